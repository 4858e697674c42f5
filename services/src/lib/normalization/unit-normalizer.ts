/**
 * Unit normalization for supplier quote items.
 * Table conversions cover the six measurement families; packaging units
 * (box, roll, pallet ...) are delegated to the inference client.
 */

import { logger } from "@/lib/logger";
import { getEnv } from "@/lib/env";
import { getSharedLimiter, mapWithLimit, type Limiter } from "@/lib/concurrency";
import { roundTo } from "@/lib/numbers";
import { getDefaultInferenceClient, parseJsonResponse } from "@/lib/openai";
import { canonicalizeUnit, isPackagingUnit, lookupUnit } from "./units";
import {
  UnitConversionResponseSchema,
  type InferenceClient,
  type UnitConversionResponse,
} from "@/types/inference";
import type { NormalizedItem, QuoteItem, Supplier } from "@/types/domain";

export const QUANTITY_DECIMALS = 4;
export const PRICE_DECIMALS = 2;

export interface UnitNormalizerOptions {
  inference: InferenceClient;
  limiter: Limiter;
  minConfidence: number; // Inferred conversions at or below this are discarded (default 0.3)
}

export class UnitNormalizer {
  private options: UnitNormalizerOptions;

  constructor(options: Partial<UnitNormalizerOptions> = {}) {
    this.options = {
      inference: options.inference ?? getDefaultInferenceClient(),
      limiter: options.limiter ?? getSharedLimiter(),
      minConfidence: options.minConfidence ?? getEnv().UNIT_INFERENCE_MIN_CONFIDENCE,
    };
  }

  /**
   * Attach normalized quantity, unit and price to an item. Never rejects:
   * anything that cannot be resolved keeps its original values.
   */
  public async normalize<T extends QuoteItem>(item: T): Promise<NormalizedItem<T>> {
    try {
      return await this.resolve(item);
    } catch (error) {
      logger.error("Unit normalization failed, keeping original values", {
        item: item.name,
        unit: item.unit,
        error: error instanceof Error ? error.message : String(error),
      });
      return passthrough(item);
    }
  }

  public async normalizeSupplier<T extends QuoteItem>(
    supplier: Supplier<T>
  ): Promise<Supplier<NormalizedItem<T>>> {
    const items = await mapWithLimit(supplier.items, this.options.limiter, (item) => this.normalize(item));
    return { ...supplier, items };
  }

  public async normalizeSuppliers<T extends QuoteItem>(
    suppliers: Supplier<T>[]
  ): Promise<Supplier<NormalizedItem<T>>[]> {
    const normalized = await Promise.all(suppliers.map((supplier) => this.normalizeSupplier(supplier)));

    logger.info("Normalized supplier items", {
      suppliers: normalized.length,
      items: normalized.reduce((sum, supplier) => sum + supplier.items.length, 0),
    });

    return normalized;
  }

  private async resolve<T extends QuoteItem>(item: T): Promise<NormalizedItem<T>> {
    const { quantity, unit, pricePerUnit } = item;

    if (!canonicalizeUnit(unit)) {
      return passthrough(item);
    }

    const conversion = lookupUnit(unit);
    if (conversion) {
      const normalizedQuantity = quantity * conversion.factor;
      const normalizedPrice =
        normalizedQuantity > 0 ? (pricePerUnit * quantity) / normalizedQuantity : pricePerUnit;

      logger.debug("Table unit conversion", {
        from: `${quantity} ${unit}`,
        to: `${normalizedQuantity} ${conversion.canonicalUnit}`,
      });

      return {
        ...item,
        normalizedQuantity: roundTo(normalizedQuantity, QUANTITY_DECIMALS),
        normalizedUnit: conversion.canonicalUnit,
        normalizedPrice: roundTo(normalizedPrice, PRICE_DECIMALS),
        normalizationMethod: "table",
      };
    }

    if (isPackagingUnit(unit)) {
      const inferred = await this.inferConversion(item);
      if (inferred) {
        return {
          ...item,
          normalizedQuantity: roundTo(inferred.normalized_quantity, QUANTITY_DECIMALS),
          normalizedUnit: inferred.normalized_unit,
          normalizedPrice: roundTo(inferred.normalized_price, PRICE_DECIMALS),
          normalizationMethod: "inference",
        };
      }
    }

    logger.warn("Could not normalize unit", { item: item.name, unit });
    return passthrough(item);
  }

  private async inferConversion(item: QuoteItem): Promise<UnitConversionResponse | null> {
    let text: string;
    try {
      text = await this.options.inference.complete({
        purpose: "unit_conversion",
        prompt: buildConversionPrompt(item),
        maxOutputTokens: 300,
      });
    } catch (error) {
      logger.warn("Packaging unit inference failed", {
        item: item.name,
        unit: item.unit,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = parseJsonResponse(text, UnitConversionResponseSchema);
    if (!parsed.ok) {
      logger.warn("Unusable packaging unit conversion", {
        item: item.name,
        unit: item.unit,
        reason: parsed.reason,
        responsePreview: text.slice(0, 200),
      });
      return null;
    }

    if (parsed.data.confidence <= this.options.minConfidence) {
      logger.warn("Packaging unit conversion below confidence threshold", {
        item: item.name,
        unit: item.unit,
        confidence: parsed.data.confidence,
      });
      return null;
    }

    logger.info("Packaging unit converted", {
      item: item.name,
      from: item.unit,
      to: parsed.data.normalized_unit,
      confidence: parsed.data.confidence,
    });
    return parsed.data;
  }
}

function passthrough<T extends QuoteItem>(item: T): NormalizedItem<T> {
  return {
    ...item,
    normalizedQuantity: item.quantity,
    normalizedUnit: item.unit,
    normalizedPrice: item.pricePerUnit,
    normalizationMethod: "passthrough",
  };
}

function buildConversionPrompt(item: QuoteItem): string {
  return `Task: normalize a unit of measure so that supplier prices can be compared.

Item: ${item.name}
Quantity: ${item.quantity} ${item.unit}
Price: ${item.pricePerUnit} per ${item.unit}

Instructions:
1. The unit is a package, box, roll, bag, pallet or sack. Work out how many base units it holds from the item name.
2. Convert the quantity to a base unit (pcs, kg, m, m2, m3).
3. Compute the price per base unit.

Return ONLY JSON in this exact shape:
{
  "normalized_quantity": <number>,
  "normalized_unit": "<base unit>",
  "normalized_price": <price per base unit>,
  "confidence": <0-1, how sure you are about the conversion>
}

If the conversion is not possible, return confidence 0 and the original values.`;
}

/**
 * Factory function to create a unit normalizer with default options
 */
export function createUnitNormalizer(options?: Partial<UnitNormalizerOptions>): UnitNormalizer {
  return new UnitNormalizer(options);
}
