/**
 * Per-group purchasing recommendations and project-level aggregation.
 * The inference client is asked first; any failure falls back to a
 * deterministic lowest-normalized-price rule.
 */

import { v4 as uuidv4 } from "uuid";
import { logger } from "@/lib/logger";
import { getSharedLimiter, mapWithLimit, type Limiter } from "@/lib/concurrency";
import { roundTo } from "@/lib/numbers";
import { getDefaultInferenceClient, parseJsonResponse } from "@/lib/openai";
import { RecommendationResponseSchema, type InferenceClient } from "@/types/inference";
import type {
  ComparisonGroup,
  ComparisonResult,
  EnrichedItem,
  ItemComparison,
  Recommendation,
} from "@/types/domain";

export interface ComparatorOptions {
  inference: InferenceClient;
  limiter: Limiter;
  maxSummaryMembers: number; // Offers described to the model per group (default 20)
}

type RecommendationCore = Omit<Recommendation, "multipleSuppliers" | "sameSupplierVariants">;

export const INSUFFICIENT_DATA_SUPPLIER = "Insufficient data";

const INSUFFICIENT_DATA: RecommendationCore = {
  recommendedSupplier: INSUFFICIENT_DATA_SUPPLIER,
  recommendedPrice: 0,
  priceUnit: "",
  priceDifferencePercent: 0,
  reasoning: "No normalized prices available for comparison",
  alternatives: [],
  source: "insufficient_data",
};

export class Comparator {
  private options: ComparatorOptions;

  constructor(options: Partial<ComparatorOptions> = {}) {
    this.options = {
      inference: options.inference ?? getDefaultInferenceClient(),
      limiter: options.limiter ?? getSharedLimiter(),
      maxSummaryMembers: options.maxSummaryMembers ?? 20,
    };
  }

  /**
   * Recommend a supplier for one group of equivalent items. Never rejects.
   */
  public async compareGroup(group: ComparisonGroup): Promise<Recommendation> {
    const distinctSuppliers = countDistinctSuppliers(group.items);
    const flags = {
      multipleSuppliers: distinctSuppliers > 1,
      sameSupplierVariants: distinctSuppliers <= 1,
    };

    let core: RecommendationCore | null = null;
    try {
      core = await this.recommendWithInference(group);
    } catch (error) {
      logger.error("Recommendation step failed, using price fallback", {
        group: group.key,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return { ...(core ?? simplePriceComparison(group.items)), ...flags };
  }

  public async compareGroups(groups: ComparisonGroup[]): Promise<ItemComparison[]> {
    return mapWithLimit(groups, this.options.limiter, async (group) => {
      logger.info("Comparing group", { group: group.key, options: group.items.length });
      const recommendation = await this.compareGroup(group);
      return toItemComparison(group, recommendation);
    });
  }

  public async compareProject(
    groups: ComparisonGroup[],
    { totalItems }: { totalItems?: number } = {}
  ): Promise<ComparisonResult> {
    const totalUniqueItems = totalItems ?? groups.reduce((sum, group) => sum + group.items.length, 0);

    if (groups.length === 0) {
      return buildComparisonResult("no_matches", "No matching items across suppliers", [], totalUniqueItems);
    }

    const comparisons = await this.compareGroups(groups);
    const result = buildComparisonResult(
      "success",
      `Compared ${comparisons.length} items`,
      comparisons,
      totalUniqueItems
    );

    logger.info("Project comparison completed", {
      runId: result.runId,
      itemsCompared: result.itemsCompared,
      averageSavingsPercent: result.averageSavingsPercent,
      inferenceRecommendations: comparisons.filter((c) => c.recommendation.source === "inference").length,
      fallbackRecommendations: comparisons.filter((c) => c.recommendation.source !== "inference").length,
    });

    return result;
  }

  private async recommendWithInference(group: ComparisonGroup): Promise<RecommendationCore | null> {
    const itemName = group.items[0]?.name ?? group.key;
    let text: string;
    try {
      text = await this.options.inference.complete({
        purpose: "recommendation",
        prompt: buildRecommendationPrompt(itemName, group.items.slice(0, this.options.maxSummaryMembers)),
        maxOutputTokens: 600,
      });
    } catch (error) {
      logger.warn("Recommendation inference failed", {
        group: group.key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = parseJsonResponse(text, RecommendationResponseSchema);
    if (!parsed.ok) {
      logger.warn("Unusable recommendation response", {
        group: group.key,
        reason: parsed.reason,
        responsePreview: text.slice(0, 200),
      });
      return null;
    }

    const suppliers = new Set(group.items.map((item) => item.supplier.name));
    const recommended = parsed.data.recommended_supplier;
    if (!suppliers.has(recommended)) {
      logger.warn("Recommended supplier is not part of the group", { group: group.key, recommended });
      return null;
    }

    logger.info("Inference recommendation", { group: group.key, recommended });

    return {
      recommendedSupplier: recommended,
      recommendedPrice: roundTo(parsed.data.recommended_price, 2),
      priceUnit: parsed.data.price_unit,
      priceDifferencePercent: roundTo(parsed.data.price_difference_percent, 1),
      reasoning: parsed.data.reasoning,
      alternatives: parsed.data.alternatives,
      source: "inference",
    };
  }
}

/**
 * Deterministic fallback: lowest positive normalized price wins.
 */
export function simplePriceComparison(items: EnrichedItem[]): RecommendationCore {
  const validItems = items.filter(
    (item) => Number.isFinite(item.normalizedPrice) && item.normalizedPrice > 0
  );

  if (validItems.length === 0) {
    return { ...INSUFFICIENT_DATA, alternatives: [] };
  }

  // Array.prototype.sort is stable, so equal prices keep ingestion order
  const sortedItems = [...validItems].sort((a, b) => a.normalizedPrice - b.normalizedPrice);
  const bestItem = sortedItems[0];
  const worstItem = sortedItems[sortedItems.length - 1];

  const bestPrice = bestItem.normalizedPrice;
  const worstPrice = worstItem.normalizedPrice;
  const priceDiff = worstPrice > 0 ? ((worstPrice - bestPrice) / worstPrice) * 100 : 0;

  return {
    recommendedSupplier: bestItem.supplier.name,
    recommendedPrice: bestPrice,
    priceUnit: bestItem.normalizedUnit,
    priceDifferencePercent: roundTo(priceDiff, 1),
    reasoning: `Best price among ${validItems.length} offers`,
    alternatives: sortedItems.slice(1, 3).map((item) => item.supplier.name),
    source: "fallback",
  };
}

export function summarizeSavings(comparisons: ItemComparison[]): {
  itemsCompared: number;
  averageSavingsPercent: number;
} {
  const savings = comparisons
    .map((comparison) => comparison.recommendation.priceDifferencePercent)
    .filter((value) => Number.isFinite(value) && value > 0);

  const average = savings.length > 0 ? savings.reduce((sum, value) => sum + value, 0) / savings.length : 0;

  return {
    itemsCompared: comparisons.length,
    averageSavingsPercent: roundTo(average, 1),
  };
}

export function buildComparisonResult(
  status: ComparisonResult["status"],
  message: string,
  comparisons: ItemComparison[],
  totalUniqueItems: number
): ComparisonResult {
  const { itemsCompared, averageSavingsPercent } = summarizeSavings(comparisons);
  return {
    runId: uuidv4(),
    status,
    message,
    itemsCompared,
    averageSavingsPercent,
    totalUniqueItems,
    itemComparisons: comparisons,
    generatedAt: new Date().toISOString(),
  };
}

function toItemComparison(group: ComparisonGroup, recommendation: Recommendation): ItemComparison {
  return {
    itemName: group.key,
    optionsCount: group.items.length,
    distinctSuppliers: countDistinctSuppliers(group.items),
    recommendation,
    allOptions: group.items.map((item) => ({
      supplier: item.supplier.name,
      price: item.normalizedPrice,
      unit: item.normalizedUnit,
      completeness: item.completenessScore,
    })),
  };
}

function countDistinctSuppliers(items: EnrichedItem[]): number {
  return new Set(items.map((item) => item.supplier.name)).size;
}

function buildRecommendationPrompt(itemName: string, items: EnrichedItem[]): string {
  const offers = items.map((item, index) => ({
    offer: index + 1,
    supplier: item.supplier.name,
    originalPrice: `${item.pricePerUnit} ${item.currency} per ${item.unit}`.trim(),
    normalizedPrice: `${item.normalizedPrice} per ${item.normalizedUnit}`,
    quantity: `${item.normalizedQuantity} ${item.normalizedUnit}`,
    specs: item.specs,
    dataCompleteness: `${Math.round(item.completenessScore * 100)}%`,
  }));

  return `You are a procurement analyst comparing supplier offers for: "${itemName}"

Offers:
${JSON.stringify(offers, null, 2)}

Task:
1. Compare the normalized prices.
2. Assess data completeness and specifications (complete information matters).
3. Recommend which supplier to choose.

Return ONLY JSON in this exact shape:
{
  "recommended_supplier": "<supplier name exactly as listed>",
  "recommended_price": <normalized price>,
  "price_unit": "<unit>",
  "price_difference_percent": <percent difference against the worst option>,
  "reasoning": "<2-3 sentences>",
  "alternatives": ["<supplier>", "<supplier>"]
}

If every option is poor or the data is insufficient, say so in reasoning.`;
}

/**
 * Factory function to create a comparator with default options
 */
export function createComparator(options?: Partial<ComparatorOptions>): Comparator {
  return new Comparator(options);
}
