/**
 * Detects commercial information missing from supplier quotes and drafts
 * clarification requests back to the suppliers.
 */

import { logger } from "@/lib/logger";
import { getSharedLimiter, mapWithLimit, type Limiter } from "@/lib/concurrency";
import { getDefaultInferenceClient } from "@/lib/openai";
import { getRequiredFields } from "@/lib/categories/catalog";
import type { InferenceClient } from "@/types/inference";
import type { ClarificationRequest, Quote, QuoteItem, SpecValue, Supplier } from "@/types/domain";

type ItemField = "pricePerUnit" | "unit" | "quantity";

const ITEM_LEVEL_FIELDS = new Map<string, ItemField>([
  ["price_per_unit", "pricePerUnit"],
  ["unit", "unit"],
  ["quantity", "quantity"],
]);

export interface ClarifierOptions {
  inference: InferenceClient;
  limiter: Limiter;
}

/**
 * Missing field labels per supplier. The first item of each supplier stands in
 * for the rest; suppliers without items or without gaps are left out.
 */
export function detectMissingFields(
  suppliers: Supplier<QuoteItem>[],
  category: string
): Record<string, string[]> {
  const requiredFields = getRequiredFields(category);
  const missingBySupplier: Record<string, string[]> = {};

  for (const supplier of suppliers) {
    const sampleItem = supplier.items[0];
    if (!sampleItem) {
      continue;
    }

    const missing: string[] = [];
    for (const [fieldKey, label] of Object.entries(requiredFields)) {
      const itemField = ITEM_LEVEL_FIELDS.get(fieldKey);
      const present = itemField
        ? Boolean(sampleItem[itemField])
        : hasSupplierTerm(supplier, fieldKey) || fieldKey in sampleItem.specs;

      if (!present) {
        missing.push(label);
      }
    }

    if (missing.length > 0) {
      missingBySupplier[supplier.name || "Unknown"] = missing;
    }
  }

  return missingBySupplier;
}

function hasSupplierTerm(supplier: Supplier<QuoteItem>, fieldKey: string): boolean {
  switch (fieldKey) {
    case "delivery_date":
      return isStated(supplier.deliveryDate);
    case "warranty":
      return isStated(supplier.warranty) || isStated(supplier.attributes.warranty);
    case "vat_included":
      return supplier.vatIncluded !== undefined || isStated(supplier.attributes.vat_included);
    default:
      return isStated(supplier.attributes[fieldKey]);
  }
}

function isStated(value: SpecValue | undefined): boolean {
  return value !== undefined && String(value).trim().length > 0;
}

export class Clarifier {
  private options: ClarifierOptions;

  constructor(options: Partial<ClarifierOptions> = {}) {
    this.options = {
      inference: options.inference ?? getDefaultInferenceClient(),
      limiter: options.limiter ?? getSharedLimiter(),
    };
  }

  public detectMissingFields(suppliers: Supplier<QuoteItem>[], category: string): Record<string, string[]> {
    return detectMissingFields(suppliers, category);
  }

  /**
   * Draft a request for the missing information. Falls back to a fixed
   * template when the inference client fails or answers with nothing.
   */
  public async generateClarificationMessage(
    supplierName: string,
    missingFields: string[],
    projectName?: string
  ): Promise<string> {
    try {
      const message = (
        await this.options.inference.complete({
          purpose: "clarification",
          prompt: buildClarificationPrompt(supplierName, missingFields, projectName),
          maxOutputTokens: 500,
        })
      ).trim();

      if (message) {
        logger.info("Generated clarification message", { supplier: supplierName });
        return message;
      }
      logger.warn("Empty clarification message, using template", { supplier: supplierName });
    } catch (error) {
      logger.warn("Clarification drafting failed, using template", {
        supplier: supplierName,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return templateClarificationMessage(supplierName, missingFields);
  }

  public async generateAllClarifications(
    quotes: Quote[],
    projectName?: string
  ): Promise<ClarificationRequest[]> {
    const pending = quotes.flatMap((quote) =>
      Object.entries(quote.missingFields)
        .filter(([, missingFields]) => missingFields.length > 0)
        .map(([supplier, missingFields]) => ({ sourceId: quote.sourceId, supplier, missingFields }))
    );

    const clarifications = await mapWithLimit(pending, this.options.limiter, async (entry) => ({
      ...entry,
      message: await this.generateClarificationMessage(entry.supplier, entry.missingFields, projectName),
    }));

    logger.info("Generated clarification requests", { count: clarifications.length });
    return clarifications;
  }
}

export function templateClarificationMessage(supplierName: string, missingFields: string[]): string {
  const fieldList = missingFields.map((field, index) => `${index + 1}. ${field}`).join("\n");

  return `Dear ${supplierName},

Thank you for your commercial offer.

To make a decision we need the following information:

${fieldList}

Please provide these details at your earliest convenience.

Kind regards,
Procurement team`;
}

function buildClarificationPrompt(supplierName: string, missingFields: string[], projectName?: string): string {
  const context = projectName ? `the "${projectName}" project` : "your commercial offer";

  return `Write a short professional business email asking a supplier for missing information.

Context:
- Supplier: ${supplierName}
- Regarding: ${context}
- Missing information: ${missingFields.join(", ")}

Requirements:
1. Polite, professional tone
2. Brief and to the point
3. A clear list of what needs clarification
4. Thank them for the cooperation

Return ONLY the email text without extra commentary.`;
}

/**
 * Factory function to create a clarifier with default options
 */
export function createClarifier(options?: Partial<ClarifierOptions>): Clarifier {
  return new Clarifier(options);
}
