import { logger } from "@/lib/logger";
import { parseQuoteInput } from "@/lib/mappers";
import { createUnitNormalizer, type UnitNormalizer } from "@/lib/normalization/unit-normalizer";
import { createCategoryClassifier, type CategoryClassifier } from "@/lib/categories/classifier";
import { scoreCompleteness } from "@/lib/categories/completeness";
import { detectMissingFields } from "@/lib/clarification/clarifier";
import type { EnrichedItem, Quote, Supplier } from "@/types/domain";

export interface ProcessQuoteOptions {
  normalizer?: UnitNormalizer;
  classifier?: CategoryClassifier;
  /** Tenant or project id the category cache is scoped to. */
  scope?: string;
}

let defaultNormalizer: UnitNormalizer | null = null;
let defaultClassifier: CategoryClassifier | null = null;

function getDefaultNormalizer(): UnitNormalizer {
  if (!defaultNormalizer) {
    defaultNormalizer = createUnitNormalizer();
  }
  return defaultNormalizer;
}

function getDefaultClassifier(): CategoryClassifier {
  if (!defaultClassifier) {
    defaultClassifier = createCategoryClassifier();
  }
  return defaultClassifier;
}

/**
 * Turn one extracted document into a Quote: normalize units, detect the
 * category, score spec completeness and list missing commercial fields.
 */
export async function processQuote(input: unknown, options: ProcessQuoteOptions = {}): Promise<Quote> {
  const normalizer = options.normalizer ?? getDefaultNormalizer();
  const classifier = options.classifier ?? getDefaultClassifier();

  const parsed = parseQuoteInput(input);
  const allItems = parsed.suppliers.flatMap((supplier) => supplier.items);

  logger.info("Processing quote", {
    sourceId: parsed.sourceId,
    suppliers: parsed.suppliers.length,
    items: allItems.length,
  });

  const [normalizedSuppliers, category] = await Promise.all([
    normalizer.normalizeSuppliers(parsed.suppliers),
    classifier.detectCategory(allItems, { scope: options.scope }),
  ]);

  const suppliers: Supplier<EnrichedItem>[] = normalizedSuppliers.map((supplier) => ({
    ...supplier,
    items: supplier.items.map((item) => {
      const { completenessScore, missingSpecs } = scoreCompleteness(item, category);
      return {
        ...item,
        completenessScore,
        missingSpecs,
        supplier: { name: supplier.name, sourceId: parsed.sourceId },
      };
    }),
  }));

  const missingFields = detectMissingFields(parsed.suppliers, category);

  logger.info("Quote processed", {
    sourceId: parsed.sourceId,
    category,
    suppliersWithMissingFields: Object.keys(missingFields).length,
  });

  return {
    sourceId: parsed.sourceId,
    createdAt: parsed.createdAt,
    detectedCategory: category,
    suppliers,
    missingFields,
  };
}
