export { processQuote, type ProcessQuoteOptions } from "@/lib/services/quote-processing";
export { compareProjectQuotes, type CompareProjectOptions } from "@/lib/services/project-comparison";

export {
  UnitNormalizer,
  createUnitNormalizer,
  type UnitNormalizerOptions,
} from "@/lib/normalization/unit-normalizer";
export { canonicalizeUnit, isPackagingUnit, lookupUnit, type UnitConversion } from "@/lib/normalization/units";

export {
  CategoryClassifier,
  coerceCategory,
  createCategoryClassifier,
  type CategoryClassifierOptions,
  type DetectCategoryOptions,
} from "@/lib/categories/classifier";
export {
  GENERAL_CATEGORY,
  PRODUCT_CATEGORIES,
  getRequiredFields,
  suggestImportantFields,
  type ProductCategory,
} from "@/lib/categories/catalog";
export { enrichWithCompleteness, scoreCompleteness } from "@/lib/categories/completeness";

export {
  CrossSupplierGrouper,
  groupSimilarItems,
  toComparisonGroups,
  type GroupingOptions,
} from "@/lib/matching/grouper";
export { normalizeItemName, tokenSortRatio } from "@/lib/matching/normalizer";

export {
  Comparator,
  INSUFFICIENT_DATA_SUPPLIER,
  createComparator,
  simplePriceComparison,
  type ComparatorOptions,
} from "@/lib/comparison/comparator";
export { generateRecommendationSummary } from "@/lib/comparison/summary";

export {
  Clarifier,
  createClarifier,
  detectMissingFields,
  templateClarificationMessage,
} from "@/lib/clarification/clarifier";

export { OpenAIInferenceClient, extractJsonFromText, parseJsonResponse } from "@/lib/openai";
export { createLimiter, type Limiter } from "@/lib/concurrency";
export { parseQuoteInput } from "@/lib/mappers";

export { InferenceError, type InferenceClient, type InferenceRequest } from "@/types/inference";
export { QuoteInputError, type RawQuoteInput } from "@/types/input";
export type * from "@/types/domain";
