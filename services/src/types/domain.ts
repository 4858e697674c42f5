import type { ProductCategory } from "@/lib/categories/catalog";

export type SpecValue = string | number;
export type SpecMap = Record<string, SpecValue>;

export interface QuoteItem {
  name: string;
  quantity: number;
  unit: string;
  pricePerUnit: number;
  currency: string;
  totalPrice: number;
  specs: SpecMap;
}

export type NormalizationMethod = "table" | "inference" | "passthrough";

export interface UnitNormalization {
  normalizedQuantity: number;
  normalizedUnit: string;
  normalizedPrice: number;
  normalizationMethod: NormalizationMethod;
}

export type NormalizedItem<TItem extends QuoteItem = QuoteItem> = TItem & UnitNormalization;

export interface CompletenessResult {
  completenessScore: number;
  hasSpecs: string[];
  missingSpecs: string[];
}

export interface SupplierAttribution {
  name: string;
  sourceId: string;
}

// Item as it leaves quote processing: normalized, scored and attributed.
export interface EnrichedItem extends NormalizedItem {
  completenessScore: number;
  missingSpecs: string[];
  supplier: SupplierAttribution;
}

export interface Supplier<TItem extends QuoteItem = QuoteItem> {
  name: string;
  items: TItem[];
  deliveryDate?: string;
  warranty?: string;
  vatIncluded?: boolean;
  attributes: SpecMap;
}

export interface Quote {
  sourceId: string;
  createdAt: string;
  detectedCategory: ProductCategory;
  suppliers: Supplier<EnrichedItem>[];
  missingFields: Record<string, string[]>;
}

export interface ComparisonGroup<TItem = EnrichedItem> {
  key: string;
  items: TItem[];
}

export type RecommendationSource = "inference" | "fallback" | "insufficient_data";

export interface Recommendation {
  recommendedSupplier: string;
  recommendedPrice: number;
  priceUnit: string;
  priceDifferencePercent: number;
  reasoning: string;
  alternatives: string[];
  multipleSuppliers: boolean;
  sameSupplierVariants: boolean;
  source: RecommendationSource;
}

export interface ComparisonOption {
  supplier: string;
  price: number;
  unit: string;
  completeness: number;
}

export interface ItemComparison {
  itemName: string;
  optionsCount: number;
  distinctSuppliers: number;
  recommendation: Recommendation;
  allOptions: ComparisonOption[];
}

export type ComparisonStatus = "success" | "empty" | "no_matches";

export interface ComparisonResult {
  runId: string;
  status: ComparisonStatus;
  message: string;
  itemsCompared: number;
  averageSavingsPercent: number;
  totalUniqueItems: number;
  itemComparisons: ItemComparison[];
  generatedAt: string;
}

export interface ClarificationRequest {
  sourceId: string;
  supplier: string;
  missingFields: string[];
  message: string;
}
