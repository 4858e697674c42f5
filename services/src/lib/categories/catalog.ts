import { z } from "zod";
import catalogData from "./categories.json";

export const PRODUCT_CATEGORIES = [
  "construction materials",
  "electronics",
  "furniture",
  "tools",
  "office supplies",
  "consumables",
  "plumbing",
  "electrical equipment",
] as const;

export const GENERAL_CATEGORY = "general" as const;

export type KnownCategory = (typeof PRODUCT_CATEGORIES)[number];
export type ProductCategory = KnownCategory | typeof GENERAL_CATEGORY;

const FieldLabelsSchema = z.record(z.string(), z.string());

const CatalogSchema = z.object({
  commonRequiredFields: FieldLabelsSchema,
  categories: z.record(
    z.string(),
    z.object({
      importantFields: z.array(z.string()),
      requiredFields: FieldLabelsSchema,
    })
  ),
});

const catalog = CatalogSchema.parse(catalogData);

export function isKnownCategory(value: string): value is KnownCategory {
  return PRODUCT_CATEGORIES.some((category) => category === value);
}

/**
 * Spec attributes that matter when comparing offers in a category.
 * Unknown categories (including "general") have no checklist.
 */
export function suggestImportantFields(category: string): string[] {
  return [...(catalog.categories[category]?.importantFields ?? [])];
}

/**
 * Commercial fields every supplier should state, keyed by field name with a
 * human readable label: the common item fields plus the category's terms.
 */
export function getRequiredFields(category: string): Record<string, string> {
  return {
    ...catalog.commonRequiredFields,
    ...(catalog.categories[category]?.requiredFields ?? {}),
  };
}
