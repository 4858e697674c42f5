import { roundTo } from "@/lib/numbers";
import { suggestImportantFields } from "./catalog";
import type { CompletenessResult, QuoteItem } from "@/types/domain";

/**
 * Share of the category's important fields present in the item's specs.
 * Categories without a checklist score 1.0.
 */
export function scoreCompleteness(item: Pick<QuoteItem, "specs">, category: string): CompletenessResult {
  const importantFields = suggestImportantFields(category);

  if (importantFields.length === 0) {
    return { completenessScore: 1.0, hasSpecs: [], missingSpecs: [] };
  }

  const specKeys = new Set(Object.keys(item.specs ?? {}));
  const hasSpecs = importantFields.filter((field) => specKeys.has(field));
  const missingSpecs = importantFields.filter((field) => !specKeys.has(field));

  return {
    completenessScore: roundTo(hasSpecs.length / importantFields.length, 2),
    hasSpecs,
    missingSpecs,
  };
}

export function enrichWithCompleteness<T extends QuoteItem>(
  items: T[],
  category: string
): Array<T & { completenessScore: number; missingSpecs: string[] }> {
  return items.map((item) => {
    const { completenessScore, missingSpecs } = scoreCompleteness(item, category);
    return { ...item, completenessScore, missingSpecs };
  });
}
