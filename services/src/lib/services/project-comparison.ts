import { logger } from "@/lib/logger";
import { CrossSupplierGrouper, toComparisonGroups } from "@/lib/matching/grouper";
import { buildComparisonResult, createComparator, type Comparator } from "@/lib/comparison/comparator";
import type { ComparisonResult, Quote } from "@/types/domain";

export interface CompareProjectOptions {
  grouper?: CrossSupplierGrouper;
  comparator?: Comparator;
}

let defaultComparator: Comparator | null = null;

function getDefaultComparator(): Comparator {
  if (!defaultComparator) {
    defaultComparator = createComparator();
  }
  return defaultComparator;
}

/**
 * Compare every quote of a project: group equivalent items across suppliers
 * and recommend a supplier per group.
 */
export async function compareProjectQuotes(
  quotes: Quote[],
  options: CompareProjectOptions = {}
): Promise<ComparisonResult> {
  const items = quotes.flatMap((quote) => quote.suppliers.flatMap((supplier) => supplier.items));

  if (items.length === 0) {
    logger.warn("No items to compare", { quotes: quotes.length });
    return buildComparisonResult("empty", "No quotes to compare", [], 0);
  }

  const grouper = options.grouper ?? new CrossSupplierGrouper();
  const grouped = grouper.group(items);

  if (grouped.size === 0) {
    logger.info("No comparable items across suppliers", { items: items.length });
    return buildComparisonResult("no_matches", "No matching items across suppliers", [], items.length);
  }

  const comparator = options.comparator ?? getDefaultComparator();
  return comparator.compareProject(toComparisonGroups(grouped), { totalItems: items.length });
}
