/**
 * Cross-supplier grouping of quote items by approximate name similarity.
 *
 * Greedy single linkage in ingestion order: each item joins the existing group
 * whose key scores best (token sort ratio), or opens a new group. The result
 * depends on input order and is not a globally optimal clustering.
 */

import { logger } from "@/lib/logger";
import { getEnv } from "@/lib/env";
import { normalizeItemName, tokenSortRatio } from "./normalizer";
import type { ComparisonGroup } from "@/types/domain";

export interface GroupingOptions {
  threshold: number; // Minimum token sort ratio (0-100) to join a group
  minGroupSize: number; // Groups below this size are not comparable (default 2)
}

interface GroupMatch<T> {
  key: string;
  members: T[];
  score: number;
}

export class CrossSupplierGrouper {
  private options: GroupingOptions;

  constructor(options: Partial<GroupingOptions> = {}) {
    this.options = {
      threshold: options.threshold ?? getEnv().GROUPING_SIMILARITY_THRESHOLD,
      minGroupSize: options.minGroupSize ?? 2,
    };
  }

  /**
   * Cluster items and keep only comparable groups, keyed by the normalized
   * name of the item that opened each group.
   */
  public group<T extends { name: string }>(items: T[]): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    let skipped = 0;

    for (const item of items) {
      const name = normalizeItemName(item.name);
      if (!name) {
        skipped++;
        continue;
      }

      const match = this.findBestGroup(name, groups);
      if (match && match.score >= this.options.threshold) {
        match.members.push(item);
      } else {
        groups.set(name, [item]);
      }
    }

    const comparable = new Map<string, T[]>();
    for (const [key, members] of groups) {
      if (members.length >= this.options.minGroupSize) {
        comparable.set(key, members);
      }
    }

    logger.info("Grouped items across suppliers", {
      items: items.length,
      skippedWithoutName: skipped,
      groupsObserved: groups.size,
      comparableGroups: comparable.size,
      threshold: this.options.threshold,
    });

    return comparable;
  }

  private findBestGroup<T>(name: string, groups: Map<string, T[]>): GroupMatch<T> | null {
    let best: GroupMatch<T> | null = null;

    for (const [key, members] of groups) {
      const score = key === name ? 100 : tokenSortRatio(name, key);
      // Strict comparison: the earliest group wins ties
      if (!best || score > best.score) {
        best = { key, members, score };
      }
    }

    return best;
  }
}

export function groupSimilarItems<T extends { name: string }>(
  items: T[],
  options?: Partial<GroupingOptions>
): Map<string, T[]> {
  return new CrossSupplierGrouper(options).group(items);
}

export function toComparisonGroups<T>(grouped: Map<string, T[]>): ComparisonGroup<T>[] {
  return [...grouped.entries()].map(([key, items]) => ({ key, items }));
}
