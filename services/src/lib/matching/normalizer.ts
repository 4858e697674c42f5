/**
 * Text normalization and similarity utilities for cross-supplier item matching
 */

/**
 * Normalize an item name for comparison: lowercase, trim, collapse whitespace
 */
export function normalizeItemName(name: string): string {
  if (!name || typeof name !== 'string') {
    return '';
  }

  return name.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Split on whitespace and sort tokens so word order stops mattering
 */
export function sortTokens(text: string): string {
  return text
    .split(/\s+/)
    .filter(token => token.length > 0)
    .sort()
    .join(' ');
}

/**
 * Length of the longest common subsequence of two strings
 */
export function calculateLcsLength(str1: string, str2: string): number {
  if (str1.length === 0 || str2.length === 0) return 0;

  let previous = new Array<number>(str2.length + 1).fill(0);
  let current = new Array<number>(str2.length + 1).fill(0);

  for (let i = 1; i <= str1.length; i++) {
    for (let j = 1; j <= str2.length; j++) {
      current[j] = str1[i - 1] === str2[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
    current.fill(0);
  }

  return previous[str2.length];
}

/**
 * Normalized Indel similarity on a 0-100 scale: 200 * LCS / (len1 + len2)
 */
export function calculateRatio(str1: string, str2: string): number {
  const totalLength = str1.length + str2.length;
  if (totalLength === 0) return 100;

  return (200 * calculateLcsLength(str1, str2)) / totalLength;
}

/**
 * Word-order independent similarity (0-100) between two item names
 */
export function tokenSortRatio(str1: string, str2: string): number {
  return calculateRatio(sortTokens(str1), sortTokens(str2));
}
