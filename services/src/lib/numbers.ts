/**
 * Numeric coercion shared by input parsing and inference response validation.
 * Extracted values arrive as numbers or as currency formatted strings.
 */
export function parseNumeric(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return undefined;
    }

    let normalised = trimmed.replace(/[,\s]/g, "");

    // Accounting-style negatives e.g. ($1,234.50)
    let accountingNegative = false;
    if (/^\(.*\)$/.test(normalised)) {
      accountingNegative = true;
      normalised = normalised.slice(1, -1);
    }

    normalised = normalised.replace(/[£€¥$₽]/g, "");

    // Trailing annotations like 'exVAT' or stray text
    normalised = normalised.replace(/[^0-9+\-.]/g, "");

    if (!normalised || /^(?:\+|-)?\.?$/.test(normalised)) {
      return undefined;
    }

    const parsed = Number(normalised);
    if (!Number.isFinite(parsed)) {
      return undefined;
    }

    return accountingNegative ? -parsed : parsed;
  }

  return undefined;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
