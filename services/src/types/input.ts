import { z } from "zod";
import { parseNumeric } from "@/lib/numbers";

// Absent or unparseable numbers count as 0
const numberField = z.preprocess((value) => parseNumeric(value) ?? 0, z.number());

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string {
  if (typeof value === "string") {
    return value.trim();
  }
  return typeof value === "number" && Number.isFinite(value) ? String(value) : "";
}

const stringField = z.unknown().transform(toText);

const optionalStringField = stringField.transform((value) => value || undefined);

// Free-text supplier terms; a bare flag becomes "yes"/"no"
const termField = z
  .unknown()
  .transform((value) => (typeof value === "boolean" ? (value ? "yes" : "no") : toText(value) || undefined));

const TRUE_FLAGS = new Set(["yes", "y", "true", "1", "included", "incl", "да", "включен", "включено"]);
const FALSE_FLAGS = new Set(["no", "n", "false", "0", "excluded", "excl", "нет", "без ндс", "не включен"]);

// Unrecognised values mean the supplier did not state it
const flagField = z.unknown().transform((value): boolean | undefined => {
  if (typeof value === "boolean") {
    return value;
  }
  const text = toText(value).toLowerCase();
  if (TRUE_FLAGS.has(text)) {
    return true;
  }
  return FALSE_FLAGS.has(text) ? false : undefined;
});

const specMapField = z.unknown().transform((specs) => {
  const out: Record<string, string | number> = {};
  if (!isRecord(specs)) {
    return out;
  }
  for (const [key, value] of Object.entries(specs)) {
    if (typeof value === "string" || typeof value === "number") {
      out[key] = value;
    } else if (typeof value === "boolean") {
      out[key] = value ? "yes" : "no";
    }
  }
  return out;
});

// Non-object entries carry nothing usable and are dropped
const recordList = z.unknown().transform((value) => (Array.isArray(value) ? value.filter(isRecord) : []));

// Item as produced by the upstream document extraction step
export const RawQuoteItemSchema = z.object({
  name: stringField.describe("Item name as written by the supplier"),
  quantity: numberField,
  unit: stringField.describe("Unit of measurement (e.g. 'kg', 'pcs', 'box')"),
  price_per_unit: numberField,
  currency: stringField,
  total_price: numberField,
  specs: specMapField.describe("Attribute name to value"),
});

export const RawSupplierSchema = z.object({
  name: stringField,
  items: recordList.pipe(z.array(RawQuoteItemSchema)),
  delivery_date: optionalStringField,
  warranty: termField,
  vat_included: flagField,
  attributes: specMapField,
});

// Only a missing or non-array supplier list is rejected
export const RawQuoteSchema = z.object({
  source_id: optionalStringField,
  created_at: optionalStringField,
  suppliers: z
    .array(z.unknown())
    .transform((suppliers) => suppliers.filter(isRecord))
    .pipe(z.array(RawSupplierSchema)),
});

export type RawQuoteItem = z.infer<typeof RawQuoteItemSchema>;
export type RawSupplier = z.infer<typeof RawSupplierSchema>;
export type RawQuoteInput = z.input<typeof RawQuoteSchema>;

export class QuoteInputError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_QUOTE_INPUT",
    public readonly context?: { issues: z.ZodIssue[] }
  ) {
    super(message);
    this.name = "QuoteInputError";
  }
}
