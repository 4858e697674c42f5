import { v4 as uuidv4 } from "uuid";
import {
  QuoteInputError,
  RawQuoteSchema,
  type RawQuoteItem,
  type RawSupplier,
} from "@/types/input";
import type { QuoteItem, Supplier } from "@/types/domain";

export interface ParsedQuoteInput {
  sourceId: string;
  createdAt: string;
  suppliers: Supplier<QuoteItem>[];
}

export function toQuoteItem(raw: RawQuoteItem): QuoteItem {
  return {
    name: raw.name,
    quantity: raw.quantity,
    unit: raw.unit,
    pricePerUnit: raw.price_per_unit,
    currency: raw.currency,
    totalPrice: raw.total_price,
    specs: raw.specs,
  };
}

export function toSupplier(raw: RawSupplier): Supplier<QuoteItem> {
  return {
    name: raw.name || "Unknown",
    items: raw.items.map(toQuoteItem),
    deliveryDate: raw.delivery_date,
    warranty: raw.warranty,
    vatIncluded: raw.vat_included,
    attributes: raw.attributes,
  };
}

export function parseQuoteInput(input: unknown): ParsedQuoteInput {
  const result = RawQuoteSchema.safeParse(input);
  if (!result.success) {
    throw new QuoteInputError("Quote input failed validation", "INVALID_QUOTE_INPUT", {
      issues: result.error.issues,
    });
  }

  return {
    sourceId: result.data.source_id ?? uuidv4(),
    createdAt: result.data.created_at ?? new Date().toISOString(),
    suppliers: result.data.suppliers.map(toSupplier),
  };
}
