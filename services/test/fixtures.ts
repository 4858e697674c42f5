import { vi } from "vitest";
import type { EnrichedItem, QuoteItem } from "@/types/domain";
import type { InferenceClient, InferenceRequest } from "@/types/inference";

export function makeItem(overrides: Partial<QuoteItem> = {}): QuoteItem {
  return {
    name: "Portland cement M500",
    quantity: 1,
    unit: "kg",
    pricePerUnit: 10,
    currency: "USD",
    totalPrice: 10,
    specs: {},
    ...overrides,
  };
}

export function makeEnrichedItem(
  supplier: string,
  normalizedPrice: number,
  overrides: Partial<EnrichedItem> = {}
): EnrichedItem {
  return {
    ...makeItem({ pricePerUnit: normalizedPrice }),
    normalizedQuantity: 1,
    normalizedUnit: "kg",
    normalizedPrice,
    normalizationMethod: "table",
    completenessScore: 1,
    missingSpecs: [],
    supplier: { name: supplier, sourceId: "quote-1" },
    ...overrides,
  };
}

export function fakeInference(
  impl: (request: InferenceRequest) => Promise<string> = () => Promise.reject(new Error("offline"))
) {
  const complete = vi.fn(impl);
  const client: InferenceClient = { complete };
  return { client, complete };
}
