import { describe, expect, it } from "vitest";

import { Clarifier, detectMissingFields, templateClarificationMessage } from "@/lib/clarification/clarifier";
import { createLimiter } from "@/lib/concurrency";
import type { Quote, QuoteItem, Supplier } from "@/types/domain";
import { fakeInference, makeItem } from "./fixtures";

function supplier(overrides: Partial<Supplier<QuoteItem>> = {}): Supplier<QuoteItem> {
  return {
    name: "Alpha",
    items: [makeItem({ quantity: 5, unit: "kg", pricePerUnit: 10 })],
    attributes: {},
    ...overrides,
  };
}

function createClarifier(inference = fakeInference()) {
  return {
    ...inference,
    clarifier: new Clarifier({ inference: inference.client, limiter: createLimiter(2) }),
  };
}

describe("detectMissingFields", () => {
  it("lists missing fields per supplier in required field order", () => {
    const missing = detectMissingFields(
      [
        supplier({ name: "Alpha", deliveryDate: "2024-05-01" }),
        supplier({
          name: "Beta",
          vatIncluded: false,
          attributes: { certificate: "ISO 9001" },
          items: [makeItem({ quantity: 0 })],
        }),
        supplier({ name: "Gamma", items: [] }),
        supplier({
          name: "Delta",
          deliveryDate: "2024-05-03",
          vatIncluded: true,
          items: [makeItem({ specs: { certificate: "EN 197-1" } })],
        }),
      ],
      "construction materials"
    );

    expect(missing).toEqual({
      Alpha: ["VAT included", "Quality certificate"],
      Beta: ["Quantity", "Delivery date"],
    });
  });

  it("checks warranty in supplier terms and attributes", () => {
    const missing = detectMissingFields(
      [
        supplier({ name: "Alpha", warranty: "24 months" }),
        supplier({ name: "Beta", attributes: { warranty: "1 year" } }),
        supplier({ name: "Gamma" }),
      ],
      "electronics"
    );

    expect(missing).toEqual({
      Alpha: ["Country of origin", "Delivery date"],
      Beta: ["Country of origin", "Delivery date"],
      Gamma: ["Warranty", "Country of origin", "Delivery date"],
    });
  });

  it("only checks item fields for uncategorized quotes", () => {
    const missing = detectMissingFields(
      [supplier({ name: "", items: [makeItem({ unit: "", pricePerUnit: 0 })] })],
      "general"
    );

    expect(missing).toEqual({ Unknown: ["Price per unit", "Unit of measure"] });
  });
});

describe("Clarifier", () => {
  it("uses the drafted message when inference answers", async () => {
    const { clarifier, complete } = createClarifier(fakeInference(async () => "  Dear Alpha, please send the VAT terms.  "));

    const message = await clarifier.generateClarificationMessage("Alpha", ["VAT included"], "Warehouse");

    expect(message).toBe("Dear Alpha, please send the VAT terms.");
    expect(complete.mock.calls[0][0].purpose).toBe("clarification");
    expect(complete.mock.calls[0][0].prompt).toContain('the "Warehouse" project');
  });

  it("falls back to the template on failure or an empty answer", async () => {
    const failing = createClarifier();
    const empty = createClarifier(fakeInference(async () => "   "));
    const expected = [
      "Dear Alpha,",
      "",
      "Thank you for your commercial offer.",
      "",
      "To make a decision we need the following information:",
      "",
      "1. VAT included",
      "2. Quality certificate",
      "",
      "Please provide these details at your earliest convenience.",
      "",
      "Kind regards,",
      "Procurement team",
    ].join("\n");

    await expect(
      failing.clarifier.generateClarificationMessage("Alpha", ["VAT included", "Quality certificate"])
    ).resolves.toBe(expected);
    await expect(
      empty.clarifier.generateClarificationMessage("Alpha", ["VAT included", "Quality certificate"])
    ).resolves.toBe(expected);
    expect(templateClarificationMessage("Alpha", ["VAT included", "Quality certificate"])).toBe(expected);
  });

  it("drafts one request per supplier with missing fields", async () => {
    const { clarifier } = createClarifier();
    const quote: Quote = {
      sourceId: "quote-1",
      createdAt: "2024-01-01T00:00:00.000Z",
      detectedCategory: "construction materials",
      suppliers: [],
      missingFields: { Alpha: ["Delivery date"], Beta: [] },
    };

    const requests = await clarifier.generateAllClarifications([quote]);

    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({ sourceId: "quote-1", supplier: "Alpha", missingFields: ["Delivery date"] });
    expect(requests[0].message).toContain("1. Delivery date");
  });
});
