import { describe, expect, it } from "vitest";

import {
  Comparator,
  INSUFFICIENT_DATA_SUPPLIER,
  simplePriceComparison,
  summarizeSavings,
} from "@/lib/comparison/comparator";
import { createLimiter } from "@/lib/concurrency";
import type { ItemComparison } from "@/types/domain";
import { fakeInference, makeEnrichedItem } from "./fixtures";

function createComparator(inference = fakeInference()) {
  return {
    ...inference,
    comparator: new Comparator({ inference: inference.client, limiter: createLimiter(2) }),
  };
}

const threeOffers = () => [
  makeEnrichedItem("Beta", 150),
  makeEnrichedItem("Alpha", 100),
  makeEnrichedItem("Gamma", 200),
];

describe("simplePriceComparison", () => {
  it("recommends the lowest normalized price", () => {
    expect(simplePriceComparison(threeOffers())).toEqual({
      recommendedSupplier: "Alpha",
      recommendedPrice: 100,
      priceUnit: "kg",
      priceDifferencePercent: 50,
      reasoning: "Best price among 3 offers",
      alternatives: ["Beta", "Gamma"],
      source: "fallback",
    });
  });

  it("ignores offers without a positive price", () => {
    const result = simplePriceComparison([
      makeEnrichedItem("Alpha", 0),
      makeEnrichedItem("Beta", 80),
      makeEnrichedItem("Gamma", 100),
    ]);

    expect(result.recommendedSupplier).toBe("Beta");
    expect(result.priceDifferencePercent).toBe(20);
    expect(result.alternatives).toEqual(["Gamma"]);
    expect(result.reasoning).toBe("Best price among 2 offers");
  });

  it("keeps the earlier offer on equal prices", () => {
    const result = simplePriceComparison([makeEnrichedItem("Beta", 100), makeEnrichedItem("Alpha", 100)]);

    expect(result.recommendedSupplier).toBe("Beta");
    expect(result.priceDifferencePercent).toBe(0);
  });

  it("returns the insufficient data sentinel when no price is usable", () => {
    expect(simplePriceComparison([makeEnrichedItem("Alpha", 0), makeEnrichedItem("Beta", 0)])).toEqual({
      recommendedSupplier: INSUFFICIENT_DATA_SUPPLIER,
      recommendedPrice: 0,
      priceUnit: "",
      priceDifferencePercent: 0,
      reasoning: "No normalized prices available for comparison",
      alternatives: [],
      source: "insufficient_data",
    });
  });
});

describe("Comparator", () => {
  it("uses the inference recommendation when it names a group member", async () => {
    const { comparator, complete } = createComparator(
      fakeInference(async () =>
        JSON.stringify({
          recommended_supplier: "Beta",
          recommended_price: 99.456,
          price_unit: "kg",
          price_difference_percent: 25,
          reasoning: "Complete specifications at a fair price.",
          alternatives: ["Alpha"],
        })
      )
    );

    const recommendation = await comparator.compareGroup({ key: "portland cement m500", items: threeOffers() });

    expect(recommendation).toEqual({
      recommendedSupplier: "Beta",
      recommendedPrice: 99.46,
      priceUnit: "kg",
      priceDifferencePercent: 25,
      reasoning: "Complete specifications at a fair price.",
      alternatives: ["Alpha"],
      multipleSuppliers: true,
      sameSupplierVariants: false,
      source: "inference",
    });
    expect(complete.mock.calls[0][0].purpose).toBe("recommendation");
  });

  it("falls back when the recommended supplier is not in the group", async () => {
    const { comparator } = createComparator(
      fakeInference(async () =>
        JSON.stringify({ recommended_supplier: "Omega", recommended_price: 1, price_difference_percent: 5 })
      )
    );

    const recommendation = await comparator.compareGroup({ key: "cement", items: threeOffers() });

    expect(recommendation.source).toBe("fallback");
    expect(recommendation.recommendedSupplier).toBe("Alpha");
  });

  it("falls back when inference fails or returns no JSON", async () => {
    const failing = createComparator();
    const prose = createComparator(fakeInference(async () => "Alpha looks best to me."));

    const [afterError, afterProse] = await Promise.all([
      failing.comparator.compareGroup({ key: "cement", items: threeOffers() }),
      prose.comparator.compareGroup({ key: "cement", items: threeOffers() }),
    ]);

    expect(afterError.source).toBe("fallback");
    expect(afterError.priceDifferencePercent).toBe(50);
    expect(afterProse.recommendedSupplier).toBe("Alpha");
  });

  it("flags groups whose offers all come from one supplier", async () => {
    const { comparator } = createComparator();

    const recommendation = await comparator.compareGroup({
      key: "cement",
      items: [makeEnrichedItem("Alpha", 10), makeEnrichedItem("Alpha", 12)],
    });

    expect(recommendation.multipleSuppliers).toBe(false);
    expect(recommendation.sameSupplierVariants).toBe(true);
  });

  it("aggregates a project comparison", async () => {
    const { comparator } = createComparator();

    const result = await comparator.compareProject(
      [
        { key: "portland cement m500", items: threeOffers() },
        { key: "steel pipe", items: [makeEnrichedItem("Alpha", 100), makeEnrichedItem("Beta", 100)] },
      ],
      { totalItems: 7 }
    );

    expect(result.status).toBe("success");
    expect(result.message).toBe("Compared 2 items");
    expect(result.itemsCompared).toBe(2);
    expect(result.averageSavingsPercent).toBe(50);
    expect(result.totalUniqueItems).toBe(7);
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(result.itemComparisons[0]).toMatchObject({
      itemName: "portland cement m500",
      optionsCount: 3,
      distinctSuppliers: 3,
    });
    expect(result.itemComparisons[1].allOptions).toEqual([
      { supplier: "Alpha", price: 100, unit: "kg", completeness: 1 },
      { supplier: "Beta", price: 100, unit: "kg", completeness: 1 },
    ]);
  });

  it("reports no matches for an empty group list", async () => {
    const { comparator, complete } = createComparator();

    const result = await comparator.compareProject([]);

    expect(result.status).toBe("no_matches");
    expect(result.message).toBe("No matching items across suppliers");
    expect(result.itemComparisons).toEqual([]);
    expect(complete).not.toHaveBeenCalled();
  });
});

describe("summarizeSavings", () => {
  it("averages only positive savings", () => {
    const comparisons = [50, 0, 25].map(
      (priceDifferencePercent): ItemComparison => ({
        itemName: "item",
        optionsCount: 2,
        distinctSuppliers: 2,
        allOptions: [],
        recommendation: {
          recommendedSupplier: "Alpha",
          recommendedPrice: 1,
          priceUnit: "kg",
          priceDifferencePercent,
          reasoning: "",
          alternatives: [],
          multipleSuppliers: true,
          sameSupplierVariants: false,
          source: "fallback",
        },
      })
    );

    expect(summarizeSavings(comparisons)).toEqual({ itemsCompared: 3, averageSavingsPercent: 37.5 });
    expect(summarizeSavings([])).toEqual({ itemsCompared: 0, averageSavingsPercent: 0 });
  });
});
