import { describe, expect, it } from "vitest";

import { CategoryClassifier, coerceCategory } from "@/lib/categories/classifier";
import { createLimiter } from "@/lib/concurrency";
import { fakeInference } from "./fixtures";

const items = [{ name: "Ceramic tile 60x60" }, { name: "Portland cement M500" }];

function createClassifier(inference = fakeInference(async () => "construction materials")) {
  return {
    ...inference,
    classifier: new CategoryClassifier({
      inference: inference.client,
      limiter: createLimiter(2),
      maxEntries: 10,
      ttlMs: 60_000,
    }),
  };
}

describe("coerceCategory", () => {
  it("normalizes case, quotes and a trailing period", () => {
    expect(coerceCategory("Electronics.")).toBe("electronics");
    expect(coerceCategory(' "Plumbing" ')).toBe("plumbing");
    expect(coerceCategory("office supplies\n")).toBe("office supplies");
  });

  it("maps anything outside the closed set to general", () => {
    expect(coerceCategory("Power tools")).toBe("general");
    expect(coerceCategory("")).toBe("general");
  });
});

describe("CategoryClassifier", () => {
  it("returns general for an empty batch without calling inference", async () => {
    const { classifier, complete } = createClassifier();

    await expect(classifier.detectCategory([])).resolves.toBe("general");
    expect(complete).not.toHaveBeenCalled();
  });

  it("caches labels per sample", async () => {
    const { classifier, complete } = createClassifier();

    await expect(classifier.detectCategory(items)).resolves.toBe("construction materials");
    await expect(classifier.detectCategory(items)).resolves.toBe("construction materials");

    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0].purpose).toBe("category_detection");
    expect(classifier.cacheSize).toBe(1);
  });

  it("does not share cached labels across scopes", async () => {
    const { classifier, complete } = createClassifier();

    await classifier.detectCategory(items, { scope: "tenant-a" });
    await classifier.detectCategory(items, { scope: "tenant-b" });
    await classifier.detectCategory(items, { scope: "tenant-a" });

    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("only samples the first ten item names", async () => {
    const { classifier, complete } = createClassifier();
    const batch = Array.from({ length: 12 }, (_, index) => ({ name: `item-${index + 1}` }));

    await classifier.detectCategory(batch);
    await classifier.detectCategory([...batch.slice(0, 10), { name: "something else" }]);

    const prompt = complete.mock.calls[0][0].prompt;
    expect(prompt).toContain("item-10");
    expect(prompt).not.toContain("item-11");
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("caches unknown answers as general", async () => {
    const { classifier, complete } = createClassifier(fakeInference(async () => "Gardening equipment"));

    await expect(classifier.detectCategory(items)).resolves.toBe("general");
    await expect(classifier.detectCategory(items)).resolves.toBe("general");

    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("does not cache failed calls", async () => {
    const { classifier, complete } = createClassifier(fakeInference());

    await expect(classifier.detectCategory(items)).resolves.toBe("general");
    expect(classifier.cacheSize).toBe(0);

    await classifier.detectCategory(items);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("shares one call between concurrent identical batches", async () => {
    let release: (answer: string) => void = () => undefined;
    const pending = new Promise<string>((resolve) => {
      release = resolve;
    });
    const { classifier, complete } = createClassifier(fakeInference(() => pending));

    const first = classifier.detectCategory(items);
    const second = classifier.detectCategory(items);
    release("furniture");

    await expect(Promise.all([first, second])).resolves.toEqual(["furniture", "furniture"]);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("clears the cache on request", async () => {
    const { classifier, complete } = createClassifier();

    await classifier.detectCategory(items);
    classifier.clearCache();
    await classifier.detectCategory(items);

    expect(classifier.cacheSize).toBe(1);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("suggests a copy of the category checklist", () => {
    const { classifier } = createClassifier();

    const fields = classifier.suggestImportantFields("furniture");
    fields.push("extra");

    expect(classifier.suggestImportantFields("furniture")).toEqual([
      "dimensions",
      "material",
      "color",
      "weight_capacity",
      "assembly_required",
      "style",
      "finish",
    ]);
    expect(classifier.suggestImportantFields("general")).toEqual([]);
  });
});
