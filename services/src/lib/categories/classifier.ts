import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import { logger } from "@/lib/logger";
import { getEnv } from "@/lib/env";
import { getSharedLimiter, type Limiter } from "@/lib/concurrency";
import { getDefaultInferenceClient } from "@/lib/openai";
import {
  GENERAL_CATEGORY,
  PRODUCT_CATEGORIES,
  isKnownCategory,
  suggestImportantFields,
  type ProductCategory,
} from "./catalog";
import type { InferenceClient } from "@/types/inference";

export interface CategoryClassifierOptions {
  inference: InferenceClient;
  limiter: Limiter;
  maxEntries: number; // LRU capacity of the label cache
  ttlMs: number; // Cached labels expire after this long
  sampleSize: number; // Item names sent for classification (default 10)
}

export interface DetectCategoryOptions {
  /** Tenant or project id; labels are never shared across scopes. */
  scope?: string;
}

/**
 * Assigns one label from the closed category set to a batch of items.
 * Labels are memoized per sample text in a bounded LRU cache.
 */
export class CategoryClassifier {
  private options: CategoryClassifierOptions;
  private cache: LRUCache<string, ProductCategory>;
  private inFlight = new Map<string, Promise<ProductCategory>>();

  constructor(options: Partial<CategoryClassifierOptions> = {}) {
    const env = getEnv();
    this.options = {
      inference: options.inference ?? getDefaultInferenceClient(),
      limiter: options.limiter ?? getSharedLimiter(),
      maxEntries: options.maxEntries ?? env.CATEGORY_CACHE_MAX_ENTRIES,
      ttlMs: options.ttlMs ?? env.CATEGORY_CACHE_TTL_MS,
      sampleSize: options.sampleSize ?? 10,
    };
    this.cache = new LRUCache<string, ProductCategory>({
      max: this.options.maxEntries,
      ttl: this.options.ttlMs,
    });
  }

  public async detectCategory(
    items: ReadonlyArray<{ name: string }>,
    { scope }: DetectCategoryOptions = {}
  ): Promise<ProductCategory> {
    if (items.length === 0) {
      return GENERAL_CATEGORY;
    }

    const sample = items
      .slice(0, this.options.sampleSize)
      .map((item) => item.name)
      .join("\n");
    const key = buildCacheKey(sample, scope);

    const cached = this.cache.get(key);
    if (cached) {
      logger.debug("Category from cache", { category: cached, scope });
      return cached;
    }

    // Concurrent batches with the same sample share one call
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.classify(sample, key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  public suggestImportantFields(category: string): string[] {
    return suggestImportantFields(category);
  }

  public get cacheSize(): number {
    return this.cache.size;
  }

  public clearCache(): void {
    this.cache.clear();
  }

  private async classify(sample: string, key: string): Promise<ProductCategory> {
    let answer: string;
    try {
      answer = await this.options.limiter(() =>
        this.options.inference.complete({
          purpose: "category_detection",
          prompt: buildCategoryPrompt(sample),
          maxOutputTokens: 50,
        })
      );
    } catch (error) {
      logger.error("Category detection failed, using general", {
        error: error instanceof Error ? error.message : String(error),
      });
      return GENERAL_CATEGORY;
    }

    const category = coerceCategory(answer);
    this.cache.set(key, category);

    logger.info("Detected category", {
      category,
      rawAnswer: answer.slice(0, 80),
    });
    return category;
  }
}

export function coerceCategory(answer: string): ProductCategory {
  const label = answer
    .trim()
    .toLowerCase()
    .replace(/^["'`]+|["'`]+$/g, "")
    .replace(/\.$/, "")
    .trim();

  return isKnownCategory(label) ? label : GENERAL_CATEGORY;
}

function buildCacheKey(sample: string, scope?: string): string {
  return createHash("sha256")
    .update(scope ?? "")
    .update("\u0000")
    .update(sample)
    .digest("hex");
}

function buildCategoryPrompt(sample: string): string {
  const options = [...PRODUCT_CATEGORIES, `${GENERAL_CATEGORY} (if none of the above fits)`]
    .map((category) => `- ${category}`)
    .join("\n");

  return `Identify the product category of the items below. Reply with ONLY the category name, exactly one of:
${options}

Items:
${sample}

Answer (category name only):`;
}

/**
 * Factory function to create a category classifier with default options
 */
export function createCategoryClassifier(options?: Partial<CategoryClassifierOptions>): CategoryClassifier {
  return new CategoryClassifier(options);
}
