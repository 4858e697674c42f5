import pLimit from "p-limit";
import { getEnv } from "@/lib/env";

/**
 * Runs a task once a slot is free. Only wrap leaf tasks (a single external
 * call); a limited task that waits on the same limiter can starve it.
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export function createLimiter(concurrency: number = getEnv().INFERENCE_CONCURRENCY): Limiter {
  const limit = pLimit(concurrency);
  return <T>(task: () => Promise<T>) => limit(task);
}

let sharedLimiter: Limiter | null = null;

// One limiter per process so every component shares the provider's rate limit.
export function getSharedLimiter(): Limiter {
  if (!sharedLimiter) {
    sharedLimiter = createLimiter();
  }
  return sharedLimiter;
}

export function mapWithLimit<T, R>(
  items: readonly T[],
  limiter: Limiter,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  return Promise.all(items.map((item, index) => limiter(() => fn(item, index))));
}
