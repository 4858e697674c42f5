import { z } from "zod";

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional().default("gpt-4.1"),
  OPENAI_SERVICE_TIER: z.enum(["auto", "default", "flex", "priority"]).optional().default("auto"),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR", "CRITICAL", "SILENT"]).optional().default("INFO"),
  GROUPING_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(100).optional().default(50),
  UNIT_INFERENCE_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).optional().default(0.3),
  CATEGORY_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional().default(500),
  CATEGORY_CACHE_TTL_MS: z.coerce.number().int().positive().optional().default(86_400_000),
  INFERENCE_CONCURRENCY: z.coerce.number().int().positive().optional().default(4),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(30_000),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

let cached: EnvConfig | null = null;

export function getEnv(): EnvConfig {
  if (!cached) {
    cached = EnvSchema.parse(process.env);
  }
  return cached;
}
