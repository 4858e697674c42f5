import OpenAI from "openai";
import type { z } from "zod";
import { logger } from "@/lib/logger";
import { getEnv } from "@/lib/env";
import {
  InferenceError,
  type InferenceClient,
  type InferenceRequest,
} from "@/types/inference";

// Initialize OpenAI client
let openaiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const { OPENAI_API_KEY, INFERENCE_TIMEOUT_MS } = getEnv();
    if (!OPENAI_API_KEY) {
      throw new InferenceError("OpenAI API key not configured", "MISSING_API_KEY");
    }
    // Every external step is attempted once; failures go to the caller's fallback.
    openaiClient = new OpenAI({
      apiKey: OPENAI_API_KEY,
      maxRetries: 0,
      timeout: INFERENCE_TIMEOUT_MS,
    });
  }
  return openaiClient;
}

export interface OpenAIInferenceOptions {
  model?: string;
  serviceTier?: "auto" | "default" | "flex" | "priority";
}

/**
 * Inference client backed by the OpenAI Responses API.
 */
export class OpenAIInferenceClient implements InferenceClient {
  constructor(private readonly options: OpenAIInferenceOptions = {}) {}

  async complete(request: InferenceRequest): Promise<string> {
    const client = getOpenAIClient();
    const { OPENAI_MODEL, OPENAI_SERVICE_TIER } = getEnv();
    const model = this.options.model ?? OPENAI_MODEL;
    const serviceTier = this.options.serviceTier ?? OPENAI_SERVICE_TIER;
    const startTime = Date.now();

    logger.debug("Calling OpenAI Responses API", {
      purpose: request.purpose,
      model,
      serviceTier,
      promptLength: request.prompt.length,
    });

    const out = await this.requestText(client, request, model, serviceTier);

    logger.debug("Received OpenAI response", {
      purpose: request.purpose,
      durationMs: Date.now() - startTime,
      responseLength: out.length,
    });

    return out;
  }

  private async requestText(
    client: OpenAI,
    request: InferenceRequest,
    model: string,
    serviceTier: NonNullable<OpenAIInferenceOptions["serviceTier"]>
  ): Promise<string> {
    let outputText: string;
    try {
      const response = await client.responses.create({
        model,
        service_tier: serviceTier,
        max_output_tokens: request.maxOutputTokens,
        input: [
          {
            role: "user",
            content: [
              {
                type: "input_text",
                text: request.prompt,
              },
            ],
          },
        ],
      });
      outputText = response.output_text ?? "";
    } catch (error) {
      throw new InferenceError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        "REQUEST_FAILED",
        { purpose: request.purpose, model }
      );
    }

    const out = outputText.trim();
    if (!out) {
      throw new InferenceError("No output returned from OpenAI", "NO_OUTPUT", {
        purpose: request.purpose,
        model,
      });
    }
    return out;
  }
}

let defaultInferenceClient: InferenceClient | null = null;

export function getDefaultInferenceClient(): InferenceClient {
  if (!defaultInferenceClient) {
    defaultInferenceClient = new OpenAIInferenceClient();
  }
  return defaultInferenceClient;
}

export type JsonExtraction =
  | { ok: true; value: unknown; text: string }
  | { ok: false; reason: "empty" | "not_found" | "ambiguous" };

/**
 * Locate the JSON value inside a free-text model answer.
 *
 * Markdown fences are removed first, then every balanced `{...}` or `[...]`
 * substring that parses as JSON is collected. Exactly one such value is
 * required; several top-level values make the answer ambiguous.
 */
export function extractJsonFromText(text: string): JsonExtraction {
  const cleaned = stripCodeFences(text ?? "").trim();
  if (!cleaned) {
    return { ok: false, reason: "empty" };
  }

  const found: Array<{ value: unknown; text: string }> = [];
  let index = 0;

  while (index < cleaned.length) {
    const char = cleaned[index];
    if (char !== "{" && char !== "[") {
      index += 1;
      continue;
    }

    const end = findBalancedEnd(cleaned, index);
    if (end === -1) {
      index += 1;
      continue;
    }

    const candidate = cleaned.slice(index, end + 1);
    try {
      found.push({ value: JSON.parse(candidate), text: candidate });
      index = end + 1;
    } catch {
      // Balanced but not JSON (e.g. "[see note]"); look inside it
      index += 1;
    }
  }

  if (found.length === 0) {
    return { ok: false, reason: "not_found" };
  }
  if (found.length > 1) {
    return { ok: false, reason: "ambiguous" };
  }

  return { ok: true, value: found[0].value, text: found[0].text };
}

export type ParsedJsonResponse<T> =
  | { ok: true; data: T }
  | { ok: false; reason: "empty" | "not_found" | "ambiguous" | "invalid_shape"; issues?: z.ZodIssue[] };

export function parseJsonResponse<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): ParsedJsonResponse<z.output<S>> {
  const extracted = extractJsonFromText(text);
  if (!extracted.ok) {
    return extracted;
  }

  const result = schema.safeParse(extracted.value);
  if (!result.success) {
    return { ok: false, reason: "invalid_shape", issues: result.error.issues };
  }
  return { ok: true, data: result.data };
}

function stripCodeFences(text: string): string {
  return text.replace(/```[\w-]*/g, "");
}

function findBalancedEnd(text: string, start: number): number {
  const expected: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      expected.push("}");
    } else if (char === "[") {
      expected.push("]");
    } else if (char === "}" || char === "]") {
      if (expected.pop() !== char) {
        return -1;
      }
      if (expected.length === 0) {
        return i;
      }
    }
  }

  return -1;
}
