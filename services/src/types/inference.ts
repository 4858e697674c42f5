import { z } from "zod";
import { parseNumeric } from "@/lib/numbers";

const numeric = z.preprocess((value) => parseNumeric(value) ?? value, z.number().finite());

// Missing or non-numeric confidence counts as 0; out-of-range values are rejected
const confidence = z.preprocess((value) => parseNumeric(value) ?? 0, z.number().min(0).max(1));

// Packaging conversion answer (box, roll, pallet ... into a base unit)
export const UnitConversionResponseSchema = z.object({
  normalized_quantity: numeric.describe("Quantity expressed in the base unit"),
  normalized_unit: z.string().trim().min(1).describe("Base unit (pcs, kg, m, m2, m3)"),
  normalized_price: numeric.describe("Price per base unit"),
  confidence: confidence.describe("Confidence of the conversion between 0 and 1"),
});

// Per-group purchasing recommendation
export const RecommendationResponseSchema = z.object({
  recommended_supplier: z.string().trim().min(1),
  recommended_price: numeric,
  price_unit: z.string().optional().default(""),
  price_difference_percent: numeric.describe("Difference against the worst option, in percent"),
  reasoning: z.string().optional().default(""),
  alternatives: z
    .array(z.string())
    .optional()
    .default([])
    .transform((alternatives) => alternatives.slice(0, 2)),
});

export type UnitConversionResponse = z.infer<typeof UnitConversionResponseSchema>;

export type InferencePurpose =
  | "unit_conversion"
  | "category_detection"
  | "recommendation"
  | "clarification";

export interface InferenceRequest {
  purpose: InferencePurpose;
  prompt: string;
  maxOutputTokens?: number;
}

/**
 * External reasoning collaborator. Resolves with the raw text answer; callers
 * own parsing and fallback.
 */
export interface InferenceClient {
  complete(request: InferenceRequest): Promise<string>;
}

export type InferenceErrorCode = "MISSING_API_KEY" | "NO_OUTPUT" | "REQUEST_FAILED";

export class InferenceError extends Error {
  constructor(
    message: string,
    public readonly code: InferenceErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "InferenceError";
  }
}
