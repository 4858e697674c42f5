import { z } from "zod";
import unitTable from "./units.json";

export const MEASUREMENT_FAMILIES = ["mass", "length", "area", "volume", "count", "time"] as const;

export type MeasurementFamily = (typeof MEASUREMENT_FAMILIES)[number];

const FamilySchema = z.object({
  canonical: z.string().min(1),
  aliases: z.record(z.string(), z.number().positive()),
});

const UnitTableSchema = z.object({
  mass: FamilySchema,
  length: FamilySchema,
  area: FamilySchema,
  volume: FamilySchema,
  count: FamilySchema,
  time: FamilySchema,
});

export interface UnitConversion {
  family: MeasurementFamily;
  canonicalUnit: string;
  factor: number;
}

// Units sold as containers; their content has to be read from the item name.
export const PACKAGING_MARKERS = [
  "package",
  "box",
  "roll",
  "bag",
  "pallet",
  "sack",
  "упаков",
  "короб",
  "рулон",
  "мешок",
  "паллет",
  "поддон",
  "пакет",
] as const;

const CONVERSIONS = buildConversionIndex();

function buildConversionIndex(): Map<string, UnitConversion> {
  const table = UnitTableSchema.parse(unitTable);
  const index = new Map<string, UnitConversion>();

  for (const family of MEASUREMENT_FAMILIES) {
    const { canonical, aliases } = table[family];
    for (const [alias, factor] of Object.entries(aliases)) {
      const key = canonicalizeUnit(alias);
      const existing = index.get(key);
      if (existing) {
        throw new Error(`Unit alias "${alias}" is declared for both ${existing.family} and ${family}`);
      }
      index.set(key, { family, canonicalUnit: canonical, factor });
    }
  }

  return index;
}

/**
 * Lowercase, trim and strip a single trailing period ("Pcs." -> "pcs").
 */
export function canonicalizeUnit(unit: string): string {
  if (!unit) {
    return "";
  }
  const trimmed = unit.toLowerCase().trim();
  return trimmed.endsWith(".") ? trimmed.slice(0, -1) : trimmed;
}

export function lookupUnit(unit: string): UnitConversion | undefined {
  return CONVERSIONS.get(canonicalizeUnit(unit));
}

export function isPackagingUnit(unit: string): boolean {
  const canonical = canonicalizeUnit(unit);
  return PACKAGING_MARKERS.some((marker) => canonical.includes(marker));
}

export function listUnitAliases(): Array<[alias: string, conversion: UnitConversion]> {
  return [...CONVERSIONS.entries()];
}
