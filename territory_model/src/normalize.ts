import type { TerritoryCode, TerritoryInput } from "./types.js";

/**
 * Canonicalizes a territory identifier into the key used by every table.
 * Purely syntactic: unknown codes come back canonicalized, not rejected.
 */
export function normalizeTerritoryCode(input: TerritoryInput): TerritoryCode {
  if (typeof input === "number") {
    if (Number.isInteger(input) && input >= 0) return String(input).padStart(3, "0");
    return String(input).toUpperCase();
  }
  return input.toUpperCase();
}
