import type { AttributeRecord, ContainmentEntry, LocaleTerritoryNames } from "./schema.js";

export type {
  AttributeRecord,
  ContainmentEntry,
  CurrencyPeriod,
  LanguagePopulation,
  LocaleTerritoryNames,
  OfficialStatus,
} from "./schema.js";

/** Canonical, upper-case territory identifier: "GB", "150", "EU", "GB-ALT-SHORT". */
export type TerritoryCode = string;

/** A string code, or a UN M49 region code given as a number (2 → "002"). */
export type TerritoryInput = string | number;

export type LocaleName = string;

export interface LanguageTag {
  /** The identifier as the caller supplied it. */
  requested: string;
  /** The known locale the request resolved to; the key of a name table. */
  canonicalName: LocaleName;
  language: string;
  script?: string;
  region?: string;
}

export type LocaleInput = LocaleName | LanguageTag;

export interface TerritoryDataset {
  containment: ContainmentEntry[];
  locales: LocaleTerritoryNames[];
  /** The authoritative code universe; `null` marks a real territory without a record. */
  info: Record<string, AttributeRecord | null>;
}

export type AmbiguityPolicy = "first" | "error";
