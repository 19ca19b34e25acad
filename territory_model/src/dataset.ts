import type { z } from "zod";
import containmentData from "../data/containment.json" with { type: "json" };
import territoryInfoData from "../data/territory_info.json" with { type: "json" };
import deNames from "../data/names/de.json" with { type: "json" };
import enNames from "../data/names/en.json" with { type: "json" };
import ptNames from "../data/names/pt.json" with { type: "json" };
import { DatasetError } from "./errors.js";
import {
  ContainmentCatalogSchema,
  LocaleTerritoryNamesSchema,
  TerritoryInfoCatalogSchema,
} from "./schema.js";
import type { TerritoryDataset } from "./types.js";

export interface RawTerritoryDataset {
  containment: unknown;
  info: unknown;
  names: unknown[];
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${source} ${path}: ${issue.message}`;
  });
  throw new DatasetError(`Invalid ${source} data`, issues);
}

/** Validates raw catalogs (as read from JSON) into the in-memory dataset shape. */
export function parseTerritoryDataset(raw: RawTerritoryDataset): TerritoryDataset {
  const containment = parseWith(ContainmentCatalogSchema, raw.containment, "containment");
  const info = parseWith(TerritoryInfoCatalogSchema, raw.info, "territory info");
  const locales = raw.names.map((names, index) => parseWith(LocaleTerritoryNamesSchema, names, `names[${index}]`));
  return {
    containment: containment.containment,
    locales,
    info: info.territories,
  };
}

let DATASET_CACHE: TerritoryDataset | null = null;

/** The dataset shipped under `territory_model/data`, parsed once. */
export function loadBundledDataset(): TerritoryDataset {
  if (!DATASET_CACHE) {
    DATASET_CACHE = parseTerritoryDataset({
      containment: containmentData,
      info: territoryInfoData,
      names: [enNames, ptNames, deNames],
    });
  }
  return DATASET_CACHE;
}
