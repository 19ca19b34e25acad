import type { TerritoryKnowledgeBase } from "./knowledgeBase.js";
import type { LocaleName, TerritoryCode } from "./types.js";

export interface LocaleCoverage {
  locale: LocaleName;
  namedTerritories: number;
  validWithoutName: TerritoryCode[];
  containmentWithoutName: TerritoryCode[];
}

export interface TerritoryCoverage {
  totalTerritories: number;
  territoriesWithAttributes: number;
  containmentParents: number;
  containedTerritories: number;
  validOutsideContainment: TerritoryCode[];
  locales: LocaleCoverage[];
}

function computeLocaleCoverage(
  kb: TerritoryKnowledgeBase,
  locale: LocaleName,
  validCodes: TerritoryCode[],
  containmentCodes: TerritoryCode[]
): LocaleCoverage {
  const names = kb.knownTerritoriesOrThrow(locale);
  return {
    locale,
    namedTerritories: names.size,
    validWithoutName: validCodes.filter((code) => !names.has(code)),
    containmentWithoutName: containmentCodes.filter((code) => !names.has(code)),
  };
}

export function computeTerritoryCoverage(kb: TerritoryKnowledgeBase): TerritoryCoverage {
  const validCodes = kb.territoryCodes();
  const parentCodes = kb.parentCodes();
  const childCodes = kb.childCodes();

  const inGraph = new Set<TerritoryCode>([...parentCodes, ...childCodes]);
  const containmentCodes = [...inGraph];

  return {
    totalTerritories: validCodes.length,
    territoriesWithAttributes: validCodes.filter((code) => kb.attributesFor(code).ok).length,
    containmentParents: parentCodes.length,
    containedTerritories: childCodes.length,
    validOutsideContainment: validCodes.filter((code) => !inGraph.has(code)),
    locales: kb.locales.map((locale) => computeLocaleCoverage(kb, locale, validCodes, containmentCodes)),
  };
}
