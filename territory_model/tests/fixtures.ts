import { createLogger } from "../src/logger.js";
import type { TerritoryDataset } from "../src/types.js";

export const silentLogger = createLogger("territory-test", "silent");

/**
 * Small hand-made dataset: "XA" is a real territory without attributes, "XB"
 * only has names, and both share the English name "Atlantis".
 */
export function sampleDataset(): TerritoryDataset {
  return {
    containment: [
      { parent: "001", children: ["150", "019"] },
      { parent: "150", children: ["FR", "DE", "GB"] },
      { parent: "019", children: ["US"] },
      { parent: "EU", children: ["FR", "DE"] },
      { parent: "UN", children: ["US", "GB", "FR", "DE"] },
    ],
    locales: [
      {
        locale: "en",
        territories: [
          ["001", "World"],
          ["150", "Europe"],
          ["019", "Americas"],
          ["EU", "European Union"],
          ["UN", "United Nations"],
          ["DE", "Germany"],
          ["FR", "France"],
          ["GB", "United Kingdom"],
          ["US", "United States"],
          ["XA", "Atlantis"],
          ["XB", "Atlantis"],
        ],
      },
      {
        locale: "fr",
        territories: [
          ["001", "Monde"],
          ["150", "Europe"],
          ["DE", "Allemagne"],
          ["FR", "France"],
          ["GB", "Royaume-Uni"],
          ["US", "États-Unis"],
          ["XA", "Atlantide A"],
          ["XB", "Atlantide B"],
        ],
      },
    ],
    info: {
      DE: { population: 83000000, currency: [{ code: "EUR", from: "1999-01-01" }], language_population: {} },
      FR: { population: 68000000, currency: [{ code: "EUR", from: "1999-01-01" }], language_population: {} },
      GB: {
        population: 12345678,
        telephone_country_code: 44,
        currency: [{ code: "GBP", from: "1694-07-27" }],
        language_population: { en: { population_percent: 98, official_status: "official" } },
      },
      US: { population: 330000000, currency: [{ code: "USD" }], language_population: {} },
      XA: null,
    },
  };
}
