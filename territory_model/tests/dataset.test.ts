import { describe, expect, it } from "vitest";
import { loadBundledDataset, parseTerritoryDataset } from "../src/dataset.js";
import { DatasetError } from "../src/errors.js";

function parseError(run: () => unknown): DatasetError {
  try {
    run();
  } catch (error) {
    if (error instanceof DatasetError) return error;
    throw error;
  }
  throw new Error("expected a DatasetError");
}

const validNames = { locale: "en", territories: [["GB", "United Kingdom"]] };

describe("dataset parsing", () => {
  it("fills in defaults for attribute records", () => {
    const dataset = parseTerritoryDataset({
      containment: { containment: [{ parent: "UN", children: ["GB"] }] },
      info: { territories: { GB: { population: 100 }, AQ: null } },
      names: [validNames],
    });
    expect(dataset.info.GB).toEqual({ population: 100, currency: [], language_population: {} });
    expect(dataset.info.AQ).toBeNull();
    expect(dataset.locales[0].territories).toEqual([["GB", "United Kingdom"]]);
  });

  it("reports empty containment codes with their path", () => {
    const error = parseError(() =>
      parseTerritoryDataset({
        containment: { containment: [{ parent: "", children: [] }] },
        info: { territories: {} },
        names: [],
      })
    );
    expect(error.issues).toEqual(["containment containment.0.parent: territory code must not be empty"]);
    expect(error.kind).toBe("dataset");
  });

  it("reports malformed currency codes", () => {
    const error = parseError(() =>
      parseTerritoryDataset({
        containment: { containment: [] },
        info: { territories: { GB: { currency: [{ code: "gbp" }] } } },
        names: [],
      })
    );
    expect(error.issues).toEqual(["territory info territories.GB.currency.0.code: expected an ISO 4217 currency code"]);
  });

  it("rejects name entries without a name", () => {
    expect(() =>
      parseTerritoryDataset({
        containment: { containment: [] },
        info: { territories: {} },
        names: [{ locale: "en", territories: [["GB"]] }],
      })
    ).toThrow(DatasetError);
  });
});

describe("bundled dataset", () => {
  const dataset = loadBundledDataset();

  it("is parsed once", () => {
    expect(loadBundledDataset()).toBe(dataset);
  });

  it("ships three locales", () => {
    expect(dataset.locales.map((names) => names.locale)).toEqual(["en", "pt", "de"]);
  });

  it("marks Antarctica as a territory without attributes", () => {
    expect(dataset.info.AQ).toBeNull();
    expect(Object.keys(dataset.info)).toHaveLength(47);
  });

  it("keeps the euro changeover dates", () => {
    expect(dataset.info.DE?.currency.map((period) => period.code)).toEqual(["DEM", "EUR"]);
    expect(dataset.info.BG?.currency[1]).toEqual({ code: "EUR", from: "2026-01-01" });
  });

  it("names the same codes in every locale apart from alternate forms", () => {
    const codeSets = dataset.locales.map(
      (names) => new Set(names.territories.map(([code]) => code).filter((code) => !code.includes("-alt-")))
    );
    for (const codes of codeSets) {
      expect([...codes].sort()).toEqual([...codeSets[0]].sort());
    }
  });
});
