import { afterEach, describe, expect, it } from "vitest";
import {
  ancestors,
  attributesFor,
  attributesForOrThrow,
  availableTerritories,
  children,
  contains,
  getCurrentLocale,
  getTerritoryKnowledgeBase,
  InvalidTerritoryError,
  isValid,
  isWithin,
  knownTerritories,
  nameFor,
  nameForOrThrow,
  NotFoundError,
  parents,
  setCurrentLocale,
  translate,
  translateOrThrow,
  unwrap,
} from "../src/index.js";

describe("bundled territory knowledge base", () => {
  afterEach(() => {
    setCurrentLocale("en");
  });

  it("lists EU members in declared order", () => {
    expect(children("EU")).toEqual({
      ok: true,
      value: [
        "AT", "BE", "BG", "HR", "CY", "CZ", "DK", "EE", "FI", "FR", "DE", "GR", "HU", "IE",
        "IT", "LV", "LT", "LU", "MT", "NL", "PL", "PT", "RO", "SK", "SI", "ES", "SE",
      ],
    });
    expect(children(150)).toEqual({ ok: true, value: ["154", "155", "151", "039"] });
  });

  it("lists every grouping a country belongs to", () => {
    expect(parents("GB")).toEqual({ ok: true, value: ["154", "UN"] });
    expect(parents("de")).toEqual({ ok: true, value: ["155", "EU", "EZ", "UN"] });
    expect(parents("BG")).toEqual({ ok: true, value: ["151", "EU", "EZ", "UN"] });
  });

  it("has no containment entry for unknown or uncontained codes", () => {
    const unknown = parents("ZZ");
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) expect(unknown.error).toBeInstanceOf(NotFoundError);
    expect(parents("AQ").ok).toBe(false);
    expect(contains("ZZ", "GB")).toBe(false);
    expect(contains("EU", "GB")).toBe(false);
    expect(contains("EZ", "BG")).toBe(true);
    expect(contains(150, 154)).toBe(true);
  });

  it("walks up to the world region", () => {
    expect(ancestors("PT")).toEqual({ ok: true, value: ["001", "039", "150", "EU", "EZ", "UN"] });
    expect(ancestors("CY")).toEqual({ ok: true, value: ["001", "142", "145", "EU", "EZ", "UN"] });
    expect(isWithin("150", "pt")).toBe(true);
    expect(isWithin("142", "PT")).toBe(false);
  });

  it("names territories per locale", () => {
    expect(nameFor("GB", "en")).toEqual({ ok: true, value: "United Kingdom" });
    expect(nameFor("GB", "pt")).toEqual({ ok: true, value: "Reino Unido" });
    expect(nameFor("de", "de")).toEqual({ ok: true, value: "Deutschland" });
    expect(nameForOrThrow("AQ", "en")).toBe("Antarctica");
    expect(nameForOrThrow("TR", "en")).toBe("Türkiye");
  });

  it("rejects unknown territories when naming", () => {
    const result = nameFor("ZZ", "en");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error).toBeInstanceOf(InvalidTerritoryError);
    }
  });

  it("translates names between locales", () => {
    expect(translate("United Kingdom", "en", "pt")).toEqual({ ok: true, value: "Reino Unido" });
    expect(translate("Reino Unido", "pt", "en")).toEqual({ ok: true, value: "United Kingdom" });
    expect(translate("Reino Unido", "pt")).toEqual({ ok: true, value: "United Kingdom" });
    expect(translateOrThrow("Europa", "de", "pt")).toBe("Europa");
    expect(translateOrThrow("Europa", "pt", "en")).toBe("Europe");
    expect(translateOrThrow("União Europeia", "pt", "de")).toBe("Europäische Union");
  });

  it("translates every name into itself", () => {
    for (const locale of ["en", "pt", "de"]) {
      for (const name of unwrap(knownTerritories(locale)).values()) {
        expect(translate(name, locale, locale)).toEqual({ ok: true, value: name });
      }
    }
  });

  it("keeps name tables in declaration order", () => {
    const codes = unwrap(availableTerritories("en"));
    expect(codes).toHaveLength(73);
    expect(codes[0]).toBe("001");
    expect(codes[codes.length - 1]).toBe("ZZ");
    expect(codes).toContain("GB-ALT-SHORT");
    expect(unwrap(knownTerritories("en")).get("GB-ALT-SHORT")).toBe("UK");
  });

  it("returns attribute records", () => {
    const gb = attributesForOrThrow("gb");
    expect(gb.population).toBe(69551332);
    expect(gb.currency).toEqual([{ code: "GBP", from: "1694-07-27" }]);
    expect(gb.telephone_country_code).toBe(44);
    expect(gb.language_population.cy).toEqual({ population_percent: 0.79, official_status: "official_regional" });
    expect(attributesForOrThrow("US").paper_size).toBe("US-Letter");
  });

  it("separates attribute-less territories from unknown ones", () => {
    const antarctica = attributesFor("AQ");
    expect(antarctica.ok).toBe(false);
    if (!antarctica.ok) expect(antarctica.error).not.toBeInstanceOf(InvalidTerritoryError);

    const world = attributesFor("001");
    expect(world.ok).toBe(false);
    if (!world.ok) expect(world.error).toBeInstanceOf(InvalidTerritoryError);
  });

  it("validates codes", () => {
    expect(isValid("gb")).toBe(true);
    expect(isValid("GB")).toBe(true);
    expect(isValid("AQ")).toBe(true);
    expect(isValid("zzz")).toBe(false);
    expect(isValid("150")).toBe(false);
  });

  it("follows the current locale", () => {
    const switched = setCurrentLocale("pt-BR");
    expect(switched.ok).toBe(true);
    if (switched.ok) expect(switched.value.region).toBe("BR");
    expect(getCurrentLocale().canonicalName).toBe("pt");
    expect(nameFor("DE")).toEqual({ ok: true, value: "Alemanha" });

    expect(setCurrentLocale("not a locale").ok).toBe(false);
    expect(getCurrentLocale().canonicalName).toBe("pt");
  });

  it("names every containment code in every locale", () => {
    const kb = getTerritoryKnowledgeBase();
    const codes = new Set([...kb.parentCodes(), ...kb.childCodes()]);
    for (const locale of kb.locales) {
      const names = unwrap(kb.knownTerritories(locale));
      for (const code of codes) {
        expect(names.has(code), `${code} in ${locale}`).toBe(true);
      }
    }
  });
});
