import { loadConfig } from "./config.js";
import { loadBundledDataset } from "./dataset.js";
import { createTerritoryKnowledgeBase, type TerritoryKnowledgeBase } from "./knowledgeBase.js";
import { LocaleContext, createLocaleResolver } from "./locale/index.js";
import { createLogger } from "./logger.js";
import type { LocaleInput, TerritoryInput } from "./types.js";

export * from "./types.js";
export { ok, err, unwrap, type Result } from "./result.js";
export {
  NotFoundError,
  InvalidTerritoryError,
  AmbiguousError,
  LocaleError,
  DatasetError,
  type TerritoryErrorKind,
} from "./errors.js";
export { normalizeTerritoryCode } from "./normalize.js";
export { ContainmentGraph } from "./containment.js";
export { LocaleNameTables } from "./names.js";
export { AttributeStore } from "./attributes.js";
export {
  createTerritoryKnowledgeBase,
  type KnowledgeBaseOptions,
  type TerritoryKnowledgeBase,
} from "./knowledgeBase.js";
export { createLocaleResolver, LocaleContext, type LocaleResolver } from "./locale/index.js";
export { parseTerritoryDataset, loadBundledDataset, type RawTerritoryDataset } from "./dataset.js";
export { loadConfig, type TerritoryConfig } from "./config.js";
export { Logger, createLogger, type LogLevel, type LogThreshold, type LogFormat } from "./logger.js";
export { computeTerritoryCoverage } from "./coverage.js";
export type { TerritoryCoverage, LocaleCoverage } from "./coverage.js";

interface DefaultInstance {
  kb: TerritoryKnowledgeBase;
  locale: LocaleContext;
}

let DEFAULT_CACHE: DefaultInstance | null = null;

function defaults(): DefaultInstance {
  if (DEFAULT_CACHE) return DEFAULT_CACHE;
  const config = loadConfig();
  const logger = createLogger("territory-model", config.logLevel, config.logFormat);
  const dataset = loadBundledDataset();
  const resolver = createLocaleResolver(dataset.locales.map((l) => l.locale));
  const locale = new LocaleContext(resolver, config.defaultLocale);
  const kb = createTerritoryKnowledgeBase(dataset, {
    resolveLocale: resolver.resolve,
    currentLocale: () => locale.get(),
    ambiguousNames: config.ambiguousNames,
    logger,
  });
  DEFAULT_CACHE = { kb, locale };
  return DEFAULT_CACHE;
}

/** The knowledge base over the bundled dataset, built on first use. */
export function getTerritoryKnowledgeBase(): TerritoryKnowledgeBase {
  return defaults().kb;
}

export function getCurrentLocale() {
  return defaults().locale.get();
}

export function setCurrentLocale(locale: LocaleInput) {
  return defaults().locale.set(locale);
}

export const isValid = (code: TerritoryInput) => defaults().kb.isValid(code);
export const availableTerritories = (locale?: LocaleInput) => defaults().kb.availableTerritories(locale);
export const knownTerritories = (locale?: LocaleInput) => defaults().kb.knownTerritories(locale);
export const nameFor = (code: TerritoryInput, locale?: LocaleInput) => defaults().kb.nameFor(code, locale);
export const nameForOrThrow = (code: TerritoryInput, locale?: LocaleInput) =>
  defaults().kb.nameForOrThrow(code, locale);
export const translate = (name: string, fromLocale: LocaleInput, toLocale?: LocaleInput) =>
  defaults().kb.translate(name, fromLocale, toLocale);
export const translateOrThrow = (name: string, fromLocale: LocaleInput, toLocale?: LocaleInput) =>
  defaults().kb.translateOrThrow(name, fromLocale, toLocale);
export const children = (code: TerritoryInput) => defaults().kb.children(code);
export const childrenOrThrow = (code: TerritoryInput) => defaults().kb.childrenOrThrow(code);
export const parents = (code: TerritoryInput) => defaults().kb.parents(code);
export const parentsOrThrow = (code: TerritoryInput) => defaults().kb.parentsOrThrow(code);
export const contains = (parent: TerritoryInput, child: TerritoryInput) => defaults().kb.contains(parent, child);
export const ancestors = (code: TerritoryInput) => defaults().kb.ancestors(code);
export const ancestorsOrThrow = (code: TerritoryInput) => defaults().kb.ancestorsOrThrow(code);
export const isWithin = (ancestor: TerritoryInput, code: TerritoryInput) => defaults().kb.isWithin(ancestor, code);
export const attributesFor = (code: TerritoryInput) => defaults().kb.attributesFor(code);
export const attributesForOrThrow = (code: TerritoryInput) => defaults().kb.attributesForOrThrow(code);
