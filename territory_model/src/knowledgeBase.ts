import { AttributeStore } from "./attributes.js";
import { ContainmentGraph } from "./containment.js";
import { DatasetError, InvalidTerritoryError, type AmbiguousError, type LocaleError, type NotFoundError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { LocaleNameTables } from "./names.js";
import { normalizeTerritoryCode } from "./normalize.js";
import { err, ok, unwrap, type Result } from "./result.js";
import { LocaleContext, createLocaleResolver } from "./locale/index.js";
import type {
  AmbiguityPolicy,
  AttributeRecord,
  LanguageTag,
  LocaleInput,
  LocaleName,
  TerritoryCode,
  TerritoryDataset,
  TerritoryInput,
} from "./types.js";

export interface KnowledgeBaseOptions {
  /** Canonicalizes caller-supplied locales; defaults to a resolver over the dataset's locales. */
  resolveLocale?: (locale: LocaleInput) => Result<LanguageTag, LocaleError>;
  /** Supplies the locale used when an operation is called without one. */
  currentLocale?: () => LanguageTag;
  /** Starting locale of the built-in context; ignored when `currentLocale` is given. */
  defaultLocale?: LocaleInput;
  ambiguousNames?: AmbiguityPolicy;
  logger?: Logger;
}

export interface TerritoryKnowledgeBase {
  readonly locales: readonly LocaleName[];

  normalize(input: TerritoryInput): TerritoryCode;
  isValid(input: TerritoryInput): boolean;
  territoryCodes(): TerritoryCode[];

  availableTerritories(locale?: LocaleInput): Result<TerritoryCode[], LocaleError | NotFoundError>;
  availableTerritoriesOrThrow(locale?: LocaleInput): TerritoryCode[];
  knownTerritories(locale?: LocaleInput): Result<ReadonlyMap<TerritoryCode, string>, LocaleError | NotFoundError>;
  knownTerritoriesOrThrow(locale?: LocaleInput): ReadonlyMap<TerritoryCode, string>;
  nameFor(code: TerritoryInput, locale?: LocaleInput): Result<string, NotFoundError | LocaleError>;
  nameForOrThrow(code: TerritoryInput, locale?: LocaleInput): string;
  translate(
    name: string,
    fromLocale: LocaleInput,
    toLocale?: LocaleInput
  ): Result<string, NotFoundError | AmbiguousError | LocaleError>;
  translateOrThrow(name: string, fromLocale: LocaleInput, toLocale?: LocaleInput): string;

  children(code: TerritoryInput): Result<TerritoryCode[], NotFoundError>;
  childrenOrThrow(code: TerritoryInput): TerritoryCode[];
  parents(code: TerritoryInput): Result<TerritoryCode[], NotFoundError>;
  parentsOrThrow(code: TerritoryInput): TerritoryCode[];
  contains(parent: TerritoryInput, child: TerritoryInput): boolean;
  ancestors(code: TerritoryInput): Result<TerritoryCode[], NotFoundError>;
  ancestorsOrThrow(code: TerritoryInput): TerritoryCode[];
  isWithin(ancestor: TerritoryInput, code: TerritoryInput): boolean;
  parentCodes(): TerritoryCode[];
  childCodes(): TerritoryCode[];

  attributesFor(code: TerritoryInput): Result<AttributeRecord, NotFoundError>;
  attributesForOrThrow(code: TerritoryInput): AttributeRecord;
}

function findDanglingReferences(dataset: TerritoryDataset): string[] {
  const known = new Set<TerritoryCode>(Object.keys(dataset.info).map(normalizeTerritoryCode));
  for (const locale of dataset.locales) {
    for (const [code] of locale.territories) known.add(normalizeTerritoryCode(code));
  }

  const issues: string[] = [];
  const seenParents = new Set<TerritoryCode>();
  for (const entry of dataset.containment) {
    const parent = normalizeTerritoryCode(entry.parent);
    if (seenParents.has(parent)) issues.push(`containment parent ${parent} is declared more than once`);
    seenParents.add(parent);
    if (!known.has(parent)) issues.push(`containment parent ${parent} is not a known territory`);
    for (const child of entry.children.map(normalizeTerritoryCode)) {
      if (!known.has(child)) issues.push(`containment child ${child} of ${parent} is not a known territory`);
    }
  }
  return issues;
}

/**
 * Builds the read-only knowledge base. Everything is indexed here, once; the
 * returned facade never mutates what it holds.
 *
 * @throws DatasetError when containment references unknown codes or repeats a parent.
 * @throws LocaleError when no `currentLocale` is given and the default locale cannot be resolved.
 */
export function createTerritoryKnowledgeBase(
  dataset: TerritoryDataset,
  options: KnowledgeBaseOptions = {}
): TerritoryKnowledgeBase {
  const logger = options.logger ?? createLogger("territory-model");

  const issues = findDanglingReferences(dataset);
  if (issues.length > 0) throw new DatasetError("Territory containment is inconsistent", issues);

  const graph = new ContainmentGraph(dataset.containment);
  const names = new LocaleNameTables(dataset.locales, options.ambiguousNames ?? "first", logger);
  const attributes = new AttributeStore(dataset.info);

  const resolveLocale = options.resolveLocale ?? createLocaleResolver(names.locales).resolve;
  let currentLocale = options.currentLocale;
  if (!currentLocale) {
    const context = new LocaleContext(
      { knownLocales: names.locales, resolve: resolveLocale },
      options.defaultLocale ?? "en"
    );
    currentLocale = () => context.get();
  }
  const current = currentLocale;

  const resolve = (locale: LocaleInput | undefined): Result<LocaleName, LocaleError> => {
    if (locale === undefined) return ok(current().canonicalName);
    const tag = resolveLocale(locale);
    return tag.ok ? ok(tag.value.canonicalName) : tag;
  };

  const availableTerritories = (locale?: LocaleInput): Result<TerritoryCode[], LocaleError | NotFoundError> => {
    const resolved = resolve(locale);
    return resolved.ok ? names.availableTerritories(resolved.value) : resolved;
  };

  const knownTerritories = (
    locale?: LocaleInput
  ): Result<ReadonlyMap<TerritoryCode, string>, LocaleError | NotFoundError> => {
    const resolved = resolve(locale);
    return resolved.ok ? names.knownTerritories(resolved.value) : resolved;
  };

  const nameFor = (input: TerritoryInput, locale?: LocaleInput): Result<string, NotFoundError | LocaleError> => {
    const code = normalizeTerritoryCode(input);
    if (!attributes.isValid(code)) return err(new InvalidTerritoryError(code));
    const resolved = resolve(locale);
    return resolved.ok ? names.nameFor(code, resolved.value) : resolved;
  };

  const translate = (
    name: string,
    fromLocale: LocaleInput,
    toLocale?: LocaleInput
  ): Result<string, NotFoundError | AmbiguousError | LocaleError> => {
    const to = resolve(toLocale);
    if (!to.ok) return to;
    const from = resolve(fromLocale);
    if (!from.ok) return from;
    return names.translate(name, from.value, to.value);
  };

  logger.debug("territory knowledge base ready", {
    locales: names.locales,
    territories: attributes.codes().length,
    containmentParents: graph.parentCodes().length,
  });

  return Object.freeze({
    locales: Object.freeze(names.locales),

    normalize: normalizeTerritoryCode,
    isValid: (input: TerritoryInput) => attributes.isValid(input),
    territoryCodes: () => attributes.codes(),

    availableTerritories,
    availableTerritoriesOrThrow: (locale?: LocaleInput) => unwrap(availableTerritories(locale)),
    knownTerritories,
    knownTerritoriesOrThrow: (locale?: LocaleInput) => unwrap(knownTerritories(locale)),
    nameFor,
    nameForOrThrow: (code: TerritoryInput, locale?: LocaleInput) => unwrap(nameFor(code, locale)),
    translate,
    translateOrThrow: (name: string, fromLocale: LocaleInput, toLocale?: LocaleInput) =>
      unwrap(translate(name, fromLocale, toLocale)),

    children: (code: TerritoryInput) => graph.children(code),
    childrenOrThrow: (code: TerritoryInput) => unwrap(graph.children(code)),
    parents: (code: TerritoryInput) => graph.parents(code),
    parentsOrThrow: (code: TerritoryInput) => unwrap(graph.parents(code)),
    contains: (parent: TerritoryInput, child: TerritoryInput) => graph.contains(parent, child),
    ancestors: (code: TerritoryInput) => graph.ancestors(code),
    ancestorsOrThrow: (code: TerritoryInput) => unwrap(graph.ancestors(code)),
    isWithin: (ancestor: TerritoryInput, code: TerritoryInput) => graph.isWithin(ancestor, code),
    parentCodes: () => graph.parentCodes(),
    childCodes: () => graph.childCodes(),

    attributesFor: (code: TerritoryInput) => attributes.attributesFor(code),
    attributesForOrThrow: (code: TerritoryInput) => unwrap(attributes.attributesFor(code)),
  });
}
