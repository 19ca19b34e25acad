import { AmbiguousError, NotFoundError } from "./errors.js";
import type { Logger } from "./logger.js";
import { normalizeTerritoryCode } from "./normalize.js";
import { err, ok, type Result } from "./result.js";
import type { AmbiguityPolicy, LocaleName, LocaleTerritoryNames, TerritoryCode, TerritoryInput } from "./types.js";

interface NameTable {
  readonly byCode: ReadonlyMap<TerritoryCode, string>;
  /** Display name → every code carrying it, in table order. */
  readonly byName: ReadonlyMap<string, readonly TerritoryCode[]>;
}

function buildTable(source: LocaleTerritoryNames, logger: Logger): NameTable {
  const byCode = new Map<TerritoryCode, string>();
  const byName = new Map<string, TerritoryCode[]>();

  for (const [rawCode, name] of source.territories) {
    const code = normalizeTerritoryCode(rawCode);
    if (byCode.has(code)) {
      logger.warn(`duplicate territory code ${code} in locale ${source.locale}; keeping the first name`, {
        locale: source.locale,
        code,
      });
      continue;
    }
    byCode.set(code, name);
    const codes = byName.get(name);
    if (codes) codes.push(code);
    else byName.set(name, [code]);
  }

  for (const [name, codes] of byName) {
    if (codes.length > 1) {
      logger.warn(`duplicate territory name "${name}" in locale ${source.locale}`, {
        locale: source.locale,
        codes,
      });
    }
  }

  return { byCode, byName };
}

/**
 * One immutable name table per locale, each with its inverted name index
 * built up front so translation is a pair of map lookups.
 */
export class LocaleNameTables {
  private readonly tables = new Map<LocaleName, NameTable>();

  constructor(
    sources: readonly LocaleTerritoryNames[],
    private readonly ambiguity: AmbiguityPolicy,
    logger: Logger
  ) {
    const log = logger.child("names");
    for (const source of sources) {
      if (this.tables.has(source.locale)) {
        log.warn(`duplicate name table for locale ${source.locale}; keeping the first one`);
        continue;
      }
      this.tables.set(source.locale, buildTable(source, log));
    }
  }

  get locales(): LocaleName[] {
    return [...this.tables.keys()];
  }

  hasLocale(locale: LocaleName): boolean {
    return this.tables.has(locale);
  }

  private table(locale: LocaleName): Result<NameTable, NotFoundError> {
    const table = this.tables.get(locale);
    return table ? ok(table) : err(new NotFoundError(`no territory names for locale ${locale}`));
  }

  availableTerritories(locale: LocaleName): Result<TerritoryCode[], NotFoundError> {
    const table = this.table(locale);
    return table.ok ? ok([...table.value.byCode.keys()]) : table;
  }

  knownTerritories(locale: LocaleName): Result<ReadonlyMap<TerritoryCode, string>, NotFoundError> {
    const table = this.table(locale);
    return table.ok ? ok(new Map(table.value.byCode)) : table;
  }

  nameFor(input: TerritoryInput, locale: LocaleName): Result<string, NotFoundError> {
    const table = this.table(locale);
    if (!table.ok) return table;
    const code = normalizeTerritoryCode(input);
    const name = table.value.byCode.get(code);
    return name === undefined
      ? err(new NotFoundError(`territory code: ${code} has no name in locale ${locale}`))
      : ok(name);
  }

  /** Exact match on `name`; no case folding or trimming. */
  codeFor(name: string, locale: LocaleName): Result<TerritoryCode, NotFoundError | AmbiguousError> {
    const table = this.table(locale);
    if (!table.ok) return table;
    const codes = table.value.byName.get(name);
    if (!codes || codes.length === 0) {
      return err(new NotFoundError(`territory name "${name}" not found in locale ${locale}`));
    }
    if (codes.length > 1 && this.ambiguity === "error") {
      return err(new AmbiguousError(name, locale, codes));
    }
    return ok(codes[0]);
  }

  translate(
    name: string,
    fromLocale: LocaleName,
    toLocale: LocaleName
  ): Result<string, NotFoundError | AmbiguousError> {
    const code = this.codeFor(name, fromLocale);
    return code.ok ? this.nameFor(code.value, toLocale) : code;
  }
}
