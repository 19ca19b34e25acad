import { LocaleError } from "../errors.js";
import { err, ok, type Result } from "../result.js";
import type { LanguageTag, LocaleInput, LocaleName } from "../types.js";

export interface LocaleResolver {
  readonly knownLocales: readonly LocaleName[];
  resolve(input: LocaleInput): Result<LanguageTag, LocaleError>;
}

function canonicalize(tag: string): string | undefined {
  try {
    return Intl.getCanonicalLocales(tag)[0];
  } catch (error) {
    if (error instanceof RangeError) return undefined;
    throw error;
  }
}

function fallbackChain(canonical: string): string[] {
  const parts = canonical.split("-");
  const chain: string[] = [];
  for (let length = parts.length; length > 0; length--) {
    chain.push(parts.slice(0, length).join("-"));
  }
  return chain;
}

function describe(requested: string, canonicalName: LocaleName, canonical: string): LanguageTag {
  const [language, ...subtags] = canonical.split("-");
  const tag: LanguageTag = { requested, canonicalName, language };
  for (const subtag of subtags) {
    if (tag.script === undefined && /^[A-Z][a-z]{3}$/.test(subtag)) tag.script = subtag;
    else if (tag.region === undefined && /^([A-Z]{2}|\d{3})$/.test(subtag)) tag.region = subtag;
  }
  return tag;
}

/**
 * Resolves locale identifiers against a fixed set of known locales: `_` is
 * read as `-`, the tag is canonicalized, then the full tag and each shorter
 * prefix are tried in turn (`pt-BR` falls back to `pt`).
 */
export function createLocaleResolver(knownLocales: Iterable<LocaleName>): LocaleResolver {
  const known = [...knownLocales];
  const byKey = new Map<string, LocaleName>();
  for (const name of known) {
    const key = (canonicalize(name) ?? name).toLowerCase();
    if (!byKey.has(key)) byKey.set(key, name);
  }

  const resolve = (input: LocaleInput): Result<LanguageTag, LocaleError> => {
    const requested = typeof input === "string" ? input : input.requested;
    const identifier = (typeof input === "string" ? input : input.canonicalName).trim().replace(/_/g, "-");
    if (identifier === "") {
      return err(new LocaleError(requested, "locale identifier must not be empty"));
    }

    const canonical = canonicalize(identifier);
    if (canonical === undefined) {
      return err(new LocaleError(requested, `invalid locale identifier: ${identifier}`));
    }

    for (const candidate of fallbackChain(canonical)) {
      const match = byKey.get(candidate.toLowerCase());
      if (match !== undefined) return ok(describe(requested, match, canonical));
    }
    return err(new LocaleError(requested, `locale ${canonical} is not a known locale (known: ${known.join(", ")})`));
  };

  return { knownLocales: known, resolve };
}
