import type { LocaleError } from "../errors.js";
import { unwrap, type Result } from "../result.js";
import type { LanguageTag, LocaleInput } from "../types.js";
import type { LocaleResolver } from "./resolve.js";

/** Holds the process-wide current locale. */
export class LocaleContext {
  private current: LanguageTag;

  /** Throws the resolver's `LocaleError` when `initial` cannot be resolved. */
  constructor(private readonly resolver: LocaleResolver, initial: LocaleInput) {
    this.current = unwrap(resolver.resolve(initial));
  }

  get(): LanguageTag {
    return this.current;
  }

  /** Leaves the current locale untouched when resolution fails. */
  set(locale: LocaleInput): Result<LanguageTag, LocaleError> {
    const resolved = this.resolver.resolve(locale);
    if (resolved.ok) this.current = resolved.value;
    return resolved;
  }
}
