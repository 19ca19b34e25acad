import type { LocaleName, TerritoryCode } from "./types.js";

export type TerritoryErrorKind = "not_found" | "invalid_territory" | "ambiguous" | "locale" | "dataset";

/**
 * A code that is valid but absent from the table being queried: no name in a
 * locale, a `null` attribute record, or no place in the containment graph.
 */
export class NotFoundError extends Error {
  readonly kind: TerritoryErrorKind = "not_found";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * The identifier is outside the universe of known territory codes. It is a
 * `NotFoundError` too, so callers matching on "not found" see both.
 */
export class InvalidTerritoryError extends NotFoundError {
  readonly kind: TerritoryErrorKind = "invalid_territory";

  constructor(readonly territory: string) {
    super(`territory code: ${territory} not available`);
    this.name = "InvalidTerritoryError";
  }
}

export class AmbiguousError extends Error {
  readonly kind: TerritoryErrorKind = "ambiguous";

  constructor(
    readonly territoryName: string,
    readonly locale: LocaleName,
    readonly candidates: readonly TerritoryCode[]
  ) {
    super(`territory name "${territoryName}" is ambiguous in locale ${locale}: ${candidates.join(", ")}`);
    this.name = "AmbiguousError";
  }
}

/** Raised by the locale collaborators only; the knowledge base passes it through. */
export class LocaleError extends Error {
  readonly kind: TerritoryErrorKind = "locale";

  constructor(readonly locale: string, message: string) {
    super(message);
    this.name = "LocaleError";
  }
}

export class DatasetError extends Error {
  readonly kind: TerritoryErrorKind = "dataset";

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}:\n- ${issues.join("\n- ")}` : message);
    this.name = "DatasetError";
  }
}
