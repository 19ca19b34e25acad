import { InvalidTerritoryError, NotFoundError } from "./errors.js";
import { normalizeTerritoryCode } from "./normalize.js";
import { err, ok, type Result } from "./result.js";
import type { AttributeRecord, TerritoryCode, TerritoryInput } from "./types.js";

/**
 * Non-localized territory records. Its keys double as the universe of valid
 * territory codes.
 */
export class AttributeStore {
  private readonly records = new Map<TerritoryCode, AttributeRecord | null>();

  constructor(info: Readonly<Record<string, AttributeRecord | null>>) {
    for (const [rawCode, record] of Object.entries(info)) {
      this.records.set(normalizeTerritoryCode(rawCode), record);
    }
  }

  codes(): TerritoryCode[] {
    return [...this.records.keys()];
  }

  isValid(input: TerritoryInput): boolean {
    return this.records.has(normalizeTerritoryCode(input));
  }

  attributesFor(input: TerritoryInput): Result<AttributeRecord, NotFoundError> {
    const code = normalizeTerritoryCode(input);
    const record = this.records.get(code);
    if (record === undefined) return err(new InvalidTerritoryError(code));
    if (record === null) return err(new NotFoundError(`territory code: ${code} has no attribute record`));
    return ok(record);
  }
}
