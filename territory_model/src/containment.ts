import { NotFoundError } from "./errors.js";
import { normalizeTerritoryCode } from "./normalize.js";
import { err, ok, type Result } from "./result.js";
import type { ContainmentEntry, TerritoryCode, TerritoryInput } from "./types.js";

function notInGraph(code: TerritoryCode, role: "parent" | "child"): NotFoundError {
  return new NotFoundError(`territory code: ${code} is not a containment ${role}`);
}

/**
 * Static parent → children table with a child → parents index built beside it.
 * Territories may sit under several groupings at once (a continent sub-region
 * and a political union), so the structure is a DAG rather than a tree.
 */
export class ContainmentGraph {
  private readonly byParent = new Map<TerritoryCode, readonly TerritoryCode[]>();
  private readonly byChild = new Map<TerritoryCode, readonly TerritoryCode[]>();

  constructor(entries: readonly ContainmentEntry[]) {
    // a parent listed in several entries gets one merged child list
    const childrenOf = new Map<TerritoryCode, TerritoryCode[]>();
    const parentsOf = new Map<TerritoryCode, Set<TerritoryCode>>();
    for (const entry of entries) {
      const parent = normalizeTerritoryCode(entry.parent);
      const children = childrenOf.get(parent) ?? [];
      childrenOf.set(parent, children);
      for (const child of entry.children.map(normalizeTerritoryCode)) {
        if (!children.includes(child)) children.push(child);
        const set = parentsOf.get(child) ?? new Set<TerritoryCode>();
        set.add(parent);
        parentsOf.set(child, set);
      }
    }
    for (const [parent, children] of childrenOf) {
      this.byParent.set(parent, Object.freeze(children));
    }
    for (const [child, parents] of parentsOf) {
      this.byChild.set(child, Object.freeze([...parents].sort()));
    }
  }

  parentCodes(): TerritoryCode[] {
    return [...this.byParent.keys()];
  }

  childCodes(): TerritoryCode[] {
    return [...this.byChild.keys()];
  }

  children(input: TerritoryInput): Result<TerritoryCode[], NotFoundError> {
    const code = normalizeTerritoryCode(input);
    const children = this.byParent.get(code);
    return children ? ok([...children]) : err(notInGraph(code, "parent"));
  }

  parents(input: TerritoryInput): Result<TerritoryCode[], NotFoundError> {
    const code = normalizeTerritoryCode(input);
    const parents = this.byChild.get(code);
    return parents ? ok([...parents]) : err(notInGraph(code, "child"));
  }

  /** Direct containment only; unknown parents answer `false`. */
  contains(parent: TerritoryInput, child: TerritoryInput): boolean {
    const children = this.byParent.get(normalizeTerritoryCode(parent));
    return children !== undefined && children.includes(normalizeTerritoryCode(child));
  }

  ancestors(input: TerritoryInput): Result<TerritoryCode[], NotFoundError> {
    const code = normalizeTerritoryCode(input);
    const direct = this.byChild.get(code);
    if (!direct) return err(notInGraph(code, "child"));

    const seen = new Set<TerritoryCode>();
    const queue = [...direct];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...(this.byChild.get(next) ?? []));
    }
    // a cycle in the data would otherwise list the code as its own ancestor
    seen.delete(code);
    return ok([...seen].sort());
  }

  isWithin(ancestor: TerritoryInput, input: TerritoryInput): boolean {
    const result = this.ancestors(input);
    return result.ok && result.value.includes(normalizeTerritoryCode(ancestor));
  }
}
