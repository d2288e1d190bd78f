/**
 * Diff Engine
 *
 * Structural diff over the flattened attributes of a matched pair. Paths
 * present only in the declared model are "removed", only in the observed
 * model "added", and in both but unequal "modified". Entries are ordered
 * by path so repeated runs produce identical output.
 */

import type { EquivalenceTable, LeafComparison } from "./equivalence.js";
import { canonicalJson, comparePaths } from "./paths.js";
import type { AttributeValue, DiffEntry, ResourceModel, ScalarValue } from "./types.js";

export class DiffEngine {
  constructor(private readonly table: EquivalenceTable) {}

  diff(declared: ResourceModel, observed: ResourceModel): DiffEntry[] {
    const paths = new Set<string>(declared.attributes.keys());
    for (const path of observed.attributes.keys()) paths.add(path);

    const entries: DiffEntry[] = [];
    for (const path of [...paths].sort(comparePaths)) {
      const d = declared.attributes.get(path);
      const o = observed.attributes.get(path);

      if (o === undefined && d !== undefined) {
        entries.push({ path, changeKind: "removed", declared: d });
      } else if (d === undefined && o !== undefined) {
        entries.push({ path, changeKind: "added", observed: o });
      } else if (d !== undefined && o !== undefined) {
        if (!valuesEqual(d, o, this.table.comparisonFor(declared.kind, path))) {
          entries.push({ path, changeKind: "modified", declared: d, observed: o });
        }
      }
    }
    return entries;
  }
}

/**
 * Equality under the leaf's comparison options: multiset comparison for
 * set paths, tolerance only for computed-numeric paths.
 */
export function valuesEqual(a: AttributeValue, b: AttributeValue, comparison: LeafComparison = { set: false }): boolean {
  if (isSequence(a) && isSequence(b)) {
    if (a.length !== b.length) return false;
    if (comparison.set) {
      const left = a.map((v) => canonicalJson(v)).sort(comparePaths);
      const right = b.map((v) => canonicalJson(v)).sort(comparePaths);
      return left.every((v, i) => v === right[i]);
    }
    return a.every((v, i) => {
      const other = b[i];
      return other !== undefined && scalarsEqual(v, other, comparison);
    });
  }
  if (isSequence(a) || isSequence(b)) return false;
  return scalarsEqual(a, b, comparison);
}

function scalarsEqual(a: ScalarValue, b: ScalarValue, comparison: LeafComparison): boolean {
  if (typeof a === "number" && typeof b === "number" && comparison.computedNumeric) {
    const { tolerance, relative } = comparison.computedNumeric;
    const limit = relative ? tolerance * Math.max(Math.abs(a), Math.abs(b)) : tolerance;
    return Math.abs(a - b) <= limit;
  }
  return a === b;
}

function isSequence(value: AttributeValue): value is readonly ScalarValue[] {
  return Array.isArray(value);
}
