/**
 * Normalizer
 *
 * Maps raw records from template parsers and live-state collectors into
 * frozen, flattened resource models, applying the equivalence table so
 * that semantically equal values share one canonical representation
 * before they are compared.
 */

import type { EquivalenceTable, NodeRules } from "./equivalence.js";
import { NormalizationError } from "./errors.js";
import { canonicalJson, childIndexPath, childKeyPath, comparePaths, formatPath, type PathSegment } from "./paths.js";
import type { AttributeValue, RawResourceRecord, ResourceModel, ResourceOrigin, ScalarValue } from "./types.js";

/** Intermediate tree after per-node normalization, before flattening. */
type NormalizedNode = ScalarValue | NormalizedNode[] | { [key: string]: NormalizedNode };

interface WalkContext {
  kind: string;
  address: string;
}

export class Normalizer {
  constructor(private readonly table: EquivalenceTable) {}

  /**
   * Normalize one raw record. Throws NormalizationError when no address or
   * kind can be derived, or when a value violates its declared type.
   */
  normalize(raw: RawResourceRecord, origin: ResourceOrigin): ResourceModel {
    if (!isPlainObject(raw)) {
      throw new NormalizationError("Raw record must be an object");
    }

    const kindHint = nonEmptyString(raw.kind);
    if (!kindHint) {
      throw new NormalizationError("Record has no kind", { address: nonEmptyString(raw.address) });
    }
    const kind = this.table.resolveKind(kindHint);

    const attributes = raw.attributes ?? {};
    if (!isPlainObject(attributes)) {
      throw new NormalizationError("Record attributes must be an object", { kind, address: nonEmptyString(raw.address) });
    }

    const address = deriveAddress(raw, kind, attributes);
    if (!address) {
      throw new NormalizationError(`Record of kind ${kind} has no address, name or id`, { kind });
    }

    const ctx: WalkContext = { kind, address };
    const tree = this.normalizeObject(attributes, [], ctx);
    const flat = new Map<string, AttributeValue>();
    if (tree) flatten(tree, "", flat);

    const sorted = new Map([...flat.entries()].sort(([a], [b]) => comparePaths(a, b)));
    const source = nonEmptyString(raw.source);

    return Object.freeze({
      address,
      kind,
      origin,
      attributes: sorted,
      ...(source ? { source } : {}),
    });
  }

  // ---------------------------------------------------------------------------
  // Tree walk
  // ---------------------------------------------------------------------------

  private normalizeNode(value: unknown, segments: PathSegment[], ctx: WalkContext): NormalizedNode | undefined {
    const rules = this.table.rulesAt(ctx.kind, segments);
    if (rules.ignore || value === undefined) return undefined;

    let result: NormalizedNode | undefined;
    if (Array.isArray(value) && rules.keyValueList) {
      result = this.normalizeObject(keyValueListToMap(value, rules.keyValueList, segments, ctx), segments, ctx);
    } else if (Array.isArray(value)) {
      result = this.normalizeSequence(value, segments, rules, ctx);
    } else if (isPlainObject(value)) {
      result = this.normalizeObject(value, segments, ctx);
    } else {
      result = normalizeScalar(value, segments, rules, ctx);
    }

    if (result !== undefined && rules.defaultValue && canonicalJson(result) === canonicalJson(rules.defaultValue.value)) {
      return undefined;
    }
    return result;
  }

  private normalizeObject(
    value: Record<string, unknown>,
    segments: PathSegment[],
    ctx: WalkContext,
  ): { [key: string]: NormalizedNode } | undefined {
    const out: { [key: string]: NormalizedNode } = {};
    for (const [key, child] of Object.entries(value)) {
      const normalized = this.normalizeNode(child, [...segments, { type: "key", key }], ctx);
      if (normalized === undefined) continue;
      if (normalized === null && this.table.dropNulls) continue;
      defineOwn(out, key, normalized);
    }
    if (Object.keys(out).length === 0 && segments.length > 0 && this.table.dropEmptyCollections) {
      return undefined;
    }
    return out;
  }

  private normalizeSequence(
    value: unknown[],
    segments: PathSegment[],
    rules: NodeRules,
    ctx: WalkContext,
  ): NormalizedNode[] | undefined {
    const out: NormalizedNode[] = [];
    value.forEach((element, index) => {
      const normalized = this.normalizeNode(element, [...segments, { type: "index", index }], ctx);
      if (normalized !== undefined) out.push(normalized);
    });

    if (out.length === 0 && this.table.dropEmptyCollections) return undefined;
    if (rules.set) {
      const keyed = out.map((node) => ({ key: canonicalJson(node), node }));
      keyed.sort((a, b) => comparePaths(a.key, b.key));
      return keyed.map((k) => k.node);
    }
    return out;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function deriveAddress(raw: RawResourceRecord, kind: string, attributes: Record<string, unknown>): string | undefined {
  const address = nonEmptyString(raw.address);
  if (address) return address;
  const name = nonEmptyString(raw.name);
  if (name) return `${kind}.${name}`;
  const id = nonEmptyString(attributes.id);
  if (id) return `${kind}.${id}`;
  return undefined;
}

function normalizeScalar(
  value: unknown,
  segments: PathSegment[],
  rules: NodeRules,
  ctx: WalkContext,
): ScalarValue {
  const fail = (message: string): never => {
    const path = formatPath(segments);
    throw new NormalizationError(`${ctx.address}: ${message} at "${path}"`, { address: ctx.address, kind: ctx.kind, path });
  };

  let scalar: ScalarValue;
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    scalar = value;
  } else if (typeof value === "number") {
    if (!Number.isFinite(value)) fail(`non-finite number ${String(value)}`);
    scalar = Object.is(value, -0) ? 0 : value;
  } else {
    return fail(`unsupported value of type ${describeType(value)}`);
  }

  if (scalar !== null && rules.coerce) scalar = coerce(scalar, rules.coerce);
  if (typeof scalar === "string") {
    if (rules.caseInsensitive) scalar = scalar.toLowerCase();
    if (rules.trimTrailingSlash) scalar = trimTrailingSlash(scalar);
  }
  if (scalar !== null && rules.type && typeof scalar !== rules.type) {
    fail(`expected ${rules.type} but found ${typeof scalar} ${JSON.stringify(scalar)}`);
  }
  return scalar;
}

function coerce(value: string | number | boolean, to: "boolean" | "number" | "string"): string | number | boolean {
  switch (to) {
    case "string":
      return String(value);
    case "number": {
      if (typeof value !== "string" || value.trim() === "") return value;
      const n = Number(value);
      return Number.isFinite(n) ? (Object.is(n, -0) ? 0 : n) : value;
    }
    case "boolean": {
      if (typeof value !== "string") return value;
      const lower = value.trim().toLowerCase();
      if (lower === "true") return true;
      if (lower === "false") return false;
      return value;
    }
  }
}

function trimTrailingSlash(value: string): string {
  const trimmed = value.replace(/\/+$/, "");
  return trimmed === "" ? value : trimmed;
}

function keyValueListToMap(
  list: unknown[],
  shape: { key: string; value: string },
  segments: PathSegment[],
  ctx: WalkContext,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const seen = new Set<string>();
  list.forEach((item, index) => {
    const path = formatPath([...segments, { type: "index", index }]);
    const key = isPlainObject(item) ? item[shape.key] : undefined;
    if (!isPlainObject(item) || typeof key !== "string") {
      throw new NormalizationError(`${ctx.address}: expected an object with a string "${shape.key}" at "${path}"`, {
        address: ctx.address,
        kind: ctx.kind,
        path,
      });
    }
    if (seen.has(key)) {
      throw new NormalizationError(`${ctx.address}: duplicate ${shape.key} ${JSON.stringify(key)} at "${path}"`, {
        address: ctx.address,
        kind: ctx.kind,
        path,
      });
    }
    seen.add(key);
    defineOwn(out, key, item[shape.value]);
  });
  return out;
}

/** Assign as an own property, so keys such as "__proto__" stay data. */
function defineOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Flatten a normalized tree into leaf paths. Scalar-only sequences are leaves. */
function flatten(node: NormalizedNode, path: string, out: Map<string, AttributeValue>): void {
  if (Array.isArray(node)) {
    const scalars = node.filter(isScalar);
    if (scalars.length === node.length) {
      out.set(path, Object.freeze(scalars));
      return;
    }
    node.forEach((child, i) => flatten(child, childIndexPath(path, i), out));
    return;
  }
  if (node !== null && typeof node === "object") {
    for (const [key, child] of Object.entries(node)) {
      flatten(child, childKeyPath(path, key), out);
    }
    return;
  }
  out.set(path, node);
}

function isScalar(node: NormalizedNode): node is ScalarValue {
  return node === null || typeof node !== "object";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function describeType(value: unknown): string {
  if (typeof value !== "object" || value === null) return typeof value;
  return value.constructor?.name ?? "object";
}
