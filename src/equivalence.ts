/**
 * Equivalence Table
 *
 * Compiled form of the per-kind field-normalization rules. The normalizer
 * asks it how to treat each node it walks; the diff engine asks it how to
 * compare each flattened leaf. Adding rules for a new kind never touches
 * either consumer.
 */

import { EquivalenceTableError } from "./errors.js";
import {
  equivalenceTableSchema,
  formatIssues,
  type EquivalenceTableDefinition,
  type FieldRule,
  type JsonValue,
} from "./config/schema.js";
import { formatPath, parsePath, parsePattern, patternCovers, type PathSegment, type PatternSegment } from "./paths.js";

// =============================================================================
// Types
// =============================================================================

export interface ComputedNumeric {
  tolerance: number;
  relative: boolean;
}

/** Options in effect at one node of a resource's attribute tree. */
export interface NodeRules {
  // Inherited by every node beneath the rule's path.
  ignore: boolean;
  coerce?: "boolean" | "number" | "string";
  type?: "string" | "number" | "boolean";
  caseInsensitive: boolean;
  trimTrailingSlash: boolean;
  computedNumeric?: ComputedNumeric;
  // Only where the rule's path matches the node itself.
  set: boolean;
  keyValueList?: { key: string; value: string };
  defaultValue?: { value: JsonValue };
}

/** How the diff engine compares one flattened leaf. */
export interface LeafComparison {
  set: boolean;
  computedNumeric?: ComputedNumeric;
}

interface CompiledFieldRule {
  pattern: PatternSegment[];
  rule: FieldRule;
}

// =============================================================================
// EquivalenceTable
// =============================================================================

export class EquivalenceTable {
  readonly version: string;
  readonly dropNulls: boolean;
  readonly dropEmptyCollections: boolean;
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly global: CompiledFieldRule[];
  private readonly byKind: ReadonlyMap<string, CompiledFieldRule[]>;
  private readonly nodeCache = new Map<string, NodeRules>();

  constructor(definition: EquivalenceTableDefinition) {
    const issues: string[] = [];
    const compile = (kind: string, rules: FieldRule[]): CompiledFieldRule[] =>
      rules.flatMap((rule, i) => {
        try {
          return [{ pattern: parsePattern(rule.path), rule }];
        } catch (err) {
          issues.push(`kinds.${kind}.${i}.path: ${err instanceof Error ? err.message : String(err)}`);
          return [];
        }
      });

    this.version = definition.version;
    this.dropNulls = definition.options.dropNulls;
    this.dropEmptyCollections = definition.options.dropEmptyCollections;
    this.aliases = new Map(Object.entries(definition.kindAliases).map(([alias, kind]) => [alias.trim(), kind.trim()]));
    this.global = compile("*", definition.kinds["*"] ?? []);

    // Rules written under an alias apply to the kind it resolves to.
    const byKind = new Map<string, CompiledFieldRule[]>();
    for (const [kind, rules] of Object.entries(definition.kinds)) {
      if (kind === "*") continue;
      const resolved = this.resolveKind(kind);
      byKind.set(resolved, [...(byKind.get(resolved) ?? []), ...compile(kind, rules)]);
    }
    this.byKind = byKind;

    if (issues.length > 0) throw new EquivalenceTableError(issues);
  }

  /** Validate an unknown value (typically parsed JSON) and compile it. */
  static parse(input: unknown): EquivalenceTable {
    const result = equivalenceTableSchema.safeParse(input);
    if (!result.success) throw new EquivalenceTableError(formatIssues(result.error));
    return new EquivalenceTable(result.data);
  }

  /** A table with no rules: only the default null/empty handling applies. */
  static empty(version = "none"): EquivalenceTable {
    return EquivalenceTable.parse({ version });
  }

  resolveKind(kind: string): string {
    return this.aliases.get(kind) ?? kind;
  }

  /** Options for the node at `segments` in a resource of `kind`. */
  rulesAt(kind: string, segments: readonly PathSegment[]): NodeRules {
    const cacheKey = `${kind}\u0000${formatPath(segments)}`;
    const cached = this.nodeCache.get(cacheKey);
    if (cached) return cached;

    const out: NodeRules = { ignore: false, caseInsensitive: false, trimTrailingSlash: false, set: false };
    const applicable = [...this.global, ...(this.byKind.get(kind) ?? [])]
      .filter((c) => patternCovers(c.pattern, segments))
      // Shallow rules first so deeper ones override; stable for equal depth.
      .sort((a, b) => a.pattern.length - b.pattern.length);

    for (const { pattern, rule } of applicable) {
      if (rule.ignore !== undefined) out.ignore = rule.ignore;
      if (rule.coerce !== undefined) out.coerce = rule.coerce;
      if (rule.type !== undefined) out.type = rule.type;
      if (rule.caseInsensitive !== undefined) out.caseInsensitive = rule.caseInsensitive;
      if (rule.trimTrailingSlash !== undefined) out.trimTrailingSlash = rule.trimTrailingSlash;
      if (rule.computedNumeric !== undefined) {
        out.computedNumeric = {
          tolerance: rule.computedNumeric.tolerance,
          relative: rule.computedNumeric.relative ?? false,
        };
      }

      if (pattern.length !== segments.length) continue;
      if (rule.set !== undefined) out.set = rule.set;
      if (rule.keyValueList !== undefined) out.keyValueList = rule.keyValueList;
      if (rule.default !== undefined) out.defaultValue = { value: rule.default };
    }

    this.nodeCache.set(cacheKey, out);
    return out;
  }

  /** Comparison options for a flattened leaf path. */
  comparisonFor(kind: string, path: string): LeafComparison {
    const rules = this.rulesAt(kind, parsePath(path));
    return rules.computedNumeric ? { set: rules.set, computedNumeric: rules.computedNumeric } : { set: rules.set };
  }

  /** Kinds that carry their own rules, sorted. */
  kinds(): string[] {
    return [...this.byKind.keys()].sort();
  }
}
