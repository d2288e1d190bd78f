/**
 * Classifier
 *
 * Assigns a severity and category to a change from a static, versioned
 * rule table. Lookup order for a (kind, path):
 *   1. exact path rule
 *   2. longest matching path-prefix rule
 *   3. the kind's wildcard rule
 *   4. informational / "unclassified"
 * Exact and prefix lookups try the literal path first, then the path with
 * its indices replaced by "[*]".
 */

import { ClassificationRuleError } from "./errors.js";
import {
  formatIssues,
  ruleTableSchema,
  type ClassificationRule,
  type RuleTableDefinition,
} from "./config/schema.js";
import { formatPath, parsePath, parsePattern, wildcardIndices, type PathSegment } from "./paths.js";
import type { ChangeKind, Classification, ClassifiedEntry, DiffEntry } from "./types.js";

export const DEFAULT_CLASSIFICATION: Readonly<Classification> = Object.freeze<Classification>({
  severity: "informational",
  category: "unclassified",
});

interface CompiledRule {
  index: number;
  rule: ClassificationRule;
  changeKinds: ReadonlySet<ChangeKind> | null;
}

interface KindRules {
  exact: Map<string, CompiledRule[]>;
  prefix: Map<string, CompiledRule[]>;
  wildcard: CompiledRule[];
}

export class Classifier {
  readonly version: string;
  readonly name: string | undefined;
  readonly ruleCount: number;
  private readonly byKind: ReadonlyMap<string, KindRules>;
  private readonly memo = new Map<string, Classification>();

  constructor(definition: RuleTableDefinition) {
    this.version = definition.version;
    this.name = definition.name;
    this.ruleCount = definition.rules.length;
    this.byKind = compileRules(definition.rules);
  }

  /** Validate an unknown value (typically parsed JSON) and compile it. */
  static parse(input: unknown): Classifier {
    const result = ruleTableSchema.safeParse(input);
    if (!result.success) throw new ClassificationRuleError(formatIssues(result.error));
    return new Classifier(result.data);
  }

  classify(kind: string, path: string, changeKind: ChangeKind): Classification {
    const key = `${kind}\u0000${path}\u0000${changeKind}`;
    const cached = this.memo.get(key);
    if (cached) return { ...cached };

    const found = this.lookup(kind, path, changeKind);
    const classification: Classification = found
      ? { severity: found.rule.severity, category: found.rule.category }
      : { ...DEFAULT_CLASSIFICATION };
    this.memo.set(key, classification);
    return { ...classification };
  }

  classifyEntries(kind: string, entries: readonly DiffEntry[]): ClassifiedEntry[] {
    return entries.map((entry) => ({ ...entry, ...this.classify(kind, entry.path, entry.changeKind) }));
  }

  /** Kinds that carry rules, sorted. */
  kinds(): string[] {
    return [...this.byKind.keys()].sort();
  }

  /** Summary of the table, for listing. */
  describe(): Array<{ kind: string; selector: string; severity: string; category: string; changeKinds: string }> {
    const rows: Array<{ kind: string; selector: string; severity: string; category: string; changeKinds: string }> = [];
    for (const kind of [...this.byKind.keys()].sort()) {
      const rules = this.byKind.get(kind);
      if (!rules) continue;
      const all: Array<[string, CompiledRule]> = [
        ...[...rules.exact.entries()].flatMap(([p, list]) => list.map((r): [string, CompiledRule] => [p, r])),
        ...[...rules.prefix.entries()].flatMap(([p, list]) => list.map((r): [string, CompiledRule] => [`${p} (prefix)`, r])),
        ...rules.wildcard.map((r): [string, CompiledRule] => ["*", r]),
      ];
      all.sort((a, b) => a[1].index - b[1].index);
      for (const [selector, { rule }] of all) {
        rows.push({
          kind,
          selector,
          severity: rule.severity,
          category: rule.category,
          changeKinds: rule.changeKinds?.join(",") ?? "any",
        });
      }
    }
    return rows;
  }

  private lookup(kind: string, path: string, changeKind: ChangeKind): CompiledRule | undefined {
    const rules = this.byKind.get(kind);
    if (!rules) return undefined;

    let segments: PathSegment[];
    try {
      segments = parsePath(path);
    } catch {
      // Not a flattened attribute path; only the wildcard rule can apply.
      return pick(rules.wildcard, changeKind);
    }

    const exact =
      pick(rules.exact.get(path), changeKind) ??
      pick(rules.exact.get(formatPath(wildcardIndices(segments))), changeKind);
    if (exact) return exact;

    for (let len = segments.length; len > 0; len--) {
      const head = segments.slice(0, len);
      const literal = formatPath(head);
      const hit =
        pick(rules.prefix.get(literal), changeKind) ??
        pick(rules.prefix.get(formatPath(wildcardIndices(head))), changeKind);
      if (hit) return hit;
    }

    return pick(rules.wildcard, changeKind);
  }
}

function pick(candidates: readonly CompiledRule[] | undefined, changeKind: ChangeKind): CompiledRule | undefined {
  return candidates?.find((c) => c.changeKinds === null || c.changeKinds.has(changeKind));
}

// =============================================================================
// Compilation
// =============================================================================

/**
 * Index rules by kind and selector. Selector syntax errors, key wildcards
 * and overlapping rules are all reported together.
 */
function compileRules(rules: readonly ClassificationRule[]): Map<string, KindRules> {
  const issues: string[] = [];
  const byKind = new Map<string, KindRules>();

  rules.forEach((rule, index) => {
    const where = `rules.${index}${rule.id ? ` (${rule.id})` : ""}`;
    let entry = byKind.get(rule.kind);
    if (!entry) {
      entry = { exact: new Map(), prefix: new Map(), wildcard: [] };
      byKind.set(rule.kind, entry);
    }

    const compiled: CompiledRule = { index, rule, changeKinds: rule.changeKinds ? new Set(rule.changeKinds) : null };
    const selector = rule.prefix ?? rule.path;

    if (selector === undefined || (rule.path === "*" && rule.prefix === undefined)) {
      addUnique(entry.wildcard, compiled, `${where}: overlaps another wildcard rule for ${rule.kind}`, issues);
      return;
    }

    let canonical: string;
    try {
      const pattern = parsePattern(selector);
      if (pattern.some((seg) => seg.type === "any-key")) {
        issues.push(`${where}: key wildcards are not supported in "${selector}"; use prefix instead`);
        return;
      }
      canonical = formatPath(pattern);
    } catch (err) {
      issues.push(`${where}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const tier = rule.prefix !== undefined ? entry.prefix : entry.exact;
    const list = tier.get(canonical) ?? [];
    tier.set(canonical, list);
    addUnique(
      list,
      compiled,
      `${where}: overlaps another ${rule.prefix !== undefined ? "prefix" : "path"} rule for ${rule.kind} "${canonical}"`,
      issues,
    );
  });

  if (issues.length > 0) throw new ClassificationRuleError(issues);
  return byKind;
}

function addUnique(list: CompiledRule[], rule: CompiledRule, message: string, issues: string[]): void {
  const clash = list.find((other) => overlaps(other.changeKinds, rule.changeKinds));
  if (clash) {
    issues.push(`${message} (rules.${clash.index})`);
    return;
  }
  list.push(rule);
}

function overlaps(a: ReadonlySet<ChangeKind> | null, b: ReadonlySet<ChangeKind> | null): boolean {
  if (a === null || b === null) return true;
  for (const kind of a) if (b.has(kind)) return true;
  return false;
}
