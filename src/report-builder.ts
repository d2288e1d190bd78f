/**
 * Report Builder
 *
 * Collects classified diff entries, orphans, unmanaged and unanalyzable
 * records into a single report. Everything is sorted on the way in so the
 * rendered report is identical for identical input, whatever order the
 * pipeline produced it in.
 */

import { comparePaths } from "./paths.js";
import {
  SEVERITIES,
  type ClassifiedEntry,
  type DriftReport,
  type DriftSummary,
  type MatchedPair,
  type ResourceDrift,
  type ResourceModel,
  type ResourceSummary,
  type Severity,
  type UnanalyzableRecord,
} from "./types.js";

export interface ReportInput {
  pairs: ReadonlyArray<{ pair: MatchedPair; entries: readonly ClassifiedEntry[] }>;
  orphans: readonly ResourceModel[];
  unmanaged: readonly ResourceModel[];
  unanalyzable: readonly UnanalyzableRecord[];
}

export interface TableVersions {
  equivalenceTableVersion: string;
  ruleTableVersion: string;
}

export function buildReport(input: ReportInput, versions: TableVersions): DriftReport {
  const resources = input.pairs
    .map(({ pair, entries }) => toResourceDrift(pair, entries))
    .sort((a, b) => comparePaths(a.address, b.address));
  const orphans = input.orphans.map(toSummary).sort(byAddress);
  const unmanaged = input.unmanaged.map(toSummary).sort(byAddress);
  const unanalyzable = input.unanalyzable
    .map((record) => ({ ...record }))
    .sort((a, b) => originRank(a.origin) - originRank(b.origin) || a.index - b.index);

  const report: DriftReport = {
    schemaVersion: 1,
    equivalenceTableVersion: versions.equivalenceTableVersion,
    ruleTableVersion: versions.ruleTableVersion,
    summary: summarize(resources, orphans.length, unmanaged.length, unanalyzable.length),
    resources,
    orphans,
    unmanaged,
    unanalyzable,
  };
  return deepFreeze(report);
}

/** Highest severity among entries, or null when there are none. */
export function highestSeverity(entries: readonly { severity: Severity }[]): Severity | null {
  for (const severity of SEVERITIES) {
    if (entries.some((e) => e.severity === severity)) return severity;
  }
  return null;
}

function toResourceDrift(pair: MatchedPair, entries: readonly ClassifiedEntry[]): ResourceDrift {
  const sorted = entries.map((e) => ({ ...e })).sort((a, b) => comparePaths(a.path, b.path));
  const { declared, observed } = pair;
  return {
    address: pair.address,
    kind: declared.kind,
    ...(observed.kind !== declared.kind ? { observedKind: observed.kind } : {}),
    ...(declared.source !== undefined ? { source: declared.source } : {}),
    drifted: sorted.length > 0,
    highestSeverity: highestSeverity(sorted),
    entries: sorted,
  };
}

function toSummary(resource: ResourceModel): ResourceSummary {
  return {
    address: resource.address,
    kind: resource.kind,
    ...(resource.source !== undefined ? { source: resource.source } : {}),
    attributeCount: resource.attributes.size,
  };
}

function summarize(
  resources: readonly ResourceDrift[],
  orphaned: number,
  unmanaged: number,
  unanalyzable: number,
): DriftSummary {
  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, informational: 0 };
  const categories = new Map<string, number>();
  let drifted = 0;
  let totalEntries = 0;

  for (const resource of resources) {
    if (resource.drifted) drifted++;
    for (const entry of resource.entries) {
      totalEntries++;
      bySeverity[entry.severity]++;
      categories.set(entry.category, (categories.get(entry.category) ?? 0) + 1);
    }
  }

  const byCategory: Record<string, number> = {};
  for (const key of [...categories.keys()].sort(comparePaths)) {
    byCategory[key] = categories.get(key) ?? 0;
  }

  return {
    matched: resources.length,
    drifted,
    clean: resources.length - drifted,
    orphaned,
    unmanaged,
    unanalyzable,
    totalEntries,
    bySeverity,
    byCategory,
  };
}

function byAddress(a: { address: string }, b: { address: string }): number {
  return comparePaths(a.address, b.address);
}

function originRank(origin: UnanalyzableRecord["origin"]): number {
  return origin === "declared" ? 0 : 1;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
