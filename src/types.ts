/**
 * Drift Detection — Type Definitions
 *
 * Resource model, diff entries, classification and report shapes shared by
 * the normalizer, matcher, diff engine, classifier and report builder.
 */

// ── Resource Model ──────────────────────────────────────────────

export type ResourceOrigin = "declared" | "observed";

export type ScalarValue = string | number | boolean | null;

/** A flattened leaf: a scalar, or a sequence made only of scalars. */
export type AttributeValue = ScalarValue | readonly ScalarValue[];

export interface ResourceModel {
  readonly address: string;
  /** Normalized resource type (`aws_s3_bucket`, `kubernetes.Deployment`). */
  readonly kind: string;
  readonly origin: ResourceOrigin;
  /** Flattened attributes, sorted by path. */
  readonly attributes: ReadonlyMap<string, AttributeValue>;
  /** Dialect of the adapter that produced the record, when known. */
  readonly source?: string;
}

/**
 * A record as handed over by a template parser or live-state collector.
 * Everything is optional and untrusted until normalized.
 */
export interface RawResourceRecord {
  address?: unknown;
  kind?: unknown;
  name?: unknown;
  source?: unknown;
  attributes?: unknown;
}

// ── Matching ────────────────────────────────────────────────────

/** A declared and an observed resource sharing one address. */
export interface MatchedPair {
  readonly address: string;
  readonly declared: ResourceModel;
  readonly observed: ResourceModel;
}

/**
 * Partition of both inputs by address. Orphans are declared-only,
 * unmanaged resources are observed-only.
 */
export interface MatchResult {
  pairs: MatchedPair[];
  orphans: ResourceModel[];
  unmanaged: ResourceModel[];
}

// ── Diff ────────────────────────────────────────────────────────

export type ChangeKind = "added" | "removed" | "modified";

export type DiffEntry =
  | { readonly path: string; readonly changeKind: "added"; readonly observed: AttributeValue }
  | { readonly path: string; readonly changeKind: "removed"; readonly declared: AttributeValue }
  | {
      readonly path: string;
      readonly changeKind: "modified";
      readonly declared: AttributeValue;
      readonly observed: AttributeValue;
    };

// ── Classification ──────────────────────────────────────────────

export type Severity = "critical" | "high" | "medium" | "low" | "informational";

/** Highest first. */
export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low", "informational"];

export interface Classification {
  severity: Severity;
  category: string;
}

export type ClassifiedEntry = DiffEntry & Classification;

// ── Report ──────────────────────────────────────────────────────

export interface ResourceSummary {
  address: string;
  kind: string;
  source?: string;
  attributeCount: number;
}

export interface ResourceDrift {
  address: string;
  kind: string;
  /** Present only when the observed resource reports a different kind. */
  observedKind?: string;
  source?: string;
  drifted: boolean;
  highestSeverity: Severity | null;
  entries: ClassifiedEntry[];
}

export interface UnanalyzableRecord {
  origin: ResourceOrigin;
  /** Position of the record in its input sequence. */
  index: number;
  address?: string;
  kind?: string;
  reason: string;
}

export interface DriftSummary {
  matched: number;
  drifted: number;
  clean: number;
  orphaned: number;
  unmanaged: number;
  unanalyzable: number;
  totalEntries: number;
  bySeverity: Record<Severity, number>;
  byCategory: Record<string, number>;
}

export interface DriftReport {
  schemaVersion: 1;
  equivalenceTableVersion: string;
  ruleTableVersion: string;
  summary: DriftSummary;
  resources: ResourceDrift[];
  orphans: ResourceSummary[];
  unmanaged: ResourceSummary[];
  unanalyzable: UnanalyzableRecord[];
}

