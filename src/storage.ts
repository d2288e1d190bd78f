/**
 * Drift history storage (InMemory + SQLite)
 *
 * Keeps past drift reports per target so successive runs can be compared.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { severitySchema } from "./config/schema.js";
import type { DriftReport, DriftSummary } from "./types.js";

export interface DriftRun {
  id: string;
  /** Free-form name of what was checked, e.g. a workspace or stack. */
  target: string;
  detectedAt: string;
  summary: DriftSummary;
  report: DriftReport;
}

export interface DriftHistoryStorage {
  initialize(): Promise<void>;
  saveRun(run: DriftRun): Promise<void>;
  getRun(id: string): Promise<DriftRun | null>;
  /** Most recent first. */
  listRuns(target: string, limit?: number): Promise<DriftRun[]>;
  close(): Promise<void>;
}

export function createRun(target: string, report: DriftReport, now: Date = new Date()): DriftRun {
  return {
    id: randomUUID(),
    target,
    detectedAt: now.toISOString(),
    summary: report.summary,
    report,
  };
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryDriftHistoryStorage implements DriftHistoryStorage {
  private runs = new Map<string, DriftRun>();
  private byTarget = new Map<string, string[]>();

  async initialize(): Promise<void> {}

  async saveRun(run: DriftRun): Promise<void> {
    this.runs.set(run.id, structuredClone(run));
    const ids = this.byTarget.get(run.target) ?? [];
    ids.unshift(run.id);
    this.byTarget.set(run.target, ids);
  }

  async getRun(id: string): Promise<DriftRun | null> {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  async listRuns(target: string, limit = 10): Promise<DriftRun[]> {
    const ids = this.byTarget.get(target) ?? [];
    return ids
      .map((id) => this.runs.get(id))
      .filter((run): run is DriftRun => run !== undefined)
      .sort((a, b) => (a.detectedAt < b.detectedAt ? 1 : a.detectedAt > b.detectedAt ? -1 : 0))
      .slice(0, limit)
      .map((run) => structuredClone(run));
  }

  async close(): Promise<void> {
    this.runs.clear();
    this.byTarget.clear();
  }
}

// ── SQLite ──────────────────────────────────────────────────────

export class SQLiteDriftHistoryStorage implements DriftHistoryStorage {
  private db: import("better-sqlite3").Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    const Database = (await import("better-sqlite3")).default;
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS drift_runs (
        id TEXT PRIMARY KEY,
        target TEXT NOT NULL,
        detected_at TEXT NOT NULL,
        summary_json TEXT NOT NULL,
        report_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_drift_runs_target ON drift_runs(target, detected_at DESC);
    `);
  }

  async saveRun(run: DriftRun): Promise<void> {
    this.connection()
      .prepare(`INSERT INTO drift_runs (id, target, detected_at, summary_json, report_json) VALUES (?, ?, ?, ?, ?)`)
      .run(run.id, run.target, run.detectedAt, JSON.stringify(run.summary), JSON.stringify(run.report));
  }

  async getRun(id: string): Promise<DriftRun | null> {
    const row: unknown = this.connection().prepare("SELECT * FROM drift_runs WHERE id = ?").get(id);
    return row === undefined ? null : rowToRun(row);
  }

  async listRuns(target: string, limit = 10): Promise<DriftRun[]> {
    const rows: unknown[] = this.connection()
      .prepare("SELECT * FROM drift_runs WHERE target = ? ORDER BY detected_at DESC, rowid DESC LIMIT ?")
      .all(target, limit);
    return rows.map(rowToRun);
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private connection(): import("better-sqlite3").Database {
    if (!this.db) throw new Error("Drift history storage is not initialized");
    return this.db;
  }
}

// ── Row decoding ────────────────────────────────────────────────

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const attributeValueSchema = z.union([scalarSchema, z.array(scalarSchema)]);
const classification = { path: z.string(), severity: severitySchema, category: z.string() };

const classifiedEntrySchema = z.discriminatedUnion("changeKind", [
  z.object({ ...classification, changeKind: z.literal("added"), observed: attributeValueSchema }),
  z.object({ ...classification, changeKind: z.literal("removed"), declared: attributeValueSchema }),
  z.object({
    ...classification,
    changeKind: z.literal("modified"),
    declared: attributeValueSchema,
    observed: attributeValueSchema,
  }),
]);

const resourceSummarySchema = z.object({
  address: z.string(),
  kind: z.string(),
  source: z.string().optional(),
  attributeCount: z.number(),
});

const driftSummarySchema = z.object({
  matched: z.number(),
  drifted: z.number(),
  clean: z.number(),
  orphaned: z.number(),
  unmanaged: z.number(),
  unanalyzable: z.number(),
  totalEntries: z.number(),
  bySeverity: z.object({
    critical: z.number(),
    high: z.number(),
    medium: z.number(),
    low: z.number(),
    informational: z.number(),
  }),
  byCategory: z.record(z.string(), z.number()),
});

const driftReportSchema = z.object({
  schemaVersion: z.literal(1),
  equivalenceTableVersion: z.string(),
  ruleTableVersion: z.string(),
  summary: driftSummarySchema,
  resources: z.array(
    z.object({
      address: z.string(),
      kind: z.string(),
      observedKind: z.string().optional(),
      source: z.string().optional(),
      drifted: z.boolean(),
      highestSeverity: severitySchema.nullable(),
      entries: z.array(classifiedEntrySchema),
    }),
  ),
  orphans: z.array(resourceSummarySchema),
  unmanaged: z.array(resourceSummarySchema),
  unanalyzable: z.array(
    z.object({
      origin: z.enum(["declared", "observed"]),
      index: z.number(),
      address: z.string().optional(),
      kind: z.string().optional(),
      reason: z.string(),
    }),
  ),
});

const driftRunRowSchema = z.object({
  id: z.string(),
  target: z.string(),
  detected_at: z.string(),
  summary_json: z.string(),
  report_json: z.string(),
});

function rowToRun(row: unknown): DriftRun {
  const r = driftRunRowSchema.parse(row);
  return {
    id: r.id,
    target: r.target,
    detectedAt: r.detected_at,
    summary: driftSummarySchema.parse(JSON.parse(r.summary_json)),
    report: driftReportSchema.parse(JSON.parse(r.report_json)),
  };
}
