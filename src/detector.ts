/**
 * Drift Detector
 *
 * Runs the pipeline end to end: normalize both sides, match by address,
 * diff and classify every pair, then build the report. The async variant
 * yields to the event loop between batches; both variants produce the
 * same report for the same input.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Classifier } from "./classifier.js";
import { DiffEngine } from "./diff-engine.js";
import type { EquivalenceTable } from "./equivalence.js";
import { AmbiguousAddressError, ClassificationRuleError, DriftCancelledError, NormalizationError } from "./errors.js";
import { getLogger, type DriftLogger } from "./logging/logger.js";
import { match } from "./matcher.js";
import { Normalizer, isPlainObject } from "./normalizer.js";
import { buildReport, type ReportInput } from "./report-builder.js";
import type {
  ClassifiedEntry,
  DriftReport,
  MatchedPair,
  MatchResult,
  RawResourceRecord,
  ResourceModel,
  ResourceOrigin,
  UnanalyzableRecord,
} from "./types.js";

export interface DetectInput {
  declared: readonly RawResourceRecord[];
  observed: readonly RawResourceRecord[];
}

export interface DetectOptions {
  signal?: AbortSignal;
}

export interface DetectAsyncOptions extends DetectOptions {
  /** Resources processed between yields. Default 100. */
  batchSize?: number;
}

export interface DriftDetectorOptions {
  equivalence: EquivalenceTable;
  classifier: Classifier;
  logger?: DriftLogger;
}

export class DriftDetector {
  readonly equivalence: EquivalenceTable;
  readonly classifier: Classifier;
  private readonly normalizer: Normalizer;
  private readonly diffEngine: DiffEngine;
  private readonly logger: DriftLogger;

  /**
   * Throws ClassificationRuleError when the rule table names a kind that the
   * equivalence table treats as an alias, since such rules could never match.
   */
  constructor(options: DriftDetectorOptions) {
    const aliased = options.classifier
      .kinds()
      .filter((kind) => options.equivalence.resolveKind(kind) !== kind)
      .map((kind) => `${kind}: kind is an alias of ${options.equivalence.resolveKind(kind)}; write rules for that kind`);
    if (aliased.length > 0) throw new ClassificationRuleError(aliased);

    this.equivalence = options.equivalence;
    this.classifier = options.classifier;
    this.normalizer = new Normalizer(options.equivalence);
    this.diffEngine = new DiffEngine(options.equivalence);
    this.logger = options.logger ?? getLogger("detector");
  }

  detect(input: DetectInput, options: DetectOptions = {}): DriftReport {
    const run = this.run(input, options.signal);
    let step = run.next();
    while (!step.done) step = run.next();
    return step.value;
  }

  async detectAsync(input: DetectInput, options: DetectAsyncOptions = {}): Promise<DriftReport> {
    const batchSize = Math.max(1, Math.floor(options.batchSize ?? 100));
    const run = this.run(input, options.signal);
    let processed = 0;
    let step = run.next();
    while (!step.done) {
      processed++;
      if (processed % batchSize === 0) await yieldToEventLoop();
      step = run.next();
    }
    return step.value;
  }

  /**
   * The pipeline as a generator that yields once per resource handled, so
   * the sync and async drivers share one implementation.
   */
  private *run(input: DetectInput, signal: AbortSignal | undefined): Generator<void, DriftReport, void> {
    let processed = 0;
    const checkpoint = (): void => {
      if (signal?.aborted) throw new DriftCancelledError(processed);
    };

    checkpoint();
    this.logger.info("Drift detection started", {
      declared: input.declared.length,
      observed: input.observed.length,
      equivalenceTable: this.equivalence.version,
      ruleTable: this.classifier.version,
    });

    const unanalyzable: UnanalyzableRecord[] = [];
    const models: Record<ResourceOrigin, ResourceModel[]> = { declared: [], observed: [] };
    for (const origin of ["declared", "observed"] as const) {
      for (const [index, raw] of input[origin].entries()) {
        checkpoint();
        const model = this.normalizeRecord(raw, origin, index, unanalyzable);
        if (model) models[origin].push(model);
        processed++;
        yield;
      }
    }

    let matched: MatchResult;
    try {
      matched = match(models.declared, models.observed);
    } catch (err) {
      if (err instanceof AmbiguousAddressError) {
        this.logger.error(err.message, { origin: err.origin, addresses: err.addresses });
      }
      throw err;
    }

    const pairs: Array<{ pair: MatchedPair; entries: ClassifiedEntry[] }> = [];
    for (const pair of matched.pairs) {
      checkpoint();
      const diff = this.diffEngine.diff(pair.declared, pair.observed);
      const entries = this.classifier.classifyEntries(pair.declared.kind, diff);
      this.logger.debug("Compared resource", { address: pair.address, entries: entries.length });
      pairs.push({ pair, entries });
      processed++;
      yield;
    }

    const reportInput: ReportInput = {
      pairs,
      orphans: matched.orphans,
      unmanaged: matched.unmanaged,
      unanalyzable,
    };
    const report = buildReport(reportInput, {
      equivalenceTableVersion: this.equivalence.version,
      ruleTableVersion: this.classifier.version,
    });

    this.logger.info("Drift detection finished", {
      matched: report.summary.matched,
      drifted: report.summary.drifted,
      orphaned: report.summary.orphaned,
      unmanaged: report.summary.unmanaged,
      unanalyzable: report.summary.unanalyzable,
    });
    return report;
  }

  private normalizeRecord(
    raw: RawResourceRecord,
    origin: ResourceOrigin,
    index: number,
    unanalyzable: UnanalyzableRecord[],
  ): ResourceModel | undefined {
    try {
      return this.normalizer.normalize(raw, origin);
    } catch (err) {
      if (!(err instanceof NormalizationError)) throw err;
      const address = err.hints.address ?? hint(raw, "address");
      const kind = err.hints.kind ?? hint(raw, "kind");
      this.logger.warn(`Skipping ${origin} record ${index}: ${err.message}`, { origin, index });
      unanalyzable.push({
        origin,
        index,
        ...(address !== undefined ? { address } : {}),
        ...(kind !== undefined ? { kind } : {}),
        reason: err.message,
      });
      return undefined;
    }
  }
}

function hint(raw: unknown, key: "address" | "kind"): string | undefined {
  if (!isPlainObject(raw)) return undefined;
  const value = raw[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}
