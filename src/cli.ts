/**
 * Drift — CLI Commands
 *
 * Registers `driftscope drift` subcommands: check, history and rules.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Option, type Command } from "commander";
import { DIALECTS, isDialect, loadDocuments, selectRecords, toRawRecords } from "./adapters/index.js";
import { loadEquivalenceTable, loadRuleTable, resolveCliSettings } from "./config/loader.js";
import { severitySchema } from "./config/schema.js";
import { DriftDetector } from "./detector.js";
import type { DriftLogger } from "./logging/logger.js";
import { renderJson, renderText, writeReport } from "./render.js";
import { SQLiteDriftHistoryStorage, createRun, type DriftHistoryStorage } from "./storage.js";
import { SEVERITIES, type DriftReport, type Severity } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  logger: DriftLogger;
  env?: NodeJS.ProcessEnv;
  /** Report and listing output. Defaults to stdout. */
  write?: (text: string) => void;
  setExitCode?: (code: number) => void;
};

export type CliDeps = {
  createStorage?: (dbPath: string) => DriftHistoryStorage;
};

/** Exit code when drift at or above --fail-on is found. */
export const EXIT_DRIFT = 2;
export const EXIT_ERROR = 1;

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

function defaultStorage(dbPath: string): DriftHistoryStorage {
  fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  return new SQLiteDriftHistoryStorage(dbPath);
}

/** True when any matched resource drifted at or above `threshold`. */
export function reachesSeverity(report: DriftReport, threshold: Severity): boolean {
  const limit = SEVERITIES.indexOf(threshold);
  return report.resources.some(
    (r) => r.highestSeverity !== null && SEVERITIES.indexOf(r.highestSeverity) <= limit,
  );
}

async function withStorage<T>(
  deps: CliDeps,
  dbPath: string,
  fn: (storage: DriftHistoryStorage) => Promise<T>,
): Promise<T> {
  const storage = (deps.createStorage ?? defaultStorage)(dbPath);
  await storage.initialize();
  try {
    return await fn(storage);
  } finally {
    await storage.close();
  }
}

// =============================================================================
// CLI Registration
// =============================================================================

type CheckOptions = {
  template: string;
  provider: string;
  state: string;
  output?: string;
  json?: boolean;
  rules?: string;
  equivalence?: string;
  failOn?: string;
  jsonpath?: string;
  record?: string;
  db?: string;
};

/**
 * Register `driftscope drift` CLI commands.
 */
export function registerDriftCli(ctx: CliContext, deps: CliDeps = {}): void {
  const env = ctx.env ?? process.env;
  const write = ctx.write ?? ((text: string) => void process.stdout.write(text));
  const setExitCode =
    ctx.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  /** Report failures and set the error exit code instead of letting commander print a stack. */
  const guarded =
    <A extends unknown[]>(fn: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(...args);
      } catch (err) {
        ctx.logger.error(err instanceof Error ? err.message : String(err));
        setExitCode(EXIT_ERROR);
      }
    };

  const drift = ctx.program.command("drift").description("Infrastructure drift detection");

  // ---------------------------------------------------------------------------
  // drift check
  // ---------------------------------------------------------------------------
  drift
    .command("check")
    .description("Compare declared infrastructure against observed state")
    .requiredOption("-t, --template <file>", "Declared configuration (plan JSON, template, manifests or records)")
    .addOption(new Option("-p, --provider <dialect>", "Input dialect").choices(DIALECTS).makeOptionMandatory())
    .requiredOption("-s, --state <file>", "Observed state (tfstate or records)")
    .option("-o, --output <file>", "Write the report to a file instead of stdout")
    .option("-j, --json", "Render the report as JSON")
    .option("--jsonpath <expr>", "Select the observed records from the state documents, e.g. $.items[*]")
    .option("--rules <file>", "Classification rule table")
    .option("--equivalence <file>", "Equivalence table")
    .addOption(new Option("--fail-on <severity>", "Exit with code 2 when drift reaches this severity").choices(SEVERITIES))
    .option("--record <target>", "Save the run to drift history under this target name")
    .option("--db <file>", "Drift history database")
    .action(
      guarded(async (opts: CheckOptions) => {
        const settings = resolveCliSettings(opts, env);
        ctx.logger.setLevel(settings.logLevel);
        if (!isDialect(opts.provider)) throw new Error(`Unknown provider "${opts.provider}"`);
        const failOn = opts.failOn === undefined ? undefined : severitySchema.parse(opts.failOn);

        const detector = new DriftDetector({
          equivalence: loadEquivalenceTable(settings.equivalencePath),
          classifier: loadRuleTable(settings.rulesPath),
          logger: ctx.logger.child("detector"),
        });

        const stateDocs = loadDocuments(opts.state);
        const report = await detector.detectAsync({
          declared: toRawRecords(opts.provider, loadDocuments(opts.template)),
          observed: toRawRecords(opts.provider, opts.jsonpath ? selectRecords(stateDocs, opts.jsonpath) : stateDocs),
        });

        const text = opts.json ? renderJson(report) : renderText(report);
        if (opts.output) {
          writeReport(opts.output, text);
          ctx.logger.info(`Report written to ${opts.output}`);
        } else {
          write(text);
        }

        if (opts.record) {
          const run = createRun(opts.record, report);
          await withStorage(deps, settings.dbPath, (storage) => storage.saveRun(run));
          ctx.logger
            .withContext({ runId: run.id, target: opts.record })
            .info("Recorded drift run", { drifted: run.summary.drifted, entries: run.summary.totalEntries });
        }

        if (failOn && reachesSeverity(report, failOn)) setExitCode(EXIT_DRIFT);
      }),
    );

  // ---------------------------------------------------------------------------
  // drift history
  // ---------------------------------------------------------------------------
  drift
    .command("history")
    .description("Show recorded drift runs for a target")
    .argument("<target>", "Target name used with --record")
    .option("--limit <n>", "Number of runs to show", "10")
    .option("--db <file>", "Drift history database")
    .option("-j, --json", "Output as JSON")
    .action(
      guarded(async (target: string, opts: { limit: string; db?: string; json?: boolean }) => {
        const settings = resolveCliSettings(opts, env);
        const limit = Number.parseInt(opts.limit, 10);
        if (!Number.isInteger(limit) || limit < 1) throw new Error(`Invalid --limit "${opts.limit}"`);

        const runs = await withStorage(deps, settings.dbPath, (storage) => storage.listRuns(target, limit));

        if (opts.json) {
          write(`${JSON.stringify(runs.map(({ report: _report, ...run }) => run), null, 2)}\n`);
          return;
        }
        if (runs.length === 0) {
          write(`No drift runs recorded for ${target}.\n`);
          return;
        }
        const rows = runs.map((r) => [
          r.detectedAt,
          r.id,
          String(r.summary.matched),
          String(r.summary.drifted),
          String(r.summary.orphaned),
          String(r.summary.unmanaged),
          String(r.summary.totalEntries),
        ]);
        write(`${table(["Detected", "Run", "Matched", "Drifted", "Orphaned", "Unmanaged", "Entries"], rows)}\n`);
      }),
    );

  // ---------------------------------------------------------------------------
  // drift rules
  // ---------------------------------------------------------------------------
  drift
    .command("rules")
    .description("List the classification rules in effect")
    .option("--rules <file>", "Classification rule table")
    .action(
      guarded(async (opts: { rules?: string }) => {
        const settings = resolveCliSettings(opts, env);
        const classifier = loadRuleTable(settings.rulesPath);
        const rows = classifier
          .describe()
          .map((r) => [r.kind, r.selector, r.severity, r.category, r.changeKinds]);

        write(`Rule table ${classifier.version}${classifier.name ? ` (${classifier.name})` : ""}: ${classifier.ruleCount} rules\n`);
        write(`${table(["Kind", "Path", "Severity", "Category", "Changes"], rows)}\n`);
      }),
    );
}
