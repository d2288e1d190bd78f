/**
 * Tests for the `driftscope drift` CLI commands.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EXIT_DRIFT, EXIT_ERROR, registerDriftCli, type CliContext } from "./cli.js";
import { createLogger, MemoryTransport } from "./logging/logger.js";
import { createRun, InMemoryDriftHistoryStorage } from "./storage.js";
import type { DriftReport } from "./types.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Survives the close() each command issues, so runs can be inspected afterwards. */
class KeptStorage extends InMemoryDriftHistoryStorage {
  override async close(): Promise<void> {}
}

type Harness = {
  program: Command;
  output: string[];
  exitCodes: number[];
  logs: MemoryTransport;
  storage: KeptStorage;
  run: (...args: string[]) => Promise<void>;
};

function createHarness(env: NodeJS.ProcessEnv = {}): Harness {
  const program = new Command("driftscope");
  program.exitOverride();
  program.configureOutput({ writeOut: () => {}, writeErr: () => {} });

  const output: string[] = [];
  const exitCodes: number[] = [];
  const logs = new MemoryTransport();
  const storage = new KeptStorage();
  const ctx: CliContext = {
    program,
    logger: createLogger("cli", { level: "info", transports: [logs] }),
    env,
    write: (text) => output.push(text),
    setExitCode: (code) => exitCodes.push(code),
  };
  registerDriftCli(ctx, { createStorage: () => storage });

  return {
    program,
    output,
    exitCodes,
    logs,
    storage,
    run: async (...args) => {
      await program.parseAsync(["drift", ...args], { from: "user" });
    },
  };
}

let dir: string;

function writeFile(name: string, value: unknown): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, typeof value === "string" ? value : JSON.stringify(value));
  return file;
}

function bucket(encryption: string): unknown[] {
  return [{ address: "logs", kind: "aws_s3_bucket", attributes: { bucket: "logs", encryption } }];
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "driftscope-cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

// ── Tests ───────────────────────────────────────────────────────────────────

describe("registerDriftCli", () => {
  it("registers the drift command group", () => {
    const { program } = createHarness();
    const drift = program.commands.find((c) => c.name() === "drift");
    expect(drift?.commands.map((c) => c.name())).toEqual(["check", "history", "rules"]);
  });
});

describe("drift check", () => {
  it("prints a text report using the bundled tables", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("disabled"));

    await h.run("check", "-t", declared, "-s", observed, "-p", "records");

    expect(h.output.join("")).toBe(
      [
        "Drift report (equivalence 2026.1, rules 2026.1)",
        "",
        "Matched: 1  Drifted: 1  Clean: 0  Orphaned: 0  Unmanaged: 0  Unanalyzable: 0",
        "Entries: 1  critical=1 high=0 medium=0 low=0 informational=0",
        "",
        "Drifted resources:",
        "  logs (aws_s3_bucket) [critical]",
        '    ~ encryption: "enabled" -> "disabled"  [critical/encryption]',
        "",
      ].join("\n"),
    );
    expect(h.exitCodes).toEqual([]);
  });

  it("writes a JSON report to a file", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("enabled"));
    const out = path.join(dir, "reports", "drift.json");

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--json", "-o", out);

    const report: DriftReport = JSON.parse(fs.readFileSync(out, "utf-8"));
    expect(report.summary.clean).toBe(1);
    expect(report.resources[0]?.address).toBe("logs");
    expect(h.output).toEqual([]);
  });

  it("exits with the drift code when --fail-on is reached", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("disabled"));

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--fail-on", "high");
    expect(h.exitCodes).toEqual([EXIT_DRIFT]);
  });

  it("keeps the success code when drift stays below --fail-on", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", [{ address: "logs", kind: "aws_s3_bucket", attributes: { acl: "private" } }]);
    const observed = writeFile("observed.json", [{ address: "logs", kind: "aws_s3_bucket", attributes: { acl: "public-read" } }]);

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--fail-on", "critical");
    expect(h.exitCodes).toEqual([]);
  });

  it("records the run under a target", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("disabled"));

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--record", "prod");

    const [run] = await h.storage.listRuns("prod");
    expect(run?.summary.drifted).toBe(1);
    expect(run?.report.resources[0]?.highestSeverity).toBe("critical");
  });

  it("logs the recorded run with its id and target", async () => {
    const h = createHarness({ DRIFTSCOPE_LOG_LEVEL: "info" });
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("disabled"));

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--record", "prod");

    const [run] = await h.storage.listRuns("prod");
    const entry = h.logs.entries.find((e) => e.message === "Recorded drift run");
    expect(entry?.runId).toBe(run?.id);
    expect(entry?.target).toBe("prod");
    expect(entry?.subsystem).toBe("drift/cli");
    expect(entry?.metadata).toEqual({ drifted: 1, entries: 1 });
  });

  it("selects observed records with --jsonpath", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", {
      exportedAt: "2026-03-01",
      inventory: { items: bucket("disabled") },
    });

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--json", "--jsonpath", "$.inventory.items[*]");

    const report: DriftReport = JSON.parse(h.output.join(""));
    expect(report.summary.matched).toBe(1);
    expect(report.resources[0]?.entries.map((e) => [e.path, e.observed])).toEqual([["encryption", "disabled"]]);
  });

  it("treats a --jsonpath without matches as empty observed state", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", { inventory: {} });

    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--json", "--jsonpath", "$.inventory.items[*]");

    const report: DriftReport = JSON.parse(h.output.join(""));
    expect(report.orphans).toEqual([{ address: "logs", kind: "aws_s3_bucket", attributeCount: 2 }]);
  });

  it("uses the tables given on the command line", async () => {
    const h = createHarness();
    const rules = writeFile("rules.json", {
      version: "custom-1",
      rules: [{ kind: "aws_s3_bucket", path: "encryption", severity: "low", category: "custom" }],
    });
    const equivalence = writeFile("equivalence.json", { version: "eq-custom" });
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("disabled"));

    await h.run(
      "check",
      "-t",
      declared,
      "-s",
      observed,
      "-p",
      "records",
      "--json",
      "--rules",
      rules,
      "--equivalence",
      equivalence,
    );

    const report: DriftReport = JSON.parse(h.output.join(""));
    expect(report.ruleTableVersion).toBe("custom-1");
    expect(report.equivalenceTableVersion).toBe("eq-custom");
    expect(report.resources[0]?.entries[0]?.category).toBe("custom");
  });

  it("reports unreadable input as an error", async () => {
    const h = createHarness();
    const observed = writeFile("observed.json", bucket("enabled"));

    await h.run("check", "-t", path.join(dir, "missing.json"), "-s", observed, "-p", "records");

    expect(h.exitCodes).toEqual([EXIT_ERROR]);
    expect(h.logs.messages("error")[0]).toMatch(/ENOENT/);
  });

  it("reports documents that do not match the dialect", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", { Parameters: {} });
    const observed = writeFile("observed.json", []);

    await h.run("check", "-t", declared, "-s", observed, "-p", "cloudformation");

    expect(h.exitCodes).toEqual([EXIT_ERROR]);
    expect(h.logs.messages("error")).toEqual(["Document 0 is not a recognised cloudformation document"]);
  });

  it("rejects an unknown provider", async () => {
    const h = createHarness();
    await expect(h.run("check", "-t", "a.json", "-s", "b.json", "-p", "pulumi")).rejects.toThrow(
      /Allowed choices are terraform, cloudformation, kubernetes, records/,
    );
  });
});

describe("drift history", () => {
  it("says so when nothing was recorded", async () => {
    const h = createHarness();
    await h.run("history", "prod");
    expect(h.output).toEqual(["No drift runs recorded for prod.\n"]);
  });

  it("lists recorded runs as a table", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("disabled"));
    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--json", "-o", path.join(dir, "r.json"));
    const report: DriftReport = JSON.parse(fs.readFileSync(path.join(dir, "r.json"), "utf-8"));
    await h.storage.saveRun({ ...createRun("prod", report, new Date("2026-03-01T10:00:00Z")), id: "run-1" });

    await h.run("history", "prod");

    expect(h.output.join("")).toBe(
      [
        " Detected                 │ Run   │ Matched │ Drifted │ Orphaned │ Unmanaged │ Entries ",
        "──────────────────────────┼───────┼─────────┼─────────┼──────────┼───────────┼─────────",
        " 2026-03-01T10:00:00.000Z │ run-1 │ 1       │ 1       │ 0        │ 0         │ 1       ",
        "",
      ].join("\n"),
    );
  });

  it("prints runs without their reports as JSON", async () => {
    const h = createHarness();
    const declared = writeFile("declared.json", bucket("enabled"));
    const observed = writeFile("observed.json", bucket("enabled"));
    await h.run("check", "-t", declared, "-s", observed, "-p", "records", "--record", "prod");
    h.output.length = 0;

    await h.run("history", "prod", "--json");

    const runs: Array<Record<string, unknown>> = JSON.parse(h.output.join(""));
    expect(runs).toHaveLength(1);
    expect(Object.keys(runs[0] ?? {})).toEqual(["id", "target", "detectedAt", "summary"]);
    expect(runs[0]?.target).toBe("prod");
  });

  it("rejects an invalid limit", async () => {
    const h = createHarness();
    await h.run("history", "prod", "--limit", "0");
    expect(h.exitCodes).toEqual([EXIT_ERROR]);
    expect(h.logs.messages("error")).toEqual(['Invalid --limit "0"']);
  });
});

describe("drift rules", () => {
  it("lists a rule table", async () => {
    const h = createHarness();
    const rules = writeFile("rules.json", {
      version: "v9",
      name: "mini",
      rules: [
        { kind: "aws_s3_bucket", path: "encryption", severity: "critical", category: "encryption" },
        { kind: "aws_s3_bucket", prefix: "tags", changeKinds: ["added", "removed"], severity: "low", category: "tagging" },
      ],
    });

    await h.run("rules", "--rules", rules);

    expect(h.output.join("")).toBe(
      [
        "Rule table v9 (mini): 2 rules",
        " Kind          │ Path          │ Severity │ Category   │ Changes       ",
        "───────────────┼───────────────┼──────────┼────────────┼───────────────",
        " aws_s3_bucket │ encryption    │ critical │ encryption │ any           ",
        " aws_s3_bucket │ tags (prefix) │ low      │ tagging    │ added,removed ",
        "",
      ].join("\n"),
    );
  });

  it("loads the bundled table by default", async () => {
    const h = createHarness();
    await h.run("rules");
    expect(h.output[0]).toBe("Rule table 2026.1 (default): 55 rules\n");
  });

  it("reports a malformed table", async () => {
    const h = createHarness();
    const rules = writeFile("rules.json", "{ not json");
    await h.run("rules", "--rules", rules);
    expect(h.exitCodes).toEqual([EXIT_ERROR]);
    expect(h.logs.messages("error")[0]).toMatch(/^Invalid classification rule table:\n {2}- .*rules\.json: /);
  });
});
