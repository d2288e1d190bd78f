import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildReport } from "./report-builder.js";
import {
  createRun,
  InMemoryDriftHistoryStorage,
  SQLiteDriftHistoryStorage,
  type DriftHistoryStorage,
} from "./storage.js";
import type { DriftReport } from "./types.js";

function makeReport(drifted: boolean): DriftReport {
  const declared = { address: "logs", kind: "aws_s3_bucket", origin: "declared" as const, attributes: new Map() };
  const observed = { ...declared, origin: "observed" as const };
  return buildReport(
    {
      pairs: [
        {
          pair: { address: "logs", declared, observed },
          entries: drifted
            ? [
                {
                  path: "encryption",
                  changeKind: "modified",
                  declared: "enabled",
                  observed: "disabled",
                  severity: "critical",
                  category: "encryption",
                },
              ]
            : [],
        },
      ],
      orphans: [],
      unmanaged: [],
      unanalyzable: [{ origin: "observed", index: 1, reason: "Record has no kind" }],
    },
    { equivalenceTableVersion: "eq-1", ruleTableVersion: "rules-1" },
  );
}

describe("createRun", () => {
  it("stamps an id and time and copies the summary", () => {
    const report = makeReport(true);
    const run = createRun("prod", report, new Date("2026-03-01T10:00:00Z"));
    expect(run.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(run.target).toBe("prod");
    expect(run.detectedAt).toBe("2026-03-01T10:00:00.000Z");
    expect(run.summary).toBe(report.summary);
  });
});

const backends: Array<[string, () => DriftHistoryStorage]> = [
  ["InMemoryDriftHistoryStorage", () => new InMemoryDriftHistoryStorage()],
  ["SQLiteDriftHistoryStorage", () => new SQLiteDriftHistoryStorage(":memory:")],
];

describe.each(backends)("%s", (_name, create) => {
  let storage: DriftHistoryStorage;

  beforeEach(async () => {
    storage = create();
    await storage.initialize();
  });

  afterEach(async () => {
    await storage.close();
  });

  it("saves and retrieves a run", async () => {
    const run = createRun("prod", makeReport(true), new Date("2026-03-01T10:00:00Z"));
    await storage.saveRun(run);

    const loaded = await storage.getRun(run.id);
    expect(loaded).toEqual(run);
    expect(loaded?.report.resources[0]?.entries[0]?.severity).toBe("critical");
  });

  it("returns null for an unknown id", async () => {
    expect(await storage.getRun("missing")).toBeNull();
  });

  it("lists runs for a target, most recent first", async () => {
    const older = createRun("prod", makeReport(false), new Date("2026-03-01T10:00:00Z"));
    const newer = createRun("prod", makeReport(true), new Date("2026-03-02T10:00:00Z"));
    const other = createRun("staging", makeReport(true), new Date("2026-03-03T10:00:00Z"));
    await storage.saveRun(newer);
    await storage.saveRun(older);
    await storage.saveRun(other);

    const runs = await storage.listRuns("prod");
    expect(runs.map((r) => r.id)).toEqual([newer.id, older.id]);
    expect(runs[1]?.summary.drifted).toBe(0);
  });

  it("breaks ties by save order and honours the limit", async () => {
    const at = new Date("2026-03-01T10:00:00Z");
    const first = createRun("prod", makeReport(false), at);
    const second = createRun("prod", makeReport(false), at);
    const third = createRun("prod", makeReport(false), at);
    for (const run of [first, second, third]) await storage.saveRun(run);

    expect((await storage.listRuns("prod", 2)).map((r) => r.id)).toEqual([third.id, second.id]);
  });

  it("returns an empty list for an unknown target", async () => {
    expect(await storage.listRuns("nowhere")).toEqual([]);
  });
});

describe("SQLiteDriftHistoryStorage", () => {
  it("refuses to work before initialize", async () => {
    const storage = new SQLiteDriftHistoryStorage(":memory:");
    await expect(storage.getRun("x")).rejects.toThrow("Drift history storage is not initialized");
  });
});
