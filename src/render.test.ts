import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { renderJson, renderText, writeReport } from "./render.js";
import { buildReport } from "./report-builder.js";
import type { ResourceModel, ResourceOrigin } from "./types.js";

function model(address: string, origin: ResourceOrigin, kind: string): ResourceModel {
  return { address, kind, origin, attributes: new Map() };
}

const versions = { equivalenceTableVersion: "eq-1", ruleTableVersion: "rules-1" };

const report = buildReport(
  {
    pairs: [
      {
        pair: {
          address: "logs",
          declared: model("logs", "declared", "aws_s3_bucket"),
          observed: model("logs", "observed", "aws_s3_bucket"),
        },
        entries: [
          {
            path: "encryption",
            changeKind: "modified",
            declared: "enabled",
            observed: "disabled",
            severity: "critical",
            category: "encryption",
          },
          { path: "tags.owner", changeKind: "removed", declared: "ops", severity: "low", category: "tagging" },
          { path: "acl", changeKind: "added", observed: ["public-read"], severity: "high", category: "access" },
        ],
      },
      {
        pair: {
          address: "web",
          declared: model("web", "declared", "aws_instance"),
          observed: model("web", "observed", "aws_instance"),
        },
        entries: [],
      },
    ],
    orphans: [model("web-sg", "declared", "aws_security_group")],
    unmanaged: [model("shadow-instance-1", "observed", "aws_instance")],
    unanalyzable: [{ origin: "observed", index: 2, address: "broken", reason: "Record has no kind" }],
  },
  versions,
);

describe("renderText", () => {
  it("renders every section", () => {
    expect(renderText(report)).toBe(
      [
        "Drift report (equivalence eq-1, rules rules-1)",
        "",
        "Matched: 2  Drifted: 1  Clean: 1  Orphaned: 1  Unmanaged: 1  Unanalyzable: 1",
        "Entries: 3  critical=1 high=1 medium=0 low=1 informational=0",
        "",
        "Drifted resources:",
        "  logs (aws_s3_bucket) [critical]",
        '    + acl: ["public-read"]  [high/access]',
        '    ~ encryption: "enabled" -> "disabled"  [critical/encryption]',
        '    - tags.owner: "ops"  [low/tagging]',
        "",
        "Orphaned (declared, not observed):",
        "  web-sg (aws_security_group)",
        "",
        "Unmanaged (observed, not declared):",
        "  shadow-instance-1 (aws_instance)",
        "",
        "Unanalyzable:",
        "  observed #2 broken: Record has no kind",
        "",
      ].join("\n"),
    );
  });

  it("omits empty sections", () => {
    const clean = buildReport({ pairs: [], orphans: [], unmanaged: [], unanalyzable: [] }, versions);
    expect(renderText(clean)).toBe(
      "Drift report (equivalence eq-1, rules rules-1)\n\n" +
        "Matched: 0  Drifted: 0  Clean: 0  Orphaned: 0  Unmanaged: 0  Unanalyzable: 0\n" +
        "Entries: 0  critical=0 high=0 medium=0 low=0 informational=0\n",
    );
  });
});

describe("renderJson", () => {
  it("pretty-prints the report with a trailing newline", () => {
    const text = renderJson(report);
    expect(text.endsWith("}\n")).toBe(true);
    expect(JSON.parse(text)).toEqual(report);
    expect(text.split("\n")[1]).toBe('  "schemaVersion": 1,');
  });
});

describe("writeReport", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates missing directories", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "driftscope-render-"));
    const file = path.join(dir, "nested", "report.txt");
    writeReport(file, "hello\n");
    expect(fs.readFileSync(file, "utf-8")).toBe("hello\n");
  });
});
