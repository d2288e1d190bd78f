/**
 * Report rendering — JSON for machines, plain text for terminals.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { SEVERITIES, type AttributeValue, type ClassifiedEntry, type DriftReport } from "./types.js";

export function renderJson(report: DriftReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function renderText(report: DriftReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push(`Drift report (equivalence ${report.equivalenceTableVersion}, rules ${report.ruleTableVersion})`);
  lines.push("");
  lines.push(
    `Matched: ${summary.matched}  Drifted: ${summary.drifted}  Clean: ${summary.clean}  ` +
      `Orphaned: ${summary.orphaned}  Unmanaged: ${summary.unmanaged}  Unanalyzable: ${summary.unanalyzable}`,
  );
  lines.push(`Entries: ${summary.totalEntries}  ${SEVERITIES.map((s) => `${s}=${summary.bySeverity[s]}`).join(" ")}`);

  const drifted = report.resources.filter((r) => r.drifted);
  if (drifted.length > 0) {
    lines.push("", "Drifted resources:");
    for (const resource of drifted) {
      const kind = resource.observedKind ? `${resource.kind} -> ${resource.observedKind}` : resource.kind;
      lines.push(`  ${resource.address} (${kind}) [${resource.highestSeverity ?? "none"}]`);
      for (const entry of resource.entries) lines.push(`    ${formatEntry(entry)}`);
    }
  }

  if (report.orphans.length > 0) {
    lines.push("", "Orphaned (declared, not observed):");
    for (const r of report.orphans) lines.push(`  ${r.address} (${r.kind})`);
  }

  if (report.unmanaged.length > 0) {
    lines.push("", "Unmanaged (observed, not declared):");
    for (const r of report.unmanaged) lines.push(`  ${r.address} (${r.kind})`);
  }

  if (report.unanalyzable.length > 0) {
    lines.push("", "Unanalyzable:");
    for (const r of report.unanalyzable) {
      lines.push(`  ${r.origin} #${r.index}${r.address ? ` ${r.address}` : ""}: ${r.reason}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

function formatEntry(entry: ClassifiedEntry): string {
  const tag = `[${entry.severity}/${entry.category}]`;
  switch (entry.changeKind) {
    case "added":
      return `+ ${entry.path}: ${formatValue(entry.observed)}  ${tag}`;
    case "removed":
      return `- ${entry.path}: ${formatValue(entry.declared)}  ${tag}`;
    case "modified":
      return `~ ${entry.path}: ${formatValue(entry.declared)} -> ${formatValue(entry.observed)}  ${tag}`;
  }
}

function formatValue(value: AttributeValue): string {
  return JSON.stringify(value);
}

export function writeReport(file: string, text: string): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  fs.writeFileSync(file, text, "utf-8");
}
