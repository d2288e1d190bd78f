/**
 * Configuration loading
 *
 * Reads the equivalence and classification tables from disk and resolves
 * CLI settings from flags, then environment variables, then the bundled
 * defaults under rules/.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { Classifier } from "../classifier.js";
import { EquivalenceTable } from "../equivalence.js";
import { ClassificationRuleError, EquivalenceTableError } from "../errors.js";
import { cliSettingsSchema, formatIssues, type CliSettings } from "./schema.js";

export const DEFAULT_RULES_FILE = "classification.json";
export const DEFAULT_EQUIVALENCE_FILE = "equivalence.json";
export const DEFAULT_DB_FILE = ".driftscope/history.db";

/** The bundled rules/ directory, from src/config/ or dist/src/config/. */
export function defaultRulesDir(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(here, "../../rules"), path.resolve(here, "../../../rules")];
  return candidates.find((dir) => fs.existsSync(path.join(dir, DEFAULT_RULES_FILE))) ?? candidates[0] ?? "rules";
}

export function loadRuleTable(file: string): Classifier {
  return Classifier.parse(readJson(file, (issue) => new ClassificationRuleError([issue])));
}

export function loadEquivalenceTable(file: string): EquivalenceTable {
  return EquivalenceTable.parse(readJson(file, (issue) => new EquivalenceTableError([issue])));
}

function readJson(file: string, toError: (issue: string) => Error): unknown {
  const text = fs.readFileSync(file, "utf-8");
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw toError(`${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export interface CliFlags {
  rules?: string;
  equivalence?: string;
  db?: string;
  logLevel?: string;
}

export function resolveCliSettings(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): CliSettings {
  const rulesDir = defaultRulesDir();
  const candidate = {
    rulesPath: flags.rules ?? nonEmpty(env.DRIFTSCOPE_RULES) ?? path.join(rulesDir, DEFAULT_RULES_FILE),
    equivalencePath:
      flags.equivalence ?? nonEmpty(env.DRIFTSCOPE_EQUIVALENCE) ?? path.join(rulesDir, DEFAULT_EQUIVALENCE_FILE),
    dbPath: flags.db ?? nonEmpty(env.DRIFTSCOPE_DB) ?? DEFAULT_DB_FILE,
    logLevel: flags.logLevel ?? nonEmpty(env.DRIFTSCOPE_LOG_LEVEL),
  };

  const result = cliSettingsSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`Invalid settings:\n  - ${formatIssues(result.error).join("\n  - ")}`);
  }
  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}
