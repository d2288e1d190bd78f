/**
 * driftscope — infrastructure drift detection core.
 */

export * from "./types.js";
export * from "./errors.js";
export { EquivalenceTable, type NodeRules, type LeafComparison, type ComputedNumeric } from "./equivalence.js";
export { Normalizer } from "./normalizer.js";
export { match } from "./matcher.js";
export { DiffEngine, valuesEqual } from "./diff-engine.js";
export { Classifier, DEFAULT_CLASSIFICATION } from "./classifier.js";
export { buildReport, highestSeverity, type ReportInput, type TableVersions } from "./report-builder.js";
export {
  DriftDetector,
  type DetectInput,
  type DetectOptions,
  type DetectAsyncOptions,
  type DriftDetectorOptions,
} from "./detector.js";
export { renderJson, renderText, writeReport } from "./render.js";
export {
  InMemoryDriftHistoryStorage,
  SQLiteDriftHistoryStorage,
  createRun,
  type DriftHistoryStorage,
  type DriftRun,
} from "./storage.js";
export { registerDriftCli, reachesSeverity, type CliContext, type CliDeps } from "./cli.js";
export { createDriftTools } from "./tools.js";
export { DIALECTS, isDialect, toRawRecords, loadDocuments, parseDocuments, type Dialect } from "./adapters/index.js";
export { loadRuleTable, loadEquivalenceTable, resolveCliSettings, defaultRulesDir } from "./config/loader.js";
export type { EquivalenceTableDefinition, RuleTableDefinition, FieldRule, ClassificationRule } from "./config/schema.js";
export { createLogger, getLogger, setGlobalLogger, MemoryTransport, ConsoleTransport, type DriftLogger } from "./logging/logger.js";
export { VERSION } from "./version.js";
