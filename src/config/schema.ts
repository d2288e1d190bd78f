/**
 * Configuration Schemas
 *
 * Zod schemas for the two external rule tables (equivalence and
 * classification) and for the CLI settings resolved from flags and
 * environment variables.
 */

import { z } from "zod";

// =============================================================================
// Shared
// =============================================================================

export const severitySchema = z.enum(["critical", "high", "medium", "low", "informational"]);

export const changeKindSchema = z.enum(["added", "removed", "modified"]);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

// =============================================================================
// Equivalence Table
// =============================================================================

/**
 * Normalization rule for one attribute path (and everything beneath it).
 */
export const fieldRuleSchema = z
  .object({
    path: z.string().min(1),
    /** Computed-only field: dropped on both sides. */
    ignore: z.boolean().optional(),
    /** Provider default: a value equal to it is treated as absent. */
    default: jsonValueSchema.optional(),
    coerce: z.enum(["boolean", "number", "string"]).optional(),
    /** Declared type; checked after coercion. */
    type: z.enum(["string", "number", "boolean"]).optional(),
    caseInsensitive: z.boolean().optional(),
    trimTrailingSlash: z.boolean().optional(),
    /** Sequence compared as a multiset. */
    set: z.boolean().optional(),
    /** `[{Key, Value}]` lists rewritten into maps. */
    keyValueList: z.object({ key: z.string().min(1), value: z.string().min(1) }).strict().optional(),
    computedNumeric: z
      .object({ tolerance: z.number().nonnegative(), relative: z.boolean().optional() })
      .strict()
      .optional(),
  })
  .strict();

export const equivalenceTableSchema = z
  .object({
    version: z.string().min(1),
    description: z.string().optional(),
    options: z
      .object({
        dropNulls: z.boolean().default(true),
        dropEmptyCollections: z.boolean().default(true),
      })
      .strict()
      .default({}),
    kindAliases: z.record(z.string(), z.string().min(1)).default({}),
    /** Field rules per kind; "*" applies to every kind. */
    kinds: z.record(z.string(), z.array(fieldRuleSchema)).default({}),
  })
  .strict();

export type FieldRule = z.infer<typeof fieldRuleSchema>;
export type EquivalenceTableDefinition = z.infer<typeof equivalenceTableSchema>;

// =============================================================================
// Classification Rule Table
// =============================================================================

export const classificationRuleSchema = z
  .object({
    id: z.string().min(1).optional(),
    kind: z.string().min(1),
    /** Exact attribute path; "*" (or no selector at all) matches every path. */
    path: z.string().min(1).optional(),
    /** Matches the path itself and every path beneath it. */
    prefix: z.string().min(1).optional(),
    severity: severitySchema,
    category: z.string().min(1),
    changeKinds: z.array(changeKindSchema).min(1).optional(),
    description: z.string().optional(),
  })
  .strict()
  .refine((rule) => rule.path === undefined || rule.prefix === undefined, {
    message: "a rule takes either path or prefix, not both",
  });

export const ruleTableSchema = z
  .object({
    version: z.string().min(1),
    name: z.string().optional(),
    rules: z.array(classificationRuleSchema),
  })
  .strict();

export type ClassificationRule = z.infer<typeof classificationRuleSchema>;
export type RuleTableDefinition = z.infer<typeof ruleTableSchema>;

// =============================================================================
// CLI Settings
// =============================================================================

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const cliSettingsSchema = z.object({
  rulesPath: z.string().min(1),
  equivalencePath: z.string().min(1),
  dbPath: z.string().min(1),
  logLevel: logLevelSchema.default("warn"),
});

export type CliSettings = z.infer<typeof cliSettingsSchema>;

/** Flatten zod issues into "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
