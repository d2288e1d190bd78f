/**
 * Drift — Agent Tools
 *
 * 2 tools: drift_check, drift_classify
 */

import { Type, type Static } from "@sinclair/typebox";
import { parseDocuments, toRawRecords } from "./adapters/index.js";
import type { DriftDetector } from "./detector.js";

const driftCheckInput = Type.Object({
  declared: Type.String({ description: "Declared configuration: plan JSON, template, manifests or a record array" }),
  observed: Type.String({ description: "Observed state: tfstate or a record array" }),
  provider: Type.Optional(
    Type.Union(
      [
        Type.Literal("terraform"),
        Type.Literal("cloudformation"),
        Type.Literal("kubernetes"),
        Type.Literal("records"),
      ],
      { description: "Input dialect (default: records)" },
    ),
  ),
  format: Type.Optional(Type.Union([Type.Literal("json"), Type.Literal("yaml")], { description: "Default: json" })),
});

const driftClassifyInput = Type.Object({
  kind: Type.String({ description: "Resource kind, e.g. aws_s3_bucket" }),
  path: Type.String({ description: "Flattened attribute path, e.g. ingress[0].cidr_blocks" }),
  changeKind: Type.Union([Type.Literal("added"), Type.Literal("removed"), Type.Literal("modified")]),
});

export type DriftCheckInput = Static<typeof driftCheckInput>;
export type DriftClassifyInput = Static<typeof driftClassifyInput>;

export function createDriftTools(detector: DriftDetector) {
  return [
    {
      name: "drift_check",
      description:
        "Compare declared infrastructure with observed state and return a drift report with classified differences, orphans and unmanaged resources.",
      inputSchema: driftCheckInput,
      execute: async (input: DriftCheckInput) => {
        const dialect = input.provider ?? "records";
        const format = input.format ?? "json";
        const report = await detector.detectAsync({
          declared: toRawRecords(dialect, parseDocuments(input.declared, format, "declared")),
          observed: toRawRecords(dialect, parseDocuments(input.observed, format, "observed")),
        });
        return { content: [{ type: "text" as const, text: JSON.stringify(report, null, 2) }] };
      },
    },
    {
      name: "drift_classify",
      description: "Look up the severity and category the rule table assigns to a change at an attribute path.",
      inputSchema: driftClassifyInput,
      execute: async (input: DriftClassifyInput) => {
        const kind = detector.equivalence.resolveKind(input.kind);
        const classification = detector.classifier.classify(kind, input.path, input.changeKind);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify({ kind, path: input.path, changeKind: input.changeKind, ...classification }, null, 2),
            },
          ],
        };
      },
    },
  ] as const;
}
