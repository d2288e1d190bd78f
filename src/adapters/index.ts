/**
 * Front-ends: turn one dialect's parsed documents into raw records.
 */

import { UnsupportedDocumentError } from "../errors.js";
import type { RawResourceRecord } from "../types.js";
import { isCloudFormationTemplate, templateRecords } from "./cloudformation.js";
import { isKubernetesDocument, manifestRecords } from "./kubernetes.js";
import { isRecordDocument, recordFileRecords } from "./records.js";
import { isTerraformPlan, isTerraformState, planRecords, stateRecords } from "./terraform.js";

export { loadDocuments, parseDocuments, formatFromPath, selectRecords, type DocumentFormat } from "./documents.js";

export const DIALECTS = ["terraform", "cloudformation", "kubernetes", "records"] as const;
export type Dialect = (typeof DIALECTS)[number];

export function isDialect(value: string): value is Dialect {
  return DIALECTS.some((d) => d === value);
}

/**
 * Convert documents of the given dialect into raw records. Every dialect
 * also accepts plain record files, which is how observed state usually
 * arrives for CloudFormation and Kubernetes.
 */
export function toRawRecords(dialect: Dialect, docs: readonly unknown[]): RawResourceRecord[] {
  return docs.flatMap((doc, i) => documentRecords(dialect, doc, i));
}

function documentRecords(dialect: Dialect, doc: unknown, index: number): RawResourceRecord[] {
  switch (dialect) {
    case "terraform":
      if (isTerraformPlan(doc)) return planRecords(doc);
      if (isTerraformState(doc)) return stateRecords(doc);
      break;
    case "cloudformation":
      if (isCloudFormationTemplate(doc)) return templateRecords(doc);
      break;
    case "kubernetes":
      if (isKubernetesDocument(doc)) return manifestRecords([doc]);
      break;
    case "records":
      break;
  }
  if (isRecordDocument(doc)) return recordFileRecords(doc);
  throw new UnsupportedDocumentError(`Document ${index} is not a recognised ${dialect} document`);
}
