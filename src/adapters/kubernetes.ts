/**
 * Kubernetes front-end
 *
 * Accepts single objects, `List` wrappers (as returned by
 * `kubectl get -o json`) and multi-document YAML. Only the desired-state
 * parts of an object are compared; status and server-populated metadata
 * are left out.
 */

import { z } from "zod";
import { formatIssues } from "../config/schema.js";
import { UnsupportedDocumentError } from "../errors.js";
import type { RawResourceRecord } from "../types.js";

export const k8sObjectSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  metadata: z.object({
    name: z.string(),
    namespace: z.string().optional(),
    labels: z.record(z.string(), z.string()).optional(),
    annotations: z.record(z.string(), z.string()).optional(),
  }),
  spec: z.unknown().optional(),
  data: z.unknown().optional(),
  stringData: z.unknown().optional(),
  rules: z.unknown().optional(),
  subjects: z.unknown().optional(),
  roleRef: z.unknown().optional(),
});

export type K8sObject = z.infer<typeof k8sObjectSchema>;

const k8sListSchema = z.object({
  kind: z.string().endsWith("List"),
  items: z.array(z.unknown()),
});

/** Annotations written by kubectl or controllers rather than by the manifest author. */
const SERVER_ANNOTATIONS = new Set([
  "kubectl.kubernetes.io/last-applied-configuration",
  "deployment.kubernetes.io/revision",
]);

const DESIRED_STATE_FIELDS = ["spec", "data", "stringData", "rules", "subjects", "roleRef"] as const;

export function isKubernetesDocument(doc: unknown): boolean {
  return k8sListSchema.safeParse(doc).success || k8sObjectSchema.safeParse(doc).success;
}

/** Expand List wrappers into their items. */
export function expandObjects(doc: unknown): K8sObject[] {
  const list = k8sListSchema.safeParse(doc);
  if (list.success) return list.data.items.flatMap(expandObjects);
  const obj = k8sObjectSchema.safeParse(doc);
  if (!obj.success) {
    throw new UnsupportedDocumentError(`Invalid Kubernetes object: ${formatIssues(obj.error).join("; ")}`);
  }
  return [obj.data];
}

export function manifestRecords(docs: readonly unknown[]): RawResourceRecord[] {
  return docs.flatMap(expandObjects).map(toRecord);
}

export function toRecord(obj: K8sObject): RawResourceRecord {
  const namespace = obj.metadata.namespace ?? "default";
  const attributes: Record<string, unknown> = {
    metadata: {
      labels: obj.metadata.labels,
      annotations: authoredAnnotations(obj.metadata.annotations),
    },
  };
  for (const field of DESIRED_STATE_FIELDS) {
    if (obj[field] !== undefined) attributes[field] = obj[field];
  }

  return {
    address: `${obj.kind}/${namespace}/${obj.metadata.name}`,
    kind: `kubernetes.${obj.kind}`,
    source: "kubernetes",
    attributes,
  };
}

function authoredAnnotations(annotations: Record<string, string> | undefined): Record<string, string> | undefined {
  if (!annotations) return undefined;
  const kept = Object.entries(annotations).filter(([key]) => !SERVER_ANNOTATIONS.has(key));
  return kept.length > 0 ? Object.fromEntries(kept) : undefined;
}
