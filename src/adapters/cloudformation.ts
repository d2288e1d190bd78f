/**
 * CloudFormation front-end — one record per template resource, addressed
 * by logical ID.
 */

import { z } from "zod";
import type { RawResourceRecord } from "../types.js";

export const cloudFormationTemplateSchema = z.object({
  AWSTemplateFormatVersion: z.string().optional(),
  Resources: z.record(
    z.string(),
    z.object({
      Type: z.string(),
      Properties: z.record(z.string(), z.unknown()).optional(),
    }),
  ),
});

export function isCloudFormationTemplate(doc: unknown): boolean {
  return cloudFormationTemplateSchema.safeParse(doc).success;
}

export function templateRecords(doc: unknown): RawResourceRecord[] {
  const template = cloudFormationTemplateSchema.parse(doc);
  return Object.entries(template.Resources).map(([logicalId, resource]) => ({
    address: logicalId,
    kind: resource.Type,
    source: "cloudformation",
    attributes: resource.Properties ?? {},
  }));
}
