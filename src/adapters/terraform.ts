/**
 * Terraform front-end
 *
 * Declared records come from `terraform show -json` plan output
 * (planned_values, child modules included). Observed records come from a
 * terraform.tfstate file. Data sources are skipped on both sides.
 */

import { z } from "zod";
import type { RawResourceRecord } from "../types.js";

// ── Plan JSON ───────────────────────────────────────────────────

const planResourceSchema = z.object({
  address: z.string(),
  mode: z.enum(["managed", "data"]),
  type: z.string(),
  name: z.string(),
  values: z.record(z.string(), z.unknown()).nullish(),
});

interface PlanModule {
  address?: string;
  resources?: Array<z.infer<typeof planResourceSchema>>;
  child_modules?: PlanModule[];
}

const planModuleSchema: z.ZodType<PlanModule> = z.lazy(() =>
  z.object({
    address: z.string().optional(),
    resources: z.array(planResourceSchema).optional(),
    child_modules: z.array(planModuleSchema).optional(),
  }),
);

export const terraformPlanSchema = z.object({
  format_version: z.string().optional(),
  planned_values: z.object({ root_module: planModuleSchema }),
});

// ── State file ──────────────────────────────────────────────────

export const terraformStateSchema = z.object({
  version: z.number(),
  terraform_version: z.string().optional(),
  resources: z.array(
    z.object({
      module: z.string().optional(),
      mode: z.enum(["managed", "data"]),
      type: z.string(),
      name: z.string(),
      provider: z.string().optional(),
      instances: z.array(
        z.object({
          index_key: z.union([z.string(), z.number()]).optional(),
          attributes: z.record(z.string(), z.unknown()).nullish(),
        }),
      ),
    }),
  ),
});

export function isTerraformPlan(doc: unknown): boolean {
  return terraformPlanSchema.safeParse(doc).success;
}

export function isTerraformState(doc: unknown): boolean {
  return terraformStateSchema.safeParse(doc).success;
}

/** Managed resources from planned_values, in module order. */
export function planRecords(doc: unknown): RawResourceRecord[] {
  const plan = terraformPlanSchema.parse(doc);
  const records: RawResourceRecord[] = [];

  const visit = (module: PlanModule): void => {
    for (const resource of module.resources ?? []) {
      if (resource.mode !== "managed") continue;
      records.push({
        address: resource.address,
        kind: resource.type,
        source: "terraform",
        attributes: resource.values ?? {},
      });
    }
    for (const child of module.child_modules ?? []) visit(child);
  };
  visit(plan.planned_values.root_module);

  return records;
}

/** One record per managed resource instance in a state file. */
export function stateRecords(doc: unknown): RawResourceRecord[] {
  const state = terraformStateSchema.parse(doc);
  const records: RawResourceRecord[] = [];

  for (const resource of state.resources) {
    if (resource.mode !== "managed") continue;
    const base = `${resource.module ? `${resource.module}.` : ""}${resource.type}.${resource.name}`;

    for (const instance of resource.instances) {
      records.push({
        address: base + formatIndexKey(instance.index_key),
        kind: resource.type,
        source: "terraform",
        attributes: instance.attributes ?? {},
      });
    }
  }

  return records;
}

/** `[0]` for count, `["key"]` for for_each, nothing for single instances. */
export function formatIndexKey(key: string | number | undefined): string {
  if (key === undefined) return "";
  return typeof key === "number" ? `[${key}]` : `[${JSON.stringify(key)}]`;
}
