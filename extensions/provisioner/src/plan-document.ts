/**
 * Converge — Plan Output
 *
 * Serializable plan documents for review and saved-plan applies, and a
 * human-readable rendering of a plan.
 */

import { z } from "zod";
import type { AttributeMap, DiffEntry, Plan, Value } from "./types.js";
import { ProvisionError } from "./errors.js";
import { freezePlan } from "./planner.js";
import {
  attributeMapSchema,
  formatIssues,
  resourceKeySchema,
  stateRecordSchema,
  valueSchema,
} from "./schemas.js";
import { isResourceRef, isUnknown } from "./values.js";

export const PLAN_DOCUMENT_FORMAT = "converge/plan";
export const PLAN_DOCUMENT_VERSION = 1;

const SENSITIVE_PLACEHOLDER = "(sensitive)";

// =============================================================================
// Schemas
// =============================================================================

const attributeDiffSchema = z.object({
  path: z.string(),
  before: valueSchema.optional(),
  after: valueSchema.optional(),
  requiresReplace: z.boolean(),
});

const planEntrySchema = z.object({
  id: z.string().min(1),
  key: resourceKeySchema,
  address: z.string().min(1),
  action: z.enum(["create", "update", "delete"]),
  attributeDiffs: z.array(attributeDiffSchema),
  attributes: attributeMapSchema.optional(),
  planned: attributeMapSchema.optional(),
  prior: stateRecordSchema.optional(),
  dependencies: z.array(z.string()),
  replace: z
    .object({
      phase: z.enum(["destroy", "create"]),
      reasons: z.array(z.string()),
      createBeforeDestroy: z.boolean(),
    })
    .optional(),
  sensitive: z.array(z.string()).optional(),
});

const planSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  mode: z.enum(["apply", "destroy"]),
  stages: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      entries: z.array(planEntrySchema).min(1),
    }),
  ),
  noop: z.array(z.string()),
  summary: z.object({
    create: z.number().int().nonnegative(),
    update: z.number().int().nonnegative(),
    delete: z.number().int().nonnegative(),
    replace: z.number().int().nonnegative(),
    noop: z.number().int().nonnegative(),
  }),
  warnings: z.array(
    z.object({
      address: z.string(),
      severity: z.enum(["fatal", "warning"]),
      code: z.string(),
      message: z.string(),
    }),
  ),
});

export const planDocumentSchema = z.object({
  format: z.literal(PLAN_DOCUMENT_FORMAT),
  version: z.literal(PLAN_DOCUMENT_VERSION),
  redacted: z.boolean(),
  plan: planSchema,
});

export type PlanDocument = z.infer<typeof planDocumentSchema>;

// =============================================================================
// Documents
// =============================================================================

function topSegment(path: string): string {
  return path.split(/[.[]/)[0];
}

function redactMap(map: AttributeMap, sensitive: ReadonlySet<string>): AttributeMap {
  const out: AttributeMap = {};
  for (const [k, v] of Object.entries(map)) out[k] = sensitive.has(k) ? SENSITIVE_PLACEHOLDER : v;
  return out;
}

function redactEntry(entry: DiffEntry): DiffEntry {
  if (!entry.sensitive?.length) return entry;
  const sensitive = new Set(entry.sensitive);
  return {
    ...entry,
    attributeDiffs: entry.attributeDiffs.map((d) => {
      if (!sensitive.has(topSegment(d.path))) return d;
      return {
        ...d,
        ...(d.before !== undefined ? { before: SENSITIVE_PLACEHOLDER } : {}),
        ...(d.after !== undefined ? { after: SENSITIVE_PLACEHOLDER } : {}),
      };
    }),
    ...(entry.attributes ? { attributes: redactMap(entry.attributes, sensitive) } : {}),
    ...(entry.planned ? { planned: redactMap(entry.planned, sensitive) } : {}),
    ...(entry.prior
      ? { prior: { ...entry.prior, attributes: redactMap(entry.prior.attributes, sensitive) } }
      : {}),
  };
}

/**
 * Serialize a plan. A redacted document is for review only and cannot be
 * applied.
 */
export function toPlanDocument(plan: Plan, options: { redactSensitive?: boolean } = {}): PlanDocument {
  const redacted = options.redactSensitive ?? false;
  return {
    format: PLAN_DOCUMENT_FORMAT,
    version: PLAN_DOCUMENT_VERSION,
    redacted,
    plan: {
      ...plan,
      stages: plan.stages.map((stage) => ({
        index: stage.index,
        entries: stage.entries.map((entry) => {
          const out = redacted ? redactEntry(entry) : entry;
          if (out.action === "noop") {
            throw new ProvisionError(`Plan entry "${entry.id}" has no operation`, "INVALID_PLAN_DOCUMENT");
          }
          return { ...out, action: out.action };
        }),
      })),
    },
  };
}

/**
 * Parse and validate a saved plan document (JSON text or an already parsed
 * value) back into a frozen plan.
 *
 * @throws ProvisionError with code INVALID_PLAN_DOCUMENT
 */
export function parsePlanDocument(input: unknown, options: { allowRedacted?: boolean } = {}): Plan {
  let raw = input;
  if (typeof input === "string") {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      throw new ProvisionError(
        `Plan document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        "INVALID_PLAN_DOCUMENT",
      );
    }
  }

  const parsed = planDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProvisionError(`Invalid plan document: ${formatIssues(parsed.error)}`, "INVALID_PLAN_DOCUMENT");
  }
  const doc = parsed.data;
  if (doc.redacted && !options.allowRedacted) {
    throw new ProvisionError("Redacted plan documents cannot be applied", "INVALID_PLAN_DOCUMENT");
  }

  const ids = new Set<string>();
  doc.plan.stages.forEach((stage, i) => {
    if (stage.index !== i) {
      throw new ProvisionError(`Stage ${i} is numbered ${stage.index}`, "INVALID_PLAN_DOCUMENT");
    }
    for (const entry of stage.entries) {
      if (ids.has(entry.id)) {
        throw new ProvisionError(`Plan entry "${entry.id}" appears more than once`, "INVALID_PLAN_DOCUMENT");
      }
      ids.add(entry.id);
    }
  });

  return freezePlan(doc.plan);
}

// =============================================================================
// Rendering
// =============================================================================

/** Compact, deterministic rendering of a value for plan output. */
export function formatValue(value: Value | undefined): string {
  if (value === undefined) return "(none)";
  if (isUnknown(value)) return "(known after apply)";
  if (isResourceRef(value)) {
    const target = `${value.$ref.kind}.${value.$ref.name}`;
    return value.attribute === undefined ? target : `${target}.${value.attribute}`;
  }
  if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
  if (value !== null && typeof value === "object") {
    const pairs = Object.entries(value).map(([k, v]) => `${k} = ${formatValue(v)}`);
    return pairs.length === 0 ? "{}" : `{ ${pairs.join(", ")} }`;
  }
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

function entryHeader(entry: DiffEntry): string {
  if (entry.replace?.phase === "destroy") return `  - ${entry.address} (destroy for replacement)`;
  if (entry.replace?.phase === "create") {
    return `  + ${entry.address} (replacement, forced by ${entry.replace.reasons.join(", ")})`;
  }
  const symbol = entry.action === "create" ? "+" : entry.action === "update" ? "~" : "-";
  return `  ${symbol} ${entry.address}`;
}

function entryLines(entry: DiffEntry): string[] {
  if (entry.action === "delete") return [];
  const sensitive = new Set(entry.sensitive ?? []);
  const show = (path: string, value: Value | undefined) =>
    value !== undefined && sensitive.has(topSegment(path)) ? SENSITIVE_PLACEHOLDER : formatValue(value);

  return entry.attributeDiffs.map((d) => {
    if (entry.action === "create" && !entry.replace) return `      ${d.path} = ${show(d.path, d.after)}`;
    const line = `      ${d.path}: ${show(d.path, d.before)} → ${show(d.path, d.after)}`;
    return d.requiresReplace ? `${line} # forces replacement` : line;
  });
}

/**
 * Human-readable plan with sensitive values redacted.
 */
export function renderPlan(plan: Plan): string {
  const lines: string[] = [];
  const s = plan.summary;

  if (plan.stages.length === 0) {
    lines.push(`No changes. ${s.noop} resource(s) up to date.`);
  } else {
    lines.push(`Plan: ${s.create} to create, ${s.update} to update, ${s.replace} to replace, ${s.delete} to delete.`);
    for (const stage of plan.stages) {
      lines.push("", `Stage ${stage.index}:`);
      for (const entry of stage.entries) lines.push(entryHeader(entry), ...entryLines(entry));
    }
    if (s.noop > 0) lines.push("", `${s.noop} unchanged.`);
  }

  for (const w of plan.warnings) lines.push(`Warning: ${w.address}: ${w.message}`);
  return lines.join("\n");
}
