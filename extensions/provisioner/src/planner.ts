/**
 * Converge — Planner
 *
 * Turns the differ's output into ordered stages. Entries in the same stage do
 * not depend on each other and may run concurrently.
 */

import { randomUUID } from "node:crypto";
import type {
  DiffEntry,
  Plan,
  PlanOptions,
  PlanStage,
  PlanSummary,
  ResourceAddress,
  Violation,
} from "./types.js";
import type { ResourceGraph } from "./graph.js";
import { PlanningError } from "./errors.js";
import { addressOf } from "./values.js";
import { getProvisionLogger, type ProvisionLogger } from "./logger.js";

export type CreatePlanOptions = PlanOptions & {
  warnings?: Violation[];
  logger?: ProvisionLogger;
};

// =============================================================================
// Target Selection
// =============================================================================

/**
 * Narrow the changes to the targets, what they depend on, and (for deletes)
 * whatever was recorded as depending on a deleted target.
 */
export function selectTargets(
  changes: DiffEntry[],
  graph: ResourceGraph,
  targets: PlanOptions["targets"],
): DiffEntry[] {
  if (!targets || targets.length === 0) return changes;

  const known = new Set(changes.map((e) => e.address));
  const targetAddresses = targets.map(addressOf);
  const missing = targetAddresses.filter((a) => !graph.has(a) && !known.has(a));
  if (missing.length > 0) {
    throw new PlanningError(`Unknown target(s): ${missing.join(", ")}`, "TARGET_NOT_FOUND", missing);
  }

  const applyScope = graph.transitiveDependencies(targetAddresses.filter((a) => graph.has(a)));

  const deleteScope = new Set<ResourceAddress>(targetAddresses);
  const deletes = changes.filter((e) => e.action === "delete");
  let grew = true;
  while (grew) {
    grew = false;
    for (const entry of deletes) {
      if (deleteScope.has(entry.address)) continue;
      if (entry.dependencies.some((d) => deleteScope.has(d))) {
        deleteScope.add(entry.address);
        grew = true;
      }
    }
  }

  return changes.filter((e) =>
    applyScope.has(e.address) || (e.action === "delete" && deleteScope.has(e.address)),
  );
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Ordering constraints as `after[i]` = indices that must complete before
 * entry `i` starts.
 */
export function orderingConstraints(entries: readonly DiffEntry[]): Set<number>[] {
  const after = entries.map(() => new Set<number>());
  const applyOf = new Map<ResourceAddress, number>();
  const deleteOf = new Map<ResourceAddress, number>();
  entries.forEach((entry, i) => {
    if (entry.action === "delete") deleteOf.set(entry.address, i);
    else applyOf.set(entry.address, i);
  });

  const order = (later: number | undefined, earlier: number | undefined) => {
    if (later === undefined || earlier === undefined || later === earlier) return;
    after[later].add(earlier);
  };

  entries.forEach((entry, i) => {
    if (entry.action === "delete") {
      // Dependents go first when tearing down.
      for (const dep of entry.dependencies) order(deleteOf.get(dep), i);
    } else {
      for (const dep of entry.dependencies) order(i, applyOf.get(dep));
      for (const dropped of entry.prior?.dependencies ?? []) {
        if (!entry.dependencies.includes(dropped)) order(deleteOf.get(dropped), i);
      }
    }

    if (!entry.replace) return;
    const pair = entry.action === "delete" ? applyOf.get(entry.address) : deleteOf.get(entry.address);
    if (entry.replace.phase === "create") {
      if (entry.replace.createBeforeDestroy) order(pair, i);
      else order(i, pair);
    }

    if (entry.replace.phase === "destroy" && entry.replace.createBeforeDestroy) {
      // The old instance stays until everything still using it has moved on.
      entries.forEach((other, j) => {
        if (other.action !== "delete" && other.dependencies.includes(entry.address)) order(i, j);
      });
    }
  });

  return after;
}

/**
 * Kahn's algorithm over the ordering constraints. Each level becomes a stage;
 * entries within a stage keep their input order.
 */
export function buildStages(entries: readonly DiffEntry[]): PlanStage[] {
  const after = orderingConstraints(entries);
  const dependents = entries.map((): number[] => []);
  const inDegree = after.map((set) => set.size);
  after.forEach((set, i) => {
    for (const j of set) dependents[j].push(i);
  });

  const stages: PlanStage[] = [];
  let ready = inDegree.flatMap((d, i) => (d === 0 ? [i] : []));
  let processed = 0;

  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    stages.push({ index: stages.length, entries: ready.map((i) => entries[i]) });
    processed += ready.length;

    const next: number[] = [];
    for (const i of ready) {
      for (const dependent of dependents[i]) {
        inDegree[dependent] -= 1;
        if (inDegree[dependent] === 0) next.push(dependent);
      }
    }
    ready = next;
  }

  if (processed < entries.length) {
    const stuck = entries.filter((_, i) => inDegree[i] > 0).map((e) => e.id);
    throw new PlanningError(
      `Operations cannot be ordered: ${stuck.join(", ")}`,
      "CYCLE",
      stuck,
    );
  }
  return stages;
}

// =============================================================================
// Plan
// =============================================================================

function summarize(entries: readonly DiffEntry[], noop: number): PlanSummary {
  const summary: PlanSummary = { create: 0, update: 0, delete: 0, replace: 0, noop };
  for (const entry of entries) {
    if (entry.replace) {
      if (entry.replace.phase === "create") summary.replace++;
    } else if (entry.action !== "noop") {
      summary[entry.action]++;
    }
  }
  return summary;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Build an immutable plan from diff entries.
 *
 * @throws PlanningError for unknown targets or an unorderable set of changes
 */
export function createPlan(
  diffs: readonly DiffEntry[],
  graph: ResourceGraph,
  options: CreatePlanOptions = {},
): Plan {
  const log = options.logger ?? getProvisionLogger("planner");
  const noop = diffs.filter((e) => e.action === "noop").map((e) => e.address);
  const changes = selectTargets(diffs.filter((e) => e.action !== "noop"), graph, options.targets);
  const stages = buildStages(changes);

  const plan: Plan = {
    id: randomUUID(),
    createdAt: new Date().toISOString(),
    mode: options.mode ?? "apply",
    stages,
    noop,
    summary: summarize(changes, noop.length),
    warnings: options.warnings ?? [],
  };

  log.info(`Plan: ${plan.summary.create} to create, ${plan.summary.update} to update, ${plan.summary.replace} to replace, ${plan.summary.delete} to delete`, {
    planId: plan.id,
    stages: stages.length,
  });
  return freezePlan(plan);
}

/** Deep-freeze a plan so nothing downstream can alter it. */
export function freezePlan(plan: Plan): Plan {
  return deepFreeze(plan);
}

/** Every entry of the plan, in stage order. */
export function planEntries(plan: Plan): DiffEntry[] {
  return plan.stages.flatMap((stage) => stage.entries);
}
