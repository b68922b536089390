/**
 * Converge — Planner Tests
 */

import { describe, it, expect } from "vitest";
import { buildStages, createPlan, planEntries } from "./planner.js";
import { buildGraph } from "./graph.js";
import { diff } from "./differ.js";
import { MemoryStateStore } from "./memory-store.js";
import { PlanningError } from "./errors.js";
import { createProvisionLogger } from "./logger.js";
import { parseAddress, ref } from "./values.js";
import type { DiffAction, DiffEntry, Plan, Resource, StateRecord } from "./types.js";

const logger = createProvisionLogger("test", { level: "fatal" });

function entry(address: string, action: DiffAction, dependencies: string[] = [], extra: Partial<DiffEntry> = {}): DiffEntry {
  return { id: address, key: parseAddress(address), address, action, attributeDiffs: [], dependencies, ...extra };
}

function priorRecord(address: string, dependencies: string[] = []): StateRecord {
  const { kind, name } = parseAddress(address);
  return { kind, name, handle: `${name}-1`, attributes: {}, computed: {}, dependencies, updatedAt: "2024-01-01T00:00:00.000Z" };
}

function stageIds(stages: Plan["stages"]): string[][] {
  return stages.map((s) => s.entries.map((e) => e.id));
}

// =============================================================================
// Stages
// =============================================================================

describe("buildStages", () => {
  it("groups independent creates into the earliest stage", () => {
    const stages = buildStages([
      entry("vpc.main", "create"),
      entry("subnet.a", "create", ["vpc.main"]),
      entry("instance.web", "create", ["subnet.a"]),
      entry("bucket.logs", "create"),
    ]);
    expect(stages.map((s) => s.index)).toEqual([0, 1, 2]);
    expect(stageIds(stages)).toEqual([["vpc.main", "bucket.logs"], ["subnet.a"], ["instance.web"]]);
  });

  it("deletes dependents before their dependencies", () => {
    const stages = buildStages([
      entry("vpc.main", "delete"),
      entry("subnet.a", "delete", ["vpc.main"]),
    ]);
    expect(stageIds(stages)).toEqual([["subnet.a"], ["vpc.main"]]);
  });

  it("deletes a dropped dependency only after its former dependent moved away", () => {
    const stages = buildStages([
      entry("sg.new", "create"),
      entry("instance.web", "update", ["sg.new"], { prior: priorRecord("instance.web", ["sg.old"]) }),
      entry("sg.old", "delete"),
    ]);
    expect(stageIds(stages)).toEqual([["sg.new"], ["instance.web"], ["sg.old"]]);
  });

  it("destroys before creating a plain replacement", () => {
    const replace = { reasons: ["cidr"], createBeforeDestroy: false };
    const stages = buildStages([
      entry("vpc.main", "delete", [], { id: "vpc.main#destroy", replace: { ...replace, phase: "destroy" } }),
      entry("vpc.main", "create", [], { id: "vpc.main#create", replace: { ...replace, phase: "create" } }),
      entry("subnet.a", "update", ["vpc.main"]),
    ]);
    expect(stageIds(stages)).toEqual([["vpc.main#destroy"], ["vpc.main#create"], ["subnet.a"]]);
  });

  it("keeps the old instance until dependents moved to its replacement", () => {
    const replace = { reasons: ["cidr"], createBeforeDestroy: true };
    const stages = buildStages([
      entry("vpc.main", "delete", [], { id: "vpc.main#destroy", replace: { ...replace, phase: "destroy" } }),
      entry("vpc.main", "create", [], { id: "vpc.main#create", replace: { ...replace, phase: "create" } }),
      entry("subnet.a", "update", ["vpc.main"]),
    ]);
    expect(stageIds(stages)).toEqual([["vpc.main#create"], ["subnet.a"], ["vpc.main#destroy"]]);
  });

  it("rejects replacement orders that contradict each other", () => {
    const destroyFirst = { reasons: ["size"], createBeforeDestroy: false };
    const createFirst = { reasons: ["db.main"], createBeforeDestroy: true };
    let caught: unknown;
    try {
      buildStages([
        entry("db.main", "delete", [], { id: "db.main#destroy", replace: { ...destroyFirst, phase: "destroy" } }),
        entry("db.main", "create", [], { id: "db.main#create", replace: { ...destroyFirst, phase: "create" } }),
        entry("app.main", "delete", ["db.main"], { id: "app.main#destroy", replace: { ...createFirst, phase: "destroy" } }),
        entry("app.main", "create", ["db.main"], { id: "app.main#create", replace: { ...createFirst, phase: "create" } }),
      ]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PlanningError);
    if (!(caught instanceof PlanningError)) return;
    expect(caught.reason).toBe("CYCLE");
    expect(caught.addresses).toEqual(["db.main#destroy", "db.main#create", "app.main#destroy", "app.main#create"]);
  });

  it("returns no stages for no changes", () => {
    expect(buildStages([])).toEqual([]);
  });
});

// =============================================================================
// Plans
// =============================================================================

describe("createPlan", () => {
  const resources: Resource[] = [
    { kind: "vpc", name: "main", attributes: { cidr: "10.0.0.0/16" } },
    { kind: "subnet", name: "a", attributes: { vpc_id: ref("vpc", "main") } },
    { kind: "bucket", name: "logs", attributes: {} },
  ];

  async function planFor(records: StateRecord[], options: Parameters<typeof createPlan>[2] = {}) {
    const graph = buildGraph(resources, { logger });
    const diffs = await diff(graph, new MemoryStateStore(records), { logger });
    return createPlan(diffs, graph, { logger, ...options });
  }

  it("summarizes changes and lists unchanged resources", async () => {
    const plan = await planFor([{ ...priorRecord("bucket.logs"), handle: "logs-1" }], {
      warnings: [{ address: "vpc.main", severity: "warning", code: "W", message: "check" }],
    });

    expect(plan.mode).toBe("apply");
    expect(stageIds(plan.stages)).toEqual([["vpc.main"], ["subnet.a"]]);
    expect(plan.noop).toEqual(["bucket.logs"]);
    expect(plan.summary).toEqual({ create: 2, update: 0, delete: 0, replace: 0, noop: 1 });
    expect(plan.warnings).toHaveLength(1);
    expect(planEntries(plan).map((e) => e.id)).toEqual(["vpc.main", "subnet.a"]);
  });

  it("is immutable", async () => {
    const plan = await planFor([]);
    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.stages[0].entries[0])).toBe(true);
    expect(Object.isFrozen(plan.stages[0].entries[0].attributeDiffs)).toBe(true);
  });

  it("narrows the plan to targets and what they depend on", async () => {
    const plan = await planFor([], { targets: [{ kind: "subnet", name: "a" }] });
    expect(stageIds(plan.stages)).toEqual([["vpc.main"], ["subnet.a"]]);
    expect(plan.summary.create).toBe(2);
  });

  it("includes recorded dependents when a deleted resource is targeted", async () => {
    const plan = await planFor(
      [priorRecord("vpc.main"), priorRecord("sg.old"), priorRecord("rule.x", ["sg.old"])],
      { targets: [{ kind: "sg", name: "old" }] },
    );
    expect(stageIds(plan.stages)).toEqual([["rule.x"], ["sg.old"]]);
    expect(plan.summary.delete).toBe(2);
  });

  it("rejects unknown targets", async () => {
    await expect(planFor([], { targets: [{ kind: "vpc", name: "nope" }] })).rejects.toThrow("Unknown target(s): vpc.nope");
  });

  it("counts a replacement once", () => {
    const graph = buildGraph([{ kind: "vpc", name: "main", attributes: {} }], { logger });
    const replace = { reasons: ["cidr"], createBeforeDestroy: false };
    const plan = createPlan(
      [
        entry("vpc.main", "delete", [], { id: "vpc.main#destroy", replace: { ...replace, phase: "destroy" } }),
        entry("vpc.main", "create", [], { id: "vpc.main#create", replace: { ...replace, phase: "create" } }),
      ],
      graph,
      { logger },
    );
    expect(plan.summary).toEqual({ create: 0, update: 0, delete: 0, replace: 1, noop: 0 });
  });
});
