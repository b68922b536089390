/**
 * Converge — Differ
 *
 * Compares the desired resource graph against recorded state and classifies
 * every resource as create, update, delete or noop, with attribute-level
 * diffs. Changes that cannot be applied in place become a delete + create
 * pair.
 */

import type {
  AttributeDiff,
  AttributeMap,
  DiffAction,
  DiffEntry,
  PlanMode,
  ResourceAddress,
  ResourceRef,
  StateRecord,
  StateStore,
  Value,
} from "./types.js";
import type { ResourceGraph } from "./graph.js";
import type { ReplaceRule, ReplaceRuleRegistry } from "./registry.js";
import { PlanningError } from "./errors.js";
import {
  addressOf,
  diffAttributes,
  getAttributePath,
  pathWithin,
  resolveAttributes,
  sameAddresses,
  setAttributePath,
  unknown,
} from "./values.js";
import { getProvisionLogger, type ProvisionLogger } from "./logger.js";

export type DiffOptions = {
  mode?: PlanMode;
  replaceRules?: ReplaceRuleRegistry;
  logger?: ProvisionLogger;
};

/** "relink": only the recorded dependency edges change; values stay put. */
type Outcome = DiffAction | "replace" | "relink";

/**
 * Diff the desired graph against the state store. The store is read once.
 *
 * @throws PlanningError when a protected resource would be destroyed
 */
export async function diff(
  graph: ResourceGraph,
  store: StateStore,
  options: DiffOptions = {},
): Promise<DiffEntry[]> {
  const log = options.logger ?? getProvisionLogger("differ");
  const records = (await store.list()).sort((a, b) => addressOf(a).localeCompare(addressOf(b)));
  const byAddress = new Map(records.map((r) => [addressOf(r), r]));

  const entries: DiffEntry[] = [];
  const protectedAddresses: ResourceAddress[] = [];

  if (options.mode === "destroy") {
    for (const record of records) {
      const address = addressOf(record);
      if (graph.get(address)?.lifecycle?.preventDestroy) protectedAddresses.push(address);
      entries.push(deleteEntry(record));
    }
    assertDestroyAllowed(protectedAddresses);
    log.debug("Planned destroy of all recorded resources", { resources: entries.length });
    return entries;
  }

  const outcomes = new Map<ResourceAddress, Outcome>();
  const planned = new Map<ResourceAddress, AttributeMap>();

  const resolvePlanned = (ref: ResourceRef): Value => {
    const target = addressOf(ref.$ref);
    const outcome = outcomes.get(target);
    const record = byAddress.get(target);

    // Unchanged targets resolve from state exactly as apply will.
    if (record && (outcome === "noop" || outcome === "relink")) {
      if (ref.attribute === undefined) return record.handle;
      return getAttributePath(record.computed, ref.attribute)
        ?? getAttributePath(record.attributes, ref.attribute)
        ?? unknown(target, ref.attribute);
    }
    if (ref.attribute === undefined) return unknown(target);
    return getAttributePath(planned.get(target) ?? {}, ref.attribute) ?? unknown(target, ref.attribute);
  };

  for (const resource of graph.topologicalOrder()) {
    const address = addressOf(resource);
    const prior = byAddress.get(address);
    const dependencies = graph.dependenciesOf(address);
    const attributes = prior
      ? applyIgnoreChanges(resource.attributes, prior.attributes, resource.lifecycle?.ignoreChanges ?? [])
      : resource.attributes;
    const resolved = resolveAttributes(attributes, resolvePlanned);
    planned.set(address, resolved);

    const base = {
      key: { kind: resource.kind, name: resource.name },
      address,
      attributes,
      planned: resolved,
      dependencies,
      ...(resource.sensitive?.length ? { sensitive: resource.sensitive } : {}),
    };

    if (!prior) {
      outcomes.set(address, "create");
      entries.push({
        ...base,
        id: address,
        action: "create",
        attributeDiffs: diffAttributes({}, resolved).map((d) => ({ ...d, requiresReplace: false })),
      });
      continue;
    }

    const rule = options.replaceRules?.resolve(resource.kind);
    const attributeDiffs: AttributeDiff[] = diffAttributes(prior.attributes, resolved).map((d) => ({
      ...d,
      requiresReplace: requiresReplace(rule, d),
    }));
    const triggers = (resource.lifecycle?.replaceTriggeredBy ?? [])
      .map(addressOf)
      .filter((t) => {
        const outcome = outcomes.get(t);
        return outcome === "create" || outcome === "update" || outcome === "replace";
      });

    if (attributeDiffs.length === 0 && triggers.length === 0) {
      if (!sameAddresses(prior.dependencies, dependencies)) {
        outcomes.set(address, "relink");
        entries.push({ ...base, id: address, action: "update", attributeDiffs, prior });
        continue;
      }
      outcomes.set(address, "noop");
      entries.push({ ...base, id: address, action: "noop", attributeDiffs, prior });
      continue;
    }

    const reasons = [
      ...attributeDiffs.filter((d) => d.requiresReplace).map((d) => d.path),
      ...triggers,
    ];
    if (reasons.length === 0) {
      outcomes.set(address, "update");
      entries.push({ ...base, id: address, action: "update", attributeDiffs, prior });
      continue;
    }

    if (resource.lifecycle?.preventDestroy) protectedAddresses.push(address);
    outcomes.set(address, "replace");
    const createBeforeDestroy = resource.lifecycle?.createBeforeDestroy ?? false;
    entries.push({
      ...deleteEntry(prior),
      id: `${address}#destroy`,
      replace: { phase: "destroy", reasons, createBeforeDestroy },
    });
    entries.push({
      ...base,
      id: `${address}#create`,
      action: "create",
      attributeDiffs,
      prior,
      replace: { phase: "create", reasons, createBeforeDestroy },
    });
  }

  for (const record of records) {
    if (!graph.has(addressOf(record))) entries.push(deleteEntry(record));
  }

  assertDestroyAllowed(protectedAddresses);

  log.debug("Computed diff", {
    resources: graph.size,
    recorded: records.length,
    changes: entries.filter((e) => e.action !== "noop").length,
  });
  return entries;
}

// =============================================================================
// Helpers
// =============================================================================

function deleteEntry(record: StateRecord): DiffEntry {
  const address = addressOf(record);
  return {
    id: address,
    key: { kind: record.kind, name: record.name },
    address,
    action: "delete",
    attributeDiffs: diffAttributes(record.attributes, {}).map((d) => ({ ...d, requiresReplace: false })),
    prior: record,
    dependencies: [...record.dependencies],
  };
}

function requiresReplace(rule: ReplaceRule | undefined, d: Omit<AttributeDiff, "requiresReplace">): boolean {
  if (!rule) return false;
  return Array.isArray(rule) ? rule.some((path) => pathWithin(d.path, path)) : rule(d);
}

/**
 * Keep the recorded value for every ignored path, so changes there never
 * show up as a diff and are never sent to the provider.
 */
export function applyIgnoreChanges(
  desired: AttributeMap,
  recorded: AttributeMap,
  ignore: readonly string[],
): AttributeMap {
  let out = desired;
  for (const path of ignore) {
    out = setAttributePath(out, path, getAttributePath(recorded, path));
  }
  return out;
}

function assertDestroyAllowed(protectedAddresses: ResourceAddress[]): void {
  if (protectedAddresses.length === 0) return;
  throw new PlanningError(
    `Refusing to destroy protected resource(s): ${protectedAddresses.join(", ")}`,
    "PREVENT_DESTROY",
    protectedAddresses,
  );
}

