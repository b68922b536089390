/**
 * Converge — Resource Invariants
 *
 * Runs the registered per-kind invariant checks over a resolved graph.
 * Every check runs; violations are collected rather than short-circuited.
 */

import type {
  AttributeMap,
  InvariantContext,
  InvariantIssue,
  ResolvedResource,
  Resource,
  ResourceAddress,
  Violation,
} from "./types.js";
import type { ResourceGraph } from "./graph.js";
import type { ValidatorRegistry } from "./registry.js";
import { ValidationError, formatErrorMessage } from "./errors.js";
import { addressOf, getAttributePath, resolveAttributes, unknown } from "./values.js";
import { getProvisionLogger, type ProvisionLogger } from "./logger.js";

/**
 * Resolve references between desired attributes. References to a handle, or
 * to anything a provider computes, stay unknown until apply.
 */
export function resolveDesiredAttributes(graph: ResourceGraph): Map<ResourceAddress, AttributeMap> {
  const resolved = new Map<ResourceAddress, AttributeMap>();
  for (const resource of graph.topologicalOrder()) {
    resolved.set(
      addressOf(resource),
      resolveAttributes(resource.attributes, (ref) => {
        const target = addressOf(ref.$ref);
        const attrs = resolved.get(target);
        if (ref.attribute === undefined || !attrs) return unknown(target, ref.attribute);
        return getAttributePath(attrs, ref.attribute) ?? unknown(target, ref.attribute);
      }),
    );
  }
  return resolved;
}

function toResolved(resource: Resource, attributes: AttributeMap): ResolvedResource {
  return Object.freeze({
    kind: resource.kind,
    name: resource.name,
    address: addressOf(resource),
    attributes: Object.freeze(structuredClone(attributes)),
  });
}

/**
 * Run every registered invariant for one resource.
 */
export function validateResource(
  resource: Resource,
  graph: ResourceGraph,
  registry: ValidatorRegistry,
  resolved: Map<ResourceAddress, AttributeMap> = resolveDesiredAttributes(graph),
): Violation[] {
  const address = addressOf(resource);
  const view = (target: ResourceAddress): ResolvedResource | undefined => {
    const dep = graph.get(target);
    const attrs = resolved.get(target);
    return dep && attrs ? toResolved(dep, attrs) : undefined;
  };
  const dependencies = graph.dependenciesOf(address);

  const ctx: InvariantContext = {
    dependency(kind, name) {
      const target = addressOf({ kind, name });
      return dependencies.includes(target) ? view(target) : undefined;
    },
    dependencies() {
      return dependencies.flatMap((target) => {
        const dep = view(target);
        return dep ? [dep] : [];
      });
    },
  };

  const subject = view(address);
  if (!subject) return [];

  const violations: Violation[] = [];
  for (const invariant of registry.invariantsFor(resource.kind)) {
    try {
      const issues = invariant(subject, ctx);
      const list: InvariantIssue[] = Array.isArray(issues) ? issues : issues === undefined ? [] : [issues];
      for (const issue of list) {
        violations.push({ ...issue, address: issue.address ?? address });
      }
    } catch (err) {
      violations.push({
        address,
        severity: "fatal",
        code: "INVARIANT_ERROR",
        message: `Invariant check threw: ${formatErrorMessage(err)}`,
      });
    }
  }
  return violations;
}

/**
 * Validate every resource in the graph.
 */
export function validateGraph(
  graph: ResourceGraph,
  registry: ValidatorRegistry,
  options: { logger?: ProvisionLogger } = {},
): Violation[] {
  const log = options.logger ?? getProvisionLogger("validator");
  const resolved = resolveDesiredAttributes(graph);
  const violations = graph.resources().flatMap((resource) =>
    validateResource(resource, graph, registry, resolved),
  );

  for (const v of violations) {
    if (v.severity === "fatal") log.error(`${v.address}: ${v.message}`, { code: v.code });
    else log.warn(`${v.address}: ${v.message}`, { code: v.code });
  }
  return violations;
}

/** Throw when any violation is fatal; warnings pass through. */
export function assertNoFatalViolations(violations: Violation[]): void {
  if (violations.some((v) => v.severity === "fatal")) {
    throw new ValidationError(violations);
  }
}
