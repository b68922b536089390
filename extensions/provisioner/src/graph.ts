/**
 * Converge — Resource Graph
 *
 * Builds the dependency DAG of a resource set. Resources live in an arena
 * indexed by address; edges are stored as index pairs so the graph can be
 * serialized and read concurrently.
 */

import type { Resource, ResourceAddress, ResourceKey } from "./types.js";
import {
  CyclicDependencyError,
  DuplicateResourceError,
  InvalidResourceError,
  UnresolvedReferenceError,
  type UnresolvedReference,
} from "./errors.js";
import { addressOf, assertValidKey, collectRefs } from "./values.js";
import { getProvisionLogger, type ProvisionLogger } from "./logger.js";

/** `from` must be applied after `to`, and destroyed before it. */
export type DependencyEdge = {
  from: number;
  to: number;
};

export class ResourceGraph {
  private readonly nodes: Resource[];
  private readonly index: Map<ResourceAddress, number>;
  private readonly edgeList: DependencyEdge[];
  private readonly outgoing: number[][];
  private readonly incoming: number[][];

  constructor(nodes: Resource[], edges: DependencyEdge[]) {
    this.nodes = nodes;
    this.index = new Map(nodes.map((node, i) => [addressOf(node), i]));
    this.edgeList = edges;
    this.outgoing = nodes.map(() => []);
    this.incoming = nodes.map(() => []);
    for (const edge of edges) {
      this.outgoing[edge.from].push(edge.to);
      this.incoming[edge.to].push(edge.from);
    }
  }

  get size(): number {
    return this.nodes.length;
  }

  has(key: ResourceKey | ResourceAddress): boolean {
    return this.index.has(typeof key === "string" ? key : addressOf(key));
  }

  get(key: ResourceKey | ResourceAddress): Resource | undefined {
    const i = this.index.get(typeof key === "string" ? key : addressOf(key));
    return i === undefined ? undefined : this.nodes[i];
  }

  /** Resources in declaration order. */
  resources(): readonly Resource[] {
    return this.nodes;
  }

  edges(): readonly DependencyEdge[] {
    return this.edgeList;
  }

  /** Addresses the resource depends on directly. */
  dependenciesOf(key: ResourceKey | ResourceAddress): ResourceAddress[] {
    const i = this.indexOf(key);
    return this.outgoing[i].map((j) => addressOf(this.nodes[j]));
  }

  /** Addresses that depend directly on the resource. */
  dependentsOf(key: ResourceKey | ResourceAddress): ResourceAddress[] {
    const i = this.indexOf(key);
    return this.incoming[i].map((j) => addressOf(this.nodes[j]));
  }

  transitiveDependencies(keys: Iterable<ResourceKey | ResourceAddress>): Set<ResourceAddress> {
    return this.reach(keys, this.outgoing);
  }

  transitiveDependents(keys: Iterable<ResourceKey | ResourceAddress>): Set<ResourceAddress> {
    return this.reach(keys, this.incoming);
  }

  /**
   * Dependencies first; ties keep declaration order.
   */
  topologicalOrder(): Resource[] {
    const remaining = this.outgoing.map((deps) => deps.length);
    const ready: number[] = [];
    remaining.forEach((count, i) => {
      if (count === 0) ready.push(i);
    });
    const order: Resource[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => a - b);
      const i = ready.shift();
      if (i === undefined) break;
      order.push(this.nodes[i]);
      for (const dependent of this.incoming[i]) {
        remaining[dependent] -= 1;
        if (remaining[dependent] === 0) ready.push(dependent);
      }
    }
    return order;
  }

  private indexOf(key: ResourceKey | ResourceAddress): number {
    const address = typeof key === "string" ? key : addressOf(key);
    const i = this.index.get(address);
    if (i === undefined) {
      throw new InvalidResourceError(`Resource "${address}" is not part of the graph`);
    }
    return i;
  }

  private reach(keys: Iterable<ResourceKey | ResourceAddress>, adjacency: number[][]): Set<ResourceAddress> {
    const seen = new Set<number>();
    const stack = [...keys].map((k) => this.indexOf(k));
    while (stack.length > 0) {
      const i = stack.pop();
      if (i === undefined || seen.has(i)) continue;
      seen.add(i);
      stack.push(...adjacency[i]);
    }
    return new Set([...seen].map((i) => addressOf(this.nodes[i])));
  }
}

// =============================================================================
// Graph Builder
// =============================================================================

/**
 * Build the dependency graph of a resource set.
 *
 * @throws InvalidResourceError, DuplicateResourceError,
 *   UnresolvedReferenceError or CyclicDependencyError
 */
export function buildGraph(
  resources: readonly Resource[],
  options: { logger?: ProvisionLogger } = {},
): ResourceGraph {
  const log = options.logger ?? getProvisionLogger("graph");
  const nodes: Resource[] = [];
  const index = new Map<ResourceAddress, number>();

  for (const resource of resources) {
    assertValidKey(resource);
    if (typeof resource.attributes !== "object" || resource.attributes === null) {
      throw new InvalidResourceError(`Resource "${addressOf(resource)}" has no attribute map`);
    }
    const address = addressOf(resource);
    if (index.has(address)) throw new DuplicateResourceError(address);
    index.set(address, nodes.length);
    nodes.push(structuredClone(resource));
  }

  const edges: DependencyEdge[] = [];
  const seenEdges = new Set<string>();
  const unresolved: UnresolvedReference[] = [];

  const addEdge = (from: number, target: ResourceKey, via: string) => {
    const to = index.get(addressOf(target));
    if (to === undefined) {
      unresolved.push({ from: addressOf(nodes[from]), to: addressOf(target), via });
      return;
    }
    const id = `${from}->${to}`;
    if (seenEdges.has(id)) return;
    seenEdges.add(id);
    edges.push({ from, to });
  };

  nodes.forEach((node, i) => {
    for (const { ref, path } of collectRefs(node.attributes)) addEdge(i, ref.$ref, path);
    for (const dep of node.dependsOn ?? []) addEdge(i, dep, "dependsOn");
    for (const trigger of node.lifecycle?.replaceTriggeredBy ?? []) {
      addEdge(i, trigger, "lifecycle.replaceTriggeredBy");
    }
  });

  if (unresolved.length > 0) throw new UnresolvedReferenceError(unresolved);

  const cycle = detectCycle(nodes.length, edges);
  if (cycle) throw new CyclicDependencyError(cycle.map((i) => addressOf(nodes[i])));

  log.debug("Built resource graph", { resources: nodes.length, edges: edges.length });
  return new ResourceGraph(nodes, edges);
}

/**
 * DFS with recursion-stack marking. Returns the members of the first cycle
 * found, in the order they were entered.
 */
function detectCycle(size: number, edges: DependencyEdge[]): number[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Array<number>(size).fill(WHITE);
  const adjacency: number[][] = Array.from({ length: size }, () => []);
  for (const edge of edges) adjacency[edge.from].push(edge.to);

  const stack: number[] = [];

  const visit = (node: number): number[] | null => {
    color[node] = GRAY;
    stack.push(node);
    for (const next of adjacency[node]) {
      if (color[next] === GRAY) return stack.slice(stack.indexOf(next));
      if (color[next] === WHITE) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    color[node] = BLACK;
    return null;
  };

  for (let node = 0; node < size; node++) {
    if (color[node] !== WHITE) continue;
    const cycle = visit(node);
    if (cycle) return cycle;
  }
  return null;
}
