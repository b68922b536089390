/**
 * Converge — Kind Registries
 *
 * Per-kind capabilities (providers, invariants, replace rules) are looked up
 * by resource kind: an exact registration wins, then the longest matching
 * family prefix (e.g. "aws_iam_").
 */

import type {
  AttributeDiff,
  InvariantFn,
  Provider,
} from "./types.js";

// =============================================================================
// Registry
// =============================================================================

export class KindRegistry<T> {
  private readonly exact = new Map<string, T>();
  private readonly families = new Map<string, T>();

  constructor(private readonly label: string) {}

  /** Register an implementation for one or more exact kinds. */
  register(kinds: string | string[], impl: T): void {
    for (const kind of Array.isArray(kinds) ? kinds : [kinds]) {
      if (this.exact.has(kind)) {
        throw new Error(`${this.label} for kind "${kind}" is already registered`);
      }
      this.exact.set(kind, impl);
    }
  }

  /** Register an implementation for every kind starting with `prefix`. */
  registerFamily(prefix: string, impl: T): void {
    if (prefix.length === 0) throw new Error(`${this.label} family prefix must not be empty`);
    if (this.families.has(prefix)) {
      throw new Error(`${this.label} for family "${prefix}*" is already registered`);
    }
    this.families.set(prefix, impl);
  }

  resolve(kind: string): T | undefined {
    const exact = this.exact.get(kind);
    if (exact !== undefined) return exact;
    let best: { prefix: string; impl: T } | undefined;
    for (const [prefix, impl] of this.families) {
      if (kind.startsWith(prefix) && (!best || prefix.length > best.prefix.length)) {
        best = { prefix, impl };
      }
    }
    return best?.impl;
  }

  has(kind: string): boolean {
    return this.resolve(kind) !== undefined;
  }

  unregister(kind: string): boolean {
    return this.exact.delete(kind) || this.families.delete(kind);
  }

  clear(): void {
    this.exact.clear();
    this.families.clear();
  }
}

// =============================================================================
// Providers
// =============================================================================

export class ProviderRegistry extends KindRegistry<Provider> {
  constructor() {
    super("Provider");
  }
}

// =============================================================================
// Invariants
// =============================================================================

/**
 * Several invariants may be registered per kind; all of them run.
 */
export class ValidatorRegistry {
  private readonly invariants = new Map<string, InvariantFn[]>();

  register(kind: string, fn: InvariantFn): void {
    const list = this.invariants.get(kind) ?? [];
    list.push(fn);
    this.invariants.set(kind, list);
  }

  invariantsFor(kind: string): readonly InvariantFn[] {
    return this.invariants.get(kind) ?? [];
  }

  kinds(): string[] {
    return [...this.invariants.keys()];
  }
}

// =============================================================================
// Replace Rules
// =============================================================================

/**
 * Attribute paths that force replacement (a path also covers everything
 * beneath it), or a predicate over a single attribute diff.
 */
export type ReplaceRule = string[] | ((diff: Omit<AttributeDiff, "requiresReplace">) => boolean);

export class ReplaceRuleRegistry extends KindRegistry<ReplaceRule> {
  constructor() {
    super("Replace rule");
  }
}
