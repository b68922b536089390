/**
 * Converge — Attribute Values
 *
 * Constructors, guards, reference resolution and structural comparison for
 * the attribute value union.
 */

import type {
  AttributeDiff,
  AttributeMap,
  MapValue,
  ResourceAddress,
  ResourceKey,
  ResourceRef,
  UnknownValue,
  Value,
} from "./types.js";
import { InvalidResourceError } from "./errors.js";

// =============================================================================
// Addresses
// =============================================================================

const KIND_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;
const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export function addressOf(key: ResourceKey): ResourceAddress {
  return `${key.kind}.${key.name}`;
}

export function parseAddress(address: ResourceAddress): ResourceKey {
  const dot = address.indexOf(".");
  if (dot <= 0 || dot === address.length - 1) {
    throw new InvalidResourceError(`Invalid resource address "${address}"`);
  }
  const key = { kind: address.slice(0, dot), name: address.slice(dot + 1) };
  assertValidKey(key);
  return key;
}

/** Order-insensitive comparison of two address lists. */
export function sameAddresses(a: readonly ResourceAddress[], b: readonly ResourceAddress[]): boolean {
  if (a.length !== b.length) return false;
  const left = [...a].sort();
  const right = [...b].sort();
  return left.every((address, i) => address === right[i]);
}

export function assertValidKey(key: ResourceKey): void {
  if (!KIND_PATTERN.test(key.kind)) {
    throw new InvalidResourceError(`Invalid resource kind "${key.kind}"`);
  }
  if (!NAME_PATTERN.test(key.name)) {
    throw new InvalidResourceError(`Invalid resource name "${key.name}" for kind "${key.kind}"`);
  }
}

// =============================================================================
// Constructors & Guards
// =============================================================================

/** Reference another resource's handle, or one of its attributes. */
export function ref(kind: string, name: string, attribute?: string): ResourceRef {
  return attribute === undefined ? { $ref: { kind, name } } : { $ref: { kind, name }, attribute };
}

export function unknown(target: ResourceAddress, attribute?: string): UnknownValue {
  return attribute === undefined ? { $unknown: target } : { $unknown: target, attribute };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isResourceRef(value: unknown): value is ResourceRef {
  if (!isObject(value) || !isObject(value.$ref)) return false;
  return typeof value.$ref.kind === "string" && typeof value.$ref.name === "string";
}

export function isUnknown(value: unknown): value is UnknownValue {
  return isObject(value) && typeof value.$unknown === "string";
}

export function isMapValue(value: Value | undefined): value is MapValue {
  return isObject(value) && !isResourceRef(value) && !isUnknown(value);
}

/** True when the value holds an UnknownValue anywhere inside it. */
export function containsUnknown(value: Value): boolean {
  if (isUnknown(value)) return true;
  if (Array.isArray(value)) return value.some(containsUnknown);
  if (isMapValue(value)) return Object.values(value).some(containsUnknown);
  return false;
}

// =============================================================================
// References
// =============================================================================

export type FoundRef = {
  ref: ResourceRef;
  /** Dotted path of the attribute holding the reference. */
  path: string;
};

/** Collect every reference in an attribute map, in declaration order. */
export function collectRefs(attributes: AttributeMap): FoundRef[] {
  const found: FoundRef[] = [];
  const walk = (value: Value, path: string) => {
    if (isResourceRef(value)) {
      found.push({ ref: value, path });
    } else if (Array.isArray(value)) {
      value.forEach((item, i) => walk(item, `${path}[${i}]`));
    } else if (isMapValue(value)) {
      for (const [k, v] of Object.entries(value)) walk(v, path ? `${path}.${k}` : k);
    }
  };
  for (const [name, value] of Object.entries(attributes)) walk(value, name);
  return found;
}

export type RefResolver = (ref: ResourceRef) => Value;

/** Replace every reference in a value with what the resolver returns. */
export function resolveValue(value: Value, resolver: RefResolver): Value {
  if (isResourceRef(value)) return resolver(value);
  if (Array.isArray(value)) return value.map((item) => resolveValue(item, resolver));
  if (isMapValue(value)) {
    const out: MapValue = {};
    for (const [k, v] of Object.entries(value)) out[k] = resolveValue(v, resolver);
    return out;
  }
  return value;
}

export function resolveAttributes(attributes: AttributeMap, resolver: RefResolver): AttributeMap {
  const out: AttributeMap = {};
  for (const [k, v] of Object.entries(attributes)) out[k] = resolveValue(v, resolver);
  return out;
}

/**
 * Look up a dotted attribute path (`tags.Name`) in a map.
 * Returns undefined when any segment is missing.
 */
export function getAttributePath(attributes: AttributeMap, path: string): Value | undefined {
  let current: Value | undefined = attributes;
  for (const segment of path.split(".")) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isMapValue(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      const map: MapValue = current;
      current = map[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Write a dotted path into a copy of the map, creating intermediate maps. */
export function setAttributePath(attributes: AttributeMap, path: string, value: Value | undefined): AttributeMap {
  const [head, ...rest] = path.split(".");
  const out: AttributeMap = { ...attributes };
  if (rest.length === 0) {
    if (value === undefined) delete out[head];
    else out[head] = value;
    return out;
  }
  const child = out[head];
  out[head] = setAttributePath(isMapValue(child) ? child : {}, rest.join("."), value);
  return out;
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Structural equality. Unknown values never compare equal, so anything
 * depending on an unapplied change is always planned as a change.
 */
export function valuesEqual(a: Value | undefined, b: Value | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (isUnknown(a) || isUnknown(b)) return false;
  if (isResourceRef(a) || isResourceRef(b)) {
    return isResourceRef(a) && isResourceRef(b)
      && a.$ref.kind === b.$ref.kind
      && a.$ref.name === b.$ref.name
      && a.attribute === b.attribute;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isMapValue(a) && isMapValue(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const k of keys) {
      if (!valuesEqual(a[k], b[k])) return false;
    }
    return true;
  }
  return false;
}

/**
 * Leaf-level differences between two attribute maps. Maps are walked into,
 * lists and scalars are compared whole.
 */
export function diffAttributes(
  before: AttributeMap,
  after: AttributeMap,
): Omit<AttributeDiff, "requiresReplace">[] {
  const diffs: Omit<AttributeDiff, "requiresReplace">[] = [];
  const walk = (b: Value | undefined, a: Value | undefined, path: string) => {
    if (isMapValue(b) && isMapValue(a)) {
      const bMap: MapValue = b;
      const aMap: MapValue = a;
      const keys = [...new Set([...Object.keys(bMap), ...Object.keys(aMap)])].sort();
      for (const k of keys) walk(bMap[k], aMap[k], `${path}.${k}`);
      return;
    }
    if (valuesEqual(b, a)) return;
    const diff: Omit<AttributeDiff, "requiresReplace"> = { path };
    if (b !== undefined) diff.before = b;
    if (a !== undefined) diff.after = a;
    diffs.push(diff);
  };
  const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
  for (const k of keys) walk(before[k], after[k], k);
  return diffs;
}

/** True when `path` equals `prefix` or lies underneath it. */
export function pathWithin(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(`${prefix}.`) || path.startsWith(`${prefix}[`);
}
