/**
 * Converge — Error Taxonomy
 *
 * Graph, validation and planning errors are thrown before any provider call.
 * Execution errors stay local to one resource and end up in the apply report.
 */

import type { ErrorClass, ResourceAddress, Violation } from "./types.js";

export type ProvisionErrorCode =
  | "INVALID_RESOURCE"
  | "DUPLICATE_RESOURCE"
  | "UNRESOLVED_REFERENCE"
  | "CYCLIC_DEPENDENCY"
  | "VALIDATION_FAILED"
  | "PLANNING_ERROR"
  | "EXECUTION_ERROR"
  | "OPERATION_TIMEOUT"
  | "INVALID_CONFIG"
  | "INVALID_PLAN_DOCUMENT"
  | "CORRUPT_STATE"
  | "STORE_CLOSED";

export class ProvisionError extends Error {
  constructor(
    message: string,
    public readonly code: ProvisionErrorCode,
  ) {
    super(message);
    this.name = "ProvisionError";
  }
}

export class InvalidResourceError extends ProvisionError {
  constructor(message: string) {
    super(message, "INVALID_RESOURCE");
    this.name = "InvalidResourceError";
  }
}

export class DuplicateResourceError extends ProvisionError {
  constructor(public readonly address: ResourceAddress) {
    super(`Resource "${address}" is declared more than once`, "DUPLICATE_RESOURCE");
    this.name = "DuplicateResourceError";
  }
}

export type UnresolvedReference = {
  from: ResourceAddress;
  to: ResourceAddress;
  /** "attribute.path" the reference was found at, or "dependsOn". */
  via: string;
};

export class UnresolvedReferenceError extends ProvisionError {
  constructor(public readonly references: UnresolvedReference[]) {
    const first = references[0];
    const more = references.length > 1 ? ` (and ${references.length - 1} more)` : "";
    super(
      first
        ? `Resource "${first.from}" references undeclared resource "${first.to}" via ${first.via}${more}`
        : "Unresolved reference",
      "UNRESOLVED_REFERENCE",
    );
    this.name = "UnresolvedReferenceError";
  }
}

export class CyclicDependencyError extends ProvisionError {
  constructor(public readonly cycle: ResourceAddress[]) {
    super(`Circular dependency detected: ${[...cycle, cycle[0]].join(" → ")}`, "CYCLIC_DEPENDENCY");
    this.name = "CyclicDependencyError";
  }
}

export class ValidationError extends ProvisionError {
  constructor(public readonly violations: Violation[]) {
    const fatal = violations.filter((v) => v.severity === "fatal");
    super(
      `${fatal.length} fatal violation(s): ${fatal.map((v) => `${v.address}: ${v.message}`).join("; ")}`,
      "VALIDATION_FAILED",
    );
    this.name = "ValidationError";
  }
}

export type PlanningErrorReason =
  | "CYCLE"
  | "PREVENT_DESTROY"
  | "TARGET_NOT_FOUND"
  | "PROVIDER_NOT_FOUND";

export class PlanningError extends ProvisionError {
  constructor(
    message: string,
    public readonly reason: PlanningErrorReason,
    public readonly addresses: ResourceAddress[] = [],
  ) {
    super(message, "PLANNING_ERROR");
    this.name = "PlanningError";
  }
}

export class ExecutionError extends ProvisionError {
  constructor(
    message: string,
    public readonly errorClass: ErrorClass,
  ) {
    super(message, "EXECUTION_ERROR");
    this.name = "ExecutionError";
  }
}

export class OperationTimeoutError extends ProvisionError {
  constructor(
    public readonly entryId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation "${entryId}" timed out after ${timeoutMs}ms`, "OPERATION_TIMEOUT");
    this.name = "OperationTimeoutError";
  }
}

/**
 * Normalize anything thrown into a single-line message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" && !(error instanceof ProvisionError)
      ? `[${error.code}] `
      : "";
    return `${code}${error.message}`;
  }
  return String(error);
}
