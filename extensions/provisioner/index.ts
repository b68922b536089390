/**
 * Converge — Provisioning Engine Entry Point
 */

export { Provisioner } from "./src/provisioner.js";
export type { ProvisionerOptions, ProvisionPlanOptions, RefreshReport } from "./src/provisioner.js";

export { buildGraph, ResourceGraph } from "./src/graph.js";
export type { DependencyEdge } from "./src/graph.js";
export { validateGraph, validateResource, assertNoFatalViolations, resolveDesiredAttributes } from "./src/validator.js";
export { diff, applyIgnoreChanges } from "./src/differ.js";
export type { DiffOptions } from "./src/differ.js";
export { createPlan, buildStages, selectTargets, planEntries, freezePlan } from "./src/planner.js";
export type { CreatePlanOptions } from "./src/planner.js";
export { Executor, runPool } from "./src/executor.js";
export type { ExecutorDeps } from "./src/executor.js";
export {
  toPlanDocument,
  parsePlanDocument,
  renderPlan,
  formatValue,
  PLAN_DOCUMENT_FORMAT,
  PLAN_DOCUMENT_VERSION,
} from "./src/plan-document.js";
export type { PlanDocument } from "./src/plan-document.js";

export { KindRegistry, ProviderRegistry, ValidatorRegistry, ReplaceRuleRegistry } from "./src/registry.js";
export type { ReplaceRule } from "./src/registry.js";
export { MemoryStateStore } from "./src/memory-store.js";
export { SqliteStateStore } from "./src/sqlite-store.js";

export {
  RETRY_DEFAULTS,
  TRANSIENT_ERROR_CODES,
  classifyError,
  computeBackoffDelay,
  isTransientError,
  sleep,
} from "./src/retry.js";
export type { ErrorClassifier } from "./src/retry.js";
export {
  provisionerConfigSchema,
  retryConfigSchema,
  loggingConfigSchema,
  loadProvisionerConfig,
  getDefaultProvisionerConfig,
} from "./src/config.js";
export type { ProvisionerConfig, ProvisionerConfigInput } from "./src/config.js";
export {
  ConsoleTransport,
  FileTransport,
  ProvisionLoggerImpl,
  createDefaultFormatter,
  createProvisionLogger,
  getProvisionLogger,
  setGlobalProvisionLogger,
} from "./src/logger.js";
export type {
  LogTransport,
  LoggingConfig,
  ProvisionLogEntry,
  ProvisionLogLevel,
  ProvisionLogger,
} from "./src/logger.js";

export {
  ProvisionError,
  InvalidResourceError,
  DuplicateResourceError,
  UnresolvedReferenceError,
  CyclicDependencyError,
  ValidationError,
  PlanningError,
  ExecutionError,
  OperationTimeoutError,
  formatErrorMessage,
} from "./src/errors.js";
export type { ProvisionErrorCode, PlanningErrorReason, UnresolvedReference } from "./src/errors.js";

export {
  ref,
  unknown,
  isResourceRef,
  isUnknown,
  addressOf,
  parseAddress,
  collectRefs,
  resolveValue,
  resolveAttributes,
  valuesEqual,
  getAttributePath,
  diffAttributes,
} from "./src/values.js";

export type * from "./src/types.js";
