/**
 * Converge — Provisioning Engine Types
 *
 * Type definitions shared by the graph builder, differ, planner and executor.
 */

// =============================================================================
// Values
// =============================================================================

/** Identity of a resource within a resource set. */
export type ResourceKey = {
  kind: string;
  name: string;
};

/** `kind.name` — the string form of a ResourceKey. */
export type ResourceAddress = string;

export type ScalarValue = string | number | boolean | null;

/**
 * A reference to another resource's attribute, resolved during planning and
 * again right before the owning resource is applied.
 * Without `attribute` it refers to the target's provider handle.
 */
export type ResourceRef = {
  readonly $ref: ResourceKey;
  readonly attribute?: string;
};

/** A value that will only be known once the referenced resource is applied. */
export type UnknownValue = {
  readonly $unknown: ResourceAddress;
  readonly attribute?: string;
};

export type ListValue = Value[];

/** Keys starting with `$` are reserved for references. */
export type MapValue = { [name: string]: Value };

export type Value = ScalarValue | ResourceRef | UnknownValue | ListValue | MapValue;

export type AttributeMap = { [name: string]: Value };

// =============================================================================
// Resources
// =============================================================================

export type ResourceLifecycle = {
  /** Refuse to plan a delete (including a replacement) of this resource. */
  preventDestroy?: boolean;
  /** Create the replacement before destroying the current instance. */
  createBeforeDestroy?: boolean;
  /** Attribute paths whose changes are ignored when diffing. */
  ignoreChanges?: string[];
  /** Replace this resource whenever one of these resources changes. */
  replaceTriggeredBy?: ResourceKey[];
};

/** A declaratively managed unit of infrastructure. */
export type Resource = {
  kind: string;
  name: string;
  attributes: AttributeMap;
  dependsOn?: ResourceKey[];
  lifecycle?: ResourceLifecycle;
  /** Attribute names whose values are redacted in plan output. */
  sensitive?: string[];
};

// =============================================================================
// State
// =============================================================================

/** Last applied state of a resource, owned by the state store. */
export type StateRecord = {
  kind: string;
  name: string;
  /** Opaque provider-assigned identifier (ARN, ID, ...). */
  handle: string;
  /** Resolved attributes as last applied. */
  attributes: AttributeMap;
  /** Attributes computed by the provider. */
  computed: AttributeMap;
  /** Addresses this resource depended on when it was applied. */
  dependencies: ResourceAddress[];
  updatedAt: string;
};

/**
 * Persistence collaborator for state records.
 * Must offer read-your-writes consistency within a single run.
 */
export interface StateStore {
  open(): Promise<void>;
  close(): Promise<void>;
  get(key: ResourceKey): Promise<StateRecord | undefined>;
  put(record: StateRecord): Promise<void>;
  delete(key: ResourceKey): Promise<void>;
  list(): Promise<StateRecord[]>;
}

// =============================================================================
// Diff
// =============================================================================

export type DiffAction = "create" | "update" | "delete" | "noop";

export type AttributeDiff = {
  path: string;
  before?: Value;
  after?: Value;
  requiresReplace: boolean;
};

export type ReplacePhase = "destroy" | "create";

export type ReplaceInfo = {
  phase: ReplacePhase;
  /** Attribute paths or trigger addresses that forced the replacement. */
  reasons: string[];
  createBeforeDestroy: boolean;
};

export type DiffEntry = {
  /** Unique within a plan; replacement halves carry a `#destroy` / `#create` suffix. */
  id: string;
  key: ResourceKey;
  address: ResourceAddress;
  action: DiffAction;
  attributeDiffs: AttributeDiff[];
  /** Desired attributes with references intact (create/update/noop). */
  attributes?: AttributeMap;
  /** Desired attributes as far as they are known at plan time. */
  planned?: AttributeMap;
  prior?: StateRecord;
  /** Desired dependencies for create/update, recorded ones for delete. */
  dependencies: ResourceAddress[];
  replace?: ReplaceInfo;
  sensitive?: string[];
};

// =============================================================================
// Plan
// =============================================================================

export type PlanMode = "apply" | "destroy";

export type PlanStage = {
  index: number;
  entries: DiffEntry[];
};

export type PlanSummary = {
  create: number;
  update: number;
  delete: number;
  replace: number;
  noop: number;
};

/** Ordered stages of operations; entries in one stage are independent. */
export type Plan = {
  id: string;
  createdAt: string;
  mode: PlanMode;
  stages: PlanStage[];
  /** Addresses that need no change. */
  noop: ResourceAddress[];
  summary: PlanSummary;
  /** Non-fatal invariant violations found while planning. */
  warnings: Violation[];
};

export type PlanOptions = {
  /** Restrict the plan to these resources and what they need. */
  targets?: ResourceKey[];
  mode?: PlanMode;
};

// =============================================================================
// Validation
// =============================================================================

export type ViolationSeverity = "fatal" | "warning";

export type Violation = {
  address: ResourceAddress;
  severity: ViolationSeverity;
  code: string;
  message: string;
};

/** Read-only view of a resource as seen by invariant checks. */
export type ResolvedResource = {
  readonly kind: string;
  readonly name: string;
  readonly address: ResourceAddress;
  /** References resolved where known; the rest are UnknownValue. */
  readonly attributes: Readonly<AttributeMap>;
};

export type InvariantContext = {
  /** A direct dependency of the resource under check. */
  dependency(kind: string, name: string): ResolvedResource | undefined;
  dependencies(): ResolvedResource[];
};

export type InvariantIssue = Omit<Violation, "address"> & { address?: ResourceAddress };

export type InvariantFn = (
  resource: ResolvedResource,
  ctx: InvariantContext,
) => InvariantIssue[] | InvariantIssue | undefined;

// =============================================================================
// Providers
// =============================================================================

export type ErrorClass = "transient" | "fatal";

export type ProviderOperation = {
  action: Exclude<DiffAction, "noop">;
  key: ResourceKey;
  /** Fully resolved attributes (create/update); the prior attributes for delete. */
  attributes: AttributeMap;
  prior?: StateRecord;
  entry: DiffEntry;
};

export type ProviderContext = {
  /** Aborted when the per-operation deadline passes. Cancelling a run never aborts in-flight work. */
  signal: AbortSignal;
  attempt: number;
  deadline: number | undefined;
};

export type ProviderResult = {
  handle: string;
  /** Attributes computed by the provider (ids, ARNs, endpoints, ...). */
  attributes?: AttributeMap;
};

export type ProviderReadResult = {
  handle: string;
  /** Attributes as currently observed on the provider side. */
  attributes: AttributeMap;
  computed?: AttributeMap;
};

/** Side-effecting implementation for one resource kind family. */
export interface Provider {
  execute(operation: ProviderOperation, ctx: ProviderContext): Promise<ProviderResult>;
  classify(error: unknown): ErrorClass;
  /** Observe the live resource; `null` when it no longer exists. */
  read?(record: StateRecord, ctx: ProviderContext): Promise<ProviderReadResult | null>;
}

// =============================================================================
// Execution
// =============================================================================

export type ExecutionStatus = "succeeded" | "failed" | "skipped";

/** A provider side effect the state store did not capture. */
export type DriftCondition = "untracked-resource" | "orphaned-state";

export type ExecutionResult = {
  id: string;
  address: ResourceAddress;
  action: Exclude<DiffAction, "noop">;
  status: ExecutionStatus;
  attempts: number;
  /** False when an update resolved to the recorded attributes. */
  changed: boolean;
  error?: string;
  errorClass?: ErrorClass;
  drift?: DriftCondition;
};

export type ApplyStatus = "succeeded" | "failed" | "cancelled";

export type ApplyReport = {
  planId: string;
  status: ApplyStatus;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  /** One result per plan entry, in plan order. */
  results: ExecutionResult[];
  summary: Record<ExecutionStatus, number>;
};

export type RetryConfig = {
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
};

export type ExecutorOptions = {
  /** Worker pool size per stage (default: 10). */
  parallelism?: number;
  retry?: Partial<RetryConfig>;
  /** Per-operation deadline in ms; 0 disables it (default: 300_000). */
  operationTimeoutMs?: number;
  signal?: AbortSignal;
};

// =============================================================================
// Events
// =============================================================================

export type ApplyEventType =
  | "apply:start"
  | "apply:complete"
  | "apply:failed"
  | "apply:cancelled"
  | "stage:start"
  | "stage:complete"
  | "operation:start"
  | "operation:complete"
  | "operation:failed"
  | "operation:retry"
  | "operation:skipped";

export type ApplyEvent = {
  type: ApplyEventType;
  planId: string;
  stage?: number;
  entryId?: string;
  timestamp: string;
  message: string;
  error?: string;
  progress?: { completed: number; total: number; percentage: number };
};

export type ApplyEventListener = (event: ApplyEvent) => void;
