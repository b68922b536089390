/**
 * Converge — Executor
 *
 * Runs a plan stage by stage:
 * - A fixed-size worker pool drains each stage; the next stage starts only
 *   after every dispatched operation of the current one has returned
 * - References are resolved against the state store right before each call
 * - Transient provider errors are retried with backoff and jitter
 * - A failed stage stops the run; entries never reached are reported skipped
 * - State is written per resource as soon as its operation succeeds
 *
 * There is no automatic rollback. Planning again from the partially
 * updated state and applying converges on the desired set.
 */

import type {
  ApplyEvent,
  ApplyEventListener,
  ApplyReport,
  ApplyStatus,
  AttributeMap,
  DiffAction,
  DiffEntry,
  ErrorClass,
  ExecutionResult,
  ExecutionStatus,
  ExecutorOptions,
  Plan,
  Provider,
  ProviderOperation,
  ProviderResult,
  ResourceAddress,
  RetryConfig,
  StateRecord,
  StateStore,
} from "./types.js";
import type { ProviderRegistry } from "./registry.js";
import { ExecutionError, OperationTimeoutError, formatErrorMessage } from "./errors.js";
import { planEntries } from "./planner.js";
import { RETRY_DEFAULTS, computeBackoffDelay, sleep } from "./retry.js";
import {
  addressOf,
  collectRefs,
  containsUnknown,
  diffAttributes,
  getAttributePath,
  resolveAttributes,
  sameAddresses,
} from "./values.js";
import { getProvisionLogger, type ProvisionLogger } from "./logger.js";

// =============================================================================
// Default Options
// =============================================================================

const DEFAULT_PARALLELISM = 10;
const DEFAULT_OPERATION_TIMEOUT_MS = 300_000;

export type ExecutorDeps = {
  store: StateStore;
  providers: ProviderRegistry;
  logger?: ProvisionLogger;
};

type OperationAction = Exclude<DiffAction, "noop">;

type RunState = {
  plan: Plan;
  signal: AbortSignal | undefined;
  log: ProvisionLogger;
  results: Map<string, ExecutionResult>;
  total: number;
  cancelled: boolean;
};

// =============================================================================
// Executor
// =============================================================================

export class Executor {
  private listeners: ApplyEventListener[] = [];
  private readonly parallelism: number;
  private readonly retry: RetryConfig;
  private readonly operationTimeoutMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly log: ProvisionLogger;

  constructor(
    private readonly deps: ExecutorDeps,
    options: ExecutorOptions = {},
  ) {
    this.parallelism = Math.max(1, options.parallelism ?? DEFAULT_PARALLELISM);
    this.retry = { ...RETRY_DEFAULTS, ...options.retry };
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.signal = options.signal;
    this.log = deps.logger ?? getProvisionLogger("executor");
  }

  /** Subscribe to apply lifecycle events. */
  on(listener: ApplyEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(run: RunState, event: Omit<ApplyEvent, "planId" | "timestamp">): void {
    const full: ApplyEvent = { ...event, planId: run.plan.id, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(full);
      } catch (err) {
        run.log.warn(`Event listener threw on ${event.type}: ${formatErrorMessage(err)}`);
      }
    }
  }

  /**
   * Apply a plan. Never throws for provider failures; they are reported per
   * resource in the returned report.
   */
  async apply(plan: Plan, options: { signal?: AbortSignal } = {}): Promise<ApplyReport> {
    const started = Date.now();
    const entries = planEntries(plan);
    const run: RunState = {
      plan,
      signal: options.signal ?? this.signal,
      log: this.log.withContext({ planId: plan.id }),
      results: new Map(),
      total: entries.length,
      cancelled: false,
    };

    this.emit(run, {
      type: "apply:start",
      message: `Applying ${entries.length} operation(s) in ${plan.stages.length} stage(s)`,
      progress: { completed: 0, total: entries.length, percentage: 0 },
    });

    let failed = false;
    for (const stage of plan.stages) {
      if (run.signal?.aborted) {
        run.cancelled = true;
        break;
      }

      this.emit(run, { type: "stage:start", stage: stage.index, message: `Stage ${stage.index}: ${stage.entries.length} operation(s)` });
      await runPool(stage.entries, this.parallelism, async (entry) => {
        if (run.signal?.aborted) {
          run.cancelled = true;
          return;
        }
        const result = await this.executeEntry(entry, stage.index, run);
        run.results.set(entry.id, result);
      });

      const stageFailed = stage.entries.some((e) => run.results.get(e.id)?.status === "failed");
      this.emit(run, {
        type: "stage:complete",
        stage: stage.index,
        message: stageFailed ? `Stage ${stage.index} finished with failures` : `Stage ${stage.index} complete`,
      });
      if (stageFailed) {
        failed = true;
        break;
      }
    }

    const results = entries.map((entry) => run.results.get(entry.id) ?? this.skip(entry, run, failed));
    const status: ApplyStatus = run.cancelled ? "cancelled" : failed ? "failed" : "succeeded";
    const summary: Record<ExecutionStatus, number> = { succeeded: 0, failed: 0, skipped: 0 };
    for (const result of results) summary[result.status]++;

    const durationMs = Date.now() - started;
    if (status === "succeeded") {
      this.emit(run, { type: "apply:complete", message: `Apply completed in ${durationMs}ms` });
      run.log.info("Apply complete", { ...summary, durationMs });
    } else if (status === "cancelled") {
      this.emit(run, { type: "apply:cancelled", message: "Apply was cancelled" });
      run.log.warn("Apply cancelled", { ...summary });
    } else {
      this.emit(run, { type: "apply:failed", message: `Apply failed: ${summary.failed} operation(s) failed` });
      run.log.error("Apply failed", { ...summary });
    }

    return {
      planId: plan.id,
      status,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      durationMs,
      results,
      summary,
    };
  }

  // ---------------------------------------------------------------------------
  // Operation Execution
  // ---------------------------------------------------------------------------

  private async executeEntry(entry: DiffEntry, stage: number, run: RunState): Promise<ExecutionResult> {
    const action = operationAction(entry);
    const log = run.log.withContext({ planId: run.plan.id, resource: entry.address, stage });
    const base = { id: entry.id, address: entry.address, action };

    this.emit(run, { type: "operation:start", stage, entryId: entry.id, message: `${capitalize(action)} ${entry.address}` });

    let attributes: AttributeMap;
    try {
      attributes = await this.resolveForApply(entry, action);
    } catch (err) {
      return this.fail(run, stage, { ...base, status: "failed", attempts: 0, changed: false, error: formatErrorMessage(err), errorClass: "fatal" });
    }

    if (action === "update" && entry.prior && diffAttributes(entry.prior.attributes, attributes).length === 0) {
      // Resolved values match what is recorded: nothing to send.
      if (!sameAddresses(entry.prior.dependencies, entry.dependencies)) {
        const written = await this.writeState(entry, action, attributes, entry.prior.handle, entry.prior.computed);
        if (written !== true) {
          return this.fail(run, stage, { ...base, status: "failed", attempts: 0, changed: false, error: written, errorClass: "fatal" });
        }
      }
      log.debug("Update resolved to recorded attributes; skipping provider call");
      return this.complete(run, stage, { ...base, status: "succeeded", attempts: 0, changed: false });
    }

    const provider = this.deps.providers.resolve(entry.key.kind);
    if (!provider) {
      const error = new ExecutionError(`No provider registered for kind "${entry.key.kind}"`, "fatal");
      return this.fail(run, stage, { ...base, status: "failed", attempts: 0, changed: false, error: error.message, errorClass: "fatal" });
    }

    let lastError: unknown;
    let lastClass: ErrorClass = "fatal";
    let attempts = 0;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1 && run.signal?.aborted) {
        run.cancelled = true;
        break;
      }
      attempts = attempt;

      let result: ProviderResult;
      try {
        result = await this.invoke(provider, { action, key: entry.key, attributes, prior: entry.prior, entry }, attempt);
      } catch (err) {
        lastError = err;
        lastClass = classifySafely(() => provider.classify(err), log);
        if (lastClass === "fatal" || attempt >= this.retry.maxAttempts) break;

        const delayMs = computeBackoffDelay(attempt, this.retry);
        log.warn(`Attempt ${attempt}/${this.retry.maxAttempts} failed, retrying in ${delayMs}ms: ${formatErrorMessage(err)}`);
        this.emit(run, {
          type: "operation:retry",
          stage,
          entryId: entry.id,
          message: `Retrying ${entry.address} (attempt ${attempt + 1}/${this.retry.maxAttempts})`,
          error: formatErrorMessage(err),
        });
        await sleep(delayMs, run.signal);
        continue;
      }

      const written = await this.writeState(entry, action, attributes, result.handle, result.attributes ?? {});
      if (written !== true) {
        return this.fail(run, stage, {
          ...base,
          status: "failed",
          attempts,
          changed: true,
          error: written,
          errorClass: "fatal",
          drift: action === "delete" ? "orphaned-state" : "untracked-resource",
        });
      }
      return this.complete(run, stage, { ...base, status: "succeeded", attempts, changed: true });
    }

    return this.fail(run, stage, {
      ...base,
      status: "failed",
      attempts,
      changed: false,
      error: formatErrorMessage(lastError),
      errorClass: lastClass,
    });
  }

  /** One provider call bounded by the per-operation deadline. */
  private async invoke(provider: Provider, operation: ProviderOperation, attempt: number): Promise<ProviderResult> {
    const controller = new AbortController();
    const timeoutMs = this.operationTimeoutMs;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : undefined;
    const call = provider.execute(operation, { signal: controller.signal, attempt, deadline });
    if (timeoutMs <= 0) return call;
    return withTimeout(call, timeoutMs, () => {
      controller.abort();
      return new OperationTimeoutError(operation.entry.id, timeoutMs);
    });
  }

  /**
   * Resolve references in the desired attributes against the store. Deletes
   * send the recorded attributes unchanged.
   */
  private async resolveForApply(entry: DiffEntry, action: OperationAction): Promise<AttributeMap> {
    if (action === "delete") return entry.prior?.attributes ?? {};
    const desired = entry.attributes ?? {};

    const records = new Map<ResourceAddress, StateRecord>();
    for (const { ref } of collectRefs(desired)) {
      const target = addressOf(ref.$ref);
      if (records.has(target)) continue;
      const record = await this.deps.store.get(ref.$ref);
      if (!record) {
        throw new ExecutionError(`Resource "${entry.address}" references "${target}", which has no recorded state`, "fatal");
      }
      records.set(target, record);
    }

    const resolved = resolveAttributes(desired, (ref) => {
      const target = addressOf(ref.$ref);
      const record = records.get(target);
      if (!record) throw new ExecutionError(`No recorded state for "${target}"`, "fatal");
      if (ref.attribute === undefined) return record.handle;
      const value = getAttributePath(record.computed, ref.attribute) ?? getAttributePath(record.attributes, ref.attribute);
      if (value === undefined) {
        throw new ExecutionError(`Resource "${target}" has no attribute "${ref.attribute}"`, "fatal");
      }
      return value;
    });
    if (containsUnknown(resolved)) {
      throw new ExecutionError(`Resource "${entry.address}" has values that are only known after apply`, "fatal");
    }
    return resolved;
  }

  /** Returns true, or the error message when the store rejected the write. */
  private async writeState(
    entry: DiffEntry,
    action: OperationAction,
    attributes: AttributeMap,
    handle: string,
    computed: AttributeMap,
  ): Promise<true | string> {
    try {
      if (action === "delete") {
        // The create half already recorded the replacement.
        if (!entry.replace?.createBeforeDestroy) await this.deps.store.delete(entry.key);
        return true;
      }
      await this.deps.store.put({
        kind: entry.key.kind,
        name: entry.key.name,
        handle,
        attributes,
        computed,
        dependencies: [...entry.dependencies],
        updatedAt: new Date().toISOString(),
      });
      return true;
    } catch (err) {
      return `State write failed after provider ${action} succeeded: ${formatErrorMessage(err)}`;
    }
  }

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------

  private complete(run: RunState, stage: number, result: ExecutionResult): ExecutionResult {
    run.results.set(result.id, result);
    this.emit(run, {
      type: "operation:complete",
      stage,
      entryId: result.id,
      message: result.changed ? `${capitalize(result.action)} ${result.address} succeeded` : `${result.address} already up to date`,
      progress: progressOf(run),
    });
    return result;
  }

  private fail(run: RunState, stage: number, result: ExecutionResult): ExecutionResult {
    run.results.set(result.id, result);
    run.log.error(`${capitalize(result.action)} ${result.address} failed: ${result.error ?? "unknown error"}`, {
      attempts: result.attempts,
      errorClass: result.errorClass,
      drift: result.drift,
    });
    this.emit(run, {
      type: "operation:failed",
      stage,
      entryId: result.id,
      message: `${capitalize(result.action)} ${result.address} failed`,
      error: result.error,
      progress: progressOf(run),
    });
    return result;
  }

  private skip(entry: DiffEntry, run: RunState, afterFailure: boolean): ExecutionResult {
    const reason = run.cancelled ? "apply was cancelled" : afterFailure ? "an earlier stage failed" : "not reached";
    this.emit(run, { type: "operation:skipped", entryId: entry.id, message: `${entry.address} skipped: ${reason}` });
    return {
      id: entry.id,
      address: entry.address,
      action: operationAction(entry),
      status: "skipped",
      attempts: 0,
      changed: false,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function operationAction(entry: DiffEntry): OperationAction {
  if (entry.action === "noop") {
    throw new ExecutionError(`Plan entry "${entry.id}" has no operation`, "fatal");
  }
  return entry.action;
}

function classifySafely(classify: () => ErrorClass, log: ProvisionLogger): ErrorClass {
  try {
    return classify();
  } catch (err) {
    log.warn(`Error classifier threw, treating error as fatal: ${formatErrorMessage(err)}`);
    return "fatal";
  }
}

function progressOf(run: RunState): ApplyEvent["progress"] {
  const completed = run.results.size;
  return { completed, total: run.total, percentage: run.total === 0 ? 100 : Math.round((completed / run.total) * 100) };
}

function capitalize(action: string): string {
  return action.charAt(0).toUpperCase() + action.slice(1);
}

/**
 * Fixed-size worker pool draining a queue. Resolves once every item has been
 * processed; `worker` must not reject.
 */
export async function runPool<T>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const workers = Array.from({ length: Math.min(Math.max(1, size), items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      await worker(items[index], index);
    }
  });
  await Promise.all(workers);
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise
      .then((val) => { clearTimeout(timer); resolve(val); })
      .catch((err: unknown) => { clearTimeout(timer); reject(err); });
  });
}
