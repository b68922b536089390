/**
 * Converge — Provisioner
 *
 * Wires the state store, provider/validator/replace-rule registries,
 * configuration and logging into the plan → apply workflow. Planning never
 * calls a provider's `execute`; nothing is mutated unless planning succeeds.
 */

import type {
  ApplyEventListener,
  ApplyReport,
  Plan,
  PlanOptions,
  ProviderReadResult,
  Resource,
  ResourceAddress,
  StateRecord,
  StateStore,
} from "./types.js";
import { buildGraph } from "./graph.js";
import { assertNoFatalViolations, validateGraph } from "./validator.js";
import { diff } from "./differ.js";
import { createPlan, planEntries } from "./planner.js";
import { Executor } from "./executor.js";
import { MemoryStateStore } from "./memory-store.js";
import { ProviderRegistry, ReplaceRuleRegistry, ValidatorRegistry } from "./registry.js";
import { ExecutionError, PlanningError, ProvisionError, formatErrorMessage } from "./errors.js";
import { loadProvisionerConfig, type ProvisionerConfig } from "./config.js";
import { addressOf, valuesEqual } from "./values.js";
import { createProvisionLogger, type ProvisionLogger } from "./logger.js";

export type ProvisionerOptions = {
  store: StateStore;
  providers?: ProviderRegistry;
  validators?: ValidatorRegistry;
  replaceRules?: ReplaceRuleRegistry;
  /** Raw configuration; validated with `loadProvisionerConfig`. */
  config?: unknown;
  env?: Record<string, string | undefined>;
  logger?: ProvisionLogger;
};

export type ProvisionPlanOptions = PlanOptions & {
  /** Reconcile recorded state with the providers before diffing. */
  refresh?: boolean;
};

export type RefreshReport = {
  updated: ResourceAddress[];
  removed: ResourceAddress[];
  unchanged: ResourceAddress[];
};

type Observation = {
  report: RefreshReport;
  /** Recorded state as the providers see it. */
  records: StateRecord[];
  writes: StateRecord[];
  removals: StateRecord[];
};

export class Provisioner {
  readonly config: ProvisionerConfig;
  readonly providers: ProviderRegistry;
  readonly validators: ValidatorRegistry;
  readonly replaceRules: ReplaceRuleRegistry;

  private readonly store: StateStore;
  private readonly log: ProvisionLogger;
  private readonly ownsLogger: boolean;
  private listeners: ApplyEventListener[] = [];
  private opened = false;

  constructor(options: ProvisionerOptions) {
    this.config = loadProvisionerConfig(options.config ?? {}, options.env ?? process.env);
    this.store = options.store;
    this.providers = options.providers ?? new ProviderRegistry();
    this.validators = options.validators ?? new ValidatorRegistry();
    this.replaceRules = options.replaceRules ?? new ReplaceRuleRegistry();
    this.ownsLogger = options.logger === undefined;
    this.log = options.logger ?? createProvisionLogger("provisioner", this.config.logging);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async open(): Promise<void> {
    if (this.opened) return;
    await this.store.open();
    this.opened = true;
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;
    try {
      await this.store.close();
    } finally {
      if (this.ownsLogger) await this.log.close();
    }
  }

  /** Open the store, run `fn`, and close the store again. */
  async run<T>(fn: (provisioner: this) => Promise<T>): Promise<T> {
    await this.open();
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  /** Subscribe to apply lifecycle events of every subsequent apply. */
  on(listener: ApplyEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Plan / Apply
  // ---------------------------------------------------------------------------

  /**
   * Build, validate and diff the desired resource set into a plan.
   *
   * @throws UnresolvedReferenceError, CyclicDependencyError, ValidationError
   *   or PlanningError, before any state is touched
   */
  async plan(resources: readonly Resource[], options: ProvisionPlanOptions = {}): Promise<Plan> {
    this.assertOpen();
    const graph = buildGraph(resources, { logger: this.log.child("graph") });
    const violations = validateGraph(graph, this.validators, { logger: this.log.child("validator") });
    assertNoFatalViolations(violations);

    // Refreshed records are diffed from memory and written only once the plan stands.
    const observation = options.refresh ? await this.observe() : undefined;
    const state = observation ? new MemoryStateStore(observation.records) : this.store;

    const diffs = await diff(graph, state, {
      mode: options.mode,
      replaceRules: this.replaceRules,
      logger: this.log.child("differ"),
    });
    const plan = createPlan(diffs, graph, {
      targets: options.targets,
      mode: options.mode,
      warnings: violations.filter((v) => v.severity === "warning"),
      logger: this.log.child("planner"),
    });
    if (observation) await this.persist(observation);
    return plan;
  }

  /**
   * Apply a plan. Every kind in the plan must have a provider before any
   * operation is dispatched.
   */
  async apply(plan: Plan, options: { signal?: AbortSignal } = {}): Promise<ApplyReport> {
    this.assertOpen();
    const missing = [
      ...new Set(planEntries(plan).filter((e) => !this.providers.has(e.key.kind)).map((e) => e.key.kind)),
    ];
    if (missing.length > 0) {
      throw new PlanningError(
        `No provider registered for kind(s): ${missing.join(", ")}`,
        "PROVIDER_NOT_FOUND",
      );
    }

    const executor = new Executor(
      { store: this.store, providers: this.providers, logger: this.log.child("executor") },
      {
        parallelism: this.config.parallelism,
        retry: this.config.retry,
        operationTimeoutMs: this.config.operationTimeoutMs,
      },
    );
    for (const listener of this.listeners) executor.on(listener);
    return executor.apply(plan, options);
  }

  /** Plan and apply in one call. */
  async provision(
    resources: readonly Resource[],
    options: ProvisionPlanOptions & { signal?: AbortSignal } = {},
  ): Promise<{ plan: Plan; report: ApplyReport }> {
    const plan = await this.plan(resources, options);
    const report = await this.apply(plan, { signal: options.signal });
    return { plan, report };
  }

  // ---------------------------------------------------------------------------
  // Refresh
  // ---------------------------------------------------------------------------

  /**
   * Ask providers that can observe resources for their current state and
   * update the records. A resource that no longer exists loses its record,
   * so the next plan creates it again.
   */
  async refresh(options: { signal?: AbortSignal } = {}): Promise<RefreshReport> {
    this.assertOpen();
    const observation = await this.observe(options.signal);
    await this.persist(observation);
    return observation.report;
  }

  /** Read every observable resource without touching the store. */
  private async observe(signal: AbortSignal = new AbortController().signal): Promise<Observation> {
    const observation: Observation = {
      report: { updated: [], removed: [], unchanged: [] },
      records: [],
      writes: [],
      removals: [],
    };
    const { report } = observation;

    for (const record of await this.store.list()) {
      const address = addressOf(record);
      const provider = this.providers.resolve(record.kind);
      if (!provider?.read) {
        report.unchanged.push(address);
        observation.records.push(record);
        continue;
      }

      let observed: ProviderReadResult | null;
      try {
        observed = await provider.read(record, { signal, attempt: 1, deadline: undefined });
      } catch (err) {
        throw new ExecutionError(`Refresh of "${address}" failed: ${formatErrorMessage(err)}`, provider.classify(err));
      }

      if (observed === null) {
        observation.removals.push(record);
        report.removed.push(address);
        continue;
      }

      const computed = observed.computed ?? record.computed;
      const same = observed.handle === record.handle
        && valuesEqual(observed.attributes, record.attributes)
        && valuesEqual(computed, record.computed);
      if (same) {
        report.unchanged.push(address);
        observation.records.push(record);
        continue;
      }

      const updated: StateRecord = {
        ...record,
        handle: observed.handle,
        attributes: observed.attributes,
        computed,
        updatedAt: new Date().toISOString(),
      };
      observation.writes.push(updated);
      observation.records.push(updated);
      report.updated.push(address);
    }
    return observation;
  }

  private async persist(observation: Observation): Promise<void> {
    for (const record of observation.removals) await this.store.delete(record);
    for (const record of observation.writes) await this.store.put(record);

    const { report } = observation;
    this.log.info("Refreshed state", {
      updated: report.updated.length,
      removed: report.removed.length,
      unchanged: report.unchanged.length,
    });
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new ProvisionError("Provisioner is not open; call open() or run() first", "STORE_CLOSED");
    }
  }
}
