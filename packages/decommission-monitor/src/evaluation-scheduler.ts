import {
  describeError,
  recordEntityGauges,
  removeEntityGauges,
  type ActivitySample,
  type AlertState,
  type AlertStatus,
  type Logger,
  type MonitoredEntity,
  type NotificationEvent,
  type ServiceMetrics,
  type ThresholdPolicy
} from "@decom-watch/shared";
import type { AlertStateMachine } from "./alert-state-machine.js";
import type { MetricSource } from "./metric-source.js";
import type { DispatchContext, DispatchOutcome } from "./notification-dispatcher.js";
import type { PolicyRegistry, ReloadSummary } from "./policy-registry.js";
import { evaluateActivity } from "./threshold-evaluator.js";

export interface Dispatcher {
  dispatch(event: NotificationEvent, context: DispatchContext): Promise<DispatchOutcome>;
}

export interface SchedulerConfig {
  serviceName: string;
  intervalMs: number;
  concurrency: number;
  metricWindowSec: number;
}

export interface SchedulerDeps {
  registry: PolicyRegistry;
  states: AlertStateMachine;
  source: MetricSource;
  dispatcher: Dispatcher;
  logger: Logger;
  metrics: ServiceMetrics;
  now?: () => number;
  processStartMs?: number;
}

export type EntityEvaluationOutcome =
  | { entityId: string; kind: "transition"; event: NotificationEvent; dispatch: DispatchOutcome }
  | { entityId: string; kind: "duplicate_suppressed"; status: AlertStatus }
  | { entityId: string; kind: "discarded" }
  | { entityId: string; kind: "skipped_in_flight" }
  | { entityId: string; kind: "failed"; error: string };

export interface CycleSummary {
  at: string;
  ok: boolean;
  summary: string;
  outcomes: Record<EntityEvaluationOutcome["kind"], number>;
}

export interface EntitySnapshot {
  entity: MonitoredEntity;
  policy: ThresholdPolicy;
  state: AlertState | undefined;
}

function emptyCounts(): CycleSummary["outcomes"] {
  return {
    transition: 0,
    duplicate_suppressed: 0,
    discarded: 0,
    skipped_in_flight: 0,
    failed: 0
  };
}

/**
 * Runs one evaluation per registered database each interval. Databases are
 * evaluated concurrently up to `concurrency`; a database whose previous
 * evaluation is still running is skipped so its own events stay ordered.
 */
export class EvaluationScheduler {
  private readonly inFlight = new Set<string>();
  private readonly now: () => number;
  private readonly processStartMs: number;
  private timer: NodeJS.Timeout | undefined;
  private lastCycle: CycleSummary = { at: "", ok: true, summary: "not started", outcomes: emptyCounts() };

  constructor(
    private readonly config: SchedulerConfig,
    private readonly deps: SchedulerDeps
  ) {
    this.now = deps.now ?? Date.now;
    this.processStartMs = deps.processStartMs ?? this.now();
    const startMs = this.now();
    for (const entity of deps.registry.listEntities()) {
      deps.states.ensure(entity.id, startMs);
    }
    deps.metrics.registeredEntities.labels(config.serviceName).set(deps.registry.size);
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.config.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  getLastCycle(): CycleSummary {
    return this.lastCycle;
  }

  async runCycle(): Promise<CycleSummary> {
    const cycleStart = Date.now();
    const queue = this.deps.registry.listEntities().map((entity) => entity.id);
    const counts = emptyCounts();
    const workerCount = Math.max(1, Math.min(Math.floor(this.config.concurrency), queue.length));

    const worker = async (): Promise<void> => {
      for (let entityId = queue.shift(); entityId !== undefined; entityId = queue.shift()) {
        const outcome = await this.evaluateEntity(entityId);
        counts[outcome.kind] += 1;
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    this.lastCycle = {
      at: new Date(this.now()).toISOString(),
      ok: counts.failed === 0,
      summary: `cycle completed in ${Date.now() - cycleStart}ms`,
      outcomes: counts
    };
    this.deps.logger.info("evaluation cycle completed", { ...counts, duration_ms: Date.now() - cycleStart });
    return this.lastCycle;
  }

  async evaluateEntity(entityId: string): Promise<EntityEvaluationOutcome> {
    if (this.inFlight.has(entityId)) {
      this.countEvaluation("skipped_in_flight");
      return { entityId, kind: "skipped_in_flight" };
    }

    this.inFlight.add(entityId);
    try {
      const outcome = await this.evaluateOnce(entityId);
      this.countEvaluation(outcome.kind);
      return outcome;
    } catch (error) {
      const message = describeError(error);
      this.countEvaluation("failed");
      this.deps.logger.error("entity evaluation failed", { entity_id: entityId, error: message });
      return { entityId, kind: "failed", error: message };
    } finally {
      this.inFlight.delete(entityId);
    }
  }

  /** Prunes state for databases a reload removed and seeds state for new ones. */
  handleReload(summary: ReloadSummary): void {
    const nowMs = this.now();
    for (const entityId of summary.removed) {
      this.deps.states.discard(entityId);
      removeEntityGauges(this.deps.metrics, entityId);
    }
    for (const entityId of summary.added) {
      this.deps.states.ensure(entityId, nowMs);
    }
    this.deps.metrics.registeredEntities.labels(this.config.serviceName).set(this.deps.registry.size);
  }

  snapshot(): EntitySnapshot[] {
    return this.deps.registry.listEntities().map((entity) => this.describe(entity));
  }

  describeEntity(entityId: string): EntitySnapshot | undefined {
    const registered = this.deps.registry.get(entityId);
    return registered ? this.describe(registered.entity) : undefined;
  }

  private describe(entity: MonitoredEntity): EntitySnapshot {
    return {
      entity,
      policy: this.deps.registry.resolve(entity),
      state: this.deps.states.get(entity.id)
    };
  }

  private async evaluateOnce(entityId: string): Promise<EntityEvaluationOutcome> {
    if (!this.deps.registry.has(entityId)) {
      return { entityId, kind: "discarded" };
    }

    const sample = await this.fetchSample(entityId);

    // The registry may have been reloaded while the fetch was pending.
    const registered = this.deps.registry.get(entityId);
    if (!registered) {
      this.deps.logger.info("discarding evaluation for removed entity", { entity_id: entityId });
      return { entityId, kind: "discarded" };
    }

    const { entity, policy } = registered;
    const nowMs = this.now();
    const state = this.deps.states.ensure(entityId, nowMs);
    const evaluation = evaluateActivity({
      status: state.status,
      policy,
      sample,
      nowMs,
      processStartMs: this.processStartMs,
      noDataSinceMs: state.noDataSinceMs,
      lastActiveAtMs: state.lastActiveAtMs
    });

    const applied = this.deps.states.apply(entity, policy, evaluation, nowMs);
    recordEntityGauges(this.deps.metrics, entityId, applied.state.status, applied.state.idleSeconds);

    if (applied.kind === "duplicate_suppressed") {
      this.deps.metrics.duplicateSuppressedTotal.labels(this.config.serviceName, entityId).inc();
      return { entityId, kind: "duplicate_suppressed", status: applied.state.status };
    }

    const { event } = applied;
    this.deps.metrics.transitionsTotal
      .labels(this.config.serviceName, entityId, event.fromStatus, event.toStatus)
      .inc();

    const dispatch = await this.deps.dispatcher.dispatch(event, {
      entity,
      policy,
      lastActiveAtMs: applied.state.lastActiveAtMs
    });
    return { entityId, kind: "transition", event, dispatch };
  }

  private async fetchSample(entityId: string): Promise<ActivitySample> {
    try {
      return await this.deps.source.fetchActivity(entityId, this.config.metricWindowSec);
    } catch (error) {
      const message = describeError(error);
      this.deps.metrics.metricFetchFailedTotal.labels(this.config.serviceName, entityId).inc();
      this.deps.logger.warn("metric fetch failed, treating as no data", { entity_id: entityId, error: message });
      return { kind: "no_data", reason: message };
    }
  }

  private countEvaluation(kind: EntityEvaluationOutcome["kind"]): void {
    this.deps.metrics.evaluationsTotal.labels(this.config.serviceName, kind).inc();
  }
}
