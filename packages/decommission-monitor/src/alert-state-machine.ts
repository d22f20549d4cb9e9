import {
  isAllowedTransition,
  type AlertState,
  type MonitoredEntity,
  type NotificationEvent,
  type ThresholdPolicy
} from "@decom-watch/shared";
import type { EvaluationResult } from "./threshold-evaluator.js";

export type ApplyOutcome =
  | { kind: "transition"; event: NotificationEvent; state: AlertState }
  | { kind: "duplicate_suppressed"; state: AlertState };

export class InvalidTransitionError extends Error {
  constructor(entityId: string, from: string, to: string) {
    super(`Illegal alert transition for ${entityId}: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

function initialState(entityId: string, nowMs: number): AlertState {
  return {
    entityId,
    status: "OK",
    sinceMs: nowMs,
    lastEvaluatedMs: nowMs,
    noDataSinceMs: null,
    lastActiveAtMs: null,
    idleSeconds: 0,
    transitionCount: 0
  };
}

/**
 * Per-entity alert states keyed by entity id. Only `apply` changes a status,
 * and it emits an event exactly when the status changes.
 */
export class AlertStateMachine {
  private readonly states = new Map<string, AlertState>();

  ensure(entityId: string, nowMs: number): AlertState {
    const existing = this.states.get(entityId);
    if (existing) {
      return { ...existing };
    }
    const created = initialState(entityId, nowMs);
    this.states.set(entityId, created);
    return { ...created };
  }

  get(entityId: string): AlertState | undefined {
    const state = this.states.get(entityId);
    return state ? { ...state } : undefined;
  }

  apply(
    entity: MonitoredEntity,
    policy: ThresholdPolicy,
    evaluation: EvaluationResult,
    nowMs: number
  ): ApplyOutcome {
    const current = this.states.get(entity.id) ?? initialState(entity.id, nowMs);
    const changed = evaluation.proposed !== current.status;

    if (changed && !isAllowedTransition(current.status, evaluation.proposed)) {
      throw new InvalidTransitionError(entity.id, current.status, evaluation.proposed);
    }

    const next: AlertState = {
      ...current,
      lastEvaluatedMs: nowMs,
      noDataSinceMs: evaluation.noDataSinceMs,
      lastActiveAtMs: evaluation.lastActiveAtMs,
      idleSeconds: evaluation.idleSeconds
    };

    if (!changed) {
      this.states.set(entity.id, next);
      return { kind: "duplicate_suppressed", state: { ...next } };
    }

    next.status = evaluation.proposed;
    next.sinceMs = nowMs;
    next.transitionCount = current.transitionCount + 1;
    this.states.set(entity.id, next);

    const occurredAt = new Date(nowMs).toISOString();
    // transitionCount restarts with the state on reload or restart; the id must not.
    const event: NotificationEvent = {
      id: `${entity.id}:${current.status}->${next.status}:${occurredAt}`,
      entityId: entity.id,
      fromStatus: current.status,
      toStatus: next.status,
      metricValue: evaluation.idleSeconds,
      occurredAt,
      requiresManualReview: policy.requiresManualReview,
      reason: evaluation.reason
    };

    return { kind: "transition", event, state: { ...next } };
  }

  discard(entityId: string): boolean {
    return this.states.delete(entityId);
  }

  prune(activeIds: ReadonlySet<string>): string[] {
    const removed: string[] = [];
    for (const entityId of this.states.keys()) {
      if (!activeIds.has(entityId)) {
        this.states.delete(entityId);
        removed.push(entityId);
      }
    }
    return removed;
  }

  snapshot(): AlertState[] {
    return [...this.states.values()].map((state) => ({ ...state }));
  }
}
