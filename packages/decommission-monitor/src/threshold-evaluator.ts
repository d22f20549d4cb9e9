import {
  statusRank,
  type ActivitySample,
  type AlertStatus,
  type ThresholdPolicy,
  type TransitionReason
} from "@decom-watch/shared";

export interface EvaluationInput {
  status: AlertStatus;
  policy: ThresholdPolicy;
  sample: ActivitySample;
  nowMs: number;
  processStartMs: number;
  noDataSinceMs: number | null;
  lastActiveAtMs: number | null;
}

export interface EvaluationResult {
  proposed: AlertStatus;
  idleSeconds: number;
  reason: TransitionReason;
  noDataSinceMs: number | null;
  lastActiveAtMs: number | null;
  noDataExpired: boolean;
}

function idleSecondsSince(nowMs: number, sinceMs: number): number {
  return Math.max(0, Math.floor((nowMs - sinceMs) / 1000));
}

/**
 * Hysteresis classification. Raising uses the trigger bounds, clearing uses
 * the lower recovery bounds, and CRITICAL only ever steps down to WARNING.
 */
export function classifyIdle(current: AlertStatus, idleSeconds: number, policy: ThresholdPolicy): AlertStatus {
  if (current === "OK") {
    if (idleSeconds >= policy.criticalSeconds) return "CRITICAL";
    if (idleSeconds >= policy.warningSeconds) return "WARNING";
    return "OK";
  }

  if (current === "WARNING") {
    if (idleSeconds >= policy.criticalSeconds) return "CRITICAL";
    if (idleSeconds <= policy.warningRecoverySeconds) return "OK";
    return "WARNING";
  }

  if (idleSeconds <= policy.criticalRecoverySeconds) return "WARNING";
  return "CRITICAL";
}

export function evaluateActivity(input: EvaluationInput): EvaluationResult {
  const { sample, nowMs, policy, status } = input;

  if (sample.kind === "activity" && sample.sampleCount > 0) {
    const candidates = [sample.lastActiveAtMs, input.lastActiveAtMs].filter(
      (value): value is number => value !== null && Number.isFinite(value)
    );
    const lastActiveAtMs = candidates.length > 0 ? Math.max(...candidates) : null;
    // Unknown last activity counts as idle since the process started watching.
    const idleSeconds = idleSecondsSince(nowMs, lastActiveAtMs ?? input.processStartMs);

    return {
      proposed: classifyIdle(status, idleSeconds, policy),
      idleSeconds,
      reason: "idle",
      noDataSinceMs: null,
      lastActiveAtMs,
      noDataExpired: false
    };
  }

  const noDataSinceMs = input.noDataSinceMs ?? nowMs;
  const idleSeconds = idleSecondsSince(nowMs, input.lastActiveAtMs ?? input.processStartMs);
  const noDataExpired = nowMs - noDataSinceMs >= policy.noDataWindowSeconds * 1000;

  // Idle time since the last known activity is a lower bound, so it may escalate but never clear.
  const byKnownIdle = classifyIdle(status, idleSeconds, policy);
  const held = statusRank(byKnownIdle) > statusRank(status) ? byKnownIdle : status;

  return {
    proposed: noDataExpired ? classifyIdle(status, Number.POSITIVE_INFINITY, policy) : held,
    idleSeconds,
    reason: "no_data",
    noDataSinceMs,
    lastActiveAtMs: input.lastActiveAtMs,
    noDataExpired
  };
}
