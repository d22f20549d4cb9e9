export const CRITICALITIES = ["LOW", "MEDIUM", "CRITICAL"] as const;
export const SCENARIO_TYPES = ["CONFIG_ONLY", "MIXED", "LOGIC_HEAVY"] as const;
export const ALERT_STATUSES = ["OK", "WARNING", "CRITICAL"] as const;

export type Criticality = (typeof CRITICALITIES)[number];

export type ScenarioType = (typeof SCENARIO_TYPES)[number];

export type AlertStatus = (typeof ALERT_STATUSES)[number];

export interface MonitoredEntity {
  id: string;
  ownerEmail: string;
  criticality: Criticality;
  scenario: ScenarioType;
  requireManualReview?: boolean;
}

export interface ThresholdPolicy {
  warningSeconds: number;
  criticalSeconds: number;
  warningRecoverySeconds: number;
  criticalRecoverySeconds: number;
  noDataWindowSeconds: number;
  requiresManualReview: boolean;
  autoReviewEligible: boolean;
}

export type ActivitySample =
  | {
      kind: "activity";
      lastActiveAtMs: number | null;
      sampleCount: number;
    }
  | {
      kind: "no_data";
      reason: string;
    };

export interface AlertState {
  entityId: string;
  status: AlertStatus;
  sinceMs: number;
  lastEvaluatedMs: number;
  noDataSinceMs: number | null;
  lastActiveAtMs: number | null;
  idleSeconds: number;
  transitionCount: number;
}

export type TransitionReason = "idle" | "no_data";

export interface NotificationEvent {
  id: string;
  entityId: string;
  fromStatus: AlertStatus;
  toStatus: AlertStatus;
  metricValue: number;
  occurredAt: string;
  requiresManualReview: boolean;
  reason: TransitionReason;
}

export interface WebhookPayload {
  database_name: string;
  scenario_type: ScenarioType;
  criticality: Criticality;
  owner_email: string;
  alert_timestamp: string;
  metric_value: number;
  requires_manual_review: boolean;
}

export interface IssuePayload {
  title: string;
  body: string;
  labels: string[];
  dedupKey: string;
}

export interface CircuitBreakerState {
  state: "closed" | "open" | "half_open";
  failureCount: number;
  lastFailureAt?: string;
  lastLatencyMs: number;
}
