import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics
} from "prom-client";
import { ALERT_STATUSES, type AlertStatus } from "./types.js";

export interface ServiceMetrics {
  registry: Registry;
  evaluationsTotal: Counter<string>;
  transitionsTotal: Counter<string>;
  duplicateSuppressedTotal: Counter<string>;
  metricFetchFailedTotal: Counter<string>;
  notificationSentTotal: Counter<string>;
  notificationFailedTotal: Counter<string>;
  deliveryRetriesTotal: Counter<string>;
  policyReloadTotal: Counter<string>;
  idleSeconds: Gauge<string>;
  alertStatus: Gauge<string>;
  registeredEntities: Gauge<string>;
  apiLatencyMs: Histogram<string>;
  dbConnections: Gauge<string>;
}

export function createServiceMetrics(serviceName: string, options: { defaultMetrics?: boolean } = {}): ServiceMetrics {
  const registry = new Registry();
  if (options.defaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const evaluationsTotal = new Counter({
    name: "decom_evaluations_total",
    help: "Entity evaluations by outcome",
    labelNames: ["service", "outcome"],
    registers: [registry]
  });

  const transitionsTotal = new Counter({
    name: "decom_transitions_total",
    help: "Alert status transitions",
    labelNames: ["service", "entity", "from", "to"],
    registers: [registry]
  });

  const duplicateSuppressedTotal = new Counter({
    name: "decom_duplicate_suppressed_total",
    help: "Evaluations that reconfirmed the current status without notifying",
    labelNames: ["service", "entity"],
    registers: [registry]
  });

  const metricFetchFailedTotal = new Counter({
    name: "decom_metric_fetch_failed_total",
    help: "Metric source fetches that failed or timed out",
    labelNames: ["service", "entity"],
    registers: [registry]
  });

  const notificationSentTotal = new Counter({
    name: "decom_notification_sent_total",
    help: "Total delivered notifications",
    labelNames: ["service", "channel"],
    registers: [registry]
  });

  const notificationFailedTotal = new Counter({
    name: "decom_notification_failed_total",
    help: "Total notifications that exhausted their retries",
    labelNames: ["service", "channel"],
    registers: [registry]
  });

  const deliveryRetriesTotal = new Counter({
    name: "decom_delivery_retries_total",
    help: "Delivery attempts that failed and were retried",
    labelNames: ["service", "channel"],
    registers: [registry]
  });

  const policyReloadTotal = new Counter({
    name: "decom_policy_reload_total",
    help: "Policy registry reloads by result",
    labelNames: ["service", "result"],
    registers: [registry]
  });

  const idleSeconds = new Gauge({
    name: "decom_idle_seconds",
    help: "Current idle duration per monitored database",
    labelNames: ["entity"],
    registers: [registry]
  });

  const alertStatus = new Gauge({
    name: "decom_alert_status",
    help: "Current alert status per monitored database (1 for the active status)",
    labelNames: ["entity", "status"],
    registers: [registry]
  });

  const registeredEntities = new Gauge({
    name: "decom_registered_entities",
    help: "Databases in the active policy registry",
    labelNames: ["service"],
    registers: [registry]
  });

  const apiLatencyMs = new Histogram({
    name: "decom_api_latency_ms",
    help: "API latency in milliseconds",
    labelNames: ["service", "route", "method", "status"],
    buckets: [50, 100, 200, 500, 1000, 2000, 5000, 10000],
    registers: [registry]
  });

  const dbConnections = new Gauge({
    name: "decom_db_connections",
    help: "Current DB connections in pool",
    labelNames: ["service"],
    registers: [registry]
  });

  dbConnections.labels(serviceName).set(0);
  registeredEntities.labels(serviceName).set(0);

  return {
    registry,
    evaluationsTotal,
    transitionsTotal,
    duplicateSuppressedTotal,
    metricFetchFailedTotal,
    notificationSentTotal,
    notificationFailedTotal,
    deliveryRetriesTotal,
    policyReloadTotal,
    idleSeconds,
    alertStatus,
    registeredEntities,
    apiLatencyMs,
    dbConnections
  };
}

export function recordEntityGauges(
  metrics: ServiceMetrics,
  entityId: string,
  status: AlertStatus,
  idleSeconds: number
): void {
  metrics.idleSeconds.labels(entityId).set(idleSeconds);
  for (const candidate of ALERT_STATUSES) {
    metrics.alertStatus.labels(entityId, candidate).set(candidate === status ? 1 : 0);
  }
}

export function removeEntityGauges(metrics: ServiceMetrics, entityId: string): void {
  metrics.idleSeconds.remove(entityId);
  for (const candidate of ALERT_STATUSES) {
    metrics.alertStatus.remove(entityId, candidate);
  }
}
