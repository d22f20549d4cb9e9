import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import {
  createServiceMetrics,
  silentLogger,
  type MonitoredEntity,
  type NotificationEvent,
  type ServiceMetrics
} from "@decom-watch/shared";
import { AlertStateMachine } from "./alert-state-machine.js";
import { MemoryDeliveryStore } from "./delivery-store.js";
import { NotificationDispatcher, type DispatcherConfig } from "./notification-dispatcher.js";
import { resolveThresholdPolicy } from "./policy-registry.js";
import type { EvaluationResult } from "./threshold-evaluator.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const pagila: MonitoredEntity = { id: "pagila", ownerEmail: "development-team@example.com", criticality: "MEDIUM", scenario: "MIXED" };
const postgresAir: MonitoredEntity = {
  id: "postgres_air",
  ownerEmail: "operations-team@example.com",
  criticality: "CRITICAL",
  scenario: "LOGIC_HEAVY"
};

const warningEvent: NotificationEvent = {
  id: "pagila:OK->WARNING:2024-01-03T00:00:00.000Z",
  entityId: "pagila",
  fromStatus: "OK",
  toStatus: "WARNING",
  metricValue: 172_800,
  occurredAt: "2024-01-03T00:00:00.000Z",
  requiresManualReview: false,
  reason: "idle"
};

const criticalEvent: NotificationEvent = {
  id: "postgres_air:OK->CRITICAL:2024-01-02T00:00:00.000Z",
  entityId: "postgres_air",
  fromStatus: "OK",
  toStatus: "CRITICAL",
  metricValue: 86_400,
  occurredAt: "2024-01-02T00:00:00.000Z",
  requiresManualReview: true,
  reason: "idle"
};

interface CapturedRequest {
  url: string;
  idempotencyKey: string | null;
  body: unknown;
}

function captureFetch(statusFor: (url: string, call: number) => number): CapturedRequest[] {
  const captured: CapturedRequest[] = [];
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit) => {
    const url = String(input);
    captured.push({
      url,
      idempotencyKey: new Headers(init?.headers).get("x-idempotency-key"),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : null
    });
    const calls = captured.filter((item) => item.url === url).length;
    return new Response("{}", { status: statusFor(url, calls) });
  };
  return captured;
}

function createDispatcher(overrides: Partial<DispatcherConfig> = {}) {
  const store = new MemoryDeliveryStore();
  const metrics = createServiceMetrics("test", { defaultMetrics: false });
  const dispatcher = new NotificationDispatcher(
    {
      serviceName: "test",
      webhookUrl: "http://hooks.test/decommissioning",
      issueTrackerUrl: "http://issues.test/api/issues",
      retry: { timeoutMs: 200, retries: 2, backoffMs: 1, maxBackoffMs: 2 },
      ...overrides
    },
    store,
    silentLogger,
    metrics
  );
  return { dispatcher, store, metrics };
}

async function counterValue(metrics: ServiceMetrics, name: "notificationSentTotal" | "notificationFailedTotal" | "deliveryRetriesTotal", channel: string) {
  const snapshot = await metrics[name].get();
  return snapshot.values.find((item) => item.labels.channel === channel)?.value ?? 0;
}

describe("notification-dispatcher", () => {
  it("sends the webhook keyed by event id and skips issues for warnings", async () => {
    const captured = captureFetch(() => 200);
    const { dispatcher, store, metrics } = createDispatcher();

    const outcome = await dispatcher.dispatch(warningEvent, {
      entity: pagila,
      policy: resolveThresholdPolicy(pagila),
      lastActiveAtMs: null
    });

    assert.deepEqual(outcome.webhook, { status: "sent", attempts: 1 });
    assert.deepEqual(outcome.issue, { status: "not_required", attempts: 0 });
    assert.equal(outcome.mandatoryDisposition, false);
    assert.equal(outcome.escalation, undefined);
    assert.equal(captured.length, 1);
    assert.equal(captured[0]?.idempotencyKey, "pagila:OK->WARNING:2024-01-03T00:00:00.000Z");
    assert.deepEqual(captured[0]?.body, {
      database_name: "pagila",
      scenario_type: "MIXED",
      criticality: "MEDIUM",
      owner_email: "development-team@example.com",
      alert_timestamp: "2024-01-03T00:00:00.000Z",
      metric_value: 172_800,
      requires_manual_review: false
    });
    assert.deepEqual(
      store.all().map((record) => [record.channel, record.status]),
      [["webhook", "sent"]]
    );
    assert.equal(await counterValue(metrics, "notificationSentTotal", "webhook"), 1);
  });

  it("escalates and opens exactly one issue per critical manual-review transition", async () => {
    const captured = captureFetch(() => 201);
    const { dispatcher } = createDispatcher();
    const context = { entity: postgresAir, policy: resolveThresholdPolicy(postgresAir), lastActiveAtMs: null };

    const first = await dispatcher.dispatch(criticalEvent, context);
    const second = await dispatcher.dispatch(criticalEvent, context);

    assert.equal(first.mandatoryDisposition, true);
    assert.match(first.escalation ?? "", /This is a CRITICAL system requiring immediate review\./);
    assert.deepEqual(first.issue, { status: "sent", attempts: 1 });
    assert.deepEqual(second.issue, { status: "duplicate", attempts: 0 });

    const issueCalls = captured.filter((item) => item.url === "http://issues.test/api/issues");
    assert.equal(issueCalls.length, 1);
    assert.equal(issueCalls[0]?.idempotencyKey, "postgres_air:OK->CRITICAL:2024-01-02T00:00:00.000Z");
  });

  it("records a failed webhook with its attempt count and retries counter", async () => {
    captureFetch(() => 503);
    const { dispatcher, store, metrics } = createDispatcher();

    const outcome = await dispatcher.dispatch(warningEvent, {
      entity: pagila,
      policy: resolveThresholdPolicy(pagila),
      lastActiveAtMs: null
    });

    assert.deepEqual(outcome.webhook, {
      status: "failed",
      attempts: 3,
      error: "Request failed after 3 attempts: HTTP 503"
    });
    assert.equal(await counterValue(metrics, "deliveryRetriesTotal", "webhook"), 2);
    assert.equal(await counterValue(metrics, "notificationFailedTotal", "webhook"), 1);

    const failures = await store.listFailures(10);
    assert.equal(failures.length, 1);
    assert.equal(failures[0]?.eventId, "pagila:OK->WARNING:2024-01-03T00:00:00.000Z");
    assert.equal(failures[0]?.target, "http://hooks.test/decommissioning");
    assert.equal(failures[0]?.attempts, 3);
  });

  it("releases the issue claim after a failed send so a redelivery can create it", async () => {
    let issueHealthy = false;
    captureFetch((url) => (url.startsWith("http://issues.test") && !issueHealthy ? 500 : 200));
    const { dispatcher } = createDispatcher();
    const context = { entity: postgresAir, policy: resolveThresholdPolicy(postgresAir), lastActiveAtMs: null };

    const failed = await dispatcher.dispatch(criticalEvent, context);
    assert.equal(failed.issue.status, "failed");
    assert.equal(failed.webhook.status, "sent");

    issueHealthy = true;
    const retried = await dispatcher.dispatch(criticalEvent, context);
    assert.deepEqual(retried.issue, { status: "sent", attempts: 1 });
  });

  it("opens a new issue when a recreated state escalates again", async () => {
    captureFetch(() => 201);
    const { dispatcher } = createDispatcher();
    const policy = resolveThresholdPolicy(postgresAir);
    const machine = new AlertStateMachine();
    const critical: EvaluationResult = {
      proposed: "CRITICAL",
      idleSeconds: 86_400,
      reason: "idle",
      noDataSinceMs: null,
      lastActiveAtMs: null,
      noDataExpired: false
    };

    const issueStatuses: string[] = [];
    for (const nowMs of [Date.UTC(2024, 0, 2), Date.UTC(2024, 0, 9)]) {
      const outcome = machine.apply(postgresAir, policy, critical, nowMs);
      assert.equal(outcome.kind, "transition");
      if (outcome.kind === "transition") {
        const dispatched = await dispatcher.dispatch(outcome.event, { entity: postgresAir, policy, lastActiveAtMs: null });
        issueStatuses.push(dispatched.issue.status);
      }
      machine.discard("postgres_air");
    }

    assert.deepEqual(issueStatuses, ["sent", "sent"]);
  });

  it("logs mock routes instead of sending them", async () => {
    const captured = captureFetch(() => 200);
    const { dispatcher, store, metrics } = createDispatcher({
      webhookUrl: "mock://decommissioning-workflow",
      issueTrackerUrl: "mock://issue-tracker"
    });

    const outcome = await dispatcher.dispatch(criticalEvent, {
      entity: postgresAir,
      policy: resolveThresholdPolicy(postgresAir),
      lastActiveAtMs: null
    });

    assert.equal(captured.length, 0);
    assert.deepEqual(outcome.webhook, { status: "sent", attempts: 0 });
    assert.deepEqual(outcome.issue, { status: "sent", attempts: 0 });
    assert.equal(store.all().length, 2);
    assert.equal(await counterValue(metrics, "notificationSentTotal", "issue"), 1);
  });
});
