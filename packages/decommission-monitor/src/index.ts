import path from "node:path";
import Fastify from "fastify";
import {
  ConfigError,
  closeDbPool,
  createLogger,
  createServiceMetrics,
  describeError,
  getDbPool,
  getEnv,
  getOptionalEnv,
  loadServiceRuntimeConfig,
  type DbPool
} from "@decom-watch/shared";
import { AlertStateMachine } from "./alert-state-machine.js";
import { MemoryDeliveryStore, PgDeliveryStore, type DeliveryStore } from "./delivery-store.js";
import { EvaluationScheduler } from "./evaluation-scheduler.js";
import { HttpMetricSource } from "./metric-source.js";
import { NotificationDispatcher } from "./notification-dispatcher.js";
import { PolicyRegistry, readPolicyDocument, type ReloadSummary } from "./policy-registry.js";

const runtime = loadServiceRuntimeConfig("decommission-monitor", Number(process.env.DECOMMISSION_MONITOR_PORT ?? 3020));
const logger = createLogger(runtime.serviceName);
const metrics = createServiceMetrics(runtime.serviceName);

const policyPath = getEnv("POLICY_CONFIG_PATH", path.resolve("config/policy/databases.json"));
const metricsBaseUrl = getEnv("METRICS_BASE_URL", "http://localhost:9400");
const webhookUrl = getEnv("WEBHOOK_URL", "mock://decommissioning-workflow");
const issueTrackerUrl = getEnv("ISSUE_TRACKER_URL", "mock://issue-tracker");

const app = Fastify({ logger: false });

let scheduler: EvaluationScheduler | undefined;
let registry: PolicyRegistry | undefined;
let store: DeliveryStore = new MemoryDeliveryStore();
let dbPool: DbPool | undefined;

async function reloadPolicy(trigger: string): Promise<ReloadSummary> {
  if (!registry || !scheduler) {
    throw new Error("service not started");
  }
  try {
    const document = await readPolicyDocument(policyPath);
    const summary = registry.reload(document);
    scheduler.handleReload(summary);
    metrics.policyReloadTotal.labels(runtime.serviceName, "applied").inc();
    logger.info("policy reloaded", { trigger, ...summary });
    return summary;
  } catch (error) {
    metrics.policyReloadTotal.labels(runtime.serviceName, "rejected").inc();
    logger.error("policy reload rejected, keeping previous policy", {
      trigger,
      generation: registry.generation,
      error: describeError(error)
    });
    throw error;
  }
}

app.addHook("onRequest", async (request) => {
  (request as { startedAt?: number }).startedAt = Date.now();
});

app.addHook("onResponse", async (request, reply) => {
  const startAt = (request as { startedAt?: number }).startedAt ?? Date.now();
  const route = request.routeOptions.url ?? request.url;
  metrics.apiLatencyMs.labels(runtime.serviceName, route, request.method, String(reply.statusCode)).observe(Date.now() - startAt);
});

app.get("/healthz", async () => {
  const lastCycle = scheduler?.getLastCycle();
  return {
    status: lastCycle?.ok === false ? "degraded" : "ok",
    service: runtime.serviceName,
    policyGeneration: registry?.generation ?? 0,
    entities: registry?.size ?? 0,
    lastCycle
  };
});

app.get("/metrics", async (_, reply) => {
  if (dbPool) {
    metrics.dbConnections.labels(runtime.serviceName).set(dbPool.totalCount);
  }
  reply.header("content-type", metrics.registry.contentType);
  return metrics.registry.metrics();
});

app.get("/api/v1/entities", async () => {
  return { items: scheduler?.snapshot() ?? [] };
});

app.get<{ Params: { entityId: string } }>("/api/v1/entities/:entityId", async (request, reply) => {
  const snapshot = scheduler?.describeEntity(request.params.entityId);
  if (!snapshot) {
    reply.status(404);
    return { error: "entity not monitored" };
  }
  return snapshot;
});

app.get<{ Querystring: { limit?: string } }>("/api/v1/deliveries/failed", async (request) => {
  const limit = Math.min(500, Math.max(1, Number(request.query.limit ?? 50) || 50));
  return { items: await store.listFailures(limit) };
});

app.post("/internal/reload", async (_, reply) => {
  try {
    const summary = await reloadPolicy("http");
    return { status: "applied", ...summary };
  } catch (error) {
    reply.status(error instanceof ConfigError ? 400 : 500);
    return {
      status: "rejected",
      error: describeError(error),
      issues: error instanceof ConfigError ? error.issues : []
    };
  }
});

app.post("/internal/run-cycle", async () => {
  if (!scheduler) {
    return { status: "not_started" };
  }
  const lastCycle = await scheduler.runCycle();
  return { status: "ok", lastCycle };
});

async function start(): Promise<void> {
  registry = new PolicyRegistry(await readPolicyDocument(policyPath));

  if (runtime.enableDeliveryStoreDb) {
    dbPool = getDbPool();
    const pgStore = new PgDeliveryStore(dbPool);
    await pgStore.ensureSchema();
    store = pgStore;
  }

  const dispatcher = new NotificationDispatcher(
    {
      serviceName: runtime.serviceName,
      webhookUrl,
      issueTrackerUrl,
      ccEmail: getOptionalEnv("NOTIFY_CC_EMAIL"),
      retry: {
        timeoutMs: runtime.apiTimeoutMs,
        retries: runtime.apiRetries,
        backoffMs: runtime.apiBackoffMs,
        maxBackoffMs: runtime.apiMaxBackoffMs
      }
    },
    store,
    logger,
    metrics
  );

  scheduler = new EvaluationScheduler(
    {
      serviceName: runtime.serviceName,
      intervalMs: runtime.evaluationIntervalSec * 1000,
      concurrency: runtime.evaluationConcurrency,
      metricWindowSec: runtime.metricWindowSec
    },
    {
      registry,
      states: new AlertStateMachine(),
      source: new HttpMetricSource({
        baseUrl: metricsBaseUrl,
        timeoutMs: runtime.metricTimeoutMs,
        apiKey: getOptionalEnv("METRICS_API_KEY")
      }),
      dispatcher,
      logger,
      metrics
    }
  );

  scheduler.start();
  await app.listen({ host: "0.0.0.0", port: runtime.port });
  logger.info("service started", {
    port: runtime.port,
    entities: registry.size,
    intervalSec: runtime.evaluationIntervalSec,
    deliveryStore: runtime.enableDeliveryStoreDb ? "postgres" : "memory"
  });
  void scheduler.runCycle();
}

async function shutdown(signal: string): Promise<void> {
  logger.warn("shutdown signal", { signal });
  scheduler?.stop();
  await app.close();
  await closeDbPool();
  process.exit(0);
}

process.on("SIGHUP", () => {
  reloadPolicy("SIGHUP").catch((error: unknown) => {
    logger.debug("SIGHUP reload not applied", { error: describeError(error) });
  });
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

start().catch(async (error) => {
  logger.error("service start failed", { error: describeError(error) });
  await closeDbPool();
  process.exit(1);
});
