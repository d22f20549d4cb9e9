import * as v from "valibot";
import {
  CircuitBreaker,
  MetricFetchError,
  describeError,
  type ActivitySample,
  type CircuitBreakerState
} from "@decom-watch/shared";

export interface MetricSource {
  fetchActivity(entityId: string, windowSec: number): Promise<ActivitySample>;
}

export interface HttpMetricSourceConfig {
  baseUrl: string;
  timeoutMs: number;
  apiKey?: string;
}

const activityResponseSchema = v.object({
  lastActiveAt: v.nullable(v.string()),
  sampleCount: v.pipe(v.number(), v.integer(), v.minValue(0))
});

/**
 * Pulls last-activity telemetry for one database from the metrics backend.
 * Failures surface as MetricFetchError; an open breaker reports no data without calling out.
 */
export class HttpMetricSource implements MetricSource {
  constructor(
    private readonly config: HttpMetricSourceConfig,
    private readonly breaker = new CircuitBreaker({ failureThreshold: 5, latencyThresholdMs: 5000, resetTimeoutMs: 30_000 })
  ) {}

  breakerState(): CircuitBreakerState {
    return this.breaker.snapshot();
  }

  async fetchActivity(entityId: string, windowSec: number): Promise<ActivitySample> {
    if (!this.breaker.canRequest()) {
      return { kind: "no_data", reason: "metric source circuit open" };
    }

    const url = new URL("/api/v1/activity", this.config.baseUrl);
    url.searchParams.set("entity", entityId);
    url.searchParams.set("window", String(windowSec));

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const startedAt = Date.now();
    const timeoutError = () =>
      new MetricFetchError(entityId, `activity fetch failed: timeout after ${this.config.timeoutMs}ms`);

    // The timer stays armed until the body is read; a stalled body is a timeout too.
    let body: unknown;
    try {
      let response: Response;
      try {
        response = await untilAborted(
          fetch(url, {
            method: "GET",
            signal: controller.signal,
            headers: {
              accept: "application/json",
              ...(this.config.apiKey ? { authorization: `Bearer ${this.config.apiKey}` } : {})
            }
          }),
          controller.signal
        );
      } catch (error) {
        this.breaker.recordFailure(Date.now() - startedAt);
        if (controller.signal.aborted) {
          throw timeoutError();
        }
        throw new MetricFetchError(entityId, `activity fetch failed: ${describeError(error)}`);
      }

      if (response.status === 404 || response.status === 204) {
        this.breaker.recordSuccess(Date.now() - startedAt);
        return { kind: "no_data", reason: `metric source returned ${response.status}` };
      }
      if (!response.ok) {
        this.breaker.recordFailure(Date.now() - startedAt);
        throw new MetricFetchError(entityId, `activity fetch failed: HTTP ${response.status}`);
      }

      try {
        body = await untilAborted(response.json(), controller.signal);
      } catch (error) {
        this.breaker.recordFailure(Date.now() - startedAt);
        if (controller.signal.aborted) {
          throw timeoutError();
        }
        throw new MetricFetchError(entityId, `activity response is not JSON: ${describeError(error)}`);
      }
    } finally {
      clearTimeout(timer);
    }

    const latencyMs = Date.now() - startedAt;
    const parsed = v.safeParse(activityResponseSchema, body);
    if (!parsed.success) {
      this.breaker.recordFailure(latencyMs);
      throw new MetricFetchError(entityId, `activity response malformed: ${parsed.issues[0].message}`);
    }

    this.breaker.recordSuccess(latencyMs);
    return toSample(entityId, parsed.output);
  }
}

function toSample(entityId: string, output: v.InferOutput<typeof activityResponseSchema>): ActivitySample {
  if (output.sampleCount === 0) {
    return { kind: "no_data", reason: "no samples in window" };
  }
  if (output.lastActiveAt === null) {
    return { kind: "activity", lastActiveAtMs: null, sampleCount: output.sampleCount };
  }
  const lastActiveAtMs = Date.parse(output.lastActiveAt);
  if (!Number.isFinite(lastActiveAtMs)) {
    throw new MetricFetchError(entityId, `activity response has invalid lastActiveAt: ${output.lastActiveAt}`);
  }
  return { kind: "activity", lastActiveAtMs, sampleCount: output.sampleCount };
}

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
