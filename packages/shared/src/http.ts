import { DeliveryError, describeError } from "./errors.js";
import type { CircuitBreakerState } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryPolicy {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface RetryHooks {
  onRetry?: (attempt: number, error: string, delayMs: number) => void;
}

export interface RetryResult {
  response: Response;
  attempts: number;
}

const defaultPolicy: RetryPolicy = {
  timeoutMs: 3000,
  retries: 3,
  backoffMs: 300,
  maxBackoffMs: 5000
};

export function computeBackoffMs(attempt: number, policy: Pick<RetryPolicy, "backoffMs" | "maxBackoffMs">): number {
  return Math.min(policy.maxBackoffMs, policy.backoffMs * Math.pow(2, attempt));
}

/**
 * Sends a request until it answers 2xx, aborting each attempt after `timeoutMs`.
 * Throws a DeliveryError carrying the attempt count once `retries` is exhausted.
 */
export async function requestWithRetry(
  url: string,
  init: RequestInit,
  policy: Partial<RetryPolicy> = {},
  hooks: RetryHooks = {}
): Promise<RetryResult> {
  const merged = { ...defaultPolicy, ...policy };
  const retries = Math.max(0, Math.floor(merged.retries));
  let lastError = "request failed";

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), merged.timeoutMs);

    try {
      const response = await fetch(url, {
        ...init,
        signal: controller.signal,
        headers: {
          "content-type": "application/json",
          ...(init.headers ?? {})
        }
      });

      clearTimeout(timer);

      if (response.ok) {
        return { response, attempts: attempt + 1 };
      }

      lastError = `HTTP ${response.status}`;
    } catch (error) {
      clearTimeout(timer);
      lastError = controller.signal.aborted ? `timeout after ${merged.timeoutMs}ms` : describeError(error);
    }

    if (attempt < retries) {
      const backoff = computeBackoffMs(attempt, merged);
      hooks.onRetry?.(attempt + 1, lastError, backoff);
      await sleep(backoff);
    }
  }

  throw new DeliveryError(url, retries + 1, `Request failed after ${retries + 1} attempts: ${lastError}`);
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  latencyThresholdMs: number;
  resetTimeoutMs: number;
}

export class CircuitBreaker {
  private state: CircuitBreakerState["state"] = "closed";
  private failureCount = 0;
  private lastFailureAtMs: number | undefined;
  private openedAtMs: number | undefined;
  private lastLatencyMs = 0;
  private readonly options: CircuitBreakerOptions;

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.options = {
      failureThreshold: options.failureThreshold ?? 5,
      latencyThresholdMs: options.latencyThresholdMs ?? 5000,
      resetTimeoutMs: options.resetTimeoutMs ?? 30_000
    };
  }

  canRequest(nowMs = Date.now()): boolean {
    if (this.state === "open") {
      if (this.openedAtMs !== undefined && nowMs - this.openedAtMs >= this.options.resetTimeoutMs) {
        this.state = "half_open";
        return true;
      }
      return false;
    }
    return true;
  }

  recordSuccess(latencyMs: number): void {
    this.lastLatencyMs = latencyMs;
    this.failureCount = 0;
    this.state = "closed";
    this.openedAtMs = undefined;
  }

  recordFailure(latencyMs: number, nowMs = Date.now()): void {
    this.lastLatencyMs = latencyMs;
    this.failureCount += 1;
    this.lastFailureAtMs = nowMs;

    if (
      this.state === "half_open" ||
      this.failureCount >= this.options.failureThreshold ||
      latencyMs > this.options.latencyThresholdMs
    ) {
      this.state = "open";
      this.openedAtMs = nowMs;
    }
  }

  snapshot(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureAt: this.lastFailureAtMs === undefined ? undefined : new Date(this.lastFailureAtMs).toISOString(),
      lastLatencyMs: this.lastLatencyMs
    };
  }
}
