import dotenv from "dotenv";

dotenv.config({ path: process.env.ENV_FILE ?? ".env.local" });
dotenv.config();

export function getEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined || value === "") {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function getOptionalEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}

export function getBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

export function getNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} is not a number: ${raw}`);
  }
  return value;
}

export interface ServiceRuntimeConfig {
  serviceName: string;
  port: number;
  nodeEnv: string;
  evaluationIntervalSec: number;
  evaluationConcurrency: number;
  metricWindowSec: number;
  metricTimeoutMs: number;
  apiTimeoutMs: number;
  apiRetries: number;
  apiBackoffMs: number;
  apiMaxBackoffMs: number;
  enableDeliveryStoreDb: boolean;
}

export function loadServiceRuntimeConfig(serviceName: string, defaultPort: number): ServiceRuntimeConfig {
  return {
    serviceName,
    port: getNumberEnv("PORT", defaultPort),
    nodeEnv: process.env.NODE_ENV ?? "development",
    evaluationIntervalSec: getNumberEnv("EVALUATION_INTERVAL_SEC", 300),
    evaluationConcurrency: getNumberEnv("EVALUATION_CONCURRENCY", 8),
    metricWindowSec: getNumberEnv("METRIC_WINDOW_SEC", 1800),
    metricTimeoutMs: getNumberEnv("METRIC_TIMEOUT_MS", 3000),
    apiTimeoutMs: getNumberEnv("API_TIMEOUT_MS", 3000),
    apiRetries: getNumberEnv("API_RETRIES", 3),
    apiBackoffMs: getNumberEnv("API_BACKOFF_MS", 300),
    apiMaxBackoffMs: getNumberEnv("API_MAX_BACKOFF_MS", 5000),
    enableDeliveryStoreDb: getBooleanEnv("ENABLE_DELIVERY_STORE_DB", false)
  };
}
