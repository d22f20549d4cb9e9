export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class MetricFetchError extends Error {
  constructor(
    readonly entityId: string,
    message: string
  ) {
    super(message);
    this.name = "MetricFetchError";
  }
}

export class DeliveryError extends Error {
  constructor(
    readonly target: string,
    readonly attempts: number,
    message: string
  ) {
    super(message);
    this.name = "DeliveryError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
