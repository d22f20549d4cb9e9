import type { AlertStatus } from "./types.js";

export function statusRank(status: AlertStatus): number {
  if (status === "OK") return 0;
  if (status === "WARNING") return 1;
  return 2;
}

// OK may jump straight to CRITICAL; recovery always steps down one level at a time.
export function isAllowedTransition(from: AlertStatus, to: AlertStatus): boolean {
  if (from === to) return false;
  return statusRank(to) > statusRank(from) || statusRank(from) - statusRank(to) === 1;
}
