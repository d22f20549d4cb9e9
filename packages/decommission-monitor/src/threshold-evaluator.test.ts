import assert from "node:assert/strict";
import { describe, it } from "node:test";
import type { ActivitySample, AlertStatus } from "@decom-watch/shared";
import { resolveThresholdPolicy } from "./policy-registry.js";
import { classifyIdle, evaluateActivity } from "./threshold-evaluator.js";

// warning 172800, critical 259200, warning recovery 138240, critical recovery 207360
const policy = resolveThresholdPolicy({ criticality: "MEDIUM", scenario: "MIXED" });
const startMs = Date.UTC(2024, 0, 1);
const day = 86_400_000;

function activityAt(lastActiveAtMs: number | null): ActivitySample {
  return { kind: "activity", lastActiveAtMs, sampleCount: 4 };
}

describe("classifyIdle", () => {
  const cases: Array<[AlertStatus, number, AlertStatus]> = [
    ["OK", 172_799, "OK"],
    ["OK", 172_800, "WARNING"],
    ["OK", 259_200, "CRITICAL"],
    ["WARNING", 259_199, "WARNING"],
    ["WARNING", 259_200, "CRITICAL"],
    ["WARNING", 138_241, "WARNING"],
    ["WARNING", 138_240, "OK"],
    ["CRITICAL", 207_361, "CRITICAL"],
    ["CRITICAL", 207_360, "WARNING"],
    ["CRITICAL", 0, "WARNING"]
  ];

  for (const [current, idle, expected] of cases) {
    it(`${current} at ${idle}s idle -> ${expected}`, () => {
      assert.equal(classifyIdle(current, idle, policy), expected);
    });
  }

  it("holds WARNING between the recovery and trigger bounds", () => {
    assert.equal(classifyIdle("OK", 150_000, policy), "OK");
    assert.equal(classifyIdle("WARNING", 150_000, policy), "WARNING");
  });
});

describe("evaluateActivity", () => {
  it("measures idle time from the last activity", () => {
    const result = evaluateActivity({
      status: "OK",
      policy,
      sample: activityAt(startMs),
      nowMs: startMs + 2 * day,
      processStartMs: startMs,
      noDataSinceMs: null,
      lastActiveAtMs: null
    });

    assert.deepEqual(result, {
      proposed: "WARNING",
      idleSeconds: 172_800,
      reason: "idle",
      noDataSinceMs: null,
      lastActiveAtMs: startMs,
      noDataExpired: false
    });
  });

  it("treats unknown last activity as idle since process start", () => {
    const result = evaluateActivity({
      status: "OK",
      policy,
      sample: activityAt(null),
      nowMs: startMs + 3 * day,
      processStartMs: startMs,
      noDataSinceMs: null,
      lastActiveAtMs: null
    });

    assert.equal(result.idleSeconds, 259_200);
    assert.equal(result.proposed, "CRITICAL");
    assert.equal(result.lastActiveAtMs, null);
  });

  it("never moves last activity backwards", () => {
    const result = evaluateActivity({
      status: "OK",
      policy,
      sample: activityAt(startMs),
      nowMs: startMs + 2 * day,
      processStartMs: startMs,
      noDataSinceMs: null,
      lastActiveAtMs: startMs + day
    });

    assert.equal(result.lastActiveAtMs, startMs + day);
    assert.equal(result.idleSeconds, 86_400);
    assert.equal(result.proposed, "OK");
  });

  it("clamps idle time to zero under clock skew", () => {
    const result = evaluateActivity({
      status: "WARNING",
      policy,
      sample: activityAt(startMs + 5_000),
      nowMs: startMs,
      processStartMs: startMs,
      noDataSinceMs: null,
      lastActiveAtMs: null
    });

    assert.equal(result.idleSeconds, 0);
    assert.equal(result.proposed, "OK");
  });

  it("holds the current status inside the no-data window", () => {
    const result = evaluateActivity({
      status: "WARNING",
      policy,
      sample: { kind: "no_data", reason: "timeout" },
      nowMs: startMs + 3 * day,
      processStartMs: startMs,
      noDataSinceMs: null,
      lastActiveAtMs: startMs + 2 * day
    });

    assert.deepEqual(result, {
      proposed: "WARNING",
      idleSeconds: 86_400,
      reason: "no_data",
      noDataSinceMs: startMs + 3 * day,
      lastActiveAtMs: startMs + 2 * day,
      noDataExpired: false
    });
  });

  it("escalates inside the no-data window when the last known activity is already past a bound", () => {
    const result = evaluateActivity({
      status: "OK",
      policy,
      sample: { kind: "no_data", reason: "timeout" },
      nowMs: startMs + 3 * day,
      processStartMs: startMs,
      noDataSinceMs: startMs + 3 * day - 60_000,
      lastActiveAtMs: startMs
    });

    assert.equal(result.proposed, "CRITICAL");
    assert.equal(result.idleSeconds, 259_200);
    assert.equal(result.reason, "no_data");
    assert.equal(result.noDataExpired, false);
  });

  it("escalates to CRITICAL once no data outlasts the window", () => {
    for (const status of ["OK", "WARNING", "CRITICAL"] as const) {
      const result = evaluateActivity({
        status,
        policy,
        sample: { kind: "no_data", reason: "no samples in window" },
        nowMs: startMs + 2 * day,
        processStartMs: startMs,
        noDataSinceMs: startMs + day,
        lastActiveAtMs: startMs + day
      });

      assert.equal(result.noDataExpired, true);
      assert.equal(result.proposed, "CRITICAL");
      assert.equal(result.idleSeconds, 86_400);
      assert.equal(result.noDataSinceMs, startMs + day);
    }
  });

  it("treats an empty activity sample as no data", () => {
    const result = evaluateActivity({
      status: "CRITICAL",
      policy,
      sample: { kind: "activity", lastActiveAtMs: startMs, sampleCount: 0 },
      nowMs: startMs + 1_000,
      processStartMs: startMs,
      noDataSinceMs: null,
      lastActiveAtMs: null
    });

    assert.equal(result.reason, "no_data");
    assert.equal(result.proposed, "CRITICAL");
    assert.equal(result.noDataSinceMs, startMs + 1_000);
  });
});
