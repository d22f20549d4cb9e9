import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import {
  getBooleanEnv,
  getEnv,
  getNumberEnv,
  getOptionalEnv,
  loadServiceRuntimeConfig
} from "./config.js";

const touched = ["DECOM_TEST_VALUE", "DECOM_TEST_FLAG", "DECOM_TEST_NUMBER", "EVALUATION_CONCURRENCY", "ENABLE_DELIVERY_STORE_DB"];
const saved = new Map(touched.map((name) => [name, process.env[name]]));

afterEach(() => {
  for (const [name, value] of saved) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
});

describe("config", () => {
  it("returns fallback and fails on missing required values", () => {
    delete process.env.DECOM_TEST_VALUE;
    assert.equal(getEnv("DECOM_TEST_VALUE", "fallback"), "fallback");
    assert.throws(() => getEnv("DECOM_TEST_VALUE"), /Missing required environment variable: DECOM_TEST_VALUE/);

    process.env.DECOM_TEST_VALUE = "";
    assert.equal(getOptionalEnv("DECOM_TEST_VALUE"), undefined);
  });

  it("parses boolean flags", () => {
    process.env.DECOM_TEST_FLAG = "Yes";
    assert.equal(getBooleanEnv("DECOM_TEST_FLAG", false), true);
    process.env.DECOM_TEST_FLAG = "off";
    assert.equal(getBooleanEnv("DECOM_TEST_FLAG", true), false);
    delete process.env.DECOM_TEST_FLAG;
    assert.equal(getBooleanEnv("DECOM_TEST_FLAG", true), true);
  });

  it("rejects non-numeric numbers", () => {
    process.env.DECOM_TEST_NUMBER = "12.5";
    assert.equal(getNumberEnv("DECOM_TEST_NUMBER", 1), 12.5);
    process.env.DECOM_TEST_NUMBER = "twelve";
    assert.throws(() => getNumberEnv("DECOM_TEST_NUMBER", 1), /is not a number: twelve/);
  });

  it("builds the runtime config from the environment", () => {
    process.env.EVALUATION_CONCURRENCY = "4";
    process.env.ENABLE_DELIVERY_STORE_DB = "true";
    const runtime = loadServiceRuntimeConfig("decommission-monitor", 3020);

    assert.equal(runtime.serviceName, "decommission-monitor");
    assert.equal(runtime.evaluationConcurrency, 4);
    assert.equal(runtime.enableDeliveryStoreDb, true);
  });
});
