import { describe, it, expect } from "vitest";

import {
  DEFAULT_TELEMETRY_CONFIG,
  TELEMETRY_ENV_REQUIREMENTS,
  checkPositive,
  loadTelemetryConfig,
  validateTelemetryConfig,
} from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("checkPositive", () => {
  it("accepts positive values", () => {
    expect(checkPositive("sampleIntervalSeconds", 0.25)).toEqual([]);
    expect(checkPositive("queueCapacity", 10, true)).toEqual([]);
  });

  it("rejects zero, negatives and non-finite values", () => {
    expect(checkPositive("logIntervalSeconds", 0)).toEqual(["logIntervalSeconds must be a positive number (got 0)"]);
    expect(checkPositive("x", -1)).toEqual(["x must be a positive number (got -1)"]);
    expect(checkPositive("x", Number.NaN, false, '"abc"')).toEqual(['x must be a positive number (got "abc")']);
    expect(checkPositive("x", Number.POSITIVE_INFINITY)).toEqual(["x must be a positive number (got Infinity)"]);
  });

  it("rejects fractions where an integer is required", () => {
    expect(checkPositive("backupCount", 2.5, true)).toEqual(["backupCount must be an integer (got 2.5)"]);
  });
});

describe("loadTelemetryConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadTelemetryConfig({})).toEqual(DEFAULT_TELEMETRY_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadTelemetryConfig({
      TELEMETRY_LOG_DIR: "/var/log/stand",
      TELEMETRY_QUEUE_CAPACITY: "500",
      TELEMETRY_SAMPLE_INTERVAL_S: "0.5",
      TELEMETRY_CIRCUIT_COOLDOWN_S: "30",
    });

    expect(config).toEqual({
      ...DEFAULT_TELEMETRY_CONFIG,
      logDir: "/var/log/stand",
      queueCapacity: 500,
      sampleIntervalSeconds: 0.5,
      circuitCooldownSeconds: 30,
    });
  });

  it("lists every invalid variable", () => {
    const load = () =>
      loadTelemetryConfig({
        TELEMETRY_WATCHDOG_POLL_MS: "0",
        TELEMETRY_BACKUP_COUNT: "1.5",
        TELEMETRY_SLOW_OPERATION_MS: "fast",
      });

    expect(load).toThrow(ConfigurationError);
    try {
      load();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.code).toBe("CONFIG_INVALID");
        expect(err.issues).toEqual([
          'TELEMETRY_BACKUP_COUNT must be an integer (got "1.5")',
          'TELEMETRY_SLOW_OPERATION_MS must be a positive number (got "fast")',
          'TELEMETRY_WATCHDOG_POLL_MS must be a positive number (got "0")',
        ]);
      }
    }
  });

  it("declares an optional requirement with a default for every variable", () => {
    expect(TELEMETRY_ENV_REQUIREMENTS).toHaveLength(14);
    for (const req of TELEMETRY_ENV_REQUIREMENTS) {
      expect(req.required).toBe(false);
      expect(req.default).toBeDefined();
    }
  });
});

describe("validateTelemetryConfig", () => {
  it("rejects an empty log directory", () => {
    expect(() => validateTelemetryConfig({ ...DEFAULT_TELEMETRY_CONFIG, logDir: " " })).toThrow(
      "Invalid telemetry configuration: logDir must not be empty",
    );
  });
});
