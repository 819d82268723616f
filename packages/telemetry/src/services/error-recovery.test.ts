import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@teststand/shared/utils", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { RecordingRouter } from "../../../../tests/helpers/fixtures.js";
import { ConfigurationError } from "../errors.js";
import type { EscalationHook } from "../types.js";
import { EventRecorder } from "./event-recorder.js";
import {
  ErrorRecoveryEngine,
  backoffDelay,
  type ErrorRecoveryOptions,
  type RecoveryStrategy,
} from "./error-recovery.js";

describe("ErrorRecoveryEngine", () => {
  let router: RecordingRouter;
  let recorder: EventRecorder;
  let clock: number;
  let sleeps: number[];

  const events = (kind: string) => router.payloads("events").filter((p) => p["eventType"] === kind);

  const createEngine = (options: ErrorRecoveryOptions = {}) =>
    new ErrorRecoveryEngine(router, recorder, {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      random: () => 0.5,
      now: () => clock,
      ...options,
    });

  beforeEach(() => {
    router = new RecordingRouter();
    recorder = new EventRecorder(router, 1);
    clock = 1_000_000;
    sleeps = [];
  });

  describe("construction", () => {
    it("rejects a non-positive circuit threshold", () => {
      expect(() => createEngine({ circuitThreshold: 0 })).toThrow(ConfigurationError);
    });

    it("reports every invalid action override", () => {
      expect(() =>
        createEngine({ actions: { timeout: { maxAttempts: 1.5 }, generic: { retry: { base: -1 } } } }),
      ).toThrow(
        "Invalid telemetry configuration: timeout.maxAttempts must be an integer (got 1.5); " +
          "generic.retry.base must be a positive number (got -1)",
      );
    });

    it("uses the per-category defaults", () => {
      const engine = createEngine();
      expect(engine.getAction("timeout")).toMatchObject({
        maxAttempts: 5,
        cooldownSeconds: 60,
        retry: { initialDelayMs: 500, maxDelayMs: 10_000, base: 2, jitter: true },
      });
      expect(engine.getAction("resource_exhaustion").maxAttempts).toBe(2);
      expect(Object.isFrozen(engine.getAction("generic"))).toBe(true);
    });
  });

  describe("retryWithBackoff", () => {
    it("invokes an operation failing k times exactly k+1 times", async () => {
      const engine = createEngine();
      let calls = 0;
      const outcome = await engine.retryWithBackoff(() => {
        calls++;
        if (calls <= 2) throw new Error(`miss ${calls}`);
        return 42;
      }, "timeout");

      expect(calls).toBe(3);
      expect(outcome).toEqual({ ok: true, value: 42, attempts: 3 });
      expect(sleeps).toEqual([500, 1_000]);
    });

    it("awaits async operations", async () => {
      const engine = createEngine();
      const outcome = await engine.retryWithBackoff(async () => "read", "parse_failure");
      expect(outcome).toEqual({ ok: true, value: "read", attempts: 1 });
      expect(sleeps).toEqual([]);
    });

    it("gives up after maxAttempts and hands the last error to recovery", async () => {
      const engine = createEngine();
      let calls = 0;
      const outcome = await engine.retryWithBackoff(() => {
        calls++;
        throw new Error(`boom ${calls}`);
      }, "connection_loss", { port: "/dev/ttyUSB0" });

      expect(calls).toBe(3);
      expect(sleeps).toEqual([1_000, 2_000]);
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.message).toBe("boom 3");
        expect(outcome.attempts).toBe(3);
        expect(outcome.recovered).toBe(false);
      }
      expect(events("serial_disconnect")[0]?.["details"]).toEqual({ port: "/dev/ttyUSB0", error: "boom 3" });
    });

    it("wraps non-Error throws", async () => {
      const engine = createEngine({ actions: { generic: { maxAttempts: 1 } } });
      const outcome = await engine.retryWithBackoff(() => {
        throw "plain string";
      });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.error.message).toBe("plain string");
    });
  });

  describe("backoffDelay", () => {
    const policy = { initialDelayMs: 100, maxDelayMs: 1_000, base: 2, jitter: false };

    it("grows exponentially up to the cap", () => {
      expect([0, 1, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([100, 200, 800, 1_000]);
    });

    it("scales by a jitter factor in [0.5, 1.5)", () => {
      const jittered = { ...policy, jitter: true };
      expect(backoffDelay(jittered, 2, () => 0)).toBe(200);
      expect(backoffDelay(jittered, 2, () => 0.25)).toBe(300);
    });
  });

  describe("circuit breaker", () => {
    it("fails fast while open and runs the strategy once after the cooldown", async () => {
      const strategy = vi.fn<RecoveryStrategy>(() => false);
      const engine = createEngine({ actions: { generic: { strategy } } });

      for (let i = 0; i < 10; i++) {
        expect(await engine.recover(new Error("bad"), "generic")).toBe(false);
      }
      expect(strategy).toHaveBeenCalledTimes(10);
      expect(engine.getCircuitState("generic")).toEqual({
        category: "generic",
        consecutiveFailures: 10,
        openUntil: 1_060_000,
        open: true,
      });

      expect(await engine.recover(new Error("bad"), "generic")).toBe(false);
      clock += 59_999;
      expect(await engine.recover(new Error("bad"), "generic")).toBe(false);
      expect(strategy).toHaveBeenCalledTimes(10);

      clock += 1;
      expect(await engine.recover(new Error("bad"), "generic")).toBe(false);
      expect(strategy).toHaveBeenCalledTimes(11);

      // the failed probe reopens the circuit
      expect(await engine.recover(new Error("bad"), "generic")).toBe(false);
      expect(strategy).toHaveBeenCalledTimes(11);
      expect(engine.getRecoveryStats().categories.generic).toMatchObject({
        attempts: 11,
        failures: 11,
        shortCircuits: 3,
      });
    });

    it("closes fully on a successful probe", async () => {
      const strategy = vi.fn<RecoveryStrategy>(() => false);
      const engine = createEngine({ circuitThreshold: 2, actions: { parse_failure: { strategy, cooldownSeconds: 5 } } });

      await engine.recover(new Error("bad frame"), "parse_failure");
      await engine.recover(new Error("bad frame"), "parse_failure");
      expect(engine.getCircuitState("parse_failure").open).toBe(true);

      strategy.mockReturnValue(true);
      clock += 5_000;
      expect(await engine.recover(new Error("bad frame"), "parse_failure")).toBe(true);
      expect(engine.getCircuitState("parse_failure")).toEqual({
        category: "parse_failure",
        consecutiveFailures: 0,
        openUntil: null,
        open: false,
      });
    });

    it("keeps categories independent", async () => {
      const engine = createEngine({ circuitThreshold: 1 });
      await engine.recover(new Error("x"), "generic");

      expect(engine.getCircuitState("generic").open).toBe(true);
      expect(engine.getCircuitState("timeout").open).toBe(false);
      expect(await engine.recover(new Error("slow"), "timeout")).toBe(true);
    });
  });

  describe("escalation", () => {
    it("invokes the hook on each failure once maxAttempts is reached", async () => {
      const escalation = vi.fn<EscalationHook>();
      const engine = createEngine({
        actions: { timeout: { maxAttempts: 2, strategy: () => false, escalation } },
      });

      await engine.recover(new Error("link down"), "timeout");
      expect(escalation).not.toHaveBeenCalled();
      await engine.recover(new Error("link down"), "timeout");
      await engine.recover(new Error("link down"), "timeout");

      expect(escalation).toHaveBeenCalledTimes(2);
      expect(escalation).toHaveBeenLastCalledWith("timeout", "link down");
      expect(events("error_escalation").map((e) => e["details"])).toEqual([
        { category: "timeout", message: "link down", failedRecoveryAttempts: 2, escalationCount: 1 },
        { category: "timeout", message: "link down", failedRecoveryAttempts: 3, escalationCount: 2 },
      ]);
      expect(router.payloads("errors").filter((p) => p["eventType"] === "error_escalation")).toHaveLength(2);
      expect(engine.getRecoveryStats().totalEscalations).toBe(2);
    });

    it("does not escalate without a hook", async () => {
      const engine = createEngine({ actions: { generic: { maxAttempts: 1 } } });
      await engine.recover(new Error("x"), "generic");

      expect(events("error_escalation")).toHaveLength(0);
      expect(engine.getRecoveryStats().totalEscalations).toBe(0);
    });

    it("isolates a failing hook", async () => {
      const engine = createEngine({
        actions: {
          generic: {
            maxAttempts: 1,
            escalation: () => {
              throw new Error("pager offline");
            },
          },
        },
      });

      await expect(engine.recover(new Error("x"), "generic")).resolves.toBe(false);
      expect(router.messages("error-recovery")).toEqual(
        expect.arrayContaining([
          expect.stringMatching(/^Escalation hook failed for generic \{"err":\{"name":"Error","message":"pager offline"/),
        ]),
      );
    });
  });

  describe("default strategies", () => {
    it("timeout records a serial error and succeeds", async () => {
      const engine = createEngine();
      expect(await engine.recover(new Error("no reply"), "timeout", { port: "/dev/ttyUSB0" })).toBe(true);

      const [serialError] = events("serial_error");
      expect(serialError?.["severity"]).toBe("ERROR");
      expect(serialError?.["details"]).toEqual({ errorType: "timeout", port: "/dev/ttyUSB0", message: "no reply" });
      expect(events("error_recovery")[0]?.["details"]).toEqual({
        category: "timeout",
        error: "no reply",
        attemptNumber: 1,
        success: true,
      });
    });

    it("connection_loss reconnects when it can", async () => {
      const engine = createEngine();
      const reconnect = vi.fn();

      expect(await engine.recover(new Error("port gone"), "connection_loss", { port: "COM3", reconnect })).toBe(true);
      expect(reconnect).toHaveBeenCalledTimes(1);
      expect(events("serial_reconnect")[0]?.["details"]).toEqual({ port: "COM3" });
    });

    it("connection_loss falls back to the simulator when reconnecting fails", async () => {
      const engine = createEngine();
      const fallback = vi.fn();
      const reconnect = async () => {
        throw new Error("still unplugged");
      };

      expect(await engine.recover(new Error("port gone"), "connection_loss", { reconnect, fallback })).toBe(true);
      expect(fallback).toHaveBeenCalledTimes(1);
      expect(events("mode_change")[0]?.["details"]).toEqual({
        fromMode: "serial",
        toMode: "simulator",
        reason: "Serial error: port gone",
      });
    });

    it("file_write cleans up on a full disk and buffers otherwise", async () => {
      const engine = createEngine();
      const cleanup = vi.fn();
      const buffer = vi.fn();
      const diskFull = Object.assign(new Error("write failed"), { code: "ENOSPC" });

      expect(await engine.recover(diskFull, "file_write", { cleanup, buffer })).toBe(true);
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(buffer).not.toHaveBeenCalled();

      expect(await engine.recover(new Error("EBUSY"), "file_write", { buffer, data: { ts: 1 } })).toBe(true);
      expect(buffer).toHaveBeenCalledWith({ ts: 1 });

      expect(await engine.recover(new Error("No space left on device"), "file_write", { buffer })).toBe(false);
    });

    it("resource_exhaustion needs a cleanup hook", async () => {
      const engine = createEngine();
      expect(await engine.recover(new Error("heap"), "resource_exhaustion")).toBe(false);
      expect(await engine.recover(new Error("heap"), "resource_exhaustion", { cleanup: () => undefined })).toBe(true);
    });

    it("parse_failure resets the parser", async () => {
      const engine = createEngine();
      const resetParser = vi.fn();

      expect(await engine.recover(new SyntaxError("Unexpected token"), "parse_failure", { resetParser })).toBe(true);
      expect(resetParser).toHaveBeenCalledTimes(1);
    });

    it("treats a throwing strategy as a failed recovery", async () => {
      const engine = createEngine({
        actions: {
          generic: {
            strategy: () => {
              throw new Error("kaboom");
            },
          },
        },
      });

      expect(await engine.recover(new Error("x"), "generic")).toBe(false);
      expect(router.messages("error-recovery")).toEqual(
        expect.arrayContaining([expect.stringMatching(/^Recovery failed for generic: kaboom /)]),
      );
    });
  });

  describe("statistics and health", () => {
    it("is healthy before any attempt", () => {
      expect(createEngine().healthCheck()).toEqual({
        healthy: true,
        totalEscalations: 0,
        escalatedCategories: [],
        openCircuits: [],
        successRate: 0,
      });
    });

    it("totals attempts across categories", async () => {
      const engine = createEngine();
      await engine.recover(new Error("a"), "timeout");
      await engine.recover(new Error("b"), "parse_failure");
      await engine.recover(new Error("c"), "generic");

      const stats = engine.getRecoveryStats();
      expect(stats).toMatchObject({ totalAttempts: 3, totalSuccesses: 2, totalFailures: 1 });
      expect(stats.successRate).toBeCloseTo(2 / 3);
      expect(engine.healthCheck().healthy).toBe(true);
    });

    it("is unhealthy once three categories have escalated", async () => {
      const escalation = vi.fn<EscalationHook>();
      const failing = { maxAttempts: 1, strategy: () => false, escalation };
      const engine = createEngine({ actions: { timeout: failing, parse_failure: failing, generic: failing } });

      for (let i = 0; i < 4; i++) await engine.recover(new Error("x"), "timeout");
      await engine.recover(new Error("x"), "parse_failure");
      await engine.recover(new Error("x"), "generic");

      const health = engine.healthCheck();
      expect(health.escalatedCategories).toEqual(["timeout", "parse_failure", "generic"]);
      expect(health.totalEscalations).toBe(6);
      expect(health.healthy).toBe(false);
    });
  });
});
