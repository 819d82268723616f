import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

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
import { EventRecorder } from "./event-recorder.js";
import { FreezeDetector } from "./freeze-detector.js";

describe("FreezeDetector", () => {
  let router: RecordingRouter;
  let recorder: EventRecorder;
  let detector: FreezeDetector;

  const events = (kind: string) => router.payloads("events").filter((p) => p["eventType"] === kind);

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 5, 1, 12, 0, 0));
    router = new RecordingRouter();
    recorder = new EventRecorder(router, 1);
    detector = new FreezeDetector(router, recorder, {
      pollIntervalMs: 100,
      minHeartbeatIntervalSeconds: 0.5,
      includeProcessReport: false,
    });
  });

  afterEach(async () => {
    await detector.stop();
    vi.useRealTimers();
  });

  describe("register", () => {
    it("rejects a timeout not above the minimum heartbeat interval", () => {
      expect(() => detector.register("acq", 0.5)).toThrow(ConfigurationError);
      expect(() => detector.register("acq", 0.5)).toThrow(
        "Invalid telemetry configuration: Watchdog 'acq' timeout 0.5s must be greater than the minimum heartbeat interval 0.5s",
      );
    });

    it("accepts a one second watchdog under the default options", () => {
      const defaults = new FreezeDetector(router, recorder);
      defaults.register("acq", 1.0);

      expect(defaults.getStatistics().watchdogs["acq"]).toMatchObject({ timeoutSeconds: 1, frozen: false });
    });

    it("rejects invalid detector options", () => {
      expect(() => new FreezeDetector(router, recorder, { pollIntervalMs: 0 })).toThrow(ConfigurationError);
    });

    it("ignores heartbeats for unknown components", () => {
      expect(detector.heartbeat("nobody")).toBe(false);
      expect(detector.getStatistics().totalHeartbeats).toBe(0);
    });
  });

  describe("freeze episodes", () => {
    it("alerts exactly once per freeze and once on recovery", async () => {
      detector.register("acq", 1.0);
      detector.heartbeat("acq");
      detector.start();

      await vi.advanceTimersByTimeAsync(5_000);

      expect(events("freeze_detected")).toHaveLength(1);
      expect(events("freeze_detected")[0]?.["details"]).toEqual({
        component: "acq",
        frozenForSeconds: 1.1,
        timeoutSeconds: 1,
        freezeNumber: 1,
      });
      expect(router.payloads("errors")).toHaveLength(1);

      detector.heartbeat("acq");
      detector.heartbeat("acq");

      expect(events("freeze_recovered")).toHaveLength(1);
      expect(events("freeze_recovered")[0]?.["details"]).toEqual({ component: "acq", frozenForSeconds: 5 });
      expect(detector.getStatistics()).toMatchObject({ freezesDetected: 1, recoveries: 1, totalHeartbeats: 3 });
    });

    it("alerts again after a recovery", async () => {
      detector.register("acq", 1.0);
      detector.start();

      await vi.advanceTimersByTimeAsync(2_000);
      detector.heartbeat("acq");
      await vi.advanceTimersByTimeAsync(2_000);

      expect(events("freeze_detected")).toHaveLength(2);
      expect(detector.getRecentFreezes().map((e) => e.freezeNumber)).toEqual([1, 2]);
    });

    it("skips inactive watchdogs and restarts their timer on resume", async () => {
      detector.register("acq", 1.0);
      detector.setActive("acq", false);
      detector.start();

      await vi.advanceTimersByTimeAsync(3_000);
      expect(events("freeze_detected")).toHaveLength(0);

      detector.setActive("acq", true);
      await vi.advanceTimersByTimeAsync(900);
      expect(events("freeze_detected")).toHaveLength(0);
      await vi.advanceTimersByTimeAsync(300);
      expect(events("freeze_detected")).toHaveLength(1);
    });

    it("runs the component callback and global callbacks in isolation", async () => {
      const calls: string[] = [];
      detector.register("serial", 1.0, () => {
        throw new Error("port busy");
      });
      detector.onFreeze(async (component, seconds) => {
        calls.push(`${component}:${seconds}`);
      });

      await vi.advanceTimersByTimeAsync(1_500);
      await detector.check();

      expect(calls).toEqual(["serial:1.5"]);
      const failures = router.messages("freeze-detector").filter((m) => m.startsWith("Freeze callback failed"));
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatch(/^Freeze callback failed for serial \{"err":\{"name":"Error","message":"port busy"/);
    });
  });

  describe("diagnostics", () => {
    it("queues a dump with the recent operation history", async () => {
      for (let i = 1; i <= 60; i++) detector.logOperation(`read_${i}`, { i });
      detector.register("acq", 1.0);

      vi.advanceTimersByTime(1_200);
      await detector.check();

      expect(router.artifacts).toHaveLength(1);
      const [dump] = router.artifacts;
      expect(dump?.fileName).toBe("freeze_dump_acq_20240601_120001.json");
      expect(dump?.body).toMatchObject({ component: "acq", freezeNumber: 1, processReport: null, activeResources: [] });

      const ops = detector.getRecentOperations(100);
      expect(ops).toHaveLength(60);
      expect(ops[0]?.operation).toBe("read_1");
    });

    it("bounds the operation history", () => {
      const small = new FreezeDetector(router, recorder, { operationHistorySize: 3 });
      for (const name of ["a", "b", "c", "d", "e"]) small.logOperation(name);

      expect(small.getRecentOperations().map((op) => op.operation)).toEqual(["c", "d", "e"]);
      expect(small.getRecentOperations(2).map((op) => op.operation)).toEqual(["d", "e"]);
    });

    it("summarises the process report when enabled", async () => {
      const reporting = new FreezeDetector(router, recorder, { minHeartbeatIntervalSeconds: 0.5 });
      reporting.register("acq", 1.0);

      vi.advanceTimersByTime(1_500);
      await reporting.check();

      expect(router.artifacts[0]?.body).toHaveProperty("processReport.libuvHandles");
    });
  });

  describe("health", () => {
    it("is unhealthy while not monitoring or while a watchdog is frozen", async () => {
      detector.register("acq", 1.0);
      expect(detector.healthCheck().healthy).toBe(false);

      detector.start();
      expect(detector.healthCheck()).toEqual({
        healthy: true,
        monitoring: true,
        frozenWatchdogs: [],
        recentFreezeCount: 0,
        activeWatchdogs: 1,
      });

      await vi.advanceTimersByTimeAsync(1_500);
      expect(detector.healthCheck()).toMatchObject({ healthy: false, frozenWatchdogs: ["acq"], recentFreezeCount: 1 });

      detector.heartbeat("acq");
      expect(detector.healthCheck().healthy).toBe(true);
    });
  });
});
