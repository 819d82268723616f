import { ConfigurationError, TelemetryError } from "../errors.js";
import { checkPositive, DEFAULT_TELEMETRY_CONFIG } from "../config.js";
import type { FreezeCallback, FreezeEvent, OperationEntry, WatchdogEntry } from "../types.js";
import type { EventRecorder } from "./event-recorder.js";
import { formatStamp, type LogRouter } from "./log-router.js";
import { NoopResourceProbe, type ResourceProbe } from "./resource-probe.js";
import { createRunLogger, type RunLogger } from "./run-logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const FREEZE_HISTORY = 50;
const DUMP_OPERATIONS = 50;
const HEALTHY_FREEZES_PER_HOUR = 10;
const HOUR_MS = 3_600_000;

export interface FreezeDetectorOptions {
  pollIntervalMs?: number;
  /** A watchdog timeout must be strictly greater than this. */
  minHeartbeatIntervalSeconds?: number;
  /** Source of the resource snapshot in diagnostics dumps. */
  probe?: ResourceProbe;
  operationHistorySize?: number;
  /** Include the Node diagnostic report (JS stack, libuv handles) in dumps. */
  includeProcessReport?: boolean;
}

export interface WatchdogStatus {
  active: boolean;
  frozen: boolean;
  timeoutSeconds: number;
  secondsSinceHeartbeat: number;
}

export interface FreezeStatistics {
  monitoring: boolean;
  freezesDetected: number;
  recoveries: number;
  totalHeartbeats: number;
  /** heartbeats per second since construction */
  heartbeatRate: number;
  uptimeSeconds: number;
  watchdogs: Record<string, WatchdogStatus>;
  recentFreezes: FreezeEvent[];
}

export interface FreezeHealth {
  healthy: boolean;
  monitoring: boolean;
  frozenWatchdogs: string[];
  recentFreezeCount: number;
  activeWatchdogs: number;
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

interface ProcessReportSummary {
  javascriptStack: unknown;
  libuvHandles: Record<string, number>;
}

function summarizeProcessReport(): ProcessReportSummary | { error: string } {
  let report: object;
  try {
    report = process.report.getReport();
  } catch (err) {
    return { error: err instanceof Error ? err.message : String(err) };
  }

  const libuvHandles: Record<string, number> = {};
  if ("libuv" in report && Array.isArray(report.libuv)) {
    const handles: unknown[] = report.libuv;
    for (const handle of handles) {
      const type = typeof handle === "object" && handle !== null && "type" in handle ? String(handle.type) : "unknown";
      libuvHandles[type] = (libuvHandles[type] ?? 0) + 1;
    }
  }
  return {
    javascriptStack: "javascriptStack" in report ? report.javascriptStack : null,
    libuvHandles,
  };
}

// ---------------------------------------------------------------------------
// FreezeDetector
// ---------------------------------------------------------------------------

/**
 * Per-component heartbeat watchdogs. Each entry moves NORMAL -> FROZEN when
 * its heartbeat is older than its timeout and back to NORMAL on the next
 * heartbeat; each transition is reported once. Detection is observational:
 * monitored components are never interrupted.
 */
export class FreezeDetector {
  private readonly router: LogRouter;
  private readonly recorder: EventRecorder;
  private readonly log: RunLogger;
  private readonly probe: ResourceProbe;

  private readonly pollIntervalMs: number;
  private readonly minHeartbeatIntervalSeconds: number;
  private readonly operationHistorySize: number;
  private readonly includeProcessReport: boolean;

  private readonly watchdogs = new Map<string, WatchdogEntry>();
  private readonly freezeCallbacks: FreezeCallback[] = [];
  private operations: OperationEntry[] = [];
  private freezeEvents: FreezeEvent[] = [];

  private freezesDetected = 0;
  private recoveries = 0;
  private totalHeartbeats = 0;
  private readonly startedAt = Date.now();

  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private pending = new Set<Promise<void>>();

  constructor(router: LogRouter, recorder: EventRecorder, options: FreezeDetectorOptions = {}) {
    this.router = router;
    this.recorder = recorder;
    this.log = createRunLogger(router, "freeze-detector");
    this.probe = options.probe ?? new NoopResourceProbe();

    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_TELEMETRY_CONFIG.watchdogPollMs;
    this.minHeartbeatIntervalSeconds =
      options.minHeartbeatIntervalSeconds ?? DEFAULT_TELEMETRY_CONFIG.minHeartbeatIntervalSeconds;
    this.operationHistorySize = options.operationHistorySize ?? 100;
    this.includeProcessReport = options.includeProcessReport ?? true;

    const issues = [
      ...checkPositive("pollIntervalMs", this.pollIntervalMs),
      ...checkPositive("minHeartbeatIntervalSeconds", this.minHeartbeatIntervalSeconds),
      ...checkPositive("operationHistorySize", this.operationHistorySize, true),
    ];
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  /**
   * Watch `component`. The timeout must exceed the minimum heartbeat
   * interval. Registering an existing component replaces its entry.
   */
  register(component: string, timeoutSeconds: number, callback?: FreezeCallback): void {
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= this.minHeartbeatIntervalSeconds) {
      throw new ConfigurationError([
        `Watchdog '${component}' timeout ${timeoutSeconds}s must be greater than the minimum heartbeat interval ${this.minHeartbeatIntervalSeconds}s`,
      ]);
    }

    this.watchdogs.set(component, {
      component,
      timeoutSeconds,
      lastHeartbeat: Date.now(),
      active: true,
      frozen: false,
      frozenAt: null,
      callback,
    });
    this.log.info({ component, timeoutSeconds }, `Registered watchdog '${component}' with ${timeoutSeconds}s timeout`);
  }

  unregister(component: string): boolean {
    return this.watchdogs.delete(component);
  }

  /** Pause or resume polling for one watchdog. Resuming restarts its timer. */
  setActive(component: string, active: boolean): boolean {
    const entry = this.watchdogs.get(component);
    if (!entry) return false;

    if (active && !entry.active) {
      entry.lastHeartbeat = Date.now();
    }
    entry.active = active;
    return true;
  }

  /** Called on every freeze, after the component's own callback. */
  onFreeze(callback: FreezeCallback): void {
    this.freezeCallbacks.push(callback);
  }

  // -----------------------------------------------------------------------
  // Heartbeats & operation history
  // -----------------------------------------------------------------------

  /**
   * Record liveness for `component`. A frozen entry returns to NORMAL and
   * one recovery event is recorded. Unknown components are ignored.
   */
  heartbeat(component: string): boolean {
    const entry = this.watchdogs.get(component);
    if (!entry) return false;

    const now = Date.now();
    this.totalHeartbeats++;

    if (entry.frozen) {
      const frozenForSeconds = round1((now - entry.lastHeartbeat) / 1000);
      entry.frozen = false;
      entry.frozenAt = null;
      this.recoveries++;

      this.log.warn({ component, frozenForSeconds }, `Component ${component} recovered after ${frozenForSeconds}s`);
      this.recorder.record("freeze_recovered", { component, frozenForSeconds }, "WARNING");
    }

    entry.lastHeartbeat = now;
    return true;
  }

  logOperation(operation: string, details: Record<string, unknown> = {}): void {
    this.operations.push({ timestamp: new Date().toISOString(), operation, details });
    if (this.operations.length > this.operationHistorySize) {
      this.operations = this.operations.slice(-this.operationHistorySize);
    }
  }

  getRecentOperations(count = 10): OperationEntry[] {
    return this.operations.slice(-count);
  }

  // -----------------------------------------------------------------------
  // Poll loop
  // -----------------------------------------------------------------------

  start(): void {
    if (this.intervalHandle) return;

    this.intervalHandle = setInterval(() => {
      void this.check();
    }, this.pollIntervalMs);
    this.log.info({ pollIntervalMs: this.pollIntervalMs }, "Freeze detection monitoring started");
  }

  /** Stop polling and wait (bounded) for in-flight freeze handling. */
  async stop(timeoutMs: number = DEFAULT_TELEMETRY_CONFIG.shutdownTimeoutMs): Promise<boolean> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }

    let stoppedCleanly = true;
    if (this.pending.size > 0) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timedOut = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), timeoutMs);
      });
      const result = await Promise.race([Promise.all(this.pending).then(() => "done" as const), timedOut]);
      clearTimeout(timer);
      if (result === "timeout") {
        this.log.error({ pending: this.pending.size }, "Freeze handling did not finish before stop timeout");
        stoppedCleanly = false;
      }
    }

    this.log.info("Freeze detection monitoring stopped");
    return stoppedCleanly;
  }

  isMonitoring(): boolean {
    return this.intervalHandle !== null;
  }

  /**
   * One poll tick. Every active NORMAL entry whose heartbeat is older than
   * its timeout is moved to FROZEN here, before any callback runs, so a
   * freeze episode is reported exactly once.
   */
  async check(): Promise<void> {
    const now = Date.now();
    const tasks: Promise<void>[] = [];

    for (const entry of this.watchdogs.values()) {
      if (!entry.active || entry.frozen) continue;

      const sinceMs = now - entry.lastHeartbeat;
      if (sinceMs > entry.timeoutSeconds * 1000) {
        entry.frozen = true;
        entry.frozenAt = now;
        this.freezesDetected++;
        tasks.push(this.track(this.handleFreeze(entry, round1(sinceMs / 1000))));
      }
    }

    await Promise.all(tasks);
  }

  private track(task: Promise<void>): Promise<void> {
    const tracked = task.catch((err: unknown) => {
      this.log.error({ err }, "Freeze handling failed");
    });
    this.pending.add(tracked);
    void tracked.finally(() => this.pending.delete(tracked));
    return tracked;
  }

  private async handleFreeze(entry: WatchdogEntry, frozenForSeconds: number): Promise<void> {
    const { component } = entry;
    const freezeNumber = this.freezesDetected;

    const event: FreezeEvent = {
      timestamp: new Date().toISOString(),
      component,
      frozenForSeconds,
      timeoutSeconds: entry.timeoutSeconds,
      freezeNumber,
    };
    this.freezeEvents.push(event);
    if (this.freezeEvents.length > FREEZE_HISTORY) this.freezeEvents.shift();

    this.log.fatal(
      { component, frozenForSeconds, freezeNumber },
      `FREEZE DETECTED: ${component} unresponsive for ${frozenForSeconds}s (freeze #${freezeNumber})`,
    );
    this.recorder.record(
      "freeze_detected",
      { component, frozenForSeconds, timeoutSeconds: entry.timeoutSeconds, freezeNumber },
      "CRITICAL",
    );

    if (entry.callback) {
      await this.invoke(entry.callback, component, frozenForSeconds, "Freeze callback failed");
    }
    for (const callback of this.freezeCallbacks) {
      await this.invoke(callback, component, frozenForSeconds, "Freeze notification callback failed");
    }

    this.dumpDiagnostics(entry, frozenForSeconds, freezeNumber);
  }

  private async invoke(callback: FreezeCallback, component: string, seconds: number, failure: string): Promise<void> {
    try {
      await callback(component, seconds);
    } catch (err) {
      this.log.error({ err, component }, `${failure} for ${component}`);
    }
  }

  private dumpDiagnostics(entry: WatchdogEntry, frozenForSeconds: number, freezeNumber: number): void {
    const now = new Date();
    const fileName = `freeze_dump_${entry.component}_${formatStamp(now)}.json`;
    const recentOperations = this.operations.slice(-DUMP_OPERATIONS);

    const diagnostics = {
      timestamp: now.toISOString(),
      component: entry.component,
      freezeNumber,
      secondsSinceHeartbeat: frozenForSeconds,
      timeoutSeconds: entry.timeoutSeconds,
      processReport: this.includeProcessReport ? summarizeProcessReport() : null,
      activeResources: this.probe.activeResources(),
      resources: this.probe.sample(),
      recentOperations,
    };

    try {
      this.router.enqueueArtifact(fileName, diagnostics);
    } catch (err) {
      if (err instanceof TelemetryError) {
        this.log.error({ code: err.code, component: entry.component }, `Failed to queue freeze diagnostics: ${err.message}`);
        return;
      }
      throw err;
    }

    this.log.fatal(
      { fileName, lastOperations: recentOperations.slice(-5).map((op) => op.operation) },
      `Freeze diagnostics dumped to ${fileName}`,
    );
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getStatistics(): FreezeStatistics {
    const now = Date.now();
    const uptimeSeconds = (now - this.startedAt) / 1000;

    const watchdogs: Record<string, WatchdogStatus> = {};
    for (const [name, entry] of this.watchdogs) {
      watchdogs[name] = {
        active: entry.active,
        frozen: entry.frozen,
        timeoutSeconds: entry.timeoutSeconds,
        secondsSinceHeartbeat: round1((now - entry.lastHeartbeat) / 1000),
      };
    }

    return {
      monitoring: this.isMonitoring(),
      freezesDetected: this.freezesDetected,
      recoveries: this.recoveries,
      totalHeartbeats: this.totalHeartbeats,
      heartbeatRate: this.totalHeartbeats / Math.max(1, uptimeSeconds),
      uptimeSeconds,
      watchdogs,
      recentFreezes: [...this.freezeEvents],
    };
  }

  getRecentFreezes(limit = 20): FreezeEvent[] {
    return this.freezeEvents.slice(-limit);
  }

  healthCheck(): FreezeHealth {
    const cutoff = Date.now() - HOUR_MS;
    const frozenWatchdogs: string[] = [];
    let activeWatchdogs = 0;

    for (const [name, entry] of this.watchdogs) {
      if (entry.active) activeWatchdogs++;
      if (entry.frozen) frozenWatchdogs.push(name);
    }
    const recentFreezeCount = this.freezeEvents.filter((e) => Date.parse(e.timestamp) >= cutoff).length;
    const monitoring = this.isMonitoring();

    return {
      healthy: monitoring && frozenWatchdogs.length === 0 && recentFreezeCount < HEALTHY_FREEZES_PER_HOUR,
      monitoring,
      frozenWatchdogs,
      recentFreezeCount,
      activeWatchdogs,
    };
  }
}
