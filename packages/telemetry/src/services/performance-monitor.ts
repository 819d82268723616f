import { ConfigurationError } from "../errors.js";
import { checkPositive, DEFAULT_TELEMETRY_CONFIG } from "../config.js";
import type { MetricSnapshot, MetricStat, ResourceSnapshot } from "../types.js";
import type { EventRecorder } from "./event-recorder.js";
import type { LogRouter } from "./log-router.js";
import { NodeResourceProbe, type ResourceProbe } from "./resource-probe.js";
import { createRunLogger, type RunLogger } from "./run-logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Resource metrics are updated continuously and survive window resets. */
const SYSTEM_METRIC_PREFIXES = ["memory_", "cpu_", "handle_"];

const MAX_HEALTHY_HANDLES = 50;

/** Operations with this prefix are request handlers and get response-time alerting. */
const API_PREFIX = "api_";

export type AlertTier = "warning" | "critical";

export interface AlertThresholds {
  cpuWarningPercent: number;
  cpuCriticalPercent: number;
  dataLagWarningMs: number;
  dataLagCriticalMs: number;
  apiWarningMs: number;
  apiCriticalMs: number;
}

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  cpuWarningPercent: 80,
  cpuCriticalPercent: 95,
  dataLagWarningMs: 1000,
  dataLagCriticalMs: 5000,
  apiWarningMs: 500,
  apiCriticalMs: 2000,
};

export interface AlertStatistics {
  alertsSent: number;
  apiCalls: number;
  slowApiCalls: number;
  slowApiCallRate: number;
}

export interface PerformanceMonitorOptions {
  sampleIntervalSeconds?: number;
  logIntervalSeconds?: number;
  slowOperationMs?: number;
  memoryCeilingMb?: number;
  probe?: ResourceProbe;
  /** Receives a performance_alert event for every alert raised. */
  recorder?: EventRecorder;
  alertThresholds?: Partial<AlertThresholds>;
  /** Millisecond clock for timers. */
  now?: () => number;
}

export interface PerformanceHealth {
  healthy: boolean;
  issues: string[];
  memoryMb: number;
  handleCount: number;
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

export function isSystemMetric(name: string): boolean {
  return SYSTEM_METRIC_PREFIXES.some((prefix) => name.startsWith(prefix));
}

function tierOf(value: number, warning: number, critical: number): AlertTier | null {
  if (value >= critical) return "critical";
  if (value >= warning) return "warning";
  return null;
}

function checkThresholdPair(name: string, warning: number, critical: number): string[] {
  const issues = [...checkPositive(`${name}Warning`, warning), ...checkPositive(`${name}Critical`, critical)];
  if (issues.length === 0 && warning >= critical) {
    issues.push(`${name} warning threshold ${warning} must be below the critical threshold ${critical}`);
  }
  return issues;
}

function emptyStat(name: string, unit: string): MetricStat {
  return { name, unit, count: 0, total: 0, min: Number.POSITIVE_INFINITY, max: Number.NEGATIVE_INFINITY, last: 0 };
}

// ---------------------------------------------------------------------------
// PerformanceMonitor
// ---------------------------------------------------------------------------

export class PerformanceMonitor {
  private readonly router: LogRouter;
  private readonly log: RunLogger;
  private readonly probe: ResourceProbe;
  private readonly recorder: EventRecorder | undefined;
  private readonly now: () => number;

  private readonly sampleIntervalSeconds: number;
  private readonly logIntervalSeconds: number;
  private readonly slowOperationMs: number;
  private readonly memoryCeilingMb: number;
  private readonly thresholds: AlertThresholds;

  private metrics = new Map<string, MetricStat>();
  private lastResources: ResourceSnapshot = { memoryMb: 0, cpuPercent: null, handleCount: 0 };
  private aboveCeiling = false;
  private cpuTier: AlertTier | null = null;
  private dataLagTier: AlertTier | null = null;
  private alertsSent = 0;
  private apiCalls = 0;
  private slowApiCalls = 0;
  private lastFlush: number;

  private sampleHandle: ReturnType<typeof setInterval> | null = null;
  private flushHandle: ReturnType<typeof setInterval> | null = null;

  constructor(router: LogRouter, options: PerformanceMonitorOptions = {}) {
    this.router = router;
    this.log = createRunLogger(router, "performance-monitor");
    this.probe = options.probe ?? new NodeResourceProbe();
    this.recorder = options.recorder;
    this.now = options.now ?? (() => performance.now());

    this.sampleIntervalSeconds = options.sampleIntervalSeconds ?? DEFAULT_TELEMETRY_CONFIG.sampleIntervalSeconds;
    this.logIntervalSeconds = options.logIntervalSeconds ?? DEFAULT_TELEMETRY_CONFIG.logIntervalSeconds;
    this.slowOperationMs = options.slowOperationMs ?? DEFAULT_TELEMETRY_CONFIG.slowOperationMs;
    this.memoryCeilingMb = options.memoryCeilingMb ?? DEFAULT_TELEMETRY_CONFIG.memoryCeilingMb;
    this.thresholds = { ...DEFAULT_ALERT_THRESHOLDS, ...options.alertThresholds };

    const t = this.thresholds;
    const issues = [
      ...checkPositive("sampleIntervalSeconds", this.sampleIntervalSeconds),
      ...checkPositive("logIntervalSeconds", this.logIntervalSeconds),
      ...checkPositive("slowOperationMs", this.slowOperationMs),
      ...checkPositive("memoryCeilingMb", this.memoryCeilingMb),
      ...checkThresholdPair("cpuPercent", t.cpuWarningPercent, t.cpuCriticalPercent),
      ...checkThresholdPair("dataLagMs", t.dataLagWarningMs, t.dataLagCriticalMs),
      ...checkThresholdPair("apiMs", t.apiWarningMs, t.apiCriticalMs),
    ];
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    this.lastFlush = this.now();
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Start the resource sampler and the aggregation flush loop. */
  start(): void {
    if (this.sampleHandle) return;

    this.sampleHandle = setInterval(() => {
      this.sampleResources();
    }, this.sampleIntervalSeconds * 1000);
    this.flushHandle = setInterval(() => {
      this.flush();
    }, this.logIntervalSeconds * 1000);

    this.log.info(
      { probe: this.probe.kind, sampleIntervalSeconds: this.sampleIntervalSeconds },
      "Performance monitoring started",
    );
  }

  /** Stop both loops and flush whatever the current window holds. */
  stop(): void {
    if (this.sampleHandle) {
      clearInterval(this.sampleHandle);
      this.sampleHandle = null;
    }
    if (this.flushHandle) {
      clearInterval(this.flushHandle);
      this.flushHandle = null;
    }
    this.flush();
    this.log.info("Performance monitoring stopped");
  }

  isRunning(): boolean {
    return this.sampleHandle !== null;
  }

  // -----------------------------------------------------------------------
  // Recording
  // -----------------------------------------------------------------------

  recordMetric(name: string, value: number, unit = ""): void {
    let stat = this.metrics.get(name);
    if (!stat) {
      stat = emptyStat(name, unit);
      this.metrics.set(name, stat);
    }
    stat.count++;
    stat.total += value;
    stat.min = Math.min(stat.min, value);
    stat.max = Math.max(stat.max, value);
    stat.last = value;
  }

  /**
   * Start timing `operation`. The returned function records the elapsed
   * milliseconds under the operation name and returns them; calling it
   * more than once records only the first time.
   */
  startTimer(operation: string): () => number {
    const started = this.now();
    let elapsed: number | null = null;

    return () => {
      if (elapsed !== null) return elapsed;
      elapsed = this.now() - started;
      this.recordMetric(operation, elapsed, "ms");

      if (elapsed > this.slowOperationMs) {
        this.log.warn(
          { operation, durationMs: round3(elapsed) },
          `Slow operation: ${operation} took ${elapsed.toFixed(1)}ms`,
        );
        this.router.tryEnqueue(
          "performance",
          { type: "slow_operation", operation, durationMs: round3(elapsed), thresholdMs: this.slowOperationMs },
          "warn",
        );
      }
      if (operation.startsWith(API_PREFIX)) {
        this.trackApiCall(operation, elapsed);
      }
      return elapsed;
    };
  }

  /**
   * Record how far acquisition is behind real time. Alerts when the lag
   * enters the warning or critical tier.
   */
  recordDataLag(lagMs: number): void {
    this.recordMetric("data_lag_ms", lagMs, "ms");

    const { dataLagWarningMs, dataLagCriticalMs } = this.thresholds;
    const tier = tierOf(lagMs, dataLagWarningMs, dataLagCriticalMs);
    if (tier !== null && tier !== this.dataLagTier) {
      this.alert(
        `data_lag_${tier}`,
        `${tier === "critical" ? "Critical" : "High"} data lag: ${lagMs.toFixed(1)}ms`,
        lagMs,
        tier === "critical" ? dataLagCriticalMs : dataLagWarningMs,
        tier,
      );
    }
    this.dataLagTier = tier;
  }

  private trackApiCall(operation: string, elapsedMs: number): void {
    this.apiCalls++;
    const { apiWarningMs, apiCriticalMs } = this.thresholds;
    if (elapsedMs <= apiWarningMs) return;

    this.slowApiCalls++;
    if (elapsedMs > apiCriticalMs) {
      this.alert(
        "api_slow_critical",
        `Critical API response time: ${elapsedMs.toFixed(1)}ms for ${operation}`,
        elapsedMs,
        apiCriticalMs,
        "critical",
      );
    } else {
      this.alert(
        "api_slow_warning",
        `Slow API response: ${elapsedMs.toFixed(1)}ms for ${operation}`,
        elapsedMs,
        apiWarningMs,
        "warning",
      );
    }
  }

  /** One alert: a performance_alert event, a performance record and a log line. */
  private alert(alertType: string, message: string, value: number, threshold: number, tier: AlertTier): void {
    this.alertsSent++;
    const critical = tier === "critical";

    this.recorder?.record(
      "performance_alert",
      { alertType, value: round3(value), threshold },
      critical ? "CRITICAL" : "WARNING",
    );
    this.router.tryEnqueue(
      "performance",
      { type: "alert", alertType, severity: tier, value: round3(value), threshold, message },
      critical ? "error" : "warn",
    );
    if (critical) {
      this.log.error(`PERFORMANCE ALERT: ${message}`);
    } else {
      this.log.warn(`Performance alert: ${message}`);
    }
  }

  /** Time a synchronous call; the sample is recorded even if it throws. */
  measure<T>(operation: string, fn: () => T): T {
    const stop = this.startTimer(operation);
    try {
      return fn();
    } finally {
      stop();
    }
  }

  /** Time an async call; the sample is recorded when it settles either way. */
  async measureAsync<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const stop = this.startTimer(operation);
    try {
      return await fn();
    } finally {
      stop();
    }
  }

  /** Take one resource sample and feed it through recordMetric. */
  sampleResources(): ResourceSnapshot {
    let snapshot: ResourceSnapshot;
    try {
      snapshot = this.probe.sample();
    } catch (err) {
      this.log.error({ err }, "Resource sampling failed");
      return this.lastResources;
    }
    this.lastResources = snapshot;

    this.recordMetric("memory_mb", snapshot.memoryMb, "MB");
    if (snapshot.cpuPercent !== null) {
      this.recordMetric("cpu_percent", snapshot.cpuPercent, "%");
      this.checkCpu(snapshot.cpuPercent);
    }
    this.recordMetric("handle_count", snapshot.handleCount, "count");

    if (snapshot.memoryMb > this.memoryCeilingMb) {
      this.log.warn(
        { memoryMb: round3(snapshot.memoryMb), ceilingMb: this.memoryCeilingMb },
        `High memory usage: ${snapshot.memoryMb.toFixed(1)}MB`,
      );
      if (!this.aboveCeiling) {
        this.alert(
          "memory_ceiling",
          `Memory above ${this.memoryCeilingMb}MB ceiling: ${snapshot.memoryMb.toFixed(1)}MB`,
          snapshot.memoryMb,
          this.memoryCeilingMb,
          "warning",
        );
      }
      this.aboveCeiling = true;
    } else {
      this.aboveCeiling = false;
    }
    return snapshot;
  }

  /** Alert on entering the warning or critical CPU tier, not on every sample inside it. */
  private checkCpu(cpuPercent: number): void {
    const { cpuWarningPercent, cpuCriticalPercent } = this.thresholds;
    const tier = tierOf(cpuPercent, cpuWarningPercent, cpuCriticalPercent);
    if (tier !== null && tier !== this.cpuTier) {
      this.alert(
        `cpu_${tier}`,
        `${tier === "critical" ? "Critical" : "High"} CPU usage: ${cpuPercent.toFixed(1)}%`,
        cpuPercent,
        tier === "critical" ? cpuCriticalPercent : cpuWarningPercent,
        tier,
      );
    }
    this.cpuTier = tier;
  }

  /**
   * Write an aggregated snapshot of every metric to the performance stream,
   * then start a fresh window for everything except resource metrics.
   */
  flush(): void {
    const now = this.now();
    const windowSeconds = round3((now - this.lastFlush) / 1000);
    this.lastFlush = now;

    if (this.metrics.size === 0) return;

    this.router.tryEnqueue("performance", {
      type: "metrics_snapshot",
      windowSeconds,
      metrics: this.getStatistics(),
    });

    for (const [name, stat] of this.metrics) {
      if (!isSystemMetric(name)) {
        this.metrics.set(name, emptyStat(name, stat.unit));
      }
    }
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getMetric(name: string): MetricStat | undefined {
    const stat = this.metrics.get(name);
    return stat ? { ...stat } : undefined;
  }

  getStatistics(): Record<string, MetricSnapshot> {
    const result: Record<string, MetricSnapshot> = {};
    for (const [name, stat] of this.metrics) {
      const empty = stat.count === 0;
      result[name] = {
        name,
        unit: stat.unit,
        count: stat.count,
        average: empty ? 0 : round3(stat.total / stat.count),
        min: empty ? null : round3(stat.min),
        max: empty ? null : round3(stat.max),
        last: round3(stat.last),
      };
    }
    return result;
  }

  getAlertStatistics(): AlertStatistics {
    return {
      alertsSent: this.alertsSent,
      apiCalls: this.apiCalls,
      slowApiCalls: this.slowApiCalls,
      slowApiCallRate: this.apiCalls > 0 ? this.slowApiCalls / this.apiCalls : 0,
    };
  }

  getResourceSnapshot(): ResourceSnapshot {
    return { ...this.lastResources };
  }

  get resourceProbe(): ResourceProbe {
    return this.probe;
  }

  checkHealth(): PerformanceHealth {
    const { memoryMb, handleCount } = this.lastResources;
    const issues: string[] = [];

    if (memoryMb > this.memoryCeilingMb) {
      issues.push(`High memory usage: ${memoryMb.toFixed(1)}MB`);
    }
    if (handleCount > MAX_HEALTHY_HANDLES) {
      issues.push(`High active handle count: ${handleCount}`);
    }
    return { healthy: issues.length === 0, issues, memoryMb: round3(memoryMb), handleCount };
  }
}
