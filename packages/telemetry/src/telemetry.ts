import { createLogger } from "@teststand/shared/utils";

import { validateTelemetryConfig, type TelemetryConfig } from "./config.js";
import { CommLogger, type CommStatistics } from "./services/comm-logger.js";
import {
  ErrorRecoveryEngine,
  type ErrorRecoveryOptions,
  type RecoveryHealth,
  type RecoveryStats,
} from "./services/error-recovery.js";
import { EventRecorder, type EventSummary } from "./services/event-recorder.js";
import { FreezeDetector, type FreezeHealth, type FreezeStatistics } from "./services/freeze-detector.js";
import { LogRouter, type LogRouterStats } from "./services/log-router.js";
import {
  PerformanceMonitor,
  type AlertStatistics,
  type PerformanceHealth,
} from "./services/performance-monitor.js";
import { NodeResourceProbe, type ResourceProbe } from "./services/resource-probe.js";
import type { MetricSnapshot } from "./types.js";

const logger = createLogger("telemetry");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Test and embedding hooks; everything else comes from TelemetryConfig. */
export interface TelemetryOverrides {
  probe?: ResourceProbe;
  sessionId?: number;
  /** Clock for run ids and record timestamps. */
  clock?: () => Date;
  includeProcessReport?: boolean;
  recovery?: Omit<ErrorRecoveryOptions, "circuitThreshold" | "cooldownSeconds">;
}

export interface TelemetryHealth {
  healthy: boolean;
  timestamp: string;
  router: LogRouterStats;
  events: EventSummary;
  performance: {
    health: PerformanceHealth;
    metrics: Record<string, MetricSnapshot>;
    alerts: AlertStatistics;
  };
  serial: CommStatistics;
  freeze: {
    health: FreezeHealth;
    statistics: FreezeStatistics;
  };
  recovery: {
    health: RecoveryHealth;
    statistics: RecoveryStats;
  };
}

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------

/**
 * The six telemetry services built against one router. Construct with
 * createTelemetry(); hand the instance to whatever drives acquisition.
 */
export class Telemetry {
  readonly config: TelemetryConfig;
  readonly router: LogRouter;
  readonly recorder: EventRecorder;
  readonly performance: PerformanceMonitor;
  readonly comm: CommLogger;
  readonly freeze: FreezeDetector;
  readonly recovery: ErrorRecoveryEngine;

  private started = false;
  private stopped = false;

  constructor(config: TelemetryConfig, overrides: TelemetryOverrides = {}) {
    this.config = validateTelemetryConfig(config);

    this.router = new LogRouter({
      logDir: config.logDir,
      queueCapacity: config.queueCapacity,
      maxFileBytes: config.maxFileBytes,
      backupCount: config.backupCount,
      shutdownTimeoutMs: config.shutdownTimeoutMs,
      now: overrides.clock,
    });
    this.recorder = new EventRecorder(this.router, overrides.sessionId);

    const probe = overrides.probe ?? new NodeResourceProbe();
    this.performance = new PerformanceMonitor(this.router, {
      sampleIntervalSeconds: config.sampleIntervalSeconds,
      logIntervalSeconds: config.logIntervalSeconds,
      slowOperationMs: config.slowOperationMs,
      memoryCeilingMb: config.memoryCeilingMb,
      probe,
      recorder: this.recorder,
    });
    this.comm = new CommLogger(this.router, { bufferSize: config.serialBufferSize });
    this.freeze = new FreezeDetector(this.router, this.recorder, {
      pollIntervalMs: config.watchdogPollMs,
      minHeartbeatIntervalSeconds: config.minHeartbeatIntervalSeconds,
      probe,
      includeProcessReport: overrides.includeProcessReport,
    });
    this.recovery = new ErrorRecoveryEngine(this.router, this.recorder, {
      ...overrides.recovery,
      circuitThreshold: config.circuitThreshold,
      cooldownSeconds: config.circuitCooldownSeconds,
    });
  }

  /**
   * Create the run directory and start the background loops. Throws
   * RunSetupError when the run cannot be created.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.router.start();
    this.performance.start();
    this.freeze.start();
    this.recorder.recordStartup({ runId: this.router.currentRun().id, pid: process.pid });
    logger.info({ runId: this.router.currentRun().id }, "Telemetry started");
  }

  /**
   * Record shutdown, stop the sampler and poll loop, then drain the router.
   * Resolves false when any loop missed its deadline.
   */
  async stop(): Promise<boolean> {
    if (this.stopped) return true;
    this.stopped = true;

    if (this.started) this.recorder.recordShutdown();
    this.performance.stop();

    const clean = await this.freeze.stop(this.config.shutdownTimeoutMs);
    const drained = await this.router.shutdown(this.config.shutdownTimeoutMs);
    logger.info({ clean: clean && drained }, "Telemetry stopped");
    return clean && drained;
  }

  getHealth(): TelemetryHealth {
    const performance = this.performance.checkHealth();
    const freeze = this.freeze.healthCheck();
    const recovery = this.recovery.healthCheck();

    return {
      healthy: performance.healthy && freeze.healthy && recovery.healthy,
      timestamp: new Date().toISOString(),
      router: this.router.getStats(),
      events: this.recorder.getSummary(),
      performance: {
        health: performance,
        metrics: this.performance.getStatistics(),
        alerts: this.performance.getAlertStatistics(),
      },
      serial: this.comm.getStatistics(),
      freeze: { health: freeze, statistics: this.freeze.getStatistics() },
      recovery: { health: recovery, statistics: this.recovery.getRecoveryStats() },
    };
  }
}

/**
 * Build Router, Recorder, Performance Monitor, Communication Logger, Freeze
 * Detector and Recovery Engine in that order. Configuration problems throw
 * ConfigurationError before anything is started.
 */
export function createTelemetry(config: TelemetryConfig, overrides?: TelemetryOverrides): Telemetry {
  return new Telemetry(config, overrides);
}
