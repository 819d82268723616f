export * from "./types.js";
export * from "./errors.js";
export {
  DEFAULT_TELEMETRY_CONFIG,
  TELEMETRY_ENV_REQUIREMENTS,
  loadTelemetryConfig,
  validateTelemetryConfig,
  type TelemetryConfig,
} from "./config.js";

export {
  CATEGORY_FILES,
  LATEST_POINTER,
  LogRouter,
  resolveLatestRun,
  type DataSample,
  type LogRouterOptions,
  type LogRouterStats,
} from "./services/log-router.js";
export { createRunLogger, type RunLogger } from "./services/run-logger.js";
export {
  EventRecorder,
  type ClientAction,
  type ConnectionAction,
  type EventSummary,
  type RecordedEvent,
} from "./services/event-recorder.js";
export {
  NodeResourceProbe,
  NoopResourceProbe,
  type ResourceProbe,
} from "./services/resource-probe.js";
export {
  DEFAULT_ALERT_THRESHOLDS,
  PerformanceMonitor,
  isSystemMetric,
  type AlertStatistics,
  type AlertThresholds,
  type AlertTier,
  type PerformanceHealth,
  type PerformanceMonitorOptions,
} from "./services/performance-monitor.js";
export {
  CommLogger,
  analyzeProtocol,
  safeAscii,
  summarizeRoundTrips,
  type CommLoggerOptions,
  type CommStatistics,
  type Frame,
  type RecentCommunications,
  type RoundTripStats,
} from "./services/comm-logger.js";
export {
  FreezeDetector,
  type FreezeDetectorOptions,
  type FreezeHealth,
  type FreezeStatistics,
  type WatchdogStatus,
} from "./services/freeze-detector.js";
export {
  DEFAULT_STRATEGIES,
  ErrorRecoveryEngine,
  backoffDelay,
  type CategoryStats,
  type ErrorRecoveryOptions,
  type RecoveryAction,
  type RecoveryActionOverride,
  type RecoveryHealth,
  type RecoveryStats,
  type RecoveryStrategy,
  type RetryPolicy,
  type StrategyEnv,
} from "./services/error-recovery.js";
export {
  Telemetry,
  createTelemetry,
  type TelemetryHealth,
  type TelemetryOverrides,
} from "./telemetry.js";
