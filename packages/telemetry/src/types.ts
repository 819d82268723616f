// ---------------------------------------------------------------------------
// Telemetry Types
// ---------------------------------------------------------------------------

export type LogCategory = "events" | "errors" | "performance" | "serial" | "system" | "data";

export const LOG_CATEGORIES: readonly LogCategory[] = [
  "events",
  "errors",
  "performance",
  "serial",
  "system",
  "data",
];

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export interface LogRecord {
  category: LogCategory;
  /** ISO-8601 */
  timestamp: string;
  level: LogLevel;
  /** Structured fields for JSON streams; `message` is the text for the system stream. */
  payload: Record<string, unknown>;
}

export interface Run {
  id: string;
  directory: string;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type Severity = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "CRITICAL";

export type EventKind =
  | "serial_connect"
  | "serial_disconnect"
  | "serial_error"
  | "serial_reconnect"
  | "threshold_warning"
  | "threshold_danger"
  | "threshold_critical"
  | "sensor_normal"
  | "valve_open"
  | "valve_close"
  | "valve_error"
  | "mode_change"
  | "config_reload"
  | "freeze_detected"
  | "freeze_recovered"
  | "startup"
  | "shutdown"
  | "error_recovery"
  | "error_escalation"
  | "performance_alert"
  | "client_connect"
  | "client_disconnect"
  | "client_throttled"
  | "client_recovered";

export type ThresholdZone = "normal" | "warning" | "danger" | "critical";

export interface SensorReading {
  sensorId: string;
  sensorName: string;
  value: number;
  unit: string;
  warningValue?: number;
  dangerValue?: number;
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export interface MetricStat {
  name: string;
  unit: string;
  count: number;
  total: number;
  min: number;
  max: number;
  last: number;
}

export interface MetricSnapshot {
  name: string;
  unit: string;
  count: number;
  average: number;
  min: number | null;
  max: number | null;
  last: number;
}

export interface ResourceSnapshot {
  memoryMb: number;
  /** null until a previous sample exists to diff against */
  cpuPercent: number | null;
  handleCount: number;
}

// ---------------------------------------------------------------------------
// Watchdogs
// ---------------------------------------------------------------------------

export type FreezeCallback = (component: string, frozenForSeconds: number) => void | Promise<void>;

export interface WatchdogEntry {
  component: string;
  timeoutSeconds: number;
  /** epoch ms */
  lastHeartbeat: number;
  active: boolean;
  frozen: boolean;
  /** epoch ms of the NORMAL -> FROZEN transition, null while NORMAL */
  frozenAt: number | null;
  callback?: FreezeCallback;
}

export interface FreezeEvent {
  timestamp: string;
  component: string;
  frozenForSeconds: number;
  timeoutSeconds: number;
  freezeNumber: number;
}

export interface OperationEntry {
  timestamp: string;
  operation: string;
  details: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Error recovery
// ---------------------------------------------------------------------------

export type ErrorCategory =
  | "connection_loss"
  | "timeout"
  | "parse_failure"
  | "file_write"
  | "resource_exhaustion"
  | "generic";

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  "connection_loss",
  "timeout",
  "parse_failure",
  "file_write",
  "resource_exhaustion",
  "generic",
];

/** Hooks and data the caller hands to a recovery strategy. */
export interface RecoveryContext {
  port?: string;
  reconnect?: () => void | Promise<void>;
  fallback?: () => void | Promise<void>;
  cleanup?: () => void | Promise<void>;
  buffer?: (data: unknown) => void | Promise<void>;
  resetParser?: () => void | Promise<void>;
  data?: unknown;
  [key: string]: unknown;
}

export interface CircuitBreakerState {
  category: ErrorCategory;
  consecutiveFailures: number;
  /** epoch ms; null while CLOSED */
  openUntil: number | null;
}

export type EscalationHook = (category: ErrorCategory, message: string) => void | Promise<void>;

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number; recovered: boolean };

// ---------------------------------------------------------------------------
// Serial link
// ---------------------------------------------------------------------------

export type Direction = "tx" | "rx";

export type ProtocolErrorKind = "json_parse" | "malformed" | "checksum";

export interface CommEntry {
  sequence: number;
  timestamp: string;
  /** ms since the previous message in the same direction */
  sinceLastMs: number | null;
  /** rx only: ms since the most recent tx */
  roundTripMs: number | null;
  command: string | null;
  hex: string;
  ascii: string;
  length: number;
  parsed: unknown;
  valid: boolean;
}

export type ProtocolFormat = "unknown" | "json" | "NMEA" | "AT_COMMAND" | "STX_ETX";

export interface ProtocolAnalysis {
  length: number;
  startsWith: string;
  endsWith: string;
  containsJson: boolean;
  parsedJson?: unknown;
  lineEndings: "CRLF" | "LF" | "CR" | null;
  potentialFormat: ProtocolFormat;
}
