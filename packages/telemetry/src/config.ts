import { validateEnvironment, type EnvRequirement, type EnvSource } from "@teststand/shared/utils";
import { ConfigurationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Telemetry configuration
// ---------------------------------------------------------------------------

export interface TelemetryConfig {
  logDir: string;
  queueCapacity: number;
  maxFileBytes: number;
  backupCount: number;
  shutdownTimeoutMs: number;
  sampleIntervalSeconds: number;
  logIntervalSeconds: number;
  slowOperationMs: number;
  memoryCeilingMb: number;
  watchdogPollMs: number;
  minHeartbeatIntervalSeconds: number;
  serialBufferSize: number;
  circuitThreshold: number;
  circuitCooldownSeconds: number;
}

export const DEFAULT_TELEMETRY_CONFIG: TelemetryConfig = {
  logDir: "logs",
  queueCapacity: 10_000,
  maxFileBytes: 100 * 1024 * 1024,
  backupCount: 7,
  shutdownTimeoutMs: 2_000,
  sampleIntervalSeconds: 1,
  logIntervalSeconds: 60,
  slowOperationMs: 500,
  memoryCeilingMb: 500,
  watchdogPollMs: 1_000,
  minHeartbeatIntervalSeconds: 0.5,
  serialBufferSize: 1_000,
  circuitThreshold: 10,
  circuitCooldownSeconds: 60,
};

type NumericKey = Exclude<keyof TelemetryConfig, "logDir">;

interface NumericVar {
  env: string;
  key: NumericKey;
  integer: boolean;
}

const NUMERIC_VARS: NumericVar[] = [
  { env: "TELEMETRY_QUEUE_CAPACITY", key: "queueCapacity", integer: true },
  { env: "TELEMETRY_MAX_FILE_BYTES", key: "maxFileBytes", integer: true },
  { env: "TELEMETRY_BACKUP_COUNT", key: "backupCount", integer: true },
  { env: "TELEMETRY_SHUTDOWN_TIMEOUT_MS", key: "shutdownTimeoutMs", integer: true },
  { env: "TELEMETRY_SAMPLE_INTERVAL_S", key: "sampleIntervalSeconds", integer: false },
  { env: "TELEMETRY_LOG_INTERVAL_S", key: "logIntervalSeconds", integer: false },
  { env: "TELEMETRY_SLOW_OPERATION_MS", key: "slowOperationMs", integer: false },
  { env: "TELEMETRY_MEMORY_CEILING_MB", key: "memoryCeilingMb", integer: false },
  { env: "TELEMETRY_WATCHDOG_POLL_MS", key: "watchdogPollMs", integer: true },
  { env: "TELEMETRY_MIN_HEARTBEAT_INTERVAL_S", key: "minHeartbeatIntervalSeconds", integer: false },
  { env: "TELEMETRY_SERIAL_BUFFER_SIZE", key: "serialBufferSize", integer: true },
  { env: "TELEMETRY_CIRCUIT_THRESHOLD", key: "circuitThreshold", integer: true },
  { env: "TELEMETRY_CIRCUIT_COOLDOWN_S", key: "circuitCooldownSeconds", integer: false },
];

export const TELEMETRY_ENV_REQUIREMENTS: EnvRequirement[] = [
  {
    name: "TELEMETRY_LOG_DIR",
    required: false,
    default: DEFAULT_TELEMETRY_CONFIG.logDir,
    description: "Parent directory for run directories",
  },
  ...NUMERIC_VARS.map((v) => ({
    name: v.env,
    required: false,
    default: String(DEFAULT_TELEMETRY_CONFIG[v.key]),
  })),
];

/**
 * Collect the problems with a numeric setting. Every interval, timeout and
 * capacity must be a positive finite number; counts must be integers.
 */
export function checkPositive(
  name: string,
  value: number,
  integer = false,
  raw: string = String(value),
): string[] {
  if (!Number.isFinite(value) || value <= 0) {
    return [`${name} must be a positive number (got ${raw})`];
  }
  if (integer && !Number.isInteger(value)) {
    return [`${name} must be an integer (got ${raw})`];
  }
  return [];
}

/** Validate a complete config object, throwing ConfigurationError on any issue. */
export function validateTelemetryConfig(config: TelemetryConfig): TelemetryConfig {
  const issues: string[] = [];
  if (config.logDir.trim() === "") {
    issues.push("logDir must not be empty");
  }
  for (const v of NUMERIC_VARS) {
    issues.push(...checkPositive(v.key, config[v.key], v.integer));
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return config;
}

/**
 * Build the telemetry configuration from environment variables, falling back
 * to the defaults above for anything unset.
 */
export function loadTelemetryConfig(env: EnvSource = process.env): TelemetryConfig {
  const { values } = validateEnvironment(TELEMETRY_ENV_REQUIREMENTS, false, env);

  const issues: string[] = [];
  const config: TelemetryConfig = { ...DEFAULT_TELEMETRY_CONFIG };
  config.logDir = values["TELEMETRY_LOG_DIR"] ?? DEFAULT_TELEMETRY_CONFIG.logDir;

  for (const v of NUMERIC_VARS) {
    const raw = values[v.env];
    if (raw === undefined) continue;
    const parsed = Number(raw);
    const problems = checkPositive(v.env, parsed, v.integer, JSON.stringify(raw));
    if (problems.length > 0) {
      issues.push(...problems);
      continue;
    }
    config[v.key] = parsed;
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return validateTelemetryConfig(config);
}
