// ---------------------------------------------------------------------------
// Telemetry errors
// ---------------------------------------------------------------------------

export type TelemetryErrorCode =
  | "CONFIG_INVALID"
  | "RUN_SETUP_FAILED"
  | "LOG_QUEUE_FULL"
  | "ROUTER_CLOSED";

export class TelemetryError extends Error {
  readonly code: TelemetryErrorCode;

  constructor(code: TelemetryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid interval, timeout or capacity. Raised at construction; not recoverable. */
export class ConfigurationError extends TelemetryError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Invalid telemetry configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** The run directory or one of its category files could not be created. */
export class RunSetupError extends TelemetryError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("RUN_SETUP_FAILED", `Cannot create log path ${path}: ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

/** The log queue is at capacity; the caller should degrade rather than retry. */
export class LogQueueFullError extends TelemetryError {
  readonly capacity: number;

  constructor(capacity: number) {
    super("LOG_QUEUE_FULL", `Log queue is full (${capacity} records) - system may be overloaded`);
    this.capacity = capacity;
  }
}

/** The log router has been shut down and accepts no further records. */
export class RouterClosedError extends TelemetryError {
  constructor() {
    super("ROUTER_CLOSED", "Log router is shut down");
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
