import type { LogRouter } from "./log-router.js";
import { createRunLogger, type RunLogger } from "./run-logger.js";
import type { EventKind, LogLevel, SensorReading, Severity, ThresholdZone } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SEVERITY_LEVEL: Record<Severity, LogLevel> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  ERROR: "error",
  CRITICAL: "fatal",
};

const CONNECTION_KINDS = {
  connect: "serial_connect",
  disconnect: "serial_disconnect",
  error: "serial_error",
  reconnect: "serial_reconnect",
} as const satisfies Record<string, EventKind>;

const CLIENT_KINDS = {
  connect: "client_connect",
  disconnect: "client_disconnect",
  throttled: "client_throttled",
  recovered: "client_recovered",
} as const satisfies Record<string, EventKind>;

export type ConnectionAction = keyof typeof CONNECTION_KINDS;
export type ClientAction = keyof typeof CLIENT_KINDS;

export interface RecordedEvent {
  kind: EventKind;
  severity: Severity;
  sessionId: number;
  sequence: number;
  details: Record<string, unknown>;
}

export interface EventSummary {
  sessionId: number;
  sessionDurationSeconds: number;
  eventCounts: Partial<Record<EventKind, number>>;
  totalEvents: number;
}

// ---------------------------------------------------------------------------
// EventRecorder
// ---------------------------------------------------------------------------

/**
 * Typed domain events (connection state, threshold crossings, valve and mode
 * changes) written to the events stream. ERROR and CRITICAL events are also
 * copied to the errors stream.
 *
 * Threshold events are deduplicated against the last zone seen per sensor;
 * discrete actions (connection, mode, valve) are always recorded.
 */
export class EventRecorder {
  private readonly router: LogRouter;
  private readonly log: RunLogger;
  private readonly sessionId: number;
  private readonly startedAt = Date.now();

  private readonly counts = new Map<EventKind, number>();
  private readonly sensorZones = new Map<string, ThresholdZone>();
  private readonly valveStates = new Map<string, boolean>();

  constructor(router: LogRouter, sessionId: number = Math.floor(Date.now() / 1000)) {
    this.router = router;
    this.log = createRunLogger(router, "event-recorder");
    this.sessionId = sessionId;
  }

  /**
   * Record one event. Assigns the per-kind sequence number and forwards the
   * event to the router; returns what was recorded.
   */
  record(kind: EventKind, details: Record<string, unknown>, severity: Severity = "INFO"): RecordedEvent {
    const sequence = (this.counts.get(kind) ?? 0) + 1;
    this.counts.set(kind, sequence);

    const event: RecordedEvent = { kind, severity, sessionId: this.sessionId, sequence, details };
    const level = SEVERITY_LEVEL[severity];
    const payload = {
      eventType: kind,
      severity,
      sessionId: this.sessionId,
      sequence,
      details,
    };

    this.router.tryEnqueue("events", payload, level);
    if (severity === "ERROR" || severity === "CRITICAL") {
      this.router.tryEnqueue("errors", payload, level);
    }
    return event;
  }

  // -----------------------------------------------------------------------
  // Thresholds
  // -----------------------------------------------------------------------

  /**
   * Record a sensor's current zone. Emits only when the zone differs from
   * the last one seen for this sensor, except that danger and critical are
   * emitted on every call so escalations are never deduplicated away.
   * Returns the recorded event, or null when suppressed.
   */
  recordThreshold(
    sensorId: string,
    sensorName: string,
    value: number,
    threshold: number,
    zone: ThresholdZone,
    unit = "",
  ): RecordedEvent | null {
    const previous = this.sensorZones.get(sensorId) ?? "normal";
    const alwaysEmit = zone === "danger" || zone === "critical";
    if (zone === previous && !alwaysEmit) return null;

    this.sensorZones.set(sensorId, zone);

    let kind: EventKind;
    let severity: Severity;
    switch (zone) {
      case "critical":
        kind = "threshold_critical";
        severity = "ERROR";
        break;
      case "danger":
        kind = "threshold_danger";
        severity = "WARNING";
        break;
      case "warning":
        kind = "threshold_warning";
        severity = "WARNING";
        break;
      default:
        kind = "sensor_normal";
        severity = "INFO";
    }

    if (zone === "critical") {
      this.log.error(
        { sensorId, value, threshold, unit },
        `CRITICAL: ${sensorName} at ${value}${unit} exceeds critical threshold ${threshold}${unit}`,
      );
    }

    return this.record(
      kind,
      {
        sensorId,
        sensorName,
        value: Math.round(value * 100) / 100,
        threshold,
        thresholdType: zone,
        unit,
        stateChange: `${previous} -> ${zone}`,
      },
      severity,
    );
  }

  /**
   * Classify each reading against its warning/danger values and record the
   * result. A reading below both thresholds is recorded only when the sensor
   * is leaving a non-normal zone.
   */
  checkThresholds(readings: SensorReading[]): RecordedEvent[] {
    const recorded: RecordedEvent[] = [];

    for (const r of readings) {
      const warning = r.warningValue ?? Number.POSITIVE_INFINITY;
      const danger = r.dangerValue ?? Number.POSITIVE_INFINITY;
      let event: RecordedEvent | null = null;

      if (r.value >= danger) {
        event = this.recordThreshold(r.sensorId, r.sensorName, r.value, danger, "danger", r.unit);
      } else if (r.value >= warning) {
        event = this.recordThreshold(r.sensorId, r.sensorName, r.value, warning, "warning", r.unit);
      } else if ((this.sensorZones.get(r.sensorId) ?? "normal") !== "normal") {
        event = this.recordThreshold(r.sensorId, r.sensorName, r.value, warning, "normal", r.unit);
      }

      if (event) recorded.push(event);
    }
    return recorded;
  }

  getSensorZone(sensorId: string): ThresholdZone {
    return this.sensorZones.get(sensorId) ?? "normal";
  }

  // -----------------------------------------------------------------------
  // Discrete actions (never deduplicated)
  // -----------------------------------------------------------------------

  recordValve(
    valveId: string,
    valveName: string,
    open: boolean,
    commandSource = "system",
    success = true,
  ): RecordedEvent {
    const previous = this.valveStates.get(valveId);
    const kind: EventKind = !success ? "valve_error" : open ? "valve_open" : "valve_close";

    const event = this.record(
      kind,
      {
        valveId,
        valveName,
        newState: open ? "open" : "closed",
        previousState: previous === undefined ? "unknown" : previous ? "open" : "closed",
        commandSource,
        success,
      },
      success ? "INFO" : "ERROR",
    );

    if (success) this.valveStates.set(valveId, open);
    return event;
  }

  recordConnection(action: ConnectionAction, details: Record<string, unknown> = {}): RecordedEvent {
    return this.record(CONNECTION_KINDS[action], details, action === "error" ? "ERROR" : "INFO");
  }

  recordModeChange(fromMode: string, toMode: string, reason = ""): RecordedEvent {
    return this.record("mode_change", { fromMode, toMode, reason });
  }

  recordClient(clientId: string, action: ClientAction, details: Record<string, unknown> = {}): RecordedEvent {
    return this.record(
      CLIENT_KINDS[action],
      { clientId, event: action, ...details },
      action === "throttled" ? "WARNING" : "INFO",
    );
  }

  recordStartup(details: Record<string, unknown> = {}): RecordedEvent {
    return this.record("startup", { startupTime: Date.now() / 1000, ...details });
  }

  recordShutdown(): RecordedEvent {
    const uptime = this.uptimeSeconds();
    return this.record("shutdown", {
      uptimeSeconds: uptime,
      uptimeFormatted: `${(uptime / 3600).toFixed(1)}h`,
      eventSummary: Object.fromEntries(this.counts),
    });
  }

  getSummary(): EventSummary {
    let total = 0;
    for (const n of this.counts.values()) total += n;
    return {
      sessionId: this.sessionId,
      sessionDurationSeconds: this.uptimeSeconds(),
      eventCounts: Object.fromEntries(this.counts),
      totalEvents: total,
    };
  }

  private uptimeSeconds(): number {
    return (Date.now() - this.startedAt) / 1000;
  }
}
