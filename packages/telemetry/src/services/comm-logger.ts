import { ConfigurationError, TelemetryError, describeError } from "../errors.js";
import { checkPositive, DEFAULT_TELEMETRY_CONFIG } from "../config.js";
import type { CommEntry, Direction, ProtocolAnalysis, ProtocolErrorKind } from "../types.js";
import { formatStamp, type LogRouter } from "./log-router.js";
import { createRunLogger, type RunLogger } from "./run-logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Frame = Uint8Array | string;

export interface CommLoggerOptions {
  bufferSize?: number;
  /** Epoch-millisecond clock. */
  now?: () => number;
}

export interface RoundTripStats {
  min: number;
  avg: number;
  max: number;
}

export interface CommStatistics {
  totalTx: number;
  totalRx: number;
  bytesTx: number;
  bytesRx: number;
  timeouts: number;
  jsonParseErrors: number;
  malformedMessages: number;
  checksumErrors: number;
  reconnections: number;
  failedReconnections: number;
  errorCount: number;
  /** errorCount / totalRx, 0 before anything is received */
  errorRate: number;
  /** over the buffered receive window; null if no round trip was measured */
  roundTripMs: RoundTripStats | null;
}

export interface RecentCommunications {
  tx: CommEntry[];
  rx: CommEntry[];
  stats: CommStatistics;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toBytes(frame: Frame): Buffer {
  return typeof frame === "string" ? Buffer.from(frame, "utf-8") : Buffer.from(frame);
}

/** Printable ASCII kept as-is; everything else as \xNN. */
export function safeAscii(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b >= 32 && b <= 126 ? String.fromCharCode(b) : `\\x${b.toString(16).padStart(2, "0")}`;
  }
  return out;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: describeError(err) };
  }
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/** min/avg/max in one pass; null for an empty window. */
export function summarizeRoundTrips(values: readonly number[]): RoundTripStats | null {
  if (values.length === 0) return null;
  const { min, max, sum } = values.reduce(
    (acc, v) => ({ min: Math.min(acc.min, v), max: Math.max(acc.max, v), sum: acc.sum + v }),
    { min: Infinity, max: -Infinity, sum: 0 },
  );
  return { min, avg: round1(sum / values.length), max };
}

/**
 * Heuristic look at a raw frame for diagnostic dumps. Never used to decode.
 */
export function analyzeProtocol(frame: Frame): ProtocolAnalysis {
  const bytes = toBytes(frame);
  const head = bytes.subarray(0, 4).toString("hex");
  const tail = bytes.subarray(Math.max(0, bytes.length - 4)).toString("hex");

  const analysis: ProtocolAnalysis = {
    length: bytes.length,
    startsWith: head,
    endsWith: tail,
    containsJson: false,
    lineEndings: null,
    potentialFormat: "unknown",
  };

  const text = bytes.toString("utf-8");
  const open = text.indexOf("{");
  const close = text.lastIndexOf("}");
  if (open !== -1 && close !== -1) {
    analysis.containsJson = true;
    analysis.potentialFormat = "json";
    const parsed = close > open ? parseJson(text.slice(open, close + 1)) : null;
    if (parsed?.ok) analysis.parsedJson = parsed.value;
  }

  if (text.includes("\r\n")) analysis.lineEndings = "CRLF";
  else if (text.includes("\n")) analysis.lineEndings = "LF";
  else if (text.includes("\r")) analysis.lineEndings = "CR";

  if (bytes[0] === 0x24) {
    analysis.potentialFormat = "NMEA";
  } else if (bytes[0] === 0x41 && bytes[1] === 0x54) {
    analysis.potentialFormat = "AT_COMMAND";
  } else if (bytes.includes(0x02) && bytes.includes(0x03)) {
    analysis.potentialFormat = "STX_ETX";
  }

  return analysis;
}

// ---------------------------------------------------------------------------
// CommLogger
// ---------------------------------------------------------------------------

/**
 * Protocol-level transmit/receive log for the serial link. Keeps the last
 * `bufferSize` frames per direction for dumps and writes one summary line
 * per frame to the serial stream.
 */
export class CommLogger {
  private readonly router: LogRouter;
  private readonly log: RunLogger;
  private readonly bufferSize: number;
  private readonly now: () => number;

  private readonly buffers: Record<Direction, CommEntry[]> = { tx: [], rx: [] };
  private readonly sequence: Record<Direction, number> = { tx: 0, rx: 0 };
  private readonly lastAt: Record<Direction, number | null> = { tx: null, rx: null };

  private readonly counters = {
    bytesTx: 0,
    bytesRx: 0,
    timeouts: 0,
    jsonParseErrors: 0,
    malformedMessages: 0,
    checksumErrors: 0,
    reconnections: 0,
    failedReconnections: 0,
  };

  constructor(router: LogRouter, options: CommLoggerOptions = {}) {
    this.router = router;
    this.log = createRunLogger(router, "comm-logger");
    this.bufferSize = options.bufferSize ?? DEFAULT_TELEMETRY_CONFIG.serialBufferSize;
    this.now = options.now ?? (() => Date.now());

    const issues = checkPositive("bufferSize", this.bufferSize, true);
    if (issues.length > 0) throw new ConfigurationError(issues);
  }

  // -----------------------------------------------------------------------
  // Frames
  // -----------------------------------------------------------------------

  logSent(frame: Frame, command: string | null = null): CommEntry {
    const bytes = toBytes(frame);
    const entry = this.append("tx", bytes, { command, roundTripMs: null, parsed: null, valid: true });
    this.counters.bytesTx += bytes.length;

    const message =
      `TX[${entry.sequence}] ${command ?? "DATA"} (${bytes.length} bytes): ` +
      `HEX=${entry.hex.slice(0, 100)} ASCII=${entry.ascii.slice(0, 50)}`;
    this.router.tryEnqueue("serial", { direction: "tx", sequence: entry.sequence, length: bytes.length, message });
    return entry;
  }

  /** `parsed` is the decoded frame, or null/undefined when decoding failed. */
  logReceived(frame: Frame, parsed?: unknown): CommEntry {
    const bytes = toBytes(frame);
    const lastTx = this.lastAt.tx;
    const roundTripMs = lastTx === null ? null : round1(this.now() - lastTx);
    const valid = parsed !== null && parsed !== undefined;

    const entry = this.append("rx", bytes, { command: null, roundTripMs, parsed: parsed ?? null, valid });
    this.counters.bytesRx += bytes.length;

    const rt = roundTripMs === null ? "" : `, RT=${roundTripMs.toFixed(1)}ms`;
    const message =
      `RX[${entry.sequence}] (${bytes.length} bytes${rt}): ` +
      `HEX=${entry.hex.slice(0, 100)} PARSED=${valid ? "OK" : "FAIL"}`;
    this.router.tryEnqueue("serial", {
      direction: "rx",
      sequence: entry.sequence,
      length: bytes.length,
      roundTripMs,
      valid,
      message,
    });
    return entry;
  }

  private append(
    direction: Direction,
    bytes: Buffer,
    extra: Pick<CommEntry, "command" | "roundTripMs" | "parsed" | "valid">,
  ): CommEntry {
    const now = this.now();
    const last = this.lastAt[direction];
    this.sequence[direction]++;

    const entry: CommEntry = {
      sequence: this.sequence[direction],
      timestamp: new Date(now).toISOString(),
      sinceLastMs: last === null ? null : round1(now - last),
      command: extra.command,
      roundTripMs: extra.roundTripMs,
      hex: bytes.toString("hex"),
      ascii: safeAscii(bytes),
      length: bytes.length,
      parsed: extra.parsed,
      valid: extra.valid,
    };

    const buffer = this.buffers[direction];
    buffer.push(entry);
    if (buffer.length > this.bufferSize) buffer.shift();
    this.lastAt[direction] = now;
    return entry;
  }

  // -----------------------------------------------------------------------
  // Faults
  // -----------------------------------------------------------------------

  logTimeout(durationSeconds: number, context?: string): void {
    this.counters.timeouts++;
    const message = `TIMEOUT after ${durationSeconds.toFixed(1)}s${context ? `: ${context}` : ""}`;
    this.router.tryEnqueue("serial", { type: "timeout", durationSeconds, message }, "warn");
  }

  logProtocolError(kind: ProtocolErrorKind, frame: Frame, error: unknown): void {
    switch (kind) {
      case "json_parse":
        this.counters.jsonParseErrors++;
        break;
      case "malformed":
        this.counters.malformedMessages++;
        break;
      case "checksum":
        this.counters.checksumErrors++;
        break;
    }

    const data = safeAscii(toBytes(frame)).slice(0, 100);
    const message = `PROTOCOL ERROR [${kind}]: ${describeError(error)} | Data: ${data}`;
    this.router.tryEnqueue("serial", { type: "protocol_error", kind, message }, "error");
  }

  logReconnection(attempts: number, success: boolean): void {
    if (success) {
      this.counters.reconnections++;
      this.router.tryEnqueue("serial", {
        type: "reconnection",
        attempts,
        success,
        message: `RECONNECTED after ${attempts} attempts`,
      });
    } else {
      this.counters.failedReconnections++;
      this.router.tryEnqueue(
        "serial",
        { type: "reconnection", attempts, success, message: `RECONNECTION FAILED after ${attempts} attempts` },
        "error",
      );
    }
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getStatistics(): CommStatistics {
    const c = this.counters;
    const totalRx = this.sequence.rx;
    const errorCount = c.jsonParseErrors + c.malformedMessages + c.checksumErrors;

    const rts: number[] = [];
    for (const entry of this.buffers.rx) {
      if (entry.roundTripMs !== null) rts.push(entry.roundTripMs);
    }
    const roundTripMs = summarizeRoundTrips(rts);

    return {
      totalTx: this.sequence.tx,
      totalRx,
      ...c,
      errorCount,
      errorRate: totalRx > 0 ? errorCount / totalRx : 0,
      roundTripMs,
    };
  }

  getRecentCommunications(count = 10): RecentCommunications {
    return {
      tx: this.buffers.tx.slice(-count),
      rx: this.buffers.rx.slice(-count),
      stats: this.getStatistics(),
    };
  }

  /**
   * Queue both buffers and the statistics as a `serial_dump_<stamp>.json`
   * artifact in the current run. Returns the file name, or null when the
   * router would not take it.
   */
  dumpToFile(): string | null {
    const now = this.now();
    const fileName = `serial_dump_${formatStamp(new Date(now))}.json`;
    const lastRx = this.buffers.rx.at(-1);

    try {
      this.router.enqueueArtifact(fileName, {
        timestamp: new Date(now).toISOString(),
        txBuffer: [...this.buffers.tx],
        rxBuffer: [...this.buffers.rx],
        statistics: this.getStatistics(),
        lastFrameAnalysis: lastRx ? analyzeProtocol(Buffer.from(lastRx.hex, "hex")) : null,
      });
    } catch (err) {
      if (err instanceof TelemetryError) {
        this.log.error({ code: err.code }, `Failed to dump serial data: ${err.message}`);
        return null;
      }
      throw err;
    }

    this.log.info(`Serial communications dumped to ${fileName}`);
    return fileName;
  }
}
