import {
  closeSync,
  lstatSync,
  mkdirSync,
  openSync,
  readFileSync,
  readlinkSync,
  rmSync,
  statSync,
  symlinkSync,
  writeFileSync,
} from "node:fs";
import { appendFile, readdir, rename, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { createLogger } from "@teststand/shared/utils";

import {
  ConfigurationError,
  LogQueueFullError,
  RouterClosedError,
  RunSetupError,
  TelemetryError,
  describeError,
  isNodeError,
} from "../errors.js";
import { checkPositive, DEFAULT_TELEMETRY_CONFIG } from "../config.js";
import { LOG_CATEGORIES, type LogCategory, type LogLevel, type LogRecord, type Run } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("log-router");

/** Category file locations, relative to the run directory. */
export const CATEGORY_FILES: Record<LogCategory, string> = {
  events: "events/events.log",
  errors: "errors/errors.log",
  performance: "performance/perf.log",
  serial: "serial/serial.log",
  data: "data/data.log",
  system: "app.log",
};

export const LATEST_POINTER = "latest";

/** Upper bound on records written per consumer pass. */
const DRAIN_BATCH_SIZE = 500;

/** Suffixes tried after `run_<stamp>` when that directory already exists. */
const MAX_RUN_SUFFIX = 99;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LogRouterOptions {
  logDir: string;
  queueCapacity?: number;
  maxFileBytes?: number;
  backupCount?: number;
  shutdownTimeoutMs?: number;
  /** Clock used for run ids and record timestamps. */
  now?: () => Date;
}

export interface DataSample {
  ts: number;
  raw: Record<string, unknown>;
  adjusted: Record<string, unknown>;
  offsets: Record<string, unknown>;
}

export interface LogRouterStats {
  runId: string | null;
  directory: string | null;
  latestPointer: "symlink" | "pointer-file" | "none";
  accepted: number;
  rejected: number;
  persisted: Record<LogCategory, number>;
  artifactsWritten: number;
  rotations: number;
  writeFailures: number;
  queueDepth: number;
  queueCapacity: number;
  running: boolean;
  uptimeSeconds: number;
}

/** Records and artifacts are serialised when queued; the consumer only writes text. */
type QueueItem =
  | { kind: "record"; category: LogCategory; line: string }
  | { kind: "artifact"; fileName: string; text: string }
  | { kind: "stop" };

function emptyCounts(): Record<LogCategory, number> {
  return { events: 0, errors: 0, performance: 0, serial: 0, system: 0, data: 0 };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-time `YYYYMMDD_HHMMSS`, used for run ids and dump file names. */
export function formatStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** JSON.stringify that tolerates bigint and Error values. */
export function toJson(value: unknown, space?: number): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => {
      if (typeof v === "bigint") return v.toString();
      if (v instanceof Error) return { name: v.name, message: v.message, stack: v.stack };
      return v;
    },
    space,
  );
}

// ---------------------------------------------------------------------------
// LogRouter
// ---------------------------------------------------------------------------

/**
 * Owns the run directory and every category stream in it. Producers push
 * onto a bounded FIFO and return immediately; a single consumer drains the
 * queue and performs all file appends, so records from one producer land in
 * their category file in call order.
 */
export class LogRouter {
  private readonly logDir: string;
  private readonly capacity: number;
  private readonly maxFileBytes: number;
  private readonly backupCount: number;
  private readonly shutdownTimeoutMs: number;
  private readonly now: () => Date;

  private run: Run | null = null;
  private latestPointer: LogRouterStats["latestPointer"] = "none";

  private queue: QueueItem[] = [];
  private wake: (() => void) | null = null;
  private consumerDone: Promise<void> | null = null;
  private closed = false;

  private context: Record<string, unknown> = {};
  private fileSizes: Record<LogCategory, number> = emptyCounts();

  private accepted = 0;
  private rejected = 0;
  private persisted = emptyCounts();
  private artifactsWritten = 0;
  private rotations = 0;
  private writeFailures = 0;
  private readonly startedAt = Date.now();

  constructor(options: LogRouterOptions) {
    this.logDir = resolve(options.logDir);
    this.capacity = options.queueCapacity ?? DEFAULT_TELEMETRY_CONFIG.queueCapacity;
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_TELEMETRY_CONFIG.maxFileBytes;
    this.backupCount = options.backupCount ?? DEFAULT_TELEMETRY_CONFIG.backupCount;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_TELEMETRY_CONFIG.shutdownTimeoutMs;
    this.now = options.now ?? (() => new Date());

    const issues = [
      ...checkPositive("queueCapacity", this.capacity, true),
      ...checkPositive("maxFileBytes", this.maxFileBytes, true),
      ...checkPositive("backupCount", this.backupCount, true),
      ...checkPositive("shutdownTimeoutMs", this.shutdownTimeoutMs, true),
    ];
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
  }

  // -----------------------------------------------------------------------
  // Run setup
  // -----------------------------------------------------------------------

  /**
   * Allocate the timestamped run directory, create every category file and
   * retarget the "latest" pointer. Throws RunSetupError when any directory
   * or file cannot be created; callers treat that as fatal.
   */
  createRun(): Run {
    if (this.run) return this.run;

    const { id, directory } = this.allocateRunDirectory(`run_${formatStamp(this.now())}`);

    for (const category of LOG_CATEGORIES) {
      const file = join(directory, CATEGORY_FILES[category]);
      try {
        mkdirSync(dirname(file), { recursive: true });
        closeSync(openSync(file, "a"));
        this.fileSizes[category] = statSync(file).size;
      } catch (err) {
        throw new RunSetupError(file, err);
      }
    }

    this.run = { id, directory };
    this.latestPointer = this.pointLatest(id, directory);

    logger.info({ runId: id, directory, latest: this.latestPointer }, "Logging run created");
    this.tryEnqueue("system", { source: "log-router", message: `New logging session started: ${id}` });
    this.tryEnqueue("system", { source: "log-router", message: `Log directory: ${directory}` });
    return this.run;
  }

  /**
   * Create a fresh leaf directory for the run. A restart within the same
   * second finds `run_<stamp>` taken and moves on to `run_<stamp>_1`, ...
   */
  private allocateRunDirectory(base: string): Run {
    try {
      mkdirSync(this.logDir, { recursive: true });
    } catch (err) {
      throw new RunSetupError(this.logDir, err);
    }

    for (let suffix = 0; suffix <= MAX_RUN_SUFFIX; suffix++) {
      const id = suffix === 0 ? base : `${base}_${suffix}`;
      const directory = join(this.logDir, id);
      try {
        mkdirSync(directory);
        return { id, directory };
      } catch (err) {
        if (isNodeError(err) && err.code === "EEXIST") continue;
        throw new RunSetupError(directory, err);
      }
    }
    throw new RunSetupError(
      join(this.logDir, base),
      new Error(`More than ${MAX_RUN_SUFFIX} runs already exist for this second`),
    );
  }

  /** The current run; throws if createRun() has not been called. */
  currentRun(): Run {
    if (!this.run) {
      throw new TelemetryError("RUN_SETUP_FAILED", "No logging run has been created");
    }
    return this.run;
  }

  private pointLatest(id: string, directory: string): LogRouterStats["latestPointer"] {
    const latest = join(this.logDir, LATEST_POINTER);
    try {
      if (lstatSync(latest, { throwIfNoEntry: false })) {
        rmSync(latest, { force: true });
      }
      symlinkSync(id, latest, "dir");
      return "symlink";
    } catch (err) {
      logger.warn({ err }, "Could not create latest symlink; writing pointer file");
    }
    try {
      writeFileSync(latest, `${directory}\n`, "utf-8");
      return "pointer-file";
    } catch (err) {
      logger.warn({ err }, "Could not write latest pointer file");
      return "none";
    }
  }

  // -----------------------------------------------------------------------
  // Producer API
  // -----------------------------------------------------------------------

  /**
   * Queue a record for its category stream. Never blocks: when the queue is
   * at capacity this throws LogQueueFullError and the record is not kept.
   */
  enqueue(category: LogCategory, payload: Record<string, unknown>, level: LogLevel = "info"): void {
    if (this.closed) {
      this.rejected++;
      throw new RouterClosedError();
    }
    if (this.queue.length >= this.capacity) {
      this.rejected++;
      throw new LogQueueFullError(this.capacity);
    }

    const merged =
      category !== "system" && Object.keys(this.context).length > 0 ? { ...this.context, ...payload } : payload;
    const record: LogRecord = {
      category,
      timestamp: this.now().toISOString(),
      level,
      payload: merged,
    };
    this.push({ kind: "record", category, line: this.format(record) });
    this.accepted++;
  }

  /**
   * enqueue() for internal producers: a full or closed queue is reported as
   * `false` and a pino warning instead of an exception.
   */
  tryEnqueue(category: LogCategory, payload: Record<string, unknown>, level: LogLevel = "info"): boolean {
    try {
      this.enqueue(category, payload, level);
      return true;
    } catch (err) {
      if (err instanceof TelemetryError) {
        logger.warn({ category, code: err.code }, "Log record not queued");
        return false;
      }
      throw err;
    }
  }

  /** Queue a standalone JSON document to be written into the run directory. */
  enqueueArtifact(fileName: string, body: unknown): void {
    if (this.closed) {
      this.rejected++;
      throw new RouterClosedError();
    }
    if (this.queue.length >= this.capacity) {
      this.rejected++;
      throw new LogQueueFullError(this.capacity);
    }
    if (fileName.includes("/") || fileName.includes("\\") || fileName.startsWith(".")) {
      throw new TypeError(`Invalid artifact file name: ${fileName}`);
    }
    this.push({ kind: "artifact", fileName, text: serializeArtifact(fileName, body) });
    this.accepted++;
  }

  logData(sample: DataSample): boolean {
    return this.tryEnqueue("data", { ...sample, loggedAt: Date.now() / 1000 });
  }

  /** Fields merged into every JSON record enqueued from now on. */
  addContext(fields: Record<string, unknown>): void {
    this.context = { ...this.context, ...fields };
  }

  clearContext(): void {
    this.context = {};
  }

  private push(item: QueueItem): void {
    this.queue.push(item);
    const wake = this.wake;
    if (wake) {
      this.wake = null;
      wake();
    }
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /** Start the background consumer. Creates the run if needed. */
  start(): void {
    this.createRun();
    if (this.consumerDone || this.closed) return;

    this.consumerDone = this.consume().catch((err: unknown) => {
      logger.error({ err }, "Log consumer terminated unexpectedly");
    });
    logger.info("Async log writer started");
  }

  /**
   * Send the stop sentinel and wait (bounded) for the consumer to drain up
   * to it. Returns false if the consumer did not stop in time; that is
   * logged and never thrown.
   */
  async shutdown(timeoutMs: number = this.shutdownTimeoutMs): Promise<boolean> {
    if (this.closed) return true;
    this.closed = true;

    if (!this.consumerDone) {
      if (this.queue.length > 0) {
        logger.warn({ pending: this.queue.length }, "Log router shut down before start; records discarded");
      }
      this.queue = [];
      return true;
    }

    this.push({ kind: "stop" });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<"timeout">((resolveTimeout) => {
      timer = setTimeout(() => resolveTimeout("timeout"), timeoutMs);
    });

    const result = await Promise.race([this.consumerDone.then(() => "done" as const), timedOut]);
    clearTimeout(timer);

    if (result === "timeout") {
      logger.error({ pending: this.queue.length, timeoutMs }, "Async log writer did not stop cleanly");
      return false;
    }
    logger.info({ persisted: this.persisted }, "Async log writer stopped");
    return true;
  }

  isRunning(): boolean {
    return this.consumerDone !== null && !this.closed;
  }

  // -----------------------------------------------------------------------
  // Consumer
  // -----------------------------------------------------------------------

  private async consume(): Promise<void> {
    for (;;) {
      if (this.queue.length === 0) {
        await new Promise<void>((wake) => {
          this.wake = wake;
        });
        continue;
      }

      const batch = this.queue.splice(0, DRAIN_BATCH_SIZE);
      const stopAt = batch.findIndex((item) => item.kind === "stop");
      await this.writeBatch(stopAt === -1 ? batch : batch.slice(0, stopAt));

      if (stopAt !== -1) return;
    }
  }

  private async writeBatch(items: QueueItem[]): Promise<void> {
    const lines = new Map<LogCategory, string[]>();
    const artifacts: { fileName: string; text: string }[] = [];

    for (const item of items) {
      if (item.kind === "record") {
        const bucket = lines.get(item.category) ?? [];
        bucket.push(item.line);
        lines.set(item.category, bucket);
      } else if (item.kind === "artifact") {
        artifacts.push(item);
      }
    }

    for (const [category, bucket] of lines) {
      await this.appendLines(category, bucket);
    }
    for (const artifact of artifacts) {
      await this.writeArtifact(artifact.fileName, artifact.text);
    }
  }

  private format(record: LogRecord): string {
    if (record.category === "system") {
      const source = typeof record.payload["source"] === "string" ? record.payload["source"] : "app";
      const message = String(record.payload["message"] ?? "");
      return `${record.timestamp} [${record.level.toUpperCase()}] ${source}: ${message}`;
    }

    const line = { timestamp: record.timestamp, level: record.level, category: record.category, ...record.payload };
    try {
      return toJson(line);
    } catch (err) {
      return toJson({
        timestamp: record.timestamp,
        level: record.level,
        category: record.category,
        message: `[unserializable payload: ${describeError(err)}]`,
      });
    }
  }

  private async appendLines(category: LogCategory, lines: string[]): Promise<void> {
    const run = this.currentRun();
    const file = join(run.directory, CATEGORY_FILES[category]);
    const data = `${lines.join("\n")}\n`;
    const bytes = Buffer.byteLength(data);

    try {
      if (this.fileSizes[category] > 0 && this.fileSizes[category] + bytes > this.maxFileBytes) {
        await this.rotate(category, file);
      }
      await appendFile(file, data, "utf-8");
      this.fileSizes[category] += bytes;
      this.persisted[category] += lines.length;
    } catch (err) {
      this.writeFailures++;
      logger.error({ err, category, lines: lines.length }, "Failed to append log records");
    }
  }

  /** file -> file.1 -> ... -> file.<backupCount>; the oldest backup is overwritten. */
  private async rotate(category: LogCategory, file: string): Promise<void> {
    for (let i = this.backupCount - 1; i >= 1; i--) {
      await renameIfExists(`${file}.${i}`, `${file}.${i + 1}`);
    }
    await renameIfExists(file, `${file}.1`);
    this.fileSizes[category] = 0;
    this.rotations++;
    logger.info({ category, file }, "Rotated log file");
  }

  private async writeArtifact(fileName: string, text: string): Promise<void> {
    const file = join(this.currentRun().directory, fileName);
    try {
      await writeFile(file, text, "utf-8");
      this.artifactsWritten++;
    } catch (err) {
      this.writeFailures++;
      logger.error({ err, file }, "Failed to write artifact");
    }
  }

  // -----------------------------------------------------------------------
  // Maintenance & stats
  // -----------------------------------------------------------------------

  /**
   * Rename run directories older than `maxAgeDays` to `archived_<name>`.
   * The current run is never touched.
   */
  async archiveOldRuns(maxAgeDays: number): Promise<number> {
    const issues = checkPositive("maxAgeDays", maxAgeDays);
    if (issues.length > 0) throw new ConfigurationError(issues);

    const cutoff = Date.now() - maxAgeDays * 24 * 3_600_000;
    const entries = await readdir(this.logDir, { withFileTypes: true });
    let archived = 0;

    for (const entry of entries) {
      if (!entry.isDirectory() || !entry.name.startsWith("run_") || entry.name === this.run?.id) continue;
      const path = join(this.logDir, entry.name);
      try {
        const info = await stat(path);
        if (info.mtimeMs >= cutoff) continue;
        await rename(path, join(this.logDir, `archived_${entry.name}`));
        archived++;
      } catch (err) {
        logger.error({ err, path }, "Failed to archive run directory");
      }
    }

    this.tryEnqueue("system", {
      source: "log-router",
      message: `Log cleanup completed, archived ${archived} run directories`,
    });
    return archived;
  }

  getStats(): LogRouterStats {
    return {
      runId: this.run?.id ?? null,
      directory: this.run?.directory ?? null,
      latestPointer: this.latestPointer,
      accepted: this.accepted,
      rejected: this.rejected,
      persisted: { ...this.persisted },
      artifactsWritten: this.artifactsWritten,
      rotations: this.rotations,
      writeFailures: this.writeFailures,
      queueDepth: this.queue.length,
      queueCapacity: this.capacity,
      running: this.isRunning(),
      uptimeSeconds: (Date.now() - this.startedAt) / 1000,
    };
  }
}

function serializeArtifact(fileName: string, body: unknown): string {
  try {
    return toJson(body, 2);
  } catch (err) {
    logger.error({ err, fileName }, "Artifact body is not serialisable");
    return toJson({ error: `[unserializable artifact: ${describeError(err)}]` }, 2);
  }
}

async function renameIfExists(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    if (!isNodeError(err) || err.code !== "ENOENT") throw err;
  }
}

/**
 * Resolve the run directory the "latest" pointer under `logDir` refers to,
 * whether it is a symlink or a pointer file. Returns null if there is none.
 */
export function resolveLatestRun(logDir: string): string | null {
  const root = resolve(logDir);
  const latest = join(root, LATEST_POINTER);
  const info = lstatSync(latest, { throwIfNoEntry: false });
  if (!info) return null;

  if (info.isSymbolicLink()) {
    const target = readlinkSync(latest);
    return isAbsolute(target) ? target : join(root, target);
  }
  return readFileSync(latest, "utf-8").trim();
}
