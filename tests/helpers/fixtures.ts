/**
 * Shared test fixtures for the telemetry test suites.
 *
 * Provides a router that captures records in memory, temporary log
 * directories, and readers for the files a run leaves behind.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { LogRouter, type LogRouterOptions } from "../../packages/telemetry/src/services/log-router.js";
import type { LogCategory, LogLevel } from "../../packages/telemetry/src/types.js";

// ---------------------------------------------------------------------------
// In-memory router
// ---------------------------------------------------------------------------

export interface CapturedRecord {
  category: LogCategory;
  payload: Record<string, unknown>;
  level: LogLevel;
}

/** A LogRouter whose tryEnqueue() only captures; nothing reaches the queue. */
export class RecordingRouter extends LogRouter {
  readonly records: CapturedRecord[] = [];
  readonly artifacts: { fileName: string; body: unknown }[] = [];

  constructor(options: Partial<LogRouterOptions> = {}) {
    super({ logDir: "unused", ...options });
  }

  override tryEnqueue(category: LogCategory, payload: Record<string, unknown>, level: LogLevel = "info"): boolean {
    this.records.push({ category, payload, level });
    return true;
  }

  override enqueueArtifact(fileName: string, body: unknown): void {
    this.artifacts.push({ fileName, body });
  }

  payloads(category: LogCategory): Record<string, unknown>[] {
    return this.records.filter((r) => r.category === category).map((r) => r.payload);
  }

  /** Text of the app.log lines, optionally for one source only. */
  messages(source?: string): string[] {
    return this.payloads("system")
      .filter((p) => source === undefined || p["source"] === source)
      .map((p) => String(p["message"]));
  }
}

// ---------------------------------------------------------------------------
// File system
// ---------------------------------------------------------------------------

export async function createTempLogDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "telemetry-test-"));
}

export async function removeTempLogDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Non-empty lines of a text file. */
export async function readLines(file: string): Promise<string[]> {
  const text = await readFile(file, "utf-8");
  return text.split("\n").filter((line) => line.length > 0);
}

/** Parse each line of a JSON-lines file. */
export async function readJsonLines(file: string): Promise<Record<string, unknown>[]> {
  const lines = await readLines(file);
  return lines.map((line) => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Not a JSON object: ${line}`);
    }
    return Object.fromEntries(Object.entries(parsed));
  });
}

// ---------------------------------------------------------------------------
// Sensor fixtures
// ---------------------------------------------------------------------------

export function createReading(overrides: Partial<{
  sensorId: string;
  sensorName: string;
  value: number;
  unit: string;
  warningValue: number;
  dangerValue: number;
}> = {}) {
  return {
    sensorId: "pt-chamber",
    sensorName: "Chamber Pressure",
    value: 0,
    unit: "psi",
    warningValue: 500,
    dangerValue: 800,
    ...overrides,
  };
}
