import { createLogger, type Logger } from "@teststand/shared/utils";

import type { LogLevel } from "../types.js";
import { toJson, type LogRouter } from "./log-router.js";

type LogFn = {
  (msg: string): void;
  (fields: Record<string, unknown>, msg: string): void;
};

export interface RunLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  /** The underlying console logger. */
  readonly console: Logger;
}

/**
 * A component logger that writes each line twice: to its pino console logger
 * and, through the router, to the run's system stream (app.log). Router
 * backpressure only costs the app.log copy.
 */
export function createRunLogger(router: LogRouter, name: string): RunLogger {
  const pinoLogger = createLogger(name);

  const make = (level: LogLevel): LogFn => {
    function log(msg: string): void;
    function log(fields: Record<string, unknown>, msg: string): void;
    function log(first: string | Record<string, unknown>, second?: string): void {
      const fields = typeof first === "string" ? undefined : first;
      const msg = typeof first === "string" ? first : (second ?? "");

      if (fields) {
        pinoLogger[level](fields, msg);
      } else {
        pinoLogger[level](msg);
      }

      const text = fields ? `${msg} ${describeFields(fields)}` : msg;
      router.tryEnqueue("system", { source: name, message: text }, level);
    }
    return log;
  };

  return {
    debug: make("debug"),
    info: make("info"),
    warn: make("warn"),
    error: make("error"),
    fatal: make("fatal"),
    console: pinoLogger,
  };
}

function describeFields(fields: Record<string, unknown>): string {
  try {
    return toJson(fields);
  } catch (err) {
    return `[unserializable fields: ${err instanceof Error ? err.message : String(err)}]`;
  }
}
