/**
 * @judgekit/sdk — Logging.
 *
 * pino logger used when the caller does not pass one.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./types.js";

/**
 * One line per completed request. Never carries URLs or credentials.
 */
export interface RequestLogEntry {
  readonly method: string;
  readonly status: number;
  readonly durationMs: number;
  readonly signed: boolean;
}

export function createLogger(level: LogLevel = "silent"): Logger {
  return pino({ name: "judgekit", level });
}
