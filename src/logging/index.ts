/**
 * Structured logging for the turn engine.
 * Logs segmentation, provider calls, language switches, breaker transitions and turn metrics as JSON.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info; silent under NODE_ENV=test)
 *   LOG_PRETTY  - "true" to pretty-print through pino-pretty (development only)
 *   LOG_FILE    - If set, also append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Append-only log file path; overrides LOG_FILE. */
  file?: string;
}

export type Logger = pino.Logger;

function parseLevel(raw: string | undefined): LogLevel | undefined {
  const v = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

function defaultLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL) ?? (process.env.NODE_ENV === "test" ? "silent" : "info");
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultLevel(),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? process.env.LOG_PRETTY === "true";
  const logFile = config.file ?? process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log a provider call summary (never the transcript itself; it may carry PII). */
export function logProviderCall(
  log: Logger,
  capability: "transcribe" | "generate" | "synthesize",
  details: { attempt: number; durationMs: number; outputSize: number; language?: string }
): void {
  log.info({ event: "PROVIDER_CALL", capability, ...details }, `${capability} completed`);
}

/** Log error. */
export function logError(log: Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
