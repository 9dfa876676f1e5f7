/**
 * Structured logging for the voice loop.
 * Logs capture, VAD, ASR, LLM, TTS and turn events with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL  - debug | info | warn | error | silent (default: info; silent under Jest)
 *   LOG_FILE   - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v);
}

const underJest = process.env.JEST_WORKER_ID !== undefined;

const defaultConfig: Required<LoggerConfig> = {
  level: parseLogLevel(process.env.LOG_LEVEL) ?? (underJest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !underJest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

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

/** Log ASR result (length only; transcripts may carry PII). */
export function logAsrResult(log: pino.Logger, textLength: number, durationMs?: number): void {
  log.info({ event: "ASR_RESULT", textLength, durationMs }, "ASR completed");
}

/** Log LLM stream summary. */
export function logLlmCall(
  log: pino.Logger,
  messageCount: number,
  responseLength: number,
  durationMs?: number,
  firstChunkMs?: number
): void {
  log.info({ event: "LLM_CALL", messageCount, responseLength, durationMs, firstChunkMs }, "LLM completed");
}

/** Log TTS call. */
export function logTtsCall(log: pino.Logger, textLength: number, audioBytes: number, durationMs?: number): void {
  log.debug({ event: "TTS_CALL", textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", turnId: string, status?: string): void {
  log.info({ event: "TURN", phase, turnId, status }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, name: err.name, stack: err.stack, ...context }, "Error");
}
