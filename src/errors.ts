/**
 * Error taxonomy for the voice loop.
 *
 * Fatal at startup: ConfigError, DeviceError (device init).
 * Contained per stage: RecognitionError (segment dropped), DialogueServiceError (apology spoken),
 * SynthesisError (item skipped). Queue overflow is an event, not an error (see metrics).
 */

export type ServiceFailureReason = "auth" | "rate_limit" | "network" | "timeout" | "cancelled" | "unknown";

export class VoiceAgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Microphone or speaker unavailable. */
export class DeviceError extends VoiceAgentError {}

/** Invalid or incomplete configuration (missing credentials, out-of-range values). */
export class ConfigError extends VoiceAgentError {}

/** External call exceeded its deadline. */
export class DeadlineError extends VoiceAgentError {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

abstract class ServiceError extends VoiceAgentError {
  constructor(
    public readonly reason: ServiceFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RecognitionError extends ServiceError {}

export class DialogueServiceError extends ServiceError {}

export class SynthesisError extends ServiceError {}

function numericStatus(err: object): number | undefined {
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

const NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN", "ETIMEDOUT", "EPIPE"]);

/**
 * Map an SDK / fetch / deadline error to a reason code.
 * Works on the openai and @anthropic-ai/sdk error classes (status + name) without importing them.
 */
export function classifyServiceError(err: unknown): ServiceFailureReason {
  if (err instanceof DeadlineError) return "timeout";
  if (err instanceof ServiceError) return err.reason;
  if (typeof err !== "object" || err === null) return "unknown";

  const status = numericStatus(err);
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "rate_limit";
  if (status === 408 || status === 504) return "timeout";

  // SDK error classes do not always set `name`; fall back to the constructor name.
  const name = err instanceof Error ? (err.name !== "Error" ? err.name : err.constructor.name) : "";
  if (name === "AbortError" || name === "APIUserAbortError") return "cancelled";
  if (name === "APIConnectionTimeoutError" || name === "TimeoutError") return "timeout";
  if (name === "APIConnectionError" || name === "FetchError") return "network";
  if ("code" in err && typeof err.code === "string" && NETWORK_CODES.has(err.code)) return "network";
  if (err instanceof TypeError && err.message === "fetch failed") return "network";
  if (status !== undefined && status >= 500) return "network";
  return "unknown";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
