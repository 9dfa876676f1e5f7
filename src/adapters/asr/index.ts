/**
 * ASR adapter factory: returns implementation based on config.
 */

import type { AppConfig } from "../../config";
import type { IASR } from "./types";
import { StubASR } from "./stub";
import { GROQ_BASE_URL, OpenAIWhisperASR } from "./openai-whisper";

export type { IASR, TranscriptResult, TranscribeOptions } from "./types";
export { StubASR } from "./stub";
export { OpenAIWhisperASR, GROQ_BASE_URL } from "./openai-whisper";

/** Credentials are checked by validateConfig(); a provider without its key falls back to the stub. */
export function createASR(config: AppConfig): IASR {
  const { provider, apiKey, model } = config.asr;
  if (provider === "openai" && apiKey) {
    return new OpenAIWhisperASR({ apiKey, model: model || "whisper-1" });
  }
  if (provider === "groq" && apiKey) {
    return new OpenAIWhisperASR({ apiKey, model: model || "whisper-large-v3", baseURL: GROQ_BASE_URL });
  }
  return new StubASR();
}
