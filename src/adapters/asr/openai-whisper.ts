/**
 * Whisper ASR over the OpenAI transcription API.
 * Also serves Groq, whose endpoint is OpenAI-compatible (set baseURL).
 */

import OpenAI, { toFile } from "openai";
import type { IASR, TranscribeOptions, TranscriptResult } from "./types";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

export interface OpenAIWhisperConfig {
  apiKey: string;
  /** Default whisper-1 (OpenAI); whisper-large-v3 on Groq. */
  model?: string;
  baseURL?: string;
}

export class OpenAIWhisperASR implements IASR {
  private client: OpenAI;
  private readonly model: string;

  constructor(config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    this.model = config.model ?? "whisper-1";
  }

  async transcribe(audioBuffer: Buffer, format: string = "wav", options?: TranscribeOptions): Promise<TranscriptResult> {
    const ext = format === "webm" ? "webm" : "wav";
    const file = await toFile(audioBuffer, `segment.${ext}`);
    const transcription = await this.client.audio.transcriptions.create(
      {
        file,
        model: this.model,
        language: options?.language,
      },
      { signal: options?.signal }
    );
    return { text: transcription.text ?? "" };
  }
}
