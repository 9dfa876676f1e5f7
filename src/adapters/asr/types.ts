/**
 * ASR (Automatic Speech Recognition) adapter types.
 * Implementations can be swapped via config (OpenAI Whisper, Groq Whisper, stub).
 */

export interface TranscriptResult {
  /** Transcribed text; empty when no speech was recognized. */
  text: string;
  /** Optional language code. */
  language?: string;
}

export interface TranscribeOptions {
  /** Aborts the request (deadline or shutdown). */
  signal?: AbortSignal;
  /** Language hint (ISO-639-1), provider-dependent. */
  language?: string;
}

/**
 * ASR adapter interface: audio buffer in, transcript out.
 * Errors (network, rate limit, auth) are thrown; the Transcriber maps them to an empty outcome.
 */
export interface IASR {
  /**
   * Transcribe audio to text.
   * @param audioBuffer - Encoded audio (WAV from the pipeline).
   * @param format - Format hint ("wav"). Provider-dependent.
   */
  transcribe(audioBuffer: Buffer, format?: string, options?: TranscribeOptions): Promise<TranscriptResult>;
}
