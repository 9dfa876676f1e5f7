/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (Google Cloud, Azure, stub).
 * Output is raw PCM, 16-bit mono little-endian, at the requested sample rate.
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. en-US). */
  languageCode?: string;
  /** Output sample rate in Hz; must match the audio sink. */
  sampleRateHz?: number;
  /** Speaking rate, 1.0 = provider default. */
  speakingRate?: number;
  /** Aborts the request (barge-in, deadline). */
  signal?: AbortSignal;
}

export type TtsResult = Promise<Buffer> | Promise<AsyncIterable<Buffer>> | AsyncIterable<Buffer>;

/**
 * TTS adapter interface: text in, audio buffer(s) out.
 */
export interface ITTS {
  /**
   * Synthesize text to speech.
   * Returns either a single buffer or an async iterable of chunks for streaming.
   */
  synthesize(text: string, options?: VoiceOptions): TtsResult;
}

function isAsyncIterable(value: Buffer | AsyncIterable<Buffer>): value is AsyncIterable<Buffer> {
  return !Buffer.isBuffer(value) && Symbol.asyncIterator in value;
}

/**
 * Normalize TTS result to async iterable of buffers for uniform consumption.
 */
export async function* ttsToStream(result: TtsResult): AsyncIterable<Buffer> {
  const resolved: Buffer | AsyncIterable<Buffer> = await result;
  if (isAsyncIterable(resolved)) {
    yield* resolved;
  } else {
    yield resolved;
  }
}

/** Collect a TTS result into one buffer. */
export async function collectTts(result: TtsResult): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const buf of ttsToStream(result)) parts.push(buf);
  return Buffer.concat(parts);
}
