/**
 * Transcriber: speech segment → transcript through the ASR adapter.
 * Failures never leave this stage: every outcome is either a valid transcript or "empty" with a reason.
 */

import type { IASR } from "../adapters/asr";
import type { BoundedQueue } from "./queue";
import type { SpeechSegment, Transcript } from "./types";
import { pcmToWav, samplesToPcm } from "./audio-utils";
import { abortable, createDeadline } from "./deadline";
import { RecognitionError, classifyServiceError, errorMessage } from "../errors";
import type { ServiceFailureReason } from "../errors";
import { incrementCounter } from "../metrics";
import { logger, logAsrResult } from "../logging";

export type EmptyReason = "no_speech" | ServiceFailureReason;

export type TranscriptionOutcome =
  | { kind: "transcript"; transcript: Transcript }
  | { kind: "empty"; reason: EmptyReason; error?: RecognitionError };

export interface TranscriberConfig {
  timeoutMs: number;
  /** Language hint for the recognizer (ISO-639-1). */
  language?: string;
}

/** Text with at least one letter or digit; recognizers return "", ".", "..." for noise. */
const SPEECH_TEXT = /[\p{L}\p{N}]/u;

export class Transcriber {
  constructor(
    private readonly asr: IASR,
    private readonly config: TranscriberConfig
  ) {}

  async transcribe(segment: SpeechSegment, signal?: AbortSignal): Promise<TranscriptionOutcome> {
    const wav = pcmToWav(samplesToPcm(segment.blocks.map((b) => b.samples)), segment.sampleRate);
    const deadline = createDeadline("asr", this.config.timeoutMs, signal);
    const start = Date.now();
    try {
      const result = await abortable(
        this.asr.transcribe(wav, "wav", { signal: deadline.signal, language: this.config.language }),
        deadline.signal
      );
      const latencyMs = Date.now() - start;
      const text = result.text.trim();
      logAsrResult(logger, text.length, latencyMs);
      if (!SPEECH_TEXT.test(text)) {
        incrementCounter("asr.empty");
        logger.debug({ event: "ASR_EMPTY", startSeq: segment.startSeq }, "No speech recognized");
        return { kind: "empty", reason: "no_speech" };
      }
      return {
        kind: "transcript",
        transcript: {
          text,
          valid: true,
          language: result.language,
          segmentSeq: segment.startSeq,
          speechEndedAt: segment.endedAt,
          recognitionMs: latencyMs,
        },
      };
    } catch (err) {
      const reason = deadline.expired() ? "timeout" : classifyServiceError(err);
      const error = new RecognitionError(reason, `Transcription failed: ${errorMessage(err)}`, { cause: err });
      if (reason === "cancelled") {
        logger.debug({ event: "ASR_CANCELLED", startSeq: segment.startSeq }, "Transcription cancelled");
        return { kind: "empty", reason, error };
      }
      incrementCounter("asr.errors");
      logger.warn({ event: "ASR_FAILED", reason, startSeq: segment.startSeq, err: errorMessage(err) }, "Transcription failed; segment dropped");
      return { kind: "empty", reason, error };
    } finally {
      deadline.dispose();
    }
  }

  /** Consume segments in order until the queue closes (or the signal aborts). */
  async run(
    segments: BoundedQueue<SpeechSegment>,
    transcripts: BoundedQueue<Transcript>,
    signal?: AbortSignal
  ): Promise<void> {
    for (;;) {
      const segment = await segments.pull(signal);
      if (!segment) return;
      const outcome = await this.transcribe(segment, signal);
      if (outcome.kind === "transcript") transcripts.push(outcome.transcript);
    }
  }
}
