/**
 * Pipeline types: audio blocks, speech segments, transcripts, playback items.
 */

/** Fixed-length run of captured samples. Immutable once produced. */
export interface AudioBlock {
  /** Signed 16-bit samples (mono). */
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly channels: number;
  /** Monotonic per AudioSource, starting at 0. */
  readonly seq: number;
  /** Wall clock (ms) when the block was cut from the capture stream. */
  readonly capturedAt: number;
}

/** Contiguous speech, including leading pre-roll and trailing silence padding. */
export interface SpeechSegment {
  readonly blocks: readonly AudioBlock[];
  readonly sampleRate: number;
  readonly startSeq: number;
  readonly endSeq: number;
  /** Total duration of all blocks. */
  readonly durationMs: number;
  /** First active block through last active block. */
  readonly speechMs: number;
  /** When the gate closed the segment. */
  readonly endedAt: number;
}

export interface Transcript {
  text: string;
  /** False for blank or unusable recognition output; invalid transcripts are never forwarded. */
  valid: boolean;
  language?: string;
  /** startSeq of the source segment. */
  segmentSeq: number;
  /** endedAt of the source segment (latency accounting). */
  speechEndedAt: number;
  /** Time spent in the recognizer. */
  recognitionMs?: number;
}

export type TurnRole = "system" | "user" | "assistant";

/** Unit of speech output; owned by the SpeechPlayer queue until played or cancelled. */
export interface PlaybackItem {
  readonly id: string;
  /** Dialogue turn (or proactive utterance) this item belongs to. */
  readonly turnId: string;
  readonly text?: string;
  /** Pre-synthesized PCM at the sink's sample rate. */
  readonly audio?: Buffer;
  readonly enqueuedAt: number;
}

export type PlaybackRequest =
  | { turnId: string; text: string }
  | { turnId: string; audio: Buffer };
