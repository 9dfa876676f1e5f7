/**
 * In-process counters and turn latencies.
 * Non-fatal errors and backpressure events are counted here and logged; nothing is exported over the network.
 */

import { logger } from "../logging";

export type CounterName =
  | "capture.blocks"
  | "capture.blocks_dropped"
  | "capture.restarts"
  | "vad.segments"
  | "vad.segments_discarded"
  | "segments.dropped"
  | "transcripts.dropped"
  | "asr.empty"
  | "asr.errors"
  | "llm.errors"
  | "llm.retries"
  | "tts.errors"
  | "playback.items"
  | "playback.items_dropped"
  | "playback.items_cancelled"
  | "turns.completed"
  | "turns.interrupted"
  | "turns.failed"
  | "barge_in";

/** Last turn timing (ms). */
export interface TurnMetrics {
  asrLatencyMs?: number;
  /** Request start to first reply chunk. */
  llmFirstChunkMs?: number;
  llmLatencyMs?: number;
  /** End of user speech to first reply chunk handed to playback (primary KPI). */
  endOfUserSpeechToFirstChunkMs?: number;
  /** Barge-in signal to playback stopped. */
  bargeInStopLatencyMs?: number;
  turnId?: string;
  /** Approximate response size (characters). */
  responseChars?: number;
}

let counters = new Map<CounterName, number>();
let lastTurnMetrics: TurnMetrics = {};

export function incrementCounter(name: CounterName, by = 1): void {
  counters.set(name, (counters.get(name) ?? 0) + by);
}

export function getCounter(name: CounterName): number {
  return counters.get(name) ?? 0;
}

export function getCounters(): Partial<Record<CounterName, number>> {
  const out: Partial<Record<CounterName, number>> = {};
  for (const [name, value] of counters) out[name] = value;
  return out;
}

/** Queue overflow (backpressure): oldest item dropped. */
export function recordQueueOverflow(queue: string, counter: CounterName): void {
  incrementCounter(counter);
  logger.debug({ event: "QUEUE_OVERFLOW", queue, dropped: getCounter(counter) }, "Queue full; dropped oldest item");
}

export function recordTurnMetrics(metrics: TurnMetrics): void {
  lastTurnMetrics = { ...metrics };
  logger.info(
    {
      event: "TURN_METRICS",
      turn_id: metrics.turnId,
      asr_latency_ms: metrics.asrLatencyMs,
      llm_first_chunk_ms: metrics.llmFirstChunkMs,
      llm_latency_ms: metrics.llmLatencyMs,
      end_of_user_speech_to_first_chunk_ms: metrics.endOfUserSpeechToFirstChunkMs,
      barge_in_stop_latency_ms: metrics.bargeInStopLatencyMs,
      response_chars: metrics.responseChars,
    },
    "Turn latency"
  );
}

export function getLastTurnMetrics(): TurnMetrics {
  return { ...lastTurnMetrics };
}

export function logCounters(reason: string): void {
  logger.info({ event: "METRICS", reason, counters: getCounters() }, "Pipeline counters");
}

/** Reset all counters (tests, new session). */
export function resetMetrics(): void {
  counters = new Map();
  lastTurnMetrics = {};
}
