/**
 * SpeechPlayer: FIFO playback of reply pieces with pipelined synthesis.
 * While item N plays, item N+1 is synthesized. Playback order always equals enqueue order.
 * cancelAll() is the barge-in path: queue drained, synthesis aborted, sink silenced.
 */

import { randomUUID } from "crypto";
import type { ITTS, VoiceOptions } from "../adapters/tts";
import { collectTts } from "../adapters/tts";
import type { AudioSink } from "../audio/playback";
import { BoundedQueue } from "./queue";
import type { PlaybackItem, PlaybackRequest } from "./types";
import { applyGain } from "./audio-utils";
import { abortable, createDeadline } from "./deadline";
import { SynthesisError, classifyServiceError, errorMessage } from "../errors";
import { incrementCounter, recordQueueOverflow } from "../metrics";
import { logger, logTtsCall } from "../logging";

export type PlaybackStatus = "queued" | "synthesizing" | "playing" | "played" | "skipped" | "cancelled" | "dropped";

export interface SpeechPlayerConfig {
  queueCapacity: number;
  synthesisTimeoutMs: number;
  /** Linear gain applied to synthesized audio (0.9 = slightly below full scale). */
  volume: number;
  speakingRate?: number;
  voiceName?: string;
  languageCode?: string;
}

interface Synthesis {
  audio: Promise<Buffer | undefined>;
  controller: AbortController;
}

export class SpeechPlayer {
  private readonly queue: BoundedQueue<PlaybackItem>;
  private readonly status = new WeakMap<PlaybackItem, PlaybackStatus>();
  private readonly synthesis = new Map<string, Synthesis>();
  /** Handed straight to the waiting loop; not yet picked up. */
  private handedOff?: PlaybackItem;
  private current?: PlaybackItem;
  private currentStarted = false;
  private playback?: AbortController;
  /** Bumped by cancelAll(); work started under an older generation is discarded. */
  private generation = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly stopController = new AbortController();
  private loopDone?: Promise<void>;

  constructor(
    private readonly tts: ITTS,
    private readonly sink: AudioSink,
    private readonly config: SpeechPlayerConfig
  ) {
    this.queue = new BoundedQueue<PlaybackItem>({
      name: "playback",
      capacity: config.queueCapacity,
      onOverflow: (dropped) => {
        this.status.set(dropped, "dropped");
        this.abortSynthesis(dropped.id);
        recordQueueOverflow("playback", "playback.items_dropped");
      },
    });
  }

  /** Open the sink (DeviceError when unusable) and start the playback loop. */
  async start(): Promise<void> {
    if (this.loopDone) return;
    await this.sink.open();
    this.loopDone = this.loop();
  }

  enqueue(request: PlaybackRequest): PlaybackItem {
    const base = { id: randomUUID(), turnId: request.turnId, enqueuedAt: Date.now() };
    const item: PlaybackItem = "audio" in request ? { ...base, audio: request.audio } : { ...base, text: request.text };
    this.status.set(item, "queued");
    this.queue.push(item);
    if (!this.queue.isClosed && this.queue.size === 0) this.handedOff = item;
    // Lookahead: if this item is next in line behind the one playing, start synthesizing it now.
    if (this.current && this.queue.peek() === item) this.prefetch(item);
    return item;
  }

  statusOf(item: PlaybackItem): PlaybackStatus | undefined {
    return this.status.get(item);
  }

  /** True while an item is being synthesized or played, or items are queued. */
  isActive(): boolean {
    return this.handedOff !== undefined || this.current !== undefined || this.queue.size > 0;
  }

  /** Resolves once nothing is queued or playing. */
  whenIdle(): Promise<void> {
    if (!this.isActive()) return Promise.resolve();
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Discard everything not yet audible and stop the sink now.
   * Returns the discarded items (queued, or pulled but not yet playing), in order.
   */
  cancelAll(reason: string): PlaybackItem[] {
    this.generation++;
    const discarded: PlaybackItem[] = [];
    if (this.handedOff) discarded.push(this.handedOff);
    this.handedOff = undefined;
    if (this.current && !this.currentStarted) discarded.push(this.current);
    discarded.push(...this.queue.drain());
    for (const item of discarded) this.status.set(item, "cancelled");
    for (const id of [...this.synthesis.keys()]) this.abortSynthesis(id);
    this.playback?.abort();
    this.playback = undefined;
    this.sink.stop();
    this.current = undefined;
    this.currentStarted = false;
    if (discarded.length > 0) incrementCounter("playback.items_cancelled", discarded.length);
    logger.info({ event: "PLAYBACK_CANCELLED", reason, discarded: discarded.length }, "Playback cancelled");
    this.notifyIdle();
    return discarded;
  }

  /** Cancel everything and end the playback loop. The sink is left open for the caller to close. */
  async stop(): Promise<void> {
    this.cancelAll("stop");
    this.queue.close();
    this.stopController.abort();
    await this.loopDone;
    this.loopDone = undefined;
  }

  private async loop(): Promise<void> {
    for (;;) {
      const item = await this.queue.pull(this.stopController.signal);
      if (!item) return;
      if (this.handedOff === item) this.handedOff = undefined;
      if (this.status.get(item) === "cancelled") continue;
      this.current = item;
      this.currentStarted = false;
      try {
        await this.play(item, this.generation);
      } catch (err) {
        // Sink failure: skip the item, keep the loop alive.
        this.status.set(item, "skipped");
        logger.error({ event: "PLAYBACK_FAILED", itemId: item.id, err: errorMessage(err) }, "Playback failed; item skipped");
      } finally {
        if (this.current === item) {
          this.current = undefined;
          this.currentStarted = false;
        }
        this.notifyIdle();
      }
    }
  }

  private async play(item: PlaybackItem, generation: number): Promise<void> {
    const synthesis = this.synthesis.get(item.id) ?? this.startSynthesis(item);
    const next = this.queue.peek();
    if (next) this.prefetch(next);

    const audio = await synthesis.audio;
    this.synthesis.delete(item.id);
    if (generation !== this.generation) return;
    if (!audio || audio.length === 0) {
      if (this.status.get(item) !== "cancelled") this.status.set(item, "skipped");
      return;
    }

    const playback = new AbortController();
    this.playback = playback;
    this.currentStarted = true;
    this.status.set(item, "playing");
    await this.sink.write(applyGain(audio, this.config.volume), playback.signal);
    if (this.playback === playback) this.playback = undefined;
    this.status.set(item, "played");
    incrementCounter("playback.items");
  }

  private prefetch(item: PlaybackItem): void {
    if (!this.synthesis.has(item.id)) this.startSynthesis(item);
  }

  private startSynthesis(item: PlaybackItem): Synthesis {
    const controller = new AbortController();
    const entry: Synthesis = { controller, audio: this.synthesize(item, controller.signal) };
    this.synthesis.set(item.id, entry);
    if (item.text !== undefined) this.status.set(item, "synthesizing");
    return entry;
  }

  private async synthesize(item: PlaybackItem, signal: AbortSignal): Promise<Buffer | undefined> {
    if (item.audio) return item.audio;
    const text = item.text?.trim();
    if (!text) return undefined;
    const deadline = createDeadline("tts", this.config.synthesisTimeoutMs, signal);
    const start = Date.now();
    try {
      const voice: VoiceOptions = {
        voiceName: this.config.voiceName,
        languageCode: this.config.languageCode,
        sampleRateHz: this.sink.sampleRate,
        speakingRate: this.config.speakingRate,
        signal: deadline.signal,
      };
      const audio = await abortable(collectTts(this.tts.synthesize(text, voice)), deadline.signal);
      logTtsCall(logger, text.length, audio.length, Date.now() - start);
      return audio;
    } catch (err) {
      const reason = deadline.expired() ? "timeout" : classifyServiceError(err);
      if (reason === "cancelled") return undefined;
      const error = new SynthesisError(reason, `Synthesis failed: ${errorMessage(err)}`, { cause: err });
      incrementCounter("tts.errors");
      logger.warn({ event: "TTS_FAILED", reason, itemId: item.id, err: error.message }, "Synthesis failed; item skipped");
      return undefined;
    } finally {
      deadline.dispose();
    }
  }

  private abortSynthesis(id: string): void {
    const entry = this.synthesis.get(id);
    if (!entry) return;
    this.synthesis.delete(id);
    entry.controller.abort();
  }

  private notifyIdle(): void {
    if (this.isActive()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
