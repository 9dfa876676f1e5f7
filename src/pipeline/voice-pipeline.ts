/**
 * VoicePipeline: AudioSource → VoiceActivityGate → Transcriber → DialogueOrchestrator → SpeechPlayer.
 * Each stage is an async loop; stages talk only through bounded queues. Barge-in runs from the gate
 * straight into the orchestrator so it does not wait behind queued work.
 */

import type { AppConfig } from "../config";
import type { IASR } from "../adapters/asr";
import type { ILLM } from "../adapters/llm";
import type { ITTS } from "../adapters/tts";
import type { AudioSink } from "../audio/playback";
import type { ProcessSpawner } from "../audio/process";
import type { DeviceError } from "../errors";
import { errorMessage } from "../errors";
import { ConversationHistory } from "../memory/history";
import { AudioSource } from "./audio-source";
import { VoiceActivityGate } from "./vad";
import { Transcriber } from "./transcriber";
import { SpeechPlayer } from "./speech-player";
import { DialogueOrchestrator } from "./orchestrator";
import type { OrchestratorCallbacks } from "./orchestrator";
import { BoundedQueue } from "./queue";
import type { SpeechSegment, Transcript } from "./types";
import { recordQueueOverflow } from "../metrics";
import { logger } from "../logging";

export interface VoicePipelineAdapters {
  asr: IASR;
  llm: ILLM;
  tts: ITTS;
}

export interface VoicePipelineOptions {
  /** Capture process factory (tests pass an in-process fake). */
  spawner?: ProcessSpawner;
  callbacks?: OrchestratorCallbacks;
  /** Capture lost for good; the pipeline keeps playing but hears nothing more. */
  onFatal?: (err: DeviceError) => void;
  /** Capture start timeout and restart policy. */
  capture?: { startTimeoutMs?: number; maxRestarts?: number; restartBackoffMs?: number };
}

const SEGMENT_QUEUE_CAPACITY = 8;
const TRANSCRIPT_QUEUE_CAPACITY = 8;

export class VoicePipeline {
  readonly source: AudioSource;
  readonly gate: VoiceActivityGate;
  readonly transcriber: Transcriber;
  readonly player: SpeechPlayer;
  readonly orchestrator: DialogueOrchestrator;
  readonly history: ConversationHistory;
  readonly segments: BoundedQueue<SpeechSegment>;
  readonly transcripts: BoundedQueue<Transcript>;
  private readonly stopController = new AbortController();
  private loops: Promise<void>[] = [];
  private started = false;

  constructor(
    private readonly config: AppConfig,
    adapters: VoicePipelineAdapters,
    private readonly sink: AudioSink,
    options: VoicePipelineOptions = {}
  ) {
    this.source = new AudioSource(
      {
        sampleRate: config.audio.sampleRate,
        blockSamples: config.audio.blockSamples,
        queueCapacity: config.audio.captureQueueBlocks,
        tool: config.audio.captureTool,
        device: config.audio.captureDevice,
        ...options.capture,
      },
      { onFatal: options.onFatal },
      options.spawner
    );
    this.segments = new BoundedQueue<SpeechSegment>({
      name: "segments",
      capacity: SEGMENT_QUEUE_CAPACITY,
      onOverflow: () => recordQueueOverflow("segments", "segments.dropped"),
    });
    this.transcripts = new BoundedQueue<Transcript>({
      name: "transcripts",
      capacity: TRANSCRIPT_QUEUE_CAPACITY,
      onOverflow: () => recordQueueOverflow("transcripts", "transcripts.dropped"),
    });
    this.history = new ConversationHistory({
      systemPrompt: config.llm.systemPrompt,
      maxHistoryChars: config.dialogue.maxHistoryChars,
      maxTurns: config.dialogue.maxTurnsInMemory,
    });
    this.player = new SpeechPlayer(adapters.tts, sink, {
      queueCapacity: config.playback.queueItems,
      synthesisTimeoutMs: config.timeouts.ttsMs,
      volume: config.playback.volume,
      speakingRate: config.playback.speakingRate,
    });
    this.orchestrator = new DialogueOrchestrator(
      adapters.llm,
      this.history,
      this.player,
      {
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
        timeoutMs: config.timeouts.llmMs,
        grouping: config.playback.grouping,
        maxCharsPerItem: config.playback.maxCharsPerItem,
        apologyText: config.dialogue.apologyText,
        retry: { attempts: config.dialogue.retryAttempts, backoffMs: config.dialogue.retryBackoffMs },
      },
      options.callbacks
    );
    this.gate = new VoiceActivityGate(config.vad, {
      isAgentSpeaking: () => this.player.isActive() || this.orchestrator.hasTurnInFlight(),
      onBargeIn: () => this.orchestrator.bargeIn(),
    });
    this.transcriber = new Transcriber(adapters.asr, { timeoutMs: config.timeouts.asrMs });
  }

  /** Open output, start capture (DeviceError when unavailable), then launch the stage loops. */
  async start(): Promise<void> {
    if (this.started) return;
    await this.player.start();
    try {
      await this.source.start();
    } catch (err) {
      await this.player.stop();
      throw err;
    }
    this.started = true;
    const signal = this.stopController.signal;
    this.loops = [
      this.guard("gate", this.runGate()),
      this.guard("transcriber", this.transcriber.run(this.segments, this.transcripts, signal)),
      this.guard("dialogue", this.orchestrator.run(this.transcripts, signal)),
    ];
    logger.info({ event: "PIPELINE_STARTED", grouping: this.config.playback.grouping }, "Voice pipeline started");
  }

  /** Speak the configured greeting (stored in history). */
  greet(): void {
    this.orchestrator.speak(this.config.dialogue.greetingText, "greeting");
  }

  /**
   * Shutdown order: capture first (no new input), downstream queues closed and drained,
   * in-flight turn and playback cancelled, then the output device.
   * With a farewell, it is spoken after cancellation and before the device closes.
   */
  async stop(options: { farewell?: boolean } = {}): Promise<void> {
    if (!this.started) {
      await this.sink.close();
      return;
    }
    this.started = false;
    await this.source.stop();
    this.segments.close();
    this.transcripts.close();
    this.segments.drain();
    this.transcripts.drain();
    this.stopController.abort();
    this.orchestrator.cancel();
    await Promise.all(this.loops);
    this.loops = [];
    if (options.farewell && this.orchestrator.speak(this.config.dialogue.farewellText, "farewell")) {
      await this.player.whenIdle();
    }
    await this.player.stop();
    await this.sink.close();
    logger.info({ event: "PIPELINE_STOPPED" }, "Voice pipeline stopped");
  }

  private async runGate(): Promise<void> {
    for await (const block of this.source.blocks) {
      const result = this.gate.process(block);
      if (result.segment) this.segments.push(result.segment);
    }
    this.gate.reset();
    this.segments.close();
  }

  private guard(stage: string, loop: Promise<void>): Promise<void> {
    return loop.catch((err: unknown) => {
      logger.error({ event: "STAGE_FAILED", stage, err: errorMessage(err) }, "Pipeline stage stopped unexpectedly");
    });
  }
}

export function createVoicePipeline(
  config: AppConfig,
  adapters: VoicePipelineAdapters,
  sink: AudioSink,
  options?: VoicePipelineOptions
): VoicePipeline {
  return new VoicePipeline(config, adapters, sink, options);
}
