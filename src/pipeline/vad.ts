/**
 * Voice activity gate: energy-based speech detection with a dynamic threshold.
 *
 * States: idle -> listening -> collecting -> segmented -> idle.
 * The threshold follows the trailing average energy of inactive blocks (times a margin),
 * clamped to [minThreshold, maxThreshold]. It is owned by the gate; others read snapshot().
 * A segment that runs to maxSegmentMs without a quiet stretch lifts the floor to its quiet level,
 * so a step up in ambient noise is followed as well as a drop.
 */

import type { AudioBlock, SpeechSegment } from "./types";
import { computeRms } from "./audio-utils";
import { incrementCounter } from "../metrics";
import { logger } from "../logging";

export type GateState = "idle" | "listening" | "collecting" | "segmented";

export interface VoiceActivityGateConfig {
  /** Starting threshold (RMS, int16 scale). */
  initialThreshold: number;
  minThreshold: number;
  maxThreshold: number;
  /** threshold = trailing noise average * marginFactor. */
  marginFactor: number;
  /** While collecting, a block stays active down to threshold * hysteresis (0 < h <= 1). */
  hysteresis: number;
  /** Number of recent inactive energies averaged for adaptation. */
  noiseWindowBlocks: number;
  /** Recompute the threshold after this many inactive blocks. */
  adaptEveryBlocks: number;
  /** Consecutive inactive audio (ms) that ends a segment. */
  silencePaddingMs: number;
  /** Quiet audio (ms) kept in front of a segment. */
  preRollMs: number;
  /** Segments with less voiced audio are discarded as noise. */
  minSegmentMs: number;
  /** Force-close a segment at this length. */
  maxSegmentMs: number;
  /** While the agent speaks, starting a segment needs energy >= threshold * bargeInFactor. Default 1. */
  bargeInFactor?: number;
}

export interface VoiceActivityGateHooks {
  /** True while the agent has a reply in flight or audio queued/playing. */
  isAgentSpeaking?: () => boolean;
  /** Raised on entering collecting while the agent speaks, before collection continues. */
  onBargeIn?: () => void;
}

export interface GateResult {
  energy: number;
  /** Threshold used for this block. */
  threshold: number;
  /** State reached by this block ("segmented" when a segment closed on it). */
  state: GateState;
  active: boolean;
  /** This block opened a new segment. */
  speechStarted: boolean;
  bargeIn: boolean;
  segment?: SpeechSegment;
  /** A segment closed but was too short to emit. */
  discarded: boolean;
}

export interface GateSnapshot {
  state: GateState;
  threshold: number;
  /** Trailing average of inactive energy; undefined before the first inactive block. */
  noiseFloor: number | undefined;
}

function blockMs(block: AudioBlock): number {
  return (block.samples.length / block.channels / block.sampleRate) * 1000;
}

/** Share of a forced segment's blocks that may sit below its quiet level. */
const QUIET_PERCENTILE = 0.1;

function lowPercentile(values: number[], p: number): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(p * (sorted.length - 1))];
}

function validate(config: VoiceActivityGateConfig): void {
  const problems: string[] = [];
  if (!(config.minThreshold > 0)) problems.push("minThreshold must be > 0");
  if (!(config.maxThreshold >= config.minThreshold)) problems.push("maxThreshold must be >= minThreshold");
  if (!(config.hysteresis > 0 && config.hysteresis <= 1)) problems.push("hysteresis must be in (0, 1]");
  if (!(config.marginFactor > 0)) problems.push("marginFactor must be > 0");
  if (!(config.noiseWindowBlocks >= 1)) problems.push("noiseWindowBlocks must be >= 1");
  if (!(config.adaptEveryBlocks >= 1)) problems.push("adaptEveryBlocks must be >= 1");
  if (problems.length > 0) throw new RangeError(`VoiceActivityGate: ${problems.join("; ")}`);
}

export class VoiceActivityGate {
  private state: GateState = "idle";
  private threshold: number;
  private noiseWindow: number[] = [];
  private inactiveSinceAdapt = 0;

  private preRoll: AudioBlock[] = [];
  private preRollMs = 0;

  private collected: AudioBlock[] = [];
  private collectedMs = 0;
  /** First active block through the latest active block. */
  private voicedMs = 0;
  /** Inactive audio since the latest active block. */
  private silenceRunMs = 0;
  /** Energy of each block from the opening block on (pre-roll excluded). */
  private segmentEnergies: number[] = [];

  private readonly bargeInFactor: number;

  constructor(
    private readonly config: VoiceActivityGateConfig,
    private readonly hooks: VoiceActivityGateHooks = {}
  ) {
    validate(config);
    this.threshold = this.clamp(config.initialThreshold);
    this.bargeInFactor = config.bargeInFactor ?? 1;
  }

  process(block: AudioBlock): GateResult {
    const energy = computeRms(block.samples);
    const durationMs = blockMs(block);
    const threshold = this.threshold;

    if (this.state !== "collecting") {
      const agentSpeaking = this.hooks.isAgentSpeaking?.() ?? false;
      const startLevel = agentSpeaking ? threshold * this.bargeInFactor : threshold;
      if (energy >= startLevel) {
        this.beginSegment(block, durationMs, energy);
        if (agentSpeaking) {
          logger.info({ event: "BARGE_IN", energy, threshold }, "Speech while agent is speaking; cancelling reply");
          this.hooks.onBargeIn?.();
        }
        return { energy, threshold, state: "collecting", active: true, speechStarted: true, bargeIn: agentSpeaking, discarded: false };
      }
      this.observeInactive(energy);
      this.rememberPreRoll(block, durationMs);
      this.state = "listening";
      return { energy, threshold, state: "listening", active: false, speechStarted: false, bargeIn: false, discarded: false };
    }

    this.collected.push(block);
    this.collectedMs += durationMs;
    this.segmentEnergies.push(energy);
    const active = energy >= threshold * this.config.hysteresis;
    if (active) {
      this.voicedMs += this.silenceRunMs + durationMs;
      this.silenceRunMs = 0;
    } else {
      this.silenceRunMs += durationMs;
      this.observeInactive(energy);
    }

    const endedBySilence = this.silenceRunMs >= this.config.silencePaddingMs;
    const endedByLength = this.voicedMs + this.silenceRunMs >= this.config.maxSegmentMs;
    if (!endedBySilence && !endedByLength) {
      return { energy, threshold, state: "collecting", active, speechStarted: false, bargeIn: false, discarded: false };
    }

    const segment = this.closeSegment(endedByLength && !endedBySilence);
    return {
      energy,
      threshold,
      state: "segmented",
      active,
      speechStarted: false,
      bargeIn: false,
      segment,
      discarded: segment === undefined,
    };
  }

  snapshot(): GateSnapshot {
    return { state: this.state, threshold: this.threshold, noiseFloor: this.noiseFloor() };
  }

  /** Drop any partial segment (e.g. on shutdown). Keeps the learned threshold. */
  reset(): void {
    this.state = "idle";
    this.collected = [];
    this.collectedMs = 0;
    this.voicedMs = 0;
    this.silenceRunMs = 0;
    this.segmentEnergies = [];
    this.preRoll = [];
    this.preRollMs = 0;
  }

  private beginSegment(block: AudioBlock, durationMs: number, energy: number): void {
    this.state = "collecting";
    this.collected = [...this.preRoll, block];
    this.collectedMs = this.preRollMs + durationMs;
    this.voicedMs = durationMs;
    this.silenceRunMs = 0;
    this.segmentEnergies = [energy];
    this.preRoll = [];
    this.preRollMs = 0;
  }

  private closeSegment(forced: boolean): SpeechSegment | undefined {
    const blocks = this.collected;
    const speechMs = this.voicedMs;
    const durationMs = this.collectedMs;
    const quietLevel = lowPercentile(this.segmentEnergies, QUIET_PERCENTILE);
    this.reset();
    if (forced && quietLevel !== undefined) this.raiseFloor(quietLevel);

    if (speechMs < this.config.minSegmentMs) {
      incrementCounter("vad.segments_discarded");
      logger.debug({ event: "VAD_SEGMENT_DISCARDED", speechMs, minSegmentMs: this.config.minSegmentMs }, "Segment too short; treated as noise");
      return undefined;
    }
    const first = blocks[0];
    const last = blocks[blocks.length - 1];
    incrementCounter("vad.segments");
    logger.info(
      { event: "VAD_SEGMENT", startSeq: first.seq, endSeq: last.seq, speechMs, durationMs, forced, threshold: this.threshold },
      "Speech segment complete"
    );
    return {
      blocks,
      sampleRate: first.sampleRate,
      startSeq: first.seq,
      endSeq: last.seq,
      durationMs,
      speechMs,
      endedAt: Date.now(),
    };
  }

  private rememberPreRoll(block: AudioBlock, durationMs: number): void {
    if (this.config.preRollMs <= 0) return;
    this.preRoll.push(block);
    this.preRollMs += durationMs;
    while (this.preRoll.length > 0 && this.preRollMs > this.config.preRollMs) {
      const dropped = this.preRoll.shift();
      if (dropped) this.preRollMs -= blockMs(dropped);
    }
  }

  private observeInactive(energy: number): void {
    this.noiseWindow.push(energy);
    if (this.noiseWindow.length > this.config.noiseWindowBlocks) this.noiseWindow.shift();
    this.inactiveSinceAdapt++;
    if (this.inactiveSinceAdapt < this.config.adaptEveryBlocks) return;
    this.inactiveSinceAdapt = 0;
    const floor = this.noiseFloor();
    if (floor === undefined) return;
    const next = this.clamp(floor * this.config.marginFactor);
    if (next !== this.threshold) {
      logger.debug({ event: "VAD_THRESHOLD", from: this.threshold, to: next, noiseFloor: floor }, "Activity threshold adjusted");
      this.threshold = next;
    }
  }

  /** Raises the noise floor to `level` when it is above the current one. Never lowers it. */
  private raiseFloor(level: number): void {
    const floor = this.noiseFloor();
    if (floor !== undefined && level <= floor) return;
    this.noiseWindow = new Array<number>(this.config.noiseWindowBlocks).fill(level);
    this.inactiveSinceAdapt = 0;
    const next = this.clamp(level * this.config.marginFactor);
    logger.info({ event: "VAD_NOISE_STEP", from: this.threshold, to: next, noiseFloor: level }, "Segment hit max length without a pause; raising threshold");
    this.threshold = next;
  }

  private noiseFloor(): number | undefined {
    if (this.noiseWindow.length === 0) return undefined;
    return this.noiseWindow.reduce((a, b) => a + b, 0) / this.noiseWindow.length;
  }

  private clamp(value: number): number {
    return Math.min(this.config.maxThreshold, Math.max(this.config.minThreshold, value));
  }
}
