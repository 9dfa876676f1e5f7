/**
 * In-process stand-ins for device processes, the audio sink and the ASR/LLM/TTS adapters.
 */

import { EventEmitter } from "events";
import { PassThrough } from "stream";
import type { AudioProcess, CommandSpec, ProcessRole, ProcessSpawner } from "../../src/audio/process";
import type { AudioSink } from "../../src/audio/playback";
import type { IASR, TranscribeOptions, TranscriptResult } from "../../src/adapters/asr";
import type { ChatOptions, ChatResponse, ILLM, Message } from "../../src/adapters/llm";
import type { ITTS, VoiceOptions } from "../../src/adapters/tts";
import type { AudioBlock, SpeechSegment } from "../../src/pipeline/types";
import { sleep } from "../../src/pipeline/deadline";
import { samplesToPcm } from "../../src/pipeline/audio-utils";

export function abortError(): Error {
  const err = new Error("aborted");
  err.name = "AbortError";
  return err;
}

export function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

/** Poll until `condition` holds; fails the test after `timeoutMs`. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutMs) throw new Error("waitFor: condition not met in time");
    await sleep(5);
  }
}

export class FakeProcess extends EventEmitter implements AudioProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly written: Buffer[] = [];
  killed = false;
  exited = false;

  constructor(
    readonly spec: CommandSpec,
    readonly role: ProcessRole
  ) {
    super();
    this.stdin.on("data", (chunk: Buffer) => this.written.push(chunk));
  }

  onExit(listener: (code: number | null, signal: string | null) => void): void {
    this.once("exit", listener);
  }

  onError(listener: (err: Error) => void): void {
    this.once("error", listener);
  }

  kill(): void {
    if (this.killed) return;
    this.killed = true;
    this.exit(null, "SIGTERM");
  }

  emitAudio(pcm: Buffer): void {
    this.stdout.emit("data", pcm);
  }

  exit(code: number | null, signal: string | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.emit("exit", code, signal);
  }

  failToSpawn(): void {
    this.exited = true;
    this.emit("error", Object.assign(new Error("spawn ENOENT"), { code: "ENOENT" }));
  }
}

/** Records every spawn; `onSpawn` scripts each process by spawn index. */
export class FakeSpawner {
  readonly processes: FakeProcess[] = [];

  constructor(private readonly onSpawn: (proc: FakeProcess, index: number) => void = () => undefined) {}

  readonly spawn: ProcessSpawner = (spec, role) => {
    const proc = new FakeProcess(spec, role);
    const index = this.processes.length;
    this.processes.push(proc);
    setImmediate(() => this.onSpawn(proc, index));
    return proc;
  };

  get tools(): string[] {
    return this.processes.map((p) => p.spec.tool);
  }
}

export interface SinkWrite {
  pcm: Buffer;
  signal?: AbortSignal;
}

export class FakeSink implements AudioSink {
  readonly writes: SinkWrite[] = [];
  stops = 0;
  opened = false;
  closed = false;
  /** Each write "plays" for this long unless aborted. */
  writeDelayMs = 0;
  onWrite?: (pcm: Buffer) => void;

  constructor(readonly sampleRate = 16000) {}

  async open(): Promise<void> {
    this.opened = true;
  }

  async write(pcm: Buffer, signal?: AbortSignal): Promise<void> {
    this.writes.push({ pcm, signal });
    this.onWrite?.(pcm);
    if (this.writeDelayMs > 0) await sleep(this.writeDelayMs, signal);
  }

  stop(): void {
    this.stops++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Writes decoded as text (FakeTTS encodes text as its bytes). */
  get texts(): string[] {
    return this.writes.map((w) => w.pcm.toString("utf8"));
  }
}

/** "Synthesizes" text as its UTF-8 bytes, with per-text delays and failures. */
export class FakeTTS implements ITTS {
  readonly calls: string[] = [];
  readonly options: VoiceOptions[] = [];
  delays: Record<string, number> = {};
  failing = new Set<string>();

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    this.calls.push(text);
    if (options) this.options.push(options);
    const delay = this.delays[text] ?? 0;
    if (delay > 0 && !(await sleep(delay, options?.signal))) throw abortError();
    if (this.failing.has(text)) throw httpError(500, "synthesis backend unavailable");
    return Buffer.from(text, "utf8");
  }
}

export class FakeASR implements IASR {
  readonly calls: Array<{ audio: Buffer; format?: string; options?: TranscribeOptions }> = [];
  /** Consumed in order; an Error is thrown, "hang" never settles; empty list returns "". */
  results: Array<string | Error | "hang"> = [];

  async transcribe(audio: Buffer, format?: string, options?: TranscribeOptions): Promise<TranscriptResult> {
    this.calls.push({ audio, format, options });
    const next = this.results.shift() ?? "";
    if (next instanceof Error) throw next;
    if (next === "hang") return new Promise<TranscriptResult>(() => undefined);
    return { text: next };
  }
}

export interface ScriptedReply {
  chunks?: string[];
  /** Delay before each chunk. */
  chunkDelayMs?: number;
  /** Thrown by chat() itself, before any stream. */
  error?: Error;
  /** Thrown by the stream after all chunks were yielded. */
  streamError?: Error;
}

export class FakeLLM implements ILLM {
  readonly calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];
  replies: ScriptedReply[] = [];

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages: messages.map((m) => ({ ...m })), options });
    const reply = this.replies.shift() ?? { chunks: [] };
    if (reply.error) throw reply.error;
    return { text: "", stream: this.stream(reply, options?.signal) };
  }

  get lastSignal(): AbortSignal | undefined {
    return this.calls[this.calls.length - 1]?.options?.signal;
  }

  private async *stream(reply: ScriptedReply, signal?: AbortSignal): AsyncIterable<string> {
    for (const chunk of reply.chunks ?? []) {
      if (reply.chunkDelayMs && !(await sleep(reply.chunkDelayMs, signal))) throw abortError();
      if (signal?.aborted) throw abortError();
      yield chunk;
    }
    if (reply.streamError) throw reply.streamError;
  }
}

/** Constant-amplitude block: its RMS equals |amplitude|. */
export function makeBlock(seq: number, amplitude: number, samples = 1600, sampleRate = 16000): AudioBlock {
  return { samples: new Int16Array(samples).fill(amplitude), sampleRate, channels: 1, seq, capturedAt: Date.now() };
}

/** PCM bytes of one constant-amplitude block. */
export function blockPcm(amplitude: number, samples = 1600): Buffer {
  return samplesToPcm([new Int16Array(samples).fill(amplitude)]);
}

export function makeSegment(startSeq: number, blockCount: number, amplitude = 1000): SpeechSegment {
  const blocks = Array.from({ length: blockCount }, (_, i) => makeBlock(startSeq + i, amplitude));
  return {
    blocks,
    sampleRate: 16000,
    startSeq,
    endSeq: startSeq + blockCount - 1,
    durationMs: blockCount * 100,
    speechMs: blockCount * 100,
    endedAt: Date.now(),
  };
}
