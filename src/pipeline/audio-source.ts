/**
 * AudioSource: continuous microphone capture through a capture tool process.
 * Raw PCM is cut into fixed-size AudioBlocks and pushed to a bounded queue; capture never waits on consumers.
 */

import { BoundedQueue } from "./queue";
import type { AudioBlock } from "./types";
import { BYTES_PER_SAMPLE, pcmToSamples } from "./audio-utils";
import { buildCaptureCommands } from "../audio/capture";
import { spawnProcess, describeCommand } from "../audio/process";
import type { AudioProcess, CommandSpec, ProcessSpawner } from "../audio/process";
import { DeviceError, errorMessage } from "../errors";
import { incrementCounter, recordQueueOverflow } from "../metrics";
import { logger } from "../logging";

export interface AudioSourceConfig {
  sampleRate: number;
  /** Samples per block (1600 at 16 kHz = 100 ms). */
  blockSamples: number;
  queueCapacity: number;
  tool?: string;
  device?: string;
  /** Wait this long for the first audio bytes before trying the next tool. Default 3000. */
  startTimeoutMs?: number;
  /** Restarts after an unexpected exit before giving up. Default 3. */
  maxRestarts?: number;
  /** First restart delay, doubled each attempt. Default 500. */
  restartBackoffMs?: number;
  platform?: NodeJS.Platform;
}

export interface AudioSourceCallbacks {
  /** Capture lost for good (restarts exhausted). The block queue is already closed. */
  onFatal?: (err: DeviceError) => void;
}

export class AudioSource {
  readonly blocks: BoundedQueue<AudioBlock>;
  private readonly blockBytes: number;
  private readonly candidates: CommandSpec[];
  private spec?: CommandSpec;
  private proc?: AudioProcess;
  private pending: Buffer = Buffer.alloc(0);
  private seq = 0;
  private restarts = 0;
  private restartTimer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private readonly config: AudioSourceConfig,
    private readonly callbacks: AudioSourceCallbacks = {},
    private readonly spawner: ProcessSpawner = spawnProcess
  ) {
    this.blockBytes = config.blockSamples * BYTES_PER_SAMPLE;
    this.candidates = buildCaptureCommands({
      sampleRate: config.sampleRate,
      tool: config.tool,
      device: config.device,
      platform: config.platform,
    });
    this.blocks = new BoundedQueue<AudioBlock>({
      name: "capture",
      capacity: config.queueCapacity,
      onOverflow: () => recordQueueOverflow("capture", "capture.blocks_dropped"),
    });
  }


  /** Resolves once audio is flowing; rejects with DeviceError when no capture tool produces audio. */
  async start(): Promise<void> {
    if (this.running) return;
    const failures: string[] = [];
    for (const spec of this.candidates) {
      try {
        await this.launch(spec);
        this.spec = spec;
        this.running = true;
        logger.info({ event: "CAPTURE_STARTED", tool: spec.tool, sampleRate: this.config.sampleRate }, "Microphone capture started");
        return;
      } catch (err) {
        failures.push(`${spec.tool}: ${errorMessage(err)}`);
        logger.debug({ event: "CAPTURE_CANDIDATE_FAILED", command: describeCommand(spec), err: errorMessage(err) }, "Capture tool unavailable");
      }
    }
    throw new DeviceError(`No audio capture device available (${failures.join("; ")})`);
  }

  /** Stop capture, wait (bounded) for the tool to exit, and close the block queue. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.restartTimer) clearTimeout(this.restartTimer);
    this.restartTimer = undefined;
    const proc = this.proc;
    this.proc = undefined;
    if (proc) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, 1000);
        proc.onExit(() => {
          clearTimeout(timer);
          resolve();
        });
        proc.kill();
      });
    }
    this.pending = Buffer.alloc(0);
    this.blocks.close();
    logger.info({ event: "CAPTURE_STOPPED", blocks: this.seq }, "Microphone capture stopped");
  }

  private launch(spec: CommandSpec): Promise<void> {
    const timeoutMs = this.config.startTimeoutMs ?? 3000;
    return new Promise<void>((resolve, reject) => {
      let proc: AudioProcess;
      try {
        proc = this.spawner(spec, "capture");
      } catch (err) {
        reject(err);
        return;
      }
      let accepted = false;
      let failed = false;
      const fail = (err: Error): void => {
        if (accepted || failed) return;
        failed = true;
        clearTimeout(timer);
        proc.kill();
        reject(err);
      };
      const timer = setTimeout(() => fail(new Error(`no audio within ${timeoutMs}ms`)), timeoutMs);

      const stdout = proc.stdout;
      if (!stdout) {
        fail(new Error("capture process has no stdout"));
        return;
      }
      stdout.on("data", (chunk: Buffer) => {
        if (failed) return;
        if (!accepted) {
          accepted = true;
          clearTimeout(timer);
          this.proc = proc;
          resolve();
        }
        if (this.proc === proc) this.ingest(chunk);
      });
      proc.stderr?.on("data", (d: Buffer) => {
        const message = d.toString().trim();
        if (message) logger.warn({ event: "CAPTURE_STDERR", tool: spec.tool, message }, "Capture tool reported an error");
      });
      proc.onError((err) => {
        if (!accepted) fail(err);
        else logger.warn({ event: "CAPTURE_PROCESS_ERROR", tool: spec.tool, err: err.message }, "Capture process error");
      });
      proc.onExit((code, signal) => {
        if (!accepted) fail(new Error(`exited with code ${code ?? signal}`));
        else this.handleExit(proc, code, signal);
      });
    });
  }

  private ingest(chunk: Buffer): void {
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    while (this.pending.length >= this.blockBytes) {
      const samples = pcmToSamples(this.pending.subarray(0, this.blockBytes));
      this.pending = this.pending.subarray(this.blockBytes);
      incrementCounter("capture.blocks");
      this.blocks.push({
        samples,
        sampleRate: this.config.sampleRate,
        channels: 1,
        seq: this.seq++,
        capturedAt: Date.now(),
      });
    }
  }

  private handleExit(proc: AudioProcess, code: number | null, signal: string | null): void {
    if (this.proc !== proc) return;
    this.proc = undefined;
    if (!this.running) return;
    logger.warn({ event: "CAPTURE_EXITED", code, signal }, "Capture process exited unexpectedly");
    this.scheduleRestart();
  }

  private scheduleRestart(): void {
    const maxRestarts = this.config.maxRestarts ?? 3;
    if (this.restarts >= maxRestarts) {
      const err = new DeviceError(`Microphone capture lost after ${this.restarts} restart attempts`);
      logger.error({ event: "CAPTURE_FATAL", restarts: this.restarts }, err.message);
      this.running = false;
      this.blocks.close();
      this.callbacks.onFatal?.(err);
      return;
    }
    this.restarts++;
    incrementCounter("capture.restarts");
    const delay = (this.config.restartBackoffMs ?? 500) * 2 ** (this.restarts - 1);
    logger.info({ event: "CAPTURE_RESTART", attempt: this.restarts, delayMs: delay }, "Restarting capture");
    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      void this.restart();
    }, delay);
  }

  private async restart(): Promise<void> {
    const spec = this.spec;
    if (!this.running || !spec) return;
    this.pending = Buffer.alloc(0);
    try {
      await this.launch(spec);
      if (!this.running) {
        this.proc?.kill();
        this.proc = undefined;
        return;
      }
      this.restarts = 0;
      logger.info({ event: "CAPTURE_RESTARTED", tool: spec.tool }, "Microphone capture restarted");
    } catch (err) {
      logger.warn({ event: "CAPTURE_RESTART_FAILED", err: errorMessage(err) }, "Capture restart failed");
      if (this.running) this.scheduleRestart();
    }
  }
}
