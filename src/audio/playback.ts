/**
 * Audio sinks: where synthesized PCM (16-bit mono) goes.
 * ProcessAudioSink pipes into a playback tool; WavFileSink records to a file for headless runs.
 */

import { promises as fs } from "fs";
import { DeviceError, errorMessage } from "../errors";
import { logger } from "../logging";
import { pcmDurationMs, pcmToWav } from "../pipeline/audio-utils";
import { sleep } from "../pipeline/deadline";
import { spawnProcess, describeCommand } from "./process";
import type { AudioProcess, CommandSpec, ProcessSpawner } from "./process";

export interface AudioSink {
  readonly sampleRate: number;
  /** Check the output device is usable; rejects with DeviceError. */
  open(): Promise<void>;
  /** Resolves once the audio has played (or immediately when the signal aborts). */
  write(pcm: Buffer, signal?: AbortSignal): Promise<void>;
  /** Drop anything buffered and silence the output now. */
  stop(): void;
  close(): Promise<void>;
}

export interface PlaybackCommandOptions {
  sampleRate: number;
  /** Preferred tool: play, sox, aplay, ffplay. */
  tool?: string;
  platform?: NodeJS.Platform;
}

export function buildPlaybackCommands(options: PlaybackCommandOptions): CommandSpec[] {
  const platform = options.platform ?? process.platform;
  const rate = String(options.sampleRate);
  const raw = ["-t", "raw", "-r", rate, "-e", "signed-integer", "-b", "16", "-c", "1", "-"];
  const all: Record<string, CommandSpec> = {
    play: { tool: "play", command: "play", args: ["-q", ...raw] },
    sox: { tool: "sox", command: "sox", args: ["-q", ...raw, "-d"] },
    aplay: { tool: "aplay", command: "aplay", args: ["-q", "-f", "S16_LE", "-r", rate, "-c", "1", "-t", "raw"] },
    ffplay: {
      tool: "ffplay",
      command: "ffplay",
      args: [
        "-nodisp", "-autoexit", "-hide_banner", "-loglevel", "error",
        "-fflags", "nobuffer", "-flags", "low_delay",
        "-f", "s16le", "-ar", rate, "-ac", "1", "-",
      ],
    },
  };
  const order = platform === "linux" ? ["play", "sox", "aplay", "ffplay"] : ["play", "sox", "ffplay"];
  const preferred = options.tool?.toLowerCase();
  if (preferred && all[preferred]) {
    return [all[preferred], ...order.filter((t) => t !== preferred).map((t) => all[t])];
  }
  return order.map((t) => all[t]);
}

export interface ProcessAudioSinkOptions extends PlaybackCommandOptions {
  spawner?: ProcessSpawner;
  /** How long open() waits for an early exit before accepting a tool. Default 300 ms. */
  probeMs?: number;
}

/**
 * Streams PCM into a playback tool. stop() kills the tool (dropping its buffer); the next write respawns it.
 * write() paces the caller to real time so "played" means the audio had time to reach the speaker.
 */
export class ProcessAudioSink implements AudioSink {
  readonly sampleRate: number;
  private readonly candidates: CommandSpec[];
  private readonly spawner: ProcessSpawner;
  private readonly probeMs: number;
  private spec?: CommandSpec;
  private proc?: AudioProcess;
  /** Wall clock (ms) at which everything written so far has played out. */
  private playingUntil = 0;

  constructor(options: ProcessAudioSinkOptions) {
    this.sampleRate = options.sampleRate;
    this.candidates = buildPlaybackCommands(options);
    this.spawner = options.spawner ?? spawnProcess;
    this.probeMs = options.probeMs ?? 300;
  }

  async open(): Promise<void> {
    if (this.spec) return;
    const failures: string[] = [];
    for (const spec of this.candidates) {
      try {
        await this.probe(spec);
        this.spec = spec;
        logger.info({ event: "PLAYBACK_READY", tool: spec.tool, sampleRate: this.sampleRate }, "Playback device ready");
        return;
      } catch (err) {
        failures.push(`${spec.tool}: ${errorMessage(err)}`);
      }
    }
    throw new DeviceError(`No audio playback device available (${failures.join("; ")})`);
  }

  async write(pcm: Buffer, signal?: AbortSignal): Promise<void> {
    if (pcm.length === 0 || signal?.aborted) return;
    if (!this.spec) await this.open();
    const proc = this.ensureProcess();
    proc.stdin?.write(pcm);
    const now = Date.now();
    this.playingUntil = Math.max(now, this.playingUntil) + pcmDurationMs(pcm.length, this.sampleRate);
    await sleep(this.playingUntil - now, signal);
  }

  stop(): void {
    const proc = this.proc;
    this.proc = undefined;
    this.playingUntil = 0;
    if (proc) {
      proc.stdin?.destroy();
      proc.kill();
    }
  }

  async close(): Promise<void> {
    const proc = this.proc;
    this.proc = undefined;
    if (!proc) return;
    const remaining = Math.max(0, this.playingUntil - Date.now());
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        proc.kill();
        resolve();
      }, remaining + 1000);
      proc.onExit(() => {
        clearTimeout(timer);
        resolve();
      });
      proc.stdin?.end();
    });
  }

  private ensureProcess(): AudioProcess {
    if (this.proc) return this.proc;
    const spec = this.spec ?? this.candidates[0];
    return this.attach(this.spawner(spec, "playback"), spec);
  }

  private attach(proc: AudioProcess, spec: CommandSpec): AudioProcess {
    proc.stdin?.on("error", (err: Error) => {
      logger.warn({ event: "PLAYBACK_PIPE_ERROR", tool: spec.tool, err: err.message }, "Playback pipe error");
    });
    proc.stderr?.on("data", (d: Buffer) => {
      logger.warn({ event: "PLAYBACK_STDERR", tool: spec.tool, message: d.toString().trim() }, "Playback tool reported an error");
    });
    proc.onError((err) => {
      logger.error({ event: "PLAYBACK_FAILED", tool: spec.tool, err: err.message }, "Playback process failed");
      if (this.proc === proc) this.proc = undefined;
    });
    proc.onExit((code) => {
      if (this.proc === proc) {
        this.proc = undefined;
        logger.warn({ event: "PLAYBACK_EXITED", tool: spec.tool, code }, "Playback process exited; respawning on next write");
      }
    });
    this.proc = proc;
    return proc;
  }

  /** Spawn the tool and keep it if it neither errors nor exits within probeMs. */
  private probe(spec: CommandSpec): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let proc: AudioProcess;
      try {
        proc = this.spawner(spec, "playback");
      } catch (err) {
        reject(err);
        return;
      }
      const finish = (err?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          reject(err);
          return;
        }
        this.attach(proc, spec);
        resolve();
      };
      const timer = setTimeout(() => finish(), this.probeMs);
      proc.onError((err) => finish(err));
      proc.onExit((code) => finish(new Error(`${describeCommand(spec)} exited with code ${code}`)));
    });
  }
}

/** Collects the agent's audio and writes one WAV file on close. */
export class WavFileSink implements AudioSink {
  private chunks: Buffer[] = [];

  constructor(
    private readonly filePath: string,
    readonly sampleRate: number
  ) {}

  async open(): Promise<void> {
    // Fail at startup, not at shutdown, when the path is unwritable.
    await fs.writeFile(this.filePath, pcmToWav(Buffer.alloc(0), this.sampleRate));
  }

  async write(pcm: Buffer, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.chunks.push(pcm);
  }

  stop(): void {
    // Nothing is buffered between write() and the file.
  }

  async close(): Promise<void> {
    const pcm = Buffer.concat(this.chunks);
    await fs.writeFile(this.filePath, pcmToWav(pcm, this.sampleRate));
    logger.info({ event: "AUDIO_FILE_WRITTEN", path: this.filePath, durationMs: pcmDurationMs(pcm.length, this.sampleRate) }, "Agent audio written");
  }
}
