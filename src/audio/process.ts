/**
 * Audio device processes. Capture and playback run in their own OS processes
 * (sox, parecord, arecord, ffmpeg, aplay, ffplay) and exchange raw PCM over pipes.
 */

import { spawn } from "child_process";
import type { Readable, Writable } from "stream";

export interface CommandSpec {
  /** Short tool name for logs ("sox", "arecord", ...). */
  tool: string;
  command: string;
  args: string[];
  /** Extra environment for the tool (e.g. AUDIODEV for sox). */
  env?: Record<string, string>;
}

export type ProcessRole = "capture" | "playback";

/** The slice of a child process the pipeline uses; tests substitute an in-process fake. */
export interface AudioProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  onExit(listener: (code: number | null, signal: string | null) => void): void;
  /** Spawn failure (ENOENT) or kill failure. */
  onError(listener: (err: Error) => void): void;
  kill(): void;
}

export type ProcessSpawner = (spec: CommandSpec, role: ProcessRole) => AudioProcess;

export const spawnProcess: ProcessSpawner = (spec, role) => {
  const child = spawn(spec.command, spec.args, {
    stdio: role === "capture" ? ["ignore", "pipe", "pipe"] : ["pipe", "ignore", "pipe"],
    env: spec.env ? { ...process.env, ...spec.env } : process.env,
  });
  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    onExit: (listener) => {
      child.once("exit", listener);
    },
    onError: (listener) => {
      child.once("error", listener);
    },
    kill: () => {
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGTERM");
    },
  };
};

export function describeCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}
