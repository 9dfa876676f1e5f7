/**
 * Capture command candidates: raw signed 16-bit little-endian mono PCM on stdout.
 * Tried in order; the configured tool (AUDIO_CAPTURE_TOOL) first.
 */

import type { CommandSpec } from "./process";

export interface CaptureCommandOptions {
  sampleRate: number;
  channels?: number;
  /** Preferred tool: sox, rec, parecord, arecord, ffmpeg. */
  tool?: string;
  /** Device name passed to the tool (AUDIODEV for sox). */
  device?: string;
  platform?: NodeJS.Platform;
}

function soxCapture(command: string, rate: string, channels: string, device?: string): CommandSpec {
  return {
    tool: command,
    command,
    args: command === "rec"
      ? ["-q", "-t", "raw", "-r", rate, "-e", "signed-integer", "-b", "16", "-c", channels, "-"]
      : ["-q", "-d", "-t", "raw", "-r", rate, "-e", "signed-integer", "-b", "16", "-c", channels, "-"],
    env: device ? { AUDIODEV: device } : undefined,
  };
}

function ffmpegCapture(platform: NodeJS.Platform, rate: string, channels: string, device?: string): CommandSpec {
  let input: string[];
  if (platform === "darwin") input = ["-f", "avfoundation", "-i", device ?? ":0"];
  else if (platform === "win32") input = ["-f", "dshow", "-i", device ?? "audio=default"];
  else input = ["-f", process.env.PULSE_SERVER ? "pulse" : "alsa", "-i", device ?? "default"];
  return {
    tool: "ffmpeg",
    command: "ffmpeg",
    args: ["-hide_banner", "-loglevel", "error", ...input, "-ac", channels, "-ar", rate, "-f", "s16le", "-"],
  };
}

export function buildCaptureCommands(options: CaptureCommandOptions): CommandSpec[] {
  const platform = options.platform ?? process.platform;
  const rate = String(options.sampleRate);
  const channels = String(options.channels ?? 1);
  const device = options.device;

  const all: Record<string, CommandSpec> = {
    sox: soxCapture("sox", rate, channels, device),
    rec: soxCapture("rec", rate, channels, device),
    parecord: {
      tool: "parecord",
      command: "parecord",
      args: ["--raw", "--format=s16le", `--rate=${rate}`, `--channels=${channels}`, ...(device ? [`--device=${device}`] : [])],
    },
    arecord: {
      tool: "arecord",
      command: "arecord",
      args: ["-q", "-D", device ?? "default", "-f", "S16_LE", "-r", rate, "-c", channels, "-t", "raw"],
    },
    ffmpeg: ffmpegCapture(platform, rate, channels, device),
  };

  const order = platform === "linux" ? ["sox", "parecord", "arecord", "ffmpeg"] : ["sox", "rec", "ffmpeg"];
  const preferred = options.tool?.toLowerCase();
  if (preferred && all[preferred]) {
    return [all[preferred], ...order.filter((t) => t !== preferred).map((t) => all[t])];
  }
  return order.map((t) => all[t]);
}
