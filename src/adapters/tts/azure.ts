/**
 * Azure Cognitive Services Text-to-Speech adapter.
 * Uses REST API with subscription key; requests raw PCM at the sink's rate.
 */

import type { ITTS, VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
}

const RAW_FORMATS: Record<number, string> = {
  8000: "raw-8khz-16bit-mono-pcm",
  16000: "raw-16khz-16bit-mono-pcm",
  24000: "raw-24khz-16bit-mono-pcm",
  48000: "raw-48khz-16bit-mono-pcm",
};

export function azureOutputFormat(sampleRateHz: number): string {
  const format = RAW_FORMATS[sampleRateHz];
  if (!format) throw new Error(`Azure TTS: unsupported sample rate ${sampleRateHz}`);
  return format;
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const voiceName = options?.voiceName ?? this.config.voiceName ?? "en-US-JennyNeural";
    const rate = options?.speakingRate ?? 1;
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": azureOutputFormat(options?.sampleRateHz ?? 24000),
      },
      body: buildSsml(text, voiceName, rate),
      signal: options?.signal,
    });
    if (!response.ok) {
      throw Object.assign(new Error(`Azure TTS failed: ${response.status} ${response.statusText}`), { status: response.status });
    }
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}

export function buildSsml(text: string, voiceName: string, rate: number): string {
  const pct = Math.round((rate - 1) * 100);
  const prosody = `${pct >= 0 ? "+" : ""}${pct}%`;
  return (
    `<speak version='1.0' xml:lang='en-US'><voice name='${voiceName}'>` +
    `<prosody rate='${prosody}'>${escapeXml(text)}</prosody></voice></speak>`
  );
}

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
