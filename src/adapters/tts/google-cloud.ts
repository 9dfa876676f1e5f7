/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * LINEAR16 responses carry a WAV header, which is stripped so callers get raw PCM.
 */

import { TextToSpeechClient, protos } from "@google-cloud/text-to-speech";
import type { ITTS, VoiceOptions } from "./types";

type SynthesizeRequest = protos.google.cloud.texttospeech.v1.ISynthesizeSpeechRequest;

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";

function buildRequest(text: string, defaults: { voiceName?: string; languageCode?: string }, options?: VoiceOptions): SynthesizeRequest {
  return {
    input: { text },
    voice: {
      name: options?.voiceName ?? defaults.voiceName ?? "en-US-Neural2-D",
      languageCode: options?.languageCode ?? defaults.languageCode ?? "en-US",
    },
    audioConfig: {
      audioEncoding: "LINEAR16",
      sampleRateHertz: options?.sampleRateHz ?? 24000,
      speakingRate: options?.speakingRate,
    },
  };
}

/** Drop a RIFF/WAV header if present; returns the data chunk. */
export function stripWavHeader(audio: Buffer): Buffer {
  if (audio.length < 12 || audio.toString("ascii", 0, 4) !== "RIFF" || audio.toString("ascii", 8, 12) !== "WAVE") {
    return audio;
  }
  let offset = 12;
  while (offset + 8 <= audio.length) {
    const id = audio.toString("ascii", offset, offset + 4);
    const size = audio.readUInt32LE(offset + 4);
    if (id === "data") return audio.subarray(offset + 8, Math.min(audio.length, offset + 8 + size));
    offset += 8 + size + (size % 2);
  }
  return Buffer.alloc(0);
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildRequest(text, this.config, options)),
      signal: options?.signal,
    });
    if (!response.ok) {
      const errText = await response.text();
      throw Object.assign(new Error(`Google TTS failed: ${response.status} ${errText}`), { status: response.status });
    }
    const b64 = audioContentOf(await response.json());
    if (!b64) return Buffer.alloc(0);
    return stripWavHeader(Buffer.from(b64, "base64"));
  }
}

function audioContentOf(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("audioContent" in data)) return undefined;
  return typeof data.audioContent === "string" ? data.audioContent : undefined;
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const [response] = await this.client.synthesizeSpeech(buildRequest(text, this.config, options));
    // The gRPC call is not abortable; drop the result if the caller gave up.
    if (options?.signal?.aborted) return Buffer.alloc(0);
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) return Buffer.alloc(0);
    return stripWavHeader(Buffer.from(content));
  }
}
