/**
 * Env-based configuration for the voice loop.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "../errors";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export const ASR_PROVIDERS = ["openai", "groq", "stub"] as const;
export const LLM_PROVIDERS = ["openai", "groq", "anthropic", "stub"] as const;
export const TTS_PROVIDERS = ["google", "azure", "stub"] as const;
export const PLAYBACK_GROUPINGS = ["sentence", "chunk"] as const;

export type AsrProvider = (typeof ASR_PROVIDERS)[number];
export type LlmProvider = (typeof LLM_PROVIDERS)[number];
export type TtsProvider = (typeof TTS_PROVIDERS)[number];
export type PlaybackGrouping = (typeof PLAYBACK_GROUPINGS)[number];

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful voice assistant. Keep responses concise and natural.";
export const DEFAULT_GREETING = "Hello! I'm your voice assistant. How can I help you today?";
export const DEFAULT_FAREWELL = "Goodbye!";
export const DEFAULT_APOLOGY = "I apologize, but I encountered an error processing your request.";

export interface AppConfig {
  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    /** OPENAI_API_KEY or GROQ_API_KEY, depending on provider. */
    apiKey?: string;
    model?: string;
  };

  /** LLM provider and generation options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel: string;
    groqApiKey?: string;
    groqModel: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    temperature: number;
    maxTokens: number;
    systemPrompt: string;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    googleVoiceName?: string;
    azureKey?: string;
    azureRegion?: string;
    azureVoiceName?: string;
  };

  /** Capture and output devices */
  audio: {
    sampleRate: number;
    /** Samples per AudioBlock. */
    blockSamples: number;
    captureQueueBlocks: number;
    captureTool?: string;
    captureDevice?: string;
    playbackTool?: string;
    playbackSampleRate: number;
    /** When set, agent audio is written to this WAV file instead of a playback tool. */
    outputFile?: string;
  };

  /** Voice activity gate tuning (RMS on the int16 scale, durations in ms) */
  vad: {
    initialThreshold: number;
    minThreshold: number;
    maxThreshold: number;
    marginFactor: number;
    hysteresis: number;
    noiseWindowBlocks: number;
    adaptEveryBlocks: number;
    silencePaddingMs: number;
    preRollMs: number;
    minSegmentMs: number;
    maxSegmentMs: number;
    bargeInFactor: number;
  };

  /** Conversation history and fixed utterances */
  dialogue: {
    maxHistoryChars: number;
    maxTurnsInMemory: number;
    /** Empty = no greeting. */
    greetingText: string;
    /** Empty = no farewell. */
    farewellText: string;
    apologyText: string;
    retryAttempts: number;
    retryBackoffMs: number;
  };

  playback: {
    queueItems: number;
    grouping: PlaybackGrouping;
    maxCharsPerItem: number;
    speakingRate: number;
    volume: number;
  };

  timeouts: {
    asrMs: number;
    llmMs: number;
    ttsMs: number;
  };

  metrics: {
    /** 0 disables periodic counter logs. */
    logIntervalMs: number;
  };
}

export type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return defaultValue;
  return v.trim();
}

/** Unset keeps the default; an explicit empty string disables the utterance. */
function getText(env: Env, key: string, defaultValue: string): string {
  const v = env[key];
  return v === undefined ? defaultValue : v.trim();
}

function getNumber(env: Env, key: string, defaultValue: number): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number, got "${v}"`);
  return n;
}

function getChoice<T extends string>(env: Env, keys: string[], choices: readonly T[], defaultValue: T): T {
  for (const key of keys) {
    const v = getEnv(env, key);
    if (v === undefined) continue;
    const match = choices.find((c) => c === v.toLowerCase());
    if (match === undefined) throw new ConfigError(`${key} must be one of ${choices.join(", ")}, got "${v}"`);
    return match;
  }
  return defaultValue;
}

/**
 * Build config from environment variables.
 * ASR_PROVIDER, LLM_PROVIDER (or MODEL_PROVIDER), TTS_PROVIDER select adapters.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const asrProvider = getChoice(env, ["ASR_PROVIDER"], ASR_PROVIDERS, "groq");
  const llmProvider = getChoice(env, ["MODEL_PROVIDER", "LLM_PROVIDER"], LLM_PROVIDERS, "groq");
  const ttsProvider = getChoice(env, ["TTS_PROVIDER"], TTS_PROVIDERS, "google");

  return {
    asr: {
      provider: asrProvider,
      apiKey: asrProvider === "groq" ? getEnv(env, "GROQ_API_KEY") : getEnv(env, "OPENAI_API_KEY"),
      model: getEnv(env, "ASR_MODEL_NAME"),
    },
    llm: {
      provider: llmProvider,
      openaiApiKey: getEnv(env, "OPENAI_API_KEY"),
      openaiModel: getEnv(env, "OPENAI_MODEL_NAME", "gpt-4o-mini") ?? "gpt-4o-mini",
      groqApiKey: getEnv(env, "GROQ_API_KEY"),
      groqModel: getEnv(env, "GROQ_MODEL_NAME", "llama-3.3-70b-versatile") ?? "llama-3.3-70b-versatile",
      anthropicApiKey: getEnv(env, "ANTHROPIC_API_KEY"),
      anthropicModel: getEnv(env, "ANTHROPIC_MODEL_NAME", "claude-3-5-sonnet-20241022") ?? "claude-3-5-sonnet-20241022",
      temperature: getNumber(env, "LLM_TEMPERATURE", 0.7),
      maxTokens: getNumber(env, "LLM_MAX_TOKENS", 150),
      systemPrompt: getEnv(env, "SYSTEM_PROMPT", DEFAULT_SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
    },
    tts: {
      provider: ttsProvider,
      googleApiKey: getEnv(env, "GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv(env, "GOOGLE_TTS_VOICE_NAME", "en-US-Neural2-D"),
      azureKey: getEnv(env, "AZURE_TTS_KEY"),
      azureRegion: getEnv(env, "AZURE_TTS_REGION"),
      azureVoiceName: getEnv(env, "AZURE_TTS_VOICE_NAME"),
    },
    audio: {
      sampleRate: getNumber(env, "AUDIO_SAMPLE_RATE", 16000),
      blockSamples: getNumber(env, "AUDIO_BLOCK_SAMPLES", 1600),
      captureQueueBlocks: getNumber(env, "CAPTURE_QUEUE_BLOCKS", 50),
      captureTool: getEnv(env, "AUDIO_CAPTURE_TOOL"),
      captureDevice: getEnv(env, "AUDIO_CAPTURE_DEVICE"),
      playbackTool: getEnv(env, "AUDIO_PLAYBACK_TOOL"),
      playbackSampleRate: getNumber(env, "PLAYBACK_SAMPLE_RATE", 24000),
      outputFile: getEnv(env, "AUDIO_OUTPUT_FILE"),
    },
    vad: {
      initialThreshold: getNumber(env, "VAD_INITIAL_THRESHOLD", 300),
      minThreshold: getNumber(env, "VAD_MIN_THRESHOLD", 50),
      maxThreshold: getNumber(env, "VAD_MAX_THRESHOLD", 4000),
      marginFactor: getNumber(env, "VAD_MARGIN", 1.5),
      hysteresis: getNumber(env, "VAD_HYSTERESIS", 0.8),
      noiseWindowBlocks: getNumber(env, "VAD_NOISE_WINDOW_BLOCKS", 30),
      adaptEveryBlocks: getNumber(env, "VAD_ADAPT_EVERY_BLOCKS", 5),
      silencePaddingMs: getNumber(env, "VAD_SILENCE_MS", 800),
      preRollMs: getNumber(env, "VAD_PRE_ROLL_MS", 300),
      minSegmentMs: getNumber(env, "VAD_MIN_SEGMENT_MS", 300),
      maxSegmentMs: getNumber(env, "VAD_MAX_SEGMENT_MS", 30000),
      bargeInFactor: getNumber(env, "VAD_BARGE_IN_FACTOR", 1),
    },
    dialogue: {
      maxHistoryChars: getNumber(env, "MAX_HISTORY_CHARS", 8000),
      maxTurnsInMemory: getNumber(env, "MAX_TURNS_IN_MEMORY", 50),
      greetingText: getText(env, "GREETING_TEXT", DEFAULT_GREETING),
      farewellText: getText(env, "FAREWELL_TEXT", DEFAULT_FAREWELL),
      apologyText: getEnv(env, "APOLOGY_TEXT", DEFAULT_APOLOGY) ?? DEFAULT_APOLOGY,
      retryAttempts: getNumber(env, "LLM_RETRY_ATTEMPTS", 1),
      retryBackoffMs: getNumber(env, "LLM_RETRY_BACKOFF_MS", 500),
    },
    playback: {
      queueItems: getNumber(env, "PLAYBACK_QUEUE_ITEMS", 64),
      grouping: getChoice(env, ["PLAYBACK_GROUPING"], PLAYBACK_GROUPINGS, "sentence"),
      maxCharsPerItem: getNumber(env, "PLAYBACK_MAX_CHARS", 250),
      speakingRate: getNumber(env, "TTS_SPEAKING_RATE", 1.1),
      volume: getNumber(env, "TTS_VOLUME", 0.9),
    },
    timeouts: {
      asrMs: getNumber(env, "ASR_TIMEOUT_MS", 20000),
      llmMs: getNumber(env, "LLM_TIMEOUT_MS", 25000),
      ttsMs: getNumber(env, "TTS_TIMEOUT_MS", 15000),
    },
    metrics: {
      logIntervalMs: getNumber(env, "METRICS_LOG_INTERVAL_MS", 60000),
    },
  };
}

/**
 * Reject values the pipeline cannot run with. Collects every problem into one ConfigError.
 */
export function validateConfig(config: AppConfig): AppConfig {
  const problems: string[] = [];
  const need = (ok: boolean, message: string): void => {
    if (!ok) problems.push(message);
  };

  if (config.asr.provider === "openai") need(!!config.asr.apiKey, "ASR_PROVIDER=openai requires OPENAI_API_KEY");
  if (config.asr.provider === "groq") need(!!config.asr.apiKey, "ASR_PROVIDER=groq requires GROQ_API_KEY");
  if (config.llm.provider === "openai") need(!!config.llm.openaiApiKey, "LLM_PROVIDER=openai requires OPENAI_API_KEY");
  if (config.llm.provider === "groq") need(!!config.llm.groqApiKey, "LLM_PROVIDER=groq requires GROQ_API_KEY");
  if (config.llm.provider === "anthropic") need(!!config.llm.anthropicApiKey, "LLM_PROVIDER=anthropic requires ANTHROPIC_API_KEY");
  if (config.tts.provider === "azure") {
    need(!!config.tts.azureKey && !!config.tts.azureRegion, "TTS_PROVIDER=azure requires AZURE_TTS_KEY and AZURE_TTS_REGION");
  }

  const { audio, vad, llm, dialogue, playback, timeouts } = config;
  need(Number.isInteger(audio.sampleRate) && audio.sampleRate >= 8000, "AUDIO_SAMPLE_RATE must be an integer >= 8000");
  need(Number.isInteger(audio.blockSamples) && audio.blockSamples > 0, "AUDIO_BLOCK_SAMPLES must be a positive integer");
  need(Number.isInteger(audio.captureQueueBlocks) && audio.captureQueueBlocks > 0, "CAPTURE_QUEUE_BLOCKS must be a positive integer");
  need([8000, 16000, 24000, 48000].includes(audio.playbackSampleRate), "PLAYBACK_SAMPLE_RATE must be 8000, 16000, 24000 or 48000");

  need(vad.minThreshold > 0, "VAD_MIN_THRESHOLD must be > 0");
  need(vad.maxThreshold >= vad.minThreshold, "VAD_MAX_THRESHOLD must be >= VAD_MIN_THRESHOLD");
  need(vad.marginFactor > 0, "VAD_MARGIN must be > 0");
  need(vad.hysteresis > 0 && vad.hysteresis <= 1, "VAD_HYSTERESIS must be in (0, 1]");
  need(Number.isInteger(vad.noiseWindowBlocks) && vad.noiseWindowBlocks >= 1, "VAD_NOISE_WINDOW_BLOCKS must be an integer >= 1");
  need(Number.isInteger(vad.adaptEveryBlocks) && vad.adaptEveryBlocks >= 1, "VAD_ADAPT_EVERY_BLOCKS must be an integer >= 1");
  need(vad.silencePaddingMs > 0, "VAD_SILENCE_MS must be > 0");
  need(vad.preRollMs >= 0, "VAD_PRE_ROLL_MS must be >= 0");
  need(vad.minSegmentMs >= 0, "VAD_MIN_SEGMENT_MS must be >= 0");
  need(vad.maxSegmentMs > vad.minSegmentMs, "VAD_MAX_SEGMENT_MS must be > VAD_MIN_SEGMENT_MS");
  need(vad.bargeInFactor >= 1, "VAD_BARGE_IN_FACTOR must be >= 1");

  need(llm.temperature >= 0 && llm.temperature <= 2, "LLM_TEMPERATURE must be in [0, 2]");
  need(Number.isInteger(llm.maxTokens) && llm.maxTokens > 0, "LLM_MAX_TOKENS must be a positive integer");
  need(dialogue.maxHistoryChars > 0, "MAX_HISTORY_CHARS must be > 0");
  need(Number.isInteger(dialogue.maxTurnsInMemory) && dialogue.maxTurnsInMemory >= 2, "MAX_TURNS_IN_MEMORY must be an integer >= 2");
  need(Number.isInteger(dialogue.retryAttempts) && dialogue.retryAttempts >= 0, "LLM_RETRY_ATTEMPTS must be an integer >= 0");
  need(dialogue.retryBackoffMs >= 0, "LLM_RETRY_BACKOFF_MS must be >= 0");
  need(Number.isInteger(playback.queueItems) && playback.queueItems > 0, "PLAYBACK_QUEUE_ITEMS must be a positive integer");
  need(playback.maxCharsPerItem > 0, "PLAYBACK_MAX_CHARS must be > 0");
  need(playback.speakingRate > 0, "TTS_SPEAKING_RATE must be > 0");
  need(playback.volume >= 0 && playback.volume <= 2, "TTS_VOLUME must be in [0, 2]");
  need(timeouts.asrMs > 0 && timeouts.llmMs > 0 && timeouts.ttsMs > 0, "ASR_TIMEOUT_MS, LLM_TIMEOUT_MS and TTS_TIMEOUT_MS must be > 0");

  if (problems.length > 0) throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  return config;
}
