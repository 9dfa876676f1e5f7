/**
 * Unit tests for config loading and validation.
 */

import { DEFAULT_GREETING, loadConfig, validateConfig } from "../../../src/config";
import type { Env } from "../../../src/config";
import { ConfigError } from "../../../src/errors";

const stubEnv: Env = { ASR_PROVIDER: "stub", LLM_PROVIDER: "stub", TTS_PROVIDER: "stub" };

describe("loadConfig", () => {
  it("uses defaults for unset values", () => {
    const config = loadConfig({});
    expect(config.asr.provider).toBe("groq");
    expect(config.llm.provider).toBe("groq");
    expect(config.llm.groqModel).toBe("llama-3.3-70b-versatile");
    expect(config.tts.provider).toBe("google");
    expect(config.audio).toMatchObject({ sampleRate: 16000, blockSamples: 1600, playbackSampleRate: 24000 });
    expect(config.vad).toMatchObject({ initialThreshold: 300, silencePaddingMs: 800, bargeInFactor: 1 });
    expect(config.playback).toMatchObject({ grouping: "sentence", maxCharsPerItem: 250, speakingRate: 1.1, volume: 0.9 });
    expect(config.dialogue.greetingText).toBe(DEFAULT_GREETING);
  });

  it("prefers MODEL_PROVIDER over LLM_PROVIDER and ignores case", () => {
    expect(loadConfig({ MODEL_PROVIDER: "Anthropic", LLM_PROVIDER: "groq" }).llm.provider).toBe("anthropic");
    expect(loadConfig({ LLM_PROVIDER: "groq" }).llm.provider).toBe("groq");
  });

  it("takes the ASR key from the selected provider", () => {
    const env: Env = { OPENAI_API_KEY: "test-openai-key", GROQ_API_KEY: "test-groq-key" };
    expect(loadConfig(env).asr.apiKey).toBe("test-groq-key");
    expect(loadConfig({ ...env, ASR_PROVIDER: "openai" }).asr.apiKey).toBe("test-openai-key");
  });

  it("treats an empty greeting as disabled and a blank number as unset", () => {
    const config = loadConfig({ GREETING_TEXT: "", LLM_TEMPERATURE: "  " });
    expect(config.dialogue.greetingText).toBe("");
    expect(config.llm.temperature).toBe(0.7);
  });

  it("rejects non-numeric numbers and unknown providers", () => {
    expect(() => loadConfig({ VAD_SILENCE_MS: "soon" })).toThrow(ConfigError);
    expect(() => loadConfig({ TTS_PROVIDER: "polly" })).toThrow('TTS_PROVIDER must be one of google, azure, stub, got "polly"');
  });
});

describe("validateConfig", () => {
  it("accepts the stub providers without keys", () => {
    const config = loadConfig(stubEnv);
    expect(validateConfig(config)).toBe(config);
  });

  it("requires the key of each selected provider", () => {
    expect(() => validateConfig(loadConfig({ ...stubEnv, LLM_PROVIDER: "anthropic" }))).toThrow(
      "Invalid configuration: LLM_PROVIDER=anthropic requires ANTHROPIC_API_KEY"
    );
    expect(() => validateConfig(loadConfig({ ...stubEnv, LLM_PROVIDER: "anthropic", ANTHROPIC_API_KEY: "test-key" }))).not.toThrow();
  });

  it("reports every problem in one error", () => {
    const config = loadConfig({ ...stubEnv, VAD_BARGE_IN_FACTOR: "0.5", PLAYBACK_SAMPLE_RATE: "22050" });
    expect(() => validateConfig(config)).toThrow(
      "Invalid configuration: PLAYBACK_SAMPLE_RATE must be 8000, 16000, 24000 or 48000; VAD_BARGE_IN_FACTOR must be >= 1"
    );
  });
});
