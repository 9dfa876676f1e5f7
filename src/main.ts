#!/usr/bin/env node
/**
 * Entry point: load config, build adapters and the voice pipeline, run until SIGINT/SIGTERM.
 * AUDIO_OUTPUT_FILE writes the agent's audio to a WAV file instead of the speaker.
 */

import { loadConfig, validateConfig } from "./config";
import { createASR } from "./adapters/asr";
import { createLLM } from "./adapters/llm";
import { createTTS } from "./adapters/tts";
import { ProcessAudioSink, WavFileSink } from "./audio/playback";
import type { AudioSink } from "./audio/playback";
import { createVoicePipeline } from "./pipeline/voice-pipeline";
import { ConfigError, DeviceError, errorMessage } from "./errors";
import { logger, logError } from "./logging";
import { logCounters } from "./metrics";

async function main(): Promise<void> {
  const config = validateConfig(loadConfig());
  const sink: AudioSink = config.audio.outputFile
    ? new WavFileSink(config.audio.outputFile, config.audio.playbackSampleRate)
    : new ProcessAudioSink({ sampleRate: config.audio.playbackSampleRate, tool: config.audio.playbackTool });

  let shuttingDown = false;
  const pipeline = createVoicePipeline(
    config,
    { asr: createASR(config), llm: createLLM(config), tts: createTTS(config) },
    sink,
    {
      callbacks: {
        onUserTranscript: (text) => logger.info({ event: "USER_TRANSCRIPT", textLength: text.length }, "User said something"),
        onAgentReply: (text, status) => logger.info({ event: "AGENT_REPLY", textLength: text.length, status }, "Agent replied"),
      },
      onFatal: (err) => {
        logger.error({ event: "CAPTURE_LOST", err: err.message }, "Microphone lost; shutting down");
        void shutdown("capture_lost", 1);
      },
    }
  );

  let metricsInterval: NodeJS.Timeout | undefined;

  async function shutdown(reason: string, exitCode: number): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ event: "SHUTDOWN", reason }, "Shutting down");
    if (metricsInterval) clearInterval(metricsInterval);
    try {
      await pipeline.stop({ farewell: exitCode === 0 });
    } catch (err) {
      logger.error({ event: "SHUTDOWN_FAILED", err: errorMessage(err) }, "Shutdown did not complete cleanly");
      exitCode = 1;
    }
    logCounters("shutdown");
    process.exit(exitCode);
  }

  await pipeline.start();
  if (config.metrics.logIntervalMs > 0) {
    metricsInterval = setInterval(() => logCounters("interval"), config.metrics.logIntervalMs);
  }
  logger.info(
    { event: "READY", asr: config.asr.provider, llm: config.llm.provider, tts: config.tts.provider },
    "Listening; press Ctrl+C to exit"
  );
  pipeline.greet();

  process.on("SIGINT", () => void shutdown("SIGINT", 0));
  process.on("SIGTERM", () => void shutdown("SIGTERM", 0));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError || err instanceof DeviceError) {
    logger.error({ event: "STARTUP_FAILED", kind: err.name, err: err.message }, "Cannot start voice loop");
  } else {
    logError(logger, err instanceof Error ? err : new Error(String(err)));
  }
  process.exit(1);
});
