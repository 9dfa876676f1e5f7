/**
 * Integration test: full voice loop with a fake microphone process, scripted adapters and a fake speaker.
 * Speech → segment → transcript → streamed reply → playback, then barge-in and shutdown.
 */

import { loadConfig, validateConfig } from "../../src/config";
import { createVoicePipeline } from "../../src/pipeline/voice-pipeline";
import type { VoicePipeline } from "../../src/pipeline/voice-pipeline";
import { DeviceError } from "../../src/errors";
import { getCounter, resetMetrics } from "../../src/metrics";
import { FakeASR, FakeLLM, FakeSink, FakeSpawner, FakeTTS, blockPcm, waitFor } from "../helpers/fakes";
import type { FakeProcess } from "../helpers/fakes";

const config = validateConfig(
  loadConfig({
    ASR_PROVIDER: "stub",
    LLM_PROVIDER: "stub",
    TTS_PROVIDER: "stub",
    SYSTEM_PROMPT: "Test prompt.",
    GREETING_TEXT: "Hi there.",
    FAREWELL_TEXT: "Bye.",
    PLAYBACK_GROUPING: "chunk",
    AUDIO_CAPTURE_TOOL: "arecord",
    VAD_SILENCE_MS: "300",
    VAD_PRE_ROLL_MS: "0",
    VAD_MIN_SEGMENT_MS: "200",
  })
);

/** Five loud blocks then three silent ones: one 500 ms utterance. */
function speak(proc: FakeProcess): void {
  for (let i = 0; i < 5; i++) proc.emitAudio(blockPcm(3000));
  for (let i = 0; i < 3; i++) proc.emitAudio(blockPcm(0));
}

let asr: FakeASR;
let llm: FakeLLM;
let sink: FakeSink;
let spawner: FakeSpawner;
let pipeline: VoicePipeline;
let fatal: DeviceError[];

beforeEach(() => {
  resetMetrics();
  asr = new FakeASR();
  llm = new FakeLLM();
  sink = new FakeSink(24000);
  fatal = [];
  spawner = new FakeSpawner((proc) => proc.emitAudio(blockPcm(0)));
  pipeline = createVoicePipeline(config, { asr, llm, tts: new FakeTTS() }, sink, {
    spawner: spawner.spawn,
    onFatal: (err) => fatal.push(err),
    capture: { startTimeoutMs: 500, maxRestarts: 0 },
  });
});

afterEach(async () => {
  await pipeline.stop();
});

describe("voice pipeline", () => {
  it("answers a question, yields to barge-in and says goodbye", async () => {
    asr.results = ["What is the capital of France?", "Stop"];
    llm.replies = [{ chunks: ["Paris is the capital.", " It is on the Seine."] }, { chunks: ["Okay."] }];
    sink.writeDelayMs = 250;
    await pipeline.start();
    const mic = spawner.processes[0];
    expect(mic.spec.tool).toBe("arecord");

    speak(mic);
    await waitFor(() => sink.writes.length === 1);
    expect(sink.texts).toEqual(["Paris is the capital."]);

    // User talks over the first reply.
    speak(mic);
    await waitFor(() => getCounter("barge_in") === 1);
    await waitFor(() => sink.texts.includes("Okay."));
    await pipeline.stop({ farewell: true });

    expect(sink.texts).toEqual(["Paris is the capital.", "Okay.", "Bye."]);
    expect(pipeline.history.toMessages().map((m) => m.content)).toEqual([
      "Test prompt.",
      "What is the capital of France?",
      "Paris is the capital.",
      "Stop",
      "Okay.",
    ]);
    expect(pipeline.history.getSnapshot().turns[2].interrupted).toBe(true);
    expect(asr.calls).toHaveLength(2);
    expect(mic.killed).toBe(true);
    expect(sink.closed).toBe(true);
  });

  it("greets on request and keeps the greeting in history", async () => {
    await pipeline.start();
    pipeline.greet();
    await waitFor(() => sink.writes.length === 1);
    await pipeline.player.whenIdle();

    expect(sink.texts).toEqual(["Hi there."]);
    expect(pipeline.history.toMessages()).toEqual([
      { role: "system", content: "Test prompt." },
      { role: "assistant", content: "Hi there." },
    ]);
  });

  it("ignores silence and noise too short to be speech", async () => {
    await pipeline.start();
    const mic = spawner.processes[0];
    mic.emitAudio(blockPcm(3000));
    for (let i = 0; i < 10; i++) mic.emitAudio(blockPcm(0));
    await waitFor(() => getCounter("vad.segments_discarded") === 1);
    expect(asr.calls).toHaveLength(0);
  });

  it("reports a lost microphone once restarts are exhausted", async () => {
    await pipeline.start();
    spawner.processes[0].exit(1);
    await waitFor(() => fatal.length === 1);
    expect(fatal[0]).toBeInstanceOf(DeviceError);
  });
});
