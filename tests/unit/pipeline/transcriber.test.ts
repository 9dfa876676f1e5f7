/**
 * Unit tests for Transcriber outcomes (transcript / empty with reason).
 */

import { Transcriber } from "../../../src/pipeline/transcriber";
import { BoundedQueue } from "../../../src/pipeline/queue";
import type { SpeechSegment, Transcript } from "../../../src/pipeline/types";
import { RecognitionError } from "../../../src/errors";
import { getCounter, resetMetrics } from "../../../src/metrics";
import { FakeASR, httpError, makeSegment } from "../../helpers/fakes";

beforeEach(() => resetMetrics());

describe("Transcriber.transcribe", () => {
  it("sends the segment as WAV and returns a trimmed transcript", async () => {
    const asr = new FakeASR();
    asr.results = ["  What is the capital of France?  "];
    const transcriber = new Transcriber(asr, { timeoutMs: 1000 });
    const segment = makeSegment(12, 3);

    const outcome = await transcriber.transcribe(segment);

    expect(outcome.kind).toBe("transcript");
    if (outcome.kind !== "transcript") return;
    expect(outcome.transcript.text).toBe("What is the capital of France?");
    expect(outcome.transcript.valid).toBe(true);
    expect(outcome.transcript.segmentSeq).toBe(12);
    expect(outcome.transcript.speechEndedAt).toBe(segment.endedAt);
    const sent = asr.calls[0];
    expect(sent.format).toBe("wav");
    expect(sent.audio.toString("ascii", 0, 4)).toBe("RIFF");
    expect(sent.audio.length).toBe(44 + 3 * 1600 * 2);
  });

  it("reports blank or punctuation-only text as no_speech", async () => {
    const asr = new FakeASR();
    asr.results = ["", " ... "];
    const transcriber = new Transcriber(asr, { timeoutMs: 1000 });
    expect(await transcriber.transcribe(makeSegment(0, 2))).toEqual({ kind: "empty", reason: "no_speech" });
    expect(await transcriber.transcribe(makeSegment(2, 2))).toEqual({ kind: "empty", reason: "no_speech" });
    expect(getCounter("asr.empty")).toBe(2);
  });

  it("maps a rate-limited request to an empty outcome", async () => {
    const asr = new FakeASR();
    asr.results = [httpError(429, "Too Many Requests")];
    const transcriber = new Transcriber(asr, { timeoutMs: 1000 });
    const outcome = await transcriber.transcribe(makeSegment(0, 2));
    expect(outcome.kind).toBe("empty");
    if (outcome.kind !== "empty") return;
    expect(outcome.reason).toBe("rate_limit");
    expect(outcome.error).toBeInstanceOf(RecognitionError);
    expect(getCounter("asr.errors")).toBe(1);
  });

  it("gives up at the deadline even if the recognizer ignores the signal", async () => {
    const asr = new FakeASR();
    asr.results = ["hang"];
    const transcriber = new Transcriber(asr, { timeoutMs: 20 });
    const outcome = await transcriber.transcribe(makeSegment(0, 2));
    expect(outcome).toMatchObject({ kind: "empty", reason: "timeout" });
    expect(asr.calls[0].options?.signal?.aborted).toBe(true);
  });

  it("reports cancellation without counting an error", async () => {
    const asr = new FakeASR();
    asr.results = ["hang"];
    const transcriber = new Transcriber(asr, { timeoutMs: 1000 });
    const controller = new AbortController();
    const pending = transcriber.transcribe(makeSegment(0, 2), controller.signal);
    controller.abort();
    expect(await pending).toMatchObject({ kind: "empty", reason: "cancelled" });
    expect(getCounter("asr.errors")).toBe(0);
  });
});

describe("Transcriber.run", () => {
  it("forwards only valid transcripts, in segment order", async () => {
    const asr = new FakeASR();
    asr.results = ["one", "", "three"];
    const transcriber = new Transcriber(asr, { timeoutMs: 1000 });
    const segments = new BoundedQueue<SpeechSegment>({ name: "segments", capacity: 4 });
    const transcripts = new BoundedQueue<Transcript>({ name: "transcripts", capacity: 4 });
    segments.push(makeSegment(0, 2));
    segments.push(makeSegment(2, 2));
    segments.push(makeSegment(4, 2));
    segments.close();

    await transcriber.run(segments, transcripts);

    expect(transcripts.drain().map((t) => [t.text, t.segmentSeq])).toEqual([
      ["one", 0],
      ["three", 4],
    ]);
  });
});
