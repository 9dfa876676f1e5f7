/**
 * Unit tests for PCM helpers.
 */

import { applyGain, computeRms, pcmDurationMs, pcmToSamples, pcmToWav, samplesToPcm } from "../../../src/pipeline/audio-utils";

describe("computeRms", () => {
  it("equals the amplitude of a constant block", () => {
    expect(computeRms(new Int16Array(160).fill(-300))).toBe(300);
  });

  it("is 0 for an empty block", () => {
    expect(computeRms(new Int16Array(0))).toBe(0);
  });

  it("averages power, not amplitude", () => {
    expect(computeRms(Int16Array.from([3, 4, 3, 4, 3, 4, 3, 4]))).toBeCloseTo(Math.sqrt(12.5), 10);
  });
});

describe("PCM conversion", () => {
  it("round-trips little-endian samples and ignores an odd trailing byte", () => {
    const pcm = samplesToPcm([Int16Array.from([1, -2]), Int16Array.from([32767])]);
    expect(pcm.length).toBe(6);
    expect(pcm.readInt16LE(2)).toBe(-2);
    expect(Array.from(pcmToSamples(Buffer.concat([pcm, Buffer.from([9])])))).toEqual([1, -2, 32767]);
  });

  it("computes duration from byte length", () => {
    expect(pcmDurationMs(32000, 16000)).toBe(1000);
  });
});

describe("applyGain", () => {
  it("returns the same buffer for gain 1", () => {
    const pcm = samplesToPcm([Int16Array.from([100])]);
    expect(applyGain(pcm, 1)).toBe(pcm);
  });

  it("scales and clips to the int16 range", () => {
    const out = applyGain(samplesToPcm([Int16Array.from([1000, 20000, -20000])]), 2);
    expect(Array.from(pcmToSamples(out))).toEqual([2000, 32767, -32768]);
  });
});

describe("pcmToWav", () => {
  it("produces a 44-byte header followed by the data", () => {
    const pcm = Buffer.alloc(320 * 2);
    const wav = pcmToWav(pcm, 16000);
    expect(wav.length).toBe(44 + pcm.length);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(40)).toBe(pcm.length);
  });
});
