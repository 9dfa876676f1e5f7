/**
 * Unit tests for capture command candidates.
 */

import { buildCaptureCommands } from "../../../src/audio/capture";

describe("buildCaptureCommands", () => {
  it("tries sox, parecord, arecord, ffmpeg on linux", () => {
    const specs = buildCaptureCommands({ sampleRate: 16000, platform: "linux" });
    expect(specs.map((s) => s.tool)).toEqual(["sox", "parecord", "arecord", "ffmpeg"]);
    expect(specs[0].args).toEqual(["-q", "-d", "-t", "raw", "-r", "16000", "-e", "signed-integer", "-b", "16", "-c", "1", "-"]);
    expect(specs[0].env).toBeUndefined();
  });

  it("tries sox, rec, ffmpeg elsewhere, with avfoundation on macOS", () => {
    const specs = buildCaptureCommands({ sampleRate: 16000, platform: "darwin" });
    expect(specs.map((s) => s.tool)).toEqual(["sox", "rec", "ffmpeg"]);
    expect(specs[2].args.slice(3, 7)).toEqual(["-f", "avfoundation", "-i", ":0"]);
  });

  it("puts the preferred tool first", () => {
    const specs = buildCaptureCommands({ sampleRate: 16000, platform: "linux", tool: "ARECORD" });
    expect(specs.map((s) => s.tool)).toEqual(["arecord", "sox", "parecord", "ffmpeg"]);
  });

  it("ignores an unknown preferred tool", () => {
    const specs = buildCaptureCommands({ sampleRate: 16000, platform: "linux", tool: "mic9000" });
    expect(specs.map((s) => s.tool)).toEqual(["sox", "parecord", "arecord", "ffmpeg"]);
  });

  it("passes the device to each tool", () => {
    const specs = buildCaptureCommands({ sampleRate: 8000, platform: "linux", device: "hw:1" });
    expect(specs[0].env).toEqual({ AUDIODEV: "hw:1" });
    expect(specs[1].args).toContain("--device=hw:1");
    expect(specs[2].args).toEqual(["-q", "-D", "hw:1", "-f", "S16_LE", "-r", "8000", "-c", "1", "-t", "raw"]);
  });
});
