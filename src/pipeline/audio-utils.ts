/**
 * PCM helpers (mono, signed 16-bit little-endian): energy, conversion, gain, WAV packing for ASR input.
 */

export const BYTES_PER_SAMPLE = 2;

/** Root-mean-square of the samples; 0 for an empty block. */
export function computeRms(samples: Int16Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const s = samples[i];
    sum += s * s;
  }
  return Math.sqrt(sum / samples.length);
}

/** Copy little-endian PCM bytes into samples (odd trailing byte ignored). */
export function pcmToSamples(pcm: Buffer): Int16Array {
  const count = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i++) out[i] = pcm.readInt16LE(i * BYTES_PER_SAMPLE);
  return out;
}

export function samplesToPcm(chunks: readonly Int16Array[]): Buffer {
  const total = chunks.reduce((n, c) => n + c.length, 0);
  const out = Buffer.alloc(total * BYTES_PER_SAMPLE);
  let offset = 0;
  for (const chunk of chunks) {
    for (let i = 0; i < chunk.length; i++) {
      out.writeInt16LE(chunk[i], offset);
      offset += BYTES_PER_SAMPLE;
    }
  }
  return out;
}

/** Scale PCM by `gain`, clipping to the int16 range. gain 1 returns the input unchanged. */
export function applyGain(pcm: Buffer, gain: number): Buffer {
  if (gain === 1) return pcm;
  const count = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  const out = Buffer.alloc(count * BYTES_PER_SAMPLE);
  for (let i = 0; i < count; i++) {
    const v = Math.round(pcm.readInt16LE(i * BYTES_PER_SAMPLE) * gain);
    out.writeInt16LE(Math.max(-32768, Math.min(32767, v)), i * BYTES_PER_SAMPLE);
  }
  return out;
}

export function pcmDurationMs(byteLength: number, sampleRateHz: number): number {
  return (byteLength / BYTES_PER_SAMPLE / sampleRateHz) * 1000;
}

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const headerSize = 44;
  const fileSize = headerSize + dataSize;
  const header = Buffer.alloc(headerSize);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}
