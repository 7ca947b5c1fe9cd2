import { AudioInput } from "../types/contracts";

const BYTES_PER_FLOAT = 4;

/**
 * Turns raw f32le byte chunks into samples. Chunk boundaries from a pipe are
 * arbitrary, so a partial sample is held back until the next chunk completes it.
 */
export class Float32Decoder {
  private remainder = Buffer.alloc(0);

  decode(chunk: Buffer): Float32Array {
    const data = this.remainder.length > 0 ? Buffer.concat([this.remainder, chunk]) : chunk;
    const count = Math.floor(data.length / BYTES_PER_FLOAT);
    const samples = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      samples[i] = data.readFloatLE(i * BYTES_PER_FLOAT);
    }
    this.remainder = Buffer.from(data.subarray(count * BYTES_PER_FLOAT));
    return samples;
  }

  get pendingBytes(): number {
    return this.remainder.length;
  }
}

export function clampSample(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(-1, Math.min(1, value));
}

export function flattenAudio(audio: AudioInput): Float32Array {
  if (audio instanceof Float32Array) {
    return audio;
  }
  const total = audio.reduce((acc, row) => acc + row.length, 0);
  const flat = new Float32Array(total);
  let offset = 0;
  for (const row of audio) {
    flat.set(row, offset);
    offset += row.length;
  }
  return flat;
}

/** 16-bit PCM mono RIFF/WAVE. */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const bytesPerSample = 2;
  const dataSize = samples.length * bytesPerSample;
  const wav = Buffer.alloc(44 + dataSize);

  wav.write("RIFF", 0, "ascii");
  wav.writeUInt32LE(36 + dataSize, 4);
  wav.write("WAVE", 8, "ascii");
  wav.write("fmt ", 12, "ascii");
  wav.writeUInt32LE(16, 16);
  wav.writeUInt16LE(1, 20); // PCM
  wav.writeUInt16LE(1, 22); // mono
  wav.writeUInt32LE(sampleRate, 24);
  wav.writeUInt32LE(sampleRate * bytesPerSample, 28);
  wav.writeUInt16LE(bytesPerSample, 32);
  wav.writeUInt16LE(16, 34);
  wav.write("data", 36, "ascii");
  wav.writeUInt32LE(dataSize, 40);

  let offset = 44;
  for (let i = 0; i < samples.length; i++) {
    const s = clampSample(samples[i]);
    wav.writeInt16LE(Math.round(s < 0 ? s * 0x8000 : s * 0x7fff), offset);
    offset += bytesPerSample;
  }
  return wav;
}
