import { AudioBuffer } from "../types/contracts";
import { clampSample } from "./pcm";

export function createAudioBuffer(samples: Float32Array, sampleRate: number): AudioBuffer {
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new RangeError(`Sample rate must be a positive integer, got ${sampleRate}`);
  }
  return {
    samples,
    sampleRate,
    duration: samples.length === 0 ? 0 : samples.length / sampleRate
  };
}

/**
 * Collects chunks pushed by the audio producer and materializes one buffer
 * after the stop flag is set. Chunks arriving once stopped are dropped.
 */
export class ChunkAccumulator {
  private readonly chunks: Float32Array[] = [];
  private readonly stopController = new AbortController();

  constructor(readonly sampleRate: number) {}

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  push(chunk: Float32Array): boolean {
    if (this.stopController.signal.aborted) {
      return false;
    }
    // The producer may reuse its buffer.
    this.chunks.push(Float32Array.from(chunk));
    return true;
  }

  stop(): void {
    this.stopController.abort();
  }

  finalize(): AudioBuffer {
    if (this.chunks.length === 0) {
      return createAudioBuffer(new Float32Array(0), this.sampleRate);
    }

    const total = this.chunks.reduce((acc, chunk) => acc + chunk.length, 0);
    const samples = new Float32Array(total);
    let offset = 0;
    for (const chunk of this.chunks) {
      for (let i = 0; i < chunk.length; i++) {
        samples[offset + i] = clampSample(chunk[i]);
      }
      offset += chunk.length;
    }
    return createAudioBuffer(samples, this.sampleRate);
  }
}
