/** Mono samples in [-1, 1]; duration is always samples.length / sampleRate. */
export interface AudioBuffer {
  readonly samples: Float32Array;
  readonly sampleRate: number;
  readonly duration: number;
}

/** A single buffer, or rows of one (e.g. per-chunk), flattened in order before decoding. */
export type AudioInput = Float32Array | readonly Float32Array[];

export interface Word {
  start: number;
  end: number;
  word: string;
}

export interface Segment {
  start: number;
  end: number;
  text: string;
  words?: Word[];
}

export interface TranscriptionResult {
  readonly text: string;
  readonly segments: readonly Segment[];
  readonly language?: string;
}

export interface TranscribeOptions {
  /** Forces decoding in this language; omitted means auto-detect. */
  language?: string;
  wordTimestamps?: boolean;
}

export interface TranscriptionBackend {
  /** Display only. */
  readonly name: string;
  loadModel(modelSize: string): Promise<void>;
  transcribe(audio: AudioInput, options?: TranscribeOptions): Promise<TranscriptionResult>;
}
