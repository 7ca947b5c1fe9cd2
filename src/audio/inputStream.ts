export interface InputStreamOptions {
  sampleRate: number;
  channels: 1;
}

export interface InputStreamCallbacks {
  /** Invoked from the producer side for every block of samples. */
  onChunk(chunk: Float32Array): void;
  /** Non-fatal stream status; capture continues. */
  onWarning(message: string): void;
  /** The stream died before close() was requested. */
  onError(error: Error): void;
}

export interface InputStream {
  close(): Promise<void>;
}

export interface InputStreamFactory {
  /** Resolves once the stream is live; rejects with CaptureUnavailableError when it cannot be opened. */
  open(options: InputStreamOptions, callbacks: InputStreamCallbacks): Promise<InputStream>;
}
