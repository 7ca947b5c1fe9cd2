import { CaptureUnavailableError, FatalError } from "../errors";
import { Logger } from "../logging/logger";
import { AudioBuffer } from "../types/contracts";
import { ChunkAccumulator } from "./chunkAccumulator";
import { InputStreamFactory } from "./inputStream";

export const DEFAULT_SAMPLE_RATE = 16_000;

export interface RecordOptions {
  sampleRate?: number;
  /** Suppresses the recording prompt. */
  silent?: boolean;
}

interface AudioCaptureDeps {
  streams: InputStreamFactory;
  /** Settles when the user asks to stop (a line on stdin, end of input, interrupt). */
  waitForStop: () => Promise<unknown>;
  logger: Logger;
  print: (text: string) => void;
}

export class AudioCapture {
  constructor(private readonly deps: AudioCaptureDeps) {}

  /**
   * Records from the input stream until the stop trigger settles. An empty
   * buffer (duration 0) means nothing was captured and is not an error.
   */
  async record(options: RecordOptions = {}): Promise<AudioBuffer> {
    const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    const accumulator = new ChunkAccumulator(sampleRate);

    let reportFailure: (error: Error) => void = () => undefined;
    const failure = new Promise<Error>((resolve) => {
      reportFailure = resolve;
    });

    const stream = await this.deps.streams.open(
      { sampleRate, channels: 1 },
      {
        onChunk: (chunk) => {
          accumulator.push(chunk);
        },
        onWarning: (message) => this.deps.logger.warn(`Audio stream: ${message}`),
        onError: (error) => reportFailure(error)
      }
    );

    if (!options.silent) {
      this.deps.print("\nRecording... Press Enter to stop.\n");
    }

    let streamError: Error | undefined;
    try {
      streamError = await Promise.race([this.deps.waitForStop().then(() => undefined), failure]);
    } finally {
      // Flag first, then close: nothing the recorder flushes during teardown is kept.
      accumulator.stop();
      await stream.close();
    }

    if (streamError) {
      throw streamError instanceof FatalError
        ? streamError
        : new CaptureUnavailableError(`Could not access microphone: ${streamError.message}`, undefined, {
            cause: streamError
          });
    }

    return accumulator.finalize();
  }
}
