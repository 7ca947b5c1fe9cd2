import { Writable } from "node:stream";
import { Logger } from "../logging/logger";
import { AudioInput, TranscribeOptions, TranscriptionBackend, TranscriptionResult } from "../types/contracts";

export function recordingLogger(): { logger: Logger; entries: string[] } {
  const entries: string[] = [];
  return {
    entries,
    logger: {
      info: (message) => entries.push(`info:${message}`),
      warn: (message) => entries.push(`warn:${message}`),
      error: (message) => entries.push(`error:${message}`)
    }
  };
}

export class Sink extends Writable {
  private readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join("");
  }
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export class FakeBackend implements TranscriptionBackend {
  readonly name = "fake";
  loadedModel?: string;
  readonly calls: Array<{ audio: AudioInput; options?: TranscribeOptions }> = [];

  constructor(private readonly respond: () => TranscriptionResult | Promise<TranscriptionResult>) {}

  async loadModel(modelSize: string): Promise<void> {
    this.loadedModel = modelSize;
  }

  async transcribe(audio: AudioInput, options?: TranscribeOptions): Promise<TranscriptionResult> {
    this.calls.push({ audio, options });
    return this.respond();
  }
}
