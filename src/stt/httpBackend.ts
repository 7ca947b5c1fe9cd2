import { Dispatcher, FormData, request } from "undici";
import { ModelLoadError, ModelNotLoadedError, TranscriptionError, errorMessage } from "../errors";
import { encodeWav, flattenAudio } from "../audio/pcm";
import { isRecord } from "../system/guards";
import { AudioInput, TranscribeOptions, TranscriptionBackend, TranscriptionResult, Word } from "../types/contracts";
import { ModelSize, assertModelSize } from "./modelSizes";
import { RawSegment, buildResult } from "./result";

const MODEL_IDS: Record<ModelSize, string> = {
  tiny: "Systran/faster-whisper-tiny",
  base: "Systran/faster-whisper-base",
  small: "Systran/faster-whisper-small",
  medium: "Systran/faster-whisper-medium",
  large: "Systran/faster-whisper-large-v3",
  "large-v2": "Systran/faster-whisper-large-v2",
  "large-v3": "Systran/faster-whisper-large-v3"
};

interface HttpBackendOptions {
  /** Base URL of an OpenAI-compatible transcription server. */
  baseUrl: string;
  timeoutMs: number;
  sampleRate?: number;
  dispatcher?: Dispatcher;
}

/**
 * Talks to a faster-whisper server over the OpenAI audio API. Needs nothing
 * beyond this package to construct; availability is checked on loadModel.
 */
export class HttpBackend implements TranscriptionBackend {
  readonly name = "faster-whisper-server";
  private modelId?: string;

  constructor(private readonly options: HttpBackendOptions) {}

  async loadModel(modelSize: string): Promise<void> {
    const size = assertModelSize(modelSize);
    const url = `${this.options.baseUrl}/health`;

    let statusCode: number;
    try {
      const res = await request(url, {
        method: "GET",
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });
      await res.body.dump();
      statusCode = res.statusCode;
    } catch (error) {
      throw new ModelLoadError(
        `Error loading model '${size}': transcription server unreachable at ${this.options.baseUrl} (${errorMessage(error)})`,
        "Start a faster-whisper server (e.g. speaches) or set VERBATIM_SERVER_URL",
        { cause: error }
      );
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new ModelLoadError(`Error loading model '${size}': server health check failed (${statusCode})`);
    }

    this.modelId = MODEL_IDS[size];
  }

  async transcribe(audio: AudioInput, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    if (!this.modelId) {
      throw new ModelNotLoadedError();
    }

    const samples = flattenAudio(audio);
    const wav = encodeWav(samples, this.options.sampleRate ?? 16_000);
    const wordTimestamps = options.wordTimestamps ?? false;

    const form = new FormData();
    form.append("file", new Blob([wav], { type: "audio/wav" }), "audio.wav");
    form.append("model", this.modelId);
    form.append("response_format", "verbose_json");
    form.append("temperature", "0");
    form.append("timestamp_granularities[]", "segment");
    if (wordTimestamps) {
      form.append("timestamp_granularities[]", "word");
    }
    if (options.language) {
      form.append("language", options.language);
    }

    let payload: unknown;
    try {
      const res = await request(`${this.options.baseUrl}/v1/audio/transcriptions`, {
        method: "POST",
        body: form,
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });

      if (res.statusCode < 200 || res.statusCode >= 300) {
        const detail = (await res.body.text()).slice(0, 300).trim();
        throw new TranscriptionError(
          `Error during transcription: server returned ${res.statusCode}${detail ? `: ${detail}` : ""}`
        );
      }
      payload = await res.body.json();
    } catch (error) {
      throw TranscriptionError.from(error);
    }

    return parseVerboseJson(payload, wordTimestamps);
  }
}

/**
 * verbose_json lists words separately from segments; each word goes to the
 * last segment starting at or before it.
 */
export function parseVerboseJson(payload: unknown, wordTimestamps: boolean): TranscriptionResult {
  if (!isRecord(payload)) {
    throw new TranscriptionError("Error during transcription: malformed server response");
  }

  const rawSegments = Array.isArray(payload.segments) ? payload.segments : [];
  const segments: RawSegment[] = rawSegments.map((entry: unknown, index) => {
    if (
      !isRecord(entry) ||
      typeof entry.start !== "number" ||
      typeof entry.end !== "number" ||
      typeof entry.text !== "string"
    ) {
      throw new TranscriptionError(`Error during transcription: segment ${index} is malformed`);
    }
    return { start: entry.start, end: entry.end, text: entry.text };
  });

  if (wordTimestamps && Array.isArray(payload.words)) {
    for (const word of payload.words.filter(isWord)) {
      const owner = findOwner(segments, word.start);
      if (owner) {
        (owner.words ??= []).push({ start: word.start, end: word.end, word: word.word });
      }
    }
  }

  // A server that returns no segments still returns text.
  if (segments.length === 0 && typeof payload.text === "string" && payload.text.trim()) {
    const duration = typeof payload.duration === "number" ? payload.duration : 0;
    segments.push({ start: 0, end: duration, text: payload.text });
  }

  const language = typeof payload.language === "string" ? payload.language : undefined;
  return buildResult(segments, language);
}

function findOwner(segments: RawSegment[], start: number): RawSegment | undefined {
  let owner: RawSegment | undefined;
  for (const segment of segments) {
    if (segment.start > start) break;
    owner = segment;
  }
  return owner ?? segments[0];
}

function isWord(value: unknown): value is Word {
  return (
    isRecord(value) &&
    typeof value.start === "number" &&
    typeof value.end === "number" &&
    typeof value.word === "string"
  );
}
