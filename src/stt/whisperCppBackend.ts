import { execFile } from "node:child_process";
import { randomBytes } from "node:crypto";
import { readFile, rm, writeFile } from "node:fs/promises";
import { cpus, tmpdir } from "node:os";
import { join } from "node:path";
import { ModelNotLoadedError, TranscriptionError } from "../errors";
import { encodeWav, flattenAudio } from "../audio/pcm";
import { isRecord } from "../system/guards";
import { binaryExists, fileExists } from "../system/binaries";
import {
  AudioInput,
  TranscribeOptions,
  TranscriptionBackend,
  TranscriptionResult,
  Word
} from "../types/contracts";
import { assertModelSize } from "./modelSizes";
import { RawSegment, buildResult } from "./result";

export type CliRunner = (binaryPath: string, args: string[], timeoutMs: number) => Promise<void>;

export interface ModelSource {
  ensureModel(modelSize: string): Promise<string>;
}

interface WhisperCppBackendOptions {
  binaryPath: string;
  models: ModelSource;
  timeoutMs: number;
  sampleRate?: number;
  tempDir?: string;
  runCli?: CliRunner;
}

/** whisper.cpp's CLI; built with Metal on Apple Silicon. */
export class WhisperCppBackend implements TranscriptionBackend {
  readonly name = "whisper-cpp";
  private modelPath?: string;

  constructor(private readonly options: WhisperCppBackendOptions) {}

  async loadModel(modelSize: string): Promise<void> {
    const size = assertModelSize(modelSize);
    this.modelPath = await this.options.models.ensureModel(size);
  }

  async transcribe(audio: AudioInput, options: TranscribeOptions = {}): Promise<TranscriptionResult> {
    if (!this.modelPath) {
      throw new ModelNotLoadedError();
    }

    const samples = flattenAudio(audio);
    const wordTimestamps = options.wordTimestamps ?? false;
    const outputBase = join(this.options.tempDir ?? tmpdir(), `verbatim-${randomBytes(8).toString("hex")}`);
    const wavPath = `${outputBase}.wav`;
    const jsonPath = `${outputBase}.json`;

    const args = [
      "-m", this.modelPath,
      "-f", wavPath,
      "-l", options.language ?? "auto",
      wordTimestamps ? "--output-json-full" : "--output-json",
      "-of", outputBase,
      "--no-prints",
      "-t", String(Math.min(cpus().length, 4))
    ];

    try {
      await writeFile(wavPath, encodeWav(samples, this.options.sampleRate ?? 16_000));
      await (this.options.runCli ?? runWhisperCli)(this.options.binaryPath, args, this.options.timeoutMs);
      const payload: unknown = JSON.parse(await readFile(jsonPath, "utf-8"));
      return parseWhisperCppOutput(payload, wordTimestamps);
    } catch (error) {
      throw TranscriptionError.from(error);
    } finally {
      await Promise.all([rm(wavPath, { force: true }), rm(jsonPath, { force: true })]);
    }
  }
}

interface Offsets {
  from: number;
  to: number;
}

export function parseWhisperCppOutput(payload: unknown, wordTimestamps: boolean): TranscriptionResult {
  if (!isRecord(payload) || !Array.isArray(payload.transcription)) {
    throw new TranscriptionError("whisper-cli output has no transcription");
  }

  const segments: RawSegment[] = payload.transcription.map((entry: unknown, index) => {
    const offsets = readOffsets(entry);
    if (!isRecord(entry) || !offsets || typeof entry.text !== "string") {
      throw new TranscriptionError(`whisper-cli segment ${index} is malformed`);
    }
    const segment: RawSegment = { start: offsets.from / 1000, end: offsets.to / 1000, text: entry.text };
    if (wordTimestamps && Array.isArray(entry.tokens)) {
      segment.words = wordsFromTokens(entry.tokens);
    }
    return segment;
  });

  const language =
    isRecord(payload.result) && typeof payload.result.language === "string" ? payload.result.language : undefined;

  return buildResult(segments, language);
}

/**
 * Tokens are sub-word pieces; one with a leading space starts a new word.
 * Control tokens ([_BEG_], [_TT_n]) carry no text.
 */
export function wordsFromTokens(tokens: readonly unknown[]): Word[] {
  const words: Word[] = [];
  for (const token of tokens) {
    const offsets = readOffsets(token);
    if (!isRecord(token) || !offsets || typeof token.text !== "string") continue;
    const text = token.text;
    if (text.startsWith("[_") || !text.trim()) continue;

    const last = words[words.length - 1];
    if (last && !text.startsWith(" ")) {
      last.word += text;
      last.end = offsets.to / 1000;
    } else {
      words.push({ start: offsets.from / 1000, end: offsets.to / 1000, word: text });
    }
  }
  return words;
}

function readOffsets(value: unknown): Offsets | undefined {
  if (!isRecord(value) || !isRecord(value.offsets)) return undefined;
  const { from, to } = value.offsets;
  return typeof from === "number" && typeof to === "number" ? { from, to } : undefined;
}

function runWhisperCli(binaryPath: string, args: string[], timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(
      binaryPath,
      args,
      { timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024 },
      (error, _stdout, stderr) => {
        if (error) {
          const msg = stderr?.slice(0, 300) || error.message;
          reject(new Error(`whisper-cli failed: ${msg}`));
          return;
        }
        resolve();
      }
    );
  });
}

export async function findWhisperCppBinary(
  settingPath?: string,
  platform: NodeJS.Platform = process.platform
): Promise<string | undefined> {
  if (settingPath) {
    return (await fileExists(settingPath)) ? settingPath : undefined;
  }

  for (const name of getWhisperCliNames(platform)) {
    if (await binaryExists(name, platform)) {
      return name;
    }
  }

  return undefined;
}

function getWhisperCliNames(platform: NodeJS.Platform): string[] {
  if (platform === "win32") {
    return ["whisper-cli.exe", "whisper-cpp.exe"];
  }
  return ["whisper-cli", "whisper-cpp"];
}
