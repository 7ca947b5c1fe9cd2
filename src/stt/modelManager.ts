import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { join } from "node:path";
import { pipeline } from "node:stream/promises";
import { Dispatcher, request } from "undici";
import { ModelLoadError, errorMessage } from "../errors";
import { Logger } from "../logging/logger";
import { fileExists } from "../system/binaries";
import { ModelSize, assertModelSize } from "./modelSizes";

export const MODEL_BASE_URL = "https://huggingface.co/ggerganov/whisper.cpp/resolve/main";

const MODELS: Record<ModelSize, { filename: string; sizeMB: number }> = {
  tiny: { filename: "ggml-tiny.bin", sizeMB: 75 },
  base: { filename: "ggml-base.bin", sizeMB: 142 },
  small: { filename: "ggml-small.bin", sizeMB: 466 },
  medium: { filename: "ggml-medium.bin", sizeMB: 1500 },
  large: { filename: "ggml-large-v3.bin", sizeMB: 2900 },
  "large-v2": { filename: "ggml-large-v2.bin", sizeMB: 2900 },
  "large-v3": { filename: "ggml-large-v3.bin", sizeMB: 2900 }
};

const MAX_REDIRECTS = 5;

interface ModelManagerOptions {
  storageDir: string;
  logger: Logger;
  timeoutMs: number;
  baseUrl?: string;
  dispatcher?: Dispatcher;
}

/** ggml model files for whisper.cpp, fetched on first use. */
export class ModelManager {
  constructor(private readonly options: ModelManagerOptions) {}

  getModelPath(size: ModelSize): string {
    return join(this.options.storageDir, MODELS[size].filename);
  }

  async ensureModel(modelSize: string): Promise<string> {
    const size = assertModelSize(modelSize);
    const info = MODELS[size];
    const modelPath = this.getModelPath(size);

    if (await fileExists(modelPath)) {
      return modelPath;
    }

    try {
      await mkdir(this.options.storageDir, { recursive: true });
      const url = `${this.options.baseUrl ?? MODEL_BASE_URL}/${info.filename}`;
      this.options.logger.info(`Downloading ${info.filename} (~${info.sizeMB}MB)...`);
      await this.download(url, modelPath, info.filename);
    } catch (error) {
      throw new ModelLoadError(
        `Error loading model '${size}': ${errorMessage(error)}`,
        `Check your network connection, or place ${info.filename} in ${this.options.storageDir}`,
        { cause: error }
      );
    }

    return modelPath;
  }

  private async download(url: string, destPath: string, filename: string): Promise<void> {
    const res = await this.get(url);
    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`Download failed: HTTP ${res.statusCode}`);
    }

    const length = res.headers["content-length"];
    const totalBytes = typeof length === "string" ? Number(length) : 0;
    const partPath = `${destPath}.part`;
    const logger = this.options.logger;
    let downloaded = 0;
    let reported = 0;

    try {
      await pipeline(
        res.body,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            downloaded += chunk.length;
            if (totalBytes > 0) {
              const pct = Math.floor((downloaded / totalBytes) * 10) * 10;
              if (pct > reported) {
                reported = pct;
                logger.info(`Downloading ${filename}: ${pct}%`);
              }
            }
            yield chunk;
          }
        },
        createWriteStream(partPath)
      );
      await rename(partPath, destPath);
    } catch (error) {
      await rm(partPath, { force: true }).catch((cleanupError: unknown) =>
        logger.warn(`Could not remove ${partPath}: ${errorMessage(cleanupError)}`)
      );
      throw error;
    }
  }

  private async get(url: string): Promise<Dispatcher.ResponseData> {
    let current = url;
    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const res = await request(current, {
        method: "GET",
        dispatcher: this.options.dispatcher,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });
      const location = res.headers.location;
      if (res.statusCode >= 300 && res.statusCode < 400 && typeof location === "string") {
        await res.body.dump();
        current = new URL(location, current).toString();
        continue;
      }
      return res;
    }
    throw new Error(`Too many redirects fetching ${url}`);
  }
}
