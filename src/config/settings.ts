import { homedir } from "node:os";
import { join } from "node:path";

export interface VerbatimSettings {
  serverUrl: string;
  whisperCppPath: string;
  modelDir: string;
  timeoutMs: number;
  sampleRate: number;
}

const PREFIX = "VERBATIM_";

export function readSettings(env: NodeJS.ProcessEnv = process.env): VerbatimSettings {
  const get = (key: string, fallback: string): string => {
    const value = env[PREFIX + key]?.trim();
    return value ? value : fallback;
  };

  return {
    serverUrl: get("SERVER_URL", "http://127.0.0.1:8000").replace(/\/+$/, ""),
    whisperCppPath: get("WHISPER_CPP_PATH", ""),
    modelDir: get("MODEL_DIR", join(homedir(), ".cache", "verbatim", "models")),
    timeoutMs: positiveInt(get("TIMEOUT_MS", ""), 120_000),
    sampleRate: positiveInt(get("SAMPLE_RATE", ""), 16_000)
  };
}

function positiveInt(raw: string, fallback: number): number {
  const n = Number(raw);
  return raw !== "" && Number.isInteger(n) && n > 0 ? n : fallback;
}
