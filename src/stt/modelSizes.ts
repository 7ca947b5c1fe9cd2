import { ModelLoadError } from "../errors";

export const MODEL_SIZES = ["tiny", "base", "small", "medium", "large", "large-v2", "large-v3"] as const;

export type ModelSize = (typeof MODEL_SIZES)[number];

export const DEFAULT_MODEL_SIZE: ModelSize = "base";

export function isModelSize(value: string): value is ModelSize {
  return (MODEL_SIZES as readonly string[]).includes(value);
}

/** Checked before any download or server round trip. */
export function assertModelSize(value: string): ModelSize {
  if (!isModelSize(value)) {
    throw new ModelLoadError(`Unknown model size '${value}'`, `Available: ${MODEL_SIZES.join(", ")}`);
  }
  return value;
}
