export const ExitCode = {
  Success: 0,
  SessionFailed: 1,
  Usage: 2,
  CaptureUnavailable: 3,
  ModelUnavailable: 4,
  TranscriptionFailed: 5
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base for failures that end the run. Each kind carries the exit status
 * scripted callers rely on and, where there is one, a remediation hint.
 */
export abstract class FatalError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, readonly hint?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CaptureUnavailableError extends FatalError {
  readonly exitCode = ExitCode.CaptureUnavailable;
}

export class ModelLoadError extends FatalError {
  readonly exitCode = ExitCode.ModelUnavailable;
}

export class TranscriptionError extends FatalError {
  readonly exitCode = ExitCode.TranscriptionFailed;

  static from(error: unknown): TranscriptionError {
    if (error instanceof TranscriptionError) return error;
    return new TranscriptionError(`Error during transcription: ${errorMessage(error)}`, undefined, {
      cause: error
    });
  }
}

export class OutputError extends FatalError {
  readonly exitCode = ExitCode.SessionFailed;
}

export class UsageError extends FatalError {
  readonly exitCode = ExitCode.Usage;
}

/** Thrown when transcribe() runs before loadModel(); a caller bug, not a user-facing failure. */
export class ModelNotLoadedError extends Error {
  constructor() {
    super("Model not loaded. Call loadModel() first.");
    this.name = "ModelNotLoadedError";
  }
}

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof FatalError ? error.exitCode : ExitCode.SessionFailed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sanitizeForLog(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
