import { TranscriptionResult } from "../types/contracts";

export interface FormatOptions {
  timestamps?: boolean;
  quiet?: boolean;
}

const RULE = "=".repeat(50);

/** M:SS, fractional seconds dropped. */
export function formatTimestamp(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${minutes}:${String(secs).padStart(2, "0")}`;
}

export function formatSegments(result: TranscriptionResult): string[] {
  return result.segments.map(
    (seg) => `[${formatTimestamp(seg.start)}-${formatTimestamp(seg.end)}] ${seg.text}`
  );
}

function body(result: TranscriptionResult, timestamps: boolean): string {
  if (timestamps && result.segments.length > 0) {
    return formatSegments(result).join("\n");
  }
  return result.text;
}

export function formatOutput(result: TranscriptionResult, duration: number, options: FormatOptions = {}): string {
  const timestamps = options.timestamps ?? false;
  if (options.quiet) {
    return body(result, timestamps);
  }

  return [
    "",
    RULE,
    "  TRANSCRIPTION",
    RULE,
    "",
    body(result, timestamps),
    "",
    `Duration: ${duration.toFixed(2)}s | Language: ${result.language ?? "unknown"}`,
    RULE,
    ""
  ].join("\n");
}

/** What --copy puts on the clipboard: the plain text, or timestamped lines. */
export function clipboardText(result: TranscriptionResult, timestamps: boolean): string {
  return body(result, timestamps);
}

export function banner(title: string): string {
  return [RULE, `  ${title}`, RULE].join("\n");
}
