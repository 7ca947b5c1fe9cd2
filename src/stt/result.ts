import { TranscriptionError } from "../errors";
import { Segment, TranscriptionResult, Word } from "../types/contracts";

export interface RawSegment {
  start: number;
  end: number;
  /** As produced by the model, leading space included. */
  text: string;
  words?: Word[];
}

/**
 * Segments keep the order the model produced them in; nothing is merged or
 * deduplicated. The full text is the raw segment texts joined, then trimmed.
 * Word texts are trimmed whatever the backend's tokenization.
 */
export function buildResult(rawSegments: readonly RawSegment[], language?: string): TranscriptionResult {
  const segments: Segment[] = [];
  for (const [index, raw] of rawSegments.entries()) {
    const previous = segments[index - 1];
    if (previous && raw.start < previous.start) {
      throw new TranscriptionError(
        `Segment ${index} starts at ${raw.start}s, before segment ${index - 1} (${previous.start}s)`
      );
    }

    const segment: Segment = { start: raw.start, end: raw.end, text: raw.text.trim() };
    const words = (raw.words ?? []).map((w) => ({ ...w, word: w.word.trim() })).filter((w) => w.word);
    if (words.length > 0) {
      segment.words = words;
    }
    segments.push(segment);
  }

  return {
    text: rawSegments.map((s) => s.text).join("").trim(),
    segments,
    language: language || undefined
  };
}
