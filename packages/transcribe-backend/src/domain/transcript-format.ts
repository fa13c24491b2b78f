// packages/transcribe-backend/src/domain/transcript-format.ts
// Turns recognized segments into readable text, breaking lines on pauses.
import { parseClockTimestamp } from './timecode.js';

export interface TranscriptSegment {
  /** Seconds from the start of the audio; null when the recognizer gave no timing. */
  startSeconds: number | null;
  endSeconds: number | null;
  text: string;
}

export interface PauseFormattingOptions {
  /** Pauses below this are joined with a space. */
  shortPauseSeconds: number;
  /** Pauses below this (and above short) become a line break; longer ones a paragraph. */
  mediumPauseSeconds: number;
}

export const DEFAULT_PAUSE_FORMATTING: PauseFormattingOptions = {
  shortPauseSeconds: 0.5,
  mediumPauseSeconds: 1.5,
};

function separatorFor(pause: number | null, options: PauseFormattingOptions): string {
  if (pause === null || pause < options.shortPauseSeconds) return ' ';
  if (pause < options.mediumPauseSeconds) return '\n';
  return '\n\n';
}

export function formatSegmentsWithPauses(
  segments: readonly TranscriptSegment[],
  options: PauseFormattingOptions = DEFAULT_PAUSE_FORMATTING,
): string {
  const parts: string[] = [];
  let previousEnd: number | null = null;
  let first = true;

  for (const segment of segments) {
    const text = segment.text.trim();
    if (!text) continue;

    if (first) {
      parts.push(text);
      first = false;
    } else {
      const pause =
        segment.startSeconds !== null && previousEnd !== null
          ? segment.startSeconds - previousEnd
          : null;
      parts.push(separatorFor(pause, options) + text);
    }
    previousEnd = segment.endSeconds;
  }

  return parts.join('').trim();
}

const SEGMENT_LINE_PATTERN =
  /^\s*\[\s*(\d+:\d{2}:\d{2}(?:[.,]\d+)?)\s*-->\s*(\d+:\d{2}:\d{2}(?:[.,]\d+)?)\s*\]\s?(.*)$/;

/**
 * Parse one recognizer output line of the form
 * `[00:00:01.000 --> 00:00:04.500]  text`. Returns null for anything else
 * (model loading chatter, timing summaries).
 */
export function parseSegmentLine(line: string): TranscriptSegment | null {
  const match = SEGMENT_LINE_PATTERN.exec(line);
  if (!match) return null;

  const [, start, end, text] = match;
  return {
    startSeconds: start === undefined ? null : parseClockTimestamp(start),
    endSeconds: end === undefined ? null : parseClockTimestamp(end),
    text: (text ?? '').trim(),
  };
}
