// packages/transcribe-backend/src/domain/timecode.ts
// Clock-style timestamps as printed by ffmpeg and whisper.cpp.

const CLOCK_PATTERN = /^(-)?(\d+):([0-5]?\d):([0-5]?\d(?:[.,]\d+)?)$/;

/**
 * Parse `HH:MM:SS(.fff)` into seconds. Returns null for anything else.
 * A comma decimal separator (SRT style) is accepted.
 */
export function parseClockTimestamp(value: string): number | null {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, negative, hours, minutes, seconds] = match;
  const total =
    Number(hours) * 3600 + Number(minutes) * 60 + Number((seconds ?? '0').replace(',', '.'));
  if (!Number.isFinite(total)) return null;
  return negative ? -total : total;
}
