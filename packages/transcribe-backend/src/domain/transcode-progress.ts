// packages/transcribe-backend/src/domain/transcode-progress.ts
//
// Pure progress computation for stage 1 (media -> normalized audio).
// The adapter feeds raw signals extracted from the transcoder's output;
// nothing here touches processes or streams.
import { STAGE_PROGRESS_RANGES } from './job-model.js';
import { parseClockTimestamp } from './timecode.js';

const STAGE = STAGE_PROGRESS_RANGES.transcoding;

/** Reported when the source duration is unknown and interpolation is impossible. */
export const INDETERMINATE_TRANSCODE_PROGRESS = (STAGE.start + STAGE.end) / 2;

export interface TranscodeProgressState {
  /** Source duration in seconds, or null in indeterminate mode. */
  readonly totalSeconds: number | null;
  readonly progress: number;
}

export function initialTranscodeState(totalSeconds: number | null): TranscodeProgressState {
  const usable =
    totalSeconds !== null && Number.isFinite(totalSeconds) && totalSeconds > 0
      ? totalSeconds
      : null;
  return { totalSeconds: usable, progress: STAGE.start };
}

export function isIndeterminate(state: TranscodeProgressState): boolean {
  return state.totalSeconds === null;
}

// nextTranscodeProgress.declaration()
export function nextTranscodeProgress(
  processedSeconds: number,
  state: TranscodeProgressState,
): TranscodeProgressState {
  let computed: number;
  if (state.totalSeconds === null) {
    computed = INDETERMINATE_TRANSCODE_PROGRESS;
  } else {
    const fraction = Math.min(Math.max(processedSeconds, 0) / state.totalSeconds, 1);
    computed = STAGE.start + fraction * (STAGE.end - STAGE.start);
  }

  return {
    ...state,
    progress: Math.max(state.progress, computed),
  };
}

const MICROSECONDS_PATTERN = /^out_time_(?:us|ms)=(-?\d+)\s*$/;
const OUT_TIME_PATTERN = /^out_time=(\S+)\s*$/;
const STATS_TIME_PATTERN = /(?:^|\s)time=\s*(-?\d+:\d{2}:\d{2}(?:\.\d+)?)/;

/**
 * Extract the processed media time (seconds) from one line of transcoder output.
 *
 * Understands the `-progress` key/value stream (`out_time_us`, `out_time_ms`,
 * which ffmpeg also reports in microseconds, and `out_time`) as well as the
 * classic `time=HH:MM:SS.xx` stats line. Returns null for everything else.
 */
export function parseTranscodeProgressLine(line: string): number | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const micro = MICROSECONDS_PATTERN.exec(trimmed);
  if (micro?.[1] !== undefined) {
    return Number(micro[1]) / 1_000_000;
  }

  const outTime = OUT_TIME_PATTERN.exec(trimmed);
  if (outTime?.[1] !== undefined) {
    return parseClockTimestamp(outTime[1]);
  }

  const stats = STATS_TIME_PATTERN.exec(trimmed);
  if (stats?.[1] !== undefined) {
    return parseClockTimestamp(stats[1]);
  }

  return null;
}

/**
 * Parse the single-value output of a duration lookup. `N/A`, blanks and
 * non-positive values mean the duration is unknown.
 */
export function parseDurationOutput(output: string): number | null {
  const first = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!first) return null;

  const value = Number(first);
  return Number.isFinite(value) && value > 0 ? value : null;
}
