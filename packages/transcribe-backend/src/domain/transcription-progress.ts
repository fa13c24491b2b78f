// packages/transcribe-backend/src/domain/transcription-progress.ts
//
// Pure progress computation for stage 2 (audio -> text).
// The total unit count is an estimate: real segmentation is only discovered
// while decoding, so the fraction is clamped and may reach 1 early.
import { STAGE_PROGRESS_RANGES } from './job-model.js';

const STAGE = STAGE_PROGRESS_RANGES.transcribing;

export const DEFAULT_AVERAGE_SEGMENT_SECONDS = 5;
/** Used when no duration at all is known for the audio. */
export const FALLBACK_AUDIO_DURATION_SECONDS = 60;

export function estimateSegmentCount(
  durationSeconds: number | null,
  averageSegmentSeconds: number = DEFAULT_AVERAGE_SEGMENT_SECONDS,
): number {
  const duration =
    durationSeconds !== null && Number.isFinite(durationSeconds) && durationSeconds > 0
      ? durationSeconds
      : FALLBACK_AUDIO_DURATION_SECONDS;
  const average =
    Number.isFinite(averageSegmentSeconds) && averageSegmentSeconds > 0
      ? averageSegmentSeconds
      : DEFAULT_AVERAGE_SEGMENT_SECONDS;
  return Math.max(Math.floor(duration / average), 1);
}

export interface TranscriptionProgressState {
  readonly estimatedUnits: number;
  readonly unitsProcessed: number;
  readonly progress: number;
}

export function initialTranscriptionState(estimatedUnits: number): TranscriptionProgressState {
  return {
    estimatedUnits: Math.max(Math.floor(estimatedUnits), 1),
    unitsProcessed: 0,
    progress: STAGE.start,
  };
}

// nextTranscriptionProgress.declaration()
export function nextTranscriptionProgress(
  state: TranscriptionProgressState,
  unitsCompleted = 1,
): TranscriptionProgressState {
  const unitsProcessed = state.unitsProcessed + Math.max(unitsCompleted, 0);
  const fraction = Math.min(unitsProcessed / state.estimatedUnits, 1);
  const computed = STAGE.start + fraction * (STAGE.end - STAGE.start);

  return {
    ...state,
    unitsProcessed,
    progress: Math.max(state.progress, computed),
  };
}
