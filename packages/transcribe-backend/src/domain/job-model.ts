// packages/transcribe-backend/src/domain/job-model.ts

// Job domain model and the single place where job state changes are decided.
// Records are frozen values: every mutation goes through applyTransition or
// applyProgress and yields a new record.
import { InternalError, type JobErrorDetail, type JobState } from '@media-scribe/contracts';

export type { JobState };

export interface JobRecord {
  readonly id: string;
  readonly state: JobState;
  readonly sourcePath: string;
  readonly originalName: string;
  readonly fileSize: number | null;
  readonly audioPath: string | null;
  readonly transcriptPath: string | null;
  readonly progress: number;
  readonly stageLabel: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
  readonly error: JobErrorDetail | null;
}
// JobRecord.declaration()

export type RunningJobState = Extract<JobState, 'transcoding' | 'transcribing'>;

export interface ProgressRange {
  readonly start: number;
  readonly end: number;
}

export const STAGE_PROGRESS_RANGES: Readonly<Record<RunningJobState, ProgressRange>> = {
  transcoding: { start: 0, end: 50 },
  transcribing: { start: 50, end: 100 },
};

export type JobTransition =
  | { type: 'start' }
  | { type: 'transcode_succeeded'; audioPath: string }
  | { type: 'transcription_succeeded'; transcriptPath: string }
  | { type: 'fail'; error: JobErrorDetail };

export interface JobProgressUpdate {
  progress: number;
  stageLabel: string;
}

export class InvalidJobTransitionError extends InternalError {
  readonly from: JobState;
  readonly to: JobState;

  constructor(from: JobState, to: JobState) {
    super(`Invalid job state transition: ${from} -> ${to}`);
    this.from = from;
    this.to = to;
  }
}

export function isRunningState(state: JobState): state is RunningJobState {
  return state === 'transcoding' || state === 'transcribing';
}

// canTransition.declaration()
export function canTransition(from: JobState, to: JobState): boolean {
  switch (from) {
    case 'queued':
      return to === 'transcoding';
    case 'transcoding':
      return to === 'transcribing' || to === 'failed';
    case 'transcribing':
      return to === 'completed' || to === 'failed';
    case 'completed':
    case 'failed':
      return false;
    default:
      return false;
  }
}

export function assertTransition(from: JobState, to: JobState): void {
  if (!canTransition(from, to)) {
    throw new InvalidJobTransitionError(from, to);
  }
}

function targetState(transition: JobTransition): JobState {
  switch (transition.type) {
    case 'start':
      return 'transcoding';
    case 'transcode_succeeded':
      return 'transcribing';
    case 'transcription_succeeded':
      return 'completed';
    case 'fail':
      return 'failed';
  }
}

export function createJobRecord(params: {
  id: string;
  sourcePath: string;
  originalName: string;
  fileSize?: number | null;
  now?: Date;
}): JobRecord {
  const now = params.now ?? new Date();
  const record: JobRecord = {
    id: params.id,
    state: 'queued',
    sourcePath: params.sourcePath,
    originalName: params.originalName,
    fileSize: params.fileSize ?? null,
    audioPath: null,
    transcriptPath: null,
    progress: 0,
    stageLabel: 'Queued',
    createdAt: now,
    updatedAt: now,
    startedAt: null,
    completedAt: null,
    error: null,
  };
  return Object.freeze(record);
}

// applyTransition.declaration()
export function applyTransition(
  job: JobRecord,
  transition: JobTransition,
  now: Date = new Date(),
): JobRecord {
  const next = targetState(transition);
  assertTransition(job.state, next);

  switch (transition.type) {
    case 'start':
      return Object.freeze({
        ...job,
        state: next,
        progress: STAGE_PROGRESS_RANGES.transcoding.start,
        stageLabel: 'Starting audio extraction',
        startedAt: now,
        updatedAt: now,
      });
    case 'transcode_succeeded':
      return Object.freeze({
        ...job,
        state: next,
        audioPath: transition.audioPath,
        progress: Math.max(job.progress, STAGE_PROGRESS_RANGES.transcribing.start),
        stageLabel: 'Starting transcription',
        updatedAt: now,
      });
    case 'transcription_succeeded':
      return Object.freeze({
        ...job,
        state: next,
        transcriptPath: transition.transcriptPath,
        progress: 100,
        stageLabel: 'Completed',
        updatedAt: now,
        completedAt: now,
      });
    case 'fail':
      // Progress stays where the failing stage left it.
      return Object.freeze({
        ...job,
        state: next,
        stageLabel: 'Failed',
        error: transition.error,
        updatedAt: now,
        completedAt: now,
      });
  }
}

/**
 * Apply a stage progress event. The value is clamped into the running stage's
 * range and never lowers the job's current progress.
 */
export function applyProgress(
  job: JobRecord,
  update: JobProgressUpdate,
  now: Date = new Date(),
): JobRecord {
  if (!isRunningState(job.state)) {
    throw new InternalError(`Cannot record progress for job in state ${job.state}`);
  }

  const range = STAGE_PROGRESS_RANGES[job.state];
  const clamped = Number.isFinite(update.progress)
    ? Math.min(Math.max(update.progress, range.start), range.end)
    : range.start;

  return Object.freeze({
    ...job,
    progress: Math.max(job.progress, clamped),
    stageLabel: update.stageLabel,
    updatedAt: now,
  });
}
