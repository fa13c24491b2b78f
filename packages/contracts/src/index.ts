export type JobState = 'queued' | 'transcoding' | 'transcribing' | 'completed' | 'failed';

export type JobErrorCode = 'transcode_error' | 'transcription_error' | 'internal_error';

/**
 * Public failure summary attached to a failed job.
 * `message` is always redacted: no filesystem paths, no stack frames.
 */
export interface JobErrorDetail {
  code: JobErrorCode;
  message: string;
}

export interface JobStatusDto {
  jobId: string;
  originalName: string;
  fileSize: number | null;
  state: JobState;
  progress: number;
  stageLabel: string;
  hasTranscript: boolean;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  completedAt: string | null;
  error: JobErrorDetail | null;
}

export type JobEventType = 'job_created' | 'job_state_changed' | 'job_progress';

/**
 * Message pushed on the live update channels (WebSocket and SSE) for every job mutation.
 */
export interface JobEventMessage {
  type: JobEventType;
  jobId: string;
  state: JobState;
  progress: number;
  stageLabel: string;
  error: JobErrorDetail | null;
}

export interface QueueStatsDto {
  concurrency: number;
  active: number;
  queued: number;
  accepting: boolean;
}

export interface ServiceStatusDto {
  queue: QueueStatsDto;
  jobs: Record<JobState, number> & { total: number };
  observers: number;
}

// Idle keepalive exchanged on the WebSocket channel. Never carries job data.
export const HEARTBEAT_TOKEN = 'ping';
export const HEARTBEAT_ECHO = 'pong';

export * from './errors.js';
