// packages/transcribe-backend/src/application/job-dto.ts
//
// Shared helpers for serializing JobRecord data into the public HTTP and live-update DTOs.
import type { JobEventMessage, JobEventType, JobStatusDto } from '@media-scribe/contracts';

import type { JobRecord } from '../domain/job-model.js';

export function jobRecordToDto(job: JobRecord): JobStatusDto {
  return {
    jobId: job.id,
    originalName: job.originalName,
    fileSize: job.fileSize,
    state: job.state,
    progress: job.progress,
    stageLabel: job.stageLabel,
    hasTranscript: job.state === 'completed' && job.transcriptPath !== null,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    startedAt: job.startedAt ? job.startedAt.toISOString() : null,
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    error: job.error ? { ...job.error } : null,
  };
}

export function jobRecordToEventMessage(type: JobEventType, job: JobRecord): JobEventMessage {
  return {
    type,
    jobId: job.id,
    state: job.state,
    progress: job.progress,
    stageLabel: job.stageLabel,
    error: job.error ? { ...job.error } : null,
  };
}

export { type JobEventMessage, type JobStatusDto } from '@media-scribe/contracts';
