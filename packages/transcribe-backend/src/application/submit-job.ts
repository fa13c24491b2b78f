// packages/transcribe-backend/src/application/submit-job.ts
//
// Application service for submitting a new transcription job.
// - Validates input.
// - Stores a queued job in the repository and announces it.
// - Hands the job id to the worker queue.
import { QueueClosedError, ValidationError } from '@media-scribe/contracts';

import { logger } from '../infrastructure/logger.js';
import { type JobStatusDto, jobRecordToDto } from './job-dto.js';
import type { SubmissionContext } from './pipeline-context.js';

export interface SubmitJobRequest {
  /** Where the uploaded original was stored. */
  sourcePath: string;
  originalName: string;
  fileSize?: number | null;
}

export type SubmitJobResponse = JobStatusDto;

function validateSubmitJobRequest(req: SubmitJobRequest): void {
  if (!req || typeof req !== 'object') {
    throw new ValidationError('Body must be an object', 'invalid_body');
  }

  if (typeof req.sourcePath !== 'string' || req.sourcePath.trim().length === 0) {
    throw new ValidationError('sourcePath is required', 'source_required');
  }

  if (typeof req.originalName !== 'string' || req.originalName.trim().length === 0) {
    throw new ValidationError('originalName is required', 'name_required');
  }

  if (
    req.fileSize !== undefined &&
    req.fileSize !== null &&
    (!Number.isInteger(req.fileSize) || req.fileSize < 0)
  ) {
    throw new ValidationError(
      'fileSize must be a non-negative integer when provided',
      'invalid_file_size',
    );
  }
}

// submitJob.declaration()
export function submitJob(context: SubmissionContext, req: SubmitJobRequest): SubmitJobResponse {
  validateSubmitJobRequest(req);

  if (!context.queue.accepting) {
    throw new QueueClosedError();
  }

  const job = context.repository.insertJob({
    sourcePath: req.sourcePath,
    originalName: req.originalName.trim(),
    fileSize: req.fileSize ?? null,
  });

  context.hub.publish({ type: 'job_created', job });
  context.queue.submit(job.id);

  logger.info('Job submitted', {
    event: 'job_submitted',
    jobId: job.id,
    originalName: job.originalName,
    fileSize: job.fileSize,
  });

  return jobRecordToDto(job);
}
