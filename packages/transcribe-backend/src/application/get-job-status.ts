// packages/transcribe-backend/src/application/get-job-status.ts
// Application services for reading job state.
import type { ServiceStatusDto } from '@media-scribe/contracts';

import type { JobQueue } from '../infrastructure/job-queue.js';
import { type JobStatusDto, jobRecordToDto } from './job-dto.js';
import type { JobStoreContext } from './pipeline-context.js';

export type GetJobStatusResponse = JobStatusDto;

// getJobStatus.declaration()
export function getJobStatus(
  context: Pick<JobStoreContext, 'repository'>,
  jobId: string,
): GetJobStatusResponse | null {
  if (!jobId) return null;

  const job = context.repository.getJobById(jobId);
  if (!job) return null;

  return jobRecordToDto(job);
}

/** All jobs in submission order. */
export function listJobStatuses(context: Pick<JobStoreContext, 'repository'>): JobStatusDto[] {
  return context.repository.listJobs().map(jobRecordToDto);
}

export function getServiceStatus(
  context: JobStoreContext & { queue: Pick<JobQueue, 'getStats'> },
): ServiceStatusDto {
  const counts = context.repository.countByState();
  const total = Object.values(counts).reduce((sum, count) => sum + count, 0);

  return {
    queue: context.queue.getStats(),
    jobs: { ...counts, total },
    observers: context.hub.size,
  };
}
