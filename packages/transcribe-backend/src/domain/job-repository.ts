// packages/transcribe-backend/src/domain/job-repository.ts
// In-memory repository for JobRecord.
// - Records are frozen; readers get shared immutable snapshots.
// - A running job has exactly one owner; writes from anyone else are rejected.
// - Insertion order is preserved for listing.
import { randomUUID } from 'node:crypto';

import { InternalError } from '@media-scribe/contracts';

import { type JobRecord, type JobState, createJobRecord } from './job-model.js';

export class JobOwnershipError extends InternalError {
  readonly jobId: string;

  constructor(jobId: string, message: string) {
    super(message);
    this.jobId = jobId;
  }
}

export type ClaimResult =
  | { status: 'claimed'; job: JobRecord }
  | { status: 'not_found' }
  | { status: 'already_owned'; ownerId: string }
  | { status: 'not_queued'; state: JobState };

export class JobRepository {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly owners = new Map<string, string>();

  // insertJob.declaration()
  insertJob(params: {
    sourcePath: string;
    originalName: string;
    fileSize?: number | null;
    id?: string;
  }): JobRecord {
    const id = params.id ?? randomUUID();
    if (this.jobs.has(id)) {
      throw new InternalError(`Job ${id} already exists`);
    }

    const job = createJobRecord({
      id,
      sourcePath: params.sourcePath,
      originalName: params.originalName,
      fileSize: params.fileSize ?? null,
    });
    this.jobs.set(id, job);
    return job;
  }

  getJobById(id: string): JobRecord | null {
    return this.jobs.get(id) ?? null;
  }

  listJobs(): JobRecord[] {
    return [...this.jobs.values()];
  }

  countByState(): Record<JobState, number> {
    const counts: Record<JobState, number> = {
      queued: 0,
      transcoding: 0,
      transcribing: 0,
      completed: 0,
      failed: 0,
    };
    for (const job of this.jobs.values()) {
      counts[job.state] += 1;
    }
    return counts;
  }

  /**
   * Take exclusive ownership of a queued job. Only one worker can hold a job;
   * jobs that already left `queued` cannot be claimed again.
   */
  claimJob(id: string, workerId: string): ClaimResult {
    const job = this.jobs.get(id);
    if (!job) return { status: 'not_found' };

    const owner = this.owners.get(id);
    if (owner !== undefined) return { status: 'already_owned', ownerId: owner };
    if (job.state !== 'queued') return { status: 'not_queued', state: job.state };

    this.owners.set(id, workerId);
    return { status: 'claimed', job };
  }

  getOwner(id: string): string | null {
    return this.owners.get(id) ?? null;
  }

  /**
   * Replace a job record through `updater`. The caller must own the job and
   * the updater must keep the id.
   */
  updateJob(id: string, workerId: string, updater: (job: JobRecord) => JobRecord): JobRecord {
    const current = this.jobs.get(id);
    if (!current) {
      throw new JobOwnershipError(id, `Job ${id} not found`);
    }

    const owner = this.owners.get(id);
    if (owner !== workerId) {
      throw new JobOwnershipError(
        id,
        `Worker ${workerId} does not own job ${id}${owner ? ` (owner: ${owner})` : ''}`,
      );
    }

    const next = updater(current);
    if (next.id !== id) {
      throw new InternalError(`Job update for ${id} changed the record id to ${next.id}`);
    }

    this.jobs.set(id, next);
    return next;
  }

  /** Drop ownership. Returns false when `workerId` was not the owner. */
  releaseJob(id: string, workerId: string): boolean {
    if (this.owners.get(id) !== workerId) return false;
    this.owners.delete(id);
    return true;
  }
}
