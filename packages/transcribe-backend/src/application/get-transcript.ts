// packages/transcribe-backend/src/application/get-transcript.ts
// Application service for downloading a finished transcript.
import { readFile } from 'node:fs/promises';
import { parse } from 'node:path';

import { InternalError } from '@media-scribe/contracts';

import type { JobState } from '../domain/job-model.js';
import type { JobStoreContext } from './pipeline-context.js';

export type ResultArtifact =
  | { status: 'found'; fileName: string; content: Buffer }
  | { status: 'not_found' }
  | { status: 'not_ready'; state: JobState };

export function transcriptFileName(originalName: string): string {
  const stem = parse(originalName).name || 'transcript';
  return `${stem}_transcript.txt`;
}

// getResultArtifact.declaration()
export async function getResultArtifact(
  context: Pick<JobStoreContext, 'repository'>,
  jobId: string,
): Promise<ResultArtifact> {
  const job = context.repository.getJobById(jobId);
  if (!job) return { status: 'not_found' };

  if (job.state !== 'completed' || job.transcriptPath === null) {
    return { status: 'not_ready', state: job.state };
  }

  try {
    const content = await readFile(job.transcriptPath);
    return { status: 'found', fileName: transcriptFileName(job.originalName), content };
  } catch (error) {
    throw new InternalError(`Transcript for job ${jobId} is unreadable`, { cause: error });
  }
}
