// packages/transcribe-backend/src/application/process-job.ts
// Application service executed by a worker loop for one job.
// Flow:
// 1. Claim the job; missing, owned or non-queued jobs are skipped.
// 2. Transition queued -> transcoding and run stage 1.
// 3. Transition transcoding -> transcribing and run stage 2.
// 4. Transition transcribing -> completed.
// 5. Any stage failure becomes a single failed transition with a public error detail.
// Every state change and progress update is published to the hub. No retries.
import { join } from 'node:path';

import { ToolStageError } from '@media-scribe/contracts';

import type { JobEventType } from '../domain/job-events.js';
import {
  type JobProgressUpdate,
  type JobRecord,
  type JobTransition,
  applyProgress,
  applyTransition,
} from '../domain/job-model.js';
import { createJobLogger } from '../infrastructure/logger.js';
import { toJobErrorDetail } from './job-error-detail.js';
import type { PipelineContext } from './pipeline-context.js';
import { runTranscodeStage } from './stages/transcode-stage.js';
import { runTranscriptionStage } from './stages/transcription-stage.js';

export function audioPathFor(audioDir: string, jobId: string): string {
  return join(audioDir, `${jobId}.wav`);
}

export function transcriptPathFor(transcriptDir: string, jobId: string): string {
  return join(transcriptDir, `${jobId}.txt`);
}

// processJob.declaration()
export async function processJob(
  jobId: string,
  workerId: string,
  context: PipelineContext,
): Promise<JobRecord | null> {
  const log = createJobLogger(jobId, workerId, context.logger);

  const claim = context.repository.claimJob(jobId, workerId);
  if (claim.status !== 'claimed') {
    log.warn('Job cannot be claimed; skipping', { event: 'job_skipped', reason: claim.status });
    return null;
  }

  const commit = (type: JobEventType, updater: (job: JobRecord) => JobRecord): JobRecord => {
    const next = context.repository.updateJob(jobId, workerId, updater);
    context.hub.publish({ type, job: next });
    return next;
  };
  const transition = (change: JobTransition): JobRecord =>
    commit('job_state_changed', (job) => applyTransition(job, change));
  const progress = (update: JobProgressUpdate): void => {
    commit('job_progress', (job) => applyProgress(job, update));
  };

  const audioPath = audioPathFor(context.settings.audioDir, jobId);
  const transcriptPath = transcriptPathFor(context.settings.transcriptDir, jobId);

  try {
    let job = transition({ type: 'start' });
    log.info('Job started', { event: 'job_started' });

    try {
      const transcoded = await runTranscodeStage(
        context.transcoder,
        {
          sourcePath: job.sourcePath,
          audioPath,
        },
        progress,
      );
      job = transition({ type: 'transcode_succeeded', audioPath: transcoded.audioPath });
      log.info('Audio extracted', {
        event: 'transcode_completed',
        sourceDurationSeconds: transcoded.sourceDurationSeconds,
      });

      const transcribed = await runTranscriptionStage(
        {
          recognizer: context.recognizer,
          durationReader: context.transcoder,
          accelerator: context.accelerator,
        },
        {
          jobId,
          audioPath: transcoded.audioPath,
          transcriptPath,
          sourceDurationSeconds: transcoded.sourceDurationSeconds,
          averageSegmentSeconds: context.settings.averageSegmentSeconds,
          devicePreference: context.settings.devicePreference,
          pauseFormatting: context.settings.pauseFormatting,
        },
        progress,
      );
      job = transition({
        type: 'transcription_succeeded',
        transcriptPath: transcribed.transcriptPath,
      });
      log.info('Job completed', {
        event: 'job_completed',
        device: transcribed.device,
        segments: transcribed.segmentCount,
        estimatedSegments: transcribed.estimatedSegments,
      });
    } catch (error) {
      const detail = toJobErrorDetail(error, [
        job.sourcePath,
        audioPath,
        transcriptPath,
        context.settings.audioDir,
        context.settings.transcriptDir,
        ...(context.settings.privatePaths ?? []),
      ]);
      log.error(error instanceof Error ? error : String(error), {
        event: 'job_failed',
        stage: job.state,
        code: detail.code,
        exitCode: error instanceof ToolStageError ? error.exitCode : undefined,
        diagnostics: error instanceof ToolStageError ? error.diagnostics : undefined,
      });
      job = transition({ type: 'fail', error: detail });
    }

    return job;
  } finally {
    context.repository.releaseJob(jobId, workerId);
  }
}
