// packages/transcribe-backend/src/infrastructure/pipeline-runtime.ts
// Composition root for the in-process pipeline: repository, hub, queue,
// accelerator and tool adapters wired to the application services.
import { mkdir } from 'node:fs/promises';

import type { ServiceStatusDto } from '@media-scribe/contracts';

import { processJob } from '../application/process-job.js';
import { getServiceStatus } from '../application/get-job-status.js';
import type { PipelineContext, PipelineSettings } from '../application/pipeline-context.js';
import type { TranscribeBackendConfig } from '../config/env.js';
import { JobEventHub } from '../domain/job-events.js';
import { JobRepository } from '../domain/job-repository.js';
import type { SpeechRecognitionTool, TranscodeTool } from '../domain/media-tools.js';
import { AcceleratorSemaphore } from './accelerator-semaphore.js';
import { FfmpegTranscodeTool } from './ffmpeg-transcoder.js';
import { JobQueue } from './job-queue.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { WhisperCliTool } from './whisper-recognizer.js';

export interface PipelineRuntimeOverrides {
  transcoder?: TranscodeTool;
  recognizer?: SpeechRecognitionTool;
  accelerator?: AcceleratorSemaphore;
  logger?: Logger;
}

export interface PipelineRuntime extends PipelineContext {
  queue: JobQueue;
  /** Create storage directories and launch the worker loops. */
  start(): Promise<void>;
  /** Stop intake and wait for in-flight jobs. */
  shutdown(): Promise<void>;
  status(): ServiceStatusDto;
}

// createPipelineRuntime.declaration()
export function createPipelineRuntime(
  config: TranscribeBackendConfig,
  overrides: PipelineRuntimeOverrides = {},
): PipelineRuntime {
  const log = overrides.logger ?? rootLogger;
  const repository = new JobRepository();
  const hub = new JobEventHub({ logger: log });
  const accelerator = overrides.accelerator ?? new AcceleratorSemaphore(1);
  const transcoder = overrides.transcoder ?? new FfmpegTranscodeTool(config.transcoder);
  const recognizer = overrides.recognizer ?? new WhisperCliTool(config.transcriber);

  const settings: PipelineSettings = {
    audioDir: config.storage.audioDir,
    transcriptDir: config.storage.transcriptDir,
    devicePreference: config.transcriber.device,
    averageSegmentSeconds: config.transcriber.averageSegmentSeconds,
    privatePaths: [config.storage.root, config.transcriber.modelPath],
  };

  const context: PipelineContext = {
    repository,
    hub,
    transcoder,
    recognizer,
    accelerator,
    settings,
    logger: overrides.logger,
  };

  const queue = new JobQueue({
    concurrency: config.worker.concurrency,
    processor: (jobId, workerId) => processJob(jobId, workerId, context),
    logger: log,
  });

  return {
    ...context,
    queue,
    async start() {
      await Promise.all(
        [config.storage.uploadDir, config.storage.audioDir, config.storage.transcriptDir].map(
          (dir) => mkdir(dir, { recursive: true }),
        ),
      );
      queue.start();
    },
    shutdown() {
      return queue.shutdown();
    },
    status() {
      return getServiceStatus({ repository, hub, queue });
    },
  };
}
