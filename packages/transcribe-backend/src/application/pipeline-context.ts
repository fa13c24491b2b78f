// packages/transcribe-backend/src/application/pipeline-context.ts
//
// Dependencies handed to the application services. The composition root
// (infrastructure/pipeline-runtime.ts) builds the real ones; tests build fakes.
import type { JobEventHub } from '../domain/job-events.js';
import type { JobRepository } from '../domain/job-repository.js';
import type {
  DevicePreference,
  SpeechRecognitionTool,
  TranscodeTool,
} from '../domain/media-tools.js';
import type { PauseFormattingOptions } from '../domain/transcript-format.js';
import type { AcceleratorSemaphore } from '../infrastructure/accelerator-semaphore.js';
import type { Logger } from '../infrastructure/logger.js';

export interface JobSubmitter {
  readonly accepting: boolean;
  submit(jobId: string): void;
}

export interface JobStoreContext {
  repository: JobRepository;
  hub: JobEventHub;
}

export interface SubmissionContext extends JobStoreContext {
  queue: JobSubmitter;
}

export interface PipelineSettings {
  audioDir: string;
  transcriptDir: string;
  devicePreference: DevicePreference;
  averageSegmentSeconds: number;
  pauseFormatting?: PauseFormattingOptions;
  /** Paths scrubbed from public failure messages on top of the job's own files. */
  privatePaths?: readonly string[];
}

export interface PipelineContext extends JobStoreContext {
  transcoder: TranscodeTool;
  recognizer: SpeechRecognitionTool;
  accelerator: AcceleratorSemaphore;
  settings: PipelineSettings;
  logger?: Logger;
}
