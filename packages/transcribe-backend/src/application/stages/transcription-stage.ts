// packages/transcribe-backend/src/application/stages/transcription-stage.ts
//
// Stage 2: normalized audio -> transcript text.
// Flow:
// 1. Estimate the segment count from the audio duration.
// 2. Lease a compute device (accelerator or CPU).
// 3. Run the recognizer; each decoded segment advances progress.
// 4. Write the pause-formatted transcript.
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { TranscriptionError } from '@media-scribe/contracts';

import type { JobProgressUpdate } from '../../domain/job-model.js';
import type {
  ComputeDevice,
  DevicePreference,
  SpeechRecognitionTool,
  ToolRunResult,
  TranscodeTool,
  TranscriptSegment,
} from '../../domain/media-tools.js';
import {
  DEFAULT_PAUSE_FORMATTING,
  type PauseFormattingOptions,
  formatSegmentsWithPauses,
} from '../../domain/transcript-format.js';
import {
  estimateSegmentCount,
  initialTranscriptionState,
  nextTranscriptionProgress,
} from '../../domain/transcription-progress.js';
import {
  type AcceleratorSemaphore,
  acquireComputeDevice,
} from '../../infrastructure/accelerator-semaphore.js';
import { describeExit, describeSpawnFailure } from './tool-errors.js';

export interface TranscriptionStageDeps {
  recognizer: SpeechRecognitionTool;
  /** Used only to read the normalized audio's duration. */
  durationReader: Pick<TranscodeTool, 'readDuration'>;
  accelerator: AcceleratorSemaphore;
}

export interface TranscriptionStageInput {
  jobId: string;
  audioPath: string;
  transcriptPath: string;
  sourceDurationSeconds: number | null;
  averageSegmentSeconds: number;
  devicePreference: DevicePreference;
  pauseFormatting?: PauseFormattingOptions;
}

export interface TranscriptionStageResult {
  transcriptPath: string;
  segmentCount: number;
  estimatedSegments: number;
  device: ComputeDevice;
}

// runTranscriptionStage.declaration()
export async function runTranscriptionStage(
  deps: TranscriptionStageDeps,
  input: TranscriptionStageInput,
  onProgress: (update: JobProgressUpdate) => void,
): Promise<TranscriptionStageResult> {
  const audioDuration = await deps.durationReader.readDuration(input.audioPath);
  const estimatedSegments = estimateSegmentCount(
    audioDuration ?? input.sourceDurationSeconds,
    input.averageSegmentSeconds,
  );

  const lease = await acquireComputeDevice(
    deps.accelerator,
    input.devicePreference,
    `transcribe:${input.jobId}`,
  );

  const segments: TranscriptSegment[] = [];
  let result: ToolRunResult;
  try {
    let state = initialTranscriptionState(estimatedSegments);
    result = await deps.recognizer.recognize({
      audioPath: input.audioPath,
      device: lease.device,
      onSegment: (segment) => {
        segments.push(segment);
        state = nextTranscriptionProgress(state);
        onProgress({
          progress: state.progress,
          stageLabel: `Transcribing segment ${state.unitsProcessed} of ~${state.estimatedUnits}`,
        });
      },
    });
  } catch (error) {
    const spawnFailure = describeSpawnFailure(deps.recognizer.name, error);
    if (spawnFailure === null) throw error;
    throw new TranscriptionError(spawnFailure, {}, { cause: error });
  } finally {
    lease.release();
  }

  if (result.exitCode !== 0) {
    throw new TranscriptionError(describeExit(deps.recognizer.name, result.exitCode), result);
  }

  const text = formatSegmentsWithPauses(segments, input.pauseFormatting ?? DEFAULT_PAUSE_FORMATTING);
  try {
    await mkdir(dirname(input.transcriptPath), { recursive: true });
    await writeFile(input.transcriptPath, text.length > 0 ? `${text}\n` : '', 'utf8');
  } catch (error) {
    throw new TranscriptionError('Failed to write transcript', {}, { cause: error });
  }

  return {
    transcriptPath: input.transcriptPath,
    segmentCount: segments.length,
    estimatedSegments,
    device: lease.device,
  };
}
