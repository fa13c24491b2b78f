// packages/transcribe-backend/src/application/stages/transcode-stage.ts
//
// Stage 1: media -> normalized audio.
// Flow:
// 1. Read the source duration (unknown duration => indeterminate progress).
// 2. Run the transcoder, turning each progress line into a bounded progress value.
// 3. Verify the audio artifact exists and is non-empty.
import { stat } from 'node:fs/promises';

import { TranscodeError } from '@media-scribe/contracts';

import type { JobProgressUpdate } from '../../domain/job-model.js';
import type { TranscodeTool, ToolRunResult } from '../../domain/media-tools.js';
import {
  initialTranscodeState,
  isIndeterminate,
  nextTranscodeProgress,
  parseTranscodeProgressLine,
} from '../../domain/transcode-progress.js';
import { describeExit, describeSpawnFailure } from './tool-errors.js';

export interface TranscodeStageInput {
  sourcePath: string;
  audioPath: string;
}

export interface TranscodeStageResult {
  audioPath: string;
  /** Source duration read before transcoding; stage 2 falls back to it. */
  sourceDurationSeconds: number | null;
}

function transcodeLabel(progress: number, indeterminate: boolean): string {
  if (indeterminate) return 'Extracting audio';
  return `Extracting audio (${Math.round((progress / 50) * 100)}%)`;
}

async function outputSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

// runTranscodeStage.declaration()
export async function runTranscodeStage(
  tool: TranscodeTool,
  input: TranscodeStageInput,
  onProgress: (update: JobProgressUpdate) => void,
): Promise<TranscodeStageResult> {
  const sourceDurationSeconds = await tool.readDuration(input.sourcePath);
  let state = initialTranscodeState(sourceDurationSeconds);
  const indeterminate = isIndeterminate(state);

  let result: ToolRunResult;
  try {
    result = await tool.transcode(input.sourcePath, input.audioPath, (line) => {
      const seconds = parseTranscodeProgressLine(line);
      if (seconds === null) return;

      const next = nextTranscodeProgress(seconds, state);
      if (next.progress <= state.progress) return;
      state = next;
      onProgress({
        progress: state.progress,
        stageLabel: transcodeLabel(state.progress, indeterminate),
      });
    });
  } catch (error) {
    const spawnFailure = describeSpawnFailure(tool.name, error);
    if (spawnFailure === null) throw error;
    throw new TranscodeError(spawnFailure, {}, { cause: error });
  }

  if (result.exitCode !== 0) {
    throw new TranscodeError(describeExit(tool.name, result.exitCode), result);
  }

  if ((await outputSize(input.audioPath)) === 0) {
    throw new TranscodeError(`${tool.name} produced no audio output`, result);
  }

  return { audioPath: input.audioPath, sourceDurationSeconds };
}
