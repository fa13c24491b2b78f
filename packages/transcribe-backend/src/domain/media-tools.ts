// packages/transcribe-backend/src/domain/media-tools.ts
//
// Ports for the external tools the stage adapters drive. Infrastructure
// provides process-backed implementations; tests provide in-process fakes.
import type { TranscriptSegment } from './transcript-format.js';

export interface ToolRunResult {
  exitCode: number | null;
  /** Tail of the tool's diagnostic stream, oldest line first. */
  diagnostics: string[];
}

export interface TranscodeTool {
  readonly name: string;
  /** Total media duration in seconds, or null when it cannot be determined. */
  readDuration(inputPath: string): Promise<number | null>;
  /**
   * Convert `inputPath` into normalized audio at `outputPath`, handing every
   * progress line to `onProgressLine` as it arrives.
   */
  transcode(
    inputPath: string,
    outputPath: string,
    onProgressLine: (line: string) => void,
  ): Promise<ToolRunResult>;
}

export type ComputeDevice = 'gpu' | 'cpu';

export type DevicePreference = 'auto' | ComputeDevice;

export interface SpeechRecognitionRequest {
  audioPath: string;
  device: ComputeDevice;
  /** Called once per decoded segment, in audio order. */
  onSegment: (segment: TranscriptSegment) => void;
}

export interface SpeechRecognitionTool {
  readonly name: string;
  recognize(request: SpeechRecognitionRequest): Promise<ToolRunResult>;
}

export type { TranscriptSegment };
