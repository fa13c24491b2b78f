// packages/transcribe-backend/src/infrastructure/ffmpeg-transcoder.ts
// ffmpeg/ffprobe implementation of the TranscodeTool port.
// Output is 16-bit PCM mono WAV at the configured sample rate.
import type { ToolRunResult, TranscodeTool } from '../domain/media-tools.js';
import { parseDurationOutput } from '../domain/transcode-progress.js';
import { logger } from './logger.js';
import { runProcess } from './process-runner.js';

export interface FfmpegTranscodeToolOptions {
  ffmpegPath: string;
  ffprobePath: string;
  sampleRate: number;
  channels: number;
}

export class FfmpegTranscodeTool implements TranscodeTool {
  readonly name = 'ffmpeg';
  private readonly options: FfmpegTranscodeToolOptions;

  constructor(options: FfmpegTranscodeToolOptions) {
    this.options = options;
  }

  buildDurationArgs(inputPath: string): string[] {
    return [
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      inputPath,
    ];
  }

  buildTranscodeArgs(inputPath: string, outputPath: string): string[] {
    return [
      '-hide_banner',
      '-nostdin',
      '-y',
      '-i',
      inputPath,
      '-vn',
      '-acodec',
      'pcm_s16le',
      '-ar',
      String(this.options.sampleRate),
      '-ac',
      String(this.options.channels),
      '-progress',
      'pipe:1',
      '-nostats',
      outputPath,
    ];
  }

  async readDuration(inputPath: string): Promise<number | null> {
    try {
      const result = await runProcess({
        command: this.options.ffprobePath,
        args: this.buildDurationArgs(inputPath),
      });
      if (result.exitCode !== 0) {
        logger.warn('Duration lookup exited with non-zero code', {
          event: 'duration_lookup_failed',
          exitCode: result.exitCode,
          diagnostics: result.diagnostics.slice(-3),
        });
        return null;
      }
      return parseDurationOutput(result.stdout.join('\n'));
    } catch (error) {
      // Missing ffprobe: progress falls back to indeterminate.
      logger.warn('Duration lookup could not run', {
        event: 'duration_lookup_failed',
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async transcode(
    inputPath: string,
    outputPath: string,
    onProgressLine: (line: string) => void,
  ): Promise<ToolRunResult> {
    const result = await runProcess({
      command: this.options.ffmpegPath,
      args: this.buildTranscodeArgs(inputPath, outputPath),
      onStdoutLine: onProgressLine,
      // Classic `time=` stats lines arrive on stderr.
      onStderrLine: onProgressLine,
    });
    return { exitCode: result.exitCode, diagnostics: result.diagnostics };
  }
}
