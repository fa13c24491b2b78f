// packages/transcribe-backend/src/infrastructure/whisper-recognizer.ts
// whisper.cpp (`whisper-cli`) implementation of the SpeechRecognitionTool port.
// Each decoded segment is printed on stdout as `[start --> end]  text`.
import type {
  SpeechRecognitionRequest,
  SpeechRecognitionTool,
  ToolRunResult,
} from '../domain/media-tools.js';
import { parseSegmentLine } from '../domain/transcript-format.js';
import { runProcess } from './process-runner.js';

export interface WhisperCliToolOptions {
  whisperPath: string;
  modelPath: string;
  language: string;
  threads: number;
}

export class WhisperCliTool implements SpeechRecognitionTool {
  readonly name = 'whisper-cli';
  private readonly options: WhisperCliToolOptions;

  constructor(options: WhisperCliToolOptions) {
    this.options = options;
  }

  buildArgs(request: Pick<SpeechRecognitionRequest, 'audioPath' | 'device'>): string[] {
    const args = [
      '-m',
      this.options.modelPath,
      '-f',
      request.audioPath,
      '-l',
      this.options.language,
      '-t',
      String(this.options.threads),
    ];
    if (request.device === 'cpu') {
      args.push('-ng');
    }
    return args;
  }

  async recognize(request: SpeechRecognitionRequest): Promise<ToolRunResult> {
    const result = await runProcess({
      command: this.options.whisperPath,
      args: this.buildArgs(request),
      onStdoutLine: (line) => {
        const segment = parseSegmentLine(line);
        if (segment) request.onSegment(segment);
      },
    });
    return { exitCode: result.exitCode, diagnostics: result.diagnostics };
  }
}
