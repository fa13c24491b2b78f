// Test doubles for the tool ports plus small async helpers.
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type {
  ComputeDevice,
  SpeechRecognitionRequest,
  SpeechRecognitionTool,
  ToolRunResult,
  TranscodeTool,
  TranscriptSegment,
} from '../../src/domain/media-tools.js';

export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let every pending promise continuation run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2_000,
  intervalMs = 5,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export interface TempStorage {
  root: string;
  uploadDir: string;
  audioDir: string;
  transcriptDir: string;
  cleanup(): Promise<void>;
}

export async function createTempStorage(): Promise<TempStorage> {
  const root = await mkdtemp(join(tmpdir(), 'media-scribe-test-'));
  const uploadDir = join(root, 'uploads');
  const audioDir = join(root, 'audio');
  const transcriptDir = join(root, 'transcripts');
  await Promise.all([uploadDir, audioDir, transcriptDir].map((dir) => mkdir(dir, { recursive: true })));
  return {
    root,
    uploadDir,
    audioDir,
    transcriptDir,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export interface FakeTranscodeScript {
  lines?: string[];
  exitCode?: number | null;
  diagnostics?: string[];
  /** Write a non-empty file at the output path. */
  writeOutput?: boolean;
  /** Thrown instead of running. */
  error?: unknown;
  /** Awaited before the run finishes. */
  gate?: Promise<void>;
}

export class FakeTranscodeTool implements TranscodeTool {
  readonly name = 'ffmpeg';
  readonly durations = new Map<string, number | null>();
  readonly transcodeCalls: Array<{ inputPath: string; outputPath: string }> = [];
  defaultDuration: number | null = null;
  script: FakeTranscodeScript;

  constructor(script: FakeTranscodeScript = {}) {
    this.script = script;
  }

  async readDuration(inputPath: string): Promise<number | null> {
    const known = this.durations.get(inputPath);
    return known === undefined ? this.defaultDuration : known;
  }

  async transcode(
    inputPath: string,
    outputPath: string,
    onProgressLine: (line: string) => void,
  ): Promise<ToolRunResult> {
    this.transcodeCalls.push({ inputPath, outputPath });
    if (this.script.error !== undefined) throw this.script.error;

    for (const line of this.script.lines ?? []) onProgressLine(line);
    if (this.script.gate) await this.script.gate;
    if (this.script.writeOutput ?? true) {
      await writeFile(outputPath, Buffer.from('RIFF-test-audio'));
    }
    return {
      exitCode: this.script.exitCode === undefined ? 0 : this.script.exitCode,
      diagnostics: this.script.diagnostics ?? [],
    };
  }
}

export interface FakeRecognitionScript {
  segments?: TranscriptSegment[];
  exitCode?: number | null;
  diagnostics?: string[];
  error?: unknown;
  gate?: Promise<void>;
}

export class FakeSpeechRecognitionTool implements SpeechRecognitionTool {
  readonly name = 'whisper-cli';
  readonly devices: ComputeDevice[] = [];
  script: FakeRecognitionScript;

  constructor(script: FakeRecognitionScript = {}) {
    this.script = script;
  }

  async recognize(request: SpeechRecognitionRequest): Promise<ToolRunResult> {
    this.devices.push(request.device);
    if (this.script.error !== undefined) throw this.script.error;

    if (this.script.gate) await this.script.gate;
    for (const segment of this.script.segments ?? []) request.onSegment(segment);
    return {
      exitCode: this.script.exitCode === undefined ? 0 : this.script.exitCode,
      diagnostics: this.script.diagnostics ?? [],
    };
  }
}

export function makeSegments(count: number, secondsEach = 5): TranscriptSegment[] {
  return Array.from({ length: count }, (_, index) => ({
    startSeconds: index * secondsEach,
    endSeconds: (index + 1) * secondsEach,
    text: `segment ${index + 1}`,
  }));
}
