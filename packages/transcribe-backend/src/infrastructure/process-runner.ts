// packages/transcribe-backend/src/infrastructure/process-runner.ts
// Child-process runner shared by the transcoder and recognizer adapters.
// Output streams are read line by line; a bounded tail of stderr is kept
// for diagnostics.
import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface RunProcessOptions {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
  /** Number of stderr lines kept for diagnostics. */
  diagnosticTailSize?: number;
}

export interface RunProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string[];
  diagnostics: string[];
}

export const DEFAULT_DIAGNOSTIC_TAIL = 20;

/**
 * Raised when the executable cannot be started at all (missing binary,
 * permission denied). Carries the system error code when there is one.
 */
export class ProcessSpawnError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: Error) {
    super(`Failed to start ${command}: ${cause.message}`, { cause });
    this.name = 'ProcessSpawnError';
    this.command = command;
    this.code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
  }
}

function pushTail(buffer: string[], line: string, limit: number): void {
  buffer.push(line);
  if (buffer.length > limit) buffer.splice(0, buffer.length - limit);
}

// runProcess.declaration()
export function runProcess(options: RunProcessOptions): Promise<RunProcessResult> {
  const tailSize = options.diagnosticTailSize ?? DEFAULT_DIAGNOSTIC_TAIL;

  return new Promise<RunProcessResult>((resolve, reject) => {
    const child = spawn(options.command, [...options.args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: string[] = [];
    const diagnostics: string[] = [];
    let callbackError: unknown = null;
    let settled = false;

    const settle = (action: () => void): void => {
      if (settled) return;
      settled = true;
      action();
    };

    // A throwing line handler aborts the run; the child is killed and the
    // handler's error is what the caller sees.
    const guard = (handler: ((line: string) => void) | undefined, line: string): void => {
      if (!handler || callbackError !== null) return;
      try {
        handler(line);
      } catch (error) {
        callbackError = error;
        child.kill('SIGKILL');
      }
    };

    const stdoutLines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    const stderrLines = createInterface({ input: child.stderr, crlfDelay: Infinity });

    const stdoutClosed = new Promise<void>((done) => stdoutLines.once('close', done));
    const stderrClosed = new Promise<void>((done) => stderrLines.once('close', done));

    stdoutLines.on('line', (line) => {
      pushTail(stdout, line, tailSize);
      guard(options.onStdoutLine, line);
    });
    stderrLines.on('line', (line) => {
      pushTail(diagnostics, line, tailSize);
      guard(options.onStderrLine, line);
    });

    child.once('error', (error) => {
      settle(() => reject(new ProcessSpawnError(options.command, error)));
    });

    child.once('close', (exitCode, signal) => {
      void Promise.all([stdoutClosed, stderrClosed]).then(() => {
        settle(() => {
          if (callbackError !== null) {
            reject(callbackError);
            return;
          }
          resolve({ exitCode, signal, stdout, diagnostics });
        });
      });
    });
  });
}
