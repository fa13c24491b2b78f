// packages/transcribe-backend/src/application/stages/tool-errors.ts
import { ProcessSpawnError } from '../../infrastructure/process-runner.js';

/**
 * Public wording for a tool that could not be started. The spawn error's own
 * message is kept as the cause for the logs.
 */
export function describeSpawnFailure(toolName: string, error: unknown): string | null {
  if (!(error instanceof ProcessSpawnError)) return null;
  return error.code === 'ENOENT'
    ? `${toolName} executable not found`
    : `${toolName} could not be started (${error.code ?? 'unknown error'})`;
}

export function describeExit(toolName: string, exitCode: number | null): string {
  return exitCode === null
    ? `${toolName} was terminated by a signal`
    : `${toolName} exited with code ${exitCode}`;
}
