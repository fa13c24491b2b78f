import { describe, expect, it, vi } from 'vitest';

import { ProcessSpawnError, runProcess } from '../src/infrastructure/process-runner.js';

function node(script: string) {
  return { command: process.execPath, args: ['-e', script] };
}

describe('infrastructure/process-runner', () => {
  it('streams stdout lines, keeps stderr as diagnostics and reports the exit code', async () => {
    const onStdoutLine = vi.fn();
    const result = await runProcess({
      ...node("console.log('a'); console.log('b'); console.error('warn1'); process.exitCode = 3;"),
      onStdoutLine,
    });

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toEqual(['a', 'b']);
    expect(result.diagnostics).toEqual(['warn1']);
    expect(onStdoutLine.mock.calls).toEqual([['a'], ['b']]);
  });

  it('keeps only the diagnostic tail', async () => {
    const result = await runProcess({
      ...node('for (let i = 1; i <= 30; i++) console.error(`line ${i}`);'),
      diagnosticTailSize: 3,
    });

    expect(result.exitCode).toBe(0);
    expect(result.diagnostics).toEqual(['line 28', 'line 29', 'line 30']);
  });

  it('rejects with ProcessSpawnError when the executable does not exist', async () => {
    const run = runProcess({ command: '/nonexistent/media-scribe-tool', args: [] });

    await expect(run).rejects.toBeInstanceOf(ProcessSpawnError);
    await expect(run).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('kills the child and surfaces the error when a line handler throws', async () => {
    const failure = new Error('handler failed');
    const run = runProcess({
      ...node("setInterval(() => console.log('tick'), 5);"),
      onStdoutLine: () => {
        throw failure;
      },
    });

    await expect(run).rejects.toBe(failure);
  });
});
