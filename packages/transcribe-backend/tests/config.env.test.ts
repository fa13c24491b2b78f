import { resolve } from 'node:path';

import { beforeEach, describe, expect, it, vi } from 'vitest';

/**
 * Intent:
 * - Guard the configuration contract of the backend:
 *   - Every key is optional and the defaults run locally.
 *   - Present but unusable values fail fast with ConfigurationError.
 * - Does not exhaustively test every env key.
 */

async function withEnv(env: Record<string, string | undefined>, fn: () => void | Promise<void>) {
  const oldEnv = { ...process.env };
  process.env = { ...process.env, ...env };
  try {
    await fn();
  } finally {
    process.env = oldEnv;
  }
}

async function loadConfigFresh() {
  const module = await import('../src/config/env.js');
  return module.loadConfig();
}

const RESET: Record<string, undefined> = {
  HTTP_PORT: undefined,
  WORKER_CONCURRENCY: undefined,
  STORAGE_ROOT: undefined,
  ALLOWED_EXTENSIONS: undefined,
  WHISPER_DEVICE: undefined,
  WHISPER_THREADS: undefined,
  WHISPER_SEGMENT_SECONDS: undefined,
};

describe('config/env - defaults', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it('runs with no configuration at all', async () => {
    await withEnv({ ...RESET, NODE_ENV: 'test' }, async () => {
      const cfg = await loadConfigFresh();

      expect(cfg.httpPort).toBe(8000);
      expect(cfg.worker.concurrency).toBe(2);
      expect(cfg.storage.root).toBe(resolve('./storage'));
      expect(cfg.storage.uploadDir).toBe(resolve('./storage', 'uploads'));
      expect(cfg.transcoder).toMatchObject({ sampleRate: 16_000, channels: 1 });
      expect(cfg.transcriber.device).toBe('auto');
      expect(cfg.transcriber.averageSegmentSeconds).toBe(5);
      expect(cfg.upload.allowedExtensions).toContain('.mp4');
      expect(cfg.upload.allowedExtensions).toContain('.flac');
    });
  });

  it('normalizes extensions and storage locations', async () => {
    await withEnv(
      {
        ...RESET,
        ALLOWED_EXTENSIONS: 'MP4, .Wav,,ogg',
        STORAGE_ROOT: '/srv/media',
        WHISPER_DEVICE: 'GPU',
        WHISPER_THREADS: '0',
      },
      async () => {
        const cfg = await loadConfigFresh();

        expect(cfg.upload.allowedExtensions).toEqual(['.mp4', '.wav', '.ogg']);
        expect(cfg.storage.transcriptDir).toBe(resolve('/srv/media', 'transcripts'));
        expect(cfg.transcriber.device).toBe('gpu');
        expect(cfg.transcriber.threads).toBe(1);
      },
    );
  });
});

describe('config/env - invalid values', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  it('rejects a worker pool smaller than one', async () => {
    await withEnv({ ...RESET, WORKER_CONCURRENCY: '0' }, async () => {
      await expect(loadConfigFresh()).rejects.toThrow(/WORKER_CONCURRENCY must be at least 1/);
    });
  });

  it('rejects unknown accelerator modes', async () => {
    await withEnv({ ...RESET, WHISPER_DEVICE: 'tpu' }, async () => {
      await expect(loadConfigFresh()).rejects.toThrow(
        'WHISPER_DEVICE must be one of auto, gpu, cpu (got tpu)',
      );
    });
  });

  it('rejects a non-positive segment length', async () => {
    await withEnv({ ...RESET, WHISPER_SEGMENT_SECONDS: '0' }, async () => {
      await expect(loadConfigFresh()).rejects.toThrow(/WHISPER_SEGMENT_SECONDS must be positive/);
    });
  });
});
