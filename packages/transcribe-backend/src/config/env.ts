// packages/transcribe-backend/src/config/env.ts
// Centralized environment-based configuration for the transcribe-backend.
// - Safe local defaults; every key is optional.
// - Only throws when a value is present but unusable.
import { join, resolve } from 'node:path';
import { ConfigurationError } from '@media-scribe/contracts';
import {
  readEnum,
  readInt,
  readList,
  readNumber,
  readString,
} from '@media-scribe/shared-infrastructure';
import type { DevicePreference } from '../domain/media-tools.js';

export const DEFAULT_ALLOWED_EXTENSIONS: readonly string[] = [
  '.mp4',
  '.avi',
  '.mkv',
  '.mov',
  '.webm',
  '.flv',
  '.wmv',
  '.mp3',
  '.wav',
  '.m4a',
  '.flac',
  '.ogg',
  '.aac',
];

export interface TranscribeBackendConfig {
  httpPort: number;
  httpHost: string;
  worker: {
    concurrency: number;
  };
  storage: {
    root: string;
    uploadDir: string;
    audioDir: string;
    transcriptDir: string;
  };
  upload: {
    maxFileSize: number;
    allowedExtensions: string[];
  };
  transcoder: {
    ffmpegPath: string;
    ffprobePath: string;
    sampleRate: number;
    channels: number;
  };
  transcriber: {
    whisperPath: string;
    modelPath: string;
    language: string;
    threads: number;
    device: DevicePreference;
    averageSegmentSeconds: number;
  };
  liveUpdates: {
    heartbeatIntervalMs: number;
    idleTimeoutMs: number;
  };
}

const DEVICE_PREFERENCES: readonly DevicePreference[] = ['auto', 'gpu', 'cpu'];

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

// loadConfig.declaration()
export function loadConfig(): TranscribeBackendConfig {
  const httpPort = readInt('HTTP_PORT', 8000);
  const httpHost = readString('HTTP_HOST', '0.0.0.0');

  const concurrency = readInt('WORKER_CONCURRENCY', 2);
  if (concurrency < 1) {
    throw new ConfigurationError(`WORKER_CONCURRENCY must be at least 1 (got ${concurrency})`);
  }

  const root = resolve(readString('STORAGE_ROOT', './storage'));

  const maxFileSize = readInt('MAX_UPLOAD_BYTES', 2 * 1024 * 1024 * 1024);
  const allowedExtensions = readList('ALLOWED_EXTENSIONS', DEFAULT_ALLOWED_EXTENSIONS).map(
    normalizeExtension,
  );

  const device = readEnum('WHISPER_DEVICE', DEVICE_PREFERENCES, 'auto');
  if (!device) {
    throw new ConfigurationError(
      `WHISPER_DEVICE must be one of ${DEVICE_PREFERENCES.join(', ')} (got ${readString('WHISPER_DEVICE', '')})`,
    );
  }

  const averageSegmentSeconds = readNumber('WHISPER_SEGMENT_SECONDS', 5);
  if (averageSegmentSeconds <= 0) {
    throw new ConfigurationError(
      `WHISPER_SEGMENT_SECONDS must be positive (got ${averageSegmentSeconds})`,
    );
  }

  return {
    httpPort,
    httpHost,
    worker: {
      concurrency,
    },
    storage: {
      root,
      uploadDir: join(root, 'uploads'),
      audioDir: join(root, 'audio'),
      transcriptDir: join(root, 'transcripts'),
    },
    upload: {
      maxFileSize,
      allowedExtensions,
    },
    transcoder: {
      ffmpegPath: readString('FFMPEG_PATH', 'ffmpeg'),
      ffprobePath: readString('FFPROBE_PATH', 'ffprobe'),
      sampleRate: readInt('AUDIO_SAMPLE_RATE', 16_000),
      channels: 1,
    },
    transcriber: {
      whisperPath: readString('WHISPER_PATH', 'whisper-cli'),
      modelPath: readString('WHISPER_MODEL', 'models/ggml-large-v3.bin'),
      language: readString('WHISPER_LANGUAGE', 'auto'),
      threads: Math.max(readInt('WHISPER_THREADS', 4), 1),
      device,
      averageSegmentSeconds,
    },
    liveUpdates: {
      heartbeatIntervalMs: readInt('LIVE_HEARTBEAT_INTERVAL_MS', 25_000),
      idleTimeoutMs: readInt('LIVE_IDLE_TIMEOUT_MS', 90_000),
    },
  };
}
