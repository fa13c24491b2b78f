import { describe, expect, it } from 'vitest';

import { FfmpegTranscodeTool } from '../src/infrastructure/ffmpeg-transcoder.js';
import { ProcessSpawnError } from '../src/infrastructure/process-runner.js';
import { WhisperCliTool } from '../src/infrastructure/whisper-recognizer.js';

const ffmpegOptions = {
  ffmpegPath: '/nonexistent/ffmpeg',
  ffprobePath: '/nonexistent/ffprobe',
  sampleRate: 16_000,
  channels: 1,
};

describe('infrastructure/ffmpeg-transcoder', () => {
  it('builds a 16 kHz mono PCM extraction with a machine-readable progress stream', () => {
    const tool = new FfmpegTranscodeTool(ffmpegOptions);

    expect(tool.buildTranscodeArgs('in.mp4', 'out.wav')).toEqual([
      '-hide_banner',
      '-nostdin',
      '-y',
      '-i',
      'in.mp4',
      '-vn',
      '-acodec',
      'pcm_s16le',
      '-ar',
      '16000',
      '-ac',
      '1',
      '-progress',
      'pipe:1',
      '-nostats',
      'out.wav',
    ]);
  });

  it('reads only the container duration', () => {
    const tool = new FfmpegTranscodeTool(ffmpegOptions);

    expect(tool.buildDurationArgs('in.mp4')).toEqual([
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      'in.mp4',
    ]);
  });

  it('treats a missing ffprobe binary as an unknown duration', async () => {
    const tool = new FfmpegTranscodeTool(ffmpegOptions);
    await expect(tool.readDuration('in.mp4')).resolves.toBeNull();
  });

  it('rejects with ProcessSpawnError when ffmpeg is missing', async () => {
    const tool = new FfmpegTranscodeTool(ffmpegOptions);
    await expect(tool.transcode('in.mp4', 'out.wav', () => undefined)).rejects.toBeInstanceOf(
      ProcessSpawnError,
    );
  });
});

describe('infrastructure/whisper-recognizer', () => {
  const tool = new WhisperCliTool({
    whisperPath: 'whisper-cli',
    modelPath: 'models/ggml-base.bin',
    language: 'auto',
    threads: 4,
  });

  it('runs on the accelerator by default', () => {
    expect(tool.buildArgs({ audioPath: 'a.wav', device: 'gpu' })).toEqual([
      '-m',
      'models/ggml-base.bin',
      '-f',
      'a.wav',
      '-l',
      'auto',
      '-t',
      '4',
    ]);
  });

  it('disables the accelerator for cpu runs', () => {
    expect(tool.buildArgs({ audioPath: 'a.wav', device: 'cpu' }).at(-1)).toBe('-ng');
  });
});
