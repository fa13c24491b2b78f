import { describe, expect, it } from 'vitest';

import { jobRecordToDto, jobRecordToEventMessage } from '../src/application/job-dto.js';
import { applyTransition, createJobRecord } from '../src/domain/job-model.js';

describe('application/job-dto', () => {
  const created = createJobRecord({
    id: 'job-1',
    sourcePath: '/storage/uploads/job-1.mp4',
    originalName: 'lecture.mp4',
    fileSize: 100,
    now: new Date('2024-01-01T00:00:00Z'),
  });
  const failed = applyTransition(
    applyTransition(created, { type: 'start' }, new Date('2024-01-01T00:00:01Z')),
    { type: 'fail', error: { code: 'transcode_error', message: 'ffmpeg exited with code 1' } },
    new Date('2024-01-01T00:00:02Z'),
  );

  it('serializes timestamps and never exposes storage paths', () => {
    const dto = jobRecordToDto(failed);

    expect(dto).toEqual({
      jobId: 'job-1',
      originalName: 'lecture.mp4',
      fileSize: 100,
      state: 'failed',
      progress: 0,
      stageLabel: 'Failed',
      hasTranscript: false,
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:02.000Z',
      startedAt: '2024-01-01T00:00:01.000Z',
      completedAt: '2024-01-01T00:00:02.000Z',
      error: { code: 'transcode_error', message: 'ffmpeg exited with code 1' },
    });
    expect(JSON.stringify(dto)).not.toContain('/storage/');
  });

  it('copies the error so callers cannot mutate the record', () => {
    const dto = jobRecordToDto(failed);
    expect(dto.error).not.toBe(failed.error);
  });

  it('builds live event messages', () => {
    expect(jobRecordToEventMessage('job_state_changed', failed)).toEqual({
      type: 'job_state_changed',
      jobId: 'job-1',
      state: 'failed',
      progress: 0,
      stageLabel: 'Failed',
      error: { code: 'transcode_error', message: 'ffmpeg exited with code 1' },
    });
  });
});
