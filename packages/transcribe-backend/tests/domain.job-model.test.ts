import { describe, expect, it } from 'vitest';

import { InternalError } from '@media-scribe/contracts';

import {
  InvalidJobTransitionError,
  applyProgress,
  applyTransition,
  assertTransition,
  canTransition,
  createJobRecord,
} from '../src/domain/job-model.js';

const T0 = new Date('2024-01-01T00:00:00Z');
const T1 = new Date('2024-01-01T00:00:01Z');
const T2 = new Date('2024-01-01T00:00:02Z');

function queuedJob() {
  return createJobRecord({
    id: 'job-1',
    sourcePath: '/uploads/job-1.mp4',
    originalName: 'lecture.mp4',
    fileSize: 1024,
    now: T0,
  });
}

describe('domain/job-model - job state transitions', () => {
  /**
   * Intent:
   * - Protect the two-stage lifecycle contract.
   * - Ensure terminal states are final and stages cannot be skipped.
   */

  it('allows the forward lifecycle and failure from running stages', () => {
    expect(canTransition('queued', 'transcoding')).toBe(true);
    expect(canTransition('transcoding', 'transcribing')).toBe(true);
    expect(canTransition('transcoding', 'failed')).toBe(true);
    expect(canTransition('transcribing', 'completed')).toBe(true);
    expect(canTransition('transcribing', 'failed')).toBe(true);
  });

  it('rejects skipping stages and moving backwards', () => {
    expect(canTransition('queued', 'transcribing')).toBe(false);
    expect(canTransition('queued', 'completed')).toBe(false);
    expect(canTransition('queued', 'failed')).toBe(false);
    expect(canTransition('transcoding', 'completed')).toBe(false);
    expect(canTransition('transcribing', 'transcoding')).toBe(false);
    expect(canTransition('transcoding', 'queued')).toBe(false);
  });

  it('rejects transitions out of terminal states', () => {
    for (const to of ['queued', 'transcoding', 'transcribing', 'completed', 'failed'] as const) {
      expect(canTransition('completed', to)).toBe(false);
      expect(canTransition('failed', to)).toBe(false);
    }
  });

  it('assertTransition throws InvalidJobTransitionError, which is an InternalError', () => {
    expect(() => assertTransition('queued', 'transcoding')).not.toThrow();

    let caught: unknown;
    try {
      assertTransition('completed', 'queued');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidJobTransitionError);
    expect(caught).toBeInstanceOf(InternalError);
    expect(caught).toMatchObject({ from: 'completed', to: 'queued' });
  });
});

describe('domain/job-model - records', () => {
  it('creates frozen queued records', () => {
    const job = queuedJob();

    expect(job).toMatchObject({
      id: 'job-1',
      state: 'queued',
      progress: 0,
      stageLabel: 'Queued',
      fileSize: 1024,
      audioPath: null,
      transcriptPath: null,
      startedAt: null,
      completedAt: null,
      error: null,
    });
    expect(job.createdAt).toEqual(T0);
    expect(Object.isFrozen(job)).toBe(true);
  });

  it('walks the happy path to exactly 100 and sets completedAt once', () => {
    const started = applyTransition(queuedJob(), { type: 'start' }, T1);
    expect(started.state).toBe('transcoding');
    expect(started.startedAt).toEqual(T1);

    const halfway = applyProgress(started, { progress: 30, stageLabel: 'Extracting audio (60%)' }, T1);
    const transcribing = applyTransition(
      halfway,
      { type: 'transcode_succeeded', audioPath: '/audio/job-1.wav' },
      T1,
    );
    expect(transcribing).toMatchObject({
      state: 'transcribing',
      progress: 50,
      audioPath: '/audio/job-1.wav',
    });

    const completed = applyTransition(
      transcribing,
      { type: 'transcription_succeeded', transcriptPath: '/transcripts/job-1.txt' },
      T2,
    );
    expect(completed).toMatchObject({
      state: 'completed',
      progress: 100,
      stageLabel: 'Completed',
      transcriptPath: '/transcripts/job-1.txt',
    });
    expect(completed.completedAt).toEqual(T2);
    expect(Object.isFrozen(completed)).toBe(true);
  });

  it('keeps the last progress value when failing', () => {
    const started = applyTransition(queuedJob(), { type: 'start' }, T1);
    const progressed = applyProgress(started, { progress: 25, stageLabel: 'Extracting audio' }, T1);
    const failed = applyTransition(
      progressed,
      { type: 'fail', error: { code: 'transcode_error', message: 'ffmpeg exited with code 1' } },
      T2,
    );

    expect(failed).toMatchObject({
      state: 'failed',
      progress: 25,
      stageLabel: 'Failed',
      error: { code: 'transcode_error', message: 'ffmpeg exited with code 1' },
    });
    expect(failed.completedAt).toEqual(T2);
    expect(() => applyTransition(failed, { type: 'start' })).toThrow(InvalidJobTransitionError);
  });

  it('leaves the input record untouched', () => {
    const job = queuedJob();
    applyTransition(job, { type: 'start' }, T1);
    expect(job.state).toBe('queued');
  });
});

describe('domain/job-model - progress', () => {
  const transcoding = applyTransition(queuedJob(), { type: 'start' }, T1);
  const transcribing = applyTransition(
    transcoding,
    { type: 'transcode_succeeded', audioPath: '/audio/job-1.wav' },
    T1,
  );

  it('clamps into the running stage range', () => {
    expect(applyProgress(transcoding, { progress: 80, stageLabel: 'x' }).progress).toBe(50);
    expect(applyProgress(transcoding, { progress: -5, stageLabel: 'x' }).progress).toBe(0);
    expect(applyProgress(transcribing, { progress: 10, stageLabel: 'x' }).progress).toBe(50);
    expect(applyProgress(transcribing, { progress: 140, stageLabel: 'x' }).progress).toBe(100);
    expect(applyProgress(transcoding, { progress: Number.NaN, stageLabel: 'x' }).progress).toBe(0);
  });

  it('never lowers progress but always updates the label', () => {
    const first = applyProgress(transcoding, { progress: 25, stageLabel: 'first' });
    const second = applyProgress(first, { progress: 20, stageLabel: 'second' });

    expect(second.progress).toBe(25);
    expect(second.stageLabel).toBe('second');
  });

  it('is illegal outside running states', () => {
    expect(() => applyProgress(queuedJob(), { progress: 10, stageLabel: 'x' })).toThrow(
      InternalError,
    );
  });
});
