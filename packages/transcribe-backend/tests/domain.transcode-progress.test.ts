import { describe, expect, it } from 'vitest';

import { parseClockTimestamp } from '../src/domain/timecode.js';
import {
  INDETERMINATE_TRANSCODE_PROGRESS,
  initialTranscodeState,
  isIndeterminate,
  nextTranscodeProgress,
  parseDurationOutput,
  parseTranscodeProgressLine,
} from '../src/domain/transcode-progress.js';

describe('domain/transcode-progress - interpolation', () => {
  /**
   * Intent:
   * - Stage 1 progress is a pure function of processed time and source duration.
   * - Reports never move progress backwards and never leave [0, 50].
   */

  it('maps 30s of a 60s source to 25 and keeps 25 on a later 20s report', () => {
    let state = initialTranscodeState(60);
    state = nextTranscodeProgress(30, state);
    expect(state.progress).toBe(25);

    state = nextTranscodeProgress(20, state);
    expect(state.progress).toBe(25);
  });

  it('caps at 50 when reports run past the known duration', () => {
    const state = nextTranscodeProgress(90, initialTranscodeState(60));
    expect(state.progress).toBe(50);
  });

  it('treats negative times as zero', () => {
    const state = nextTranscodeProgress(-3, initialTranscodeState(60));
    expect(state.progress).toBe(0);
  });

  it('stays monotonic over shuffled reports', () => {
    let state = initialTranscodeState(120);
    const seen: number[] = [];
    for (const seconds of [10, 5, 60, 30, 119, 0, 120]) {
      state = nextTranscodeProgress(seconds, state);
      seen.push(state.progress);
    }
    for (let index = 1; index < seen.length; index += 1) {
      expect(seen[index]).toBeGreaterThanOrEqual(seen[index - 1] ?? 0);
    }
    expect(seen.at(-1)).toBe(50);
  });

  it('falls back to a fixed midpoint when the duration is unknown', () => {
    for (const duration of [null, 0, -1, Number.NaN]) {
      const initial = initialTranscodeState(duration);
      expect(isIndeterminate(initial)).toBe(true);
      expect(nextTranscodeProgress(500, initial).progress).toBe(INDETERMINATE_TRANSCODE_PROGRESS);
    }
    expect(INDETERMINATE_TRANSCODE_PROGRESS).toBe(25);
  });
});

describe('domain/transcode-progress - output parsing', () => {
  it('reads the -progress key/value stream', () => {
    expect(parseTranscodeProgressLine('out_time_us=30000000')).toBe(30);
    expect(parseTranscodeProgressLine('out_time_ms=1500000')).toBe(1.5);
    expect(parseTranscodeProgressLine('out_time=00:01:02.500000')).toBe(62.5);
  });

  it('reads classic stats lines', () => {
    expect(
      parseTranscodeProgressLine(
        'size=     512kB time=00:00:10.50 bitrate= 399.4kbits/s speed=21.0x',
      ),
    ).toBe(10.5);
  });

  it('ignores unrelated and unavailable values', () => {
    expect(parseTranscodeProgressLine('out_time_us=N/A')).toBeNull();
    expect(parseTranscodeProgressLine('out_time=N/A')).toBeNull();
    expect(parseTranscodeProgressLine('progress=continue')).toBeNull();
    expect(parseTranscodeProgressLine('  Duration: 00:01:00.00, start: 0.000000')).toBeNull();
    expect(parseTranscodeProgressLine('')).toBeNull();
  });

  it('parses duration lookup output', () => {
    expect(parseDurationOutput('60.024000\n')).toBe(60.024);
    expect(parseDurationOutput('\n  12.5  \n')).toBe(12.5);
    expect(parseDurationOutput('N/A')).toBeNull();
    expect(parseDurationOutput('0')).toBeNull();
    expect(parseDurationOutput('')).toBeNull();
  });

  it('parses clock timestamps', () => {
    expect(parseClockTimestamp('01:02:03.5')).toBe(3723.5);
    expect(parseClockTimestamp('00:00:01,250')).toBe(1.25);
    expect(parseClockTimestamp('-00:00:00.1')).toBe(-0.1);
    expect(parseClockTimestamp('12:3')).toBeNull();
  });
});
