import { describe, expect, it } from 'vitest';
import type { TrackInfo } from '../../shared/protocol.js';
import { formatPlaybackTime, getDurationSeconds, playbackProgress } from '../../shared/utils/time.js';

const track = (durationMs: number, positionSeconds: number): TrackInfo => ({
  name: 'Test Song',
  artist: 'Test Artist',
  album: 'Test Album',
  durationMs,
  positionSeconds,
  isPlaying: true,
});

describe('time utils', () => {
  describe('formatPlaybackTime', () => {
    it('should format seconds as m:ss', () => {
      expect(formatPlaybackTime(0)).toBe('0:00');
      expect(formatPlaybackTime(5)).toBe('0:05');
      expect(formatPlaybackTime(65.9)).toBe('1:05');
      expect(formatPlaybackTime(3600)).toBe('60:00');
    });

    it('should fall back to 0:00 for invalid input', () => {
      expect(formatPlaybackTime(-1)).toBe('0:00');
      expect(formatPlaybackTime(Number.NaN)).toBe('0:00');
      expect(formatPlaybackTime(Number.POSITIVE_INFINITY)).toBe('0:00');
    });
  });

  it('should convert the duration to seconds', () => {
    expect(getDurationSeconds(track(210000, 0))).toBe(210);
  });

  describe('playbackProgress', () => {
    it('should return the played fraction', () => {
      expect(playbackProgress(track(200000, 50))).toBe(0.25);
    });

    it('should clamp past the end', () => {
      expect(playbackProgress(track(10000, 30))).toBe(1);
    });

    it('should be zero without a duration', () => {
      expect(playbackProgress(track(0, 30))).toBe(0);
    });
  });
});
