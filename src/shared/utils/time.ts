import type { TrackInfo } from '../protocol.js';

/**
 * Formats a playback position in seconds as m:ss
 */
export function formatPlaybackTime(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return '0:00';
  }
  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${minutes}:${rest.toString().padStart(2, '0')}`;
}

/**
 * Track duration in seconds
 */
export function getDurationSeconds(track: TrackInfo): number {
  return track.durationMs / 1000;
}

/**
 * Fraction of the track already played, clamped to [0, 1].
 * Zero when the duration is unknown.
 */
export function playbackProgress(track: TrackInfo): number {
  const duration = getDurationSeconds(track);
  if (duration <= 0) {
    return 0;
  }
  return Math.min(Math.max(track.positionSeconds / duration, 0), 1);
}
