import { EMPTY_TRACK_RESPONSE, formatTrackResponse } from '../../shared/protocol.js';
import { createLogger } from '../../shared/utils/logger.js';
import { captureOutput } from '../utils/process-runner.js';
import type { MediaPlayer } from './media-player.js';

const logger = createLogger('playerctl-player');

// Tab-separated so titles containing | survive; length and position are in µs
export const PLAYERCTL_FORMAT =
  '{{title}}\t{{artist}}\t{{album}}\t{{mpris:length}}\t{{position}}\t{{status}}';

function microsecondsToMs(value: string): number | null {
  if (value.trim() === '') return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? Math.round(parsed / 1000) : null;
}

function microsecondsToSeconds(value: string): number | null {
  const ms = microsecondsToMs(value);
  return ms === null ? null : ms / 1000;
}

/**
 * Converts one line of playerctl output into a TRACK: response
 */
export function parsePlayerctlOutput(output: string): string {
  const fields = output.replace(/\r?\n$/, '').split('\t');
  if (fields.length < 6) {
    return EMPTY_TRACK_RESPONSE;
  }

  const [name, artist, album, lengthRaw, positionRaw, status] = fields;
  if (status !== 'Playing' && status !== 'Paused') {
    return EMPTY_TRACK_RESPONSE;
  }

  const durationMs = microsecondsToMs(lengthRaw);
  const positionSeconds = microsecondsToSeconds(positionRaw);
  if (durationMs === null || positionSeconds === null) {
    return EMPTY_TRACK_RESPONSE;
  }

  return formatTrackResponse({
    name,
    artist,
    album,
    durationMs,
    positionSeconds,
    isPlaying: status === 'Playing',
  });
}

/**
 * Reads the current track from any MPRIS player on Linux through playerctl
 */
export class PlayerctlPlayer implements MediaPlayer {
  readonly name = 'playerctl';

  async getTrackInfo(timeoutMs: number): Promise<string> {
    const result = await captureOutput(['playerctl', 'metadata', '--format', PLAYERCTL_FORMAT], timeoutMs);

    if (result.error) {
      logger.warn('playerctl error:', result.error.message);
      return EMPTY_TRACK_RESPONSE;
    }
    if (result.timedOut) {
      logger.warn(`playerctl query timed out after ${timeoutMs}ms`);
      return EMPTY_TRACK_RESPONSE;
    }
    // Exit code 1 means no player is running
    if (result.exitCode !== 0) {
      return EMPTY_TRACK_RESPONSE;
    }

    return parsePlayerctlOutput(result.stdout);
  }
}
