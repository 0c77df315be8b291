import { EMPTY_TRACK_RESPONSE, TRACK_PREFIX } from '../../shared/protocol.js';
import { createLogger } from '../../shared/utils/logger.js';
import { captureOutput } from '../utils/process-runner.js';
import type { MediaPlayer } from './media-player.js';

const logger = createLogger('apple-script-player');

export const NOT_PLAYING = 'NOT_PLAYING';

// Spotify reports duration in ms and player position in seconds
export const SPOTIFY_TRACK_SCRIPT = `
tell application "Spotify"
  if player state is playing or player state is paused then
    set trackName to name of current track
    set artistName to artist of current track
    set albumName to album of current track
    set trackDuration to duration of current track
    set playerPos to player position
    set isPlaying to (player state is playing)
    return trackName & "|" & artistName & "|" & albumName & "|" & trackDuration & "|" & playerPos & "|" & isPlaying
  else
    return "${NOT_PLAYING}"
  end if
end tell
`;

/**
 * Reads the current Spotify track on macOS through osascript
 */
export class AppleScriptPlayer implements MediaPlayer {
  readonly name = 'applescript';

  async getTrackInfo(timeoutMs: number): Promise<string> {
    try {
      const result = await captureOutput(['osascript', '-e', SPOTIFY_TRACK_SCRIPT], timeoutMs);

      if (result.error) {
        logger.warn('AppleScript error:', result.error.message);
        return EMPTY_TRACK_RESPONSE;
      }
      if (result.timedOut) {
        logger.warn(`AppleScript query timed out after ${timeoutMs}ms`);
        return EMPTY_TRACK_RESPONSE;
      }
      if (result.exitCode !== 0) {
        logger.debug(`osascript exited with code ${result.exitCode}`);
        return EMPTY_TRACK_RESPONSE;
      }

      const output = result.stdout.trim();
      if (output === NOT_PLAYING) {
        return EMPTY_TRACK_RESPONSE;
      }
      if (output.split('|').length >= 6) {
        return `${TRACK_PREFIX}${output}`;
      }

      logger.debug('Unexpected AppleScript output:', output);
      return EMPTY_TRACK_RESPONSE;
    } catch (error) {
      logger.warn('AppleScript error:', error);
      return EMPTY_TRACK_RESPONSE;
    }
  }
}
