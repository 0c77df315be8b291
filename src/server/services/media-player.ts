import { EMPTY_TRACK_RESPONSE } from '../../shared/protocol.js';
import type { MediaPlayerKind } from '../../types/config.js';
import { AppleScriptPlayer } from './apple-script-player.js';
import { PlayerctlPlayer } from './playerctl-player.js';

/**
 * Read-only view of the desktop's media player
 */
export interface MediaPlayer {
  readonly name: string;
  /**
   * Ask the player for the current track.
   * Always resolves with a TRACK: response line; failures become the empty one.
   */
  getTrackInfo(timeoutMs: number): Promise<string>;
}

/**
 * Player for hosts without a scriptable media player
 */
export class NullMediaPlayer implements MediaPlayer {
  readonly name = 'none';

  async getTrackInfo(): Promise<string> {
    return EMPTY_TRACK_RESPONSE;
  }
}

export function createMediaPlayer(kind: MediaPlayerKind): MediaPlayer {
  switch (kind) {
    case 'applescript':
      return new AppleScriptPlayer();
    case 'playerctl':
      return new PlayerctlPlayer();
    case 'none':
      return new NullMediaPlayer();
  }
}
