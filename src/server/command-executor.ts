/**
 * Command Executor
 *
 * Maps a command token to a response line. Action tokens launch a detached
 * process and answer as soon as it has started; the track query asks the
 * media player and never fails.
 */

import {
  EMPTY_TRACK_RESPONSE,
  errorResponse,
  okResponse,
  TRACK_INFO_COMMAND,
  unknownResponse,
} from '../shared/protocol.js';
import { createLogger } from '../shared/utils/logger.js';
import type { CommandTable } from '../types/config.js';
import type { MediaPlayer } from './services/media-player.js';
import { launchDetached } from './utils/process-runner.js';

const logger = createLogger('command-executor');

export type CommandKind = 'query' | 'app' | 'media' | 'unknown';

export type Launcher = (argv: readonly string[]) => Promise<number | undefined>;

export interface CommandExecutorOptions {
  appCommands: CommandTable;
  mediaCommands: CommandTable;
  mediaPlayer: MediaPlayer;
  queryTimeoutMs: number;
  /** Replaces the detached process launcher */
  launch?: Launcher;
}

/**
 * Anything that turns a token into a response line
 */
export interface CommandDispatcher {
  execute(token: string): Promise<string>;
}

export class CommandExecutor implements CommandDispatcher {
  private readonly appCommands: ReadonlyMap<string, readonly string[]>;
  private readonly mediaCommands: ReadonlyMap<string, readonly string[]>;
  private readonly mediaPlayer: MediaPlayer;
  private readonly queryTimeoutMs: number;
  private readonly launch: Launcher;

  constructor(options: CommandExecutorOptions) {
    this.appCommands = new Map(Object.entries(options.appCommands));
    this.mediaCommands = new Map(Object.entries(options.mediaCommands));
    this.mediaPlayer = options.mediaPlayer;
    this.queryTimeoutMs = options.queryTimeoutMs;
    this.launch = options.launch ?? launchDetached;
  }

  /**
   * Classify a token using the dispatch precedence: query, app, media
   */
  classify(token: string): CommandKind {
    if (token === TRACK_INFO_COMMAND) return 'query';
    if (this.appCommands.has(token)) return 'app';
    if (this.mediaCommands.has(token)) return 'media';
    return 'unknown';
  }

  /**
   * Tokens this executor answers to, in dispatch order
   */
  supportedTokens(): { apps: string[]; media: string[]; query: string } {
    return {
      apps: [...this.appCommands.keys()],
      media: [...this.mediaCommands.keys()],
      query: TRACK_INFO_COMMAND,
    };
  }

  async execute(token: string): Promise<string> {
    switch (this.classify(token)) {
      case 'query':
        return this.queryTrackInfo();

      case 'app':
        return this.runAction(token, this.appCommands, `Launched ${token}`);

      case 'media':
        return this.runAction(token, this.mediaCommands, token);

      case 'unknown':
        logger.warn(`Unknown command: ${token}`);
        return unknownResponse(token);
    }
  }

  private async queryTrackInfo(): Promise<string> {
    try {
      const response = await this.mediaPlayer.getTrackInfo(this.queryTimeoutMs);
      logger.debug(`Track info: ${response}`);
      return response;
    } catch (error) {
      logger.warn('Track query failed:', error);
      return EMPTY_TRACK_RESPONSE;
    }
  }

  private async runAction(
    token: string,
    table: ReadonlyMap<string, readonly string[]>,
    description: string
  ): Promise<string> {
    const argv = table.get(token);
    if (!argv) {
      return unknownResponse(token);
    }

    try {
      const pid = await this.launch(argv);
      logger.log(`${token} → ${argv[0]} (pid ${pid ?? 'unknown'})`);
      return okResponse(description);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to launch ${token}:`, message);
      return errorResponse(message);
    }
  }
}
