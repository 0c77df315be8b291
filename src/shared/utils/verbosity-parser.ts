import { parseVerbosityLevel, VerbosityLevel } from './logger.js';

/**
 * Parse verbosity level from environment variables
 * Checks REMOTE_DECK_LOG_LEVEL first, then falls back to REMOTE_DECK_DEBUG
 * @returns The parsed verbosity level or undefined if not set
 */
export function parseVerbosityFromEnv(env: NodeJS.ProcessEnv = process.env): VerbosityLevel | undefined {
  if (env.REMOTE_DECK_LOG_LEVEL) {
    const parsed = parseVerbosityLevel(env.REMOTE_DECK_LOG_LEVEL);
    if (parsed !== undefined) {
      return parsed;
    }
    console.warn(`Invalid REMOTE_DECK_LOG_LEVEL: ${env.REMOTE_DECK_LOG_LEVEL}`);
    console.warn('Valid levels: silent, error, warn, info, verbose, debug');
  }

  if (env.REMOTE_DECK_DEBUG === '1' || env.REMOTE_DECK_DEBUG === 'true') {
    return VerbosityLevel.DEBUG;
  }

  return undefined;
}
