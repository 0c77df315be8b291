import { afterEach, describe, expect, it, vi } from 'vitest';
import { VerbosityLevel } from '../../shared/utils/logger.js';
import { parseVerbosityFromEnv } from '../../shared/utils/verbosity-parser.js';

describe('Verbosity Parser', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return undefined when no environment variables are set', () => {
    expect(parseVerbosityFromEnv({})).toBeUndefined();
  });

  it('should parse REMOTE_DECK_LOG_LEVEL', () => {
    expect(parseVerbosityFromEnv({ REMOTE_DECK_LOG_LEVEL: 'info' })).toBe(VerbosityLevel.INFO);
    expect(parseVerbosityFromEnv({ REMOTE_DECK_LOG_LEVEL: 'DEBUG' })).toBe(VerbosityLevel.DEBUG);
    expect(parseVerbosityFromEnv({ REMOTE_DECK_LOG_LEVEL: 'silent' })).toBe(VerbosityLevel.SILENT);
  });

  it('should warn about an invalid REMOTE_DECK_LOG_LEVEL', () => {
    const consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(parseVerbosityFromEnv({ REMOTE_DECK_LOG_LEVEL: 'invalid' })).toBeUndefined();

    expect(consoleWarnSpy).toHaveBeenCalledTimes(2);
    expect(consoleWarnSpy).toHaveBeenCalledWith('Invalid REMOTE_DECK_LOG_LEVEL: invalid');
    expect(consoleWarnSpy).toHaveBeenCalledWith('Valid levels: silent, error, warn, info, verbose, debug');
  });

  it('should handle REMOTE_DECK_DEBUG', () => {
    expect(parseVerbosityFromEnv({ REMOTE_DECK_DEBUG: '1' })).toBe(VerbosityLevel.DEBUG);
    expect(parseVerbosityFromEnv({ REMOTE_DECK_DEBUG: 'true' })).toBe(VerbosityLevel.DEBUG);
    expect(parseVerbosityFromEnv({ REMOTE_DECK_DEBUG: 'yes' })).toBeUndefined();
  });

  it('should prefer REMOTE_DECK_LOG_LEVEL over REMOTE_DECK_DEBUG', () => {
    expect(parseVerbosityFromEnv({ REMOTE_DECK_LOG_LEVEL: 'warn', REMOTE_DECK_DEBUG: '1' })).toBe(
      VerbosityLevel.WARN
    );
  });

  it('should fall back to REMOTE_DECK_DEBUG when the level is invalid', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(parseVerbosityFromEnv({ REMOTE_DECK_LOG_LEVEL: 'loud', REMOTE_DECK_DEBUG: 'true' })).toBe(
      VerbosityLevel.DEBUG
    );
  });
});
