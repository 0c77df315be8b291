import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ClientErrorCode, CommandClientError } from '../../shared/client-errors.js';
import { ErrorDeduplicator, formatErrorSummary } from '../../shared/utils/error-deduplicator.js';

describe('ErrorDeduplicator', () => {
  const timeout = (message: string) => new CommandClientError(ClientErrorCode.TIMEOUT, message);

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should log the first occurrence and suppress repeats within the window', () => {
    const deduplicator = new ErrorDeduplicator(1000);
    const error = timeout('timed out');

    expect(deduplicator.shouldLog(error)).toBe(true);
    expect(deduplicator.shouldLog(error)).toBe(false);
    expect(deduplicator.shouldLog(error)).toBe(false);
    expect(deduplicator.getErrorStats(error)?.count).toBe(3);
  });

  it('should log again after the window expires', () => {
    const deduplicator = new ErrorDeduplicator(50);
    const error = timeout('timed out');

    expect(deduplicator.shouldLog(error)).toBe(true);
    vi.advanceTimersByTime(49);
    expect(deduplicator.shouldLog(error)).toBe(false);
    vi.advanceTimersByTime(1);
    expect(deduplicator.shouldLog(error)).toBe(true);
    expect(deduplicator.getErrorStats(error)).toEqual({
      count: 3,
      lastLogged: Date.now(),
      firstSeen: Date.now() - 50,
    });
  });

  it('should group transport errors by code whatever the message', () => {
    const deduplicator = new ErrorDeduplicator();
    const first = timeout('No response to GET_TRACK_INFO from 10.0.0.5:9999 within 2000ms');
    const second = timeout('No response to GET_TRACK_INFO from 10.0.0.5:9999 within 1500ms');
    const refused = new CommandClientError(ClientErrorCode.CONNECTION_REFUSED, 'Connection refused by 10.0.0.5:9999');

    expect(deduplicator.shouldLog(first)).toBe(true);
    expect(deduplicator.shouldLog(second)).toBe(false);
    expect(deduplicator.shouldLog(refused)).toBe(true);
    expect(deduplicator.getErrorStats(first)?.count).toBe(2);
    expect(deduplicator.getErrorStats(refused)?.count).toBe(1);
  });

  it('should put errors that are not transport errors in one group', () => {
    const deduplicator = new ErrorDeduplicator();

    expect(deduplicator.shouldLog(new Error('boom'))).toBe(true);
    expect(deduplicator.shouldLog('something else')).toBe(false);
    expect(deduplicator.getErrorStats(timeout('timed out'))).toBeUndefined();
  });
});

describe('formatErrorSummary', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:10:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report count, duration and context', () => {
    const now = Date.now();
    const summary = formatErrorSummary(
      new Error('Connection refused'),
      { count: 12, lastLogged: now, firstSeen: now - 30000 },
      '10.0.0.5:9999'
    );

    expect(summary).toBe('Repeated error: 12 occurrences over 30s (context: 10.0.0.5:9999): Connection refused');
  });

  it('should pick the duration unit', () => {
    const now = Date.now();
    const summaryFor = (elapsed: number) =>
      formatErrorSummary(new Error('x'), { count: 2, lastLogged: now, firstSeen: now - elapsed });

    expect(summaryFor(500)).toBe('Repeated error: 2 occurrences over 500ms: x');
    expect(summaryFor(120000)).toBe('Repeated error: 2 occurrences over 2m: x');
    expect(summaryFor(7200000)).toBe('Repeated error: 2 occurrences over 2h: x');
  });
});
