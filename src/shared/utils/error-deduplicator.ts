/**
 * Rate-limits repeated poll failures. Failures are grouped by transport
 * error code, so a host that stays unreachable is reported once per
 * interval whatever the message says.
 */

import { type ClientErrorCode, isCommandClientError } from '../client-errors.js';

export interface ErrorInfo {
  count: number;
  lastLogged: number;
  firstSeen: number;
}

type ErrorKey = ClientErrorCode | 'UNEXPECTED';

export class ErrorDeduplicator {
  private readonly seen = new Map<ErrorKey, ErrorInfo>();

  constructor(private readonly minLogInterval = 60000) {}

  /**
   * Count one occurrence; true when it should be logged now
   */
  shouldLog(error: unknown): boolean {
    const key = errorKey(error);
    const now = Date.now();
    const info = this.seen.get(key);

    if (!info) {
      this.seen.set(key, { count: 1, lastLogged: now, firstSeen: now });
      return true;
    }

    info.count++;
    if (now - info.lastLogged < this.minLogInterval) {
      return false;
    }
    info.lastLogged = now;
    return true;
  }

  getErrorStats(error: unknown): ErrorInfo | undefined {
    return this.seen.get(errorKey(error));
  }
}

function errorKey(error: unknown): ErrorKey {
  return isCommandClientError(error) ? error.code : 'UNEXPECTED';
}

export function formatErrorSummary(error: unknown, stats: ErrorInfo, context?: string): string {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const contextPart = context ? ` (context: ${context})` : '';
  const duration = formatDuration(Date.now() - stats.firstSeen);

  return `Repeated error: ${stats.count} occurrences over ${duration}${contextPart}: ${errorMessage}`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3600000) return `${Math.round(ms / 60000)}m`;
  return `${Math.round(ms / 3600000)}h`;
}
