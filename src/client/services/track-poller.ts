import { EventEmitter } from 'events';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS } from '../../shared/constants.js';
import type { TrackInfo } from '../../shared/protocol.js';
import { ErrorDeduplicator, formatErrorSummary } from '../../shared/utils/error-deduplicator.js';
import { createLogger } from '../../shared/utils/logger.js';
import type { CommandClient } from './command-client.js';

const logger = createLogger('track-poller');

export interface TrackPollerEvents {
  track: (track: TrackInfo) => void;
  connectionChange: (connected: boolean) => void;
  pollError: (error: unknown) => void;
}

export interface TrackPollerOptions {
  intervalMs?: number;
  timeoutMs?: number;
}

/**
 * Polls the host for the current track while a view needs it.
 *
 * A new request is scheduled every intervalMs whether or not the previous one
 * has finished, so answers can arrive out of order: a result older than the
 * newest one already handled is dropped. stop() only stops scheduling: a
 * request already in flight is left to finish and its result is dropped.
 *
 * @example
 * ```typescript
 * const poller = new TrackPoller(new CommandClient({ host: '192.168.1.20', port: 9999 }));
 * poller.on('track', (track) => render(track));
 * poller.on('connectionChange', (connected) => showBanner(!connected));
 * poller.start();
 * ```
 */
export class TrackPoller extends EventEmitter {
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly errorDeduplicator = new ErrorDeduplicator(30000);
  private timer?: NodeJS.Timeout;
  private running = false;
  private connected: boolean | null = null;
  private lastIssued = 0;
  private lastHandled = 0;

  constructor(
    private readonly client: CommandClient,
    options: TrackPollerOptions = {}
  ) {
    super();
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.debug(`polling ${this.client.address} every ${this.intervalMs}ms`);
    this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Last known reachability of the host; null before the first answer
   */
  isConnected(): boolean | null {
    return this.connected;
  }

  private tick(): void {
    if (!this.running) return;
    this.poll(++this.lastIssued).catch((error) => {
      logger.error('Track poll failed unexpectedly:', error);
    });
    this.timer = setTimeout(() => this.tick(), this.intervalMs);
  }

  private async poll(sequence: number): Promise<void> {
    let track: TrackInfo | null;
    try {
      track = await this.client.fetchTrackInfo(this.timeoutMs);
    } catch (error) {
      if (!this.accept(sequence)) return;
      this.setConnected(false);
      this.reportError(error);
      this.emit('pollError', error);
      return;
    }

    if (!this.accept(sequence)) return;
    this.setConnected(true);

    if (!track) {
      logger.debug('Ignoring malformed track response');
      return;
    }
    this.emit('track', track);
  }

  private accept(sequence: number): boolean {
    if (!this.running || sequence < this.lastHandled) return false;
    this.lastHandled = sequence;
    return true;
  }

  private setConnected(connected: boolean): void {
    if (this.connected === connected) return;
    this.connected = connected;
    this.emit('connectionChange', connected);
  }

  private reportError(error: unknown): void {
    if (!this.errorDeduplicator.shouldLog(error)) return;

    const stats = this.errorDeduplicator.getErrorStats(error);
    if (stats && stats.count > 1) {
      logger.warn(formatErrorSummary(error, stats, this.client.address));
    } else {
      logger.warn('Track poll error:', error instanceof Error ? error.message : String(error));
    }
  }
}
