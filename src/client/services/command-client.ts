/**
 * Command client for the device side
 *
 * Every request uses its own short-lived TCP connection: connect, send one
 * token, read one response, close. Nothing is retried.
 */

import * as net from 'net';
import {
  ClientErrorCode,
  CommandClientError,
  clientErrorFromSocketError,
} from '../../shared/client-errors.js';
import {
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  MAX_COMMAND_BYTES,
} from '../../shared/constants.js';
import {
  type ParsedResponse,
  parseResponseLine,
  parseTrackResponse,
  TRACK_INFO_COMMAND,
  type TrackInfo,
} from '../../shared/protocol.js';
import { createLogger } from '../../shared/utils/logger.js';
import type { ClientFraming } from '../../types/config.js';

const logger = createLogger('command-client');

export interface CommandTarget {
  host: string;
  port: number;
}

export interface CommandClientOptions {
  timeoutMs?: number;
  probeTimeoutMs?: number;
  /**
   * 'line' terminates requests with a newline and reads up to the newline.
   * 'raw' sends the bare token and takes the first chunk received as the
   * whole response, for hosts that do not frame their answers.
   */
  framing?: ClientFraming;
}

export type ActionResult =
  | { ok: true; response: string; parsed: ParsedResponse | null }
  | { ok: false; error: CommandClientError };

export class CommandClient {
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly framing: ClientFraming;

  constructor(
    private readonly target: CommandTarget,
    options: CommandClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.framing = options.framing ?? 'line';
  }

  get address(): string {
    return `${this.target.host}:${this.target.port}`;
  }

  /**
   * Send one token and resolve with the host's response line
   */
  send(token: string, timeoutMs = this.timeoutMs): Promise<string> {
    const target = this.address;

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.target.host, port: this.target.port });
      const chunks: Buffer[] = [];
      let received = 0;
      let settled = false;

      const settle = (error: CommandClientError | null, response?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        if (error) {
          reject(error);
        } else {
          resolve(response ?? '');
        }
      };

      const timer = setTimeout(() => {
        settle(
          new CommandClientError(
            ClientErrorCode.TIMEOUT,
            `No response to ${token} from ${target} within ${timeoutMs}ms`
          )
        );
      }, timeoutMs);

      socket.setNoDelay(true);

      socket.once('connect', () => {
        logger.debug(`connected to ${target}, sending ${token}`);
        socket.write(this.framing === 'line' ? `${token}\n` : token);
      });

      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
        received += chunk.length;
        const data = Buffer.concat(chunks);

        if (this.framing === 'raw') {
          settle(null, data.toString('utf8').trim());
          return;
        }

        const newline = data.indexOf(0x0a);
        if (newline !== -1) {
          settle(null, data.subarray(0, newline).toString('utf8').replace(/\r$/, ''));
        } else if (received >= MAX_COMMAND_BYTES) {
          settle(null, data.subarray(0, MAX_COMMAND_BYTES).toString('utf8'));
        }
      });

      socket.once('end', () => {
        if (received === 0) {
          settle(
            new CommandClientError(
              ClientErrorCode.CONNECTION_CLOSED,
              `${target} closed the connection without answering ${token}`
            )
          );
          return;
        }
        settle(null, Buffer.concat(chunks).toString('utf8').trim());
      });

      socket.on('error', (error: NodeJS.ErrnoException) => {
        settle(clientErrorFromSocketError(error, target));
      });
    });
  }

  /**
   * Fire an action token. Transport failures are logged and returned, not thrown.
   */
  async sendAction(token: string): Promise<ActionResult> {
    try {
      const response = await this.send(token);
      logger.log(`Response: ${response}`);
      return { ok: true, response, parsed: parseResponseLine(response) };
    } catch (error) {
      const clientError =
        error instanceof CommandClientError
          ? error
          : new CommandClientError(ClientErrorCode.NETWORK_ERROR, String(error), { cause: error });
      logger.warn(`Network error sending ${token}:`, clientError.message);
      return { ok: false, error: clientError };
    }
  }

  /**
   * Query the current track. Resolves null when the response is malformed;
   * rejects on transport failures.
   */
  async fetchTrackInfo(timeoutMs = this.timeoutMs): Promise<TrackInfo | null> {
    const response = await this.send(TRACK_INFO_COMMAND, timeoutMs);
    return parseTrackResponse(response);
  }

  /**
   * Check reachability with a bare TCP handshake; no command is sent
   */
  probe(timeoutMs = this.probeTimeoutMs): Promise<boolean> {
    const target = this.address;

    return new Promise((resolve) => {
      const socket = net.createConnection({ host: this.target.host, port: this.target.port });
      let settled = false;

      const settle = (reachable: boolean) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        resolve(reachable);
      };

      const timer = setTimeout(() => {
        logger.debug(`probe of ${target} timed out after ${timeoutMs}ms`);
        settle(false);
      }, timeoutMs);

      socket.once('connect', () => {
        logger.debug(`probe of ${target} succeeded`);
        settle(true);
      });

      socket.on('error', (error: Error) => {
        logger.debug(`probe of ${target} failed: ${error.message}`);
        settle(false);
      });
    });
  }
}
