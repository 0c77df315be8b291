/**
 * Connection Server
 *
 * Accepts TCP connections and runs an independent exchange loop on each:
 * read one command, dispatch it, write one response, repeat until the peer
 * closes. A failing connection never affects the listener or its neighbours.
 */

import chalk from 'chalk';
import type { AddressInfo } from 'net';
import * as net from 'net';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_UNTERMINATED_FLUSH_MS, MAX_COMMAND_BYTES } from '../shared/constants.js';
import { errorResponse } from '../shared/protocol.js';
import { createLogger } from '../shared/utils/logger.js';
import type { CommandDispatcher } from './command-executor.js';
import { type CommandFrame, CommandFramer } from './command-framer.js';

const logger = createLogger('command-server');

export interface CommandServerOptions {
  port: number;
  bind: string;
  /** Quiet period after which bytes without a terminator count as one command */
  unterminatedFlushMs?: number;
  maxCommandBytes?: number;
}

/**
 * One client session on the host
 */
export class CommandConnection {
  readonly id = uuidv4();
  readonly remote: string;
  private readonly framer: CommandFramer;
  private readonly queue: CommandFrame[] = [];
  private flushTimer?: NodeJS.Timeout;
  private processing = false;
  private peerEnded = false;
  private ending = false;
  private closed = false;

  constructor(
    private readonly socket: net.Socket,
    private readonly dispatcher: CommandDispatcher,
    private readonly flushDelayMs: number,
    maxCommandBytes: number,
    private readonly onClose: (connection: CommandConnection) => void
  ) {
    this.remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.framer = new CommandFramer(maxCommandBytes);
  }

  start(): void {
    logger.log(chalk.green(`connection from ${this.remote}`) + chalk.gray(` (${this.id})`));
    this.socket.setNoDelay(true);

    this.socket.on('data', (chunk: Buffer) => {
      this.clearFlushTimer();
      this.enqueue(this.framer.push(chunk));

      if (this.framer.pendingBytes > 0) {
        this.flushTimer = setTimeout(() => {
          this.flushTimer = undefined;
          this.enqueueFlushed();
        }, this.flushDelayMs);
      }
    });

    this.socket.on('end', () => {
      this.clearFlushTimer();
      this.peerEnded = true;
      this.enqueueFlushed();
      this.finishIfIdle();
    });

    this.socket.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ECONNRESET' || error.code === 'EPIPE') {
        logger.debug(`connection ${this.remote} reset by peer`);
      } else {
        logger.error(`connection ${this.remote} error:`, error);
      }
    });

    this.socket.on('close', () => {
      this.closed = true;
      this.clearFlushTimer();
      this.queue.length = 0;
      logger.log(chalk.yellow(`connection closed: ${this.remote}`));
      this.onClose(this);
    });
  }

  /**
   * End the session from the host side
   */
  close(): void {
    this.clearFlushTimer();
    this.socket.destroy();
  }

  private clearFlushTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
  }

  private enqueueFlushed(): void {
    const frame = this.framer.flush();
    if (frame) {
      this.enqueue([frame]);
    }
  }

  private enqueue(frames: CommandFrame[]): void {
    if (frames.length === 0 || this.closed || this.ending) return;
    this.queue.push(...frames);
    this.drain().catch((error) => {
      logger.error(`connection ${this.remote} failed:`, error);
      this.close();
    });
  }

  /**
   * Process queued commands strictly one at a time
   */
  private async drain(): Promise<void> {
    if (this.processing) return;
    this.processing = true;
    this.socket.pause();

    try {
      for (let frame = this.queue.shift(); frame && !this.closed; frame = this.queue.shift()) {
        if (frame.text === '') {
          logger.debug(`empty command from ${this.remote}, ending session`);
          this.endSession();
          return;
        }

        logger.log(`${chalk.blue('>')} ${frame.text}` + chalk.gray(` from ${this.remote}`));
        const response = await this.dispatch(frame.text);
        if (this.closed) return;

        this.socket.write(frame.terminated ? `${response}\n` : response);
        logger.debug(`< ${response}`);
      }
    } finally {
      this.processing = false;
      if (!this.closed && !this.ending) {
        this.socket.resume();
        this.finishIfIdle();
      }
    }
  }

  private async dispatch(token: string): Promise<string> {
    try {
      return await this.dispatcher.execute(token);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`dispatch of ${token} failed:`, message);
      return errorResponse(message);
    }
  }

  private endSession(): void {
    this.ending = true;
    this.queue.length = 0;
    this.clearFlushTimer();
    this.socket.end(() => this.socket.destroy());
  }

  // Once the peer has half-closed and every command is answered, close our side
  private finishIfIdle(): void {
    if (
      this.peerEnded &&
      !this.processing &&
      !this.ending &&
      !this.closed &&
      this.queue.length === 0
    ) {
      this.endSession();
    }
  }
}

/**
 * TCP listener that hands each accepted socket to its own CommandConnection
 */
export class CommandServer {
  private server: net.Server | null = null;
  private readonly connections = new Set<CommandConnection>();
  private readonly flushDelayMs: number;
  private readonly maxCommandBytes: number;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly options: CommandServerOptions
  ) {
    this.flushDelayMs = options.unterminatedFlushMs ?? DEFAULT_UNTERMINATED_FLUSH_MS;
    this.maxCommandBytes = options.maxCommandBytes ?? MAX_COMMAND_BYTES;
  }

  /**
   * Start listening. Node binds TCP listeners with SO_REUSEADDR, so a
   * restarted host can take the port over at once.
   */
  start(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('Command server already started'));
    }

    return new Promise((resolve, reject) => {
      const server = net.createServer({ allowHalfOpen: true }, (socket) => {
        this.handleConnection(socket);
      });
      this.server = server;

      const onStartupError = (error: Error) => {
        this.server = null;
        reject(error);
      };
      server.once('error', onStartupError);

      server.listen({ port: this.options.port, host: this.options.bind }, () => {
        server.off('error', onStartupError);
        server.on('error', (error) => {
          logger.error('Command server error:', error);
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listener address: ${String(address)}`));
          return;
        }
        logger.log(chalk.green(`listening on ${address.address}:${address.port}`));
        resolve(address);
      });
    });
  }

  /**
   * Close the listener and every open connection
   */
  stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;

    return new Promise((resolve) => {
      server.close(() => {
        logger.log(chalk.yellow('command server stopped'));
        resolve();
      });
      for (const connection of this.connections) {
        connection.close();
      }
    });
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== 'string' ? address : null;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  private handleConnection(socket: net.Socket): void {
    const connection = new CommandConnection(
      socket,
      this.dispatcher,
      this.flushDelayMs,
      this.maxCommandBytes,
      (closed) => this.connections.delete(closed)
    );
    this.connections.add(connection);
    connection.start();
  }
}
