import chalk from 'chalk';
import { ConfigService } from '../server/services/config-service.js';
import { isValidToken, type TrackInfo } from '../shared/protocol.js';
import { createLogger } from '../shared/utils/logger.js';
import { formatPlaybackTime, getDurationSeconds } from '../shared/utils/time.js';
import type { ClientConfig } from '../types/config.js';
import { CommandClient } from './services/command-client.js';
import { TrackPoller } from './services/track-poller.js';

const logger = createLogger('remote');

export interface ClientArgs {
  overrides: Partial<ClientConfig>;
  positional: string[];
}

function parseIntegerFlag(flag: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid value for ${flag}: ${value}`);
  }
  return parsed;
}

/**
 * Parse flags shared by the device-side commands
 */
export function parseClientArgs(args: string[]): ClientArgs {
  const overrides: Partial<ClientConfig> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--host' && i + 1 < args.length) {
      overrides.host = args[i + 1];
      i++;
    } else if (args[i] === '--port' && i + 1 < args.length) {
      overrides.port = parseIntegerFlag('--port', args[i + 1]);
      i++;
    } else if (args[i] === '--timeout' && i + 1 < args.length) {
      overrides.timeoutMs = parseIntegerFlag('--timeout', args[i + 1]);
      i++;
    } else if (args[i] === '--interval' && i + 1 < args.length) {
      overrides.pollIntervalMs = parseIntegerFlag('--interval', args[i + 1]);
      i++;
    } else if (args[i] === '--raw') {
      overrides.framing = 'raw';
    } else if (args[i].startsWith('--')) {
      logger.warn(`Ignoring unknown option: ${args[i]}`);
    } else {
      positional.push(args[i]);
    }
  }

  return { overrides, positional };
}

/**
 * One status line for the watch view, e.g. `Song — Artist [1:05 / 3:30] ▶`
 */
export function formatTrackLine(track: TrackInfo): string {
  if (!track.name) {
    return 'Nothing playing';
  }
  const position = formatPlaybackTime(track.positionSeconds);
  const duration = formatPlaybackTime(getDurationSeconds(track));
  const state = track.isPlaying ? '▶' : '⏸';
  return `${track.name} — ${track.artist} [${position} / ${duration}] ${state}`;
}

function createClient(config: Readonly<ClientConfig>): CommandClient {
  return new CommandClient(
    { host: config.host, port: config.port },
    { timeoutMs: config.timeoutMs, probeTimeoutMs: config.probeTimeoutMs, framing: config.framing }
  );
}

function loadConfig(args: string[]): { config: Readonly<ClientConfig>; positional: string[] } {
  const { overrides, positional } = parseClientArgs(args);
  const config = new ConfigService().loadClientConfig(overrides);
  return { config, positional };
}

/**
 * `remote-deck send <TOKEN>`; resolves with the process exit code
 */
export async function runSend(args: string[]): Promise<number> {
  const { config, positional } = loadConfig(args);
  const token = positional[0];
  if (!token) {
    console.error('Usage: remote-deck send <TOKEN> [--host <host>] [--port <port>]');
    return 2;
  }
  if (!isValidToken(token)) {
    logger.warn(`${token} does not look like a command token; sending it anyway`);
  }

  const result = await createClient(config).sendAction(token);
  if (!result.ok) {
    console.error(chalk.red(result.error.message));
    return 1;
  }
  console.log(result.response);
  return 0;
}

/**
 * `remote-deck probe`; resolves with the process exit code
 */
export async function runProbe(args: string[]): Promise<number> {
  const { config } = loadConfig(args);
  const client = createClient(config);
  const reachable = await client.probe();
  if (reachable) {
    console.log(chalk.green(`${client.address} reachable`));
    return 0;
  }
  console.log(chalk.red(`${client.address} unreachable`));
  return 1;
}

/**
 * `remote-deck watch`; polls until SIGINT
 */
export function runWatch(args: string[]): TrackPoller {
  const { config } = loadConfig(args);
  const client = createClient(config);
  const poller = new TrackPoller(client, {
    intervalMs: config.pollIntervalMs,
    timeoutMs: config.pollTimeoutMs,
  });

  poller.on('track', (track: TrackInfo) => {
    console.log(formatTrackLine(track));
  });
  poller.on('connectionChange', (connected: boolean) => {
    console.log(
      connected
        ? chalk.green(`Connected to ${client.address}`)
        : chalk.red(`Lost connection to ${client.address}`)
    );
  });
  poller.on('pollError', (error: unknown) => {
    logger.debug('poll failed:', error);
  });

  process.once('SIGINT', () => {
    poller.stop();
  });

  poller.start();
  return poller;
}
