import chalk from 'chalk';
import type { AddressInfo } from 'net';
import { closeLogger, createLogger, initLogger } from '../shared/utils/logger.js';
import type { HostConfig } from '../types/config.js';
import { CommandExecutor } from './command-executor.js';
import { CommandServer } from './command-server.js';
import { ConfigService } from './services/config-service.js';
import { createMediaPlayer } from './services/media-player.js';
import { MDNSService } from './services/mdns-service.js';
import { getLocalAddresses } from './utils/network.js';
import { VERSION } from './version.js';

const logger = createLogger('server');

export interface ServerArgs {
  port?: number;
  bind?: string;
  configPath?: string;
  advertise?: boolean;
  serviceName?: string;
  debug?: boolean;
  logFile?: string;
  showHelp?: boolean;
}

/**
 * Parse `serve` flags. Only flags that were given appear in the result, so
 * they can be laid over the loaded config without masking it.
 */
export function parseServerArgs(args: string[]): ServerArgs {
  const config: ServerArgs = {};

  if (args.includes('--help') || args.includes('-h')) {
    config.showHelp = true;
    return config;
  }

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--port' && i + 1 < args.length) {
      const port = Number.parseInt(args[i + 1], 10);
      if (Number.isNaN(port)) {
        throw new Error(`Invalid port: ${args[i + 1]}`);
      }
      config.port = port;
      i++;
    } else if (args[i] === '--bind' && i + 1 < args.length) {
      config.bind = args[i + 1];
      i++;
    } else if (args[i] === '--config' && i + 1 < args.length) {
      config.configPath = args[i + 1];
      i++;
    } else if (args[i] === '--name' && i + 1 < args.length) {
      config.serviceName = args[i + 1];
      i++;
    } else if (args[i] === '--log-file' && i + 1 < args.length) {
      config.logFile = args[i + 1];
      i++;
    } else if (args[i] === '--advertise') {
      config.advertise = true;
    } else if (args[i] === '--debug') {
      config.debug = true;
    } else if (args[i].startsWith('--')) {
      logger.warn(`Ignoring unknown option: ${args[i]}`);
    }
  }

  return config;
}

export function hostOverrides(args: ServerArgs): Partial<HostConfig> {
  const overrides: Partial<HostConfig> = {};
  if (args.port !== undefined) overrides.port = args.port;
  if (args.bind !== undefined) overrides.bind = args.bind;
  if (args.advertise !== undefined) overrides.advertise = args.advertise;
  if (args.serviceName !== undefined) overrides.serviceName = args.serviceName;
  return overrides;
}

export function printServerHelp(): void {
  console.log(`Remote Deck host v${VERSION}`);
  console.log('');
  console.log('Usage: remote-deck serve [options]');
  console.log('');
  console.log('Options:');
  console.log('  --port <number>     Port to listen on (default: 9999)');
  console.log('  --bind <address>    Address to bind (default: 0.0.0.0)');
  console.log('  --config <file>     JSON config file (default: ~/.remote-deck/config.json)');
  console.log('  --advertise         Advertise the host over mDNS');
  console.log('  --name <name>       mDNS instance name (default: hostname)');
  console.log('  --log-file <file>   Also append log lines to a file');
  console.log('  --debug             Enable debug logging');
}

function printBanner(address: AddressInfo, executor: CommandExecutor, playerName: string): void {
  const tokens = executor.supportedTokens();
  console.log(chalk.green(`Remote Deck host v${VERSION} listening on port ${address.port}`));

  const lanAddresses = getLocalAddresses();
  if (address.address === '0.0.0.0' && lanAddresses.length > 0) {
    for (const lanAddress of lanAddresses) {
      console.log(chalk.gray(`  reachable at ${lanAddress}:${address.port}`));
    }
  } else {
    console.log(chalk.gray(`  bound to ${address.address}:${address.port}`));
  }

  console.log(chalk.blue(`  apps:  ${tokens.apps.join(', ') || '(none)'}`));
  console.log(chalk.blue(`  media: ${tokens.media.join(', ') || '(none)'}`));
  console.log(chalk.blue(`  query: ${tokens.query} (${playerName})`));
}

export interface RunningHost {
  config: Readonly<HostConfig>;
  server: CommandServer;
  address: AddressInfo;
  shutdown: () => Promise<void>;
}

/**
 * Build the host from its config and start listening.
 * Does not install signal handlers; see startRemoteDeckServer.
 */
export async function createHost(args: ServerArgs, configService?: ConfigService): Promise<RunningHost> {
  const service = configService ?? new ConfigService({ configPath: args.configPath });
  const config = service.loadHostConfig(hostOverrides(args));

  const mediaPlayer = createMediaPlayer(config.mediaPlayer);
  const executor = new CommandExecutor({
    appCommands: config.appCommands,
    mediaCommands: config.mediaCommands,
    mediaPlayer,
    queryTimeoutMs: config.queryTimeoutMs,
  });

  const server = new CommandServer(executor, {
    port: config.port,
    bind: config.bind,
    unterminatedFlushMs: config.unterminatedFlushMs,
  });
  const address = await server.start();
  printBanner(address, executor, mediaPlayer.name);

  const mdns = new MDNSService();
  if (config.advertise) {
    try {
      await mdns.startAdvertising(address.port, config.serviceName);
    } catch (error) {
      logger.warn('Continuing without mDNS advertisement:', error);
    }
  }

  const shutdown = async () => {
    await mdns.stopAdvertising();
    await server.stop();
  };

  return { config, server, address, shutdown };
}

/**
 * Entry point for `remote-deck serve`
 */
export async function startRemoteDeckServer(argv: string[]): Promise<void> {
  const args = parseServerArgs(argv);
  if (args.showHelp) {
    printServerHelp();
    return;
  }

  if (args.debug || args.logFile) {
    initLogger(args.debug ?? false, undefined, args.logFile);
  }

  const host = await createHost(args);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log(chalk.yellow(`Received ${signal}, shutting down...`));

    host
      .shutdown()
      .then(() => {
        closeLogger(() => process.exit(0));
      })
      .catch((error) => {
        logger.error('Error during shutdown:', error);
        closeLogger(() => process.exit(1));
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
