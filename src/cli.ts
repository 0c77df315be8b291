#!/usr/bin/env node
import { runProbe, runSend, runWatch } from './client/remote.js';
import { startRemoteDeckServer } from './server/server.js';
import { VERSION } from './server/version.js';
import { closeLogger, createLogger, initLogger, VerbosityLevel } from './shared/utils/logger.js';
import { parseVerbosityFromEnv } from './shared/utils/verbosity-parser.js';

const verbosityLevel = parseVerbosityFromEnv();
const command = process.argv[2];
const isServe = command === undefined || command === 'serve' || command.startsWith('--');

// The host logs connections at info by default; the device commands stay quiet
initLogger(false, verbosityLevel ?? (isServe ? VerbosityLevel.INFO : VerbosityLevel.ERROR));
const logger = createLogger('cli');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error);
  closeLogger(() => process.exit(1));
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', reason);
  closeLogger(() => process.exit(1));
});

function printHelp(): void {
  console.log(`Remote Deck v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  remote-deck [serve] [options]     Start the host command server');
  console.log('  remote-deck send <TOKEN>          Send one command and print the response');
  console.log('  remote-deck probe                 Check whether the host is reachable');
  console.log('  remote-deck watch                 Poll and print the current track');
  console.log('  remote-deck version               Show version');
  console.log('  remote-deck help                  Show this help');
  console.log('');
  console.log('Client options: --host <host> --port <port> --timeout <ms> --interval <ms> --raw');
  console.log('For host options, run: remote-deck serve --help');
}

function exitWith(code: number): void {
  closeLogger(() => process.exit(code));
}

async function parseCommandAndExecute(): Promise<void> {
  const args = process.argv.slice(3);

  switch (command) {
    case 'version':
    case '--version':
      console.log(`Remote Deck v${VERSION}`);
      exitWith(0);
      break;

    case 'help':
    case '--help':
    case '-h':
      printHelp();
      exitWith(0);
      break;

    case 'send':
      exitWith(await runSend(args));
      break;

    case 'probe':
      exitWith(await runProbe(args));
      break;

    case 'watch':
      runWatch(args);
      break;

    case 'serve':
      await startRemoteDeckServer(args);
      break;

    default:
      if (command === undefined || command.startsWith('--')) {
        await startRemoteDeckServer(process.argv.slice(2));
      } else {
        console.error(`Unknown command: ${command}`);
        printHelp();
        exitWith(2);
      }
      break;
  }
}

parseCommandAndExecute().catch((error) => {
  logger.error('Fatal error:', error instanceof Error ? error.message : error);
  closeLogger(() => process.exit(1));
});
