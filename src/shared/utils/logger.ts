import chalk from 'chalk';
import * as fs from 'fs';

/**
 * Verbosity levels, ordered from quietest to noisiest.
 * A message is printed when its level is at or below the current level.
 */
export enum VerbosityLevel {
  SILENT = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  VERBOSE = 4,
  DEBUG = 5,
}

export const VERBOSITY_MAP: Record<string, VerbosityLevel> = {
  silent: VerbosityLevel.SILENT,
  error: VerbosityLevel.ERROR,
  warn: VerbosityLevel.WARN,
  info: VerbosityLevel.INFO,
  verbose: VerbosityLevel.VERBOSE,
  debug: VerbosityLevel.DEBUG,
};

type LogMethod = (...args: unknown[]) => void;

export interface Logger {
  log: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  debug: LogMethod;
  verbose: LogMethod;
  setDebugMode: (enabled: boolean) => void;
  setVerbosity: (level: VerbosityLevel) => void;
}

let verbosityLevel = VerbosityLevel.ERROR;
let logFileStream: fs.WriteStream | null = null;

export function isVerbosityLevel(value: string): boolean {
  return Object.hasOwn(VERBOSITY_MAP, value.toLowerCase());
}

export function parseVerbosityLevel(value: string): VerbosityLevel | undefined {
  const key = value.toLowerCase();
  return Object.hasOwn(VERBOSITY_MAP, key) ? VERBOSITY_MAP[key] : undefined;
}

export function setVerbosityLevel(level: VerbosityLevel): void {
  verbosityLevel = level;
}

export function getVerbosityLevel(): VerbosityLevel {
  return verbosityLevel;
}

export function isDebugEnabled(): boolean {
  return verbosityLevel >= VerbosityLevel.DEBUG;
}

export function isVerbose(): boolean {
  return verbosityLevel >= VerbosityLevel.VERBOSE;
}

/**
 * Enable or disable debug output for all loggers
 */
export function setDebugMode(enabled: boolean): void {
  verbosityLevel = enabled ? VerbosityLevel.DEBUG : VerbosityLevel.ERROR;
}

/**
 * Initialize logging once at process start.
 * Debug mode wins over an explicit level; a log file receives every
 * printed line without colors.
 */
export function initLogger(debugMode = false, level?: VerbosityLevel, logFile?: string): void {
  if (debugMode) {
    verbosityLevel = VerbosityLevel.DEBUG;
  } else if (level !== undefined) {
    verbosityLevel = level;
  }

  if (logFile && !logFileStream) {
    logFileStream = fs.createWriteStream(logFile, { flags: 'a' });
    logFileStream.on('error', (error) => {
      console.error(`Failed to write log file ${logFile}:`, error.message);
      logFileStream = null;
    });
  }
}

/**
 * Flush and close the log file, if any. onClosed runs once every queued
 * line is written, so callers can exit the process from it.
 */
export function closeLogger(onClosed?: () => void): void {
  const stream = logFileStream;
  logFileStream = null;
  if (!stream) {
    onClosed?.();
    return;
  }
  stream.end(() => onClosed?.());
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function writeToFile(label: string, module: string, message: string): void {
  logFileStream?.write(`${new Date().toISOString()} ${label} [${module}] ${message}\n`);
}

/**
 * Create a logger whose lines are prefixed with the module name
 */
export function createLogger(module: string): Logger {
  const emit = (
    minLevel: VerbosityLevel,
    label: string,
    color: (text: string) => string,
    sink: (line: string) => void,
    args: unknown[]
  ) => {
    if (verbosityLevel < minLevel) return;
    const message = args.map(formatArg).join(' ');
    const timestamp = chalk.gray(new Date().toISOString());
    sink(`${timestamp} ${color(label)} ${chalk.cyan(`[${module}]`)} ${message}`);
    writeToFile(label, module, message);
  };

  const info: LogMethod = (...args) =>
    emit(VerbosityLevel.INFO, 'LOG', chalk.green, console.log, args);

  return {
    log: info,
    info,
    warn: (...args) => emit(VerbosityLevel.WARN, 'WARN', chalk.yellow, console.warn, args),
    error: (...args) => emit(VerbosityLevel.ERROR, 'ERROR', chalk.red, console.error, args),
    verbose: (...args) => emit(VerbosityLevel.VERBOSE, 'VERBOSE', chalk.blue, console.log, args),
    debug: (...args) => emit(VerbosityLevel.DEBUG, 'DEBUG', chalk.magenta, console.log, args),
    setDebugMode,
    setVerbosity: setVerbosityLevel,
  };
}
