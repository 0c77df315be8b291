/**
 * Child process helpers for the command executor
 *
 * Actions are launched detached and never awaited past the launch itself.
 * Queries capture stdout under a hard timeout and never reject.
 */

import { type ChildProcess, spawn } from 'child_process';
import { createLogger } from '../../shared/utils/logger.js';

const logger = createLogger('process-runner');

export interface CaptureResult {
  exitCode: number | null;
  stdout: string;
  timedOut: boolean;
  error?: Error;
}

/**
 * Spawn argv detached from this process with no shell.
 *
 * Resolves with the child's pid once the OS reports the process started and
 * rejects when it could not be started (missing program, empty argv, bad
 * arguments). The child's exit status is never observed.
 */
export function launchDetached(argv: readonly string[]): Promise<number | undefined> {
  return new Promise((resolve, reject) => {
    const [command, ...args] = argv;
    if (!command) {
      reject(new Error('Cannot launch an empty command'));
      return;
    }

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        detached: true,
        stdio: 'ignore',
      });
    } catch (error) {
      reject(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    let started = false;

    child.once('spawn', () => {
      started = true;
      child.unref();
      resolve(child.pid);
    });

    child.on('error', (error) => {
      if (started) {
        logger.warn(`Launched process ${command} reported an error:`, error.message);
        return;
      }
      reject(error);
    });
  });
}

/**
 * Run argv to completion and collect stdout, killing it after timeoutMs
 */
export function captureOutput(argv: readonly string[], timeoutMs: number): Promise<CaptureResult> {
  return new Promise((resolve) => {
    const [command, ...args] = argv;
    if (!command) {
      resolve({
        exitCode: null,
        stdout: '',
        timedOut: false,
        error: new Error('Cannot run an empty command'),
      });
      return;
    }

    let settled = false;
    const finish = (result: CaptureResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    let stdout = '';
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'ignore'],
      });
    } catch (error) {
      resolve({
        exitCode: null,
        stdout: '',
        timedOut: false,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    const timeout = setTimeout(() => {
      child.kill('SIGTERM');
      finish({ exitCode: null, stdout, timedOut: true });
    }, timeoutMs);

    child.stdout?.on('data', (data: Buffer | string) => {
      stdout += data.toString();
    });

    child.on('close', (code: number | null) => {
      finish({ exitCode: code, stdout, timedOut: false });
    });

    child.on('error', (error: Error) => {
      finish({ exitCode: null, stdout, timedOut: false, error });
    });
  });
}
