import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('child_process', () => ({
  spawn: vi.fn(),
}));

import { spawn } from 'child_process';
import { captureOutput, launchDetached } from '../../server/utils/process-runner.js';
import { FakeChildProcess } from '../helpers/fake-child-process.js';

const mockSpawn = vi.mocked(spawn);

describe('process-runner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('launchDetached', () => {
    it('should spawn detached without a shell and resolve with the pid', async () => {
      const child = new FakeChildProcess(777).startSoon();
      mockSpawn.mockReturnValue(child.asChildProcess());

      await expect(launchDetached(['open', '-a', 'Terminal'])).resolves.toBe(777);
      expect(mockSpawn).toHaveBeenCalledWith('open', ['-a', 'Terminal'], {
        detached: true,
        stdio: 'ignore',
      });
      expect(child.unref).toHaveBeenCalledTimes(1);
    });

    it('should reject when the program cannot be started', async () => {
      const child = new FakeChildProcess(undefined).failSoon('ENOENT', 'spawn open ENOENT');
      mockSpawn.mockReturnValue(child.asChildProcess());

      await expect(launchDetached(['open', '-a', 'Nowhere'])).rejects.toThrow('spawn open ENOENT');
      expect(child.unref).not.toHaveBeenCalled();
    });

    it('should reject an empty argv without spawning', async () => {
      await expect(launchDetached([])).rejects.toThrow('Cannot launch an empty command');
      expect(mockSpawn).not.toHaveBeenCalled();
    });

    it('should reject when spawn throws synchronously', async () => {
      mockSpawn.mockImplementation(() => {
        throw new TypeError('The argument "file" cannot be empty');
      });

      await expect(launchDetached(['bad'])).rejects.toThrow('cannot be empty');
    });

    it('should ignore errors reported after the process started', async () => {
      const child = new FakeChildProcess(5).startSoon();
      mockSpawn.mockReturnValue(child.asChildProcess());

      await expect(launchDetached(['code'])).resolves.toBe(5);
      expect(() => child.emit('error', new Error('late failure'))).not.toThrow();
    });
  });

  describe('captureOutput', () => {
    it('should collect stdout and the exit code', async () => {
      const child = new FakeChildProcess().exitSoon('hello\n', 0);
      mockSpawn.mockReturnValue(child.asChildProcess());

      await expect(captureOutput(['echo', 'hello'], 1000)).resolves.toEqual({
        exitCode: 0,
        stdout: 'hello\n',
        timedOut: false,
      });
      expect(mockSpawn).toHaveBeenCalledWith('echo', ['hello'], {
        stdio: ['ignore', 'pipe', 'ignore'],
      });
    });

    it('should kill the child and report a timeout', async () => {
      const child = new FakeChildProcess();
      mockSpawn.mockReturnValue(child.asChildProcess());

      const result = await captureOutput(['sleep', '10'], 20);

      expect(result).toEqual({ exitCode: null, stdout: '', timedOut: true });
      expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    });

    it('should resolve with the error instead of rejecting', async () => {
      const child = new FakeChildProcess().failSoon('ENOENT', 'spawn osascript ENOENT');
      mockSpawn.mockReturnValue(child.asChildProcess());

      const result = await captureOutput(['osascript', '-e', 'return 1'], 1000);

      expect(result.exitCode).toBeNull();
      expect(result.error?.message).toBe('spawn osascript ENOENT');
    });
  });
});
