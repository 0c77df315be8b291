import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MAC_APP_COMMANDS, MAC_MEDIA_COMMANDS } from '../../types/config.js';
import { ConfigError, ConfigService } from './config-service.js';

describe('ConfigService', () => {
  let tempDir: string;
  let missingDefaultPath: string;

  const writeConfig = (contents: unknown): string => {
    const configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(
      configPath,
      typeof contents === 'string' ? contents : JSON.stringify(contents),
      'utf8'
    );
    return configPath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remote-deck-config-'));
    missingDefaultPath = path.join(tempDir, 'missing', 'config.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadHostConfig', () => {
    it('should use platform defaults without a config file', () => {
      const service = new ConfigService({
        defaultConfigPath: missingDefaultPath,
        env: {},
        platform: 'darwin',
      });

      const config = service.loadHostConfig();

      expect(config.port).toBe(9999);
      expect(config.bind).toBe('0.0.0.0');
      expect(config.mediaPlayer).toBe('applescript');
      expect(config.advertise).toBe(false);
      expect(config.appCommands).toEqual(MAC_APP_COMMANDS);
      expect(config.mediaCommands).toEqual(MAC_MEDIA_COMMANDS);
    });

    it('should pick playerctl and no player by platform', () => {
      const linux = new ConfigService({ defaultConfigPath: missingDefaultPath, env: {}, platform: 'linux' });
      const windows = new ConfigService({ defaultConfigPath: missingDefaultPath, env: {}, platform: 'win32' });

      expect(linux.loadHostConfig().mediaPlayer).toBe('playerctl');
      expect(linux.loadHostConfig().appCommands.OPEN_SAFARI).toBeUndefined();
      expect(windows.loadHostConfig().mediaPlayer).toBe('none');
    });

    it('should merge file command tables over the defaults', () => {
      const configPath = writeConfig({
        port: 9100,
        appCommands: { OPEN_NOTES: ['open', '-a', 'Notes'] },
      });
      const service = new ConfigService({ configPath, env: {}, platform: 'darwin' });

      const config = service.loadHostConfig();

      expect(config.port).toBe(9100);
      expect(config.appCommands.OPEN_NOTES).toEqual(['open', '-a', 'Notes']);
      expect(config.appCommands.OPEN_TERMINAL).toEqual(['open', '-a', 'Terminal']);
    });

    it('should replace the defaults when asked to', () => {
      const configPath = writeConfig({
        replaceDefaultCommands: true,
        appCommands: { OPEN_NOTES: ['open', '-a', 'Notes'] },
      });
      const service = new ConfigService({ configPath, env: {}, platform: 'darwin' });

      const config = service.loadHostConfig();

      expect(Object.keys(config.appCommands)).toEqual(['OPEN_NOTES']);
      expect(config.mediaCommands).toEqual({});
    });

    it('should apply file, then environment, then overrides', () => {
      const configPath = writeConfig({ port: 9100, bind: '127.0.0.1' });
      const service = new ConfigService({
        configPath,
        env: { REMOTE_DECK_PORT: '9200' },
        platform: 'darwin',
      });

      expect(service.loadHostConfig().port).toBe(9200);
      expect(service.loadHostConfig().bind).toBe('127.0.0.1');
      expect(service.loadHostConfig({ port: 9300 }).port).toBe(9300);
    });

    it('should read the config path from the environment', () => {
      const configPath = writeConfig({ queryTimeoutMs: 1500 });
      const service = new ConfigService({ env: { REMOTE_DECK_CONFIG: configPath }, platform: 'darwin' });

      expect(service.loadHostConfig().queryTimeoutMs).toBe(1500);
    });

    it('should freeze the config and its tables', () => {
      const service = new ConfigService({ defaultConfigPath: missingDefaultPath, env: {}, platform: 'darwin' });

      const config = service.loadHostConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.appCommands)).toBe(true);
      expect(Object.isFrozen(config.appCommands.OPEN_TERMINAL)).toBe(true);
    });

    it('should fail when an explicit config file is missing', () => {
      const service = new ConfigService({ configPath: missingDefaultPath, env: {} });

      expect(() => service.loadHostConfig()).toThrow(`Config file not found: ${missingDefaultPath}`);
    });

    it('should fail on malformed JSON', () => {
      const configPath = writeConfig('{ "port": ');
      const service = new ConfigService({ configPath, env: {} });

      expect(() => service.loadHostConfig()).toThrow(`Failed to read config file ${configPath}`);
    });

    it('should list validation issues', () => {
      const configPath = writeConfig({ port: 70000, mediaPlayer: 'winamp' });
      const service = new ConfigService({ configPath, env: {} });

      let thrown: unknown;
      try {
        service.loadHostConfig();
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ConfigError);
      if (thrown instanceof ConfigError) {
        expect(thrown.issues).toHaveLength(2);
        expect(thrown.issues[0]).toMatch(/^port: /);
        expect(thrown.issues[1]).toMatch(/^mediaPlayer: /);
      }
    });

    it('should reject unknown keys', () => {
      const configPath = writeConfig({ prot: 9000 });
      const service = new ConfigService({ configPath, env: {} });

      expect(() => service.loadHostConfig()).toThrow(ConfigError);
    });

    it('should reject the reserved query token as an action', () => {
      const configPath = writeConfig({ mediaCommands: { GET_TRACK_INFO: ['true'] } });
      const service = new ConfigService({ configPath, env: {} });

      expect(() => service.loadHostConfig()).toThrow('GET_TRACK_INFO is reserved for the track query');
    });

    it('should reject lowercase tokens and empty argv', () => {
      const lowercase = new ConfigService({ configPath: writeConfig({ appCommands: { open_notes: ['open'] } }), env: {} });
      expect(() => lowercase.loadHostConfig()).toThrow(ConfigError);

      const empty = new ConfigService({ configPath: writeConfig({ appCommands: { OPEN_NOTES: [] } }), env: {} });
      expect(() => empty.loadHostConfig()).toThrow('Command needs a program');
    });

    it('should reject a non-numeric port in the environment', () => {
      const service = new ConfigService({
        defaultConfigPath: missingDefaultPath,
        env: { REMOTE_DECK_PORT: 'abc' },
      });

      expect(() => service.loadHostConfig()).toThrow('Invalid REMOTE_DECK_PORT: abc');
    });
  });

  describe('loadClientConfig', () => {
    it('should use the defaults', () => {
      const service = new ConfigService({ env: {} });

      expect(service.loadClientConfig()).toEqual({
        host: '127.0.0.1',
        port: 9999,
        timeoutMs: 3000,
        pollIntervalMs: 1000,
        pollTimeoutMs: 2000,
        probeTimeoutMs: 2000,
        framing: 'line',
      });
    });

    it('should apply environment then overrides', () => {
      const service = new ConfigService({
        env: { REMOTE_DECK_HOST: '192.168.1.20', REMOTE_DECK_PORT: '9100', REMOTE_DECK_TIMEOUT: '500' },
      });

      const config = service.loadClientConfig({ port: 9200, framing: 'raw' });

      expect(config.host).toBe('192.168.1.20');
      expect(config.port).toBe(9200);
      expect(config.timeoutMs).toBe(500);
      expect(config.framing).toBe('raw');
    });

    it('should reject port zero for a client', () => {
      const service = new ConfigService({ env: {} });

      expect(() => service.loadClientConfig({ port: 0 })).toThrow(
        'Invalid client config: port: Port must be between 1 and 65535'
      );
    });
  });
});
