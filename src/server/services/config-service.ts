import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { TOKEN_PATTERN, TRACK_INFO_COMMAND } from '../../shared/protocol.js';
import { createLogger } from '../../shared/utils/logger.js';
import {
  type ClientConfig,
  type CommandTable,
  createDefaultHostConfig,
  DEFAULT_CLIENT_CONFIG,
  type HostConfig,
} from '../../types/config.js';

const logger = createLogger('config-service');

const PortSchema = z.number().int().min(0).max(65535);
const MillisecondsSchema = z.number().int().positive();

const CommandTableSchema = z
  .record(
    z.string().regex(TOKEN_PATTERN, 'Command tokens must be uppercase letters, digits or underscores'),
    z.array(z.string().min(1, 'Command arguments cannot be empty')).min(1, 'Command needs a program')
  )
  .refine((table) => !Object.hasOwn(table, TRACK_INFO_COMMAND), {
    message: `${TRACK_INFO_COMMAND} is reserved for the track query`,
  });

const HostConfigSchema = z.object({
  bind: z.string().min(1, 'Bind address cannot be empty'),
  port: PortSchema,
  queryTimeoutMs: MillisecondsSchema,
  unterminatedFlushMs: MillisecondsSchema,
  mediaPlayer: z.enum(['applescript', 'playerctl', 'none']),
  appCommands: CommandTableSchema,
  mediaCommands: CommandTableSchema,
  advertise: z.boolean(),
  serviceName: z.string().min(1).optional(),
});

// The file may set any subset; command tables extend the platform defaults
// unless replaceDefaultCommands is set
const HostConfigFileSchema = HostConfigSchema.partial()
  .extend({ replaceDefaultCommands: z.boolean().optional() })
  .strict();

const ClientConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: PortSchema.refine((port) => port > 0, 'Port must be between 1 and 65535'),
  timeoutMs: MillisecondsSchema,
  pollIntervalMs: MillisecondsSchema,
  pollTimeoutMs: MillisecondsSchema,
  probeTimeoutMs: MillisecondsSchema,
  framing: z.enum(['line', 'raw']),
});

type HostConfigFile = z.infer<typeof HostConfigFileSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ConfigServiceOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Read when no explicit path is given; skipped when missing */
  defaultConfigPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function freezeTable(table: CommandTable): CommandTable {
  const frozen: Record<string, readonly string[]> = {};
  for (const [token, argv] of Object.entries(table)) {
    frozen[token] = Object.freeze([...argv]);
  }
  return Object.freeze(frozen);
}

function parseEnvInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

/**
 * Builds the host and client configuration once at startup.
 *
 * Precedence, later wins: built-in defaults for the platform, the JSON config
 * file, environment variables, then explicit overrides (command line flags).
 * The result is validated with Zod and frozen; nothing mutates it afterwards.
 *
 * @example
 * ```typescript
 * const configService = new ConfigService({ configPath: './deck.json' });
 * const config = configService.loadHostConfig({ port: 9000 });
 * ```
 */
export class ConfigService {
  private readonly configPath?: string;
  private readonly defaultConfigPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;

  constructor(options: ConfigServiceOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.configPath = options.configPath ?? this.env.REMOTE_DECK_CONFIG;
    this.defaultConfigPath =
      options.defaultConfigPath ?? path.join(os.homedir(), '.remote-deck', 'config.json');
  }

  loadHostConfig(overrides: Partial<HostConfig> = {}): Readonly<HostConfig> {
    const defaults = createDefaultHostConfig(this.platform);
    const file = this.readConfigFile();

    const { replaceDefaultCommands, ...fileValues } = file;
    const merged: HostConfig = {
      ...defaults,
      ...fileValues,
      appCommands: replaceDefaultCommands
        ? (file.appCommands ?? {})
        : { ...defaults.appCommands, ...file.appCommands },
      mediaCommands: replaceDefaultCommands
        ? (file.mediaCommands ?? {})
        : { ...defaults.mediaCommands, ...file.mediaCommands },
      ...this.hostEnvOverrides(),
      ...overrides,
    };

    const result = HostConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = formatIssues(result.error);
      logger.error('Host config validation failed:', issues);
      throw new ConfigError(`Invalid config: ${issues.join(', ')}`, issues);
    }

    const config = result.data;
    return Object.freeze({
      ...config,
      appCommands: freezeTable(config.appCommands),
      mediaCommands: freezeTable(config.mediaCommands),
    });
  }

  loadClientConfig(overrides: Partial<ClientConfig> = {}): Readonly<ClientConfig> {
    const merged: ClientConfig = {
      ...DEFAULT_CLIENT_CONFIG,
      ...this.clientEnvOverrides(),
      ...overrides,
    };

    const result = ClientConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigError(`Invalid client config: ${issues.join(', ')}`, issues);
    }
    return Object.freeze(result.data);
  }

  private hostEnvOverrides(): Partial<HostConfig> {
    const values: Partial<HostConfig> = {};
    const port = parseEnvInteger('REMOTE_DECK_PORT', this.env.REMOTE_DECK_PORT);
    if (port !== undefined) values.port = port;
    if (this.env.REMOTE_DECK_BIND) values.bind = this.env.REMOTE_DECK_BIND;
    return values;
  }

  private clientEnvOverrides(): Partial<ClientConfig> {
    const values: Partial<ClientConfig> = {};
    if (this.env.REMOTE_DECK_HOST) values.host = this.env.REMOTE_DECK_HOST;
    const port = parseEnvInteger('REMOTE_DECK_PORT', this.env.REMOTE_DECK_PORT);
    if (port !== undefined) values.port = port;
    const timeoutMs = parseEnvInteger('REMOTE_DECK_TIMEOUT', this.env.REMOTE_DECK_TIMEOUT);
    if (timeoutMs !== undefined) values.timeoutMs = timeoutMs;
    const pollIntervalMs = parseEnvInteger(
      'REMOTE_DECK_POLL_INTERVAL',
      this.env.REMOTE_DECK_POLL_INTERVAL
    );
    if (pollIntervalMs !== undefined) values.pollIntervalMs = pollIntervalMs;
    return values;
  }

  private readConfigFile(): HostConfigFile {
    const filePath = this.configPath ?? this.defaultConfigPath;
    if (!fs.existsSync(filePath)) {
      if (this.configPath) {
        throw new ConfigError(`Config file not found: ${filePath}`);
      }
      logger.debug(`No config file at ${filePath}, using defaults`);
      return {};
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = HostConfigFileSchema.safeParse(data);
    if (!result.success) {
      const issues = formatIssues(result.error);
      logger.error('Config file validation failed:', issues);
      throw new ConfigError(`Invalid config file ${filePath}: ${issues.join(', ')}`, issues);
    }

    logger.info(`Loaded configuration from ${filePath}`);
    return result.data;
  }
}
