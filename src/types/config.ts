import {
  DEFAULT_BIND_ADDRESS,
  DEFAULT_CLIENT_HOST,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SERVER_PORT,
  DEFAULT_UNTERMINATED_FLUSH_MS,
} from '../shared/constants.js';

/** Token → argument vector. argv[0] is the program, spawned without a shell. */
export type CommandTable = Readonly<Record<string, readonly string[]>>;

export type MediaPlayerKind = 'applescript' | 'playerctl' | 'none';

export type ClientFraming = 'line' | 'raw';

export interface HostConfig {
  bind: string;
  port: number;
  queryTimeoutMs: number;
  unterminatedFlushMs: number;
  mediaPlayer: MediaPlayerKind;
  appCommands: CommandTable;
  mediaCommands: CommandTable;
  advertise: boolean;
  serviceName?: string;
}

export interface ClientConfig {
  host: string;
  port: number;
  timeoutMs: number;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  probeTimeoutMs: number;
  framing: ClientFraming;
}

function osascript(script: string): string[] {
  return ['osascript', '-e', script];
}

export const MAC_APP_COMMANDS: CommandTable = {
  OPEN_SPOTIFY: ['open', '-a', 'Spotify'],
  OPEN_VSCODE: ['open', '-a', 'Visual Studio Code'],
  OPEN_SAFARI: ['open', '-a', 'Safari'],
  OPEN_TERMINAL: ['open', '-a', 'Terminal'],
};

export const MAC_MEDIA_COMMANDS: CommandTable = {
  MEDIA_PLAY_PAUSE: osascript('tell application "Spotify" to playpause'),
  MEDIA_NEXT: osascript('tell application "Spotify" to next track'),
  MEDIA_PREV: osascript('tell application "Spotify" to previous track'),
  MEDIA_VOL_UP: osascript('set volume output volume ((output volume of (get volume settings)) + 10)'),
  MEDIA_VOL_DOWN: osascript(
    'set volume output volume ((output volume of (get volume settings)) - 10)'
  ),
  MEDIA_MUTE: osascript('set volume output muted not (output muted of (get volume settings))'),
};

export const LINUX_APP_COMMANDS: CommandTable = {
  OPEN_SPOTIFY: ['gtk-launch', 'spotify'],
  OPEN_VSCODE: ['code'],
  OPEN_TERMINAL: ['x-terminal-emulator'],
};

export const LINUX_MEDIA_COMMANDS: CommandTable = {
  MEDIA_PLAY_PAUSE: ['playerctl', 'play-pause'],
  MEDIA_NEXT: ['playerctl', 'next'],
  MEDIA_PREV: ['playerctl', 'previous'],
  MEDIA_VOL_UP: ['pactl', 'set-sink-volume', '@DEFAULT_SINK@', '+10%'],
  MEDIA_VOL_DOWN: ['pactl', 'set-sink-volume', '@DEFAULT_SINK@', '-10%'],
  MEDIA_MUTE: ['pactl', 'set-sink-mute', '@DEFAULT_SINK@', 'toggle'],
};

export function defaultAppCommands(platform: NodeJS.Platform): CommandTable {
  return platform === 'linux' ? LINUX_APP_COMMANDS : MAC_APP_COMMANDS;
}

export function defaultMediaCommands(platform: NodeJS.Platform): CommandTable {
  return platform === 'linux' ? LINUX_MEDIA_COMMANDS : MAC_MEDIA_COMMANDS;
}

export function defaultMediaPlayer(platform: NodeJS.Platform): MediaPlayerKind {
  switch (platform) {
    case 'darwin':
      return 'applescript';
    case 'linux':
      return 'playerctl';
    default:
      return 'none';
  }
}

export function createDefaultHostConfig(platform: NodeJS.Platform = process.platform): HostConfig {
  return {
    bind: DEFAULT_BIND_ADDRESS,
    port: DEFAULT_SERVER_PORT,
    queryTimeoutMs: DEFAULT_QUERY_TIMEOUT_MS,
    unterminatedFlushMs: DEFAULT_UNTERMINATED_FLUSH_MS,
    mediaPlayer: defaultMediaPlayer(platform),
    appCommands: defaultAppCommands(platform),
    mediaCommands: defaultMediaCommands(platform),
    advertise: false,
  };
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  host: DEFAULT_CLIENT_HOST,
  port: DEFAULT_SERVER_PORT,
  timeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  pollTimeoutMs: DEFAULT_POLL_TIMEOUT_MS,
  probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  framing: 'line',
};
