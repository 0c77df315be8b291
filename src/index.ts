export { CommandClient } from './client/services/command-client.js';
export type {
  ActionResult,
  CommandClientOptions,
  CommandTarget,
} from './client/services/command-client.js';
export { TrackPoller } from './client/services/track-poller.js';
export type { TrackPollerEvents, TrackPollerOptions } from './client/services/track-poller.js';
export { CommandExecutor } from './server/command-executor.js';
export type { CommandDispatcher, CommandExecutorOptions, CommandKind } from './server/command-executor.js';
export { CommandFramer } from './server/command-framer.js';
export type { CommandFrame } from './server/command-framer.js';
export { CommandConnection, CommandServer } from './server/command-server.js';
export type { CommandServerOptions } from './server/command-server.js';
export { createHost } from './server/server.js';
export { ConfigError, ConfigService } from './server/services/config-service.js';
export { createMediaPlayer, NullMediaPlayer } from './server/services/media-player.js';
export type { MediaPlayer } from './server/services/media-player.js';
export {
  ClientErrorCode,
  CommandClientError,
  isCommandClientError,
} from './shared/client-errors.js';
export * from './shared/protocol.js';
export { formatPlaybackTime, playbackProgress } from './shared/utils/time.js';
export type { ClientConfig, CommandTable, HostConfig, MediaPlayerKind } from './types/config.js';
