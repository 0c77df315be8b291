/**
 * Transport errors reported by the device client
 */

export enum ClientErrorCode {
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  TIMEOUT = 'TIMEOUT',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',
  NETWORK_ERROR = 'NETWORK_ERROR',
}

export class CommandClientError extends Error {
  constructor(
    readonly code: ClientErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommandClientError';
  }
}

export function isCommandClientError(error: unknown): error is CommandClientError {
  return error instanceof CommandClientError;
}

/**
 * Map a socket error onto a client error code
 */
export function clientErrorFromSocketError(
  error: NodeJS.ErrnoException,
  target: string
): CommandClientError {
  switch (error.code) {
    case 'ECONNREFUSED':
      return new CommandClientError(
        ClientErrorCode.CONNECTION_REFUSED,
        `Connection refused by ${target}`,
        { cause: error }
      );
    case 'ETIMEDOUT':
      return new CommandClientError(ClientErrorCode.TIMEOUT, `Timed out connecting to ${target}`, {
        cause: error,
      });
    case 'ECONNRESET':
    case 'EPIPE':
      return new CommandClientError(
        ClientErrorCode.CONNECTION_CLOSED,
        `Connection to ${target} was reset`,
        { cause: error }
      );
    default:
      return new CommandClientError(
        ClientErrorCode.NETWORK_ERROR,
        `Network error talking to ${target}: ${error.message}`,
        { cause: error }
      );
  }
}
