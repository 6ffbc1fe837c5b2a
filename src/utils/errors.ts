import { types } from 'util';

/**
 * Error types raised by the Feishu channel.
 *
 * ChannelError (base)
 * ├── ConfigurationError  missing or invalid credentials, thrown before any connection attempt
 * └── StartupError        the connection worker failed while building the SDK client
 */

export class ChannelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChannelError';
  }
}

export class ConfigurationError extends ChannelError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class StartupError extends ChannelError {
  /** Name of the error raised inside the worker */
  readonly causeName: string;

  constructor(message: string, causeName = 'Error', stack?: string) {
    super(message);
    this.name = 'StartupError';
    this.causeName = causeName;
    if (stack) {
      this.stack = stack;
    }
  }
}

/**
 * Plain-object form of an error, safe to post between threads
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Errors raised in a worker arrive from another realm, where `instanceof Error` is false
 */
export function serializeError(error: unknown): SerializedError {
  if (types.isNativeError(error)) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

export function toStartupError(error: SerializedError): StartupError {
  return new StartupError(error.message, error.name, error.stack);
}
