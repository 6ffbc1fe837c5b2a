import type { FeishuCredentials } from '../config/index.js';
import type { SerializedError } from '../utils/errors.js';

export type ConnectionState = 'idle' | 'starting' | 'running' | 'failed' | 'stopped';

/**
 * Everything the connection worker needs; posted to it as workerData
 */
export interface ConnectionOptions extends FeishuCredentials {
  logLevel: string;
}

/**
 * Messages posted from the connection context back to the supervisor
 */
export type ConnectionMessage =
  | { type: 'ready' }
  | { type: 'failed'; error: SerializedError }
  | { type: 'event'; event: unknown };

export type ConnectionListener = (message: ConnectionMessage) => void;

/**
 * An isolated execution context hosting the SDK's long connection.
 * The default implementation is a worker thread (see WorkerHandle).
 */
export interface ConnectionContext {
  /**
   * Launch the context. `listener` receives every message it posts until detached.
   */
  start(listener: ConnectionListener): void;

  /**
   * Deliver messages to `listener` again after `detach`, reusing the running connection
   */
  resume(listener: ConnectionListener): void;

  /**
   * Whether the context is still running
   */
  isAlive(): boolean;

  /**
   * Stop listening and let the process exit without waiting for the context.
   * Does not close the underlying connection.
   */
  detach(): void;
}

export type ConnectionContextFactory = (options: ConnectionOptions) => ConnectionContext;

export function isConnectionMessage(value: unknown): value is ConnectionMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }

  switch (value.type) {
    case 'ready':
      return true;
    case 'failed':
      return (
        'error' in value &&
        typeof value.error === 'object' &&
        value.error !== null &&
        'name' in value.error &&
        typeof value.error.name === 'string' &&
        'message' in value.error &&
        typeof value.error.message === 'string'
      );
    case 'event':
      return 'event' in value;
    default:
      return false;
  }
}
