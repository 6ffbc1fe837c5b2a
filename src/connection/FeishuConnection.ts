import * as lark from '@larksuiteoapi/node-sdk';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { serializeError } from '../utils/errors.js';
import type { FeishuDomain } from '../config/index.js';
import type { ConnectionMessage, ConnectionOptions } from './types.js';

/**
 * A push-event stream. `start` resolves once the stream is set up and
 * calls `onEvent` for every message event from then on.
 */
export interface EventStream {
  start(onEvent: (event: unknown) => void): Promise<void>;
}

export type EventStreamFactory = (options: ConnectionOptions) => EventStream;

const connectionOptionsSchema = z.object({
  appId: z.string().min(1),
  appSecret: z.string().min(1),
  domain: z.enum(['feishu', 'lark']),
  logLevel: z.string(),
});

/**
 * Validate the options a worker received as workerData
 */
export function parseConnectionOptions(data: unknown): ConnectionOptions {
  return connectionOptionsSchema.parse(data);
}

export function toLarkDomain(domain: FeishuDomain): lark.Domain {
  return domain === 'lark' ? lark.Domain.Lark : lark.Domain.Feishu;
}

export function toLarkLoggerLevel(level: string): lark.LoggerLevel {
  switch (level) {
    case 'error':
      return lark.LoggerLevel.error;
    case 'warn':
      return lark.LoggerLevel.warn;
    case 'debug':
      return lark.LoggerLevel.debug;
    case 'silly':
      return lark.LoggerLevel.trace;
    default:
      return lark.LoggerLevel.info;
  }
}

/**
 * Event stream backed by the SDK's WebSocket long connection
 */
export function createLarkEventStream(options: ConnectionOptions): EventStream {
  const wsClient = new lark.WSClient({
    appId: options.appId,
    appSecret: options.appSecret,
    domain: toLarkDomain(options.domain),
    loggerLevel: toLarkLoggerLevel(options.logLevel),
  });

  return {
    async start(onEvent: (event: unknown) => void): Promise<void> {
      const eventDispatcher = new lark.EventDispatcher({}).register({
        'im.message.receive_v1': (data) => {
          onEvent(data);
        },
      });

      // Reconnects are handled inside the SDK; there is no close method
      await wsClient.start({ eventDispatcher });
    },
  };
}

/**
 * Entry of the connection worker: validates workerData and runs the connection,
 * posting its messages to the parent port
 */
export function startConnectionWorker(
  port: { postMessage(message: ConnectionMessage): void } | null,
  data: unknown,
  createStream: EventStreamFactory = createLarkEventStream
): Promise<void> {
  if (!port) {
    throw new Error('connectionWorker must be run as a worker thread');
  }

  const options = parseConnectionOptions(data);
  return runFeishuConnection(options, (message) => port.postMessage(message), createStream);
}

/**
 * Body of the connection worker. Posts `ready` once the stream is up,
 * `event` for each inbound message and `failed` if setup throws.
 */
export async function runFeishuConnection(
  options: ConnectionOptions,
  post: (message: ConnectionMessage) => void,
  createStream: EventStreamFactory = createLarkEventStream
): Promise<void> {
  try {
    const stream = createStream(options);
    await stream.start((event) => {
      post({ type: 'event', event });
    });
    post({ type: 'ready' });
    logger.info(`Feishu WebSocket client running for app ${options.appId}`);
  } catch (error) {
    logger.error('Feishu WebSocket client error:', error);
    post({ type: 'failed', error: serializeError(error) });
  }
}
