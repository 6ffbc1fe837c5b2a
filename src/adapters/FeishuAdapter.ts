import * as lark from '@larksuiteoapi/node-sdk';
import type {
  ChannelConfig,
  ChannelPlugin,
  MessageCallback,
  MessagePayload,
} from './BaseAdapter.js';
import { ConnectionSupervisor } from '../connection/ConnectionSupervisor.js';
import { createInboundHandler } from '../connection/inboundHandler.js';
import { toLarkDomain, toLarkLoggerLevel } from '../connection/FeishuConnection.js';
import type { ConnectionContextFactory, ConnectionState } from '../connection/types.js';
import { DedupWindow } from '../utils/DedupWindow.js';
import { logger } from '../utils/logger.js';
import config, { resolveCredentials, type FeishuCredentials } from '../config/index.js';

export interface CreateTextMessageRequest {
  params: { receive_id_type: 'chat_id' };
  data: { receive_id: string; msg_type: 'text'; content: string };
}

export interface CreateMessageResponse {
  code?: number;
  msg?: string;
}

/**
 * The slice of the SDK client used for outbound messages
 */
export interface MessageClient {
  im: {
    message: {
      create(payload: CreateTextMessageRequest): Promise<CreateMessageResponse>;
    };
  };
}

export type MessageClientFactory = (credentials: FeishuCredentials) => MessageClient;

export function createLarkClient(credentials: FeishuCredentials): MessageClient {
  return new lark.Client({
    appId: credentials.appId,
    appSecret: credentials.appSecret,
    appType: lark.AppType.SelfBuild,
    domain: toLarkDomain(credentials.domain),
    loggerLevel: toLarkLoggerLevel(config.logLevel),
  });
}

export interface FeishuAdapterOptions {
  readyTimeoutMs?: number;
  livenessIntervalMs?: number;
  dedupCapacity?: number;
  contextFactory?: ConnectionContextFactory;
  clientFactory?: MessageClientFactory;
}

/**
 * Feishu channel plugin
 * Receives messages over the SDK's WebSocket long connection and sends text replies
 *
 * The message callback runs on the host's event loop, after dedup and
 * normalization. The outbound client belongs to the host thread; the
 * worker thread only carries the inbound connection.
 */
export class FeishuAdapter implements ChannelPlugin {
  readonly id = 'feishu';
  readonly label = '飞书';

  private client: MessageClient | null = null;
  private messageCallback: MessageCallback | null = null;
  private readonly supervisor: ConnectionSupervisor;
  private readonly clientFactory: MessageClientFactory;

  constructor(options: FeishuAdapterOptions = {}) {
    this.clientFactory = options.clientFactory ?? createLarkClient;

    const handleEvent = createInboundHandler({
      channelId: this.id,
      window: new DedupWindow(options.dedupCapacity ?? config.dedupCapacity),
      getCallback: () => this.messageCallback,
    });

    this.supervisor = new ConnectionSupervisor(handleEvent, {
      readyTimeoutMs: options.readyTimeoutMs ?? config.readyTimeoutMs,
      livenessIntervalMs: options.livenessIntervalMs ?? config.livenessIntervalMs,
      contextFactory: options.contextFactory,
    });
  }

  /**
   * Start the Feishu WebSocket connection.
   * Resolves once the connection is stopped or dies.
   */
  async start(channelConfig: ChannelConfig): Promise<void> {
    const credentials = resolveCredentials(channelConfig);

    if (this.supervisor.isActive()) {
      logger.warn('Feishu channel already running');
      return;
    }

    logger.info('Starting Feishu WebSocket connection...');
    this.client = this.clientFactory(credentials);

    try {
      await this.supervisor.start({ ...credentials, logLevel: config.logLevel });
    } catch (error) {
      this.client = null;
      logger.error('Failed to start Feishu channel:', error);
      throw error;
    }
  }

  /**
   * Stop the Feishu connection
   */
  async stop(): Promise<void> {
    this.supervisor.stop();
    logger.info('Feishu channel stopped');
  }

  /**
   * Send a text message to a chat
   */
  async send(payload: MessagePayload): Promise<boolean> {
    if (!this.client) {
      logger.error('Feishu client not initialized');
      return false;
    }

    try {
      const response = await this.client.im.message.create({
        params: { receive_id_type: 'chat_id' },
        data: {
          receive_id: payload.chatId,
          msg_type: 'text',
          content: JSON.stringify({ text: payload.content }),
        },
      });

      if (response.code !== undefined && response.code !== 0) {
        logger.error(`Failed to send Feishu message: ${response.msg ?? 'unknown error'} (code ${response.code})`);
        return false;
      }

      logger.info(`Sent Feishu message to ${payload.chatId}`);
      return true;
    } catch (error) {
      logger.error('Error sending Feishu message:', error);
      return false;
    }
  }

  onMessage(callback: MessageCallback): void {
    this.messageCallback = callback;
  }

  getState(): ConnectionState {
    return this.supervisor.getState();
  }
}
