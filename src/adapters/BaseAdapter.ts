import type { ChannelConfig } from '../config/index.js';

export type { ChannelConfig };

/**
 * Channel plugin contract consumed by the host's plugin manager
 */
export interface ChannelPlugin {
  /**
   * Constant channel identifier
   */
  readonly id: string;

  /**
   * Human-readable channel name
   */
  readonly label: string;

  /**
   * Connect to the platform and keep receiving events until stopped
   */
  start(config: ChannelConfig): Promise<void>;

  /**
   * Stop receiving events
   */
  stop(): Promise<void>;

  /**
   * Send a text message. Resolves to false instead of throwing on failure.
   */
  send(payload: MessagePayload): Promise<boolean>;

  /**
   * Register the consumer for inbound messages (last registration wins)
   */
  onMessage(callback: MessageCallback): void;
}

/**
 * Message received from a chat platform, normalized for the host
 */
export interface ChannelMessage {
  channelId: string;
  chatId: string;
  senderId: string;
  senderName: string;
  content: string;
  raw: Record<string, unknown>;
}

/**
 * Outbound message from the host
 */
export interface MessagePayload {
  chatId: string;
  content: string;
}

export type MessageCallback = (message: ChannelMessage) => void;

/**
 * The part of the host's plugin manager a channel plugin talks to
 */
export interface PluginManager {
  registerChannel(channel: ChannelPlugin): void;
}
