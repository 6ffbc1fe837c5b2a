export { FeishuAdapter, createLarkClient } from './FeishuAdapter.js';
export type {
  FeishuAdapterOptions,
  MessageClient,
  MessageClientFactory,
  CreateTextMessageRequest,
  CreateMessageResponse,
} from './FeishuAdapter.js';
export type {
  ChannelPlugin,
  ChannelMessage,
  ChannelConfig,
  MessagePayload,
  MessageCallback,
  PluginManager,
} from './BaseAdapter.js';
