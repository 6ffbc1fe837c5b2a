import { logger } from '../utils/logger.js';
import { extractMessageId, normalizeEvent } from '../utils/eventNormalizer.js';
import type { DedupWindow } from '../utils/DedupWindow.js';
import type { MessageCallback } from '../adapters/BaseAdapter.js';

export interface InboundHandlerOptions {
  channelId: string;
  window: DedupWindow;
  /** Read on every event, so a callback registered after start still receives messages */
  getCallback: () => MessageCallback | null;
}

/**
 * Build the per-event handler: dedup, normalize, then hand off to the
 * registered callback. Nothing thrown here reaches the caller.
 */
export function createInboundHandler(options: InboundHandlerOptions): (event: unknown) => void {
  const { channelId, window, getCallback } = options;

  return (event: unknown): void => {
    try {
      const messageId = extractMessageId(event);
      if (!messageId) {
        logger.warn('Dropping Feishu event without a message ID');
        return;
      }

      if (!window.admit(messageId)) {
        logger.debug(`Skipping duplicate message: ${messageId}`);
        return;
      }

      const message = normalizeEvent(event, channelId);
      if (!message) return;

      const callback = getCallback();
      if (!callback) {
        logger.debug(`No message callback registered, dropping ${messageId}`);
        return;
      }

      callback(message);
    } catch (error) {
      logger.error('Error handling Feishu message:', error);
    }
  };
}
