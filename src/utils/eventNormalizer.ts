import { z } from 'zod';
import type { ChannelMessage } from '../adapters/BaseAdapter.js';
import { logger } from './logger.js';

/**
 * The fields of an `im.message.receive_v1` event the channel reads.
 * Anything else on the event is ignored.
 */
const inboundEventSchema = z.object({
  sender: z.object({
    sender_id: z.object({
      open_id: z.string(),
    }),
  }),
  message: z.object({
    message_id: z.string(),
    chat_id: z.string(),
    message_type: z.string(),
    content: z.string(),
    create_time: z.string(),
  }),
});

export type InboundEvent = z.infer<typeof inboundEventSchema>;

const messageIdSchema = z.object({
  message: z.object({ message_id: z.string().min(1) }),
});

const textContentSchema = z.object({
  text: z.string().optional(),
});

/**
 * Pull just the message ID out of a raw event, or null if it has none
 */
export function extractMessageId(raw: unknown): string | null {
  const parsed = messageIdSchema.safeParse(raw);
  return parsed.success ? parsed.data.message.message_id : null;
}

/**
 * Decode the JSON body of a text message
 */
export function decodeTextContent(content: string): string {
  return textContentSchema.parse(JSON.parse(content)).text ?? '';
}

/**
 * Convert a Feishu message event into a ChannelMessage.
 *
 * Only text bodies are decoded; other message types produce a record with
 * empty content. Returns null (after logging) when the event is missing
 * fields or its text body is not valid JSON.
 */
export function normalizeEvent(raw: unknown, channelId: string): ChannelMessage | null {
  const parsed = inboundEventSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Dropping malformed Feishu event: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
    return null;
  }

  const { message, sender } = parsed.data;

  let content = '';
  if (message.message_type === 'text') {
    try {
      content = decodeTextContent(message.content);
    } catch (error) {
      logger.error(`Failed to decode content of Feishu message ${message.message_id}:`, error);
      return null;
    }
  }

  return {
    channelId,
    chatId: message.chat_id,
    senderId: sender.sender_id.open_id,
    // No user lookup yet; the open ID stands in for the display name
    senderName: sender.sender_id.open_id,
    content,
    raw: {
      message_id: message.message_id,
      message_type: message.message_type,
      create_time: message.create_time,
    },
  };
}
