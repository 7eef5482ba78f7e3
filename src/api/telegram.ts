/**
 * Telegram Bot API plumbing: webhook update parsing and best-effort replies.
 */
import { z } from 'zod';
import type { InboundMessage } from './router.js';

const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      message_id: z.number(),
      chat: z.object({ id: z.number() }),
      from: z
        .object({
          id: z.number(),
          first_name: z.string().optional(),
        })
        .optional(),
      text: z.string().optional(),
    })
    .optional(),
});

/**
 * Pull the chat message out of an update. Null for anything that is not a
 * text message (edits, joins, stickers, malformed bodies).
 */
export function toInboundMessage(body: unknown): InboundMessage | null {
  const parsed = TelegramUpdateSchema.safeParse(body);
  if (!parsed.success) return null;

  const message = parsed.data.message;
  if (!message || !message.text?.trim()) return null;

  return {
    chatId: message.chat.id,
    senderName: message.from?.first_name,
    text: message.text,
  };
}

export interface TelegramClientOptions {
  token: string;
  apiBase: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface TelegramClient {
  /** Resolves true when Telegram accepted the message; never rejects */
  sendMessage(chatId: number, text: string): Promise<boolean>;
}

export function createTelegramClient({
  token,
  apiBase,
  timeoutMs,
  fetchImpl = fetch,
}: TelegramClientOptions): TelegramClient {
  const baseUrl = `${apiBase.replace(/\/+$/, '')}/bot${token}`;

  async function sendMessage(chatId: number, text: string): Promise<boolean> {
    try {
      const response = await fetchImpl(`${baseUrl}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text }),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        console.error(`Error sending message to chat ${chatId}: HTTP ${response.status}`);
        return false;
      }
      return true;
    } catch (error) {
      console.error(`Error sending message to chat ${chatId}:`, error);
      return false;
    }
  }

  return { sendMessage };
}
