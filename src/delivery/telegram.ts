/**
 * NewsRelay — Telegram Delivery
 *
 * Sends rendered items to one chat through the Bot API (HTML parse mode).
 * Without a bot token or chat id, messages go to the console instead.
 */

import { DeliveryError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';
import type { DeliverableItem } from './messages';

// ============================================================
// TYPES
// ============================================================

export interface TelegramConfig {
  botToken?: string;
  chatId?: string;
  apiBase?: string;
}

export interface TelegramResult {
  success: boolean;
  messageId?: number;
  error?: string;
  sentAt: string;
}

export interface DeliverySink {
  /** Sends in order; returns how many items were sent successfully */
  send(items: readonly DeliverableItem[]): Promise<number>;
}

interface TelegramApiResponse {
  ok: boolean;
  result?: { message_id: number };
  description?: string;
}

const TELEGRAM_API = 'https://api.telegram.org';

function getDefaultConfig(): TelegramConfig {
  return {
    botToken: process.env.TELEGRAM_BOT_TOKEN,
    chatId: process.env.TELEGRAM_CHAT_ID,
  };
}

// ============================================================
// SEND
// ============================================================

async function sendViaBotApi(
  config: Required<Pick<TelegramConfig, 'botToken' | 'chatId'>> & TelegramConfig,
  text: string
): Promise<TelegramResult> {
  const res = await fetch(`${config.apiBase ?? TELEGRAM_API}/bot${config.botToken}/sendMessage`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      chat_id: config.chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: false,
    }),
  });

  const data = (await res.json()) as TelegramApiResponse;
  if (!res.ok || !data.ok) {
    throw new DeliveryError(res.status, data.description ?? 'unknown error');
  }

  return {
    success: true,
    messageId: data.result?.message_id,
    sentAt: new Date().toISOString(),
  };
}

/**
 * Send one HTML message. Never throws; failures come back as success: false.
 */
export async function sendTelegramMessage(
  text: string,
  config?: Partial<TelegramConfig>
): Promise<TelegramResult> {
  const merged: TelegramConfig = { ...getDefaultConfig(), ...config };

  try {
    if (merged.botToken && merged.chatId) {
      const result = await sendViaBotApi({ ...merged, botToken: merged.botToken, chatId: merged.chatId }, text);
      logger.debug('Telegram message sent', { messageId: result.messageId });
      return result;
    }

    // Console fallback
    console.log('='.repeat(60));
    console.log('TELEGRAM MESSAGE (Console Fallback)');
    console.log('='.repeat(60));
    console.log(text);
    console.log('='.repeat(60));

    return { success: true, sentAt: new Date().toISOString() };
  } catch (error) {
    const errorMsg = errorMessage(error);
    logger.error('Telegram send failed', { error: errorMsg });
    return { success: false, error: errorMsg, sentAt: new Date().toISOString() };
  }
}

// ============================================================
// SINK
// ============================================================

export interface TelegramSinkOptions extends Partial<TelegramConfig> {
  /** Pause after each successful message, to stay under chat rate limits */
  pauseMs?: number;
}

export class TelegramSink implements DeliverySink {
  private readonly config: Partial<TelegramConfig>;
  private readonly pauseMs: number;

  constructor(options: TelegramSinkOptions = {}) {
    const { pauseMs, ...config } = options;
    this.config = config;
    this.pauseMs = pauseMs ?? 500;
  }

  async send(items: readonly DeliverableItem[]): Promise<number> {
    let sent = 0;
    for (const item of items) {
      const result = await sendTelegramMessage(item.renderMessage(), this.config);
      if (!result.success) {
        logger.warn('Item not delivered', { url: item.url, error: result.error });
        continue;
      }
      sent++;
      if (this.pauseMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.pauseMs));
      }
    }
    return sent;
  }
}
