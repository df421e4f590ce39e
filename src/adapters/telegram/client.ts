import { z } from 'zod';
import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import { ChannelSendError, ExternalServiceError, toError } from '../../shared/errors';
import type { ChatChannel, ReplyKeyboard } from '../../shared/types';

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramClientOptions {
  botToken: string;
  apiUrl: string;
  fetch?: typeof fetch;
  log?: Logger;
}

/**
 * Outbound side of the Telegram Bot API. Inbound updates arrive through the
 * webhook route.
 */
export class TelegramClient implements ChatChannel {
  private baseUrl: string;
  private fetchImpl: typeof fetch;
  private log: Logger;

  constructor(options: TelegramClientOptions) {
    this.baseUrl = `${options.apiUrl.replace(/\/+$/, '')}/bot${options.botToken}`;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = (options.log ?? rootLogger).child({ component: 'telegram' });
  }

  /**
   * Send a Markdown text message, optionally with a reply keyboard
   */
  async send(chatId: string, text: string, keyboard?: ReplyKeyboard): Promise<void> {
    const body: Record<string, unknown> = {
      chat_id: chatId,
      text,
      parse_mode: 'Markdown',
    };

    if (keyboard) {
      body.reply_markup = keyboard;
    }

    try {
      await this.call('sendMessage', body);
      this.log.debug({ chatId, contentLength: text.length }, 'Message sent via Telegram');
    } catch (error) {
      if (error instanceof ChannelSendError) throw error;
      const err = toError(error);
      throw new ChannelSendError(chatId, err.message, err);
    }
  }

  /**
   * Register the webhook URL Telegram should deliver message updates to
   */
  async setWebhook(url: string, secretToken?: string): Promise<void> {
    const body: Record<string, unknown> = {
      url,
      allowed_updates: ['message'],
    };
    if (secretToken) {
      body.secret_token = secretToken;
    }

    try {
      await this.call('setWebhook', body);
      this.log.info({ url }, 'Telegram webhook registered');
    } catch (error) {
      const err = toError(error);
      throw new ExternalServiceError('Telegram', `Failed to set webhook: ${err.message}`, err);
    }
  }

  private async call(method: string, body: Record<string, unknown>): Promise<void> {
    const response = await this.fetchImpl(`${this.baseUrl}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new Error(`${method} failed: ${response.status} ${text}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new Error(`${method} returned invalid JSON`);
    }

    const parsed = telegramResponseSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : 'malformed response';
      throw new Error(`${method} rejected: ${description ?? 'unknown error'}`);
    }
  }
}
