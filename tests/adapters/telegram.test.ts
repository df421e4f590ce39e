import { describe, expect, it, vi } from 'vitest';
import { TelegramClient } from '../../src/adapters/telegram/client';
import { ChannelSendError, ExternalServiceError } from '../../src/shared/errors';
import { PROFESSIONAL_KEYBOARD } from '../../src/shared/types';
import { silentLogger } from '../support/fakes';

function clientReturning(status: number, body: string) {
  const fetch = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(body, { status }));
  const client = new TelegramClient({
    botToken: 'test-token',
    apiUrl: 'https://telegram.example.test/',
    fetch,
    log: silentLogger,
  });
  return { client, fetch };
}

describe('TelegramClient', () => {
  it('posts a Markdown message with the keyboard', async () => {
    const { client, fetch } = clientReturning(200, '{"ok":true,"result":{}}');

    await client.send('1001', 'Hello *Jane*', PROFESSIONAL_KEYBOARD);

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe('https://telegram.example.test/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '1001',
      text: 'Hello *Jane*',
      parse_mode: 'Markdown',
      reply_markup: {
        keyboard: [['Contact a professional']],
        resize_keyboard: true,
        one_time_keyboard: false,
        persistent: true,
      },
    });
  });

  it('raises ChannelSendError on an HTTP failure', async () => {
    const { client } = clientReturning(403, '{"ok":false,"description":"Forbidden: bot was blocked by the user"}');

    const attempt = client.send('1001', 'Hello');

    await expect(attempt).rejects.toBeInstanceOf(ChannelSendError);
    await expect(attempt).rejects.toMatchObject({ chatId: '1001' });
  });

  it('raises ChannelSendError when the API refuses the call', async () => {
    const { client } = clientReturning(200, '{"ok":false,"description":"chat not found"}');

    await expect(client.send('1001', 'Hello')).rejects.toThrow(
      'Telegram error: sendMessage rejected: chat not found'
    );
  });

  it('registers the webhook with its secret', async () => {
    const { client, fetch } = clientReturning(200, '{"ok":true,"result":true}');

    await client.setWebhook('https://echomind.example.test/ingest/telegram', 'test-webhook-secret');

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe('https://telegram.example.test/bottest-token/setWebhook');
    expect(JSON.parse(String(init?.body))).toEqual({
      url: 'https://echomind.example.test/ingest/telegram',
      allowed_updates: ['message'],
      secret_token: 'test-webhook-secret',
    });
  });

  it('wraps webhook failures', async () => {
    const { client } = clientReturning(500, 'oops');

    await expect(client.setWebhook('https://echomind.example.test/ingest/telegram')).rejects.toBeInstanceOf(
      ExternalServiceError
    );
  });
});
