/**
 * Tests for Telegram delivery
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sendTelegramMessage, TelegramSink } from '../../src/delivery/telegram';

const mockFetch = vi.fn();

function apiResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const config = { botToken: 'test-token', chatId: '-100123' };

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('sendTelegramMessage', () => {
  it('should post HTML messages to the Bot API', async () => {
    mockFetch.mockResolvedValueOnce(apiResponse(200, { ok: true, result: { message_id: 7 } }));

    const result = await sendTelegramMessage('<b>Привет</b>', config);

    expect(result.success).toBe(true);
    expect(result.messageId).toBe(7);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '-100123',
      text: '<b>Привет</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: false,
    });
  });

  it('should report API errors without throwing', async () => {
    mockFetch.mockResolvedValueOnce(apiResponse(400, { ok: false, description: 'Bad Request: chat not found' }));

    const result = await sendTelegramMessage('text', config);

    expect(result.success).toBe(false);
    expect(result.error).toBe('Telegram API error 400: Bad Request: chat not found');
  });

  it('should print to the console when not configured', async () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', '');
    vi.stubEnv('TELEGRAM_CHAT_ID', '');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const result = await sendTelegramMessage('console text');

    expect(result.success).toBe(true);
    expect(mockFetch).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith('console text');
  });
});

describe('TelegramSink', () => {
  it('should send in order and count only successes', async () => {
    mockFetch
      .mockResolvedValueOnce(apiResponse(200, { ok: true, result: { message_id: 1 } }))
      .mockResolvedValueOnce(apiResponse(429, { ok: false, description: 'Too Many Requests' }))
      .mockResolvedValueOnce(apiResponse(200, { ok: true, result: { message_id: 2 } }));

    const sink = new TelegramSink({ ...config, pauseMs: 0 });
    const sent = await sink.send(
      ['first', 'second', 'third'].map((text) => ({ url: `https://dzen.ru/a/${text}`, renderMessage: () => text }))
    );

    expect(sent).toBe(2);
    const texts = mockFetch.mock.calls.map(([, init]) => JSON.parse(String(init?.body)).text);
    expect(texts).toEqual(['first', 'second', 'third']);
  });
});
