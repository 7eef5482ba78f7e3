import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTelegramClient, toInboundMessage } from './telegram.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('toInboundMessage', () => {
  it('extracts chat, sender and text', () => {
    const update = {
      update_id: 1,
      message: {
        message_id: 7,
        chat: { id: 99 },
        from: { id: 5, first_name: 'Ana', is_bot: false },
        text: '/saldo',
      },
    };
    expect(toInboundMessage(update)).toEqual({ chatId: 99, senderName: 'Ana', text: '/saldo' });
  });

  it('ignores updates without text', () => {
    expect(toInboundMessage({ update_id: 2 })).toBeNull();
    expect(toInboundMessage({ update_id: 3, message: { message_id: 1, chat: { id: 1 } } })).toBeNull();
    expect(toInboundMessage({ update_id: 4, message: { message_id: 1, chat: { id: 1 }, text: '  ' } })).toBeNull();
  });

  it('ignores malformed bodies', () => {
    expect(toInboundMessage('nope')).toBeNull();
    expect(toInboundMessage({ message: { text: '/saldo' } })).toBeNull();
  });
});

describe('createTelegramClient', () => {
  it('posts the message to the Bot API', async () => {
    const fetchImpl = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) => new Response('{"ok":true}', { status: 200 }),
    );
    const client = createTelegramClient({
      token: 'test-token',
      apiBase: 'https://telegram.example/',
      timeoutMs: 1000,
      fetchImpl,
    });

    await expect(client.sendMessage(99, 'hola')).resolves.toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://telegram.example/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ chat_id: 99, text: 'hola' }));
  });

  it('logs and swallows delivery failures', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing = createTelegramClient({
      token: 'test-token',
      apiBase: 'https://telegram.example',
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    });
    const rejected = createTelegramClient({
      token: 'test-token',
      apiBase: 'https://telegram.example',
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => new Response('', { status: 403 })),
    });

    await expect(failing.sendMessage(1, 'x')).resolves.toBe(false);
    await expect(rejected.sendMessage(1, 'x')).resolves.toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith('Error sending message to chat 1: HTTP 403');
  });
});
