/**
 * Unit tests for OneBotClient
 *
 * Note: These tests mock the OneBot HTTP API.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OneBotClient } from '../channels/onebot-client.js';
import { BotRegistry } from '../channels/chat-channel.js';

// Mock fetch globally
const mockFetch = vi.fn();
global.fetch = mockFetch;

function apiResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  };
}

/** What fetch throws when nothing listens on the port. */
function refused(): TypeError {
  return new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
}

function lastRequest(): { url: string; init: { method: string; headers: Record<string, string>; body: string } } {
  const call = mockFetch.mock.calls[mockFetch.mock.calls.length - 1];
  return { url: call[0], init: call[1] };
}

describe('OneBotClient', () => {
  let client: OneBotClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new OneBotClient({
      botId: '900',
      apiUrl: 'http://onebot.local:5700/',
      accessToken: 'test-secret',
      timeoutMs: 1000,
      retries: 1,
      retryDelayMs: 10,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Configuration', () => {
    it('should use default config values', () => {
      const health = new OneBotClient({ botId: '900' }).getHealth();
      expect(health.url).toBe('http://127.0.0.1:5700');
      expect(health.botId).toBe('900');
    });

    it('should strip trailing slashes from the URL', () => {
      expect(client.getHealth().url).toBe('http://onebot.local:5700');
    });
  });

  describe('sendDirect', () => {
    it('should post a private text message', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'ok', retcode: 0, data: { message_id: 1 } }));

      const result = await client.sendDirect('10001', 'hello');

      expect(result).toEqual({ ok: true });
      const { url, init } = lastRequest();
      expect(url).toBe('http://onebot.local:5700/send_private_msg');
      expect(init.method).toBe('POST');
      expect(init.headers['Authorization']).toBe('Bearer test-secret');
      expect(JSON.parse(init.body)).toEqual({
        user_id: 10001,
        message: [{ type: 'text', data: { text: 'hello' } }],
      });
    });

    it('should return the API failure without retrying', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse({ status: 'failed', retcode: 100, msg: 'SEND_MSG_API_ERROR', wording: 'not a friend' })
      );

      const result = await client.sendDirect('10001', 'hello');

      expect(result).toEqual({ ok: false, error: 'not a friend' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should fall back to the retcode when no text is given', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'failed', retcode: 1404 }));
      expect(await client.sendDirect('10001', 'hello')).toEqual({ ok: false, error: 'retcode 1404' });
    });

    it('should retry when the connection is refused and then report failure', async () => {
      mockFetch.mockRejectedValueOnce(refused());
      mockFetch.mockRejectedValueOnce(refused());

      const result = await client.sendDirect('10001', 'hello');

      expect(result).toEqual({ ok: false, error: 'fetch failed' });
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(client.getHealth().consecutiveErrors).toBe(1);
    });

    it('should succeed on retry', async () => {
      mockFetch.mockRejectedValueOnce(refused());
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'ok', retcode: 0 }));

      expect(await client.sendDirect('10001', 'hello')).toEqual({ ok: true });
      expect(client.getHealth().consecutiveErrors).toBe(0);
    });

    it('should not resend a message that timed out', async () => {
      const slow = new OneBotClient({ botId: '900', timeoutMs: 20, retries: 2, retryDelayMs: 1 });
      mockFetch.mockImplementation(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      );

      const result = await slow.sendDirect('10001', 'hello');

      expect(result).toEqual({ ok: false, error: 'OneBot did not answer within 20ms' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should not resend after the connection dropped mid-request', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed', { cause: { code: 'ECONNRESET' } }));
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'ok', retcode: 0 }));

      expect(await client.sendDirect('10001', 'hello')).toEqual({ ok: false, error: 'fetch failed' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should treat HTTP errors as transport failures without resending', async () => {
      mockFetch.mockResolvedValue(apiResponse({}, 502));

      expect(await client.sendDirect('10001', 'hello')).toEqual({ ok: false, error: 'OneBot returned 502' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('sendGroupMention', () => {
    it('should post an at segment followed by the text', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'ok', retcode: 0 }));

      await client.sendGroupMention('5555', '10001', 'are you there?');

      const { url, init } = lastRequest();
      expect(url).toBe('http://onebot.local:5700/send_group_msg');
      expect(JSON.parse(init.body)).toEqual({
        group_id: 5555,
        message: [
          { type: 'at', data: { qq: '10001' } },
          { type: 'text', data: { text: ' are you there?' } },
        ],
      });
    });
  });

  describe('isMember', () => {
    it('should be true when member info is returned', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'ok', retcode: 0, data: { user_id: 20002 } }));

      expect(await client.isMember('5555', '20002')).toBe(true);
      expect(JSON.parse(lastRequest().init.body)).toEqual({ group_id: 5555, user_id: 20002, no_cache: true });
    });

    it('should be false when the lookup fails', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'failed', retcode: 100 }));
      expect(await client.isMember('5555', '20002')).toBe(false);
    });

    it('should retry lookups after HTTP errors', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse({}, 502));
      mockFetch.mockResolvedValueOnce(apiResponse({ status: 'ok', retcode: 0, data: { user_id: 20002 } }));

      expect(await client.isMember('5555', '20002')).toBe(true);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should be false without a group', async () => {
      expect(await client.isMember('', '20002')).toBe(false);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});

describe('BotRegistry', () => {
  it('should resolve registered bots and nothing else', () => {
    const registry = new BotRegistry();
    const client = new OneBotClient({ botId: '900' });
    registry.register(client);

    expect(registry.resolve('900')).toBe(client);
    expect(registry.resolve('901')).toBeNull();
    expect(registry.list()).toEqual([client]);
  });
});
