import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { HttpWorkerHandle, classifyApiError, DEFAULT_RETRY_AFTER_SECONDS } from '../../src/workers/bindings/http.js';
import { MAX_COOLDOWN_SECONDS, authExpired, rateLimited, transient } from '../../src/workers/handle.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { workItem } from '../helpers/fakes.js';

function reply(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('classifyApiError', () => {
  it('maps 429 to a rate limit with the advertised cooldown', () => {
    const error = classifyApiError(429, {
      ok: false,
      error_code: 429,
      description: 'Too Many Requests: retry after 12',
      parameters: { retry_after: 12 },
    });
    expect(error).toEqual(rateLimited(12, 'Too Many Requests: retry after 12'));
  });

  it('caps a cooldown longer than a day', () => {
    const error = classifyApiError(429, { ok: false, description: 'Too Many Requests', parameters: { retry_after: 1e17 } });
    expect(error).toEqual({ kind: 'rate-limited', cooldownSeconds: MAX_COOLDOWN_SECONDS, message: 'Too Many Requests' });
  });

  it('falls back to the default cooldown', () => {
    expect(classifyApiError(429, null)).toEqual(rateLimited(DEFAULT_RETRY_AFTER_SECONDS, 'HTTP 429'));
  });

  it('prefers the error code in the body over the HTTP status', () => {
    expect(classifyApiError(400, { ok: false, error_code: 403, description: 'Forbidden: bot was blocked' }))
      .toEqual(authExpired('Forbidden: bot was blocked'));
  });

  it('treats anything else as transient', () => {
    expect(classifyApiError(500, null)).toEqual(transient('HTTP 500'));
    expect(classifyApiError(400, { ok: false, description: 'Bad Request: chat not found' }))
      .toEqual(transient('Bad Request: chat not found'));
  });
});

describe('HttpWorkerHandle', () => {
  let fetchMock: Mock<typeof fetch>;
  let handle: HttpWorkerHandle;

  beforeEach(() => {
    setLogLevel('silent');
    fetchMock = vi.fn<typeof fetch>();
    handle = new HttpWorkerHandle(
      { id: 'a', credentials: { token: 'test-token' } },
      { apiBase: 'https://api.example.test/', targetChatId: '-100123', requestTimeoutMs: 1_000, fetchImpl: fetchMock },
    );
  });

  it('authorizes with getMe on connect', async () => {
    fetchMock.mockResolvedValueOnce(reply({ ok: true, result: { id: 1, is_bot: true } }));

    expect(await handle.connect()).toEqual({ ok: true });
    expect(handle.isConnected()).toBe(true);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.test/bottest-token/getMe');
    expect(init?.method).toBe('GET');
  });

  it('reports a rejected token on connect', async () => {
    fetchMock.mockResolvedValueOnce(reply({ ok: false, error_code: 401, description: 'Unauthorized' }, 401));

    expect(await handle.connect()).toEqual({ ok: false, error: authExpired('Unauthorized') });
    expect(handle.isConnected()).toBe(false);
  });

  it('refuses to execute before connecting', async () => {
    expect(await handle.execute(workItem('w1'))).toEqual({ ok: false, error: transient('Not connected') });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts the work item text to the target chat', async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ ok: true, result: {} }))
      .mockResolvedValueOnce(reply({ ok: true, result: { message_id: 77 } }));
    await handle.connect();

    const result = await handle.execute(workItem('w1', 'Need slides for Monday'));

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.outcome.remoteId).toBe('77');

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://api.example.test/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ chat_id: '-100123', text: 'Need slides for Monday' });
  });

  it('stays connected through a rate limit', async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ ok: true, result: {} }))
      .mockResolvedValueOnce(reply({ ok: false, error_code: 429, description: 'Too Many Requests', parameters: { retry_after: 5 } }, 429));
    await handle.connect();

    expect(await handle.execute(workItem('w1'))).toEqual({ ok: false, error: rateLimited(5, 'Too Many Requests') });
    expect(handle.isConnected()).toBe(true);
  });

  it('drops the connection when authorization is lost mid-session', async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ ok: true, result: {} }))
      .mockResolvedValueOnce(reply({ ok: false, error_code: 401, description: 'Unauthorized' }, 401));
    await handle.connect();

    const result = await handle.execute(workItem('w1'));
    expect(result).toEqual({ ok: false, error: authExpired('Unauthorized') });
    expect(handle.isConnected()).toBe(false);
  });

  it('turns network errors and unreadable replies into transient errors', async () => {
    fetchMock
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
      .mockResolvedValueOnce(new Response('<html>Bad Gateway</html>', { status: 502 }));

    expect(await handle.connect()).toEqual({ ok: false, error: transient('connect ECONNREFUSED') });
    expect(await handle.connect()).toEqual({ ok: false, error: transient('HTTP 502') });
  });

  it('forgets the session on disconnect', async () => {
    fetchMock.mockResolvedValueOnce(reply({ ok: true, result: {} }));
    await handle.connect();
    await handle.disconnect();
    expect(handle.isConnected()).toBe(false);
  });
});
