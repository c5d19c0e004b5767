import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockGet = vi.fn();
const mockClose = vi.fn();
const mockSessionOptions: Record<string, unknown>[] = [];

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('httpcloak', () => ({
  default: {
    Session: class MockSession {
      get = mockGet;
      close = mockClose;
      constructor(opts?: Record<string, unknown>) {
        mockSessionOptions.push(opts ?? {});
      }
    },
    Preset: {
      CHROME_143: 'chrome_143',
      FIREFOX_133: 'firefox_133',
    },
  },
}));

import { closeAllSessions, httpRequest } from '../fetch/http-client.js';

const URL_A = 'https://example.com/page';

describe('fetch/http-client', () => {
  beforeEach(async () => {
    await closeAllSessions();
    vi.clearAllMocks();
    mockSessionOptions.length = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('httpRequest', () => {
    it('returns the body, status and lower-cased headers', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: '<html>Hello</html>',
        headers: { 'Content-Type': 'text/html', 'Retry-After': '5' },
      });

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });

      expect(result).toEqual({
        success: true,
        statusCode: 200,
        body: '<html>Hello</html>',
        headers: { 'content-type': 'text/html', 'retry-after': '5' },
      });
    });

    it('reports the post-redirect URL when the response carries one', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: '<html></html>',
        headers: {},
        url: 'https://example.com/landing',
      });

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result.finalUrl).toBe('https://example.com/landing');
    });

    it('handles text-as-function quirk', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: () => '<html>Function text</html>',
        headers: {},
      });

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result.body).toBe('<html>Function text</html>');
    });

    it('reports HTTP errors without throwing', async () => {
      mockGet.mockResolvedValue({ ok: false, statusCode: 503, text: 'busy', headers: {} });

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result).toMatchObject({ success: false, statusCode: 503, body: 'busy' });
      expect(result.error).toBeUndefined();
    });

    it('merges caller headers over the defaults', async () => {
      mockGet.mockResolvedValue({ ok: true, statusCode: 200, text: '', headers: {} });

      await httpRequest(URL_A, { timeoutMs: 30_000, headers: { 'User-Agent': 'test-agent' } });

      expect(mockGet).toHaveBeenCalledWith(URL_A, {
        headers: {
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
          'Cache-Control': 'no-cache',
          'User-Agent': 'test-agent',
        },
      });
    });

    it('rejects oversized Content-Length', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: 'small',
        headers: { 'Content-Length': String(20 * 1024 * 1024) },
      });

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result).toMatchObject({ success: false, statusCode: 200, error: 'response_too_large' });
    });

    it('rejects response body exceeding size limit without Content-Length', async () => {
      mockGet.mockResolvedValue({
        ok: true,
        statusCode: 200,
        text: 'x'.repeat(10 * 1024 * 1024 + 1),
        headers: {},
      });

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result.error).toBe('response_too_large');
    });

    it('reports session.get errors as network failures', async () => {
      mockGet.mockRejectedValue(new Error('Connection refused'));

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result).toMatchObject({ success: false, statusCode: 0, error: 'network' });
      expect(result.message).toContain('Connection refused');
    });

    it('classifies timeout messages from the client as timeouts', async () => {
      mockGet.mockRejectedValue(new Error('request timed out'));

      const result = await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(result.error).toBe('timeout');
    });

    it('times out a request that never answers', async () => {
      vi.useFakeTimers();
      mockGet.mockReturnValue(new Promise(() => {}));

      const pending = httpRequest(URL_A, { timeoutMs: 1_000 });
      await vi.advanceTimersByTimeAsync(1_000);
      const result = await pending;

      expect(result).toMatchObject({ success: false, statusCode: 0, error: 'timeout' });
      expect(result.message).toContain('Request timeout after 1000ms');
    });
  });

  describe('session cache', () => {
    it('reuses one session per preset and timeout', async () => {
      mockGet.mockResolvedValue({ ok: true, statusCode: 200, text: '', headers: {} });

      await httpRequest(URL_A, { timeoutMs: 30_000 });
      await httpRequest('https://other.test/', { timeoutMs: 30_000 });
      await httpRequest(URL_A, { timeoutMs: 10_000 });
      await httpRequest(URL_A, { timeoutMs: 30_000, preset: 'firefox_133' });

      expect(mockSessionOptions).toEqual([
        { preset: 'chrome_143', timeout: 30 },
        { preset: 'chrome_143', timeout: 10 },
        { preset: 'firefox_133', timeout: 30 },
      ]);
    });

    it('rounds sub-second timeouts up to one second', async () => {
      mockGet.mockResolvedValue({ ok: true, statusCode: 200, text: '', headers: {} });

      await httpRequest(URL_A, { timeoutMs: 250 });
      expect(mockSessionOptions).toEqual([{ preset: 'chrome_143', timeout: 1 }]);
    });

    it('closeAllSessions closes every session and clears the cache', async () => {
      mockGet.mockResolvedValue({ ok: true, statusCode: 200, text: '', headers: {} });
      await httpRequest(URL_A, { timeoutMs: 30_000 });
      await httpRequest(URL_A, { timeoutMs: 5_000 });

      await closeAllSessions();
      expect(mockClose).toHaveBeenCalledTimes(2);

      await httpRequest(URL_A, { timeoutMs: 30_000 });
      expect(mockSessionOptions).toHaveLength(3);
    });
  });
});
