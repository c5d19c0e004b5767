import { describe, it, expect } from 'vitest';
import {
  classifyResponse,
  createFetchRequest,
  fetchOnce,
  isRetriableStatus,
  parseRetryAfter,
} from '../fetch/fetcher.js';
import { fakeTransport, htmlResponse, networkError, statusResponse } from './test-helpers.js';

describe('createFetchRequest', () => {
  it('derives the lower-cased domain and freezes the request', () => {
    const request = createFetchRequest('https://WWW.Example.com/Path', 2);
    expect(request).toEqual({ url: 'https://WWW.Example.com/Path', attempt: 2, domain: 'www.example.com' });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('throws on an unparseable URL', () => {
    expect(() => createFetchRequest('nope')).toThrow();
  });
});

describe('isRetriableStatus', () => {
  it.each([
    [500, true],
    [503, true],
    [429, true],
    [404, false],
    [403, false],
    [400, false],
  ])('status %i → %s', (status, expected) => {
    expect(isRetriableStatus(status)).toBe(expected);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120_000);
  });

  it('reads an HTTP date relative to now', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';
    expect(parseRetryAfter(date, Date.parse(date) - 5_000)).toBe(5_000);
  });

  it('clamps past dates to zero', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';
    expect(parseRetryAfter(date, Date.parse(date) + 5_000)).toBe(0);
  });

  it('returns undefined for missing or garbage values', () => {
    expect(parseRetryAfter(undefined, 0)).toBeUndefined();
    expect(parseRetryAfter('soon', 0)).toBeUndefined();
  });
});

describe('classifyResponse', () => {
  const request = createFetchRequest('https://example.com/', 1);

  it('classifies 2xx as success', () => {
    const result = classifyResponse(request, htmlResponse('<p>hi</p>'), 12, 0);
    expect(result).toEqual({
      ok: true,
      url: 'https://example.com/',
      status: 200,
      body: '<p>hi</p>',
      headers: { 'content-type': 'text/html' },
      elapsedMs: 12,
      attempts: 2,
    });
  });

  it('passes on the final URL when the transport reports one', () => {
    const result = classifyResponse(
      request,
      { ...htmlResponse('<p>hi</p>'), finalUrl: 'https://example.com/landing' },
      0,
      0
    );
    expect(result).toMatchObject({ ok: true, finalUrl: 'https://example.com/landing' });
  });

  it('treats 3xx left after redirects as success', () => {
    const result = classifyResponse(request, statusResponse(304), 0, 0);
    expect(result.ok).toBe(true);
  });

  it('marks 503 retriable and carries Retry-After', () => {
    const result = classifyResponse(request, statusResponse(503, { 'retry-after': '7' }), 0, 0);
    expect(result).toMatchObject({
      ok: false,
      kind: 'http_status_error',
      retriable: true,
      statusCode: 503,
      retryAfterMs: 7_000,
    });
  });

  it('marks 404 not retriable', () => {
    const result = classifyResponse(request, statusResponse(404), 0, 0);
    expect(result).toMatchObject({ ok: false, kind: 'http_status_error', retriable: false, statusCode: 404 });
    expect(result).not.toHaveProperty('retryAfterMs');
  });

  it('classifies timeouts and network errors as retriable', () => {
    const timeout = classifyResponse(
      request,
      { success: false, statusCode: 0, headers: {}, error: 'timeout' },
      0,
      0
    );
    expect(timeout).toMatchObject({ ok: false, kind: 'timeout', retriable: true });

    const network = classifyResponse(request, networkError('ECONNRESET'), 0, 0);
    expect(network).toMatchObject({
      ok: false,
      kind: 'network_error',
      retriable: true,
      message: 'ECONNRESET',
    });
  });

  it('classifies oversized bodies as not retriable', () => {
    const result = classifyResponse(
      request,
      { success: false, statusCode: 200, headers: {}, error: 'response_too_large', message: 'too big' },
      0,
      0
    );
    expect(result).toMatchObject({
      ok: false,
      kind: 'response_too_large',
      retriable: false,
      statusCode: 200,
      message: 'too big',
    });
  });
});

describe('fetchOnce', () => {
  it('issues one request with timeout, preset and User-Agent', async () => {
    const fake = fakeTransport({ 'https://example.com/': htmlResponse('<p>ok</p>') });
    let tick = 100;

    const result = await fetchOnce(createFetchRequest('https://example.com/'), {
      transport: fake.transport,
      timeoutMs: 5_000,
      userAgent: 'test-agent/1.0',
      preset: 'chrome-143',
      now: () => (tick += 25),
    });

    expect(fake.calls).toEqual(['https://example.com/']);
    expect(fake.options[0]).toEqual({
      timeoutMs: 5_000,
      headers: { 'User-Agent': 'test-agent/1.0' },
      preset: 'chrome-143',
    });
    expect(result).toMatchObject({ ok: true, status: 200, elapsedMs: 25, attempts: 1 });
  });

  it('sends no User-Agent header when none is configured', async () => {
    const fake = fakeTransport({ 'https://example.com/': htmlResponse('') });
    await fetchOnce(createFetchRequest('https://example.com/'), {
      transport: fake.transport,
      timeoutMs: 1_000,
    });
    expect(fake.options[0].headers).toEqual({});
  });
});
