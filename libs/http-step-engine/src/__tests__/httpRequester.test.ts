import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FormData, MockAgent, ProxyAgent } from 'undici';
import { ClientBuildError, DecodeError, RequestBuildError, TimeoutError, TransportError } from '../errors';
import { HttpRequester } from '../httpRequester';
import { MultipartForm, RequestDescriptor } from '../request';
import type { Logger } from '../types';

const ORIGIN = 'http://shop.example.com';

const get = (path: string) => RequestDescriptor.builder('GET', `${ORIGIN}${path}`);

const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe('HttpRequester', () => {
  let mockAgent: MockAgent;
  let logger: Logger;
  let requester: HttpRequester;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    requester = new HttpRequester({ dispatcher: mockAgent, logger });
  });

  afterEach(async () => {
    await requester.close();
    await mockAgent.close();
  });

  describe('buildRequest', () => {
    it('binds method, url, timeout and headers', () => {
      const prepared = requester.buildRequest(
        get('/robots.txt').withHeader('Accept', 'text/plain').withTimeout(1_500).build(),
      );

      expect(prepared.method).toBe('GET');
      expect(prepared.url).toBe(`${ORIGIN}/robots.txt`);
      expect(prepared.timeoutMs).toBe(1_500);
      expect(prepared.headers).toEqual({ Accept: 'text/plain' });
    });

    it('rejects a malformed url', () => {
      const descriptor = RequestDescriptor.builder('GET', 'not a url').build();

      expect(() => requester.buildRequest(descriptor)).toThrow(RequestBuildError);
      expect(() => requester.buildRequest(descriptor)).toThrow('Invalid request URL "not a url"');
    });

    it('rejects a malformed header name', () => {
      const descriptor = get('/').withHeader('Bad Header', 'x').build();

      expect(() => requester.buildRequest(descriptor)).toThrow(/^Invalid header "Bad Header"/);
    });

    it('rejects a payload on a GET request', () => {
      const descriptor = get('/').withTextBody('q=1').build();

      expect(() => requester.buildRequest(descriptor)).toThrow('A GET request cannot carry a body');
    });

    it('encodes multipart forms as FormData', () => {
      const form = MultipartForm.empty()
        .text('sku', 'A-1')
        .bytes('file', new TextEncoder().encode('hello'), 'note.txt');
      const prepared = requester.buildRequest(
        RequestDescriptor.builder('POST', `${ORIGIN}/upload`).withMultipart(form).build(),
      );

      const body = prepared.request.body;
      if (!(body instanceof FormData)) {
        throw new Error('expected a FormData body');
      }
      expect(body.get('sku')).toBe('A-1');
      const file = body.get('file');
      expect(typeof file === 'object' && file?.name).toBe('note.txt');
    });
  });

  describe('buildClient', () => {
    it('reflects the current settings', () => {
      requester.settings.setUserAgent('stepwise-test/1.0').disableCompression();
      const client = requester.buildClient();

      expect(client.userAgent).toBe('stepwise-test/1.0');
      expect(client.compression).toBe(false);
      expect(client.proxy).toBeUndefined();
      expect(client.dispatcher).toBe(mockAgent);
      expect(client.maxRedirects).toBe(10);
    });

    it('rejects a malformed proxy url', () => {
      requester.settings.setProxy('not a url');

      expect(() => requester.buildClient()).toThrow(ClientBuildError);
      expect(() => requester.buildClient()).toThrow('Invalid proxy URL "not a url"');
    });

    it('rejects an unsupported proxy protocol', () => {
      requester.settings.setProxy('ftp://proxy.example.com');

      expect(() => requester.buildClient()).toThrow('Unsupported proxy protocol "ftp:"');
    });

    it('caches one proxy dispatcher per proxy url', () => {
      requester.settings.setProxy('http://proxy.example.com:8080');
      const first = requester.buildClient();
      const second = requester.buildClient();

      expect(first.proxy).toBe('http://proxy.example.com:8080');
      expect(first.dispatcher).toBeInstanceOf(ProxyAgent);
      expect(second.dispatcher).toBe(first.dispatcher);
    });
  });

  describe('send', () => {
    it('returns status, headers and body', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/robots.txt', method: 'GET' })
        .reply(200, 'User-agent: *', { headers: { 'content-type': 'text/plain' } });

      const response = await requester.buildRequest(get('/robots.txt').build()).send();

      expect(response.status).toBe(200);
      expect(response.redirected).toBe(false);
      expect(response.url).toBe(`${ORIGIN}/robots.txt`);
      expect(response.headers['content-type']).toBe('text/plain');
      expect(decode(await response.bytes())).toBe('User-agent: *');
    });

    it('sends the configured user agent and disables compression on request', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({
          path: '/',
          method: 'GET',
          headers: { 'user-agent': 'stepwise-test/1.0', 'accept-encoding': 'identity' },
        })
        .reply(200, 'ok');
      requester.settings.setUserAgent('stepwise-test/1.0').disableCompression();

      const response = await requester.buildRequest(get('/').build()).send();

      expect(response.status).toBe(200);
    });

    it('lets a descriptor header win over the client user agent', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/', method: 'GET', headers: { 'user-agent': 'explicit/2.0' } })
        .reply(200, 'ok');
      requester.settings.setUserAgent('stepwise-test/1.0');

      const response = await requester.buildRequest(get('/').withHeader('User-Agent', 'explicit/2.0').build()).send();

      expect(response.status).toBe(200);
    });

    it('stores cookies and sends them on later requests', async () => {
      const pool = mockAgent.get(ORIGIN);
      pool
        .intercept({ path: '/login', method: 'POST' })
        .reply(200, 'welcome', { headers: { 'set-cookie': 'sid=abc123; Path=/' } });
      pool.intercept({ path: '/account', method: 'GET', headers: { cookie: 'sid=abc123' } }).reply(200, 'account');

      const login = await requester
        .buildRequest(RequestDescriptor.builder('POST', `${ORIGIN}/login`).withTextBody('user=test').build())
        .send();
      await login.bytes();
      const account = await requester.buildRequest(get('/account').build()).send();

      expect(decode(await account.bytes())).toBe('account');
      expect(await requester.getCookieString(`${ORIGIN}/`)).toBe('sid=abc123');
    });

    it('follows redirects and keeps cookies set along the way', async () => {
      const pool = mockAgent.get(ORIGIN);
      pool
        .intercept({ path: '/start', method: 'GET' })
        .reply(302, '', { headers: { location: '/home', 'set-cookie': 'sid=r1; Path=/' } });
      pool.intercept({ path: '/home', method: 'GET', headers: { cookie: 'sid=r1' } }).reply(200, 'home');

      const response = await requester.buildRequest(get('/start').build()).send();

      expect(response.status).toBe(200);
      expect(response.redirected).toBe(true);
      expect(response.url).toBe(`${ORIGIN}/home`);
      expect(decode(await response.bytes())).toBe('home');
      expect(logger.debug).toHaveBeenCalledWith('http.redirect', {
        from: `${ORIGIN}/start`,
        to: `${ORIGIN}/home`,
        status: 302,
      });
    });

    it('switches to GET after a 303', async () => {
      const pool = mockAgent.get(ORIGIN);
      pool.intercept({ path: '/submit', method: 'POST' }).reply(303, '', { headers: { location: '/done' } });
      pool.intercept({ path: '/done', method: 'GET' }).reply(200, 'done');

      const response = await requester
        .buildRequest(RequestDescriptor.builder('POST', `${ORIGIN}/submit`).withJsonBody({ a: 1 }).build())
        .send();

      expect(response.url).toBe(`${ORIGIN}/done`);
      expect(decode(await response.bytes())).toBe('done');
    });

    it('gives up after the redirect limit', async () => {
      const limited = new HttpRequester({ dispatcher: mockAgent, maxRedirects: 1 });
      const pool = mockAgent.get(ORIGIN);
      pool.intercept({ path: '/a', method: 'GET' }).reply(302, '', { headers: { location: '/b' } });
      pool.intercept({ path: '/b', method: 'GET' }).reply(302, '', { headers: { location: '/c' } });

      const sending = limited.buildRequest(get('/a').build()).send();

      await expect(sending).rejects.toBeInstanceOf(TransportError);
      await expect(sending).rejects.toThrow('Transport error: too many redirects (limit 1)');
    });

    it('reports a connection failure as a transport error', async () => {
      const sending = requester.buildRequest(get('/unmatched').build()).send();

      await expect(sending).rejects.toBeInstanceOf(TransportError);
    });

    it('times out when the response is slower than the request timeout', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(200, 'late').delay(500);

      const sending = requester.buildRequest(get('/slow').withTimeout(50).build()).send();

      await expect(sending).rejects.toBeInstanceOf(TimeoutError);
      await expect(sending).rejects.toThrow('Request timed out after 50ms');
    });

    it('treats an abort with a timeout reason as a timeout', async () => {
      const reason = new Error('deadline reached');
      reason.name = 'TimeoutError';

      const sending = requester.buildRequest(get('/').build()).send({ signal: AbortSignal.abort(reason) });

      await expect(sending).rejects.toThrow('Request cancelled by a timeout signal');
    });

    it('treats any other abort as a transport error', async () => {
      const sending = requester.buildRequest(get('/').build()).send({ signal: AbortSignal.abort('stopped') });

      await expect(sending).rejects.toThrow('Transport error: request aborted: stopped');
    });
  });

  describe('cookies', () => {
    const seedCookie = async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/login', method: 'GET' })
        .reply(200, '', { headers: { 'set-cookie': 'sid=abc123; Path=/' } });
      const response = await requester.buildRequest(get('/login').build()).send();
      await response.bytes();
    };

    it('exports the jar as JSON without changing it', async () => {
      await seedCookie();

      const exported = JSON.parse(decode(await requester.exportCookies()));

      expect(exported.cookies).toHaveLength(1);
      expect(exported.cookies[0]).toMatchObject({ key: 'sid', value: 'abc123', domain: 'shop.example.com', path: '/' });
      expect(await requester.getCookieString(`${ORIGIN}/`)).toBe('sid=abc123');
    });

    it('imports an export into another requester', async () => {
      await seedCookie();
      const other = new HttpRequester({ dispatcher: mockAgent });

      await other.importCookies(await requester.exportCookies());

      expect(await other.getCookieString(`${ORIGIN}/`)).toBe('sid=abc123');
    });

    it('rejects an export that is not JSON', async () => {
      await expect(requester.importCookies(new TextEncoder().encode('not json'))).rejects.toBeInstanceOf(DecodeError);
    });
  });
});
