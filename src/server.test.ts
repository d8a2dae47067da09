import { Writable } from 'node:stream';
import { gzipSync } from 'node:zlib';
import pino, { type Logger } from 'pino';
import type { FastifyInstance } from 'fastify';
import { Agent, Dispatcher, MockAgent, errors, request } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseConfig } from './config/index.js';
import { toForwardableMethod } from './origin/client.js';
import { buildServer } from './server.js';

const ORIGIN = 'http://origin.test';
const BROWSER_UA = 'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0';
const CRAWLER_UA = 'Mozilla/5.0 (compatible; GPTBot/1.2; +https://openai.com/gptbot)';

function startsWith(prefix: string): (path: string) => boolean {
  return path => path.startsWith(prefix);
}

// Sends the headers and a first chunk, then holds the body open until aborted
class StallingDispatcher extends Dispatcher {
  dispatch(_options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    let aborted = false;
    handler.onConnect?.(reason => {
      if (aborted) return;
      aborted = true;
      handler.onError?.(reason ?? new Error('aborted'));
    });
    handler.onHeaders?.(200, [Buffer.from('content-type'), Buffer.from('text/html')], () => undefined, 'OK');
    handler.onData?.(Buffer.from('<p>Hello'));
    return true;
  }
}

describe('proxy server', () => {
  let agent: MockAgent;
  let app: FastifyInstance;

  async function start(overrides: Record<string, unknown> = {}, logger?: Logger): Promise<FastifyInstance> {
    const config = parseConfig({ upstream: { baseUrl: ORIGIN }, ...overrides });
    app = await buildServer(config, { dispatcher: agent, random: () => 0, logger });
    return app;
  }

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await app.close();
    await agent.close();
  });

  describe('passthrough', () => {
    it('returns the origin body byte for byte to ordinary clients', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/post', method: 'GET' })
        .reply(200, '<p>Hello world</p>', { headers: { 'content-type': 'text/html', 'x-origin': 'yes', etag: '"v1"' } });
      await start();

      const res = await app.inject({ method: 'GET', url: '/post', headers: { 'user-agent': BROWSER_UA } });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('<p>Hello world</p>');
      expect(res.headers['content-type']).toBe('text/html');
      expect(res.headers['x-origin']).toBe('yes');
      expect(res.headers['etag']).toBe('"v1"');
    });

    it('forwards origin errors unchanged', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/broken', method: 'GET' })
        .reply(500, 'upstream exploded', { headers: { 'content-type': 'text/plain' } });
      await start();

      const res = await app.inject({ method: 'GET', url: '/broken' });

      expect(res.statusCode).toBe(500);
      expect(res.body).toBe('upstream exploded');
    });

    it('forwards request bodies', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/submit', method: 'POST' })
        .reply(201, 'created', { headers: { 'content-type': 'text/plain' } });
      await start();

      const res = await app.inject({
        method: 'POST',
        url: '/submit',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        payload: 'name=test'
      });

      expect(res.statusCode).toBe(201);
      expect(res.body).toBe('created');
    });

    it('leaves opaque content alone even for crawlers', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/notes.txt', method: 'GET' })
        .reply(200, 'Plain notes', { headers: { 'content-type': 'text/plain' } });
      await start();

      const res = await app.inject({ method: 'GET', url: '/notes.txt', headers: { 'user-agent': CRAWLER_UA } });

      expect(res.body).toBe('Plain notes');
    });
  });

  describe('obfuscation', () => {
    it('rewrites HTML for the demonstration override', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: startsWith('/post?'), method: 'GET', headers: { 'accept-encoding': 'identity' } })
        .reply(200, '<p>Hello world</p>', {
          headers: { 'content-type': 'text/html; charset=utf-8', etag: '"v1"', 'content-length': '18' }
        });
      await start();

      const res = await app.inject({ method: 'GET', url: '/post?demo=1' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('<p>Aaaaa aaaaa</p>');
      expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(res.headers['content-length']).toBe('18');
      expect(res.headers['etag']).toBeUndefined();
    });

    it('rewrites JSON for matched crawlers', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/api/post', method: 'GET' })
        .reply(200, '{"title":"Real Post","views":42}', { headers: { 'content-type': 'application/json' } });
      await start();

      const res = await app.inject({ method: 'GET', url: '/api/post', headers: { 'user-agent': CRAWLER_UA } });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ title: 'Aaba Aaaa', views: 10 });
    });

    it('decodes a compressed body the origin sent anyway', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/zipped', method: 'GET' })
        .reply(200, gzipSync('<p>Hello world</p>'), {
          headers: { 'content-type': 'text/html', 'content-encoding': 'gzip' }
        });
      await start();

      const res = await app.inject({ method: 'GET', url: '/zipped', headers: { 'user-agent': CRAWLER_UA } });

      expect(res.body).toBe('<p>Aaaaa aaaaa</p>');
      expect(res.headers['content-encoding']).toBeUndefined();
    });

    it('serves the original body when declared JSON does not parse', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: startsWith('/api/broken'), method: 'GET' })
        .reply(200, '{"title":', { headers: { 'content-type': 'application/json' } });
      await start();

      const res = await app.inject({ method: 'GET', url: '/api/broken?demo=1' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('{"title":');
    });

    it('streams bodies over the buffering ceiling untouched', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/big', method: 'GET' })
        .reply(200, '<p>Hello world</p>', { headers: { 'content-type': 'text/html' } });
      await start({ upstream: { baseUrl: ORIGIN, maxBodyBytes: 8 } });

      const res = await app.inject({ method: 'GET', url: '/big', headers: { 'user-agent': CRAWLER_UA } });

      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('<p>Hello world</p>');
    });
  });

  describe('gateway failures', () => {
    it('answers 502 when the origin cannot be reached', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/down', method: 'GET' })
        .replyWithError(new Error('connect ECONNREFUSED 10.0.0.1:80'));
      await start();

      const res = await app.inject({ method: 'GET', url: '/down' });

      expect(res.statusCode).toBe(502);
      expect(res.body).toBe('502 Bad Gateway');
      expect(res.headers['cache-control']).toBe('no-store');
    });

    it('answers 504 when the origin times out', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/slow', method: 'GET' })
        .replyWithError(new errors.HeadersTimeoutError());
      await start({ errorPageStyle: 'nginx' });

      const res = await app.inject({ method: 'GET', url: '/slow' });

      expect(res.statusCode).toBe(504);
      expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(res.body).toContain('<title>504 Gateway Time-out</title>');
    });

    it('answers 504 when the headers arrive after the deadline', async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/late', method: 'GET' })
        .reply(200, 'too late', { headers: { 'content-type': 'text/plain' } })
        .delay(200);
      await start({ upstream: { baseUrl: ORIGIN, timeoutMs: 50 } });

      const res = await app.inject({ method: 'GET', url: '/late', headers: { 'user-agent': BROWSER_UA } });

      expect(res.statusCode).toBe(504);
      expect(res.body).toBe('504 Gateway Timeout');
    });

    it('answers 504 when a body being rewritten stalls past the deadline', async () => {
      const config = parseConfig({ upstream: { baseUrl: ORIGIN, timeoutMs: 50 } });
      app = await buildServer(config, { dispatcher: new StallingDispatcher(), random: () => 0 });

      const res = await app.inject({ method: 'GET', url: '/stalled', headers: { 'user-agent': CRAWLER_UA } });

      expect(res.statusCode).toBe(504);
      expect(res.body).toBe('504 Gateway Timeout');
    });
  });

  describe('extension methods', () => {
    // Fastify's inject only types the common methods, so these go over a loopback socket
    async function sendOverSocket(method: string, path: string) {
      const forwardable = toForwardableMethod(method);
      if (!forwardable) throw new Error(`${method} is not forwardable`);

      const address = await app.listen({ port: 0, host: '127.0.0.1' });
      const client = new Agent();
      try {
        const response = await request(`${address}${path}`, {
          method: forwardable,
          headers: { 'user-agent': BROWSER_UA },
          dispatcher: client
        });
        return { statusCode: response.statusCode, headers: response.headers, body: await response.body.text() };
      } finally {
        await client.close();
      }
    }

    it.each(['PROPFIND', 'SEARCH', 'MKCOL'])('forwards %s to the origin', async method => {
      agent
        .get(ORIGIN)
        .intercept({ path: '/dav', method })
        .reply(207, '<multistatus/>', { headers: { 'content-type': 'application/xml' } });
      await start();

      const res = await sendOverSocket(method, '/dav');

      expect(res.statusCode).toBe(207);
      expect(res.body).toBe('<multistatus/>');
      expect(res.headers['content-type']).toBe('application/xml');
    });
  });

  describe('route log', () => {
    it('writes one line per request with the decision', async () => {
      const lines: string[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString('utf-8'));
          callback();
        }
      });

      agent
        .get(ORIGIN)
        .intercept({ path: '/post', method: 'GET' })
        .reply(200, '<p>Hello world</p>', { headers: { 'content-type': 'text/html' } });
      await start({}, pino({ level: 'info' }, sink));

      await app.inject({
        method: 'GET',
        url: '/post',
        headers: { 'user-agent': CRAWLER_UA, 'x-request-id': 'req-123', 'x-forwarded-for': '203.0.113.7, 10.0.0.2' }
      });

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        module: 'pipeline',
        request_id: 'req-123',
        method: 'GET',
        url: '/post',
        status: 200,
        verdict: 'obfuscate',
        reason: 'matched-signature',
        rule: 'GPTBot',
        content_kind: 'html',
        transformed: true,
        upstream: 'http://origin.test/post',
        client_ip: '203.0.113.7',
        user_agent: CRAWLER_UA,
        referer: '-',
        msg: '200 "GET /post" obfuscate'
      });
    });
  });
});
