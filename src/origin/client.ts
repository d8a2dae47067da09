import type { Readable } from 'node:stream';
import { Agent, request, type Dispatcher } from 'undici';
import type { ClassificationVerdict, IncomingRequest, OriginResponse, UpstreamConfig } from '../types/index.js';
import { err, ok, type Result, type TransportError } from '../types/index.js';
import { buildForwardHeaders } from './headers.js';
import { toTransportError } from './transport.js';

// RFC 9110 method token
const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

// CONNECT opens a tunnel rather than an exchange; undici refuses it on `request`
const TUNNEL_METHODS: ReadonlySet<string> = new Set(['CONNECT']);

export type ForwardableMethod = Dispatcher.HttpMethod;

function isForwardableMethod(method: string): method is ForwardableMethod {
  return METHOD_TOKEN.test(method) && !TUNNEL_METHODS.has(method.toUpperCase());
}

// Every method is forwarded as received (WebDAV and extension methods included), except tunnels
export function toForwardableMethod(method: string): ForwardableMethod | undefined {
  return isForwardableMethod(method) ? method : undefined;
}

// Shared, pooled connections to the backend
export function createOriginAgent(config: UpstreamConfig): Agent {
  return new Agent({
    connections: config.connections,
    connectTimeout: config.timeoutMs,
    headersTimeout: config.timeoutMs,
    bodyTimeout: config.timeoutMs,
    keepAliveTimeout: 4_000
  });
}

export interface OriginClientOptions {
  baseUrl: string;
  dispatcher: Dispatcher;
}

export interface OriginFetch {
  request: IncomingRequest;
  method: ForwardableMethod;
  verdict: ClassificationVerdict;
  body?: Readable;
  signal: AbortSignal;
  deadlineExpired: () => boolean;
}

export class OriginClient {
  private readonly baseUrl: string;
  private readonly upstreamHost: string;
  private readonly dispatcher: Dispatcher;

  constructor(options: OriginClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.upstreamHost = new URL(this.baseUrl).host;
    this.dispatcher = options.dispatcher;
  }

  targetUrl(incoming: IncomingRequest): string {
    return `${this.baseUrl}${incoming.url.startsWith('/') ? '' : '/'}${incoming.url}`;
  }

  async fetch(params: OriginFetch): Promise<Result<OriginResponse, TransportError>> {
    const { method } = params;
    const hasBody = method !== 'GET' && method !== 'HEAD' && params.body !== undefined;

    try {
      const response = await request(this.targetUrl(params.request), {
        method,
        headers: buildForwardHeaders(params.request, this.upstreamHost, params.verdict),
        body: hasBody ? params.body : undefined,
        dispatcher: this.dispatcher,
        signal: params.signal
      });

      return ok({
        statusCode: response.statusCode,
        headers: response.headers,
        body: { kind: 'stream', stream: response.body }
      });
    } catch (error) {
      return err(toTransportError(error, params.deadlineExpired()));
    }
  }
}
