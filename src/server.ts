import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { Dispatcher } from 'undici';
import { v4 as uuidv4 } from 'uuid';

import type { ChaffGateConfig, IncomingRequest, OutgoingResponse } from './types/index.js';
import { buildRules } from './classifier/index.js';
import { OriginClient, createOriginAgent } from './origin/client.js';
import { createObfuscationSettings, type RandomSource } from './obfuscators/index.js';
import { RequestPipeline } from './pipeline/handler.js';
import { buildSpecialResponse } from './assembler/special-response.js';
import { firstHeader } from './logging/route-log.js';
import { silentLogger, type Logger } from './logging/logger.js';

export interface ServerDeps {
  logger?: Logger;
  // Outbound dispatcher; an agent is created (and closed with the server) when omitted
  dispatcher?: Dispatcher;
  random?: RandomSource;
}

export function toIncomingRequest(request: FastifyRequest): IncomingRequest {
  const url = request.raw.url ?? request.url;
  const queryStart = url.indexOf('?');
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  const rawQuery = queryStart === -1 ? '' : url.slice(queryStart + 1);

  const query: Record<string, string[]> = {};
  for (const [name, value] of new URLSearchParams(rawQuery)) {
    (query[name] ??= []).push(value);
  }

  return Object.freeze({
    method: request.method,
    url,
    path,
    rawQuery,
    query,
    headers: { ...request.headers },
    remoteAddress: request.ip
  });
}

function sendOutgoing(reply: FastifyReply, outgoing: OutgoingResponse): FastifyReply {
  reply.code(outgoing.statusCode);
  for (const [name, value] of Object.entries(outgoing.headers)) {
    if (value !== undefined) reply.header(name, value);
  }
  return reply.send(outgoing.body);
}

export async function buildServer(config: ChaffGateConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const logger = deps.logger ?? silentLogger();
  const ownsDispatcher = deps.dispatcher === undefined;
  const dispatcher = deps.dispatcher ?? createOriginAgent(config.upstream);

  const pipeline = new RequestPipeline({
    config,
    rules: buildRules(config.classifier),
    origin: new OriginClient({ baseUrl: config.upstream.baseUrl, dispatcher }),
    obfuscation: createObfuscationSettings(config.obfuscation, deps.random),
    logger
  });

  // pino is used directly; Fastify's own logger stays off
  const app = Fastify({ logger: false, exposeHeadRoutes: false, disableRequestLogging: true });

  // Request bodies are streamed to the origin untouched
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', (_request, _payload, done) => {
    done(null);
  });

  app.setErrorHandler((error, request, reply) => {
    logger.error({ error: error.message, method: request.method, url: request.url }, 'Unhandled error in proxy route');
    return sendOutgoing(reply, buildSpecialResponse(502, config.errorPageStyle));
  });

  app.all('*', async (request, reply) => {
    const startTime = Date.now();
    const incoming = toIncomingRequest(request);
    const requestId = firstHeader(incoming.headers, 'x-request-id') ?? uuidv4();
    const hasBody = request.method !== 'GET' && request.method !== 'HEAD';

    const outcome = await pipeline.handle(incoming, {
      requestId,
      startTime,
      body: hasBody ? request.raw : undefined
    });

    return sendOutgoing(reply, outcome.response);
  });

  if (ownsDispatcher) {
    app.addHook('onClose', async () => {
      await dispatcher.close();
    });
  }

  return app;
}
