import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { classify, type ClassificationRule } from '../classifier/index.js';
import { OriginClient, toForwardableMethod } from '../origin/client.js';
import { bufferBody, decodeBody, parseContentLength } from '../origin/buffer.js';
import { Deadline, OversizeBodyError } from '../origin/transport.js';
import { routeContent } from '../router/content-kind.js';
import { isTransformable, obfuscateBody, type ObfuscationSettings } from '../obfuscators/index.js';
import { assembleResponse } from '../assembler/response.js';
import { buildSpecialResponse } from '../assembler/special-response.js';
import { buildRouteLogEntry, firstHeader, logRoute } from '../logging/route-log.js';
import type {
  ChaffGateConfig,
  ClassificationDecision,
  ContentKind,
  IncomingRequest,
  ObfuscationResult,
  OriginResponse,
  OutgoingResponse,
  TransportError
} from '../types/index.js';

export interface PipelineDeps {
  config: ChaffGateConfig;
  rules: readonly ClassificationRule[];
  origin: OriginClient;
  obfuscation: ObfuscationSettings;
  logger: Logger;
}

export interface PipelineContext {
  requestId: string;
  startTime: number;
  body?: Readable;
}

export interface PipelineOutcome {
  response: OutgoingResponse;
  decision: ClassificationDecision;
  contentKind?: ContentKind;
  transformed: boolean;
}

// Statuses that never carry a body worth transforming
const BODYLESS_STATUSES = new Set([204, 205, 304]);

function transportFailureStatus(error: TransportError): number {
  return error.code === 'TIMEOUT' ? 504 : 502;
}

export class RequestPipeline {
  private readonly log: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.log = deps.logger.child({ module: 'pipeline' });
  }

  async handle(request: IncomingRequest, ctx: PipelineContext): Promise<PipelineOutcome> {
    const outcome = await this.run(request, ctx);

    logRoute(
      this.log,
      buildRouteLogEntry({
        requestId: ctx.requestId,
        request,
        status: outcome.response.statusCode,
        decision: outcome.decision,
        contentKind: outcome.contentKind,
        transformed: outcome.transformed,
        upstream: this.deps.origin.targetUrl(request),
        startTime: ctx.startTime
      })
    );

    return outcome;
  }

  private async run(request: IncomingRequest, ctx: PipelineContext): Promise<PipelineOutcome> {
    const { config, origin } = this.deps;

    // Classification happens before any network activity
    const decision = classify(request, this.deps.rules);

    const method = toForwardableMethod(request.method);
    if (!method) {
      return {
        response: buildSpecialResponse(501, config.errorPageStyle),
        decision,
        transformed: false
      };
    }

    const deadline = new Deadline(config.upstream.timeoutMs);
    const fetched = await origin.fetch({
      request,
      method,
      verdict: decision.verdict,
      body: ctx.body,
      signal: deadline.signal,
      deadlineExpired: () => deadline.expired
    });

    if (!fetched.ok) {
      deadline.clear();
      return this.transportFailure(ctx, fetched.error, decision);
    }

    const originResponse = fetched.value;
    const contentKind = routeContent(originResponse.headers);

    if (
      decision.verdict === 'passthrough' ||
      !isTransformable(contentKind) ||
      method === 'HEAD' ||
      BODYLESS_STATUSES.has(originResponse.statusCode) ||
      originResponse.body.kind !== 'stream'
    ) {
      // Streamed bodies are bounded by the agent's idle body timeout instead
      deadline.clear();
      return { response: assembleResponse(originResponse), decision, contentKind, transformed: false };
    }

    const buffered = await bufferBody(originResponse.body.stream, {
      maxBytes: config.upstream.maxBodyBytes,
      declaredLength: parseContentLength(originResponse.headers['content-length']),
      deadlineExpired: () => deadline.expired
    });
    deadline.clear();

    if (!buffered.ok) {
      if (buffered.error instanceof OversizeBodyError) {
        this.log.warn(
          { request_id: ctx.requestId, max_body_bytes: config.upstream.maxBodyBytes },
          'Body over buffering ceiling, streaming original'
        );
        const replayed: OriginResponse = {
          ...originResponse,
          body: { kind: 'stream', stream: buffered.error.replay }
        };
        return { response: assembleResponse(replayed), decision, contentKind, transformed: false };
      }

      return this.transportFailure(ctx, buffered.error, decision, contentKind);
    }

    const bufferedResponse: OriginResponse = {
      ...originResponse,
      body: { kind: 'buffered', bytes: buffered.value }
    };
    const result = this.transform(ctx, contentKind, bufferedResponse, buffered.value);

    return {
      response: assembleResponse(bufferedResponse, result),
      decision,
      contentKind,
      transformed: result.transformed
    };
  }

  private transform(
    ctx: PipelineContext,
    contentKind: 'html' | 'json',
    response: OriginResponse,
    original: Buffer
  ): ObfuscationResult {
    const encoding = firstHeader(response.headers, 'content-encoding');
    const decoded = decodeBody(original, encoding, this.deps.config.upstream.maxBodyBytes);

    if (decoded.kind === 'unsupported' || decoded.kind === 'failed') {
      this.log.warn(
        {
          request_id: ctx.requestId,
          content_encoding: encoding,
          error: decoded.kind === 'failed' ? decoded.error.message : undefined
        },
        'Cannot decode body, serving original'
      );
      return { body: original, transformed: false };
    }

    const outcome = obfuscateBody(contentKind, decoded.bytes, this.deps.obfuscation);
    if (!outcome.ok) {
      // Fail open with the original bytes
      this.log.warn(
        { request_id: ctx.requestId, content_kind: contentKind, code: outcome.error.code, error: outcome.error.message },
        'Obfuscation failed, serving original'
      );
      return { body: original, transformed: false };
    }

    return { body: outcome.value, transformed: true };
  }

  private transportFailure(
    ctx: PipelineContext,
    error: TransportError,
    decision: ClassificationDecision,
    contentKind?: ContentKind
  ): PipelineOutcome {
    const status = transportFailureStatus(error);
    const details = { request_id: ctx.requestId, code: error.code, error: error.message };

    if (error.code === 'TIMEOUT') {
      this.log.warn(details, 'Upstream request timed out');
    } else {
      this.log.error(details, 'Upstream request failed');
    }

    return {
      response: buildSpecialResponse(status, this.deps.config.errorPageStyle),
      decision,
      contentKind,
      transformed: false
    };
  }
}
