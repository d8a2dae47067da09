import type { Logger } from 'pino';
import type { ClassificationDecision, ContentKind, HeaderMap, IncomingRequest } from '../types/index.js';

export interface RouteLogEntry {
  request_id: string;
  method: string;
  url: string;
  status: number;
  verdict: ClassificationDecision['verdict'];
  reason: ClassificationDecision['reason'];
  rule?: string;
  content_kind?: ContentKind;
  transformed: boolean;
  upstream: string;
  client_ip: string;
  user_agent: string;
  referer: string;
  elapsed_ms: number;
}

export function firstHeader(headers: Readonly<HeaderMap>, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function clientIp(request: IncomingRequest): string {
  const forwarded = firstHeader(request.headers, 'x-forwarded-for');
  const first = forwarded?.split(',')[0]?.trim();
  return first ? first : request.remoteAddress;
}

export function buildRouteLogEntry(params: {
  requestId: string;
  request: IncomingRequest;
  status: number;
  decision: ClassificationDecision;
  contentKind?: ContentKind;
  transformed: boolean;
  upstream: string;
  startTime: number;
}): RouteLogEntry {
  const { request, decision } = params;

  return {
    request_id: params.requestId,
    method: request.method,
    url: request.url,
    status: params.status,
    verdict: decision.verdict,
    reason: decision.reason,
    rule: decision.rule,
    content_kind: params.contentKind,
    transformed: params.transformed,
    upstream: params.upstream,
    client_ip: clientIp(request),
    user_agent: firstHeader(request.headers, 'user-agent') ?? '-',
    referer: firstHeader(request.headers, 'referer') ?? '-',
    elapsed_ms: Date.now() - params.startTime
  };
}

export function logRoute(logger: Logger, entry: RouteLogEntry): void {
  logger.info(entry, `${entry.status} "${entry.method} ${entry.url}" ${entry.verdict}`);
}
