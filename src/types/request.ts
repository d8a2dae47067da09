export type HeaderValue = string | string[];

export type HeaderMap = Record<string, HeaderValue | undefined>;

export interface IncomingRequest {
  readonly method: string;
  readonly url: string;
  readonly path: string;
  readonly rawQuery: string;
  readonly query: Readonly<Record<string, readonly string[]>>;
  readonly headers: Readonly<HeaderMap>;
  readonly remoteAddress: string;
}

export type ClassificationVerdict = 'passthrough' | 'obfuscate';

export type ClassificationReason = 'forced-override' | 'matched-signature' | 'default';

export interface ClassificationDecision {
  verdict: ClassificationVerdict;
  reason: ClassificationReason;
  rule?: string;
}
