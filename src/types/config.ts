export type SignatureMatchType = 'exact' | 'substring' | 'regex';

export interface SignatureDefinition {
  name: string;
  pattern: string;
  type: SignatureMatchType;
  caseSensitive: boolean;
  documentation?: string;
}

// Characters inside [start, end] are replaced with characters from [targetStart, targetEnd]
export interface CharRange {
  start: string;
  end: string;
  targetStart: string;
  targetEnd: string;
  comment?: string;
}

export type ErrorPageStyle = 'plain' | 'nginx';

export interface ServerConfig {
  host: string;
  port: number;
}

export interface UpstreamConfig {
  baseUrl: string;
  timeoutMs: number;
  maxBodyBytes: number;
  connections: number;
}

export interface ClassifierConfig {
  header: string;
  override: {
    param: string;
    value: string;
  };
  signatures: SignatureDefinition[];
}

// Text from the anchor element onwards keeps its first `length` visible characters
export interface ExcerptConfig {
  anchorId: string;
  length: number;
}

export interface ObfuscationConfig {
  ignoreIds: string[];
  metaTags: string[];
  preserveTitle: boolean;
  excerpt?: ExcerptConfig;
  charRanges: CharRange[];
}

export interface ChaffGateConfig {
  server: ServerConfig;
  upstream: UpstreamConfig;
  classifier: ClassifierConfig;
  obfuscation: ObfuscationConfig;
  errorPageStyle: ErrorPageStyle;
}
