export type TransportErrorCode = 'UNREACHABLE' | 'TIMEOUT' | 'TOO_LARGE';

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code;
  }
}

export type ObfuscationErrorCode = 'PARSE_FAILED' | 'SHAPE_MISMATCH';

export class ObfuscationError extends Error {
  readonly code: ObfuscationErrorCode;

  constructor(code: ObfuscationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ObfuscationError';
    this.code = code;
  }
}

// Raised while loading configuration; fatal at startup
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
