export type {
  HeaderValue,
  HeaderMap,
  IncomingRequest,
  ClassificationVerdict,
  ClassificationReason,
  ClassificationDecision
} from './request.js';
export type {
  ContentKind,
  ResponseBody,
  OriginResponse,
  ObfuscationResult,
  OutgoingResponse
} from './response.js';
export type {
  ChaffGateConfig,
  ServerConfig,
  UpstreamConfig,
  ClassifierConfig,
  SignatureDefinition,
  SignatureMatchType,
  ObfuscationConfig,
  ExcerptConfig,
  CharRange,
  ErrorPageStyle
} from './config.js';
export { type Result, ok, err } from './result.js';
export {
  TransportError,
  ObfuscationError,
  ConfigurationError,
  type TransportErrorCode,
  type ObfuscationErrorCode
} from './errors.js';
