// src/index.ts

export { WebtenderClient } from './client';
export type { ClientOptions } from './client';
export type {
  ApiRequest,
  ApiResult,
  HttpMethod,
  HttpTransport,
  JsonObject,
  JsonValue,
  NormalizedResponse,
  RequestBody,
  TransportOptions,
  TransportResponse,
} from './core/http/types';
export type { BodyInput } from './core/http/RequestBuilder';
export type { Credentials, SignatureHeaders } from './core/signing/types';
export type { ClientConfig, ClientConfigInput } from './config/ConfigValidator';
export type { LoggerConfig } from './observability/Logger';
export type { MetricsConfig } from './observability/MetricsCollector';

export {
  buildCanonicalMessage,
  computeSignature,
  unixTimestamp,
  RequestSigner,
} from './core/signing/RequestSigner';
export { HEADER_API_KEY, HEADER_TIMESTAMP, HEADER_SIGNATURE } from './core/signing/types';
export { AxiosTransport } from './core/http/AxiosTransport';
export { joinUrl } from './utils/url';
export { isJsonArray, isJsonObject } from './utils/json';
export {
  validateConfig,
  validateConfigSafe,
  resolveConfigFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './config/ConfigValidator';
export { Logger } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  SDKError,
  ConfigError,
  RequestConstructionError,
  SigningError,
  BodyReadError,
  TransportError,
  NetworkTimeoutError,
  ResponseBodyReadError,
  DecodeError,
  ApiStatusError,
} from './utils/errors';
export type { ResponseError } from './utils/errors';
