/**
 * @tether-http/client - fetch-based HTTP client with retries and backoff
 *
 * @packageDocumentation
 */

// Main client
export { HttpClient } from './client.js';
export { RequestExecutor } from './executor.js';

// Configuration
export {
  type BackoffFn,
  type ClientConfig,
  type ClientConfigDraft,
  DEFAULT_TIMEOUT_MS,
  type Option,
  resolveConfig,
} from './config.js';
export {
  exponentialBackoff,
  withDefaultHeaders,
  withExponentialBackoff,
  withLogger,
  withRetry,
  withTimeout,
  withTLSConfig,
  withTransport,
} from './options.js';

// Transports
export {
  HeaderTransport,
  isTlsConfigurable,
  KyTransport,
  type KyTransportOptions,
} from './transport/index.js';

// Response readers
export { MAX_TIMER_MS, readBody, readJSONBody } from './utils/index.js';

// Logging
export { consoleLogger, guardLogger, noopLogger } from './logger.js';

// Errors
export {
  BodyReadError,
  DecodeError,
  HttpClientError,
  type HttpClientErrorOptions,
  NetworkError,
  NonSuccessStatusError,
  RequestBuildError,
  SerializationError,
  UnexpectedStatusError,
  ValidationError,
} from './errors/index.js';

// Types
export type {
  HeaderMap,
  LogMeta,
  Logger,
  RequestBody,
  RequestOptions,
  TlsConfig,
  TlsConfigurable,
  Transport,
} from './types/index.js';
