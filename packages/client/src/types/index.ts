export type { LogMeta, Logger } from './logger.js';
export type {
  HeaderMap,
  RequestBody,
  RequestOptions,
  TlsConfig,
  TlsConfigurable,
  Transport,
} from './transport.js';
