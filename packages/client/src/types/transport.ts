import type { ConnectionOptions } from 'node:tls';

/**
 * TLS parameters handed to the connection layer (CA bundle, client cert,
 * `rejectUnauthorized`, SNI, ...)
 */
export type TlsConfig = ConnectionOptions;

/**
 * Anything that can physically send a request and produce a response
 */
export interface Transport {
  /**
   * Send the request. Resolves with any status; rejects only on transport
   * failure (connection, DNS, TLS, abort).
   */
  send(request: Request, signal?: AbortSignal): Promise<Response>;
}

/**
 * Transport whose TLS settings can be replaced in place
 */
export interface TlsConfigurable {
  tlsConfig: TlsConfig | undefined;
}

/**
 * Header name to value, one value per name
 */
export type HeaderMap = Readonly<Record<string, string>>;

/**
 * Anything `fetch` accepts as a request body
 */
export type RequestBody = NonNullable<RequestInit['body']>;

/**
 * Per-call options for request helpers and `execute`
 */
export interface RequestOptions {
  /**
   * Aborts the inter-retry wait and the in-flight send
   */
  signal?: AbortSignal;
}
