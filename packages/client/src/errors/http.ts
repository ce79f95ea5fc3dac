import { HttpClientError } from './base.js';

/**
 * The transport could not complete the exchange: connection refused, DNS,
 * TLS, or the per-attempt timeout
 */
export class NetworkError extends HttpClientError {
  constructor(message: string, options: { cause?: unknown; attempt?: number } = {}) {
    super(message, options);
  }
}

/**
 * The retry loop saw a status outside [200, 300). Only the logs carry the
 * status; this marker does not.
 */
export class NonSuccessStatusError extends HttpClientError {
  constructor(attempt?: number) {
    super('non-2xx response received', { attempt });
  }
}

/**
 * `readJSONBody` was handed a response outside [200, 300)
 */
export class UnexpectedStatusError extends HttpClientError {
  constructor(statusCode: number) {
    super(`unexpected status code: ${statusCode}`, { statusCode });
  }
}

/**
 * URL, init or caller headers rejected while building the request
 */
export class RequestBuildError extends HttpClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class BodyReadError extends HttpClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
