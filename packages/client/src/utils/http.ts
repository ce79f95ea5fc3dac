import ky, { type KyInstance } from 'ky';
import { NetworkError, RequestBuildError } from '../errors/index.js';
import type { HeaderMap, RequestBody } from '../types/index.js';

type FetchFn = (input: Request | URL | string, init?: RequestInit) => Promise<Response>;

/**
 * Create a ky instance that only moves bytes.
 * Retries, timeouts and status handling belong to the request executor.
 */
export function createKyInstance(options?: { fetch?: FetchFn }): KyInstance {
  return ky.create({
    retry: 0,
    timeout: false,
    throwHttpErrors: false,
    fetch: options?.fetch,
  });
}

/**
 * Whether the status is in [200, 300)
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Build a request, setting each header individually.
 * @throws {RequestBuildError} if the URL or init is malformed
 */
export function buildRequest(
  method: string,
  url: string | URL,
  body?: RequestBody,
  headers?: HeaderMap,
): Request {
  try {
    // Stream bodies need half-duplex; string and buffer bodies ignore it
    const request = new Request(url, {
      method,
      body,
      duplex: body === undefined ? undefined : 'half',
    });

    if (headers) {
      for (const [name, value] of Object.entries(headers)) {
        request.headers.set(name, value);
      }
    }

    return request;
  } catch (error) {
    throw new RequestBuildError(
      `Invalid request ${method} ${String(url)}`,
      error,
    );
  }
}

/**
 * Map whatever the transport rejected with to a NetworkError tagged with the
 * 1-based attempt that failed
 */
export function toNetworkError(error: unknown, attempt?: number): NetworkError {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new NetworkError('Request timed out', { cause: error, attempt });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, { cause: error, attempt });
}
