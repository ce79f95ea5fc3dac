import { type ClientConfig, type Option, resolveConfig } from './config.js';
import { SerializationError } from './errors/index.js';
import { RequestExecutor } from './executor.js';
import type { HeaderMap, RequestBody, RequestOptions } from './types/index.js';
import { buildRequest } from './utils/index.js';

/**
 * HTTP client with retries, backoff and default headers
 *
 * @example
 * ```typescript
 * const client = new HttpClient(
 *   withTimeout(5_000),
 *   withRetry(3, 500),
 *   withExponentialBackoff(100),
 *   withDefaultHeaders({ 'User-Agent': 'my-service/1.0' }),
 * );
 *
 * const response = await client.get('https://api.example.com/items');
 * const items = await readJSONBody(response, itemsSchema);
 * ```
 */
export class HttpClient {
  /**
   * Resolved configuration, frozen after construction
   */
  public readonly config: Readonly<ClientConfig>;

  private readonly executor: RequestExecutor;

  /**
   * Create a new client; later options override earlier ones
   */
  constructor(...options: Option[]) {
    this.config = resolveConfig(options);
    this.executor = new RequestExecutor(this.config);
  }

  /**
   * Send a fully-formed request with the configured retry policy
   */
  execute(request: Request, options?: RequestOptions): Promise<Response> {
    return this.executor.execute(request, options);
  }

  async get(
    url: string | URL,
    headers?: HeaderMap,
    options?: RequestOptions,
  ): Promise<Response> {
    return this.execute(buildRequest('GET', url, undefined, headers), options);
  }

  async post(
    url: string | URL,
    body?: RequestBody,
    headers?: HeaderMap,
    options?: RequestOptions,
  ): Promise<Response> {
    return this.execute(buildRequest('POST', url, body, headers), options);
  }

  async put(
    url: string | URL,
    body?: RequestBody,
    headers?: HeaderMap,
    options?: RequestOptions,
  ): Promise<Response> {
    return this.execute(buildRequest('PUT', url, body, headers), options);
  }

  async delete(
    url: string | URL,
    headers?: HeaderMap,
    options?: RequestOptions,
  ): Promise<Response> {
    return this.execute(buildRequest('DELETE', url, undefined, headers), options);
  }

  /**
   * POST `value` as JSON. `Content-Type: application/json` replaces any
   * content type given in `headers`.
   *
   * @throws {SerializationError} if `value` cannot be encoded, before any I/O
   */
  async postJSON(
    url: string | URL,
    value: unknown,
    headers?: HeaderMap,
    options?: RequestOptions,
  ): Promise<Response> {
    return this.post(
      url,
      encodeJson(value),
      { ...headers, 'Content-Type': 'application/json' },
      options,
    );
  }
}

function encodeJson(value: unknown): string {
  let body: string | undefined;
  try {
    body = JSON.stringify(value);
  } catch (error) {
    throw new SerializationError(
      'Failed to encode JSON body',
      error,
    );
  }

  // JSON.stringify yields undefined for undefined, functions and symbols
  if (body === undefined) {
    throw new SerializationError(`Cannot encode ${typeof value} as JSON`);
  }

  return body;
}
