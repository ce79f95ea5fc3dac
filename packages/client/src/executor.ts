import type { ClientConfig } from './config.js';
import {
  type HttpClientError,
  NonSuccessStatusError,
} from './errors/index.js';
import { guardLogger } from './logger.js';
import type { Logger, RequestOptions } from './types/index.js';
import { isSuccessStatus, toNetworkError, wait } from './utils/index.js';

/**
 * Runs one request against the configured transport with retry policy.
 *
 * Every attempt sends a fresh clone of the request, so bodies can be replayed
 * and the caller's request is never consumed. Both transport failures and any
 * status outside [200, 300) are retried, 4xx included.
 */
export class RequestExecutor {
  private readonly logger: Logger;

  constructor(private readonly config: Readonly<ClientConfig>) {
    this.logger = guardLogger(config.logger);
  }

  /**
   * Send `request`, retrying up to `retryCount` times.
   *
   * Resolves with the first 2xx response; the caller owns its body. Bodies of
   * rejected responses are released before the next attempt. Rejects with the
   * error of the final attempt: a NetworkError or a NonSuccessStatusError,
   * whose `attempt` equals the number of attempts made.
   * A caller abort is not retried and rejects with the signal's reason.
   */
  async execute(request: Request, options: RequestOptions = {}): Promise<Response> {
    const { retryCount, retryDelay, backoff, transport } = this.config;
    const { signal } = options;
    let lastError: HttpClientError | undefined;

    for (let attempt = 0; attempt <= retryCount; attempt++) {
      if (attempt > 0) {
        const delay = backoff ? backoff(attempt) : retryDelay;
        this.logger.info(
          `Retrying request (${attempt}/${retryCount}) after ${delay}ms...`,
          { attempt, retryCount, delay },
        );
        await wait(delay, signal);
      }

      signal?.throwIfAborted();

      let response: Response;
      try {
        response = await transport.send(request.clone(), this.attemptSignal(signal));
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        lastError = toNetworkError(error, attempt + 1);
        this.logger.warn(`Request failed: ${lastError.message}`, {
          method: request.method,
          url: request.url,
          attempt,
        });
        continue;
      }

      if (isSuccessStatus(response.status)) {
        return response;
      }

      this.logger.warn(`Received non-2xx response: ${response.status}`, {
        method: request.method,
        url: request.url,
        status: response.status,
        attempt,
      });
      lastError = new NonSuccessStatusError(attempt + 1);
      await this.release(response);
    }

    throw lastError ?? new NonSuccessStatusError();
  }

  private attemptSignal(signal?: AbortSignal): AbortSignal | undefined {
    const { timeout } = this.config;
    if (timeout <= 0) {
      return signal;
    }

    const timer = AbortSignal.timeout(timeout);
    return signal ? AbortSignal.any([signal, timer]) : timer;
  }

  private async release(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug('Failed to release response body', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
