import type { KyInstance } from 'ky';
import { Agent } from 'undici';
import { guardLogger, noopLogger } from '../logger.js';
import type {
  Logger,
  TlsConfig,
  TlsConfigurable,
  Transport,
} from '../types/index.js';
import { createKyInstance } from '../utils/index.js';

export interface KyTransportOptions {
  /**
   * TLS parameters for every connection this transport opens
   */
  tlsConfig?: TlsConfig;

  /**
   * Receives failures to close a replaced TLS agent
   * @default noopLogger
   */
  logger?: Logger;
}

/**
 * Default transport: global `fetch` driven through ky.
 *
 * ky's own retry, timeout and HTTP-error handling are switched off; it
 * resolves with every status and rejects only when the exchange itself fails.
 */
export class KyTransport implements Transport, TlsConfigurable {
  private readonly http: KyInstance;
  private readonly logger: Logger;
  private dispatcher?: Agent;
  private currentTlsConfig?: TlsConfig;

  constructor(options: KyTransportOptions = {}) {
    this.logger = guardLogger(options.logger ?? noopLogger);
    this.tlsConfig = options.tlsConfig;
    this.http = createKyInstance({
      fetch: (input, init) =>
        globalThis.fetch(input, { ...init, dispatcher: this.dispatcher }),
    });
  }

  get tlsConfig(): TlsConfig | undefined {
    return this.currentTlsConfig;
  }

  /**
   * Replacing the TLS config swaps the connection pool used for later sends.
   * The previous pool is closed once its in-flight requests finish.
   */
  set tlsConfig(tlsConfig: TlsConfig | undefined) {
    const previous = this.dispatcher;
    this.currentTlsConfig = tlsConfig;
    this.dispatcher = tlsConfig ? new Agent({ connect: tlsConfig }) : undefined;

    void previous?.close().catch((error: unknown) => {
      this.logger.warn('Failed to close replaced TLS agent', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async send(request: Request, signal?: AbortSignal): Promise<Response> {
    return this.http(request, { signal });
  }
}
