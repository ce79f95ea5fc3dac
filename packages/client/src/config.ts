import { noopLogger } from './logger.js';
import { KyTransport } from './transport/index.js';
import type { Logger, Transport } from './types/index.js';

/**
 * Maps a 1-based retry attempt to the delay (ms) before it
 */
export type BackoffFn = (attempt: number) => number;

/**
 * Resolved configuration of an HttpClient
 */
export interface ClientConfig {
  /**
   * Per-attempt time budget in milliseconds, `0` for none
   * @default 30000 (30 seconds)
   */
  timeout: number;

  /**
   * Retries after the first attempt; total attempts = retryCount + 1
   * @default 0
   */
  retryCount: number;

  /**
   * Fixed delay between attempts in milliseconds, used when no backoff is set
   * @default 0
   */
  retryDelay: number;

  /**
   * Overrides `retryDelay` when present
   */
  backoff?: BackoffFn;

  /**
   * Diagnostic sink
   * @default noopLogger
   */
  logger: Logger;

  /**
   * Sends requests; possibly wrapped by the header decorator
   */
  transport: Transport;
}

/**
 * Configuration while options are being applied. No transport is
 * synthesized until an option or the final resolution needs one.
 */
export type ClientConfigDraft = Omit<ClientConfig, 'transport'> & {
  transport?: Transport;
};

/**
 * Functional option applied to the draft in the order given
 */
export type Option = (draft: ClientConfigDraft) => void;

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Apply options in order over the defaults and freeze the result
 */
export function resolveConfig(options: readonly Option[]): Readonly<ClientConfig> {
  const draft: ClientConfigDraft = {
    timeout: DEFAULT_TIMEOUT_MS,
    retryCount: 0,
    retryDelay: 0,
    logger: noopLogger,
  };

  for (const option of options) {
    option(draft);
  }

  return Object.freeze({
    ...draft,
    transport: draft.transport ?? new KyTransport(),
  });
}
