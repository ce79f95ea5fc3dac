import type { ZodSchema } from 'zod';
import type { BackoffFn, Option } from './config.js';
import { ValidationError } from './errors/index.js';
import { guardLogger } from './logger.js';
import {
  durationSchema,
  headerMapSchema,
  retryOptionsSchema,
} from './schemas/index.js';
import { HeaderTransport, isTlsConfigurable, KyTransport } from './transport/index.js';
import type { HeaderMap, Logger, TlsConfig, Transport } from './types/index.js';

function parseOption<T>(name: string, value: unknown, schema: ZodSchema<T>): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${name} option`, result.error);
  }
  return result.data;
}

/**
 * `delay(attempt) = baseDelay * 2^(attempt - 1)`, no jitter
 */
export function exponentialBackoff(baseDelay: number): BackoffFn {
  return (attempt) => baseDelay * 2 ** (attempt - 1);
}

/**
 * Bound each send attempt to `timeout` ms (`0` disables the bound)
 */
export function withTimeout(timeout: number): Option {
  const ms = parseOption('timeout', timeout, durationSchema);
  return (draft) => {
    draft.timeout = ms;
  };
}

/**
 * Retry `retryCount` times, waiting `retryDelay` ms between attempts
 */
export function withRetry(retryCount: number, retryDelay: number): Option {
  const parsed = parseOption(
    'retry',
    { retryCount, retryDelay },
    retryOptionsSchema,
  );
  return (draft) => {
    draft.retryCount = parsed.retryCount;
    draft.retryDelay = parsed.retryDelay;
  };
}

/**
 * Double the delay on every retry, starting from `baseDelay` ms.
 * Takes precedence over the fixed delay of `withRetry`.
 */
export function withExponentialBackoff(baseDelay: number): Option {
  const backoff = exponentialBackoff(
    parseOption('exponential backoff', baseDelay, durationSchema),
  );
  return (draft) => {
    draft.backoff = backoff;
  };
}

export function withLogger(logger: Logger): Option {
  return (draft) => {
    draft.logger = logger;
  };
}

/**
 * Replace the underlying transport
 */
export function withTransport(transport: Transport): Option {
  return (draft) => {
    draft.transport = transport;
  };
}

/**
 * Set TLS parameters on the current transport.
 *
 * A transport exposing `tlsConfig` is updated in place. Anything else (a
 * custom transport, or one already wrapped by `withDefaultHeaders`) is
 * replaced by a fresh KyTransport carrying only this TLS config, so apply
 * this option before `withTransport` or `withDefaultHeaders` to keep them.
 */
export function withTLSConfig(tlsConfig: TlsConfig): Option {
  return (draft) => {
    if (draft.transport && isTlsConfigurable(draft.transport)) {
      draft.transport.tlsConfig = tlsConfig;
      return;
    }

    if (draft.transport) {
      guardLogger(draft.logger).warn(
        'TLS config replaced a transport without TLS settings; earlier transport customization is dropped',
        { transport: draft.transport.constructor.name },
      );
    }
    draft.transport = new KyTransport({ tlsConfig, logger: draft.logger });
  };
}

/**
 * Wrap the current transport so every request carries `headers`
 */
export function withDefaultHeaders(headers: HeaderMap): Option {
  const fixed = Object.freeze({
    ...parseOption('default headers', headers, headerMapSchema),
  });
  return (draft) => {
    draft.transport = new HeaderTransport(
      draft.transport ?? new KyTransport(),
      fixed,
    );
  };
}
