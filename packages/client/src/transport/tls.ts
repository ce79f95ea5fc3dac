import type { TlsConfigurable, Transport } from '../types/index.js';

/**
 * Whether the transport exposes a `tlsConfig` field that can be set in place
 */
export function isTlsConfigurable(
  transport: Transport,
): transport is Transport & TlsConfigurable {
  return 'tlsConfig' in transport;
}
