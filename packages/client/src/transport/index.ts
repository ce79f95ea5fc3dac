export { HeaderTransport } from './headers.js';
export { KyTransport, type KyTransportOptions } from './ky.js';
export { isTlsConfigurable } from './tls.js';
