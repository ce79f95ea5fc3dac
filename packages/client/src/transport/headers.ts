import type { HeaderMap, Transport } from '../types/index.js';

/**
 * Transport decorator that stamps a fixed set of headers on every request.
 * Its values win over headers the caller already set.
 */
export class HeaderTransport implements Transport {
  constructor(
    public readonly base: Transport,
    public readonly headers: HeaderMap,
  ) {}

  send(request: Request, signal?: AbortSignal): Promise<Response> {
    for (const [name, value] of Object.entries(this.headers)) {
      request.headers.set(name, value);
    }
    return this.base.send(request, signal);
  }
}
