import type { Transport } from '../../src/types/index.js';

export type Outcome =
  | number
  | Error
  | ((request: Request, signal?: AbortSignal) => Promise<Response>);

/**
 * In-process transport replaying a script of outcomes: a status code becomes
 * a response with that status, an Error becomes a rejection. The last
 * outcome repeats once the script runs out.
 */
export class ScriptedTransport implements Transport {
  public readonly requests: Request[] = [];
  public readonly responses: Response[] = [];

  constructor(private readonly outcomes: Outcome[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async send(request: Request, signal?: AbortSignal): Promise<Response> {
    this.requests.push(request);
    const outcome =
      this.outcomes[Math.min(this.requests.length, this.outcomes.length) - 1];

    if (outcome === undefined) {
      throw new Error('ScriptedTransport has no outcomes');
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    if (typeof outcome === 'function') {
      return outcome(request, signal);
    }

    const response = new Response(`status ${outcome}`, { status: outcome });
    this.responses.push(response);
    return response;
  }
}
