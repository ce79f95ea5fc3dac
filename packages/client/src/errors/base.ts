export interface HttpClientErrorOptions {
  /**
   * Status code the error refers to, when one is known
   */
  statusCode?: number;

  /**
   * 1-based attempt of the retry loop that produced the error
   */
  attempt?: number;

  cause?: unknown;
}

/**
 * Root of every error the client rejects with. Errors raised inside
 * `execute` carry the attempt they came from; the error a call finally
 * rejects with therefore tells how many attempts were made.
 */
export class HttpClientError extends Error {
  public readonly statusCode?: number;
  public readonly attempt?: number;

  constructor(message: string, options: HttpClientErrorOptions = {}) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = new.target.name;
    this.statusCode = options.statusCode;
    this.attempt = options.attempt;
  }
}
