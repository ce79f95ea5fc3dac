import type { ZodSchema } from 'zod';
import {
  BodyReadError,
  DecodeError,
  UnexpectedStatusError,
  ValidationError,
} from '../errors/index.js';
import { isSuccessStatus } from './http.js';

/**
 * Read the whole response body as text. The body is consumed afterwards.
 * @throws {BodyReadError} if the body stream fails
 */
export async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new BodyReadError(
      'Failed to read response body',
      error,
    );
  }
}

/**
 * Decode a JSON response body, optionally validating it against a schema.
 *
 * A status outside [200, 300) rejects with UnexpectedStatusError before any
 * decoding; the body is released either way.
 *
 * @throws {UnexpectedStatusError} on a non-2xx status
 * @throws {DecodeError} if the body is not valid JSON
 * @throws {ValidationError} if the decoded value does not match `schema`
 */
export async function readJSONBody<T>(
  response: Response,
  schema: ZodSchema<T>,
): Promise<T>;
export async function readJSONBody(response: Response): Promise<unknown>;
export async function readJSONBody<T>(
  response: Response,
  schema?: ZodSchema<T>,
): Promise<unknown> {
  if (!isSuccessStatus(response.status)) {
    try {
      await response.body?.cancel();
    } catch {
      // Body already locked or consumed; the status error stands
    }
    throw new UnexpectedStatusError(response.status);
  }

  const text = await readBody(response);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      'Response body is not valid JSON',
      error,
    );
  }

  if (!schema) {
    return data;
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError('Response body validation failed', result.error);
  }

  return result.data;
}
