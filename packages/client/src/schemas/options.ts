import { z } from 'zod';
import { MAX_TIMER_MS } from '../utils/wait.js';

/**
 * Duration in milliseconds, at most one timer's worth
 */
export const durationSchema = z.number().finite().nonnegative().max(MAX_TIMER_MS);

export const retryOptionsSchema = z.object({
  retryCount: z.number().int().nonnegative(),
  retryDelay: durationSchema,
});

/**
 * Header names must be HTTP tokens; values may not contain CR, LF or NUL
 */
export const headerMapSchema = z.record(
  z.string().regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/, 'Invalid header name'),
  z.string().regex(/^[^\r\n\0]*$/, 'Invalid header value'),
);
