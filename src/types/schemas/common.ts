/**
 * Common Zod schema primitives for model-dispatcher
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Log level enum (pino levels plus silent)
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
  errorMap: () => ({ message: 'Log level must be one of: trace, debug, info, warn, error, fatal, silent' }),
});
