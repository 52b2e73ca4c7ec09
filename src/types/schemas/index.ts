/**
 * Zod schema exports for model-dispatcher validation
 *
 * @example
 * ```typescript
 * import { InferenceRequestSchema } from 'model-dispatcher';
 *
 * const result = InferenceRequestSchema.safeParse({ inputs: [[1, 2, 3]] });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Request schemas
export * from './request.js';

// Config schemas
export * from './config.js';
