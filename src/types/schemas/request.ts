/**
 * Inference request schemas
 *
 * @module schemas/request
 */

import { z } from 'zod';

/**
 * Protocol v2 request body: an `inputs` list plus arbitrary extra keys.
 */
export const InferenceRequestSchema = z
  .object({
    inputs: z.array(z.unknown(), {
      required_error: 'Expected key "inputs" in request body',
      invalid_type_error: 'Expected "inputs" to be a list',
    }),
  })
  .passthrough();

export type ValidatedInferenceRequest = z.infer<typeof InferenceRequestSchema>;
