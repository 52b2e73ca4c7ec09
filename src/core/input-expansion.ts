/**
 * Dict-to-list input expansion for predict_dict / infer_dict
 *
 * Models consume positional feature vectors; callers of the *_dict operations
 * send named features instead. Values are laid out in the declared input
 * feature order of the model artifact.
 */

import { InvalidArgumentError } from '../api/errors.js';
import { isRecord, type InferenceRequest } from '../types/event.js';

function missingKeys(order: readonly string[], row: Record<string, unknown>): string[] {
  return order.filter((key) => !(key in row));
}

/**
 * Replace `request.inputs` (a dict or a list of dicts) with ordered lists.
 *
 * @throws {InvalidArgumentError} when the feature order is unknown, the inputs
 * have the wrong shape, or a row is missing declared keys
 */
export function expandDictInputs(
  request: InferenceRequest,
  featureOrder: readonly string[] | undefined
): InferenceRequest {
  if (!featureOrder || featureOrder.length === 0) {
    throw new InvalidArgumentError(
      'predict_dict/infer_dict require the model input features; provide a model path whose artifact declares inputs'
    );
  }

  const { inputs } = request;
  let rows: Record<string, unknown>[];
  let single = false;

  if (Array.isArray(inputs) && inputs.every(isRecord)) {
    rows = inputs;
  } else if (isRecord(inputs)) {
    rows = [inputs];
    single = true;
  } else {
    throw new InvalidArgumentError(
      'When using predict_dict or infer_dict the inputs must be of type list[dict] or dict'
    );
  }

  const missing = [...new Set(rows.flatMap((row) => missingKeys(featureOrder, row)))];
  if (missing.length > 0) {
    throw new InvalidArgumentError(`Input dictionary is missing required keys: ${missing.join(', ')}`, {
      missing,
      expected: [...featureOrder],
    });
  }

  const ordered = rows.map((row) => featureOrder.map((key) => row[key]));
  return { ...request, inputs: single ? ordered[0] : ordered };
}
