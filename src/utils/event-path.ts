/**
 * Dotted-path addressing inside event bodies
 *
 * `inputPath` selects the part of the body used as the request and
 * `resultPath` selects where the response is written, leaving the rest of the
 * envelope untouched. Example: body `{"data": {"a": 5}}` with inputPath
 * `data.a` yields request `5`.
 */

import { isRecord } from '../types/event.js';
import { InvalidArgumentError } from '../api/errors.js';

function splitPath(path: string): string[] {
  return path.split('.').filter((segment) => segment.length > 0);
}

/**
 * Read the value at `path`; an empty path returns the body itself
 */
export function extractInputData(path: string | undefined, body: unknown): unknown {
  if (!path) {
    return body;
  }
  if (!isRecord(body)) {
    throw new InvalidArgumentError(`input path "${path}" requires a mapping event body`, { path });
  }

  let current: unknown = body;
  for (const segment of splitPath(path)) {
    if (!isRecord(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Write `result` at `path` inside a copy of `body`. Without a path the result
 * replaces the body.
 */
export function updateResultBody(path: string | undefined, body: unknown, result: unknown): unknown {
  if (!path || body === undefined || body === null) {
    return result;
  }
  if (!isRecord(body)) {
    throw new InvalidArgumentError(`result path "${path}" requires a mapping event body`, { path });
  }

  const segments = splitPath(path);
  const output: Record<string, unknown> = { ...body };
  let cursor = output;
  segments.forEach((segment, index) => {
    if (index === segments.length - 1) {
      cursor[segment] = result;
      return;
    }
    const existing = cursor[segment];
    const next: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
    cursor[segment] = next;
    cursor = next;
  });
  return output;
}
