import { describe, it, expect } from 'vitest';
import { extractInputData, updateResultBody } from '../../../src/utils/event-path.js';
import { InvalidArgumentError } from '../../../src/api/errors.js';

describe('extractInputData', () => {
  it('returns the body without a path', () => {
    const body = { inputs: [1] };
    expect(extractInputData(undefined, body)).toBe(body);
    expect(extractInputData('', 'raw')).toBe('raw');
  });

  it('reads a dotted path', () => {
    expect(extractInputData('data.a', { data: { a: 5 } })).toBe(5);
    expect(extractInputData('data', { data: { a: 5 } })).toEqual({ a: 5 });
  });

  it('returns undefined for missing segments', () => {
    expect(extractInputData('data.b', { data: { a: 5 } })).toBeUndefined();
    expect(extractInputData('data.a.b', { data: { a: 5 } })).toBeUndefined();
  });

  it('requires a mapping body when a path is set', () => {
    expect(() => extractInputData('data', [1, 2])).toThrow(InvalidArgumentError);
  });
});

describe('updateResultBody', () => {
  it('replaces the body without a path', () => {
    expect(updateResultBody(undefined, { a: 1 }, { outputs: [1] })).toEqual({ outputs: [1] });
    expect(updateResultBody('resp', undefined, 'x')).toBe('x');
  });

  it('writes into a copy at the path', () => {
    const body = { data: 1, nested: { keep: true } };

    const updated = updateResultBody('nested.resp', body, { outputs: [7] });

    expect(updated).toEqual({ data: 1, nested: { keep: true, resp: { outputs: [7] } } });
    expect(body).toEqual({ data: 1, nested: { keep: true } });
  });

  it('creates intermediate mappings', () => {
    expect(updateResultBody('a.b.c', {}, 1)).toEqual({ a: { b: { c: 1 } } });
  });

  it('requires a mapping body when a path is set', () => {
    expect(() => updateResultBody('resp', 'text', 1)).toThrow(InvalidArgumentError);
  });
});
