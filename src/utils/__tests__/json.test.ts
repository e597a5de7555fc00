/**
 * Tests for stored JSON parsing
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { parseStoredJson } from '../json.js';

const CountsSchema = z.record(z.string(), z.number());
type Counts = z.infer<typeof CountsSchema>;

describe('parseStoredJson', () => {
  it('returns validated data', () => {
    expect(parseStoredJson<Counts>('{"a":1,"b":2}', CountsSchema, {})).toEqual({ a: 1, b: 2 });
  });

  it('returns the fallback for absent input without reporting', () => {
    const onError = vi.fn();

    expect(parseStoredJson<Counts>(undefined, CountsSchema, { seed: 0 }, onError)).toEqual({ seed: 0 });
    expect(parseStoredJson<Counts>(null, CountsSchema, {}, onError)).toEqual({});
    expect(onError).not.toHaveBeenCalled();
  });

  it('reports malformed JSON as a syntax failure', () => {
    const onError = vi.fn();

    const result = parseStoredJson<Counts>('{"a":', CountsSchema, {}, onError);

    expect(result).toEqual({});
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toMatchObject({ kind: 'syntax' });
    expect(onError.mock.calls[0]?.[1]).toBe('{"a":');
  });

  it('reports a schema mismatch with the offending path', () => {
    const onError = vi.fn();

    const result = parseStoredJson<Counts>('{"a":"one"}', CountsSchema, {}, onError);

    expect(result).toEqual({});
    expect(onError.mock.calls[0]?.[0]).toEqual({
      kind: 'shape',
      message: 'a: Expected number, received string',
    });
  });

  it('applies schema defaults', () => {
    const schema = z.object({ retries: z.number().default(3) });

    expect(parseStoredJson('{}', schema, { retries: 0 })).toEqual({ retries: 3 });
  });
});
