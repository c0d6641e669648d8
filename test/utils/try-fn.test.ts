import { describe, it, expect } from 'vitest';
import { tryFnSync } from '../../src/utils/try-fn.js';
import { HeaderParseError } from '../../src/core/errors.js';

describe('tryFnSync', () => {
  it('should return the value on success', () => {
    expect(tryFnSync(() => 42)).toEqual([true, null, 42]);
  });

  it('should return the thrown error', () => {
    const error = new Error('boom');

    expect(tryFnSync(() => {
      throw error;
    })).toEqual([false, error, undefined]);
  });

  it('should wrap values that are not errors', () => {
    const [ok, err] = tryFnSync(() => {
      throw 'text';
    });

    expect(ok).toBe(false);
    expect(err).toBeInstanceOf(HeaderParseError);
    expect(err?.message).toBe('Synchronous function threw an error: text');
  });
});
