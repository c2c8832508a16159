import { describe, it, expect } from 'vitest';
import { ok, err, map, tryCatch, unwrap } from '../../../src/core/result.js';

describe('Result', () => {
  it('should carry a value on ok and an error on err', () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 });
    expect(err('boom')).toEqual({ ok: false, error: 'boom' });
  });

  it('should map only successful results', () => {
    expect(map(ok(2), n => n * 3)).toEqual({ ok: true, value: 6 });
    expect(map(err('nope'), (n: number) => n * 3)).toEqual({ ok: false, error: 'nope' });
  });

  it('should turn a throw into err through the error mapper', () => {
    const result = tryCatch(() => {
      throw new Error('handler exploded');
    }, (e) => `mapped: ${e instanceof Error ? e.message : String(e)}`);

    expect(result).toEqual({ ok: false, error: 'mapped: handler exploded' });
    expect(tryCatch(() => 'fine', () => 'unused')).toEqual({ ok: true, value: 'fine' });
  });

  it('should unwrap values and rethrow errors', () => {
    expect(unwrap(ok('value'))).toBe('value');
    const failure = new Error('unwrapped');
    expect(() => unwrap(err(failure))).toThrow(failure);
  });
});
