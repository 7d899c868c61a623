import { describe, expect, it } from 'vitest';
import {
  createDigitSource,
  describeConfig,
  digitChar,
  parseSpigotConfig,
  spigotConfig,
  type ConstantId,
} from '../digits.js';
import { ConfigError } from '../errors.js';

function firstDigits(constant: ConstantId, base: number, n: number): number[] {
  const source = createDigitSource(spigotConfig(constant, base));
  const out: number[] = [];
  for (let i = 0; i < n; i++) {
    const d = source.next();
    if (d === undefined) break;
    out.push(d);
  }
  return out;
}

describe('digit sources', () => {
  it('π base 10 starts with its integer part', () => {
    expect(firstDigits('pi', 10, 10)).toEqual([3, 1, 4, 1, 5, 9, 2, 6, 5, 3]);
  });

  it('keeps π exact across precision refills', () => {
    const expected =
      '314159265358979323846264338327950288419716939937510582097494459230781640628620899862803482534211706798214808651328230664';
    expect(firstDigits('pi', 10, expected.length).join('')).toBe(expected);
  });

  it('e base 10', () => {
    expect(firstDigits('e', 10, 10)).toEqual([2, 7, 1, 8, 2, 8, 1, 8, 2, 8]);
  });

  it('π base 16', () => {
    expect(firstDigits('pi', 16, 16)).toEqual([3, 2, 4, 3, 15, 6, 10, 8, 8, 8, 5, 10, 3, 0, 8, 13]);
  });

  it('writes a multi-digit integer part in full (e base 2 = 10.1011…)', () => {
    expect(firstDigits('e', 2, 14)).toEqual([1, 0, 1, 0, 1, 1, 0, 1, 1, 1, 1, 1, 1, 0]);
  });

  it('π base 2', () => {
    expect(firstDigits('pi', 2, 8)).toEqual([1, 1, 0, 0, 1, 0, 0, 1]);
  });

  it('ln 2 base 10 leads with a zero integer digit', () => {
    expect(firstDigits('ln2', 10, 10)).toEqual([0, 6, 9, 3, 1, 4, 7, 1, 8, 0]);
  });

  it('e base 16', () => {
    expect(firstDigits('e', 16, 6)).toEqual([2, 11, 7, 14, 1, 5]);
  });

  it('Liouville marks factorial positions in every base', () => {
    expect(firstDigits('liouville', 10, 8)).toEqual([0, 1, 1, 0, 0, 0, 1, 0]);
    expect(firstDigits('liouville', 3, 8)).toEqual([0, 1, 1, 0, 0, 0, 1, 0]);
    const long = firstDigits('liouville', 10, 30);
    expect(long[24]).toBe(1);
    expect(long[23]).toBe(0);
  });

  it('Champernowne concatenates the counting numbers in the base', () => {
    expect(firstDigits('champernowne', 10, 14)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 1, 0, 1, 1]);
    expect(firstDigits('champernowne', 2, 9)).toEqual([0, 1, 1, 0, 1, 1, 1, 0, 0]);
  });

  it('Thue–Morse is always bits', () => {
    expect(firstDigits('thue-morse', 10, 9)).toEqual([0, 0, 1, 1, 0, 1, 0, 0, 1]);
  });

  it('every digit stays below the base', () => {
    for (const base of [2, 7, 10, 16, 36]) {
      for (const d of firstDigits('pi', base, 50)) {
        expect(d).toBeGreaterThanOrEqual(0);
        expect(d).toBeLessThan(base);
      }
    }
  });

  it('is deterministic per configuration', () => {
    expect(firstDigits('e', 7, 60)).toEqual(firstDigits('e', 7, 60));
  });
});

describe('spigotConfig', () => {
  it('normalizes the constant name and freezes the result', () => {
    const cfg = spigotConfig('PI', 16);
    expect(cfg).toEqual({ constant: 'pi', base: 16 });
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it.each([1, 37, 2.5, Number.NaN])('rejects base %s', (base) => {
    expect(() => spigotConfig('pi', base)).toThrow(ConfigError);
  });

  it('rejects an unknown constant', () => {
    expect(() => spigotConfig('tau', 10)).toThrow("Unknown constant 'tau'");
  });

  it('parses constant:base with base 10 by default', () => {
    expect(parseSpigotConfig('pi:16')).toEqual({ constant: 'pi', base: 16 });
    expect(parseSpigotConfig('e')).toEqual({ constant: 'e', base: 10 });
    expect(parseSpigotConfig(' thue-morse:2 ')).toEqual({ constant: 'thue-morse', base: 2 });
  });

  it('rejects malformed stream text', () => {
    expect(() => parseSpigotConfig('pi:16:2')).toThrow(ConfigError);
    expect(() => parseSpigotConfig('pi:x')).toThrow(ConfigError);
    expect(() => parseSpigotConfig(':10')).toThrow(ConfigError);
  });

  it('describes a configuration', () => {
    expect(describeConfig(spigotConfig('pi', 10))).toBe('π base 10');
    expect(describeConfig(spigotConfig('ln2', 2))).toBe('ln 2 base 2');
  });

  it('renders digits as base-36 characters', () => {
    expect(digitChar(9)).toBe('9');
    expect(digitChar(15)).toBe('f');
    expect(digitChar(35)).toBe('z');
  });
});
