/**
 * Digit sources — spigots for six constants in any base from 2 to 36.
 *
 * Every source produces the integer part written in the base (most
 * significant digit first), followed by the fractional digits. Sources are
 * strictly sequential: the only way to reach position n is to emit the n
 * digits before it.
 */

import { ConfigError } from './errors.js';

// ── Constants ──

export type ConstantId = 'pi' | 'e' | 'ln2' | 'liouville' | 'champernowne' | 'thue-morse';

export interface ConstantInfo {
  id: ConstantId;
  name: string;
  approx: string;
}

export const CONSTANTS: readonly ConstantInfo[] = [
  { id: 'pi', name: 'π', approx: '3.14159265358979…' },
  { id: 'e', name: 'e', approx: '2.71828182845904…' },
  { id: 'ln2', name: 'ln 2', approx: '0.69314718055994…' },
  { id: 'liouville', name: 'Liouville', approx: '0.11000100000000…' },
  { id: 'champernowne', name: 'Champernowne', approx: '0.12345678910111…' },
  { id: 'thue-morse', name: 'Thue–Morse', approx: '0.0110100110010110… (bits)' },
];

export const MIN_BASE = 2;
export const MAX_BASE = 36;

export function constantInfo(id: ConstantId): ConstantInfo {
  const info = CONSTANTS.find((c) => c.id === id);
  if (!info) throw new ConfigError(`Unknown constant '${id}'.`);
  return info;
}

function isConstantId(value: string): value is ConstantId {
  return CONSTANTS.some((c) => c.id === value);
}

// ── Configuration ──

export interface SpigotConfig {
  readonly constant: ConstantId;
  readonly base: number;
}

/** Validate and freeze a (constant, base) configuration. */
export function spigotConfig(constant: string, base: number): SpigotConfig {
  const id = constant.toLowerCase();
  if (!isConstantId(id)) {
    const known = CONSTANTS.map((c) => c.id).join(', ');
    throw new ConfigError(`Unknown constant '${constant}'. Expected one of: ${known}.`);
  }
  if (!Number.isInteger(base) || base < MIN_BASE || base > MAX_BASE) {
    throw new ConfigError(`Base must be an integer from ${MIN_BASE} to ${MAX_BASE}, got ${base}.`);
  }
  return Object.freeze({ constant: id, base });
}

/** Parse the `constant:base` form used on the command line (base defaults to 10). */
export function parseSpigotConfig(text: string): SpigotConfig {
  const [constant, baseText, ...rest] = text.trim().split(':');
  if (rest.length > 0 || !constant) {
    throw new ConfigError(`Malformed stream '${text}'. Use <constant>[:<base>], e.g. pi:16.`);
  }
  const base = baseText === undefined ? 10 : Number(baseText);
  return spigotConfig(constant, base);
}

export function describeConfig(config: SpigotConfig): string {
  return `${constantInfo(config.constant).name} base ${config.base}`;
}

/** Render a digit value (0–35) as its base-36 character. */
export function digitChar(digit: number): string {
  return digit.toString(36);
}

// ── Digit Source Capability ──

export interface DigitSource {
  /** Next digit in [0, base), or undefined once the source has terminated. */
  next(): number | undefined;
}

export function createDigitSource(config: SpigotConfig): DigitSource {
  switch (config.constant) {
    case 'pi':
      return new SeriesSource(piBounds, config.base);
    case 'e':
      return new SeriesSource(eBounds, config.base);
    case 'ln2':
      return new SeriesSource(ln2Bounds, config.base);
    case 'liouville':
      return new LiouvilleSource();
    case 'champernowne':
      return new ChampernowneSource(config.base);
    case 'thue-morse':
      return new ThueMorseSource();
  }
}

// ── Series-backed Sources (π, e, ln 2) ──

/** Returns [lo, hi] with lo <= x * scale <= hi. */
type Bounds = (scale: bigint) => [bigint, bigint];

const INITIAL_FRACTION_DIGITS = 32;
const GUARD_DIGITS = 8;

/**
 * Digits of floor(x * base^fraction), padded so the integer part of x keeps
 * at least one digit. Widens the guard until the interval pins every digit.
 */
export function expandDigits(bounds: Bounds, base: number, fraction: number): number[] {
  const b = BigInt(base);
  const unit = b ** BigInt(fraction);
  for (let guard = GUARD_DIGITS; ; guard += GUARD_DIGITS) {
    const slack = b ** BigInt(guard);
    const [lo, hi] = bounds(unit * slack);
    const floorLo = lo / slack;
    if (floorLo !== hi / slack) continue;

    const intPart = floorLo / unit;
    const intLength = intPart === 0n ? 1 : intPart.toString(base).length;
    return Array.from(floorLo.toString(base).padStart(intLength + fraction, '0'), (ch) =>
      parseInt(ch, 36),
    );
  }
}

class SeriesSource implements DigitSource {
  private buffer: number[] = [];
  private cursor = 0;
  private produced = 0;
  private fraction = 0;

  constructor(
    private readonly bounds: Bounds,
    private readonly base: number,
  ) {}

  next(): number | undefined {
    if (this.cursor >= this.buffer.length) this.refill();
    return this.buffer[this.cursor++];
  }

  private refill(): void {
    this.fraction = Math.max(INITIAL_FRACTION_DIGITS, this.fraction * 2);
    const digits = expandDigits(this.bounds, this.base, this.fraction);
    this.buffer = digits.slice(this.produced);
    this.produced = digits.length;
    this.cursor = 0;
  }
}

/** atan(1/m) * scale, each truncated term off by less than one. */
function atanInverse(m: bigint, scale: bigint): [bigint, bigint] {
  const m2 = m * m;
  let power = scale / m;
  let sum = 0n;
  let j = 0n;
  while (power > 0n) {
    const term = power / (2n * j + 1n);
    sum += j % 2n === 0n ? term : -term;
    j += 1n;
    power /= m2;
  }
  const err = j + 1n;
  return [sum - err, sum + err];
}

/** Machin: π = 16 atan(1/5) − 4 atan(1/239). */
export const piBounds: Bounds = (scale) => {
  const [aLo, aHi] = atanInverse(5n, scale);
  const [bLo, bHi] = atanInverse(239n, scale);
  return [16n * aLo - 4n * bHi, 16n * aHi - 4n * bLo];
};

/** e = Σ 1/k! */
export const eBounds: Bounds = (scale) => {
  let term = scale;
  let sum = 0n;
  let k = 0n;
  while (term > 0n) {
    sum += term;
    k += 1n;
    term /= k;
  }
  return [sum, sum + k + 2n];
};

/** ln 2 = Σ 1/(k·2^k), k ≥ 1 */
export const ln2Bounds: Bounds = (scale) => {
  let power = scale >> 1n;
  let sum = 0n;
  let k = 1n;
  while (power > 0n) {
    sum += power / k;
    k += 1n;
    power >>= 1n;
  }
  return [sum, sum + k + 2n];
};

// ── Combinatorial Sources ──

/** 0, then 1 at fractional positions 1!, 2!, 3!, … — identical in every base. */
class LiouvilleSource implements DigitSource {
  private position = 0;
  private n = 1;
  private nextFactorial = 1;

  next(): number {
    const p = this.position++;
    if (p === 0) return 0;
    if (p !== this.nextFactorial) return 0;
    this.n += 1;
    this.nextFactorial *= this.n;
    return 1;
  }
}

/** 0, then 1, 2, 3, … written in the base and concatenated. */
class ChampernowneSource implements DigitSource {
  private started = false;
  private counter = 0;
  private pending: number[] = [];

  constructor(private readonly base: number) {}

  next(): number {
    if (!this.started) {
      this.started = true;
      return 0;
    }
    if (this.pending.length === 0) {
      this.counter += 1;
      this.pending = Array.from(this.counter.toString(this.base), (ch) => parseInt(ch, 36));
    }
    const digit = this.pending.shift();
    return digit ?? 0;
  }
}

/** 0, then t(n) = parity of the number of set bits in n. Always bits. */
class ThueMorseSource implements DigitSource {
  private started = false;
  private n = 0;

  next(): number {
    if (!this.started) {
      this.started = true;
      return 0;
    }
    let bits = 0;
    for (let v = this.n++; v > 0; v = Math.floor(v / 2)) {
      bits += v % 2;
    }
    return bits % 2;
  }
}
