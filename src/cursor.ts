/**
 * Cursor — a digit source plus a monotonic position counter.
 *
 * The position always equals the number of digits emitted so far. There is
 * no seeking: reaching an earlier or arbitrary index means building a fresh
 * cursor and replaying from zero.
 */

import { createDigitSource, type DigitSource, type SpigotConfig } from './digits.js';

function assertCount(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Count must be a non-negative integer, got ${n}.`);
  }
}

export class Cursor {
  readonly config: SpigotConfig;
  private readonly source: DigitSource;
  private pos = 0;

  constructor(config: SpigotConfig, source: DigitSource = createDigitSource(config)) {
    this.config = config;
    this.source = source;
  }

  get position(): number {
    return this.pos;
  }

  get base(): number {
    return this.config.base;
  }

  /** One digit; undefined if the source has terminated. */
  next(): number | undefined {
    const digit = this.source.next();
    if (digit !== undefined) this.pos += 1;
    return digit;
  }

  /** Skip `n` digits. Returns how many were actually skipped. */
  drop(n: number): number {
    assertCount(n);
    let dropped = 0;
    while (dropped < n && this.next() !== undefined) dropped++;
    return dropped;
  }

  /** Collect the next `n` digits (fewer only if the source terminates). */
  take(n: number): number[] {
    assertCount(n);
    const out: number[] = [];
    while (out.length < n) {
      const digit = this.next();
      if (digit === undefined) break;
      out.push(digit);
    }
    return out;
  }

  /** Streaming left fold over the next `n` digits. */
  fold<A>(n: number, seed: A, combine: (acc: A, digit: number) => A): A {
    assertCount(n);
    let acc = seed;
    for (let i = 0; i < n; i++) {
      const digit = this.next();
      if (digit === undefined) break;
      acc = combine(acc, digit);
    }
    return acc;
  }
}
