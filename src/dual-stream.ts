/**
 * DualStream — two independently positioned cursors plus a snippet store.
 *
 * Zip operations advance both sides in lock-step; `left()` / `right()` expose
 * a single side. `twist()` exchanges the cursors as whole units. `snip()`
 * captures an absolute range from fresh replays and never touches the live
 * cursors.
 */

import { Cursor } from './cursor.js';
import { describeConfig, type SpigotConfig } from './digits.js';
import { SnipRangeError } from './errors.js';

// ── Types ──

export type DigitPair = readonly [left: number, right: number];

export interface Snippet {
  readonly name: string;
  readonly pairs: readonly DigitPair[];
  /** Captured absolute range [from, to). */
  readonly from: number;
  readonly to: number;
}

// ── Snippet Store ──

export class SnippetStore {
  private entries = new Map<string, Snippet>();

  /** Store `snippet`, overwriting an entry with the same name in place. */
  deposit(snippet: Snippet): void {
    this.entries.set(snippet.name, snippet);
  }

  get(name: string): Snippet | undefined {
    return this.entries.get(name);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}

// ── Dual Stream ──

export class DualStream {
  private leftCursor: Cursor;
  private rightCursor: Cursor;
  private readonly snippets = new SnippetStore();

  constructor(left: Cursor, right: Cursor) {
    this.leftCursor = left;
    this.rightCursor = right;
  }

  static fromConfigs(left: SpigotConfig, right: SpigotConfig): DualStream {
    return new DualStream(new Cursor(left), new Cursor(right));
  }

  // ── Side access ──

  left(): Cursor {
    return this.leftCursor;
  }

  right(): Cursor {
    return this.rightCursor;
  }

  leftPos(): number {
    return this.leftCursor.position;
  }

  rightPos(): number {
    return this.rightCursor.position;
  }

  leftConfig(): SpigotConfig {
    return this.leftCursor.config;
  }

  rightConfig(): SpigotConfig {
    return this.rightCursor.config;
  }

  // ── Zip ──

  /**
   * Next (left, right) pair. Undefined once either side terminates; if only
   * the right side ran dry, the left digit already pulled is lost.
   */
  zipNext(): DigitPair | undefined {
    const l = this.leftCursor.next();
    if (l === undefined) return undefined;
    const r = this.rightCursor.next();
    if (r === undefined) return undefined;
    return [l, r];
  }

  zipTake(n: number): DigitPair[] {
    return this.zipFoldN<DigitPair[]>(n, [], (acc, pair) => {
      acc.push(pair);
      return acc;
    });
  }

  zipFoldN<A>(n: number, seed: A, combine: (acc: A, pair: DigitPair) => A): A {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Count must be a non-negative integer, got ${n}.`);
    }
    let acc = seed;
    for (let i = 0; i < n; i++) {
      const pair = this.zipNext();
      if (!pair) break;
      acc = combine(acc, pair);
    }
    return acc;
  }

  // ── Twist ──

  twist(): void {
    [this.leftCursor, this.rightCursor] = [this.rightCursor, this.leftCursor];
  }

  // ── Snip ──

  /**
   * Capture absolute positions [from, to) of both sides under `name`.
   * Replays fresh cursors from zero, so the cost grows with `to`.
   */
  snip(name: string, from: number, to: number): Snippet {
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || from > to) {
      throw new SnipRangeError(from, to);
    }
    const left = replay(this.leftCursor.config, from, to);
    const right = replay(this.rightCursor.config, from, to);
    const count = Math.min(left.length, right.length);
    const pairs: DigitPair[] = [];
    for (let i = 0; i < count; i++) {
      pairs.push([left[i], right[i]]);
    }
    const snippet: Snippet = Object.freeze({ name, pairs: Object.freeze(pairs), from, to });
    this.snippets.deposit(snippet);
    return snippet;
  }

  getSnippet(name: string): Snippet | undefined {
    return this.snippets.get(name);
  }

  snippetKeys(): string[] {
    return this.snippets.keys();
  }

  status(): string {
    return (
      `Left: ${describeConfig(this.leftConfig())} @ ${this.leftPos()}  ` +
      `Right: ${describeConfig(this.rightConfig())} @ ${this.rightPos()}  ` +
      `Snippets: ${this.snippets.size}`
    );
  }
}

function replay(config: SpigotConfig, from: number, to: number): number[] {
  const cursor = new Cursor(config);
  cursor.drop(from);
  return cursor.take(to - from);
}
