import type { DigitSource } from '../digits.js';

/** A source that emits `digits` and then terminates. */
export function finiteSource(digits: number[]): DigitSource {
  let i = 0;
  return { next: () => digits[i++] };
}

/** Sleep stand-in that yields a macrotask, so a looping player never starves the event loop. */
export function yieldingSleep(log?: number[]): (ms: number) => Promise<void> {
  return (ms) =>
    new Promise<void>((resolve) => {
      log?.push(ms);
      setImmediate(resolve);
    });
}

/** Resolve after `n` turns of the event loop. */
export async function turns(n: number): Promise<void> {
  for (let i = 0; i < n; i++) await new Promise<void>((resolve) => setImmediate(resolve));
}

/** Turn the event loop until `cond` holds; fails after `maxTurns`. */
export async function waitFor(cond: () => boolean, maxTurns = 10_000): Promise<void> {
  for (let i = 0; i < maxTurns; i++) {
    if (cond()) return;
    await turns(1);
  }
  throw new Error(`Condition not met after ${maxTurns} turns`);
}
