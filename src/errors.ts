/**
 * Error types surfaced to callers.
 *
 * Configuration problems are raised at construction time; a snip over an
 * inverted range is rejected before anything is stored.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SnipRangeError extends Error {
  readonly from: number;
  readonly to: number;

  constructor(from: number, to: number) {
    super(`Invalid snip range [${from}, ${to}): from must be <= to.`);
    this.name = 'SnipRangeError';
    this.from = from;
    this.to = to;
  }
}

export class ComposeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComposeError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
