import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { PERFORMANCE_LOG, RIBBON_DIR } from './constants.js';
import { errorMessage } from './errors.js';

// ── Logger ──

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
}

function ensureDir() {
  if (!existsSync(RIBBON_DIR)) {
    mkdirSync(RIBBON_DIR, { recursive: true });
  }
}

function append(level: string, msg: string) {
  const line = `[${new Date().toISOString()}] ${level} ${msg}\n`;
  try {
    ensureDir();
    appendFileSync(PERFORMANCE_LOG, line);
  } catch (err) {
    process.stderr.write(`${line}(log file unavailable: ${errorMessage(err)})\n`);
  }
}

/** Appends timestamped lines to the performance log. */
export const fileLogger: Logger = {
  info: (msg) => append('INFO', msg),
  warn: (msg) => append('WARN', msg),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};

// ── Warn Once ──

const warned = new Set<string>();

/**
 * Emit `msg` as a warning the first time `key` is seen; later calls are no-ops.
 * Returns whether the warning was written.
 */
export function warnOnce(logger: Logger, key: string, msg: string): boolean {
  if (warned.has(key)) return false;
  warned.add(key);
  logger.warn(msg);
  return true;
}
