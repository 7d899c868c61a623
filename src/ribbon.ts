/**
 * Display-side state owned by the orchestrator: the two digit ribbons, the
 * stitch between them, the scissor highlight and the snippet tray.
 *
 * Every tick takes the elapsed milliseconds; increments are defined per
 * reference frame (FRAME_MS) and scaled to the real elapsed time.
 */

import {
  FRAME_MS,
  SCISSOR_STEP,
  SCROLL_FRICTION,
  STITCH_STEP,
  TRAY_CAPACITY,
  TRAY_SLIDE_STEP,
} from './constants.js';

function frames(dtMs: number): number {
  return Math.max(0, dtMs) / FRAME_MS;
}

// ── Colors ──

/** Opaque 0xAARRGGBB color for a digit: hue spread evenly around the wheel by value. */
export function digitColor(digit: number, base: number): number {
  const hue = (digit / Math.max(base, 1)) * 360;
  return hsvToArgb(hue, 0.82, 0.92);
}

function hsvToArgb(h: number, s: number, v: number): number {
  const hh = h % 360;
  const hi = Math.floor(hh / 60);
  const f = hh / 60 - hi;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  const [r, g, b] =
    hi === 0 ? [v, t, p]
    : hi === 1 ? [q, v, p]
    : hi === 2 ? [p, v, t]
    : hi === 3 ? [p, q, v]
    : hi === 4 ? [t, p, v]
    : [v, p, q];
  const ri = Math.floor(r * 255);
  const gi = Math.floor(g * 255);
  const bi = Math.floor(b * 255);
  return (0xff000000 | (ri << 16) | (gi << 8) | bi) >>> 0;
}

// ── Ribbon ──

export interface Patch {
  digit: number;
  color: number;
  /** Absolute index of the digit in its stream. */
  position: number;
}

const MIN_SCROLL_VELOCITY = 0.1;
const MAX_SCROLL_VELOCITY = 18;

export class RibbonState {
  patches: Patch[] = [];
  scrollPx = 0;
  scrollVel = 0;

  constructor(
    readonly capacity: number,
    public base: number,
    public label: string,
  ) {}

  /** Append a patch, dropping the oldest once the ribbon is full. */
  push(digit: number, position: number): void {
    if (this.patches.length >= this.capacity) this.patches.shift();
    this.patches.push({ digit, color: digitColor(digit, this.base), position });
  }

  kick(velocity: number): void {
    this.scrollVel = Math.min(velocity * 12, MAX_SCROLL_VELOCITY);
  }

  tick(dtMs: number, patchWidth: number): void {
    const k = frames(dtMs);
    this.scrollPx += this.scrollVel * k;
    if (patchWidth > 0) this.scrollPx %= patchWidth;
    this.scrollVel *= SCROLL_FRICTION ** k;
    if (Math.abs(this.scrollVel) < MIN_SCROLL_VELOCITY) this.scrollVel = 0;
  }

  get visibleCount(): number {
    return this.patches.length;
  }
}

// ── Stitch ──

export type StitchPhase =
  | { kind: 'unstitched' }
  | { kind: 'stitching'; progress: number }
  | { kind: 'stitched' }
  | { kind: 'unstitching'; progress: number };

export function isStitched(phase: StitchPhase): boolean {
  return phase.kind === 'stitched' || phase.kind === 'stitching';
}

/** Advance a transition; `completed` is true on the tick that commits its end state. */
export function advanceStitch(phase: StitchPhase, dtMs: number): { phase: StitchPhase; completed: boolean } {
  if (phase.kind !== 'stitching' && phase.kind !== 'unstitching') return { phase, completed: false };
  const progress = phase.progress + STITCH_STEP * frames(dtMs);
  if (progress >= 1) {
    return { phase: { kind: phase.kind === 'stitching' ? 'stitched' : 'unstitched' }, completed: true };
  }
  return { phase: { kind: phase.kind, progress }, completed: false };
}

// ── Scissors ──

export class ScissorAnimation {
  progress = 0;

  /** Highlights absolute positions [from, to). */
  constructor(
    readonly from: number,
    readonly to: number,
  ) {}

  tick(dtMs: number): void {
    this.progress = Math.min(1, this.progress + SCISSOR_STEP * frames(dtMs));
  }

  done(): boolean {
    return this.progress >= 1;
  }

  covers(position: number): boolean {
    return position >= this.from && position < this.to;
  }
}

// ── Tray ──

export interface TrayEntry {
  name: string;
  pairs: Array<readonly [left: Patch, right: Patch]>;
  /** 0 → just deposited, 1 → fully slid in. */
  slideIn: number;
}

export class SnippetTray {
  entries: TrayEntry[] = [];

  constructor(readonly capacity: number = TRAY_CAPACITY) {}

  deposit(name: string, pairs: Array<readonly [left: Patch, right: Patch]>): void {
    this.entries.push({ name, pairs, slideIn: 0 });
    while (this.entries.length > this.capacity) this.entries.shift();
  }

  tick(dtMs: number): void {
    const step = TRAY_SLIDE_STEP * frames(dtMs);
    for (const entry of this.entries) {
      if (entry.slideIn < 1) entry.slideIn = Math.min(1, entry.slideIn + step);
    }
  }
}
