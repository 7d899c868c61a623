/**
 * Music mappings — digit → pitch (right side) and digit → duration (left side),
 * plus the General MIDI program table.
 */

import { readFileSync } from 'node:fs';
import { TICKS_PER_QUARTER } from './constants.js';
import { ConfigError } from './errors.js';

// ── Scales ──

export class Scale {
  readonly name: string;
  /** Semitone offsets from the root within one octave. */
  readonly intervals: readonly number[];

  private constructor(name: string, intervals: readonly number[]) {
    this.name = name;
    this.intervals = Object.freeze([...intervals]);
  }

  static chromatic(): Scale {
    return new Scale('chromatic', [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  }

  static major(): Scale {
    return new Scale('major', [0, 2, 4, 5, 7, 9, 11]);
  }

  static minor(): Scale {
    return new Scale('minor', [0, 2, 3, 5, 7, 8, 10]);
  }

  static pentatonicMajor(): Scale {
    return new Scale('pentatonic-major', [0, 2, 4, 7, 9]);
  }

  static pentatonicMinor(): Scale {
    return new Scale('pentatonic-minor', [0, 3, 5, 7, 10]);
  }

  static dorian(): Scale {
    return new Scale('dorian', [0, 2, 3, 5, 7, 9, 10]);
  }

  static phrygian(): Scale {
    return new Scale('phrygian', [0, 1, 3, 5, 7, 8, 10]);
  }

  static lydian(): Scale {
    return new Scale('lydian', [0, 2, 4, 6, 7, 9, 11]);
  }

  static mixolydian(): Scale {
    return new Scale('mixolydian', [0, 2, 4, 5, 7, 9, 10]);
  }

  static wholeTone(): Scale {
    return new Scale('whole-tone', [0, 2, 4, 6, 8, 10]);
  }

  static diminished(): Scale {
    return new Scale('diminished', [0, 2, 3, 5, 6, 8, 9, 11]);
  }

  static custom(intervals: readonly number[]): Scale {
    if (intervals.length === 0) {
      throw new ConfigError('A custom scale needs at least one interval.');
    }
    if (intervals.some((i) => !Number.isInteger(i) || i < 0 || i > 127)) {
      throw new ConfigError(`Scale intervals must be integers from 0 to 127, got [${intervals.join(', ')}].`);
    }
    return new Scale('custom', intervals);
  }

  get length(): number {
    return this.intervals.length;
  }
}

const SCALE_PRESETS: Record<string, () => Scale> = {
  chromatic: Scale.chromatic,
  major: Scale.major,
  minor: Scale.minor,
  'pentatonic-major': Scale.pentatonicMajor,
  'pentatonic-minor': Scale.pentatonicMinor,
  dorian: Scale.dorian,
  phrygian: Scale.phrygian,
  lydian: Scale.lydian,
  mixolydian: Scale.mixolydian,
  'whole-tone': Scale.wholeTone,
  diminished: Scale.diminished,
};

export const SCALE_NAMES = Object.keys(SCALE_PRESETS);

export function scaleByName(name: string): Scale {
  const preset = SCALE_PRESETS[name.toLowerCase()];
  if (!preset) {
    throw new ConfigError(`Unknown scale '${name}'. Expected one of: ${SCALE_NAMES.join(', ')}.`);
  }
  return preset();
}

// ── Pitch Map ──

export class PitchMap {
  readonly root: number;
  readonly scale: Scale;

  constructor(root: number, scale: Scale) {
    if (!Number.isInteger(root) || root < 0 || root > 127) {
      throw new ConfigError(`Root note must be an integer from 0 to 127, got ${root}.`);
    }
    this.root = root;
    this.scale = scale;
  }

  static major(root: number): PitchMap {
    return new PitchMap(root, Scale.major());
  }

  static minor(root: number): PitchMap {
    return new PitchMap(root, Scale.minor());
  }

  static chromatic(root: number): PitchMap {
    return new PitchMap(root, Scale.chromatic());
  }

  static pentatonicMajor(root: number): PitchMap {
    return new PitchMap(root, Scale.pentatonicMajor());
  }

  /** The digit indexes the scale, climbing an octave per wrap; clamped to 127. */
  noteFor(digit: number): number {
    const n = this.scale.length;
    const octave = Math.floor(digit / n);
    const semitone = this.scale.intervals[digit % n] ?? 0;
    return Math.min(127, this.root + octave * 12 + semitone);
  }
}

// ── Duration Map ──

export type DurationKind = 'musical' | 'linear' | 'exponential' | 'fixed' | 'custom';

export const DURATION_KINDS: readonly DurationKind[] = ['musical', 'linear', 'exponential', 'fixed'];

const EMPTY_TABLE_TICKS = 120;

export class DurationMap {
  readonly kind: DurationKind;
  /** Ticks indexed by digit value. */
  readonly table: readonly number[];

  private constructor(kind: DurationKind, table: readonly number[]) {
    this.kind = kind;
    this.table = Object.freeze([...table]);
  }

  /** 32nd, 16th, dotted 16th, 8th, dotted 8th, quarter, dotted quarter, half, dotted half, whole. */
  static musical(ticksPerQuarter: number = TICKS_PER_QUARTER): DurationMap {
    const q = ticksPerQuarter;
    return new DurationMap('musical', [
      Math.floor(q / 8),
      Math.floor(q / 4),
      Math.floor((q * 3) / 8),
      Math.floor(q / 2),
      Math.floor((q * 3) / 4),
      q,
      Math.floor((q * 3) / 2),
      q * 2,
      q * 3,
      q * 4,
    ]);
  }

  static linear(unitTicks: number, base: number): DurationMap {
    return new DurationMap(
      'linear',
      Array.from({ length: base }, (_, d) => (d + 1) * unitTicks),
    );
  }

  /** unit × 2^d, the exponent capped at 16. */
  static exponential(unitTicks: number, base: number): DurationMap {
    return new DurationMap(
      'exponential',
      Array.from({ length: base }, (_, d) => unitTicks * 2 ** Math.min(d, 16)),
    );
  }

  static fixed(ticks: number, base: number): DurationMap {
    return new DurationMap('fixed', Array.from({ length: base }, () => ticks));
  }

  static custom(table: readonly number[]): DurationMap {
    return new DurationMap('custom', table);
  }

  /** Wraps when the digit exceeds the table. */
  ticksFor(digit: number): number {
    if (this.table.length === 0) return EMPTY_TABLE_TICKS;
    return this.table[digit % this.table.length] ?? EMPTY_TABLE_TICKS;
  }
}

/**
 * Build a duration map from its CLI name at the file's resolution. `unit`
 * defaults to a sixteenth note and is ignored by `musical`.
 */
export function durationMapByName(
  kind: string,
  base: number,
  ticksPerQuarter: number = TICKS_PER_QUARTER,
  unit: number = Math.max(1, Math.floor(ticksPerQuarter / 4)),
): DurationMap {
  switch (kind.toLowerCase()) {
    case 'musical':
      return DurationMap.musical(ticksPerQuarter);
    case 'linear':
      return DurationMap.linear(unit, base);
    case 'exponential':
      return DurationMap.exponential(unit, base);
    case 'fixed':
      return DurationMap.fixed(unit, base);
    default:
      throw new ConfigError(
        `Unknown duration map '${kind}'. Expected one of: ${DURATION_KINDS.join(', ')}.`,
      );
  }
}

// ── General MIDI ──

function loadProgramNames(): readonly string[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/general-midi.json', import.meta.url), 'utf-8'),
  );
  if (
    !Array.isArray(raw) ||
    raw.length !== 128 ||
    !raw.every((n): n is string => typeof n === 'string')
  ) {
    throw new Error('data/general-midi.json must list exactly 128 program names.');
  }
  return Object.freeze(raw);
}

export const GM_PROGRAMS = loadProgramNames();

export function instrumentName(program: number): string {
  return GM_PROGRAMS[program] ?? `Program ${program}`;
}

function normalize(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Look up a program by name, ignoring case, spacing and punctuation. */
export function programByName(name: string): number | undefined {
  const key = normalize(name);
  const index = GM_PROGRAMS.findIndex((n) => normalize(n) === key);
  return index === -1 ? undefined : index;
}

/** Accept a program number (0–127) or a General MIDI name. */
export function parseProgram(text: string): number {
  const trimmed = text.trim();
  if (/^\d+$/.test(trimmed)) {
    const program = Number(trimmed);
    if (program > 127) throw new ConfigError(`Program must be 0–127, got ${program}.`);
    return program;
  }
  const program = programByName(trimmed);
  if (program === undefined) {
    throw new ConfigError(`Unknown instrument '${text}'. Run 'spigot instruments' for the list.`);
  }
  return program;
}
