/**
 * Standard MIDI File output.
 *
 * `MidiComposer` zips a DualStream into notes (left digit → duration, right
 * digit → pitch) and produces a `MidiTrack`. Tracks serialize to format 0 on
 * their own, or to format 1 through `multiTrackBytes`.
 */

import { writeFile } from 'node:fs/promises';
import { DEFAULT_TEMPO_BPM, DEFAULT_VELOCITY, TICKS_PER_QUARTER } from './constants.js';
import type { DualStream, DigitPair } from './dual-stream.js';
import { ComposeError, ConfigError } from './errors.js';
import { DurationMap, PitchMap } from './music.js';

export interface Note {
  pitch: number;
  /** Ticks. */
  duration: number;
  velocity: number;
}

export const MAX_TEMPO_BPM = 300;
const MAX_TICKS_PER_QUARTER = 0x7fff;

// ── Byte helpers ──

/** MIDI variable-length quantity: 7 bits per byte, most significant first. */
export function writeVlq(value: number): number[] {
  if (!Number.isInteger(value) || value < 0 || value > 0x0fffffff) {
    throw new RangeError(`VLQ value out of range: ${value}`);
  }
  const out = [value & 0x7f];
  let rest = value >>> 7;
  while (rest > 0) {
    out.unshift((rest & 0x7f) | 0x80);
    rest >>>= 7;
  }
  return out;
}

function u16(value: number): number[] {
  return [(value >>> 8) & 0xff, value & 0xff];
}

function u32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

function ascii(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0));
}

function headerChunk(format: 0 | 1, trackCount: number, ticksPerQuarter: number): number[] {
  return [...ascii('MThd'), ...u32(6), ...u16(format), ...u16(trackCount), ...u16(ticksPerQuarter)];
}

// ── Track ──

export class MidiTrack {
  constructor(
    readonly notes: readonly Note[],
    readonly ticksPerQuarter: number,
    readonly tempoBpm: number,
    readonly instrument: number,
    readonly channel: number,
    readonly description: string,
  ) {}

  /** A complete format-0 file. */
  toBytes(): Uint8Array {
    return Uint8Array.from([...headerChunk(0, 1, this.ticksPerQuarter), ...this.chunk()]);
  }

  /** The `MTrk` chunk, header included. */
  chunk(): number[] {
    const body = this.events();
    return [...ascii('MTrk'), ...u32(body.length), ...body];
  }

  private events(): number[] {
    const ch = this.channel & 0x0f;
    const micros = Math.floor(60_000_000 / this.tempoBpm);
    const name = Buffer.from(this.description, 'utf-8');

    const t: number[] = [
      0x00, 0xff, 0x51, 0x03, (micros >>> 16) & 0xff, (micros >>> 8) & 0xff, micros & 0xff,
      0x00, 0xff, 0x03, ...writeVlq(name.length), ...name,
      0x00, 0xc0 | ch, this.instrument,
    ];
    for (const note of this.notes) {
      t.push(0x00, 0x90 | ch, note.pitch, note.velocity);
      t.push(...writeVlq(note.duration), 0x80 | ch, note.pitch, 0x00);
    }
    t.push(0x00, 0xff, 0x2f, 0x00);
    return t;
  }
}

/** Format-1 file; every track shares the first track's resolution. Empty input gives no bytes. */
export function multiTrackBytes(tracks: readonly MidiTrack[]): Uint8Array {
  const [first] = tracks;
  if (!first) return new Uint8Array(0);
  const out = headerChunk(1, tracks.length, first.ticksPerQuarter);
  for (const track of tracks) out.push(...track.chunk());
  return Uint8Array.from(out);
}

export async function writeMidiFile(path: string, bytes: Uint8Array): Promise<void> {
  await writeFile(path, bytes);
}

// ── Composer ──

/**
 * Builder over a DualStream. Defaults: 120 BPM, Acoustic Grand Piano,
 * C major from middle C, musical durations at 480 TPQ, velocity 100, channel 0.
 */
export class MidiComposer {
  private tempoBpm = DEFAULT_TEMPO_BPM;
  private program = 0;
  private pitchMap = PitchMap.major(60);
  private durationMap = DurationMap.musical(TICKS_PER_QUARTER);
  private noteVelocity = DEFAULT_VELOCITY;
  private midiChannel = 0;
  private tpq = TICKS_PER_QUARTER;
  private label = 'spigot-ribbon';

  constructor(private readonly stream: DualStream) {}

  tempo(bpm: number): this {
    if (!Number.isInteger(bpm) || bpm < 1 || bpm > MAX_TEMPO_BPM) {
      throw new ConfigError(`Tempo must be 1–${MAX_TEMPO_BPM} BPM, got ${bpm}.`);
    }
    this.tempoBpm = bpm;
    return this;
  }

  instrument(program: number): this {
    if (!Number.isInteger(program) || program < 0 || program > 127) {
      throw new ConfigError(`Program must be 0–127, got ${program}.`);
    }
    this.program = program;
    return this;
  }

  withPitchMap(map: PitchMap): this {
    this.pitchMap = map;
    return this;
  }

  withDurationMap(map: DurationMap): this {
    this.durationMap = map;
    return this;
  }

  ticksPerQuarter(tpq: number): this {
    if (!Number.isInteger(tpq) || tpq < 1 || tpq > MAX_TICKS_PER_QUARTER) {
      throw new ConfigError(`Ticks per quarter must be 1–${MAX_TICKS_PER_QUARTER}, got ${tpq}.`);
    }
    this.tpq = tpq;
    return this;
  }

  /** Clamped to 0–127. */
  velocity(v: number): this {
    this.noteVelocity = Math.max(0, Math.min(127, Math.floor(v)));
    return this;
  }

  /** Masked to 0–15. */
  channel(ch: number): this {
    this.midiChannel = ch & 0x0f;
    return this;
  }

  description(text: string): this {
    this.label = text;
    return this;
  }

  dropLeft(n: number): this {
    this.stream.left().drop(n);
    return this;
  }

  dropRight(n: number): this {
    this.stream.right().drop(n);
    return this;
  }

  /** Swap which stream drives duration and which drives pitch. */
  twist(): this {
    this.stream.twist();
    return this;
  }

  compose(n: number): MidiTrack {
    return this.build(this.takePairs(n));
  }

  /** Consumes exactly `n` pairs; only those passing `keep` become notes. */
  composeFiltered(n: number, keep: (left: number, right: number) => boolean): MidiTrack {
    const pairs = this.takePairs(n).filter(([l, r]) => keep(l, r));
    if (pairs.length === 0) throw new ComposeError('Filter rejected every note.');
    return this.build(pairs);
  }

  private takePairs(n: number): DigitPair[] {
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigError(`Note count must be a positive integer, got ${n}.`);
    }
    return this.stream.zipTake(n);
  }

  private build(pairs: readonly DigitPair[]): MidiTrack {
    const notes = pairs.map(([left, right]) => ({
      pitch: this.pitchMap.noteFor(right),
      duration: this.durationMap.ticksFor(left),
      velocity: this.noteVelocity,
    }));
    return new MidiTrack(notes, this.tpq, this.tempoBpm, this.program, this.midiChannel, this.label);
  }
}
