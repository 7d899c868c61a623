/**
 * Player — the real-time production loop.
 *
 * Owns a private DualStream and turns each zipped pair into one note:
 * right digit → pitch, left digit → duration. Commands arrive over a bounded
 * channel and are applied in a batch before each note, so a Stop or Quit
 * takes effect only after the note in flight has sounded and released.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { Channel } from './channel.js';
import {
  COMMAND_CHANNEL_CAPACITY,
  DEFAULT_TEMPO_BPM,
  DEFAULT_VELOCITY,
  MIN_GAP_MS,
  MIN_NOTE_MS,
  NOTE_CHANNEL_CAPACITY,
  PLAYER_IDLE_MS,
  TICKS_PER_QUARTER,
} from './constants.js';
import type { DualStream } from './dual-stream.js';
import { ConfigError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './log.js';
import { NullSink, type InstrumentSink } from './sink.js';

// ── Types ──

export type PlayerCommand =
  | { type: 'play' }
  | { type: 'stop' }
  | { type: 'set-instrument'; program: number }
  | { type: 'set-tempo'; bpm: number }
  | { type: 'quit' };

export type PlayState = 'stopped' | 'playing';

export interface NoteEvent {
  pitch: number;
  /** Ticks. */
  duration: number;
  velocity: number;
  /** Absolute index of the left digit the note was made from. */
  leftPos: number;
  rightPos: number;
}

export type Sleep = (ms: number) => Promise<void>;

export interface PlayerOptions {
  sink: InstrumentSink;
  pitchFor: (digit: number) => number;
  ticksFor: (digit: number) => number;
  program?: number;
  tempoBpm?: number;
  velocity?: number;
  channel?: number;
  ticksPerQuarter?: number;
  sleep?: Sleep;
  logger?: Logger;
}

// ── Timing ──

/** Wall-clock length of a note, never shorter than MIN_NOTE_MS. */
export function ticksToMs(ticks: number, ticksPerQuarter: number, bpm: number): number {
  const msPerBeat = Math.floor(60_000 / Math.max(bpm, 1));
  const ms = Math.floor((ticks * msPerBeat) / Math.max(ticksPerQuarter, 1));
  return Math.max(MIN_NOTE_MS, ms);
}

export function gapMs(noteMs: number): number {
  return Math.max(MIN_GAP_MS, Math.floor(noteMs / 20));
}

function validateProgram(program: number): number {
  if (!Number.isInteger(program) || program < 0 || program > 127) {
    throw new ConfigError(`Program must be 0–127, got ${program}.`);
  }
  return program;
}

function validateTempo(bpm: number): number {
  if (!Number.isFinite(bpm) || bpm < 1) {
    throw new ConfigError(`Tempo must be at least 1 BPM, got ${bpm}.`);
  }
  return bpm;
}

function clampMidi(value: number): number {
  return Math.max(0, Math.min(127, Math.floor(value)));
}

// ── Loop ──

class PlayerLoop {
  private sink: InstrumentSink;
  private program: number;
  private tempoBpm: number;
  private state: PlayState = 'stopped';
  private quitRequested = false;
  private readonly velocity: number;
  private readonly channel: number;
  private readonly tpq: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(
    private readonly stream: DualStream,
    private readonly opts: PlayerOptions,
    private readonly commands: Channel<PlayerCommand>,
    private readonly notes: Channel<NoteEvent>,
  ) {
    this.sink = opts.sink;
    this.program = validateProgram(opts.program ?? 0);
    this.tempoBpm = validateTempo(opts.tempoBpm ?? DEFAULT_TEMPO_BPM);
    this.tpq = opts.ticksPerQuarter ?? TICKS_PER_QUARTER;
    if (!Number.isInteger(this.tpq) || this.tpq < 1) {
      throw new ConfigError(`Ticks per quarter must be a positive integer, got ${this.tpq}.`);
    }
    this.velocity = clampMidi(opts.velocity ?? DEFAULT_VELOCITY);
    this.channel = (opts.channel ?? 0) & 0x0f;
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.logger = opts.logger ?? silentLogger;
  }

  async run(): Promise<void> {
    this.logger.info(`Player started (${this.sink.name} sink, ${this.tempoBpm} BPM)`);
    try {
      while (this.applyPending()) {
        if (this.state === 'stopped') {
          await this.sleep(PLAYER_IDLE_MS);
          continue;
        }
        await this.playNext();
      }
    } finally {
      this.commands.close();
      this.notes.close();
      this.logger.info('Player stopped');
    }
  }

  /** Ends the loop at the next command batch, ahead of anything still queued. */
  requestQuit(): void {
    this.quitRequested = true;
  }

  /** Apply every queued command in order. Returns false once Quit is seen. */
  private applyPending(): boolean {
    if (this.quitRequested) return false;
    for (const cmd of this.commands.drain()) {
      switch (cmd.type) {
        case 'play':
          this.state = 'playing';
          this.toSink((s) => s.programChange(this.channel, this.program));
          break;
        case 'stop':
          this.state = 'stopped';
          break;
        case 'set-instrument':
          this.program = cmd.program;
          this.toSink((s) => s.programChange(this.channel, this.program));
          break;
        case 'set-tempo':
          this.tempoBpm = cmd.bpm;
          break;
        case 'quit':
          return false;
      }
    }
    return true;
  }

  private async playNext(): Promise<void> {
    const leftPos = this.stream.leftPos();
    const rightPos = this.stream.rightPos();
    const pair = this.stream.zipNext();
    if (!pair) {
      this.logger.info('Digit stream exhausted; playback stopped');
      this.state = 'stopped';
      return;
    }

    const [left, right] = pair;
    const pitch = clampMidi(this.opts.pitchFor(right));
    const ticks = this.opts.ticksFor(left);
    const ms = ticksToMs(ticks, this.tpq, this.tempoBpm);

    this.notes.send({ pitch, duration: ticks, velocity: this.velocity, leftPos, rightPos });
    this.toSink((s) => s.noteOn(this.channel, pitch, this.velocity));
    await this.sleep(ms);
    this.toSink((s) => s.noteOff(this.channel, pitch));
    await this.sleep(gapMs(ms));
  }

  /** A failing sink is replaced by a silent one; playback carries on. */
  private toSink(action: (sink: InstrumentSink) => void): void {
    try {
      action(this.sink);
    } catch (err) {
      this.logger.warn(`Instrument sink '${this.sink.name}' failed (${errorMessage(err)}); continuing silently.`);
      this.sink = new NullSink();
    }
  }
}

// ── Handle ──

export class PlayerHandle {
  /** Resolves when the loop has ended after Quit. */
  readonly finished: Promise<void>;

  constructor(
    private readonly commands: Channel<PlayerCommand>,
    private readonly notes: Channel<NoteEvent>,
    finished: Promise<void>,
    private readonly requestQuit: () => void,
  ) {
    this.finished = finished;
  }

  play(): boolean {
    return this.commands.send({ type: 'play' });
  }

  stop(): boolean {
    return this.commands.send({ type: 'stop' });
  }

  setInstrument(program: number): boolean {
    return this.commands.send({ type: 'set-instrument', program: validateProgram(program) });
  }

  setTempo(bpm: number): boolean {
    return this.commands.send({ type: 'set-tempo', bpm: validateTempo(bpm) });
  }

  /** Never lost to a full command queue. False only once the player has ended. */
  quit(): boolean {
    if (this.commands.isClosed) return false;
    if (!this.commands.send({ type: 'quit' })) this.requestQuit();
    return true;
  }

  /** Every note event produced since the last drain, oldest first. */
  drainNotes(): NoteEvent[] {
    return this.notes.drain();
  }

  get droppedNotes(): number {
    return this.notes.dropped;
  }
}

export const Player = {
  /** Validate the options and start the loop on its own async task. */
  spawn(stream: DualStream, opts: PlayerOptions): PlayerHandle {
    const commands = new Channel<PlayerCommand>(COMMAND_CHANNEL_CAPACITY, 'drop-newest');
    const notes = new Channel<NoteEvent>(NOTE_CHANNEL_CAPACITY, 'drop-oldest');
    const loop = new PlayerLoop(stream, opts, commands, notes);
    return new PlayerHandle(commands, notes, loop.run(), () => loop.requestQuit());
  },
};
