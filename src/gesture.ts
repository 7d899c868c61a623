/**
 * Gesture dispatcher — uniform front for every gesture producer.
 *
 * A producer runs on its own async task and sends normalized events into a
 * channel; the dispatcher neither reorders nor coalesces them. Producers may
 * coalesce before sending (a fast pull is one event of five steps).
 */

import { emitKeypressEvents, type Key } from 'node:readline';
import { createInterface } from 'node:readline/promises';
import { Channel } from './channel.js';
import { GESTURE_CHANNEL_CAPACITY } from './constants.js';

// ── Events ──

export type GestureEvent =
  | { kind: 'pull-left'; steps: number; velocity: number }
  | { kind: 'pull-right'; steps: number; velocity: number }
  | { kind: 'twist' }
  | { kind: 'clap' }
  | { kind: 'unclap' }
  /** An empty name asks the orchestrator to prompt for one. */
  | { kind: 'scissors'; name: string }
  | { kind: 'quit' };

export type GestureKind = GestureEvent['kind'];

export const MAX_PULL_STEPS = 1000;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate an untrusted payload (a decoded JSON body) as a gesture event. */
export function parseGestureEvent(input: unknown): ParseResult<GestureEvent> {
  if (!isRecord(input)) return { ok: false, error: 'Event must be a JSON object' };

  const { kind } = input;
  if (kind === 'pull-left' || kind === 'pull-right') {
    const { steps, velocity } = input;
    if (typeof steps !== 'number' || !Number.isInteger(steps) || steps < 1 || steps > MAX_PULL_STEPS) {
      return { ok: false, error: `"steps" must be an integer from 1 to ${MAX_PULL_STEPS}` };
    }
    if (typeof velocity !== 'number' || !(velocity >= 0 && velocity <= 1)) {
      return { ok: false, error: '"velocity" must be a number from 0 to 1' };
    }
    return { ok: true, value: { kind, steps, velocity } };
  }
  if (kind === 'scissors') {
    const name = input.name ?? '';
    if (typeof name !== 'string') return { ok: false, error: '"name" must be a string' };
    return { ok: true, value: { kind, name: name.trim() } };
  }
  if (kind === 'twist' || kind === 'clap' || kind === 'unclap' || kind === 'quit') {
    return { ok: true, value: { kind } };
  }
  return { ok: false, error: `Unknown gesture kind: ${JSON.stringify(kind)}` };
}

// ── Producers ──

export interface GestureSource {
  /** Produce events into `sink` until the source ends (after sending Quit, or on shutdown). */
  run(sink: Channel<GestureEvent>): Promise<void>;
}

export interface GestureFeed {
  events: Channel<GestureEvent>;
  /** Settles when the producer's task ends. */
  done: Promise<void>;
}

/**
 * Start `source` on its own task. Pass an existing channel to let several
 * producers feed one consumer.
 */
export function spawnGestureSource(
  source: GestureSource,
  events: Channel<GestureEvent> = new Channel<GestureEvent>(GESTURE_CHANNEL_CAPACITY, 'drop-newest'),
): GestureFeed {
  return { events, done: source.run(events) };
}

// ── Simulated producer ──

export type SimKey =
  | 'pull-left'
  | 'pull-right'
  | 'pull-left-fast'
  | 'pull-right-fast'
  | 'twist'
  | 'clap'
  | 'unclap'
  | 'scissors'
  | 'quit';

export type SimInput =
  | { kind: 'key-down'; key: SimKey }
  | { kind: 'key-up'; key: SimKey }
  | { kind: 'snippet-name'; name: string };

function simEvent(input: SimInput): GestureEvent | undefined {
  switch (input.kind) {
    case 'snippet-name':
      return { kind: 'scissors', name: input.name };
    case 'key-up':
      return undefined;
    case 'key-down':
      switch (input.key) {
        case 'pull-left':
          return { kind: 'pull-left', steps: 1, velocity: 0.3 };
        case 'pull-left-fast':
          return { kind: 'pull-left', steps: 5, velocity: 0.9 };
        case 'pull-right':
          return { kind: 'pull-right', steps: 1, velocity: 0.3 };
        case 'pull-right-fast':
          return { kind: 'pull-right', steps: 5, velocity: 0.9 };
        case 'scissors':
          return { kind: 'scissors', name: '' };
        case 'twist':
        case 'clap':
        case 'unclap':
        case 'quit':
          return { kind: input.key };
      }
  }
}

/** Translates simulated key input into gestures; ends after Quit or when its input closes. */
export class SimGestureSource implements GestureSource {
  constructor(private readonly input: Channel<SimInput>) {}

  async run(sink: Channel<GestureEvent>): Promise<void> {
    for (let input = await this.input.recv(); input; input = await this.input.recv()) {
      const event = simEvent(input);
      if (!event) continue;
      sink.send(event);
      if (event.kind === 'quit') return;
    }
  }
}

// ── Keyboard ──

/** Terminal key → simulated key. `a`/`d` pull, shifted for a fast pull. */
export function keyToSim(key: Key): SimKey | undefined {
  if (key.ctrl && key.name === 'c') return 'quit';
  if (key.ctrl || key.meta) return undefined;
  switch (key.name) {
    case 'a':
      return key.shift ? 'pull-left-fast' : 'pull-left';
    case 'd':
      return key.shift ? 'pull-right-fast' : 'pull-right';
    case 't':
      return 'twist';
    case 'space':
      return 'clap';
    case 'escape':
      return 'unclap';
    case 's':
      return 'scissors';
    case 'q':
      return 'quit';
    default:
      return undefined;
  }
}

/**
 * Raw-mode keypress reader feeding a SimInput channel. `prompt` leaves raw
 * mode long enough to read one line, for snippet names.
 */
export class KeyboardInput {
  readonly channel = new Channel<SimInput>(GESTURE_CHANNEL_CAPACITY, 'drop-newest');
  private readonly stdin = process.stdin;
  private listening = false;

  private readonly onKeypress = (_: string | undefined, key: Key | undefined): void => {
    if (!key) return;
    const sim = keyToSim(key);
    if (sim) this.channel.send({ kind: 'key-down', key: sim });
  };

  start(): void {
    emitKeypressEvents(this.stdin);
    this.resume();
  }

  async prompt(question: string): Promise<string> {
    this.suspend();
    const rl = createInterface({ input: this.stdin, output: process.stdout });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
      this.resume();
    }
  }

  stop(): void {
    this.suspend();
    this.stdin.pause();
    this.channel.close();
  }

  private suspend(): void {
    if (!this.listening) return;
    this.listening = false;
    this.stdin.off('keypress', this.onKeypress);
    if (this.stdin.isTTY) this.stdin.setRawMode(false);
  }

  private resume(): void {
    if (this.listening || this.channel.isClosed) return;
    this.listening = true;
    if (this.stdin.isTTY) this.stdin.setRawMode(true);
    this.stdin.on('keypress', this.onKeypress);
    this.stdin.resume();
  }
}
