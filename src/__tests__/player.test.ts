import { describe, expect, it } from 'vitest';
import { Cursor } from '../cursor.js';
import { spigotConfig } from '../digits.js';
import { DualStream } from '../dual-stream.js';
import { ConfigError } from '../errors.js';
import type { Logger } from '../log.js';
import { gapMs, Player, ticksToMs, type PlayerHandle, type PlayerOptions } from '../player.js';
import type { InstrumentSink } from '../sink.js';
import { finiteSource, waitFor, yieldingSleep } from './helpers.js';

class RecordingSink implements InstrumentSink {
  readonly name = 'recording';
  events: string[] = [];
  onNoteOn?: () => void;

  programChange(channel: number, program: number): void {
    this.events.push(`program ${channel} ${program}`);
  }
  noteOn(channel: number, note: number, velocity: number): void {
    this.events.push(`on ${channel} ${note} ${velocity}`);
    this.onNoteOn?.();
  }
  noteOff(channel: number, note: number): void {
    this.events.push(`off ${channel} ${note}`);
  }
  async close(): Promise<void> {}
}

class RecordingLogger implements Logger {
  infos: string[] = [];
  warns: string[] = [];
  info = (msg: string): void => {
    this.infos.push(msg);
  };
  warn = (msg: string): void => {
    this.warns.push(msg);
  };
}

const EXHAUSTED = 'Digit stream exhausted; playback stopped';

/** π-like left [3, 1, 4] against e-like right [2, 7, 1], then nothing. */
function shortStream(): DualStream {
  return new DualStream(
    new Cursor(spigotConfig('pi', 10), finiteSource([3, 1, 4])),
    new Cursor(spigotConfig('e', 10), finiteSource([2, 7, 1])),
  );
}

function options(sink: InstrumentSink, extra: Partial<PlayerOptions> = {}): PlayerOptions {
  return {
    sink,
    pitchFor: (d) => 60 + d,
    ticksFor: (d) => d * 100,
    sleep: yieldingSleep(),
    ...extra,
  };
}

describe('timing', () => {
  it.each([
    [480, 480, 120, 500],
    [240, 480, 120, 250],
    [300, 480, 120, 312],
    [960, 480, 60, 2000],
    [1, 480, 120, 50],
    [480, 480, 0, 60_000],
  ])('ticksToMs(%i, %i, %i) = %i', (ticks, tpq, bpm, ms) => {
    expect(ticksToMs(ticks, tpq, bpm)).toBe(ms);
  });

  it('keeps a gap of a twentieth of the note, at least 5 ms', () => {
    expect(gapMs(500)).toBe(25);
    expect(gapMs(312)).toBe(15);
    expect(gapMs(50)).toBe(5);
  });
});

describe('Player', () => {
  it('plays one note per pair until the stream runs out', async () => {
    const sink = new RecordingSink();
    const logger = new RecordingLogger();
    const slept: number[] = [];
    const player = Player.spawn(shortStream(), options(sink, { logger, sleep: yieldingSleep(slept) }));

    player.play();
    await waitFor(() => logger.infos.includes(EXHAUSTED));
    player.quit();
    await player.finished;

    expect(sink.events).toEqual([
      'program 0 0',
      'on 0 62 100',
      'off 0 62',
      'on 0 67 100',
      'off 0 67',
      'on 0 61 100',
      'off 0 61',
    ]);
    expect(slept.filter((ms) => ms !== 10)).toEqual([312, 15, 104, 5, 416, 20]);
  });

  it('reports each note with the positions it was read from', async () => {
    const logger = new RecordingLogger();
    const player = Player.spawn(shortStream(), options(new RecordingSink(), { logger }));

    player.play();
    await waitFor(() => logger.infos.includes(EXHAUSTED));

    expect(player.drainNotes()).toEqual([
      { pitch: 62, duration: 300, velocity: 100, leftPos: 0, rightPos: 0 },
      { pitch: 67, duration: 100, velocity: 100, leftPos: 1, rightPos: 1 },
      { pitch: 61, duration: 400, velocity: 100, leftPos: 2, rightPos: 2 },
    ]);
    expect(player.drainNotes()).toEqual([]);
    player.quit();
    await player.finished;
  });

  it('finishes the note in flight when stopped', async () => {
    const sink = new RecordingSink();
    let handle: PlayerHandle | undefined;
    sink.onNoteOn = () => handle?.stop();
    handle = Player.spawn(DualStream.fromConfigs(spigotConfig('pi', 10), spigotConfig('e', 10)), options(sink));

    handle.play();
    await waitFor(() => sink.events.length >= 3);
    handle.quit();
    await handle.finished;

    expect(sink.events).toEqual(['program 0 0', 'on 0 62 100', 'off 0 62']);
  });

  it('quits even when the command queue is full', async () => {
    const sink = new RecordingSink();
    const held: { release?: () => void } = {};
    const idle = yieldingSleep();
    const sleep = (ms: number): Promise<void> =>
      ms === 312 ? new Promise<void>((resolve) => (held.release = resolve)) : idle(ms);
    const player = Player.spawn(shortStream(), options(sink, { sleep }));

    player.play();
    await waitFor(() => held.release !== undefined);
    for (let i = 0; i < 128; i++) {
      player.play();
      player.stop();
    }
    expect(player.stop()).toBe(false);

    expect(player.quit()).toBe(true);
    held.release?.();
    await player.finished;

    expect(sink.events).toEqual(['program 0 0', 'on 0 62 100', 'off 0 62']);
  });

  it('stops accepting commands once it has quit', async () => {
    const player = Player.spawn(shortStream(), options(new RecordingSink()));
    expect(player.quit()).toBe(true);
    await player.finished;
    expect(player.play()).toBe(false);
    expect(player.quit()).toBe(false);
  });

  it('masks the channel and clamps the velocity', async () => {
    const sink = new RecordingSink();
    const logger = new RecordingLogger();
    const player = Player.spawn(shortStream(), options(sink, { logger, channel: 17, velocity: 300 }));

    player.play();
    await waitFor(() => logger.infos.includes(EXHAUSTED));
    player.quit();
    await player.finished;

    expect(sink.events.slice(0, 3)).toEqual(['program 1 0', 'on 1 62 127', 'off 1 62']);
  });

  it('applies instrument changes before the next note', async () => {
    const sink = new RecordingSink();
    const logger = new RecordingLogger();
    const player = Player.spawn(shortStream(), options(sink, { logger, program: 4 }));

    player.setInstrument(11);
    player.play();
    await waitFor(() => logger.infos.includes(EXHAUSTED));
    player.quit();
    await player.finished;

    expect(sink.events.slice(0, 3)).toEqual(['program 0 11', 'program 0 11', 'on 0 62 100']);
  });

  it('carries on silently after the sink fails', async () => {
    const sink = new RecordingSink();
    sink.onNoteOn = () => {
      throw new Error('device unplugged');
    };
    const logger = new RecordingLogger();
    const player = Player.spawn(shortStream(), options(sink, { logger }));

    player.play();
    await waitFor(() => logger.infos.includes(EXHAUSTED));
    player.quit();
    await player.finished;

    expect(sink.events).toEqual(['program 0 0', 'on 0 62 100']);
    expect(logger.warns).toEqual([
      "Instrument sink 'recording' failed (device unplugged); continuing silently.",
    ]);
    expect(player.drainNotes().map((n) => n.pitch)).toEqual([62, 67, 61]);
  });

  it('rejects invalid settings', () => {
    const sink = new RecordingSink();
    expect(() => Player.spawn(shortStream(), options(sink, { program: 128 }))).toThrow(ConfigError);
    expect(() => Player.spawn(shortStream(), options(sink, { tempoBpm: 0 }))).toThrow(ConfigError);
    expect(() => Player.spawn(shortStream(), options(sink, { ticksPerQuarter: 0 }))).toThrow(ConfigError);
  });

  it('validates commands before queueing them', async () => {
    const player = Player.spawn(shortStream(), options(new RecordingSink()));
    expect(() => player.setInstrument(-1)).toThrow(ConfigError);
    expect(() => player.setTempo(0)).toThrow(ConfigError);
    expect(player.setTempo(90)).toBe(true);
    player.quit();
    await player.finished;
  });
});
