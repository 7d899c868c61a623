#!/usr/bin/env node

/**
 * spigot CLI — play two digit streams against each other.
 *
 * Commands:
 *   perform [--left pi:10] [--right e:10] [--remote]   Live, gesture-driven performance
 *   digits <stream> [-n <count>] [--skip <n>]          Print digits of one stream
 *   zip <left> <right> [-n <count>] [--snip <a:b>]     Print zipped pairs (and a snippet)
 *   compose <file> [--pair <l/r> ...]                  Write a Standard MIDI File
 *   gesture <kind> [--steps <n>] [--name <s>]          Send a gesture to a running performance
 *   status                                             Is a --remote performance listening?
 *   instruments                                        List General MIDI programs
 */

import { Command, InvalidArgumentError } from 'commander';
import { defaultAppConfig, runPerformance, type AppConfig } from './app.js';
import { health, sendGesture } from './client.js';
import { C, TICKS_PER_QUARTER } from './constants.js';
import { Cursor } from './cursor.js';
import { describeConfig, digitChar, parseSpigotConfig, type SpigotConfig } from './digits.js';
import { DualStream } from './dual-stream.js';
import { errorMessage } from './errors.js';
import { parseGestureEvent } from './gesture.js';
import { MidiComposer, multiTrackBytes, writeMidiFile, type MidiTrack } from './midi-file.js';
import {
  durationMapByName,
  GM_PROGRAMS,
  parseProgram,
  PitchMap,
  scaleByName,
  type DurationMap,
} from './music.js';

const program = new Command();

program
  .name('spigot')
  .description('Turn two infinite digit streams into a gesture-driven musical performance')
  .version('0.1.0');

// ── Option parsing ──

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseNonNegative(value: string): number {
  const n = parseInteger(value);
  if (n < 0) throw new InvalidArgumentError('Must not be negative.');
  return n;
}

function parseStream(value: string): SpigotConfig {
  try {
    return parseSpigotConfig(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(err: unknown): never {
  console.error(`${C.red}✗${C.reset} ${errorMessage(err)}`);
  process.exit(1);
}

interface SoundOpts {
  scale: string;
  root: number;
  durations: string;
  unit?: number;
  instrument: string;
  tempo: number;
  velocity: number;
  channel: number;
}

function withSoundOptions(cmd: Command): Command {
  return cmd
    .option('--scale <name>', 'Scale for the right (pitch) digits', 'major')
    .option('--root <note>', 'Root MIDI note', parseInteger, 60)
    .option('--durations <kind>', 'Duration map for the left digits: musical, linear, exponential, fixed', 'musical')
    .option('--unit <ticks>', 'Unit length in ticks for non-musical duration maps', parseInteger)
    .option('-i, --instrument <program>', 'General MIDI program number or name', '0')
    .option('--tempo <bpm>', 'Tempo in BPM', parseInteger, 120)
    .option('--velocity <v>', 'Note velocity (clamped to 0–127)', parseInteger, 100)
    .option('--channel <ch>', 'MIDI channel (0–15)', parseInteger, 0);
}

function pitchMapFrom(opts: SoundOpts): PitchMap {
  return new PitchMap(opts.root, scaleByName(opts.scale));
}

function durationMapFrom(opts: SoundOpts, base: number, ticksPerQuarter: number): DurationMap {
  return durationMapByName(opts.durations, base, ticksPerQuarter, opts.unit);
}

// ── perform ──

interface PerformOpts extends SoundOpts {
  left: SpigotConfig;
  right: SpigotConfig;
  remote: boolean;
}

withSoundOptions(
  program
    .command('perform')
    .description('Start a live performance driven by keyboard (and optionally remote) gestures')
    .option('-l, --left <stream>', 'Left stream as constant:base', parseStream, parseSpigotConfig('pi:10'))
    .option('-r, --right <stream>', 'Right stream as constant:base', parseStream, parseSpigotConfig('e:10'))
    .option('--remote', 'Also accept gestures over HTTP (see `spigot gesture`)', false),
).action(async (opts: PerformOpts) => {
  try {
    const cfg: AppConfig = {
      ...defaultAppConfig(),
      left: opts.left,
      right: opts.right,
      pitchMap: pitchMapFrom(opts),
      durationMap: durationMapFrom(opts, opts.left.base, TICKS_PER_QUARTER),
      program: parseProgram(opts.instrument),
      tempoBpm: opts.tempo,
      velocity: opts.velocity,
      channel: opts.channel,
    };
    await runPerformance(cfg, { remote: opts.remote });
    console.log(`${C.yellow}■${C.reset} Performance ended.`);
  } catch (err) {
    fail(err);
  }
});

// ── digits ──

program
  .command('digits')
  .description('Print the first digits of a stream')
  .argument('<stream>', 'constant:base, e.g. pi:16', parseStream)
  .option('-n, --count <n>', 'Number of digits', parseNonNegative, 50)
  .option('--skip <n>', 'Digits to drop first', parseNonNegative, 0)
  .action((config: SpigotConfig, opts: { count: number; skip: number }) => {
    try {
      const cursor = new Cursor(config);
      cursor.drop(opts.skip);
      const digits = cursor.take(opts.count).map(digitChar).join('');
      console.log(`${C.bold}${describeConfig(config)}${C.reset} ${C.dim}@ ${opts.skip}${C.reset}`);
      console.log(digits);
    } catch (err) {
      fail(err);
    }
  });

// ── zip ──

interface ZipOpts {
  count: number;
  dropLeft: number;
  dropRight: number;
  twist: boolean;
  snip?: string;
}

function parseRange(text: string): [number, number] {
  const match = /^(\d+):(\d+)$/.exec(text.trim());
  if (!match) throw new InvalidArgumentError('Use <from>:<to>, e.g. 0:16.');
  return [Number(match[1]), Number(match[2])];
}

program
  .command('zip')
  .description('Print zipped (left, right) digit pairs')
  .argument('<left>', 'Left stream as constant:base', parseStream)
  .argument('<right>', 'Right stream as constant:base', parseStream)
  .option('-n, --count <n>', 'Number of pairs', parseNonNegative, 20)
  .option('--drop-left <n>', 'Advance only the left side first', parseNonNegative, 0)
  .option('--drop-right <n>', 'Advance only the right side first', parseNonNegative, 0)
  .option('--twist', 'Swap the sides before zipping', false)
  .option('--snip <from:to>', 'Also capture an absolute range as a snippet')
  .action((left: SpigotConfig, right: SpigotConfig, opts: ZipOpts) => {
    try {
      const stream = DualStream.fromConfigs(left, right);
      stream.left().drop(opts.dropLeft);
      stream.right().drop(opts.dropRight);
      if (opts.twist) stream.twist();

      const pairs = stream.zipTake(opts.count);
      console.log(`${C.dim}${stream.status()}${C.reset}`);
      console.log(pairs.map(([l, r]) => `(${digitChar(l)},${digitChar(r)})`).join(' '));

      if (opts.snip) {
        const [from, to] = parseRange(opts.snip);
        const snippet = stream.snip('cli', from, to);
        console.log(
          `${C.magenta}✂${C.reset} [${snippet.from}, ${snippet.to}) ` +
            snippet.pairs.map(([l, r]) => `${digitChar(l)}${digitChar(r)}`).join(' '),
        );
      }
    } catch (err) {
      fail(err);
    }
  });

// ── compose ──

interface ComposeOpts extends SoundOpts {
  pair: string[];
  notes: number;
  dropLeft: number;
  dropRight: number;
  twist: boolean;
  tpq: number;
  skipPitchDigit?: number;
}

function parsePair(text: string): [SpigotConfig, SpigotConfig] {
  const [left, right, ...rest] = text.split('/');
  if (!left || !right || rest.length > 0) {
    throw new InvalidArgumentError(`Malformed pair '${text}'. Use <left>/<right>, e.g. pi:10/e:10.`);
  }
  return [parseStream(left), parseStream(right)];
}

function composeTrack(left: SpigotConfig, right: SpigotConfig, opts: ComposeOpts): MidiTrack {
  const composer = new MidiComposer(DualStream.fromConfigs(left, right))
    .tempo(opts.tempo)
    .instrument(parseProgram(opts.instrument))
    .withPitchMap(pitchMapFrom(opts))
    .withDurationMap(durationMapFrom(opts, left.base, opts.tpq))
    .ticksPerQuarter(opts.tpq)
    .velocity(opts.velocity)
    .channel(opts.channel)
    .description(`${describeConfig(left)} × ${describeConfig(right)}`)
    .dropLeft(opts.dropLeft)
    .dropRight(opts.dropRight);
  if (opts.twist) composer.twist();

  const skip = opts.skipPitchDigit;
  return skip === undefined
    ? composer.compose(opts.notes)
    : composer.composeFiltered(opts.notes, (_, r) => r !== skip);
}

withSoundOptions(
  program
    .command('compose')
    .description('Compose zipped digit pairs into a Standard MIDI File')
    .argument('<file>', 'Output .mid path')
    .option('-p, --pair <left/right>', 'Stream pair for one track (repeat for more tracks)', collect, [])
    .option('-n, --notes <n>', 'Pairs to consume per track', parseInteger, 64)
    .option('--drop-left <n>', 'Advance the left (duration) side first', parseNonNegative, 0)
    .option('--drop-right <n>', 'Advance the right (pitch) side first', parseNonNegative, 0)
    .option('--twist', 'Swap which stream drives duration and pitch', false)
    .option('--tpq <n>', 'Ticks per quarter note', parseInteger, 480)
    .option('--skip-pitch-digit <d>', 'Leave out pairs whose right digit is <d>', parseNonNegative),
).action(async (file: string, opts: ComposeOpts) => {
  try {
    const pairs = (opts.pair.length > 0 ? opts.pair : ['pi:10/e:10']).map(parsePair);
    const tracks = pairs.map(([left, right]) => composeTrack(left, right, opts));
    const [only] = tracks;
    const bytes = tracks.length === 1 && only ? only.toBytes() : multiTrackBytes(tracks);
    await writeMidiFile(file, bytes);

    const noteCount = tracks.reduce((sum, t) => sum + t.notes.length, 0);
    console.log(
      `${C.green}✓${C.reset} Wrote ${C.cyan}${file}${C.reset} ${C.dim}(format ${tracks.length === 1 ? 0 : 1}, ${tracks.length} track(s), ${noteCount} notes, ${bytes.length} bytes)${C.reset}`,
    );
  } catch (err) {
    fail(err);
  }
});

// ── gesture ──

program
  .command('gesture')
  .description('Send a gesture to a performance started with --remote')
  .argument('<kind>', 'pull-left, pull-right, twist, clap, unclap, scissors or quit')
  .option('--steps <n>', 'Steps for a pull', parseInteger, 1)
  .option('--velocity <v>', 'Velocity 0–1 for a pull', Number, 0.5)
  .option('--name <name>', 'Snippet name for scissors', '')
  .action(async (kind: string, opts: { steps: number; velocity: number; name: string }) => {
    try {
      const parsed = parseGestureEvent({ kind, ...opts });
      if (!parsed.ok) throw new Error(parsed.error);
      const result = await sendGesture(parsed.value);
      if (result.accepted) {
        console.log(`${C.green}✓${C.reset} Sent ${C.cyan}${result.kind}${C.reset}`);
      } else {
        console.log(`${C.yellow}!${C.reset} ${result.kind} dropped: the performance's gesture queue is full.`);
      }
    } catch (err) {
      fail(err);
    }
  });

// ── status ──

program
  .command('status')
  .description('Check whether a performance is accepting remote gestures')
  .action(async () => {
    try {
      const info = await health();
      if (info) {
        console.log(`${C.green}●${C.reset} Performance listening ${C.dim}(pid: ${info.pid})${C.reset}`);
      } else {
        console.log(`${C.gray}○${C.reset} No performance is listening.`);
      }
    } catch (err) {
      fail(err);
    }
  });

// ── instruments ──

program
  .command('instruments')
  .description('List General MIDI programs')
  .action(() => {
    GM_PROGRAMS.forEach((name, index) => {
      console.log(`  ${C.dim}${String(index).padStart(3)}${C.reset}  ${name}`);
    });
  });

// ── Parse and execute ──

program.parseAsync().catch(fail);
