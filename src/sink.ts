/**
 * Instrument sinks — where the player's note-on / note-off events go.
 *
 * `WebAudioSink` voices each note with an oscillator on a Web Audio context
 * (node-web-audio-api in production). `NullSink` drops everything; it stands
 * in whenever no audio output can be opened.
 */

import { errorMessage } from './errors.js';
import { warnOnce, type Logger } from './log.js';

export interface InstrumentSink {
  readonly name: string;
  programChange(channel: number, program: number): void;
  noteOn(channel: number, note: number, velocity: number): void;
  noteOff(channel: number, note: number): void;
  close(): Promise<void>;
}

export class NullSink implements InstrumentSink {
  readonly name = 'silent';
  programChange(): void {}
  noteOn(): void {}
  noteOff(): void {}
  async close(): Promise<void> {}
}

// ── Web Audio ──

// The slice of the Web Audio API the sink drives.
export interface SynthParam {
  value: number;
  setValueAtTime(value: number, time: number): unknown;
  linearRampToValueAtTime(value: number, time: number): unknown;
}

export interface SynthNode {
  connect(destination: SynthNode): unknown;
}

export interface SynthOscillator extends SynthNode {
  type: string;
  readonly frequency: SynthParam;
  start(when?: number): void;
  stop(when?: number): void;
}

export interface SynthGain extends SynthNode {
  readonly gain: SynthParam;
}

export interface SynthContext {
  readonly currentTime: number;
  readonly destination: SynthNode;
  createOscillator(): SynthOscillator;
  createGain(): SynthGain;
  close(): Promise<void>;
}

// One waveform per General MIDI family of eight programs.
const FAMILY_WAVEFORMS = [
  'triangle', 'sine', 'square', 'sawtooth', // piano, chromatic percussion, organ, guitar
  'triangle', 'sawtooth', 'sawtooth', 'square', // bass, strings, ensemble, brass
  'square', 'sine', 'sawtooth', 'triangle', // reed, pipe, synth lead, synth pad
  'sine', 'triangle', 'sine', 'square', // synth effects, ethnic, percussive, sound effects
] as const;

export type Waveform = (typeof FAMILY_WAVEFORMS)[number];

export function waveformFor(program: number): Waveform {
  return FAMILY_WAVEFORMS[Math.floor(program / 8) & 15] ?? 'triangle';
}

export function midiToFrequency(note: number): number {
  return 440 * 2 ** ((note - 69) / 12);
}

const PEAK_GAIN = 0.3;
const ATTACK_S = 0.01;
const RELEASE_S = 0.05;

interface Voice {
  osc: SynthOscillator;
  gain: SynthGain;
}

export class WebAudioSink implements InstrumentSink {
  readonly name = 'web-audio';
  private readonly programs = new Array<number>(16).fill(0);
  private readonly voices = new Map<string, Voice>();

  constructor(private readonly ctx: SynthContext) {}

  programChange(channel: number, program: number): void {
    this.programs[channel & 15] = program;
  }

  noteOn(channel: number, note: number, velocity: number): void {
    this.noteOff(channel, note);
    const t = this.ctx.currentTime;
    const osc = this.ctx.createOscillator();
    const gain = this.ctx.createGain();

    osc.type = waveformFor(this.programs[channel & 15] ?? 0);
    osc.frequency.setValueAtTime(midiToFrequency(note), t);
    gain.gain.setValueAtTime(0, t);
    gain.gain.linearRampToValueAtTime((velocity / 127) * PEAK_GAIN, t + ATTACK_S);
    osc.connect(gain);
    gain.connect(this.ctx.destination);
    osc.start(t);

    this.voices.set(voiceKey(channel, note), { osc, gain });
  }

  noteOff(channel: number, note: number): void {
    const key = voiceKey(channel, note);
    const voice = this.voices.get(key);
    if (!voice) return;
    this.voices.delete(key);

    const t = this.ctx.currentTime;
    voice.gain.gain.setValueAtTime(voice.gain.gain.value, t);
    voice.gain.gain.linearRampToValueAtTime(0, t + RELEASE_S);
    voice.osc.stop(t + RELEASE_S);
  }

  get activeVoices(): number {
    return this.voices.size;
  }

  async close(): Promise<void> {
    const t = this.ctx.currentTime;
    for (const { osc } of this.voices.values()) osc.stop(t);
    this.voices.clear();
    await this.ctx.close();
  }
}

function voiceKey(channel: number, note: number): string {
  return `${channel & 15}:${note}`;
}

// ── Opening ──

/** A Web Audio sink on the default output, or a NullSink (warned once) when none opens. */
export async function openInstrumentSink(logger: Logger): Promise<InstrumentSink> {
  try {
    const { AudioContext } = await import('node-web-audio-api');
    const sink = new WebAudioSink(new AudioContext());
    logger.info('Audio output opened');
    return sink;
  } catch (err) {
    warnOnce(logger, 'audio-unavailable', `No audio output (${errorMessage(err)}); playing silently.`);
    return new NullSink();
  }
}
