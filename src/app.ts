/**
 * Application orchestrator.
 *
 * `AppState` is the single owner of the live DualStream and all display
 * state. Once per frame it drains the gesture channel in arrival order,
 * applies each event, then advances the animations and picks up the player's
 * latest note for highlighting. `runPerformance` wires it to the keyboard,
 * the optional remote endpoint, the player and the terminal.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Channel } from './channel.js';
import { DEFAULT_TEMPO_BPM, DEFAULT_VELOCITY, FRAME_MS, PATCH_WIDTH, RIBBON_CAPACITY } from './constants.js';
import { describeConfig, spigotConfig, type SpigotConfig } from './digits.js';
import { DualStream, type Snippet } from './dual-stream.js';
import { errorMessage, SnipRangeError } from './errors.js';
import { KeyboardInput, SimGestureSource, spawnGestureSource, type GestureEvent } from './gesture.js';
import { fileLogger, type Logger } from './log.js';
import { DurationMap, instrumentName, PitchMap } from './music.js';
import { Player, type NoteEvent, type PlayState } from './player.js';
import { RemoteGestureSource } from './remote.js';
import { TerminalRenderer, type AppView } from './render.js';
import {
  advanceStitch,
  digitColor,
  RibbonState,
  ScissorAnimation,
  SnippetTray,
  type Patch,
  type StitchPhase,
} from './ribbon.js';
import { openInstrumentSink } from './sink.js';

// ── Configuration ──

export interface AppConfig {
  left: SpigotConfig;
  right: SpigotConfig;
  pitchMap: PitchMap;
  durationMap: DurationMap;
  program: number;
  tempoBpm: number;
  velocity: number;
  channel: number;
  ribbonCapacity: number;
}

export function defaultAppConfig(): AppConfig {
  return {
    left: spigotConfig('pi', 10),
    right: spigotConfig('e', 10),
    pitchMap: PitchMap.major(60),
    durationMap: DurationMap.musical(),
    program: 0,
    tempoBpm: DEFAULT_TEMPO_BPM,
    velocity: DEFAULT_VELOCITY,
    channel: 0,
    ribbonCapacity: RIBBON_CAPACITY,
  };
}

/** The part of the player handle the orchestrator drives. */
export interface PlayerLink {
  play(): boolean;
  stop(): boolean;
  quit(): boolean;
  drainNotes(): NoteEvent[];
}

export type PromptName = (question: string) => Promise<string>;

// ── State ──

export class AppState {
  readonly dual: DualStream;
  private leftRibbon: RibbonState;
  private rightRibbon: RibbonState;
  private playState: PlayState = 'stopped';
  private stitchPhase: StitchPhase = { kind: 'unstitched' };
  private readonly snippetTray = new SnippetTray();
  private scissor: ScissorAnimation | undefined;
  private highlight: number | undefined;
  private lastNote: NoteEvent | undefined;
  status: string;

  constructor(
    cfg: AppConfig,
    private readonly player: PlayerLink,
  ) {
    this.dual = DualStream.fromConfigs(cfg.left, cfg.right);
    this.leftRibbon = new RibbonState(cfg.ribbonCapacity, cfg.left.base, describeConfig(cfg.left));
    this.rightRibbon = new RibbonState(cfg.ribbonCapacity, cfg.right.base, describeConfig(cfg.right));

    // The ribbons open full: the first window of digits is pulled from the live stream.
    for (let i = 0; i < cfg.ribbonCapacity; i++) {
      const leftPos = this.dual.leftPos();
      const rightPos = this.dual.rightPos();
      const pair = this.dual.zipNext();
      if (!pair) break;
      this.leftRibbon.push(pair[0], leftPos);
      this.rightRibbon.push(pair[1], rightPos);
    }
    this.status = `Ready — Left: ${this.leftRibbon.label}  Right: ${this.rightRibbon.label}`;
  }

  // ── Events ──

  /** Apply one gesture. Returns false for Quit. */
  handleGesture(event: GestureEvent): boolean {
    switch (event.kind) {
      case 'pull-left':
        this.pull('left', event.steps, event.velocity);
        break;
      case 'pull-right':
        this.pull('right', event.steps, event.velocity);
        break;
      case 'twist':
        this.twist();
        break;
      case 'clap':
        if (this.playState === 'stopped') {
          this.playState = 'playing';
          this.stitchPhase = { kind: 'stitching', progress: 0 };
          this.player.play();
          this.status = 'CLAP — playback started ♪';
        }
        break;
      case 'unclap':
        if (this.playState === 'playing') {
          this.playState = 'stopped';
          this.stitchPhase = { kind: 'unstitching', progress: 0 };
          this.player.stop();
          this.status = 'UN-CLAP — playback stopped';
        }
        break;
      case 'scissors':
        this.doSnip(event.name || this.autoSnippetName());
        break;
      case 'quit':
        return false;
    }
    return true;
  }

  /**
   * Drain every queued gesture in order. A scissors gesture without a name
   * waits on `promptName` before it is applied. Returns false once Quit arrives.
   */
  async drainGestures(events: Channel<GestureEvent>, promptName: PromptName): Promise<boolean> {
    for (let event = events.tryRecv(); event; event = events.tryRecv()) {
      if (event.kind === 'scissors' && !event.name) {
        const name = await promptName('Snippet name: ');
        event = { kind: 'scissors', name: name || this.autoSnippetName() };
      }
      if (!this.handleGesture(event)) return false;
    }
    return true;
  }

  /** Snip the visible trailing window of the left side into the store and the tray. */
  doSnip(name: string): Snippet | undefined {
    const to = this.dual.leftPos();
    const from = Math.max(0, to - this.leftRibbon.visibleCount);

    let snippet: Snippet;
    try {
      snippet = this.dual.snip(name, from, to);
    } catch (err) {
      if (!(err instanceof SnipRangeError)) throw err;
      this.status = `SNIP rejected — ${err.message}`;
      return undefined;
    }

    const leftBase = this.leftRibbon.base;
    const rightBase = this.rightRibbon.base;
    const pairs = snippet.pairs.map(([l, r], i): readonly [Patch, Patch] => [
      { digit: l, color: digitColor(l, leftBase), position: from + i },
      { digit: r, color: digitColor(r, rightBase), position: from + i },
    ]);
    this.snippetTray.deposit(name, pairs);
    this.scissor = new ScissorAnimation(from, to);
    this.status = `SNIP "${name}" — ${snippet.pairs.length} pairs [${from}, ${to}) saved to tray`;
    return snippet;
  }

  private pull(side: 'left' | 'right', steps: number, velocity: number): void {
    const cursor = side === 'left' ? this.dual.left() : this.dual.right();
    const ribbon = side === 'left' ? this.leftRibbon : this.rightRibbon;
    for (let i = 0; i < steps; i++) {
      const position = cursor.position;
      const digit = cursor.next();
      if (digit === undefined) break;
      ribbon.push(digit, position);
    }
    ribbon.kick(velocity);
    this.status = `Pull ${side.toUpperCase()} ×${steps}  (vel=${velocity.toFixed(2)})  pos=${cursor.position}`;
  }

  private twist(): void {
    this.dual.twist();
    [this.leftRibbon, this.rightRibbon] = [this.rightRibbon, this.leftRibbon];
    this.leftRibbon.label = describeConfig(this.dual.leftConfig());
    this.rightRibbon.label = describeConfig(this.dual.rightConfig());
    this.status = `TWIST — Left now: ${this.leftRibbon.label}  Right now: ${this.rightRibbon.label}`;
  }

  private autoSnippetName(): string {
    return `snippet-${this.dual.snippetKeys().length + 1}`;
  }

  // ── Frame ──

  tick(dtMs: number): void {
    this.leftRibbon.tick(dtMs, PATCH_WIDTH);
    this.rightRibbon.tick(dtMs, PATCH_WIDTH);

    this.stitchPhase = advanceStitch(this.stitchPhase, dtMs).phase;

    if (this.scissor) {
      this.scissor.tick(dtMs);
      if (this.scissor.done()) this.scissor = undefined;
    }

    this.snippetTray.tick(dtMs);

    const last = this.player.drainNotes().at(-1);
    if (last) {
      this.lastNote = last;
      const index = this.leftRibbon.patches.findIndex((p) => p.position >= last.leftPos);
      this.highlight = index === -1 ? undefined : index;
      this.status = `♪ pitch=${last.pitch} duration=${last.duration}t  L-pos=${last.leftPos}  R-pos=${last.rightPos}`;
    }
  }

  // ── Accessors ──

  get left(): RibbonState {
    return this.leftRibbon;
  }

  get right(): RibbonState {
    return this.rightRibbon;
  }

  get stitch(): StitchPhase {
    return this.stitchPhase;
  }

  get tray(): SnippetTray {
    return this.snippetTray;
  }

  get scissorAnimation(): ScissorAnimation | undefined {
    return this.scissor;
  }

  /** Index into the left ribbon of the patch under the latest note. */
  get noteHighlight(): number | undefined {
    return this.highlight;
  }

  get latestNote(): NoteEvent | undefined {
    return this.lastNote;
  }

  get isPlaying(): boolean {
    return this.playState === 'playing';
  }

  view(): AppView {
    return {
      left: this.leftRibbon,
      right: this.rightRibbon,
      stitch: this.stitchPhase,
      tray: this.snippetTray,
      scissor: this.scissor,
      status: this.status,
      playing: this.isPlaying,
      highlight: this.highlight,
    };
  }
}

// ── Main loop ──

export interface PerformOptions {
  /** Also accept gestures over HTTP. */
  remote?: boolean;
  logger?: Logger;
}

export async function runPerformance(cfg: AppConfig, opts: PerformOptions = {}): Promise<void> {
  const logger = opts.logger ?? fileLogger;
  logger.info(`Performance starting: ${describeConfig(cfg.left)} / ${describeConfig(cfg.right)}`);

  const sink = await openInstrumentSink(logger);
  const player = Player.spawn(DualStream.fromConfigs(cfg.left, cfg.right), {
    sink,
    pitchFor: (d) => cfg.pitchMap.noteFor(d),
    ticksFor: (d) => cfg.durationMap.ticksFor(d),
    program: cfg.program,
    tempoBpm: cfg.tempoBpm,
    velocity: cfg.velocity,
    channel: cfg.channel,
    logger,
  });
  const playerDone = player.finished.catch((err: unknown) => {
    logger.warn(`Player failed: ${errorMessage(err)}`);
  });

  const app = new AppState(cfg, player);
  const keyboard = new KeyboardInput();
  const feed = spawnGestureSource(new SimGestureSource(keyboard.channel));

  const remote = opts.remote ? new RemoteGestureSource({ logger }) : undefined;
  const remoteDone = remote
    ? remote.run(feed.events).catch((err: unknown) => {
        logger.warn(`Remote gestures unavailable: ${errorMessage(err)}`);
      })
    : Promise.resolve();

  const renderer = new TerminalRenderer(process.stdout);
  renderer.start(`${instrumentName(cfg.program)} · ${cfg.tempoBpm} BPM · ${sink.name} output`);
  keyboard.start();

  const prompt: PromptName = async (question) => {
    renderer.suspend();
    try {
      return await keyboard.prompt(question);
    } finally {
      renderer.resume();
    }
  };

  let last = performance.now();
  try {
    while (await app.drainGestures(feed.events, prompt)) {
      const now = performance.now();
      app.tick(now - last);
      last = now;
      renderer.render(app.view());
      await delay(FRAME_MS);
    }
  } finally {
    renderer.stop();
    keyboard.stop();
    remote?.stop();
    player.quit();
    await Promise.all([playerDone, feed.done, remoteDone]);
    await sink.close();
    logger.info(`Performance ended; ${app.dual.snippetKeys().length} snippet(s) captured`);
  }
}
