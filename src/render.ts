/**
 * Terminal renderer — both ribbons as colored digit patches, the stitch
 * between them, the scissor highlight, the snippet tray and a status line.
 * Purely cosmetic; `renderFrame` is the pure part.
 */

import { C } from './constants.js';
import { digitChar } from './digits.js';
import type { Patch, RibbonState, ScissorAnimation, SnippetTray, StitchPhase } from './ribbon.js';

export interface AppView {
  left: RibbonState;
  right: RibbonState;
  stitch: StitchPhase;
  tray: SnippetTray;
  scissor: ScissorAnimation | undefined;
  status: string;
  playing: boolean;
  /** Index into the left ribbon's patches. */
  highlight: number | undefined;
}

const CELL_WIDTH = 3;
const LABEL_WIDTH = 18;

const KEY_HELP = 'a/A pull left · d/D pull right · t twist · space clap · esc unclap · s snip · q quit';

function bg(argb: number): string {
  return `\x1b[48;2;${(argb >>> 16) & 0xff};${(argb >>> 8) & 0xff};${argb & 0xff}m`;
}

function cell(patch: Patch, opts: { highlight: boolean; cut: boolean }): string {
  const mark = opts.highlight ? `${C.bold}\x1b[4m` : '';
  const dim = opts.cut ? C.dim : '';
  return `${bg(patch.color)}\x1b[30m${mark}${dim} ${digitChar(patch.digit)} ${C.reset}`;
}

/** How many trailing patches fit in `columns`. */
export function visibleCells(columns: number): number {
  return Math.max(1, Math.floor((columns - LABEL_WIDTH - 2) / CELL_WIDTH));
}

function ribbonLine(
  ribbon: RibbonState,
  tag: string,
  cells: number,
  highlight: number | undefined,
  scissor: ScissorAnimation | undefined,
): string {
  const start = Math.max(0, ribbon.patches.length - cells);
  const body = ribbon.patches
    .slice(start)
    .map((patch, i) =>
      cell(patch, {
        highlight: highlight === start + i,
        cut: scissor !== undefined && scissor.covers(patch.position),
      }),
    )
    .join('');
  return `${C.bold}${tag}${C.reset} ${ribbon.label.padEnd(LABEL_WIDTH - 2).slice(0, LABEL_WIDTH - 2)}${body}`;
}

/** Stitch row between the ribbons; fills left to right while stitching. */
export function stitchLine(phase: StitchPhase, width: number): string {
  const filled =
    phase.kind === 'stitched' ? width
    : phase.kind === 'stitching' ? Math.floor(phase.progress * width)
    : phase.kind === 'unstitching' ? Math.floor((1 - phase.progress) * width)
    : 0;
  return '┼'.repeat(filled) + '·'.repeat(Math.max(0, width - filled));
}

function trayLine(tray: SnippetTray): string {
  if (tray.entries.length === 0) return `${C.dim}tray: (empty)${C.reset}`;
  const names = tray.entries.map((e) => {
    const shown = Math.max(1, Math.ceil(e.name.length * e.slideIn));
    return `${C.cyan}${e.name.slice(0, shown)}${C.reset}${C.dim}(${e.pairs.length})${C.reset}`;
  });
  return `tray: ${names.join('  ')}`;
}

export function renderFrame(view: AppView, columns: number, subtitle = ''): string[] {
  const cells = visibleCells(columns);
  const state = view.playing ? `${C.green}▶ playing${C.reset}` : `${C.yellow}■ stopped${C.reset}`;
  const scissorMark = view.scissor
    ? `  ${C.magenta}✂ [${view.scissor.from}, ${view.scissor.to}) ${Math.round(view.scissor.progress * 100)}%${C.reset}`
    : '';

  return [
    `${C.bold}spigot-ribbon${C.reset}  ${C.dim}${subtitle}${C.reset}  ${state}${scissorMark}`,
    '',
    ribbonLine(view.left, 'L', cells, view.highlight, view.scissor),
    `${' '.repeat(LABEL_WIDTH)}${C.gray}${stitchLine(view.stitch, cells * CELL_WIDTH)}${C.reset}`,
    ribbonLine(view.right, 'R', cells, undefined, undefined),
    '',
    trayLine(view.tray),
    view.status,
    `${C.dim}${KEY_HELP}${C.reset}`,
  ];
}

// ── Terminal ──

const ALT_SCREEN_ON = '\x1b[?1049h';
const ALT_SCREEN_OFF = '\x1b[?1049l';
const CURSOR_HIDE = '\x1b[?25l';
const CURSOR_SHOW = '\x1b[?25h';

export class TerminalRenderer {
  private subtitle = '';
  private active = false;

  constructor(private readonly out: NodeJS.WriteStream) {}

  start(subtitle: string): void {
    this.subtitle = subtitle;
    this.resume();
  }

  render(view: AppView): void {
    if (!this.active) return;
    const lines = renderFrame(view, this.out.columns || 80, this.subtitle);
    this.out.write(`\x1b[H${lines.join('\x1b[K\n')}\x1b[K\x1b[J`);
  }

  /** Hand the terminal back, e.g. while prompting for a line of input. */
  suspend(): void {
    if (!this.active) return;
    this.active = false;
    this.out.write(`${ALT_SCREEN_OFF}${CURSOR_SHOW}`);
  }

  resume(): void {
    if (this.active) return;
    this.active = true;
    this.out.write(`${ALT_SCREEN_ON}${CURSOR_HIDE}\x1b[2J`);
  }

  stop(): void {
    this.suspend();
  }
}
