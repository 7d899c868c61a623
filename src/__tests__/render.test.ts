import { describe, expect, it } from 'vitest';
import { C, FRAME_MS } from '../constants.js';
import { renderFrame, stitchLine, visibleCells, type AppView } from '../render.js';
import { RibbonState, SnippetTray } from '../ribbon.js';

function view(overrides: Partial<AppView> = {}): AppView {
  const left = new RibbonState(4, 10, 'π base 10');
  const right = new RibbonState(4, 10, 'e base 10');
  [3, 1, 4, 1].forEach((d, i) => left.push(d, i));
  [2, 7, 1, 8].forEach((d, i) => right.push(d, i));
  return {
    left,
    right,
    stitch: { kind: 'unstitched' },
    tray: new SnippetTray(),
    scissor: undefined,
    status: 'Ready',
    playing: false,
    highlight: undefined,
    ...overrides,
  };
}

describe('stitchLine', () => {
  it('fills with the stitch phase', () => {
    expect(stitchLine({ kind: 'unstitched' }, 4)).toBe('····');
    expect(stitchLine({ kind: 'stitched' }, 4)).toBe('┼┼┼┼');
    expect(stitchLine({ kind: 'stitching', progress: 0.5 }, 4)).toBe('┼┼··');
    expect(stitchLine({ kind: 'unstitching', progress: 0.25 }, 4)).toBe('┼┼┼·');
  });
});

describe('visibleCells', () => {
  it('fits three-column cells after the label', () => {
    expect(visibleCells(80)).toBe(20);
    expect(visibleCells(10)).toBe(1);
  });
});

describe('renderFrame', () => {
  it('lays out header, ribbons, tray, status and help', () => {
    const lines = renderFrame(view(), 80, 'piano');
    expect(lines).toHaveLength(9);
    expect(lines[0]).toBe(`${C.bold}spigot-ribbon${C.reset}  ${C.dim}piano${C.reset}  ${C.yellow}■ stopped${C.reset}`);
    expect(lines[6]).toBe(`${C.dim}tray: (empty)${C.reset}`);
    expect(lines[7]).toBe('Ready');
  });

  it('lists tray entries with their pair counts', () => {
    const tray = new SnippetTray();
    tray.deposit('riff', []);
    tray.tick(FRAME_MS * 100);
    const lines = renderFrame(view({ tray }), 80);
    expect(lines[6]).toBe(`tray: ${C.cyan}riff${C.reset}${C.dim}(0)${C.reset}`);
  });

  it('shows playback state', () => {
    expect(renderFrame(view({ playing: true }), 80)[0]).toContain(`${C.green}▶ playing${C.reset}`);
  });
});
