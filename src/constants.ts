import { homedir } from 'node:os';
import { join } from 'node:path';

// ── Directory & File Paths ──

export const RIBBON_DIR = process.env.SPIGOT_RIBBON_HOME || join(homedir(), '.spigot-ribbon');
export const PID_FILE = join(RIBBON_DIR, 'performance.pid');
export const PERFORMANCE_LOG = join(RIBBON_DIR, 'performance.log');

// ── Remote Gesture Endpoint ──

export const REMOTE_HOST = '127.0.0.1';

// ── Playback ──

export const TICKS_PER_QUARTER = 480;
export const DEFAULT_TEMPO_BPM = 120;
export const DEFAULT_VELOCITY = 100;
export const MIN_NOTE_MS = 50;
export const MIN_GAP_MS = 5;
export const PLAYER_IDLE_MS = 10;

// ── Channels ──

export const GESTURE_CHANNEL_CAPACITY = 1024;
export const COMMAND_CHANNEL_CAPACITY = 256;
export const NOTE_CHANNEL_CAPACITY = 64;

// ── Display ──

export const FRAME_MS = 1000 / 60;
export const RIBBON_CAPACITY = 26;
export const TRAY_CAPACITY = 8;
export const PATCH_WIDTH = 48;

// Per-frame increments at the reference frame rate; tick functions scale them by dt / FRAME_MS.
export const STITCH_STEP = 0.05;
export const SCISSOR_STEP = 0.04;
export const TRAY_SLIDE_STEP = 0.08;
export const SCROLL_FRICTION = 0.88;

// ── Colors (ANSI escape codes — zero dependencies) ──

export const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;
