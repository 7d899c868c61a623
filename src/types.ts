import type { GestureKind } from './gesture.js';

// ── Performance PID File ──

export interface PerformancePidInfo {
  port: number;
  pid: number;
}

// ── Remote Gesture API ──

export interface HealthResponse {
  ok: true;
  pid: number;
}

export interface GestureResponse {
  ok: true;
  kind: GestureKind;
  /** False when the gesture queue was full and the event was dropped. */
  accepted: boolean;
}

export interface ErrorResponse {
  ok: false;
  error: string;
}
