/**
 * HTTP client for CLI → running performance communication.
 *
 * Reads the remote gesture endpoint's port from the PID file and posts
 * normalized gesture events to it.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { PID_FILE, REMOTE_HOST } from './constants.js';
import { errorMessage } from './errors.js';
import { isRecord, type GestureEvent } from './gesture.js';
import type { GestureResponse, HealthResponse, PerformancePidInfo } from './types.js';

// ── PID File ──

export async function readPidFile(pidFile: string = PID_FILE): Promise<PerformancePidInfo | null> {
  if (!existsSync(pidFile)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(pidFile, 'utf-8'));
  } catch (err) {
    throw new Error(`Unreadable PID file ${pidFile}: ${errorMessage(err)}`);
  }
  if (!isRecord(raw)) return null;
  const { port, pid } = raw;
  if (typeof port !== 'number' || typeof pid !== 'number' || !port || !pid) return null;
  return { port, pid };
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

const NOT_LISTENING = "No performance is listening for gestures. Start one with 'spigot perform --remote'.";

async function requireEndpoint(pidFile: string): Promise<PerformancePidInfo> {
  const info = await readPidFile(pidFile);
  if (!info || !isProcessAlive(info.pid)) throw new Error(NOT_LISTENING);
  return info;
}

// ── HTTP Helpers ──

async function readJson(resp: Response): Promise<Record<string, unknown>> {
  const data: unknown = await resp.json();
  if (!isRecord(data)) throw new Error(`Unexpected response (HTTP ${resp.status})`);
  if (!resp.ok) {
    throw new Error(typeof data.error === 'string' ? data.error : `HTTP ${resp.status}`);
  }
  return data;
}

// ── Public Client API ──

/** Health of the running performance, or null when none is listening. */
export async function health(pidFile: string = PID_FILE): Promise<HealthResponse | null> {
  const info = await readPidFile(pidFile);
  if (!info || !isProcessAlive(info.pid)) return null;
  try {
    const data = await readJson(await fetch(`http://${REMOTE_HOST}:${info.port}/health`));
    return typeof data.pid === 'number' ? { ok: true, pid: data.pid } : null;
  } catch {
    return null;
  }
}

export async function sendGesture(event: GestureEvent, pidFile: string = PID_FILE): Promise<GestureResponse> {
  const info = await requireEndpoint(pidFile);
  const resp = await fetch(`http://${REMOTE_HOST}:${info.port}/gesture`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(event),
  });
  const data = await readJson(resp);
  return { ok: true, kind: event.kind, accepted: data.accepted === true };
}
