import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Channel } from '../channel.js';
import { health, readPidFile, sendGesture } from '../client.js';
import type { GestureEvent } from '../gesture.js';
import { RemoteGestureSource } from '../remote.js';

let dir: string;
let pidFile: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'spigot-remote-'));
  pidFile = join(dir, 'performance.pid');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function listening(source: RemoteGestureSource): Promise<number> {
  for (let i = 0; i < 400; i++) {
    const info = await readPidFile(pidFile);
    if (info && source.port !== undefined) return info.port;
    await delay(5);
  }
  throw new Error('Remote gesture server never came up');
}

async function start(capacity = 16) {
  const source = new RemoteGestureSource({ pidFile });
  const events = new Channel<GestureEvent>(capacity);
  const done = source.run(events);
  const port = await listening(source);
  return { source, events, done, port };
}

describe('readPidFile', () => {
  it('is null without a PID file', async () => {
    expect(await readPidFile(pidFile)).toBeNull();
  });

  it('is null for a PID file without a port', async () => {
    await writeFile(pidFile, JSON.stringify({ pid: 42 }));
    expect(await readPidFile(pidFile)).toBeNull();
  });

  it('fails on a PID file that is not JSON', async () => {
    await writeFile(pidFile, 'not json');
    await expect(readPidFile(pidFile)).rejects.toThrow(`Unreadable PID file ${pidFile}`);
  });
});

describe('remote gestures', () => {
  it('reports that nothing is listening', async () => {
    expect(await health(pidFile)).toBeNull();
    await expect(sendGesture({ kind: 'clap' }, pidFile)).rejects.toThrow(
      "No performance is listening for gestures. Start one with 'spigot perform --remote'.",
    );
  });

  it('records its port and pid', async () => {
    const { source, done, port } = await start();
    expect(await readPidFile(pidFile)).toEqual({ port, pid: process.pid });
    expect(await health(pidFile)).toEqual({ ok: true, pid: process.pid });
    source.stop();
    await done;
  });

  it('forwards gestures in order', async () => {
    const { source, events, done } = await start();
    expect(await sendGesture({ kind: 'pull-left', steps: 2, velocity: 0.4 }, pidFile)).toEqual({
      ok: true,
      kind: 'pull-left',
      accepted: true,
    });
    await sendGesture({ kind: 'scissors', name: 'hook' }, pidFile);
    expect(events.drain()).toEqual([
      { kind: 'pull-left', steps: 2, velocity: 0.4 },
      { kind: 'scissors', name: 'hook' },
    ]);
    source.stop();
    await done;
  });

  it('reports a dropped gesture when the queue is full', async () => {
    const { source, events, done } = await start(1);
    events.send({ kind: 'twist' });
    expect(await sendGesture({ kind: 'clap' }, pidFile)).toEqual({ ok: true, kind: 'clap', accepted: false });
    expect(events.drain()).toEqual([{ kind: 'twist' }]);
    source.stop();
    await done;
  });

  it('rejects malformed and invalid bodies', async () => {
    const { source, events, done, port } = await start();
    const url = `http://127.0.0.1:${port}`;

    const malformed = await fetch(`${url}/gesture`, { method: 'POST', body: '{' });
    expect(malformed.status).toBe(400);

    const invalid = await fetch(`${url}/gesture`, { method: 'POST', body: JSON.stringify({ kind: 'wave' }) });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ ok: false, error: 'Unknown gesture kind: "wave"' });

    const missing = await fetch(`${url}/nope`);
    expect(missing.status).toBe(404);
    await missing.body?.cancel();
    await malformed.body?.cancel();

    expect(events.size).toBe(0);
    source.stop();
    await done;
  });

  it('shuts down and removes the PID file after quit', async () => {
    const { events, done } = await start();
    expect(await sendGesture({ kind: 'quit' }, pidFile)).toEqual({ ok: true, kind: 'quit', accepted: true });
    await done;
    expect(events.drain()).toEqual([{ kind: 'quit' }]);
    expect(await readPidFile(pidFile)).toBeNull();
  });
});
