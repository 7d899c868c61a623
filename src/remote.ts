/**
 * Remote gesture producer — a local HTTP endpoint for hardware bridges.
 *
 * Listens on a random port on 127.0.0.1, writes { port, pid } to the
 * performance PID file, and forwards every validated POST /gesture body into
 * the gesture channel. A `quit` gesture, or `stop()`, shuts it down and
 * removes the PID file.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { mkdir, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Channel } from './channel.js';
import { PID_FILE, REMOTE_HOST } from './constants.js';
import { errorMessage } from './errors.js';
import { parseGestureEvent, type GestureEvent, type GestureSource } from './gesture.js';
import { silentLogger, type Logger } from './log.js';
import type { ErrorResponse, GestureResponse, HealthResponse, PerformancePidInfo } from './types.js';

// ── Request Parsing ──

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

function json(res: ServerResponse, status: number, data: HealthResponse | GestureResponse | ErrorResponse) {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

export interface RemoteOptions {
  logger?: Logger;
  pidFile?: string;
  /** 0 picks a free port. */
  port?: number;
}

export class RemoteGestureSource implements GestureSource {
  private readonly logger: Logger;
  private readonly pidFile: string;
  private readonly requestedPort: number;
  private server: Server | undefined;

  constructor(opts: RemoteOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    this.pidFile = opts.pidFile ?? PID_FILE;
    this.requestedPort = opts.port ?? 0;
  }

  async run(sink: Channel<GestureEvent>): Promise<void> {
    const server = createServer((req, res) => {
      this.route(req, res, sink).catch((err: unknown) => {
        this.logger.warn(`Remote gesture error: ${errorMessage(err)}`);
        if (!res.headersSent) json(res, 500, { ok: false, error: 'Internal server error' });
      });
    });
    this.server = server;

    const closed = new Promise<void>((resolve) => server.once('close', resolve));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.requestedPort, REMOTE_HOST, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const port = this.port;
    if (port === undefined) {
      server.close();
      throw new Error('Remote gesture server has no address');
    }

    try {
      const info: PerformancePidInfo = { port, pid: process.pid };
      await mkdir(dirname(this.pidFile), { recursive: true });
      await writeFile(this.pidFile, JSON.stringify(info), 'utf-8');
      this.logger.info(`Listening for gestures on ${REMOTE_HOST}:${port} (pid: ${process.pid})`);
      await closed;
    } finally {
      await unlink(this.pidFile).catch((err: unknown) => {
        this.logger.warn(`Could not remove ${this.pidFile}: ${errorMessage(err)}`);
      });
      this.logger.info('Remote gesture server stopped');
    }
  }

  get port(): number | undefined {
    const addr = this.server?.address();
    return addr && typeof addr !== 'string' ? addr.port : undefined;
  }

  /** Stop listening; `run` settles once the server has closed. */
  stop(): void {
    const server = this.server;
    if (!server || !server.listening) return;
    server.close();
    server.closeIdleConnections();
  }

  private async route(req: IncomingMessage, res: ServerResponse, sink: Channel<GestureEvent>) {
    const url = req.url || '/';
    const method = req.method || 'GET';

    if (method === 'GET' && url === '/health') {
      json(res, 200, { ok: true, pid: process.pid });
    } else if (method === 'POST' && url === '/gesture') {
      await this.handleGesture(req, res, sink);
    } else {
      json(res, 404, { ok: false, error: 'Not found' });
    }
  }

  private async handleGesture(req: IncomingMessage, res: ServerResponse, sink: Channel<GestureEvent>) {
    let payload: unknown;
    try {
      payload = JSON.parse(await readBody(req));
    } catch (err) {
      json(res, 400, { ok: false, error: `Malformed JSON: ${errorMessage(err)}` });
      return;
    }

    const parsed = parseGestureEvent(payload);
    if (!parsed.ok) {
      json(res, 400, { ok: false, error: parsed.error });
      return;
    }

    const event = parsed.value;
    const accepted = sink.send(event);
    if (!accepted) this.logger.warn(`Gesture queue full; dropped ${event.kind}`);
    if (event.kind === 'quit') {
      res.setHeader('Connection', 'close');
      res.once('finish', () => this.stop());
    }
    json(res, 200, { ok: true, kind: event.kind, accepted });
  }
}
