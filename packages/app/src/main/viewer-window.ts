/**
 * @module viewer-window
 * The viewer window: a local HTTP server whose page, opened in the system
 * browser, shows the latest frame.
 *
 * Routes:
 * - `GET /`            viewer page
 * - `GET /events`      Server-Sent Events (`frame`, `quit`)
 * - `GET /frame.png`   latest frame
 * - `POST /api/resize` `{ width, height }` in physical pixels
 * - `POST /api/quit`   Escape pressed
 *
 * Only accepts connections from 127.0.0.1 / ::1. POST routes take
 * `application/json` only and refuse an `Origin` other than the viewer's own.
 * Requests never touch the document or the surface; they only send events
 * through the loop proxy.
 */

import * as http from 'http';
import type { AddressInfo } from 'net';
import type {
  EventSender,
  Logger,
  PresentationSurface,
  RasterSurface,
  Size,
  ViewerEvent,
} from '@svgview/types';
import {
  EventLoopClosedError,
  PresentError,
  describeError,
  encodePng,
  silentLogger,
} from '@svgview/core';
import { renderViewerPage } from './viewer-page';

export const WINDOW_TITLE = 'svgview';

export interface ViewerWindowOptions {
  /** 0 picks a free port. */
  port: number;
  /** Drawable size assumed until the page reports one. */
  initialSize: Size;
  /** Delay before a lost page counts as a closed window. */
  closeGraceMs: number;
  host?: string;
  logger?: Logger;
}

interface Frame {
  png: Uint8Array;
  revision: number;
  width: number;
  height: number;
}

/** Longest wait for pages to take the final quit message on close. */
export const CLOSE_FLUSH_MS = 250;

const LOOPBACK_ADDRESSES = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1']);

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** Validate a resize request body. */
export function parseResizeBody(body: string): Size | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const width = 'width' in parsed ? parsed.width : undefined;
  const height = 'height' in parsed ? parsed.height : undefined;
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) return null;
  return { width, height };
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sseMessage(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/** Read the full request body as a string. */
function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

export class ViewerWindow implements PresentationSurface {
  readonly title = WINDOW_TITLE;

  private size: Size;
  private frame: Frame | null = null;
  private readonly clients = new Set<http.ServerResponse>();
  private graceTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private readonly page: string;

  private constructor(
    private readonly server: http.Server,
    private readonly sender: EventSender<ViewerEvent>,
    private readonly options: ViewerWindowOptions,
    private readonly logger: Logger,
  ) {
    this.size = { ...options.initialSize };
    this.page = renderViewerPage(this.title);
    server.on('request', (req: http.IncomingMessage, res: http.ServerResponse) => {
      void this.handleRequest(req, res);
    });
  }

  /**
   * Start the server on the loopback interface.
   * @throws {PresentError} If the server cannot listen.
   */
  static open(sender: EventSender<ViewerEvent>, options: ViewerWindowOptions): Promise<ViewerWindow> {
    const host = options.host ?? '127.0.0.1';
    const logger = options.logger ?? silentLogger;
    const server = http.createServer();
    const viewer = new ViewerWindow(server, sender, options, logger);

    return new Promise((resolve, reject) => {
      const onListenError = (error: Error): void => {
        reject(new PresentError(`Could not open viewer window on ${host}:${options.port}`, error));
      };
      server.once('error', onListenError);
      server.listen(options.port, host, () => {
        server.off('error', onListenError);
        server.on('error', (error: Error) => {
          logger.error(`Viewer server error: ${error.message}`);
        });
        logger.info(`viewer window listening on ${viewer.url}`);
        resolve(viewer);
      });
    });
  }

  /** Address of the viewer page. */
  get url(): string {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new PresentError('Viewer window is not listening');
    }
    const info: AddressInfo = address;
    const host = info.family === 'IPv6' ? `[${info.address}]` : info.address;
    return `http://${host}:${info.port}/`;
  }

  /** Number of pages currently connected to `/events`. */
  get connectedPages(): number {
    return this.clients.size;
  }

  innerSize(): Size {
    return { ...this.size };
  }

  async present(surface: RasterSurface, revision: number): Promise<void> {
    if (this.closed) throw new PresentError('Viewer window is closed');
    let png: Uint8Array;
    try {
      png = encodePng({ data: surface.data, width: surface.width, height: surface.height });
    } catch (error) {
      throw new PresentError(`Could not encode frame ${revision}: ${describeError(error)}`, error);
    }
    this.frame = { png, revision, width: surface.width, height: surface.height };
    this.broadcast('frame', this.frameInfo(this.frame));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.clearGraceTimer();
    const ending = [...this.clients].map((client) => this.endClient(client));
    this.clients.clear();
    let flushTimer: ReturnType<typeof setTimeout> | undefined;
    const flushDeadline = new Promise<void>((resolve) => {
      flushTimer = setTimeout(resolve, CLOSE_FLUSH_MS);
    });
    await Promise.race([Promise.all(ending), flushDeadline]);
    clearTimeout(flushTimer);
    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
      this.server.closeAllConnections();
    });
  }

  /** Send the final quit message and wait until the response is done. */
  private endClient(client: http.ServerResponse): Promise<void> {
    return new Promise((resolve) => {
      if (client.writableEnded || client.destroyed) {
        resolve();
        return;
      }
      client.once('close', () => resolve());
      client.end(sseMessage('quit', {}));
    });
  }

  private frameInfo(frame: Frame): { revision: number; width: number; height: number } {
    return { revision: frame.revision, width: frame.width, height: frame.height };
  }

  private broadcast(event: string, data: unknown): void {
    const message = sseMessage(event, data);
    for (const client of this.clients) {
      client.write(message);
    }
  }

  /** Send an event to the loop. Returns false once the loop has closed. */
  private send(event: ViewerEvent): boolean {
    try {
      this.sender.sendEvent(event);
      return true;
    } catch (error) {
      if (!(error instanceof EventLoopClosedError)) throw error;
      this.logger.debug(`dropping ${event.type} event: ${error.message}`);
      return false;
    }
  }

  private clearGraceTimer(): void {
    if (this.graceTimer !== null) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
  }

  /** Origins the viewer page itself can be loaded from. */
  private isOwnOrigin(origin: string): boolean {
    const { port } = new URL(this.url);
    return [`http://127.0.0.1:${port}`, `http://localhost:${port}`, `http://[::1]:${port}`].includes(origin);
  }

  /** Answer and return true when a POST must not reach the loop. */
  private rejectPost(req: http.IncomingMessage, res: http.ServerResponse): boolean {
    const origin = req.headers.origin;
    if (origin !== undefined && !this.isOwnOrigin(origin)) {
      sendJson(res, 403, { error: 'Forbidden: cross-origin request' });
      return true;
    }
    const contentType = (req.headers['content-type'] ?? '').split(';')[0].trim().toLowerCase();
    if (contentType !== 'application/json') {
      sendJson(res, 415, { error: 'Content-Type must be application/json' });
      return true;
    }
    return false;
  }

  private handleDisconnect(client: http.ServerResponse): void {
    this.clients.delete(client);
    if (this.closed || this.clients.size > 0) return;
    this.clearGraceTimer();
    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      if (this.closed || this.clients.size > 0) return;
      this.logger.info('viewer page closed');
      this.send({ type: 'quit', reason: 'close' });
    }, this.options.closeGraceMs);
  }

  private openEventStream(res: http.ServerResponse): void {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(': connected\n\n');
    if (this.frame) {
      res.write(sseMessage('frame', this.frameInfo(this.frame)));
    }
    this.clearGraceTimer();
    this.clients.add(res);
    res.on('close', () => this.handleDisconnect(res));
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const remote = req.socket.remoteAddress;
    if (remote === undefined || !LOOPBACK_ADDRESSES.has(remote)) {
      sendJson(res, 403, { error: 'Forbidden: only localhost allowed' });
      return;
    }

    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    try {
      if (req.method === 'GET' && pathname === '/') {
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8', 'Cache-Control': 'no-store' });
        res.end(this.page);
        return;
      }

      if (req.method === 'GET' && pathname === '/events') {
        if (this.closed) {
          sendJson(res, 503, { error: 'Viewer window is closed' });
          return;
        }
        this.openEventStream(res);
        return;
      }

      if (req.method === 'GET' && pathname === '/frame.png') {
        if (!this.frame) {
          sendJson(res, 404, { error: 'No frame yet' });
          return;
        }
        res.writeHead(200, {
          'Content-Type': 'image/png',
          'Content-Length': this.frame.png.length,
          'Cache-Control': 'no-store',
        });
        res.end(this.frame.png);
        return;
      }

      if (req.method === 'POST' && (pathname === '/api/resize' || pathname === '/api/quit')) {
        if (this.rejectPost(req, res)) return;
      }

      if (req.method === 'POST' && pathname === '/api/resize') {
        const size = parseResizeBody(await readBody(req));
        if (!size) {
          sendJson(res, 400, { error: 'Body must be { "width": positive integer, "height": positive integer }' });
          return;
        }
        if (!this.send({ type: 'resized', size })) {
          sendJson(res, 503, { error: 'Viewer is shutting down' });
          return;
        }
        this.size = size;
        sendJson(res, 202, { width: size.width, height: size.height });
        return;
      }

      if (req.method === 'POST' && pathname === '/api/quit') {
        await readBody(req);
        if (!this.send({ type: 'quit', reason: 'escape' })) {
          sendJson(res, 503, { error: 'Viewer is shutting down' });
          return;
        }
        sendJson(res, 202, { ok: true });
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (e) {
      this.logger.warn(`Request ${req.method ?? '?'} ${pathname} failed: ${describeError(e)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: describeError(e) });
      } else {
        res.end();
      }
    }
  }
}
