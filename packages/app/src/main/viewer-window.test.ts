/**
 * @module viewer-window.test
 * Tests for the viewer window's HTTP routes and event stream, against a real
 * server on an ephemeral loopback port.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as http from 'http';
import type { RasterSurface, ViewerEvent } from '@svgview/types';
import { EventLoop, PNG_SIGNATURE, PresentError, encodePng } from '@svgview/core';
import { ViewerWindow, parseResizeBody } from './viewer-window';

const SURFACE: RasterSurface = {
  width: 2,
  height: 1,
  data: new Uint8Array([255, 0, 0, 255, 0, 0, 255, 255]),
};

let loop: EventLoop<ViewerEvent>;
let viewer: ViewerWindow;

async function openViewer(closeGraceMs = 1000): Promise<ViewerWindow> {
  return ViewerWindow.open(loop.createProxy(), {
    port: 0,
    initialSize: { width: 800, height: 600 },
    closeGraceMs,
  });
}

function route(path: string): string {
  return new URL(path, viewer.url).toString();
}

function postJson(path: string, body: string) {
  return fetch(route(path), {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

interface ChunkReader {
  read(): Promise<{ value?: Uint8Array; done: boolean }>;
}

/** Read an event stream until the accumulated text contains `marker`. */
async function readUntil(
  reader: ChunkReader,
  marker: string,
  seen = '',
): Promise<string> {
  const decoder = new TextDecoder();
  let text = seen;
  while (!text.includes(marker)) {
    const { value, done } = await reader.read();
    if (done) break;
    text += decoder.decode(value, { stream: true });
  }
  return text;
}

async function openEventStream(controller?: AbortController) {
  const res = await fetch(route('/events'), { signal: controller?.signal });
  if (!res.body) throw new Error('event stream has no body');
  const reader = res.body.getReader();
  const text = await readUntil(reader, ': connected\n\n');
  return { res, reader, text };
}

beforeEach(async () => {
  loop = new EventLoop<ViewerEvent>();
  viewer = await openViewer();
});

afterEach(async () => {
  await viewer.close();
  loop.close();
});

describe('parseResizeBody', () => {
  it('accepts positive integer sizes', () => {
    expect(parseResizeBody('{"width":640,"height":480}')).toEqual({ width: 640, height: 480 });
  });

  it.each(['nope', 'null', '[]', '{"width":640}', '{"width":0,"height":1}', '{"width":1.5,"height":2}', '{"width":"640","height":480}'])(
    'rejects %s',
    (body) => {
      expect(parseResizeBody(body)).toBeNull();
    },
  );
});

describe('ViewerWindow', () => {
  it('listens on the loopback interface', () => {
    expect(viewer.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/$/);
    expect(viewer.title).toBe('svgview');
    expect(viewer.innerSize()).toEqual({ width: 800, height: 600 });
  });

  it('serves the viewer page', async () => {
    const res = await fetch(route('/'));
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await res.text()).toContain('<title>svgview</title>');
  });

  it('answers 404 for the frame before anything is presented', async () => {
    const res = await fetch(route('/frame.png'));
    expect(res.status).toBe(404);
  });

  it('serves the latest presented frame as PNG', async () => {
    await viewer.present(SURFACE, 1);
    const res = await fetch(route('/frame.png?r=1'));
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('image/png');
    expect(res.headers.get('cache-control')).toBe('no-store');
    const bytes = new Uint8Array(await res.arrayBuffer());
    expect(Array.from(bytes.subarray(0, 8))).toEqual(Array.from(PNG_SIGNATURE));
    expect(Array.from(bytes)).toEqual(Array.from(encodePng(SURFACE)));
  });

  it('rejects frames whose buffer does not match their size', async () => {
    const broken: RasterSurface = { width: 2, height: 2, data: new Uint8Array(3) };
    await expect(viewer.present(broken, 4)).rejects.toBeInstanceOf(PresentError);
  });

  it('turns a resize request into a resized event', async () => {
    const res = await postJson('/api/resize', '{"width":640,"height":480}');
    expect(res.status).toBe(202);
    await expect(loop.next()).resolves.toEqual({ type: 'resized', size: { width: 640, height: 480 } });
    expect(viewer.innerSize()).toEqual({ width: 640, height: 480 });
  });

  it('answers 400 for an invalid resize body', async () => {
    const res = await postJson('/api/resize', '{"width":-3,"height":480}');
    expect(res.status).toBe(400);
    expect(loop.pending).toBe(0);
  });

  it('answers 503 once the event loop has closed', async () => {
    loop.close();
    const res = await postJson('/api/resize', '{"width":640,"height":480}');
    expect(res.status).toBe(503);
    expect(viewer.innerSize()).toEqual({ width: 800, height: 600 });
  });

  it('turns a quit request into an escape quit event', async () => {
    const res = await postJson('/api/quit', '{}');
    expect(res.status).toBe(202);
    await expect(loop.next()).resolves.toEqual({ type: 'quit', reason: 'escape' });
  });

  it('refuses a request from another origin', async () => {
    const res = await fetch(route('/api/resize'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Origin: 'http://attacker.test' },
      body: '{"width":640,"height":480}',
    });
    expect(res.status).toBe(403);
    expect(loop.pending).toBe(0);
    expect(viewer.innerSize()).toEqual({ width: 800, height: 600 });
  });

  it('accepts a request from its own page', async () => {
    const res = await fetch(route('/api/quit'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Origin: new URL(viewer.url).origin },
      body: '{}',
    });
    expect(res.status).toBe(202);
    expect(loop.pending).toBe(1);
  });

  it('answers 415 for a quit that is not JSON', async () => {
    const res = await fetch(route('/api/quit'), { method: 'POST', body: '{}' });
    expect(res.status).toBe(415);
    expect(loop.pending).toBe(0);
  });

  it('answers 404 for unknown routes', async () => {
    expect((await fetch(route('/nope'))).status).toBe(404);
    expect((await fetch(route('/api/resize'))).status).toBe(404);
  });

  it('announces frames to connected pages', async () => {
    const { res, reader } = await openEventStream();
    expect(res.headers.get('content-type')).toBe('text/event-stream');

    await viewer.present(SURFACE, 3);
    const text = await readUntil(reader, '\n\n', '');
    expect(text).toBe('event: frame\ndata: {"revision":3,"width":2,"height":1}\n\n');
    await reader.cancel();
  });

  it('sends the current frame to a page as soon as it connects', async () => {
    await viewer.present(SURFACE, 7);
    const { reader, text } = await openEventStream();
    const all = await readUntil(reader, '"height":1}\n\n', text);
    expect(all).toBe(': connected\n\nevent: frame\ndata: {"revision":7,"width":2,"height":1}\n\n');
    await reader.cancel();
  });

  it('tells pages to quit when it closes', async () => {
    const { reader } = await openEventStream();
    await viewer.close();
    const text = await readUntil(reader, 'event: quit');
    expect(text).toBe('event: quit\ndata: {}\n\n');
    await expect(viewer.present(SURFACE, 2)).rejects.toBeInstanceOf(PresentError);
  });

  it('finishes closing when a page never takes the final message', async () => {
    await openEventStream();
    const end = vi.spyOn(http.ServerResponse.prototype, 'end').mockReturnThis();
    try {
      await viewer.close();
      expect(end).toHaveBeenCalled();
    } finally {
      end.mockRestore();
    }
    expect(viewer.connectedPages).toBe(0);
  });

  it('sends a close quit when the last page goes away', async () => {
    await viewer.close();
    viewer = await openViewer(20);
    const controller = new AbortController();
    await openEventStream(controller);
    expect(viewer.connectedPages).toBe(1);

    controller.abort();
    await expect(loop.next()).resolves.toEqual({ type: 'quit', reason: 'close' });
    expect(viewer.connectedPages).toBe(0);
  });

  it('does not quit while another page is still connected', async () => {
    await viewer.close();
    viewer = await openViewer(20);
    const first = new AbortController();
    await openEventStream(first);
    const second = await openEventStream();

    first.abort();
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(loop.pending).toBe(0);
    expect(viewer.connectedPages).toBe(1);
    await second.reader.cancel();
  });
});
