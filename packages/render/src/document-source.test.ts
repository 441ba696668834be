/**
 * @module document-source.test
 * Tests for loading documents from files and streams, and for resolving the
 * images they reference. Files live in a per-test temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { gzipSync } from 'fflate';
import { IoError, ParseError, encodePng } from '@svgview/core';
import {
  ResvgDocumentLoader,
  createDocumentOptions,
  decodeMarkup,
  loadFromFile,
  loadFromStdin,
  resolveInputPath,
  toResvgOptions,
} from './document-source';
import { imageMimeType, inlineImageResources, resolveResourcePath } from './resources';

const BAR =
  '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50">' +
  '<rect width="100" height="50" fill="#336699"/></svg>';

const NO_FONTS = { loadSystemFonts: false };

let dir: string;

beforeEach(() => {
  dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'svgview-doc-')));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeFixture(name: string, contents: string | Uint8Array): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, contents);
  return file;
}

describe('createDocumentOptions', () => {
  it('loads system fonts by default and freezes the result', () => {
    const options = createDocumentOptions({ resourcesDir: '/docs', fontDirs: ['/fonts'] });
    expect(options).toEqual({
      resourcesDir: '/docs',
      fonts: { loadSystemFonts: true, fontDirs: ['/fonts'] },
    });
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.fonts)).toBe(true);
  });

  it('maps onto resvg font options', () => {
    const options = createDocumentOptions({
      resourcesDir: null,
      defaultFontFamily: 'Serif',
      loadSystemFonts: false,
    });
    expect(toResvgOptions(options, { mode: 'width', value: 40 })).toEqual({
      logLevel: 'error',
      font: { loadSystemFonts: false, fontDirs: [], defaultFontFamily: 'Serif' },
      fitTo: { mode: 'width', value: 40 },
    });
  });
});

describe('decodeMarkup', () => {
  it('inflates gzip input', () => {
    expect(decodeMarkup(gzipSync(new TextEncoder().encode(BAR)))).toBe(BAR);
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(() => decodeMarkup(new Uint8Array([0xff, 0xfe, 0x00]))).toThrow(ParseError);
  });
});

describe('loadFromFile', () => {
  it('parses a file and resolves resources beside it', async () => {
    const file = writeFixture('bar.svg', BAR);
    const doc = await loadFromFile(file, createDocumentOptions({ resourcesDir: dir, ...NO_FONTS }));
    expect(doc.origin).toEqual({ kind: 'file', path: file });
    expect(doc.naturalSize).toEqual({ width: 100, height: 50 });
    expect(doc.markup).toBe(BAR);
    expect(doc.options.resourcesDir).toBe(dir);
    expect(Object.isFrozen(doc)).toBe(true);
  });

  it('reads compressed .svgz files', async () => {
    const file = writeFixture('bar.svgz', gzipSync(new TextEncoder().encode(BAR)));
    const doc = await loadFromFile(file, createDocumentOptions({ resourcesDir: dir, ...NO_FONTS }));
    expect(doc.naturalSize).toEqual({ width: 100, height: 50 });
  });

  it('throws IoError for a missing file', async () => {
    await expect(loadFromFile(path.join(dir, 'missing.svg'))).rejects.toBeInstanceOf(IoError);
  });

  it('throws ParseError for malformed markup', async () => {
    const file = writeFixture('broken.svg', 'this is not markup');
    await expect(
      loadFromFile(file, createDocumentOptions({ resourcesDir: dir, ...NO_FONTS })),
    ).rejects.toBeInstanceOf(ParseError);
  });

  it('inlines local images relative to the resources directory', async () => {
    const png = encodePng({ data: new Uint8Array([255, 0, 0, 255]), width: 1, height: 1 });
    writeFixture('img/dot.png', png);
    const file = writeFixture(
      'with-image.svg',
      '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10">' +
        '<image href="img/dot.png" width="10" height="10"/></svg>',
    );

    const doc = await loadFromFile(file, createDocumentOptions({ resourcesDir: dir, ...NO_FONTS }));

    const dataUri = `data:image/png;base64,${Buffer.from(png).toString('base64')}`;
    expect(doc.markup).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10">' +
        `<image href="${dataUri}" width="10" height="10"/></svg>`,
    );
  });

  it('lists each inlined reference once', async () => {
    writeFixture('img/dot.png', encodePng({ data: new Uint8Array([0, 0, 0, 255]), width: 1, height: 1 }));
    const markup =
      '<svg xmlns="http://www.w3.org/2000/svg"><image href="img/dot.png"/>' +
      '<image href="img/dot.png"/><image href="missing.png"/></svg>';
    const { inlined } = await inlineImageResources(markup, dir);
    expect(inlined).toEqual(['img/dot.png']);
  });

  it('leaves unreadable and remote images untouched', async () => {
    const markup =
      '<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" width="10" height="10">' +
      '<image xlink:href="gone.png" width="5" height="5"/>' +
      '<image href="https://example.com/a.png" width="5" height="5"/></svg>';
    const file = writeFixture('remote.svg', markup);
    const doc = await loadFromFile(file, createDocumentOptions({ resourcesDir: dir, ...NO_FONTS }));
    expect(doc.markup).toBe(markup);
  });
});

describe('loadFromStdin', () => {
  it('reads the whole stream with no resources directory', async () => {
    const half = Math.floor(BAR.length / 2);
    const stream = Readable.from([Buffer.from(BAR.slice(0, half)), Buffer.from(BAR.slice(half))]);
    const doc = await loadFromStdin(stream, createDocumentOptions({ resourcesDir: null, ...NO_FONTS }));
    expect(doc.origin).toEqual({ kind: 'stdin' });
    expect(doc.options.resourcesDir).toBeNull();
    expect(doc.naturalSize).toEqual({ width: 100, height: 50 });
  });

  it('throws IoError when the stream fails', async () => {
    const stream = new Readable({
      read() {
        this.destroy(new Error('pipe closed'));
      },
    });
    await expect(loadFromStdin(stream)).rejects.toBeInstanceOf(IoError);
  });

  it('throws ParseError for empty input', async () => {
    await expect(
      loadFromStdin(Readable.from([]), createDocumentOptions({ resourcesDir: null, ...NO_FONTS })),
    ).rejects.toBeInstanceOf(ParseError);
  });
});

describe('resolveInputPath', () => {
  it('canonicalizes an existing path', async () => {
    const file = writeFixture('bar.svg', BAR);
    await expect(resolveInputPath(path.join(dir, '.', 'bar.svg'))).resolves.toBe(file);
  });

  it('throws IoError for a missing path', async () => {
    await expect(resolveInputPath(path.join(dir, 'nope.svg'))).rejects.toBeInstanceOf(IoError);
  });
});

describe('ResvgDocumentLoader', () => {
  it('reuses the options it is given on reload', async () => {
    const file = writeFixture('bar.svg', BAR);
    const options = createDocumentOptions({ resourcesDir: dir, ...NO_FONTS });
    const doc = await new ResvgDocumentLoader().loadFile(file, options);
    expect(doc.options).toBe(options);
  });

  it('reads standard input from the stream it was built with', async () => {
    const loader = new ResvgDocumentLoader(undefined, Readable.from([Buffer.from(BAR)]));
    const doc = await loader.loadStdin(createDocumentOptions({ resourcesDir: null, ...NO_FONTS }));
    expect(doc.origin).toEqual({ kind: 'stdin' });
  });
});

describe('resolveResourcePath', () => {
  it.each([
    ['https://example.com/a.png', '/r'],
    ['data:image/png;base64,AAAA', '/r'],
    ['#sprite', '/r'],
    ['', '/r'],
    ['a.png', null],
  ])('does not resolve %s', (href, base) => {
    expect(resolveResourcePath(href, base)).toBeNull();
  });

  it('resolves relative, absolute and file URL references', () => {
    expect(resolveResourcePath('a.png', '/r')).toBe('/r/a.png');
    expect(resolveResourcePath('img%20one.png', '/r')).toBe('/r/img one.png');
    expect(resolveResourcePath('/abs/b.png', null)).toBe('/abs/b.png');
    expect(resolveResourcePath('file:///tmp/c.png', null)).toBe('/tmp/c.png');
  });
});

describe('imageMimeType', () => {
  it('prefers the extension', () => {
    expect(imageMimeType('photo.JPG', new Uint8Array())).toBe('image/jpeg');
  });

  it('sniffs the leading bytes otherwise', () => {
    expect(imageMimeType('blob', new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toBe('image/png');
    expect(imageMimeType('blob', new Uint8Array([0x47, 0x49, 0x46, 0x38]))).toBe('image/gif');
  });
});
