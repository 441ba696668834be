/**
 * @module document-source
 * Read SVG bytes from a file or standard input and parse them with resvg.
 *
 * A document is parsed once per load and then kept immutable; the raster
 * surface re-renders its markup at whatever size the window has.
 *
 * @see https://github.com/yisibl/resvg-js
 */

import * as fs from 'fs';
import * as path from 'path';
import { gunzipSync } from 'fflate';
import { Resvg, type ResvgRenderOptions } from '@resvg/resvg-js';
import type {
  DocumentLoader,
  DocumentOptions,
  DocumentOrigin,
  Logger,
  SvgDocument,
} from '@svgview/types';
import { IoError, ParseError, describeError, silentLogger } from '@svgview/core';
import { inlineImageResources } from './resources';
import type { FitTo } from './fit';

/** Inputs for {@link createDocumentOptions}. */
export interface DocumentOptionsInit {
  resourcesDir: string | null;
  fontDirs?: readonly string[];
  defaultFontFamily?: string;
  /** Defaults to true. */
  loadSystemFonts?: boolean;
}

/** Build the parser options that a document keeps for its whole life. */
export function createDocumentOptions(init: DocumentOptionsInit): DocumentOptions {
  return Object.freeze({
    resourcesDir: init.resourcesDir,
    fonts: Object.freeze({
      loadSystemFonts: init.loadSystemFonts ?? true,
      fontDirs: Object.freeze([...(init.fontDirs ?? [])]),
      ...(init.defaultFontFamily !== undefined ? { defaultFontFamily: init.defaultFontFamily } : {}),
    }),
  });
}

/** Translate document options into resvg constructor options. */
export function toResvgOptions(options: DocumentOptions, fitTo?: FitTo): ResvgRenderOptions {
  const { fonts } = options;
  return {
    logLevel: 'error',
    font: {
      loadSystemFonts: fonts.loadSystemFonts,
      fontDirs: [...fonts.fontDirs],
      ...(fonts.defaultFontFamily !== undefined ? { defaultFontFamily: fonts.defaultFontFamily } : {}),
    },
    ...(fitTo !== undefined ? { fitTo } : {}),
  };
}

/** Inflate `.svgz` input and decode UTF-8. */
export function decodeMarkup(bytes: Uint8Array): string {
  let raw = bytes;
  if (bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) {
    try {
      raw = gunzipSync(bytes);
    } catch (error) {
      throw new ParseError(`Invalid gzip data: ${describeError(error)}`, error);
    }
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch (error) {
    throw new ParseError('Document is not valid UTF-8', error);
  }
}

function describeOrigin(origin: DocumentOrigin): string {
  return origin.kind === 'file' ? origin.path : 'standard input';
}

/**
 * Turn raw bytes into an immutable document.
 * @throws {ParseError} If the bytes are not a well-formed SVG.
 */
export async function parseDocument(
  bytes: Uint8Array,
  origin: DocumentOrigin,
  options: DocumentOptions,
  logger: Logger = silentLogger,
): Promise<SvgDocument> {
  const decoded = decodeMarkup(bytes);
  const { markup, inlined } = await inlineImageResources(decoded, options.resourcesDir, logger);
  if (inlined.length > 0) logger.debug(`inlined ${inlined.length} image(s) into ${describeOrigin(origin)}`);

  let resvg: Resvg;
  try {
    resvg = new Resvg(markup, toResvgOptions(options));
  } catch (error) {
    throw new ParseError(`Failed to parse ${describeOrigin(origin)}: ${describeError(error)}`, error);
  }

  const naturalSize = { width: resvg.width, height: resvg.height };
  logger.debug(`parsed ${describeOrigin(origin)} (${naturalSize.width}x${naturalSize.height})`);

  return Object.freeze({ origin, options, markup, naturalSize });
}

/**
 * Canonicalize a command-line path.
 * @throws {IoError} If the path does not exist.
 */
export async function resolveInputPath(input: string): Promise<string> {
  try {
    return await fs.promises.realpath(input);
  } catch (error) {
    throw new IoError(`Cannot open ${input}: ${describeError(error)}`, error);
  }
}

/**
 * Read and parse a file. Options default to resolving resources beside it.
 * @throws {IoError} If the file cannot be read.
 * @throws {ParseError} If its contents are not a well-formed SVG.
 */
export async function loadFromFile(
  filePath: string,
  options: DocumentOptions = createDocumentOptions({ resourcesDir: path.dirname(filePath) }),
  logger: Logger = silentLogger,
): Promise<SvgDocument> {
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new IoError(`Cannot read ${filePath}: ${describeError(error)}`, error);
  }
  return parseDocument(new Uint8Array(bytes), { kind: 'file', path: filePath }, options, logger);
}

/** Drain a stream into one buffer. */
async function readAll(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return new Uint8Array(Buffer.concat(chunks));
}

/**
 * Read standard input to the end and parse it.
 * Relative references are not resolved because there is no base directory.
 */
export async function loadFromStdin(
  stream: NodeJS.ReadableStream = process.stdin,
  options: DocumentOptions = createDocumentOptions({ resourcesDir: null }),
  logger: Logger = silentLogger,
): Promise<SvgDocument> {
  let bytes: Uint8Array;
  try {
    bytes = await readAll(stream);
  } catch (error) {
    throw new IoError(`Cannot read standard input: ${describeError(error)}`, error);
  }
  return parseDocument(bytes, { kind: 'stdin' }, options, logger);
}

/** {@link DocumentLoader} backed by the local filesystem and resvg. */
export class ResvgDocumentLoader implements DocumentLoader {
  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly stdin: NodeJS.ReadableStream = process.stdin,
  ) {}

  loadFile(filePath: string, options: DocumentOptions): Promise<SvgDocument> {
    return loadFromFile(filePath, options, this.logger);
  }

  loadStdin(options: DocumentOptions): Promise<SvgDocument> {
    return loadFromStdin(this.stdin, options, this.logger);
  }
}
