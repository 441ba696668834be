/**
 * @module document
 * Parsed SVG document and the options it was parsed with.
 */

import type { Size } from './common';

/** Where a document's bytes came from. */
export type DocumentOrigin =
  | { kind: 'file'; /** Canonical absolute path. */ path: string }
  | { kind: 'stdin' };

/** Font database configuration handed to the parser. */
export interface FontOptions {
  /** Populate the font database with the fonts installed on the system. */
  readonly loadSystemFonts: boolean;
  /** Extra directories scanned for font files. */
  readonly fontDirs: readonly string[];
  /** Family used when the document names none that can be found. */
  readonly defaultFontFamily?: string;
}

/**
 * Parser configuration captured when a document is first loaded.
 * Reloads reuse the same object so resource resolution stays stable.
 */
export interface DocumentOptions {
  /** Base directory for relative references such as linked images; null for stdin. */
  readonly resourcesDir: string | null;
  readonly fonts: FontOptions;
}

/**
 * Immutable parsed SVG. Replaced wholesale on reload, never mutated.
 */
export interface SvgDocument {
  readonly origin: DocumentOrigin;
  readonly options: DocumentOptions;
  /** Normalized UTF-8 markup (gzip input already inflated). */
  readonly markup: string;
  /** Intrinsic size reported by the parser, in user units. */
  readonly naturalSize: Size;
}

/** Loads documents for the application state (startup and reload). */
export interface DocumentLoader {
  /** Read and parse a file. Rejects with an IoError or ParseError. */
  loadFile(path: string, options: DocumentOptions): Promise<SvgDocument>;
  /** Read standard input to the end and parse it. */
  loadStdin(options: DocumentOptions): Promise<SvgDocument>;
}
