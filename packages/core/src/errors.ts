/**
 * @module errors
 * Error taxonomy for the viewer.
 *
 * Every failure the viewer reports carries a `kind` so the entry point can
 * decide between a usage message, a fatal exit, or a logged degradation
 * without string matching. The underlying error is kept as `cause`.
 */

/** Discriminant of {@link ViewerError}. */
export type ViewerErrorKind =
  | 'usage'
  | 'config'
  | 'io'
  | 'parse'
  | 'allocation'
  | 'rasterize'
  | 'watch'
  | 'present';

/** Base class for all classified viewer failures. */
export abstract class ViewerError extends Error {
  abstract readonly kind: ViewerErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Wrong number of command-line arguments. */
export class UsageError extends ViewerError {
  readonly kind = 'usage' as const;
}

/** An environment setting has an invalid value. */
export class ConfigError extends ViewerError {
  readonly kind = 'config' as const;
}

/** The input file or standard input could not be read. */
export class IoError extends ViewerError {
  readonly kind = 'io' as const;
}

/** The input bytes are not a well-formed SVG. */
export class ParseError extends ViewerError {
  readonly kind = 'parse' as const;
}

/** A pixel buffer of the requested size cannot be obtained. */
export class AllocationError extends ViewerError {
  readonly kind = 'allocation' as const;
}

/** The renderer failed to paint the document. */
export class RasterizeError extends ViewerError {
  readonly kind = 'rasterize' as const;
}

/** The file observer could not start or died. */
export class WatchError extends ViewerError {
  readonly kind = 'watch' as const;
}

/** A frame could not be shown on the presentation surface. */
export class PresentError extends ViewerError {
  readonly kind = 'present' as const;
}

/** Thrown by an event loop proxy once the loop has shut down. */
export class EventLoopClosedError extends Error {
  constructor() {
    super('Event loop is closed');
    this.name = 'EventLoopClosedError';
  }
}

/** Type guard for classified viewer errors. */
export function isViewerError(value: unknown): value is ViewerError {
  return value instanceof ViewerError;
}

/** Render an unknown thrown value as a single-line message. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
