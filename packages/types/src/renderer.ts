/**
 * @module renderer
 * Raster surface and renderer contracts.
 */

import type { Size } from './common';
import type { SvgDocument } from './document';

/**
 * How a document is mapped onto the surface.
 * - `stretch`: fill exactly width × height, ignoring aspect ratio.
 * - `contain`: keep aspect ratio, fit inside the surface at the top-left.
 */
export type FitPolicy = 'stretch' | 'contain';

/** RGBA pixel buffer. `data.length === width * height * 4`. */
export interface RasterSurface {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/** Allocates surfaces and paints documents into them. */
export interface SurfaceRenderer {
  /** Allocate a zeroed surface. Throws an AllocationError for empty or oversized requests. */
  allocate(size: Size): RasterSurface;
  /**
   * Clear the surface to transparent and paint `document` at the surface size.
   * Throws a RasterizeError if the renderer fails.
   */
  rasterize(surface: RasterSurface, document: SvgDocument): void;
}

/** Something a rendered surface can be shown on. */
export interface PresentationSurface {
  /** Fixed window title. */
  readonly title: string;
  /** Current drawable size in physical pixels. */
  innerSize(): Size;
  /** Show the surface. Rejects with a PresentError when the frame cannot be shown. */
  present(surface: RasterSurface, revision: number): Promise<void>;
  /** Tear the surface down. */
  close(): Promise<void>;
}

/** Owner of a background file observer. */
export interface WatchHandle {
  /** Stop observing. Safe to call more than once. */
  close(): Promise<void>;
}
