/**
 * @module raster-surface
 * RGBA pixel buffers sized to the window and the resvg-backed painter that
 * fills them.
 *
 * A surface is always cleared before painting, so anything the document
 * leaves uncovered stays fully transparent.
 */

import { Resvg } from '@resvg/resvg-js';
import type { FitPolicy, RasterSurface, Size, SurfaceRenderer, SvgDocument } from '@svgview/types';
import { AllocationError, RasterizeError, describeError } from '@svgview/core';
import { toResvgOptions } from './document-source';
import { containFitTo, stretchMarkup, type FitTo } from './fit';

/** Largest width or height the renderer accepts. */
export const MAX_SURFACE_DIMENSION = 32767;

/** Owned RGBA8 buffer, row-major, `width * 4` bytes per row. */
export class PixelSurface implements RasterSurface {
  readonly data: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.data = new Uint8Array(width * height * 4);
  }
}

function isValidDimension(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_SURFACE_DIMENSION;
}

/**
 * Allocate a zeroed surface.
 * @throws {AllocationError} If either dimension is empty, fractional or too
 *   large, or the buffer cannot be obtained.
 */
export function allocateSurface(size: Size): PixelSurface {
  const { width, height } = size;
  if (!isValidDimension(width) || !isValidDimension(height)) {
    throw new AllocationError(
      `Cannot allocate a ${width}x${height} surface: dimensions must be integers between 1 and ${MAX_SURFACE_DIMENSION}`,
    );
  }
  try {
    return new PixelSurface(width, height);
  } catch (error) {
    throw new AllocationError(
      `Cannot allocate a ${width}x${height} surface: ${describeError(error)}`,
      error,
    );
  }
}

interface RenderedPixels {
  width: number;
  height: number;
  pixels: Uint8Array;
}

function renderPixels(markup: string, document: SvgDocument, fitTo: FitTo): RenderedPixels {
  const resvg = new Resvg(markup, toResvgOptions(document.options, fitTo));
  const image = resvg.render();
  return { width: image.width, height: image.height, pixels: image.pixels };
}

/** Copy `source` into the top-left of `surface`, clipping to both. */
function blit(surface: RasterSurface, source: RenderedPixels): void {
  const rowBytes = Math.min(surface.width, source.width) * 4;
  const rows = Math.min(surface.height, source.height);
  const sourceStride = source.width * 4;
  const targetStride = surface.width * 4;
  for (let y = 0; y < rows; y++) {
    const start = y * sourceStride;
    surface.data.set(source.pixels.subarray(start, start + rowBytes), y * targetStride);
  }
}

/**
 * Clear `surface` and paint `document` into it.
 * @throws {RasterizeError} If the renderer fails; the surface is left cleared.
 */
export function rasterize(surface: RasterSurface, document: SvgDocument, fit: FitPolicy = 'stretch'): void {
  surface.data.fill(0);
  const target = { width: surface.width, height: surface.height };

  let rendered: RenderedPixels;
  try {
    rendered =
      fit === 'stretch'
        ? renderPixels(stretchMarkup(document.markup, document.naturalSize, target), document, {
            mode: 'original',
          })
        : renderPixels(document.markup, document, containFitTo(document.naturalSize, target));
  } catch (error) {
    throw new RasterizeError(
      `Failed to render at ${target.width}x${target.height}: ${describeError(error)}`,
      error,
    );
  }
  blit(surface, rendered);
}

/** {@link SurfaceRenderer} that paints with resvg under a fixed fit policy. */
export class ResvgSurfaceRenderer implements SurfaceRenderer {
  constructor(readonly fit: FitPolicy = 'stretch') {}

  allocate(size: Size): RasterSurface {
    return allocateSurface(size);
  }

  rasterize(surface: RasterSurface, document: SvgDocument): void {
    rasterize(surface, document, this.fit);
  }
}
