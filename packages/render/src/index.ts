/**
 * @svgview/render
 *
 * Document loading and rasterization with resvg.
 *
 * @packageDocumentation
 */

// Document source
export {
  ResvgDocumentLoader,
  createDocumentOptions,
  decodeMarkup,
  loadFromFile,
  loadFromStdin,
  parseDocument,
  resolveInputPath,
  toResvgOptions,
} from './document-source';
export type { DocumentOptionsInit } from './document-source';
export { imageMimeType, inlineImageResources, resolveResourcePath } from './resources';
export type { InlinedResources } from './resources';

// Raster surface
export {
  MAX_SURFACE_DIMENSION,
  PixelSurface,
  ResvgSurfaceRenderer,
  allocateSurface,
  rasterize,
} from './raster-surface';
export { containFitTo, stretchMarkup } from './fit';
export type { FitTo } from './fit';
