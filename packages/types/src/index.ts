/**
 * @svgview/types
 *
 * Shared type definitions for svgview.
 * This package contains zero runtime code: only TypeScript interfaces and
 * types that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { LogLevel, Logger, Size } from './common';

// Document
export type {
  DocumentLoader,
  DocumentOptions,
  DocumentOrigin,
  FontOptions,
  SvgDocument,
} from './document';

// Renderer & presentation
export type {
  FitPolicy,
  PresentationSurface,
  RasterSurface,
  SurfaceRenderer,
  WatchHandle,
} from './renderer';

// Events
export type { EventSender, QuitReason, ViewerEvent } from './events';
