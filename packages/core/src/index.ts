/**
 * @svgview/core
 *
 * Application state, event loop, file watch bridge and the ambient stack
 * (errors, logging, configuration, CLI arguments).
 *
 * @packageDocumentation
 */

// Errors
export {
  AllocationError,
  ConfigError,
  EventLoopClosedError,
  IoError,
  ParseError,
  PresentError,
  RasterizeError,
  UsageError,
  ViewerError,
  WatchError,
  describeError,
  isViewerError,
} from './errors';
export type { ViewerErrorKind } from './errors';

// Logging
export { createLogger, isLogLevel, silentLogger } from './logger';

// Configuration
export { DEFAULT_CONFIG, loadViewerConfig } from './config';
export type { ReloadPolicy, ViewerConfig } from './config';

// Command line
export { USAGE, parseArgs } from './cli-args';
export type { CliCommand } from './cli-args';

// Event loop
export { EventLoop, EventLoopProxy } from './event-loop';

// PNG encoding
export { PNG_SIGNATURE, encodePng } from './png-codec';
export type { EncodePngOptions, RgbaImage } from './png-codec';

// File watch bridge
export { WatchBridge } from './watch-bridge';
export type { WatchBridgeOptions } from './watch-bridge';

// Application state
export { createViewerStore } from './viewer-store';
export type {
  CreateViewerStoreParams,
  ReloadOutcome,
  SourceBinding,
  ViewerActions,
  ViewerState,
  ViewerStore,
  WatchStarter,
} from './viewer-store';
