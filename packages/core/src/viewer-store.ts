/**
 * @module viewer-store
 * Zustand store holding the viewer's application state.
 *
 * The store owns the current document, the viewport, the raster surface
 * painted for that viewport and the binding to the document's source. Only
 * the presentation loop calls its actions, one event at a time, so the
 * document and pixel buffer have a single writer.
 *
 * Invariant: after every completed action `viewport` equals the surface size.
 *
 * @see https://github.com/pmndrs/zustand
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
  DocumentLoader,
  Logger,
  RasterSurface,
  Size,
  SurfaceRenderer,
  SvgDocument,
  WatchHandle,
} from '@svgview/types';
import type { ReloadPolicy } from './config';
import { describeError } from './errors';
import { silentLogger } from './logger';

/**
 * Where the document comes from. Only file sources carry a watch, so a stdin
 * document can never be reloaded.
 */
export type SourceBinding =
  | { kind: 'file'; path: string; watch: WatchHandle }
  | { kind: 'stdin' };

/** Result of {@link ViewerActions.reload}. */
export type ReloadOutcome = 'reloaded' | 'skipped' | 'kept-last-good';

export interface ViewerState {
  document: SvgDocument;
  viewport: Size;
  surface: RasterSurface;
  source: SourceBinding;
  /** Bumped after every completed rasterize. */
  revision: number;
  disposed: boolean;
}

export interface ViewerActions {
  /**
   * Repaint the current document at a new viewport size.
   * @returns false when the size did not change.
   */
  resize(size: Size): boolean;
  /** Re-read the source file and repaint; see {@link ReloadPolicy} for failures. */
  reload(): Promise<ReloadOutcome>;
  /** Stop the file watch. Safe to call more than once. */
  dispose(): Promise<void>;
}

export type ViewerStore = StoreApi<ViewerState & ViewerActions>;

/** Starts the watch for a file-backed document. */
export type WatchStarter = (path: string) => Promise<WatchHandle>;

export interface CreateViewerStoreParams {
  document: SvgDocument;
  /** Initial window size. */
  viewport: Size;
  renderer: SurfaceRenderer;
  loader: DocumentLoader;
  startWatch: WatchStarter;
  reloadPolicy?: ReloadPolicy;
  logger?: Logger;
}

function sameSize(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

/** Allocate a surface at `size` and paint `document` into it. */
function paint(renderer: SurfaceRenderer, document: SvgDocument, size: Size): RasterSurface {
  const surface = renderer.allocate(size);
  renderer.rasterize(surface, document);
  return surface;
}

/**
 * Build the initial state: allocate, rasterize, then start watching when the
 * document came from a file. Any failure rejects, aborting startup.
 */
export async function createViewerStore(params: CreateViewerStoreParams): Promise<ViewerStore> {
  const { renderer, loader, startWatch } = params;
  const reloadPolicy = params.reloadPolicy ?? 'keep';
  const logger = params.logger ?? silentLogger;
  const viewport = { ...params.viewport };

  const surface = paint(renderer, params.document, viewport);

  const origin = params.document.origin;
  const source: SourceBinding =
    origin.kind === 'file'
      ? { kind: 'file', path: origin.path, watch: await startWatch(origin.path) }
      : { kind: 'stdin' };

  return createStore<ViewerState & ViewerActions>()((set, get) => ({
    document: params.document,
    viewport,
    surface,
    source,
    revision: 1,
    disposed: false,

    resize: (size) => {
      const state = get();
      if (sameSize(state.viewport, size)) return false;
      const next = paint(renderer, state.document, size);
      set((s) => ({ viewport: { ...size }, surface: next, revision: s.revision + 1 }));
      logger.debug(`resized to ${size.width}x${size.height}`);
      return true;
    },

    reload: async () => {
      const { source: current, document, disposed } = get();
      if (current.kind === 'stdin' || disposed) return 'skipped';

      let next: SvgDocument;
      try {
        next = await loader.loadFile(current.path, document.options);
      } catch (error) {
        if (reloadPolicy === 'abort') throw error;
        logger.warn(
          `Reload of ${current.path} failed, keeping the last good document: ${describeError(error)}`,
        );
        return 'kept-last-good';
      }

      const nextSurface = paint(renderer, next, get().viewport);
      set((s) => ({ document: next, surface: nextSurface, revision: s.revision + 1 }));
      logger.info(`reloaded ${current.path}`);
      return 'reloaded';
    },

    dispose: async () => {
      const { source: current, disposed } = get();
      if (disposed) return;
      set({ disposed: true });
      if (current.kind === 'file') {
        await current.watch.close();
      }
    },
  }));
}
