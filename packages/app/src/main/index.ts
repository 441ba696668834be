/**
 * @module main
 * svgview entry point.
 *
 * Wires the pieces together for one run: arguments and configuration,
 * the initial document, the viewer window, the application state with its
 * file watch, and the presentation loop. Everything started here is torn
 * down here, whichever way the loop ends.
 */

import * as path from 'path';
import type { SvgDocument, ViewerEvent } from '@svgview/types';
import {
  EventLoop,
  UsageError,
  WatchBridge,
  createLogger,
  createViewerStore,
  describeError,
  isViewerError,
  loadViewerConfig,
  parseArgs,
  type CliCommand,
  type ViewerStore,
} from '@svgview/core';
import {
  ResvgDocumentLoader,
  ResvgSurfaceRenderer,
  createDocumentOptions,
  resolveInputPath,
} from '@svgview/render';
import { openInBrowser } from './browser';
import { runPresentationLoop } from './presentation-loop';
import { ViewerWindow } from './viewer-window';

export { runPresentationLoop } from './presentation-loop';
export type { LoopExit } from './presentation-loop';
export { ViewerWindow, WINDOW_TITLE, parseResizeBody } from './viewer-window';
export type { ViewerWindowOptions } from './viewer-window';
export { browserCommand, openInBrowser } from './browser';

/** Single-line report for a fatal error. */
export function formatFatalError(error: unknown): string {
  if (isViewerError(error)) return `svgview: ${error.kind}: ${error.message}`;
  return `svgview: ${describeError(error)}`;
}

/**
 * Run the viewer.
 * @param argv - Positional arguments, without the node and script entries.
 * @returns The process exit code. Fatal errors reject instead.
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    // eslint-disable-next-line no-console
    console.log(error.message);
    return 0;
  }

  const config = loadViewerConfig(env);
  const logger = createLogger('main', config.logLevel);
  const loader = new ResvgDocumentLoader(createLogger('document', config.logLevel));

  const fonts = { fontDirs: config.fontDirs, defaultFontFamily: config.defaultFontFamily };
  let document: SvgDocument;
  if (command.kind === 'file') {
    const filePath = await resolveInputPath(command.path);
    document = await loader.loadFile(
      filePath,
      createDocumentOptions({ resourcesDir: path.dirname(filePath), ...fonts }),
    );
  } else {
    document = await loader.loadStdin(createDocumentOptions({ resourcesDir: null, ...fonts }));
  }

  const loop = new EventLoop<ViewerEvent>();
  const viewer = await ViewerWindow.open(loop.createProxy(), {
    port: config.port,
    initialSize: config.initialSize,
    closeGraceMs: config.closeGraceMs,
    logger: createLogger('window', config.logLevel),
  });

  let store: ViewerStore | null = null;
  try {
    if (config.openBrowser) {
      openInBrowser(viewer.url, createLogger('browser', config.logLevel));
    } else {
      // eslint-disable-next-line no-console
      console.error(`svgview: open ${viewer.url} to view the document`);
    }

    const watchLogger = createLogger('watch', config.logLevel);
    store = await createViewerStore({
      document,
      viewport: viewer.innerSize(),
      renderer: new ResvgSurfaceRenderer(config.fit),
      loader,
      startWatch: (watched) =>
        WatchBridge.start(watched, loop.createProxy(), {
          debounceMs: config.debounceMs,
          logger: watchLogger,
        }),
      reloadPolicy: config.reloadPolicy,
      logger: createLogger('state', config.logLevel),
    });

    const exit = await runPresentationLoop(loop, store, viewer, createLogger('loop', config.logLevel));
    logger.debug(`presentation loop finished: ${exit}`);
    return 0;
  } finally {
    if (store) await store.getState().dispose();
    loop.close();
    await viewer.close();
  }
}
