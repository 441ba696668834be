/**
 * @module presentation-loop
 * The viewer's UI loop: takes one event at a time from the event loop and
 * applies it to the application state, then shows the result.
 *
 * Every handler runs to completion before the next event is taken, so the
 * document and surface only ever change here.
 */

import type { Logger, PresentationSurface, ViewerEvent } from '@svgview/types';
import { PresentError, silentLogger, type EventLoop, type ViewerStore } from '@svgview/core';

/** Why {@link runPresentationLoop} returned. */
export type LoopExit = 'quit' | 'present-failed' | 'closed';

/**
 * Drive the viewer until a quit event, a failed present, or the loop closing.
 * Reload and resize failures that the state treats as fatal propagate.
 */
export async function runPresentationLoop(
  loop: EventLoop<ViewerEvent>,
  store: ViewerStore,
  surface: PresentationSurface,
  logger: Logger = silentLogger,
): Promise<LoopExit> {
  const proxy = loop.createProxy();
  let redrawPending = false;

  const requestRedraw = (): void => {
    if (redrawPending || loop.isClosed) return;
    redrawPending = true;
    proxy.sendEvent({ type: 'redraw-requested' });
  };

  requestRedraw();

  for (;;) {
    const event = await loop.next();
    if (event === null) return 'closed';

    switch (event.type) {
      case 'redraw-requested': {
        redrawPending = false;
        const { surface: frame, revision } = store.getState();
        try {
          await surface.present(frame, revision);
        } catch (error) {
          if (!(error instanceof PresentError)) throw error;
          logger.warn(`Failed to present frame ${revision}: ${error.message}`);
          return 'present-failed';
        }
        break;
      }
      case 'file-changed': {
        const outcome = await store.getState().reload();
        logger.debug(`file change handled: ${outcome}`);
        if (outcome === 'reloaded') requestRedraw();
        break;
      }
      case 'resized':
        if (store.getState().resize(event.size)) requestRedraw();
        break;
      case 'quit':
        logger.debug(`quit requested (${event.reason})`);
        return 'quit';
    }
  }
}
