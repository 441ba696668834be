/**
 * @module events
 * Events consumed by the presentation loop.
 * Producers (file watcher, viewer window) only ever send these; they never
 * touch the document or the pixel buffer.
 */

import type { Size } from './common';

/** Why the viewer is quitting. */
export type QuitReason = 'escape' | 'close';

/** Input to the presentation loop. */
export type ViewerEvent =
  /** The window's drawable size changed. */
  | { type: 'resized'; size: Size }
  /** The current surface should be shown again. */
  | { type: 'redraw-requested' }
  /** The watched file finished a write. */
  | { type: 'file-changed' }
  /** Escape key or window close. */
  | { type: 'quit'; reason: QuitReason };

/** Sending side of an event loop, safe to hand to producers. */
export interface EventSender<E> {
  /** Enqueue an event. Throws once the loop has closed. */
  sendEvent(event: E): void;
}
