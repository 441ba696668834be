/**
 * @module watch-bridge
 * Forwards completed writes of one file into the presentation loop.
 *
 * The bridge owns a chokidar watcher on a single path. Only `change` events
 * qualify, and chokidar's `awaitWriteFinish` holds them back until the file
 * size has settled, so a notification always follows a finished write.
 * Each qualifying event becomes one `file-changed` event on the loop, unless a
 * debounce window is configured, in which case a burst collapses into one.
 *
 * A watcher error after startup leaves the viewer running without reloads.
 */

import { watch, type FSWatcher } from 'chokidar';
import type { EventSender, Logger, ViewerEvent, WatchHandle } from '@svgview/types';
import { EventLoopClosedError, WatchError, describeError } from './errors';
import { silentLogger } from './logger';

/** Tuning for {@link WatchBridge.start}. */
export interface WatchBridgeOptions {
  /** Coalescing window in milliseconds; 0 forwards every change. */
  debounceMs?: number;
  /** How long the file size must stay unchanged before a write counts as finished. */
  stabilityThresholdMs?: number;
  logger?: Logger;
}

const DEFAULT_STABILITY_THRESHOLD_MS = 50;

export class WatchBridge implements WatchHandle {
  private watcher: FSWatcher | null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly debounceMs: number;
  private readonly logger: Logger;

  private constructor(
    readonly path: string,
    watcher: FSWatcher,
    private readonly sender: EventSender<ViewerEvent>,
    options: WatchBridgeOptions,
  ) {
    this.watcher = watcher;
    this.debounceMs = options.debounceMs ?? 0;
    this.logger = options.logger ?? silentLogger;

    watcher.on('change', () => this.handleChange());
    watcher.on('unlink', (removed: string) => {
      this.logger.debug(`ignoring removal of ${removed}`);
    });
    watcher.on('add', (added: string) => {
      this.logger.debug(`ignoring creation of ${added}`);
    });
    watcher.on('error', (error: Error) => this.handleWatchError(error));
  }

  /**
   * Start watching `path` non-recursively.
   * Resolves once the watcher is ready.
   * @throws {WatchError} If the watcher reports an error before it is ready.
   */
  static start(
    path: string,
    sender: EventSender<ViewerEvent>,
    options: WatchBridgeOptions = {},
  ): Promise<WatchBridge> {
    const stabilityThreshold = options.stabilityThresholdMs ?? DEFAULT_STABILITY_THRESHOLD_MS;
    const watcher = watch(path, {
      persistent: true,
      ignoreInitial: true,
      disableGlobbing: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold,
        pollInterval: Math.max(10, Math.floor(stabilityThreshold / 5)),
      },
    });

    return new Promise((resolve, reject) => {
      const onStartupError = (error: Error): void => {
        watcher.off('ready', onReady);
        const failure = new WatchError(`Could not start filesystem watcher for ${path}`, error);
        watcher.close().then(
          () => reject(failure),
          () => reject(failure),
        );
      };
      const onReady = (): void => {
        watcher.off('error', onStartupError);
        resolve(new WatchBridge(path, watcher, sender, options));
      };
      watcher.once('error', onStartupError);
      watcher.once('ready', onReady);
    });
  }

  /** Whether change notifications are still being forwarded. */
  get active(): boolean {
    return this.watcher !== null;
  }

  /** Stop the watcher and drop any pending debounced notification. */
  async close(): Promise<void> {
    this.clearDebounce();
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }

  private handleChange(): void {
    if (!this.active) return;
    if (this.debounceMs <= 0) {
      this.notify();
      return;
    }
    this.clearDebounce();
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.notify();
    }, this.debounceMs);
  }

  private notify(): void {
    if (!this.active) return;
    try {
      this.sender.sendEvent({ type: 'file-changed' });
    } catch (error) {
      if (!(error instanceof EventLoopClosedError)) throw error;
      this.logger.warn(`Failed to notify UI of write to ${this.path}: ${error.message}`);
    }
  }

  private handleWatchError(error: Error): void {
    this.logger.warn(`watch error on ${this.path}, reloading is disabled: ${describeError(error)}`);
    this.close().catch((closeError: unknown) => {
      this.logger.warn(`Failed to stop watcher on ${this.path}: ${describeError(closeError)}`);
    });
  }

  private clearDebounce(): void {
    if (this.debounceTimer !== null) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }
}
