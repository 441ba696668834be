/**
 * @module event-loop
 * Single-consumer event queue driving the presentation loop.
 *
 * The loop owner awaits {@link EventLoop.next}; producers such as the file
 * watcher and the viewer window hold an {@link EventLoopProxy} and can only
 * enqueue. Events are delivered in the order they were sent.
 */

import type { EventSender } from '@svgview/types';
import { EventLoopClosedError } from './errors';

export class EventLoop<E> {
  private readonly queue: E[] = [];
  private waiter: ((event: E | null) => void) | null = null;
  private closed = false;

  /** Whether {@link close} has been called. */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of events waiting to be taken. */
  get pending(): number {
    return this.queue.length;
  }

  /** Create a sending handle for a producer. */
  createProxy(): EventLoopProxy<E> {
    return new EventLoopProxy(this);
  }

  /**
   * Wait for the next event.
   * Resolves with `null` once the loop is closed.
   */
  next(): Promise<E | null> {
    if (this.waiter) {
      return Promise.reject(new Error('EventLoop already has a pending consumer'));
    }
    if (this.closed) return Promise.resolve(null);
    const event = this.queue.shift();
    if (event !== undefined) return Promise.resolve(event);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Stop accepting events, drop pending ones and release a waiting consumer. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  /** @internal Used by {@link EventLoopProxy}. */
  enqueue(event: E): void {
    if (this.closed) throw new EventLoopClosedError();
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(event);
      return;
    }
    this.queue.push(event);
  }
}

/** Producer-side handle of an {@link EventLoop}. */
export class EventLoopProxy<E> implements EventSender<E> {
  constructor(private readonly loop: EventLoop<E>) {}

  /**
   * Enqueue an event for the loop.
   * @throws {EventLoopClosedError} If the loop has shut down.
   */
  sendEvent(event: E): void {
    this.loop.enqueue(event);
  }
}
