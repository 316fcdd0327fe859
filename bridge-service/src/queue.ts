import { EventEmitter } from 'eventemitter3';
import type { QueueItem } from './types.js';

export type QueueWait = { timedOut: false; item: QueueItem } | { timedOut: true };

/**
 * FIFO of pending vehicle commands. The MQTT message handler appends, the polling
 * engine is the only consumer. A `null` entry is a bare wake-up; one is queued at
 * construction so the first poll happens immediately.
 */
export class CommandQueue {
  private items: QueueItem[] = [null];
  private readonly events = new EventEmitter();

  get size(): number {
    return this.items.length;
  }

  enqueue(item: QueueItem): void {
    this.items.push(item);
    this.events.emit('enqueued');
  }

  /** Resolve with the oldest item, or `{ timedOut: true }` after `timeoutMs`. */
  waitNext(timeoutMs: number): Promise<QueueWait> {
    if (this.items.length > 0) {
      return Promise.resolve({ timedOut: false, item: this.takeOldest() });
    }
    return new Promise((resolve) => {
      const onEnqueued = () => {
        clearTimeout(timer);
        resolve({ timedOut: false, item: this.takeOldest() });
      };
      const timer = setTimeout(() => {
        this.events.off('enqueued', onEnqueued);
        resolve({ timedOut: true });
      }, timeoutMs);
      this.events.once('enqueued', onEnqueued);
    });
  }

  /** Drop everything queued and leave a single wake-up so the next wait returns at once. */
  drain(): number {
    const dropped = this.items.filter((item) => item !== null).length;
    this.items = [null];
    return dropped;
  }

  private takeOldest(): QueueItem {
    return this.items.shift() ?? null;
  }
}
