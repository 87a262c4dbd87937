/**
 * Inbox: buffers decoded inbound messages until the client pumps them.
 *
 * `take(timeoutMs)` resolves as soon as anything is buffered (with
 * everything buffered), or with [] when the timeout passes. There is at most
 * one reader at a time.
 */

import { OscMessage } from '../osc/types';
import { RingBuffer } from './ring-buffer';

export class Inbox {
  private buffer: RingBuffer<OscMessage>;
  private waiter: (() => void) | null = null;

  constructor(capacity = 1024) {
    this.buffer = new RingBuffer<OscMessage>(capacity);
  }

  push(message: OscMessage): void {
    this.buffer.push(message);
    if (this.waiter) this.waiter();
  }

  take(timeoutMs: number): Promise<OscMessage[]> {
    if (this.waiter) {
      return Promise.reject(new Error('Inbox already has a pending reader'));
    }
    if (!this.buffer.empty || timeoutMs <= 0) {
      return Promise.resolve(this.buffer.drain());
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(this.buffer.drain());
      }, timeoutMs);

      this.waiter = () => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(this.buffer.drain());
      };
    });
  }

  clear(): void {
    this.buffer.clear();
  }

  get size(): number {
    return this.buffer.size;
  }

  get droppedCount(): number {
    return this.buffer.droppedCount;
  }
}
