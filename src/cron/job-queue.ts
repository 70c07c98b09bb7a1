import type { RunRequest } from './types.js';

/**
 * Bounded FIFO of pending run requests for one job (overlap=queue).
 * A full queue drops new requests rather than blocking the caller.
 */
export class JobQueue {
  private items: RunRequest[] = [];
  private capacity: number;

  constructor(max: number) {
    this.capacity = normalizeMax(max);
  }

  get max(): number {
    return this.capacity;
  }

  get size(): number {
    return this.items.length;
  }

  enqueue(request: RunRequest): boolean {
    if (this.items.length >= this.capacity) return false;
    this.items.push(request);
    return true;
  }

  dequeue(): RunRequest | undefined {
    return this.items.shift();
  }

  peek(): RunRequest | undefined {
    return this.items[0];
  }

  /** Empty the queue; returns how many requests were dropped. */
  clear(): number {
    const n = this.items.length;
    this.items = [];
    return n;
  }

  /** Apply a new limit; when shrinking, the newest requests are dropped. */
  resize(max: number): number {
    this.capacity = normalizeMax(max);
    const dropped = Math.max(0, this.items.length - this.capacity);
    if (dropped > 0) this.items = this.items.slice(0, this.capacity);
    return dropped;
  }
}

function normalizeMax(max: number): number {
  return Number.isFinite(max) ? Math.max(0, Math.floor(max)) : 0;
}
