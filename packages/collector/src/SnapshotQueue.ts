import type { MetricSnapshot } from '@hostpulse/shared';

/**
 * Bounded FIFO between the sampler and the delivery pump. On overflow the
 * oldest snapshot is evicted so the newest reading always gets through.
 */
export class SnapshotQueue {
  private items: MetricSnapshot[] = [];
  private readonly depth: number;
  private droppedCount: number = 0;

  constructor(depth: number = 1) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`Queue depth must be a positive integer, got ${depth}`);
    }
    this.depth = depth;
  }

  /** Enqueue a snapshot; returns the evicted snapshot when the queue was full. */
  push(snapshot: MetricSnapshot): MetricSnapshot | undefined {
    let evicted: MetricSnapshot | undefined;
    if (this.items.length >= this.depth) {
      evicted = this.items.shift();
      this.droppedCount++;
    }
    this.items.push(snapshot);
    return evicted;
  }

  shift(): MetricSnapshot | undefined {
    return this.items.shift();
  }

  clear(): number {
    const cleared = this.items.length;
    this.items = [];
    return cleared;
  }

  get size(): number {
    return this.items.length;
  }

  get capacity(): number {
    return this.depth;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
