import type { AlertEvent } from '@hostpulse/shared';

/** Fixed-size ring of the most recent alert events. */
export class AlertHistory {
  private buffer: Array<AlertEvent | undefined>;
  private head: number = 0;
  private count: number = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Alert history capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<AlertEvent | undefined>(capacity).fill(undefined);
  }

  add(event: AlertEvent): void {
    this.buffer[this.head] = event;
    this.head = (this.head + 1) % this.buffer.length;
    if (this.count < this.buffer.length) this.count++;
  }

  /** The newest `limit` events, oldest first. */
  list(limit?: number): AlertEvent[] {
    const take = limit === undefined ? this.count : Math.max(0, Math.min(limit, this.count));
    const events: AlertEvent[] = [];
    const capacity = this.buffer.length;
    for (let i = take; i > 0; i--) {
      const event = this.buffer[(this.head - i + capacity) % capacity];
      if (event) events.push(event);
    }
    return events;
  }

  size(): number {
    return this.count;
  }

  capacity(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
