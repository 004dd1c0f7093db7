import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import { getLogger } from '@hostpulse/shared';
import type { AlertEvent, EventBusMessage, Logger } from '@hostpulse/shared';

export interface SnapshotAcceptedEvent {
  hostname: string;
  timestamp: Date;
}

export interface SnapshotRejectedEvent {
  hostname?: string;
  reason: string;
}

type EventMap = {
  'snapshot:accepted': SnapshotAcceptedEvent;
  'snapshot:rejected': SnapshotRejectedEvent;
  'alert:fired': AlertEvent;
  'alert:recovered': AlertEvent;
  'system:shutdown': undefined;
};

export type EventName = keyof EventMap;

type Handler = (data: never) => void;
type Wrapped = (...args: unknown[]) => void;

interface Subscription {
  wrapped: Wrapped;
  /** Cleared once the same handler is also registered with `on`. */
  once: boolean;
}

/**
 * Typed in-process pub/sub. Events are published from the ingest path, so a
 * throwing subscriber is logged and never propagates into `emit`.
 */
export class EventBus {
  private emitter: EventEmitter;
  private logger: Logger;
  private wrappers: Map<string, Map<Handler, Subscription>> = new Map();

  constructor(logger?: Logger) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
    this.logger = logger ?? getLogger().child({ component: 'event-bus' });
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for subscribers that want everything
    const message: EventBusMessage<EventMap[K]> = {
      id: nanoid(),
      type: event,
      source: 'ingestion',
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, this.wrap(event, handler));
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, this.wrap(event, handler, true));
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.unwrap(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', this.wrap('*', handler));
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.unwrap('*', handler);
  }

  listenerCount(event: EventName | '*'): number {
    return this.emitter.listenerCount(event);
  }

  /** Handlers still held for a later `off`, across all events. */
  trackedHandlerCount(): number {
    let count = 0;
    for (const byHandler of this.wrappers.values()) count += byHandler.size;
    return count;
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.wrappers.clear();
  }

  private wrap<T>(event: string, handler: (data: T) => void, once: boolean = false): Wrapped {
    let byHandler = this.wrappers.get(event);
    if (!byHandler) {
      byHandler = new Map();
      this.wrappers.set(event, byHandler);
    }

    const existing = byHandler.get(handler);
    if (existing) {
      if (!once) existing.once = false;
      return existing.wrapped;
    }

    const wrapped: Wrapped = (...args) => {
      if (subscription.once) this.forget(event, handler);
      try {
        handler(args[0] as T);
      } catch (err) {
        this.logger.error({ err, event }, 'Event handler failed');
      }
    };
    const subscription: Subscription = { wrapped, once };
    byHandler.set(handler, subscription);
    return wrapped;
  }

  private unwrap(event: string, handler: Handler): void {
    const subscription = this.wrappers.get(event)?.get(handler);
    if (!subscription) return;
    this.emitter.off(event, subscription.wrapped);
    this.forget(event, handler);
  }

  private forget(event: string, handler: Handler): void {
    const byHandler = this.wrappers.get(event);
    if (!byHandler) return;
    byHandler.delete(handler);
    if (byHandler.size === 0) this.wrappers.delete(event);
  }
}
