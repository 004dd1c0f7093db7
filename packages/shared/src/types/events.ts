/** Envelope delivered to wildcard subscribers of an event bus. */
export interface EventBusMessage<T = unknown> {
  id: string;
  type: string;
  source: 'collector' | 'ingestion';
  timestamp: Date;
  data: T;
}
