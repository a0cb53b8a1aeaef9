import { EventEmitter } from 'node:events';

import type { AuditEvent } from '../domain/models.js';

import type { EventHandler, TradingEventMap, TradingEventName } from './events.js';

export type EventBusOptions = {
  queueEmits?: boolean;
};

type QueuedEvent<TName extends TradingEventName = TradingEventName> = {
  event: TName;
  payload: TradingEventMap[TName];
};

const DEFAULT_OPTIONS: Required<EventBusOptions> = {
  queueEmits: false
};

export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly options: Required<EventBusOptions>;
  private readonly queue: QueuedEvent[] = [];
  private isFlushingQueue = false;

  constructor(options?: EventBusOptions) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options
    };
  }

  on<TName extends TradingEventName>(event: TName, handler: EventHandler<TradingEventMap[TName]>): () => void {
    const wrapped = async (payload: TradingEventMap[TName]) => {
      try {
        await handler(payload);
      } catch (error: unknown) {
        this.emitAuditFromError(event, error);
      }
    };

    this.emitter.on(event, wrapped);

    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<TName extends TradingEventName>(event: TName, payload: TradingEventMap[TName]): void {
    if (!this.options.queueEmits) {
      this.emitter.emit(event, payload);
      return;
    }

    this.queue.push({ event, payload });
    this.flushQueue();
  }

  getPendingCount(): number {
    return this.queue.length;
  }

  private flushQueue(): void {
    if (this.isFlushingQueue) {
      return;
    }

    this.isFlushingQueue = true;
    try {
      let item = this.queue.shift();
      while (item) {
        this.emitter.emit(item.event, item.payload);
        item = this.queue.shift();
      }
    } finally {
      this.isFlushingQueue = false;
    }
  }

  private emitAuditFromError(sourceEvent: TradingEventName, error: unknown): void {
    // A failing audit handler must not feed back into itself.
    if (sourceEvent === 'audit.event') {
      return;
    }

    const now = Date.now();
    const audit: AuditEvent = {
      id: `audit-${now}-${Math.random().toString(16).slice(2, 10)}`,
      ts: now,
      step: `events.handler.${sourceEvent}`,
      level: 'error',
      message: error instanceof Error ? error.message : 'Unknown handler error',
      metadata: {
        sourceEvent,
        errorName: error instanceof Error ? error.name : 'UnknownError'
      }
    };

    this.emitter.emit('audit.event', audit);
  }
}
