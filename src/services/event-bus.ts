import { EventEmitter } from 'node:events';
import type { JournalEvent } from '../types/events.js';
import type { Logger } from '../infra/logger.js';

type EventHandler = (event: JournalEvent) => void | Promise<void>;

export class EventBus {
  private readonly emitter: EventEmitter;
  private readonly logger: Logger;
  // Handlers are wrapped so a failing subscriber is logged, not thrown at the emitter
  private readonly wrapped = new Map<EventHandler, (event: JournalEvent) => void>();

  constructor(logger: Logger) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
    this.logger = logger;
  }

  emit(event: JournalEvent): void {
    this.logger.debug({ eventType: event.type, eventId: event.id }, 'Event emitted');
    this.emitter.emit('event', event);
    this.emitter.emit(event.type, event);
  }

  on(handler: EventHandler): void {
    this.emitter.on('event', this.wrap(handler));
  }

  onType(type: JournalEvent['type'], handler: EventHandler): void {
    this.emitter.on(type, this.wrap(handler));
  }

  off(handler: EventHandler): void {
    const listener = this.wrapped.get(handler);
    if (!listener) return;
    this.emitter.off('event', listener);
    for (const name of this.emitter.eventNames()) {
      this.emitter.off(name, listener);
    }
    this.wrapped.delete(handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.wrapped.clear();
  }

  private wrap(handler: EventHandler): (event: JournalEvent) => void {
    const existing = this.wrapped.get(handler);
    if (existing) return existing;

    const listener = (event: JournalEvent): void => {
      const onError = (err: unknown): void => {
        this.logger.error({ err, eventType: event.type, eventId: event.id }, 'Event handler failed');
      };
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch(onError);
        }
      } catch (err) {
        onError(err);
      }
    };

    this.wrapped.set(handler, listener);
    return listener;
  }
}
