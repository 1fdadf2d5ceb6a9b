import { createChildLogger } from '../logger.js';
import type { EngineEvent, EventOfType, EventType } from '../types/index.js';

const log = createChildLogger('event-bus');

type EventHandler<T extends EventType> = (event: EventOfType<T>) => void;

type HandlerTable = { [K in EventType]?: Array<EventHandler<K>> };

/**
 * Typed event bus with a bounded replay log
 */
export class EventBus {
  private handlers: HandlerTable = {};
  private log: EngineEvent[] = [];

  constructor(private readonly logLimit: number = 1000) {}

  on<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    const list: Array<EventHandler<T>> = this.handlers[type] ?? [];
    list.push(handler);
    this.handlers[type] = list;
    return () => {
      const idx = list.indexOf(handler);
      if (idx !== -1) list.splice(idx, 1);
    };
  }

  emit(event: EngineEvent): void {
    this.log.push(event);
    if (this.log.length > this.logLimit) {
      this.log = this.log.slice(-Math.floor(this.logLimit / 2));
    }
    this.dispatch(event.type, event);
  }

  private dispatch<T extends EventType>(type: T, event: EventOfType<T>): void {
    const handlers: Array<EventHandler<T>> | undefined = this.handlers[type];
    if (!handlers) return;
    for (const h of [...handlers]) {
      // a subscriber must never break the emitting handler
      try {
        h(event);
      } catch (err) {
        log.error({ err, type }, 'Event handler threw');
      }
    }
  }

  getLog(): readonly EngineEvent[] {
    return this.log;
  }

  clearLog(): void {
    this.log = [];
  }

  reset(): void {
    this.handlers = {};
    this.log = [];
  }
}
