import { LogLevel, silentSink, type LogSink } from '../types/log-types.js';
import { isEventOf, type EngineEvent, type EngineEventOf, type EngineEventType } from './EngineEvents.js';

/**
 * Event handler function signature
 */
export type EventHandler<E extends EngineEvent = EngineEvent> = (event: E) => void | Promise<void>;

/**
 * EventBus - pub/sub for engine lifecycle events
 *
 * - Emission is synchronous; the engine never waits on a subscriber
 * - A handler that throws or rejects is logged and otherwise ignored
 * - `onAny` (or `on('*')`) receives every event
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 *
 * bus.on(EngineEventType.NODE_FAILED, (event) => {
 *   console.log(event.nodeId, event.payload.error.message);
 * });
 *
 * bus.onAny((event) => logger.debug(event.type));
 * ```
 */
export class EventBus {
  private listeners: Map<EngineEventType, EventHandler[]> = new Map();
  private wildcardListeners: EventHandler[] = [];
  private readonly logger: LogSink;

  constructor(logger: LogSink = silentSink) {
    this.logger = logger;
  }

  /**
   * Subscribe to one event type
   *
   * @returns Unsubscribe function
   */
  on<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEventOf<K>>): () => void {
    const wrapped: EventHandler = event => {
      if (isEventOf(event, eventType)) {
        return handler(event);
      }
    };

    const handlers = this.listeners.get(eventType) ?? [];
    handlers.push(wrapped);
    this.listeners.set(eventType, handlers);

    return () => {
      const current = this.listeners.get(eventType);
      const index = current ? current.indexOf(wrapped) : -1;
      if (current && index !== -1) {
        current.splice(index, 1);
      }
    };
  }

  /**
   * Subscribe to every event
   */
  onAny(handler: EventHandler): () => void {
    this.wildcardListeners.push(handler);
    return () => {
      const index = this.wildcardListeners.indexOf(handler);
      if (index !== -1) {
        this.wildcardListeners.splice(index, 1);
      }
    };
  }

  /**
   * Subscribe to several event types with the same handler
   *
   * @returns Unsubscribe function that removes all subscriptions
   */
  onMany(eventTypes: EngineEventType[], handler: EventHandler): () => void {
    const unsubscribers = eventTypes.map(type => this.on(type, handler));
    return () => {
      unsubscribers.forEach(unsub => unsub());
    };
  }

  /**
   * Subscribe for a single delivery
   */
  once<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEventOf<K>>): void {
    const unsubscribe = this.on(eventType, event => {
      unsubscribe();
      return handler(event);
    });
  }

  /**
   * Deliver an event to its handlers, then to wildcard handlers, in
   * registration order. Async handlers are not awaited.
   */
  emit(event: EngineEvent): void {
    const handlers = this.listeners.get(event.type) ?? [];
    const allHandlers = [...handlers, ...this.wildcardListeners];

    for (const handler of allHandlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(event, error));
        }
      } catch (error) {
        this.reportHandlerError(event, error);
      }
    }
  }

  off(eventType: EngineEventType): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  listenerCount(eventType: EngineEventType): number {
    return (this.listeners.get(eventType) ?? []).length;
  }

  hasListeners(eventType: EngineEventType): boolean {
    return this.listenerCount(eventType) > 0 || this.wildcardListeners.length > 0;
  }

  private reportHandlerError(event: EngineEvent, error: unknown): void {
    this.logger.log(LogLevel.ERROR, 'Event handler failed', {
      event: event.type,
      runId: event.runId,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
