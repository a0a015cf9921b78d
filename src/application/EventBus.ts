import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type AnyHandler = (event: DomainEvent) => void;

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/** Typed event bus for decode lifecycle events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<object, AnyHandler>>();
  private readonly wildcardHandlers = new Set<AnyHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<object, AnyHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Subscribe to every event regardless of type. */
  onAny(handler: AnyHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a handler registered with `onAny()`. */
  offAny(handler: AnyHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const typed = this.handlers.get(event.type)?.values() ?? [];
    for (const handler of [...typed, ...this.wildcardHandlers]) {
      try {
        handler(event);
      } catch {
        // Subscriber failures never reach the decode or the other subscribers.
      }
    }
  }
}
