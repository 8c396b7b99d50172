import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Called when a subscriber throws. The event still reaches the remaining handlers. */
export type HandlerErrorFn = (error: unknown, event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Set<WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly adapters = new WeakMap<object, WildcardHandler>();

  constructor(private readonly onHandlerError: HandlerErrorFn) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<WildcardHandler>();
    existing.add(this.adapt(type, handler));
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const adapted = this.adapters.get(handler);
    if (adapted) {
      this.handlers.get(type)?.delete(adapted);
    }
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type) ?? new Set<WildcardHandler>();
    for (const handler of [...handlers, ...this.wildcardHandlers]) {
      try {
        handler(event);
      } catch (error) {
        this.onHandlerError(error, event);
      }
    }
  }

  private adapt<T extends EventType>(type: T, handler: EventHandler<T>): WildcardHandler {
    const existing = this.adapters.get(handler);
    if (existing) return existing;

    const adapted: WildcardHandler = (event) => {
      if (isEventOf(type, event)) handler(event);
    };
    this.adapters.set(handler, adapted);
    return adapted;
  }
}

function isEventOf<T extends EventType>(type: T, event: DomainEvent): event is EventPayload<T> {
  return event.type === type;
}
