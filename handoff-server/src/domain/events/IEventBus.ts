import { DomainEventMap, DomainEventName } from './DomainEvents';

/**
 * Event handler function type.
 */
export type EventHandler<T> = (data: T) => void | Promise<void>;

/**
 * Interface for event bus implementations.
 * Provides publish-subscribe pattern for domain events.
 */
export interface IEventBus {
  /**
   * Emit an event and wait for every handler to settle.
   * Handler failures are logged, not rethrown.
   */
  emit<E extends DomainEventName>(event: E, data: DomainEventMap[E]): Promise<void>;

  on<E extends DomainEventName>(event: E, handler: EventHandler<DomainEventMap[E]>): void;

  off<E extends DomainEventName>(event: E, handler: EventHandler<DomainEventMap[E]>): void;

  once<E extends DomainEventName>(event: E, handler: EventHandler<DomainEventMap[E]>): void;

  /**
   * Remove all listeners for an event, or for every event when omitted.
   */
  removeAllListeners(event?: DomainEventName): void;

  listenerCount?(event: DomainEventName): number;
}
