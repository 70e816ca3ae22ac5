import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { DomainEventMap, DomainEventName } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';

/**
 * In-memory event bus implementation using Node.js EventEmitter.
 * Provides async event emission with error handling.
 */
export class InMemoryEventBus implements IEventBus {
  private emitter: EventEmitter;
  private logger: ILogger;

  constructor(logger: ILogger) {
    this.emitter = new EventEmitter();
    this.logger = logger;

    // Every open wait holds a listener
    this.emitter.setMaxListeners(0);
  }

  /**
   * Emit an event with data.
   * Handlers are called asynchronously and errors are caught.
   */
  async emit<E extends DomainEventName>(event: E, data: DomainEventMap[E]): Promise<void> {
    this.logger.debug(`Event emitted: ${event}`, { event });

    // rawListeners keeps once-wrappers, so one-time handlers detach when called
    const listeners = this.emitter.rawListeners(event);

    const promises = listeners.map(async (listener) => {
      try {
        await (listener as EventHandler<DomainEventMap[E]>)(data);
      } catch (error) {
        this.logger.error(
          `Error in event handler for ${event}:`,
          error instanceof Error ? error : new Error(String(error))
        );
      }
    });

    await Promise.all(promises);
  }

  on<E extends DomainEventName>(event: E, handler: EventHandler<DomainEventMap[E]>): void {
    this.emitter.on(event, handler);
    this.logger.debug(`Handler registered for: ${event}`);
  }

  off<E extends DomainEventName>(event: E, handler: EventHandler<DomainEventMap[E]>): void {
    this.emitter.off(event, handler);
    this.logger.debug(`Handler removed for: ${event}`);
  }

  once<E extends DomainEventName>(event: E, handler: EventHandler<DomainEventMap[E]>): void {
    this.emitter.once(event, handler);
    this.logger.debug(`One-time handler registered for: ${event}`);
  }

  removeAllListeners(event?: DomainEventName): void {
    if (event) {
      this.emitter.removeAllListeners(event);
      this.logger.debug(`All handlers removed for: ${event}`);
    } else {
      this.emitter.removeAllListeners();
      this.logger.debug('All handlers removed');
    }
  }

  listenerCount(event: DomainEventName): number {
    return this.emitter.listenerCount(event);
  }
}
