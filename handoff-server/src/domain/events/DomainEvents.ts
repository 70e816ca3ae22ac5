import { Project, Task, InteractionLogEntry } from '../../types';

/**
 * Type-safe domain event definitions.
 * Keys are the event names emitted on the bus, values their payloads.
 */
export interface DomainEventMap {
  'project:created': Project;
  'task:created': Task;
  /** Emitted after every task write, with the task as stored. */
  'task:updated': Task;
  /** Emitted after a ledger entry has been appended. */
  'interaction:logged': InteractionLogEntry;
}

export type DomainEventName = keyof DomainEventMap;

