import { InteractionLogEntry, InteractionType } from '../../types';

/**
 * Append-only ledger of agent feedback and human responses.
 * Entries are never updated or deleted.
 */
export interface IInteractionLogRepository {
  /**
   * Append an entry. Fails if an entry with the same id already exists.
   */
  append(entry: InteractionLogEntry): Promise<InteractionLogEntry>;

  findById(id: string): Promise<InteractionLogEntry | null>;

  /**
   * All entries of a task, oldest first.
   */
  findByTaskId(taskId: string): Promise<InteractionLogEntry[]>;

  /**
   * All entries of a session, oldest first, optionally of one type.
   */
  findBySessionId(sessionId: string, type?: InteractionType): Promise<InteractionLogEntry[]>;

  /**
   * Newest human response of a session.
   * @param since - Only consider entries created strictly after this epoch-ms timestamp
   */
  findLatestResponse(sessionId: string, since?: number): Promise<InteractionLogEntry | null>;

  initialize(): Promise<void>;
}
