import { InteractionLogEntry, InteractionType } from '../../types';
import { IInteractionLogRepository } from '../../domain/repositories/IInteractionLogRepository';
import { ILogger } from '../../domain/common/ILogger';
import { InvalidStateError } from '../../domain/common/Errors';

/**
 * Append-only ledger held in insertion order.
 */
export class InMemoryInteractionLogRepository implements IInteractionLogRepository {
  protected entries: Map<string, InteractionLogEntry>;
  private initialized: boolean = false;

  constructor(protected logger: ILogger) {
    this.entries = new Map();
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.load();
    this.initialized = true;
  }

  protected async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }

  protected async ensureFresh(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
      return;
    }
    await this.refresh();
  }

  protected async load(): Promise<void> {}

  /**
   * Pick up entries appended to durable storage by other writers.
   */
  protected async refresh(): Promise<void> {}

  protected async persist(_entry: InteractionLogEntry): Promise<void> {}

  async append(entry: InteractionLogEntry): Promise<InteractionLogEntry> {
    await this.ensureInitialized();

    if (this.entries.has(entry.id)) {
      throw new InvalidStateError(`Interaction log entry ${entry.id} already exists`);
    }

    const stored: InteractionLogEntry = { ...entry, metadata: { ...entry.metadata } };
    this.entries.set(stored.id, stored);
    try {
      await this.persist(stored);
    } catch (err) {
      this.entries.delete(stored.id);
      throw err;
    }

    this.logger.debug(`Appended interaction: ${stored.id}`, { taskId: stored.taskId, type: stored.type });
    return this.copy(stored);
  }

  async findById(id: string): Promise<InteractionLogEntry | null> {
    await this.ensureFresh();
    const entry = this.entries.get(id);
    return entry ? this.copy(entry) : null;
  }

  async findByTaskId(taskId: string): Promise<InteractionLogEntry[]> {
    await this.ensureFresh();
    return this.ordered(e => e.taskId === taskId);
  }

  async findBySessionId(sessionId: string, type?: InteractionType): Promise<InteractionLogEntry[]> {
    await this.ensureFresh();
    return this.ordered(e => e.sessionId === sessionId && (type === undefined || e.type === type));
  }

  async findLatestResponse(sessionId: string, since?: number): Promise<InteractionLogEntry | null> {
    const responses = await this.findBySessionId(sessionId, 'human_response');
    const eligible = since === undefined ? responses : responses.filter(e => e.createdAt > since);
    return eligible.length > 0 ? eligible[eligible.length - 1] : null;
  }

  private ordered(predicate: (entry: InteractionLogEntry) => boolean): InteractionLogEntry[] {
    // Sort is stable, so equal timestamps keep append order
    return Array.from(this.entries.values())
      .filter(predicate)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(e => this.copy(e));
  }

  private copy(entry: InteractionLogEntry): InteractionLogEntry {
    return { ...entry, metadata: { ...entry.metadata } };
  }
}
