import { Task, UpdateTaskPayload } from '../../types';
import { ITaskRepository, TaskFilter, CreateTaskInput } from '../../domain/repositories/ITaskRepository';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ConflictError } from '../../domain/common/Errors';

/**
 * Map-backed implementation of ITaskRepository.
 * Subclasses add durability through the `load`, `refresh` and `persist` hooks.
 */
export class InMemoryTaskRepository implements ITaskRepository {
  protected tasks: Map<string, Task>;
  private initialized: boolean = false;

  constructor(
    protected idGenerator: IIdGenerator,
    protected clock: IClock,
    protected logger: ILogger
  ) {
    this.tasks = new Map();
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

  /**
   * Reads go through here so every lookup sees the latest stored state.
   */
  protected async ensureFresh(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
      return;
    }
    await this.refresh();
  }

  /**
   * Populate `tasks` from durable storage. Memory-only storage has nothing to load.
   */
  protected async load(): Promise<void> {}

  /**
   * Pick up records written to durable storage by other writers.
   */
  protected async refresh(): Promise<void> {}

  /**
   * Write one task to durable storage.
   */
  protected async persist(_task: Task): Promise<void> {}

  async create(input: CreateTaskInput): Promise<Task> {
    await this.ensureInitialized();

    const now = this.clock.now();
    const status = input.status || 'todo';
    const task: Task = {
      id: this.idGenerator.generate('task'),
      projectId: input.projectId,
      title: input.title,
      description: input.description || '',
      status,
      priority: input.priority || 'medium',
      creatorId: input.creatorId,
      isInteractive: input.isInteractive ?? false,
      aiWaitingFeedback: false,
      interactionSessionId: null,
      feedbackContent: null,
      feedbackAt: null,
      createdAt: now,
      updatedAt: now,
      startedAt: status === 'in_progress' ? now : null,
      completedAt: null,
      version: 1
    };

    this.tasks.set(task.id, task);
    try {
      await this.persist(task);
    } catch (err) {
      this.tasks.delete(task.id);
      throw err;
    }

    this.logger.debug(`Created task: ${task.id}`);
    return { ...task };
  }

  async findById(id: string): Promise<Task | null> {
    await this.ensureFresh();
    const task = this.tasks.get(id);
    return task ? { ...task } : null;
  }

  async findAll(filter?: TaskFilter): Promise<Task[]> {
    await this.ensureFresh();
    let tasks = Array.from(this.tasks.values());

    if (filter) {
      if (filter.projectId) {
        tasks = tasks.filter(t => t.projectId === filter.projectId);
      }
      const statuses = filter.statuses;
      if (statuses) {
        tasks = tasks.filter(t => statuses.includes(t.status));
      }
      const createdAfter = filter.createdAfter;
      if (createdAfter !== undefined) {
        tasks = tasks.filter(t => t.createdAt > createdAfter);
      }
    }

    return tasks
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(t => ({ ...t }));
  }

  async update(id: string, updates: UpdateTaskPayload, expectedVersion?: number): Promise<Task> {
    await this.ensureFresh();

    const current = this.tasks.get(id);
    if (!current) {
      throw new NotFoundError('Task', id);
    }
    if (expectedVersion !== undefined && current.version !== expectedVersion) {
      throw new ConflictError('Task', id, expectedVersion, current.version);
    }

    const task: Task = { ...current };

    // Apply updates
    if (updates.title !== undefined) task.title = updates.title;
    if (updates.description !== undefined) task.description = updates.description;
    if (updates.priority !== undefined) task.priority = updates.priority;
    if (updates.status !== undefined) task.status = updates.status;
    if (updates.aiWaitingFeedback !== undefined) task.aiWaitingFeedback = updates.aiWaitingFeedback;
    if (updates.interactionSessionId !== undefined) task.interactionSessionId = updates.interactionSessionId;
    if (updates.feedbackContent !== undefined) task.feedbackContent = updates.feedbackContent;
    if (updates.feedbackAt !== undefined) task.feedbackAt = updates.feedbackAt;
    if (updates.startedAt !== undefined) task.startedAt = updates.startedAt;
    if (updates.completedAt !== undefined) task.completedAt = updates.completedAt;

    task.updatedAt = this.clock.now();
    task.version = current.version + 1;

    this.tasks.set(id, task);
    try {
      await this.persist(task);
    } catch (err) {
      this.tasks.set(id, current);
      throw err;
    }

    this.logger.debug(`Updated task: ${id}`, { version: task.version, status: task.status });
    return { ...task };
  }

  async existsByProjectId(projectId: string): Promise<boolean> {
    await this.ensureFresh();
    return Array.from(this.tasks.values()).some(t => t.projectId === projectId);
  }

  async count(): Promise<number> {
    await this.ensureFresh();
    return this.tasks.size;
  }
}
