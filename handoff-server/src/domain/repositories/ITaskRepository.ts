import { Task, TaskStatus, CreateTaskPayload, UpdateTaskPayload } from '../../types';

/**
 * Filter options for listing tasks.
 */
export interface TaskFilter {
  projectId?: string;
  statuses?: readonly TaskStatus[];
  /** Only tasks created strictly after this epoch-ms timestamp. */
  createdAfter?: number;
}

/**
 * Input for creating a task: the payload plus the authenticated creator.
 */
export type CreateTaskInput = CreateTaskPayload & { creatorId: string };

/**
 * Repository interface for Task persistence operations.
 * Returned tasks are copies; mutating them does not affect stored state.
 */
export interface ITaskRepository {
  /**
   * Create a new task.
   * @returns The created task with generated id, timestamps and version 1
   */
  create(task: CreateTaskInput): Promise<Task>;

  /**
   * Find a task by ID.
   * @returns The task if found, null otherwise
   */
  findById(id: string): Promise<Task | null>;

  /**
   * Find tasks with optional filters, ordered by creation time ascending.
   */
  findAll(filter?: TaskFilter): Promise<Task[]>;

  /**
   * Update an existing task and bump its version.
   * @param expectedVersion - When given, the write only succeeds if the stored
   *   version still equals it
   * @throws {NotFoundError} if task not found
   * @throws {ConflictError} if expectedVersion is stale
   */
  update(id: string, updates: UpdateTaskPayload, expectedVersion?: number): Promise<Task>;

  /**
   * Check if project has any tasks.
   */
  existsByProjectId(projectId: string): Promise<boolean>;

  count(): Promise<number>;

  initialize(): Promise<void>;
}
