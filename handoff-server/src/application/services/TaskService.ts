import {
  Actor,
  Project,
  Task,
  TaskStatus,
  TaskPriority,
  CreateTaskPayload,
  OPEN_TASK_STATUSES
} from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError, NotFoundError } from '../../domain/common/Errors';
import { AccessGuard } from './AccessGuard';

/**
 * Result of listing a project's tasks by project name.
 */
export interface ProjectTaskListing {
  projectId: string;
  projectName: string;
  tasks: Task[];
}

/**
 * Descriptive fields any task may change outside the state machine.
 */
export interface TaskDetailsChanges {
  title?: string;
  description?: string;
  priority?: TaskPriority;
}

export interface ProjectLookup {
  projectId?: string;
  projectName?: string;
}

export interface ProjectSummary {
  project: Project;
  taskCounts: Record<TaskStatus, number>;
  /** Most recently updated first. */
  recentTasks: Task[];
}

export const RECENT_TASK_LIMIT = 5;

/**
 * Application service for task operations.
 * Interactive handoff transitions live in InteractionService.
 */
export class TaskService {
  constructor(
    private taskRepo: ITaskRepository,
    private projectRepo: IProjectRepository,
    private guard: AccessGuard,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  /**
   * Create a new task. Only the project owner may add tasks.
   * Interactivity is fixed here for the lifetime of the task.
   */
  async createTask(actor: Actor, input: CreateTaskPayload): Promise<Task> {
    if (!input.projectId) {
      throw new ValidationError('Project ID is required');
    }
    if (!input.title || input.title.trim() === '') {
      throw new ValidationError('Task title is required');
    }

    const project = await this.projectRepo.findById(input.projectId);
    if (!project) {
      throw new NotFoundError('Project', input.projectId);
    }
    this.guard.assertProjectAccess(actor, project);

    const task = await this.taskRepo.create({
      ...input,
      title: input.title.trim(),
      creatorId: actor.id
    });

    this.logger.info('Task created', {
      taskId: task.id,
      projectId: project.id,
      isInteractive: task.isInteractive
    });
    await this.eventBus.emit('task:created', task);

    return task;
  }

  /**
   * Get a task by ID.
   */
  async getTask(actor: Actor, id: string): Promise<Task> {
    const task = await this.taskRepo.findById(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    await this.guard.assertTaskAccess(actor, task);
    return task;
  }

  /**
   * List a project's tasks, oldest first. Open work only unless statuses are given.
   */
  async listProjectTasks(
    actor: Actor,
    projectName: string,
    statuses: readonly TaskStatus[] = OPEN_TASK_STATUSES
  ): Promise<ProjectTaskListing> {
    const project = await this.projectRepo.findByName(projectName);
    if (!project) {
      throw await this.guard.unknownProject(actor, projectName);
    }
    this.guard.assertProjectAccess(actor, project);

    const tasks = await this.taskRepo.findAll({ projectId: project.id, statuses });
    return { projectId: project.id, projectName: project.name, tasks };
  }

  /**
   * Change a task's title, description or priority.
   * Status is not accepted here: it only moves through InteractionService.
   */
  async updateTaskDetails(actor: Actor, taskId: string, changes: TaskDetailsChanges): Promise<Task> {
    const updatedFields = (['title', 'description', 'priority'] as const).filter(f => changes[f] !== undefined);
    if (updatedFields.length === 0) {
      throw new ValidationError('At least one field must be provided for update');
    }
    const title = changes.title?.trim();
    if (title === '') {
      throw new ValidationError('Task title is required');
    }

    const task = await this.getTask(actor, taskId);
    const updated = await this.taskRepo.update(
      task.id,
      { title, description: changes.description, priority: changes.priority },
      task.version
    );

    this.logger.info('Task details updated', { taskId: task.id, fields: updatedFields, version: updated.version });
    await this.eventBus.emit('task:updated', updated);

    return updated;
  }

  /**
   * Project details with per-status task counts and the latest activity.
   * Looks the project up by id when given, by name otherwise.
   */
  async getProjectSummary(actor: Actor, lookup: ProjectLookup): Promise<ProjectSummary> {
    const identifier = lookup.projectId ?? lookup.projectName;
    if (identifier === undefined) {
      throw new ValidationError('Either project_id or project_name is required');
    }

    const project = lookup.projectId !== undefined
      ? await this.projectRepo.findById(lookup.projectId)
      : await this.projectRepo.findByName(identifier);
    if (!project) {
      throw await this.guard.unknownProject(actor, identifier);
    }
    this.guard.assertProjectAccess(actor, project);

    const tasks = await this.taskRepo.findAll({ projectId: project.id });
    const taskCounts: Record<TaskStatus, number> = {
      todo: 0,
      in_progress: 0,
      review: 0,
      done: 0,
      cancelled: 0,
      waiting_human_feedback: 0
    };
    for (const task of tasks) {
      taskCounts[task.status] += 1;
    }
    const recentTasks = [...tasks]
      .sort((a, b) => b.updatedAt - a.updatedAt)
      .slice(0, RECENT_TASK_LIMIT);

    return { project, taskCounts, recentTasks };
  }
}
