import {
  Actor,
  Project,
  Task,
  InteractionLogEntry,
  SubmitFeedbackPayload,
  SubmitHumanResponsePayload
} from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IInteractionLogRepository } from '../../domain/repositories/IInteractionLogRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';
import {
  TransitionPlan,
  planFeedback,
  planHumanResponse,
  revertPatch
} from '../../domain/interaction/TaskStateMachine';
import { AccessGuard } from './AccessGuard';
import { ProjectService } from './ProjectService';

export const DEFAULT_AI_IDENTIFIER = 'AI Assistant';
export const DEFAULT_HUMAN_IDENTIFIER = 'Human Reviewer';

/**
 * Outcome of a committed transition.
 */
export interface TransitionResult {
  task: Task;
  project: Project;
  /** Ledger entry written by the transition, if any. */
  entry: InteractionLogEntry | null;
  sessionId: string | null;
  waitingHumanFeedback: boolean;
}

export interface InteractionHistory {
  task: Task;
  entries: InteractionLogEntry[];
}

/**
 * Drives the interactive handoff: agent feedback, human verdicts, and the
 * read-only views over a task's interaction state.
 *
 * Every transition is a compare-and-swap task write followed by a ledger
 * append. If the append fails the task write is reverted, so the task and
 * the ledger never disagree about a transition.
 */
export class InteractionService {
  constructor(
    private taskRepo: ITaskRepository,
    private logRepo: IInteractionLogRepository,
    private projectService: ProjectService,
    private guard: AccessGuard,
    private eventBus: IEventBus,
    private idGenerator: IIdGenerator,
    private clock: IClock,
    private logger: ILogger
  ) {}

  private async loadTask(taskId: string): Promise<Task> {
    const task = await this.taskRepo.findById(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    return task;
  }

  /**
   * Apply an agent's feedback submission to a task.
   */
  async submitFeedback(actor: Actor, payload: SubmitFeedbackPayload): Promise<TransitionResult> {
    const task = await this.loadTask(payload.taskId);
    const project = await this.guard.assertTaskAccess(actor, task);

    if (payload.projectName !== undefined && payload.projectName !== project.name) {
      throw new ValidationError(`Task ${task.id} does not belong to project "${payload.projectName}"`);
    }

    const plan = planFeedback(task, {
      requestedStatus: payload.status,
      content: payload.content,
      actorTag: payload.actorTag || DEFAULT_AI_IDENTIFIER,
      sessionHint: payload.sessionId,
      now: this.clock.now(),
      newSessionId: () => this.idGenerator.generate('sess')
    });

    const result = await this.commit(task, project, plan);

    this.logger.info('Task feedback submitted', {
      taskId: task.id,
      fromStatus: task.status,
      requestedStatus: payload.status,
      toStatus: result.task.status,
      sessionId: result.sessionId,
      waitingHumanFeedback: result.waitingHumanFeedback
    });

    return result;
  }

  /**
   * Record a human verdict on a task that is waiting for one.
   */
  async submitHumanResponse(actor: Actor, payload: SubmitHumanResponsePayload): Promise<TransitionResult> {
    const task = await this.loadTask(payload.taskId);
    const project = await this.guard.assertTaskAccess(actor, task);

    const plan = planHumanResponse(task, {
      sessionId: payload.sessionId,
      content: payload.content,
      verdict: payload.verdict,
      actorTag: payload.actorTag || actor.name || DEFAULT_HUMAN_IDENTIFIER,
      now: this.clock.now()
    });

    const result = await this.commit(task, project, plan);

    this.logger.info('Human response recorded', {
      taskId: task.id,
      sessionId: payload.sessionId,
      verdict: payload.verdict,
      toStatus: result.task.status
    });

    return result;
  }

  /**
   * Current interaction snapshot of a task. No side effects.
   */
  async getInteractionStatus(actor: Actor, taskId: string): Promise<Task> {
    const task = await this.loadTask(taskId);
    await this.guard.assertTaskAccess(actor, task);
    return task;
  }

  /**
   * Every ledger entry of a task, oldest first. No side effects.
   */
  async getInteractionHistory(actor: Actor, taskId: string): Promise<InteractionHistory> {
    const task = await this.loadTask(taskId);
    await this.guard.assertTaskAccess(actor, task);
    const entries = await this.logRepo.findByTaskId(taskId);
    return { task, entries };
  }

  private async commit(original: Task, project: Project, plan: TransitionPlan): Promise<TransitionResult> {
    const updated = await this.taskRepo.update(original.id, plan.patch, original.version);

    let entry: InteractionLogEntry | null = null;
    if (plan.entry) {
      try {
        entry = await this.logRepo.append({ id: this.idGenerator.generate('ilog'), ...plan.entry });
      } catch (err) {
        await this.revert(original, updated);
        throw err;
      }
    }

    await this.projectService.touchActivity(project.id, updated.updatedAt);

    await this.eventBus.emit('task:updated', updated);
    if (entry) {
      await this.eventBus.emit('interaction:logged', entry);
    }

    return {
      task: updated,
      project,
      entry,
      sessionId: plan.sessionId,
      waitingHumanFeedback: plan.waitingHumanFeedback
    };
  }

  private async revert(original: Task, updated: Task): Promise<void> {
    try {
      await this.taskRepo.update(original.id, revertPatch(original), updated.version);
      this.logger.warn('Reverted task write after ledger append failed', { taskId: original.id });
    } catch (revertErr) {
      this.logger.error(
        'Failed to revert task write after ledger append failed',
        revertErr instanceof Error ? revertErr : undefined,
        { taskId: original.id, version: updated.version }
      );
    }
  }
}
