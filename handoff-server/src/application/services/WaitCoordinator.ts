import {
  Actor,
  Project,
  Task,
  InteractionLogEntry,
  FeedbackAction,
  WaitOptions,
  OPEN_TASK_STATUSES
} from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IInteractionLogRepository } from '../../domain/repositories/IInteractionLogRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import {
  NotFoundError,
  ValidationError,
  InvalidStateError,
  SessionMismatchError
} from '../../domain/common/Errors';
import { actionForResponse } from '../../domain/interaction/TaskStateMachine';
import { AccessGuard } from './AccessGuard';

interface Range {
  min: number;
  max: number;
  default: number;
}

export const WAIT_TIMEOUT_SECONDS: Range = { min: 30, max: 7200, default: 3600 };
export const WAIT_POLL_INTERVAL_SECONDS: Range = { min: 10, max: 300, default: 30 };

export interface WaitParameters {
  timeoutSeconds: number;
  pollIntervalSeconds: number;
}

/** How a wait ended. A timeout is a normal outcome, not an error. */
export type WaitOutcome = 'matched' | 'timeout' | 'aborted';

interface WaitSummary {
  outcome: WaitOutcome;
  /** Number of times the stores were sampled. */
  pollCount: number;
  startedAt: number;
  waitDurationMs: number;
  timeoutSeconds: number;
  pollIntervalSeconds: number;
}

export interface NewTasksWaitResult extends WaitSummary {
  project: Project;
  /** Open tasks created after the wait started, oldest first. */
  tasks: Task[];
}

export interface HumanFeedbackWaitResult extends WaitSummary {
  task: Task;
  sessionId: string;
  /** Newest human response recorded since the wait started. */
  response: InteractionLogEntry | null;
  action: FeedbackAction;
}

type Subscribe = (wake: () => void) => () => void;

function clamp(value: number | undefined, range: Range, name: string): number {
  if (value === undefined) return range.default;
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a finite number`);
  }
  return Math.min(range.max, Math.max(range.min, Math.trunc(value)));
}

/**
 * Clamp requested wait parameters into their allowed ranges.
 * Out-of-range values are pulled to the nearest bound, not rejected.
 */
export function clampWaitParameters(options: WaitOptions = {}): WaitParameters {
  return {
    timeoutSeconds: clamp(options.timeoutSeconds, WAIT_TIMEOUT_SECONDS, 'timeout_seconds'),
    pollIntervalSeconds: clamp(options.pollIntervalSeconds, WAIT_POLL_INTERVAL_SECONDS, 'poll_interval_seconds')
  };
}

/**
 * Long-poll waits for agents.
 *
 * A wait subscribes to the relevant domain events and also samples the
 * stores every poll interval, so writes made through this process wake it
 * immediately while writes from other processes sharing the data directory
 * are still seen. No thread is held between samples.
 */
export class WaitCoordinator {
  constructor(
    private taskRepo: ITaskRepository,
    private projectRepo: IProjectRepository,
    private logRepo: IInteractionLogRepository,
    private guard: AccessGuard,
    private eventBus: IEventBus,
    private clock: IClock,
    private logger: ILogger
  ) {}

  /**
   * Wait until open tasks appear in a project, created after the wait began.
   */
  async waitForNewTasks(actor: Actor, projectName: string, options: WaitOptions = {}): Promise<NewTasksWaitResult> {
    const params = clampWaitParameters(options);
    const startedAt = this.clock.now();

    const project = await this.projectRepo.findByName(projectName);
    if (!project) {
      throw await this.guard.unknownProject(actor, projectName);
    }
    this.guard.assertProjectAccess(actor, project);

    this.logger.info('Waiting for new tasks', { projectId: project.id, ...params });

    const subscribe: Subscribe = wake => {
      const onCreated = (task: Task) => {
        if (task.projectId === project.id) wake();
      };
      this.eventBus.on('task:created', onCreated);
      return () => this.eventBus.off('task:created', onCreated);
    };

    let tasks: Task[] = [];
    const summary = await this.poll(params, startedAt, subscribe, options.signal, async () => {
      tasks = await this.taskRepo.findAll({
        projectId: project.id,
        statuses: OPEN_TASK_STATUSES,
        createdAfter: startedAt
      });
      return tasks.length > 0;
    });

    this.logger.info('New task wait finished', {
      projectId: project.id,
      outcome: summary.outcome,
      pollCount: summary.pollCount,
      found: tasks.length
    });

    return { ...summary, project, tasks: summary.outcome === 'matched' ? tasks : [] };
  }

  /**
   * Wait until a human answers the pending completion claim of a task.
   * Preconditions are checked once, before any waiting.
   */
  async waitForHumanFeedback(
    actor: Actor,
    taskId: string,
    sessionId: string,
    options: WaitOptions = {}
  ): Promise<HumanFeedbackWaitResult> {
    const params = clampWaitParameters(options);
    const startedAt = this.clock.now();

    let task = await this.taskRepo.findById(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    await this.guard.assertTaskAccess(actor, task);
    if (!task.isInteractive) {
      throw new InvalidStateError(`Task ${taskId} is not interactive`);
    }
    if (task.status !== 'waiting_human_feedback') {
      throw new InvalidStateError(`Task ${taskId} is not waiting for human feedback`, { status: task.status });
    }
    if (task.interactionSessionId !== sessionId) {
      throw new SessionMismatchError(taskId, sessionId);
    }

    this.logger.info('Waiting for human feedback', { taskId, sessionId, ...params });

    const subscribe: Subscribe = wake => {
      const onTask = (updated: Task) => {
        if (updated.id === taskId) wake();
      };
      const onLogged = (entry: InteractionLogEntry) => {
        if (entry.taskId === taskId) wake();
      };
      this.eventBus.on('task:updated', onTask);
      this.eventBus.on('interaction:logged', onLogged);
      return () => {
        this.eventBus.off('task:updated', onTask);
        this.eventBus.off('interaction:logged', onLogged);
      };
    };

    let response: InteractionLogEntry | null = null;
    const summary = await this.poll(params, startedAt, subscribe, options.signal, async () => {
      const current = await this.taskRepo.findById(taskId);
      if (!current) {
        throw new NotFoundError('Task', taskId);
      }
      task = current;
      response = await this.logRepo.findLatestResponse(sessionId, startedAt);
      return !current.aiWaitingFeedback || response !== null;
    });

    const action = actionForResponse(response);
    this.logger.info('Human feedback wait finished', {
      taskId,
      sessionId,
      outcome: summary.outcome,
      pollCount: summary.pollCount,
      action
    });

    return { ...summary, task, sessionId, response, action };
  }

  /**
   * Sample until `check` holds, the deadline passes, or `signal` aborts.
   * Samples run while now < deadline; between samples the wait sleeps
   * min(interval, remaining) unless an event arrived during the sample.
   */
  private async poll(
    params: WaitParameters,
    startedAt: number,
    subscribe: Subscribe,
    signal: AbortSignal | undefined,
    check: () => Promise<boolean>
  ): Promise<WaitSummary> {
    const deadline = startedAt + params.timeoutSeconds * 1000;
    const intervalMs = params.pollIntervalSeconds * 1000;

    let pollCount = 0;
    let signalled = false;
    let wakeSleeper: (() => void) | null = null;
    let timer: NodeJS.Timeout | undefined;

    const wake = () => {
      signalled = true;
      if (wakeSleeper) wakeSleeper();
    };
    const unsubscribe = subscribe(wake);
    signal?.addEventListener('abort', wake);

    const finish = (outcome: WaitOutcome): WaitSummary => ({
      outcome,
      pollCount,
      startedAt,
      waitDurationMs: this.clock.now() - startedAt,
      timeoutSeconds: params.timeoutSeconds,
      pollIntervalSeconds: params.pollIntervalSeconds
    });

    try {
      while (this.clock.now() < deadline) {
        if (signal?.aborted) return finish('aborted');

        signalled = false;
        pollCount++;
        if (await check()) return finish('matched');

        const remaining = deadline - this.clock.now();
        if (remaining <= 0) break;
        if (signalled || signal?.aborted) continue;

        await new Promise<void>(resolve => {
          wakeSleeper = resolve;
          timer = setTimeout(resolve, Math.min(intervalMs, remaining));
        });
        wakeSleeper = null;
        clearTimeout(timer);
      }

      return finish(signal?.aborted ? 'aborted' : 'timeout');
    } finally {
      unsubscribe();
      signal?.removeEventListener('abort', wake);
      clearTimeout(timer);
    }
  }
}
