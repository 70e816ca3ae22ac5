import {
  Task,
  FeedbackStatus,
  FeedbackAction,
  HumanVerdict,
  InteractionLogEntry,
  UpdateTaskPayload,
  FEEDBACK_STATUSES
} from '../../types';
import { ValidationError, InvalidStateError, SessionMismatchError } from '../common/Errors';

/**
 * Ledger entry produced by a transition, before it is given an id.
 */
export type InteractionDraft = Omit<InteractionLogEntry, 'id'>;

/**
 * Result of planning a transition: what to write, nothing written yet.
 */
export interface TransitionPlan {
  patch: UpdateTaskPayload;
  entry: InteractionDraft | null;
  /** Interaction session the task is bound to after the transition. */
  sessionId: string | null;
  waitingHumanFeedback: boolean;
}

export interface FeedbackRequest {
  requestedStatus: string;
  content: string;
  actorTag: string;
  /** Session id held by the caller; must match the bound session if there is one. */
  sessionHint?: string;
  now: number;
  newSessionId: () => string;
}

export interface HumanResponseRequest {
  sessionId: string;
  content: string;
  verdict: string;
  actorTag: string;
  now: number;
}

export function isFeedbackStatus(value: string): value is FeedbackStatus {
  return FEEDBACK_STATUSES.some(status => status === value);
}

export function isHumanVerdict(value: string): value is HumanVerdict {
  return value === 'complete' || value === 'continue';
}

/**
 * Timestamps that follow a status change.
 */
function lifecycleTimestamps(task: Task, nextStatus: Task['status'], now: number): UpdateTaskPayload {
  const patch: UpdateTaskPayload = {};
  if (nextStatus === 'in_progress' && task.startedAt === null) {
    patch.startedAt = now;
  }
  if (nextStatus === 'done') {
    patch.completedAt = now;
  } else if (task.completedAt !== null) {
    patch.completedAt = null;
  }
  return patch;
}

/**
 * Plan an agent feedback submission.
 *
 * Interactive tasks record every non-cancel submission in the ledger, and a
 * completion claim (`done`, or an explicit `waiting_human_feedback`) parks the
 * task until a human answers. Cancellation always applies directly and
 * releases the interaction session.
 */
export function planFeedback(task: Task, request: FeedbackRequest): TransitionPlan {
  const requested = request.requestedStatus;
  if (!isFeedbackStatus(requested)) {
    throw new ValidationError(`Invalid status. Must be one of: ${FEEDBACK_STATUSES.join(', ')}`);
  }

  const snapshot: UpdateTaskPayload = {
    feedbackContent: request.content,
    feedbackAt: request.now
  };

  if (requested === 'cancelled') {
    return {
      patch: {
        ...snapshot,
        ...lifecycleTimestamps(task, 'cancelled', request.now),
        status: 'cancelled',
        aiWaitingFeedback: false,
        interactionSessionId: null
      },
      entry: null,
      sessionId: null,
      waitingHumanFeedback: false
    };
  }

  if (task.status === 'waiting_human_feedback') {
    throw new InvalidStateError(
      `Task ${task.id} is already waiting for human feedback; wait for the verdict or cancel the task`,
      { sessionId: task.interactionSessionId }
    );
  }

  if (!task.isInteractive) {
    if (requested === 'waiting_human_feedback') {
      throw new InvalidStateError(`Task ${task.id} is not interactive`);
    }
    return {
      patch: {
        ...snapshot,
        ...lifecycleTimestamps(task, requested, request.now),
        status: requested,
        aiWaitingFeedback: false
      },
      entry: null,
      sessionId: task.interactionSessionId,
      waitingHumanFeedback: false
    };
  }

  if (request.sessionHint && task.interactionSessionId && request.sessionHint !== task.interactionSessionId) {
    throw new SessionMismatchError(task.id, request.sessionHint);
  }

  // First writer binds the session; it is kept for every later cycle
  const sessionId = task.interactionSessionId ?? request.newSessionId();
  const holdForHuman = requested === 'done' || requested === 'waiting_human_feedback';
  const nextStatus = holdForHuman ? 'waiting_human_feedback' : requested;

  return {
    patch: {
      ...snapshot,
      ...lifecycleTimestamps(task, nextStatus, request.now),
      status: nextStatus,
      aiWaitingFeedback: holdForHuman,
      interactionSessionId: sessionId
    },
    entry: {
      taskId: task.id,
      sessionId,
      type: 'ai_feedback',
      status: 'pending',
      content: request.content,
      metadata: {
        ai_identifier: request.actorTag,
        original_status: task.status,
        requested_status: requested
      },
      createdAt: request.now,
      createdBy: request.actorTag
    },
    sessionId,
    waitingHumanFeedback: holdForHuman
  };
}

/**
 * Plan a human verdict on a pending completion claim.
 * The session stays bound in both outcomes.
 */
export function planHumanResponse(task: Task, request: HumanResponseRequest): TransitionPlan {
  const verdict = request.verdict;
  if (!isHumanVerdict(verdict)) {
    throw new ValidationError('action must be "complete" or "continue"');
  }
  if (!task.isInteractive) {
    throw new InvalidStateError(`Task ${task.id} is not interactive`);
  }
  if (task.status !== 'waiting_human_feedback') {
    throw new InvalidStateError(`Task ${task.id} is not waiting for human feedback`, { status: task.status });
  }
  if (task.interactionSessionId !== request.sessionId) {
    throw new SessionMismatchError(task.id, request.sessionId);
  }

  const nextStatus = verdict === 'complete' ? 'done' : 'in_progress';

  return {
    patch: {
      ...lifecycleTimestamps(task, nextStatus, request.now),
      status: nextStatus,
      aiWaitingFeedback: false
    },
    entry: {
      taskId: task.id,
      sessionId: request.sessionId,
      type: 'human_response',
      status: verdict === 'complete' ? 'completed' : 'continued',
      content: request.content,
      metadata: { action: verdict },
      createdAt: request.now,
      createdBy: request.actorTag
    },
    sessionId: request.sessionId,
    waitingHumanFeedback: false
  };
}

/**
 * Patch that restores every field a transition may touch to the values in `task`.
 */
export function revertPatch(task: Task): UpdateTaskPayload {
  return {
    status: task.status,
    aiWaitingFeedback: task.aiWaitingFeedback,
    interactionSessionId: task.interactionSessionId,
    feedbackContent: task.feedbackContent,
    feedbackAt: task.feedbackAt,
    startedAt: task.startedAt,
    completedAt: task.completedAt
  };
}

/**
 * Next step for the agent, derived from the human response it waited for.
 */
export function actionForResponse(response: InteractionLogEntry | null): FeedbackAction {
  if (response?.status === 'completed') return 'task_completed';
  if (response?.status === 'continued') return 'continue_task';
  return 'pending';
}
