// Base types
export interface Project {
  id: string;
  name: string;
  description: string;
  ownerId: string;
  createdAt: number;
  updatedAt: number;
  lastActivityAt: number | null;
}

export interface Task {
  id: string;
  projectId: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  creatorId: string;

  // Interactive handoff state
  isInteractive: boolean;          // fixed at creation
  aiWaitingFeedback: boolean;      // true exactly while status is waiting_human_feedback
  interactionSessionId: string | null;
  feedbackContent: string | null;  // last submitted feedback snapshot; history lives in the ledger
  feedbackAt: number | null;

  createdAt: number;
  updatedAt: number;
  startedAt: number | null;
  completedAt: number | null;

  // Incremented on every write; used for compare-and-swap updates
  version: number;
}

export interface InteractionLogEntry {
  id: string;
  taskId: string;
  sessionId: string;
  type: InteractionType;
  status: InteractionStatus;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: number;
  createdBy: string;
}

/**
 * Authenticated caller, as produced by an actor resolver.
 */
export interface Actor {
  id: string;
  name?: string;
}

// Supporting types
export type TaskStatus =
  | 'todo'
  | 'in_progress'
  | 'review'
  | 'done'
  | 'cancelled'
  | 'waiting_human_feedback';

export type TaskPriority = 'low' | 'medium' | 'high' | 'urgent';

/** Statuses an agent may request when submitting feedback. */
export type FeedbackStatus = Exclude<TaskStatus, 'todo'>;

/** Statuses a task may be created in. */
export type InitialTaskStatus = 'todo' | 'in_progress' | 'review';

export type InteractionType = 'ai_feedback' | 'human_response';
export type InteractionStatus = 'pending' | 'completed' | 'continued';

/** Verdict a human gives on a pending completion claim. */
export type HumanVerdict = 'complete' | 'continue';

/** What an agent should do after a human feedback wait resolves. */
export type FeedbackAction = 'task_completed' | 'continue_task' | 'pending';

export const TASK_STATUSES: readonly TaskStatus[] = [
  'todo',
  'in_progress',
  'review',
  'done',
  'cancelled',
  'waiting_human_feedback'
];

export const FEEDBACK_STATUSES: readonly FeedbackStatus[] = [
  'in_progress',
  'review',
  'done',
  'cancelled',
  'waiting_human_feedback'
];

/** Statuses that count as open work for new-task waits and listings. */
export const OPEN_TASK_STATUSES: readonly InitialTaskStatus[] = ['todo', 'in_progress', 'review'];

// API request/response types
export interface CreateProjectPayload {
  name: string;
  description?: string;
}

export interface CreateTaskPayload {
  projectId: string;
  title: string;
  description?: string;
  status?: InitialTaskStatus;
  priority?: TaskPriority;
  isInteractive?: boolean;
}

/**
 * Fields a task write may change. `null` clears a nullable field,
 * `undefined` leaves it untouched.
 */
export interface UpdateTaskPayload {
  title?: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  aiWaitingFeedback?: boolean;
  interactionSessionId?: string | null;
  feedbackContent?: string | null;
  feedbackAt?: number | null;
  startedAt?: number | null;
  completedAt?: number | null;
}

export interface SubmitFeedbackPayload {
  taskId: string;
  content: string;
  status: string;
  /** Label of the reporting agent, recorded in ledger metadata. */
  actorTag?: string;
  /** Project name the caller believes the task belongs to. */
  projectName?: string;
  /** Session id the caller holds from an earlier cycle. */
  sessionId?: string;
}

export interface SubmitHumanResponsePayload {
  taskId: string;
  sessionId: string;
  content: string;
  /** `complete` or `continue`; anything else is rejected as invalid. */
  verdict: string;
  actorTag?: string;
}

export interface WaitOptions {
  timeoutSeconds?: number;
  pollIntervalSeconds?: number;
  /** Fires when the caller is no longer interested in the result. */
  signal?: AbortSignal;
}
