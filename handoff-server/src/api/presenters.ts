import { Project, Task, InteractionLogEntry } from '../types';
import { TransitionResult } from '../application/services/InteractionService';
import { NewTasksWaitResult, HumanFeedbackWaitResult } from '../application/services/WaitCoordinator';
import { ProjectSummary } from '../application/services/TaskService';

// Wire representations for the tool contract and the human-facing interaction routes.

export const MESSAGES = {
  awaitingHuman: 'Task feedback submitted. Waiting for human confirmation or additional instructions.',
  completed: 'Task has been marked as completed by human reviewer.',
  continued: 'Human has provided additional instructions. Continue working on the task.',
  released: 'Task is no longer waiting for human feedback.',
  timeout: 'Timeout waiting for human feedback. Task remains in waiting state.',
  aborted: 'Wait cancelled before human feedback arrived.'
} as const;

function iso(ms: number): string;
function iso(ms: number | null): string | null;
function iso(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString();
}

function seconds(ms: number): number {
  return Math.round(ms / 10) / 100;
}

export function presentProject(project: Project) {
  return {
    id: project.id,
    name: project.name,
    description: project.description,
    owner_id: project.ownerId,
    created_at: iso(project.createdAt),
    updated_at: iso(project.updatedAt),
    last_activity_at: iso(project.lastActivityAt)
  };
}

export function presentProjectSummary(summary: ProjectSummary) {
  const counts = summary.taskCounts;
  return {
    ...presentProject(summary.project),
    statistics: {
      total_tasks: Object.values(counts).reduce((sum, n) => sum + n, 0),
      todo_tasks: counts.todo,
      in_progress_tasks: counts.in_progress,
      review_tasks: counts.review,
      done_tasks: counts.done,
      cancelled_tasks: counts.cancelled,
      waiting_human_feedback_tasks: counts.waiting_human_feedback
    },
    recent_tasks: summary.recentTasks.map(presentTask)
  };
}

export function presentTask(task: Task) {
  return {
    id: task.id,
    project_id: task.projectId,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    creator_id: task.creatorId,
    is_interactive: task.isInteractive,
    ai_waiting_feedback: task.aiWaitingFeedback,
    interaction_session_id: task.interactionSessionId,
    feedback_content: task.feedbackContent,
    feedback_at: iso(task.feedbackAt),
    created_at: iso(task.createdAt),
    updated_at: iso(task.updatedAt),
    started_at: iso(task.startedAt),
    completed_at: iso(task.completedAt),
    version: task.version
  };
}

export function presentInteraction(entry: InteractionLogEntry) {
  return {
    id: entry.id,
    task_id: entry.taskId,
    session_id: entry.sessionId,
    interaction_type: entry.type,
    status: entry.status,
    content: entry.content,
    metadata: entry.metadata,
    created_at: iso(entry.createdAt),
    created_by: entry.createdBy
  };
}

export function presentInteractionStatus(task: Task) {
  return {
    task_id: task.id,
    is_interactive: task.isInteractive,
    ai_waiting_feedback: task.aiWaitingFeedback,
    interaction_session_id: task.interactionSessionId,
    task_status: task.status,
    feedback_content: task.feedbackContent,
    feedback_at: iso(task.feedbackAt)
  };
}

export function presentInteractionHistory(task: Task, entries: InteractionLogEntry[]) {
  return {
    task_id: task.id,
    total_interactions: entries.length,
    interactions: entries.map(presentInteraction)
  };
}

export function presentFeedbackResult(result: TransitionResult, aiIdentifier: string) {
  const { task } = result;
  return {
    task_id: task.id,
    project_name: result.project.name,
    status: task.status,
    feedback_submitted: true,
    feedback_content: task.feedbackContent,
    ai_identifier: aiIdentifier,
    timestamp: iso(task.updatedAt),
    is_interactive: task.isInteractive,
    session_id: result.sessionId,
    ...(result.waitingHumanFeedback
      ? { waiting_human_feedback: true, message: MESSAGES.awaitingHuman }
      : {})
  };
}

export function presentHumanResponseResult(result: TransitionResult, action: string) {
  const { task } = result;
  return {
    task_id: task.id,
    session_id: result.sessionId,
    action,
    feedback_content: result.entry ? result.entry.content : null,
    task_status: task.status,
    ai_waiting_feedback: task.aiWaitingFeedback,
    interaction_log_id: result.entry ? result.entry.id : null,
    timestamp: iso(task.updatedAt)
  };
}

export function presentNewTasksWait(result: NewTasksWaitResult) {
  return {
    project_name: result.project.name,
    project_id: result.project.id,
    new_tasks: result.tasks.map(presentTask),
    total_new_tasks: result.tasks.length,
    poll_count: result.pollCount,
    wait_duration_seconds: seconds(result.waitDurationMs),
    timeout: result.outcome !== 'matched',
    timeout_seconds: result.timeoutSeconds,
    poll_interval_seconds: result.pollIntervalSeconds,
    start_timestamp: iso(result.startedAt)
  };
}

export function presentHumanFeedbackWait(result: HumanFeedbackWaitResult) {
  const { task, response } = result;
  const base = {
    task_id: task.id,
    session_id: result.sessionId,
    human_feedback_received: result.outcome === 'matched',
    poll_count: result.pollCount,
    wait_duration_seconds: seconds(result.waitDurationMs),
    timeout: result.outcome !== 'matched',
    timeout_seconds: result.timeoutSeconds,
    poll_interval_seconds: result.pollIntervalSeconds,
    task_status: task.status,
    ai_waiting_feedback: task.aiWaitingFeedback
  };

  if (result.outcome === 'timeout') {
    return { ...base, message: MESSAGES.timeout };
  }
  if (result.outcome === 'aborted') {
    return { ...base, message: MESSAGES.aborted };
  }
  if (!response) {
    return { ...base, action: result.action, message: MESSAGES.released };
  }

  const humanResponse = {
    content: response.content,
    status: response.status,
    created_at: iso(response.createdAt),
    created_by: response.createdBy
  };
  if (result.action === 'continue_task') {
    return {
      ...base,
      human_response: humanResponse,
      action: result.action,
      message: MESSAGES.continued,
      additional_instructions: response.content
    };
  }
  return { ...base, human_response: humanResponse, action: result.action, message: MESSAGES.completed };
}
