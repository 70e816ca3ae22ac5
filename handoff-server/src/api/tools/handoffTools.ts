import { TaskStatus } from '../../types';
import { InteractionService, DEFAULT_AI_IDENTIFIER } from '../../application/services/InteractionService';
import { WaitCoordinator, WAIT_TIMEOUT_SECONDS, WAIT_POLL_INTERVAL_SECONDS } from '../../application/services/WaitCoordinator';
import { TaskService } from '../../application/services/TaskService';
import { ProjectService } from '../../application/services/ProjectService';
import {
  submitTaskFeedbackArgsSchema,
  submitHumanFeedbackArgsSchema,
  waitForNewTasksArgsSchema,
  waitForHumanFeedbackArgsSchema,
  taskIdArgsSchema,
  projectTasksArgsSchema,
  createTaskArgsSchema,
  updateTaskArgsSchema,
  projectInfoArgsSchema,
  emptyArgsSchema
} from '../validation';
import {
  presentFeedbackResult,
  presentHumanResponseResult,
  presentNewTasksWait,
  presentHumanFeedbackWait,
  presentInteractionStatus,
  presentInteractionHistory,
  presentTask,
  presentProject,
  presentProjectSummary,
  MESSAGES
} from '../presenters';
import { ValidationError } from '../../domain/common/Errors';
import { defineTool, ToolDefinition, JsonSchema } from './ToolRegistry';

export interface HandoffToolDeps {
  interactionService: InteractionService;
  waitCoordinator: WaitCoordinator;
  taskService: TaskService;
  projectService: ProjectService;
}

const string = (description: string): JsonSchema => ({ type: 'string', description });

const timeoutSeconds: JsonSchema = {
  type: 'integer',
  description: `Maximum time to wait, clamped to ${WAIT_TIMEOUT_SECONDS.min}-${WAIT_TIMEOUT_SECONDS.max}`,
  default: WAIT_TIMEOUT_SECONDS.default
};

const pollIntervalSeconds: JsonSchema = {
  type: 'integer',
  description: `Seconds between checks, clamped to ${WAIT_POLL_INTERVAL_SECONDS.min}-${WAIT_POLL_INTERVAL_SECONDS.max}`,
  default: WAIT_POLL_INTERVAL_SECONDS.default
};

function objectSchema(properties: Record<string, JsonSchema>, required: string[]): JsonSchema {
  return { type: 'object', properties, required };
}

/**
 * Tools offered to agents over the tool-call endpoint.
 */
export function createHandoffTools(deps: HandoffToolDeps): ToolDefinition[] {
  const { interactionService, waitCoordinator, taskService, projectService } = deps;

  return [
    defineTool({
      name: 'submit_task_feedback',
      description: 'Report progress on a task. On an interactive task, a "done" claim waits for human confirmation.',
      schema: submitTaskFeedbackArgsSchema,
      inputSchema: objectSchema({
        task_id: string('Task ID'),
        project_name: string('Name of the project the task belongs to'),
        feedback_content: string('What was done'),
        status: {
          type: 'string',
          enum: ['in_progress', 'review', 'done', 'cancelled', 'waiting_human_feedback']
        },
        ai_identifier: string('Label of the reporting agent'),
        session_id: string('Interaction session from an earlier cycle')
      }, ['task_id', 'project_name', 'feedback_content', 'status']),
      handler: async (args, { actor }) => {
        const aiIdentifier = args.ai_identifier || DEFAULT_AI_IDENTIFIER;
        const result = await interactionService.submitFeedback(actor, {
          taskId: args.task_id,
          projectName: args.project_name,
          content: args.feedback_content,
          status: args.status,
          actorTag: aiIdentifier,
          sessionId: args.session_id
        });
        return presentFeedbackResult(result, aiIdentifier);
      }
    }),

    defineTool({
      name: 'submit_human_feedback',
      description: 'Answer a task that is waiting for human feedback: complete it or send it back with instructions.',
      schema: submitHumanFeedbackArgsSchema,
      inputSchema: objectSchema({
        task_id: string('Task ID'),
        feedback_content: string('Verdict or additional instructions'),
        action: { type: 'string', enum: ['complete', 'continue'] },
        session_id: string('Interaction session the task is waiting in')
      }, ['task_id', 'feedback_content', 'action', 'session_id']),
      handler: async (args, { actor }) => {
        const result = await interactionService.submitHumanResponse(actor, {
          taskId: args.task_id,
          sessionId: args.session_id,
          content: args.feedback_content,
          verdict: args.action
        });
        return presentHumanResponseResult(result, args.action);
      }
    }),

    defineTool({
      name: 'wait_for_new_tasks',
      description: 'Block until open tasks are created in a project, or until the timeout.',
      schema: waitForNewTasksArgsSchema,
      inputSchema: objectSchema({
        project_name: string('Project to watch'),
        timeout_seconds: timeoutSeconds,
        poll_interval_seconds: pollIntervalSeconds
      }, ['project_name']),
      handler: async (args, { actor, signal }) => {
        const result = await waitCoordinator.waitForNewTasks(actor, args.project_name, {
          timeoutSeconds: args.timeout_seconds,
          pollIntervalSeconds: args.poll_interval_seconds,
          signal
        });
        return presentNewTasksWait(result);
      }
    }),

    defineTool({
      name: 'wait_for_human_feedback',
      description: 'Block until a human answers the pending completion claim of a task, or until the timeout.',
      schema: waitForHumanFeedbackArgsSchema,
      inputSchema: objectSchema({
        task_id: string('Task ID'),
        session_id: string('Session returned by submit_task_feedback'),
        timeout_seconds: timeoutSeconds,
        poll_interval_seconds: pollIntervalSeconds
      }, ['task_id', 'session_id']),
      handler: async (args, { actor, signal }) => {
        const result = await waitCoordinator.waitForHumanFeedback(actor, args.task_id, args.session_id, {
          timeoutSeconds: args.timeout_seconds,
          pollIntervalSeconds: args.poll_interval_seconds,
          signal
        });
        return presentHumanFeedbackWait(result);
      }
    }),

    defineTool({
      name: 'get_interaction_status',
      description: 'Current interaction state of a task.',
      schema: taskIdArgsSchema,
      inputSchema: objectSchema({ task_id: string('Task ID') }, ['task_id']),
      handler: async (args, { actor }) => {
        const task = await interactionService.getInteractionStatus(actor, args.task_id);
        return presentInteractionStatus(task);
      }
    }),

    defineTool({
      name: 'get_interaction_history',
      description: 'All agent feedback and human responses recorded for a task, oldest first.',
      schema: taskIdArgsSchema,
      inputSchema: objectSchema({ task_id: string('Task ID') }, ['task_id']),
      handler: async (args, { actor }) => {
        const { task, entries } = await interactionService.getInteractionHistory(actor, args.task_id);
        return presentInteractionHistory(task, entries);
      }
    }),

    defineTool({
      name: 'get_project_tasks_by_name',
      description: 'List the tasks of a project. Defaults to open tasks.',
      schema: projectTasksArgsSchema,
      inputSchema: objectSchema({
        project_name: string('Project name'),
        status: {
          description: 'One status or a list of statuses',
          oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }]
        }
      }, ['project_name']),
      handler: async (args, { actor }) => {
        const statuses: TaskStatus[] | undefined =
          args.status === undefined ? undefined : Array.isArray(args.status) ? args.status : [args.status];
        const listing = await taskService.listProjectTasks(actor, args.project_name, statuses);
        return {
          project_name: listing.projectName,
          project_id: listing.projectId,
          tasks: listing.tasks.map(presentTask),
          total_tasks: listing.tasks.length
        };
      }
    }),

    defineTool({
      name: 'get_task_by_id',
      description: 'Fetch one task.',
      schema: taskIdArgsSchema,
      inputSchema: objectSchema({ task_id: string('Task ID') }, ['task_id']),
      handler: async (args, { actor }) => presentTask(await taskService.getTask(actor, args.task_id))
    }),

    defineTool({
      name: 'create_task',
      description: 'Create a task in a project you own.',
      schema: createTaskArgsSchema,
      inputSchema: objectSchema({
        project_name: string('Project name'),
        title: string('Task title'),
        description: string('Task description'),
        status: { type: 'string', enum: ['todo', 'in_progress', 'review'] },
        priority: { type: 'string', enum: ['low', 'medium', 'high', 'urgent'] },
        is_interactive: { type: 'boolean', description: 'Require human sign-off before completion' }
      }, ['project_name', 'title']),
      handler: async (args, { actor }) => {
        const project = await projectService.getProjectByName(actor, args.project_name);
        const task = await taskService.createTask(actor, {
          projectId: project.id,
          title: args.title,
          description: args.description,
          status: args.status,
          priority: args.priority,
          isInteractive: args.is_interactive
        });
        return presentTask(task);
      }
    }),

    defineTool({
      name: 'update_task',
      description:
        'Change a task\'s title, description or priority. A status change is reported like submit_task_feedback ' +
        'and, on an interactive task, a "done" claim waits for human confirmation.',
      schema: updateTaskArgsSchema,
      inputSchema: objectSchema({
        task_id: string('Task ID'),
        title: string('New title'),
        description: string('New description'),
        priority: { type: 'string', enum: ['low', 'medium', 'high', 'urgent'] },
        status: {
          type: 'string',
          enum: ['in_progress', 'review', 'done', 'cancelled', 'waiting_human_feedback']
        },
        feedback_content: string('What was done; required with status'),
        ai_identifier: string('Label of the reporting agent')
      }, ['task_id']),
      handler: async (args, { actor }) => {
        const hasDetails = args.title !== undefined || args.description !== undefined || args.priority !== undefined;
        if (!hasDetails && args.status === undefined) {
          throw new ValidationError('At least one field must be provided for update');
        }

        const task = hasDetails
          ? await taskService.updateTaskDetails(actor, args.task_id, {
            title: args.title,
            description: args.description,
            priority: args.priority
          })
          : await taskService.getTask(actor, args.task_id);

        if (args.status === undefined || args.feedback_content === undefined) {
          return presentTask(task);
        }

        const result = await interactionService.submitFeedback(actor, {
          taskId: task.id,
          content: args.feedback_content,
          status: args.status,
          actorTag: args.ai_identifier || DEFAULT_AI_IDENTIFIER
        });
        return {
          ...presentTask(result.task),
          session_id: result.sessionId,
          ...(result.waitingHumanFeedback
            ? { waiting_human_feedback: true, message: MESSAGES.awaitingHuman }
            : {})
        };
      }
    }),

    defineTool({
      name: 'list_user_projects',
      description: 'List the projects you own.',
      schema: emptyArgsSchema,
      inputSchema: objectSchema({}, []),
      handler: async (_args, { actor }) => {
        const projects = await projectService.listProjects(actor);
        return { projects: projects.map(presentProject), total_projects: projects.length };
      }
    }),

    defineTool({
      name: 'get_project_info',
      description: 'Details of a project you own, with task counts per status and the most recently updated tasks.',
      schema: projectInfoArgsSchema,
      inputSchema: objectSchema({
        project_id: string('Project ID'),
        project_name: string('Project name, used when project_id is not given')
      }, []),
      handler: async (args, { actor }) => {
        const summary = await taskService.getProjectSummary(actor, {
          projectId: args.project_id,
          projectName: args.project_name
        });
        return presentProjectSummary(summary);
      }
    })
  ];
}
