import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../domain/common/Errors';
import { sanitizeText } from '../utils/sanitize';

// --- Reusable patterns ---

// Safe ID: alphanumeric, hyphens, underscores
const safeId = z.string().regex(/^[a-zA-Z0-9_-]+$/, 'ID must be alphanumeric with hyphens/underscores only');

// Free text, escaped on the way in
const requiredText = (max: number) => z.string()
  .min(1)
  .max(max)
  .transform(sanitizeText)
  .refine(value => value.length > 0, 'Must not be blank');

const optionalText = (max: number) => z.string().max(max).transform(sanitizeText).optional();

// Accepts 60 or "60" and nothing else; bounds are applied by the wait coordinator
const SECONDS_MESSAGE = 'timeout_seconds and poll_interval_seconds must be valid numbers';
const seconds = z.union(
  [
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/, SECONDS_MESSAGE).transform(Number),
  ],
  { errorMap: () => ({ message: SECONDS_MESSAGE }) }
).optional();

// --- Enums ---

const initialTaskStatusSchema = z.enum(['todo', 'in_progress', 'review']);
const taskPrioritySchema = z.enum(['low', 'medium', 'high', 'urgent']);
const taskStatusSchema = z.enum(['todo', 'in_progress', 'review', 'done', 'cancelled', 'waiting_human_feedback']);

// --- Param schemas ---

export const idParamSchema = z.object({
  id: safeId,
});

// --- Project schemas ---

export const createProjectSchema = z.object({
  name: requiredText(200),
  description: optionalText(2000),
}).strict();

// --- Task schemas ---

export const createTaskSchema = z.object({
  projectId: safeId,
  title: requiredText(500),
  description: optionalText(10000),
  status: initialTaskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  isInteractive: z.boolean().optional(),
}).strict();

// --- Human feedback (REST) ---

export const humanFeedbackBodySchema = z.object({
  feedback_content: requiredText(10000),
  action: z.string().min(1),
  session_id: safeId,
});

// --- Tool argument schemas ---

export const submitTaskFeedbackArgsSchema = z.object({
  task_id: safeId,
  project_name: requiredText(200),
  feedback_content: requiredText(10000),
  // Checked by the state machine so the error lists the accepted values
  status: z.string().min(1),
  ai_identifier: optionalText(200),
  session_id: safeId.optional(),
});

export const submitHumanFeedbackArgsSchema = z.object({
  task_id: safeId,
  feedback_content: requiredText(10000),
  action: z.string().min(1),
  session_id: safeId,
});

export const waitForNewTasksArgsSchema = z.object({
  project_name: requiredText(200),
  timeout_seconds: seconds,
  poll_interval_seconds: seconds,
});

export const waitForHumanFeedbackArgsSchema = z.object({
  task_id: safeId,
  session_id: safeId,
  timeout_seconds: seconds,
  poll_interval_seconds: seconds,
});

export const taskIdArgsSchema = z.object({
  task_id: safeId,
});

export const projectTasksArgsSchema = z.object({
  project_name: requiredText(200),
  status: z.union([taskStatusSchema, z.array(taskStatusSchema).min(1)]).optional(),
});

export const createTaskArgsSchema = z.object({
  project_name: requiredText(200),
  title: requiredText(500),
  description: optionalText(10000),
  status: initialTaskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  is_interactive: z.boolean().optional(),
});

export const updateTaskArgsSchema = z.object({
  task_id: safeId,
  title: requiredText(500).optional(),
  description: optionalText(10000),
  priority: taskPrioritySchema.optional(),
  // Status moves through the feedback state machine, which validates it
  status: z.string().min(1).optional(),
  feedback_content: requiredText(10000).optional(),
  ai_identifier: optionalText(200),
}).superRefine((args, ctx) => {
  if (args.status !== undefined && args.feedback_content === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['feedback_content'],
      message: 'Required when status is given',
    });
  }
});

export const projectInfoArgsSchema = z.object({
  project_id: safeId.optional(),
  project_name: requiredText(200).optional(),
}).refine(args => args.project_id !== undefined || args.project_name !== undefined, {
  message: 'Either project_id or project_name is required',
});

export const emptyArgsSchema = z.object({});

export const toolCallSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
}).strict();

// --- Helpers ---

function issues(error: z.ZodError) {
  return error.issues.map(i => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

/**
 * Parse a value with a schema, turning failures into a ValidationError.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, issues(result.error));
  }
  return result.data;
}

/**
 * Validate request body against a Zod schema.
 * Replaces the body with the parsed (sanitized) value.
 */
export function validateBody(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json(new ValidationError('Invalid request body', issues(result.error)).toJSON());
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validate request params against a Zod schema.
 */
export function validateParams(schema: z.ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return res.status(400).json(new ValidationError('Invalid URL parameters', issues(result.error)).toJSON());
    }
    next();
  };
}
