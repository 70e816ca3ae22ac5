import express, { Request, Response } from 'express';
import { z } from 'zod';
import { TaskService } from '../application/services/TaskService';
import { ILogger } from '../domain/common/ILogger';
import { requireActor } from './middleware/authenticate';
import { validateBody, validateParams, idParamSchema, createTaskSchema } from './validation';
import { sendError } from './errors';

/**
 * Create task routes using the TaskService.
 */
export function createTaskRoutes(taskService: TaskService, logger: ILogger) {
  const router = express.Router();

  // Create task
  router.post('/tasks', validateBody(createTaskSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof createTaskSchema> = req.body;
      const task = await taskService.createTask(requireActor(req), input);
      res.status(201).json(task);
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  // Get task by ID
  router.get('/tasks/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const task = await taskService.getTask(requireActor(req), req.params.id);
      res.json(task);
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  return router;
}
