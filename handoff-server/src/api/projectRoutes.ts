import express, { Request, Response } from 'express';
import { z } from 'zod';
import { ProjectService } from '../application/services/ProjectService';
import { ILogger } from '../domain/common/ILogger';
import { requireActor } from './middleware/authenticate';
import { validateBody, validateParams, idParamSchema, createProjectSchema } from './validation';
import { sendError } from './errors';

/**
 * Create project routes using the ProjectService.
 */
export function createProjectRoutes(projectService: ProjectService, logger: ILogger) {
  const router = express.Router();

  // List the caller's projects
  router.get('/projects', async (req: Request, res: Response) => {
    try {
      const projects = await projectService.listProjects(requireActor(req));
      res.json(projects);
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  // Create project
  router.post('/projects', validateBody(createProjectSchema), async (req: Request, res: Response) => {
    try {
      const input: z.infer<typeof createProjectSchema> = req.body;
      const project = await projectService.createProject(requireActor(req), input);
      res.status(201).json(project);
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  // Get project by ID
  router.get('/projects/:id', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const project = await projectService.getProject(requireActor(req), req.params.id);
      res.json(project);
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  return router;
}
