import express, { Request, Response } from 'express';
import cors from 'cors';
import { Container } from './container';
import { authenticate } from './api/middleware/authenticate';
import { rateLimit } from './api/middleware/rateLimit';
import { createProjectRoutes } from './api/projectRoutes';
import { createTaskRoutes } from './api/taskRoutes';
import { createInteractionRoutes } from './api/interactionRoutes';
import { createToolRoutes } from './api/toolRoutes';
import { createErrorMiddleware } from './api/errors';

/**
 * Build the Express application from a container. Does not listen.
 */
export function createApp(container: Container) {
  const {
    config,
    logger,
    actorResolver,
    rateLimiter,
    projectService,
    taskService,
    interactionService,
    toolRegistry
  } = container;

  const app = express();

  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      exposedHeaders: ['Retry-After', 'X-RateLimit-Limit', 'X-RateLimit-Remaining']
    }));
  }
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime()
    });
  });

  // Everything under /api needs a bearer token; tool calls are rate limited per actor
  app.use('/api', authenticate(actorResolver, logger));
  app.use('/api/tools', rateLimit(rateLimiter, config.rateLimit, logger));

  app.use('/api', createToolRoutes(toolRegistry, logger));
  app.use('/api', createProjectRoutes(projectService, logger));
  app.use('/api', createTaskRoutes(taskService, logger));
  app.use('/api', createInteractionRoutes(interactionService, logger));

  // Global error handling middleware
  app.use(createErrorMiddleware(logger));

  return app;
}
