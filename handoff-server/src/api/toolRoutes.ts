import express, { Request, Response } from 'express';
import { z } from 'zod';
import { ILogger } from '../domain/common/ILogger';
import { ToolRegistry } from './tools/ToolRegistry';
import { requireActor } from './middleware/authenticate';
import { validateBody, toolCallSchema } from './validation';
import { sendError } from './errors';

/**
 * Tool-call contract: list tools, call one by name.
 */
export function createToolRoutes(registry: ToolRegistry, logger: ILogger) {
  const router = express.Router();

  // List tools with their input schemas
  router.get('/tools', (req: Request, res: Response) => {
    res.json({ tools: registry.describe() });
  });

  // Call a tool
  router.post('/tools/call', validateBody(toolCallSchema), async (req: Request, res: Response) => {
    const call: z.infer<typeof toolCallSchema> = req.body;

    // Long waits stop when the client disconnects
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const startedAt = Date.now();
    try {
      const actor = requireActor(req);
      const result = await registry.execute(call.name, call.arguments ?? {}, { actor, signal: controller.signal });

      if (controller.signal.aborted) {
        logger.info('Client disconnected before tool result', { tool: call.name, durationMs: Date.now() - startedAt });
        return;
      }
      logger.debug('Tool call finished', { tool: call.name, actorId: actor.id, durationMs: Date.now() - startedAt });
      res.json(result);
    } catch (err) {
      if (controller.signal.aborted) {
        logger.warn('Tool call failed after client disconnected', {
          tool: call.name,
          error: err instanceof Error ? err.message : String(err)
        });
        return;
      }
      sendError(err, res, logger);
    }
  });

  return router;
}
