import express, { Request, Response } from 'express';
import { z } from 'zod';
import { InteractionService } from '../application/services/InteractionService';
import { ILogger } from '../domain/common/ILogger';
import { requireActor } from './middleware/authenticate';
import { validateBody, validateParams, idParamSchema, humanFeedbackBodySchema } from './validation';
import { presentHumanResponseResult, presentInteractionStatus, presentInteractionHistory } from './presenters';
import { sendError } from './errors';

/**
 * Human-facing interaction routes: answer a waiting task, inspect its interaction state.
 */
export function createInteractionRoutes(interactionService: InteractionService, logger: ILogger) {
  const router = express.Router();

  // Submit a human verdict
  router.post(
    '/tasks/:id/human-feedback',
    validateParams(idParamSchema),
    validateBody(humanFeedbackBodySchema),
    async (req: Request, res: Response) => {
      try {
        const actor = requireActor(req);
        const body: z.infer<typeof humanFeedbackBodySchema> = req.body;
        const result = await interactionService.submitHumanResponse(actor, {
          taskId: req.params.id,
          sessionId: body.session_id,
          content: body.feedback_content,
          verdict: body.action,
          actorTag: actor.name
        });
        res.json(presentHumanResponseResult(result, body.action));
      } catch (err) {
        sendError(err, res, logger);
      }
    }
  );

  // Interaction snapshot
  router.get('/tasks/:id/interaction-status', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const task = await interactionService.getInteractionStatus(requireActor(req), req.params.id);
      res.json(presentInteractionStatus(task));
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  // Ledger, oldest first
  router.get('/tasks/:id/interaction-history', validateParams(idParamSchema), async (req: Request, res: Response) => {
    try {
      const { task, entries } = await interactionService.getInteractionHistory(requireActor(req), req.params.id);
      res.json(presentInteractionHistory(task, entries));
    } catch (err) {
      sendError(err, res, logger);
    }
  });

  return router;
}
