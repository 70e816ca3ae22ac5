import { Request, Response, NextFunction } from 'express';
import { Actor } from '../../types';
import { IActorResolver } from '../../domain/services/IActorResolver';
import { ILogger } from '../../domain/common/ILogger';
import { UnauthorizedError } from '../../domain/common/Errors';
import { sendError } from '../errors';

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

const BEARER = /^Bearer\s+(\S+)$/i;

/**
 * Resolve `Authorization: Bearer <token>` into `req.actor`, or answer 401.
 */
export function authenticate(resolver: IActorResolver, logger: ILogger) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const match = BEARER.exec(req.headers.authorization || '');
    if (!match) {
      logger.warn('Rejected request without bearer token', { path: req.path });
      return sendError(new UnauthorizedError('Missing bearer token'), res, logger);
    }

    try {
      const actor = await resolver.resolve(match[1]);
      if (!actor) {
        logger.warn('Rejected request with unknown token', { path: req.path });
        return sendError(new UnauthorizedError('Invalid API token'), res, logger);
      }
      req.actor = actor;
      next();
    } catch (err) {
      sendError(err, res, logger);
    }
  };
}

/**
 * The authenticated actor of a request that passed `authenticate`.
 */
export function requireActor(req: Request): Actor {
  if (!req.actor) {
    throw new UnauthorizedError();
  }
  return req.actor;
}
