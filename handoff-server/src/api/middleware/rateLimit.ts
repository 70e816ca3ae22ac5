import { Request, Response, NextFunction } from 'express';
import { SlidingWindowRateLimiter } from '../../infrastructure/ratelimit/SlidingWindowRateLimiter';
import { RateLimitConfig } from '../../infrastructure/config/Config';
import { ILogger } from '../../domain/common/ILogger';
import { RateLimitError } from '../../domain/common/Errors';
import { sendError } from '../errors';

/**
 * Per-caller rate limit, keyed by actor when authenticated and by remote address otherwise.
 */
export function rateLimit(limiter: SlidingWindowRateLimiter, limits: RateLimitConfig, logger: ILogger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = req.actor ? `actor:${req.actor.id}` : `ip:${req.ip || 'unknown'}`;
    const decision = limiter.consume(key);

    res.setHeader('X-RateLimit-Limit', String(limits.maxRequests));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      logger.warn('Rate limit exceeded', { key, retryAfterMs: decision.retryAfterMs });
      res.setHeader('Retry-After', String(Math.ceil(decision.retryAfterMs / 1000)));
      return sendError(new RateLimitError(limits.maxRequests, limits.windowMs, decision.retryAfterMs), res, logger);
    }
    next();
  };
}
