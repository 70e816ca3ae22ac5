import { Request, Response, NextFunction } from 'express';
import { AppError } from '../domain/common/Errors';
import { ILogger } from '../domain/common/ILogger';

/**
 * Write an error response. Known errors keep their status and code;
 * anything else is a 500 and gets logged.
 */
export function sendError(err: unknown, res: Response, logger: ILogger): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(err.message, err);
    }
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('Unhandled error:', error);
  res.status(500).json({
    error: true,
    statusCode: 500,
    code: 'INTERNAL_ERROR',
    message: error.message
  });
}

/**
 * Terminal Express error middleware.
 */
export function createErrorMiddleware(logger: ILogger) {
  return (err: Error, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    // Malformed JSON bodies surface from express.json() as a 400 SyntaxError
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({
        error: true,
        statusCode: 400,
        code: 'INVALID_ARGUMENT',
        message: 'Malformed JSON body'
      });
      return;
    }
    sendError(err, res, logger);
  };
}
