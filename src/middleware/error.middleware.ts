import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../utils/ApiError';
import { QuizError } from '../utils/quizErrors';
import logger from '../config/logger';

export const errorHandler = (
  err: Error | ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  let apiError: ApiError;

  if (err instanceof ApiError) {
    apiError = err;
  } else if (err instanceof SyntaxError && 'body' in err) {
    // express.json() rejecting a malformed body
    apiError = ApiError.badRequest('Malformed JSON body');
  } else {
    apiError = new ApiError(500, err.message || 'Internal Server Error', false, err.stack);
  }

  const statusCode = apiError.statusCode || 500;

  // Unexpected failures keep their details out of production responses
  const exposeMessage = apiError.isOperational || process.env.NODE_ENV !== 'production';

  const response = {
    success: false,
    message: exposeMessage ? apiError.message : 'Internal Server Error',
    ...(apiError instanceof QuizError && { code: apiError.code }),
    ...(apiError instanceof QuizError && apiError.details && { details: apiError.details }),
    ...(process.env.NODE_ENV === 'development' && { stack: apiError.stack }),
  };

  // warn for 4xx, error for 5xx, info otherwise
  if (statusCode >= 500) {
    logger.error(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  } else if (statusCode >= 400) {
    logger.warn(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  } else {
    logger.info(`${statusCode} - ${apiError.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  const error = ApiError.notFound(`Route ${req.originalUrl} not found`);
  next(error);
};
