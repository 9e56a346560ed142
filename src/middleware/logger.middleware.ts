import { Request, Response, NextFunction } from 'express';
import logger from '../config/logger';
import '../types';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} - ${durationMs.toFixed(1)}ms`, {
      ip: req.ip,
      userId: req.user?.userId,
    });
  });

  next();
};
