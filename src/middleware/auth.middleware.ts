import { Request, Response, NextFunction } from 'express';
import { verifyAccessToken } from '../config/jwt';
import { ApiError } from '../utils/ApiError';
import '../types';

function getBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) return null;
  const token = authHeader.split(' ')[1];
  return token || null;
}

export const authenticate = (req: Request, _res: Response, next: NextFunction) => {
  const token = getBearerToken(req);
  if (!token) throw ApiError.unauthorized('No token provided');

  const decoded = verifyAccessToken(token);
  req.user = {
    userId: decoded.userId,
    email: decoded.email,
    role: decoded.role,
  };
  next();
};

/**
 * The authenticated learner's id. Only valid behind `authenticate`.
 */
export const currentUserId = (req: Request): string => {
  if (!req.user) throw ApiError.unauthorized('User not authenticated');
  return req.user.userId;
};
