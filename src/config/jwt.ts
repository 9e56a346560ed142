import jwt, { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { ApiError } from '../utils/ApiError';

// Tokens are issued by the identity service; this app only verifies them.
// Signing is kept for tests and local tooling.
const ACCESS_SECRET = process.env.JWT_ACCESS_SECRET || 'access_secret_fallback';
const ACCESS_EXPIRY = process.env.JWT_ACCESS_EXPIRY || '15m';

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string().optional(),
  role: z.enum(['student', 'teacher']),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

const signOpts = (exp: string | number): SignOptions => ({ expiresIn: exp as SignOptions['expiresIn'] });

export const generateAccessToken = (payload: TokenPayload): string => {
  return jwt.sign(payload, ACCESS_SECRET, signOpts(ACCESS_EXPIRY));
};

export const verifyAccessToken = (token: string): TokenPayload => {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, ACCESS_SECRET);
  } catch (error) {
    throw ApiError.unauthorized('Invalid or expired access token');
  }

  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw ApiError.unauthorized('Access token is missing user id or role');
  }
  return parsed.data;
};
