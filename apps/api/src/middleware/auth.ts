import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { AppError } from './error-handler.js';

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  name: z.string().optional(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      user?: TokenPayload;
    }
  }
}

/**
 * Verify a bearer token issued by the COBRA API
 */
export function verifyToken(token: string, secret: string): TokenPayload | null {
  try {
    const decoded = jwt.verify(token, secret);
    const parsed = tokenPayloadSchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Constant-time string comparison
 */
export function safeCompare(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * Authentication middleware
 * Verifies JWT token and attaches user to request
 */
export function authMiddleware(jwtSecret: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = req.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      next(new AppError('UNAUTHORIZED'));
      return;
    }

    const payload = jwtSecret ? verifyToken(token, jwtSecret) : null;

    if (!payload) {
      next(new AppError('UNAUTHORIZED', 'Invalid or expired token'));
      return;
    }

    req.user = payload;
    next();
  };
}

/**
 * API key middleware for calls made by the platform bots
 */
export function apiKeyMiddleware(apiKey: string) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const provided = req.headers['x-api-key'];

    if (!apiKey || typeof provided !== 'string' || !safeCompare(provided, apiKey)) {
      next(new AppError('UNAUTHORIZED', 'Invalid API key'));
      return;
    }

    next();
  };
}

/**
 * Display name of the authenticated user, for audit columns
 */
export function currentActor(req: Request): string {
  return req.user?.name ?? req.user?.userId ?? 'unknown';
}
