import { Request, Response, NextFunction, RequestHandler } from 'express';
import crypto from 'crypto';
import { AuthenticationError } from './errorHandler';

const secureCompare = (a: string, b: string): boolean => {
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
};

/**
 * Requires `Authorization: Bearer <token>` matching the configured token.
 * Without a configured token every request passes.
 */
export const createBearerAuth = (expectedToken?: string): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      next(new AuthenticationError('Authentication required'));
      return;
    }

    const [type, token] = authHeader.split(' ');
    if (type !== 'Bearer' || !token) {
      res.setHeader('WWW-Authenticate', 'Bearer');
      next(new AuthenticationError('Invalid authentication format'));
      return;
    }

    if (!secureCompare(token, expectedToken)) {
      res.setHeader('WWW-Authenticate', 'Bearer error="invalid_token"');
      next(new AuthenticationError('Invalid credentials'));
      return;
    }

    next();
  };
};
