/**
 * accessControl.ts
 *
 * Request gates driven by the route table. Rate limiting is registered before
 * authentication so unauthenticated floods are still counted.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { getRoutePolicy } from './routeTable';
import type { RateLimiter } from '../services/RateLimiter';
import type { AuthSessionService, AuthenticatedDriver } from '../services/AuthSessionService';
import { DatabaseError } from '../errors';

const BEARER_PREFIX = 'Bearer ';

export type HeaderLookup = (name: string) => string | undefined;

export const headersOf = (req: Request): HeaderLookup => (name) => req.get(name);

/**
 * Identity a request is rate limited under: the first forwarded address,
 * then a bearer token prefix, then the real-IP header.
 */
export function getClientId(header: HeaderLookup): string {
  const forwarded = header('X-Forwarded-For');
  if (forwarded) {
    return forwarded.split(',')[0].trim();
  }

  const auth = header('Authorization');
  if (auth && auth.startsWith(BEARER_PREFIX)) {
    return `token:${auth.slice(BEARER_PREFIX.length, BEARER_PREFIX.length + 16)}`;
  }

  return header('X-Real-IP') || 'unknown';
}

export function getBearerToken(header: HeaderLookup): string | null {
  const auth = header('Authorization');
  if (!auth || !auth.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = auth.slice(BEARER_PREFIX.length);
  return token.length > 0 ? token : null;
}

/**
 * Driver attached by the auth middleware
 * @throws {Error} If used on a route the auth middleware does not guard
 */
export function getDriver(req: Request): AuthenticatedDriver {
  if (!req.driver) {
    throw new Error(`No authenticated driver on ${req.path}`);
  }
  return req.driver;
}

export function createRateLimitMiddleware(rateLimiter: RateLimiter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const policy = getRoutePolicy(req.path);
    if (!policy) {
      next();
      return;
    }

    const clientId = getClientId(headersOf(req));
    const { limited, retryAfterSeconds } = rateLimiter.checkAndRecord(clientId, policy.limiter);
    if (limited) {
      console.warn(`[RATE LIMIT] ${clientId} exceeded ${policy.limiter} limit on ${req.path}`);
      res.status(429).json({ error: 'Rate limit exceeded', retry_after: retryAfterSeconds });
      return;
    }
    next();
  };
}

export function createAuthMiddleware(authSessionService: AuthSessionService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const policy = getRoutePolicy(req.path);
    if (!policy || !policy.auth) {
      next();
      return;
    }

    const token = getBearerToken(headersOf(req));
    if (!token) {
      console.warn(`[AUTH] Missing auth token for ${req.path}`);
      res.status(401).json({ error: 'Missing Authorization header' });
      return;
    }

    let driver: AuthenticatedDriver | null;
    try {
      driver = authSessionService.getByToken(token);
    } catch (error) {
      if (error instanceof DatabaseError) {
        console.error(`[AUTH] ${error.message}`);
        res.status(500).json({ error: 'Internal server error' });
        return;
      }
      throw error;
    }

    if (!driver) {
      console.warn(`[AUTH] Invalid token for ${req.path}`);
      res.status(401).json({ error: 'Invalid token' });
      return;
    }

    req.driver = driver;
    req.authToken = token;
    next();
  };
}
