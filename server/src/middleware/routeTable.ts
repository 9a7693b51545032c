/**
 * routeTable.ts
 *
 * Static map of rate-limited and authenticated routes.
 * Routes not listed here bypass both rate limiting and auth.
 */

import type { LimiterClass } from '../services/RateLimiter';

export interface RoutePolicy {
  limiter: LimiterClass;
  auth: boolean;
}

export const ROUTES: Readonly<Record<string, RoutePolicy>> = {
  '/leaderboard/{track}': { limiter: 'general', auth: false },
  '/leaderboard/{track}/submit': { limiter: 'submit', auth: true },
  '/user': { limiter: 'general', auth: true },
  '/user/logout': { limiter: 'auth', auth: true },
  '/discord': { limiter: 'auth', auth: false },
  '/discord/callback': { limiter: 'auth', auth: false }
};

function isParamSegment(segment: string): boolean {
  return segment.startsWith('{') && segment.endsWith('}');
}

function segmentsOf(path: string): string[] {
  return path.split('/').filter(segment => segment.length > 0);
}

/**
 * Find the route pattern for a request path.
 * Matching follows Express routing: fixed segments compare case-insensitively
 * and a trailing slash is ignored. A {param} segment matches any value in that
 * position when the segment counts are equal.
 *
 * @returns the matching pattern, or null for unmapped paths
 */
export function matchRoute(path: string, routes: Readonly<Record<string, RoutePolicy>> = ROUTES): string | null {
  const pathParts = segmentsOf(path);
  for (const pattern of Object.keys(routes)) {
    const parts = segmentsOf(pattern);
    if (parts.length !== pathParts.length) {
      continue;
    }
    const matches = parts.every((part, i) =>
      isParamSegment(part) || part.toLowerCase() === pathParts[i].toLowerCase()
    );
    if (matches) {
      return pattern;
    }
  }
  return null;
}

export function getRoutePolicy(path: string): RoutePolicy | null {
  const pattern = matchRoute(path);
  return pattern === null ? null : ROUTES[pattern];
}
