/**
 * express.ts
 *
 * Fields the auth middleware attaches to authenticated requests.
 */

import type { AuthenticatedDriver } from '../services/AuthSessionService';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      driver?: AuthenticatedDriver;
      authToken?: string;
    }
  }
}

export {};
