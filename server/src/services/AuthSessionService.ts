/**
 * AuthSessionService.ts
 *
 * Opaque bearer tokens issued at the end of the Discord login.
 * Every login creates a new token; earlier tokens of the same driver stay valid
 * until they are logged out.
 */

import { randomBytes } from 'crypto';
import { type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq } from 'drizzle-orm';
import { authSession } from '../db/schema';
import { withDatabaseErrors } from '../errors';
import { StructuredLogger } from '../types/Logger';

export interface AuthenticatedDriver {
  driverId: string;
  driverName: string;
}

export class AuthSessionService {
  constructor(
    private drizzleDb: BetterSQLite3Database,
    private logger: StructuredLogger = new StructuredLogger('Auth')
  ) {}

  /**
   * Issue a new token for a driver
   */
  createSession(driverId: string, driverName: string): string {
    const token = randomBytes(32).toString('base64url');
    withDatabaseErrors('creating auth session', () =>
      this.drizzleDb
        .insert(authSession)
        .values({ driver_id: driverId, driver_name: driverName, token })
        .run()
    );
    this.logger.success('Session created', driverName);
    return token;
  }

  getByToken(token: string): AuthenticatedDriver | null {
    return withDatabaseErrors('fetching auth session', () => {
      const row = this.drizzleDb
        .select({ driverId: authSession.driver_id, driverName: authSession.driver_name })
        .from(authSession)
        .where(eq(authSession.token, token))
        .get();
      return row ?? null;
    });
  }

  /**
   * Invalidate a single token
   * @returns false when the token was unknown
   */
  destroy(token: string): boolean {
    const removed = withDatabaseErrors('deleting auth session', () =>
      this.drizzleDb.delete(authSession).where(eq(authSession.token, token)).run().changes > 0
    );
    if (removed) {
      this.logger.info('Session destroyed');
    }
    return removed;
  }
}
