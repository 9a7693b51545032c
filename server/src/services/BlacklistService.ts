/**
 * BlacklistService.ts
 *
 * Drivers on the blacklist cannot submit lap times.
 */

import { type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { asc, eq } from 'drizzle-orm';
import { blacklist, type BlacklistEntry } from '../db/schema';
import { withDatabaseErrors } from '../errors';
import { StructuredLogger } from '../types/Logger';

export class BlacklistService {
  constructor(
    private drizzleDb: BetterSQLite3Database,
    private logger: StructuredLogger = new StructuredLogger('Blacklist')
  ) {}

  isBlacklisted(driverId: string): boolean {
    return withDatabaseErrors('checking blacklist', () => {
      const row = this.drizzleDb
        .select({ id: blacklist.id })
        .from(blacklist)
        .where(eq(blacklist.driver_id, driverId))
        .get();
      return row !== undefined;
    });
  }

  /**
   * Add a driver to the blacklist
   * @returns false when the driver was already listed
   */
  add(driverId: string, reason: string | null = null): boolean {
    const added = withDatabaseErrors('adding to blacklist', () =>
      this.drizzleDb
        .insert(blacklist)
        .values({ driver_id: driverId, reason })
        .onConflictDoNothing({ target: blacklist.driver_id })
        .run().changes > 0
    );
    if (added) {
      this.logger.warn('Driver blacklisted', driverId);
    }
    return added;
  }

  /**
   * @returns false when the driver was not listed
   */
  remove(driverId: string): boolean {
    const removed = withDatabaseErrors('removing from blacklist', () =>
      this.drizzleDb.delete(blacklist).where(eq(blacklist.driver_id, driverId)).run().changes > 0
    );
    if (removed) {
      this.logger.info('Driver removed from blacklist', driverId);
    }
    return removed;
  }

  list(): BlacklistEntry[] {
    return withDatabaseErrors('fetching blacklist', () =>
      this.drizzleDb.select().from(blacklist).orderBy(asc(blacklist.blacklisted_at), asc(blacklist.id)).all()
    );
  }
}
