/**
 * LeaderboardConfigService.ts
 *
 * One leaderboard configuration per track: required weather, grip level,
 * allowed car classes and session settings. Configs are written by upsert and
 * removed together with every lap time recorded on the track.
 */

import { type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { asc, eq, sql } from 'drizzle-orm';
import { leaderboard, lapTime, type Leaderboard } from '../db/schema';
import { withDatabaseErrors } from '../errors';
import { StructuredLogger } from '../types/Logger';
import type { LeaderboardConfigResponse } from '../../../shared/api';

export interface LeaderboardConfigInput {
  track: string;
  discordChannel: string;
  weather: {
    condition: number;
    temperature: number;
    rain: number;
    gripLevel: number | null;
  };
  allowedClasses: number[];
  showTechnical: boolean;
  timeOfDay: number;
  fixedSetupRequired: boolean;
}

/**
 * Convert a stored config to the wire shape served at GET /leaderboard/:track
 */
export function toLeaderboardResponse(row: Leaderboard): LeaderboardConfigResponse {
  return {
    track: row.track,
    discord_channel: row.discord_channel,
    weather: {
      condition: row.weather_condition,
      temperature: row.weather_temperature,
      rain: row.weather_rain,
      grip_level: row.grip_level
    },
    classes: row.allowed_classes,
    show_technical: row.show_technical,
    tod: row.time_of_day,
    fixed_setup: row.fixed_setup
  };
}

export class LeaderboardConfigService {
  constructor(
    private drizzleDb: BetterSQLite3Database,
    private logger: StructuredLogger = new StructuredLogger('Leaderboard')
  ) {}

  get(track: string): Leaderboard | null {
    return withDatabaseErrors('fetching leaderboard', () => {
      const row = this.drizzleDb
        .select()
        .from(leaderboard)
        .where(eq(leaderboard.track, track))
        .get();
      return row ?? null;
    });
  }

  list(): Leaderboard[] {
    return withDatabaseErrors('fetching leaderboards', () =>
      this.drizzleDb.select().from(leaderboard).orderBy(asc(leaderboard.track)).all()
    );
  }

  /**
   * Insert a config, or replace every field of the existing one for the track
   */
  upsert(input: LeaderboardConfigInput): Leaderboard {
    const values = {
      discord_channel: input.discordChannel,
      weather_condition: input.weather.condition,
      weather_temperature: input.weather.temperature,
      weather_rain: input.weather.rain,
      grip_level: input.weather.gripLevel,
      allowed_classes: [...new Set(input.allowedClasses)].sort((a, b) => a - b),
      show_technical: input.showTechnical,
      time_of_day: input.timeOfDay,
      fixed_setup: input.fixedSetupRequired
    };

    const saved = withDatabaseErrors('saving leaderboard', () =>
      this.drizzleDb
        .insert(leaderboard)
        .values({ track: input.track, ...values })
        .onConflictDoUpdate({
          target: leaderboard.track,
          set: { ...values, updated_at: sql`CURRENT_TIMESTAMP` }
        })
        .returning()
        .get()
    );

    this.logger.info(`Saved leaderboard for track '${input.track}'`);
    return saved;
  }

  /**
   * Remove a config and all lap times on its track in one transaction
   * @returns false when no config existed for the track
   */
  remove(track: string): boolean {
    const removed = withDatabaseErrors('removing leaderboard', () =>
      this.drizzleDb.transaction((tx) => {
        tx.delete(lapTime).where(eq(lapTime.track, track)).run();
        const result = tx.delete(leaderboard).where(eq(leaderboard.track, track)).run();
        return result.changes > 0;
      }, { behavior: 'immediate' })
    );

    if (removed) {
      this.logger.info(`Removed leaderboard for track '${track}'`);
    } else {
      this.logger.warn(`No leaderboard found to remove for track '${track}'`);
    }
    return removed;
  }
}
