/**
 * LapTimeService.ts
 *
 * Best-time submission policy and standings.
 *
 * A driver holds at most one record per track. A submission replaces it only
 * when its lap time is strictly faster, so the stored time for a
 * (track, driver) pair never increases.
 */

import { type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { and, asc, eq, isNotNull, sql } from 'drizzle-orm';
import { lapTime } from '../db/schema';
import { withDatabaseErrors } from '../errors';
import { StructuredLogger } from '../types/Logger';

export interface SubmittedTimes {
  lap: number | null;
  sector1: number | null;
  sector2: number | null;
}

export interface StandingsEntry {
  position: number;
  driver_name: string;
  car: string;
  car_class: string | null;
  lap_time: number;
  sector1: number | null;
  sector2: number | null;
  sector3: number | null;
  technical: boolean;
}

/** Sector value recorded when the game could not report the boundary */
export const SECTOR_UNAVAILABLE = -1;

function roundMillis(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Split cumulative sector boundaries into per-sector durations.
 * A duration is null when either boundary it depends on is unavailable.
 */
export function sectorSplits(
  lap: number,
  sector1: number | null,
  sector2: number | null
): { sector1: number | null; sector2: number | null; sector3: number | null } {
  const s1Valid = sector1 !== null && sector1 > 0;
  const s2Valid = sector2 !== null && sector2 > 0;
  return {
    sector1: s1Valid ? roundMillis(sector1) : null,
    sector2: s1Valid && s2Valid ? roundMillis(sector2 - sector1) : null,
    sector3: s2Valid ? roundMillis(lap - sector2) : null
  };
}

export class LapTimeService {
  constructor(
    private drizzleDb: BetterSQLite3Database,
    private logger: StructuredLogger = new StructuredLogger('LapTime')
  ) {}

  /**
   * Store a lap time if it is the driver's first on the track or strictly
   * faster than the stored one. The read and the write share one IMMEDIATE
   * transaction so concurrent submissions for the same key are serialized.
   *
   * @returns true when the submission was stored
   */
  submitLapTime(
    track: string,
    driverId: string,
    driverName: string,
    car: string,
    carClass: string,
    times: SubmittedTimes
  ): boolean {
    const newLap = times.lap;

    const accepted = withDatabaseErrors('submitting lap time', () =>
      this.drizzleDb.transaction((tx) => {
        const existing = tx
          .select({ id: lapTime.id, lap_time: lapTime.lap_time })
          .from(lapTime)
          .where(and(eq(lapTime.track, track), eq(lapTime.driver_id, driverId)))
          .get();

        if (!existing) {
          tx.insert(lapTime).values({
            track,
            driver_id: driverId,
            driver_name: driverName,
            car,
            car_class: carClass,
            lap_time: newLap,
            sector1: times.sector1,
            sector2: times.sector2
          }).run();
          return true;
        }

        const improves = newLap !== null && (existing.lap_time === null || newLap < existing.lap_time);
        if (!improves) {
          return false;
        }

        tx.update(lapTime)
          .set({
            driver_name: driverName,
            car,
            car_class: carClass,
            lap_time: newLap,
            sector1: times.sector1,
            sector2: times.sector2,
            updated_at: sql`CURRENT_TIMESTAMP`
          })
          .where(eq(lapTime.id, existing.id))
          .run();
        return true;
      }, { behavior: 'immediate' })
    );

    if (accepted) {
      this.logger.success(`Stored ${newLap?.toFixed(3)}s on '${track}'`, driverName);
    } else {
      this.logger.info(`Kept existing best on '${track}', ${newLap?.toFixed(3)}s is not faster`, driverName);
    }
    return accepted;
  }

  /**
   * Stored best for a driver on a track, or null when none
   */
  getBest(track: string, driverId: string): number | null {
    return withDatabaseErrors('fetching lap time', () => {
      const row = this.drizzleDb
        .select({ lap_time: lapTime.lap_time })
        .from(lapTime)
        .where(and(eq(lapTime.track, track), eq(lapTime.driver_id, driverId)))
        .get();
      return row?.lap_time ?? null;
    });
  }

  /**
   * Lap times for a track, fastest first, with per-sector durations.
   * Laps with an unavailable sector are listed only when showTechnical is set.
   */
  getStandings(track: string, showTechnical: boolean): StandingsEntry[] {
    const rows = withDatabaseErrors('fetching lap times', () =>
      this.drizzleDb
        .select()
        .from(lapTime)
        .where(and(eq(lapTime.track, track), isNotNull(lapTime.lap_time)))
        .orderBy(asc(lapTime.lap_time), asc(lapTime.id))
        .all()
    );

    const entries: StandingsEntry[] = [];
    for (const row of rows) {
      if (row.lap_time === null) continue;
      const technical = row.sector1 === SECTOR_UNAVAILABLE || row.sector2 === SECTOR_UNAVAILABLE;
      if (technical && !showTechnical) continue;

      entries.push({
        position: entries.length + 1,
        driver_name: row.driver_name,
        car: row.car,
        car_class: row.car_class,
        lap_time: row.lap_time,
        ...sectorSplits(row.lap_time, row.sector1, row.sector2),
        technical
      });
    }
    return entries;
  }

  /**
   * Delete every lap time on a track
   * @returns number of records removed
   */
  clearTimes(track: string): number {
    const removed = withDatabaseErrors('clearing lap times', () =>
      this.drizzleDb.delete(lapTime).where(eq(lapTime.track, track)).run().changes
    );
    this.logger.info(`Cleared ${removed} lap time(s) on '${track}'`);
    return removed;
  }
}
