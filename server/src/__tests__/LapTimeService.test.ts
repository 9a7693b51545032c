import type { Database } from 'better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { LapTimeService, sectorSplits } from '../services/LapTimeService';
import { LeaderboardConfigService } from '../services/LeaderboardConfigService';
import { lapTime } from '../db/schema';
import { DatabaseError } from '../errors';
import { createCollectingLoggerCallback, LogLevel, StructuredLogger } from '../types/Logger';
import { leaderboardInput, setupTestDb, silentLogger, teardownTestDb } from './testDataHelpers';

describe('LapTimeService', () => {
  let db: Database;
  let drizzleDb: BetterSQLite3Database;
  let service: LapTimeService;

  const submit = (driverId: string, lap: number | null, sector1: number | null = 30, sector2: number | null = 60) =>
    service.submitLapTime('SPAWEC', driverId, `Driver ${driverId}`, 'Test GT3', 'GT3', { lap, sector1, sector2 });

  beforeEach(() => {
    ({ db, drizzleDb } = setupTestDb());
    new LeaderboardConfigService(drizzleDb, silentLogger()).upsert(leaderboardInput());
    service = new LapTimeService(drizzleDb, silentLogger());
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  describe('submitLapTime', () => {
    it('should insert the first time for a driver', () => {
      expect(submit('d1', 90.0)).toBe(true);
      expect(service.getBest('SPAWEC', 'd1')).toBe(90.0);
    });

    it('should keep the best of 90.0, 89.5, 91.0 and reject the slower third', () => {
      expect(submit('d1', 90.0)).toBe(true);
      expect(submit('d1', 89.5)).toBe(true);
      expect(submit('d1', 91.0)).toBe(false);
      expect(service.getBest('SPAWEC', 'd1')).toBe(89.5);
    });

    it('should reject an equal time without touching the record', () => {
      submit('d1', 90.0, 30, 60);
      expect(submit('d1', 90.0, 29, 59)).toBe(false);

      const row = drizzleDb.select().from(lapTime).get();
      expect(row?.sector1).toBe(30);
      expect(row?.sector2).toBe(60);
    });

    it('should never increase the stored time across a sequence of submissions', () => {
      const sequence = [95.2, 96.0, 94.1, 94.1, 99.9, 93.7, 94.0, 93.8];
      let best = Infinity;
      for (const lap of sequence) {
        submit('d1', lap);
        const stored = service.getBest('SPAWEC', 'd1');
        expect(stored).not.toBeNull();
        expect(stored).toBeLessThanOrEqual(best);
        best = Math.min(best, lap);
        expect(stored).toBe(best);
      }
    });

    it('should overwrite name, car, class and sectors on improvement', () => {
      submit('d1', 90.0, 30, 60);
      service.submitLapTime('SPAWEC', 'd1', 'Renamed', 'Other Car', 'GTE', { lap: 88.0, sector1: -1, sector2: 58 });

      const row = drizzleDb.select().from(lapTime).get();
      expect(row).toMatchObject({
        driver_name: 'Renamed',
        car: 'Other Car',
        car_class: 'GTE',
        lap_time: 88.0,
        sector1: -1,
        sector2: 58
      });
    });

    it('should let any real time replace a stored null time', () => {
      expect(submit('d1', null)).toBe(true);
      expect(service.getBest('SPAWEC', 'd1')).toBeNull();
      expect(submit('d1', 120.0)).toBe(true);
      expect(service.getBest('SPAWEC', 'd1')).toBe(120.0);
    });

    it('should reject a null time against a stored time', () => {
      submit('d1', 90.0);
      expect(submit('d1', null)).toBe(false);
      expect(service.getBest('SPAWEC', 'd1')).toBe(90.0);
    });

    it('should keep records of different drivers apart', () => {
      submit('d1', 90.0);
      submit('d2', 95.0);
      expect(service.getBest('SPAWEC', 'd1')).toBe(90.0);
      expect(service.getBest('SPAWEC', 'd2')).toBe(95.0);
    });

    it('should wrap storage failures in DatabaseError', () => {
      expect(() =>
        service.submitLapTime('NO_SUCH_TRACK', 'd1', 'Driver', 'Car', 'GT3', { lap: 90, sector1: 30, sector2: 60 })
      ).toThrow(DatabaseError);
    });

    it('should log accepted and rejected submissions', () => {
      const [callback, getLogs] = createCollectingLoggerCallback();
      service = new LapTimeService(drizzleDb, new StructuredLogger('LapTime', callback));

      submit('d1', 90.0);
      submit('d1', 91.0);

      const logs = getLogs();
      expect(logs.map(l => l.level)).toEqual([LogLevel.Success, LogLevel.Info]);
      expect(logs[0].message).toBe("Stored 90.000s on 'SPAWEC'");
      expect(logs[0].subject).toBe('Driver d1');
    });
  });

  describe('sectorSplits', () => {
    it('should turn boundaries into durations', () => {
      expect(sectorSplits(90.5, 30.1, 60.3)).toEqual({ sector1: 30.1, sector2: 30.2, sector3: 30.2 });
    });

    it('should null out durations that depend on an unavailable boundary', () => {
      expect(sectorSplits(89, -1, 59)).toEqual({ sector1: null, sector2: null, sector3: 30 });
      expect(sectorSplits(89, 29, -1)).toEqual({ sector1: 29, sector2: null, sector3: null });
    });
  });

  describe('getStandings', () => {
    beforeEach(() => {
      submit('d1', 90.5, 30.1, 60.3);
      submit('d2', 89.0, -1, 59);
      submit('d3', 91.25, 31, 61);
    });

    it('should order fastest first and hide technical laps by default', () => {
      const standings = service.getStandings('SPAWEC', false);
      expect(standings.map(s => [s.position, s.driver_name, s.lap_time])).toEqual([
        [1, 'Driver d1', 90.5],
        [2, 'Driver d3', 91.25]
      ]);
      expect(standings[0]).toMatchObject({ sector1: 30.1, sector2: 30.2, sector3: 30.2, technical: false });
    });

    it('should include technical laps when enabled', () => {
      const standings = service.getStandings('SPAWEC', true);
      expect(standings.map(s => s.driver_name)).toEqual(['Driver d2', 'Driver d1', 'Driver d3']);
      expect(standings[0]).toMatchObject({ position: 1, sector1: null, sector2: null, sector3: 30, technical: true });
    });

    it('should be empty for a track without times', () => {
      expect(service.getStandings('MONZAWEC', true)).toEqual([]);
    });
  });

  describe('clearTimes', () => {
    it('should remove every time on the track', () => {
      submit('d1', 90.0);
      submit('d2', 91.0);
      expect(service.clearTimes('SPAWEC')).toBe(2);
      expect(service.getStandings('SPAWEC', true)).toEqual([]);
    });
  });
});
