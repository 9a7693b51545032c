import type { Database } from 'better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { LeaderboardConfigService, toLeaderboardResponse } from '../services/LeaderboardConfigService';
import { LapTimeService } from '../services/LapTimeService';
import { leaderboardInput, setupTestDb, silentLogger, teardownTestDb } from './testDataHelpers';

describe('LeaderboardConfigService', () => {
  let db: Database;
  let drizzleDb: BetterSQLite3Database;
  let service: LeaderboardConfigService;

  beforeEach(() => {
    ({ db, drizzleDb } = setupTestDb());
    service = new LeaderboardConfigService(drizzleDb, silentLogger());
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('should return null for an unknown track', () => {
    expect(service.get('SPAWEC')).toBeNull();
  });

  it('should insert a config and serve it in wire shape', () => {
    service.upsert(leaderboardInput({ allowedClasses: [5, 0, 5], fixedSetupRequired: true }));

    const row = service.get('SPAWEC');
    expect(row).not.toBeNull();
    if (!row) return;
    expect(toLeaderboardResponse(row)).toEqual({
      track: 'SPAWEC',
      discord_channel: 'channel-1',
      weather: { condition: 0, temperature: 25, rain: 0, grip_level: 4 },
      classes: [0, 5],
      show_technical: false,
      tod: 720,
      fixed_setup: true
    });
  });

  it('should replace every field on a second upsert for the same track', () => {
    service.upsert(leaderboardInput());
    service.upsert(leaderboardInput({
      discordChannel: 'channel-2',
      weather: { condition: 8, temperature: 14.5, rain: 60, gripLevel: null },
      allowedClasses: [3],
      showTechnical: true,
      timeOfDay: 0
    }));

    expect(service.list()).toHaveLength(1);
    const row = service.get('SPAWEC');
    expect(row).toMatchObject({
      discord_channel: 'channel-2',
      weather_condition: 8,
      weather_temperature: 14.5,
      weather_rain: 60,
      grip_level: null,
      allowed_classes: [3],
      show_technical: true,
      time_of_day: 0
    });
  });

  it('should list configs ordered by track', () => {
    service.upsert(leaderboardInput({ track: 'SPAWEC' }));
    service.upsert(leaderboardInput({ track: 'MONZAWEC' }));
    expect(service.list().map(l => l.track)).toEqual(['MONZAWEC', 'SPAWEC']);
  });

  it('should remove a config together with its lap times', () => {
    service.upsert(leaderboardInput());
    const lapTimes = new LapTimeService(drizzleDb, silentLogger());
    lapTimes.submitLapTime('SPAWEC', 'd1', 'Alice', 'Test GT3', 'GT3', { lap: 90, sector1: 30, sector2: 60 });

    expect(service.remove('SPAWEC')).toBe(true);
    expect(service.get('SPAWEC')).toBeNull();
    expect(lapTimes.getBest('SPAWEC', 'd1')).toBeNull();
  });

  it('should report false when removing an unknown track', () => {
    expect(service.remove('NOPE')).toBe(false);
  });
});
