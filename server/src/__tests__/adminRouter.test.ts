import request from 'supertest';
import { TRPCError } from '@trpc/server';
import { appRouter } from '../routers';
import { createContext, type Context } from '../trpc/context';
import { createTestServer, leaderboardInput, teardownTestDb, type TestServer } from './testDataHelpers';

describe('admin router', () => {
  let server: TestServer;

  const contextFor = (driver: Context['driver'], isAdmin: boolean): Context => ({
    services: server,
    driver,
    isAdmin
  });

  const adminCaller = () => appRouter.createCaller(contextFor({ driverId: 'admin-1', driverName: 'Admin' }, true));

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    server = createTestServer({ adminDriverIds: ['admin-1'] });
  });

  afterEach(() => {
    teardownTestDb(server.db);
    jest.restoreAllMocks();
  });

  describe('authorization', () => {
    it('should reject anonymous callers with UNAUTHORIZED', async () => {
      const caller = appRouter.createCaller(createContext({ services: server }));
      await expect(caller.leaderboard.list()).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });

    it('should reject non-admin drivers with FORBIDDEN', async () => {
      const caller = appRouter.createCaller(contextFor({ driverId: 'd1', driverName: 'Alice' }, false));
      await expect(caller.blacklist.list()).rejects.toBeInstanceOf(TRPCError);
      await expect(caller.blacklist.list()).rejects.toMatchObject({ code: 'FORBIDDEN' });
    });

    it('should leave health public', async () => {
      const caller = appRouter.createCaller(createContext({ services: server }));
      await expect(caller.health()).resolves.toBe('ok');
    });

    it('should resolve admins from the bearer token over HTTP', async () => {
      const token = server.authSessionService.createSession('admin-1', 'Admin');
      const res = await request(server.app)
        .get('/trpc/leaderboard.list')
        .set('Authorization', `Bearer ${token}`);
      expect(res.status).toBe(200);
      expect(res.body.result.data).toEqual([]);
    });

    it('should refuse HTTP callers whose driver is not an admin', async () => {
      const token = server.authSessionService.createSession('d1', 'Alice');
      const res = await request(server.app)
        .get('/trpc/leaderboard.list')
        .set('Authorization', `Bearer ${token}`);
      expect(res.status).toBe(403);
    });
  });

  describe('leaderboard', () => {
    it('should upsert and list leaderboards', async () => {
      const caller = adminCaller();
      const saved = await caller.leaderboard.upsert(leaderboardInput({ track: 'MONZAWEC', allowedClasses: [3, 0] }));
      expect(saved.classes).toEqual([0, 3]);

      const all = await caller.leaderboard.list();
      expect(all.map(l => l.track)).toEqual(['MONZAWEC']);
    });

    it('should validate codes on upsert', async () => {
      const caller = adminCaller();
      await expect(
        caller.leaderboard.upsert(leaderboardInput({ allowedClasses: [9] }))
      ).rejects.toMatchObject({ code: 'BAD_REQUEST' });
      await expect(
        caller.leaderboard.upsert(leaderboardInput({ weather: { condition: 11, temperature: 20, rain: 0, gripLevel: null } }))
      ).rejects.toMatchObject({ code: 'BAD_REQUEST' });
    });

    it('should remove a leaderboard and report NOT_FOUND for unknown tracks', async () => {
      const caller = adminCaller();
      await caller.leaderboard.upsert(leaderboardInput());
      await expect(caller.leaderboard.remove({ track: 'SPAWEC' })).resolves.toEqual({ removed: true });
      await expect(caller.leaderboard.remove({ track: 'SPAWEC' })).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('should serve standings publicly with splits and clear them', async () => {
      const caller = adminCaller();
      await caller.leaderboard.upsert(leaderboardInput());
      server.lapTimeService.submitLapTime('SPAWEC', 'd1', 'Alice', 'Test GT3', 'GT3', { lap: 90.5, sector1: 30.1, sector2: 60.3 });
      server.lapTimeService.submitLapTime('SPAWEC', 'd2', 'Bob', 'Test GT3', 'GT3', { lap: 89, sector1: -1, sector2: 59 });

      const publicCaller = appRouter.createCaller(createContext({ services: server }));
      const standings = await publicCaller.leaderboard.standings({ track: 'SPAWEC' });
      expect(standings.times).toEqual([
        {
          position: 1,
          driver_name: 'Alice',
          car: 'Test GT3',
          car_class: 'GT3',
          lap_time: 90.5,
          sector1: 30.1,
          sector2: 30.2,
          sector3: 30.2,
          technical: false
        }
      ]);

      await expect(caller.leaderboard.clearTimes({ track: 'SPAWEC' })).resolves.toEqual({ removed: 2 });
      const cleared = await publicCaller.leaderboard.standings({ track: 'SPAWEC' });
      expect(cleared.times).toEqual([]);
    });
  });

  describe('blacklist', () => {
    it('should add, list and remove drivers', async () => {
      const caller = adminCaller();
      await expect(caller.blacklist.add({ driverId: 'd1', reason: 'test' })).resolves.toEqual({ added: true });
      await expect(caller.blacklist.add({ driverId: 'd1' })).resolves.toEqual({ added: false });

      const listed = await caller.blacklist.list();
      expect(listed.map(e => [e.driver_id, e.reason])).toEqual([['d1', 'test']]);

      await expect(caller.blacklist.remove({ driverId: 'd1' })).resolves.toEqual({ removed: true });
      expect(server.blacklistService.isBlacklisted('d1')).toBe(false);
    });
  });
});
