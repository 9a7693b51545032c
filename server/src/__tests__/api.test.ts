import request from 'supertest';
import { createTestServer, leaderboardInput, teardownTestDb, type TestServer } from './testDataHelpers';

describe('Leaderboard Backend API', () => {
  let server: TestServer;
  let token: string;

  const validSubmission = (overrides: Record<string, unknown> = {}) => ({
    time_data: { lap: 90.5, sector1: 30.1, sector2: 60.3 },
    car: 'Test GT3',
    driver_name: 'Alice',
    class: 'GT3',
    ...overrides
  });

  const submit = (body: unknown, track = 'SPAWEC') =>
    request(server.app)
      .post(`/leaderboard/${track}/submit`)
      .set('Authorization', `Bearer ${token}`)
      .set('Content-Type', 'application/json')
      .send(typeof body === 'string' ? body : JSON.stringify(body));

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});

    server = createTestServer();
    server.leaderboardConfigService.upsert(leaderboardInput());
    token = server.authSessionService.createSession('driver-1', 'Alice');
  });

  afterEach(() => {
    teardownTestDb(server.db);
    jest.restoreAllMocks();
  });

  describe('public routes', () => {
    it('GET /health should answer ok', async () => {
      const res = await request(server.app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
    });

    it('GET /version should return the backend version', async () => {
      const res = await request(server.app).get('/version');
      expect(res.body).toEqual({ version: '9.9.9' });
    });

    it('GET /cars should return the car model table', async () => {
      const res = await request(server.app).get('/cars');
      expect(res.body).toEqual({ abcdef0123456789: 'Test GT3' });
    });
  });

  describe('GET /leaderboard/:track', () => {
    it('should return the configuration', async () => {
      const res = await request(server.app).get('/leaderboard/SPAWEC');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        track: 'SPAWEC',
        discord_channel: 'channel-1',
        weather: { condition: 0, temperature: 25, rain: 0, grip_level: 4 },
        classes: [0],
        show_technical: false,
        tod: 720,
        fixed_setup: false
      });
    });

    it('should return 404 for an unconfigured track', async () => {
      const res = await request(server.app).get('/leaderboard/MONZAWEC');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Leaderboard not found' });
    });
  });

  describe('POST /leaderboard/:track/submit', () => {
    it('should store a valid submission', async () => {
      const res = await submit(validSubmission());
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Time submitted successfully' });
      expect(server.lapTimeService.getBest('SPAWEC', 'driver-1')).toBe(90.5);
    });

    it('should answer 200 even when the time does not improve', async () => {
      await submit(validSubmission());
      const res = await submit(validSubmission({ time_data: { lap: 95, sector1: 31, sector2: 62 } }));
      expect(res.status).toBe(200);
      expect(server.lapTimeService.getBest('SPAWEC', 'driver-1')).toBe(90.5);
    });

    it('should reject a lap time of 0', async () => {
      const res = await submit(validSubmission({ time_data: { lap: 0, sector1: 30, sector2: 60 } }));
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'lap_time must be greater than 0' });
    });

    it('should accept sector1 = -1 as unavailable', async () => {
      const res = await submit(validSubmission({ time_data: { lap: 90, sector1: -1, sector2: 60 } }));
      expect(res.status).toBe(200);
    });

    it('should reject sector1 = 0', async () => {
      const res = await submit(validSubmission({ time_data: { lap: 90, sector1: 0, sector2: 60 } }));
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'sector1 must be -1 or greater than 0' });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await submit('{"time_data":');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid JSON body' });
    });

    it('should return 404 for an unconfigured track after validation', async () => {
      const res = await submit(validSubmission(), 'MONZAWEC');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Leaderboard not found' });
    });

    it('should refuse blacklisted drivers before reading the body', async () => {
      server.blacklistService.add('driver-1');
      const res = await submit('not json at all');
      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'You are blacklisted' });
    });

    it('should require an Authorization header', async () => {
      const res = await request(server.app).post('/leaderboard/SPAWEC/submit').send(validSubmission());
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Missing Authorization header' });
    });

    it('should require an Authorization header on a trailing-slash or upper-case path', async () => {
      for (const path of ['/leaderboard/SPAWEC/submit/', '/LEADERBOARD/SPAWEC/SUBMIT']) {
        const res = await request(server.app).post(path).send(validSubmission());
        expect(res.status).toBe(401);
        expect(res.body).toEqual({ error: 'Missing Authorization header' });
      }
    });

    it('should reject unknown tokens', async () => {
      const res = await request(server.app)
        .post('/leaderboard/SPAWEC/submit')
        .set('Authorization', 'Bearer test-token')
        .send(validSubmission());
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid token' });
    });

    it('should return 500 without leaking storage errors', async () => {
      jest.spyOn(server.lapTimeService, 'submitLapTime').mockImplementation(() => {
        throw new Error('SQLITE_BUSY: database is locked');
      });
      const res = await submit(validSubmission());
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error' });
    });
  });

  describe('rate limiting', () => {
    it('should answer 429 on the 11th submit within a minute', async () => {
      for (let i = 0; i < 10; i++) {
        const res = await submit(validSubmission());
        expect(res.status).toBe(200);
      }
      const res = await submit(validSubmission());
      expect(res.status).toBe(429);
      expect(res.body.error).toBe('Rate limit exceeded');
      expect(res.body.retry_after).toBeGreaterThan(0);
    });

    it('should count requests before checking auth', async () => {
      for (let i = 0; i < 10; i++) {
        await request(server.app).post('/user/logout').set('X-Real-IP', '198.51.100.2');
      }
      const res = await request(server.app).post('/user/logout').set('X-Real-IP', '198.51.100.2');
      expect(res.status).toBe(429);
    });

    it('should share one budget across path spellings of the same route', async () => {
      const paths = ['/leaderboard/SPAWEC', '/leaderboard/SPAWEC/', '/LEADERBOARD/SPAWEC'];
      for (let i = 0; i < 60; i++) {
        const res = await request(server.app).get(paths[i % paths.length]).set('X-Forwarded-For', '203.0.113.7');
        expect(res.status).toBe(200);
      }
      const res = await request(server.app).get('/leaderboard/SPAWEC/').set('X-Forwarded-For', '203.0.113.7');
      expect(res.status).toBe(429);
    });

    it('should not limit unmapped routes', async () => {
      for (let i = 0; i < 70; i++) {
        await request(server.app).get('/version');
      }
      const res = await request(server.app).get('/version');
      expect(res.status).toBe(200);
    });
  });

  describe('user routes', () => {
    it('GET /user should return the driver name', async () => {
      const res = await request(server.app).get('/user').set('Authorization', `Bearer ${token}`);
      expect(res.body).toEqual({ name: 'Alice' });
    });

    it('POST /user/logout should invalidate the token', async () => {
      const res = await request(server.app).post('/user/logout').set('Authorization', `Bearer ${token}`);
      expect(res.body).toEqual({ message: 'Logged out successfully' });

      const after = await request(server.app).get('/user').set('Authorization', `Bearer ${token}`);
      expect(after.status).toBe(401);
    });
  });

  describe('GET /discord', () => {
    it('should return the authorize URL with the given state', async () => {
      const res = await request(server.app).get('/discord').query({ state: 'abc123' });
      expect(res.status).toBe(200);
      const url = new URL(res.body.url);
      expect(url.origin + url.pathname).toBe('https://discord.com/oauth2/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('scope')).toBe('identify guilds');
      expect(url.searchParams.get('state')).toBe('abc123');
    });

    it('should reject a callback without code', async () => {
      const res = await request(server.app).get('/discord/callback');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Missing code parameter' });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(server.app).get('/nowhere');
    expect(res.status).toBe(404);
  });
});
