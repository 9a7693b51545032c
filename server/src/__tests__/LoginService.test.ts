import request from 'supertest';
import { createTestServer, teardownTestDb, type TestServer } from './testDataHelpers';
import { NotGuildMemberError } from '../services/LoginService';

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

function mockDiscord(options: { guilds?: string[]; tokenStatus?: number } = {}) {
  const { guilds = ['guild-other', 'guild-home'], tokenStatus = 200 } = options;
  return jest.spyOn(global, 'fetch').mockImplementation(async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    if (url.endsWith('/oauth2/token')) {
      return tokenStatus === 200
        ? json({ access_token: 'test-access-token', token_type: 'Bearer' })
        : json({ error: 'invalid_grant' }, tokenStatus);
    }
    if (url.endsWith('/users/@me')) {
      return json({ id: 'discord-42', username: 'alice', global_name: 'Alice' });
    }
    if (url.endsWith('/users/@me/guilds')) {
      return json(guilds.map(id => ({ id, name: id })));
    }
    return json({ message: 'Unknown' }, 404);
  });
}

describe('LoginService', () => {
  let server: TestServer;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    server = createTestServer();
  });

  afterEach(() => {
    teardownTestDb(server.db);
    jest.restoreAllMocks();
  });

  it('should exchange the code with basic auth and a form body', async () => {
    const fetchSpy = mockDiscord();
    await server.loginService.completeLogin('test-code', 'state-1');

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://discord.com/api/v10/oauth2/token');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('Authorization')).toBe(
      `Basic ${Buffer.from('test-client-id:test-secret').toString('base64')}`
    );
    const body = new URLSearchParams(String(init?.body));
    expect(body.get('grant_type')).toBe('authorization_code');
    expect(body.get('code')).toBe('test-code');
    expect(body.get('redirect_uri')).toBe('http://localhost:8000/discord/callback');
  });

  it('should issue a token for home guild members', async () => {
    mockDiscord();
    const login = await server.loginService.completeLogin('test-code', 'state-1');

    expect(login.driverId).toBe('discord-42');
    expect(login.driverName).toBe('alice');
    expect(server.authSessionService.getByToken(login.token)).toEqual({ driverId: 'discord-42', driverName: 'alice' });

    const redirect = new URL(login.redirectUrl);
    expect(redirect.origin + redirect.pathname).toBe('http://127.0.0.1:54783/callback');
    expect(redirect.searchParams.get('state')).toBe('state-1');
    expect(redirect.searchParams.get('code')).toBe(login.token);
    expect(redirect.searchParams.get('name')).toBe('alice');
  });

  it('should refuse users outside the home guild', async () => {
    mockDiscord({ guilds: ['guild-other'] });
    await expect(server.loginService.completeLogin('test-code', 'state-1')).rejects.toBeInstanceOf(NotGuildMemberError);
  });

  describe('GET /discord/callback', () => {
    it('should redirect to the recorder with the new token', async () => {
      mockDiscord();
      const res = await request(server.app).get('/discord/callback').query({ code: 'test-code', state: 'state-1' });

      expect(res.status).toBe(302);
      const location = new URL(res.headers.location);
      expect(location.searchParams.get('state')).toBe('state-1');
      expect(location.searchParams.get('name')).toBe('alice');
    });

    it('should answer 403 for non-members', async () => {
      mockDiscord({ guilds: [] });
      const res = await request(server.app).get('/discord/callback').query({ code: 'test-code' });
      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'You must be a member of the Discord server' });
    });

    it('should answer 400 when the code exchange fails', async () => {
      mockDiscord({ tokenStatus: 400 });
      const res = await request(server.app).get('/discord/callback').query({ code: 'bad-code' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Token exchange failed' });
    });
  });
});
