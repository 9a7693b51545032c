/**
 * discordClient.ts
 *
 * Thin wrapper over the Discord REST API used by the login handoff:
 * - Exchange an authorization code for an access token
 * - Fetch the authorizing user and the guilds they belong to
 */

import { z } from 'zod';

const DISCORD_API = 'https://discord.com/api/v10';
const REQUEST_TIMEOUT_MS = 5000;

export const DISCORD_AUTHORIZE_URL = 'https://discord.com/oauth2/authorize';

const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string()
});

const userSchema = z.object({
  id: z.string(),
  username: z.string(),
  global_name: z.string().nullish()
});

const guildsSchema = z.array(z.object({ id: z.string() }));

export type DiscordUser = z.infer<typeof userSchema>;

export interface DiscordCredentials {
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
}

async function readJson(response: Response, what: string): Promise<unknown> {
  if (!response.ok) {
    const body = await response.text();
    throw new Error(`Discord ${what} failed: ${response.status} ${body.substring(0, 200)}`);
  }
  return response.json();
}

/**
 * Exchange an authorization code for a user access token
 * @throws {Error} If Discord rejects the code or the response is malformed
 */
export async function exchangeCode(code: string, credentials: DiscordCredentials): Promise<string> {
  const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
  const response = await fetch(`${DISCORD_API}/oauth2/token`, {
    method: 'POST',
    headers: {
      Authorization: `Basic ${basic}`,
      'Content-Type': 'application/x-www-form-urlencoded'
    },
    body: new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: credentials.callbackUrl
    }),
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
  });

  const data = tokenResponseSchema.parse(await readJson(response, 'token exchange'));
  return data.access_token;
}

async function getWithToken(path: string, accessToken: string): Promise<unknown> {
  const response = await fetch(`${DISCORD_API}${path}`, {
    headers: { Authorization: `Bearer ${accessToken}` },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
  });
  return readJson(response, `GET ${path}`);
}

export async function fetchUser(accessToken: string): Promise<DiscordUser> {
  return userSchema.parse(await getWithToken('/users/@me', accessToken));
}

/**
 * IDs of the guilds the user belongs to
 */
export async function fetchGuildIds(accessToken: string): Promise<string[]> {
  const guilds = guildsSchema.parse(await getWithToken('/users/@me/guilds', accessToken));
  return guilds.map(g => g.id);
}
