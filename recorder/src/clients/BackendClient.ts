/**
 * BackendClient.ts
 *
 * HTTP client for the leaderboard backend. GET answers are data, `false` for
 * 404 and `null` for anything else; lap submissions resolve to an outcome.
 */

import { z } from 'zod';
import type { LeaderboardConfigResponse, SubmitTimeRequest } from '../../../shared/api';
import type { Logger } from '../logger';

export type SubmitOutcome = 'accepted' | 'blacklisted' | 'failed';

const leaderboardConfigSchema = z.object({
  track: z.string(),
  discord_channel: z.string(),
  weather: z.object({
    condition: z.number(),
    temperature: z.number(),
    rain: z.number(),
    grip_level: z.number().nullable()
  }),
  classes: z.array(z.number()),
  show_technical: z.boolean(),
  tod: z.number(),
  fixed_setup: z.boolean()
}) satisfies z.ZodType<LeaderboardConfigResponse>;

const messageSchema = z.object({ message: z.string().min(1) });

interface HttpReply {
  status: number;
  body: unknown;
}

export class BackendClient {
  constructor(
    private baseUrl: string,
    private timeoutMs: number,
    private logger: Logger,
    private getToken: () => string | null = () => null
  ) {}

  private headers(json: boolean): Record<string, string> {
    const headers: Record<string, string> = {};
    if (json) {
      headers['Content-Type'] = 'application/json';
    }
    const token = this.getToken();
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }

  private async send(method: 'GET' | 'POST', endpoint: string, payload?: unknown): Promise<HttpReply | null> {
    try {
      const response = await fetch(`${this.baseUrl}/${endpoint}`, {
        method,
        headers: this.headers(payload !== undefined),
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const text = await response.text();
      let body: unknown = null;
      if (text.length > 0) {
        try {
          body = JSON.parse(text);
        } catch {
          this.logger.warn(`${method} ${endpoint}: response is not JSON`);
        }
      }
      return { status: response.status, body };
    } catch (error) {
      this.logger.error(`${method} ${endpoint} failed`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  private async get<T>(endpoint: string, schema: z.ZodType<T>): Promise<T | false | null> {
    const reply = await this.send('GET', endpoint);
    if (!reply) return null;
    if (reply.status === 404) return false;
    if (reply.status !== 200) {
      this.logger.error(`GET ${endpoint}: ${reply.status}`);
      return null;
    }
    const parsed = schema.safeParse(reply.body);
    if (!parsed.success) {
      this.logger.error(`GET ${endpoint}: unexpected response shape`);
      return null;
    }
    return parsed.data;
  }

  async getVersion(): Promise<string | null> {
    const data = await this.get('version', z.object({ version: z.string() }));
    return data ? data.version : null;
  }

  async getCarModels(): Promise<Record<string, string> | null> {
    const data = await this.get('cars', z.record(z.string()));
    return data || null;
  }

  getLeaderboardConfig(track: string): Promise<LeaderboardConfigResponse | false | null> {
    return this.get(`leaderboard/${encodeURIComponent(track)}`, leaderboardConfigSchema);
  }

  async submitLapTime(track: string, submission: SubmitTimeRequest): Promise<SubmitOutcome> {
    this.logger.info(`Submitting time ${submission.time_data.lap.toFixed(3)} for ${track}`);
    const reply = await this.send('POST', `leaderboard/${encodeURIComponent(track)}/submit`, submission);
    if (!reply) return 'failed';
    if (reply.status === 403) {
      this.logger.warn('Submission rejected: driver is blacklisted');
      return 'blacklisted';
    }
    if (reply.status === 200 && messageSchema.safeParse(reply.body).success) {
      this.logger.info('Time submitted');
      return 'accepted';
    }
    this.logger.error(`Submission failed with status ${reply.status}`, reply.body);
    return 'failed';
  }

  async getUsername(): Promise<string | null> {
    const data = await this.get('user', z.object({ name: z.string() }));
    return data ? data.name : null;
  }

  async getOAuthUrl(state: string): Promise<string | null> {
    const data = await this.get(`discord?state=${encodeURIComponent(state)}`, z.object({ url: z.string() }));
    return data ? data.url : null;
  }

  async logout(): Promise<boolean> {
    const reply = await this.send('POST', 'user/logout', {});
    return reply !== null && reply.status === 200 && messageSchema.safeParse(reply.body).success;
  }
}
