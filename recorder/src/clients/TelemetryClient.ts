/**
 * TelemetryClient.ts
 *
 * Reads session data from the game's local REST API and writes practice
 * session settings back to it.
 *
 * Reads return parsed data, `false` when the game is not reachable (404 or a
 * refused connection) and `null` on any other failure. Nothing is thrown.
 */

import { z } from 'zod';
import type { WeatherRequirement } from '../../../shared/api';
import type { Logger } from '../logger';

export type ReadResult<T> = T | false | null;

export interface WeatherSlot {
  condition: number;
  temperature: number;
  rain: number;
}

const sessionStateSchema = z.object({
  loadingStatus: z.object({
    loadingData: z.string(),
    track: z.object({ sceneDesc: z.string() })
  }),
  state: z.object({ gameSession: z.string().nullish() }).default({})
});
export type SessionState = z.infer<typeof sessionStateSchema>;

const sessionInfoSchema = z.object({
  inControlOfVehicle: z.boolean().default(false)
});
export type SessionInfo = z.infer<typeof sessionInfoSchema>;

const standingsEntrySchema = z.object({
  driverName: z.string().nullish(),
  carClass: z.string().nullish(),
  bestLapTime: z.number().nullish(),
  bestLapSectorTime1: z.number().nullish(),
  bestLapSectorTime2: z.number().nullish()
});
export type StandingsEntry = z.infer<typeof standingsEntrySchema>;

const currentValueSchema = z.object({ currentValue: z.number() });

const weatherNodeSchema = z.object({
  WNV_SKY: currentValueSchema,
  WNV_TEMPERATURE: currentValueSchema,
  WNV_RAIN_CHANCE: currentValueSchema
});

const weatherSchema = z.object({
  PRACTICE: z.record(weatherNodeSchema)
});

const settingsSchema = z.record(z.unknown());

export const WEATHER_NODES = ['START', 'NODE_25', 'NODE_50', 'NODE_75', 'FINISH'] as const;

type WeatherSettingName = keyof z.infer<typeof weatherNodeSchema>;

const loadingDataSchema = z.object({
  selectedCar: z.object({ sig: z.string().default('') })
});

/**
 * Car signature of the loaded car, or null when the loading data is unreadable
 */
export function readCarSignature(state: SessionState): string | null {
  try {
    const parsed = loadingDataSchema.safeParse(JSON.parse(state.loadingStatus.loadingData));
    return parsed.success ? parsed.data.selectedCar.sig : null;
  } catch {
    return null;
  }
}

function readCurrentValue(settings: Record<string, unknown>, name: string): number | undefined {
  const parsed = currentValueSchema.safeParse(settings[name]);
  return parsed.success ? parsed.data.currentValue : undefined;
}

export class TelemetryClient {
  constructor(
    private baseUrl: string,
    private timeoutMs: number,
    private logger: Logger
  ) {}

  private async request(endpoint: string, init: RequestInit = {}): Promise<Response | false | null> {
    try {
      return await fetch(`${this.baseUrl}/${endpoint}`, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.warn(`${init.method ?? 'GET'} ${endpoint} timed out`);
        return null;
      }
      this.logger.debug(`${init.method ?? 'GET'} ${endpoint}: game not reachable`);
      return false;
    }
  }

  private async readJson(response: Response, endpoint: string): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch {
      this.logger.warn(`${endpoint}: response is not JSON`);
      return null;
    }
  }

  async get(endpoint: string): Promise<unknown> {
    const response = await this.request(endpoint);
    if (response === false || response === null) return response;
    if (response.status === 200) return this.readJson(response, endpoint);
    if (response.status === 404) return false;
    this.logger.warn(`GET ${endpoint}: ${response.status}`);
    return null;
  }

  async post(endpoint: string, body: string, contentType: string): Promise<unknown> {
    const response = await this.request(endpoint, {
      method: 'POST',
      body,
      headers: { 'Content-Type': contentType }
    });
    if (response === false || response === null) return response;
    if (response.ok) return this.readJson(response, endpoint);
    if (response.status === 404) return false;
    this.logger.warn(`POST ${endpoint}: ${response.status}`);
    return null;
  }

  private async read<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ReadResult<T>> {
    const data = await this.get(endpoint);
    if (data === false || data === null) return data;
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`${endpoint}: unexpected response shape`, parsed.error.issues[0]?.message);
      return null;
    }
    return parsed.data;
  }

  async probeConnection(): Promise<boolean> {
    const response = await this.request('swagger-schema.json');
    return response !== false && response !== null && response.status === 200;
  }

  getSessionState(): Promise<ReadResult<SessionState>> {
    return this.read('navigation/state', sessionStateSchema);
  }

  getSessionInfo(): Promise<ReadResult<SessionInfo>> {
    return this.read('rest/sessions/GetGameState', sessionInfoSchema);
  }

  /**
   * Current standings. An empty list reads as `false`, like a disconnected game.
   */
  async getStandings(): Promise<ReadResult<StandingsEntry[]>> {
    const standings = await this.read('rest/watch/standings', z.array(standingsEntrySchema));
    if (Array.isArray(standings) && standings.length === 0) {
      return false;
    }
    return standings;
  }

  /**
   * Practice weather slots in session order, or null when unreadable
   */
  async getWeatherSlots(): Promise<WeatherSlot[] | null> {
    const weather = await this.read('rest/sessions/weather', weatherSchema);
    if (!weather) return null;
    return Object.values(weather.PRACTICE)
      .map((node) => ({
        condition: node.WNV_SKY.currentValue,
        temperature: node.WNV_TEMPERATURE.currentValue,
        rain: node.WNV_RAIN_CHANCE.currentValue
      }))
      .reverse();
  }

  async getGripLevel(): Promise<number | null> {
    const settings = await this.read('rest/sessions', settingsSchema);
    if (!settings) return null;
    return readCurrentValue(settings, 'SESSSET_pract1_realroad_init') ?? null;
  }

  async getActiveSetupName(): Promise<string | null> {
    const summary = await this.read('rest/garage/summary', z.object({ activeSetup: z.string() }));
    return summary ? summary.activeSetup : null;
  }

  private async setSessionSetting(name: string, delta: number, expected: number): Promise<string | null> {
    const response = await this.post(
      'rest/sessions/settings',
      JSON.stringify({ sessionSetting: name, value: Math.trunc(delta) }),
      'application/json'
    );
    const parsed = currentValueSchema.safeParse(response);
    if (parsed.success && parsed.data.currentValue === Math.trunc(expected)) {
      this.logger.info(`Session setting ${name} set to ${parsed.data.currentValue}`);
      return null;
    }
    this.logger.warn(`Failed to set session setting ${name}`, response);
    return 'Session setting update failed';
  }

  private async updateWeather(
    node: string,
    setting: WeatherSettingName,
    value: number,
    current: number | undefined
  ): Promise<string | null> {
    if (current === undefined) {
      this.logger.warn(`Current ${setting} at ${node} not found in weather data`);
      return 'Failed to set weather: current value not found';
    }
    if (current === value) {
      return null;
    }

    const response = await this.post(
      `rest/sessions/weather/PRACTICE/${node}/${setting}`,
      String(value - current),
      'text/plain'
    );
    const parsed = settingsSchema.safeParse(response);
    if (parsed.success && readCurrentValue(parsed.data, setting) === value) {
      return null;
    }
    this.logger.warn(`Failed to set ${setting} at ${node}`, response);
    return 'Weather setting update failed';
  }

  /**
   * Configure the practice session for a leaderboard: practice only, static
   * grip, the given start time, grip level and weather on every node.
   *
   * @returns the first failure message, or null when everything was applied
   */
  async applySessionSettings(weather: WeatherRequirement, timeOfDay: number): Promise<string | null> {
    const settings = await this.read('rest/sessions', settingsSchema);
    if (!settings) {
      return 'Failed to read session settings';
    }

    const targets: Array<[name: string, target: number, missing: string]> = [
      ['SESSSET_pract1', 1, 'Current practice session value not found'],
      ['SESSSET_num_qual_sessions', 0, 'Current qualifying session value not found'],
      ['SESSSET_num_race_sessions', 0, 'Current race session value not found'],
      ['SESSSET_realroad_timescale_practice', 0, 'Current timescale value not found'],
      ['SESSSET_practice1_starting_time', timeOfDay, 'Current time not found']
    ];
    if (weather.grip_level !== null) {
      targets.push(['SESSSET_pract1_realroad_init', weather.grip_level, 'Current grip level not found']);
    }

    for (const [name, target, missing] of targets) {
      const current = readCurrentValue(settings, name);
      if (current === undefined) {
        this.logger.warn(`${name} not found in session data`);
        return missing;
      }
      if (current === target) {
        this.logger.debug(`${name} already at ${target}`);
        continue;
      }
      const failure = await this.setSessionSetting(name, target - current, target);
      if (failure) return failure;
    }

    const currentWeather = await this.read('rest/sessions/weather', weatherSchema);
    if (!currentWeather) {
      return 'Failed to set weather: current value not found';
    }

    const writes: Array<[WeatherSettingName, number]> = [
      ['WNV_SKY', weather.condition],
      ['WNV_RAIN_CHANCE', weather.rain],
      ['WNV_TEMPERATURE', weather.temperature]
    ];
    for (const node of WEATHER_NODES) {
      const values = currentWeather.PRACTICE[node];
      for (const [setting, value] of writes) {
        const failure = await this.updateWeather(node, setting, value, values?.[setting].currentValue);
        if (failure) return failure;
      }
    }

    this.logger.info('Session settings applied');
    return null;
  }
}
