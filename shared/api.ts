/**
 * api.ts
 *
 * JSON shapes exchanged between the recorder and the backend HTTP API.
 * Field names follow the wire format (snake_case).
 */

export interface WeatherRequirement {
  condition: number;
  temperature: number;
  rain: number;
  grip_level: number | null;
}

/**
 * GET /leaderboard/:track
 */
export interface LeaderboardConfigResponse {
  track: string;
  discord_channel: string;
  weather: WeatherRequirement;
  classes: number[];
  show_technical: boolean;
  tod: number;
  fixed_setup: boolean;
}

/**
 * Lap and sector boundary times in seconds. -1 marks an unavailable sector.
 */
export interface TimeData {
  lap: number;
  sector1: number;
  sector2: number;
}

/**
 * POST /leaderboard/:track/submit
 */
export interface SubmitTimeRequest {
  time_data: TimeData;
  car: string;
  driver_name: string;
  class: string;
}

export interface MessageResponse {
  message: string;
}

export interface ErrorResponse {
  error: string;
}

export interface RateLimitedResponse extends ErrorResponse {
  retry_after: number;
}

export interface UserResponse {
  name: string;
}

export interface OAuthUrlResponse {
  url: string;
}

export interface VersionResponse {
  version: string;
}

/**
 * GET /cars: car signature -> car model name
 */
export type CarModelsResponse = Record<string, string>;
