/**
 * config.ts
 *
 * Recorder configuration, loaded once from the environment (and .env).
 * No other recorder file reads process.env directly.
 *
 * Environment Variables:
 *    - BACKEND_URL: leaderboard backend (defaults to http://localhost:8000)
 *    - LMU_URL: the game's local REST API (defaults to http://localhost:6397)
 *    - POLL_INTERVAL_MS: delay between game polls (defaults to 1000)
 *    - REQUEST_TIMEOUT_MS: per-request timeout (defaults to 5000)
 *    - OAUTH_CALLBACK_PORT: local login callback port (defaults to 54783)
 *    - TOKEN_PATH: where the login token is kept
 *    - LOG_LEVEL: debug | info | warn | error
 *    - RECORDER_VERSION: must equal the backend's version
 */

import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface RecorderConfig {
  backendUrl: string;
  lmuUrl: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  oauthCallbackPort: number;
  tokenPath: string;
  logLevel: string;
  version: string;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function getConfig(): RecorderConfig {
  return {
    backendUrl: trimTrailingSlash(process.env.BACKEND_URL || 'http://localhost:8000'),
    lmuUrl: trimTrailingSlash(process.env.LMU_URL || 'http://localhost:6397'),
    pollIntervalMs: parsePositiveInt(process.env.POLL_INTERVAL_MS, 1000),
    requestTimeoutMs: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 5000),
    oauthCallbackPort: parsePositiveInt(process.env.OAUTH_CALLBACK_PORT, 54783),
    tokenPath: process.env.TOKEN_PATH || path.join(os.homedir(), '.hotlap-recorder', 'token'),
    logLevel: process.env.LOG_LEVEL || 'info',
    version: process.env.RECORDER_VERSION || '1.4.0'
  };
}

export let config = getConfig();

/**
 * Reload configuration from environment variables
 * Used primarily in tests where process.env is modified
 */
export function reloadConfig(): void {
  config = getConfig();
}
