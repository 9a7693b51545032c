/**
 * config.ts
 *
 * Centralized configuration management - SINGLE SOURCE OF TRUTH.
 *
 * This module:
 * 1. Loads environment variables from .env file (via dotenv)
 * 2. Parses and validates configuration
 * 3. Exports a ready-to-use config object
 *
 * No other server file should access process.env directly.
 *
 * Environment Variables:
 *    - PORT / HOST: listen address (defaults 8000 / 0.0.0.0)
 *    - DATABASE_PATH: SQLite file (defaults to server/data/leaderboard.db)
 *    - APP_VERSION: version string the recorder must match
 *    - CAR_MODELS_PATH: JSON file mapping car signatures to model names
 *    - DISCORD_CLIENT_ID / DISCORD_CLIENT_SECRET / DISCORD_CALLBACK_URL
 *    - HOME_GUILD_ID: Discord server a driver must belong to
 *    - APPLICATION_CALLBACK: recorder's local OAuth callback URL
 *    - ADMIN_DRIVER_IDS: comma-separated driver IDs allowed on admin procedures
 *    - RATE_LIMIT_GENERAL / RATE_LIMIT_SUBMIT / RATE_LIMIT_AUTH: "max/windowSeconds"
 *    - DEBUG: "true" enables verbose logging
 */

import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface RateLimitBudget {
  maxRequests: number;
  windowSeconds: number;
}

export interface Config {
  port: number;
  host: string;
  debug: boolean;
  appVersion: string;
  // Database
  databasePath: string;
  carModelsPath: string;
  // Discord OAuth
  discordClientId: string | undefined;
  discordClientSecret: string | undefined;
  discordCallbackUrl: string;
  homeGuildId: string;
  applicationCallback: string;
  // Admin
  adminDriverIds: string[];
  // Rate limits
  rateLimits: {
    general: RateLimitBudget;
    submit: RateLimitBudget;
    auth: RateLimitBudget;
  };
}

const DEFAULT_RATE_LIMITS: Config['rateLimits'] = {
  general: { maxRequests: 60, windowSeconds: 60 },
  submit: { maxRequests: 10, windowSeconds: 60 },
  auth: { maxRequests: 10, windowSeconds: 60 }
};

/**
 * Parse a "max/windowSeconds" budget, falling back when malformed
 */
function parseBudget(value: string | undefined, fallback: RateLimitBudget): RateLimitBudget {
  if (!value) {
    return fallback;
  }
  const [max, window] = value.split('/').map(part => parseInt(part.trim(), 10));
  if (!Number.isInteger(max) || !Number.isInteger(window) || max <= 0 || window <= 0) {
    console.warn(`[CONFIG] Ignoring malformed rate limit "${value}"`);
    return fallback;
  }
  return { maxRequests: max, windowSeconds: window };
}

function getConfig(): Config {
  const adminDriverIds: string[] = [];
  if (process.env.ADMIN_DRIVER_IDS) {
    adminDriverIds.push(
      ...process.env.ADMIN_DRIVER_IDS
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0)
    );
  }

  return {
    port: parseInt(process.env.PORT || '8000', 10),
    host: process.env.HOST || '0.0.0.0',
    debug: (process.env.DEBUG || 'false').toLowerCase() === 'true',
    appVersion: process.env.APP_VERSION || '1.4.0',
    databasePath: process.env.DATABASE_PATH || path.join(__dirname, '..', 'data', 'leaderboard.db'),
    carModelsPath: process.env.CAR_MODELS_PATH || path.join(__dirname, '..', 'data', 'car-models.json'),
    discordClientId: process.env.DISCORD_CLIENT_ID,
    discordClientSecret: process.env.DISCORD_CLIENT_SECRET,
    discordCallbackUrl: process.env.DISCORD_CALLBACK_URL || 'http://localhost:8000/discord/callback',
    homeGuildId: process.env.HOME_GUILD_ID || '',
    applicationCallback: process.env.APPLICATION_CALLBACK || 'http://127.0.0.1:54783/callback',
    adminDriverIds,
    rateLimits: {
      general: parseBudget(process.env.RATE_LIMIT_GENERAL, DEFAULT_RATE_LIMITS.general),
      submit: parseBudget(process.env.RATE_LIMIT_SUBMIT, DEFAULT_RATE_LIMITS.submit),
      auth: parseBudget(process.env.RATE_LIMIT_AUTH, DEFAULT_RATE_LIMITS.auth)
    }
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

export type Mode = 'development' | 'test' | 'production';

/**
 * Get the runtime mode
 */
export function getMode(): Mode {
  const env = process.env.NODE_ENV;
  if (env === 'test' || env === 'production') {
    return env;
  }
  return 'development';
}

export function isTestMode(): boolean {
  return getMode() === 'test';
}

export function isProduction(): boolean {
  return getMode() === 'production';
}

/**
 * Log configuration on startup (never logs secrets)
 */
export function logConfigOnStartup(): void {
  console.log('========== CONFIGURATION ==========');
  console.log(`[CONFIG] Mode: ${getMode()}`);
  console.log(`[CONFIG] Version: ${config.appVersion}`);
  console.log(`[CONFIG] Database: ${config.databasePath}`);
  console.log(`[CONFIG] Car models: ${config.carModelsPath}`);
  console.log(`[CONFIG] OAuth callback: ${config.discordCallbackUrl}`);
  console.log(`[CONFIG] Application callback: ${config.applicationCallback}`);
  console.log(`[CONFIG] Admin drivers: ${config.adminDriverIds.length}`);
  const { general, submit, auth } = config.rateLimits;
  console.log(
    `[CONFIG] Rate limits: general=${general.maxRequests}/${general.windowSeconds}s ` +
    `submit=${submit.maxRequests}/${submit.windowSeconds}s auth=${auth.maxRequests}/${auth.windowSeconds}s`
  );

  if (isProduction() && (!config.discordClientId || !config.homeGuildId)) {
    console.warn('[CONFIG] ⚠️  Discord OAuth is not fully configured in production.');
  }
}

/**
 * Get Discord OAuth configuration
 * @throws Error if client ID or secret are missing
 */
export function getDiscordConfig() {
  const { discordClientId, discordClientSecret, discordCallbackUrl, homeGuildId, applicationCallback } = config;

  if (!discordClientId || !discordClientSecret) {
    throw new Error('Missing DISCORD_CLIENT_ID or DISCORD_CLIENT_SECRET environment variables');
  }

  return {
    clientId: discordClientId,
    clientSecret: discordClientSecret,
    callbackUrl: discordCallbackUrl,
    homeGuildId,
    applicationCallback
  };
}
