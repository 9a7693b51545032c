/**
 * startup.ts
 *
 * Checks that must pass before the recorder watches any session, and
 * restoring a saved login.
 */

import type { BackendClient } from './clients/BackendClient';
import type { TokenStore } from './auth/tokenStore';
import type { Logger } from './logger';

export type StartupResult =
  | { ok: true; carModels: Record<string, string> }
  | { ok: false; message: string };

/**
 * The backend must be reachable, run the same version as the recorder and
 * know at least one car model. Any failure is fatal.
 */
export async function runStartupChecks(
  backend: Pick<BackendClient, 'getVersion' | 'getCarModels'>,
  version: string,
  logger: Logger
): Promise<StartupResult> {
  const backendVersion = await backend.getVersion();
  if (backendVersion === null) {
    return { ok: false, message: 'Could not reach the leaderboard server' };
  }
  if (backendVersion !== version) {
    return {
      ok: false,
      message: `Version mismatch: recorder ${version}, server ${backendVersion}. Please update the recorder.`
    };
  }

  const carModels = await backend.getCarModels();
  if (!carModels || Object.keys(carModels).length === 0) {
    return { ok: false, message: 'Failed to load car models from the server' };
  }

  logger.info(`Startup checks passed (version ${version}, ${Object.keys(carModels).length} car models)`);
  return { ok: true, carModels };
}

/**
 * Name of the driver the saved token belongs to. A token the backend no
 * longer accepts is removed from the store.
 */
export async function restoreLogin(
  backend: Pick<BackendClient, 'getUsername'>,
  tokens: TokenStore,
  logger: Logger
): Promise<string | null> {
  if (!tokens.load()) {
    return null;
  }
  const name = await backend.getUsername();
  if (name === null) {
    logger.warn('Saved login is no longer valid, removing it');
    tokens.clear();
    return null;
  }
  logger.info(`Logged in as ${name}`);
  return name;
}
