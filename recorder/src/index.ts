#!/usr/bin/env node
/**
 * Recorder command line.
 *
 *   hotlap-recorder [run]   watch the game and submit session bests
 *   hotlap-recorder login   sign in with Discord
 *   hotlap-recorder logout  sign out and forget the saved token
 *   hotlap-recorder setup   apply the current track's leaderboard conditions
 */

import { config } from './config';
import { createLogger, type Logger } from './logger';
import { BackendClient } from './clients/BackendClient';
import { TelemetryClient } from './clients/TelemetryClient';
import { FileTokenStore, type TokenStore } from './auth/tokenStore';
import { CallbackServer, createLoginState } from './auth/callbackServer';
import { RecorderEventBus } from './core/events';
import { SessionValidator } from './core/SessionValidator';
import { SessionRecorder } from './core/SessionRecorder';
import { SessionCoordinator } from './core/SessionCoordinator';
import { restoreLogin, runStartupChecks } from './startup';
import { getTrackName } from '../../shared/racing';

interface Clients {
  logger: Logger;
  tokens: TokenStore;
  backend: BackendClient;
  telemetry: TelemetryClient;
}

function createClients(): Clients {
  const logger = createLogger(config.logLevel);
  const tokens = new FileTokenStore(config.tokenPath);
  const backend = new BackendClient(config.backendUrl, config.requestTimeoutMs, logger, () => tokens.load());
  const telemetry = new TelemetryClient(config.lmuUrl, config.requestTimeoutMs, logger);
  return { logger, tokens, backend, telemetry };
}

async function run({ logger, tokens, backend, telemetry }: Clients): Promise<number> {
  const startup = await runStartupChecks(backend, config.version, logger);
  if (!startup.ok) {
    logger.error(startup.message);
    return 1;
  }

  const driver = await restoreLogin(backend, tokens, logger);
  if (!driver) {
    logger.error('Not logged in. Run "hotlap-recorder login" first.');
    return 1;
  }

  const events = new RecorderEventBus();
  events.on('status', (message) => logger.info(message.replace(/\n/g, ' | ')));
  events.on('recorderError', (message) => logger.warn(message));
  events.on('leaderboardDetected', (track) =>
    logger.info(`Leaderboard available for ${getTrackName(track)}. Run "hotlap-recorder setup" to apply its conditions.`)
  );

  const validator = new SessionValidator(
    telemetry,
    backend,
    startup.carModels,
    events,
    config.pollIntervalMs,
    logger
  );
  const recorder = new SessionRecorder(telemetry, backend, events, config.pollIntervalMs, logger);
  const coordinator = new SessionCoordinator({
    telemetry,
    backend,
    validator,
    recorder,
    events,
    pollIntervalMs: config.pollIntervalMs,
    logger
  });

  const shutdown = () => {
    logger.info('Stopping recorder');
    coordinator.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await coordinator.run();
  return 0;
}

async function login({ logger, tokens, backend }: Clients): Promise<number> {
  const state = createLoginState();
  const url = await backend.getOAuthUrl(state);
  if (!url) {
    logger.error('Could not get a login URL from the server');
    return 1;
  }

  const server = new CallbackServer(config.oauthCallbackPort, state, logger);
  const { result } = await server.start();
  logger.info(`Open this URL in your browser to log in:\n${url}`);

  const { token, name } = await result;
  tokens.save(token);
  logger.info(`Logged in as ${name}`);
  return 0;
}

async function logout({ logger, tokens, backend }: Clients): Promise<number> {
  if (!tokens.load()) {
    logger.info('Not logged in');
    return 0;
  }
  if (!(await backend.logout())) {
    logger.error('Logout failed');
    return 1;
  }
  tokens.clear();
  logger.info('Logged out');
  return 0;
}

async function setup({ logger, backend, telemetry }: Clients): Promise<number> {
  const session = await telemetry.getSessionState();
  if (!session) {
    logger.error('Could not read the game session. Is the game running?');
    return 1;
  }

  const track = session.loadingStatus.track.sceneDesc;
  const leaderboard = await backend.getLeaderboardConfig(track);
  if (!leaderboard) {
    logger.error(`No leaderboard for ${getTrackName(track)}`);
    return 1;
  }

  const failure = await telemetry.applySessionSettings(leaderboard.weather, leaderboard.tod);
  if (failure) {
    logger.error(`Session setup failed: ${failure}`);
    return 1;
  }
  logger.info(`Session set up for ${getTrackName(track)}`);
  return 0;
}

const COMMANDS: Record<string, (clients: Clients) => Promise<number>> = {
  run,
  login,
  logout,
  setup
};

async function main(): Promise<void> {
  const name = process.argv[2] ?? 'run';
  const command = COMMANDS[name];
  if (!command) {
    console.error(`Unknown command "${name}". Expected one of: ${Object.keys(COMMANDS).join(', ')}`);
    process.exit(1);
  }
  process.exit(await command(createClients()));
}

main().catch((error: unknown) => {
  console.error('Recorder failed:', error);
  process.exit(1);
});
