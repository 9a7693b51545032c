// Configuration must be imported FIRST (it loads .env and provides all config)
import { config, logConfigOnStartup, getDiscordConfig } from './config';

import { openDatabase } from './db';
import { createApp } from './app';
import { RateLimiter } from './services/RateLimiter';
import { LeaderboardConfigService } from './services/LeaderboardConfigService';
import { LapTimeService } from './services/LapTimeService';
import { BlacklistService } from './services/BlacklistService';
import { AuthSessionService } from './services/AuthSessionService';
import { LoginService } from './services/LoginService';
import { CarModelService } from './services/CarModelService';

logConfigOnStartup();

console.log('==========================================');

const { db, drizzleDb } = openDatabase(config.databasePath);

try {
  const userVersion = db.pragma('user_version', { simple: true });
  console.log(`[DB] ✓ Database is readable - PRAGMA user_version: ${JSON.stringify(userVersion)}`);
} catch (err) {
  console.log(`[DB] ✗ ERROR reading database: ${err instanceof Error ? err.message : String(err)}`);
}

const authSessionService = new AuthSessionService(drizzleDb);

const services = {
  leaderboardConfigService: new LeaderboardConfigService(drizzleDb),
  lapTimeService: new LapTimeService(drizzleDb),
  blacklistService: new BlacklistService(drizzleDb),
  authSessionService,
  loginService: new LoginService(authSessionService, getDiscordConfig),
  carModelService: CarModelService.fromFile(config.carModelsPath)
};

const rateLimiter = new RateLimiter(config.rateLimits);

const app = createApp({
  services,
  rateLimiter,
  getVersion: () => config.appVersion,
  getAdminDriverIds: () => config.adminDriverIds
});

const server = app.listen(config.port, config.host, () => {
  console.log(`Leaderboard backend listening on ${config.host}:${config.port}`);
  rateLimiter.startSweeper();
});

function shutdown(signal: string): void {
  console.log(`[SHUTDOWN] ${signal} received, closing server`);
  rateLimiter.stopSweeper();
  server.close(() => {
    db.close();
    console.log('[SHUTDOWN] Closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
