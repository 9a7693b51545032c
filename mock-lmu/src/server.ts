import * as http from 'http';
import { URL } from 'url';
import { createLogger } from './logger';
import { GameStateStore } from './gameStateStore';
import { RequestHandlers } from './handlers';
import { WEATHER_NODES, WEATHER_SETTINGS } from './types';
import type { Logger, WeatherNode, WeatherSetting } from './types';

export interface MockLmuServer {
  server: http.Server;
  store: GameStateStore;
  logger: Logger;
}

function isWeatherNode(value: string): value is WeatherNode {
  return (WEATHER_NODES as readonly string[]).includes(value);
}

function isWeatherSetting(value: string): value is WeatherSetting {
  return (WEATHER_SETTINGS as readonly string[]).includes(value);
}

async function getBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => {
      body += chunk.toString();
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

/**
 * Build (but do not start) a server answering the game's local REST endpoints.
 * While the store reports the game as not running every endpoint but /health
 * answers 404, which the recorder reads the same way as a refused connection.
 */
export function createMockLmuServer(
  logger: Logger = createLogger(),
  store: GameStateStore = new GameStateStore(logger)
): MockLmuServer {
  const handlers = new RequestHandlers(logger, store);

  const server = http.createServer(async (req, res) => {
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
    const pathname = url.pathname;
    const method = req.method || 'GET';

    logger.debug(`${method} ${pathname}`);

    try {
      if (pathname === '/health' && method === 'GET') {
        handlers.handleHealth(req, res);
        return;
      }

      if (!store.get().running) {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Game not running' }));
        return;
      }

      if (method === 'GET') {
        switch (pathname) {
          case '/swagger-schema.json':
            handlers.handleSchema(req, res);
            return;
          case '/navigation/state':
            handlers.handleNavigationState(req, res);
            return;
          case '/rest/sessions/GetGameState':
            handlers.handleGameState(req, res);
            return;
          case '/rest/watch/standings':
            handlers.handleStandings(req, res);
            return;
          case '/rest/sessions/weather':
            handlers.handleWeather(req, res);
            return;
          case '/rest/sessions':
            handlers.handleSessions(req, res);
            return;
          case '/rest/garage/summary':
            handlers.handleGarageSummary(req, res);
            return;
        }
      }

      if (method === 'POST' && pathname === '/rest/sessions/settings') {
        const body = await getBody(req);
        handlers.handleSessionSetting(req, res, body);
        return;
      }

      const weatherMatch = pathname.match(/^\/rest\/sessions\/weather\/PRACTICE\/([A-Z0-9_]+)\/([A-Z_]+)$/);
      if (weatherMatch && method === 'POST') {
        const [, node, setting] = weatherMatch;
        if (isWeatherNode(node) && isWeatherSetting(setting)) {
          const body = await getBody(req);
          handlers.handleWeatherSetting(req, res, node, setting, body);
          return;
        }
      }

      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error('Unhandled error', error);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  return { server, store, logger };
}
