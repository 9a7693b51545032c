import type { IncomingMessage, ServerResponse } from 'http';
import type { Logger, WeatherNode, WeatherSetting } from './types';
import type { GameStateStore } from './gameStateStore';

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export class RequestHandlers {
  private logger: Logger;
  private store: GameStateStore;

  constructor(logger: Logger, store: GameStateStore) {
    this.logger = logger;
    this.store = store;
  }

  handleSchema(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, { swagger: '2.0', info: { title: 'Mock LMU REST API' } });
  }

  handleNavigationState(_req: IncomingMessage, res: ServerResponse): void {
    const state = this.store.get();
    sendJson(res, 200, {
      loadingStatus: {
        loadingData: JSON.stringify({ selectedCar: { sig: state.carSignature } }),
        track: { sceneDesc: state.sceneDesc },
      },
      state: { gameSession: state.gameSession },
    });
  }

  handleGameState(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, { inControlOfVehicle: this.store.get().inControlOfVehicle });
  }

  handleStandings(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, this.store.get().standings);
  }

  handleWeather(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, { PRACTICE: this.store.get().weather });
  }

  handleSessions(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, this.store.get().sessionSettings);
  }

  handleGarageSummary(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, { activeSetup: this.store.get().activeSetup });
  }

  handleSessionSetting(_req: IncomingMessage, res: ServerResponse, body: string): void {
    const parsed = parseJson(body);
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('sessionSetting' in parsed) ||
      !('value' in parsed) ||
      typeof parsed.sessionSetting !== 'string' ||
      typeof parsed.value !== 'number'
    ) {
      this.logger.warn('Malformed session setting request', { body });
      sendJson(res, 400, { error: 'Expected { sessionSetting, value }' });
      return;
    }

    const updated = this.store.applySettingDelta(parsed.sessionSetting, parsed.value);
    if (!updated) {
      sendJson(res, 404, { error: 'Unknown session setting' });
      return;
    }
    sendJson(res, 200, updated);
  }

  handleWeatherSetting(
    _req: IncomingMessage,
    res: ServerResponse,
    node: WeatherNode,
    setting: WeatherSetting,
    body: string
  ): void {
    const delta = Number(body.trim());
    if (body.trim() === '' || !Number.isFinite(delta)) {
      this.logger.warn('Malformed weather delta', { node, setting, body });
      sendJson(res, 400, { error: 'Expected a numeric delta' });
      return;
    }
    sendJson(res, 200, this.store.applyWeatherDelta(node, setting, delta));
  }

  handleHealth(_req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, { status: 'ok' });
  }
}
