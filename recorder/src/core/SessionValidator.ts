/**
 * SessionValidator.ts
 *
 * Decides whether the session the driver is in may be recorded. Checks run in
 * a fixed order and stop at the first failure; the validator never throws.
 */

import {
  CAR_CLASSES,
  getClassName,
  getConditionName,
  getGripName,
  isCarClassName
} from '../../../shared/racing';
import type { LeaderboardConfigResponse } from '../../../shared/api';
import type { BackendClient } from '../clients/BackendClient';
import {
  readCarSignature,
  type ReadResult,
  type StandingsEntry,
  type TelemetryClient,
  type WeatherSlot
} from '../clients/TelemetryClient';
import type { Logger } from '../logger';
import { MAX_STANDINGS_ATTEMPTS, PRACTICE_SESSION } from '../settings';
import { sleep } from '../utils/sleep';
import type { RecorderEventBus } from './events';
import { matchWeather, type RequiredWeather } from './weather';

export type ValidationError =
  | { kind: 'StandingsUnavailable' }
  | { kind: 'MultipleDriversDetected'; count: number }
  | { kind: 'SessionStateUnavailable' }
  | { kind: 'UnknownCar'; signaturePrefix: string }
  | { kind: 'WrongSessionType'; gameSession: string | null }
  | { kind: 'NoLeaderboardConfigured'; track: string }
  | { kind: 'ClassNotAllowed'; carClass: string; allowed: string[] }
  | { kind: 'WeatherUnavailable' }
  | { kind: 'WeatherMismatch'; required: RequiredWeather; index: number; observed: WeatherSlot }
  | { kind: 'GripUnavailable' }
  | { kind: 'GripMismatch'; required: number; current: number };

export interface ValidSession {
  ok: true;
  track: string;
  car: string;
  carClass: string;
  config: LeaderboardConfigResponse;
}

export type ValidationResult = ValidSession | { ok: false; error: ValidationError };

export type ValidatorTelemetry = Pick<
  TelemetryClient,
  'getStandings' | 'getSessionState' | 'getWeatherSlots' | 'getGripLevel'
>;
export type ValidatorBackend = Pick<BackendClient, 'getLeaderboardConfig'>;

function formatSlot(slot: RequiredWeather): string {
  return `${getConditionName(slot.condition)}, ${slot.temperature}°C, ${slot.rain}%`;
}

export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case 'StandingsUnavailable':
      return 'Failed to load standings. Waiting for session end...';
    case 'MultipleDriversDetected':
      return 'Multiple drivers detected. Only one driver allowed.';
    case 'SessionStateUnavailable':
      return 'Error reading session state. Waiting for session end...';
    case 'UnknownCar':
      return `Unknown car (sig: ${error.signaturePrefix}...). Waiting for session end...`;
    case 'WrongSessionType':
      return 'Not in practice. Waiting for session end...';
    case 'NoLeaderboardConfigured':
      return 'No leaderboard for this track. Waiting for session end...';
    case 'ClassNotAllowed':
      return `Wrong class! Yours: ${error.carClass}\nAllowed: ${error.allowed.join(', ')}`;
    case 'WeatherUnavailable':
      return 'Error reading weather. Waiting for session end...';
    case 'WeatherMismatch':
      return (
        'Weather incorrect!\n' +
        `Required: ${formatSlot(error.required)}\n` +
        `Slot ${error.index + 1}: ${formatSlot(error.observed)}`
      );
    case 'GripUnavailable':
      return 'Error reading grip level. Waiting for session end...';
    case 'GripMismatch':
      return `Grip level incorrect!\nRequired: ${getGripName(error.required)}\nCurrent: ${getGripName(error.current)}`;
  }
}

export class SessionValidator {
  constructor(
    private telemetry: ValidatorTelemetry,
    private backend: ValidatorBackend,
    private carModels: Readonly<Record<string, string>>,
    private events: RecorderEventBus,
    private pollIntervalMs: number,
    private logger: Logger
  ) {}

  private fail(error: ValidationError): ValidationResult {
    this.logger.info(`Session rejected: ${error.kind}`);
    return { ok: false, error };
  }

  async validate(signal?: AbortSignal): Promise<ValidationResult> {
    this.logger.info('Validating session conditions');

    let standings: ReadResult<StandingsEntry[]> = null;
    for (let attempt = 1; attempt <= MAX_STANDINGS_ATTEMPTS; attempt++) {
      standings = await this.telemetry.getStandings();
      if (standings || signal?.aborted) break;
      this.events.emit('status', `Loading... (${attempt}/${MAX_STANDINGS_ATTEMPTS})`);
      if (attempt < MAX_STANDINGS_ATTEMPTS) {
        await sleep(this.pollIntervalMs, signal);
      }
    }
    if (!standings) {
      return this.fail({ kind: 'StandingsUnavailable' });
    }
    if (standings.length > 1) {
      return this.fail({ kind: 'MultipleDriversDetected', count: standings.length });
    }

    const session = await this.telemetry.getSessionState();
    if (!session) {
      return this.fail({ kind: 'SessionStateUnavailable' });
    }

    const signature = readCarSignature(session) ?? '';
    const car = this.carModels[signature];
    if (!car) {
      return this.fail({ kind: 'UnknownCar', signaturePrefix: signature.slice(0, 8) });
    }

    const gameSession = session.state.gameSession ?? null;
    if (gameSession !== PRACTICE_SESSION) {
      return this.fail({ kind: 'WrongSessionType', gameSession });
    }

    const track = session.loadingStatus.track.sceneDesc;
    const config = await this.backend.getLeaderboardConfig(track);
    if (!config) {
      return this.fail({ kind: 'NoLeaderboardConfigured', track });
    }

    const carClass = standings[0].carClass ?? '';
    if (!isCarClassName(carClass) || !config.classes.includes(CAR_CLASSES[carClass])) {
      return this.fail({
        kind: 'ClassNotAllowed',
        carClass,
        allowed: config.classes.map(getClassName)
      });
    }

    const slots = await this.telemetry.getWeatherSlots();
    if (!slots || slots.length === 0) {
      return this.fail({ kind: 'WeatherUnavailable' });
    }
    const weatherMatch = matchWeather(slots, config.weather);
    if (!weatherMatch.matches) {
      return this.fail({
        kind: 'WeatherMismatch',
        required: config.weather,
        index: weatherMatch.index,
        observed: slots[weatherMatch.index]
      });
    }

    const grip = await this.telemetry.getGripLevel();
    const requiredGrip = config.weather.grip_level;
    if (grip === null || requiredGrip === null) {
      return this.fail({ kind: 'GripUnavailable' });
    }
    if (grip !== requiredGrip) {
      return this.fail({ kind: 'GripMismatch', required: requiredGrip, current: grip });
    }

    this.logger.info('All conditions met, session valid');
    return { ok: true, track, car, carClass, config };
  }
}
