/**
 * SessionCoordinator.ts
 *
 * The recorder's driving loop: wait for the game, wait for a session,
 * validate it, record it, then wait for it to end. States and the transitions
 * between them are reported on the event bus.
 */

import type { BackendClient } from '../clients/BackendClient';
import type { TelemetryClient } from '../clients/TelemetryClient';
import type { Logger } from '../logger';
import { getTrackName } from '../../../shared/racing';
import { sleep } from '../utils/sleep';
import type { CoordinatorState, RecorderEventBus } from './events';
import type { SessionRecorder } from './SessionRecorder';
import { describeValidationError, type SessionValidator, type ValidSession } from './SessionValidator';

export type CoordinatorTelemetry = Pick<TelemetryClient, 'probeConnection' | 'getSessionInfo' | 'getSessionState'>;
export type CoordinatorBackend = Pick<BackendClient, 'getLeaderboardConfig'>;

export interface CoordinatorOptions {
  telemetry: CoordinatorTelemetry;
  backend: CoordinatorBackend;
  validator: Pick<SessionValidator, 'validate'>;
  recorder: Pick<SessionRecorder, 'start' | 'stop'>;
  events: RecorderEventBus;
  pollIntervalMs: number;
  logger: Logger;
  /** Asked before each valid session is recorded; resolving false skips it */
  confirmRecording?: (session: ValidSession) => Promise<boolean>;
}

type ActiveState = Exclude<CoordinatorState, 'Stopped'>;

export class SessionCoordinator {
  private controller: AbortController | null = null;
  private session: ValidSession | null = null;
  private lastTrack: string | null = null;
  private state: CoordinatorState = 'Stopped';

  constructor(private options: CoordinatorOptions) {}

  get currentState(): CoordinatorState {
    return this.state;
  }

  private setState(state: CoordinatorState): void {
    if (state !== this.state) {
      this.state = state;
      this.options.logger.debug(`State: ${state}`);
      this.options.events.emit('stateChanged', state);
    }
  }

  private status(message: string): void {
    this.options.events.emit('status', message);
  }

  /**
   * Run until stop() is called. Resolves once the loop has wound down.
   */
  async run(): Promise<void> {
    if (this.controller) {
      this.options.logger.warn('Coordinator already running');
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;

    let next: ActiveState = 'WaitingForGame';
    try {
      while (!signal.aborted) {
        this.setState(next);
        switch (next) {
          case 'WaitingForGame':
            next = await this.waitForGame(signal);
            break;
          case 'WaitingForSession':
            next = await this.waitForSession(signal);
            break;
          case 'Validating':
            next = await this.validateSession(signal);
            break;
          case 'Recording':
            next = await this.recordSession();
            break;
          case 'WaitingForSessionEnd':
            next = await this.waitForSessionEnd(signal);
            break;
        }
      }
    } finally {
      this.controller = null;
      this.setState('Stopped');
    }
  }

  stop(): void {
    this.controller?.abort();
    this.options.recorder.stop();
  }

  private async waitForGame(signal: AbortSignal): Promise<ActiveState> {
    this.status('Waiting for game...');
    this.lastTrack = null;
    while (!signal.aborted) {
      if (await this.options.telemetry.probeConnection()) {
        this.options.logger.info('Game connected');
        this.status('Game connected. Waiting for session...');
        return 'WaitingForSession';
      }
      await sleep(this.options.pollIntervalMs, signal);
    }
    return 'WaitingForGame';
  }

  private async waitForSession(signal: AbortSignal): Promise<ActiveState> {
    while (!signal.aborted) {
      const info = await this.options.telemetry.getSessionInfo();
      if (info === false) {
        return 'WaitingForGame';
      }
      if (info?.inControlOfVehicle) {
        return 'Validating';
      }
      await this.checkTrackForLeaderboard();
      await sleep(this.options.pollIntervalMs, signal);
    }
    return 'WaitingForSession';
  }

  /**
   * Announce a leaderboard when the loaded track changes to one that has one
   */
  private async checkTrackForLeaderboard(): Promise<void> {
    const state = await this.options.telemetry.getSessionState();
    if (!state) return;

    const track = state.loadingStatus.track.sceneDesc;
    if (!track || track === this.lastTrack) return;

    const config = await this.options.backend.getLeaderboardConfig(track);
    if (config === null) return;

    this.lastTrack = track;
    if (config) {
      this.options.logger.info(`Leaderboard available for ${getTrackName(track)}`);
      this.options.events.emit('leaderboardDetected', track, config);
    }
  }

  private async validateSession(signal: AbortSignal): Promise<ActiveState> {
    this.status('Validating session...');
    const result = await this.options.validator.validate(signal);
    if (signal.aborted) {
      return 'WaitingForSession';
    }

    if (!result.ok) {
      const message = describeValidationError(result.error);
      this.options.events.emit('validationFailed', result.error, message);
      this.status(message);
      return 'WaitingForSessionEnd';
    }

    if (this.options.confirmRecording && !(await this.options.confirmRecording(result))) {
      this.status('Recording skipped. Waiting for session end...');
      return 'WaitingForSessionEnd';
    }

    this.session = result;
    return 'Recording';
  }

  private async recordSession(): Promise<ActiveState> {
    const session = this.session;
    if (!session) {
      return 'WaitingForSession';
    }

    this.status(`Recording on ${getTrackName(session.track)} in ${session.car}. Waiting for a lap...`);
    const outcome = await this.options.recorder.start({
      track: session.track,
      car: session.car,
      fixedSetup: session.config.fixed_setup
    });
    this.session = null;
    this.options.logger.info(`Recording finished: ${outcome}`);

    switch (outcome) {
      case 'Disconnected':
        return 'WaitingForGame';
      case 'Blacklisted':
        return 'WaitingForSessionEnd';
      case 'SessionEnded':
      case 'StoppedByCaller':
        return 'WaitingForSession';
    }
  }

  private async waitForSessionEnd(signal: AbortSignal): Promise<ActiveState> {
    while (!signal.aborted) {
      const info = await this.options.telemetry.getSessionInfo();
      if (info === false) {
        return 'WaitingForGame';
      }
      if (info && !info.inControlOfVehicle) {
        this.status('Session ended. Waiting for new session...');
        return 'WaitingForSession';
      }
      await sleep(this.options.pollIntervalMs, signal);
    }
    return 'WaitingForSessionEnd';
  }
}
