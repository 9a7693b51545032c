import { EventEmitter } from 'events';
import type { LeaderboardConfigResponse } from '../../../shared/api';
import type { ValidationError } from './SessionValidator';

export type CoordinatorState =
  | 'WaitingForGame'
  | 'WaitingForSession'
  | 'Validating'
  | 'Recording'
  | 'WaitingForSessionEnd'
  | 'Stopped';

/**
 * Events background work reports to whatever presents them
 */
export interface RecorderEvents {
  status: [message: string];
  stateChanged: [state: CoordinatorState];
  validationFailed: [error: ValidationError, message: string];
  recorderError: [message: string];
  lapRecorded: [lap: number];
  leaderboardDetected: [track: string, config: LeaderboardConfigResponse];
}

/**
 * Typed wrapper over EventEmitter, the single dispatch point for status updates
 */
export class RecorderEventBus {
  private emitter = new EventEmitter();

  on<K extends keyof RecorderEvents>(event: K, listener: (...args: RecorderEvents[K]) => void): this {
    this.emitter.on(event, (...args: RecorderEvents[K]) => listener(...args));
    return this;
  }

  removeAllListeners<K extends keyof RecorderEvents>(event?: K): this {
    this.emitter.removeAllListeners(event);
    return this;
  }

  emit<K extends keyof RecorderEvents>(event: K, ...args: RecorderEvents[K]): boolean {
    return this.emitter.emit(event, ...args);
  }
}
