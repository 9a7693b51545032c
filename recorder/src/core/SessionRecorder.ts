/**
 * SessionRecorder.ts
 *
 * Polls the game during a validated session and submits each new session
 * best lap. One recording loop runs at a time; it ends with an outcome rather
 * than a callback.
 */

import type { BackendClient } from '../clients/BackendClient';
import type { TelemetryClient } from '../clients/TelemetryClient';
import type { Logger } from '../logger';
import { COOLDOWN_POLLS, FIXED_SETUP_MARKER, MIN_LAP_SECONDS } from '../settings';
import { sleep } from '../utils/sleep';
import type { RecorderEventBus } from './events';

export type RecordingOutcome = 'SessionEnded' | 'Disconnected' | 'Blacklisted' | 'StoppedByCaller';

export interface RecordingOptions {
  track: string;
  car: string;
  fixedSetup: boolean;
}

export type RecorderTelemetry = Pick<TelemetryClient, 'getStandings' | 'getSessionInfo' | 'getActiveSetupName'>;
export type RecorderBackend = Pick<BackendClient, 'submitLapTime'>;

export class SessionRecorder {
  private controller: AbortController | null = null;
  private running: Promise<RecordingOutcome> | null = null;
  private sessionBest: number | null = null;

  constructor(
    private telemetry: RecorderTelemetry,
    private backend: RecorderBackend,
    private events: RecorderEventBus,
    private pollIntervalMs: number,
    private logger: Logger
  ) {}

  get isRecording(): boolean {
    return this.running !== null;
  }

  /** Fastest lap recorded in the current (or last) session */
  get bestLap(): number | null {
    return this.sessionBest;
  }

  /**
   * Start recording. While a loop is already running this returns its
   * promise instead of starting another.
   */
  start(options: RecordingOptions): Promise<RecordingOutcome> {
    if (this.running) {
      this.logger.warn('Already recording');
      return this.running;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.sessionBest = null;
    this.running = this.recordLoop(options, controller.signal).finally(() => {
      this.running = null;
      this.controller = null;
    });
    return this.running;
  }

  /**
   * Ask the running loop to stop. Interrupts a pending sleep; safe to call
   * at any time and more than once.
   */
  stop(): void {
    if (this.controller && !this.controller.signal.aborted) {
      this.logger.info('Recording stopped');
      this.controller.abort();
    }
  }

  private async recordLoop(options: RecordingOptions, signal: AbortSignal): Promise<RecordingOutcome> {
    this.logger.info(`Recording on ${options.track} in ${options.car}`);
    let onFixedSetup = true;

    while (!signal.aborted) {
      if (options.fixedSetup) {
        const setup = await this.telemetry.getActiveSetupName();
        if (signal.aborted) break;
        if (setup === null) {
          this.events.emit('recorderError', 'Error reading setup. Trying again...');
          await sleep(this.pollIntervalMs, signal);
          continue;
        }
        const isFixed = setup.includes(FIXED_SETUP_MARKER);
        if (!isFixed) {
          if (onFixedSetup) {
            this.events.emit('recorderError', 'Fixed setup required! Please switch to the default setup to record.');
            onFixedSetup = false;
          }
          await sleep(this.pollIntervalMs, signal);
          continue;
        }
        if (!onFixedSetup) {
          this.events.emit('recorderError', 'Thank you for switching to the default setup! Resuming recording.');
          onFixedSetup = true;
        }
      }

      const [standings, info] = await Promise.all([
        this.telemetry.getStandings(),
        this.telemetry.getSessionInfo()
      ]);
      if (signal.aborted) break;

      // Standings empty out when the session ends, so check control first
      if (info && !info.inControlOfVehicle) {
        this.logger.info('Session ended during recording');
        this.events.emit('status', 'Session ended. Waiting for new session...');
        return 'SessionEnded';
      }
      if (info === false || standings === false) {
        this.logger.warn('Game disconnected during recording');
        this.events.emit('status', 'Waiting for game...');
        return 'Disconnected';
      }
      if (standings === null || info === null) {
        await sleep(this.pollIntervalMs, signal);
        continue;
      }

      const entry = standings[0];
      const lap = entry.bestLapTime;
      const sector1 = entry.bestLapSectorTime1;
      const sector2 = entry.bestLapSectorTime2;

      if (
        !lap ||
        lap < MIN_LAP_SECONDS ||
        (this.sessionBest !== null && lap >= this.sessionBest) ||
        !sector1 ||
        !sector2
      ) {
        await sleep(this.pollIntervalMs, signal);
        continue;
      }

      this.logger.info(`Lap: ${lap.toFixed(3)} (S1: ${sector1.toFixed(3)}, S2: ${sector2.toFixed(3)})`);
      this.sessionBest = lap;
      this.events.emit('lapRecorded', lap);
      this.events.emit('status', `Recorded: ${lap.toFixed(3)}s\nWaiting for next lap...`);

      const outcome = await this.backend.submitLapTime(options.track, {
        time_data: { sector1, sector2, lap },
        car: options.car,
        driver_name: entry.driverName ?? 'Unknown',
        class: entry.carClass ?? ''
      });

      if (outcome === 'blacklisted') {
        this.logger.error('Submission failed, driver is blacklisted');
        this.events.emit('status', 'Submission failed. Blacklisted. Waiting for session end...');
        return 'Blacklisted';
      }
      if (outcome === 'failed') {
        this.logger.error(`Submission of ${lap.toFixed(3)}s failed`);
      }

      await sleep(this.pollIntervalMs * COOLDOWN_POLLS, signal);
    }

    return 'StoppedByCaller';
  }
}
