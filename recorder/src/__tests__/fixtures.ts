import type { LeaderboardConfigResponse } from '../../../shared/api';
import type { SessionState, StandingsEntry } from '../clients/TelemetryClient';
import { RecorderEventBus, type RecorderEvents } from '../core/events';

export const TEST_SIGNATURE = 'abcdef0123456789';
export const CAR_MODELS: Record<string, string> = { [TEST_SIGNATURE]: 'Test GT3' };

export function leaderboardConfig(overrides: Partial<LeaderboardConfigResponse> = {}): LeaderboardConfigResponse {
  return {
    track: 'SPAWEC',
    discord_channel: 'channel-1',
    weather: { condition: 0, temperature: 25, rain: 0, grip_level: 4 },
    classes: [0],
    show_technical: false,
    tod: 720,
    fixed_setup: false,
    ...overrides
  };
}

export function sessionState(
  options: { signature?: string; track?: string; gameSession?: string } = {}
): SessionState {
  const { signature = TEST_SIGNATURE, track = 'SPAWEC', gameSession = 'PRACTICE1' } = options;
  return {
    loadingStatus: {
      loadingData: JSON.stringify({ selectedCar: { sig: signature } }),
      track: { sceneDesc: track }
    },
    state: { gameSession }
  };
}

export function standingsEntry(overrides: Partial<StandingsEntry> = {}): StandingsEntry {
  return {
    driverName: 'Test Driver',
    carClass: 'GT3',
    bestLapTime: 95.0,
    bestLapSectorTime1: 30.0,
    bestLapSectorTime2: 62.0,
    ...overrides
  };
}

/**
 * Event bus that also records what was emitted, per event
 */
export function recordingBus(): {
  bus: RecorderEventBus;
  emitted: { [K in keyof RecorderEvents]: RecorderEvents[K][] };
} {
  const bus = new RecorderEventBus();
  const emitted: { [K in keyof RecorderEvents]: RecorderEvents[K][] } = {
    status: [],
    stateChanged: [],
    validationFailed: [],
    recorderError: [],
    lapRecorded: [],
    leaderboardDetected: []
  };
  bus.on('status', (...args) => emitted.status.push(args));
  bus.on('stateChanged', (...args) => emitted.stateChanged.push(args));
  bus.on('validationFailed', (...args) => emitted.validationFailed.push(args));
  bus.on('recorderError', (...args) => emitted.recorderError.push(args));
  bus.on('lapRecorded', (...args) => emitted.lapRecorded.push(args));
  bus.on('leaderboardDetected', (...args) => emitted.leaderboardDetected.push(args));
  return { bus, emitted };
}
