export const WEATHER_NODES = ['START', 'NODE_25', 'NODE_50', 'NODE_75', 'FINISH'] as const;
export type WeatherNode = (typeof WEATHER_NODES)[number];

export const WEATHER_SETTINGS = ['WNV_SKY', 'WNV_TEMPERATURE', 'WNV_RAIN_CHANCE'] as const;
export type WeatherSetting = (typeof WEATHER_SETTINGS)[number];

export interface SettingValue {
  currentValue: number;
}

export type WeatherNodeValues = Record<WeatherSetting, SettingValue>;

export interface StandingsRow {
  driverName: string;
  carClass: string;
  bestLapTime: number;
  bestLapSectorTime1: number;
  bestLapSectorTime2: number;
}

/**
 * Everything the fake game reports. Tests mutate it through GameStateStore.
 */
export interface GameState {
  running: boolean;
  inControlOfVehicle: boolean;
  gameSession: string;
  sceneDesc: string;
  carSignature: string;
  activeSetup: string;
  standings: StandingsRow[];
  weather: Record<WeatherNode, WeatherNodeValues>;
  sessionSettings: Record<string, SettingValue>;
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
