import type {
  GameState,
  Logger,
  SettingValue,
  StandingsRow,
  WeatherNode,
  WeatherNodeValues,
  WeatherSetting,
} from './types';

function defaultNodeWeather(): WeatherNodeValues {
  return {
    WNV_SKY: { currentValue: 0 },
    WNV_TEMPERATURE: { currentValue: 25 },
    WNV_RAIN_CHANCE: { currentValue: 0 },
  };
}

export function createDefaultGameState(): GameState {
  const weather: Record<WeatherNode, WeatherNodeValues> = {
    START: defaultNodeWeather(),
    NODE_25: defaultNodeWeather(),
    NODE_50: defaultNodeWeather(),
    NODE_75: defaultNodeWeather(),
    FINISH: defaultNodeWeather(),
  };
  return {
    running: true,
    inControlOfVehicle: false,
    gameSession: 'PRACTICE1',
    sceneDesc: 'SPAWEC',
    carSignature: 'abcdef0123456789',
    activeSetup: 'Balanced',
    standings: [],
    weather,
    sessionSettings: {
      SESSSET_pract1: { currentValue: 1 },
      SESSSET_num_qual_sessions: { currentValue: 1 },
      SESSSET_num_race_sessions: { currentValue: 1 },
      SESSSET_realroad_timescale_practice: { currentValue: 1 },
      SESSSET_practice1_starting_time: { currentValue: 540 },
      SESSSET_pract1_realroad_init: { currentValue: 0 },
    },
  };
}

export class GameStateStore {
  private state: GameState;
  private logger: Logger;

  constructor(logger: Logger, initial: GameState = createDefaultGameState()) {
    this.logger = logger;
    this.state = initial;
  }

  get(): GameState {
    return this.state;
  }

  update(changes: Partial<GameState>): void {
    this.state = { ...this.state, ...changes };
    this.logger.debug('Game state updated', Object.keys(changes));
  }

  setStandings(rows: StandingsRow[]): void {
    this.state.standings = rows;
  }

  setWeather(node: WeatherNode, setting: WeatherSetting, value: number): void {
    this.state.weather[node][setting].currentValue = value;
  }

  /**
   * Apply a relative change to a session setting
   * @returns the updated setting, or undefined when it does not exist
   */
  applySettingDelta(name: string, delta: number): SettingValue | undefined {
    const setting = this.state.sessionSettings[name];
    if (!setting) {
      this.logger.warn('Unknown session setting', { name });
      return undefined;
    }
    setting.currentValue += delta;
    this.logger.info('Session setting changed', { name, value: setting.currentValue });
    return setting;
  }

  applyWeatherDelta(node: WeatherNode, setting: WeatherSetting, delta: number): WeatherNodeValues {
    const values = this.state.weather[node];
    values[setting].currentValue += delta;
    this.logger.info('Weather changed', { node, setting, value: values[setting].currentValue });
    return values;
  }

  reset(): void {
    this.state = createDefaultGameState();
    this.logger.info('Game state reset');
  }
}
