/** Shortest lap the recorder accepts, in seconds */
export const MIN_LAP_SECONDS = 10;

/** Allowed difference between observed and required temperature, in °C */
export const TEMP_TOLERANCE = 1.0;

/** Allowed difference between observed and required rain chance, in percent */
export const RAIN_TOLERANCE = 5.0;

/** After a recorded lap the recorder waits this many poll intervals */
export const COOLDOWN_POLLS = 5;

export const MAX_STANDINGS_ATTEMPTS = 10;

/** Setups whose name contains this are the game's default (fixed) setup */
export const FIXED_SETUP_MARKER = 'Balanced';

export const PRACTICE_SESSION = 'PRACTICE1';
