import { RAIN_TOLERANCE, TEMP_TOLERANCE } from '../settings';
import type { WeatherSlot } from '../clients/TelemetryClient';

export interface RequiredWeather {
  condition: number;
  temperature: number;
  rain: number;
}

export type WeatherMatch = { matches: true } | { matches: false; index: number };

export function slotMatches(slot: WeatherSlot, required: RequiredWeather): boolean {
  return (
    slot.condition === required.condition &&
    Math.abs(slot.temperature - required.temperature) <= TEMP_TOLERANCE &&
    Math.abs(slot.rain - required.rain) <= RAIN_TOLERANCE
  );
}

/**
 * Check every observed slot against the requirement, reporting the first that
 * does not match. Callers treat an empty slot list as a read error.
 */
export function matchWeather(observed: readonly WeatherSlot[], required: RequiredWeather): WeatherMatch {
  const index = observed.findIndex((slot) => !slotMatches(slot, required));
  return index === -1 ? { matches: true } : { matches: false, index };
}
