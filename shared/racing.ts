/**
 * racing.ts
 *
 * Code tables shared by the backend and the recorder: car classes, weather
 * conditions, grip levels and track display names.
 *
 * Each table is keyed by its code type and checked with `satisfies`, so adding
 * a code without a label (or the reverse) fails type-checking.
 */

export const CAR_CLASSES = {
  GT3: 0,
  GTE: 1,
  LMP3: 2,
  LMP2: 3,
  LMP2_ELMS: 4,
  Hyper: 5
} as const;

export type CarClassName = keyof typeof CAR_CLASSES;
export type CarClassCode = (typeof CAR_CLASSES)[CarClassName];

export const CAR_CLASS_NAMES = {
  0: 'GT3',
  1: 'GTE',
  2: 'LMP3',
  3: 'LMP2',
  4: 'LMP2_ELMS',
  5: 'Hyper'
} as const satisfies Record<CarClassCode, CarClassName>;

export const CAR_CLASS_CODES: readonly CarClassCode[] = [0, 1, 2, 3, 4, 5];

export type WeatherConditionCode = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10;

export const WEATHER_CONDITIONS = {
  0: 'Clear',
  1: 'Light Clouds',
  2: 'Partially Cloudy',
  3: 'Mostly Cloudy',
  4: 'Overcast',
  5: 'Cloudy & Drizzle',
  6: 'Cloudy & Light Rain',
  7: 'Overcast & Light Rain',
  8: 'Overcast & Rain',
  9: 'Overcast & Heavy Rain',
  10: 'Overcast & Storm'
} as const satisfies Record<WeatherConditionCode, string>;

export type GripLevelCode = 0 | 1 | 2 | 3 | 4 | 5;

export const GRIP_LEVELS = {
  0: 'Green',
  1: 'Naturally Progressing',
  2: 'Heavy Grip',
  3: 'Low Grip',
  4: 'Medium Grip',
  5: 'Saturated Grip'
} as const satisfies Record<GripLevelCode, string>;

export const TRACK_NAMES: Readonly<Record<string, string>> = {
  PORTIMAOWEC: 'Portimão',
  IMOLAWEC: 'Imola',
  MONZAWEC: 'Monza',
  MONZAWEC_GRANDE: 'Monza Curva Grande',
  INTERLAGOSWEC: 'Interlagos',
  BAHRAINWEC: 'Bahrain',
  BAHRAINWEC_ENDCE: 'Bahrain Endurance',
  BAHRAINWEC_OUTER: 'Bahrain Outer',
  BAHRAINWEC_PADDOCK: 'Bahrain Paddock',
  SPAWEC: 'Spa-Francorchamps',
  SPAWEC_ENDCE: 'Spa Endurance',
  LEMANSWEC: 'Le Mans',
  LEMANSWEC_MULSANNE: 'Le Mans Mulsanne',
  COTAWEC_NATIONAL: 'Circuit of the Americas - National',
  COTAWEC: 'Circuit of the Americas',
  FUJIWEC: 'Fuji Speedway',
  FUJIWEC_CL: 'Fuji Classic',
  QATARWEC_SHORT: 'Lusail Short',
  QATARWEC: 'Lusail Circuit',
  PAULRICARDELMS: 'Paul Ricard',
  SEBRINGWEC: 'Sebring International Raceway',
  SEBRINGWEC_SCHOOL: 'Sebring School Circuit',
  SILVERSTONEELMS: 'Silverstone'
};

export function isCarClassName(value: string): value is CarClassName {
  return Object.prototype.hasOwnProperty.call(CAR_CLASSES, value);
}

export function isCarClassCode(value: number): value is CarClassCode {
  return (CAR_CLASS_CODES as readonly number[]).includes(value);
}

export function isWeatherConditionCode(value: number): value is WeatherConditionCode {
  return Number.isInteger(value) && value >= 0 && value <= 10;
}

export function isGripLevelCode(value: number): value is GripLevelCode {
  return Number.isInteger(value) && value >= 0 && value <= 5;
}

export function getConditionName(condition: number): string {
  return isWeatherConditionCode(condition)
    ? WEATHER_CONDITIONS[condition]
    : `Unknown (${condition})`;
}

export function getGripName(grip: number): string {
  return isGripLevelCode(grip) ? GRIP_LEVELS[grip] : String(grip);
}

export function getClassName(code: number): string {
  return isCarClassCode(code) ? CAR_CLASS_NAMES[code] : '?';
}

export function getTrackName(track: string): string {
  return TRACK_NAMES[track] ?? track;
}
