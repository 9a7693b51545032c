/**
 * submission.ts
 *
 * Validation of the POST /leaderboard/:track/submit body.
 * Checks run in a fixed order and the first failure is reported with a
 * field-level message.
 */

import { z } from 'zod';

export interface ValidSubmission {
  car: string;
  driverName: string;
  carClass: string;
  lap: number;
  sector1: number;
  sector2: number;
}

export type SubmissionParseResult =
  | { ok: true; value: ValidSubmission }
  | { ok: false; error: string };

const MAX_DRIVER_NAME_LENGTH = 100;
const MAX_CAR_LENGTH = 100;
const MAX_CLASS_LENGTH = 50;

const bodySchema = z.record(z.unknown());
const timeDataSchema = z.record(z.unknown()).refine(obj => Object.keys(obj).length > 0);
const nonEmptyString = z.string().refine(s => s.trim().length > 0);

// Numbers, or strings holding a number
const timeValue = z.union([
  z.number(),
  z.string().trim().min(1).pipe(z.coerce.number())
]).pipe(z.number().finite());

const isSectorValue = (value: number): boolean => value === -1 || value > 0;

function fail(error: string): SubmissionParseResult {
  return { ok: false, error };
}

/**
 * Parse a raw request body (text) into a validated submission
 */
export function parseSubmissionBody(rawBody: string): SubmissionParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    return fail('Invalid JSON body');
  }
  return validateSubmission(parsed);
}

export function validateSubmission(body: unknown): SubmissionParseResult {
  const bodyResult = bodySchema.safeParse(body);
  if (!bodyResult.success || Array.isArray(body)) {
    return fail('Invalid JSON body');
  }
  const fields = bodyResult.data;

  const timeData = timeDataSchema.safeParse(fields.time_data);
  if (!timeData.success || Array.isArray(fields.time_data)) {
    return fail('time_data is required and must be an object');
  }

  const car = nonEmptyString.safeParse(fields.car);
  if (!car.success) {
    return fail('car is required and must be a non-empty string');
  }
  const driverName = nonEmptyString.safeParse(fields.driver_name);
  if (!driverName.success) {
    return fail('driver_name is required and must be a non-empty string');
  }
  const carClass = nonEmptyString.safeParse(fields.class);
  if (!carClass.success) {
    return fail('class is required and must be a non-empty string');
  }

  for (const key of ['lap', 'sector1', 'sector2'] as const) {
    if (timeData.data[key] === undefined || timeData.data[key] === null) {
      return fail(`time_data.${key} is required`);
    }
  }

  const lap = timeValue.safeParse(timeData.data.lap);
  const sector1 = timeValue.safeParse(timeData.data.sector1);
  const sector2 = timeValue.safeParse(timeData.data.sector2);
  if (!lap.success || !sector1.success || !sector2.success) {
    return fail('All time values must be numbers');
  }

  if (lap.data <= 0) {
    return fail('lap_time must be greater than 0');
  }
  if (!isSectorValue(sector1.data)) {
    return fail('sector1 must be -1 or greater than 0');
  }
  if (!isSectorValue(sector2.data)) {
    return fail('sector2 must be -1 or greater than 0');
  }

  if (driverName.data.length > MAX_DRIVER_NAME_LENGTH) {
    return fail(`driver_name must not exceed ${MAX_DRIVER_NAME_LENGTH} characters`);
  }
  if (car.data.length > MAX_CAR_LENGTH) {
    return fail(`car must not exceed ${MAX_CAR_LENGTH} characters`);
  }
  if (carClass.data.length > MAX_CLASS_LENGTH) {
    return fail(`class must not exceed ${MAX_CLASS_LENGTH} characters`);
  }

  return {
    ok: true,
    value: {
      car: car.data.trim(),
      driverName: driverName.data.trim(),
      carClass: carClass.data.trim(),
      lap: lap.data,
      sector1: sector1.data,
      sector2: sector2.data
    }
  };
}
