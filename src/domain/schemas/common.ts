/**
 * Common Zod schemas for Aladhan tools
 *
 * Numeric arguments also accept numeric strings, and empty optional strings
 * count as absent, so loosely typed MCP clients validate the same way.
 */

import { z } from 'zod';
import type { QueryParams } from '../types.js';

const DECIMAL_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Plain decimal strings become numbers; null becomes undefined.
 * Hex, exponent and Infinity spellings are left as strings and fail as non-numbers.
 */
function toNumber(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

function toBoolean(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  return value;
}

/**
 * Trimmed; null and blank become undefined
 */
function toOptionalString(value: unknown): unknown {
  if (value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  return value;
}

function requiredString(field: string) {
  const message = `${field} is required`;
  return z
    .string({ required_error: message, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, message);
}

function optionalString(field: string) {
  return z.preprocess(
    toOptionalString,
    z.string({ invalid_type_error: `${field} must be a string` }).optional()
  );
}

function requiredNumber(field: string) {
  return z.number({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a number`,
  });
}

/**
 * An optional number restricted to a closed set of values
 */
function numericChoice<const T extends readonly number[]>(choices: T, message: string) {
  return z.preprocess(
    toNumber,
    z
      .number({ invalid_type_error: message })
      .refine(
        (value): value is T[number] => choices.some((choice) => choice === value),
        message
      )
      .optional()
  );
}

export const LatitudeSchema = z
  .preprocess(
    toNumber,
    requiredNumber('lat')
      .min(-90, 'lat must be >= -90')
      .max(90, 'lat must be <= 90')
  )
  .describe('Latitude in decimal degrees');

export const LongitudeSchema = z
  .preprocess(
    toNumber,
    requiredNumber('lon')
      .min(-180, 'lon must be >= -180')
      .max(180, 'lon must be <= 180')
  )
  .describe('Longitude in decimal degrees');

export const yearSchema = (calendar: 'Gregorian' | 'Hijri') =>
  z
    .preprocess(
      toNumber,
      requiredNumber('year')
        .int('year must be an integer')
        .positive('year must be positive')
    )
    .describe(`${calendar} year (e.g., ${calendar === 'Hijri' ? 1446 : 2025})`);

export const monthSchema = (calendar: 'Gregorian' | 'Hijri') =>
  z
    .preprocess(
      toNumber,
      requiredNumber('month')
        .int('month must be an integer')
        .min(1, 'month must be between 1 and 12')
        .max(12, 'month must be between 1 and 12')
    )
    .describe(`${calendar} month (1-12)`);

export const CitySchema = requiredString('city').describe('City name');

export const CountrySchema = requiredString('country').describe(
  'Country name or 2-letter ISO code'
);

export const StateSchema = optionalString('state').describe('State or province');

export const OptionalDateSchema = optionalString('date').describe(
  'Date in DD-MM-YYYY format (defaults to today)'
);

export const MethodSchema = z
  .preprocess(
    toNumber,
    z
      .number({ invalid_type_error: 'method must be a number' })
      .int('method must be an integer')
      .nonnegative('method must be >= 0')
      .max(99, 'method must be <= 99')
      .optional()
  )
  .describe('Prayer calculation method id (0-23 or 99, see list_calculation_methods)');

export const SchoolSchema = numericChoice(
  [0, 1] as const,
  'school must be 0 (Shafi) or 1 (Hanafi)'
).describe('Islamic school for Asr (0=Shafi, 1=Hanafi)');

export const MidnightModeSchema = numericChoice(
  [0, 1] as const,
  'midnightMode must be 0 (Standard) or 1 (Jafari)'
).describe('Midnight calculation mode (0=Standard, 1=Jafari)');

export const LatitudeAdjustmentMethodSchema = numericChoice(
  [1, 2, 3] as const,
  'latitudeAdjustmentMethod must be 1, 2, or 3'
).describe(
  'Higher latitude adjustment (1=Middle of the Night, 2=One Seventh, 3=Angle Based)'
);

export const CALENDAR_METHODS = ['HJCoSA', 'UAQ', 'DIYANET', 'MATHEMATICAL'] as const;

export const CalendarMethodSchema = z
  .preprocess(
    toOptionalString,
    z
      .enum(CALENDAR_METHODS, {
        errorMap: () => ({
          message: 'calendarMethod must be HJCoSA, UAQ, DIYANET, or MATHEMATICAL',
        }),
      })
      .optional()
  )
  .describe('Hijri calendar calculation method (HJCoSA|UAQ|DIYANET|MATHEMATICAL)');

export const SHAFAQ_TYPES = ['general', 'ahmer', 'abyad'] as const;

export const ShafaqSchema = z
  .preprocess(
    toOptionalString,
    z
      .enum(SHAFAQ_TYPES, {
        errorMap: () => ({ message: 'shafaq must be general, ahmer, or abyad' }),
      })
      .optional()
  )
  .describe('Shafaq type for Isha (general|ahmer|abyad)');

export const TimezoneSchema = optionalString('timezone').describe(
  'IANA timezone (e.g., Asia/Singapore)'
);

export const Iso8601Schema = z
  .preprocess(
    toBoolean,
    z.boolean({ invalid_type_error: 'iso8601 must be true or false' }).optional()
  )
  .describe('Return times in ISO-8601 format');

export const TuneSchema = optionalString('tune').describe(
  'Comma-separated minute offsets for timings (e.g., 0,0,5,0,0,0,0,0,0)'
);

export const AdjustmentSchema = z
  .preprocess(
    toNumber,
    z
      .number({ invalid_type_error: 'adjustment must be a number' })
      .int('adjustment must be an integer')
      .optional()
  )
  .describe('Hijri date adjustment in days');

/**
 * Settings shared by the daily timing tools
 */
export const DailySettingsShape = {
  date: OptionalDateSchema,
  method: MethodSchema,
  school: SchoolSchema,
  timezone: TimezoneSchema,
  iso8601: Iso8601Schema,
};

/**
 * Optional calculation settings, in the order they are sent upstream
 */
export interface CalculationSettings {
  method?: number;
  school?: 0 | 1;
  midnightMode?: 0 | 1;
  timezone?: string;
  latitudeAdjustmentMethod?: 1 | 2 | 3;
  calendarMethod?: (typeof CALENDAR_METHODS)[number];
  shafaq?: (typeof SHAFAQ_TYPES)[number];
  tune?: string;
  iso8601?: boolean;
  adjustment?: number;
}

/**
 * Map friendly setting names onto upstream query parameters
 */
export function settingsQuery(settings: CalculationSettings): QueryParams {
  return {
    method: settings.method,
    school: settings.school,
    midnightMode: settings.midnightMode,
    timezonestring: settings.timezone,
    latitudeAdjustmentMethod: settings.latitudeAdjustmentMethod,
    calendarMethod: settings.calendarMethod,
    shafaq: settings.shafaq,
    tune: settings.tune,
    iso8601: settings.iso8601,
    adjustment: settings.adjustment,
  };
}
