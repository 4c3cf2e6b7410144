/**
 * Unit tests for shared input schemas
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  CalendarMethodSchema,
  CitySchema,
  Iso8601Schema,
  LatitudeSchema,
  LongitudeSchema,
  MethodSchema,
  SchoolSchema,
  ShafaqSchema,
  StateSchema,
  monthSchema,
  settingsQuery,
} from './common.js';

type ParseResult = { success: true } | { success: false; error: z.ZodError };

function firstMessage(result: ParseResult): string | undefined {
  return result.success ? undefined : result.error.issues[0]?.message;
}

describe('LatitudeSchema / LongitudeSchema', () => {
  it('should accept in-range numbers and numeric strings', () => {
    expect(LatitudeSchema.parse(21.4225)).toBe(21.4225);
    expect(LatitudeSchema.parse('-33.5')).toBe(-33.5);
    expect(LongitudeSchema.parse(180)).toBe(180);
  });

  it('should reject values outside the valid range', () => {
    expect(firstMessage(LatitudeSchema.safeParse(91))).toBe('lat must be <= 90');
    expect(firstMessage(LongitudeSchema.safeParse(-181))).toBe('lon must be >= -180');
  });

  it('should report a missing coordinate as required', () => {
    expect(firstMessage(LatitudeSchema.safeParse(undefined))).toBe('lat is required');
  });

  it('should reject non-numeric strings', () => {
    expect(firstMessage(LongitudeSchema.safeParse('east'))).toBe('lon must be a number');
  });

  it('should only coerce plain decimal strings', () => {
    expect(LatitudeSchema.parse(' +12.5 ')).toBe(12.5);
    expect(firstMessage(LatitudeSchema.safeParse('0x1F'))).toBe('lat must be a number');
    expect(firstMessage(LongitudeSchema.safeParse('1e2'))).toBe('lon must be a number');
    expect(firstMessage(LongitudeSchema.safeParse('Infinity'))).toBe('lon must be a number');
  });
});

describe('string fields', () => {
  it('should trim required strings and reject blanks', () => {
    expect(CitySchema.parse('  Cairo ')).toBe('Cairo');
    expect(firstMessage(CitySchema.safeParse('   '))).toBe('city is required');
  });

  it('should treat blank optional strings as absent', () => {
    expect(StateSchema.parse('')).toBeUndefined();
    expect(StateSchema.parse(null)).toBeUndefined();
    expect(StateSchema.parse(' Texas ')).toBe('Texas');
  });
});

describe('choice fields', () => {
  it('should accept school 0 and 1 only', () => {
    expect(SchoolSchema.parse(1)).toBe(1);
    expect(SchoolSchema.parse('0')).toBe(0);
    expect(SchoolSchema.parse(undefined)).toBeUndefined();
    expect(firstMessage(SchoolSchema.safeParse(2))).toBe(
      'school must be 0 (Shafi) or 1 (Hanafi)'
    );
  });

  it('should accept a non-negative integer method', () => {
    expect(MethodSchema.parse(99)).toBe(99);
    expect(firstMessage(MethodSchema.safeParse(-1))).toBe('method must be >= 0');
    expect(firstMessage(MethodSchema.safeParse(2.5))).toBe('method must be an integer');
    expect(firstMessage(MethodSchema.safeParse(1e21))).toBe('method must be <= 99');
    expect(firstMessage(MethodSchema.safeParse('1e21'))).toBe('method must be a number');
  });

  it('should validate calendarMethod and shafaq names', () => {
    expect(CalendarMethodSchema.parse('UAQ')).toBe('UAQ');
    expect(firstMessage(CalendarMethodSchema.safeParse('LUNAR'))).toBe(
      'calendarMethod must be HJCoSA, UAQ, DIYANET, or MATHEMATICAL'
    );
    expect(ShafaqSchema.parse('ahmer')).toBe('ahmer');
    expect(firstMessage(ShafaqSchema.safeParse('red'))).toBe(
      'shafaq must be general, ahmer, or abyad'
    );
  });

  it('should accept iso8601 as a boolean or its string form', () => {
    expect(Iso8601Schema.parse('true')).toBe(true);
    expect(Iso8601Schema.parse(false)).toBe(false);
    expect(firstMessage(Iso8601Schema.safeParse('yes'))).toBe('iso8601 must be true or false');
  });
});

describe('monthSchema', () => {
  it('should accept months 1 to 12', () => {
    expect(monthSchema('Hijri').parse(9)).toBe(9);
    expect(firstMessage(monthSchema('Gregorian').safeParse(13))).toBe(
      'month must be between 1 and 12'
    );
  });
});

describe('settingsQuery', () => {
  it('should map settings onto upstream parameter names in order', () => {
    const query = settingsQuery({
      adjustment: -1,
      timezone: 'Africa/Cairo',
      school: 1,
      method: 5,
    });

    expect(Object.entries(query).filter(([, value]) => value !== undefined)).toEqual([
      ['method', 5],
      ['school', 1],
      ['timezonestring', 'Africa/Cairo'],
      ['adjustment', -1],
    ]);
  });
});
