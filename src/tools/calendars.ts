/**
 * Monthly calendar tools
 * Prayer times for a whole Hijri or Gregorian month, by coordinates or by city
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { buildToolResponse } from '../domain/response-builder.js';
import { unwrapEnvelope } from '../domain/envelope.js';
import { wrapTool } from '../domain/tool-wrapper.js';
import { logger } from '../domain/logger.js';
import type { QueryParams } from '../domain/types.js';
import {
  AdjustmentSchema,
  CalendarMethodSchema,
  CitySchema,
  CountrySchema,
  Iso8601Schema,
  LatitudeAdjustmentMethodSchema,
  LatitudeSchema,
  LongitudeSchema,
  MethodSchema,
  MidnightModeSchema,
  SchoolSchema,
  ShafaqSchema,
  StateSchema,
  TimezoneSchema,
  TuneSchema,
  monthSchema,
  settingsQuery,
  yearSchema,
} from '../domain/schemas/common.js';
import type { ToolContext } from './context.js';

const calendarSettingsShape = {
  method: MethodSchema,
  school: SchoolSchema,
  midnightMode: MidnightModeSchema,
  timezone: TimezoneSchema,
  latitudeAdjustmentMethod: LatitudeAdjustmentMethodSchema,
  iso8601: Iso8601Schema,
  adjustment: AdjustmentSchema,
};

export const HijriCalendarByCityInputSchema = z.object({
  year: yearSchema('Hijri'),
  month: monthSchema('Hijri'),
  city: CitySchema,
  country: CountrySchema,
  state: StateSchema,
  ...calendarSettingsShape,
  calendarMethod: CalendarMethodSchema,
});

export type HijriCalendarByCityInput = z.infer<typeof HijriCalendarByCityInputSchema>;

export const HijriCalendarInputSchema = z.object({
  year: yearSchema('Hijri'),
  month: monthSchema('Hijri'),
  lat: LatitudeSchema,
  lon: LongitudeSchema,
  ...calendarSettingsShape,
  calendarMethod: CalendarMethodSchema,
});

export type HijriCalendarInput = z.infer<typeof HijriCalendarInputSchema>;

export const MonthlyCalendarInputSchema = z.object({
  year: yearSchema('Gregorian'),
  month: monthSchema('Gregorian'),
  lat: LatitudeSchema,
  lon: LongitudeSchema,
  ...calendarSettingsShape,
  shafaq: ShafaqSchema,
  tune: TuneSchema,
});

export type MonthlyCalendarInput = z.infer<typeof MonthlyCalendarInputSchema>;

export const MonthlyCalendarByCityInputSchema = z.object({
  year: yearSchema('Gregorian'),
  month: monthSchema('Gregorian'),
  city: CitySchema,
  country: CountrySchema,
  state: StateSchema,
  ...calendarSettingsShape,
  shafaq: ShafaqSchema,
  tune: TuneSchema,
  x7xapikey: z
    .preprocess(
      (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined),
      z.string().optional()
    )
    .describe('API key for premium features'),
});

export type MonthlyCalendarByCityInput = z.infer<typeof MonthlyCalendarByCityInputSchema>;

async function fetchCalendar(
  context: ToolContext,
  path: string,
  query: QueryParams
): Promise<CallToolResult> {
  const response = await context.client.get(path, query, {
    timeout: context.calendarTimeoutMs,
  });
  return buildToolResponse(unwrapEnvelope(response.data));
}

export async function handleGetHijriCalendarByCity(
  input: HijriCalendarByCityInput,
  context: ToolContext
): Promise<CallToolResult> {
  return fetchCalendar(context, `/hijriCalendarByCity/${input.year}/${input.month}`, {
    city: input.city,
    country: input.country,
    state: input.state,
    ...settingsQuery(input),
  });
}

export async function handleGetHijriCalendar(
  input: HijriCalendarInput,
  context: ToolContext
): Promise<CallToolResult> {
  return fetchCalendar(context, `/hijriCalendar/${input.year}/${input.month}`, {
    latitude: input.lat,
    longitude: input.lon,
    ...settingsQuery(input),
  });
}

export async function handleGetMonthlyCalendar(
  input: MonthlyCalendarInput,
  context: ToolContext
): Promise<CallToolResult> {
  return fetchCalendar(context, `/calendar/${input.year}/${input.month}`, {
    latitude: input.lat,
    longitude: input.lon,
    ...settingsQuery(input),
  });
}

export async function handleGetMonthlyCalendarByCity(
  input: MonthlyCalendarByCityInput,
  context: ToolContext
): Promise<CallToolResult> {
  return fetchCalendar(context, `/calendarByCity/${input.year}/${input.month}`, {
    city: input.city,
    country: input.country,
    state: input.state,
    ...settingsQuery(input),
    x7xapikey: input.x7xapikey,
  });
}

export function registerCalendarTools(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'get_hijri_calendar_by_city',
    {
      description: 'Get prayer times for every day of a Hijri month by city/country.',
      inputSchema: HijriCalendarByCityInputSchema.shape,
    },
    wrapTool('get_hijri_calendar_by_city', async (args: unknown) => {
      const input = HijriCalendarByCityInputSchema.parse(args);
      return handleGetHijriCalendarByCity(input, context);
    })
  );

  server.registerTool(
    'get_hijri_calendar',
    {
      description: 'Get prayer times for every day of a Hijri month by coordinates.',
      inputSchema: HijriCalendarInputSchema.shape,
    },
    wrapTool('get_hijri_calendar', async (args: unknown) => {
      const input = HijriCalendarInputSchema.parse(args);
      return handleGetHijriCalendar(input, context);
    })
  );

  server.registerTool(
    'get_monthly_calendar',
    {
      description: 'Get prayer times for every day of a Gregorian month by coordinates.',
      inputSchema: MonthlyCalendarInputSchema.shape,
    },
    wrapTool('get_monthly_calendar', async (args: unknown) => {
      const input = MonthlyCalendarInputSchema.parse(args);
      return handleGetMonthlyCalendar(input, context);
    })
  );

  server.registerTool(
    'get_monthly_calendar_by_city',
    {
      description: 'Get prayer times for every day of a Gregorian month by city/country.',
      inputSchema: MonthlyCalendarByCityInputSchema.shape,
    },
    wrapTool('get_monthly_calendar_by_city', async (args: unknown) => {
      const input = MonthlyCalendarByCityInputSchema.parse(args);
      return handleGetMonthlyCalendarByCity(input, context);
    })
  );

  logger.debug('Registered calendar tools');
}
