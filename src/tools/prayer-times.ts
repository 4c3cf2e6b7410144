/**
 * Daily prayer times tools
 * Timings by coordinates or by city, and the next prayer for a location
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { buildToolResponse } from '../domain/response-builder.js';
import { unwrapEnvelope, unwrapTimings } from '../domain/envelope.js';
import { resolveDate } from '../domain/dates.js';
import { wrapTool } from '../domain/tool-wrapper.js';
import { logger } from '../domain/logger.js';
import {
  CitySchema,
  CountrySchema,
  DailySettingsShape,
  LatitudeSchema,
  LongitudeSchema,
  StateSchema,
  settingsQuery,
} from '../domain/schemas/common.js';
import type { ToolContext } from './context.js';

/**
 * Tool input schema (shared by get_prayer_times and get_next_prayer)
 */
export const PrayerTimesInputSchema = z.object({
  lat: LatitudeSchema,
  lon: LongitudeSchema,
  ...DailySettingsShape,
});

export type PrayerTimesInput = z.infer<typeof PrayerTimesInputSchema>;

export const PrayerTimesByCityInputSchema = z.object({
  city: CitySchema,
  country: CountrySchema,
  state: StateSchema,
  ...DailySettingsShape,
});

export type PrayerTimesByCityInput = z.infer<typeof PrayerTimesByCityInputSchema>;

function coordinateQuery(input: PrayerTimesInput) {
  return {
    latitude: input.lat,
    longitude: input.lon,
    ...settingsQuery(input),
  };
}

/**
 * Daily timings for coordinates; returns `data.timings`
 */
export async function handleGetPrayerTimes(
  input: PrayerTimesInput,
  context: ToolContext
): Promise<CallToolResult> {
  const date = resolveDate(input.date);
  const response = await context.client.get(
    `/timings/${encodeURIComponent(date)}`,
    coordinateQuery(input)
  );
  return buildToolResponse(unwrapTimings(response.data));
}

/**
 * Daily timings for a city; returns `data.timings`
 */
export async function handleGetPrayerTimesByCity(
  input: PrayerTimesByCityInput,
  context: ToolContext
): Promise<CallToolResult> {
  const date = resolveDate(input.date);
  const response = await context.client.get(`/timingsByCity/${encodeURIComponent(date)}`, {
    city: input.city,
    country: input.country,
    state: input.state,
    ...settingsQuery(input),
  });
  return buildToolResponse(unwrapTimings(response.data));
}

/**
 * Name and time of the next prayer for coordinates
 */
export async function handleGetNextPrayer(
  input: PrayerTimesInput,
  context: ToolContext
): Promise<CallToolResult> {
  const date = resolveDate(input.date);
  const response = await context.client.get(
    `/nextPrayer/${encodeURIComponent(date)}`,
    coordinateQuery(input)
  );
  return buildToolResponse(unwrapEnvelope(response.data));
}

export function registerPrayerTimesTools(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'get_prayer_times',
    {
      description:
        'Get daily prayer times (Fajr, Sunrise, Dhuhr, Asr, Maghrib, Isha, ...) for coordinates. Date defaults to today.',
      inputSchema: PrayerTimesInputSchema.shape,
    },
    wrapTool('get_prayer_times', async (args: unknown) => {
      const input = PrayerTimesInputSchema.parse(args);
      return handleGetPrayerTimes(input, context);
    })
  );

  server.registerTool(
    'get_prayer_times_by_city',
    {
      description:
        'Get daily prayer times for a city and country. Date defaults to today.',
      inputSchema: PrayerTimesByCityInputSchema.shape,
    },
    wrapTool('get_prayer_times_by_city', async (args: unknown) => {
      const input = PrayerTimesByCityInputSchema.parse(args);
      return handleGetPrayerTimesByCity(input, context);
    })
  );

  server.registerTool(
    'get_next_prayer',
    {
      description: 'Get the next prayer (name and time) for coordinates.',
      inputSchema: PrayerTimesInputSchema.shape,
    },
    wrapTool('get_next_prayer', async (args: unknown) => {
      const input = PrayerTimesInputSchema.parse(args);
      return handleGetNextPrayer(input, context);
    })
  );

  logger.debug('Registered prayer times tools');
}
