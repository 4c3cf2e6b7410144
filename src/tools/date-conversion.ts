/**
 * Date conversion tools
 * Calculation methods listing and Gregorian <-> Hijri date conversion
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { buildToolResponse } from '../domain/response-builder.js';
import { unwrapEnvelope } from '../domain/envelope.js';
import { wrapTool } from '../domain/tool-wrapper.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { ToolContext } from './context.js';

export const METHODS_CACHE_KEY = 'methods';

export const GregorianToHijriInputSchema = z.object({
  date: z
    .string({ required_error: "Required: 'date' as YYYY-MM-DD" })
    .trim()
    .min(1, "Required: 'date' as YYYY-MM-DD")
    .describe('Gregorian date in YYYY-MM-DD format'),
});

export type GregorianToHijriInput = z.infer<typeof GregorianToHijriInputSchema>;

export const HijriToGregorianInputSchema = z.object({
  date: z
    .string({ required_error: "Required: 'date' as DD-MM-YYYY" })
    .trim()
    .min(1, "Required: 'date' as DD-MM-YYYY")
    .describe('Hijri date in DD-MM-YYYY format'),
});

export type HijriToGregorianInput = z.infer<typeof HijriToGregorianInputSchema>;

/**
 * List calculation methods, served from the cache while it is fresh
 */
export async function handleListCalculationMethods(
  context: ToolContext
): Promise<CallToolResult> {
  const { client, methodsCache, methodsCacheTtlSeconds } = context;

  let payload = methodsCache.get(METHODS_CACHE_KEY, methodsCacheTtlSeconds);
  if (payload === undefined) {
    metrics.incrementCacheStatus('MISS');
    const response = await client.get('/methods');
    payload = response.data;
    methodsCache.put(METHODS_CACHE_KEY, payload);
  } else {
    metrics.incrementCacheStatus('HIT');
    logger.debug('Calculation methods served from cache');
  }

  return buildToolResponse(unwrapEnvelope(payload));
}

export async function handleGregorianToHijri(
  input: GregorianToHijriInput,
  context: ToolContext
): Promise<CallToolResult> {
  const response = await context.client.get('/gToH', { date: input.date });
  return buildToolResponse(unwrapEnvelope(response.data));
}

export async function handleHijriToGregorian(
  input: HijriToGregorianInput,
  context: ToolContext
): Promise<CallToolResult> {
  const response = await context.client.get('/hToG', { date: input.date });
  return buildToolResponse(unwrapEnvelope(response.data));
}

export function registerDateConversionTools(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'list_calculation_methods',
    {
      description:
        'List Aladhan prayer time calculation methods (id -> name, params). Use the ids as the `method` argument of the prayer time tools.',
    },
    wrapTool('list_calculation_methods', async () =>
      handleListCalculationMethods(context)
    )
  );

  server.registerTool(
    'convert_gregorian_to_hijri',
    {
      description: 'Convert a Gregorian date (YYYY-MM-DD) to its Hijri equivalent.',
      inputSchema: GregorianToHijriInputSchema.shape,
    },
    wrapTool('convert_gregorian_to_hijri', async (args: unknown) => {
      const input = GregorianToHijriInputSchema.parse(args);
      return handleGregorianToHijri(input, context);
    })
  );

  server.registerTool(
    'convert_hijri_to_gregorian',
    {
      description: 'Convert a Hijri date (DD-MM-YYYY) to its Gregorian equivalent.',
      inputSchema: HijriToGregorianInputSchema.shape,
    },
    wrapTool('convert_hijri_to_gregorian', async (args: unknown) => {
      const input = HijriToGregorianInputSchema.parse(args);
      return handleHijriToGregorian(input, context);
    })
  );

  logger.debug('Registered date conversion tools');
}
