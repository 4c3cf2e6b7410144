/**
 * Qibla direction tool
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { buildToolResponse } from '../domain/response-builder.js';
import { unwrapQibla } from '../domain/envelope.js';
import { wrapTool } from '../domain/tool-wrapper.js';
import { logger } from '../domain/logger.js';
import { LatitudeSchema, LongitudeSchema } from '../domain/schemas/common.js';
import type { ToolContext } from './context.js';

export const QiblaInputSchema = z.object({
  lat: LatitudeSchema,
  lon: LongitudeSchema,
});

export type QiblaInput = z.infer<typeof QiblaInputSchema>;

/**
 * Returns `{ direction }` (bearing in degrees from true north)
 */
export async function handleGetQibla(
  input: QiblaInput,
  context: ToolContext
): Promise<CallToolResult> {
  const response = await context.client.get(`/qibla/${input.lat}/${input.lon}`);
  return buildToolResponse(unwrapQibla(response.data));
}

export function registerQiblaTools(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'get_qibla',
    {
      description:
        'Get the Qibla direction (bearing in degrees from true north) for a latitude/longitude.',
      inputSchema: QiblaInputSchema.shape,
    },
    wrapTool('get_qibla', async (args: unknown) => {
      const input = QiblaInputSchema.parse(args);
      return handleGetQibla(input, context);
    })
  );

  logger.debug('Registered qibla tool');
}
