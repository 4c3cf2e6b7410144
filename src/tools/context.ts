/**
 * Dependencies shared by every tool handler, built once per server
 */

import type { AladhanClient } from '../domain/aladhan-client.js';
import type { TtlCache } from '../domain/ttl-cache.js';

export interface ToolContext {
  client: AladhanClient;
  /** Holds the calculation methods listing for the life of the server */
  methodsCache: TtlCache;
  methodsCacheTtlSeconds: number;
  /** Timeout for the month-calendar endpoints, which run longer */
  calendarTimeoutMs: number;
}
