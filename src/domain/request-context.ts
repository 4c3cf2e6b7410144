/**
 * Request context propagated through AsyncLocalStorage, so the request id
 * reaches upstream logging without being threaded through every signature
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  toolName: string;
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Returns undefined outside a tool call
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getRequestId(): string | undefined {
  return getContext()?.requestId;
}

export function generateRequestId(): string {
  return randomUUID();
}
