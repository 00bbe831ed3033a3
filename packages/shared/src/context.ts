/**
 * Request context (AsyncLocalStorage)
 *
 * A context is opened per HTTP request and per queue job with its
 * correlation ID. An extraction session opens a child context that keeps the
 * caller's correlation ID and adds its own session ID, document ID and
 * filename, so every log line of a session can be told apart even when
 * sessions run concurrently.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  sessionId?: string;
  documentId?: string;
  filename?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Correlation ID of the current context; a fresh ULID outside any context.
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return storage.run(context, fn);
}

/**
 * Run `fn` in a child of the current context. The correlation ID is
 * inherited (or minted when there is no parent); the other fields come from
 * `fields` and do not leak back to the parent.
 */
export async function runInChildContext<T>(
  fields: Omit<RequestContext, 'correlationId'>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return runWithContextAsync({ ...parent, ...fields, correlationId: getCorrelationId() }, fn);
}
