/**
 * Request Context
 *
 * Correlation id, job id and document path carried through API requests,
 * worker jobs and detections with AsyncLocalStorage. The logger reads it
 * on every line.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentPath?: string;
  jobId?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Correlation id of the current context, or a fresh ULID outside one
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
 * Run fn with documentPath set, keeping the surrounding correlation and job
 * ids. Outside any context a new correlation id is minted.
 */
export async function runForDocument<T>(documentPath: string, fn: () => Promise<T>): Promise<T> {
  const current = getContext();
  return storage.run(
    {
      correlationId: current?.correlationId || ulid(),
      jobId: current?.jobId,
      documentPath,
    },
    fn
  );
}
