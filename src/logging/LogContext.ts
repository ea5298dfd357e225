import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';

export interface LogContext {
  runId: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();

/**
 * Short id correlating every orchestrator log line of one invocation.
 */
export function createRunId(): string {
  return crypto.randomUUID().slice(0, 8);
}
