import type { ExitInfo } from '../supervisor/types';

export type HealthStatus = 'ok' | 'degraded' | 'error' | 'unreachable';

export interface HealthCheckResult {
  status: HealthStatus;
  latencyMs: number;
  /** HTTP status of the response, when one arrived. */
  httpStatus?: number;
  body?: string;
  error?: string;
}

export type PollOutcome =
  | { kind: 'healthy'; result: HealthCheckResult; attempts: number; elapsedMs: number }
  | { kind: 'unreachable'; last?: HealthCheckResult; attempts: number; elapsedMs: number }
  | { kind: 'process-exited'; exit?: ExitInfo; attempts: number; elapsedMs: number }
  | { kind: 'cancelled'; attempts: number; elapsedMs: number };

/**
 * `ok` and `degraded` both count as alive.
 */
export function isHealthy(status: HealthStatus): boolean {
  return status === 'ok' || status === 'degraded';
}
