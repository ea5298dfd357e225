import type { HealthCheckResult, HealthStatus } from './types';

const MAX_BODY_LENGTH = 2_048;

export interface ProbeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type HealthProbe = (url: string, options: ProbeOptions) => Promise<HealthCheckResult>;

const IPV4_LOOPBACK = '127.0.0.1';
const IPV6_LOOPBACK = '[::1]';

/**
 * One GET against a health endpoint.
 *
 * Transport failures and non-2xx responses are `unreachable`. A 2xx response
 * is refined by an optional JSON `status` field; without one it counts as `ok`.
 * A refused connection on the IPv4 loopback is retried on `[::1]`, for dev
 * servers that bind `localhost` to IPv6 only.
 */
export const probeHealth: HealthProbe = async(url, options) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1, options.timeoutMs));
  const onCancel = (): void => controller.abort();
  options.signal?.addEventListener('abort', onCancel, { once: true });
  if (options.signal?.aborted) {
    controller.abort();
  }
  const started = Date.now();
  let failure: unknown;
  try {
    for (const candidate of loopbackCandidates(url)) {
      try {
        return await request(candidate, controller.signal, started);
      } catch (error: unknown) {
        failure = error;
        if (!isConnectionRefused(error)) {
          break;
        }
      }
    }
    return {
      status: 'unreachable',
      latencyMs: Date.now() - started,
      error: failure instanceof Error ? failure.message : String(failure),
    };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCancel);
  }
};

async function request(url: string, signal: AbortSignal, started: number): Promise<HealthCheckResult> {
  const response = await fetch(url, {
    method: 'GET',
    signal,
    headers: { accept: 'application/json' },
  });
  const body = await response.text();
  const latencyMs = Date.now() - started;
  if (!response.ok) {
    return {
      status: 'unreachable',
      latencyMs,
      httpStatus: response.status,
      body: truncate(body),
      error: `status:${response.status}`,
    };
  }
  return { status: interpretBody(body), latencyMs, httpStatus: response.status, body: truncate(body) };
}

export function loopbackCandidates(url: string): string[] {
  const parsed = new URL(url);
  if (parsed.hostname !== IPV4_LOOPBACK) {
    return [ url ];
  }
  parsed.hostname = IPV6_LOOPBACK;
  return [ url, parsed.toString() ];
}

/**
 * fetch wraps socket errors in `cause`.
 */
function isConnectionRefused(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const { cause } = error;
  return cause instanceof Error && 'code' in cause && cause.code === 'ECONNREFUSED';
}

/**
 * Maps a successful response body to a status. Unknown `status` values are
 * treated as `error`: only `ok` and `degraded` mean alive.
 */
export function interpretBody(body: string): HealthStatus {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return 'ok';
  }
  if (typeof parsed !== 'object' || parsed === null || !('status' in parsed)) {
    return 'ok';
  }
  const { status } = parsed;
  if (status === 'ok' || status === 'degraded' || status === 'error') {
    return status;
  }
  return 'error';
}

function truncate(body: string): string | undefined {
  if (!body) {
    return undefined;
  }
  return body.length > MAX_BODY_LENGTH ? `${body.slice(0, MAX_BODY_LENGTH)}...` : body;
}
