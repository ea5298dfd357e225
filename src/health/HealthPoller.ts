import { getLoggerFor } from 'global-logger-factory';
import { delay } from '../util/delay';
import { probeHealth, type HealthProbe } from './HealthProbe';
import { isHealthy, type HealthCheckResult, type PollOutcome } from './types';

export interface HealthPollerOptions {
  intervalMs?: number;
  /** Upper bound for one request; the remaining poll budget is used when smaller. */
  requestTimeoutMs?: number;
  probe?: HealthProbe;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PollContext {
  /** Existence check of the process behind the endpoint. */
  isAlive: () => boolean;
  signal?: AbortSignal;
}

/**
 * Polls a liveness endpoint until it answers healthy, the process behind it
 * dies, the timeout elapses, or the run is cancelled.
 */
export class HealthPoller {
  protected readonly logger = getLoggerFor(this);
  private readonly intervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly probe: HealthProbe;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  public constructor(options: HealthPollerOptions = {}) {
    this.intervalMs = options.intervalMs ?? 1_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 2_000;
    this.probe = options.probe ?? probeHealth;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  public async pollUntilHealthy(url: string, timeoutMs: number, context: PollContext): Promise<PollOutcome> {
    const { signal, isAlive } = context;
    const started = this.now();
    const deadline = started + timeoutMs;
    const elapsed = (): number => this.now() - started;
    let attempts = 0;
    let last: HealthCheckResult | undefined;

    while (true) {
      if (signal?.aborted) {
        return { kind: 'cancelled', attempts, elapsedMs: elapsed() };
      }
      if (!isAlive()) {
        return { kind: 'process-exited', attempts, elapsedMs: elapsed() };
      }

      const remaining = deadline - this.now();
      attempts += 1;
      last = await this.probe(url, { timeoutMs: Math.max(1, Math.min(this.requestTimeoutMs, remaining)), signal });
      if (signal?.aborted) {
        return { kind: 'cancelled', attempts, elapsedMs: elapsed() };
      }
      if (isHealthy(last.status)) {
        return { kind: 'healthy', result: last, attempts, elapsedMs: elapsed() };
      }
      this.logger.debug(`Probe ${attempts} of ${url}: ${last.status}${last.error ? ` (${last.error})` : ''}`);

      if (!isAlive()) {
        return { kind: 'process-exited', attempts, elapsedMs: elapsed() };
      }
      const left = deadline - this.now();
      if (left <= 0) {
        return { kind: 'unreachable', last, attempts, elapsedMs: elapsed() };
      }
      await this.sleep(Math.min(this.intervalMs, left), signal);
    }
  }
}
