import { getLoggerFor } from 'global-logger-factory';
import type { RunConfig } from '../config/RunConfig';
import { OrchestratorError, ProcessCrashError } from '../errors';
import { HealthPoller } from '../health/HealthPoller';
import { probeHealth, type HealthProbe } from '../health/HealthProbe';
import { isHealthy, type HealthCheckResult } from '../health/types';
import type { ServiceRegistry } from '../registry/ServiceRegistry';
import { ProcessSupervisor } from '../supervisor/ProcessSupervisor';
import type { RunningService } from '../supervisor/RunningService';
import { ModeSelector } from './ModeSelector';
import { serviceUrl } from './Orchestrator';

const PROBE_TIMEOUT_MS = 5_000;

export interface HealthVerifierOptions {
  config: RunConfig;
  registry: ServiceRegistry;
  supervisor?: ProcessSupervisor;
  poller?: HealthPoller;
  probe?: HealthProbe;
}

export interface CheckReport {
  service: string;
  /** False when an instance was already listening on the port. */
  startedByCheck: boolean;
  liveness: HealthCheckResult;
  readiness?: HealthCheckResult;
  passed: boolean;
}

/**
 * One-shot verification of the backend's health endpoints, starting the
 * backend for the duration of the check when nothing is listening yet.
 */
export class HealthVerifier {
  protected readonly logger = getLoggerFor(this);
  private readonly config: RunConfig;
  private readonly registry: ServiceRegistry;
  private readonly supervisor: ProcessSupervisor;
  private readonly poller: HealthPoller;
  private readonly probe: HealthProbe;

  public constructor(options: HealthVerifierOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.probe = options.probe ?? probeHealth;
    this.supervisor = options.supervisor ?? new ProcessSupervisor({ gracePeriodMs: options.config.stopGracePeriodMs });
    this.poller = options.poller ?? new HealthPoller({
      intervalMs: options.config.healthCheck.intervalMs,
      probe: this.probe,
    });
  }

  public async verify(signal?: AbortSignal): Promise<CheckReport> {
    const backend = new ModeSelector(this.registry, this.config.backendPriority).selectBackend();
    const liveUrl = serviceUrl(backend.port, backend.livenessPath);

    let service: RunningService | undefined;
    try {
      if (await this.supervisor.isPortFree(backend.port)) {
        service = await this.supervisor.spawn(backend);
        await this.waitUntilLive(service, liveUrl, signal);
      } else {
        this.logger.info(`Port ${backend.port} is in use, assuming ${backend.name} is already running`);
      }

      const liveness = await this.probe(liveUrl, { timeoutMs: PROBE_TIMEOUT_MS, signal });
      this.logResult('Liveness', liveUrl, liveness);
      let readiness: HealthCheckResult | undefined;
      if (backend.readinessPath) {
        const readyUrl = serviceUrl(backend.port, backend.readinessPath);
        readiness = await this.probe(readyUrl, { timeoutMs: PROBE_TIMEOUT_MS, signal });
        this.logResult('Readiness', readyUrl, readiness);
      }

      const passed = isHealthy(liveness.status) && readiness?.status !== 'error';
      this.logger[passed ? 'info' : 'error'](`Health check ${passed ? 'passed' : 'failed'} for ${backend.name}`);
      return { service: backend.name, startedByCheck: service !== undefined, liveness, readiness, passed };
    } finally {
      if (service) {
        await this.supervisor.stop(service);
      }
    }
  }

  private async waitUntilLive(service: RunningService, url: string, signal?: AbortSignal): Promise<void> {
    const outcome = await this.poller.pollUntilHealthy(url, this.config.healthCheck.timeoutMs, {
      isAlive: (): boolean => this.supervisor.isAlive(service),
      signal,
    });
    if (outcome.kind === 'process-exited') {
      const exit = await service.exited;
      throw new ProcessCrashError(service.name, exit.code, exit.signal, service.descriptor.logPath);
    }
    if (outcome.kind === 'cancelled') {
      throw new OrchestratorError('Health check cancelled');
    }
    if (outcome.kind === 'unreachable') {
      this.logger.warn(`${service.name} did not answer at ${url} within ${this.config.healthCheck.timeoutMs}ms`);
    }
  }

  private logResult(kind: string, url: string, result: HealthCheckResult): void {
    const detail = result.error ?? result.body ?? '';
    const line = `${kind} ${url}: ${result.status} (${result.latencyMs}ms)${detail ? ` ${detail}` : ''}`;
    if (result.status === 'ok') {
      this.logger.info(line);
    } else {
      this.logger.warn(line);
    }
  }
}
