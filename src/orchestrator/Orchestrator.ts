import { getLoggerFor } from 'global-logger-factory';
import type { RunConfig } from '../config/RunConfig';
import { HealthTimeoutError, OrchestratorError, PortConflictError, ProcessCrashError } from '../errors';
import { HealthPoller } from '../health/HealthPoller';
import { probeHealth, type HealthProbe } from '../health/HealthProbe';
import { createRunId, logContext } from '../logging/LogContext';
import type { ServiceRegistry } from '../registry/ServiceRegistry';
import type { ServiceDescriptor } from '../registry/types';
import { ProcessSupervisor } from '../supervisor/ProcessSupervisor';
import type { RunningService } from '../supervisor/RunningService';
import { ModeSelector, type RunMode } from './ModeSelector';
import { SignalCoordinator } from './SignalCoordinator';

export const LOCAL_HOST = '127.0.0.1';

const READINESS_TIMEOUT_MS = 5_000;

export interface SkippedService {
  name: string;
  reason: string;
}

export interface StartReport {
  /** In start order. */
  started: RunningService[];
  skipped: SkippedService[];
  warnings: string[];
  /** A termination signal arrived before every service was up. */
  cancelled: boolean;
}

export interface OrchestratorOptions {
  config: RunConfig;
  registry: ServiceRegistry;
  supervisor?: ProcessSupervisor;
  poller?: HealthPoller;
  probe?: HealthProbe;
  coordinator?: SignalCoordinator;
}

export function serviceUrl(port: number, urlPath: string): string {
  return `http://${LOCAL_HOST}:${port}${urlPath}`;
}

/**
 * The first service that exited without being asked to.
 */
function findCrashed(services: readonly RunningService[]): RunningService | undefined {
  return services.find((service) => service.exitInfo && !service.stopRequested);
}

async function crashError(service: RunningService): Promise<ProcessCrashError> {
  const exit = await service.exited;
  return new ProcessCrashError(service.name, exit.code, exit.signal, service.descriptor.logPath);
}

/**
 * Drives one run: start the services of a mode one after another, wait on
 * them, and tear everything down on a signal or a crash.
 *
 * An instance is good for a single run; teardown happens at most once.
 */
export class Orchestrator {
  protected readonly logger = getLoggerFor(this);
  public readonly supervisor: ProcessSupervisor;
  public readonly coordinator: SignalCoordinator;
  private readonly config: RunConfig;
  private readonly registry: ServiceRegistry;
  private readonly poller: HealthPoller;
  private readonly probe: HealthProbe;

  public constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.probe = options.probe ?? probeHealth;
    this.supervisor = options.supervisor ?? new ProcessSupervisor({ gracePeriodMs: options.config.stopGracePeriodMs });
    this.poller = options.poller ?? new HealthPoller({
      intervalMs: options.config.healthCheck.intervalMs,
      probe: this.probe,
    });
    this.coordinator = options.coordinator ?? new SignalCoordinator();
  }

  /**
   * Full lifecycle of `stackrun <mode>`. Resolves with the process exit code
   * once every started service is stopped.
   */
  public async run(mode: RunMode): Promise<number> {
    return logContext.run({ runId: createRunId() }, async(): Promise<number> => this.runInContext(mode));
  }

  /**
   * Spawns the services of `mode` sequentially, blocking on each liveness
   * probe before the next spawn. Any fatal error tears down what was already
   * started before it is rethrown.
   */
  public async start(mode: RunMode): Promise<StartReport> {
    const report: StartReport = { started: [], skipped: [], warnings: [], cancelled: false };
    try {
      const descriptors = new ModeSelector(this.registry, this.config.backendPriority).select(mode);
      this.logger.info(`Starting ${descriptors.map((descriptor) => descriptor.name).join(', ')} (mode ${mode})`);

      let conflict: PortConflictError | undefined;
      for (const descriptor of descriptors) {
        if (this.coordinator.isCancelled) {
          report.cancelled = true;
          break;
        }
        const service = await this.spawn(descriptor, report);
        if (service instanceof PortConflictError) {
          conflict = conflict ?? service;
          continue;
        }
        report.started.push(service);
        if (!await this.awaitHealthy(service, report)) {
          report.cancelled = true;
          break;
        }
        const crashed = findCrashed(report.started);
        if (crashed) {
          throw await crashError(crashed);
        }
      }

      if (report.started.length === 0 && !report.cancelled && conflict) {
        throw conflict;
      }
      return report;
    } catch (error: unknown) {
      await this.shutdown();
      throw error;
    }
  }

  /**
   * Stops every tracked service in reverse start order. Safe to call any
   * number of times from any path; only the first call does work.
   */
  public async shutdown(): Promise<void> {
    return this.coordinator.runTeardown(async(): Promise<void> => {
      this.coordinator.cancel('teardown');
      const active = this.supervisor.list().filter((service) => !service.isTerminal());
      if (active.length > 0) {
        this.logger.info(`Stopping ${active.length} service(s)...`);
      }
      await this.supervisor.stopAll();
    });
  }

  private async runInContext(mode: RunMode): Promise<number> {
    this.coordinator.install();
    try {
      const report = await this.start(mode);
      if (!report.cancelled) {
        this.logger.info(`Running: ${report.started.map((service) => `${service.name} (${service.status})`).join(', ')}. ` +
          'Press Ctrl+C to stop');
      }

      const exited = await this.supervisor.waitAll(report.started, this.coordinator.signal);
      if (exited && !exited.stopRequested) {
        const crash = await crashError(exited);
        this.logger.error(crash.message);
        await this.shutdown();
        return crash.exitCode;
      }
      await this.shutdown();
      return 0;
    } catch (error: unknown) {
      await this.shutdown();
      this.logger.error(error instanceof Error ? error.message : String(error));
      return error instanceof OrchestratorError ? error.exitCode : 1;
    } finally {
      this.coordinator.dispose();
    }
  }

  /**
   * A port conflict skips this one service and is handed back instead of thrown.
   */
  private async spawn(descriptor: ServiceDescriptor, report: StartReport): Promise<RunningService | PortConflictError> {
    try {
      return await this.supervisor.spawn(descriptor);
    } catch (error: unknown) {
      if (error instanceof PortConflictError) {
        this.logger.error(`${error.message}, skipping ${descriptor.name}`);
        report.skipped.push({ name: descriptor.name, reason: error.message });
        return error;
      }
      throw error;
    }
  }

  /**
   * Returns false when the run was cancelled during the wait.
   */
  private async awaitHealthy(service: RunningService, report: StartReport): Promise<boolean> {
    const { descriptor } = service;
    if (!this.config.healthCheck.enabled) {
      this.logger.info(`Health checks disabled, not waiting for ${service.name}`);
      return true;
    }

    const url = serviceUrl(descriptor.port, descriptor.livenessPath);
    this.logger.info(`Waiting for ${service.name} at ${url}...`);
    // A sibling that crashes while this one is polled ends the wait as well.
    const outcome = await this.poller.pollUntilHealthy(url, this.config.healthCheck.timeoutMs, {
      isAlive: (): boolean => this.supervisor.isAlive(service) && !findCrashed(report.started),
      signal: this.coordinator.signal,
    });

    switch (outcome.kind) {
      case 'cancelled':
        return false;
      case 'process-exited':
        throw await crashError(findCrashed(report.started) ?? service);
      case 'unreachable': {
        service.transition('unhealthy');
        const timeout = new HealthTimeoutError(service.name, url, this.config.healthCheck.timeoutMs);
        this.logger.warn(`${timeout.message}, continuing`);
        report.warnings.push(timeout.message);
        return true;
      }
      case 'healthy':
        service.transition('healthy');
        if (outcome.result.status === 'degraded') {
          const message = `${service.name} is degraded${outcome.result.body ? `: ${outcome.result.body}` : ''}`;
          this.logger.warn(message);
          report.warnings.push(message);
        } else {
          this.logger.info(`${service.name} is healthy (${outcome.elapsedMs}ms)`);
        }
        await this.checkReadiness(service, report);
        return !this.coordinator.isCancelled;
    }
  }

  private async checkReadiness(service: RunningService, report: StartReport): Promise<void> {
    const { readinessPath, port } = service.descriptor;
    if (!readinessPath) {
      return;
    }
    const url = serviceUrl(port, readinessPath);
    const result = await this.probe(url, { timeoutMs: READINESS_TIMEOUT_MS, signal: this.coordinator.signal });
    if (this.coordinator.isCancelled) {
      return;
    }
    let warning: string | undefined;
    if (result.status === 'ok') {
      this.logger.info(`${service.name} is ready`);
    } else if (result.status === 'degraded') {
      warning = `${service.name} readiness is degraded`;
    } else if (result.status === 'unreachable') {
      warning = `${service.name} readiness endpoint not found at ${url}`;
    } else {
      warning = `${service.name} readiness check failed${result.body ? `: ${result.body}` : ''}`;
    }
    if (warning) {
      this.logger.warn(warning);
      report.warnings.push(warning);
    }
  }
}
