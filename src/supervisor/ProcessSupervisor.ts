import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import kill from 'tree-kill';
import { ConfigurationError, DependencyMissingError, PortConflictError, ProcessCrashError } from '../errors';
import type { ServiceDescriptor } from '../registry/types';
import { formatCommand } from '../util/command';
import { delay } from '../util/delay';
import { isCommandAvailable } from './DependencyCheck';
import { getFreePort, isPortAvailable } from './PortFinder';
import { RunningService } from './RunningService';
import type { ExitInfo, GroupSignalFn, KillFn, ProcessFactory, SpawnedProcess, StatusChangeHandler } from './types';

const DEFAULT_GRACE_PERIOD_MS = 5_000;
const FORCE_KILL_WAIT_MS = 2_000;
const GROUP_POLL_MS = 100;

export interface ProcessSupervisorOptions {
  gracePeriodMs?: number;
  processFactory?: ProcessFactory;
  killProcess?: KillFn;
  isPortAvailable?: (port: number) => Promise<boolean>;
  suggestPort?: (port: number) => Promise<number | undefined>;
  commandExists?: (command: string, cwd: string) => boolean;
  isPidAlive?: (pid: number) => boolean;
  signalGroup?: GroupSignalFn;
  onStatusChange?: StatusChangeHandler;
}

const treeKill: KillFn = async(pid, signal) => new Promise((resolve, reject) => {
  kill(pid, signal, (err) => err ? reject(err) : resolve());
});

async function suggestFreePort(port: number): Promise<number | undefined> {
  try {
    return await getFreePort(port + 1);
  } catch {
    return undefined;
  }
}

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    // EPERM: the pid exists but belongs to someone else.
    return errnoCode(error) === 'EPERM';
  }
}

/**
 * Signals the process group led by `pgid`. Grandchildren stay in the group
 * after its leader exits, so this still reaches them.
 */
export const signalProcessGroup: GroupSignalFn = (pgid, signal) => {
  try {
    process.kill(-pgid, signal);
    return true;
  } catch (error: unknown) {
    return errnoCode(error) === 'EPERM';
  }
};

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Spawns service processes, owns their handles and stops them.
 *
 * Every handle this supervisor has spawned stays tracked until the run ends,
 * in start order, so teardown can walk the list backwards.
 */
export class ProcessSupervisor {
  protected readonly logger = getLoggerFor(this);
  private readonly services: RunningService[] = [];
  private readonly stopping: Map<RunningService, Promise<void>> = new Map();
  private readonly reaped: Set<RunningService> = new Set();
  private readonly gracePeriodMs: number;
  private readonly processFactory: ProcessFactory;
  private readonly killProcess: KillFn;
  private readonly checkPort: (port: number) => Promise<boolean>;
  private readonly suggestPort: (port: number) => Promise<number | undefined>;
  private readonly commandExists: (command: string, cwd: string) => boolean;
  private readonly pidAlive: (pid: number) => boolean;
  private readonly signalGroup: GroupSignalFn;
  private readonly onStatusChange?: StatusChangeHandler;

  public constructor(options: ProcessSupervisorOptions = {}) {
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.processFactory = options.processFactory ?? spawn;
    this.killProcess = options.killProcess ?? treeKill;
    this.checkPort = options.isPortAvailable ?? isPortAvailable;
    this.suggestPort = options.suggestPort ?? suggestFreePort;
    this.commandExists = options.commandExists ?? isCommandAvailable;
    this.pidAlive = options.isPidAlive ?? isPidAlive;
    this.signalGroup = options.signalGroup ?? signalProcessGroup;
    this.onStatusChange = options.onStatusChange;
  }

  /**
   * Launches the descriptor's process in its own process group with output
   * appended to the descriptor's log file. Returns as soon as the process
   * exists; readiness is the HealthPoller's job.
   */
  public async spawn(descriptor: ServiceDescriptor): Promise<RunningService> {
    const occupant = this.services.find((service) =>
      !service.isTerminal() && service.descriptor.port === descriptor.port);
    if (occupant) {
      throw new PortConflictError(descriptor.name, descriptor.port);
    }
    if (!await this.checkPort(descriptor.port)) {
      throw new PortConflictError(descriptor.name, descriptor.port, await this.suggestPort(descriptor.port));
    }

    const { executable, args } = descriptor.command;
    if (!this.commandExists(executable, descriptor.cwd)) {
      throw new DependencyMissingError(executable, descriptor.installHint);
    }
    // Spawning in a missing cwd fails with the same ENOENT as a missing executable.
    if (!await isDirectory(descriptor.cwd)) {
      throw new ConfigurationError(`Working directory of ${descriptor.name} does not exist: ${descriptor.cwd}`);
    }

    await fs.mkdir(path.dirname(descriptor.logPath), { recursive: true });
    const log = await fs.open(descriptor.logPath, 'a');
    let service: RunningService;
    try {
      await log.appendFile(`\n--- ${new Date().toISOString()} ${formatCommand(descriptor.command)} ---\n`);
      const child = this.processFactory(executable, args, {
        cwd: descriptor.cwd,
        env: { ...process.env, ...descriptor.env },
        stdio: [ 'ignore', log.fd, log.fd ],
        // Own process group: terminal signals reach the orchestrator only.
        detached: true,
      });
      service = this.track(descriptor, child);
    } finally {
      // The child keeps its own duplicate of the log file descriptor.
      await log.close();
    }

    if (service.pid === undefined) {
      const exit = await service.exited;
      if (errnoCode(exit.error) === 'ENOENT') {
        throw new DependencyMissingError(executable, descriptor.installHint);
      }
      throw new ProcessCrashError(descriptor.name, exit.code, exit.signal, descriptor.logPath);
    }

    this.services.push(service);
    this.logger.info(`Started ${descriptor.name} (pid ${service.pid}) on port ${descriptor.port}, logs: ${descriptor.logPath}`);
    return service;
  }

  /**
   * SIGTERM, then SIGKILL after the grace period. A service whose main
   * process already exited still has whatever it left in its process group
   * stopped the same way. Stopping a service again sends nothing new.
   */
  public async stop(service: RunningService): Promise<void> {
    const pending = this.stopping.get(service);
    if (pending) {
      return pending;
    }
    if (this.reaped.has(service)) {
      return;
    }
    const work = service.isTerminal() ? this.reapGroup(service) : this.terminate(service);
    const promise = work.finally(() => {
      this.stopping.delete(service);
    });
    this.stopping.set(service, promise);
    return promise;
  }

  /**
   * Stops every tracked service, most recently started first.
   */
  public async stopAll(): Promise<void> {
    for (const service of [ ...this.services ].reverse()) {
      await this.stop(service);
    }
  }

  /**
   * Resolves with the first of `services` to exit, or with undefined once
   * `signal` aborts.
   */
  public async waitAll(services: readonly RunningService[], signal: AbortSignal): Promise<RunningService | undefined> {
    if (signal.aborted) {
      return undefined;
    }
    const alreadyExited = services.find((service) => service.exitInfo);
    if (alreadyExited) {
      return alreadyExited;
    }

    let resolveAborted: (value: undefined) => void = () => undefined;
    const aborted = new Promise<undefined>((resolve) => {
      resolveAborted = resolve;
    });
    const onAbort = (): void => resolveAborted(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await Promise.race([
        ...services.map(async(service) => service.exited.then(() => service)),
        aborted,
      ]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Cheap existence check used between health probes.
   */
  public isAlive(service: RunningService): boolean {
    if (service.exitInfo || service.pid === undefined) {
      return false;
    }
    return this.pidAlive(service.pid);
  }

  public async isPortFree(port: number): Promise<boolean> {
    return this.checkPort(port);
  }

  public list(): RunningService[] {
    return [ ...this.services ];
  }

  /**
   * Last-resort synchronous kill for the process 'exit' hook, where nothing
   * asynchronous can run anymore.
   */
  public killAllSync(): void {
    for (const service of this.services) {
      if (service.pid === undefined) {
        continue;
      }
      // The group created by `detached` outlives its leader.
      if (this.signalGroup(service.pid, 'SIGKILL') || service.exitInfo) {
        continue;
      }
      try {
        process.kill(service.pid, 'SIGKILL');
      } catch {
        // Already gone.
      }
    }
  }

  private track(descriptor: ServiceDescriptor, child: SpawnedProcess): RunningService {
    const service = new RunningService(descriptor, child.pid, this.onStatusChange);
    child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.handleExit(service, { code, signal, at: Date.now() });
    });
    child.once('error', (error: Error) => {
      this.logger.error(`Error spawning ${descriptor.name}: ${error.message}`);
      if (service.pid === undefined) {
        this.handleExit(service, { code: null, signal: null, error, at: Date.now() });
      }
    });
    return service;
  }

  private handleExit(service: RunningService, info: ExitInfo): void {
    if (!service.stopRequested) {
      const level = info.code === 0 ? 'warn' : 'error';
      this.logger[level](`${service.name} exited with code ${info.code ?? 'null'} signal ${info.signal ?? 'null'}`);
    }
    service.markExited(info);
  }

  private async terminate(service: RunningService): Promise<void> {
    service.markStopRequested();
    if (service.pid === undefined || service.exitInfo) {
      service.transition('stopped');
      await this.reapGroup(service);
      return;
    }

    this.logger.info(`Stopping ${service.name} (pid ${service.pid})...`);
    await this.sendSignal(service, 'SIGTERM');
    if (!await this.waitForExit(service, this.gracePeriodMs)) {
      this.logger.warn(`${service.name} did not exit within ${this.gracePeriodMs}ms, sending SIGKILL`);
      await this.sendSignal(service, 'SIGKILL');
      if (!await this.waitForExit(service, FORCE_KILL_WAIT_MS)) {
        this.logger.error(`${service.name} (pid ${service.pid}) is still alive after SIGKILL`);
      }
    }
    service.transition('stopped');
    await this.reapGroup(service);
    this.logger.info(`Stopped ${service.name}`);
  }

  /**
   * Stops processes left in the service's group, such as a dev server whose
   * launcher already exited.
   */
  private async reapGroup(service: RunningService): Promise<void> {
    this.reaped.add(service);
    const { pid } = service;
    if (pid === undefined || !this.signalGroup(pid, 0)) {
      return;
    }
    this.logger.info(`Stopping processes left behind by ${service.name} (process group ${pid})...`);
    this.signalGroup(pid, 'SIGTERM');
    if (await this.waitForGroupExit(pid, this.gracePeriodMs)) {
      return;
    }
    this.logger.warn(`Process group ${pid} of ${service.name} outlived SIGTERM, sending SIGKILL`);
    this.signalGroup(pid, 'SIGKILL');
    if (!await this.waitForGroupExit(pid, FORCE_KILL_WAIT_MS)) {
      this.logger.error(`Process group ${pid} of ${service.name} is still alive after SIGKILL`);
    }
  }

  private async waitForGroupExit(pgid: number, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.signalGroup(pgid, 0)) {
      if (Date.now() >= deadline) {
        return false;
      }
      await delay(GROUP_POLL_MS);
    }
    return true;
  }

  private async sendSignal(service: RunningService, signal: NodeJS.Signals): Promise<void> {
    if (service.pid === undefined || service.exitInfo) {
      return;
    }
    try {
      await this.killProcess(service.pid, signal);
    } catch (error: unknown) {
      this.logger.warn(`Failed to send ${signal} to ${service.name}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async waitForExit(service: RunningService, timeoutMs: number): Promise<boolean> {
    if (service.exitInfo) {
      return true;
    }
    const controller = new AbortController();
    try {
      return await Promise.race([
        service.exited.then(() => true),
        delay(timeoutMs, controller.signal).then(() => false),
      ]);
    } finally {
      controller.abort();
    }
  }
}
