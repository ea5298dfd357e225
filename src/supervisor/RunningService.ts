import type { ServiceDescriptor } from '../registry/types';
import type { ExitInfo, ServiceStatus, StatusChangeHandler } from './types';

const TRANSITIONS: Record<ServiceStatus, readonly ServiceStatus[]> = {
  starting: [ 'healthy', 'unhealthy', 'crashed', 'stopped' ],
  healthy: [ 'crashed', 'stopped' ],
  unhealthy: [ 'healthy', 'crashed', 'stopped' ],
  crashed: [],
  stopped: [],
};

/**
 * A spawned service. Created and mutated only by the ProcessSupervisor.
 */
export class RunningService {
  public readonly descriptor: ServiceDescriptor;
  public readonly pid?: number;
  public readonly startedAt: number;
  public readonly exited: Promise<ExitInfo>;

  private currentStatus: ServiceStatus = 'starting';
  private exitInfoValue?: ExitInfo;
  private stopRequestedValue = false;
  private readonly resolveExit: (info: ExitInfo) => void;

  public constructor(
    descriptor: ServiceDescriptor,
    pid: number | undefined,
    private readonly onStatusChange?: StatusChangeHandler,
    startedAt = Date.now(),
  ) {
    this.descriptor = descriptor;
    this.pid = pid;
    this.startedAt = startedAt;
    let resolveExit: (info: ExitInfo) => void = () => undefined;
    this.exited = new Promise((resolve) => {
      resolveExit = resolve;
    });
    this.resolveExit = resolveExit;
  }

  public get name(): string {
    return this.descriptor.name;
  }

  public get status(): ServiceStatus {
    return this.currentStatus;
  }

  public get exitInfo(): ExitInfo | undefined {
    return this.exitInfoValue;
  }

  public get stopRequested(): boolean {
    return this.stopRequestedValue;
  }

  public isTerminal(): boolean {
    return this.currentStatus === 'crashed' || this.currentStatus === 'stopped';
  }

  /**
   * Applies a status change when the state machine allows it.
   * Returns false for disallowed changes, including any change out of a terminal state.
   */
  public transition(next: ServiceStatus): boolean {
    if (this.currentStatus === next || !TRANSITIONS[this.currentStatus].includes(next)) {
      return false;
    }
    this.currentStatus = next;
    this.onStatusChange?.(this, next);
    return true;
  }

  public markStopRequested(): void {
    this.stopRequestedValue = true;
  }

  public markExited(info: ExitInfo): void {
    if (this.exitInfoValue) {
      return;
    }
    this.exitInfoValue = info;
    this.transition(this.stopRequestedValue ? 'stopped' : 'crashed');
    this.resolveExit(info);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      status: this.currentStatus,
      pid: this.pid,
      port: this.descriptor.port,
      logPath: this.descriptor.logPath,
      startedAt: new Date(this.startedAt).toISOString(),
      exitCode: this.exitInfoValue?.code,
    };
  }
}
