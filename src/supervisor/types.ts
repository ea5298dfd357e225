import type { SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { RunningService } from './RunningService';

export type ServiceStatus = 'starting' | 'healthy' | 'unhealthy' | 'crashed' | 'stopped';

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all. */
  error?: Error;
  at: number;
}

/**
 * The part of a `ChildProcess` the supervisor relies on.
 */
export interface SpawnedProcess extends Pick<EventEmitter, 'once'> {
  readonly pid?: number;
}

export type ProcessFactory = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export type KillFn = (pid: number, signal: NodeJS.Signals) => Promise<void>;

export type StatusChangeHandler = (service: RunningService, status: ServiceStatus) => void;

/**
 * Sends `signal` to a whole process group, 0 only probing it.
 * Returns false once the group has no members left.
 */
export type GroupSignalFn = (pgid: number, signal: NodeJS.Signals | 0) => boolean;
