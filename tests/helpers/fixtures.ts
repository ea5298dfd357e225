import { EventEmitter } from 'node:events';
import http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import type { RunConfig } from '../../src/config/RunConfig';
import type { ServiceDescriptor } from '../../src/registry/types';

export class MockChildProcess extends EventEmitter {
  public constructor(public readonly pid?: number) {
    super();
  }

  public exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('exit', code, signal);
  }
}

export function makeConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  const root = path.join(os.tmpdir(), 'stackrun-fixture');
  return {
    projectRoot: root,
    projectName: 'demo',
    backendPort: 8000,
    frontendPort: 5173,
    healthCheck: {
      enabled: true,
      timeoutMs: 5_000,
      intervalMs: 1_000,
      livenessPath: '/health/live',
      readinessPath: '/health/ready',
    },
    stopGracePeriodMs: 5_000,
    logDir: path.join(root, 'logs'),
    logLevel: 'info',
    stacks: { python: 'auto', rust: 'auto', go: 'auto', node: 'auto', docker: 'auto' },
    backendPriority: [ 'python', 'rust', 'go' ],
    python: { dir: path.join(root, 'backend'), venv: path.join(root, 'venv') },
    node: { dir: path.join(root, 'frontend'), packageManager: 'npm' },
    overrides: {},
    ...overrides,
  };
}

export function makeDescriptor(overrides: Partial<ServiceDescriptor> = {}): ServiceDescriptor {
  const name = overrides.name ?? 'python';
  return {
    name,
    runtime: 'python',
    role: 'backend',
    command: { executable: 'uvicorn', args: [ 'main:app' ] },
    cwd: os.tmpdir(),
    port: 8000,
    livenessPath: '/health/live',
    readinessPath: '/health/ready',
    logPath: path.join(os.tmpdir(), `stackrun-test-${name}.log`),
    env: { PORT: String(overrides.port ?? 8000) },
    dependsOn: [],
    ...overrides,
  };
}

/**
 * Listens on an ephemeral loopback port and returns it.
 */
export async function listen(server: http.Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('Server has no TCP address');
  }
  return address.port;
}
