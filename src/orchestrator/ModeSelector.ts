import { getLoggerFor } from 'global-logger-factory';
import { ConfigurationError } from '../errors';
import type { ServiceRegistry } from '../registry/ServiceRegistry';
import type { RuntimeKind, ServiceDescriptor, ServiceRole } from '../registry/types';

export const RUN_MODES = [ 'all', 'backend', 'frontend', 'docker' ] as const;

export type RunMode = typeof RUN_MODES[number];

export function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

export function parseRunMode(value: string): RunMode {
  const mode = value.trim().toLowerCase();
  if (!isRunMode(mode)) {
    throw new ConfigurationError(`Unknown mode '${value}'. Expected one of: ${RUN_MODES.join(', ')}`);
  }
  return mode;
}

/**
 * Resolves a run mode into the ordered list of descriptors to start.
 *
 * At most one backend is ever selected. Services come out with their role
 * dependencies first, so the reverse of that order is a safe teardown order.
 */
export class ModeSelector {
  protected readonly logger = getLoggerFor(this);

  public constructor(
    private readonly registry: ServiceRegistry,
    private readonly backendPriority: readonly RuntimeKind[],
  ) {}

  public select(mode: RunMode): ServiceDescriptor[] {
    let selected: ServiceDescriptor[];
    switch (mode) {
      case 'backend':
        selected = this.optionalBackend();
        break;
      case 'frontend':
        selected = this.registry.byRole('frontend');
        break;
      case 'docker':
        selected = this.registry.byRole('docker');
        break;
      case 'all':
        selected = [ ...this.optionalBackend(), ...this.registry.byRole('frontend') ];
        break;
    }

    if (selected.length === 0) {
      throw new ConfigurationError(`No service matches mode '${mode}'. ` +
        `Registered services: ${this.registry.list().map((descriptor) => descriptor.name).join(', ') || 'none'}`);
    }

    const ordered = orderByDependencies(selected);
    assertDistinctPorts(ordered);
    this.logger.debug(`Mode ${mode} resolved to ${ordered.map((descriptor) => descriptor.name).join(', ')}`);
    return ordered;
  }

  /**
   * The single backend to run: the first registered candidate in priority
   * order, then any remaining candidates in registration order.
   */
  public selectBackend(): ServiceDescriptor {
    const [ backend ] = this.optionalBackend();
    if (!backend) {
      throw new ConfigurationError('No backend service is registered');
    }
    return backend;
  }

  private optionalBackend(): ServiceDescriptor[] {
    const candidates = this.registry.byRole('backend');
    if (candidates.length === 0) {
      return [];
    }
    const ranked = [ ...candidates ].sort((left, right) => rank(left, this.backendPriority) -
      rank(right, this.backendPriority));
    const [ chosen, ...passed ] = ranked;
    if (passed.length > 0) {
      this.logger.info(`Multiple backends available, using ${chosen.name} (skipping ${passed.map((d) => d.name).join(', ')})`);
    }
    return [ chosen ];
  }
}

function rank(descriptor: ServiceDescriptor, priority: readonly RuntimeKind[]): number {
  const index = priority.indexOf(descriptor.runtime);
  return index === -1 ? priority.length : index;
}

/**
 * Stable ordering where every service comes after the services whose role it
 * depends on. Roles that are not selected impose no constraint.
 */
function orderByDependencies(descriptors: readonly ServiceDescriptor[]): ServiceDescriptor[] {
  const ordered: ServiceDescriptor[] = [];
  const pending = [ ...descriptors ];
  const placedRoles = (): Set<ServiceRole> => new Set(ordered.map((descriptor) => descriptor.role));

  while (pending.length > 0) {
    const present = new Set(pending.map((descriptor) => descriptor.role));
    const placed = placedRoles();
    const index = pending.findIndex((descriptor) => descriptor.dependsOn.every((role) =>
      placed.has(role) || !present.has(role) || role === descriptor.role));
    if (index === -1) {
      throw new ConfigurationError(`Circular dependency between ${pending.map((d) => d.name).join(', ')}`);
    }
    ordered.push(...pending.splice(index, 1));
  }
  return ordered;
}

function assertDistinctPorts(descriptors: readonly ServiceDescriptor[]): void {
  const owners = new Map<number, string>();
  for (const descriptor of descriptors) {
    const owner = owners.get(descriptor.port);
    if (owner) {
      throw new ConfigurationError(`Services '${owner}' and '${descriptor.name}' both use port ${descriptor.port}`);
    }
    owners.set(descriptor.port, descriptor.name);
  }
}
