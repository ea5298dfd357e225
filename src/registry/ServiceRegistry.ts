import { ConfigurationError } from '../errors';
import type { ServiceDescriptor, ServiceRole } from './types';

/**
 * Static mapping from logical service name to its resolved descriptor.
 * Registration order is preserved and used as the tie-breaker everywhere.
 */
export class ServiceRegistry {
  private readonly descriptors: Map<string, ServiceDescriptor> = new Map();

  public constructor(descriptors: Iterable<ServiceDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  public register(descriptor: ServiceDescriptor): void {
    if (this.descriptors.has(descriptor.name)) {
      throw new ConfigurationError(`Service '${descriptor.name}' is registered twice`);
    }
    this.descriptors.set(descriptor.name, freezeDescriptor(descriptor));
  }

  public get(name: string): ServiceDescriptor | undefined {
    return this.descriptors.get(name);
  }

  public list(): ServiceDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  public byRole(role: ServiceRole): ServiceDescriptor[] {
    return this.list().filter((descriptor) => descriptor.role === role);
  }

  public get size(): number {
    return this.descriptors.size;
  }
}

function freezeDescriptor(descriptor: ServiceDescriptor): ServiceDescriptor {
  return Object.freeze({
    ...descriptor,
    command: Object.freeze({
      executable: descriptor.command.executable,
      args: Object.freeze([ ...descriptor.command.args ]),
    }),
    env: Object.freeze({ ...descriptor.env }),
    dependsOn: Object.freeze([ ...descriptor.dependsOn ]),
  });
}
