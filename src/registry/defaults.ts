import fs from 'node:fs';
import path from 'node:path';
import type { RunConfig } from '../config/RunConfig';
import { ServiceRegistry } from './ServiceRegistry';
import { isStackEnabled, markerFileDetector, type StackDetector } from './StackDetector';
import { RUNTIME_KINDS, type CommandSpec, type RuntimeKind, type ServiceDescriptor, type ServiceRole } from './types';

interface RuntimeDefaults {
  role: ServiceRole;
  command: CommandSpec;
  cwd: string;
  port: number;
  livenessPath: string;
  readinessPath?: string;
  dependsOn: ServiceRole[];
  installHint: string;
}

const INSTALL_HINTS: Record<RuntimeKind, string> = {
  python: 'pip install uvicorn (inside the project virtualenv)',
  rust: 'https://rustup.rs',
  go: 'https://go.dev/dl/',
  node: 'https://nodejs.org',
  docker: 'https://docs.docker.com/get-docker/',
};

/**
 * Builds the registry for a project: one descriptor per enabled runtime,
 * with `stackrun.json` overrides applied on top of the defaults.
 */
export function createDefaultRegistry(config: RunConfig, detect: StackDetector = markerFileDetector): ServiceRegistry {
  const registry = new ServiceRegistry();
  for (const runtime of RUNTIME_KINDS) {
    if (isStackEnabled(runtime, config, detect)) {
      registry.register(buildDescriptor(runtime, config));
    }
  }
  return registry;
}

export function buildDescriptor(runtime: RuntimeKind, config: RunConfig): ServiceDescriptor {
  const defaults = runtimeDefaults(runtime, config);
  const override = config.overrides[runtime] ?? {};
  const port = override.port ?? defaults.port;

  return {
    name: runtime,
    runtime,
    role: defaults.role,
    command: override.command ?? defaults.command,
    cwd: override.cwd ? path.resolve(config.projectRoot, override.cwd) : defaults.cwd,
    port,
    livenessPath: override.livenessPath ?? defaults.livenessPath,
    readinessPath: override.readinessPath ?? defaults.readinessPath,
    logPath: serviceLogPath(config, runtime),
    env: { PORT: String(port) },
    dependsOn: defaults.dependsOn,
    installHint: defaults.installHint,
  };
}

export function serviceLogPath(config: RunConfig, service: string): string {
  return path.join(config.logDir, `${config.projectName}_${service}.log`);
}

function runtimeDefaults(runtime: RuntimeKind, config: RunConfig): RuntimeDefaults {
  const backend = {
    port: config.backendPort,
    livenessPath: config.healthCheck.livenessPath,
    readinessPath: config.healthCheck.readinessPath,
    dependsOn: [],
    installHint: INSTALL_HINTS[runtime],
  };

  switch (runtime) {
    case 'python':
      return {
        ...backend,
        role: 'backend',
        cwd: config.python.dir,
        command: {
          executable: resolveVenvExecutable(config.python.venv, 'uvicorn'),
          args: [ 'main:app', '--host', '0.0.0.0', '--port', String(config.backendPort) ],
        },
      };
    case 'rust':
      return { ...backend, role: 'backend', cwd: config.projectRoot, command: { executable: 'cargo', args: [ 'run' ] }};
    case 'go':
      return { ...backend, role: 'backend', cwd: config.projectRoot, command: { executable: 'go', args: [ 'run', '.' ] }};
    case 'docker':
      return { ...backend, role: 'docker', cwd: config.projectRoot, command: { executable: 'docker', args: [ 'compose', 'up' ] }};
    case 'node': {
      const pm = config.node.packageManager;
      const port = String(config.frontendPort);
      return {
        role: 'frontend',
        cwd: config.node.dir,
        port: config.frontendPort,
        // Dev servers expose no health endpoints; the index page answers once the bundler is up.
        livenessPath: '/',
        dependsOn: [ 'backend' ],
        installHint: INSTALL_HINTS.node,
        command: {
          executable: pm,
          args: pm === 'npm' ? [ 'run', 'dev', '--', '--port', port ] : [ 'run', 'dev', '--port', port ],
        },
      };
    }
  }
}

function resolveVenvExecutable(venv: string, name: string): string {
  const candidate = path.join(venv, 'bin', name);
  return fs.existsSync(candidate) ? candidate : name;
}
