import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '../errors';
import { RUNTIME_KINDS, type CommandSpec, type RuntimeKind } from '../registry/types';

export type StackToggle = 'auto' | 'true' | 'false';

export type NodePackageManager = 'npm' | 'pnpm' | 'yarn';

export interface HealthCheckConfig {
  readonly enabled: boolean;
  readonly timeoutMs: number;
  readonly intervalMs: number;
  readonly livenessPath: string;
  /** Empty when readiness probing is disabled. */
  readonly readinessPath?: string;
}

/**
 * Per-runtime descriptor overrides read from `stackrun.json`.
 */
export interface ServiceOverride {
  readonly command?: CommandSpec;
  readonly cwd?: string;
  readonly port?: number;
  readonly livenessPath?: string;
  readonly readinessPath?: string;
}

export interface RunConfig {
  readonly projectRoot: string;
  readonly projectName: string;
  readonly backendPort: number;
  readonly frontendPort: number;
  readonly healthCheck: HealthCheckConfig;
  readonly stopGracePeriodMs: number;
  readonly logDir: string;
  readonly logLevel: LogLevel;
  readonly stacks: Readonly<Record<RuntimeKind, StackToggle>>;
  readonly backendPriority: readonly RuntimeKind[];
  readonly python: { readonly dir: string; readonly venv: string };
  readonly node: { readonly dir: string; readonly packageManager: NodePackageManager };
  readonly overrides: Readonly<Partial<Record<RuntimeKind, ServiceOverride>>>;
}

export interface LoadRunConfigOptions {
  projectRoot?: string;
  /** Explicit descriptor override file; must exist when given. */
  configFile?: string;
}

export const DEFAULT_CONFIG_FILE = 'stackrun.json';

const DEFAULT_BACKEND_PRIORITY: readonly RuntimeKind[] = [ 'python', 'rust', 'go' ];
const NODE_DIR_CANDIDATES = [ 'frontend', 'web', 'client' ];
export const LOG_LEVELS = [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ] as const;

export type LogLevel = typeof LOG_LEVELS[number];

type Env = Readonly<Record<string, string | undefined>>;

export function loadRunConfig(env: Env = process.env, options: LoadRunConfigOptions = {}): RunConfig {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const readinessPath = env.HEALTH_READY_PATH === undefined ?
    '/health/ready' :
    env.HEALTH_READY_PATH.trim();

  const config: RunConfig = {
    projectRoot,
    projectName: nonEmpty(env.PROJECT_NAME) ?? (path.basename(projectRoot) || 'project'),
    backendPort: parsePort('BACKEND_PORT', env.BACKEND_PORT, 8000),
    frontendPort: parsePort('FRONTEND_PORT', env.FRONTEND_PORT, 5173),
    healthCheck: {
      enabled: parseBoolean('HEALTH_CHECK_ENABLED', env.HEALTH_CHECK_ENABLED, true),
      timeoutMs: parsePositive('HEALTH_CHECK_TIMEOUT', env.HEALTH_CHECK_TIMEOUT, 30) * 1000,
      intervalMs: parsePositive('HEALTH_CHECK_INTERVAL_MS', env.HEALTH_CHECK_INTERVAL_MS, 1000),
      livenessPath: normalizeUrlPath(nonEmpty(env.HEALTH_LIVE_PATH) ?? '/health/live'),
      readinessPath: readinessPath.length > 0 ? normalizeUrlPath(readinessPath) : undefined,
    },
    stopGracePeriodMs: parsePositive('STOP_GRACE_PERIOD_MS', env.STOP_GRACE_PERIOD_MS, 5000),
    logDir: path.resolve(projectRoot, nonEmpty(env.STACKRUN_LOG_DIR) ?? os.tmpdir()),
    logLevel: parseLogLevel(env.STACKRUN_LOG_LEVEL),
    stacks: {
      python: parseToggle('ENABLE_PYTHON', env.ENABLE_PYTHON),
      rust: parseToggle('ENABLE_RUST', env.ENABLE_RUST),
      go: parseToggle('ENABLE_GO', env.ENABLE_GO),
      node: parseToggle('ENABLE_NODE', env.ENABLE_NODE),
      docker: parseToggle('ENABLE_DOCKER', env.ENABLE_DOCKER),
    },
    backendPriority: parsePriority(env.BACKEND_PRIORITY),
    python: {
      dir: resolvePythonDir(projectRoot, nonEmpty(env.PYTHON_DIR)),
      venv: path.resolve(projectRoot, nonEmpty(env.PYTHON_VENV) ?? 'venv'),
    },
    node: {
      dir: resolveNodeDir(projectRoot, nonEmpty(env.NODE_DIR)),
      packageManager: parsePackageManager(env.NODE_PACKAGE_MANAGER),
    },
    overrides: loadOverrides(projectRoot, options.configFile),
  };
  return config;
}

function nonEmpty(value?: string): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parsePort(name: string, value: string | undefined, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return fallback;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`${name} must be an integer between 1 and 65535, got '${raw}'`);
  }
  return port;
}

export function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  if ([ 'true', '1', 'yes', 'on' ].includes(raw)) {
    return true;
  }
  if ([ 'false', '0', 'no', 'off' ].includes(raw)) {
    return false;
  }
  throw new ConfigurationError(`${name} must be a boolean, got '${value}'`);
}

function parsePositive(name: string, value: string | undefined, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got '${raw}'`);
  }
  return parsed;
}

function parseToggle(name: string, value: string | undefined): StackToggle {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined || raw === 'auto') {
    return 'auto';
  }
  return parseBoolean(name, raw, true) ? 'true' : 'false';
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(value?: string): LogLevel {
  const level = nonEmpty(value)?.toLowerCase() ?? 'info';
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`STACKRUN_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${value}'`);
  }
  return level;
}

function parsePriority(value?: string): RuntimeKind[] {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return [ ...DEFAULT_BACKEND_PRIORITY ];
  }
  const priority: RuntimeKind[] = [];
  for (const entry of raw.split(',')) {
    const runtime = entry.trim().toLowerCase();
    if (!runtime) {
      continue;
    }
    if (!isRuntimeKind(runtime)) {
      throw new ConfigurationError(`BACKEND_PRIORITY contains unknown runtime '${runtime}'`);
    }
    if (!priority.includes(runtime)) {
      priority.push(runtime);
    }
  }
  return priority;
}

function parsePackageManager(value?: string): NodePackageManager {
  const pm = nonEmpty(value)?.toLowerCase() ?? 'npm';
  if (pm !== 'npm' && pm !== 'pnpm' && pm !== 'yarn') {
    throw new ConfigurationError(`NODE_PACKAGE_MANAGER must be npm, pnpm or yarn, got '${value}'`);
  }
  return pm;
}

export function isRuntimeKind(value: string): value is RuntimeKind {
  return RUNTIME_KINDS.some((runtime) => runtime === value);
}

function normalizeUrlPath(value: string): string {
  return value.startsWith('/') ? value : `/${value}`;
}

function resolvePythonDir(projectRoot: string, configured?: string): string {
  if (configured) {
    return path.resolve(projectRoot, configured);
  }
  const backend = path.join(projectRoot, 'backend');
  return fs.existsSync(backend) ? backend : projectRoot;
}

function resolveNodeDir(projectRoot: string, configured?: string): string {
  if (configured) {
    return path.resolve(projectRoot, configured);
  }
  for (const candidate of NODE_DIR_CANDIDATES) {
    const dir = path.join(projectRoot, candidate);
    if (fs.existsSync(dir)) {
      return dir;
    }
  }
  return projectRoot;
}

function loadOverrides(projectRoot: string, configFile?: string): Partial<Record<RuntimeKind, ServiceOverride>> {
  const filePath = path.resolve(projectRoot, configFile ?? DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(filePath)) {
    if (configFile) {
      throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigurationError(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a JSON object`);
  }
  const services = parsed.services;
  if (services === undefined) {
    return {};
  }
  if (!isRecord(services)) {
    throw new ConfigurationError(`${filePath}: "services" must be an object`);
  }

  const overrides: Partial<Record<RuntimeKind, ServiceOverride>> = {};
  for (const [ runtime, value ] of Object.entries(services)) {
    if (!isRuntimeKind(runtime)) {
      throw new ConfigurationError(`${filePath}: unknown runtime '${runtime}'`);
    }
    overrides[runtime] = parseOverride(`${filePath}: services.${runtime}`, value);
  }
  return overrides;
}

function parseOverride(where: string, value: unknown): ServiceOverride {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }
  const { command, cwd, port, livenessPath, readinessPath } = value;

  let commandSpec: CommandSpec | undefined;
  if (command !== undefined) {
    if (!Array.isArray(command) || command.length === 0 ||
      !command.every((part): part is string => typeof part === 'string' && part.length > 0)) {
      throw new ConfigurationError(`${where}.command must be a non-empty array of strings (argv, not a shell string)`);
    }
    const [ executable, ...args ] = command;
    commandSpec = { executable, args };
  }
  if (cwd !== undefined && typeof cwd !== 'string') {
    throw new ConfigurationError(`${where}.cwd must be a string`);
  }
  if (port !== undefined && (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new ConfigurationError(`${where}.port must be an integer between 1 and 65535`);
  }
  if (livenessPath !== undefined && typeof livenessPath !== 'string') {
    throw new ConfigurationError(`${where}.livenessPath must be a string`);
  }
  if (readinessPath !== undefined && typeof readinessPath !== 'string') {
    throw new ConfigurationError(`${where}.readinessPath must be a string`);
  }

  return {
    command: commandSpec,
    cwd,
    port,
    livenessPath: livenessPath === undefined ? undefined : normalizeUrlPath(livenessPath),
    readinessPath: readinessPath === undefined ? undefined : normalizeUrlPath(readinessPath),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
