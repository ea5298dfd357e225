import path from 'node:path';
import dotenv from 'dotenv';
import { getLoggerFor, setGlobalLoggerFactory } from 'global-logger-factory';
import { isLogLevel, loadRunConfig, type RunConfig } from '../config/RunConfig';
import { ConfigurationError, OrchestratorError } from '../errors';
import { ConfigurableLoggerFactory } from '../logging/ConfigurableLoggerFactory';
import { createDefaultRegistry } from '../registry/defaults';
import type { ServiceRegistry } from '../registry/ServiceRegistry';

export interface CommonArgs {
  env?: string;
  config?: string;
  root?: string;
}

export interface Bootstrapped {
  config: RunConfig;
  registry: ServiceRegistry;
}

/**
 * Shared setup of every command: env file, logger, configuration, registry.
 */
export function bootstrap(args: CommonArgs): Bootstrapped {
  if (args.env) {
    loadEnvFile(path.resolve(args.env));
  }
  initLogger();
  const config = loadRunConfig(process.env, { projectRoot: args.root, configFile: args.config });
  const registry = createDefaultRegistry(config);
  getLoggerFor('Bootstrap').debug(`Registered services: ${registry.list().map((d) => d.name).join(', ') || 'none'}`);
  return { config, registry };
}

/**
 * Loads a dotenv file without overriding variables that are already set.
 */
export function loadEnvFile(envPath: string): void {
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigurationError(`Env file not found: ${envPath}`);
  }
}

function initLogger(): void {
  const level = process.env.STACKRUN_LOG_LEVEL?.trim().toLowerCase() ?? 'info';
  const logFile = process.env.STACKRUN_LOG_FILE?.trim();
  setGlobalLoggerFactory(new ConfigurableLoggerFactory(isLogLevel(level) ? level : 'info', {
    fileName: logFile ? logFile : undefined,
    showLocation: true,
  }));
}

/**
 * Exit code for an error that escaped a command, logged once.
 */
export function reportFatal(error: unknown): number {
  const message = error instanceof Error ? error.message : String(error);
  getLoggerFor('Main').error(message);
  return error instanceof OrchestratorError ? error.exitCode : 1;
}
