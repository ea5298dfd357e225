/**
 * Error taxonomy of a run.
 *
 * Every error that ends a run carries the process exit code the CLI reports
 * after teardown has completed.
 */
export class OrchestratorError extends Error {
  public readonly exitCode: number;

  public constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'OrchestratorError';
    this.exitCode = exitCode;
  }
}

/**
 * Unknown mode, invalid variable, or nothing in the registry matches the mode.
 */
export class ConfigurationError extends OrchestratorError {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DependencyMissingError extends OrchestratorError {
  public constructor(
    public readonly command: string,
    public readonly hint?: string,
  ) {
    super(hint ?
      `Required command '${command}' is not installed. Install with: ${hint}` :
      `Required command '${command}' is not installed`);
    this.name = 'DependencyMissingError';
  }
}

export class PortConflictError extends OrchestratorError {
  public constructor(
    public readonly service: string,
    public readonly port: number,
    public readonly suggestedPort?: number,
  ) {
    super(suggestedPort === undefined ?
      `Port ${port} for service '${service}' is already in use` :
      `Port ${port} for service '${service}' is already in use (next free port: ${suggestedPort})`);
    this.name = 'PortConflictError';
  }
}

export { PortConflictError as PortInUseError };

/**
 * Recorded as a warning: the service stays tracked and the run continues.
 */
export class HealthTimeoutError extends OrchestratorError {
  public constructor(
    public readonly service: string,
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Service '${service}' did not become healthy at ${url} within ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'HealthTimeoutError';
  }
}

export class ProcessCrashError extends OrchestratorError {
  public constructor(
    public readonly service: string,
    public readonly childExitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly logPath: string,
  ) {
    super(`Service '${service}' exited unexpectedly (code ${childExitCode ?? 'null'}, signal ${signal ?? 'null'}). ` +
      `Check logs: ${logPath}`);
    this.name = 'ProcessCrashError';
  }
}
