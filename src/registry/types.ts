export type RuntimeKind = 'python' | 'rust' | 'go' | 'node' | 'docker';

export const RUNTIME_KINDS: readonly RuntimeKind[] = [ 'python', 'rust', 'go', 'node', 'docker' ];

export type ServiceRole = 'backend' | 'frontend' | 'docker';

/**
 * Executable plus explicit argument list. Never evaluated by a shell.
 */
export interface CommandSpec {
  readonly executable: string;
  readonly args: readonly string[];
}

export interface ServiceDescriptor {
  readonly name: string;
  readonly runtime: RuntimeKind;
  readonly role: ServiceRole;
  readonly command: CommandSpec;
  readonly cwd: string;
  readonly port: number;
  readonly livenessPath: string;
  /** Readiness endpoint; absent for services that expose none. */
  readonly readinessPath?: string;
  /** Append-only file receiving stdout and stderr. */
  readonly logPath: string;
  readonly env: Readonly<Record<string, string>>;
  /** Roles that must be up before this service starts. */
  readonly dependsOn: readonly ServiceRole[];
  readonly installHint?: string;
}
