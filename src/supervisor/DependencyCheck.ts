import { execFileSync } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import path from 'node:path';

/**
 * Resolves like a shell would: paths must point at an executable file,
 * bare names are looked up on PATH.
 */
export function isCommandAvailable(command: string, cwd = process.cwd()): boolean {
  if (command.includes('/') || command.includes(path.sep)) {
    const resolved = path.resolve(cwd, command);
    try {
      accessSync(resolved, constants.X_OK);
      return statSync(resolved).isFile();
    } catch {
      return false;
    }
  }
  try {
    execFileSync('which', [ command ], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}
