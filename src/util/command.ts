import type { CommandSpec } from '../registry/types';

const SAFE_ARG = /^[\w@%+=:,./-]+$/u;

/**
 * Renders a command for log output only.
 */
export function formatCommand(command: CommandSpec): string {
  return [ command.executable, ...command.args ]
    .map((part) => SAFE_ARG.test(part) ? part : `'${part.replace(/'/gu, `'\\''`)}'`)
    .join(' ');
}
