#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { checkCommand } from './commands/check';
import { runCommand } from './commands/run';

yargs(hideBin(process.argv))
  .scriptName('stackrun')
  .usage('$0 [mode] [options]')
  .command(runCommand)
  .command(checkCommand)
  .strict()
  .help()
  .parse();
