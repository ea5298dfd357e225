import type { CommandModule } from 'yargs';
import { Orchestrator } from '../../orchestrator/Orchestrator';
import { RUN_MODES, parseRunMode } from '../../orchestrator/ModeSelector';
import { bootstrap, reportFatal, type CommonArgs } from '../bootstrap';

interface RunArgs extends CommonArgs {
  mode: string;
}

export const runCommand: CommandModule<object, RunArgs> = {
  command: '$0 [mode]',
  describe: 'Start the services of a mode and keep them running until interrupted',
  builder: (yargs) =>
    yargs
      .positional('mode', {
        type: 'string',
        choices: RUN_MODES,
        default: 'all',
        description: 'Which services to start',
      })
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to .env file',
      })
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to service override file (default: stackrun.json)',
      })
      .option('root', {
        alias: 'r',
        type: 'string',
        description: 'Project root (default: current directory)',
      }),
  handler: async(argv) => {
    let code: number;
    try {
      const mode = parseRunMode(argv.mode);
      const { config, registry } = bootstrap(argv);
      const orchestrator = new Orchestrator({ config, registry });
      // Last resort for an exit that bypasses teardown.
      process.once('exit', () => orchestrator.supervisor.killAllSync());
      code = await orchestrator.run(mode);
    } catch (error: unknown) {
      code = reportFatal(error);
    }
    process.exit(code);
  },
};
