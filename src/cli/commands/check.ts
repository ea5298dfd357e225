import type { CommandModule } from 'yargs';
import { HealthVerifier } from '../../orchestrator/HealthVerifier';
import { SignalCoordinator } from '../../orchestrator/SignalCoordinator';
import { bootstrap, reportFatal, type CommonArgs } from '../bootstrap';

export const checkCommand: CommandModule<object, CommonArgs> = {
  command: 'check',
  describe: 'Verify the backend health endpoints, starting the backend if needed',
  builder: (yargs) =>
    yargs
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
    const coordinator = new SignalCoordinator();
    let code: number;
    try {
      const { config, registry } = bootstrap(argv);
      coordinator.install();
      const report = await new HealthVerifier({ config, registry }).verify(coordinator.signal);
      code = report.passed ? 0 : 1;
    } catch (error: unknown) {
      code = reportFatal(error);
    } finally {
      coordinator.dispose();
    }
    process.exit(code);
  },
};
