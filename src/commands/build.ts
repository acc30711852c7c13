import { Command } from 'commander';
import { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { executeOperation, printDryRun, reportOutcome, requestFromOptions } from './execute';
import type { OperationCliOptions } from './execute';

export function buildCommand(program: Command): void {
  program
    .command('build')
    .description('Build Unreal Engine project')
    .option('--project <path>', 'Path to project directory or .uproject file')
    .option('--engine <path>', 'Path to the engine root or its UE5.sln')
    .option('-c, --config <config>', 'Build configuration (Debug, Development, Shipping)', 'Development')
    .option('-p, --platform <platform>', 'Target platform (Win64, Linux, Mac, Android, iOS, PS4, PS5, XBoxOne, XBoxSeries, Switch)', 'Win64')
    .option('--stderr-progress', 'Also read progress markers from stderr')
    .option('--dry-run', 'Show the command without running it')
    .action(async (options: OperationCliOptions) => {
      try {
        Logger.title('Unreal Engine Build');

        const { request } = await requestFromOptions('Build', options);

        if (options.dryRun) {
          printDryRun(request);
          return;
        }

        const snapshot = await executeOperation(request, { parseStderr: options.stderrProgress });
        process.exitCode = reportOutcome(snapshot);
      } catch (error) {
        Logger.error(`Build preparation failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
