import { Command } from 'commander';
import { ProjectDetector } from '../core/project-detector';
import { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { executeOperation, printDryRun, reportOutcome, requestFromOptions } from './execute';
import type { OperationCliOptions } from './execute';

export function packageCommand(program: Command): void {
  program
    .command('package')
    .description('Build, cook, stage and package an Unreal Engine project with BuildCookRun')
    .option('--project <path>', 'Path to project directory or .uproject file')
    .option('--engine <path>', 'Path to the engine root or its UE5.sln')
    .option('-c, --config <config>', 'Client and server configuration (Debug, Development, Shipping)', 'Development')
    .option('-p, --platform <platform>', 'Target platform (Win64, Linux, Mac, Android, iOS, PS4, PS5, XBoxOne, XBoxSeries, Switch)', 'Win64')
    .option('--stderr-progress', 'Also read progress markers from stderr')
    .option('--force', 'Package even if the project is not on a source-built engine')
    .option('--dry-run', 'Show the command without running it')
    .action(async (options: OperationCliOptions) => {
      try {
        Logger.title('Unreal Engine Package');

        const { request, project } = await requestFromOptions('Package', options);

        if (!ProjectDetector.isSourceBuild(project) && !options.force) {
          Logger.error(`Packaging needs a source-built engine, ${project.name} uses: ${project.engineVersion}`);
          Logger.info('Use --force to package anyway');
          process.exitCode = 1;
          return;
        }

        if (options.dryRun) {
          printDryRun(request);
          return;
        }

        const snapshot = await executeOperation(request, { parseStderr: options.stderrProgress });
        process.exitCode = reportOutcome(snapshot);
      } catch (error) {
        Logger.error(`Package preparation failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
