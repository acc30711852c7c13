import { Command } from 'commander';
import chalk from 'chalk';
import { ProjectDetector } from '../core/project-detector';
import { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export function infoCommand(program: Command): void {
  program
    .command('info')
    .description('Show project name, engine version and plugins')
    .option('--project <path>', 'Path to project directory or .uproject file')
    .action(async (options: { project?: string }) => {
      try {
        const uprojectPath = await ProjectDetector.resolveProjectFile(options.project);
        const project = await ProjectDetector.loadProject(uprojectPath);

        Logger.title(project.name);
        console.log(`  Project file: ${project.path}`);
        console.log(`  Engine: ${project.engineVersion}`);
        console.log(`  Plugins: ${project.plugins.length > 0 ? project.plugins.join(', ') : chalk.gray('none')}`);
        console.log(`  Packaging: ${ProjectDetector.isSourceBuild(project) ? chalk.green('available') : chalk.yellow('needs a source-built engine')}`);
      } catch (error) {
        Logger.error(`Failed to read project: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
