import chalk from 'chalk';
import path from 'path';
import { CommandBuilder } from '../core/command-builder';
import { ProcessRunner } from '../core/process-runner';
import { ProjectDetector } from '../core/project-detector';
import { createBuildRequest } from '../core/build-request';
import type { BuildOperation, BuildRequest } from '../types/build';
import type { ExecutionSnapshot } from '../types/execution';
import type { ProjectInfo } from '../types/project';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';

export const RENDER_INTERVAL_MS = 100;
export const EXIT_CODE_CANCELLED = 130;

export interface OperationCliOptions {
  project?: string;
  engine?: string;
  config: string;
  platform: string;
  stderrProgress?: boolean;
  dryRun?: boolean;
  force?: boolean;
}

/**
 * Turn parsed CLI options into a request, or explain what is wrong with them
 */
export async function requestFromOptions(
  operation: BuildOperation,
  options: OperationCliOptions
): Promise<{ request: BuildRequest; project: ProjectInfo }> {
  const { config, platform } = options;
  if (!Validator.isValidBuildConfig(config)) {
    throw new Error(`Invalid build configuration: ${config} (valid: Debug, Development, Shipping)`);
  }
  if (!Validator.isValidBuildPlatform(platform)) {
    throw new Error(`Invalid build platform: ${platform}`);
  }
  if (!options.engine) {
    throw new Error('Engine location is required. Please specify --engine <path>');
  }

  const uprojectPath = await ProjectDetector.resolveProjectFile(options.project);
  const project = await ProjectDetector.loadProject(uprojectPath);

  const request = createBuildRequest({
    operation,
    configuration: config,
    platform,
    projectPath: project.path,
    engineRoot: ProjectDetector.resolveEngineRoot(options.engine)
  });

  return { request, project };
}

export function printDryRun(request: BuildRequest): void {
  const command = CommandBuilder.build(request);

  Logger.subTitle(`Dry Run - ${request.operation} Configuration`);
  console.log(`  Project: ${request.projectPath}`);
  console.log(`  Engine: ${request.engineRoot}`);
  console.log(`  Configuration: ${request.configuration}`);
  console.log(`  Platform: ${request.platform}`);
  console.log(`  Working Directory: ${command.cwd}`);
  console.log(`  Command: ${command.file} ${command.args.join(' ')}`);

  console.log();
  Logger.info('This is a dry run - nothing will be executed');
}

/**
 * Run a request to completion, echoing output and redrawing progress each tick.
 * Ctrl+C cancels the run instead of killing this process.
 */
export async function executeOperation(
  request: BuildRequest,
  options: { parseStderr?: boolean } = {}
): Promise<ExecutionSnapshot> {
  const runner = new ProcessRunner({ parseStderr: options.parseStderr });
  let progressShown = false;

  const unsubscribe = runner.subscribe(event => {
    if (event.type === 'line') {
      if (progressShown) {
        Logger.clearProgress();
        progressShown = false;
      }
      Logger.output(event.entry);
    }
  });

  const render = setInterval(() => {
    const snapshot = runner.snapshot();
    if (snapshot.phase === 'Running') {
      Logger.progress(Logger.progressBar(snapshot.progress, snapshot.marker));
      progressShown = true;
    }
  }, RENDER_INTERVAL_MS);

  const onInterrupt = (): void => {
    if (runner.cancel()) {
      Logger.warning('Cancelling... waiting for the build tool to exit');
    }
  };
  process.on('SIGINT', onInterrupt);

  try {
    Logger.info(`Starting ${request.operation.toLowerCase()}: ${chalk.bold(path.basename(request.projectPath))} | ${chalk.bold(request.platform)} | ${chalk.bold(request.configuration)}`);
    Logger.divider();

    const started = runner.start(request);
    if (!started.started) {
      throw new Error(`Could not start: ${started.error}`);
    }

    return await runner.whenSettled();
  } finally {
    clearInterval(render);
    process.off('SIGINT', onInterrupt);
    unsubscribe();
    if (progressShown) {
      Logger.clearProgress();
    }
    Logger.divider();
  }
}

/**
 * Report the outcome and return the exit code for this process
 */
export function reportOutcome(snapshot: ExecutionSnapshot): number {
  const exitInfo = snapshot.exitInfo;
  const duration = exitInfo ? (exitInfo.durationMs / 1000).toFixed(1) : '0.0';
  const operation = snapshot.request?.operation ?? 'Operation';

  switch (snapshot.phase) {
    case 'Succeeded':
      Logger.success(`${operation} completed successfully in ${duration}s`);
      return 0;
    case 'Cancelled':
      Logger.warning(`${operation} cancelled after ${duration}s`);
      return EXIT_CODE_CANCELLED;
    case 'Failed': {
      const failure = exitInfo?.failure;
      if (failure?.kind === 'LaunchFailure') {
        Logger.error(`Could not launch the build tool (${failure.reason}): ${failure.message}`);
      } else {
        Logger.error(`${operation} failed after ${duration}s${failure ? `: ${failure.message}` : ''}`);
      }
      printErrorSummary(snapshot);
      return failureExitCode(exitInfo?.code ?? null);
    }
    default:
      Logger.error(`${operation} did not finish (phase: ${snapshot.phase})`);
      return 1;
  }
}

/**
 * The tool's own code when this process can exit with it unchanged. Anything
 * else would wrap modulo 256, and 256 would read as success.
 */
export function failureExitCode(code: number | null): number {
  return code !== null && Number.isInteger(code) && code >= 1 && code <= 255 ? code : 1;
}

function printErrorSummary(snapshot: ExecutionSnapshot): void {
  const errorLines = snapshot.log
    .map(entry => entry.text)
    .filter(line =>
      line.toLowerCase().includes('error') ||
      line.toLowerCase().includes('failed') ||
      line.toLowerCase().includes('fatal')
    );

  if (errorLines.length === 0) {
    return;
  }

  Logger.subTitle('Error Summary');
  errorLines.slice(0, 10).forEach(line => {
    console.log(`  ${chalk.red('•')} ${line.trim()}`);
  });

  if (errorLines.length > 10) {
    console.log(`  ${chalk.gray(`... and ${errorLines.length - 10} more errors`)}`);
  }
}
