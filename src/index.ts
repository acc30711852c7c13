// API exports for programmatic usage

// Core functionality
import { LineFramer } from './core/line-framer';
import { extractProgress, progressFraction } from './core/progress-extractor';
import { ExecutionStateMachine } from './core/execution-state';
import { ProcessRunner, classifyLaunchError, DEFAULT_FORCE_KILL_AFTER_MS } from './core/process-runner';
import { execaLauncher } from './core/process-launcher';
import { CommandBuilder } from './core/command-builder';
import { createBuildRequest } from './core/build-request';
import { ProjectDetector } from './core/project-detector';

// Utilities
import { Logger } from './utils/logger';
import { Validator } from './utils/validator';
import { Platform } from './utils/platform';

// Re-exports
export { LineFramer, extractProgress, progressFraction, ExecutionStateMachine };
export { ProcessRunner, classifyLaunchError, DEFAULT_FORCE_KILL_AFTER_MS, execaLauncher };
export { CommandBuilder, createBuildRequest, ProjectDetector };
export { Logger, Validator, Platform };
export * from './utils/errors';

// Types
export * from './types/build';
export * from './types/execution';
export * from './types/project';
export type { RunnerOptions } from './core/process-runner';
export type { OutputSink, LaunchedProcess, ProcessCompletion, ProcessLauncher } from './core/process-launcher';
export type { HostOS } from './utils/platform';

// Command functions (for programmatic usage)
import { buildCommand } from './commands/build';
import { packageCommand } from './commands/package';
import { infoCommand } from './commands/info';

export { buildCommand, packageCommand, infoCommand };

/**
 * Main API for programmatic usage
 */
export class UEBuildKit {
  static createRunner = (options?: ConstructorParameters<typeof ProcessRunner>[0]): ProcessRunner =>
    new ProcessRunner(options);

  static project = {
    resolve: ProjectDetector.resolveProjectFile.bind(ProjectDetector),
    load: ProjectDetector.loadProject.bind(ProjectDetector)
  };

  static command = {
    build: CommandBuilder.build.bind(CommandBuilder),
    request: createBuildRequest
  };

  static utils = {
    logger: Logger,
    validator: Validator,
    platform: Platform
  };
}

// Default export
export default UEBuildKit;
