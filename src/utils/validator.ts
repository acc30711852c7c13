import { BUILD_CONFIGURATIONS, BUILD_OPERATIONS, BUILD_PLATFORMS } from '../types/build';
import type { BuildConfiguration, BuildOperation, BuildPlatform, BuildRequest } from '../types/build';
import { InvalidRequestError } from './errors';

export class Validator {
  static isValidOperation(operation: string): operation is BuildOperation {
    return BUILD_OPERATIONS.some(o => o === operation);
  }

  static isValidBuildConfig(config: string): config is BuildConfiguration {
    return BUILD_CONFIGURATIONS.some(c => c === config);
  }

  static isValidBuildPlatform(platform: string): platform is BuildPlatform {
    return BUILD_PLATFORMS.some(p => p === platform);
  }

  /**
   * Validate .uproject file path by extension only; existence is the caller's concern
   */
  static isUProjectPath(projectPath: string): boolean {
    return projectPath.toLowerCase().endsWith('.uproject');
  }

  /**
   * Collect every problem with a request, empty when it is well formed
   */
  static checkBuildRequest(request: BuildRequest): string[] {
    const problems: string[] = [];

    if (!Validator.isValidOperation(request.operation)) {
      problems.push(`unknown operation "${request.operation}"`);
    }
    if (!Validator.isValidBuildConfig(request.configuration)) {
      problems.push(`unknown configuration "${request.configuration}"`);
    }
    if (!Validator.isValidBuildPlatform(request.platform)) {
      problems.push(`unknown platform "${request.platform}"`);
    }
    if (!request.projectPath || !request.projectPath.trim()) {
      problems.push('projectPath is required');
    } else if (!Validator.isUProjectPath(request.projectPath)) {
      problems.push(`projectPath must point at a .uproject file: ${request.projectPath}`);
    }
    if (!request.engineRoot || !request.engineRoot.trim()) {
      problems.push('engineRoot is required');
    }
    if (!request.workingDirectory || !request.workingDirectory.trim()) {
      problems.push('workingDirectory is required');
    }
    if (request.target !== undefined && !request.target.trim()) {
      problems.push('target must not be empty');
    }

    return problems;
  }

  static assertBuildRequest(request: BuildRequest): void {
    const problems = Validator.checkBuildRequest(request);
    if (problems.length > 0) {
      throw new InvalidRequestError(problems);
    }
  }
}
