import path from 'path';
import type { BuildRequest, BuildRequestInput } from '../types/build';
import { Validator } from '../utils/validator';

/**
 * Fill in defaults and freeze. The working directory defaults to the
 * directory holding the .uproject file.
 */
export function createBuildRequest(input: BuildRequestInput): BuildRequest {
  const request: BuildRequest = {
    operation: input.operation,
    configuration: input.configuration ?? 'Development',
    platform: input.platform ?? 'Win64',
    projectPath: input.projectPath,
    engineRoot: input.engineRoot,
    workingDirectory: input.workingDirectory ?? path.dirname(input.projectPath),
    target: input.target,
    additionalArgs: input.additionalArgs ? Object.freeze([...input.additionalArgs]) : undefined
  };

  Validator.assertBuildRequest(request);
  return Object.freeze(request);
}
