export type BuildOperation = 'Build' | 'Package';
export type BuildConfiguration = 'Debug' | 'Development' | 'Shipping';
export type BuildPlatform =
  | 'Win64'
  | 'Linux'
  | 'Mac'
  | 'Android'
  | 'iOS'
  | 'PS4'
  | 'PS5'
  | 'XBoxOne'
  | 'XBoxSeries'
  | 'Switch';

export const BUILD_OPERATIONS: readonly BuildOperation[] = ['Build', 'Package'];
export const BUILD_CONFIGURATIONS: readonly BuildConfiguration[] = ['Debug', 'Development', 'Shipping'];
export const BUILD_PLATFORMS: readonly BuildPlatform[] = [
  'Win64',
  'Linux',
  'Mac',
  'Android',
  'iOS',
  'PS4',
  'PS5',
  'XBoxOne',
  'XBoxSeries',
  'Switch'
];

/**
 * One invocation of the Unreal build tooling. Never mutated once created.
 */
export interface BuildRequest {
  readonly operation: BuildOperation;
  readonly configuration: BuildConfiguration;
  readonly platform: BuildPlatform;
  /** Path to the .uproject file */
  readonly projectPath: string;
  /** Engine root, the directory holding Engine/ */
  readonly engineRoot: string;
  readonly workingDirectory: string;
  /** Build target name, defaults to the project name */
  readonly target?: string;
  readonly additionalArgs?: readonly string[];
}

export interface BuildRequestInput {
  operation: BuildOperation;
  configuration?: BuildConfiguration;
  platform?: BuildPlatform;
  projectPath: string;
  engineRoot: string;
  workingDirectory?: string;
  target?: string;
  additionalArgs?: string[];
}

export interface CommandSpec {
  file: string;
  args: string[];
  cwd: string;
}
