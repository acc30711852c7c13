import fs from 'fs-extra';
import path from 'path';
import { glob } from 'glob';
import type { UProject, ProjectInfo } from '../types/project';
import { ProjectResolutionError, errorMessage } from '../utils/errors';
import { Validator } from '../utils/validator';

export const SOURCE_ENGINE_VERSION = 'From Source';
export const UNKNOWN_ENGINE_VERSION = 'Unknown';

export class ProjectDetector {
  /**
   * Resolve a project directory or .uproject path to the .uproject file
   */
  static async resolveProjectFile(projectPath: string = process.cwd()): Promise<string> {
    const absolute = path.resolve(projectPath);

    if (Validator.isUProjectPath(absolute)) {
      return absolute;
    }

    if (!(await fs.pathExists(absolute)) || !(await fs.stat(absolute)).isDirectory()) {
      throw new ProjectResolutionError(`Project path is neither a .uproject file nor a directory: ${absolute}`);
    }

    const uprojectFiles = await this.findUProjectFiles(absolute);
    if (uprojectFiles.length === 0) {
      throw new ProjectResolutionError(`No .uproject file found in project directory: ${absolute}`);
    }

    return uprojectFiles[0];
  }

  /**
   * Read name, engine association and plugins from a .uproject file
   */
  static async loadProject(uprojectPath: string): Promise<ProjectInfo> {
    const absolute = path.resolve(uprojectPath);
    const uproject = await this.parseUProject(absolute);

    return {
      name: path.basename(absolute, path.extname(absolute)),
      path: absolute,
      directory: path.dirname(absolute),
      engineVersion: this.engineVersion(uproject),
      plugins: (uproject.Plugins ?? []).map(plugin => plugin.Name)
    };
  }

  /**
   * Launcher installs associate a version ("5.3"); source builds register a {GUID}
   */
  static engineVersion(uproject: UProject): string {
    const association = uproject.EngineAssociation;
    if (typeof association !== 'string' || association.length === 0) {
      return UNKNOWN_ENGINE_VERSION;
    }
    if (association.startsWith('{') && association.endsWith('}')) {
      return SOURCE_ENGINE_VERSION;
    }
    return association;
  }

  static isSourceBuild(project: ProjectInfo): boolean {
    return project.engineVersion === SOURCE_ENGINE_VERSION;
  }

  /**
   * Accept either the engine root or the UE5.sln inside it
   */
  static resolveEngineRoot(enginePath: string): string {
    const absolute = path.resolve(enginePath);
    return absolute.toLowerCase().endsWith('.sln') ? path.dirname(absolute) : absolute;
  }

  private static async findUProjectFiles(cwd: string): Promise<string[]> {
    const files = await glob('*.uproject', { cwd, absolute: true });
    return files.sort();
  }

  private static async parseUProject(uprojectPath: string): Promise<UProject> {
    let content: string;
    try {
      content = await fs.readFile(uprojectPath, 'utf-8');
    } catch (error) {
      throw new ProjectResolutionError(`Failed to read project file ${uprojectPath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ProjectResolutionError(`Failed to parse project file ${uprojectPath}: ${errorMessage(error)}`);
    }

    return this.validateUProject(parsed, uprojectPath);
  }

  private static validateUProject(value: unknown, uprojectPath: string): UProject {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ProjectResolutionError(`Invalid .uproject file: ${uprojectPath} is not a JSON object`);
    }

    const uproject: UProject = {};
    if ('FileVersion' in value && typeof value.FileVersion === 'number') {
      uproject.FileVersion = value.FileVersion;
    }
    if ('EngineAssociation' in value && typeof value.EngineAssociation === 'string') {
      uproject.EngineAssociation = value.EngineAssociation;
    }
    if ('Plugins' in value && Array.isArray(value.Plugins)) {
      uproject.Plugins = value.Plugins.flatMap((plugin: unknown) =>
        typeof plugin === 'object' && plugin !== null && 'Name' in plugin && typeof plugin.Name === 'string'
          ? [{ Name: plugin.Name }]
          : []
      );
    }

    return uproject;
  }
}
