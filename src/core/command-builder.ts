import type { BuildRequest, CommandSpec } from '../types/build';
import { Platform } from '../utils/platform';
import type { HostOS } from '../utils/platform';

export class CommandBuilder {
  /**
   * Resolve the exact invocation for a request. Paths are not checked here;
   * a missing script shows up as a launch failure.
   */
  static build(request: BuildRequest, host: HostOS = Platform.host()): CommandSpec {
    const script = request.operation === 'Package'
      ? this.uatScriptPath(request.engineRoot, host)
      : this.buildScriptPath(request.engineRoot, host);
    const args = request.operation === 'Package'
      ? this.packageArgs(request, host)
      : this.buildArgs(request, host);

    // execa quotes arguments for cmd.exe itself when the script is a .bat
    return {
      file: script,
      args: [...args, ...(request.additionalArgs ?? [])],
      cwd: request.workingDirectory
    };
  }

  /**
   * Build.bat on Windows, the per-OS Build.sh elsewhere
   */
  static buildScriptPath(engineRoot: string, host: HostOS = Platform.host()): string {
    const p = Platform.pathFor(host);
    const batchFiles = p.join(engineRoot, 'Engine', 'Build', 'BatchFiles');

    switch (host) {
      case 'windows':
        return p.join(batchFiles, 'Build.bat');
      case 'mac':
        return p.join(batchFiles, 'Mac', 'Build.sh');
      case 'linux':
        return p.join(batchFiles, 'Linux', 'Build.sh');
    }
  }

  /**
   * Unreal Automation Tool entry point
   */
  static uatScriptPath(engineRoot: string, host: HostOS = Platform.host()): string {
    const p = Platform.pathFor(host);
    return p.join(engineRoot, 'Engine', 'Build', 'BatchFiles', `RunUAT${Platform.batExtension(host)}`);
  }

  static targetName(request: BuildRequest, host: HostOS = Platform.host()): string {
    if (request.target) {
      return request.target;
    }
    const p = Platform.pathFor(host);
    return p.basename(request.projectPath, p.extname(request.projectPath));
  }

  private static buildArgs(request: BuildRequest, host: HostOS): string[] {
    return [
      this.targetName(request, host),
      request.platform,
      request.configuration,
      request.projectPath,
      '-waitmutex'
    ];
  }

  private static packageArgs(request: BuildRequest, host: HostOS): string[] {
    const p = Platform.pathFor(host);
    const stagingDirectory = p.join(p.dirname(request.projectPath), 'Builds');

    return [
      'BuildCookRun',
      `-project=${request.projectPath}`,
      '-noP4',
      `-platform=${request.platform}`,
      `-clientconfig=${request.configuration}`,
      `-serverconfig=${request.configuration}`,
      '-nocompileeditor',
      '-cook',
      '-allmaps',
      '-build',
      '-CookCultures=en',
      '-unversionedcookedcontent',
      '-stage',
      '-package',
      `-stagingdirectory=${stagingDirectory}`
    ];
  }
}
