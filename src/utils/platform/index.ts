import path from 'path';

export type HostOS = 'windows' | 'mac' | 'linux';

export class Platform {
  /**
   * Host OS the build tooling runs on
   */
  static host(): HostOS {
    if (process.platform === 'win32') {
      return 'windows';
    }
    return process.platform === 'darwin' ? 'mac' : 'linux';
  }

  static isWindows(host: HostOS = Platform.host()): boolean {
    return host === 'windows';
  }

  /**
   * Path helpers matching the host's separator style
   */
  static pathFor(host: HostOS = Platform.host()): path.PlatformPath {
    return host === 'windows' ? path.win32 : path.posix;
  }

  /**
   * Platform-specific batch file extension
   */
  static batExtension(host: HostOS = Platform.host()): string {
    return Platform.isWindows(host) ? '.bat' : '.sh';
  }
}
