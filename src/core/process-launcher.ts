import execa from 'execa';
import { finished } from 'stream';
import type { Readable } from 'stream';
import type { CommandSpec } from '../types/build';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';

export interface OutputSink {
  stdout(chunk: Buffer | string): void;
  stderr(chunk: Buffer | string): void;
}

export type ProcessCompletion =
  | { kind: 'exited'; code: number | null; signal: string | null }
  | { kind: 'launch-failed'; error: Error };

export interface LaunchedProcess {
  /**
   * Settles once the process has ended and both output streams are drained.
   * Never rejects.
   */
  readonly completion: Promise<ProcessCompletion>;
  kill(signal: NodeJS.Signals, forceKillAfterMs: number): void;
}

/**
 * Starts a command and delivers its output to the sink as it arrives
 */
export type ProcessLauncher = (command: CommandSpec, sink: OutputSink) => LaunchedProcess;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function streamSettled(stream: Readable | null, name: string): Promise<void> {
  return new Promise(resolve => {
    if (!stream) {
      resolve();
      return;
    }
    finished(stream, error => {
      if (error) {
        Logger.debug(`${name} closed early: ${error.message}`);
      }
      resolve();
    });
  });
}

/**
 * Signal the process and everything it started. Build scripts hand the real
 * work to a grandchild (dotnet UnrealBuildTool, AutomationTool) that holds
 * the output pipes open, so signalling the direct child is not enough.
 */
export function killProcessTree(pid: number | undefined, signal: NodeJS.Signals): void {
  if (pid === undefined) {
    return;
  }

  if (Platform.isWindows()) {
    // /T takes the children cmd.exe started along
    void execa('taskkill', ['/T', '/F', '/PID', String(pid)], { reject: false, windowsHide: true }).then(
      result => {
        if (result.exitCode !== 0) {
          Logger.debug(`taskkill exited with ${result.exitCode}: ${result.stderr}`);
        }
      },
      (error: unknown) => Logger.debug(`taskkill failed: ${errorMessage(error)}`)
    );
    return;
  }

  try {
    // The child leads its own process group, see `detached` below
    process.kill(-pid, signal);
  } catch (error) {
    Logger.debug(`Could not send ${signal} to process group ${pid}: ${errorMessage(error)}`);
  }
}

export const execaLauncher: ProcessLauncher = (command, sink) => {
  const childProcess = execa(command.file, command.args, {
    cwd: command.cwd,
    stdin: 'ignore',
    buffer: false,
    reject: false,
    windowsHide: true,
    detached: !Platform.isWindows()
  });

  let spawned = false;
  let spawnError: Error | undefined;

  childProcess.once('spawn', () => {
    spawned = true;
  });
  childProcess.once('error', (error: Error) => {
    if (!spawned) {
      spawnError = error;
    }
  });

  // Stream output
  if (childProcess.stdout) {
    childProcess.stdout.on('data', (data: Buffer) => sink.stdout(data));
  }

  if (childProcess.stderr) {
    childProcess.stderr.on('data', (data: Buffer) => sink.stderr(data));
  }

  const completion = Promise.all([
    childProcess,
    streamSettled(childProcess.stdout, 'stdout'),
    streamSettled(childProcess.stderr, 'stderr')
  ]).then(
    ([result]): ProcessCompletion => {
      if (spawnError) {
        return { kind: 'launch-failed', error: spawnError };
      }
      return {
        kind: 'exited',
        code: typeof result.exitCode === 'number' ? result.exitCode : null,
        signal: result.signal ?? null
      };
    },
    (error: unknown): ProcessCompletion => ({ kind: 'launch-failed', error: toError(error) })
  );

  let escalation: NodeJS.Timeout | undefined;
  const settled = completion.then(result => {
    clearTimeout(escalation);
    return result;
  });

  return {
    completion: settled,
    kill(signal, forceKillAfterMs) {
      killProcessTree(childProcess.pid, signal);
      if (signal !== 'SIGKILL' && !Platform.isWindows() && escalation === undefined) {
        escalation = setTimeout(() => {
          Logger.debug(`Process group ${String(childProcess.pid)} still alive, sending SIGKILL`);
          killProcessTree(childProcess.pid, 'SIGKILL');
        }, forceKillAfterMs);
      }
    }
  };
};
