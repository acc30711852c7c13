import type { BuildRequest, CommandSpec } from '../types/build';
import type {
  ExecutionSnapshot,
  ExitInfo,
  LaunchFailureReason,
  OutputStream,
  StartResult,
  StateListener,
  TerminalPhase
} from '../types/execution';
import { Logger } from '../utils/logger';
import { Validator } from '../utils/validator';
import { CommandBuilder } from './command-builder';
import { ExecutionStateMachine } from './execution-state';
import { LineFramer } from './line-framer';
import { execaLauncher } from './process-launcher';
import type { LaunchedProcess, ProcessCompletion, ProcessLauncher } from './process-launcher';
import { extractProgress } from './progress-extractor';

export interface RunnerOptions {
  /** Also scan stderr lines for progress markers */
  parseStderr?: boolean;
  /** Grace period between SIGTERM and SIGKILL on cancel */
  forceKillAfterMs?: number;
  launcher?: ProcessLauncher;
  resolveCommand?: (request: BuildRequest) => CommandSpec;
}

export const DEFAULT_FORCE_KILL_AFTER_MS = 5000;

/**
 * Map a spawn error to the reason reported in exit info
 */
export function classifyLaunchError(error: unknown): LaunchFailureReason {
  if (error instanceof Error && 'code' in error) {
    switch (error.code) {
      case 'ENOENT':
        return 'CommandNotFound';
      case 'EACCES':
      case 'EPERM':
        return 'PermissionDenied';
    }
  }
  return 'SpawnFailed';
}

/**
 * Runs one build or package operation at a time and tracks it in an
 * {@link ExecutionStateMachine}.
 *
 * `start` returns as soon as the process is launched; output, progress and
 * the final phase are written to the state as they happen. Failures of the
 * run itself are reported through the state, never thrown.
 */
export class ProcessRunner {
  private readonly state = new ExecutionStateMachine();
  private readonly parseStderr: boolean;
  private readonly forceKillAfterMs: number;
  private readonly launcher: ProcessLauncher;
  private readonly resolveCommand: (request: BuildRequest) => CommandSpec;

  private runId = 0;
  private active?: LaunchedProcess;
  private cancelRequested = false;
  private current?: Promise<ExecutionSnapshot>;

  constructor(options: RunnerOptions = {}) {
    this.parseStderr = options.parseStderr ?? false;
    this.forceKillAfterMs = options.forceKillAfterMs ?? DEFAULT_FORCE_KILL_AFTER_MS;
    this.launcher = options.launcher ?? execaLauncher;
    this.resolveCommand = options.resolveCommand ?? (request => CommandBuilder.build(request));
  }

  start(request: BuildRequest): StartResult {
    Validator.assertBuildRequest(request);

    if (this.state.isRunning) {
      Logger.debug('Start rejected: an operation is already running');
      return { started: false, error: 'AlreadyRunning' };
    }

    const command = this.resolveCommand(request);
    const frozen: BuildRequest = Object.freeze({
      ...request,
      additionalArgs: request.additionalArgs ? Object.freeze([...request.additionalArgs]) : undefined
    });

    this.runId++;
    this.cancelRequested = false;
    this.state.begin(frozen);
    this.current = this.execute(this.runId, command);

    return { started: true };
  }

  /**
   * Ask the running process to terminate. The phase stays Running until it
   * actually exits. Returns false when nothing is running.
   */
  cancel(): boolean {
    if (!this.state.isRunning) {
      return false;
    }

    if (!this.cancelRequested) {
      this.cancelRequested = true;
      Logger.debug(`Cancel requested, sending SIGTERM (SIGKILL after ${this.forceKillAfterMs}ms)`);
      this.active?.kill('SIGTERM', this.forceKillAfterMs);
    }
    return true;
  }

  snapshot(): ExecutionSnapshot {
    return this.state.snapshot();
  }

  subscribe(listener: StateListener): () => void {
    return this.state.subscribe(listener);
  }

  /**
   * Resolves with the terminal snapshot of the current run, or right away
   * with the current snapshot when nothing has been started.
   */
  whenSettled(): Promise<ExecutionSnapshot> {
    return this.current ?? Promise.resolve(this.state.snapshot());
  }

  private async execute(runId: number, command: CommandSpec): Promise<ExecutionSnapshot> {
    const startTime = Date.now();
    const framers: Record<OutputStream, LineFramer> = {
      stdout: new LineFramer(),
      stderr: new LineFramer()
    };

    Logger.debug(`Executing: ${command.file} ${command.args.join(' ')} (cwd: ${command.cwd})`);

    let completion: ProcessCompletion;
    try {
      this.active = this.launcher(command, {
        stdout: chunk => this.handleLines(runId, 'stdout', framers.stdout.feed(chunk)),
        stderr: chunk => this.handleLines(runId, 'stderr', framers.stderr.feed(chunk))
      });
      completion = await this.active.completion;
    } catch (error) {
      completion = { kind: 'launch-failed', error: error instanceof Error ? error : new Error(String(error)) };
    } finally {
      this.active = undefined;
    }

    this.handleLines(runId, 'stdout', framers.stdout.flush());
    this.handleLines(runId, 'stderr', framers.stderr.flush());

    const [phase, exitInfo] = this.classify(completion, Date.now() - startTime);
    Logger.debug(`Run finished: ${phase}${exitInfo.failure ? ` (${exitInfo.failure.message})` : ''}`);
    return this.state.finish(phase, exitInfo);
  }

  private handleLines(runId: number, stream: OutputStream, lines: string[]): void {
    if (runId !== this.runId || !this.state.isRunning) {
      return;
    }

    for (const text of lines) {
      this.state.appendLine({ stream, text });

      if (stream === 'stdout' || this.parseStderr) {
        const marker = extractProgress(text);
        if (marker) {
          this.state.updateProgress(marker);
        }
      }
    }
  }

  private classify(completion: ProcessCompletion, durationMs: number): [TerminalPhase, ExitInfo] {
    if (completion.kind === 'launch-failed') {
      return ['Failed', {
        code: null,
        signal: null,
        durationMs,
        failure: {
          kind: 'LaunchFailure',
          reason: classifyLaunchError(completion.error),
          message: completion.error.message
        }
      }];
    }

    const { code, signal } = completion;

    if (this.cancelRequested) {
      return ['Cancelled', { code, signal, durationMs }];
    }

    if (code === 0) {
      return ['Succeeded', { code, signal, durationMs }];
    }

    let message: string;
    if (code !== null) {
      message = `Process exited with code ${code}`;
    } else if (signal !== null) {
      message = `Process terminated by signal ${signal}`;
    } else {
      message = 'Process exited without a status';
    }

    return ['Failed', { code, signal, durationMs, failure: { kind: 'RuntimeFailure', message } }];
  }
}
