import type { BuildRequest } from './build';

export type Phase = 'Idle' | 'Running' | 'Succeeded' | 'Failed' | 'Cancelled';
export type TerminalPhase = Exclude<Phase, 'Idle' | 'Running'>;

export type OutputStream = 'stdout' | 'stderr';

export interface LogEntry {
  readonly stream: OutputStream;
  readonly text: string;
}

export interface ProgressMarker {
  readonly current: number;
  readonly total: number;
}

export type LaunchFailureReason = 'CommandNotFound' | 'PermissionDenied' | 'SpawnFailed';

export type FailureInfo =
  | { readonly kind: 'LaunchFailure'; readonly reason: LaunchFailureReason; readonly message: string }
  | { readonly kind: 'RuntimeFailure'; readonly message: string };

export interface ExitInfo {
  /** Exit code, null when the process never started or died from a signal */
  readonly code: number | null;
  readonly signal: string | null;
  readonly durationMs: number;
  readonly failure?: FailureInfo;
}

export interface ExecutionSnapshot {
  readonly phase: Phase;
  /** Fraction in [0, 1] */
  readonly progress: number;
  readonly marker?: ProgressMarker;
  readonly log: readonly LogEntry[];
  readonly exitInfo?: ExitInfo;
  readonly request?: BuildRequest;
  /** Incremented on every write */
  readonly revision: number;
}

export type StateEvent =
  | { readonly type: 'phase'; readonly phase: Phase; readonly exitInfo?: ExitInfo; readonly revision: number }
  | { readonly type: 'line'; readonly entry: LogEntry; readonly index: number; readonly revision: number }
  | {
      readonly type: 'progress';
      readonly progress: number;
      readonly marker: ProgressMarker;
      readonly revision: number;
    };

export type StateListener = (event: StateEvent) => void;

export type StartResult = { started: true } | { started: false; error: 'AlreadyRunning' };
