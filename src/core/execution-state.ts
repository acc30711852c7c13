import type { BuildRequest } from '../types/build';
import type {
  ExecutionSnapshot,
  ExitInfo,
  LogEntry,
  Phase,
  ProgressMarker,
  StateEvent,
  StateListener,
  TerminalPhase
} from '../types/execution';
import { IllegalTransitionError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { progressFraction } from './progress-extractor';

/**
 * Holds the state of the current (or last) run and applies every write to it.
 *
 * Writes are synchronous, so a snapshot always shows phase, progress and log
 * from the same moment. Snapshots are frozen and cached until the next write.
 */
export class ExecutionStateMachine {
  private phase: Phase = 'Idle';
  private progress = 0;
  private marker?: ProgressMarker;
  private log: LogEntry[] = [];
  private exitInfo?: ExitInfo;
  private request?: BuildRequest;
  private revision = 0;
  private cached?: ExecutionSnapshot;
  private readonly listeners = new Set<StateListener>();

  get isRunning(): boolean {
    return this.phase === 'Running';
  }

  snapshot(): ExecutionSnapshot {
    if (!this.cached || this.cached.revision !== this.revision) {
      const snapshot: ExecutionSnapshot = {
        phase: this.phase,
        progress: this.progress,
        marker: this.marker,
        log: Object.freeze(this.log.slice()),
        exitInfo: this.exitInfo,
        request: this.request,
        revision: this.revision
      };
      this.cached = Object.freeze(snapshot);
    }
    return this.cached;
  }

  /**
   * Listen for writes in the order they are applied. Returns the unsubscribe function.
   * A listener that throws is reported and does not affect the state.
   */
  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Start a new run: clears log, progress and exit info
   */
  begin(request: BuildRequest): void {
    if (this.phase === 'Running') {
      throw new IllegalTransitionError(this.phase, 'Running');
    }

    this.phase = 'Running';
    this.progress = 0;
    this.marker = undefined;
    this.log = [];
    this.exitInfo = undefined;
    this.request = request;
    this.revision++;
    this.emit({ type: 'phase', phase: this.phase, revision: this.revision });
  }

  appendLine(entry: LogEntry): void {
    this.assertRunning('appendLine');

    const frozen = Object.freeze({ stream: entry.stream, text: entry.text });
    this.log.push(frozen);
    this.revision++;
    this.emit({ type: 'line', entry: frozen, index: this.log.length - 1, revision: this.revision });
  }

  /**
   * Record a progress marker. The latest marker wins, even if it reports less than before.
   */
  updateProgress(marker: ProgressMarker): void {
    this.assertRunning('updateProgress');

    this.marker = Object.freeze({ current: marker.current, total: marker.total });
    this.progress = progressFraction(marker);
    this.revision++;
    this.emit({ type: 'progress', progress: this.progress, marker: this.marker, revision: this.revision });
  }

  /**
   * End the run. Returns the terminal snapshot, taken before listeners run,
   * since a listener may already begin the next run.
   */
  finish(phase: TerminalPhase, exitInfo: ExitInfo): ExecutionSnapshot {
    this.assertRunning(phase);

    this.phase = phase;
    this.exitInfo = Object.freeze({
      ...exitInfo,
      ...(exitInfo.failure ? { failure: Object.freeze({ ...exitInfo.failure }) } : {})
    });
    this.revision++;
    const terminal = this.snapshot();
    this.emit({ type: 'phase', phase, exitInfo: this.exitInfo, revision: this.revision });
    return terminal;
  }

  private assertRunning(to: string): void {
    if (this.phase !== 'Running') {
      throw new IllegalTransitionError(this.phase, to);
    }
  }

  private emit(event: StateEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        Logger.warning(`State listener failed on ${event.type} event: ${errorMessage(error)}`);
      }
    }
  }
}
