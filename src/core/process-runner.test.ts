import { describe, it, expect } from 'vitest';
import { ProcessRunner, classifyLaunchError } from './process-runner';
import { CommandBuilder } from './command-builder';
import { createBuildRequest } from './build-request';
import { FakeLauncher } from '../testing/fake-launcher';
import { InvalidRequestError } from '../utils/errors';
import type { BuildRequest } from '../types/build';

function buildRequest(overrides: Partial<BuildRequest> = {}): BuildRequest {
  return {
    ...createBuildRequest({
      operation: 'Build',
      configuration: 'Development',
      platform: 'Win64',
      projectPath: '/projects/Shooter/Shooter.uproject',
      engineRoot: '/engines/UE5'
    }),
    ...overrides
  };
}

function setup(options: { parseStderr?: boolean } = {}) {
  const launcher = new FakeLauncher();
  const runner = new ProcessRunner({ ...options, launcher: launcher.launch });
  return { launcher, runner };
}

describe('ProcessRunner', () => {
  describe('successful runs', () => {
    it('should track progress and log lines through to Succeeded', async () => {
      const { launcher, runner } = setup();

      expect(runner.start(buildRequest())).toEqual({ started: true });
      expect(runner.snapshot().phase).toBe('Running');

      const fake = launcher.last;
      fake.stdout('[1/10]\n');
      fake.stdout('[5/10]\n');
      fake.stdout('[10/10]\n');
      fake.exit(0);

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Succeeded');
      expect(snapshot.progress).toBe(1);
      expect(snapshot.log).toHaveLength(3);
      expect(snapshot.exitInfo?.code).toBe(0);
      expect(snapshot.exitInfo?.failure).toBeUndefined();
    });

    it('should launch the command built for the request', () => {
      const { launcher, runner } = setup();
      const request = buildRequest();

      runner.start(request);

      expect(launcher.last.command).toEqual(CommandBuilder.build(request));
    });

    it('should update progress as each chunk arrives', () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.stdout('[2/8] Compile A.cpp\n[4/');
      expect(runner.snapshot().progress).toBe(0.25);
      expect(runner.snapshot().log).toHaveLength(1);

      launcher.last.stdout('8] Compile B.cpp\n');
      expect(runner.snapshot().progress).toBe(0.5);
      expect(runner.snapshot().marker).toEqual({ current: 4, total: 8 });
    });

    it('should let a later, smaller marker win', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.stdout('[9/10] A\n[2/10] B\n');
      launcher.last.exit(0);

      expect((await runner.whenSettled()).progress).toBe(0.2);
    });

    it('should flush an unterminated final line before finishing', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.stdout('[3/4] Linking Shooter');
      launcher.last.exit(0);

      const snapshot = await runner.whenSettled();
      expect(snapshot.log).toEqual([{ stream: 'stdout', text: '[3/4] Linking Shooter' }]);
      expect(snapshot.progress).toBe(0.75);
    });

    it('should keep stdout and stderr lines in arrival order', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.stdout('one\n');
      launcher.last.stderr('two\n');
      launcher.last.stdout('three\n');
      launcher.last.exit(0);

      expect((await runner.whenSettled()).log).toEqual([
        { stream: 'stdout', text: 'one' },
        { stream: 'stderr', text: 'two' },
        { stream: 'stdout', text: 'three' }
      ]);
    });
  });

  describe('stderr progress', () => {
    it('should log but not parse stderr by default', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.stderr('[5/10] warning\n');
      launcher.last.exit(0);

      const snapshot = await runner.whenSettled();
      expect(snapshot.progress).toBe(0);
      expect(snapshot.log).toEqual([{ stream: 'stderr', text: '[5/10] warning' }]);
    });

    it('should parse stderr when configured to', async () => {
      const { launcher, runner } = setup({ parseStderr: true });
      runner.start(buildRequest());

      launcher.last.stderr('[5/10] warning\n');
      launcher.last.exit(0);

      expect((await runner.whenSettled()).progress).toBe(0.5);
    });
  });

  describe('failures', () => {
    it('should report a nonzero exit as Failed with the code', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest({ operation: 'Package' }));

      launcher.last.exit(1);

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Failed');
      expect(snapshot.progress).toBe(0);
      expect(snapshot.exitInfo?.code).toBe(1);
      expect(snapshot.exitInfo?.failure).toEqual({ kind: 'RuntimeFailure', message: 'Process exited with code 1' });
    });

    it('should report an unrequested signal as a runtime failure', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.exit(null, 'SIGKILL');

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Failed');
      expect(snapshot.exitInfo?.signal).toBe('SIGKILL');
      expect(snapshot.exitInfo?.failure).toEqual({
        kind: 'RuntimeFailure',
        message: 'Process terminated by signal SIGKILL'
      });
    });

    it('should classify a missing executable as a launch failure', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      launcher.last.failLaunch('ENOENT', 'spawn Build.sh ENOENT');

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Failed');
      expect(snapshot.exitInfo?.code).toBeNull();
      expect(snapshot.exitInfo?.failure).toEqual({
        kind: 'LaunchFailure',
        reason: 'CommandNotFound',
        message: 'spawn Build.sh ENOENT'
      });
    });

    it('should report a launcher that throws as a launch failure', async () => {
      const runner = new ProcessRunner({
        launcher: () => {
          throw new Error('spawn failed');
        }
      });

      expect(runner.start(buildRequest())).toEqual({ started: true });

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Failed');
      expect(snapshot.exitInfo?.failure).toEqual({ kind: 'LaunchFailure', reason: 'SpawnFailed', message: 'spawn failed' });
    });

    it('should throw for a malformed request and leave the state alone', () => {
      const { launcher, runner } = setup();

      expect(() => runner.start(buildRequest({ projectPath: '' }))).toThrow(InvalidRequestError);
      expect(runner.snapshot().phase).toBe('Idle');
      expect(launcher.processes).toHaveLength(0);
    });
  });

  describe('AlreadyRunning', () => {
    it('should reject a second start without touching the state', () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());
      launcher.last.stdout('[1/4] A\n');

      const before = runner.snapshot();
      const result = runner.start(buildRequest({ operation: 'Package' }));

      expect(result).toEqual({ started: false, error: 'AlreadyRunning' });
      expect(runner.snapshot()).toBe(before);
      expect(launcher.processes).toHaveLength(1);
    });

    it('should accept a new start once the previous run ended and reset the state', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());
      launcher.last.stdout('[4/4] Done\n');
      launcher.last.exit(0);
      await runner.whenSettled();

      expect(runner.start(buildRequest())).toEqual({ started: true });
      const snapshot = runner.snapshot();
      expect(snapshot.phase).toBe('Running');
      expect(snapshot.progress).toBe(0);
      expect(snapshot.log).toEqual([]);
      expect(snapshot.exitInfo).toBeUndefined();
    });

    it('should settle with the finished run when a listener starts the next one', async () => {
      const { launcher, runner } = setup();
      const restarted: boolean[] = [];
      runner.subscribe(event => {
        if (event.type === 'phase' && event.phase === 'Failed') {
          restarted.push(runner.start(buildRequest()).started);
        }
      });

      runner.start(buildRequest());
      const settled = runner.whenSettled();
      launcher.last.exit(4);

      const snapshot = await settled;
      expect(restarted).toEqual([true]);
      expect(snapshot.phase).toBe('Failed');
      expect(snapshot.exitInfo?.code).toBe(4);
      expect(runner.snapshot().phase).toBe('Running');
    });

    it('should ignore output arriving late from a previous run', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());
      const first = launcher.last;
      first.exit(0);
      await runner.whenSettled();

      runner.start(buildRequest());
      first.stdout('[9/10] stale\n');

      expect(runner.snapshot().log).toEqual([]);
      expect(runner.snapshot().progress).toBe(0);
    });
  });

  describe('cancel', () => {
    it('should end as Cancelled when the process dies from the signal', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());
      launcher.last.exitOnKill = 'SIGTERM';

      expect(runner.cancel()).toBe(true);

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Cancelled');
      expect(snapshot.exitInfo).toMatchObject({ code: null, signal: 'SIGTERM' });
      expect(snapshot.exitInfo?.failure).toBeUndefined();
      expect(launcher.last.kills).toEqual([{ signal: 'SIGTERM', forceKillAfterMs: 5000 }]);
    });

    it('should stay Running until the process actually exits', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      runner.cancel();
      expect(runner.snapshot().phase).toBe('Running');

      launcher.last.exit(1);
      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Cancelled');
      expect(snapshot.exitInfo?.code).toBe(1);
    });

    it('should send the signal only once for repeated cancels', () => {
      const runnerLauncher = new FakeLauncher();
      const runner = new ProcessRunner({ launcher: runnerLauncher.launch, forceKillAfterMs: 250 });
      runner.start(buildRequest());

      runner.cancel();
      runner.cancel();

      expect(runnerLauncher.last.kills).toEqual([{ signal: 'SIGTERM', forceKillAfterMs: 250 }]);
    });

    it('should be a no-op when nothing is running', async () => {
      const { launcher, runner } = setup();
      expect(runner.cancel()).toBe(false);

      runner.start(buildRequest());
      launcher.last.exit(0);
      await runner.whenSettled();

      expect(runner.cancel()).toBe(false);
      expect(runner.snapshot().phase).toBe('Succeeded');
      expect(launcher.last.kills).toEqual([]);
    });

    it('should report a launch failure even after a cancel request', async () => {
      const { launcher, runner } = setup();
      runner.start(buildRequest());

      runner.cancel();
      launcher.last.failLaunch('EACCES');

      const snapshot = await runner.whenSettled();
      expect(snapshot.phase).toBe('Failed');
      expect(snapshot.exitInfo?.failure).toMatchObject({ kind: 'LaunchFailure', reason: 'PermissionDenied' });
    });
  });

  describe('observers', () => {
    it('should never see the log shrink during a run', async () => {
      const { launcher, runner } = setup();
      const lengths: number[] = [];
      runner.subscribe(() => lengths.push(runner.snapshot().log.length));

      runner.start(buildRequest());
      launcher.last.stdout('a\nb\n[1/2] c\n');
      launcher.last.stderr('d');
      launcher.last.exit(0);
      await runner.whenSettled();

      expect(lengths).toEqual([...lengths].sort((a, b) => a - b));
      expect(lengths[lengths.length - 1]).toBe(4);
    });

    it('should resolve whenSettled right away when nothing was started', async () => {
      const { runner } = setup();

      expect((await runner.whenSettled()).phase).toBe('Idle');
    });
  });
});

describe('classifyLaunchError', () => {
  it('should map spawn error codes to reasons', () => {
    expect(classifyLaunchError(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('CommandNotFound');
    expect(classifyLaunchError(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe('PermissionDenied');
    expect(classifyLaunchError(Object.assign(new Error('x'), { code: 'EPERM' }))).toBe('PermissionDenied');
    expect(classifyLaunchError(Object.assign(new Error('x'), { code: 'EMFILE' }))).toBe('SpawnFailed');
    expect(classifyLaunchError('not an error')).toBe('SpawnFailed');
  });
});
