import { runSequence } from '../../../src/provision/sequencer.js';
import { gitStep } from '../../../src/provision/steps/git.js';
import { createDefaultSteps } from '../../../src/provision/steps/index.js';
import { MAC_APP_BUNDLE, passwordManagerStep } from '../../../src/provision/steps/password-manager.js';
import { verifyInstallation } from '../../../src/provision/post-actions.js';
import type { InstallStep, PostProvisionAction } from '../../../src/provision/types.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { ProvisionError, ProvisionErrorCode } from '../../../src/shared/errors.js';
import type { Result } from '../../../src/shared/result.js';
import { err, ok } from '../../../src/shared/result.js';
import { FakeExecutor, FakeProbe } from '../../helpers/fakes.js';
import { makeEnv } from '../../helpers/env.js';

interface FakeStepOptions {
  required?: boolean;
  exitCode?: number;
  present?: boolean;
  install?: Result<string>;
  /** Whether the install actually makes the step detectable. */
  takesEffect?: boolean;
}

interface FakeStep extends InstallStep {
  readonly installCalls: number;
  readonly checks: number;
}

function fakeStep(name: string, options: FakeStepOptions = {}): FakeStep {
  let present = options.present ?? false;
  let installCalls = 0;
  let checks = 0;
  return {
    name,
    required: options.required ?? true,
    exitCode: options.exitCode ?? 30,
    get installCalls() {
      return installCalls;
    },
    get checks() {
      return checks;
    },
    async isInstalled() {
      checks++;
      return present;
    },
    async install() {
      installCalls++;
      const result = options.install ?? ok(name);
      if (result.ok && (options.takesEffect ?? true)) present = true;
      return result;
    },
  };
}

const failure = (message: string) => err(new ProvisionError(ProvisionErrorCode.NO_CANDIDATE_AVAILABLE, message));
const noRefresh = { refresh: false, upgrade: false, postActions: [] };

describe('runSequence', () => {
  it('aborts with exit 10 before any step when no manager is found', async () => {
    const step = fakeStep('python');
    const { env, executor, sink } = makeEnv({ steps: [step] });

    const report = await runSequence(env, { refresh: true, upgrade: false, postActions: [] });

    expect(report).toEqual({ status: 'aborted', exitCode: 10, results: [], postActionFailures: [] });
    expect(step.checks).toBe(0);
    expect(executor.calls).toHaveLength(0);
    expect(sink.messages('error')).toEqual(['No supported package manager found on linux']);
  });

  it('installs missing steps and leaves present ones alone', async () => {
    const present = fakeStep('python', { present: true });
    const missing = fakeStep('git');
    const { env } = makeEnv({ binaries: ['apt-get'], steps: [present, missing] });

    const report = await runSequence(env, noRefresh);

    expect(report.exitCode).toBe(0);
    expect(report.results).toEqual([
      { step: 'python', outcome: { kind: 'already_present' } },
      { step: 'git', outcome: { kind: 'installed', package: 'git' } },
    ]);
    expect(present.installCalls).toBe(0);
  });

  it('aborts on the first required failure with that step exit code', async () => {
    const first = fakeStep('python', { present: true });
    const failing = fakeStep('git', { exitCode: 30, install: failure('no git') });
    const after = fakeStep('password-manager', { exitCode: 40 });
    const action: PostProvisionAction = { name: 'noop', run: jest.fn(async () => ok(undefined)) };
    const { env, sink } = makeEnv({ binaries: ['apt-get'], steps: [first, failing, after] });

    const report = await runSequence(env, { ...noRefresh, postActions: [action] });

    expect(report.status).toBe('aborted');
    expect(report.exitCode).toBe(30);
    expect(report.results.map((r) => `${r.step}:${r.outcome.kind}`)).toEqual(['python:already_present', 'git:failed']);
    expect(after.checks).toBe(0);
    expect(action.run).not.toHaveBeenCalled();
    expect(sink.messages('error')).toEqual(['git failed: no git']);
  });

  it('records an optional failure as skipped and continues', async () => {
    const optional = fakeStep('git', { required: false, install: failure('no git') });
    const next = fakeStep('password-manager');
    const { env } = makeEnv({ binaries: ['apt-get'], steps: [optional, next] });

    const report = await runSequence(env, noRefresh);

    expect(report.status).toBe('completed');
    expect(report.exitCode).toBe(0);
    expect(report.results).toEqual([
      { step: 'git', outcome: { kind: 'skipped', reason: 'no git' } },
      { step: 'password-manager', outcome: { kind: 'installed', package: 'password-manager' } },
    ]);
  });

  it('skips disabled steps without checking them', async () => {
    const disabled = { ...fakeStep('git'), disabled: true };
    const { env } = makeEnv({ binaries: ['apt-get'], steps: [disabled] });
    const report = await runSequence(env, noRefresh);
    expect(report.results).toEqual([{ step: 'git', outcome: { kind: 'skipped', reason: 'disabled' } }]);
  });

  it('fails a step whose install reports success without effect', async () => {
    const step = fakeStep('git', { install: ok('git-core'), takesEffect: false, exitCode: 30 });
    const { env } = makeEnv({ binaries: ['apt-get'], steps: [step] });

    const report = await runSequence(env, noRefresh);

    expect(report.exitCode).toBe(30);
    const outcome = report.results[0]?.outcome;
    expect(outcome?.kind).toBe('failed');
    if (outcome?.kind !== 'failed') return;
    expect(outcome.error.code).toBe(ProvisionErrorCode.VERIFICATION_MISMATCH);
    expect(outcome.error.message).toBe('git-core reported success but git is still not detected');
  });

  it('is idempotent: a second run installs nothing', async () => {
    const steps = [fakeStep('python'), fakeStep('git')];
    const { env } = makeEnv({ binaries: ['apt-get'], steps });

    await runSequence(env, noRefresh);
    const second = await runSequence(env, noRefresh);

    expect(second.results.map((r) => r.outcome.kind)).toEqual(['already_present', 'already_present']);
    expect(steps.map((s) => s.installCalls)).toEqual([1, 1]);
  });

  it('proceeds with a warning when the index refresh fails', async () => {
    const executor = new FakeExecutor().on('apt-get update', { exitCode: 100, stderr: 'E: Failed to fetch mirror' });
    const { env, sink } = makeEnv({ binaries: ['apt-get'], steps: [fakeStep('git')], executor });

    const report = await runSequence(env, { refresh: true, upgrade: false, postActions: [] });

    expect(report.exitCode).toBe(0);
    expect(sink.messages('warn')).toEqual([
      'Package index refresh failed; proceeding: apt-get update -y exited with 100: E: Failed to fetch mirror',
    ]);
  });

  it('runs post actions after completion and reports their failures with exit 1', async () => {
    const seen: string[][] = [];
    const recording: PostProvisionAction = {
      name: 'recording',
      async run(_env, results) {
        seen.push(results.map((r) => r.step));
        return ok(undefined);
      },
    };
    const failing: PostProvisionAction = {
      name: 'failing',
      async run() {
        return err(new ProvisionError(ProvisionErrorCode.POST_ACTION_FAILED, 'could not write profile'));
      },
    };
    const { env } = makeEnv({ binaries: ['apt-get'], steps: [fakeStep('python'), fakeStep('git')] });

    const report = await runSequence(env, { ...noRefresh, postActions: [recording, failing] });

    expect(seen).toEqual([['python', 'git']]);
    expect(report.status).toBe('completed');
    expect(report.exitCode).toBe(1);
    expect(report.postActionFailures.map((e) => e.message)).toEqual(['could not write profile']);
  });
});

describe('runSequence with the default steps', () => {
  const REPO_MARKER = '/etc/apt/sources.list.d/1password.list';

  function aptHost() {
    const probe = new FakeProbe('linux', { binaries: ['apt-get', 'curl', 'gpg'] });
    let pipReady = false;
    const executor = new FakeExecutor()
      .on('apt-get update -y', { exitCode: 0 })
      .on('apt-get install -y python3.11', { exitCode: 0 }, () => probe.binaries.add('python3.11'))
      .on('-m pip --version', () => ({ exitCode: pipReady ? 0 : 1, stderr: pipReady ? '' : 'No module named pip' }))
      .on('-m ensurepip', { exitCode: 0 }, () => {
        pipReady = true;
      })
      .on('apt-get install -y git', { exitCode: 0 }, () => probe.binaries.add('git'))
      .on('apt-get install -y 1password', { exitCode: 0 }, () => probe.binaries.add('1password'))
      .on('mkdir -p', { exitCode: 0 });
    return { probe, executor };
  }

  it('provisions a bare apt host end to end', async () => {
    const { probe, executor } = aptHost();
    probe.binaries.add('git');
    executor.on('sh -c', { exitCode: 0 });
    const { env } = makeEnv({ probe, executor, steps: createDefaultSteps(DEFAULT_CONFIG) });

    const report = await runSequence(env, { refresh: true, upgrade: false, postActions: [verifyInstallation()] });

    expect(report.exitCode).toBe(0);
    expect(report.results).toEqual([
      { step: 'python', outcome: { kind: 'installed', package: 'python3.11' } },
      { step: 'pip', outcome: { kind: 'installed', package: 'ensurepip' } },
      { step: 'git', outcome: { kind: 'already_present' } },
      { step: 'password-manager', outcome: { kind: 'installed', package: '1password' } },
    ]);
    expect(executor.commandLines.filter((l) => l.startsWith('apt-get install'))).toEqual([
      'apt-get install -y python3.11',
      'apt-get install -y python3.11-venv',
      'apt-get install -y 1password',
    ]);
    expect(executor.commandLines.filter((l) => l === 'apt-get update -y')).toHaveLength(2);
    expect(executor.commandLines.some((l) => l.includes(REPO_MARKER))).toBe(true);
  });

  it('aborts with exit 40 when the 1Password repository cannot be configured', async () => {
    const { probe, executor } = aptHost();
    executor
      .on('--dearmor --output /usr/share/keyrings', { exitCode: 2, stderr: 'curl: (6) Could not resolve host: downloads.1password.com' })
      .on('sh -c', { exitCode: 0 });
    const { env } = makeEnv({ probe, executor, steps: createDefaultSteps(DEFAULT_CONFIG) });

    const report = await runSequence(env, { refresh: true, upgrade: false, postActions: [verifyInstallation()] });

    expect(report.status).toBe('aborted');
    expect(report.exitCode).toBe(40);
    expect(report.results.map((r) => r.outcome.kind)).toEqual(['installed', 'installed', 'installed', 'failed']);
    const outcome = report.results[3]?.outcome;
    if (outcome?.kind !== 'failed') throw new Error('expected a failed password-manager step');
    expect(outcome.error.code).toBe(ProvisionErrorCode.REPOSITORY_SETUP_FAILED);
    expect(outcome.error.message.endsWith('exited with 2: curl: (6) Could not resolve host: downloads.1password.com')).toBe(true);
    expect(executor.commandLines).not.toContain('apt-get install -y 1password');
  });
});

describe('runSequence verification on desktop platforms', () => {
  const toggle = { required: true, disabled: false };

  it('recognises the 1Password cask on the next run instead of reinstalling it', async () => {
    const probe = new FakeProbe('darwin', { binaries: ['brew'] });
    const executor = new FakeExecutor()
      .on('brew list --cask 1password', { exitCode: 1, stderr: "Error: Cask '1password' is not installed." })
      .on('brew install --cask 1password', { exitCode: 0 }, () => probe.files.add(MAC_APP_BUNDLE));
    const steps = [passwordManagerStep(toggle)];

    const first = await runSequence(makeEnv({ probe, executor, steps }).env, noRefresh);
    const second = await runSequence(makeEnv({ probe, executor, steps }).env, noRefresh);

    expect(first.exitCode).toBe(0);
    expect(first.results).toEqual([{ step: 'password-manager', outcome: { kind: 'installed', package: '1password' } }]);
    expect(second.exitCode).toBe(0);
    expect(second.results).toEqual([{ step: 'password-manager', outcome: { kind: 'already_present' } }]);
    expect(executor.commandLines).toEqual(['brew list --cask 1password', 'brew install --cask 1password']);
  });

  it('treats a cask Homebrew lists as present', async () => {
    const executor = new FakeExecutor().on('brew list --cask 1password', { exitCode: 0, stdout: '1Password.app\n' });
    const { env } = makeEnv({ platform: 'darwin', binaries: ['brew'], executor, steps: [passwordManagerStep(toggle)] });

    const report = await runSequence(env, noRefresh);

    expect(report.results).toEqual([{ step: 'password-manager', outcome: { kind: 'already_present' } }]);
    expect(executor.commandLines).toEqual(['brew list --cask 1password']);
  });

  it('re-reads PATH after a Windows install before verifying it', async () => {
    const probe = new FakeProbe('win32', { binaries: ['winget'] });
    const executor = new FakeExecutor().on('winget install --exact --id Git.Git', { exitCode: 0 }, () => probe.staged.add('git'));
    const { env } = makeEnv({ probe, executor, steps: [gitStep(toggle)] });

    const report = await runSequence(env, noRefresh);

    expect(report.exitCode).toBe(0);
    expect(report.results).toEqual([{ step: 'git', outcome: { kind: 'installed', package: 'Git.Git' } }]);
    expect(probe.pathRefreshes).toBe(1);
  });
});
