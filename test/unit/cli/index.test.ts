import os from 'os';
import path from 'path';
import fs from 'fs';
import { USAGE } from '../../../src/cli/args.js';
import type { CliDependencies } from '../../../src/cli/index.js';
import { applyOverrides, runCli } from '../../../src/cli/index.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { createLogger, pinoSink } from '../../../src/logger.js';
import type { LogLevel } from '../../../src/types/log.js';
import { FakeExecutor, FakeProbe, MemorySink } from '../../helpers/fakes.js';

interface Harness {
  deps: CliDependencies;
  executor: FakeExecutor;
  sink: MemorySink;
  stdout: string[];
  stderr: string[];
  sinkOptions: { logFile: string; level: LogLevel }[];
}

function harness(probe: FakeProbe, executor = new FakeExecutor(), home?: string): Harness {
  const sink = new MemorySink();
  const stdout: string[] = [];
  const stderr: string[] = [];
  const sinkOptions: { logFile: string; level: LogLevel }[] = [];
  const deps: CliDependencies = {
    probe,
    executor,
    createSink: (options) => {
      sinkOptions.push(options);
      return sink;
    },
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    home,
  };
  return { deps, executor, sink, stdout, stderr, sinkOptions };
}

describe('runCli', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provision-kit-cli-'));
    configPath = path.join(dir, 'config.yaml');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true });
  });

  it('prints usage and exits 0 for --help', async () => {
    const h = harness(new FakeProbe('linux'));
    expect(await runCli(['--help', '--config', configPath], h.deps)).toBe(0);
    expect(h.stdout).toEqual([USAGE]);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('exits 1 with a single line when the log file cannot be opened', async () => {
    fs.writeFileSync(path.join(dir, 'blocker'), 'not a directory');
    const logFile = path.join(dir, 'blocker', 'provision.log');
    const h = harness(new FakeProbe('linux', { binaries: ['apt-get'] }));
    h.deps.createSink = (options) => pinoSink(createLogger(options));

    expect(await runCli(['--config', configPath, '--log-file', logFile], h.deps)).toBe(1);
    expect(h.stderr).toHaveLength(1);
    expect(h.stderr[0]?.startsWith(`Cannot open log file ${logFile}: `)).toBe(true);
    expect(h.stderr[0]?.endsWith('\n')).toBe(true);
    expect(h.executor.calls).toHaveLength(0);
  });

  it('exits 2 on an unknown flag', async () => {
    const h = harness(new FakeProbe('linux'));
    expect(await runCli(['--frobnicate'], h.deps)).toBe(2);
    expect(h.stderr).toEqual([`Unknown option: --frobnicate\n\n${USAGE}`]);
  });

  it('exits 2 on an invalid config file', async () => {
    fs.writeFileSync(configPath, 'log:\n  level: loud\n');
    const h = harness(new FakeProbe('linux', { binaries: ['apt-get'] }));
    expect(await runCli(['--config', configPath], h.deps)).toBe(2);
    expect(h.stderr[0]?.startsWith(`Invalid configuration in ${configPath}: log.level:`)).toBe(true);
    expect(h.sinkOptions).toHaveLength(0);
  });

  it('exits 10 with no package manager and writes the default config', async () => {
    const h = harness(new FakeProbe('linux'));
    expect(await runCli(['--config', configPath, '-y'], h.deps)).toBe(10);
    expect(fs.existsSync(configPath)).toBe(true);
    expect(h.sink.messages('error')).toContain('No supported package manager found on linux');
    expect(h.executor.calls).toHaveLength(0);
  });

  it('exits 0 without installing anything on a provisioned host', async () => {
    const probe = new FakeProbe('linux', { binaries: ['apt-get', 'python3.11', 'git', 'op'] });
    const executor = new FakeExecutor().on('-m pip --version', { stdout: 'pip 24.0' });
    const h = harness(probe, executor);

    expect(await runCli(['--config', configPath, '--no-refresh', '--log-file', path.join(dir, 'run.log')], h.deps)).toBe(0);
    expect(executor.commandLines).toEqual(['python3.11 -m pip --version', 'python3.11 -m pip --version']);
    expect(h.sinkOptions).toEqual([{ logFile: path.join(dir, 'run.log'), level: 'info' }]);
  });

  it('honours skip flags', async () => {
    const h = harness(new FakeProbe('linux', { binaries: ['apt-get'] }));
    const argv = ['--config', configPath, '--no-refresh', '--skip-python', '--skip-git', '--skip-password-manager'];

    expect(await runCli(argv, h.deps)).toBe(0);
    expect(h.executor.calls).toHaveLength(0);
    const start = h.sink.entries.find((e) => e.message === 'Starting provisioning');
    expect(start?.context?.skipped).toEqual(['python', 'pip', 'git', 'password_manager']);
  });

  it('returns the failing step exit code', async () => {
    const probe = new FakeProbe('linux', { binaries: ['apt-get', 'python3.11', 'op'] });
    const executor = new FakeExecutor()
      .on('-m pip --version', { stdout: 'pip 24.0' })
      .on('apt-get install -y git', { exitCode: 100, stderr: 'E: Unable to locate package git' });
    const h = harness(probe, executor);

    expect(await runCli(['--config', configPath, '--no-refresh'], h.deps)).toBe(30);
    expect(h.sink.messages('error')).toContain('Provisioning aborted with exit code 30');
  });

  it('appends configured profile lines after a successful run', async () => {
    fs.writeFileSync(configPath, 'post:\n  profile_lines:\n    - file: ~/.profile\n      line: export EDITOR=vim\n');
    const probe = new FakeProbe('linux', { binaries: ['apt-get', 'python3.11', 'git', '1password'] });
    const executor = new FakeExecutor().on('-m pip --version', { stdout: 'pip 24.0' });
    const h = harness(probe, executor, dir);

    expect(await runCli(['--config', configPath, '--no-refresh'], h.deps)).toBe(0);
    expect(fs.readFileSync(path.join(dir, '.profile'), 'utf-8')).toBe('export EDITOR=vim\n');
  });
});

describe('applyOverrides', () => {
  it('lets flags win over config values', () => {
    const config = applyOverrides(DEFAULT_CONFIG, {
      help: false,
      nonInteractive: true,
      refresh: false,
      logFile: '/var/log/provision.log',
      skip: ['git'],
    });
    expect(config.non_interactive).toBe(true);
    expect(config.refresh).toBe(false);
    expect(config.upgrade).toBe(false);
    expect(config.log).toEqual({ file: '/var/log/provision.log', level: 'info' });
    expect(config.steps.git).toEqual({ enabled: false, required: true });
    expect(DEFAULT_CONFIG.steps.git.enabled).toBe(true);
  });
});
