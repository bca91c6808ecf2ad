import os from 'os';
import path from 'path';
import fs from 'fs';
import { createLogger, pinoSink } from '../../src/logger.js';

describe('createLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provision-kit-log-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true });
  });

  it('appends JSON lines with an ISO timestamp and upper-case level to the log file', () => {
    const logFile = path.join(dir, 'logs', 'provision.log');
    const sink = pinoSink(createLogger({ logFile, level: 'warn' }));

    sink.record('info', 'filtered out');
    sink.record('warn', 'Candidate a failed via apt (exit 100)', { exitCode: 100 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({
      level: 'WARN',
      name: 'provision-kit',
      msg: 'Candidate a failed via apt (exit 100)',
      exitCode: 100,
    });
    expect(record).toHaveProperty('time', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/));
  });
});
