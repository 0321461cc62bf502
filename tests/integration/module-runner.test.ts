import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ModuleRunner } from '../../src/runner/module-runner.js';
import { LocalExecutor } from '../../src/runner/local-executor.js';
import { ArtifactError } from '../../src/errors.js';
import type { StreamChunk } from '../../src/types.js';

const STUB = fileURLToPath(
  new URL('../fixtures/stub-collaborator.mjs', import.meta.url),
);

describe('ModuleRunner', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'modular-runner-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function stubRunner(failing: string[] = []): ModuleRunner {
    return new ModuleRunner({
      executor: new LocalExecutor(),
      command: process.execPath,
      args: [STUB, '{module}', '{threads}'],
      threads: 2,
      cwd: tempDir,
      env: { STUB_FAIL_MODULES: failing.join(',') },
      logDir: tempDir,
    });
  }

  it('classifies exit status 0 as passed and captures both streams', async () => {
    const outcome = await stubRunner().run('io::dma_file');

    expect(outcome.status).toBe('passed');
    expect(outcome.exitCode).toBe(0);
    expect(outcome.signal).toBeNull();
    expect(outcome.logPath).toBe(path.join(tempDir, 'test-io-dma_file.log'));

    const log = fs.readFileSync(outcome.logPath, 'utf-8');
    expect(log).toContain('running io::dma_file\n');
    expect(log).toContain('threads=2\n');
    expect(log).toContain('test result: ok io::dma_file\n');
  });

  it('classifies a non-zero exit status as failed', async () => {
    const outcome = await stubRunner(['timer']).run('timer');

    expect(outcome.status).toBe('failed');
    expect(outcome.exitCode).toBe(1);
    expect(outcome.error).toBeUndefined();
    expect(fs.readFileSync(outcome.logPath, 'utf-8')).toContain(
      'test result: FAILED timer\n',
    );
  });

  it('classifies termination by signal as failed', async () => {
    const runner = new ModuleRunner({
      executor: new LocalExecutor(),
      command: process.execPath,
      args: ['-e', "process.kill(process.pid, 'SIGTERM')"],
      threads: 1,
      cwd: tempDir,
      logDir: tempDir,
    });

    const outcome = await runner.run('timer');

    expect(outcome.status).toBe('failed');
    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe('SIGTERM');
  });

  it('records a launch failure as a failed outcome with a log', async () => {
    const command = path.join(tempDir, 'no-such-collaborator');
    const runner = new ModuleRunner({
      executor: new LocalExecutor(),
      command,
      args: ['{module}'],
      threads: 1,
      cwd: tempDir,
      logDir: tempDir,
    });

    const outcome = await runner.run('timer');

    expect(outcome.status).toBe('failed');
    expect(outcome.exitCode).toBeNull();
    expect(outcome.error).toMatch(/^Failed to launch .*no-such-collaborator: /);
    expect(outcome.error).toContain('ENOENT');
    expect(fs.readFileSync(outcome.logPath, 'utf-8')).toBe(
      `${outcome.error}\n`,
    );
  });

  it('overwrites the log of a previous run', async () => {
    const logPath = path.join(tempDir, 'test-timer.log');
    fs.writeFileSync(logPath, 'stale output from an earlier run\n');

    await stubRunner().run('timer');

    const log = fs.readFileSync(logPath, 'utf-8');
    expect(log).not.toContain('stale output');
    expect(log).toContain('running timer\n');
  });

  it('forwards output chunks to the output callback', async () => {
    const chunks: StreamChunk[] = [];
    const runner = new ModuleRunner({
      executor: new LocalExecutor(),
      command: process.execPath,
      args: [STUB, '{module}', '{threads}'],
      threads: 3,
      cwd: tempDir,
      logDir: tempDir,
      onOutput: (_moduleId, chunk) => chunks.push(chunk),
    });

    await runner.run('timer');

    const stderr = Buffer.concat(
      chunks.filter((c) => c.type === 'stderr').map((c) => c.data),
    ).toString('utf-8');
    expect(stderr).toBe('threads=3\n');
  });

  it('writes multi-byte output to the log without splitting characters', async () => {
    const runner = new ModuleRunner({
      executor: new LocalExecutor(),
      command: process.execPath,
      args: ['-e', "process.stdout.write('€'.repeat(200000))"],
      threads: 1,
      cwd: tempDir,
      logDir: tempDir,
    });

    const outcome = await runner.run('timer');

    expect(outcome.status).toBe('passed');
    expect(fs.statSync(outcome.logPath).size).toBe(600000);
    expect(fs.readFileSync(outcome.logPath, 'utf-8')).toBe('€'.repeat(200000));
  });

  it('captures output larger than the log buffer in full', async () => {
    const runner = new ModuleRunner({
      executor: new LocalExecutor(),
      command: process.execPath,
      args: [
        '-e',
        "for (let i = 0; i < 20000; i++) console.log('line ' + i + ' ' + 'x'.repeat(200))",
      ],
      threads: 1,
      cwd: tempDir,
      logDir: tempDir,
    });

    const outcome = await runner.run('timer');

    const lines = fs.readFileSync(outcome.logPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(20001);
    expect(lines[19999]).toBe(`line 19999 ${'x'.repeat(200)}`);
  });

  it('throws an ArtifactError when the log cannot be created', async () => {
    const runner = new ModuleRunner({
      executor: new LocalExecutor(),
      command: process.execPath,
      args: [STUB, '{module}'],
      threads: 1,
      cwd: tempDir,
      logDir: path.join(tempDir, 'missing', 'dir'),
    });

    await expect(runner.run('timer')).rejects.toThrow(ArtifactError);
  });
});
