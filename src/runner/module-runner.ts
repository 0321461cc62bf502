import * as fs from 'fs';
import { once } from 'events';
import { finished } from 'stream/promises';
import type { ModuleOutcome, StreamChunk } from '../types.js';
import { ArtifactError, errorMessage } from '../errors.js';
import { artifactPath, DEFAULT_LOG_PREFIX } from '../utils/artifact-name.js';
import { buildCollaboratorArgs, type CommandExecutor } from './executor.js';

export interface ModuleRunnerOptions {
  executor: CommandExecutor;
  command: string;
  args: string[];
  threads: number;
  cwd: string;
  env?: Record<string, string>;
  logDir: string;
  logPrefix?: string;
  onOutput?: (moduleId: string, chunk: StreamChunk) => void;
}

/**
 * Runs a single module through the collaborator and captures its combined
 * output to the module's log artifact. Only the termination status decides
 * the outcome.
 */
export class ModuleRunner {
  constructor(private readonly options: ModuleRunnerOptions) {}

  logPathFor(moduleId: string): string {
    return artifactPath(
      this.options.logDir,
      moduleId,
      this.options.logPrefix ?? DEFAULT_LOG_PREFIX,
    );
  }

  async run(moduleId: string): Promise<ModuleOutcome> {
    const startTime = Date.now();
    const logPath = this.logPathFor(moduleId);
    const log = await openArtifact(logPath);

    let writeError: Error | null = null;
    log.on('error', (error) => {
      writeError = error;
    });

    const { executor, command, threads, cwd, env, onOutput } = this.options;
    const args = buildCollaboratorArgs(this.options.args, moduleId, threads);

    let outcome: ModuleOutcome;
    try {
      const result = await executor.execute(
        { command, args, cwd, env: env ?? {} },
        (chunk) => {
          onOutput?.(moduleId, chunk);
          if (log.destroyed || log.write(chunk.data)) return;
          return drained(log);
        },
      );

      outcome = {
        moduleId,
        status: result.exitCode === 0 ? 'passed' : 'failed',
        logPath,
        exitCode: result.exitCode,
        signal: result.signal,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const message = `Failed to launch ${command}: ${errorMessage(error)}`;
      if (!log.destroyed) log.write(`${message}\n`);

      outcome = {
        moduleId,
        status: 'failed',
        logPath,
        exitCode: null,
        signal: null,
        error: message,
        durationMs: Date.now() - startTime,
      };
    }

    log.end();
    try {
      await finished(log);
    } catch (error) {
      writeError = writeError ?? toError(error);
    }

    if (writeError) {
      throw new ArtifactError(
        `Cannot write log ${logPath}: ${errorMessage(writeError)}`,
        { cause: writeError },
      );
    }

    return outcome;
  }
}

async function openArtifact(logPath: string): Promise<fs.WriteStream> {
  const log = fs.createWriteStream(logPath, { flags: 'w' });
  try {
    await once(log, 'open');
  } catch (error) {
    throw new ArtifactError(
      `Cannot create log ${logPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  return log;
}

/** Resolves once the log can take more data, or has failed. */
function drained(log: fs.WriteStream): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      log.off('drain', done);
      log.off('close', done);
      resolve();
    };
    log.on('drain', done);
    log.on('close', done);
  });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
