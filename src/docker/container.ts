import Docker from 'dockerode';
import { PassThrough } from 'stream';
import { finished } from 'stream/promises';
import type { ContainerConfig } from '../types.js';
import {
  forwardOutput,
  type ChunkHandler,
  type CollaboratorCommand,
  type CommandExecutor,
  type ExecutionResult,
} from '../runner/executor.js';

export interface MountConfig {
  hostPath: string;
  containerPath: string;
}

export interface RunCommandOptions {
  workDir: string;
  mounts?: MountConfig[];
  env?: Record<string, string>;
  keepContainer?: boolean;
}

export class ContainerManager {
  private docker: Docker;

  constructor(socketPath: string = '/var/run/docker.sock') {
    this.docker = new Docker({ socketPath });
  }

  /**
   * Run a command in a fresh container, forwarding output as it arrives.
   * Resolves with the container's exit status once it has stopped.
   */
  async runCommand(
    image: string,
    command: string[],
    options: RunCommandOptions,
    onChunk: ChunkHandler,
  ): Promise<number> {
    const binds: string[] = [];
    if (options.mounts) {
      for (const mount of options.mounts) {
        binds.push(`${mount.hostPath}:${mount.containerPath}:rw`);
      }
    }

    const envArray: string[] = [];
    if (options.env) {
      for (const [key, value] of Object.entries(options.env)) {
        envArray.push(`${key}=${value}`);
      }
    }

    const container = await this.docker.createContainer({
      Image: image,
      Cmd: command,
      Tty: false,
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: options.workDir,
      Env: envArray.length > 0 ? envArray : undefined,
      HostConfig: {
        Binds: binds,
        AutoRemove: false, // removed below, once the output is collected
      },
    });

    try {
      // Attach before starting so no early output is lost
      const stream = await container.attach({
        stream: true,
        stdout: true,
        stderr: true,
      });

      const stdoutStream = new PassThrough();
      const stderrStream = new PassThrough();

      forwardOutput(stdoutStream, 'stdout', onChunk);
      forwardOutput(stderrStream, 'stderr', onChunk);

      this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);

      await container.start();

      const waitResult: { StatusCode: number } = await container.wait();

      // Docker closes the attach stream once the output is fully sent;
      // only then is every demuxed chunk in the pass-throughs.
      await finished(stream, { writable: false });
      stdoutStream.end();
      stderrStream.end();
      await Promise.all([finished(stdoutStream), finished(stderrStream)]);

      return waitResult.StatusCode;
    } finally {
      if (!options.keepContainer) {
        await container.remove({ force: true }).catch((e: unknown) => {
          console.warn(
            `Warning: could not remove container: ${e instanceof Error ? e.message : String(e)}`,
          );
        });
      }
    }
  }
}

export interface ContainerExecutorOptions {
  keepContainers?: boolean;
  manager?: ContainerManager;
}

/**
 * Runs the collaborator inside a container with the working directory
 * bind-mounted at `config.workDir`.
 */
export class ContainerExecutor implements CommandExecutor {
  private manager: ContainerManager;

  constructor(
    private readonly config: ContainerConfig,
    private readonly options: ContainerExecutorOptions = {},
  ) {
    this.manager = options.manager ?? new ContainerManager();
  }

  async execute(
    command: CollaboratorCommand,
    onChunk: ChunkHandler,
  ): Promise<ExecutionResult> {
    const exitCode = await this.manager.runCommand(
      this.config.image,
      [command.command, ...command.args],
      {
        workDir: this.config.workDir,
        mounts: [{ hostPath: command.cwd, containerPath: this.config.workDir }],
        env: command.env,
        keepContainer: this.options.keepContainers,
      },
      onChunk,
    );

    return { exitCode, signal: null };
  }
}
