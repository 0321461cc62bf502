import { spawn } from 'child_process';
import {
  forwardOutput,
  type ChunkHandler,
  type CollaboratorCommand,
  type CommandExecutor,
  type ExecutionResult,
} from './executor.js';

export class LocalExecutor implements CommandExecutor {
  execute(
    command: CollaboratorCommand,
    onChunk: ChunkHandler,
  ): Promise<ExecutionResult> {
    return new Promise((resolve, reject) => {
      let settled = false;

      const child = spawn(command.command, command.args, {
        cwd: command.cwd,
        env: { ...process.env, ...command.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      forwardOutput(child.stdout, 'stdout', onChunk);
      forwardOutput(child.stderr, 'stderr', onChunk);

      // A failed spawn may emit 'close' after 'error'; the first one wins.
      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        reject(error);
      });

      // 'close' fires after the process exited and both pipes were consumed.
      child.on('close', (exitCode, signal) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode, signal });
      });
    });
  }
}
