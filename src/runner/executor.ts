import type { Readable } from 'stream';
import type { StreamChunk } from '../types.js';

export interface CollaboratorCommand {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface ExecutionResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Receives collaborator output. Returning a promise pauses the source
 * stream until it settles.
 */
export type ChunkHandler = (chunk: StreamChunk) => void | Promise<void>;

/**
 * Starts one collaborator invocation and resolves once it has fully
 * terminated. Rejects only when the process could not be started at all.
 */
export interface CommandExecutor {
  execute(
    command: CollaboratorCommand,
    onChunk: ChunkHandler,
  ): Promise<ExecutionResult>;
}

export function forwardOutput(
  stream: Readable,
  type: StreamChunk['type'],
  onChunk: ChunkHandler,
): void {
  stream.on('data', (data: Buffer) => {
    const pending = onChunk({ type, data });
    if (pending instanceof Promise) {
      stream.pause();
      pending.then(
        () => stream.resume(),
        () => stream.resume(),
      );
    }
  });
}

export const MODULE_PLACEHOLDER = '{module}';

export function buildCollaboratorArgs(
  template: readonly string[],
  moduleId: string,
  threads: number,
): string[] {
  // Single pass, so placeholder text inside a module id stays literal.
  return template.map((arg) =>
    arg.replace(/\{module\}|\{threads\}/g, (placeholder) =>
      placeholder === MODULE_PLACEHOLDER ? moduleId : String(threads),
    ),
  );
}
