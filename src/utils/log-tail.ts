import * as fs from 'fs';

/**
 * Last `count` non-empty lines of a log artifact. Reads at most `maxBytes`
 * from the end of the file.
 */
export function readLogTail(
  logPath: string,
  count: number,
  maxBytes = 64 * 1024,
): string[] {
  if (count <= 0 || !fs.existsSync(logPath)) return [];

  const size = fs.statSync(logPath).size;
  const length = Math.min(size, maxBytes);
  const buffer = Buffer.alloc(length);

  const fd = fs.openSync(logPath, 'r');
  try {
    fs.readSync(fd, buffer, 0, length, size - length);
  } finally {
    fs.closeSync(fd);
  }

  const lines = buffer
    .toString('utf-8')
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '');

  return lines.slice(-count);
}
