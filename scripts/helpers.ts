import { readSync } from 'node:fs';

export function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric value for ${name}: ${value}`);
  }
  return parsed;
}

export function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function formatNum(value: number): string {
  return value.toFixed(2);
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

const STDIN_FD = 0;

function isRetryableReadError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EAGAIN';
}

/**
 * Blocking read of one line from `fd`, consuming bytes through the newline.
 * Returns an empty string at end of input.
 */
export function readLineFromFd(fd: number): string {
  const buffer = Buffer.alloc(1);
  const bytes: number[] = [];

  for (;;) {
    let read: number;
    try {
      read = readSync(fd, buffer, 0, 1, null);
    } catch (error) {
      if (isRetryableReadError(error)) {
        continue;
      }
      throw error;
    }
    if (read === 0 || buffer[0] === 0x0a) {
      break;
    }
    bytes.push(buffer[0]);
  }

  return Buffer.from(bytes).toString('utf8').replace(/\r$/, '').trim();
}

/**
 * Prompt on stdout and read the answer from stdin.
 */
export function readLineSync(prompt: string, fd: number = STDIN_FD): string {
  process.stdout.write(prompt);
  return readLineFromFd(fd);
}
