import { closeSync, mkdtempSync, openSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readLineFromFd, readLineSync } from '../../../scripts/helpers';

describe('console line reading', () => {
  let dir: string;
  let fd: number;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tokyo-brawl-'));
    const inputPath = join(dir, 'input.txt');
    writeFileSync(inputPath, '2\nAnn\r\n  Bob  \n');
    fd = openSync(inputPath, 'r');
  });

  afterEach(() => {
    closeSync(fd);
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('reads successive lines from a file descriptor', () => {
    expect(readLineFromFd(fd)).toBe('2');
    expect(readLineFromFd(fd)).toBe('Ann');
    expect(readLineFromFd(fd)).toBe('Bob');
    expect(readLineFromFd(fd)).toBe('');
  });

  it('writes the prompt before each read', () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(readLineSync('How many players? ', fd)).toBe('2');
    expect(readLineSync('Name? ', fd)).toBe('Ann');

    expect(writeSpy.mock.calls.map((call) => call[0])).toEqual(['How many players? ', 'Name? ']);
  });
});
