import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { DEFAULT_EXEC_TIMEOUT_MS } from '@ringwatch/shared';
import type { ExecFn, ReadFileFn } from './types.js';

const execFileAsync = promisify(execFile);

/** Default exec function that shells out to real commands */
export const defaultExec: ExecFn = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, {
    timeout: DEFAULT_EXEC_TIMEOUT_MS,
    maxBuffer: 16 * 1024 * 1024,
  });
  return stdout;
};

export const defaultReadFile: ReadFileFn = (path) => readFile(path, 'utf-8');
