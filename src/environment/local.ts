import path from 'node:path';

import type { ExecutionEnvironment } from './types.js';
import { runCommand } from './shell.js';
import {
  appendTextFile,
  createTextFile,
  grepFile,
  listDirectory,
  readTextFile,
  replaceLines,
} from './files.js';
import { TIMEOUTS } from '../config/defaults.js';

export interface LocalEnvironmentConfig {
  cwd: string;
  commandTimeoutMs?: number | undefined;
}

/** Runs commands and file operations directly on this machine. */
export function createLocalEnvironment(config: LocalEnvironmentConfig): ExecutionEnvironment {
  const cwd = path.resolve(config.cwd);
  const timeoutMs = config.commandTimeoutMs ?? TIMEOUTS.COMMAND_TIMEOUT;
  const resolve = (p: string): string => path.resolve(cwd, p);

  return {
    cwd,
    execute: (command) => runCommand(command, { cwd, timeoutMs }),
    read: (filePath) => readTextFile(resolve(filePath)),
    writeRange: (filePath, fromLine, toLine, content) =>
      replaceLines(resolve(filePath), fromLine, toLine, content),
    create: (filePath, content) => createTextFile(resolve(filePath), content),
    append: (filePath, content) => appendTextFile(resolve(filePath), content),
    list: (dirPath) => listDirectory(resolve(dirPath)),
    grep: (filePath, pattern) => grepFile(resolve(filePath), pattern),
  };
}
