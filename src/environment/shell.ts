import { exec } from 'node:child_process';

import { ShellCommandError } from '../utils/errors.js';

// ── Public types ─────────────────────────────────────────────

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
}

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

// ── Output formatting ────────────────────────────────────────

export function formatCommandOutput(stdout: string, stderr: string): string {
  return `--STDOUT--\n${stdout}\n--STDERR--\n${stderr}`;
}

// ── Runner ───────────────────────────────────────────────────

/**
 * Run `command` through the system shell.
 * Resolves with both streams on exit 0 and on timeout (as partial output);
 * rejects with ShellCommandError on any other failure.
 */
export function runCommand(command: string, options: CommandOptions): Promise<string> {
  return new Promise((resolve, reject) => {
    exec(
      command,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        const output = formatCommandOutput(stdout, stderr);
        if (!error) {
          resolve(output);
          return;
        }
        if (error.killed && error.signal === 'SIGTERM') {
          resolve(
            `Command timed out after ${String(options.timeoutMs)}ms.\n\nPartial output:\n${output}`,
          );
          return;
        }
        const exitCode = typeof error.code === 'number' ? error.code : 1;
        reject(new ShellCommandError(command, exitCode, output));
      },
    );
  });
}
