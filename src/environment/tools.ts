import { z } from 'zod';

import type { ToolDescriptor } from '../core/registry.js';
import type { FinishGuard } from '../core/agentLoop.js';
import type { ExecutionEnvironment } from './types.js';
import { hasPendingChanges } from './git.js';

// ── Argument schemas ─────────────────────────────────────────
// Every decoded value is a string; numbers are coerced here.

const filePath = z.string().min(1);
const lineNumber = z.coerce.number().int().positive();

const runBashCmdSchema = z.object({ command: z.string().min(1) });

const showFileSchema = z.object({ file_path: filePath });

const replaceInFileSchema = z.object({
  file_path: filePath,
  from_line: lineNumber,
  to_line: lineNumber,
  content: z.string(),
});

const createFileSchema = z.object({ file_path: filePath, content: z.string() });

const appendToFileSchema = z.object({ file_path: filePath, content: z.string() });

const listDirSchema = z.object({ path: z.string().min(1).optional().default('.') });

const grepInFileSchema = z.object({ file_path: filePath, pattern: z.string().min(1) });

// ── Tool catalog ─────────────────────────────────────────────

export function createEnvironmentTools(env: ExecutionEnvironment): ToolDescriptor[] {
  return [
    {
      name: 'run_bash_cmd',
      description:
        'Run the command in a shell from the working directory and return stdout and stderr. A nonzero exit code is reported as an error together with the output.',
      parameters: [{ name: 'command', description: 'the shell command to run' }],
      invoke: (args) => env.execute(runBashCmdSchema.parse(args).command),
    },
    {
      name: 'show_file',
      description: 'Show the content of a file.',
      parameters: [{ name: 'file_path', description: 'path to the file' }],
      invoke: (args) => env.read(showFileSchema.parse(args).file_path),
    },
    {
      name: 'replace_in_file',
      description:
        'Replace lines from_line to to_line (1-indexed, inclusive) of a file with the given content and return the updated file.',
      parameters: [
        { name: 'file_path', description: 'path to the file' },
        { name: 'from_line', description: 'first line to replace (1-indexed)' },
        { name: 'to_line', description: 'last line to replace (inclusive)' },
        { name: 'content', description: 'replacement text' },
      ],
      invoke: (args) => {
        const { file_path, from_line, to_line, content } = replaceInFileSchema.parse(args);
        return env.writeRange(file_path, from_line, to_line, content);
      },
    },
    {
      name: 'create_file',
      description: 'Create (or overwrite) a file with the given content.',
      parameters: [
        { name: 'file_path', description: 'path to the file' },
        { name: 'content', description: 'content to write' },
      ],
      invoke: (args) => {
        const { file_path, content } = createFileSchema.parse(args);
        return env.create(file_path, content);
      },
    },
    {
      name: 'append_to_file',
      description: 'Append content to the end of a file, creating it if missing. Returns the tail of the file.',
      parameters: [
        { name: 'file_path', description: 'path to the file' },
        { name: 'content', description: 'content to append' },
      ],
      invoke: (args) => {
        const { file_path, content } = appendToFileSchema.parse(args);
        return env.append(file_path, content);
      },
    },
    {
      name: 'list_dir',
      description: 'List the immediate children of a directory; directories end with "/".',
      parameters: [
        { name: 'path', description: 'directory to list, defaults to the working directory', optional: true },
      ],
      invoke: async (args) => {
        const entries = await env.list(listDirSchema.parse(args).path);
        return entries.length > 0 ? entries.join('\n') : '(empty directory)';
      },
    },
    {
      name: 'grep_in_file',
      description: 'Return the lines of a file matching a JavaScript regular expression, prefixed with line numbers.',
      parameters: [
        { name: 'file_path', description: 'path to the file' },
        { name: 'pattern', description: 'regular expression' },
      ],
      invoke: async (args) => {
        const { file_path, pattern } = grepInFileSchema.parse(args);
        const matches = await env.grep(file_path, pattern);
        return matches.length > 0 ? matches : '(no matches)';
      },
    },
  ];
}

// ── Finish guard ─────────────────────────────────────────────

export function createChangesGuard(env: ExecutionEnvironment): FinishGuard {
  return {
    reason:
      'no changes were detected in the working tree. Make the required edits in place before calling finish.',
    check: () => hasPendingChanges(env),
  };
}
