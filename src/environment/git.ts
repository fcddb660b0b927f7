import type { ExecutionEnvironment } from './types.js';
import { formatError } from '../utils/errors.js';

const STAGED_DIFF_COMMAND = 'git add -A && git diff --cached';

// ── Diff extraction ──────────────────────────────────────────

function stdoutOf(output: string): string {
  const start = output.indexOf('--STDOUT--\n');
  const end = output.lastIndexOf('\n--STDERR--');
  if (start === -1 || end === -1 || end < start) return output;
  return output.slice(start + '--STDOUT--\n'.length, end);
}

async function stagedDiff(env: ExecutionEnvironment): Promise<string> {
  return stdoutOf(await env.execute(STAGED_DIFF_COMMAND));
}

// ── Public API ───────────────────────────────────────────────

/**
 * Stage everything and return the diff as the run's deliverable.
 * Falls back to the model's own result text when there is nothing to show.
 */
export async function generatePatch(env: ExecutionEnvironment, result: string): Promise<string> {
  try {
    const diff = await stagedDiff(env);
    if (diff.trim().length > 0) return diff;
    return `${result}\n\nNo changes detected to generate a patch.`;
  } catch (err) {
    return `${result}\n\nError running git commands: ${formatError(err)}`;
  }
}

export async function hasPendingChanges(env: ExecutionEnvironment): Promise<boolean> {
  const diff = await stagedDiff(env);
  return diff.trim().length > 0;
}
