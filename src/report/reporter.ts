import type { Message, RunSummary, TerminationReason } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputMessage } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputMessage };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  run: RunSummary,
  exitCode: number,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    task: run.task,
    result: run.result,
    terminatedBy: run.terminatedBy,
    steps: run.steps,
    stepBudget: run.stepBudget,
    durationMs: run.durationMs,
    exitCode,
    messages: run.messages.map(messageToJSON),
  };
}

function messageToJSON(message: Message): JsonOutputMessage {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[k] = v;
  }
  return sorted;
}

// ── Markdown transcript ──────────────────────────────────────

export function generateMarkdown(run: RunSummary): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# steploop Run`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Task** | ${escapeMarkdownCell(run.task)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Steps** | ${String(run.steps)} / ${String(run.stepBudget)} |`);
  lines.push(`| **Outcome** | ${terminationLabel(run.terminatedBy)} |`);
  lines.push('');

  lines.push(`## Result`);
  lines.push('');
  lines.push(fence(run.result));
  lines.push('');

  // Every ledger entry, in id order
  lines.push(`## Transcript`);
  lines.push('');

  for (const message of run.messages) {
    lines.push(`### #${String(message.id)} ${message.role}`);
    lines.push('');
    lines.push(message.content.length > 0 ? fence(message.content) : '_(empty)_');
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function terminationLabel(reason: TerminationReason): string {
  switch (reason) {
    case 'finish':
      return 'finished';
    case 'budget':
      return 'step budget exhausted';
  }
}

/** Fence long enough that no backtick run inside the text can close it. */
function fence(text: string): string {
  const longestRun = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  const ticks = '`'.repeat(Math.max(3, longestRun + 1));
  return `${ticks}\n${text}\n${ticks}`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
