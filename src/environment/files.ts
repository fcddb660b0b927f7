import { appendFile, mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { TOKEN_GUARDS } from '../config/defaults.js';

// ── Helpers ──────────────────────────────────────────────────

/** Split into lines, each keeping its trailing newline. */
function splitKeepingNewlines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

async function assertFile(filePath: string): Promise<void> {
  const info = await stat(filePath).catch(() => undefined);
  if (!info?.isFile()) {
    throw new Error(`File not found: ${filePath}`);
  }
}

// ── Read ─────────────────────────────────────────────────────

export async function readTextFile(filePath: string): Promise<string> {
  await assertFile(filePath);
  return readFile(filePath, 'utf-8');
}

// ── Line-range replacement ───────────────────────────────────

/**
 * Replace lines `fromLine..toLine` (1-indexed, inclusive) with `content`
 * and return the whole updated file. A `toLine` past the end is clamped;
 * `fromLine` one past the last line appends.
 */
export async function replaceLines(
  filePath: string,
  fromLine: number,
  toLine: number,
  content: string,
): Promise<string> {
  const lines = splitKeepingNewlines(await readTextFile(filePath));

  const fromIndex = Math.max(0, fromLine - 1);
  const toIndex = Math.min(lines.length, toLine);
  if (fromIndex > lines.length) {
    throw new Error(
      `Invalid from_line: ${String(fromLine)} for file with ${String(lines.length)} lines`,
    );
  }
  if (toIndex < fromIndex) {
    throw new Error(
      `Invalid range: to_line (${String(toLine)}) must be >= from_line (${String(fromLine)})`,
    );
  }

  const replacement = content.endsWith('\n') ? content : `${content}\n`;
  const updated = [
    ...lines.slice(0, fromIndex),
    replacement,
    ...lines.slice(toIndex),
  ].join('');

  await writeFile(filePath, updated, 'utf-8');
  return updated;
}

// ── Create / append ──────────────────────────────────────────

export async function createTextFile(filePath: string, content: string): Promise<string> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  return `File created: ${filePath}`;
}

/** Append and return the tail of the file. */
export async function appendTextFile(filePath: string, content: string): Promise<string> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await appendFile(filePath, content, 'utf-8');
  const updated = await readFile(filePath, 'utf-8');
  return updated.slice(-TOKEN_GUARDS.MAX_APPEND_TAIL_CHARS);
}

// ── Listing / search ─────────────────────────────────────────

/** Immediate children, sorted; directories carry a trailing slash. */
export async function listDirectory(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
    .sort();
}

/** Matching lines as `<line number>: <text>`, one per line. */
export async function grepFile(filePath: string, pattern: string): Promise<string> {
  const regex = new RegExp(pattern);
  const text = await readTextFile(filePath);
  const lines = text.split(/\r?\n/);
  if (text.endsWith('\n')) lines.pop();

  const matches: string[] = [];
  lines.forEach((line, i) => {
    if (regex.test(line)) {
      matches.push(`${String(i + 1)}: ${line.trimEnd()}`);
    }
  });
  return matches.join('\n');
}
