import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

export const DEFAULT_INSTRUCTIONS_PATH = path.join(PROMPTS_DIR, 'system.txt');

// ── Loader ───────────────────────────────────────────────────

/**
 * Read the system instructions once; the agent receives them as a value.
 */
export async function loadInstructions(instructionsPath?: string): Promise<string> {
  const raw = await readFile(instructionsPath ?? DEFAULT_INSTRUCTIONS_PATH, 'utf-8');
  return raw.trim();
}
