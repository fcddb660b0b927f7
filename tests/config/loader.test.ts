import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { loadConfigFile, loadConfigFileIfPresent } from '../../src/config/loader.js';
import { DEFAULT_INSTRUCTIONS_PATH, loadInstructions } from '../../src/config/prompts.js';

const DEFAULTS = {
  maxSteps: 30,
  commandTimeout: 120,
  requireChanges: false,
  patch: false,
};

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'steploop-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeConfig(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content, 'utf-8');
  return file;
}

describe('loadConfigFile', () => {
  it('parses a YAML config and fills defaults', async () => {
    const file = await writeConfig(
      '.steploop.yaml',
      ['provider: mock', 'maxSteps: 12', 'markers:', '  end: "@@END@@"', ''].join('\n'),
    );

    await expect(loadConfigFile(file)).resolves.toEqual({
      ...DEFAULTS,
      provider: 'mock',
      maxSteps: 12,
      markers: { end: '@@END@@' },
    });
  });

  it('parses JSON by extension', async () => {
    const file = await writeConfig('steploop.json', '{"requireChanges": true, "commandTimeout": 5}');

    await expect(loadConfigFile(file)).resolves.toEqual({
      ...DEFAULTS,
      requireChanges: true,
      commandTimeout: 5,
    });
  });

  it('treats an empty file as all defaults', async () => {
    const file = await writeConfig('.steploop.yaml', '');

    await expect(loadConfigFile(file)).resolves.toEqual(DEFAULTS);
  });

  it('rejects invalid values', async () => {
    const file = await writeConfig('.steploop.yaml', 'maxSteps: 0\n');

    await expect(loadConfigFile(file)).rejects.toThrow(ZodError);
  });

  it('rejects an unknown provider', async () => {
    const file = await writeConfig('.steploop.yaml', 'provider: local\n');

    await expect(loadConfigFile(file)).rejects.toThrow(ZodError);
  });

  it('fails for a missing file', async () => {
    await expect(loadConfigFile(path.join(dir, 'nope.yaml'))).rejects.toThrow(/ENOENT/);
  });
});

describe('loadConfigFileIfPresent', () => {
  it('returns the defaults when the file is missing', async () => {
    await expect(loadConfigFileIfPresent(path.join(dir, 'nope.yaml'))).resolves.toEqual(DEFAULTS);
  });

  it('still rejects an invalid file', async () => {
    const file = await writeConfig('.steploop.yaml', 'patch: sometimes\n');

    await expect(loadConfigFileIfPresent(file)).rejects.toThrow(ZodError);
  });
});

describe('loadInstructions', () => {
  it('reads the bundled instructions', async () => {
    const text = await loadInstructions();

    expect(DEFAULT_INSTRUCTIONS_PATH.endsWith(path.join('prompts', 'system.txt'))).toBe(true);
    expect(text.startsWith('You are a careful software engineering agent')).toBe(true);
  });

  it('trims a custom instructions file', async () => {
    const file = await writeConfig('rules.txt', '\n  Only edit tests.  \n\n');

    await expect(loadInstructions(file)).resolves.toBe('Only edit tests.');
  });
});
