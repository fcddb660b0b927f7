#!/usr/bin/env node

/**
 * steploop CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerToolsCommand } from './run.js';

const program = new Command();

program
  .name('steploop')
  .description(
    'Step-budgeted coding agent. Queries a model, decodes one tool call per response, executes it, repeats until finish.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerToolsCommand(program);

await program.parseAsync();
