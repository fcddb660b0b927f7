import { randomUUID } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { z } from 'zod';

import type { FileConfig, RunSummary } from '../schema/index.js';
import { exitCodeFor } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient, LLMConfig } from '../llm/index.js';
import { createAgent } from '../core/agentLoop.js';
import type { Agent } from '../core/agentLoop.js';
import { resolveMarkers } from '../core/protocol.js';
import {
  createChangesGuard,
  createEnvironmentTools,
  createLocalEnvironment,
  generatePatch,
} from '../environment/index.js';
import type { ExecutionEnvironment } from '../environment/index.js';
import { generateMarkdown, generateJSON, serializeJSON } from '../report/reporter.js';
import { DEFAULT_CONFIG_PATH, DEFAULT_REPORT_PATH } from '../config/defaults.js';
import { loadConfigFileIfPresent } from '../config/loader.js';
import { loadInstructions } from '../config/prompts.js';
import { formatError } from '../utils/errors.js';
import * as log from '../utils/logger.js';

// ── Option parsing ───────────────────────────────────────────

const stepCountSchema = z.coerce.number().int().nonnegative();
const secondsSchema = z.coerce.number().positive();

async function readTask(raw: string): Promise<string> {
  // `@path` reads the task description from a file.
  if (raw.startsWith('@')) {
    return (await readFile(raw.slice(1), 'utf-8')).trim();
  }
  return raw;
}

// ── Agent assembly ───────────────────────────────────────────

interface AgentSetup {
  agent: Agent;
  env: ExecutionEnvironment;
}

async function assembleAgent(
  client: LLMClient,
  config: FileConfig,
  overrides: { workdir?: string | undefined; timeoutSec?: number | undefined; instructions?: string | undefined; requireChanges?: boolean | undefined },
): Promise<AgentSetup> {
  const workdir = path.resolve(overrides.workdir ?? config.workdir ?? '.');
  const timeoutSec = overrides.timeoutSec ?? config.commandTimeout;
  const requireChanges = overrides.requireChanges ?? config.requireChanges;

  log.info(`Workdir: ${workdir}`);
  const env = createLocalEnvironment({ cwd: workdir, commandTimeoutMs: timeoutSec * 1000 });
  const instructions = await loadInstructions(overrides.instructions ?? config.instructions);

  const agent = createAgent(client, {
    instructions,
    markers: resolveMarkers(config.markers),
    finishGuard: requireChanges ? createChangesGuard(env) : undefined,
  });
  agent.addTools(createEnvironmentTools(env));

  return { agent, env };
}

function buildLLMConfig(config: FileConfig): LLMConfig {
  // Config provider/model override env; the key follows the chosen provider.
  const env = config.provider
    ? { ...process.env, LLM_PROVIDER: config.provider }
    : process.env;
  const envConfig = loadLLMConfig(env);
  return { ...envConfig, model: config.model ?? envConfig.model };
}

// ── Artifacts ────────────────────────────────────────────────

async function writeArtifacts(
  outputDir: string,
  summary: RunSummary,
  exitCode: number,
): Promise<void> {
  await mkdir(outputDir, { recursive: true });
  await writeFile(
    path.join(outputDir, 'summary.json'),
    serializeJSON(generateJSON(summary, exitCode)) + '\n',
    'utf-8',
  );
  await writeFile(path.join(outputDir, 'transcript.md'), generateMarkdown(summary), 'utf-8');
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(summary: RunSummary, outputDir: string): void {
  const outcome = summary.terminatedBy === 'finish' ? 'finished' : 'step budget exhausted';

  process.stderr.write(`\n--- steploop Result ---\n`);
  process.stderr.write(`Task:     ${summary.task.split('\n', 1)[0] ?? ''}\n`);
  process.stderr.write(`Outcome:  ${outcome}\n`);
  process.stderr.write(
    `Steps:    ${String(summary.steps)} of ${String(summary.stepBudget)}\n`,
  );
  process.stderr.write(`Messages: ${String(summary.messages.length)}\n`);
  process.stderr.write(
    `Time:     ${(summary.durationMs / 1000).toFixed(1)}s\n`,
  );
  process.stderr.write(`Report:   ${outputDir}\n`);
  process.stderr.write(`Run ID:   ${summary.runId}\n\n`);
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the agent on a task until it calls finish or the step budget runs out')
    .argument('<task>', 'Task description, or @file to read it from a file')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--max-steps <n>', 'Step budget (capped at the ceiling)')
    .option('--workdir <dir>', 'Working directory the tools operate in')
    .option('--timeout <seconds>', 'Per-command timeout in seconds')
    .option('--instructions <path>', 'System instructions file')
    .option('--require-changes', 'Reject finish while the working tree has no changes')
    .option('--patch', 'Return the staged git diff as the final result')
    .option('--report-path <dir>', 'Artifact directory')
    .option('--json', 'Output JSON to stdout')
    .option('--quiet', 'Suppress live progress on stderr')
    .action(
      async (
        rawTask: string,
        opts: {
          config: string;
          maxSteps?: string;
          workdir?: string;
          timeout?: string;
          instructions?: string;
          requireChanges?: true;
          patch?: true;
          reportPath?: string;
          json?: true;
          quiet?: true;
        },
      ) => {
        try {
          if (opts.quiet) log.setLogSink(() => undefined);

          // 1. Load config file (CLI flags override)
          const config = await loadConfigFileIfPresent(opts.config);
          const maxSteps = opts.maxSteps !== undefined
            ? stepCountSchema.parse(opts.maxSteps)
            : config.maxSteps;
          const usePatch = opts.patch ?? config.patch;

          // 2. Build client, environment and agent
          const llmConfig = buildLLMConfig(config);
          log.info(`Provider: ${llmConfig.provider}${llmConfig.model ? ` (${llmConfig.model})` : ''}`);
          const client = createLLMClient(llmConfig);
          const { agent, env } = await assembleAgent(client, config, {
            workdir: opts.workdir,
            timeoutSec: opts.timeout !== undefined ? secondsSchema.parse(opts.timeout) : undefined,
            instructions: opts.instructions,
            requireChanges: opts.requireChanges,
          });

          // 3. Run
          const task = await readTask(rawTask);
          const runId = randomUUID();
          const startedAt = new Date();
          const outcome = await agent.run(task, maxSteps);

          // 4. Materialize the result
          const result = usePatch ? await generatePatch(env, outcome.result) : outcome.result;
          const finishedAt = new Date();

          const summary: RunSummary = {
            runId,
            task,
            result,
            terminatedBy: outcome.terminatedBy,
            steps: outcome.steps,
            stepBudget: outcome.stepBudget,
            startedAt: startedAt.toISOString(),
            finishedAt: finishedAt.toISOString(),
            durationMs: finishedAt.getTime() - startedAt.getTime(),
            messages: outcome.messages,
          };
          const exitCode = exitCodeFor(outcome.terminatedBy);

          // 5. Artifacts
          const outputDir = path.resolve(opts.reportPath ?? config.reportPath ?? DEFAULT_REPORT_PATH, runId);
          await writeArtifacts(outputDir, summary, exitCode);

          // 6. Result (or JSON contract) to stdout
          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(summary, exitCode)) + '\n');
          } else {
            process.stdout.write(result + '\n');
          }

          // 7. Summary to stderr always
          printSummary(summary, outputDir);

          process.exitCode = exitCode;
        } catch (err) {
          process.stderr.write(`Error: ${formatError(err)}\n`);
          process.exitCode = 4;
        }
      },
    );
}

// ── Tools command ────────────────────────────────────────────

export function registerToolsCommand(program: Command): void {
  program
    .command('tools')
    .description('Print the system prompt the model sees, including the tool catalog')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--workdir <dir>', 'Working directory the tools operate in')
    .option('--instructions <path>', 'System instructions file')
    .action(
      async (opts: { config: string; workdir?: string; instructions?: string }) => {
        try {
          const config = await loadConfigFileIfPresent(opts.config);
          // No model is queried; the mock keeps API keys optional here.
          const client = createLLMClient({ provider: 'mock' });
          const { agent } = await assembleAgent(client, config, {
            workdir: opts.workdir,
            instructions: opts.instructions,
          });
          process.stdout.write(agent.renderPrompt().system);
        } catch (err) {
          process.stderr.write(`Error: ${formatError(err)}\n`);
          process.exitCode = 4;
        }
      },
    );
}
