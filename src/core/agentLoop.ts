import type { CompletionPrompt, LLMClient } from '../llm/index.js';
import type {
  Message,
  ParsedCall,
  ProtocolMarkers,
  TerminationReason,
} from '../schema/index.js';
import { protocolMarkersSchema } from '../schema/index.js';
import { BUDGET_EXHAUSTED_RESULT, LIMITS } from '../config/defaults.js';
import { AgentStateError, ProtocolError, formatError } from '../utils/errors.js';
import * as log from '../utils/logger.js';
import { createMessageLedger } from './ledger.js';
import { createToolRegistry, checkArguments } from './registry.js';
import type { ToolDescriptor, ToolParameter } from './registry.js';
import {
  decodeCall,
  renderResponseFormat,
  resolveMarkers,
  stopSequence,
} from './protocol.js';

// ── Public types ─────────────────────────────────────────────

export const FINISH_TOOL_NAME = 'finish';

/**
 * Consulted when the model calls `finish`. A false (or throwing) check
 * rejects the call and the loop goes on.
 */
export interface FinishGuard {
  check(): boolean | Promise<boolean>;
  reason: string;
}

export interface AgentConfig {
  instructions: string;
  name?: string | undefined;
  markers?: ProtocolMarkers | undefined;
  stepCeiling?: number | undefined;
  finishGuard?: FinishGuard | undefined;
}

export type AgentState = 'init' | 'running' | 'terminated';

export interface AgentRunResult {
  result: string;
  terminatedBy: TerminationReason;
  /** Model round trips performed. */
  steps: number;
  /** Budget after clamping to the ceiling. */
  stepBudget: number;
  messages: Message[];
}

export interface Agent {
  readonly name: string;
  readonly state: AgentState;
  readonly markers: ProtocolMarkers;
  addTools(tools: readonly ToolDescriptor[]): void;
  toolNames(): string[];
  renderPrompt(): CompletionPrompt;
  messages(): Message[];
  run(task: string, stepBudget: number): Promise<AgentRunResult>;
}

// ── Mandatory finish tool ────────────────────────────────────

const finishParameters: readonly ToolParameter[] = [
  { name: 'result', description: 'the result generated by the agent' },
];

export function createFinishTool(): ToolDescriptor {
  return {
    name: FINISH_TOOL_NAME,
    description:
      'Call this with the final result once the task is solved. The result is returned by the run.',
    parameters: finishParameters,
    invoke: (args) => args['result'] ?? '',
  };
}

// ── Corrective entries ───────────────────────────────────────

function decodeFailureMessage(err: ProtocolError, format: string, raw: string): string {
  return [
    `The previous response could not be parsed (${err.message}).`,
    'Please use the correct response format:',
    format,
    '',
    'Offending response:',
    raw,
  ].join('\n');
}

function unknownToolMessage(name: string, available: readonly string[]): string {
  return `The function '${name}' is not recognized. Please use one of the available tools: ${available.join(', ')}.`;
}

function argumentMismatchMessage(tool: ToolDescriptor, problems: readonly string[]): string {
  const expected = tool.parameters
    .map((p) => (p.optional ? `${p.name} (optional)` : p.name))
    .join(', ');
  return [
    `The call to '${tool.name}' has invalid arguments: ${problems.join('; ')}.`,
    `Expected parameters: ${expected || '(none)'}.`,
  ].join('\n');
}

function finishRejectedMessage(reason: string): string {
  return `Calling finish now is rejected: ${reason}`;
}

function preview(text: string): string {
  const firstLine = text.split('\n', 1)[0] ?? '';
  return firstLine.length > 100 ? `${firstLine.slice(0, 100)}...` : firstLine;
}

// ── Step outcome ─────────────────────────────────────────────

type StepOutcome =
  | { done: false }
  | { done: true; result: string };

const CONTINUE: StepOutcome = { done: false };

// ── Factory ──────────────────────────────────────────────────

export function createAgent(client: LLMClient, config: AgentConfig): Agent {
  const name = config.name ?? 'steploop';
  const markers = config.markers
    ? protocolMarkersSchema.parse(config.markers)
    : resolveMarkers();
  const responseFormat = renderResponseFormat(markers);
  const stepCeiling = config.stepCeiling ?? LIMITS.STEP_CEILING;

  const ledger = createMessageLedger();
  const registry = createToolRegistry();
  let state: AgentState = 'init';

  const systemId = ledger.appendSlot('system', config.instructions);
  const taskId = ledger.appendSlot('user', '');
  const slotIds: ReadonlySet<number> = new Set([systemId, taskId]);
  registry.register([createFinishTool()]);

  // ── Rendering ──────────────────────────────────────────────

  function renderSystemBlock(): string {
    return (
      ledger.renderEntry(systemId) +
      `--- AVAILABLE TOOLS ---\n${registry.describe()}\n\n` +
      `--- RESPONSE FORMAT ---\n${responseFormat}\n`
    );
  }

  function renderPrompt(): CompletionPrompt {
    return {
      system: renderSystemBlock(),
      task: ledger.renderEntry(taskId),
      transcript: ledger.renderTranscript(slotIds),
      stopSequences: [stopSequence(markers)],
    };
  }

  // ── Finish gating ──────────────────────────────────────────

  async function guardAllowsFinish(guard: FinishGuard): Promise<boolean> {
    try {
      return await guard.check();
    } catch (err) {
      log.warn(`Finish guard failed, treating as rejection: ${formatError(err)}`);
      return false;
    }
  }

  // ── One decode-dispatch step ───────────────────────────────

  async function executeStep(raw: string): Promise<StepOutcome> {
    let call: ParsedCall;
    try {
      call = decodeCall(raw, markers);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      log.warn(`Could not decode response: ${err.message}`);
      ledger.append('user', decodeFailureMessage(err, responseFormat, raw));
      return CONTINUE;
    }

    ledger.append('assistant', call.thought);
    if (call.thought.length > 0) log.detail(preview(call.thought));

    const tool = registry.lookup(call.name);
    if (!tool) {
      log.warn(`Model called unknown tool "${call.name}"`);
      ledger.append('user', unknownToolMessage(call.name, registry.names()));
      return CONTINUE;
    }

    const problems = checkArguments(tool, call.arguments);
    if (problems.length > 0) {
      log.warn(`Rejected call to ${tool.name}: ${problems.join('; ')}`);
      ledger.append('user', argumentMismatchMessage(tool, problems));
      return CONTINUE;
    }

    log.tool(tool.name, Object.keys(call.arguments));

    let observation: string;
    let succeeded = true;
    try {
      observation = await registry.invoke(tool.name, call.arguments);
    } catch (err) {
      succeeded = false;
      observation = `Error: ${tool.name} failed: ${formatError(err)}`;
      log.error(`Tool ${tool.name} raised: ${formatError(err)}`);
    }

    log.observation(succeeded, observation);
    ledger.append('tool', observation);

    if (tool.name !== FINISH_TOOL_NAME || !succeeded) return CONTINUE;

    if (config.finishGuard && !(await guardAllowsFinish(config.finishGuard))) {
      log.warn(`Finish rejected: ${config.finishGuard.reason}`);
      ledger.append('user', finishRejectedMessage(config.finishGuard.reason));
      return CONTINUE;
    }

    return { done: true, result: observation };
  }

  // ── Budget exhaustion ──────────────────────────────────────

  async function forceFinish(): Promise<string> {
    try {
      return await registry.invoke(FINISH_TOOL_NAME, { result: BUDGET_EXHAUSTED_RESULT });
    } catch (err) {
      log.warn(`Implicit finish failed, returning sentinel: ${formatError(err)}`);
      return BUDGET_EXHAUSTED_RESULT;
    }
  }

  // ── Main loop ──────────────────────────────────────────────

  async function run(task: string, stepBudget: number): Promise<AgentRunResult> {
    if (state !== 'init') {
      throw new AgentStateError(`Agent "${name}" has already run; create a new agent for another task`);
    }
    if (!Number.isInteger(stepBudget) || stepBudget < 0) {
      throw new AgentStateError(`Step budget must be a non-negative integer, got ${String(stepBudget)}`);
    }

    let budget = stepBudget;
    if (budget > stepCeiling) {
      log.warn(`Step budget ${String(budget)} exceeds the ceiling, using ${String(stepCeiling)}`);
      budget = stepCeiling;
    }

    state = 'running';
    ledger.setSlotContent(taskId, task);
    log.section(`Run (${name}): ${task}`);

    const finish = (terminatedBy: TerminationReason, result: string, steps: number): AgentRunResult => {
      log.finished(`${terminatedBy === 'finish' ? 'Finished' : 'Budget exhausted'} after ${String(steps)} step(s)`);
      return { result, terminatedBy, steps, stepBudget: budget, messages: ledger.entries() };
    };

    try {
      for (let i = 0; i < budget; i++) {
        log.step(i, budget, 'Querying model...');
        const raw = await client.complete(renderPrompt());
        log.llm(`Response received (${String(raw.length)} chars)`);
        const outcome = await executeStep(raw);
        if (outcome.done) {
          return finish('finish', outcome.result, i + 1);
        }
      }

      log.warn(`Step budget of ${String(budget)} exhausted without a finish call`);
      return finish('budget', await forceFinish(), budget);
    } finally {
      state = 'terminated';
    }
  }

  return {
    name,
    markers,

    get state() {
      return state;
    },

    addTools(tools) {
      if (state !== 'init') {
        throw new AgentStateError('Tools can only be registered before the run starts');
      }
      registry.register(tools);
    },

    toolNames() {
      return registry.names();
    },

    renderPrompt,

    messages() {
      return ledger.entries();
    },

    run,
  };
}
