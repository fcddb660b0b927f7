import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createAgent } from '../../src/core/agentLoop.js';
import type { Agent, AgentConfig, AgentState } from '../../src/core/agentLoop.js';
import { encodeCall, renderResponseFormat } from '../../src/core/protocol.js';
import type { ToolDescriptor } from '../../src/core/registry.js';
import { createMockClient } from '../../src/llm/mock.js';
import type { LLMClient } from '../../src/llm/client.js';
import { DEFAULT_MARKERS } from '../../src/config/defaults.js';
import { AgentStateError } from '../../src/utils/errors.js';
import { setLogSink } from '../../src/utils/logger.js';

const RULE = '-'.repeat(28);

const echoTool: ToolDescriptor = {
  name: 'echo',
  description: 'Echo text back with an exclamation mark.',
  parameters: [{ name: 'text', description: 'what to echo' }],
  invoke: (args) => `${args['text'] ?? ''}!`,
};

function call(name: string, args: Record<string, string> = {}, thought = `calling ${name}`): string {
  return encodeCall({ thought, name, arguments: args }, DEFAULT_MARKERS);
}

function finishCall(result: string, thought = 'Done.'): string {
  return call('finish', { result }, thought);
}

function echoCall(text = 'hi'): string {
  return call('echo', { text }, 'Echo first.');
}

function newAgent(client: LLMClient, extra: Omit<AgentConfig, 'instructions'> = {}): Agent {
  const agent = createAgent(client, { instructions: 'Be helpful.', ...extra });
  agent.addTools([echoTool]);
  return agent;
}

beforeEach(() => {
  setLogSink(() => undefined);
});

describe('agent run', () => {
  it('dispatches tool calls until finish is called', async () => {
    const client = createMockClient([echoCall(), finishCall('all good')]);
    const agent = newAgent(client);

    const outcome = await agent.run('say hi', 10);

    expect(outcome.result).toBe('all good');
    expect(outcome.terminatedBy).toBe('finish');
    expect(outcome.steps).toBe(2);
    expect(outcome.stepBudget).toBe(10);
    expect(outcome.messages.map((m) => m.role)).toEqual([
      'system',
      'user',
      'assistant',
      'tool',
      'assistant',
      'tool',
    ]);
    expect(outcome.messages.map((m) => m.content).slice(1)).toEqual([
      'say hi',
      'Echo first.',
      'hi!',
      'Done.',
      'all good',
    ]);
  });

  it('renders the task and growing transcript into each prompt', async () => {
    const client = createMockClient([echoCall(), finishCall('ok')]);
    const agent = newAgent(client);

    await agent.run('say hi', 5);

    const [first, second] = client.prompts;
    expect(first?.task).toBe(`${RULE}\n|MESSAGE(role="user", id=1)|\nsay hi\n`);
    expect(first?.transcript).toBe('');
    expect(second?.transcript).toBe(
      `${RULE}\n|MESSAGE(role="assistant", id=2)|\nEcho first.\n` +
        `${RULE}\n|MESSAGE(role="tool", id=3)|\nhi!\n`,
    );
    expect(second?.stopSequences).toEqual([DEFAULT_MARKERS.end]);
  });

  it('puts instructions, tool catalog and response format in the system block', () => {
    const agent = newAgent(createMockClient());

    const { system } = agent.renderPrompt();

    expect(system).toBe(
      `${RULE}\n|MESSAGE(role="system", id=0)|\nBe helpful.\n` +
        '--- AVAILABLE TOOLS ---\n' +
        'Function: finish(result)\n' +
        'Call this with the final result once the task is solved. The result is returned by the run.\n' +
        '  - result: the result generated by the agent\n' +
        '\n' +
        'Function: echo(text)\n' +
        'Echo text back with an exclamation mark.\n' +
        '  - text: what to echo\n' +
        '\n\n' +
        `--- RESPONSE FORMAT ---\n${renderResponseFormat(DEFAULT_MARKERS)}\n`,
    );
  });

  it('lists tools with finish first', () => {
    expect(newAgent(createMockClient()).toolNames()).toEqual(['finish', 'echo']);
  });

  describe('recoverable failures', () => {
    it('answers an undecodable response with the response format', async () => {
      const client = createMockClient(['I forgot the format']);
      const agent = newAgent(client);

      const outcome = await agent.run('task', 5);

      expect(outcome.messages[2]).toMatchObject({
        role: 'user',
        content: [
          'The previous response could not be parsed (END function call marker not found).',
          'Please use the correct response format:',
          renderResponseFormat(DEFAULT_MARKERS),
          '',
          'Offending response:',
          'I forgot the format',
        ].join('\n'),
      });
      expect(outcome.result).toBe('mock');
      expect(outcome.steps).toBe(2);
    });

    it('names the available tools when an unknown tool is called', async () => {
      const client = createMockClient([call('deploy', {}, 'ship it')]);
      const agent = newAgent(client);

      const outcome = await agent.run('task', 5);

      expect(outcome.messages[2]).toMatchObject({ role: 'assistant', content: 'ship it' });
      expect(outcome.messages[3]).toMatchObject({
        role: 'user',
        content: "The function 'deploy' is not recognized. Please use one of the available tools: finish, echo.",
      });
    });

    it('rejects calls whose arguments do not match the parameters', async () => {
      const client = createMockClient([call('echo', { txt: 'hi' })]);
      const agent = newAgent(client);

      const outcome = await agent.run('task', 5);

      expect(outcome.messages[3]).toMatchObject({
        role: 'user',
        content:
          `The call to 'echo' has invalid arguments: unexpected argument "txt"; missing required argument "text".\n` +
          'Expected parameters: text.',
      });
    });

    it('records a failing tool as an error observation', async () => {
      const failing: ToolDescriptor = {
        name: 'fail',
        description: 'Always fails.',
        parameters: [],
        invoke: () => {
          throw new Error('boom');
        },
      };
      const client = createMockClient([call('fail')]);
      const agent = newAgent(client);
      agent.addTools([failing]);

      const outcome = await agent.run('task', 5);

      expect(outcome.messages[3]).toMatchObject({ role: 'tool', content: 'Error: fail failed: boom' });
      expect(outcome.terminatedBy).toBe('finish');
    });

    it('aborts the run when the provider fails', async () => {
      const failure = new Error('network down');
      const client: LLMClient = { complete: vi.fn().mockRejectedValue(failure) };
      const agent = newAgent(client);

      await expect(agent.run('task', 3)).rejects.toBe(failure);
      expect(agent.state).toBe('terminated');
    });
  });

  describe('finish guard', () => {
    it('rejects finish while the check fails', async () => {
      const check = vi.fn<() => boolean>().mockReturnValueOnce(false).mockReturnValueOnce(true);
      const client = createMockClient([finishCall('first'), finishCall('second')]);
      const agent = newAgent(client, { finishGuard: { check, reason: 'tests are still failing' } });

      const outcome = await agent.run('task', 5);

      expect(outcome.result).toBe('second');
      expect(outcome.steps).toBe(2);
      expect(check).toHaveBeenCalledTimes(2);
      expect(outcome.messages.map((m) => m.role)).toEqual([
        'system',
        'user',
        'assistant',
        'tool',
        'user',
        'assistant',
        'tool',
      ]);
      expect(outcome.messages[4]?.content).toBe('Calling finish now is rejected: tests are still failing');
    });

    it('treats a throwing check as a rejection', async () => {
      const check = vi.fn<() => Promise<boolean>>().mockRejectedValue(new Error('git missing'));
      const client = createMockClient([finishCall('early')]);
      const agent = newAgent(client, { finishGuard: { check, reason: 'no changes' } });

      const outcome = await agent.run('task', 1);

      expect(outcome.terminatedBy).toBe('budget');
      expect(outcome.result).toBe('budget exhausted');
      expect(outcome.messages.at(-1)?.content).toBe('Calling finish now is rejected: no changes');
    });
  });

  describe('step budget', () => {
    it('stops after exactly the budgeted number of model calls', async () => {
      const client = createMockClient([echoCall(), echoCall(), echoCall(), finishCall('late')]);
      const agent = newAgent(client);

      const outcome = await agent.run('task', 3);

      expect(client.prompts).toHaveLength(3);
      expect(outcome).toMatchObject({
        result: 'budget exhausted',
        terminatedBy: 'budget',
        steps: 3,
        stepBudget: 3,
      });
      expect(outcome.messages).toHaveLength(8);
    });

    it('clamps the budget to the ceiling', async () => {
      const client = createMockClient([echoCall(), echoCall(), echoCall()]);
      const agent = newAgent(client, { stepCeiling: 2 });

      const outcome = await agent.run('task', 5);

      expect(client.prompts).toHaveLength(2);
      expect(outcome.stepBudget).toBe(2);
      expect(outcome.terminatedBy).toBe('budget');
    });

    it('returns without querying the model for a zero budget', async () => {
      const client = createMockClient();
      const agent = newAgent(client);

      const outcome = await agent.run('task', 0);

      expect(client.prompts).toHaveLength(0);
      expect(outcome.result).toBe('budget exhausted');
      expect(outcome.steps).toBe(0);
      expect(outcome.messages).toHaveLength(2);
      expect(outcome.messages[1]?.content).toBe('task');
    });

    it('routes exhaustion through an overridden finish tool', async () => {
      const agent = newAgent(createMockClient());
      agent.addTools([
        {
          name: 'finish',
          description: 'Finish with a prefix.',
          parameters: [{ name: 'result', description: 'final result' }],
          invoke: (args) => `patched: ${args['result'] ?? ''}`,
        },
      ]);

      const outcome = await agent.run('task', 0);

      expect(outcome.result).toBe('patched: budget exhausted');
      expect(agent.toolNames()).toEqual(['finish', 'echo']);
    });

    it.each([-1, 1.5])('rejects a budget of %s', async (budget) => {
      const agent = newAgent(createMockClient());

      await expect(agent.run('task', budget)).rejects.toThrow(AgentStateError);
      expect(agent.state).toBe('init');
    });
  });

  describe('lifecycle', () => {
    it('moves from init through running to terminated', async () => {
      const seen: AgentState[] = [];
      const client: LLMClient = {
        complete: async () => {
          seen.push(agent.state);
          return finishCall('ok');
        },
      };
      const agent = newAgent(client);

      expect(agent.state).toBe('init');
      await agent.run('task', 2);

      expect(seen).toEqual(['running']);
      expect(agent.state).toBe('terminated');
    });

    it('refuses a second run', async () => {
      const agent = newAgent(createMockClient());
      await agent.run('task', 1);

      await expect(agent.run('again', 1)).rejects.toThrow(AgentStateError);
    });

    it('refuses new tools once the run has started', async () => {
      const agent = newAgent(createMockClient());
      await agent.run('task', 1);

      expect(() => agent.addTools([echoTool])).toThrow(AgentStateError);
    });
  });
});
