import { RegistryError } from '../utils/errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ToolParameter {
  name: string;
  description: string;
  optional?: boolean;
}

export type ToolArguments = Readonly<Record<string, string>>;

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: readonly ToolParameter[];
  invoke(args: ToolArguments): string | Promise<string>;
}

export interface ToolRegistry {
  register(tools: readonly ToolDescriptor[]): void;
  lookup(name: string): ToolDescriptor | undefined;
  /** Failures thrown by the tool propagate as-is. */
  invoke(name: string, args: ToolArguments): Promise<string>;
  describe(): string;
  names(): string[];
}

// ── Catalog rendering ────────────────────────────────────────

function formatSignature(tool: ToolDescriptor): string {
  const params = tool.parameters
    .map((p) => (p.optional ? `${p.name}?` : p.name))
    .join(', ');
  return `${tool.name}(${params})`;
}

export function describeTool(tool: ToolDescriptor): string {
  const lines = [`Function: ${formatSignature(tool)}`, tool.description];
  for (const param of tool.parameters) {
    const flag = param.optional ? ' (optional)' : '';
    lines.push(`  - ${param.name}${flag}: ${param.description}`);
  }
  return lines.join('\n') + '\n';
}

// ── Argument check ───────────────────────────────────────────

/**
 * Compare decoded argument names against the declared parameters.
 * Returns one line per problem; empty when the call matches.
 */
export function checkArguments(tool: ToolDescriptor, args: ToolArguments): string[] {
  const problems: string[] = [];
  const declared = new Set(tool.parameters.map((p) => p.name));

  for (const name of Object.keys(args)) {
    if (!declared.has(name)) {
      problems.push(`unexpected argument "${name}"`);
    }
  }
  for (const param of tool.parameters) {
    if (!param.optional && !Object.hasOwn(args, param.name)) {
      problems.push(`missing required argument "${param.name}"`);
    }
  }

  return problems;
}

// ── Factory ──────────────────────────────────────────────────

export function createToolRegistry(): ToolRegistry {
  // Map keeps first-insertion order, so overwriting a name keeps its slot.
  const tools = new Map<string, ToolDescriptor>();

  return {
    register(list) {
      for (const tool of list) {
        tools.set(tool.name, tool);
      }
    },

    lookup(name) {
      return tools.get(name);
    },

    async invoke(name, args) {
      const tool = tools.get(name);
      if (!tool) {
        throw new RegistryError(`No tool registered under "${name}"`);
      }
      return tool.invoke(args);
    },

    describe() {
      return [...tools.values()].map(describeTool).join('\n');
    },

    names() {
      return [...tools.keys()];
    },
  };
}
