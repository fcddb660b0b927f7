import { ZodError } from 'zod';

// ── Base error ───────────────────────────────────────────────

export class AgentError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'AgentError';
  }
}

// ── Programmer-contract violations ──────────────────────────

export type LedgerErrorCode = 'UNKNOWN_MESSAGE' | 'NOT_A_SLOT';

export class LedgerError extends AgentError {
  declare readonly code: LedgerErrorCode;

  constructor(message: string, code: LedgerErrorCode) {
    super(message, code);
    this.name = 'LedgerError';
  }
}

export class RegistryError extends AgentError {
  constructor(message: string) {
    super(message, 'UNKNOWN_TOOL');
    this.name = 'RegistryError';
  }
}

export class AgentStateError extends AgentError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'AgentStateError';
  }
}

// ── Formatting ───────────────────────────────────────────────

/**
 * Render any thrown value as one readable message.
 * Zod issues are flattened to `path: message` pairs.
 */
export function formatError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
        return `${where}: ${issue.message}`;
      })
      .join('; ');
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

// ── Protocol ─────────────────────────────────────────────────

export type ProtocolErrorKind =
  | 'missing_end'
  | 'missing_begin'
  | 'malformed_block'
  | 'missing_name';

const PROTOCOL_MESSAGES: Record<ProtocolErrorKind, string> = {
  missing_end: 'END function call marker not found',
  missing_begin: 'BEGIN function call marker not found before the END marker',
  malformed_block: 'Malformed function call block: ARG marker without a matching VALUE marker',
  missing_name: 'Function name not found in function call block',
};

export class ProtocolError extends AgentError {
  readonly kind: ProtocolErrorKind;

  constructor(kind: ProtocolErrorKind) {
    super(PROTOCOL_MESSAGES[kind], 'PROTOCOL_ERROR');
    this.kind = kind;
    this.name = 'ProtocolError';
  }
}

// ── Environment ──────────────────────────────────────────────

export class ShellCommandError extends AgentError {
  readonly command: string;
  readonly exitCode: number;
  readonly output: string;

  constructor(command: string, exitCode: number, output: string) {
    super(`Command exited with code ${String(exitCode)}\n${output}`, 'COMMAND_FAILED');
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
    this.name = 'ShellCommandError';
  }
}
