/**
 * steploop library entry.
 * Embedders build an agent from a client, instructions and tools, then call `run`.
 */

export * from './core/index.js';
export * from './schema/index.js';
export * from './llm/index.js';
export * from './environment/index.js';
export { generateJSON, generateMarkdown, serializeJSON } from './report/index.js';
export * from './config/index.js';
export {
  AgentError,
  AgentStateError,
  LedgerError,
  ProtocolError,
  RegistryError,
  ShellCommandError,
  formatError,
} from './utils/errors.js';
export type { LedgerErrorCode, ProtocolErrorKind } from './utils/errors.js';
