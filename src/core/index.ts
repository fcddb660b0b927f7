/**
 * Core orchestration module.
 * Ledger → prompt → model → decoder → registry → ledger, one call per step.
 * Pure logic; no file system or process access.
 */

export { createMessageLedger, renderMessage } from './ledger.js';
export type { MessageLedger } from './ledger.js';
export { createToolRegistry, checkArguments, describeTool } from './registry.js';
export type { ToolArguments, ToolDescriptor, ToolParameter, ToolRegistry } from './registry.js';
export {
  decodeCall,
  encodeCall,
  renderResponseFormat,
  resolveMarkers,
  stopSequence,
} from './protocol.js';
export { createAgent, createFinishTool, FINISH_TOOL_NAME } from './agentLoop.js';
export type {
  Agent,
  AgentConfig,
  AgentRunResult,
  AgentState,
  FinishGuard,
} from './agentLoop.js';
