// Dispatcher Module - Main exports

export { ToolCallingDispatcher } from './dispatcher.js';
export type { ToolCallingDispatcherOptions } from './dispatcher.js';
export { ToolExecutor, parseToolArguments } from './executor.js';
export type { ToolExecutorOptions } from './executor.js';
export { DECIDE_SYSTEM_PROMPT, SYNTHESIZE_SYSTEM_PROMPT } from './prompts.js';
export {
  DispatchError,
  ABORTED_ERROR,
  TIMEOUT_ERROR,
  UNKNOWN_TOOL_ERROR,
  serializeToolResult,
  toToolPayload,
} from './types.js';
export type { DispatchOptions, DispatchOutcome, DispatcherPhase, DispatcherSettings, ToolResult } from './types.js';
