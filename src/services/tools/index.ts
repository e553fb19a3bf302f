// Tool System
// One handler per ToolName; a name without a handler does not compile

import { ToolRegistry } from './registry.js';
import { TOOL_NAMES, type ToolDefinition, type ToolName } from './types.js';
import { dailyChallengeTool } from './daily-challenge-tool.js';
import { problemTool } from './problem-tool.js';
import { searchProblemsTool } from './search-problems-tool.js';
import { userProfileTool } from './user-profile-tool.js';
import { recentSubmissionsTool } from './recent-submissions-tool.js';

export const TOOL_TABLE: { readonly [K in ToolName]: ToolDefinition<K> } = {
  daily_challenge: dailyChallengeTool,
  problem: problemTool,
  search_problems: searchProblemsTool,
  user_profile: userProfileTool,
  recent_submissions: recentSubmissionsTool,
};

export const toolRegistry = new ToolRegistry(TOOL_NAMES.map(name => TOOL_TABLE[name]));

export { ToolRegistry } from './registry.js';
export type { OpenAIFunctionDef } from './registry.js';
export { NO_USERNAME_ERROR } from './define.js';
export { TOOL_NAMES, isToolName } from './types.js';
export type { ToolContext, ToolDefinition, ToolName, ToolOutcome, ToolParameter } from './types.js';
