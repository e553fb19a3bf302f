// Tool system types and interfaces
// Defines the schema and interfaces for the LeetCode tools advertised to the reasoning service

import type { DataClient } from '../leetcode/types.js';

// Declared order is the order advertised to the reasoning service
export const TOOL_NAMES = [
  'daily_challenge',
  'problem',
  'search_problems',
  'user_profile',
  'recent_submissions',
] as const;

export type ToolName = typeof TOOL_NAMES[number];

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: string | number | boolean;
}

export interface ToolContext {
  client: DataClient;
  defaultUsername?: string;
}

export type ToolOutcome =
  | { ok: true; data: unknown }
  | { ok: false; error: string };

export interface ToolDefinition<N extends ToolName = ToolName> {
  name: N;
  description: string;
  parameters: ToolParameter[];
  /** Validates raw arguments, applies declared defaults and calls the Data Client. */
  run: (args: unknown, context: ToolContext) => Promise<ToolOutcome>;
}

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some(name => name === value);
}
