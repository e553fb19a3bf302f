// Tool definition helper
// Binds a zod argument schema to a tool so handlers only ever see validated, defaulted arguments

import type { z } from 'zod';
import type { DataResult } from '../leetcode/types.js';
import type { ToolContext, ToolDefinition, ToolName, ToolOutcome, ToolParameter } from './types.js';

export const NO_USERNAME_ERROR = 'no username available';

interface ToolConfig<N extends ToolName, S extends z.ZodTypeAny> {
  name: N;
  description: string;
  parameters: ToolParameter[];
  argsSchema: S;
  execute: (args: z.infer<S>, context: ToolContext) => Promise<ToolOutcome>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function defineTool<N extends ToolName, S extends z.ZodTypeAny>(config: ToolConfig<N, S>): ToolDefinition<N> {
  return {
    name: config.name,
    description: config.description,
    parameters: config.parameters,
    run: async (args, context) => {
      const parsed = config.argsSchema.safeParse(args);
      if (!parsed.success) {
        return { ok: false, error: `invalid arguments: ${formatIssues(parsed.error)}` };
      }
      return config.execute(parsed.data, context);
    },
  };
}

/** Explicit username first, then the configured default identity. */
export function resolveUsername(explicit: string | undefined, context: ToolContext): string | undefined {
  return explicit || context.defaultUsername || undefined;
}

export function fromDataResult<T>(result: DataResult<T>): ToolOutcome {
  return result.ok ? { ok: true, data: result.data } : { ok: false, error: result.error };
}
