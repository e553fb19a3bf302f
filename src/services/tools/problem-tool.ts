// Problem Tool
// Details of a single LeetCode problem, looked up by its slug

import { z } from 'zod';
import { defineTool, fromDataResult } from './define.js';

export const problemTool = defineTool({
  name: 'problem',
  description: 'Get details about a specific LeetCode problem',
  parameters: [
    {
      name: 'title_slug',
      type: 'string',
      description: "The problem slug (e.g., 'two-sum', 'add-two-numbers')",
      required: true,
    },
  ],
  argsSchema: z.object({
    title_slug: z.string().trim().min(1),
  }),
  execute: async ({ title_slug }, { client }) => fromDataResult(await client.problem(title_slug)),
});
