// Recent Submissions Tool
// Latest submissions of a LeetCode user

import { z } from 'zod';
import { NO_USERNAME_ERROR, defineTool, fromDataResult, resolveUsername } from './define.js';

export const recentSubmissionsTool = defineTool({
  name: 'recent_submissions',
  description: "Get user's recent LeetCode submissions",
  parameters: [
    {
      name: 'username',
      type: 'string',
      description: 'LeetCode username (optional if default user is set)',
      required: false,
    },
    {
      name: 'limit',
      type: 'number',
      description: 'Number of submissions to return',
      required: false,
      default: 10,
    },
  ],
  argsSchema: z.object({
    username: z.string().trim().optional(),
    limit: z.coerce.number().int().min(1).max(50).default(10),
  }),
  execute: async (args, context) => {
    const username = resolveUsername(args.username, context);
    if (!username) {
      return { ok: false, error: NO_USERNAME_ERROR };
    }
    return fromDataResult(await context.client.recentSubmissions(username, args.limit));
  },
});
