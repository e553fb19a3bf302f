// User Profile Tool
// Public profile and solved counts of a LeetCode user

import { z } from 'zod';
import { NO_USERNAME_ERROR, defineTool, fromDataResult, resolveUsername } from './define.js';

export const userProfileTool = defineTool({
  name: 'user_profile',
  description: 'Get LeetCode user profile information',
  parameters: [
    {
      name: 'username',
      type: 'string',
      description: 'LeetCode username (optional if default user is set)',
      required: false,
    },
  ],
  argsSchema: z.object({
    username: z.string().trim().optional(),
  }),
  execute: async (args, context) => {
    const username = resolveUsername(args.username, context);
    if (!username) {
      return { ok: false, error: NO_USERNAME_ERROR };
    }
    return fromDataResult(await context.client.userProfile(username));
  },
});
