// Daily Challenge Tool
// Today's LeetCode daily challenge problem

import { z } from 'zod';
import { defineTool, fromDataResult } from './define.js';

export const dailyChallengeTool = defineTool({
  name: 'daily_challenge',
  description: "Get today's LeetCode daily challenge problem",
  parameters: [],
  argsSchema: z.object({}),
  execute: async (_args, { client }) => fromDataResult(await client.dailyChallenge()),
});
