// Search Problems Tool
// Keyword and difficulty search over the LeetCode problem set

import { z } from 'zod';
import { defineTool, fromDataResult } from './define.js';

const DIFFICULTIES = ['EASY', 'MEDIUM', 'HARD'] as const;

export const searchProblemsTool = defineTool({
  name: 'search_problems',
  description: 'Search for LeetCode problems by keywords, tags, or difficulty',
  parameters: [
    {
      name: 'keywords',
      type: 'string',
      description: 'Search keywords',
      required: false,
    },
    {
      name: 'difficulty',
      type: 'string',
      description: 'Problem difficulty level',
      required: false,
      enum: [...DIFFICULTIES],
    },
    {
      name: 'limit',
      type: 'number',
      description: 'Number of results to return',
      required: false,
      default: 5,
    },
  ],
  argsSchema: z.object({
    keywords: z.string().trim().default(''),
    // Models tend to send "Easy" or an empty string for "any"
    difficulty: z.preprocess(
      value => (value === '' || value === null ? undefined : typeof value === 'string' ? value.toUpperCase() : value),
      z.enum(DIFFICULTIES).optional(),
    ),
    limit: z.coerce.number().int().min(1).max(50).default(5),
  }),
  execute: async ({ keywords, difficulty, limit }, { client }) =>
    fromDataResult(await client.search(keywords, difficulty, limit)),
});
