// Answer Route
// POST /v1/answer - Answer one question about LeetCode

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { QuestionAnswerer } from '../services/orchestrator/index.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const AnswerRequestSchema = z.object({
  question: z.string({ required_error: 'question is required' }),
});

export interface AnswerRoutesOptions {
  answerer: QuestionAnswerer;
}

export const answerRoutes: FastifyPluginAsync<AnswerRoutesOptions> = async (server, options) => {
  const { answerer } = options;

  server.post('/answer', async (request, reply) => {
    const parsed = AnswerRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      return reply.code(400).send(formatErrorResponse(AppError.validationError(message)));
    }

    const result = await answerer.answerWithDetails(parsed.data.question);
    return { answer: result.text, source: result.source };
  });
};
