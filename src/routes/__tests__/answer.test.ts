import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../app.js';
import { QuestionAnswerer } from '../../services/orchestrator/index.js';
import { toolRegistry } from '../../services/tools/index.js';

describe('Answer Routes', () => {
  let app: FastifyInstance;
  const answerer = new QuestionAnswerer({ kind: 'fallback-only' });

  beforeAll(async () => {
    app = await buildServer({ answerer });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('POST /v1/answer', () => {
    it('should answer a question', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/answer',
        payload: { question: 'goodbye' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ answer: 'Goodbye! It was nice talking with you.', source: 'fallback' });
    });

    it('should answer an empty question without a downstream attempt', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/answer',
        payload: { question: '   ' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        answer: "I didn't hear anything. Could you please repeat your question?",
        source: 'input',
      });
    });

    it('should pass the question to the answerer', async () => {
      const spy = vi.spyOn(answerer, 'answerWithDetails').mockResolvedValue({ text: 'stubbed', source: 'dispatcher' });

      const response = await app.inject({
        method: 'POST',
        url: '/v1/answer',
        payload: { question: 'what is two sum' },
      });

      expect(response.json()).toEqual({ answer: 'stubbed', source: 'dispatcher' });
      expect(spy).toHaveBeenCalledWith('what is two sum');
    });

    it('should reject a body without a question', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/answer',
        payload: { text: 'hello' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'validation_error',
        message: 'question: question is required',
        statusCode: 400,
      });
    });

    it('should reject a non-string question', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/answer',
        payload: { question: 42 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'validation_error',
        message: 'question: Expected string, received number',
        statusCode: 400,
      });
    });
  });

  describe('GET /v1/tools', () => {
    it('should list the advertised tools in order', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/tools' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ tools: toolRegistry.toOpenAIFunctions() });
    });
  });

  describe('GET /v1/health', () => {
    it('should report status', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', version: '1.0.0' });
    });
  });
});
