// Question Answering Orchestrator
// Top-level entry point: always returns non-empty text, whatever fails downstream

import { env } from '../../env.js';
import { logger } from '../../logger.js';
import { getReasoningProvider } from '../../providers/index.js';
import { TimeoutError, withTimeout } from '../../utils/timeout.js';
import { ToolCallingDispatcher, ToolExecutor } from '../dispatcher/index.js';
import { respondWithFallback } from '../fallback/index.js';
import { LeetCodeClient, type DataClient } from '../leetcode/index.js';
import { toolRegistry } from '../tools/index.js';
import type { AnswerDetails, QuestionAnswererOptions, Responder } from './types.js';

const log = logger.child({ component: 'answerer' });

export const EMPTY_QUESTION_REPLY = "I didn't hear anything. Could you please repeat your question?";

export class QuestionAnswerer {
  private responder: Responder;
  private timeoutMs: number;

  constructor(responder: Responder, options: QuestionAnswererOptions = {}) {
    this.responder = responder;
    this.timeoutMs = options.timeoutMs ?? 45000;
  }

  get mode(): Responder['kind'] {
    return this.responder.kind;
  }

  async answer(question: string): Promise<string> {
    const { text } = await this.answerWithDetails(question);
    return text;
  }

  async answerWithDetails(question: string): Promise<AnswerDetails> {
    const trimmed = question.trim();
    if (!trimmed) {
      return { text: EMPTY_QUESTION_REPLY, source: 'input' };
    }

    if (this.responder.kind === 'fallback-only') {
      return this.fallback(trimmed);
    }

    const controller = new AbortController();
    try {
      const outcome = await withTimeout(
        this.responder.dispatcher.dispatch(trimmed, { signal: controller.signal }),
        this.timeoutMs,
        () => controller.abort(),
      );

      if (!outcome.text) {
        log.warn({ phases: outcome.phases }, 'Dispatcher returned an empty answer, using fallback');
        return this.fallback(trimmed);
      }

      log.info({ roundTrips: outcome.roundTrips, tools: outcome.toolResults.length }, 'Answered with dispatcher');
      return { text: outcome.text, source: 'dispatcher' };
    } catch (error) {
      if (error instanceof TimeoutError) {
        log.warn({ timeoutMs: this.timeoutMs }, 'Answer timed out, using fallback');
      } else {
        log.warn({ err: error }, 'Dispatcher failed, using fallback');
      }
      return this.fallback(trimmed);
    }
  }

  private fallback(question: string): AnswerDetails {
    return { text: respondWithFallback(question).trim(), source: 'fallback' };
  }
}

export interface CreateQuestionAnswererOptions {
  client?: DataClient;
}

/** Wires the answerer from configuration; no reasoning credentials means fallback only. */
export function createQuestionAnswerer(options: CreateQuestionAnswererOptions = {}): QuestionAnswerer {
  const provider = getReasoningProvider();
  const answererOptions = { timeoutMs: env.ANSWER_TIMEOUT_MS };

  if (!provider) {
    log.warn('No reasoning service configured, answering with fallback responses');
    return new QuestionAnswerer({ kind: 'fallback-only' }, answererOptions);
  }

  const executor = new ToolExecutor({
    registry: toolRegistry,
    client: options.client ?? new LeetCodeClient(),
    defaultUsername: env.LEETCODE_USERNAME,
    timeoutMs: env.TOOL_TIMEOUT_MS,
  });

  const dispatcher = new ToolCallingDispatcher({
    provider,
    registry: toolRegistry,
    executor,
    settings: {
      model: env.OPENAI_MODEL,
      maxTokens: env.REASONING_MAX_TOKENS,
      temperature: env.REASONING_TEMPERATURE,
    },
  });

  return new QuestionAnswerer({ kind: 'dispatcher', dispatcher }, answererOptions);
}
