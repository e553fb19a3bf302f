// Orchestrator Types

import type { DispatchOptions, DispatchOutcome } from '../dispatcher/index.js';

export interface Dispatcher {
  dispatch(question: string, options?: DispatchOptions): Promise<DispatchOutcome>;
}

// Chosen once at construction: with no reasoning service there is nothing to dispatch to
export type Responder =
  | { kind: 'dispatcher'; dispatcher: Dispatcher }
  | { kind: 'fallback-only' };

export type AnswerSource = 'dispatcher' | 'fallback' | 'input';

export interface AnswerDetails {
  text: string;
  source: AnswerSource;
}

export interface QuestionAnswererOptions {
  timeoutMs?: number; // Caller-level bound on one dispatcher attempt
}
