// Fallback Responder Entry Point
// Normalizes the question, then applies the ordered rules

import type { FallbackResult } from './types.js';
import { applyFallbackRules, replyFor } from './rules.js';

export function classifyFallback(question: string): FallbackResult {
  const text = question.toLowerCase().trim();
  const decision = applyFallbackRules(text);
  return { decision, reply: replyFor(decision) };
}

export function respondWithFallback(question: string): string {
  return classifyFallback(question).reply;
}

// Re-export types for convenience
export { FALLBACK_TRIGGERS, CATEGORY_REPLIES } from './rules.js';
export type { FallbackCategory, FallbackDecision, FallbackResult, FallbackTrigger } from './types.js';
