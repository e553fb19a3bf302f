// Fallback rules
// Triggers are scanned in declared order and the first contained phrase wins,
// so "thanks hi" answers with the "hi" reply

import type { FallbackCategory, FallbackDecision, FallbackTrigger } from './types.js';

export const FALLBACK_TRIGGERS: readonly FallbackTrigger[] = [
  { phrase: 'hello', reply: "Hello! I'm your voice assistant. I can help with LeetCode problems and general questions!" },
  { phrase: 'hi', reply: 'Hi there! Ask me about LeetCode problems or any other questions!' },
  { phrase: 'how are you', reply: "I'm doing great! Ready to help with LeetCode or other questions. How can I assist you?" },
  { phrase: 'what is your name', reply: "I'm your voice assistant powered by AI with LeetCode integration." },
  { phrase: 'goodbye', reply: 'Goodbye! It was nice talking with you.' },
  { phrase: 'bye', reply: 'Bye! Have a great day!' },
  { phrase: 'thank you', reply: "You're welcome! Is there anything else I can help you with?" },
  { phrase: 'thanks', reply: "You're welcome!" },
];

const QUESTION_WORDS = ['what', 'how', 'why', 'when', 'where', 'who'];
const ARITHMETIC_WORDS = ['calculate', 'math', 'plus', 'minus'];

export const CATEGORY_REPLIES: Record<FallbackCategory, string> = {
  QUESTION: "That's an interesting question! I'd recommend checking reliable sources for detailed information on this topic.",
  ARITHMETIC: "I can help with basic math, but I'd need my full capabilities for complex calculations.",
  OTHER: "I'm sorry, I need my AI capabilities to answer that properly. Please check your OpenAI API configuration.",
};

function selectCategory(text: string): FallbackCategory {
  if (QUESTION_WORDS.some(word => text.includes(word))) return 'QUESTION';
  if (ARITHMETIC_WORDS.some(word => text.includes(word))) return 'ARITHMETIC';
  return 'OTHER';
}

export function applyFallbackRules(text: string): FallbackDecision {
  const trigger = FALLBACK_TRIGGERS.find(t => text.includes(t.phrase));
  if (trigger) {
    return { kind: 'trigger', trigger: trigger.phrase };
  }
  return { kind: 'category', category: selectCategory(text) };
}

export function replyFor(decision: FallbackDecision): string {
  if (decision.kind === 'category') {
    return CATEGORY_REPLIES[decision.category];
  }
  const trigger = FALLBACK_TRIGGERS.find(t => t.phrase === decision.trigger);
  return trigger ? trigger.reply : CATEGORY_REPLIES.OTHER;
}
