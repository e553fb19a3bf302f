import { describe, it, expect } from 'vitest';
import { CATEGORY_REPLIES, classifyFallback, respondWithFallback } from '../index.js';

describe('Fallback Responder', () => {
  describe('Greeting triggers', () => {
    it('should answer hello', () => {
      expect(respondWithFallback('hello')).toBe(
        "Hello! I'm your voice assistant. I can help with LeetCode problems and general questions!",
      );
    });

    it('should match case-insensitively after trimming', () => {
      expect(respondWithFallback('  GOODBYE  ')).toBe('Goodbye! It was nice talking with you.');
    });

    it('should use the first trigger in declared order', () => {
      // "hi" is declared before "thanks"
      expect(respondWithFallback('thanks hi')).toBe('Hi there! Ask me about LeetCode problems or any other questions!');
    });

    it('should prefer "thank you" over "thanks"', () => {
      expect(respondWithFallback('thank you so much')).toBe(
        "You're welcome! Is there anything else I can help you with?",
      );
    });

    it('should report which trigger matched', () => {
      expect(classifyFallback('how are you').decision).toEqual({ kind: 'trigger', trigger: 'how are you' });
    });
  });

  describe('Categories', () => {
    it('should classify questions', () => {
      const result = classifyFallback('Why does my code fail?');

      expect(result.decision).toEqual({ kind: 'category', category: 'QUESTION' });
      expect(result.reply).toBe(CATEGORY_REPLIES.QUESTION);
    });

    it('should classify arithmetic requests', () => {
      expect(classifyFallback('calculate 2 plus 2').decision).toEqual({ kind: 'category', category: 'ARITHMETIC' });
    });

    it('should answer anything else with the generic reply', () => {
      expect(respondWithFallback('tell me a joke')).toBe(
        "I'm sorry, I need my AI capabilities to answer that properly. Please check your OpenAI API configuration.",
      );
    });
  });

  it('should be deterministic', () => {
    expect(respondWithFallback('where is the daily challenge')).toBe(respondWithFallback('where is the daily challenge'));
  });
});
