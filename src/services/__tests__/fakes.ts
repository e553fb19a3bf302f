// In-process stand-ins for the LeetCode API and the reasoning service

import { vi } from 'vitest';
import type { DataClient, DailyChallenge, ProblemDetail, UserProfile } from '../leetcode/types.js';
import type { ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from '../../providers/types.js';

export const TWO_SUM: ProblemDetail = {
  questionId: '1',
  questionFrontendId: '1',
  title: 'Two Sum',
  titleSlug: 'two-sum',
  difficulty: 'Easy',
  likes: 100,
  dislikes: 3,
  topicTags: [{ name: 'Array', slug: 'array' }],
  content: 'Given an array of integers nums and an integer target, return indices of the two numbers.',
};

export const DAILY: DailyChallenge = {
  questionTitle: 'Valid Parentheses',
  difficulty: 'Easy',
  titleSlug: 'valid-parentheses',
  date: '2026-10-19',
  link: 'https://leetcode.com/problems/valid-parentheses/',
};

export function profileOf(username: string): UserProfile {
  return {
    username,
    profile: {
      realName: null,
      ranking: 1234,
      reputation: 5,
      countryName: null,
      company: null,
      school: null,
    },
    submitStats: {
      acSubmissionNum: [{ difficulty: 'All', count: 42, submissions: 60 }],
    },
  };
}

export function createFakeClient() {
  return {
    dailyChallenge: vi.fn<DataClient['dailyChallenge']>(async () => ({ ok: true, data: DAILY })),
    problem: vi.fn<DataClient['problem']>(async slug =>
      slug === TWO_SUM.titleSlug
        ? { ok: true, data: TWO_SUM }
        : { ok: false, error: `Problem "${slug}" not found` },
    ),
    search: vi.fn<DataClient['search']>(async () => ({ ok: true, data: { total: 0, questions: [] } })),
    userProfile: vi.fn<DataClient['userProfile']>(async username => ({ ok: true, data: profileOf(username) })),
    recentSubmissions: vi.fn<DataClient['recentSubmissions']>(async username => ({
      ok: true,
      data: { username, submissions: [] },
    })),
  } satisfies DataClient;
}

export type FakeClient = ReturnType<typeof createFakeClient>;

const USAGE = { promptTokens: 10, completionTokens: 5, totalTokens: 15 };

export function textResponse(content: string): ProviderResponse {
  return { type: 'text', content, usage: USAGE };
}

export function toolCallsResponse(toolCalls: ToolCall[], content: string = ''): ProviderResponse {
  return { type: 'tool_calls', content, toolCalls, usage: USAGE };
}

export interface RecordedCall {
  messages: ProviderMessage[];
  options: ProviderOptions;
}

/** Replays the given responses in order; an Error entry is thrown instead of returned. */
export function createScriptedProvider(script: Array<ProviderResponse | Error>) {
  const queue = [...script];
  const calls: RecordedCall[] = [];

  const sendChat = vi.fn(async (messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> => {
    calls.push({ messages: messages.map(m => ({ ...m })), options });
    const next = queue.shift();
    if (!next) {
      throw new Error('no scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });

  return { provider: { name: 'scripted', sendChat }, calls };
}
