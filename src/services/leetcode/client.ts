/**
 * LeetCode GraphQL client
 * Implements the DataClient operations against the public GraphQL endpoint.
 * Failures of any kind come back as `{ ok: false, error }`.
 */

import { z } from 'zod';
import { env } from '../../env.js';
import { logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import {
  DAILY_CHALLENGE_QUERY,
  PROBLEM_QUERY,
  RECENT_SUBMISSIONS_QUERY,
  SEARCH_PROBLEMS_QUERY,
  USER_PROFILE_QUERY,
} from './queries.js';
import type {
  DailyChallenge,
  DataClient,
  DataResult,
  Difficulty,
  ProblemDetail,
  ProblemSearchResult,
  RecentSubmissions,
  UserProfile,
} from './types.js';

const log = logger.child({ component: 'leetcode' });

const MAX_CONTENT_CHARS = 1500;

const TopicTagSchema = z.object({
  name: z.string(),
  slug: z.string(),
});

const GraphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

const DailyChallengeDataSchema = z.object({
  activeDailyCodingChallengeQuestion: z
    .object({
      date: z.string(),
      link: z.string(),
      question: z.object({
        title: z.string(),
        titleSlug: z.string(),
        difficulty: z.string(),
      }),
    })
    .nullable(),
});

const ProblemDataSchema = z.object({
  question: z
    .object({
      questionId: z.string(),
      questionFrontendId: z.string(),
      title: z.string(),
      titleSlug: z.string(),
      content: z.string().nullable(),
      difficulty: z.string(),
      likes: z.number(),
      dislikes: z.number(),
      topicTags: z.array(TopicTagSchema),
    })
    .nullable(),
});

const SearchDataSchema = z.object({
  problemsetQuestionList: z
    .object({
      total: z.number(),
      questions: z.array(
        z.object({
          acRate: z.number(),
          difficulty: z.string(),
          frontendQuestionId: z.string(),
          paidOnly: z.boolean(),
          title: z.string(),
          titleSlug: z.string(),
          topicTags: z.array(TopicTagSchema),
        }),
      ),
    })
    .nullable(),
});

const UserProfileDataSchema = z.object({
  matchedUser: z
    .object({
      username: z.string(),
      profile: z.object({
        realName: z.string().nullable(),
        ranking: z.number().nullable(),
        reputation: z.number().nullable(),
        countryName: z.string().nullable(),
        company: z.string().nullable(),
        school: z.string().nullable(),
      }),
      submitStats: z.object({
        acSubmissionNum: z.array(
          z.object({
            difficulty: z.string(),
            count: z.number(),
            submissions: z.number(),
          }),
        ),
      }),
    })
    .nullable(),
});

const RecentSubmissionsDataSchema = z.object({
  recentSubmissionList: z
    .array(
      z.object({
        title: z.string(),
        titleSlug: z.string(),
        timestamp: z.string(),
        statusDisplay: z.string(),
        lang: z.string(),
      }),
    )
    .nullable(),
});

const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&amp;': '&',
};

/** Reduce problem HTML to speakable plain text. */
export function htmlToPlainText(html: string, maxChars = MAX_CONTENT_CHARS): string {
  const text = html
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;|&lt;|&gt;|&quot;|&#39;|&amp;/g, entity => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();

  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars).trimEnd()}...`;
}

export interface LeetCodeClientOptions {
  endpoint?: string;
  session?: string;
  timeoutMs?: number;
}

export class LeetCodeClient implements DataClient {
  private endpoint: string;
  private origin: string;
  private session: string;
  private timeoutMs: number;

  constructor(options: LeetCodeClientOptions = {}) {
    this.endpoint = options.endpoint ?? env.LEETCODE_GRAPHQL_URL;
    this.origin = new URL(this.endpoint).origin;
    this.session = options.session ?? env.LEETCODE_SESSION;
    this.timeoutMs = options.timeoutMs ?? env.LEETCODE_TIMEOUT_MS;
  }

  async dailyChallenge(): Promise<DataResult<DailyChallenge>> {
    const result = await this.query(DAILY_CHALLENGE_QUERY, {}, DailyChallengeDataSchema);
    if (!result.ok) return result;

    const challenge = result.data.activeDailyCodingChallengeQuestion;
    if (!challenge) {
      return { ok: false, error: 'Daily challenge not found' };
    }

    return {
      ok: true,
      data: {
        questionTitle: challenge.question.title,
        difficulty: challenge.question.difficulty,
        titleSlug: challenge.question.titleSlug,
        date: challenge.date,
        link: `${this.origin}${challenge.link}`,
      },
    };
  }

  async problem(titleSlug: string): Promise<DataResult<ProblemDetail>> {
    const result = await this.query(PROBLEM_QUERY, { titleSlug }, ProblemDataSchema);
    if (!result.ok) return result;

    const question = result.data.question;
    if (!question) {
      return { ok: false, error: `Problem "${titleSlug}" not found` };
    }

    return {
      ok: true,
      data: {
        ...question,
        content: question.content ? htmlToPlainText(question.content) : '',
      },
    };
  }

  async search(keywords: string, difficulty: Difficulty | undefined, limit: number): Promise<DataResult<ProblemSearchResult>> {
    const filters: Record<string, string> = {};
    if (difficulty) filters.difficulty = difficulty.toUpperCase();
    if (keywords) filters.searchKeywords = keywords;

    const result = await this.query(
      SEARCH_PROBLEMS_QUERY,
      { categorySlug: '', limit, skip: 0, filters },
      SearchDataSchema,
    );
    if (!result.ok) return result;

    const list = result.data.problemsetQuestionList;
    if (!list) {
      return { ok: false, error: 'No problems found' };
    }

    return { ok: true, data: list };
  }

  async userProfile(username: string): Promise<DataResult<UserProfile>> {
    const result = await this.query(USER_PROFILE_QUERY, { username }, UserProfileDataSchema);
    if (!result.ok) return result;

    const user = result.data.matchedUser;
    if (!user) {
      return { ok: false, error: `User "${username}" not found` };
    }

    return { ok: true, data: user };
  }

  async recentSubmissions(username: string, limit: number): Promise<DataResult<RecentSubmissions>> {
    const result = await this.query(RECENT_SUBMISSIONS_QUERY, { username, limit }, RecentSubmissionsDataSchema);
    if (!result.ok) return result;

    const submissions = result.data.recentSubmissionList;
    if (!submissions) {
      return { ok: false, error: `User "${username}" not found` };
    }

    return { ok: true, data: { username, submissions } };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Referer': `${this.origin}/`,
      'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36',
    };

    if (this.session) {
      headers['Cookie'] = `LEETCODE_SESSION=${this.session}`;
    }

    return headers;
  }

  private async query<S extends z.ZodTypeAny>(
    query: string,
    variables: Record<string, unknown>,
    schema: S,
  ): Promise<DataResult<z.infer<S>>> {
    const start = Date.now();

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify({ query, variables }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        log.warn({ status: response.status }, 'LeetCode request failed');
        return { ok: false, error: `LeetCode API error (${response.status})` };
      }

      const envelope = GraphQLEnvelopeSchema.parse(await response.json());
      if (envelope.errors && envelope.errors.length > 0) {
        return { ok: false, error: envelope.errors.map(e => e.message).join('; ') };
      }

      const parsed = schema.safeParse(envelope.data);
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues }, 'Unexpected LeetCode response shape');
        return { ok: false, error: 'Unexpected LeetCode response shape' };
      }

      log.debug({ durationMs: Date.now() - start }, 'LeetCode request completed');
      return { ok: true, data: parsed.data };
    } catch (error) {
      log.warn({ err: error }, 'LeetCode request error');
      return { ok: false, error: errorMessage(error) };
    }
  }
}
