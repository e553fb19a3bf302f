// LeetCode Data Client - Main exports

export { LeetCodeClient, htmlToPlainText } from './client.js';
export type { LeetCodeClientOptions } from './client.js';
export type {
  DataClient,
  DataResult,
  Difficulty,
  DailyChallenge,
  ProblemDetail,
  ProblemSearchResult,
  ProblemSummary,
  RecentSubmissions,
  Submission,
  TopicTag,
  UserProfile,
} from './types.js';
