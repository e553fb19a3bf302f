// LeetCode Data Client types
// Every operation resolves to a DataResult and never rejects

export type Difficulty = 'EASY' | 'MEDIUM' | 'HARD';

export type DataResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

export interface TopicTag {
  name: string;
  slug: string;
}

export interface DailyChallenge {
  questionTitle: string;
  difficulty: string;
  titleSlug: string;
  date: string;
  link: string;
}

export interface ProblemDetail {
  questionId: string;
  questionFrontendId: string;
  title: string;
  titleSlug: string;
  difficulty: string;
  likes: number;
  dislikes: number;
  topicTags: TopicTag[];
  content: string; // Plain text, truncated
}

export interface ProblemSummary {
  frontendQuestionId: string;
  title: string;
  titleSlug: string;
  difficulty: string;
  acRate: number;
  paidOnly: boolean;
  topicTags: TopicTag[];
}

export interface ProblemSearchResult {
  total: number;
  questions: ProblemSummary[];
}

export interface SubmissionCount {
  difficulty: string;
  count: number;
  submissions: number;
}

export interface UserProfile {
  username: string;
  profile: {
    realName: string | null;
    ranking: number | null;
    reputation: number | null;
    countryName: string | null;
    company: string | null;
    school: string | null;
  };
  submitStats: {
    acSubmissionNum: SubmissionCount[];
  };
}

export interface Submission {
  title: string;
  titleSlug: string;
  timestamp: string;
  statusDisplay: string;
  lang: string;
}

export interface RecentSubmissions {
  username: string;
  submissions: Submission[];
}

export interface DataClient {
  dailyChallenge(): Promise<DataResult<DailyChallenge>>;
  problem(titleSlug: string): Promise<DataResult<ProblemDetail>>;
  search(keywords: string, difficulty: Difficulty | undefined, limit: number): Promise<DataResult<ProblemSearchResult>>;
  userProfile(username: string): Promise<DataResult<UserProfile>>;
  recentSubmissions(username: string, limit: number): Promise<DataResult<RecentSubmissions>>;
}
