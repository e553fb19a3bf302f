// Environment configuration for the LeetCode Q&A API
// Load reasoning-service credentials, LeetCode access and timeouts from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseTemperature(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 2) {
    console.error(`Invalid REASONING_TEMPERATURE "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Reasoning service (OpenAI-compatible chat completions)
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-3.5-turbo'),
  REASONING_MAX_TOKENS: parsePositiveInt(process.env.REASONING_MAX_TOKENS, 150, 'REASONING_MAX_TOKENS'),
  REASONING_TEMPERATURE: parseTemperature(process.env.REASONING_TEMPERATURE, 0.7),

  // LeetCode data
  LEETCODE_GRAPHQL_URL: strEnv(process.env.LEETCODE_GRAPHQL_URL, 'https://leetcode.com/graphql'),
  LEETCODE_SESSION: strEnv(process.env.LEETCODE_SESSION),
  LEETCODE_USERNAME: strEnv(process.env.LEETCODE_USERNAME), // Default identity, empty = none
  LEETCODE_TIMEOUT_MS: parsePositiveInt(process.env.LEETCODE_TIMEOUT_MS, 30000, 'LEETCODE_TIMEOUT_MS'),

  // Timeouts
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 15000, 'TOOL_TIMEOUT_MS'),
  ANSWER_TIMEOUT_MS: parsePositiveInt(process.env.ANSWER_TIMEOUT_MS, 45000, 'ANSWER_TIMEOUT_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isReasoningConfigured(): boolean {
  return !!env.OPENAI_API_KEY;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('LeetCode Q&A API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Reasoning service: ${isReasoningConfigured() ? `${env.OPENAI_MODEL}` : 'not configured (fallback only)'}`);
  if (env.OPENAI_BASE_URL) {
    console.log(`  Reasoning base URL: ${env.OPENAI_BASE_URL}`);
  }
  console.log(`  LeetCode endpoint: ${env.LEETCODE_GRAPHQL_URL}`);
  console.log(`  LeetCode session: ${env.LEETCODE_SESSION ? 'set' : 'not set'}`);
  console.log(`  Default username: ${env.LEETCODE_USERNAME || 'none'}`);
  console.log(`  Tool timeout ms: ${env.TOOL_TIMEOUT_MS}`);
  console.log(`  Answer timeout ms: ${env.ANSWER_TIMEOUT_MS}`);
}
