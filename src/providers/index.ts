// Provider Registry
// Resolves the reasoning provider once from configuration

import type { Provider } from './types.js';
import { OpenAIProvider } from './openai.js';
import { isReasoningConfigured } from '../env.js';

let provider: Provider | null = null;

/**
 * Returns the configured reasoning provider, or null when no credentials are set.
 * The instance is created lazily and cached for the process.
 */
export function getReasoningProvider(): Provider | null {
  if (provider) {
    return provider;
  }

  if (!isReasoningConfigured()) {
    return null;
  }

  provider = new OpenAIProvider();
  return provider;
}

// Re-export types
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderTool, ToolCall } from './types.js';
