// OpenAI Provider
// Chat completions with native function calling through the official SDK

import OpenAI from 'openai';
import { env } from '../env.js';
import { AppError, errorMessage } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';

type ChatCompletion = OpenAI.Chat.ChatCompletion;
type ChatCompletionCreateParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
type ChatCompletionMessageParam = OpenAI.Chat.ChatCompletionMessageParam;

// The slice of the SDK this provider uses; `client.chat.completions` satisfies it
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParams, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
}

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseURL?: string;
  completions?: ChatCompletionsApi;
}

export class OpenAIProvider implements Provider {
  name = 'openai';
  private completions: ChatCompletionsApi;

  constructor(options: OpenAIProviderOptions = {}) {
    if (options.completions) {
      this.completions = options.completions;
      return;
    }

    const apiKey = options.apiKey ?? env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }

    const baseURL = options.baseURL ?? env.OPENAI_BASE_URL;
    const client = new OpenAI({
      apiKey,
      ...(baseURL ? { baseURL } : {}),
      // One attempt per phase: retries would stretch a spoken reply
      maxRetries: 0,
    });
    this.completions = client.chat.completions;
  }

  private formatMessages(messages: ProviderMessage[]): ChatCompletionMessageParam[] {
    return messages.map((m): ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
        case 'tool':
          if (!m.tool_call_id) {
            throw AppError.internal('Tool message is missing tool_call_id');
          }
          return { role: 'tool', content: m.content, tool_call_id: m.tool_call_id };
        case 'assistant':
          if (m.tool_calls && m.tool_calls.length > 0) {
            return {
              role: 'assistant',
              content: m.content || null,
              tool_calls: m.tool_calls.map(tc => ({
                id: tc.id,
                type: 'function' as const,
                function: {
                  name: tc.name,
                  arguments: tc.arguments,
                },
              })),
            };
          }
          return { role: 'assistant', content: m.content };
      }
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const body: ChatCompletionCreateParams = {
      model: options.model,
      messages: this.formatMessages(messages),
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0.7,
    };

    if (options.tools && options.tools.length > 0) {
      body.tools = options.tools;
      if (options.tool_choice) {
        body.tool_choice = options.tool_choice;
      }
    }

    let completion: ChatCompletion;
    try {
      completion = await this.completions.create(body, { signal: options.signal });
    } catch (error) {
      throw AppError.reasoningUnavailable(`OpenAI API error: ${errorMessage(error)}`, error);
    }

    return this.normalize(completion);
  }

  private normalize(completion: ChatCompletion): ProviderResponse {
    const message = completion.choices?.[0]?.message;
    if (!message) {
      throw AppError.malformedResponse('Completion has no choices');
    }

    const usage = {
      promptTokens: completion.usage?.prompt_tokens || 0,
      completionTokens: completion.usage?.completion_tokens || 0,
      totalTokens: completion.usage?.total_tokens || 0,
    };

    const toolCalls: ToolCall[] = [];
    for (const tc of message.tool_calls ?? []) {
      if (!tc.id || !tc.function?.name) {
        throw AppError.malformedResponse('Tool call is missing its id or function name', tc);
      }
      toolCalls.push({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments || '{}',
      });
    }

    if (toolCalls.length > 0) {
      return { type: 'tool_calls', content: message.content ?? '', toolCalls, usage };
    }

    if (typeof message.content !== 'string') {
      throw AppError.malformedResponse('Completion has neither content nor tool calls');
    }

    return { type: 'text', content: message.content, usage };
  }
}
