// Reasoning Provider Interface
// Contract the dispatcher needs from a chat-completions service with function calling

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ProviderTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, ProviderToolProperty>;
      required: string[];
    };
  };
}

export interface ProviderToolProperty {
  type: 'string' | 'number' | 'boolean';
  description: string;
  enum?: string[];
  default?: string | number | boolean;
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  tool_calls?: ToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type ProviderResponse =
  | { type: 'text'; content: string; usage: ProviderUsage }
  | { type: 'tool_calls'; content: string; toolCalls: ToolCall[]; usage: ProviderUsage };

export interface Provider {
  name: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
