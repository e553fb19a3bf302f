// Tool-Calling Dispatcher
// Two round trips at most: ask what to do, run the requested tools, ask what to say

import type { Provider, ProviderMessage, ProviderResponse } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { logger } from '../../logger.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { AbortedError } from '../../utils/timeout.js';
import { parseToolArguments, type ToolExecutor } from './executor.js';
import { DECIDE_SYSTEM_PROMPT, SYNTHESIZE_SYSTEM_PROMPT } from './prompts.js';
import {
  DispatchError,
  serializeToolResult,
  type DispatchOptions,
  type DispatchOutcome,
  type DispatcherPhase,
  type DispatcherSettings,
} from './types.js';

const log = logger.child({ component: 'dispatcher' });

export interface ToolCallingDispatcherOptions {
  provider: Provider;
  registry: ToolRegistry;
  executor: ToolExecutor;
  settings: DispatcherSettings;
}

export class ToolCallingDispatcher {
  private provider: Provider;
  private registry: ToolRegistry;
  private executor: ToolExecutor;
  private settings: DispatcherSettings;

  constructor(options: ToolCallingDispatcherOptions) {
    this.provider = options.provider;
    this.registry = options.registry;
    this.executor = options.executor;
    this.settings = options.settings;
  }

  async dispatch(question: string, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const phases: DispatcherPhase[] = ['idle'];
    const conversation: ProviderMessage[] = [{ role: 'user', content: question }];

    // Decide
    phases.push('awaiting_decision');
    const decision = await this.callProvider(
      [{ role: 'system', content: DECIDE_SYSTEM_PROMPT }, ...conversation],
      phases,
      options,
      true,
    );

    if (decision.type === 'text') {
      phases.push('done');
      return { text: decision.content.trim(), toolResults: [], roundTrips: 1, phases };
    }

    // Argument text that is not a JSON object is a broken reply, not a tool failure
    const unparseable = decision.toolCalls.find(tc => !parseToolArguments(tc.arguments).ok);
    if (unparseable) {
      phases.push('error');
      throw new DispatchError(
        'Reasoning service sent unparseable tool arguments',
        phases,
        { cause: AppError.malformedResponse(`Arguments of tool call "${unparseable.id}" are not a JSON object`, unparseable) },
      );
    }

    // Execute
    phases.push('executing_tools');
    log.info({ tools: decision.toolCalls.map(tc => tc.name) }, 'Executing requested tools');
    const toolResults = await this.executor.executeAll(decision.toolCalls, options.signal);

    if (options.signal?.aborted) {
      phases.push('error');
      throw new DispatchError('Dispatch aborted before synthesis', phases, { cause: new AbortedError() });
    }

    conversation.push({
      role: 'assistant',
      content: decision.content,
      tool_calls: decision.toolCalls,
    });
    for (const result of toolResults) {
      conversation.push({
        role: 'tool',
        tool_call_id: result.callId,
        name: result.name,
        content: serializeToolResult(result),
      });
    }

    // Synthesize
    phases.push('awaiting_synthesis');
    const synthesis = await this.callProvider(
      [{ role: 'system', content: SYNTHESIZE_SYSTEM_PROMPT }, ...conversation],
      phases,
      options,
      false,
    );

    if (synthesis.type !== 'text') {
      phases.push('error');
      throw new DispatchError(
        'Reasoning service requested tools while synthesizing',
        phases,
        { cause: AppError.malformedResponse('Unexpected tool calls in synthesis response') },
      );
    }

    phases.push('done');
    return { text: synthesis.content.trim(), toolResults, roundTrips: 2, phases };
  }

  private async callProvider(
    messages: ProviderMessage[],
    phases: DispatcherPhase[],
    options: DispatchOptions,
    withTools: boolean,
  ): Promise<ProviderResponse> {
    try {
      return await this.provider.sendChat(messages, {
        model: this.settings.model,
        maxTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        signal: options.signal,
        ...(withTools ? { tools: this.registry.toProviderTools(), tool_choice: 'auto' as const } : {}),
      });
    } catch (error) {
      const phase = phases[phases.length - 1];
      phases.push('error');
      log.warn({ phase, err: error }, 'Reasoning service call failed');
      throw new DispatchError(`Reasoning service failed during ${phase}: ${errorMessage(error)}`, phases, { cause: error });
    }
  }
}
