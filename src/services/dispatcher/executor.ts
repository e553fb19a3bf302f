// Tool Executor
// Executes the tool calls requested by the reasoning service

import type { ToolCall } from '../../providers/types.js';
import type { DataClient } from '../leetcode/types.js';
import type { ToolContext } from '../tools/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { logger } from '../../logger.js';
import { errorMessage } from '../../utils/errors.js';
import { AbortedError, TimeoutError, withAbort, withTimeout } from '../../utils/timeout.js';
import { ABORTED_ERROR, TIMEOUT_ERROR, UNKNOWN_TOOL_ERROR, type ToolResult } from './types.js';

const log = logger.child({ component: 'tool-executor' });

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  client: DataClient;
  defaultUsername?: string;
  timeoutMs?: number;
}

type ParsedArguments =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseToolArguments(raw: string): ParsedArguments {
  if (!raw.trim()) {
    return { ok: true, value: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: `invalid arguments: ${errorMessage(error)}` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: 'invalid arguments: expected a JSON object' };
  }

  return { ok: true, value: parsed };
}

export class ToolExecutor {
  private registry: ToolRegistry;
  private context: ToolContext;
  private timeoutMs: number;

  constructor(options: ToolExecutorOptions) {
    this.registry = options.registry;
    this.context = {
      client: options.client,
      defaultUsername: options.defaultUsername || undefined,
    };
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async execute(toolCall: ToolCall, signal?: AbortSignal): Promise<ToolResult> {
    const startTime = Date.now();
    const fail = (error: string): ToolResult => ({
      callId: toolCall.id,
      name: toolCall.name,
      ok: false,
      error,
      durationMs: Date.now() - startTime,
    });

    const tool = this.registry.get(toolCall.name);
    if (!tool) {
      log.warn({ tool: toolCall.name, callId: toolCall.id }, 'Unknown tool requested');
      return fail(UNKNOWN_TOOL_ERROR);
    }

    const args = parseToolArguments(toolCall.arguments);
    if (!args.ok) {
      return fail(args.error);
    }

    if (signal?.aborted) {
      return fail(ABORTED_ERROR);
    }

    try {
      const outcome = await withTimeout(withAbort(tool.run(args.value, this.context), signal), this.timeoutMs);
      const durationMs = Date.now() - startTime;
      log.debug({ tool: tool.name, callId: toolCall.id, ok: outcome.ok, durationMs }, 'Tool executed');

      return outcome.ok
        ? { callId: toolCall.id, name: toolCall.name, ok: true, data: outcome.data, durationMs }
        : { callId: toolCall.id, name: toolCall.name, ok: false, error: outcome.error, durationMs };
    } catch (error) {
      if (error instanceof TimeoutError) {
        log.warn({ tool: tool.name, callId: toolCall.id, timeoutMs: this.timeoutMs }, 'Tool timed out');
        return fail(TIMEOUT_ERROR);
      }
      if (error instanceof AbortedError) {
        return fail(ABORTED_ERROR);
      }
      log.warn({ tool: tool.name, callId: toolCall.id, err: error }, 'Tool failed');
      return fail(errorMessage(error));
    }
  }

  /**
   * Runs every call concurrently and joins them. Results keep the request order;
   * one failing or slow call never affects its siblings. Once `signal` fires, calls
   * still in flight resolve to an aborted result.
   */
  async executeAll(toolCalls: ToolCall[], signal?: AbortSignal): Promise<ToolResult[]> {
    return Promise.all(toolCalls.map(toolCall => this.execute(toolCall, signal)));
  }
}
