// Dispatcher Types

export type DispatcherPhase =
  | 'idle'
  | 'awaiting_decision'
  | 'executing_tools'
  | 'awaiting_synthesis'
  | 'done'
  | 'error';

export const UNKNOWN_TOOL_ERROR = 'unknown tool';
export const TIMEOUT_ERROR = 'timeout';
export const ABORTED_ERROR = 'aborted';

export type ToolResult =
  | { callId: string; name: string; ok: true; data: unknown; durationMs: number }
  | { callId: string; name: string; ok: false; error: string; durationMs: number };

export interface DispatchOutcome {
  text: string;
  toolResults: ToolResult[];
  roundTrips: number;
  phases: DispatcherPhase[];
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface DispatcherSettings {
  model: string;
  maxTokens: number;
  temperature: number;
}

export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly phases: DispatcherPhase[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

/** What the reasoning service sees for a result: the data, or `{ error }`. */
export function toToolPayload(result: ToolResult): unknown {
  return result.ok ? result.data : { error: result.error };
}

export function serializeToolResult(result: ToolResult): string {
  return JSON.stringify(toToolPayload(result));
}
