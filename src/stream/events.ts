import type { GuardedOutcome } from '../guard/response-guard.js';

export type WireEventType =
  | 'tool_call_started'
  | 'tool_call_finished'
  | 'answer_chunk'
  | 'final_answer'
  | 'error'
  | 'session_ended';

export type SessionEndReason = 'completed' | 'cancelled' | 'step_budget_exceeded' | 'fatal_error';

export interface ToolCallStartedPayload {
  tool: string;
  arguments: Record<string, unknown>;
}

export interface ToolCallFinishedPayload {
  tool: string;
  outcome: GuardedOutcome;
  result: string;
  latency_ms: number;
  error_kind?: string;
}

export interface TextPayload {
  text: string;
}

export interface ErrorPayload {
  code: string;
  message: string;
}

export interface SessionEndedPayload {
  reason: SessionEndReason;
  steps?: number;
  detail?: string;
}

export interface PayloadByType {
  tool_call_started: ToolCallStartedPayload;
  tool_call_finished: ToolCallFinishedPayload;
  answer_chunk: TextPayload;
  final_answer: TextPayload;
  error: ErrorPayload;
  session_ended: SessionEndedPayload;
}

/** Internal event as produced by the agent loop; `seq` comes from the multiplexer's counter. */
export type StepEvent = {
  [K in WireEventType]: { type: K; seq: number; invocationId?: number; payload: PayloadByType[K] };
}[WireEventType];

/** Event as sent to the client. `sequence` is strictly increasing in emission order. */
export type WireEvent = {
  [K in WireEventType]: {
    type: K;
    sequence: number;
    invocation_id?: number;
    payload: PayloadByType[K];
    // Set when the event was produced out of order and arrived after the reorder window moved past it.
    reordered?: true;
  };
}[WireEventType];

export const TERMINAL_EVENT_TYPES: ReadonlySet<WireEventType> = new Set<WireEventType>(['final_answer', 'error', 'session_ended']);

export const isTerminalEvent = (event: { type: WireEventType }): boolean => TERMINAL_EVENT_TYPES.has(event.type);
