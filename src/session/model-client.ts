import type { GuardedOutcome } from '../guard/response-guard.js';
import type { ExportedTool } from '../tools/types.js';

export interface ModelToolCall {
  // Assigned by the session when the model leaves it out or repeats one.
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ConversationMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls: Required<ModelToolCall>[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string; outcome: GuardedOutcome };

// Earlier exchange supplied by the client; seeds the transcript before the prompt.
export interface PriorTurn {
  role: 'user' | 'assistant';
  content: string;
}

export type ModelAction =
  | { kind: 'tool_calls'; calls: ModelToolCall[]; text?: string; chunks?: string[] }
  | { kind: 'final'; text: string; chunks?: string[] };

export interface ModelRequest {
  sessionId: string;
  step: number;
  messages: readonly ConversationMessage[];
  tools: ExportedTool[];
  signal: AbortSignal;
}

/**
 * The language-model collaborator. One call is one agent step: it either asks
 * for tool executions or produces the final answer.
 */
export interface ModelClient {
  nextAction(request: ModelRequest): Promise<ModelAction>;
}
