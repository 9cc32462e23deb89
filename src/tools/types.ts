import type { JsonSchema } from '../types.js';

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'any';

export interface ToolParameter {
  name: string;
  type: ParameterType;
  required: boolean;
  description?: string;
}

export type ToolOrigin = 'builtin' | 'user-loaded' | `external:${string}`;

export interface ToolCallContext {
  // Aborts when the per-call timeout expires. Session cancellation does not abort it.
  signal: AbortSignal;
  timeoutMs: number;
  sessionId?: string;
  invocationId?: number;
}

export type ToolHandler = (args: Record<string, unknown>, ctx: ToolCallContext) => unknown;

/** Authoring contract shared by builtin catalogs and user tool modules. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  handler: ToolHandler;
}

export type ToolBinding =
  | { kind: 'builtin'; handler: ToolHandler }
  | { kind: 'user-loaded'; handler: ToolHandler; file: string }
  | { kind: 'external'; providerId: string; remoteName: string };

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
  readonly inputSchema: JsonSchema;
  readonly origin: ToolOrigin;
  readonly binding: ToolBinding;
  // Resolved once when the registry merges its sources.
  readonly invoke: (args: Record<string, unknown>, ctx: ToolCallContext) => Promise<unknown>;
}

/** Shape handed to the language-model collaborator. */
export interface ExportedTool {
  name: string;
  description: string;
  input_schema: JsonSchema;
}

export type RegistryWarningKind = 'name_conflict' | 'invalid_definition' | 'load_failure' | 'invalid_name';

export interface RegistryWarning {
  kind: RegistryWarningKind;
  source: string;
  message: string;
}

export interface RegistrySnapshot {
  readonly version: number;
  readonly fingerprint: string;
  readonly createdAt: number;
  readonly warnings: readonly RegistryWarning[];
  readonly size: number;
  get(name: string): ToolDescriptor | undefined;
  has(name: string): boolean;
  list(): readonly ToolDescriptor[];
  export(): ExportedTool[];
}
