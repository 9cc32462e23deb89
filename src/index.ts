export { ConfigError, CoreError, FatalError, ModelError, ProviderUnavailableError, RemoteError, TimeoutError, isCoreError } from './errors.js';
export type { CoreErrorCode } from './errors.js';
export { loadConfig, parseConfig, parseProviderEntry, toProviderConfig } from './config.js';
export type { ProviderEntry, ToolcoreConfig } from './config.js';
export { ProviderConfigStore } from './config-store.js';
export type { LogEntry, LogFn, LogSeverity } from './types.js';
export { StructuredLogger, createStructuredLogger } from './logging/structured-logger.js';
export type { LogFormat, StructuredLoggerOptions } from './logging/structured-logger.js';

export { ProcessSupervisor } from './supervisor/process-supervisor.js';
export type { SupervisorOptions } from './supervisor/process-supervisor.js';
export { computeBackoffDelay, DEFAULT_BACKOFF } from './supervisor/backoff.js';
export { createStdioChannel, McpChannel } from './supervisor/mcp-channel.js';
export type {
  BackoffPolicy,
  CapabilitySource,
  ChannelFactory,
  ProcessHandle,
  ProviderChannel,
  ProviderConfig,
  ProviderState,
  RemoteToolSpec,
} from './supervisor/types.js';

export { ToolRegistry, assertSnapshotIntegrity } from './tools/registry.js';
export { ArgumentValidator, parametersToSchema, schemaToParameters } from './tools/schema.js';
export { createBuiltinCatalog } from './tools/builtins.js';
export { ToolExecutionError } from './tools/tool-errors.js';
export type { ToolErrorKind } from './tools/tool-errors.js';
export type {
  ExportedTool,
  RegistrySnapshot,
  RegistryWarning,
  ToolDefinition,
  ToolDescriptor,
  ToolOrigin,
  ToolParameter,
} from './tools/types.js';

export { ResponseGuard, SessionGuard } from './guard/response-guard.js';
export type { GuardedResult } from './guard/response-guard.js';
export { truncateResult, DEFAULT_TRUNCATION_POLICY } from './guard/truncation.js';
export { AuditStore } from './guard/audit-store.js';

export { StreamMultiplexer } from './stream/multiplexer.js';
export type { SessionEndReason, WireEvent, WireEventType } from './stream/events.js';

export { AgentSession } from './session/agent-session.js';
export type { AgentSessionOptions, SessionState, SessionSummary } from './session/agent-session.js';
export type { ModelAction, ModelClient, ModelRequest, ModelToolCall, PriorTurn } from './session/model-client.js';
export { ScriptedModelClient, loadModelScript, parseModelScript } from './session/scripted-model.js';

export { ToolcoreRuntime } from './runtime.js';
export { createApp, startServer } from './server/index.js';
