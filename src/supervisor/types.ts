import type { JsonSchema, LogFn } from '../types.js';

export type ProviderState = 'starting' | 'ready' | 'degraded' | 'crashed' | 'stopped';

export interface ProviderConfig {
  id: string;
  command: string;
  args: string[];
  env: Record<string, string>;
  enabled: boolean;
  cwd?: string;
  // Prepended to every remote tool name when exposed in the registry.
  prefix?: string;
  // Force one in-flight call at a time even when the transport multiplexes.
  serialize?: boolean;
}

export interface RemoteToolSpec {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

export interface RemoteCallResult {
  isError: boolean;
  // Joined text content, or structured content when the provider sent it.
  value: unknown;
}

export interface RemoteCallOptions {
  timeoutMs: number;
}

/**
 * One live connection to a provider process. The default implementation
 * speaks MCP over stdio; tests substitute in-process channels.
 */
export interface ProviderChannel {
  readonly pid: number | null;
  // True when concurrent requests are matched to responses by request id.
  readonly multiplexed: boolean;
  listTools(): Promise<RemoteToolSpec[]>;
  ping(): Promise<void>;
  callTool(name: string, args: Record<string, unknown>, opts: RemoteCallOptions): Promise<RemoteCallResult>;
  close(): Promise<void>;
  onExit(listener: (reason: string) => void): void;
}

export type ChannelFactory = (config: ProviderConfig, log: LogFn) => Promise<ProviderChannel>;

export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
  // Fractional jitter: 0.2 means +/-20%.
  jitter: number;
}

export interface ProcessHandle {
  providerId: string;
  command: string;
  args: readonly string[];
  envKeys: readonly string[];
  state: ProviderState;
  pid: number | null;
  lastHandshakeAt?: number;
  restartCount: number;
  consecutiveFailures: number;
  toolCount: number;
  lastError?: string;
}

export interface ExternalCapability {
  providerId: string;
  prefix?: string;
  tools: readonly RemoteToolSpec[];
}

export type SupervisorEvent =
  | { type: 'state'; providerId: string; from: ProviderState | undefined; to: ProviderState }
  | { type: 'capabilities'; providerId: string; token: number };

export type SupervisorListener = (event: SupervisorEvent) => void;

/** What the tool registry needs from the supervisor. */
export interface CapabilitySource {
  readonly capabilityToken: number;
  capabilities(): ExternalCapability[];
  invoke(providerId: string, remoteName: string, args: Record<string, unknown>, timeoutMs?: number): Promise<unknown>;
}
