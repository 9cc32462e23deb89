import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

import type { ChannelFactory, ProviderChannel, RemoteCallOptions, RemoteCallResult, RemoteToolSpec } from './types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { ProviderUnavailableError, RemoteError, TimeoutError, errorMessage } from '../errors.js';
import { createLogEntry } from '../types.js';
import { isPlainObject } from '../utils.js';

const CLIENT_INFO = { name: 'toolcore', version: '0.1.0' } as const;

export function normalizeCallResult(res: unknown): RemoteCallResult {
  if (!isPlainObject(res)) return { isError: false, value: res };
  const isError = res.isError === true;
  if (!isError && res.structuredContent !== undefined) {
    return { isError, value: res.structuredContent };
  }
  const content = res.content;
  if (Array.isArray(content)) {
    const texts = content
      .map((part: unknown) => (isPlainObject(part) && typeof part.text === 'string' ? part.text : undefined))
      .filter((text): text is string => text !== undefined);
    return { isError, value: texts.length > 0 ? texts.join('') : content };
  }
  if (Object.prototype.hasOwnProperty.call(res, 'toolResult')) {
    return { isError, value: res.toolResult };
  }
  return { isError, value: res };
}

function mapProtocolError(error: unknown, providerId: string, remoteName: string, timeoutMs: number): Error {
  if (error instanceof McpError) {
    if (error.code === Number(ErrorCode.RequestTimeout)) {
      return new TimeoutError(`tool '${remoteName}' on provider '${providerId}' timed out after ${String(timeoutMs)}ms`, timeoutMs);
    }
    if (error.code === Number(ErrorCode.ConnectionClosed)) {
      return new ProviderUnavailableError(providerId, `provider '${providerId}' closed the connection: ${error.message}`);
    }
    return new RemoteError(providerId, remoteName, error.message);
  }
  return new ProviderUnavailableError(providerId, `provider '${providerId}' call failed: ${errorMessage(error)}`);
}

/** MCP client session bound to one provider process. */
export class McpChannel implements ProviderChannel {
  readonly multiplexed = true;
  private readonly exitListeners: ((reason: string) => void)[] = [];
  private closing = false;

  constructor(
    private readonly providerId: string,
    private readonly client: Client,
    readonly pid: number | null
  ) {
    this.client.onclose = () => {
      if (this.closing) return;
      this.exitListeners.forEach((listener) => {
        listener('transport closed');
      });
    };
  }

  static async connect(providerId: string, transport: Transport, pid: () => number | null = () => null): Promise<McpChannel> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(transport);
    return new McpChannel(providerId, client, pid());
  }

  async listTools(): Promise<RemoteToolSpec[]> {
    const response = await this.client.listTools();
    return response.tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async callTool(name: string, args: Record<string, unknown>, opts: RemoteCallOptions): Promise<RemoteCallResult> {
    try {
      const res = await this.client.callTool({ name, arguments: args }, undefined, { timeout: opts.timeoutMs });
      return normalizeCallResult(res);
    } catch (error) {
      throw mapProtocolError(error, this.providerId, name, opts.timeoutMs);
    }
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    // Closing the client closes its transport (and, for stdio, ends the child's stdin).
    await this.client.close();
  }

  onExit(listener: (reason: string) => void): void {
    this.exitListeners.push(listener);
  }
}

/** Spawns the provider command and performs the MCP initialize exchange over its stdio. */
export const createStdioChannel: ChannelFactory = async (config, log) => {
  const transport = new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: { ...getDefaultEnvironment(), ...config.env },
    cwd: config.cwd,
    stderr: 'pipe',
  });
  const remote = `provider:${config.id}`;
  transport.stderr?.on('data', (chunk: Buffer) => {
    const text = chunk.toString('utf8').trim();
    if (text.length === 0) return;
    log(createLogEntry('supervisor', 'VRB', remote, `stderr: ${text}`));
  });
  try {
    return await McpChannel.connect(config.id, transport, () => transport.pid);
  } catch (error) {
    await transport.close().catch((closeError: unknown) => {
      log(createLogEntry('supervisor', 'WRN', remote, `failed to close transport after connect error: ${errorMessage(closeError)}`));
    });
    throw error;
  }
};
