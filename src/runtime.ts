import type { ProviderConfigStore } from './config-store.js';
import type { ToolcoreConfig } from './config.js';
import type { ModelClient, PriorTurn } from './session/model-client.js';
import type { ChannelFactory } from './supervisor/types.js';
import type { ToolDefinition } from './tools/types.js';
import type { LogFn } from './types.js';

import { toProviderConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { AuditStore } from './guard/audit-store.js';
import { ResponseGuard } from './guard/response-guard.js';
import { AgentSession } from './session/agent-session.js';
import { ScriptedModelClient, loadModelScript } from './session/scripted-model.js';
import { ProcessSupervisor } from './supervisor/process-supervisor.js';
import { createBuiltinCatalog } from './tools/builtins.js';
import { ToolRegistry } from './tools/registry.js';
import { ArgumentValidator } from './tools/schema.js';
import { createLogEntry, noopLog } from './types.js';

export type ModelFactory = () => ModelClient;

export interface RuntimeOptions {
  log?: LogFn;
  channelFactory?: ChannelFactory;
  // Overrides `model.script` from the configuration.
  modelFactory?: ModelFactory;
  builtins?: ToolDefinition[];
  // Receives provider changes made at runtime.
  providerStore?: ProviderConfigStore;
}

export interface SessionRequest {
  prompt: string;
  history?: readonly PriorTurn[];
  sessionId?: string;
  stepBudget?: number;
}

/** Wires supervisor, registry, guard and sessions together from one configuration. */
export class ToolcoreRuntime {
  readonly supervisor: ProcessSupervisor;
  readonly registry: ToolRegistry;
  readonly guard: ResponseGuard;
  readonly validator = new ArgumentValidator();
  readonly providerStore?: ProviderConfigStore;
  private readonly log: LogFn;
  private readonly modelFactory?: ModelFactory;
  private readonly builtins: ToolDefinition[];
  private readonly active = new Map<string, AgentSession>();
  private started = false;

  constructor(readonly config: ToolcoreConfig, options: RuntimeOptions = {}) {
    this.log = options.log ?? noopLog;
    const { supervisor: sup, guard } = config;
    this.supervisor = new ProcessSupervisor({
      ...(options.channelFactory !== undefined ? { channelFactory: options.channelFactory } : {}),
      handshakeTimeoutMs: sup.handshakeTimeoutMs,
      healthIntervalMs: sup.healthIntervalMs,
      healthCheckTimeoutMs: sup.healthCheckTimeoutMs,
      degradeAfterFailures: sup.degradeAfterFailures,
      maxConsecutiveFailures: sup.maxConsecutiveFailures,
      ...(sup.maxRestarts !== undefined ? { maxRestarts: sup.maxRestarts } : {}),
      backoff: sup.backoff,
      stableAfterMs: sup.stableAfterMs,
      killGraceMs: sup.killGraceMs,
      invokeTimeoutMs: sup.invokeTimeoutMs,
      log: this.log,
    });
    this.registry = new ToolRegistry({ capabilities: this.supervisor, log: this.log });
    this.guard = new ResponseGuard({
      truncation: {
        thresholdChars: guard.thresholdChars,
        maxEntries: guard.maxEntries,
        maxItems: guard.maxItems,
        capChars: guard.capChars,
        maxValueChars: guard.maxValueChars,
      },
      repetition: { threshold: guard.repetitionThreshold, historySize: guard.historySize },
      ...(guard.auditDir !== undefined ? { audit: new AuditStore({ root: guard.auditDir, mode: guard.auditMode, log: this.log }) } : {}),
      log: this.log,
    });
    this.builtins = options.builtins ?? createBuiltinCatalog();
    if (options.providerStore !== undefined) this.providerStore = options.providerStore;
    this.modelFactory = options.modelFactory ?? scriptModelFactory(config.model.script);
  }

  get hasModel(): boolean {
    return this.modelFactory !== undefined;
  }

  get activeSessions(): number {
    return this.active.size;
  }

  isSessionActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  findSession(sessionId: string): AgentSession | undefined {
    return this.active.get(sessionId);
  }

  /** Loads builtin and user tools and launches every enabled provider. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.registry.loadBuiltins(this.builtins);
    if (this.config.registry.userToolsDir !== undefined) {
      await this.registry.loadUserModules(this.config.registry.userToolsDir);
    }
    this.config.providers.forEach((entry) => {
      if (!entry.enabled) {
        this.log(createLogEntry('supervisor', 'VRB', `provider:${entry.id}`, 'provider disabled in configuration; not launched'));
        return;
      }
      try {
        this.supervisor.registerProvider(toProviderConfig(entry));
      } catch (error) {
        this.log(createLogEntry('supervisor', 'ERR', `provider:${entry.id}`, `provider rejected: ${errorMessage(error)}`));
      }
    });
  }

  createSession(request: SessionRequest, model?: ModelClient): AgentSession {
    const client = model ?? this.modelFactory?.();
    if (client === undefined) {
      throw new ConfigError('no language model is configured; set model.script or supply a model client');
    }
    if (request.sessionId !== undefined && this.active.has(request.sessionId)) {
      throw new ConfigError(`session '${request.sessionId}' is already running`, { sessionId: request.sessionId });
    }
    const { session: sessionCfg, stream } = this.config;
    const session = new AgentSession({
      prompt: request.prompt,
      ...(request.history !== undefined ? { history: request.history } : {}),
      ...(request.sessionId !== undefined ? { sessionId: request.sessionId } : {}),
      registry: this.registry,
      model: client,
      guard: this.guard,
      validator: this.validator,
      stepBudget: request.stepBudget ?? sessionCfg.stepBudget,
      toolTimeoutMs: sessionCfg.toolTimeoutMs,
      modelTimeoutMs: sessionCfg.modelTimeoutMs,
      stream: { windowSize: stream.windowSize, windowMs: stream.windowMs },
      log: this.log,
    });
    this.active.set(session.id, session);
    void session.start().finally(() => {
      if (this.active.get(session.id) === session) this.active.delete(session.id);
    });
    return session;
  }

  async shutdown(): Promise<void> {
    this.active.forEach((session) => {
      session.cancel('server shutting down');
    });
    await this.supervisor.shutdown();
  }
}

const scriptModelFactory = (scriptPath: string | undefined): ModelFactory | undefined => {
  if (scriptPath === undefined) return undefined;
  const script = loadModelScript(scriptPath);
  return () => new ScriptedModelClient(script);
};
