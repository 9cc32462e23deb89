import { Mutex } from 'async-mutex';

import type {
  BackoffPolicy,
  CapabilitySource,
  ChannelFactory,
  ExternalCapability,
  ProcessHandle,
  ProviderChannel,
  ProviderConfig,
  ProviderState,
  RemoteCallResult,
  RemoteToolSpec,
  SupervisorEvent,
  SupervisorListener,
} from './types.js';
import type { LogEntryExtras, LogFn, LogSeverity } from '../types.js';

import { ConfigError, ProviderUnavailableError, RemoteError, errorMessage } from '../errors.js';
import { recordProviderTransition } from '../telemetry/index.js';
import { createLogEntry, noopLog } from '../types.js';
import { createDeferred, delay, withTimeout } from '../utils.js';
import { terminateProcessTree } from '../utils/process-tree.js';
import { stableStringify } from '../utils/stable-stringify.js';

import { computeBackoffDelay, DEFAULT_BACKOFF } from './backoff.js';
import { createStdioChannel } from './mcp-channel.js';

export interface SupervisorOptions {
  channelFactory?: ChannelFactory;
  handshakeTimeoutMs?: number;
  // 0 disables the periodic health check; runHealthCheck() can still be driven by hand.
  healthIntervalMs?: number;
  healthCheckTimeoutMs?: number;
  degradeAfterFailures?: number;
  maxConsecutiveFailures?: number;
  // Undefined means restarts are unlimited.
  maxRestarts?: number;
  backoff?: Partial<BackoffPolicy>;
  // How long a provider must stay up before a crash counts as a fresh start again.
  stableAfterMs?: number;
  killGraceMs?: number;
  invokeTimeoutMs?: number;
  log?: LogFn;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

interface ProviderEntry {
  config: ProviderConfig;
  state: ProviderState;
  channel?: ProviderChannel;
  // Bumped whenever the current channel is replaced or retired; stale callbacks compare against it.
  generation: number;
  tools: RemoteToolSpec[];
  lastHandshakeAt?: number;
  restartCount: number;
  // Backoff position; survives crashes of an unstable provider.
  backoffAttempt: number;
  lastBackoffMs: number;
  readySince?: number;
  consecutiveFailures: number;
  healthFailures: number;
  probing: boolean;
  lastError?: string;
  lifecycle: AbortController;
  healthTimer?: NodeJS.Timeout;
  mutex: Mutex;
}

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const DEFAULT_HEALTH_INTERVAL_MS = 30_000;
const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5_000;
const DEFAULT_DEGRADE_AFTER = 3;
const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;
const DEFAULT_STABLE_AFTER_MS = 60_000;
const DEFAULT_KILL_GRACE_MS = 2_000;
const DEFAULT_INVOKE_TIMEOUT_MS = 30_000;

const isPublished = (state: ProviderState): boolean => state === 'ready' || state === 'degraded';

/**
 * Owns the lifecycle of every external tool-provider process:
 * launch and capability handshake, periodic health checks, crash restarts
 * with jittered exponential backoff, and graceful teardown.
 */
export class ProcessSupervisor implements CapabilitySource {
  private readonly entries = new Map<string, ProviderEntry>();
  private readonly listeners = new Set<SupervisorListener>();
  private readonly channelFactory: ChannelFactory;
  private readonly handshakeTimeoutMs: number;
  private readonly healthIntervalMs: number;
  private readonly healthCheckTimeoutMs: number;
  private readonly degradeAfterFailures: number;
  private readonly maxConsecutiveFailures: number;
  private readonly maxRestarts?: number;
  private readonly backoff: BackoffPolicy;
  private readonly stableAfterMs: number;
  private readonly killGraceMs: number;
  private readonly invokeTimeoutMs: number;
  private readonly log: LogFn;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;
  private token = 0;
  private stopping = false;

  constructor(options: SupervisorOptions = {}) {
    this.channelFactory = options.channelFactory ?? createStdioChannel;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.healthIntervalMs = options.healthIntervalMs ?? DEFAULT_HEALTH_INTERVAL_MS;
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? DEFAULT_HEALTH_CHECK_TIMEOUT_MS;
    this.degradeAfterFailures = options.degradeAfterFailures ?? DEFAULT_DEGRADE_AFTER;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    this.maxRestarts = options.maxRestarts;
    this.backoff = { ...DEFAULT_BACKOFF, ...(options.backoff ?? {}) };
    this.stableAfterMs = options.stableAfterMs ?? DEFAULT_STABLE_AFTER_MS;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.invokeTimeoutMs = options.invokeTimeoutMs ?? DEFAULT_INVOKE_TIMEOUT_MS;
    this.log = options.log ?? noopLog;
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  get capabilityToken(): number {
    return this.token;
  }

  registerProvider(config: ProviderConfig): ProcessHandle {
    if (this.stopping) {
      throw new ConfigError(`cannot register provider '${config.id}': supervisor is shutting down`);
    }
    if (config.id.trim().length === 0) {
      throw new ConfigError('provider id must be a non-empty string');
    }
    if (config.command.trim().length === 0) {
      throw new ConfigError(`provider '${config.id}' requires a launch command`);
    }
    if (this.entries.has(config.id)) {
      throw new ConfigError(`provider '${config.id}' is already registered`);
    }
    if (!config.enabled) {
      throw new ConfigError(`provider '${config.id}' is disabled and will not be launched`);
    }
    const entry: ProviderEntry = {
      config: { ...config, args: [...config.args], env: { ...config.env } },
      state: 'starting',
      generation: 0,
      tools: [],
      restartCount: 0,
      backoffAttempt: 0,
      lastBackoffMs: 0,
      consecutiveFailures: 0,
      healthFailures: 0,
      probing: false,
      lifecycle: new AbortController(),
      mutex: new Mutex(),
    };
    this.entries.set(config.id, entry);
    this.emit({ type: 'state', providerId: config.id, from: undefined, to: 'starting' });
    this.logFor(entry, 'VRB', `registered provider: ${config.command} ${config.args.join(' ')}`.trim());
    this.startLifecycle(entry, false);
    return this.toHandle(entry);
  }

  async deregisterProvider(providerId: string): Promise<void> {
    const entry = this.entries.get(providerId);
    if (entry === undefined) {
      throw new ConfigError(`provider '${providerId}' is not registered`);
    }
    this.entries.delete(providerId);
    entry.lifecycle.abort();
    entry.generation += 1;
    this.stopHealthTimer(entry);
    const channel = entry.channel;
    entry.channel = undefined;
    entry.tools = [];
    this.setState(entry, 'stopped');
    this.bumpToken(providerId);
    if (channel !== undefined) {
      await this.disposeChannel(entry, channel);
    }
    this.logFor(entry, 'VRB', 'provider deregistered');
  }

  /** Restarts a provider that was parked in `stopped` after repeated handshake failures. */
  enableProvider(providerId: string): boolean {
    const entry = this.entries.get(providerId);
    if (entry === undefined) {
      throw new ConfigError(`provider '${providerId}' is not registered`);
    }
    if (entry.state !== 'stopped') return false;
    this.resetFailureHistory(entry);
    this.logFor(entry, 'VRB', 'provider re-enabled');
    this.startLifecycle(entry, false);
    return true;
  }

  async invoke(providerId: string, remoteName: string, args: Record<string, unknown>, timeoutMs?: number): Promise<unknown> {
    const entry = this.entries.get(providerId);
    if (entry === undefined) {
      throw new ProviderUnavailableError(providerId, `provider '${providerId}' is not registered`);
    }
    const channel = entry.channel;
    if (entry.state !== 'ready' || channel === undefined) {
      throw new ProviderUnavailableError(providerId, `provider '${providerId}' is ${entry.state}`, { state: entry.state });
    }
    const budget = timeoutMs ?? this.invokeTimeoutMs;
    const call = (): Promise<RemoteCallResult> => withTimeout(
      channel.callTool(remoteName, args, { timeoutMs: budget }),
      budget,
      `tool '${remoteName}' on provider '${providerId}'`
    );
    const serialize = entry.config.serialize === true || !channel.multiplexed;
    const result = serialize ? await entry.mutex.runExclusive(call) : await call();
    if (result.isError) {
      const detail = typeof result.value === 'string' ? result.value : stableStringify(result.value);
      throw new RemoteError(providerId, remoteName, detail);
    }
    return result.value;
  }

  capabilities(): ExternalCapability[] {
    return Array.from(this.entries.values())
      .filter((entry) => isPublished(entry.state))
      .sort((a, b) => (a.config.id < b.config.id ? -1 : a.config.id > b.config.id ? 1 : 0))
      .map((entry) => ({
        providerId: entry.config.id,
        ...(entry.config.prefix !== undefined ? { prefix: entry.config.prefix } : {}),
        tools: [...entry.tools],
      }));
  }

  get(providerId: string): ProcessHandle | undefined {
    const entry = this.entries.get(providerId);
    return entry === undefined ? undefined : this.toHandle(entry);
  }

  list(): ProcessHandle[] {
    return Array.from(this.entries.values()).map((entry) => this.toHandle(entry));
  }

  subscribe(listener: SupervisorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async waitForState(providerId: string, wanted: ProviderState | ProviderState[], timeoutMs: number): Promise<ProviderState> {
    const targets = Array.isArray(wanted) ? wanted : [wanted];
    const current = this.entries.get(providerId)?.state;
    if (current !== undefined && targets.includes(current)) return current;
    const reached = createDeferred<ProviderState>();
    const unsubscribe = this.subscribe((event) => {
      if (event.type === 'state' && event.providerId === providerId && targets.includes(event.to)) {
        reached.resolve(event.to);
      }
    });
    try {
      return await withTimeout(reached.promise, timeoutMs, `waiting for provider '${providerId}' to reach ${targets.join('|')}`);
    } finally {
      unsubscribe();
    }
  }

  async runHealthCheck(providerId: string): Promise<ProviderState | undefined> {
    const entry = this.entries.get(providerId);
    if (entry === undefined) return undefined;
    const channel = entry.channel;
    if (entry.probing || channel === undefined || !isPublished(entry.state)) return entry.state;
    const generation = entry.generation;
    entry.probing = true;
    let healthy: boolean;
    try {
      healthy = await this.checkHealth(entry, channel);
    } finally {
      entry.probing = false;
    }
    if (this.isRetired(entry) || generation !== entry.generation) return entry.state;

    if (healthy) {
      entry.healthFailures = 0;
      if (this.hasBeenStable(entry)) this.resetFailureHistory(entry);
      if (entry.state === 'degraded') {
        this.setState(entry, 'ready');
        this.logFor(entry, 'VRB', 'health check recovered');
      }
      return entry.state;
    }

    entry.healthFailures += 1;
    if (entry.state === 'degraded') {
      this.crash(entry, `health check failed while degraded (${String(entry.healthFailures)} consecutive failures)`);
    } else if (entry.healthFailures >= this.degradeAfterFailures) {
      this.setState(entry, 'degraded');
      this.logFor(entry, 'WRN', `provider degraded after ${String(entry.healthFailures)} failed health checks`);
    } else {
      this.logFor(entry, 'WRN', `health check failed (${String(entry.healthFailures)}/${String(this.degradeAfterFailures)})`);
    }
    return entry.state;
  }

  async shutdown(): Promise<void> {
    this.stopping = true;
    const ids = Array.from(this.entries.keys());
    await Promise.all(ids.map(async (id) => {
      await this.deregisterProvider(id);
    }));
  }

  private startLifecycle(entry: ProviderEntry, afterCrash: boolean, previous?: ProviderChannel): void {
    void this.supervise(entry, afterCrash, previous).catch((error: unknown) => {
      this.logFor(entry, 'ERR', `supervision loop failed: ${errorMessage(error)}`, { fatal: true });
    });
  }

  private async supervise(entry: ProviderEntry, afterCrash: boolean, previous?: ProviderChannel): Promise<void> {
    if (previous !== undefined) {
      await this.disposeChannel(entry, previous);
    }
    let delayNext = afterCrash;
    // eslint-disable-next-line functional/no-loop-statements -- restart policy is an explicit retry loop
    for (;;) {
      if (this.isRetired(entry)) return;
      if (delayNext) {
        if (entry.consecutiveFailures >= this.maxConsecutiveFailures) {
          this.park(entry, `${String(entry.consecutiveFailures)} consecutive failures`);
          return;
        }
        if (this.maxRestarts !== undefined && entry.restartCount >= this.maxRestarts) {
          this.park(entry, `restart budget of ${String(this.maxRestarts)} exhausted`);
          return;
        }
        entry.backoffAttempt += 1;
        const delayMs = computeBackoffDelay(entry.backoffAttempt, this.backoff, this.random, entry.lastBackoffMs);
        entry.lastBackoffMs = delayMs;
        const budget = this.maxRestarts === undefined ? 'unlimited' : String(this.maxRestarts);
        this.logFor(entry, 'WRN', `restarting in ${String(delayMs)}ms (restart ${String(entry.restartCount + 1)}, budget ${budget})`);
        await this.sleep(delayMs, entry.lifecycle.signal);
        if (this.isRetired(entry)) return;
        entry.restartCount += 1;
      }
      delayNext = true;
      if (await this.handshake(entry)) return;
    }
  }

  private async handshake(entry: ProviderEntry): Promise<boolean> {
    this.setState(entry, 'starting');
    entry.generation += 1;
    const generation = entry.generation;
    const attempt = this.openChannel(entry);
    try {
      const { channel, tools } = await withTimeout(attempt, this.handshakeTimeoutMs, `handshake with provider '${entry.config.id}'`);
      if (this.isRetired(entry) || generation !== entry.generation) {
        await this.disposeChannel(entry, channel);
        return false;
      }
      entry.channel = channel;
      entry.tools = tools;
      entry.lastHandshakeAt = this.now();
      entry.readySince = entry.lastHandshakeAt;
      entry.healthFailures = 0;
      entry.lastError = undefined;
      channel.onExit((reason) => {
        this.handleChannelExit(entry, generation, reason);
      });
      this.setState(entry, 'ready');
      this.startHealthTimer(entry);
      this.logFor(entry, 'VRB', `handshake complete: ${String(tools.length)} tools`, { details: { pid: channel.pid ?? 0 } });
      return true;
    } catch (error) {
      // A handshake that resolves after its timeout still owns a live process.
      attempt.then(
        async ({ channel }) => { await this.disposeChannel(entry, channel); },
        () => { /* failure already reported below */ }
      ).catch((disposeError: unknown) => {
        this.logFor(entry, 'WRN', `late channel cleanup failed: ${errorMessage(disposeError)}`);
      });
      if (this.isRetired(entry) || generation !== entry.generation) return false;
      entry.consecutiveFailures += 1;
      entry.lastError = errorMessage(error);
      this.setState(entry, 'crashed');
      this.logFor(entry, 'ERR', `handshake failed (${String(entry.consecutiveFailures)} consecutive): ${entry.lastError}`);
      return false;
    }
  }

  private async openChannel(entry: ProviderEntry): Promise<{ channel: ProviderChannel; tools: RemoteToolSpec[] }> {
    const channel = await this.channelFactory(entry.config, this.log);
    try {
      const tools = await channel.listTools();
      return { channel, tools };
    } catch (error) {
      await this.disposeChannel(entry, channel);
      throw error;
    }
  }

  private handleChannelExit(entry: ProviderEntry, generation: number, reason: string): void {
    if (this.isRetired(entry) || generation !== entry.generation) return;
    if (!isPublished(entry.state)) return;
    this.crash(entry, `provider exited: ${reason}`);
  }

  private crash(entry: ProviderEntry, reason: string): void {
    if (this.hasBeenStable(entry)) this.resetFailureHistory(entry);
    else entry.consecutiveFailures += 1;
    entry.readySince = undefined;
    entry.generation += 1;
    const channel = entry.channel;
    entry.channel = undefined;
    entry.tools = [];
    entry.healthFailures = 0;
    entry.lastError = reason;
    this.stopHealthTimer(entry);
    this.setState(entry, 'crashed');
    this.logFor(entry, 'ERR', reason);
    this.startLifecycle(entry, true, channel);
  }

  private hasBeenStable(entry: ProviderEntry): boolean {
    return entry.readySince !== undefined && this.now() - entry.readySince >= this.stableAfterMs;
  }

  private resetFailureHistory(entry: ProviderEntry): void {
    entry.consecutiveFailures = 0;
    entry.backoffAttempt = 0;
    entry.lastBackoffMs = 0;
  }

  private park(entry: ProviderEntry, reason: string): void {
    this.setState(entry, 'stopped');
    this.logFor(entry, 'ERR', `provider stopped: ${reason}; re-enable it to retry`, { fatal: true });
  }

  private async checkHealth(entry: ProviderEntry, channel: ProviderChannel): Promise<boolean> {
    try {
      await withTimeout(channel.ping(), this.healthCheckTimeoutMs, 'ping');
      return true;
    } catch (error) {
      this.logFor(entry, 'TRC', `ping failed, falling back to listTools: ${errorMessage(error)}`);
    }
    try {
      await withTimeout(channel.listTools(), this.healthCheckTimeoutMs, 'listTools health check');
      return true;
    } catch (error) {
      this.logFor(entry, 'WRN', `health check exception: ${errorMessage(error)}`);
      return false;
    }
  }

  private async disposeChannel(entry: ProviderEntry, channel: ProviderChannel): Promise<void> {
    if (channel.pid !== null) {
      try {
        const report = await terminateProcessTree(channel.pid, this.killGraceMs, (message) => { this.logFor(entry, 'WRN', message); });
        if (report.killed.length > 0) this.logFor(entry, 'VRB', `force-killed ${String(report.killed.length)} process(es) after ${String(this.killGraceMs)}ms`);
      } catch (error) {
        this.logFor(entry, 'WRN', `failed to terminate pid ${String(channel.pid)}: ${errorMessage(error)}`);
      }
    }
    try {
      await channel.close();
    } catch (error) {
      this.logFor(entry, 'VRB', `channel close failed: ${errorMessage(error)}`);
    }
  }

  private startHealthTimer(entry: ProviderEntry): void {
    this.stopHealthTimer(entry);
    if (this.healthIntervalMs <= 0) return;
    const timer = setInterval(() => {
      void this.runHealthCheck(entry.config.id);
    }, this.healthIntervalMs);
    timer.unref();
    entry.healthTimer = timer;
  }

  private stopHealthTimer(entry: ProviderEntry): void {
    if (entry.healthTimer !== undefined) {
      clearInterval(entry.healthTimer);
      entry.healthTimer = undefined;
    }
  }

  private isRetired(entry: ProviderEntry): boolean {
    return entry.lifecycle.signal.aborted || this.entries.get(entry.config.id) !== entry;
  }

  private setState(entry: ProviderEntry, to: ProviderState): void {
    const from = entry.state;
    if (from === to) return;
    entry.state = to;
    recordProviderTransition({ providerId: entry.config.id, from, to });
    this.logFor(entry, 'TRC', `state ${from} -> ${to}`);
    this.emit({ type: 'state', providerId: entry.config.id, from, to });
    if (isPublished(from) !== isPublished(to) || to === 'ready') {
      this.bumpToken(entry.config.id);
    }
  }

  private bumpToken(providerId: string): void {
    this.token += 1;
    this.emit({ type: 'capabilities', providerId, token: this.token });
  }

  private emit(event: SupervisorEvent): void {
    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        this.log(createLogEntry('supervisor', 'WRN', `provider:${event.providerId}`, `supervisor listener failed: ${errorMessage(error)}`));
      }
    });
  }

  private toHandle(entry: ProviderEntry): ProcessHandle {
    return {
      providerId: entry.config.id,
      command: entry.config.command,
      args: [...entry.config.args],
      envKeys: Object.keys(entry.config.env).sort(),
      state: entry.state,
      pid: entry.channel?.pid ?? null,
      ...(entry.lastHandshakeAt !== undefined ? { lastHandshakeAt: entry.lastHandshakeAt } : {}),
      restartCount: entry.restartCount,
      consecutiveFailures: entry.consecutiveFailures,
      toolCount: entry.tools.length,
      ...(entry.lastError !== undefined ? { lastError: entry.lastError } : {}),
    };
  }

  private logFor(entry: ProviderEntry, severity: LogSeverity, message: string, extras: LogEntryExtras = {}): void {
    this.log(createLogEntry('supervisor', severity, `provider:${entry.config.id}`, message, extras));
  }
}
