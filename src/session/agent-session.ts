import crypto from 'node:crypto';

import type { ConversationMessage, ModelAction, ModelClient, ModelToolCall, PriorTurn } from './model-client.js';
import type { ResponseGuard, SessionGuard, GuardedResult } from '../guard/response-guard.js';
import type { SessionEndReason } from '../stream/events.js';
import type { MultiplexerOptions } from '../stream/multiplexer.js';
import type { ExportedTool, RegistrySnapshot } from '../tools/types.js';
import type { LogEntryExtras, LogFn, LogSeverity } from '../types.js';

import { FatalError, ModelError, errorMessage, isCoreError } from '../errors.js';
import { StreamMultiplexer } from '../stream/multiplexer.js';
import { recordSessionMetrics } from '../telemetry/index.js';
import { assertSnapshotIntegrity } from '../tools/registry.js';
import { ArgumentValidator } from '../tools/schema.js';
import { createLogEntry, noopLog } from '../types.js';
import { withTimeout } from '../utils.js';

import { ToolInvocation } from './invocation.js';
import { ToolExecutor } from './tool-executor.js';

export type SessionState =
  | 'initializing'
  | 'running'
  | 'completed'
  | 'cancelled'
  | 'step-budget-exceeded'
  | 'fatal-error';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  initializing: ['running', 'cancelled', 'fatal-error'],
  running: ['completed', 'cancelled', 'step-budget-exceeded', 'fatal-error'],
  completed: [],
  cancelled: [],
  'step-budget-exceeded': [],
  'fatal-error': [],
};

export const isTerminalSessionState = (state: SessionState): boolean => TRANSITIONS[state].length === 0;

export interface SnapshotSource {
  snapshot(): RegistrySnapshot;
}

export interface AgentSessionOptions {
  prompt: string;
  history?: readonly PriorTurn[];
  registry: SnapshotSource;
  model: ModelClient;
  guard: ResponseGuard;
  sessionId?: string;
  validator?: ArgumentValidator;
  stepBudget?: number;
  toolTimeoutMs?: number;
  modelTimeoutMs?: number;
  stream?: Omit<MultiplexerOptions, 'sessionId' | 'log'>;
  log?: LogFn;
  now?: () => number;
}

export interface SessionSummary {
  sessionId: string;
  state: SessionState;
  steps: number;
  invocations: number;
  snapshotVersion?: number;
  finalAnswer?: string;
  error?: string;
}

export const DEFAULT_STEP_BUDGET = 20;
const DEFAULT_TOOL_TIMEOUT_MS = 30_000;
const DEFAULT_MODEL_TIMEOUT_MS = 120_000;

interface PlannedCall {
  invocation: ToolInvocation;
  startSeq: number;
  finishSeq: number;
}

/**
 * One request, end to end: binds a registry snapshot, drives the model through
 * at most `stepBudget` steps, runs requested tools through the response guard,
 * and reports everything on `stream`.
 */
export class AgentSession {
  readonly id: string;
  readonly stream: StreamMultiplexer;
  private readonly opts: AgentSessionOptions;
  private readonly stepBudget: number;
  private readonly toolTimeoutMs: number;
  private readonly modelTimeoutMs: number;
  private readonly log: LogFn;
  private readonly now: () => number;
  private readonly abortController = new AbortController();
  private readonly messages: ConversationMessage[] = [];
  private current: SessionState = 'initializing';
  private steps = 0;
  private invocationCounter = 0;
  private snapshot?: RegistrySnapshot;
  private finalAnswer?: string;
  private failure?: string;
  private internalFault = false;
  private running?: Promise<SessionSummary>;

  constructor(options: AgentSessionOptions) {
    this.opts = options;
    this.id = options.sessionId ?? crypto.randomUUID();
    this.stepBudget = options.stepBudget ?? DEFAULT_STEP_BUDGET;
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.modelTimeoutMs = options.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    this.log = options.log ?? noopLog;
    this.now = options.now ?? Date.now;
    this.stream = new StreamMultiplexer({ ...(options.stream ?? {}), sessionId: this.id, log: this.log });
    this.stream.onCancel(() => {
      this.cancel('stream consumer went away');
    });
  }

  get state(): SessionState {
    return this.current;
  }

  get stepCount(): number {
    return this.steps;
  }

  get boundSnapshot(): RegistrySnapshot | undefined {
    return this.snapshot;
  }

  get transcript(): readonly ConversationMessage[] {
    return this.messages;
  }

  /** Runs the session once; later calls return the same promise. */
  start(): Promise<SessionSummary> {
    this.running ??= this.run();
    return this.running;
  }

  /**
   * Cooperative cancel. Tools already dispatched keep running; their results
   * are discarded when they arrive. Returns false when the session had already ended.
   */
  cancel(reason = 'cancelled by client'): boolean {
    if (isTerminalSessionState(this.current)) return false;
    this.abortController.abort();
    this.transition('cancelled');
    this.emitLog('VRB', `session cancelled: ${reason}`);
    this.stream.cancel({ steps: this.steps, detail: reason });
    return true;
  }

  private async run(): Promise<SessionSummary> {
    const started = this.now();
    let guard: SessionGuard | undefined;
    try {
      const snapshot = this.opts.registry.snapshot();
      assertSnapshotIntegrity(snapshot);
      this.snapshot = snapshot;
      this.steps = 0;
      (this.opts.history ?? []).forEach((turn) => {
        this.messages.push(turn.role === 'user'
          ? { role: 'user', content: turn.content }
          : { role: 'assistant', content: turn.content, toolCalls: [] });
      });
      this.messages.push({ role: 'user', content: this.opts.prompt });
      guard = this.opts.guard.forSession(this.id);
      const executor = new ToolExecutor({
        sessionId: this.id,
        snapshot,
        guard,
        validator: this.opts.validator ?? new ArgumentValidator(),
        timeoutMs: this.toolTimeoutMs,
        log: this.log,
        now: this.now,
      });
      if (this.current === 'cancelled') return this.summary();
      this.transition('running');
      this.emitLog('VRB', `session running with registry snapshot v${String(snapshot.version)} (${String(snapshot.size)} tools)`);
      await this.loop(snapshot, executor);
    } catch (error) {
      this.fail(error);
    } finally {
      if (guard !== undefined) await guard.settled();
      recordSessionMetrics({ outcome: this.current, steps: this.steps, durationMs: this.now() - started });
      this.emitLog('FIN', `session finished: ${this.current} after ${String(this.steps)} steps`, { fatal: this.internalFault });
    }
    return this.summary();
  }

  private async loop(snapshot: RegistrySnapshot, executor: ToolExecutor): Promise<void> {
    const tools = snapshot.export();
    // eslint-disable-next-line functional/no-loop-statements -- the agent loop
    for (;;) {
      if (this.current !== 'running') return;
      if (this.steps >= this.stepBudget) {
        this.end('step-budget-exceeded', 'step_budget_exceeded', `step budget of ${String(this.stepBudget)} exhausted without a final answer`);
        return;
      }
      this.steps += 1;
      const action = await this.askModel(tools);
      if (this.current !== 'running') {
        this.emitLog('VRB', `discarding model action for step ${String(this.steps)} after ${this.current}`);
        return;
      }
      this.emitChunks(action);
      if (action.kind === 'final') {
        this.finalAnswer = action.text;
        this.messages.push({ role: 'assistant', content: action.text, toolCalls: [] });
        this.stream.push({ type: 'final_answer', seq: this.stream.nextSeq(), payload: { text: action.text } });
        this.transition('completed');
        return;
      }
      await this.executeCalls(action.calls, action.text ?? '', executor);
    }
  }

  private async askModel(tools: ExportedTool[]): Promise<ModelAction> {
    try {
      return await withTimeout(
        this.opts.model.nextAction({
          sessionId: this.id,
          step: this.steps,
          messages: [...this.messages],
          tools,
          signal: this.abortController.signal,
        }),
        this.modelTimeoutMs,
        'model call'
      );
    } catch (error) {
      if (isCoreError(error)) throw error;
      throw new ModelError(errorMessage(error), { step: this.steps });
    }
  }

  private emitChunks(action: ModelAction): void {
    (action.chunks ?? []).forEach((text) => {
      this.stream.push({ type: 'answer_chunk', seq: this.stream.nextSeq(), payload: { text } });
    });
  }

  private async executeCalls(requested: ModelToolCall[], text: string, executor: ToolExecutor): Promise<void> {
    const calls = this.assignCallIds(requested);
    this.messages.push({ role: 'assistant', content: text, toolCalls: calls });

    // All start slots first, then the finish slots in request order.
    const planned: PlannedCall[] = calls
      .map((call) => {
        this.invocationCounter += 1;
        return {
          invocation: new ToolInvocation(this.invocationCounter, call.id, call.name, call.arguments, this.now()),
          startSeq: this.stream.nextSeq(),
        };
      })
      .map((entry) => ({ ...entry, finishSeq: this.stream.nextSeq() }));

    planned.forEach(({ invocation, startSeq }) => {
      this.stream.push({
        type: 'tool_call_started',
        seq: startSeq,
        invocationId: invocation.id,
        payload: { tool: invocation.tool, arguments: invocation.args },
      });
    });

    const prepared = planned.map((entry) => executor.prepare(entry.invocation));
    const results = await Promise.all(prepared.map(async (prep, index) => {
      const result = prep.kind === 'settled' ? prep.result : await executor.run(prep.invocation, prep.descriptor);
      this.complete(planned[index], result);
      return result;
    }));

    if (this.current !== 'running') return;
    planned.forEach(({ invocation }, index) => {
      this.messages.push({
        role: 'tool',
        toolCallId: invocation.callId,
        name: invocation.tool,
        content: results[index].text,
        outcome: results[index].outcome,
      });
    });
  }

  private complete(entry: PlannedCall, result: GuardedResult): void {
    const { invocation } = entry;
    const finishedAt = this.now();
    invocation.settle(result.outcome, finishedAt, result.errorKind);
    if (this.current !== 'running') {
      this.emitLog('VRB', `discarding result of invocation ${String(invocation.id)} (${invocation.tool}) after ${this.current}`, { invocationId: invocation.id });
      return;
    }
    this.stream.push({
      type: 'tool_call_finished',
      seq: entry.finishSeq,
      invocationId: invocation.id,
      payload: {
        tool: invocation.tool,
        outcome: result.outcome,
        result: result.text,
        latency_ms: finishedAt - invocation.startedAt,
        ...(result.errorKind !== undefined ? { error_kind: result.errorKind } : {}),
      },
    });
  }

  private assignCallIds(calls: ModelToolCall[]): Required<ModelToolCall>[] {
    const used = new Set<string>();
    return calls.map((call, index) => {
      let id = call.id !== undefined && call.id.length > 0 && !used.has(call.id)
        ? call.id
        : `call_${String(this.steps)}_${String(index + 1)}`;
      let suffix = 1;
      // eslint-disable-next-line functional/no-loop-statements -- find a free id
      while (used.has(id)) {
        suffix += 1;
        id = `call_${String(this.steps)}_${String(index + 1)}_${String(suffix)}`;
      }
      used.add(id);
      return { id, name: call.name, arguments: call.arguments };
    });
  }

  private end(state: SessionState, reason: SessionEndReason, detail: string): void {
    this.transition(state);
    this.emitLog('WRN', detail);
    this.stream.push({ type: 'session_ended', seq: this.stream.nextSeq(), payload: { reason, steps: this.steps, detail } });
  }

  private fail(error: unknown): void {
    const message = errorMessage(error);
    if (isTerminalSessionState(this.current)) {
      this.emitLog('WRN', `error after session ended (${this.current}): ${message}`);
      return;
    }
    this.failure = message;
    this.transition('fatal-error');
    // Model failures and model timeouts end the session without counting as internal faults.
    this.internalFault = !(isCoreError(error) && (error.code === 'model_error' || error.code === 'timeout'));
    this.emitLog('ERR', `session failed: ${message}`, {
      fatal: this.internalFault,
      ...(error instanceof Error && error.stack !== undefined ? { stack: error.stack } : {}),
    });
    this.stream.push({
      type: 'error',
      seq: this.stream.nextSeq(),
      payload: { code: isCoreError(error) ? error.code : 'fatal_error', message },
    });
  }

  private transition(to: SessionState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new FatalError(`illegal session transition ${from} -> ${to}`, { sessionId: this.id });
    }
    this.current = to;
    this.emitLog('TRC', `state ${from} -> ${to}`);
  }

  private summary(): SessionSummary {
    return {
      sessionId: this.id,
      state: this.current,
      steps: this.steps,
      invocations: this.invocationCounter,
      ...(this.snapshot !== undefined ? { snapshotVersion: this.snapshot.version } : {}),
      ...(this.finalAnswer !== undefined ? { finalAnswer: this.finalAnswer } : {}),
      ...(this.failure !== undefined ? { error: this.failure } : {}),
    };
  }

  private emitLog(severity: LogSeverity, message: string, extras: LogEntryExtras = {}): void {
    this.log(createLogEntry('session', severity, `session:${this.id}`, message, { sessionId: this.id, step: this.steps, ...extras }));
  }
}
