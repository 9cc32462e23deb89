import { SpanKind } from '@opentelemetry/api';

import type { ToolInvocation } from './invocation.js';
import type { GuardedResult, SessionGuard } from '../guard/response-guard.js';
import type { ArgumentValidator } from '../tools/schema.js';
import type { RegistrySnapshot, ToolDescriptor } from '../tools/types.js';
import type { LogFn } from '../types.js';

import { errorMessage } from '../errors.js';
import { addSpanAttributes, recordToolMetrics, runWithSpan } from '../telemetry/index.js';
import { ToolExecutionError, toToolExecutionError } from '../tools/tool-errors.js';
import { createLogEntry } from '../types.js';
import { withTimeout } from '../utils.js';

export interface ToolExecutorOptions {
  sessionId: string;
  snapshot: RegistrySnapshot;
  guard: SessionGuard;
  validator: ArgumentValidator;
  timeoutMs: number;
  log: LogFn;
  now: () => number;
}

/** Either a result decided before execution, or a call cleared to run. */
export type PreparedCall =
  | { kind: 'settled'; invocation: ToolInvocation; result: GuardedResult }
  | { kind: 'runnable'; invocation: ToolInvocation; descriptor: ToolDescriptor };

/**
 * Resolves, validates and runs tool calls against the session's bound snapshot.
 * Failures come back as well-formed results; nothing here throws to the agent loop.
 */
export class ToolExecutor {
  constructor(private readonly opts: ToolExecutorOptions) {}

  /**
   * Synchronous checks, run in request order so the repetition history sees
   * calls in the order the model issued them.
   */
  prepare(invocation: ToolInvocation): PreparedCall {
    const { snapshot, guard, validator } = this.opts;
    const call = { invocationId: invocation.id, tool: invocation.tool, args: invocation.args };
    const descriptor = snapshot.get(invocation.tool);
    if (descriptor === undefined) {
      const error = new ToolExecutionError('unknown_tool', `tool '${invocation.tool}' is not available in this session`);
      return { kind: 'settled', invocation, result: guard.fail(error) };
    }
    const validation = validator.validate(descriptor.inputSchema, invocation.args);
    if (!validation.ok) {
      const error = new ToolExecutionError('invalid_parameters', `arguments for '${invocation.tool}' are invalid: ${validation.errors}`);
      return { kind: 'settled', invocation, result: guard.fail(error) };
    }
    const breaker = guard.admit(call);
    if (breaker !== undefined) {
      return { kind: 'settled', invocation, result: breaker };
    }
    return { kind: 'runnable', invocation, descriptor };
  }

  async run(invocation: ToolInvocation, descriptor: ToolDescriptor): Promise<GuardedResult> {
    const { guard, sessionId, timeoutMs, log, now } = this.opts;
    const remote = `tool:${invocation.tool}`;
    const started = now();
    const controller = new AbortController();
    const call = { invocationId: invocation.id, tool: invocation.tool, args: invocation.args };
    log(createLogEntry('session', 'VRB', remote, `invoking ${descriptor.origin} tool`, { sessionId, invocationId: invocation.id }));

    const result = await runWithSpan('tool.execute', {
      kind: SpanKind.INTERNAL,
      attributes: { 'tool.name': invocation.tool, 'tool.origin': descriptor.origin, 'session.id': sessionId },
    }, async () => {
      try {
        const raw = await withTimeout(
          descriptor.invoke(invocation.args, { signal: controller.signal, timeoutMs, sessionId, invocationId: invocation.id }),
          timeoutMs,
          `tool '${invocation.tool}'`
        );
        return guard.seal(call, raw);
      } catch (error) {
        const failure = toToolExecutionError(error);
        if (failure.kind === 'timeout') controller.abort();
        log(createLogEntry('session', 'WRN', remote, `tool failed (${failure.kind}): ${errorMessage(error)}`, { sessionId, invocationId: invocation.id }));
        return guard.fail(failure);
      } finally {
        addSpanAttributes({ 'tool.latency_ms': now() - started });
      }
    });

    recordToolMetrics({
      tool: invocation.tool,
      origin: descriptor.origin,
      outcome: result.outcome,
      latencyMs: now() - started,
      ...(result.errorKind !== undefined ? { errorKind: result.errorKind } : {}),
    });
    return result;
  }
}
