import type { AuditStore } from './audit-store.js';
import type { RepetitionPolicy } from './repetition.js';
import type { TruncationPolicy } from './truncation.js';
import type { ToolErrorKind, ToolExecutionError } from '../tools/tool-errors.js';
import type { LogFn } from '../types.js';

import { createLogEntry, noopLog } from '../types.js';

import { DEFAULT_REPETITION_POLICY, RepetitionTracker, repetitionMessage } from './repetition.js';
import { DEFAULT_TRUNCATION_POLICY, truncateResult } from './truncation.js';

export type GuardedOutcome = 'succeeded' | 'failed' | 'truncated';

export interface GuardedResult {
  outcome: GuardedOutcome;
  // What the agent loop receives.
  text: string;
  truncated: boolean;
  originalChars: number;
  errorKind?: ToolErrorKind;
}

export interface GuardedCall {
  invocationId: number;
  tool: string;
  args: Record<string, unknown>;
}

export interface ResponseGuardOptions {
  truncation?: Partial<TruncationPolicy>;
  repetition?: Partial<RepetitionPolicy>;
  audit?: AuditStore;
  log?: LogFn;
  now?: () => number;
}

export const failureText = (kind: ToolErrorKind, message: string): string => `ERROR (${kind}): ${message}`;

/** Shared guard configuration; hands out per-session state. */
export class ResponseGuard {
  readonly truncation: TruncationPolicy;
  readonly repetition: RepetitionPolicy;
  private readonly audit?: AuditStore;
  private readonly log: LogFn;
  private readonly now: () => number;

  constructor(options: ResponseGuardOptions = {}) {
    this.truncation = { ...DEFAULT_TRUNCATION_POLICY, ...(options.truncation ?? {}) };
    this.repetition = { ...DEFAULT_REPETITION_POLICY, ...(options.repetition ?? {}) };
    this.audit = options.audit;
    this.log = options.log ?? noopLog;
    this.now = options.now ?? Date.now;
  }

  forSession(sessionId: string): SessionGuard {
    return new SessionGuard(sessionId, this.truncation, new RepetitionTracker(this.repetition), this.audit, this.log, this.now);
  }
}

export class SessionGuard {
  private readonly pendingAudits = new Set<Promise<unknown>>();

  constructor(
    readonly sessionId: string,
    private readonly truncation: TruncationPolicy,
    private readonly tracker: RepetitionTracker,
    private readonly audit: AuditStore | undefined,
    private readonly log: LogFn,
    private readonly now: () => number
  ) {}

  /**
   * Records the call in the session's repetition history. Returns the breaker
   * result when the call must not run, undefined when it may proceed.
   */
  admit(call: GuardedCall): GuardedResult | undefined {
    const verdict = this.tracker.record(call.tool, call.args);
    if (!verdict.repeated) return undefined;
    this.log(createLogEntry('guard', 'WRN', `tool:${call.tool}`, `repetition breaker tripped after ${String(verdict.priorCalls)} identical calls`, {
      sessionId: this.sessionId,
      invocationId: call.invocationId,
    }));
    const text = repetitionMessage(call.tool, verdict.priorCalls);
    return { outcome: 'failed', text, truncated: false, originalChars: text.length, errorKind: 'repetition_detected' };
  }

  /** Applies the truncation policy and queues the audit write. */
  seal(call: GuardedCall, raw: unknown): GuardedResult {
    const outcome = truncateResult(raw, this.truncation);
    if (outcome.truncated) {
      this.log(createLogEntry('guard', 'VRB', `tool:${call.tool}`, `result truncated from ${String(outcome.originalChars)} to ${String(outcome.text.length)} chars`, {
        sessionId: this.sessionId,
        invocationId: call.invocationId,
      }));
    }
    const audit = this.audit;
    if (audit?.wants(outcome.truncated) === true) {
      const write = audit.persist({
        sessionId: this.sessionId,
        invocationId: call.invocationId,
        tool: call.tool,
        timestamp: this.now(),
        args: call.args,
        truncated: outcome.truncated,
        originalChars: outcome.originalChars,
        result: raw,
      });
      this.pendingAudits.add(write);
      void write.finally(() => {
        this.pendingAudits.delete(write);
      });
    }
    return {
      outcome: outcome.truncated ? 'truncated' : 'succeeded',
      text: outcome.text,
      truncated: outcome.truncated,
      originalChars: outcome.originalChars,
    };
  }

  fail(error: ToolExecutionError): GuardedResult {
    const text = failureText(error.kind, error.message);
    return { outcome: 'failed', text, truncated: false, originalChars: text.length, errorKind: error.kind };
  }

  /** Resolves once every queued audit write has finished. */
  async settled(): Promise<void> {
    await Promise.all(Array.from(this.pendingAudits));
  }
}
