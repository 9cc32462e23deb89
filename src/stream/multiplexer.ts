import type { SessionEndedPayload, StepEvent, WireEvent } from './events.js';
import type { LogFn, LogSeverity } from '../types.js';
import type { Deferred } from '../utils.js';

import { createLogEntry, noopLog } from '../types.js';
import { createDeferred } from '../utils.js';

import { isTerminalEvent } from './events.js';

export interface MultiplexerOptions {
  sessionId?: string;
  // Buffered events beyond which the oldest gap is abandoned.
  windowSize?: number;
  // How long a gap may hold back buffered events.
  windowMs?: number;
  log?: LogFn;
}

const DEFAULT_WINDOW_SIZE = 256;
const DEFAULT_WINDOW_MS = 2_000;

interface WireExtras {
  sequence: number;
  invocation_id?: number;
  reordered?: true;
}

function toWire(event: StepEvent, extras: WireExtras): WireEvent {
  switch (event.type) {
    case 'tool_call_started':
      return { ...extras, type: event.type, payload: event.payload };
    case 'tool_call_finished':
      return { ...extras, type: event.type, payload: event.payload };
    case 'answer_chunk':
      return { ...extras, type: event.type, payload: event.payload };
    case 'final_answer':
      return { ...extras, type: event.type, payload: event.payload };
    case 'error':
      return { ...extras, type: event.type, payload: event.payload };
    case 'session_ended':
      return { ...extras, type: event.type, payload: event.payload };
  }
}

/**
 * Orders, deduplicates and terminates one session's event stream.
 *
 * Producers reserve sequence numbers with `nextSeq()` and push events in any
 * order; events leave in reserved order. A gap holds later events back until it
 * fills, the buffer passes `windowSize`, or `windowMs` elapses. An event whose
 * slot was already skipped goes out immediately, flagged `reordered`.
 * Exactly one terminal event is emitted, after which the stream closes.
 */
export class StreamMultiplexer implements AsyncIterable<WireEvent> {
  private readonly windowSize: number;
  private readonly windowMs: number;
  private readonly log: LogFn;
  private readonly sessionId?: string;
  private seqCounter = 1;
  private expected = 1;
  private wireSequence = 1;
  private readonly buffer = new Map<number, StepEvent>();
  private readonly seen = new Set<string>();
  private readonly finishedInvocations = new Set<number>();
  private readonly ready: WireEvent[] = [];
  private readonly waiters: Deferred<IteratorResult<WireEvent>>[] = [];
  private readonly cancelListeners: (() => void)[] = [];
  private gapTimer?: NodeJS.Timeout;
  private terminated = false;

  constructor(options: MultiplexerOptions = {}) {
    this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.log = options.log ?? noopLog;
    this.sessionId = options.sessionId;
  }

  /** The session's single ordering point. */
  nextSeq(): number {
    const seq = this.seqCounter;
    this.seqCounter += 1;
    return seq;
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  /** Returns false when the event was dropped as a duplicate or arrived after termination. */
  push(event: StepEvent): boolean {
    if (this.terminated) {
      this.trace('TRC', `dropped ${event.type} #${String(event.seq)} after stream end`, event.invocationId);
      return false;
    }
    const key = `${String(event.seq)}:${event.invocationId !== undefined ? String(event.invocationId) : '-'}`;
    if (this.seen.has(key)) {
      this.trace('VRB', `dropped duplicate ${event.type} ${key}`, event.invocationId);
      return false;
    }
    if (event.type === 'tool_call_finished' && event.invocationId !== undefined) {
      if (this.finishedInvocations.has(event.invocationId)) {
        this.trace('VRB', `dropped repeated finish for invocation ${String(event.invocationId)}`, event.invocationId);
        return false;
      }
      this.finishedInvocations.add(event.invocationId);
    }
    this.seen.add(key);

    if (event.seq < this.expected) {
      this.emit(event, true);
      return true;
    }
    this.buffer.set(event.seq, event);
    this.drain();
    if (this.buffer.size > this.windowSize) {
      this.skipGap('window full');
    }
    this.armGapTimer();
    return true;
  }

  /** Ends the stream with `session_ended{cancelled}`, discarding anything still buffered. */
  cancel(extra: Omit<SessionEndedPayload, 'reason'> = {}): void {
    if (this.terminated) return;
    if (this.buffer.size > 0) {
      this.trace('VRB', `discarding ${String(this.buffer.size)} buffered events on cancel`);
    }
    this.buffer.clear();
    this.clearGapTimer();
    this.emit({ type: 'session_ended', seq: this.nextSeq(), payload: { reason: 'cancelled', ...extra } }, false);
    this.cancelListeners.forEach((listener) => {
      listener();
    });
  }

  onCancel(listener: () => void): void {
    this.cancelListeners.push(listener);
  }

  [Symbol.asyncIterator](): AsyncIterator<WireEvent> {
    return {
      next: async (): Promise<IteratorResult<WireEvent>> => {
        const value = this.ready.shift();
        if (value !== undefined) return { value, done: false };
        if (this.terminated) return { value: undefined, done: true };
        const waiter = createDeferred<IteratorResult<WireEvent>>();
        this.waiters.push(waiter);
        return await waiter.promise;
      },
      // Consumer went away: treat like a client disconnect.
      return: (): Promise<IteratorResult<WireEvent>> => {
        this.cancel({ detail: 'consumer stopped reading' });
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private drain(): void {
    let next = this.buffer.get(this.expected);
    // eslint-disable-next-line functional/no-loop-statements -- flush the contiguous run
    while (next !== undefined && !this.terminated) {
      this.buffer.delete(this.expected);
      this.expected += 1;
      this.emit(next, false);
      next = this.buffer.get(this.expected);
    }
    if (this.buffer.size === 0) this.clearGapTimer();
  }

  private skipGap(reason: string): void {
    if (this.buffer.size === 0 || this.terminated) return;
    const lowest = Math.min(...this.buffer.keys());
    this.trace('WRN', `skipping sequence gap ${String(this.expected)}..${String(lowest - 1)} (${reason})`);
    this.expected = lowest;
    this.drain();
  }

  private armGapTimer(): void {
    if (this.gapTimer !== undefined || this.buffer.size === 0 || this.terminated) return;
    const timer = setTimeout(() => {
      this.gapTimer = undefined;
      this.skipGap('window elapsed');
      this.armGapTimer();
    }, this.windowMs);
    timer.unref();
    this.gapTimer = timer;
  }

  private clearGapTimer(): void {
    if (this.gapTimer !== undefined) {
      clearTimeout(this.gapTimer);
      this.gapTimer = undefined;
    }
  }

  private emit(event: StepEvent, reordered: boolean): void {
    const wire = toWire(event, {
      sequence: this.wireSequence,
      ...(event.invocationId !== undefined ? { invocation_id: event.invocationId } : {}),
      ...(reordered ? { reordered: true as const } : {}),
    });
    this.wireSequence += 1;
    if (reordered) {
      this.trace('WRN', `emitting ${event.type} #${String(event.seq)} out of order`, event.invocationId);
    }
    const waiter = this.waiters.shift();
    if (waiter !== undefined) {
      waiter.resolve({ value: wire, done: false });
    } else {
      this.ready.push(wire);
    }
    if (isTerminalEvent(wire)) {
      this.terminated = true;
      this.buffer.clear();
      this.clearGapTimer();
      this.waiters.splice(0).forEach((pending) => {
        pending.resolve({ value: undefined, done: true });
      });
    }
  }

  private trace(severity: LogSeverity, message: string, invocationId?: number): void {
    this.log(createLogEntry('stream', severity, this.sessionId !== undefined ? `session:${this.sessionId}` : 'stream', message, {
      ...(this.sessionId !== undefined ? { sessionId: this.sessionId } : {}),
      ...(invocationId !== undefined ? { invocationId } : {}),
    }));
  }
}
