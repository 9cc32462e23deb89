import { stableStringify } from '../utils/stable-stringify.js';

export interface RepetitionPolicy {
  // Identical calls allowed before the breaker trips; the next one is short-circuited.
  threshold: number;
  // Distinct (tool, arguments) pairs remembered per session; the oldest is forgotten first.
  historySize: number;
}

export const DEFAULT_REPETITION_POLICY: RepetitionPolicy = { threshold: 2, historySize: 64 };

export interface RepetitionVerdict {
  repeated: boolean;
  // Calls with this key seen before the current one.
  priorCalls: number;
  key: string;
}

export const repetitionKey = (tool: string, args: Record<string, unknown>): string =>
  `${tool}\u0000${stableStringify(args)}`;

export class RepetitionTracker {
  private readonly counts = new Map<string, number>();

  constructor(private readonly policy: RepetitionPolicy = DEFAULT_REPETITION_POLICY) {}

  /** Records one call and reports whether it crosses the threshold. */
  record(tool: string, args: Record<string, unknown>): RepetitionVerdict {
    const key = repetitionKey(tool, args);
    const priorCalls = this.counts.get(key) ?? 0;
    if (priorCalls === 0 && this.counts.size >= this.policy.historySize) {
      const oldest = this.counts.keys().next();
      if (oldest.done !== true) this.counts.delete(oldest.value);
    }
    this.counts.set(key, priorCalls + 1);
    return { repeated: priorCalls >= this.policy.threshold, priorCalls, key };
  }

  reset(): void {
    this.counts.clear();
  }
}

export const repetitionMessage = (tool: string, priorCalls: number): string => (
  `Repetition detected: '${tool}' was already called ${String(priorCalls)} times in this session with identical arguments. `
  + 'Further identical calls will not be re-executed. Use the results you already have, or change the arguments.'
);
