import type { ToolErrorKind } from '../tools/tool-errors.js';

import { FatalError } from '../errors.js';

export type InvocationOutcome = 'pending' | 'succeeded' | 'failed' | 'truncated';

export type SettledOutcome = Exclude<InvocationOutcome, 'pending'>;

/** One requested tool execution. Its outcome is set exactly once. */
export class ToolInvocation {
  private current: InvocationOutcome = 'pending';
  private finished?: number;
  private failure?: ToolErrorKind;

  constructor(
    readonly id: number,
    // Identifier the model used for this call; echoed back with the result.
    readonly callId: string,
    readonly tool: string,
    readonly args: Record<string, unknown>,
    readonly startedAt: number
  ) {}

  get outcome(): InvocationOutcome {
    return this.current;
  }

  get finishedAt(): number | undefined {
    return this.finished;
  }

  get errorKind(): ToolErrorKind | undefined {
    return this.failure;
  }

  get isSettled(): boolean {
    return this.current !== 'pending';
  }

  settle(outcome: SettledOutcome, at: number, errorKind?: ToolErrorKind): void {
    if (this.current !== 'pending') {
      throw new FatalError(`invocation ${String(this.id)} (${this.tool}) settled twice: ${this.current} then ${outcome}`);
    }
    this.current = outcome;
    this.finished = at;
    this.failure = errorKind;
  }
}
