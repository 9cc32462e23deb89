import type { ChannelFactory, ProviderChannel, RemoteCallOptions, RemoteCallResult, RemoteToolSpec } from '../../supervisor/types.js';

export type CallHandler = (name: string, args: Record<string, unknown>) => Promise<RemoteCallResult> | RemoteCallResult;

export interface FakeChannelOptions {
  tools?: RemoteToolSpec[];
  multiplexed?: boolean;
  onCall?: CallHandler;
}

export const remoteTool = (name: string, description = `${name} tool`): RemoteToolSpec => ({
  name,
  description,
  inputSchema: { type: 'object', properties: { value: { type: 'string' } } },
});

/** In-process provider channel whose health and exit can be driven by the test. */
export class FakeChannel implements ProviderChannel {
  readonly pid = null;
  readonly multiplexed: boolean;
  tools: RemoteToolSpec[];
  pingFails = false;
  listToolsFails = false;
  closed = false;
  inFlight = 0;
  maxInFlight = 0;
  readonly calls: { name: string; args: Record<string, unknown> }[] = [];
  private readonly onCall: CallHandler;
  private readonly exitListeners: ((reason: string) => void)[] = [];

  constructor(options: FakeChannelOptions = {}) {
    this.tools = options.tools ?? [remoteTool('echo')];
    this.multiplexed = options.multiplexed ?? true;
    this.onCall = options.onCall ?? ((_name, args) => ({ isError: false, value: args.value ?? 'ok' }));
  }

  async listTools(): Promise<RemoteToolSpec[]> {
    if (this.listToolsFails) throw new Error('listTools failed');
    return [...this.tools];
  }

  async ping(): Promise<void> {
    if (this.pingFails) throw new Error('ping failed');
  }

  async callTool(name: string, args: Record<string, unknown>, _opts: RemoteCallOptions): Promise<RemoteCallResult> {
    this.calls.push({ name, args });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await Promise.resolve();
      return await this.onCall(name, args);
    } finally {
      this.inFlight -= 1;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  onExit(listener: (reason: string) => void): void {
    this.exitListeners.push(listener);
  }

  exit(reason: string): void {
    this.exitListeners.forEach((listener) => {
      listener(reason);
    });
  }
}

/**
 * Factory whose behavior per launch comes from `plan`: a channel to hand out,
 * or an error to fail the launch with. Launches past the plan reuse its last entry.
 */
export class FakeChannelFactory {
  readonly launched: FakeChannel[] = [];
  attempts = 0;
  private readonly plan: (() => FakeChannel | Error)[];

  constructor(plan: (() => FakeChannel | Error)[] = [() => new FakeChannel()]) {
    this.plan = plan;
  }

  setPlan(plan: (() => FakeChannel | Error)[]): void {
    this.plan.splice(0, this.plan.length, ...plan);
  }

  get latest(): FakeChannel | undefined {
    return this.launched.at(-1);
  }

  readonly create: ChannelFactory = async () => {
    const step = this.plan[Math.min(this.attempts, this.plan.length - 1)];
    this.attempts += 1;
    const outcome = step();
    if (outcome instanceof Error) throw outcome;
    this.launched.push(outcome);
    return outcome;
  };
}
