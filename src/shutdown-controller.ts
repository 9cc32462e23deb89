import type { LogFn } from './types.js';

import { errorMessage } from './errors.js';
import { createLogEntry } from './types.js';
import { warn } from './utils.js';

export type ShutdownTask = () => Promise<void> | void;

interface Registration {
  name: string;
  task: ShutdownTask;
}

/**
 * Ordered teardown for the CLI commands. Tasks run one at a time, the most
 * recently registered first, so the HTTP listener closes before the runtime
 * it serves. A failing task is reported and the rest still run.
 */
export class ShutdownController {
  private readonly aborter = new AbortController();
  private readonly stack: Registration[] = [];
  private done?: Promise<void>;

  /** Aborts as soon as shutdown begins. */
  get signal(): AbortSignal {
    return this.aborter.signal;
  }

  isStopping(): boolean {
    return this.aborter.signal.aborted;
  }

  register(name: string, task: ShutdownTask): () => void {
    const registration: Registration = { name, task };
    this.stack.push(registration);
    return () => {
      const index = this.stack.indexOf(registration);
      if (index !== -1) this.stack.splice(index, 1);
    };
  }

  shutdown(opts: { log?: LogFn } = {}): Promise<void> {
    this.done ??= this.unwind(opts.log);
    return this.done;
  }

  private async unwind(log: LogFn | undefined): Promise<void> {
    this.aborter.abort();
    const pending = [...this.stack].reverse();
    // eslint-disable-next-line functional/no-loop-statements -- teardown is sequential
    for (const { name, task } of pending) {
      try {
        await task();
      } catch (error) {
        const message = `shutdown task '${name}' failed: ${errorMessage(error)}`;
        if (log === undefined) warn(message);
        else log(createLogEntry('cli', 'WRN', 'shutdown', message));
      }
    }
  }
}
