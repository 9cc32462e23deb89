import { TimeoutError } from './errors.js';

export const TOOL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export const isValidToolName = (name: string): boolean => TOOL_NAME_PATTERN.test(name);

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

export const createDeferred = <T>(): Deferred<T> => {
  const settle: Omit<Deferred<T>, 'promise'> = { resolve: () => undefined, reject: () => undefined };
  const promise = new Promise<T>((resolve, reject) => {
    settle.resolve = resolve;
    settle.reject = reject;
  });
  return { promise, ...settle };
};

/** Resolves after `ms`, or early when `signal` aborts. Never rejects. */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> => new Promise((resolve) => {
  if (ms <= 0 || signal?.aborted === true) {
    resolve();
    return;
  }
  const onAbort = (): void => {
    clearTimeout(timer);
    resolve();
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal?.addEventListener('abort', onAbort, { once: true });
});

/** Rejects with a TimeoutError when `work` takes longer than `timeoutMs`. Non-positive limits disable the timer. */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return await work;
  const expiry = createDeferred<never>();
  const timer = setTimeout(() => {
    expiry.reject(new TimeoutError(`${label} timed out after ${String(timeoutMs)}ms`, timeoutMs));
  }, timeoutMs);
  try {
    return await Promise.race([work, expiry.promise]);
  } finally {
    clearTimeout(timer);
  }
}

let warningSink: ((message: string) => void) | undefined;

export const setWarningSink = (handler?: (message: string) => void): void => {
  warningSink = handler;
};

// Without a sink, warnings are dropped.
export const warn = (message: string): void => {
  try {
    warningSink?.(message);
  } catch {
    // the sink's own failure is not the caller's problem
  }
};
