export type CoreErrorCode =
  | 'config_error'
  | 'provider_unavailable'
  | 'timeout'
  | 'remote_error'
  | 'model_error'
  | 'fatal_error';

export class CoreError extends Error {
  readonly code: CoreErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CoreErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CoreError';
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/** Rejected provider or tool configuration. Raised at registration time. */
export class ConfigError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('config_error', message, details);
    this.name = 'ConfigError';
  }
}

export class ProviderUnavailableError extends CoreError {
  readonly providerId: string;

  constructor(providerId: string, message: string, details?: Record<string, unknown>) {
    super('provider_unavailable', message, details);
    this.name = 'ProviderUnavailableError';
    this.providerId = providerId;
  }
}

export class TimeoutError extends CoreError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('timeout', message, { timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The provider executed the call and answered with an error payload. */
export class RemoteError extends CoreError {
  readonly providerId: string;
  readonly remoteName: string;

  constructor(providerId: string, remoteName: string, message: string) {
    super('remote_error', message, { providerId, remoteName });
    this.name = 'RemoteError';
    this.providerId = providerId;
    this.remoteName = remoteName;
  }
}

/** The language-model collaborator failed to produce a next action. Ends the session, but is not an internal fault. */
export class ModelError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('model_error', message, details);
    this.name = 'ModelError';
  }
}

/** Internal invariant violation. Ends the owning session. */
export class FatalError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('fatal_error', message, details);
    this.name = 'FatalError';
  }
}

export const isCoreError = (value: unknown): value is CoreError => value instanceof CoreError;

export const errorMessage = (value: unknown): string => {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};
