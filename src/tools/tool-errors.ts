import { CoreError, errorMessage } from '../errors.js';

/**
 * Why a single tool call failed. The first four are decided before anything
 * runs; the rest mean the handler or the remote provider was reached.
 */
export type ToolErrorKind =
  | 'unknown_tool'
  | 'invalid_parameters'
  | 'repetition_detected'
  | 'provider_unavailable'
  | 'timeout'
  | 'remote_error'
  | 'execution_error'
  | 'internal_error';

export class ToolExecutionError extends Error {
  constructor(
    readonly kind: ToolErrorKind,
    message: string,
    readonly code?: string
  ) {
    super(message);
    this.name = 'ToolExecutionError';
  }
}

const kindForCoreError = (error: CoreError): ToolErrorKind => {
  switch (error.code) {
    case 'provider_unavailable':
    case 'timeout':
    case 'remote_error':
      return error.code;
    default:
      return 'internal_error';
  }
};

/** Classifies whatever a handler threw. Plain errors get `fallbackKind`. */
export const toToolExecutionError = (value: unknown, fallbackKind: ToolErrorKind = 'execution_error'): ToolExecutionError => {
  if (value instanceof ToolExecutionError) return value;
  if (value instanceof CoreError) return new ToolExecutionError(kindForCoreError(value), value.message, value.code);
  return new ToolExecutionError(fallbackKind, errorMessage(value));
};
