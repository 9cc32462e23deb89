export type LogSeverity = 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';

// Subsystem that produced a log entry.
export type LogComponent =
  | 'supervisor'
  | 'registry'
  | 'guard'
  | 'stream'
  | 'session'
  | 'server'
  | 'cli';

export type LogDetailValue = string | number | boolean;

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  component: LogComponent;
  remoteIdentifier: string;             // 'provider:<id>', 'tool:<name>', 'session:<id>'
  fatal: boolean;                       // True if this ended a session or a provider
  message: string;
  sessionId?: string;
  step?: number;                        // Agent loop step within the session
  invocationId?: number;
  details?: Record<string, LogDetailValue>;
  stack?: string;
}

export type LogFn = (entry: LogEntry) => void;

export type LogEntryExtras = Partial<Pick<LogEntry, 'fatal' | 'sessionId' | 'step' | 'invocationId' | 'details' | 'stack'>>;

export const createLogEntry = (
  component: LogComponent,
  severity: LogSeverity,
  remoteIdentifier: string,
  message: string,
  extras: LogEntryExtras = {}
): LogEntry => ({
  timestamp: Date.now(),
  severity,
  component,
  remoteIdentifier,
  fatal: extras.fatal ?? false,
  message,
  ...(extras.sessionId !== undefined ? { sessionId: extras.sessionId } : {}),
  ...(extras.step !== undefined ? { step: extras.step } : {}),
  ...(extras.invocationId !== undefined ? { invocationId: extras.invocationId } : {}),
  ...(extras.details !== undefined ? { details: extras.details } : {}),
  ...(extras.stack !== undefined ? { stack: extras.stack } : {}),
});

export const noopLog: LogFn = () => { /* discard */ };

export type JsonSchema = Record<string, unknown>;
