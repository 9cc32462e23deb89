import type { LogDetailValue, LogEntry } from '../types.js';

/** A log entry with everything the formatters derive from it resolved once. */
export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  component: LogEntry['component'];
  remoteIdentifier: string;
  provider?: string;
  tool?: string;
  sessionId?: string;
  step?: number;
  invocationId?: number;
  labels: Record<string, string>;
  stack?: string;
}

// syslog(3) levels
const SYSLOG_PRIORITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

// Keys the fixed fields already own.
const FIXED_KEYS: ReadonlySet<string> = new Set(['severity', 'component', 'remote', 'provider', 'tool', 'session', 'step', 'invocation', 'message']);

const labelText = (value: LogDetailValue): string | undefined => {
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  return value === '' ? undefined : value;
};

/** `provider:<id>` and `tool:<name>` identifiers expose their name as a field of its own. */
const scopeOf = (identifier: string): Pick<StructuredLogEvent, 'provider' | 'tool'> => {
  const match = /^(provider|tool):(.+)$/.exec(identifier);
  if (match === null) return {};
  return match[1] === 'provider' ? { provider: match[2] } : { tool: match[2] };
};

export function buildStructuredLogEvent(entry: LogEntry, options: { labels?: Record<string, string> } = {}): StructuredLogEvent {
  const labels = new Map<string, string>();
  const sources: Record<string, LogDetailValue>[] = [options.labels ?? {}, entry.details ?? {}];
  sources.forEach((source) => {
    Object.entries(source).forEach(([key, value]) => {
      const text = labelText(value);
      if (text === undefined || FIXED_KEYS.has(key) || labels.has(key)) return;
      labels.set(key, text);
    });
  });

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: SYSLOG_PRIORITY[entry.severity],
    message: entry.message,
    component: entry.component,
    remoteIdentifier: entry.remoteIdentifier,
    ...scopeOf(entry.remoteIdentifier),
    sessionId: entry.sessionId,
    step: entry.step,
    invocationId: entry.invocationId,
    labels: Object.fromEntries(labels),
    stack: entry.stack,
  };
}
