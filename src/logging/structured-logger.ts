import type { LogEntry, LogFn } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  // Implies verbose.
  trace?: boolean;
  writer?: (line: string) => void;
}

type Renderer = (event: StructuredLogEvent, color: boolean) => string;

// JSON.stringify leaves out the undefined members.
const toJsonRecord = (event: StructuredLogEvent): Record<string, unknown> => ({
  ts: event.isoTimestamp,
  timestamp: event.timestamp,
  severity: event.severity,
  level: event.severity.toLowerCase(),
  priority: event.priority,
  component: event.component,
  remote: event.remoteIdentifier,
  provider: event.provider,
  tool: event.tool,
  session: event.sessionId,
  step: event.step,
  invocation: event.invocationId,
  labels: Object.keys(event.labels).length > 0 ? event.labels : undefined,
  stack: event.stack,
  message: event.message,
});

const RENDERERS: Record<Exclude<LogFormat, 'none'>, Renderer> = {
  logfmt: (event, color) => formatLogfmt(event, { color }),
  json: (event) => JSON.stringify(toJsonRecord(event)),
  console: (event, color) => formatConsole(event, { color }),
};

const writeStderr = (line: string): void => {
  try {
    process.stderr.write(line);
  } catch {
    // stderr is gone; there is nowhere left to report
  }
};

export class StructuredLogger {
  private readonly render?: Renderer;
  private readonly muted: ReadonlySet<LogEntry['severity']>;
  private readonly labels: Record<string, string>;
  private readonly color: boolean;
  private readonly writer: (line: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    const format = options.format ?? 'logfmt';
    this.render = format === 'none' ? undefined : RENDERERS[format];
    const trace = options.trace === true;
    const verbose = trace || options.verbose === true;
    const muted = new Set<LogEntry['severity']>();
    if (!verbose) muted.add('VRB');
    if (!trace) muted.add('TRC');
    this.muted = muted;
    this.labels = options.labels ?? {};
    this.color = options.color === true;
    this.writer = options.writer ?? writeStderr;
  }

  emit(entry: LogEntry): void {
    if (this.render === undefined || this.muted.has(entry.severity)) return;
    this.writer(`${this.render(buildStructuredLogEvent(entry, { labels: this.labels }), this.color)}\n`);
  }

  /** Bound emitter for components that take a plain log callback. */
  get log(): LogFn {
    return (entry) => { this.emit(entry); };
  }
}

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => new StructuredLogger(options);
