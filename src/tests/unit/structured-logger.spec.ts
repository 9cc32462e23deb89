import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { formatConsole } from '../../logging/console-format.js';
import { formatLogfmt } from '../../logging/logfmt.js';
import { buildStructuredLogEvent } from '../../logging/structured-log-event.js';
import { StructuredLogger } from '../../logging/structured-logger.js';

const TS = Date.UTC(2024, 0, 2, 3, 4, 5, 678);

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  timestamp: TS,
  severity: 'WRN',
  component: 'session',
  remoteIdentifier: 'tool:fs_read',
  fatal: false,
  message: 'tool failed (timeout): took "too" long',
  ...overrides,
});

const capture = (format: 'logfmt' | 'json' | 'console' | 'none', extra: { verbose?: boolean; trace?: boolean } = {}): { logger: StructuredLogger; lines: string[] } => {
  const lines: string[] = [];
  const logger = new StructuredLogger({ format, labels: { app: 'toolcore' }, writer: (line) => { lines.push(line); }, ...extra });
  return { logger, lines };
};

describe('formatLogfmt', () => {
  it('renders fields in a fixed order with the message last', () => {
    const event = buildStructuredLogEvent(
      entry({ sessionId: 's-1', step: 2, invocationId: 4, details: { attempt: 3, retry: true } }),
      { labels: { app: 'toolcore' } }
    );
    expect(formatLogfmt(event)).toBe(
      'ts=2024-01-02T03:04:05.678Z level=wrn priority=4 component=session remote=tool:fs_read tool=fs_read '
      + 'session=s-1 step=2 invocation=4 app=toolcore attempt=3 retry=true message="tool failed (timeout): took \\"too\\" long"'
    );
  });

  it('escapes line breaks and colors by severity', () => {
    const event = buildStructuredLogEvent(entry({ severity: 'ERR', remoteIdentifier: 'provider:fs', component: 'supervisor', message: 'a\nb' }));
    expect(formatLogfmt(event, { color: true })).toBe(
      '\u001B[31mts=2024-01-02T03:04:05.678Z level=err priority=3 component=supervisor remote=provider:fs provider=fs message=a\\nb\u001B[0m'
    );
  });

  it('keeps reserved keys out of the labels', () => {
    const event = buildStructuredLogEvent(entry({ details: { message: 'shadow', step: 9, ok: false } }), { labels: { session: 'x', env: '' } });
    expect(event.labels).toEqual({ ok: 'false' });
  });
});

describe('formatConsole', () => {
  it('prints time, severity, context and the stack of errors', () => {
    const event = buildStructuredLogEvent(entry({
      severity: 'ERR',
      component: 'supervisor',
      remoteIdentifier: 'provider:fs',
      message: 'crashed',
      invocationId: 4,
      stack: 'Error: boom\nat launch',
    }));
    expect(formatConsole(event)).toBe('03:04:05.678 ERR [supervisor provider:fs] #4 crashed\n    Error: boom\n    at launch');
  });
});

describe('StructuredLogger', () => {
  it('drops verbose and trace entries unless enabled', () => {
    const quiet = capture('console');
    quiet.logger.emit(entry({ severity: 'VRB', message: 'v' }));
    quiet.logger.emit(entry({ severity: 'TRC', message: 't' }));
    quiet.logger.emit(entry({ severity: 'FIN', message: 'f' }));
    expect(quiet.lines).toEqual(['03:04:05.678 FIN [session tool:fs_read] f\n']);

    const tracing = capture('console', { trace: true });
    tracing.logger.log(entry({ severity: 'VRB', message: 'v' }));
    tracing.logger.log(entry({ severity: 'TRC', message: 't' }));
    expect(tracing.lines).toHaveLength(2);
  });

  it('writes one JSON object per line', () => {
    const { logger, lines } = capture('json');
    logger.emit(entry({ severity: 'ERR', component: 'supervisor', remoteIdentifier: 'provider:fs', message: 'crashed', stack: 'Error: boom' }));

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('\n')).toBe(true);
    expect(JSON.parse(lines[0])).toEqual({
      ts: '2024-01-02T03:04:05.678Z',
      timestamp: TS,
      severity: 'ERR',
      level: 'err',
      priority: 3,
      component: 'supervisor',
      remote: 'provider:fs',
      provider: 'fs',
      labels: { app: 'toolcore' },
      stack: 'Error: boom',
      message: 'crashed',
    });
  });

  it('writes nothing in none format', () => {
    const { logger, lines } = capture('none');
    logger.emit(entry({ severity: 'ERR' }));
    expect(lines).toEqual([]);
  });
});
