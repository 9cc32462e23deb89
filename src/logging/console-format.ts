import type { StructuredLogEvent } from './structured-log-event.js';

import { paint } from './logfmt.js';

/** Human-oriented line: `HH:MM:SS.mmm SEV [component remote] #invocation message`, with the stack under errors. */
export function formatConsole(event: StructuredLogEvent, options: { color?: boolean } = {}): string {
  const clock = event.isoTimestamp.slice(11, 23);
  const scope = [event.component, event.remoteIdentifier].filter((part) => part !== '').join(' ');
  const marker = event.invocationId === undefined ? '' : ` #${String(event.invocationId)}`;
  const head = `${clock} ${event.severity} [${scope}]${marker} ${event.message}`;
  const line = options.color === true ? paint(event.severity, head) : head;

  const stack = event.severity === 'ERR' ? event.stack ?? '' : '';
  if (stack === '') return line;
  return [line, ...stack.split('\n').map((frame) => `    ${frame}`)].join('\n');
}
