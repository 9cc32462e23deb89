import type { StructuredLogEvent } from './structured-log-event.js';

type Severity = StructuredLogEvent['severity'];

const ANSI_RESET = '\u001B[0m';
const GRAY = '\u001B[90m';
const SEVERITY_COLORS: Record<Severity, string> = {
  ERR: '\u001B[31m',
  WRN: '\u001B[33m',
  FIN: '\u001B[36m',
  VRB: GRAY,
  TRC: GRAY,
};

export const paint = (severity: Severity, text: string): string => `${SEVERITY_COLORS[severity]}${text}${ANSI_RESET}`;

type FieldPicker = (event: StructuredLogEvent) => string | number | undefined;

const FIXED_FIELDS: readonly (readonly [string, FieldPicker])[] = [
  ['ts', (event) => event.isoTimestamp],
  ['level', (event) => event.severity.toLowerCase()],
  ['priority', (event) => event.priority],
  ['component', (event) => event.component],
  ['remote', (event) => event.remoteIdentifier],
  ['provider', (event) => event.provider],
  ['tool', (event) => event.tool],
  ['session', (event) => event.sessionId],
  ['step', (event) => event.step],
  ['invocation', (event) => event.invocationId],
];

const quote = (raw: string): string => {
  const flat = raw.replace(/\r/g, '\\r').replace(/\n/g, '\\n');
  const escaped = flat.replace(/"/g, '\\"');
  return /[\s="]/.test(flat) ? `"${escaped}"` : escaped;
};

/**
 * One `key=value` line. Fixed fields come first, then labels, then the
 * message. Empty values are left out; the first writer of a key wins.
 */
export function formatLogfmt(event: StructuredLogEvent, options: { color?: boolean } = {}): string {
  const fields = new Map<string, string>();
  const add = (key: string, value: string | number | undefined): void => {
    const text = value === undefined ? '' : String(value);
    if (text.length > 0 && !fields.has(key)) fields.set(key, quote(text));
  };

  FIXED_FIELDS.forEach(([key, pick]) => { add(key, pick(event)); });
  Object.entries(event.labels).forEach(([key, value]) => { add(key, value); });
  add('message', event.message);

  const line = [...fields].map(([key, value]) => `${key}=${value}`).join(' ');
  return options.color === true ? paint(event.severity, line) : line;
}
