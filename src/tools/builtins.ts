import type { ToolDefinition } from './types.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function createBuiltinCatalog(now: () => Date = () => new Date()): ToolDefinition[] {
  return [
    {
      name: 'get_current_time',
      description: 'Get the current date and time.',
      parameters: [],
      handler: () => formatLocalTimestamp(now()),
    },
  ];
}
