import { isPlainObject } from '../utils.js';

const sortObject = (value: Record<string, unknown>): Record<string, unknown> => (
  Object.keys(value)
    .sort()
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = value[key];
      return acc;
    }, {})
);

/**
 * JSON with object keys sorted at every depth, so that two structurally equal
 * values always produce the same text. `undefined` serializes as `null`.
 */
export const stableStringify = (value: unknown): string => {
  try {
    const replacer = (_key: string, val: unknown): unknown => (isPlainObject(val) ? sortObject(val) : val);
    return JSON.stringify(value, replacer) ?? 'null';
  } catch {
    try {
      return JSON.stringify(String(value));
    } catch {
      return '"[unserializable]"';
    }
  }
};
