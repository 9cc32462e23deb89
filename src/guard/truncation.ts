import { isPlainObject } from '../utils.js';

export interface TruncationPolicy {
  // Results whose serialized form is at most this long pass through untouched.
  thresholdChars: number;
  maxEntries: number;
  maxItems: number;
  capChars: number;
  // Long string values inside kept entries are shortened to this many characters.
  maxValueChars: number;
}

export const DEFAULT_TRUNCATION_POLICY: TruncationPolicy = {
  thresholdChars: 10_000,
  maxEntries: 20,
  maxItems: 5,
  capChars: 3_000,
  maxValueChars: 100,
};

export type ResultShape = 'mapping' | 'sequence' | 'text';

export interface SerializedResult {
  text: string;
  shape: ResultShape;
  // Parsed structure for mapping and sequence shapes.
  structured?: Record<string, unknown> | unknown[];
}

export interface TruncationOutcome {
  text: string;
  truncated: boolean;
  shape: ResultShape;
  originalChars: number;
}

const ELLIPSIS = '...';

export const truncationFooter = (totalChars: number): string =>
  `\n\n... (Response truncated - showing first portion of data. Total size: ${String(totalChars)} chars. The data above is usable as-is.)`;

const structuredShape = (value: unknown): SerializedResult | undefined => {
  if (Array.isArray(value)) return { text: JSON.stringify(value), shape: 'sequence', structured: value };
  if (isPlainObject(value)) return { text: JSON.stringify(value), shape: 'mapping', structured: value };
  return undefined;
};

/**
 * Canonical text for a raw tool result. Strings holding a JSON object or array
 * are treated as that structure but measured by their own length.
 */
export function serializeResult(value: unknown): SerializedResult {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        const shaped = structuredShape(parsed);
        if (shaped !== undefined) return { ...shaped, text: value };
      } catch {
        // not JSON; fall through to text
      }
    }
    return { text: value, shape: 'text' };
  }
  if (value === undefined) return { text: '', shape: 'text' };
  const shaped = structuredShape(value);
  if (shaped !== undefined) return shaped;
  return { text: JSON.stringify(value) ?? String(value), shape: 'text' };
}

const shortenString = (value: string, max: number): string => (
  value.length > max ? `${value.slice(0, max)}${ELLIPSIS}` : value
);

// One level deep: string values and the string fields of object values.
const shortenValue = (value: unknown, max: number): unknown => {
  if (typeof value === 'string') return shortenString(value, max);
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [
      key,
      typeof inner === 'string' ? shortenString(inner, max) : inner,
    ]));
  }
  return value;
};

export function truncateResult(value: unknown, policy: TruncationPolicy = DEFAULT_TRUNCATION_POLICY): TruncationOutcome {
  const serialized = serializeResult(value);
  const originalChars = serialized.text.length;
  if (originalChars <= policy.thresholdChars) {
    return { text: serialized.text, truncated: false, shape: serialized.shape, originalChars };
  }

  let body: string;
  const { structured } = serialized;
  if (structured === undefined) {
    body = serialized.text.slice(0, policy.capChars);
  } else if (Array.isArray(structured)) {
    const kept = structured.slice(0, policy.maxItems).map((item) => shortenValue(item, policy.maxValueChars));
    const omitted = structured.length - kept.length;
    if (omitted > 0) kept.push(`... and ${String(omitted)} more items`);
    body = JSON.stringify(kept, null, 2).slice(0, policy.capChars);
  } else {
    const kept = Object.fromEntries(
      Object.entries(structured)
        .slice(0, policy.maxEntries)
        .map(([key, entry]) => [key, shortenValue(entry, policy.maxValueChars)])
    );
    body = JSON.stringify(kept, null, 2).slice(0, policy.capChars);
  }
  return { text: `${body}${truncationFooter(originalChars)}`, truncated: true, shape: serialized.shape, originalChars };
}
