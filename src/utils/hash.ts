import crypto from 'node:crypto';

import { stableStringify } from './stable-stringify.js';

export const sha256Hex = (input: string): string =>
  crypto.createHash('sha256').update(input).digest('hex');

export const fingerprintOf = (value: unknown): string => sha256Hex(stableStringify(value));
