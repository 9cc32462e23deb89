import fs from 'node:fs';
import path from 'node:path';

import type { LogFn } from '../types.js';

import { errorMessage } from '../errors.js';
import { createLogEntry, noopLog } from '../types.js';
import { warn } from '../utils.js';

export type AuditMode = 'all' | 'truncated' | 'none';

export interface AuditRecord {
  sessionId: string;
  invocationId: number;
  tool: string;
  timestamp: number;
  args: Record<string, unknown>;
  truncated: boolean;
  originalChars: number;
  // Untouched provider or handler output.
  result: unknown;
}

export interface AuditStoreOptions {
  root: string;
  mode?: AuditMode;
  log?: LogFn;
}

const SAFE_SEGMENT = /[^A-Za-z0-9_.-]/g;

// Dot-only names would step out of the audit root.
const safeSegment = (value: string): string => {
  const cleaned = value.replace(SAFE_SEGMENT, '_');
  if (cleaned.length === 0) return '_';
  return /^\.+$/.test(cleaned) ? '_'.repeat(cleaned.length) : cleaned;
};

const fileStamp = (timestamp: number): string => new Date(timestamp).toISOString().replace(/[:.]/g, '-');

/**
 * Writes full tool results to disk for operators. The location never flows back
 * into what the agent loop receives, and a failed write only produces a warning.
 */
export class AuditStore {
  readonly mode: AuditMode;
  private readonly root: string;
  private readonly log: LogFn;

  constructor(options: AuditStoreOptions) {
    this.root = path.resolve(options.root);
    this.mode = options.mode ?? 'truncated';
    this.log = options.log ?? noopLog;
  }

  wants(truncated: boolean): boolean {
    return this.mode === 'all' || (this.mode === 'truncated' && truncated);
  }

  pathFor(record: Pick<AuditRecord, 'sessionId' | 'invocationId' | 'tool' | 'timestamp'>): string {
    return path.join(
      this.root,
      safeSegment(record.sessionId),
      `${fileStamp(record.timestamp)}-${String(record.invocationId)}-${safeSegment(record.tool)}.json`
    );
  }

  /** Resolves to the written path, or undefined when skipped or failed. Never rejects. */
  async persist(record: AuditRecord): Promise<string | undefined> {
    if (!this.wants(record.truncated)) return undefined;
    const filePath = this.pathFor(record);
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      const json = JSON.stringify({
        session_id: record.sessionId,
        invocation_id: record.invocationId,
        tool: record.tool,
        timestamp: new Date(record.timestamp).toISOString(),
        arguments: record.args,
        truncated: record.truncated,
        original_chars: record.originalChars,
        result: record.result,
      }, null, 2);
      const tmp = `${filePath}.tmp-${String(process.pid)}`;
      await fs.promises.writeFile(tmp, json, 'utf8');
      await fs.promises.rename(tmp, filePath);
      this.log(createLogEntry('guard', 'TRC', `tool:${record.tool}`, `audit record written to ${filePath}`, {
        sessionId: record.sessionId,
        invocationId: record.invocationId,
      }));
      return filePath;
    } catch (error: unknown) {
      const message = `audit persistence failed for invocation ${String(record.invocationId)}: ${errorMessage(error)}`;
      warn(message);
      this.log(createLogEntry('guard', 'WRN', `tool:${record.tool}`, message, {
        sessionId: record.sessionId,
        invocationId: record.invocationId,
      }));
      return undefined;
    }
  }
}
