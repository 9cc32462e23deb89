import fs from 'node:fs';
import path from 'node:path';

import { Mutex } from 'async-mutex';
import * as yaml from 'js-yaml';

import { ConfigError, errorMessage } from './errors.js';
import { isPlainObject } from './utils.js';

const PROVIDER_MAPS = ['mcpServers', 'mcp_servers'] as const;

const entryId = (entry: unknown): string | undefined => {
  if (!isPlainObject(entry)) return undefined;
  if (typeof entry.id === 'string') return entry.id;
  return typeof entry.provider_id === 'string' ? entry.provider_id : undefined;
};

/**
 * Writes provider additions and removals back into the configuration file so
 * they survive a restart. Entries are stored as received, before `${VAR}`
 * expansion. Writes go through a temporary file and a rename.
 */
export class ProviderConfigStore {
  private readonly lock = new Mutex();

  constructor(readonly filePath: string) {}

  /** Adds `entry` under `id`, replacing any earlier entry with that id. */
  async upsert(id: string, entry: Record<string, unknown>): Promise<void> {
    await this.update((doc) => {
      const stored: Record<string, unknown> = { ...entry, id };
      delete stored.provider_id;
      const rest = this.without(doc, id);
      return { ...rest, providers: [...this.listed(rest), stored] };
    });
  }

  /** Drops every entry for `id`, whether listed or in a server map. */
  async remove(id: string): Promise<void> {
    await this.update((doc) => this.without(doc, id));
  }

  async read(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (isPlainObject(error) && error.code === 'ENOENT') return {};
      throw new ConfigError(`Failed to read configuration file ${this.filePath}: ${errorMessage(error)}`);
    }
    let raw: unknown;
    try {
      raw = this.isJson() ? JSON.parse(content) : yaml.load(content);
    } catch (error: unknown) {
      throw new ConfigError(`Invalid syntax in configuration file ${this.filePath}: ${errorMessage(error)}`);
    }
    if (raw === undefined || raw === null) return {};
    if (!isPlainObject(raw)) throw new ConfigError(`Configuration file ${this.filePath} does not hold a mapping`);
    return raw;
  }

  private async update(change: (doc: Record<string, unknown>) => Record<string, unknown>): Promise<void> {
    await this.lock.runExclusive(async () => {
      const next = change(await this.read());
      const text = this.isJson() ? `${JSON.stringify(next, null, 2)}\n` : yaml.dump(next, { lineWidth: 120 });
      await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      const tmp = `${this.filePath}.tmp-${String(process.pid)}-${String(Date.now())}`;
      await fs.promises.writeFile(tmp, text, 'utf-8');
      await fs.promises.rename(tmp, this.filePath);
    });
  }

  private listed(doc: Record<string, unknown>): unknown[] {
    return Array.isArray(doc.providers) ? doc.providers : [];
  }

  private without(doc: Record<string, unknown>, id: string): Record<string, unknown> {
    const out: Record<string, unknown> = { ...doc };
    if (Array.isArray(doc.providers)) {
      out.providers = doc.providers.filter((entry) => entryId(entry) !== id);
    }
    PROVIDER_MAPS.forEach((key) => {
      const servers = doc[key];
      if (!isPlainObject(servers) || !(id in servers)) return;
      const rest = { ...servers };
      delete rest[id];
      out[key] = rest;
    });
    return out;
  }

  private isJson(): boolean {
    return /\.json$/i.test(this.filePath);
  }
}
