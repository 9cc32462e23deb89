import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import * as yaml from 'js-yaml';
import { afterEach, describe, expect, it } from 'vitest';

import { ProviderConfigStore } from '../../config-store.js';
import { ConfigError } from '../../errors.js';

const tempDirs: string[] = [];

const tempDir = (): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolcore-store-'));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  tempDirs.splice(0).forEach((dir) => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('ProviderConfigStore', () => {
  it('replaces mapped entries and keeps JSON files as JSON', async () => {
    const file = path.join(tempDir(), 'toolcore.json');
    fs.writeFileSync(file, JSON.stringify({
      server: { port: 9000 },
      mcp_servers: { fs: { command: 'old-fs' } },
      providers: [{ provider_id: 'db', command: 'db-server' }],
    }));
    const store = new ProviderConfigStore(file);

    await store.upsert('fs', { command: 'new-fs', env: { TOKEN: '${FS_TOKEN}' } });

    const text = fs.readFileSync(file, 'utf-8');
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual({
      server: { port: 9000 },
      mcp_servers: {},
      providers: [
        { provider_id: 'db', command: 'db-server' },
        { command: 'new-fs', env: { TOKEN: '${FS_TOKEN}' }, id: 'fs' },
      ],
    });

    await store.remove('db');
    expect(await store.read()).toEqual({
      server: { port: 9000 },
      mcp_servers: {},
      providers: [{ command: 'new-fs', env: { TOKEN: '${FS_TOKEN}' }, id: 'fs' }],
    });
  });

  it('creates a missing YAML file on the first change', async () => {
    const file = path.join(tempDir(), 'conf', 'toolcore.yaml');
    const store = new ProviderConfigStore(file);

    await Promise.all([
      store.upsert('a', { command: 'a-server' }),
      store.upsert('b', { command: 'b-server', provider_id: 'ignored' }),
    ]);

    expect(yaml.load(fs.readFileSync(file, 'utf-8'))).toEqual({
      providers: [
        { command: 'a-server', id: 'a' },
        { command: 'b-server', id: 'b' },
      ],
    });
    expect(fs.readdirSync(path.dirname(file))).toEqual(['toolcore.yaml']);
  });

  it('leaves the file alone when a removed id is unknown', async () => {
    const file = path.join(tempDir(), 'toolcore.yaml');
    fs.writeFileSync(file, 'mcpServers:\n  fs:\n    command: fs-server\n');
    const store = new ProviderConfigStore(file);

    await store.remove('other');

    expect(yaml.load(fs.readFileSync(file, 'utf-8'))).toEqual({ mcpServers: { fs: { command: 'fs-server' } } });
  });

  it('refuses to rewrite a file it cannot parse', async () => {
    const file = path.join(tempDir(), 'toolcore.json');
    fs.writeFileSync(file, '{"providers": [');
    const store = new ProviderConfigStore(file);

    await expect(store.upsert('a', { command: 'a-server' })).rejects.toBeInstanceOf(ConfigError);
    expect(fs.readFileSync(file, 'utf-8')).toBe('{"providers": [');
  });
});
