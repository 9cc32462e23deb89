import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { loadConfig, parseConfig, parseProviderEntry, toProviderConfig } from '../../config.js';
import { ConfigError } from '../../errors.js';

const BASE_DIR = path.resolve('/srv/toolcore');

describe('parseConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills every default from an empty document', () => {
    const config = parseConfig({});
    expect(config.providers).toEqual([]);
    expect(config.server).toEqual({ host: '127.0.0.1', port: 8000, maxConcurrentSessions: 10 });
    expect(config.session).toEqual({ stepBudget: 20, toolTimeoutMs: 30_000, modelTimeoutMs: 120_000 });
    expect(config.stream).toEqual({ windowSize: 256, windowMs: 2_000 });
    expect(config.supervisor.backoff).toEqual({ baseMs: 1_000, capMs: 60_000, jitter: 0.2 });
    expect(config.supervisor.maxRestarts).toBeUndefined();
    expect(config.supervisor.stableAfterMs).toBe(60_000);
    expect(config.guard.auditMode).toBe('truncated');
    expect(config.guard.capChars).toBe(3_000);
    expect(config.log).toEqual({ format: 'logfmt', verbose: false, trace: false });
  });

  it('folds mcpServers maps into the provider list', () => {
    const config = parseConfig({
      providers: [{ provider_id: 'git', command: 'git-server' }],
      mcpServers: {
        fs: { type: 'stdio', command: ['fs-server', '--root'], args: ['/data'], environment: { LEVEL: '1' } },
      },
    });

    expect(config.providers).toEqual([
      { id: 'git', command: 'git-server', args: [], env: {}, enabled: true },
      { id: 'fs', command: 'fs-server', args: ['--root', '/data'], env: { LEVEL: '1' }, enabled: true },
    ]);
  });

  it('expands environment references, missing ones to empty strings', () => {
    vi.stubEnv('TOOLCORE_TEST_TOKEN', 'test-secret');
    const config = parseConfig({
      providers: [{ id: 'api', command: 'api-server', env: { TOKEN: '${TOOLCORE_TEST_TOKEN}', OTHER: 'x${TOOLCORE_TEST_UNSET_VAR}y' } }],
    });
    expect(config.providers[0].env).toEqual({ TOKEN: 'test-secret', OTHER: 'xy' });
  });

  it('resolves relative paths against the base directory', () => {
    const config = parseConfig({
      providers: [{ id: 'a', command: 'srv', cwd: 'work' }],
      registry: { userToolsDir: 'tools' },
      guard: { auditDir: 'audit' },
      model: { script: 'script.yaml' },
    }, 'inline', BASE_DIR);

    expect(config.providers[0].cwd).toBe(path.join(BASE_DIR, 'work'));
    expect(config.registry.userToolsDir).toBe(path.join(BASE_DIR, 'tools'));
    expect(config.guard.auditDir).toBe(path.join(BASE_DIR, 'audit'));
    expect(config.model.script).toBe(path.join(BASE_DIR, 'script.yaml'));
  });

  it('rejects duplicate provider ids', () => {
    expect(() => parseConfig({ providers: [{ id: 'a', command: 'x' }, { id: 'a', command: 'y' }] }))
      .toThrow("Configuration validation failed in configuration:\n  providers.1.id: duplicate provider id 'a'");
  });

  it('reports out-of-range values with their path', () => {
    expect(() => parseConfig({ server: { port: 70_000 } }, 'test.yaml'))
      .toThrow('Configuration validation failed in test.yaml:\n  server.port: Number must be less than or equal to 65535');
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  const writeFile = (name: string, content: string): string => {
    dir ??= fs.mkdtempSync(path.join(os.tmpdir(), 'toolcore-config-'));
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  it('reads YAML and resolves paths next to the file', () => {
    const file = writeFile('toolcore.yaml', [
      'providers:',
      '  - id: fs',
      '    command: fs-server',
      '    prefix: fs_',
      'registry:',
      '  userToolsDir: ./user-tools',
      'server:',
      '  port: 0',
      '',
    ].join('\n'));

    const config = loadConfig(file);

    expect(config.providers).toEqual([{ id: 'fs', command: 'fs-server', args: [], env: {}, enabled: true, prefix: 'fs_' }]);
    expect(config.registry.userToolsDir).toBe(path.join(path.dirname(file), 'user-tools'));
    expect(config.server.port).toBe(0);
  });

  it('reads JSON', () => {
    const file = writeFile('toolcore.json', JSON.stringify({ session: { stepBudget: 3 } }));
    expect(loadConfig(file).session.stepBudget).toBe(3);
  });

  it('fails on a missing file', () => {
    const missing = path.join(os.tmpdir(), 'toolcore-no-such-config.yaml');
    expect(() => loadConfig(missing)).toThrow(`Configuration file not found: ${missing}`);
  });

  it('fails on malformed syntax', () => {
    const file = writeFile('broken.json', '{ "providers": ');
    expect(() => loadConfig(file)).toThrow(ConfigError);
    expect(() => loadConfig(file)).toThrow(`Invalid syntax in configuration file ${file}: `);
  });
});

describe('provider entries', () => {
  it('validates a runtime entry and converts it for the supervisor', () => {
    const entry = parseProviderEntry({ command: ['srv', '--stdio'], serialize: true }, 'remote');
    expect(toProviderConfig(entry)).toEqual({ id: 'remote', command: 'srv', args: ['--stdio'], env: {}, enabled: true, serialize: true });
  });

  it('names the offending field', () => {
    expect(() => parseProviderEntry({ id: 'x', command: '' }))
      .toThrow('invalid provider configuration: command: String must contain at least 1 character(s)');
  });
});
