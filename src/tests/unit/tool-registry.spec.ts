import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { RegistrySnapshot, ToolCallContext } from '../../tools/types.js';

import { ConfigError, FatalError } from '../../errors.js';
import { createBuiltinCatalog } from '../../tools/builtins.js';
import { ToolRegistry, assertSnapshotIntegrity } from '../../tools/registry.js';
import { FakeCapabilities } from '../support/fake-capabilities.js';
import { remoteTool } from '../support/fake-channel.js';

const CTX: ToolCallContext = { signal: new AbortController().signal, timeoutMs: 1234 };

const GOOD_MODULE = `
export const tools = [
  {
    name: 'shout',
    description: 'Upper-case the text.',
    parameters: [{ name: 'text', type: 'string', description: 'Text to shout' }],
    handler: ({ text }) => text.toUpperCase(),
  },
  {
    name: 'get_current_time',
    description: 'Shadowed by the builtin.',
    handler: () => 'never',
  },
];
`;

const BAD_MODULE = `
export default [
  { name: 'bad name', description: 'Invalid name.', handler: () => 1 },
  { name: 'no_handler', description: 'Missing handler.' },
  { name: 'fine', description: 'Still loads.', parameters: [], handler: () => 'fine' },
];
`;

const withBuiltins = (registry: ToolRegistry): ToolRegistry => {
  registry.loadBuiltins(createBuiltinCatalog(() => new Date(2024, 0, 2, 3, 4, 5)));
  return registry;
};

describe('ToolRegistry merging', () => {
  it('returns the same snapshot while nothing changes', () => {
    const registry = withBuiltins(new ToolRegistry());
    const first = registry.snapshot();

    expect(first.version).toBe(1);
    expect(first.list().map((tool) => tool.name)).toEqual(['get_current_time']);
    expect(registry.snapshot()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('prefers builtins, then the lower provider id', () => {
    const caps = new FakeCapabilities([
      { providerId: 'beta', tools: [remoteTool('search'), remoteTool('get_current_time')] },
      { providerId: 'alpha', tools: [remoteTool('search')] },
    ]);
    const snapshot = withBuiltins(new ToolRegistry({ capabilities: caps })).snapshot();

    expect(snapshot.list().map((tool) => [tool.name, tool.origin])).toEqual([
      ['get_current_time', 'builtin'],
      ['search', 'external:alpha'],
    ]);
    expect(snapshot.warnings).toEqual([
      { kind: 'name_conflict', source: 'external:beta', message: "tool 'search' from external:beta dropped: name already provided by external:alpha" },
      { kind: 'name_conflict', source: 'external:beta', message: "tool 'get_current_time' from external:beta dropped: name already provided by builtin" },
    ]);
  });

  it('applies provider prefixes and skips invalid names', () => {
    const caps = new FakeCapabilities([{ providerId: 'fs', prefix: 'fs_', tools: [remoteTool('read'), remoteTool('bad name')] }]);
    const snapshot = new ToolRegistry({ capabilities: caps }).snapshot();

    expect(snapshot.list().map((tool) => tool.name)).toEqual(['fs_read']);
    expect(snapshot.warnings).toEqual([
      { kind: 'invalid_name', source: 'external:fs', message: "tool 'fs_bad name' from external:fs skipped: invalid tool name" },
    ]);
    expect(snapshot.get('fs_read')?.binding).toEqual({ kind: 'external', providerId: 'fs', remoteName: 'read' });
    expect(snapshot.get('fs_read')?.parameters).toEqual([{ name: 'value', type: 'string', required: false }]);
  });

  it('routes external calls to the owning provider with the remote name', async () => {
    const caps = new FakeCapabilities([{ providerId: 'fs', prefix: 'fs_', tools: [remoteTool('read')] }]);
    const snapshot = new ToolRegistry({ capabilities: caps }).snapshot();

    await expect(snapshot.get('fs_read')?.invoke({ value: 'x' }, CTX)).resolves.toBe('remote-ok');
    expect(caps.invocations).toEqual([{ providerId: 'fs', remoteName: 'read', args: { value: 'x' }, timeoutMs: 1234 }]);
  });

  it('publishes a new version when capabilities change and leaves old snapshots intact', () => {
    const caps = new FakeCapabilities([{ providerId: 'a', tools: [remoteTool('one')] }]);
    const registry = new ToolRegistry({ capabilities: caps });
    const before = registry.snapshot();

    caps.publish([{ providerId: 'a', tools: [remoteTool('one'), remoteTool('two')] }]);
    const after = registry.snapshot();

    expect(after.version).toBe(2);
    expect(after.has('two')).toBe(true);
    expect(before.has('two')).toBe(false);
    expect(before.size).toBe(1);
  });

  it('keeps the version when a token bump changes nothing', () => {
    const caps = new FakeCapabilities([{ providerId: 'a', tools: [remoteTool('one')] }]);
    const registry = new ToolRegistry({ capabilities: caps });
    const before = registry.snapshot();

    caps.publish([{ providerId: 'a', tools: [remoteTool('one')] }]);

    expect(registry.snapshot()).toBe(before);
  });

  it('drops every external tool of a provider that goes away', () => {
    const caps = new FakeCapabilities([{ providerId: 'a', tools: [remoteTool('one')] }]);
    const registry = withBuiltins(new ToolRegistry({ capabilities: caps }));
    registry.snapshot();

    caps.publish([]);

    expect(registry.snapshot().list().map((tool) => tool.origin)).toEqual(['builtin']);
  });

  it('exports the model-facing catalog', () => {
    const snapshot = withBuiltins(new ToolRegistry()).snapshot();
    expect(snapshot.export()).toEqual([
      { name: 'get_current_time', description: 'Get the current date and time.', input_schema: { type: 'object', properties: {} } },
    ]);
  });

  it('rejects a second builtin load and duplicate builtin names', () => {
    const registry = withBuiltins(new ToolRegistry());
    expect(() => registry.loadBuiltins([])).toThrow(ConfigError);

    const twice = createBuiltinCatalog();
    expect(() => new ToolRegistry().loadBuiltins([...twice, ...twice])).toThrow("builtin tool 'get_current_time' is defined twice");
  });

  it('runs builtin handlers through the descriptor', async () => {
    const snapshot = withBuiltins(new ToolRegistry()).snapshot();
    await expect(snapshot.get('get_current_time')?.invoke({}, CTX)).resolves.toBe('2024-01-02 03:04:05');
  });
});

describe('ToolRegistry user modules', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolcore-tools-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads valid definitions and reports the rest', async () => {
    fs.writeFileSync(path.join(dir, 'good.mjs'), GOOD_MODULE);
    fs.writeFileSync(path.join(dir, 'bad.mjs'), BAD_MODULE);
    fs.writeFileSync(path.join(dir, 'empty.mjs'), 'export const nothing = 1;\n');
    fs.writeFileSync(path.join(dir, 'broken.mjs'), 'export const tools = [;\n');
    fs.writeFileSync(path.join(dir, '_draft.mjs'), 'throw new Error("never imported");\n');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

    const registry = withBuiltins(new ToolRegistry());
    const diagnostics = await registry.loadUserModules(dir);

    expect(diagnostics.map((entry) => [entry.kind, path.basename(entry.source)])).toEqual([
      ['invalid_definition', 'bad.mjs'],
      ['invalid_definition', 'bad.mjs'],
      ['load_failure', 'broken.mjs'],
      ['invalid_definition', 'empty.mjs'],
    ]);
    expect(diagnostics[0].message).toBe('tool bad name skipped: name: must match [A-Za-z0-9][A-Za-z0-9_-]{0,63}');
    expect(diagnostics[1].message).toBe('tool no_handler skipped: handler: must be a function');
    expect(diagnostics[2].message.startsWith('failed to import: ')).toBe(true);
    expect(diagnostics[3].message).toBe('module exports no `tools` array or default array');

    const snapshot = registry.snapshot();
    expect(snapshot.list().map((tool) => [tool.name, tool.origin])).toEqual([
      ['get_current_time', 'builtin'],
      ['fine', 'user-loaded'],
      ['shout', 'user-loaded'],
    ]);
    expect(snapshot.warnings.at(-1)).toEqual({
      kind: 'name_conflict',
      source: 'user-loaded',
      message: "tool 'get_current_time' from user-loaded dropped: name already provided by builtin",
    });
    expect(snapshot.get('shout')?.inputSchema).toEqual({
      type: 'object',
      properties: { text: { type: 'string', description: 'Text to shout' } },
      required: ['text'],
    });
    await expect(snapshot.get('shout')?.invoke({ text: 'hi' }, CTX)).resolves.toBe('HI');
  });

  it('picks up new modules on reload and keeps the version when nothing changed', async () => {
    fs.writeFileSync(path.join(dir, 'good.mjs'), GOOD_MODULE);
    const registry = withBuiltins(new ToolRegistry());
    await registry.loadUserModules(dir);
    const first = registry.snapshot();

    expect(await registry.reload()).toBe(first);

    fs.writeFileSync(path.join(dir, 'more.mjs'), "export const tools = [{ name: 'whisper', description: 'Lower-case.', handler: ({ text }) => String(text).toLowerCase() }];\n");
    const second = await registry.reload();

    expect(second.version).toBe(first.version + 1);
    expect(second.has('whisper')).toBe(true);
    expect(first.has('whisper')).toBe(false);
  });

  it('reports new load failures without moving the version', async () => {
    fs.writeFileSync(path.join(dir, 'good.mjs'), GOOD_MODULE);
    const registry = withBuiltins(new ToolRegistry());
    await registry.loadUserModules(dir);
    const first = registry.snapshot();

    fs.writeFileSync(path.join(dir, 'broken.mjs'), 'export const tools = [;\n');
    const second = await registry.reload();

    expect(second).not.toBe(first);
    expect(second.version).toBe(first.version);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second.warnings.map((warning) => [warning.kind, path.basename(warning.source)])).toEqual([
      ['load_failure', 'broken.mjs'],
      ['name_conflict', 'user-loaded'],
    ]);
    expect(first.warnings.map((warning) => warning.kind)).toEqual(['name_conflict']);
    expect(await registry.reload()).toBe(second);
  });

  it('treats a missing directory as empty', async () => {
    const registry = new ToolRegistry();
    expect(await registry.loadUserModules(path.join(dir, 'absent'))).toEqual([]);
    expect(registry.snapshot().size).toBe(0);
  });
});

describe('assertSnapshotIntegrity', () => {
  it('accepts registry snapshots', () => {
    expect(() => { assertSnapshotIntegrity(withBuiltins(new ToolRegistry()).snapshot()); }).not.toThrow();
  });

  it('rejects a snapshot whose listing disagrees with its size', () => {
    const real = withBuiltins(new ToolRegistry()).snapshot();
    const forged: RegistrySnapshot = Object.freeze({
      version: real.version,
      fingerprint: real.fingerprint,
      createdAt: real.createdAt,
      warnings: real.warnings,
      size: 5,
      get: (name: string) => real.get(name),
      has: (name: string) => real.has(name),
      list: () => real.list(),
      export: () => real.export(),
    });
    expect(() => { assertSnapshotIntegrity(forged); }).toThrow(FatalError);
  });
});
