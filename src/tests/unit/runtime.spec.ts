import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import type { ToolDefinition } from '../../tools/types.js';
import type { LogEntry } from '../../types.js';

import { parseConfig } from '../../config.js';
import { ConfigError } from '../../errors.js';
import { ToolcoreRuntime } from '../../runtime.js';
import { ScriptedModelClient } from '../../session/scripted-model.js';
import { createDeferred, delay } from '../../utils.js';
import { FakeChannelFactory } from '../support/fake-channel.js';
import { collect } from '../support/streams.js';

const runtimes: ToolcoreRuntime[] = [];
const tempDirs: string[] = [];

const makeRuntime = (raw: Record<string, unknown>, options: ConstructorParameters<typeof ToolcoreRuntime>[1] = {}): ToolcoreRuntime => {
  const runtime = new ToolcoreRuntime(parseConfig({ supervisor: { healthIntervalMs: 0 }, ...raw }), {
    channelFactory: new FakeChannelFactory().create,
    ...options,
  });
  runtimes.push(runtime);
  return runtime;
};

const tempDir = (): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolcore-runtime-'));
  tempDirs.push(dir);
  return dir;
};

afterEach(async () => {
  await Promise.all(runtimes.splice(0).map((runtime) => runtime.shutdown()));
  tempDirs.splice(0).forEach((dir) => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('ToolcoreRuntime', () => {
  it('launches enabled providers only and starts once', async () => {
    const entries: LogEntry[] = [];
    const runtime = makeRuntime({
      providers: [
        { id: 'on', command: 'provider-a' },
        { id: 'off', command: 'provider-b', enabled: false },
      ],
    }, { log: (entry) => { entries.push(entry); } });

    await runtime.start();
    await runtime.start();

    expect(runtime.supervisor.list().map((handle) => handle.providerId)).toEqual(['on']);
    expect(entries.some((entry) => entry.remoteIdentifier === 'provider:off' && entry.message === 'provider disabled in configuration; not launched')).toBe(true);
    expect(runtime.registry.snapshot().list().map((tool) => tool.name)).toContain('get_current_time');
  });

  it('loads user tools from the configured directory', async () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, 'greet.mjs'), "export const tools = [{ name: 'greet', description: 'Greets.', handler: () => 'hello' }];\n");
    const runtime = makeRuntime({ registry: { userToolsDir: dir } });

    await runtime.start();

    expect(runtime.registry.snapshot().get('greet')?.origin).toBe('user-loaded');
  });

  it('builds its model from the configured script', async () => {
    const dir = tempDir();
    const script = path.join(dir, 'script.yaml');
    fs.writeFileSync(script, 'steps:\n  - final: "scripted"\n');
    const runtime = makeRuntime({ model: { script } });
    await runtime.start();

    expect(runtime.hasModel).toBe(true);
    const session = runtime.createSession({ prompt: 'hi', stepBudget: 1 });
    const events = await collect(session.stream);
    expect(events).toEqual([{ type: 'final_answer', sequence: 1, payload: { text: 'scripted' } }]);
  });

  it('refuses sessions without a model', async () => {
    const runtime = makeRuntime({});
    await runtime.start();
    expect(runtime.hasModel).toBe(false);
    expect(() => runtime.createSession({ prompt: 'hi' })).toThrow('no language model is configured; set model.script or supply a model client');
  });

  it('cancels active sessions on shutdown', async () => {
    const gate = createDeferred<string>();
    const wait: ToolDefinition = { name: 'wait', description: 'Blocks until released.', parameters: [], handler: async () => await gate.promise };
    const runtime = makeRuntime({}, { builtins: [wait] });
    await runtime.start();
    const session = runtime.createSession(
      { prompt: 'hi', sessionId: 'long' },
      new ScriptedModelClient({ steps: [{ toolCalls: [{ name: 'wait', arguments: {} }] }, { final: 'never' }] })
    );
    const reader = session.stream[Symbol.asyncIterator]();
    const started = await reader.next();
    expect(started.value?.type).toBe('tool_call_started');
    expect(runtime.activeSessions).toBe(1);

    await runtime.shutdown();
    const ended = await reader.next();
    expect(ended.value).toEqual({ type: 'session_ended', sequence: 2, payload: { reason: 'cancelled', steps: 1, detail: 'server shutting down' } });

    gate.resolve('done');
    expect((await session.start()).state).toBe('cancelled');
    await delay(0);
    expect(runtime.activeSessions).toBe(0);
  });

  it('rejects a second session under an id that is still running', async () => {
    const gate = createDeferred<string>();
    const wait: ToolDefinition = { name: 'wait', description: 'Blocks until released.', parameters: [], handler: async () => await gate.promise };
    const runtime = makeRuntime({}, { builtins: [wait] });
    await runtime.start();
    const script = { steps: [{ toolCalls: [{ name: 'wait', arguments: {} }] }, { final: 'first' }] };
    const first = runtime.createSession({ prompt: 'hi', sessionId: 'dup' }, new ScriptedModelClient(script));

    expect(() => runtime.createSession({ prompt: 'again', sessionId: 'dup' }, new ScriptedModelClient(script)))
      .toThrow(new ConfigError("session 'dup' is already running"));
    expect(runtime.activeSessions).toBe(1);
    expect(runtime.findSession('dup')).toBe(first);

    gate.resolve('done');
    expect((await first.start()).state).toBe('completed');
    await delay(0);
    expect(runtime.activeSessions).toBe(0);

    const second = runtime.createSession({ prompt: 'again', sessionId: 'dup' }, new ScriptedModelClient({ steps: [{ final: 'second' }] }));
    expect(await collect(second.stream)).toEqual([{ type: 'final_answer', sequence: 1, payload: { text: 'second' } }]);
    await second.start();
    await delay(0);
    expect(runtime.isSessionActive('dup')).toBe(false);
  });
});
