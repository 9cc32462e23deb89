import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { ShutdownController } from '../../shutdown-controller.js';

describe('ShutdownController', () => {
  it('runs tasks newest first and only once', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    controller.register('runtime', () => { order.push('runtime'); });
    controller.register('http', async () => { order.push('http'); });

    await Promise.all([controller.shutdown(), controller.shutdown()]);
    await controller.shutdown();

    expect(order).toEqual(['http', 'runtime']);
    expect(controller.isStopping()).toBe(true);
    expect(controller.signal.aborted).toBe(true);
  });

  it('keeps going after a failing task and logs it', async () => {
    const controller = new ShutdownController();
    const entries: LogEntry[] = [];
    const order: string[] = [];
    controller.register('first', () => { order.push('first'); });
    controller.register('broken', () => { throw new Error('boom'); });

    await controller.shutdown({ log: (entry) => { entries.push(entry); } });

    expect(order).toEqual(['first']);
    expect(entries.map((entry) => [entry.severity, entry.message])).toEqual([['WRN', "shutdown task 'broken' failed: boom"]]);
  });

  it('skips unregistered tasks', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    const unregister = controller.register('gone', () => { order.push('gone'); });
    unregister();
    await controller.shutdown();
    expect(order).toEqual([]);
  });
});
