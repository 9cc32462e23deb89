import express from 'express';

import type { ToolcoreRuntime } from '../runtime.js';
import type { LogFn } from '../types.js';
import type { Express, Request, Response } from 'express';
import type { Server } from 'node:http';

import { createLogEntry } from '../types.js';

import { apiErrorHandler, buildApiRouter } from './api.js';

export interface RunningServer {
  port: number;
  close(): Promise<void>;
}

export function createApp(runtime: ToolcoreRuntime, log: LogFn): Express {
  const app = express();
  app.disable('x-powered-by');
  app.get('/health', (_req: Request, res: Response) => {
    const providers = runtime.supervisor.list();
    res.status(200).json({
      status: 'ok',
      sessions: runtime.activeSessions,
      tools: runtime.registry.snapshot().size,
      providers: providers.map((handle) => ({ id: handle.providerId, state: handle.state })),
    });
  });
  app.use('/api', buildApiRouter(runtime, {
    maxConcurrentSessions: runtime.config.server.maxConcurrentSessions,
    log,
  }));
  app.use(apiErrorHandler(log));
  return app;
}

/** Listens on the configured host and port; port 0 picks a free one. */
export async function startServer(runtime: ToolcoreRuntime, log: LogFn): Promise<RunningServer> {
  const { host, port } = runtime.config.server;
  const app = createApp(runtime, log);
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      listening.off('error', reject);
      resolve(listening);
    });
    listening.once('error', reject);
  });
  const address = server.address();
  const bound = typeof address === 'object' && address !== null ? address.port : port;
  log(createLogEntry('server', 'VRB', 'server', `listening on http://${host}:${String(bound)}`));
  return {
    port: bound,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((err) => {
        if (err !== undefined) reject(err);
        else resolve();
      });
    }),
  };
}
