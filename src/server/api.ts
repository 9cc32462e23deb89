import { Semaphore } from 'async-mutex';
import express from 'express';
import { z } from 'zod';

import type { CoreErrorCode } from '../errors.js';
import type { ToolcoreRuntime } from '../runtime.js';
import type { PriorTurn } from '../session/model-client.js';
import type { WireEvent } from '../stream/events.js';
import type { RegistrySnapshot } from '../tools/types.js';
import type { LogFn } from '../types.js';
import type { NextFunction, Request, Response, Router } from 'express';

import { parseProviderEntry, toProviderConfig } from '../config.js';
import { errorMessage, isCoreError } from '../errors.js';
import { createLogEntry } from '../types.js';
import { isPlainObject } from '../utils.js';

import { pipeEventsToSse } from './sse.js';

// Prior turns beyond this many, prompt included, are dropped oldest first.
const HISTORY_LIMIT = 10;

const ChatTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

const ChatBodySchema = z.object({
  message: z.string().min(1).optional(),
  messages: z.array(ChatTurnSchema).optional(),
  session_id: z.string().min(1).optional(),
  step_budget: z.number().int().positive().optional(),
  stream: z.boolean().default(true),
}).refine((body) => body.message !== undefined || body.messages?.at(-1)?.role === 'user', {
  path: ['message'],
  message: 'either message or messages ending with a user turn is required',
});

type ChatBody = z.infer<typeof ChatBodySchema>;

/** The prompt is `message`, or else the last turn of `messages`; the turns before it become history. */
const splitConversation = (body: ChatBody): { prompt: string; history: PriorTurn[] } => {
  const turns = body.messages ?? [];
  if (body.message !== undefined) {
    return { prompt: body.message, history: turns.slice(-(HISTORY_LIMIT - 1)) };
  }
  const recent = turns.slice(-HISTORY_LIMIT);
  return { prompt: recent.at(-1)?.content ?? '', history: recent.slice(0, -1) };
};

const STATUS_BY_CODE: Record<CoreErrorCode, number> = {
  config_error: 400,
  provider_unavailable: 503,
  timeout: 504,
  remote_error: 502,
  model_error: 502,
  fatal_error: 500,
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const wrap = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction): void => {
  handler(req, res).catch(next);
};

const describeSnapshot = (snapshot: RegistrySnapshot): Record<string, unknown> => ({
  version: snapshot.version,
  fingerprint: snapshot.fingerprint,
  tools: snapshot.list().map((descriptor) => ({
    name: descriptor.name,
    description: descriptor.description,
    origin: descriptor.origin,
    input_schema: descriptor.inputSchema,
  })),
  warnings: snapshot.warnings,
});

export interface ApiOptions {
  maxConcurrentSessions: number;
  log: LogFn;
}

/** Writes a provider change back to the configuration file; a failure is logged and the change stays live. */
const persistProviders = async (runtime: ToolcoreRuntime, log: LogFn, providerId: string, change: (store: NonNullable<ToolcoreRuntime['providerStore']>) => Promise<void>): Promise<void> => {
  const store = runtime.providerStore;
  if (store === undefined) return;
  try {
    await change(store);
  } catch (error) {
    log(createLogEntry('server', 'WRN', `provider:${providerId}`, `provider change not saved to ${store.filePath}: ${errorMessage(error)}`));
  }
};

export function buildApiRouter(runtime: ToolcoreRuntime, opts: ApiOptions): Router {
  const router = express.Router();
  router.use(express.json({ limit: '512kb' }));
  const slots = new Semaphore(opts.maxConcurrentSessions);

  router.get('/tools', (_req: Request, res: Response) => {
    res.status(200).json(describeSnapshot(runtime.registry.snapshot()));
  });

  router.post('/tools/reload', wrap(async (_req, res) => {
    const snapshot = await runtime.registry.reload();
    res.status(200).json(describeSnapshot(snapshot));
  }));

  router.get('/providers', (_req: Request, res: Response) => {
    res.status(200).json({ providers: runtime.supervisor.list() });
  });

  // Replaces any provider already registered under the same id.
  router.post('/providers/:id', wrap(async (req, res) => {
    const providerId = req.params.id;
    const body: unknown = req.body;
    const fields = isPlainObject(body) ? body : {};
    const entry = parseProviderEntry({ ...fields, id: providerId });
    if (runtime.supervisor.get(providerId) !== undefined) {
      await runtime.supervisor.deregisterProvider(providerId);
    }
    const handle = runtime.supervisor.registerProvider(toProviderConfig(entry));
    await persistProviders(runtime, opts.log, providerId, (store) => store.upsert(providerId, fields));
    res.status(201).json(handle);
  }));

  router.delete('/providers/:id', wrap(async (req, res) => {
    const providerId = req.params.id;
    if (runtime.supervisor.get(providerId) === undefined) {
      res.status(404).json({ error: 'not_found', message: `unknown provider '${providerId}'` });
      return;
    }
    await runtime.supervisor.deregisterProvider(providerId);
    await persistProviders(runtime, opts.log, providerId, (store) => store.remove(providerId));
    res.status(204).end();
  }));

  router.post('/providers/:id/enable', (req: Request, res: Response) => {
    const providerId = req.params.id;
    const handle = runtime.supervisor.get(providerId);
    if (handle === undefined) {
      res.status(404).json({ error: 'not_found', message: `unknown provider '${providerId}'` });
      return;
    }
    if (!runtime.supervisor.enableProvider(providerId)) {
      res.status(409).json({ error: 'conflict', message: `provider '${providerId}' is ${handle.state}; only stopped providers can be enabled` });
      return;
    }
    res.status(202).json(runtime.supervisor.get(providerId) ?? handle);
  });

  router.post('/chat', wrap(async (req, res) => {
    const parsed = ChatBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const msgs = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
      res.status(400).json({ error: 'invalid_request', message: msgs });
      return;
    }
    if (!runtime.hasModel) {
      res.status(503).json({ error: 'model_unavailable', message: 'no language model is configured' });
      return;
    }
    const { session_id: sessionId, step_budget: stepBudget, stream } = parsed.data;
    if (sessionId !== undefined && runtime.isSessionActive(sessionId)) {
      res.status(409).json({ error: 'conflict', message: `session '${sessionId}' is already running` });
      return;
    }
    if (slots.isLocked()) {
      res.status(503).json({ error: 'busy', message: `too many concurrent sessions (limit ${String(opts.maxConcurrentSessions)})` });
      return;
    }
    const [, release] = await slots.acquire();
    try {
      const { prompt, history } = splitConversation(parsed.data);
      const session = runtime.createSession({
        prompt,
        ...(history.length > 0 ? { history } : {}),
        ...(sessionId !== undefined ? { sessionId } : {}),
        ...(stepBudget !== undefined ? { stepBudget } : {}),
      });
      res.on('close', () => {
        if (!res.writableFinished) session.cancel('client disconnected');
      });
      if (!stream) {
        const events: WireEvent[] = [];
        // eslint-disable-next-line functional/no-loop-statements -- collect the whole session
        for await (const event of session.stream) events.push(event);
        if (res.destroyed) return;
        const final = events.find((event) => event.type === 'final_answer');
        res.status(200).json({
          session_id: session.id,
          final_answer: final?.type === 'final_answer' ? final.payload.text : null,
          events,
        });
        return;
      }
      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Session-Id', session.id);
      res.flushHeaders();
      await pipeEventsToSse(session.stream, res);
      if (!res.writableEnded && !res.destroyed) res.end();
    } finally {
      release();
    }
  }));

  return router;
}

/** Maps core error codes to HTTP statuses; must be registered after the routes. */
export const apiErrorHandler = (log: LogFn) => (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const message = errorMessage(err);
  let status = 500;
  let code = 'internal_error';
  if (isCoreError(err)) {
    status = STATUS_BY_CODE[err.code];
    code = err.code;
  } else if (err instanceof SyntaxError) {
    status = 400;
    code = 'invalid_json';
  }
  log(createLogEntry('server', status >= 500 ? 'ERR' : 'WRN', `${req.method} ${req.originalUrl}`, `request failed (${String(status)}): ${message}`, {
    ...(status >= 500 && err instanceof Error && err.stack !== undefined ? { stack: err.stack } : {}),
  }));
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json({ error: code, message });
};
