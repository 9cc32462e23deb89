#!/usr/bin/env node
import path from 'node:path';

import { Command, Option } from 'commander';

import type { ToolcoreConfig } from './config.js';
import type { LogFormat } from './logging/structured-logger.js';
import type { ModelFactory } from './runtime.js';
import type { LogFn, LogSeverity } from './types.js';
import type { CommanderError } from 'commander';

import { ProviderConfigStore } from './config-store.js';
import { loadConfig, resolveConfigPath } from './config.js';
import { errorMessage, isCoreError } from './errors.js';
import { StructuredLogger } from './logging/structured-logger.js';
import { ToolcoreRuntime } from './runtime.js';
import { startServer } from './server/index.js';
import { formatSseEvent } from './server/sse.js';
import { ScriptedModelClient, loadModelScript } from './session/scripted-model.js';
import { ShutdownController } from './shutdown-controller.js';
import { createLogEntry } from './types.js';
import { setWarningSink } from './utils.js';

const VERSION = '0.1.0';
const SHUTDOWN_WATCHDOG_MS = 30_000;

interface GlobalOptions {
  config?: string;
  logFormat?: LogFormat;
  verbose?: boolean;
  trace?: boolean;
  color?: boolean;
}

let hasExited = false;
function exitWith(code: number, reason: string, log?: LogFn): never {
  const severity: LogSeverity = code === 0 ? 'FIN' : 'ERR';
  const entry = createLogEntry('cli', severity, 'exit', reason, { fatal: code !== 0 });
  if (log !== undefined) {
    log(entry);
  } else if (code !== 0) {
    process.stderr.write(`${reason}\n`);
  }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const program = new Command();
program
  .name('toolcore')
  .description('Tool orchestration and streaming core for language-model agents')
  .version(VERSION)
  .option('-c, --config <path>', 'configuration file (default: toolcore.yaml|yml|json in the working directory)')
  .addOption(new Option('--log-format <format>', 'log output format').choices(['logfmt', 'json', 'console', 'none']))
  .option('--verbose', 'log verbose lifecycle messages')
  .option('--trace', 'log trace messages (implies --verbose)')
  .option('--no-color', 'disable colored log output');

program.exitOverride((err: CommanderError) => {
  if (err.exitCode === 0) exitWith(0, 'done');
  exitWith(err.exitCode, `commander: ${err.message}`);
});

interface Context {
  config: ToolcoreConfig;
  logger: StructuredLogger;
  log: LogFn;
}

function prepare(): Context {
  const opts = program.opts<GlobalOptions>();
  let config: ToolcoreConfig;
  try {
    config = loadConfig(opts.config);
  } catch (error) {
    exitWith(isCoreError(error) ? 2 : 1, errorMessage(error));
  }
  const logger = new StructuredLogger({
    format: opts.logFormat ?? config.log.format,
    verbose: opts.verbose === true || config.log.verbose,
    trace: opts.trace === true || config.log.trace,
    color: opts.color === false ? false : (config.log.color ?? process.stderr.isTTY),
    labels: { app: 'toolcore' },
  });
  const { log } = logger;
  setWarningSink((message) => {
    log(createLogEntry('cli', 'WRN', 'warning', message));
  });
  return { config, logger, log };
}

const scriptFactory = (scriptPath: string): ModelFactory => {
  const script = loadModelScript(scriptPath);
  return () => new ScriptedModelClient(script);
};

/** Waits until every configured provider has settled into ready, degraded or stopped. */
async function awaitProviders(runtime: ToolcoreRuntime, log: LogFn): Promise<void> {
  const timeoutMs = runtime.config.supervisor.handshakeTimeoutMs * 2;
  const ids = runtime.supervisor.list().map((handle) => handle.providerId);
  const results = await Promise.allSettled(ids.map((id) => runtime.supervisor.waitForState(id, ['ready', 'degraded', 'stopped'], timeoutMs)));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      log(createLogEntry('cli', 'WRN', `provider:${ids[index]}`, `provider did not settle: ${errorMessage(result.reason)}`));
    }
  });
}

function installSignalHandlers(controller: ShutdownController, log: LogFn): () => void {
  const handlers = new Map<NodeJS.Signals, () => void>();
  const handleSignal = async (signal: NodeJS.Signals): Promise<void> => {
    if (controller.isStopping()) {
      exitWith(1, `received ${signal} during shutdown; forcing exit`, log);
    }
    log(createLogEntry('cli', 'WRN', 'signal', `received ${signal}, shutting down`));
    const watchdog = setTimeout(() => {
      exitWith(1, 'shutdown watchdog expired', log);
    }, SHUTDOWN_WATCHDOG_MS).unref();
    try {
      await controller.shutdown({ log });
    } finally {
      clearTimeout(watchdog);
    }
    exitWith(0, `stopped after ${signal}`, log);
  };
  (['SIGINT', 'SIGTERM'] as const).forEach((sig) => {
    const handler = (): void => {
      handleSignal(sig).catch((error: unknown) => {
        exitWith(1, `shutdown failed: ${errorMessage(error)}`, log);
      });
    };
    handlers.set(sig, handler);
    process.once(sig, handler);
  });
  return () => {
    handlers.forEach((handler, sig) => {
      process.removeListener(sig, handler);
    });
  };
}

program
  .command('serve')
  .description('Start the HTTP server')
  .option('--host <host>', 'bind address')
  .option('--port <port>', 'listen port', (value) => Number.parseInt(value, 10))
  .option('--script <file>', 'serve sessions with a scripted model')
  .action(async (cmd: { host?: string; port?: number; script?: string }) => {
    const { config, log } = prepare();
    const effective: ToolcoreConfig = {
      ...config,
      server: {
        ...config.server,
        ...(cmd.host !== undefined ? { host: cmd.host } : {}),
        ...(cmd.port !== undefined && Number.isFinite(cmd.port) ? { port: cmd.port } : {}),
      },
    };
    const runtime = new ToolcoreRuntime(effective, {
      log,
      providerStore: new ProviderConfigStore(resolveConfigPath(program.opts<GlobalOptions>().config) ?? path.join(process.cwd(), 'toolcore.yaml')),
      ...(cmd.script !== undefined ? { modelFactory: scriptFactory(cmd.script) } : {}),
    });
    const controller = new ShutdownController();
    controller.register('runtime', () => runtime.shutdown());
    installSignalHandlers(controller, log);
    await runtime.start();
    const server = await startServer(runtime, log);
    controller.register('http', () => server.close());
    if (!runtime.hasModel) {
      log(createLogEntry('cli', 'WRN', 'serve', 'no model configured; /api/chat will answer 503'));
    }
  });

program
  .command('tools')
  .description('Launch configured providers and list the merged tool catalog')
  .option('--json', 'print the catalog as JSON')
  .action(async (cmd: { json?: boolean }) => {
    const { config, log } = prepare();
    const runtime = new ToolcoreRuntime(config, { log });
    try {
      await runtime.start();
      await awaitProviders(runtime, log);
      const snapshot = runtime.registry.snapshot();
      if (cmd.json === true) {
        process.stdout.write(`${JSON.stringify(snapshot.export(), null, 2)}\n`);
      } else {
        snapshot.list().forEach((descriptor) => {
          process.stdout.write(`${descriptor.name}\t${descriptor.origin}\t${descriptor.description}\n`);
        });
      }
      snapshot.warnings.forEach((warning) => {
        log(createLogEntry('cli', 'WRN', warning.source, warning.message));
      });
    } finally {
      await runtime.shutdown();
    }
  });

program
  .command('run')
  .description('Run one session and print its event stream as SSE lines')
  .argument('<prompt>', 'user message')
  .option('--script <file>', 'scripted model to drive the session')
  .option('--step-budget <n>', 'maximum model steps', (value) => Number.parseInt(value, 10))
  .action(async (prompt: string, cmd: { script?: string; stepBudget?: number }) => {
    const { config, log } = prepare();
    const runtime = new ToolcoreRuntime(config, {
      log,
      ...(cmd.script !== undefined ? { modelFactory: scriptFactory(cmd.script) } : {}),
    });
    const controller = new ShutdownController();
    controller.register('runtime', () => runtime.shutdown());
    const removeHandlers = installSignalHandlers(controller, log);
    let state = 'unknown';
    try {
      await runtime.start();
      await awaitProviders(runtime, log);
      const session = runtime.createSession({
        prompt,
        ...(cmd.stepBudget !== undefined && Number.isFinite(cmd.stepBudget) ? { stepBudget: cmd.stepBudget } : {}),
      });
      // eslint-disable-next-line functional/no-loop-statements -- print events as they arrive
      for await (const event of session.stream) {
        process.stdout.write(formatSseEvent(event));
      }
      const summary = await session.start();
      state = summary.state;
    } finally {
      removeHandlers();
      await controller.shutdown({ log });
    }
    exitWith(state === 'completed' ? 0 : 1, `session ${state}`, log);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  exitWith(isCoreError(error) ? 2 : 1, errorMessage(error));
});
