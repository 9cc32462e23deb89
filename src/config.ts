import fs from 'node:fs';
import path from 'node:path';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { ProviderConfig } from './supervisor/types.js';

import { ConfigError } from './errors.js';
import { isPlainObject } from './utils.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ProviderEntrySchema = z.object({
  id: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
  enabled: z.boolean().default(true),
  cwd: z.string().optional(),
  prefix: z.string().optional(),
  serialize: z.boolean().optional(),
});

const SupervisorSectionSchema = z.object({
  handshakeTimeoutMs: positiveInt.default(10_000),
  healthIntervalMs: nonNegativeInt.default(30_000),
  healthCheckTimeoutMs: positiveInt.default(5_000),
  degradeAfterFailures: positiveInt.default(3),
  maxConsecutiveFailures: positiveInt.default(5),
  maxRestarts: nonNegativeInt.optional(),
  stableAfterMs: nonNegativeInt.default(60_000),
  killGraceMs: nonNegativeInt.default(2_000),
  invokeTimeoutMs: positiveInt.default(30_000),
  backoff: z.object({
    baseMs: positiveInt.default(1_000),
    capMs: positiveInt.default(60_000),
    jitter: z.number().min(0).max(1).default(0.2),
  }).default({}),
}).default({});

const GuardSectionSchema = z.object({
  thresholdChars: positiveInt.default(10_000),
  maxEntries: positiveInt.default(20),
  maxItems: positiveInt.default(5),
  capChars: positiveInt.default(3_000),
  maxValueChars: positiveInt.default(100),
  repetitionThreshold: positiveInt.default(2),
  historySize: positiveInt.default(64),
  auditDir: z.string().optional(),
  auditMode: z.enum(['all', 'truncated', 'none']).default('truncated'),
}).default({});

const ToolcoreConfigSchema = z.object({
  providers: z.array(ProviderEntrySchema).default([]),
  supervisor: SupervisorSectionSchema,
  registry: z.object({
    userToolsDir: z.string().optional(),
  }).default({}),
  guard: GuardSectionSchema,
  session: z.object({
    stepBudget: positiveInt.default(20),
    toolTimeoutMs: positiveInt.default(30_000),
    modelTimeoutMs: positiveInt.default(120_000),
  }).default({}),
  stream: z.object({
    windowSize: positiveInt.default(256),
    windowMs: positiveInt.default(2_000),
  }).default({}),
  server: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65_535).default(8_000),
    maxConcurrentSessions: positiveInt.default(10),
  }).default({}),
  model: z.object({
    script: z.string().optional(),
  }).default({}),
  log: z.object({
    format: z.enum(['logfmt', 'json', 'console', 'none']).default('logfmt'),
    verbose: z.boolean().default(false),
    trace: z.boolean().default(false),
    color: z.boolean().optional(),
  }).default({}),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.providers.forEach((provider, index) => {
    if (seen.has(provider.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['providers', index, 'id'], message: `duplicate provider id '${provider.id}'` });
    }
    seen.add(provider.id);
  });
});

export type ToolcoreConfig = z.infer<typeof ToolcoreConfigSchema>;
export type ProviderEntry = z.infer<typeof ProviderEntrySchema>;

const CONFIG_CANDIDATES = ['toolcore.yaml', 'toolcore.yml', 'toolcore.json'];

function expandEnv(str: string): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (process.env[name] ?? ''));
}

function expandDeep(value: unknown): unknown {
  if (typeof value === 'string') return expandEnv(value);
  if (Array.isArray(value)) return value.map((item) => expandDeep(item));
  if (isPlainObject(value)) {
    return Object.entries(value).reduce<Record<string, unknown>>((acc, [key, item]) => {
      acc[key] = expandDeep(item);
      return acc;
    }, {});
  }
  return value;
}

const normalizeProviderEntry = (entry: unknown, fallbackId?: string): unknown => {
  if (!isPlainObject(entry)) return entry;
  const out: Record<string, unknown> = { ...entry };
  if (out.id === undefined && typeof entry.provider_id === 'string') out.id = entry.provider_id;
  if (out.id === undefined && fallbackId !== undefined) out.id = fallbackId;
  delete out.provider_id;
  // Launchers written as one array: ["npx", "-y", "server"].
  if (Array.isArray(entry.command) && entry.command.length > 0) {
    const existing = Array.isArray(entry.args) ? entry.args : [];
    out.command = String(entry.command[0]);
    out.args = [...entry.command.slice(1).map((part) => String(part)), ...existing];
  }
  if (entry.environment !== undefined && entry.env === undefined) out.env = entry.environment;
  delete out.environment;
  // Accepted for compatibility with existing provider maps; stdio is the only transport.
  delete out.transport;
  delete out.type;
  return out;
};

/** Folds `mcpServers` / `mcp_servers` maps into the `providers` list. */
export function normalizeRawConfig(raw: unknown): unknown {
  if (!isPlainObject(raw)) return raw;
  const out: Record<string, unknown> = { ...raw };
  const listed = Array.isArray(raw.providers) ? raw.providers.map((entry) => normalizeProviderEntry(entry)) : [];
  const mapped = [raw.mcpServers, raw.mcp_servers]
    .filter(isPlainObject)
    .flatMap((servers) => Object.entries(servers).map(([id, entry]) => normalizeProviderEntry(entry, id)));
  delete out.mcpServers;
  delete out.mcp_servers;
  if (listed.length > 0 || mapped.length > 0 || raw.providers !== undefined) {
    out.providers = [...listed, ...mapped];
  }
  return out;
}

const resolveFrom = (baseDir: string, value: string | undefined): string | undefined => (
  value === undefined ? undefined : path.resolve(baseDir, value)
);

export function parseConfig(raw: unknown, source = 'configuration', baseDir = process.cwd()): ToolcoreConfig {
  const parsed = ToolcoreConfigSchema.safeParse(normalizeRawConfig(expandDeep(raw ?? {})));
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  const config = parsed.data;
  return {
    ...config,
    providers: config.providers.map((provider) => ({
      ...provider,
      ...(provider.cwd !== undefined ? { cwd: path.resolve(baseDir, provider.cwd) } : {}),
    })),
    registry: { userToolsDir: resolveFrom(baseDir, config.registry.userToolsDir) },
    guard: { ...config.guard, auditDir: resolveFrom(baseDir, config.guard.auditDir) },
    model: { script: resolveFrom(baseDir, config.model.script) },
  };
}

export function resolveConfigPath(configPath?: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new ConfigError(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  return CONFIG_CANDIDATES.map((name) => path.join(process.cwd(), name)).find((candidate) => fs.existsSync(candidate));
}

/**
 * Loads `configPath`, or the first of toolcore.yaml / toolcore.yml / toolcore.json
 * in the working directory. With no file at all, every default applies.
 * Relative paths inside the file resolve against the file's directory.
 */
export function loadConfig(configPath?: string): ToolcoreConfig {
  const resolved = resolveConfigPath(configPath);
  if (resolved === undefined) return parseConfig({}, 'defaults');
  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let raw: unknown;
  try {
    raw = /\.(ya?ml)$/i.test(resolved) ? yaml.load(content) : JSON.parse(content);
  } catch (e) {
    throw new ConfigError(`Invalid syntax in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfig(raw, resolved, path.dirname(path.resolve(resolved)));
}

export const toProviderConfig = (entry: ProviderEntry): ProviderConfig => ({
  id: entry.id,
  command: entry.command,
  args: [...entry.args],
  env: { ...entry.env },
  enabled: entry.enabled,
  ...(entry.cwd !== undefined ? { cwd: entry.cwd } : {}),
  ...(entry.prefix !== undefined ? { prefix: entry.prefix } : {}),
  ...(entry.serialize !== undefined ? { serialize: entry.serialize } : {}),
});

/** Validates one provider entry as received at runtime (API or CLI). */
export function parseProviderEntry(raw: unknown, fallbackId?: string): ProviderEntry {
  const parsed = ProviderEntrySchema.safeParse(normalizeProviderEntry(expandDeep(raw), fallbackId));
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid provider configuration: ${msgs}`);
  }
  return parsed.data;
}
